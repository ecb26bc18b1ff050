/**
 * Stand-in provider for builds without Firebase settings.
 * Reports push as unsupported so the client degrades to "no token".
 */

import { createLogger } from '@/lib/debug-logger';
import { detectPlatform } from '@/lib/platform';
import type { MessagingProvider } from './types';

const noop = () => {};

export function createUnconfiguredProvider(missing: readonly string[]): MessagingProvider {
  const log = createLogger('[UnconfiguredProvider]');

  return {
    platform: detectPlatform(),
    isSupported: async () => {
      log.error('Firebase is not configured, missing:', missing.join(', '));
      return false;
    },
    requestPermission: async () => 'not-determined',
    getPlatformToken: async () => null,
    getToken: async () => null,
    onTokenRefresh: () => noop,
    onForegroundMessage: () => noop,
    onNotificationTap: () => noop,
    getInitialMessage: async () => null,
  };
}
