/**
 * In-process MessagingProvider for tests. Every method is a spy; the
 * emit* helpers play the part of the browser and the service worker.
 */

import { vi } from 'vitest';
import type { Platform } from '@/lib/platform';
import type { AuthorizationStatus, InboundMessage, MessagingProvider, Unsubscribe } from '@/lib/push/types';

function listen<T>(listeners: Set<(value: T) => void>, listener: (value: T) => void): Unsubscribe {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export class FakeMessagingProvider implements MessagingProvider {
  platform: Platform = 'android';
  supported = true;
  permission: AuthorizationStatus = 'authorized';
  platformTokens: Array<string | null> = [];
  token: string | null = 'token-1';
  initialMessage: InboundMessage | null = null;

  readonly tokenListeners = new Set<(token: string) => void>();
  readonly foregroundListeners = new Set<(message: InboundMessage) => void>();
  readonly tapListeners = new Set<(message: InboundMessage) => void>();

  isSupported = vi.fn(async () => this.supported);
  requestPermission = vi.fn(async () => this.permission);
  getPlatformToken = vi.fn(async () => this.platformTokens.shift() ?? null);
  getToken = vi.fn(async () => this.token);
  onTokenRefresh = vi.fn((listener: (token: string) => void) => listen(this.tokenListeners, listener));
  onForegroundMessage = vi.fn((listener: (message: InboundMessage) => void) =>
    listen(this.foregroundListeners, listener)
  );
  onNotificationTap = vi.fn((listener: (message: InboundMessage) => void) =>
    listen(this.tapListeners, listener)
  );
  getInitialMessage = vi.fn(async () => {
    const message = this.initialMessage;
    this.initialMessage = null;
    return message;
  });

  emitTokenRefresh(token: string): void {
    this.tokenListeners.forEach((listener) => listener(token));
  }

  emitForeground(message: InboundMessage): void {
    this.foregroundListeners.forEach((listener) => listener(message));
  }

  emitTap(message: InboundMessage): void {
    this.tapListeners.forEach((listener) => listener(message));
  }
}
