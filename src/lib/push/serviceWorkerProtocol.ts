/**
 * Messages the messaging service worker posts to open pages.
 */

import { parseInboundMessage } from './message';
import type { InboundMessage } from './types';

export const NOTIFICATION_TAP_EVENT = 'push-probe:notification-tap';
export const SUBSCRIPTION_CHANGE_EVENT = 'push-probe:subscription-change';

export type ServiceWorkerEvent =
  | { type: typeof NOTIFICATION_TAP_EVENT; message: InboundMessage }
  | { type: typeof SUBSCRIPTION_CHANGE_EVENT };

export function parseServiceWorkerEvent(data: unknown): ServiceWorkerEvent | null {
  if (typeof data !== 'object' || data === null || !('type' in data)) {
    return null;
  }

  if (data.type === SUBSCRIPTION_CHANGE_EVENT) {
    return { type: SUBSCRIPTION_CHANGE_EVENT };
  }

  if (data.type === NOTIFICATION_TAP_EVENT && 'message' in data) {
    const message = parseInboundMessage(data.message);
    return message ? { type: NOTIFICATION_TAP_EVENT, message } : null;
  }

  return null;
}
