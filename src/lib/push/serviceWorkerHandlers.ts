/**
 * Service worker side of notification taps.
 *
 * Kept free of service worker globals so it can be exercised from tests;
 * the worker entry passes its `clients` in.
 */

import type { Logger } from '@/lib/debug-logger';
import { buildLaunchUrl, parseInboundMessage } from './message';
import { NOTIFICATION_TAP_EVENT, SUBSCRIPTION_CHANGE_EVENT, type ServiceWorkerEvent } from './serviceWorkerProtocol';
import type { InboundMessage } from './types';

/** Key under which Firebase stores the original payload on notifications it displays */
export const FCM_MESSAGE_KEY = 'FCM_MSG';

export interface WindowClientLike {
  readonly url: string;
  focus(): Promise<unknown>;
  postMessage(message: ServiceWorkerEvent): void;
}

export interface ClientsLike {
  matchAll(options: { type: 'window'; includeUncontrolled: boolean }): Promise<readonly WindowClientLike[]>;
  openWindow(url: string): Promise<unknown>;
}

export type TapRoute = 'focused' | 'opened';

/**
 * Recover the message behind a tapped notification. Returns null for
 * notifications this app did not display.
 */
export function extractTappedMessage(notificationData: unknown): InboundMessage | null {
  if (typeof notificationData !== 'object' || notificationData === null) {
    return null;
  }
  if (FCM_MESSAGE_KEY in notificationData) {
    return parseInboundMessage(notificationData[FCM_MESSAGE_KEY]);
  }
  return parseInboundMessage(notificationData);
}

/**
 * Hand a tap to a running page, or cold-start one with the message in its URL.
 */
export async function routeNotificationTap(
  clients: ClientsLike,
  message: InboundMessage,
  log: Logger
): Promise<TapRoute> {
  const windows = await clients.matchAll({ type: 'window', includeUncontrolled: true });
  const target = windows[0];

  if (target) {
    target.postMessage({ type: NOTIFICATION_TAP_EVENT, message });
    try {
      await target.focus();
    } catch (error) {
      log.warn('Could not focus window after notification tap:', error);
    }
    log.debug('Notification tap relayed to open window', message.messageId);
    return 'focused';
  }

  const url = buildLaunchUrl(message);
  await clients.openWindow(url);
  log.debug('Opened window for notification tap', message.messageId);
  return 'opened';
}

/**
 * Tell open pages the push subscription changed so they re-read the token.
 */
export async function broadcastSubscriptionChange(clients: ClientsLike): Promise<number> {
  const windows = await clients.matchAll({ type: 'window', includeUncontrolled: true });
  for (const client of windows) {
    client.postMessage({ type: SUBSCRIPTION_CHANGE_EVENT });
  }
  return windows.length;
}
