/**
 * Messaging Service Worker
 *
 * Receives pushes while no page is in the foreground and routes taps on
 * the notifications Firebase displays back into the app.
 *
 * The tap listener is added before Firebase is initialized so it runs
 * ahead of the SDK's own handler and can stop it.
 */

import { initializeApp } from 'firebase/app';
import { getMessaging, onBackgroundMessage } from 'firebase/messaging/sw';
import { createLogger } from '@/lib/debug-logger';
import { getFirebaseConfig } from '@/lib/firebase/config';
import { handleBackgroundMessage } from '@/lib/push/backgroundHandler';
import {
  broadcastSubscriptionChange,
  extractTappedMessage,
  routeNotificationTap,
  type ClientsLike,
} from '@/lib/push/serviceWorkerHandlers';

// Only the parts of the worker scope this file touches; the DOM lib the
// rest of the app compiles against does not describe service workers.
interface ExtendableEventLike extends Event {
  waitUntil(promise: Promise<unknown>): void;
}

interface NotificationEventLike extends ExtendableEventLike {
  readonly notification: Notification;
}

interface MessagingWorkerScope {
  readonly clients: ClientsLike;
  addEventListener(type: 'notificationclick', listener: (event: NotificationEventLike) => void): void;
  addEventListener(type: 'pushsubscriptionchange', listener: (event: ExtendableEventLike) => void): void;
}

declare const self: MessagingWorkerScope;

const log = createLogger('[MessagingWorker]');

self.addEventListener('notificationclick', (event) => {
  const message = extractTappedMessage(event.notification.data);
  if (!message) {
    return;
  }

  event.stopImmediatePropagation();
  event.notification.close();
  event.waitUntil(
    routeNotificationTap(self.clients, message, log).catch((error: unknown) => {
      log.error('Failed to route notification tap:', error);
    })
  );
});

self.addEventListener('pushsubscriptionchange', (event) => {
  event.waitUntil(
    broadcastSubscriptionChange(self.clients).catch((error: unknown) => {
      log.error('Failed to broadcast subscription change:', error);
    })
  );
});

const config = getFirebaseConfig();
if (config.valid) {
  const app = initializeApp(config.settings.options);
  onBackgroundMessage(getMessaging(app), handleBackgroundMessage);
} else {
  log.error('Firebase is not configured, missing:', config.missing.join(', '));
}
