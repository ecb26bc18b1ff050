/**
 * Firebase Messaging Provider
 *
 * MessagingProvider on top of the Firebase JS SDK.
 *
 * The web SDK only covers part of the lifecycle, the rest comes from the
 * messaging service worker:
 * - Foreground messages: `onMessage`
 * - Taps while the app runs: relayed by the worker via postMessage
 * - Taps that cold-start the app: the worker opens `/?push_launch=...`
 * - Token refresh: the web SDK has no stream, so the token is re-read when
 *   the page becomes visible and when the worker reports a subscription
 *   change
 */

import { getApps, initializeApp, type FirebaseApp } from 'firebase/app';
import {
  getMessaging,
  getToken,
  isSupported,
  onMessage,
  type Messaging,
} from 'firebase/messaging';
import { createLogger, type Logger } from '@/lib/debug-logger';
import type { FirebaseSettings } from '@/lib/firebase/config';
import { detectPlatform, type Platform } from '@/lib/platform';
import { LAUNCH_PARAM, fromMessagePayload, readLaunchMessage } from './message';
import { registerMessagingServiceWorker } from './serviceWorkerRegistration';
import { NOTIFICATION_TAP_EVENT, SUBSCRIPTION_CHANGE_EVENT, parseServiceWorkerEvent } from './serviceWorkerProtocol';
import type { AuthorizationStatus, InboundMessage, MessagingProvider, Unsubscribe } from './types';

export interface FirebaseMessagingProviderOptions {
  settings: FirebaseSettings;
  registerServiceWorker?: () => Promise<ServiceWorkerRegistration>;
  platform?: Platform;
  logger?: Logger;
}

export function toAuthorizationStatus(permission: NotificationPermission): AuthorizationStatus {
  switch (permission) {
    case 'granted':
      return 'authorized';
    case 'denied':
      return 'denied';
    default:
      return 'not-determined';
  }
}

export class FirebaseMessagingProvider implements MessagingProvider {
  readonly platform: Platform;
  private readonly settings: FirebaseSettings;
  private readonly registerServiceWorker: () => Promise<ServiceWorkerRegistration>;
  private readonly log: Logger;
  private messaging: Messaging | null = null;
  private registration: Promise<ServiceWorkerRegistration> | null = null;
  private lastToken: string | null = null;
  private launchConsumed = false;

  constructor(options: FirebaseMessagingProviderOptions) {
    this.settings = options.settings;
    this.registerServiceWorker = options.registerServiceWorker ?? registerMessagingServiceWorker;
    this.platform = options.platform ?? detectPlatform();
    this.log = options.logger ?? createLogger('[FirebaseProvider]');
  }

  async isSupported(): Promise<boolean> {
    if (typeof window === 'undefined' || typeof Notification === 'undefined') {
      return false;
    }
    if (!('serviceWorker' in navigator)) {
      return false;
    }
    return isSupported();
  }

  async requestPermission(): Promise<AuthorizationStatus> {
    const permission = await Notification.requestPermission();
    return toAuthorizationStatus(permission);
  }

  async getPlatformToken(): Promise<string | null> {
    const registration = await this.getRegistration();
    const subscription = await registration.pushManager.getSubscription();
    return subscription?.endpoint ?? null;
  }

  async getToken(): Promise<string | null> {
    const messaging = this.getMessagingInstance();
    const serviceWorkerRegistration = await this.getRegistration();
    const token = await getToken(messaging, {
      vapidKey: this.settings.vapidKey,
      serviceWorkerRegistration,
    });
    this.lastToken = token || null;
    return this.lastToken;
  }

  onTokenRefresh(listener: (token: string) => void): Unsubscribe {
    const recheck = (reason: string) => {
      const previous = this.lastToken;
      this.getToken()
        .then((token) => {
          if (token && token !== previous) {
            this.log.debug(`Token changed (${reason})`);
            listener(token);
          }
        })
        .catch((error: unknown) => {
          this.log.warn(`Token re-check failed (${reason}):`, error);
        });
    };

    const handleVisibilityChange = () => {
      if (document.visibilityState === 'visible') {
        recheck('visible');
      }
    };
    const handleWorkerMessage = (event: MessageEvent) => {
      const parsed = parseServiceWorkerEvent(event.data);
      if (parsed?.type === SUBSCRIPTION_CHANGE_EVENT) {
        recheck('subscription-change');
      }
    };

    document.addEventListener('visibilitychange', handleVisibilityChange);
    navigator.serviceWorker.addEventListener('message', handleWorkerMessage);

    return () => {
      document.removeEventListener('visibilitychange', handleVisibilityChange);
      navigator.serviceWorker.removeEventListener('message', handleWorkerMessage);
    };
  }

  onForegroundMessage(listener: (message: InboundMessage) => void): Unsubscribe {
    const messaging = this.getMessagingInstance();
    return onMessage(messaging, (payload) => {
      listener(fromMessagePayload(payload));
    });
  }

  onNotificationTap(listener: (message: InboundMessage) => void): Unsubscribe {
    const handleWorkerMessage = (event: MessageEvent) => {
      const parsed = parseServiceWorkerEvent(event.data);
      if (parsed?.type === NOTIFICATION_TAP_EVENT) {
        listener(parsed.message);
      }
    };

    navigator.serviceWorker.addEventListener('message', handleWorkerMessage);
    return () => {
      navigator.serviceWorker.removeEventListener('message', handleWorkerMessage);
    };
  }

  async getInitialMessage(): Promise<InboundMessage | null> {
    if (this.launchConsumed || typeof window === 'undefined') {
      return null;
    }
    this.launchConsumed = true;

    const message = readLaunchMessage(window.location.search);
    if (!message) {
      return null;
    }

    // Drop the parameter so a reload does not replay the launch
    const url = new URL(window.location.href);
    url.searchParams.delete(LAUNCH_PARAM);
    window.history.replaceState(window.history.state, '', `${url.pathname}${url.search}${url.hash}`);

    return message;
  }

  private getApp(): FirebaseApp {
    const existing = getApps()[0];
    return existing ?? initializeApp(this.settings.options);
  }

  private getMessagingInstance(): Messaging {
    if (!this.messaging) {
      this.messaging = getMessaging(this.getApp());
    }
    return this.messaging;
  }

  private getRegistration(): Promise<ServiceWorkerRegistration> {
    if (!this.registration) {
      this.registration = this.registerServiceWorker().catch((error: unknown) => {
        // Allow a later call to try again
        this.registration = null;
        throw error;
      });
    }
    return this.registration;
  }
}
