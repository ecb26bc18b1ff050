/**
 * Push Types
 *
 * Shared types for the messaging client, the presentation dispatcher and
 * the provider that bridges them to Firebase Cloud Messaging.
 */

import type { Platform } from '@/lib/platform';

/** Display fields of a received notification. */
export interface NotificationContent {
  title?: string;
  body?: string;
  imageUrl?: string;
}

/**
 * A received push message. Created frozen and never mutated.
 */
export interface InboundMessage {
  readonly messageId: string;
  /** Epoch milliseconds, when the provider reports it */
  readonly sentTime: number | null;
  readonly from: string | null;
  readonly notification: Readonly<NotificationContent> | null;
  readonly data: Readonly<Record<string, string>>;
}

/** Which provider callback delivered a message. */
export type DeliveryContext = 'foreground' | 'background-tap' | 'terminated-launch';

export type AuthorizationStatus = 'authorized' | 'provisional' | 'denied' | 'not-determined';

export type PushErrorKind =
  | 'unsupported'
  | 'permission-denied'
  | 'token-unavailable'
  | 'context-unavailable'
  | 'no-content'
  | 'provider-error'
  | 'disposed';

export interface PushError {
  kind: PushErrorKind;
  message: string;
  cause?: unknown;
}

export type PushResult<T> =
  | { success: true; value: T }
  | { success: false; error: PushError };

export type Unsubscribe = () => void;

/**
 * Receives the data payload of a tapped notification. Navigation is left
 * to the application.
 */
export type NotificationTapHandler = (
  data: Readonly<Record<string, string>>,
  message: InboundMessage,
  context: DeliveryContext
) => void;

/**
 * Bridge to the platform push-messaging provider.
 * Implemented for the browser by FirebaseMessagingProvider; tests use fakes.
 */
export interface MessagingProvider {
  readonly platform: Platform;
  isSupported(): Promise<boolean>;
  requestPermission(): Promise<AuthorizationStatus>;
  /** Low-level push subscription (the APNs-equivalent on iOS-class devices) */
  getPlatformToken(): Promise<string | null>;
  getToken(): Promise<string | null>;
  onTokenRefresh(listener: (token: string) => void): Unsubscribe;
  onForegroundMessage(listener: (message: InboundMessage) => void): Unsubscribe;
  onNotificationTap(listener: (message: InboundMessage) => void): Unsubscribe;
  /** The message whose tap cold-started the app, returned once */
  getInitialMessage(): Promise<InboundMessage | null>;
}
