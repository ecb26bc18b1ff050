/**
 * Push Notifications Module
 *
 * Registration token, permission and delivery handling for Firebase Cloud
 * Messaging, plus the in-app banner dispatcher.
 */

export { MessagingClient, createLoggingTapHandler, type MessagingClientOptions } from './messagingClient';

export {
  PresentationDispatcher,
  toBannerContent,
  DEFAULT_BANNER_TITLE,
  type BannerContent,
  type BannerEntry,
  type BannerHandle,
  type OverlayLayer,
  type PresentationRoot,
  type PresentationDispatcherOptions,
} from './presentationDispatcher';

export { FirebaseMessagingProvider, toAuthorizationStatus } from './firebaseProvider';
export { createUnconfiguredProvider } from './unconfiguredProvider';
export { getPushSettings, DEFAULT_PUSH_SETTINGS, type PushSettings } from './config';
export { createInboundMessage, fromMessagePayload, hasDisplayContent } from './message';

export type {
  AuthorizationStatus,
  DeliveryContext,
  InboundMessage,
  MessagingProvider,
  NotificationTapHandler,
  PushError,
  PushErrorKind,
  PushResult,
} from './types';
