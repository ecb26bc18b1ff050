/**
 * Messaging Client
 *
 * Bridge between the push-messaging provider and the rest of the app:
 * requests permission, owns the registration token and installs the
 * delivery handlers.
 *
 * Delivery paths:
 * - Foreground: message arrives while the page is visible -> banner
 * - Background tap: user taps a system notification while the app runs
 *   in the background -> tap handler
 * - Terminated launch: the tap cold-started the app -> tap handler
 * Messages delivered while no page is open are handled by the service
 * worker (see backgroundHandler.ts).
 *
 * No method throws. Failures come back as PushResult errors and are
 * logged here, so notification plumbing never takes the app down.
 */

import { createLogger, type Logger } from '@/lib/debug-logger';
import { isIosClass } from '@/lib/platform';
import { DEFAULT_PUSH_SETTINGS } from './config';
import { describeMessage } from './message';
import type { PresentationDispatcher } from './presentationDispatcher';
import { fail, ok, toPushError } from './result';
import type {
  AuthorizationStatus,
  DeliveryContext,
  InboundMessage,
  MessagingProvider,
  NotificationTapHandler,
  PushResult,
  Unsubscribe,
} from './types';

export interface MessagingClientOptions {
  dispatcher: PresentationDispatcher;
  onNotificationTap?: NotificationTapHandler;
  /** Wait before asking again for a missing iOS push subscription */
  platformTokenRetryMs?: number;
  logger?: Logger;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Default tap handler. Navigation based on the payload is left to the
 * application; this only records what would be acted on.
 */
export function createLoggingTapHandler(log: Logger): NotificationTapHandler {
  return (data, message, context) => {
    log.info(`Handling notification tap (${context})`, { messageId: message.messageId, data });
  };
}

export class MessagingClient {
  private readonly provider: MessagingProvider;
  private readonly dispatcher: PresentationDispatcher;
  private readonly onNotificationTap: NotificationTapHandler;
  private readonly platformTokenRetryMs: number;
  private readonly log: Logger;

  private token: string | null = null;
  private permission: AuthorizationStatus | null = null;
  private initializing: Promise<PushResult<AuthorizationStatus>> | null = null;
  private initialized: PushResult<AuthorizationStatus> | null = null;
  private handlersRegistered = false;
  private subscriptions: Unsubscribe[] = [];
  private tokenRefreshSubscribed = false;
  /** Bumped by dispose(); runs started under an older value install nothing */
  private generation = 0;

  constructor(provider: MessagingProvider, options: MessagingClientOptions) {
    this.provider = provider;
    this.dispatcher = options.dispatcher;
    this.log = options.logger ?? createLogger('[MessagingClient]');
    this.onNotificationTap = options.onNotificationTap ?? createLoggingTapHandler(this.log);
    this.platformTokenRetryMs = options.platformTokenRetryMs ?? DEFAULT_PUSH_SETTINGS.platformTokenRetryMs;
  }

  /** The current registration token, if one has been issued. */
  getToken(): string | null {
    return this.token;
  }

  /** Last permission status reported by the provider. */
  getPermissionStatus(): AuthorizationStatus | null {
    return this.permission;
  }

  /**
   * Request permission, fetch the token and install the delivery handlers.
   * Concurrent calls share one run; a successful run is not repeated.
   * A run that could not install its message handlers is not cached, so
   * the next call tries again.
   */
  initialize(): Promise<PushResult<AuthorizationStatus>> {
    if (this.initialized) {
      this.log.debug('Already initialized, skipping');
      return Promise.resolve(this.initialized);
    }
    if (this.initializing) {
      return this.initializing;
    }
    const run: Promise<PushResult<AuthorizationStatus>> = this.runInitialize().finally(() => {
      if (this.initializing === run) {
        this.initializing = null;
      }
    });
    this.initializing = run;
    return run;
  }

  /**
   * Fetch the token from the provider again and store it.
   */
  async refreshToken(): Promise<PushResult<string>> {
    return this.fetchToken(this.generation);
  }

  /**
   * Install the foreground, background-tap and terminated-launch handlers.
   * A second call installs nothing.
   */
  async registerHandlers(): Promise<PushResult<void>> {
    const generation = this.generation;
    if (this.handlersRegistered) {
      this.log.debug('Handlers already registered');
      return ok(undefined);
    }

    const installed: Unsubscribe[] = [];
    try {
      installed.push(
        this.provider.onForegroundMessage((message) => this.handleForegroundMessage(message))
      );
      installed.push(
        this.provider.onNotificationTap((message) => {
          this.log.info('Notification tapped while app was in background', describeMessage(message));
          this.handleNotificationTap(message, 'background-tap');
        })
      );
    } catch (error) {
      this.log.error('Failed to register message handlers:', error);
      installed.forEach((unsubscribe) => unsubscribe());
      return { success: false, error: toPushError('provider-error', error) };
    }
    this.subscriptions.push(...installed);
    this.handlersRegistered = true;

    return this.checkInitialMessage(generation);
  }

  /**
   * Forward a tapped notification's data payload to the tap handler.
   */
  handleNotificationTap(message: InboundMessage, context: DeliveryContext): void {
    try {
      this.onNotificationTap(message.data, message, context);
    } catch (error) {
      this.log.error('Notification tap handler failed:', error);
    }
  }

  /**
   * Remove every listener and forget the token (e.g. on teardown).
   * An initialization still in flight stops at its next step.
   */
  dispose(): void {
    this.log.debug('Cleaning up messaging state');
    this.generation += 1;
    for (const unsubscribe of this.subscriptions) {
      try {
        unsubscribe();
      } catch (error) {
        this.log.warn('Failed to remove listener:', error);
      }
    }
    this.subscriptions = [];
    this.handlersRegistered = false;
    this.tokenRefreshSubscribed = false;
    this.initialized = null;
    this.initializing = null;
    this.token = null;
  }

  private isStale(generation: number): boolean {
    return generation !== this.generation;
  }

  private disposedDuring<T>(step: string): PushResult<T> {
    this.log.debug(`Client disposed while ${step}, stopping`);
    return fail('disposed', `Messaging client was disposed while ${step}`);
  }

  private async runInitialize(): Promise<PushResult<AuthorizationStatus>> {
    const generation = this.generation;
    this.log.debug('Initializing push messaging');

    try {
      const supported = await this.provider.isSupported();
      if (this.isStale(generation)) {
        return this.disposedDuring('checking support');
      }
      if (!supported) {
        this.log.info('Push messaging is not supported in this browser');
        return fail('unsupported', 'Push messaging is not supported on this platform');
      }
    } catch (error) {
      this.log.error('Support check failed:', error);
      return { success: false, error: toPushError('unsupported', error) };
    }

    let status: AuthorizationStatus;
    try {
      status = await this.provider.requestPermission();
    } catch (error) {
      this.log.error('Permission request failed:', error);
      return { success: false, error: toPushError('provider-error', error) };
    }
    if (this.isStale(generation)) {
      return this.disposedDuring('requesting permission');
    }
    this.permission = status;
    this.log.info('Notification permission status:', status);

    if (status === 'authorized') {
      this.log.info('User granted notification permission');
    } else if (status === 'provisional') {
      this.log.info('User granted provisional notification permission');
    } else {
      this.log.warn('User declined or has not accepted notification permission');
      return fail('permission-denied', `Notification permission is ${status}`);
    }

    const tokenResult = await this.fetchToken(generation);
    if (this.isStale(generation)) {
      return this.disposedDuring('fetching the token');
    }
    if (!tokenResult.success) {
      // The token screen shows "no token"; the user can refresh manually
      this.log.warn('Continuing without a token:', tokenResult.error.message);
    }

    this.subscribeToTokenRefresh();

    const handlers = await this.registerHandlers();
    if (this.isStale(generation)) {
      return this.disposedDuring('registering handlers');
    }

    const result = ok(status);
    if (handlers.success) {
      this.log.info('Push messaging initialized');
      this.initialized = result;
    } else {
      this.log.warn('Message handlers not fully registered, will retry on next initialize:', handlers.error.message);
    }
    return result;
  }

  private subscribeToTokenRefresh(): void {
    if (this.tokenRefreshSubscribed) {
      return;
    }
    try {
      this.subscriptions.push(
        this.provider.onTokenRefresh((newToken) => {
          this.log.info('Registration token refreshed');
          this.token = newToken;
        })
      );
      this.tokenRefreshSubscribed = true;
    } catch (error) {
      this.log.warn('Could not subscribe to token refresh:', error);
    }
  }

  private async fetchToken(generation: number): Promise<PushResult<string>> {
    try {
      if (isIosClass(this.provider.platform)) {
        await this.ensurePlatformToken(generation);
        if (this.isStale(generation)) {
          return this.disposedDuring('waiting for the platform token');
        }
      }

      const token = await this.provider.getToken();
      if (this.isStale(generation)) {
        return this.disposedDuring('fetching the token');
      }
      if (!token) {
        this.log.warn('Registration token is not available');
        return fail('token-unavailable', 'Provider returned no registration token');
      }

      this.token = token;
      this.log.info('Registration token retrieved');
      this.log.debug('Token:', token);
      return ok(token);
    } catch (error) {
      this.log.error('Failed to get registration token:', error);
      return { success: false, error: toPushError('token-unavailable', error) };
    }
  }

  /**
   * iOS-class devices issue the registration token only after the push
   * subscription exists. Ask once more after a fixed wait; the token
   * request goes ahead either way.
   */
  private async ensurePlatformToken(generation: number): Promise<void> {
    const first = await this.provider.getPlatformToken();
    if (first) {
      this.log.debug('Platform push token available');
      return;
    }

    this.log.warn(`Platform push token not available yet, retrying in ${this.platformTokenRetryMs}ms`);
    await delay(this.platformTokenRetryMs);
    if (this.isStale(generation)) {
      return;
    }

    const second = await this.provider.getPlatformToken();
    if (second) {
      this.log.debug('Platform push token available after retry');
    } else {
      this.log.warn('Platform push token still missing, requesting registration token anyway');
    }
  }

  private handleForegroundMessage(message: InboundMessage): void {
    this.log.info('Foreground message received', describeMessage(message));
    const result = this.dispatcher.showBanner(message);
    if (!result.success) {
      this.log.debug(`Banner not shown (${result.error.kind}):`, result.error.message);
    }
  }

  private async checkInitialMessage(generation: number): Promise<PushResult<void>> {
    let initial: InboundMessage | null;
    try {
      initial = await this.provider.getInitialMessage();
    } catch (error) {
      this.log.error('Failed to read launch message:', error);
      return { success: false, error: toPushError('provider-error', error) };
    }
    if (this.isStale(generation)) {
      return this.disposedDuring('reading the launch message');
    }

    if (initial) {
      this.log.info('App opened from terminated state via notification', describeMessage(initial));
      this.handleNotificationTap(initial, 'terminated-launch');
    }
    return ok(undefined);
  }
}
