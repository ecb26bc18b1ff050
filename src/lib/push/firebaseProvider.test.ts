/**
 * Firebase Messaging Provider Tests
 *
 * The Firebase SDK is mocked; the service worker container is an
 * EventTarget so worker messages can be dispatched from the test.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('firebase/app', () => ({
  getApps: vi.fn(() => []),
  initializeApp: vi.fn(() => ({ name: '[DEFAULT]' })),
}));

vi.mock('firebase/messaging', () => ({
  getMessaging: vi.fn(() => ({ app: 'messaging' })),
  getToken: vi.fn(),
  isSupported: vi.fn(),
  onMessage: vi.fn(),
}));

vi.mock('@/lib/debug-logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { initializeApp } from 'firebase/app';
import { getToken, isSupported, onMessage, type MessagePayload } from 'firebase/messaging';
import { FirebaseMessagingProvider, toAuthorizationStatus } from './firebaseProvider';
import { buildLaunchUrl, createInboundMessage } from './message';
import { NOTIFICATION_TAP_EVENT, SUBSCRIPTION_CHANGE_EVENT } from './serviceWorkerProtocol';
import type { InboundMessage } from './types';

const settings = {
  options: { apiKey: 'test-api-key', projectId: 'probe-test', messagingSenderId: '1', appId: 'test-app' },
  vapidKey: 'test-vapid-key',
};

describe('FirebaseMessagingProvider', () => {
  let serviceWorker: EventTarget;
  let getSubscription: ReturnType<typeof vi.fn>;
  let registration: ServiceWorkerRegistration;
  let registerServiceWorker: ReturnType<typeof vi.fn>;
  let provider: FirebaseMessagingProvider;

  beforeEach(() => {
    serviceWorker = new EventTarget();
    Object.defineProperty(navigator, 'serviceWorker', { value: serviceWorker, configurable: true });

    getSubscription = vi.fn().mockResolvedValue({ endpoint: 'https://push.example.test/sub-1' });
    registration = { pushManager: { getSubscription } } as unknown as ServiceWorkerRegistration;
    registerServiceWorker = vi.fn().mockResolvedValue(registration);

    provider = new FirebaseMessagingProvider({ settings, registerServiceWorker, platform: 'desktop' });
  });

  afterEach(() => {
    Reflect.deleteProperty(navigator, 'serviceWorker');
    vi.unstubAllGlobals();
    window.history.replaceState(null, '', '/');
  });

  describe('toAuthorizationStatus', () => {
    it('should map browser permissions', () => {
      expect(toAuthorizationStatus('granted')).toBe('authorized');
      expect(toAuthorizationStatus('denied')).toBe('denied');
      expect(toAuthorizationStatus('default')).toBe('not-determined');
    });
  });

  describe('isSupported', () => {
    it('should be false without the Notification API', async () => {
      await expect(provider.isSupported()).resolves.toBe(false);
      expect(isSupported).not.toHaveBeenCalled();
    });

    it('should defer to Firebase when the browser APIs exist', async () => {
      vi.stubGlobal('Notification', { requestPermission: vi.fn() });
      vi.mocked(isSupported).mockResolvedValue(true);

      await expect(provider.isSupported()).resolves.toBe(true);
    });
  });

  describe('requestPermission', () => {
    it('should map the browser prompt result', async () => {
      vi.stubGlobal('Notification', { requestPermission: vi.fn().mockResolvedValue('granted') });

      await expect(provider.requestPermission()).resolves.toBe('authorized');
    });
  });

  describe('tokens', () => {
    it('should read the push subscription endpoint as platform token', async () => {
      await expect(provider.getPlatformToken()).resolves.toBe('https://push.example.test/sub-1');
    });

    it('should return null without a push subscription', async () => {
      getSubscription.mockResolvedValueOnce(null);

      await expect(provider.getPlatformToken()).resolves.toBeNull();
    });

    it('should request the token with the VAPID key and worker registration', async () => {
      vi.mocked(getToken).mockResolvedValue('token-1');

      await expect(provider.getToken()).resolves.toBe('token-1');
      expect(initializeApp).toHaveBeenCalledWith(settings.options);
      expect(getToken).toHaveBeenCalledWith(
        { app: 'messaging' },
        { vapidKey: 'test-vapid-key', serviceWorkerRegistration: registration }
      );
    });

    it('should register the service worker once', async () => {
      vi.mocked(getToken).mockResolvedValue('token-1');

      await provider.getToken();
      await provider.getPlatformToken();

      expect(registerServiceWorker).toHaveBeenCalledTimes(1);
    });

    it('should retry a failed service worker registration', async () => {
      registerServiceWorker.mockRejectedValueOnce(new Error('blocked'));

      await expect(provider.getPlatformToken()).rejects.toThrow('blocked');
      await expect(provider.getPlatformToken()).resolves.toBe('https://push.example.test/sub-1');
      expect(registerServiceWorker).toHaveBeenCalledTimes(2);
    });

    it('should map an empty token to null', async () => {
      vi.mocked(getToken).mockResolvedValue('');

      await expect(provider.getToken()).resolves.toBeNull();
    });

    it('should report a changed token when the worker signals a subscription change', async () => {
      vi.mocked(getToken).mockResolvedValueOnce('token-1').mockResolvedValueOnce('token-2');
      await provider.getToken();
      const listener = vi.fn();
      const unsubscribe = provider.onTokenRefresh(listener);

      serviceWorker.dispatchEvent(new MessageEvent('message', { data: { type: SUBSCRIPTION_CHANGE_EVENT } }));

      await vi.waitFor(() => expect(listener).toHaveBeenCalledWith('token-2'));
      unsubscribe();
    });

    it('should stay quiet when the token did not change', async () => {
      vi.mocked(getToken).mockResolvedValue('token-1');
      await provider.getToken();
      const listener = vi.fn();
      provider.onTokenRefresh(listener);

      serviceWorker.dispatchEvent(new MessageEvent('message', { data: { type: SUBSCRIPTION_CHANGE_EVENT } }));

      await vi.waitFor(() => expect(getToken).toHaveBeenCalledTimes(2));
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('messages', () => {
    it('should convert foreground payloads', () => {
      const captured: { deliver?: (payload: MessagePayload) => void } = {};
      vi.mocked(onMessage).mockImplementation((_messaging, next) => {
        if (typeof next === 'function') {
          captured.deliver = next;
        }
        return () => undefined;
      });
      const listener = vi.fn();

      provider.onForegroundMessage(listener);
      captured.deliver?.({
        from: 'sender-1',
        collapseKey: 'collapse-1',
        messageId: 'fcm-1',
        notification: { title: 'Hello', body: 'World' },
      });

      expect(listener).toHaveBeenCalledTimes(1);
      const message: InboundMessage = listener.mock.calls[0][0];
      expect(message.messageId).toBe('fcm-1');
      expect(message.notification).toEqual({ title: 'Hello', body: 'World' });
    });

    it('should pass on taps relayed by the service worker', () => {
      const listener = vi.fn();
      const unsubscribe = provider.onNotificationTap(listener);

      serviceWorker.dispatchEvent(
        new MessageEvent('message', {
          data: { type: NOTIFICATION_TAP_EVENT, message: { messageId: 'msg-1', data: { type: 'chat' } } },
        })
      );
      unsubscribe();
      serviceWorker.dispatchEvent(
        new MessageEvent('message', { data: { type: NOTIFICATION_TAP_EVENT, message: { messageId: 'msg-2' } } })
      );

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].data).toEqual({ type: 'chat' });
    });
  });

  describe('getInitialMessage', () => {
    it('should read the launch message once and strip it from the URL', async () => {
      const launch = createInboundMessage({ messageId: 'launch-1', data: { type: 'chat' } });
      const launchUrl = new URL(buildLaunchUrl(launch), window.location.origin);
      launchUrl.searchParams.set('keep', '1');
      window.history.replaceState(null, '', `${launchUrl.pathname}${launchUrl.search}`);

      await expect(provider.getInitialMessage()).resolves.toEqual(launch);
      expect(window.location.search).toBe('?keep=1');
      await expect(provider.getInitialMessage()).resolves.toBeNull();
    });

    it('should return null for a normal start', async () => {
      await expect(provider.getInitialMessage()).resolves.toBeNull();
    });
  });
});
