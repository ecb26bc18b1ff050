/**
 * Registers the messaging service worker at the root scope.
 *
 * The worker is bundled from src/worker; next.config.ts serves it with
 * `Service-Worker-Allowed: /` so it can control every page.
 */

export function registerMessagingServiceWorker(): Promise<ServiceWorkerRegistration> {
  return navigator.serviceWorker.register(
    new URL('../../worker/firebase-messaging.sw.ts', import.meta.url),
    { scope: '/' }
  );
}
