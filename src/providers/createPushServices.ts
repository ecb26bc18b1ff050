/**
 * Builds the messaging client and the presentation dispatcher.
 *
 * Called once when PushProvider mounts; both services are then shared
 * through React context instead of living in module state.
 */

import { createLogger } from '@/lib/debug-logger';
import { getFirebaseConfig } from '@/lib/firebase/config';
import {
  FirebaseMessagingProvider,
  MessagingClient,
  PresentationDispatcher,
  createLoggingTapHandler,
  createUnconfiguredProvider,
  getPushSettings,
  type MessagingProvider,
  type PushSettings,
} from '@/lib/push';

export interface PushServices {
  client: MessagingClient;
  dispatcher: PresentationDispatcher;
}

export interface PushServicesOptions {
  provider?: MessagingProvider;
  settings?: PushSettings;
}

function createDefaultProvider(): MessagingProvider {
  const config = getFirebaseConfig();
  if (!config.valid) {
    return createUnconfiguredProvider(config.missing);
  }
  return new FirebaseMessagingProvider({ settings: config.settings });
}

export function createPushServices(options: PushServicesOptions = {}): PushServices {
  const settings = options.settings ?? getPushSettings();
  const onNotificationTap = createLoggingTapHandler(createLogger('[NotificationTap]'));

  const dispatcher = new PresentationDispatcher({
    autoDismissMs: settings.bannerTimeoutMs,
    maxVisibleBanners: settings.maxVisibleBanners,
    onBannerTap: (message) => onNotificationTap(message.data, message, 'foreground'),
  });

  const client = new MessagingClient(options.provider ?? createDefaultProvider(), {
    dispatcher,
    onNotificationTap,
    platformTokenRetryMs: settings.platformTokenRetryMs,
  });

  return { client, dispatcher };
}
