/**
 * Push Configuration
 *
 * Timing and stacking settings for the messaging client and the banner
 * dispatcher, overridable at build time.
 */

export interface PushSettings {
  /** How long a banner stays on screen without interaction */
  bannerTimeoutMs: number;
  /** Banners visible at once; the oldest is removed beyond this */
  maxVisibleBanners: number;
  /** Wait before asking again for a missing iOS push subscription */
  platformTokenRetryMs: number;
}

export const DEFAULT_PUSH_SETTINGS: PushSettings = {
  bannerTimeoutMs: 5000,
  maxVisibleBanners: 3,
  platformTokenRetryMs: 3000,
};

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

interface PushEnv {
  bannerTimeoutMs?: string;
  maxVisibleBanners?: string;
  platformTokenRetryMs?: string;
}

function readEnv(): PushEnv {
  return {
    bannerTimeoutMs: process.env.NEXT_PUBLIC_BANNER_TIMEOUT_MS,
    maxVisibleBanners: process.env.NEXT_PUBLIC_MAX_VISIBLE_BANNERS,
    platformTokenRetryMs: process.env.NEXT_PUBLIC_PLATFORM_TOKEN_RETRY_MS,
  };
}

export function getPushSettings(env: PushEnv = readEnv()): PushSettings {
  return {
    bannerTimeoutMs: parsePositiveInt(env.bannerTimeoutMs, DEFAULT_PUSH_SETTINGS.bannerTimeoutMs),
    maxVisibleBanners: parsePositiveInt(env.maxVisibleBanners, DEFAULT_PUSH_SETTINGS.maxVisibleBanners),
    platformTokenRetryMs: parsePositiveInt(
      env.platformTokenRetryMs,
      DEFAULT_PUSH_SETTINGS.platformTokenRetryMs
    ),
  };
}
