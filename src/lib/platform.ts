/**
 * Platform Detection Utility
 *
 * Detects the device family the client runs on. Push delivery differs
 * between them: iOS-class devices (iPhone, iPad, iPadOS reporting a desktop
 * Safari user agent) only hand out a Firebase token once the low-level
 * push subscription exists.
 */

export type Platform = 'ios' | 'android' | 'desktop';

export interface PlatformEnvironment {
  userAgent: string;
  maxTouchPoints: number;
}

function currentEnvironment(): PlatformEnvironment | null {
  if (typeof navigator === 'undefined') {
    return null;
  }
  return {
    userAgent: navigator.userAgent ?? '',
    maxTouchPoints: navigator.maxTouchPoints ?? 0,
  };
}

/**
 * Detect the current runtime platform
 */
export function detectPlatform(env: PlatformEnvironment | null = currentEnvironment()): Platform {
  if (!env) {
    return 'desktop';
  }

  const ua = env.userAgent;
  if (/iphone|ipad|ipod/i.test(ua)) {
    return 'ios';
  }

  // iPadOS 13+ reports itself as desktop Safari
  if (/macintosh/i.test(ua) && env.maxTouchPoints > 1) {
    return 'ios';
  }

  if (/android/i.test(ua)) {
    return 'android';
  }

  return 'desktop';
}

/**
 * Check if the platform requires a low-level push token before a
 * registration token can be requested
 */
export function isIosClass(platform: Platform): boolean {
  return platform === 'ios';
}
