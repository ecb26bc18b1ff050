/**
 * Platform Detection Tests
 *
 * Tests for the platform detection module that tells iOS-class devices
 * apart from Android and desktop browsers.
 */

import { describe, it, expect } from 'vitest';
import { detectPlatform, isIosClass } from './platform';

describe('platform', () => {
  describe('detectPlatform', () => {
    it('returns "desktop" when no navigator is available (SSR)', () => {
      expect(detectPlatform(null)).toBe('desktop');
    });

    it('returns "ios" for an iPhone user agent', () => {
      const env = {
        userAgent: 'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X)',
        maxTouchPoints: 5,
      };

      expect(detectPlatform(env)).toBe('ios');
    });

    it('returns "ios" for iPadOS reporting a desktop Safari user agent', () => {
      const env = {
        userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15',
        maxTouchPoints: 5,
      };

      expect(detectPlatform(env)).toBe('ios');
    });

    it('returns "desktop" for a Mac without touch support', () => {
      const env = {
        userAgent: 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15',
        maxTouchPoints: 0,
      };

      expect(detectPlatform(env)).toBe('desktop');
    });

    it('returns "android" for an Android user agent', () => {
      const env = {
        userAgent: 'Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36',
        maxTouchPoints: 5,
      };

      expect(detectPlatform(env)).toBe('android');
    });

    it('reads the global navigator by default', () => {
      // jsdom reports a desktop user agent
      expect(detectPlatform()).toBe('desktop');
    });
  });

  describe('isIosClass', () => {
    it('is true only for ios', () => {
      expect(isIosClass('ios')).toBe(true);
      expect(isIosClass('android')).toBe(false);
      expect(isIosClass('desktop')).toBe(false);
    });
  });
});
