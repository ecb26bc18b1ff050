import { describe, it, expect } from 'vitest';
import { DEFAULT_PUSH_SETTINGS, getPushSettings } from './config';

describe('getPushSettings', () => {
  it('should use the defaults when nothing is set', () => {
    expect(getPushSettings({})).toEqual({
      bannerTimeoutMs: 5000,
      maxVisibleBanners: 3,
      platformTokenRetryMs: 3000,
    });
  });

  it('should read overrides', () => {
    expect(
      getPushSettings({ bannerTimeoutMs: '8000', maxVisibleBanners: '1', platformTokenRetryMs: '1500' })
    ).toEqual({ bannerTimeoutMs: 8000, maxVisibleBanners: 1, platformTokenRetryMs: 1500 });
  });

  it('should ignore values that are not positive integers', () => {
    const settings = getPushSettings({ bannerTimeoutMs: 'soon', maxVisibleBanners: '0', platformTokenRetryMs: '-5' });

    expect(settings).toEqual(DEFAULT_PUSH_SETTINGS);
  });
});
