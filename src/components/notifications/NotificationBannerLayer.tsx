'use client';

import { useEffect } from 'react';
import { useBannerStore } from '@/stores';
import { NotificationBanner } from './NotificationBanner';

/**
 * NotificationBannerLayer - topmost overlay for foreground banners
 *
 * Sits below the status bar inset, newest banner first. Registers itself
 * as mounted so the dispatcher knows the overlay can take banners.
 */
export function NotificationBannerLayer() {
  const banners = useBannerStore((state) => state.banners);
  const setOverlayMounted = useBannerStore((state) => state.setOverlayMounted);

  useEffect(() => {
    setOverlayMounted(true);
    return () => setOverlayMounted(false);
  }, [setOverlayMounted]);

  return (
    <div
      className="fixed left-4 right-4 z-50 flex flex-col items-center space-y-2 pointer-events-none"
      style={{ top: 'calc(env(safe-area-inset-top, 0px) + 8px)' }}
      data-testid="notification-banner-layer"
    >
      {[...banners].reverse().map((banner) => (
        <div key={banner.id} className="w-full max-w-md">
          <NotificationBanner banner={banner} />
        </div>
      ))}
    </div>
  );
}
