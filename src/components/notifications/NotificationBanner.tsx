'use client';

import { useRef } from 'react';
import { Bell, X } from 'lucide-react';
import type { BannerEntry } from '@/lib/push/presentationDispatcher';

interface NotificationBannerProps {
  banner: BannerEntry;
}

/** Upward travel that counts as a dismiss swipe */
export const SWIPE_DISMISS_PX = 40;

/**
 * NotificationBanner - one foreground push, shown at the top of the screen
 *
 * Tapping the body runs the banner's tap action; the X or an upward swipe
 * only closes it.
 */
export function NotificationBanner({ banner }: NotificationBannerProps) {
  const swipeStartY = useRef<number | null>(null);
  // The click that ends a swipe must not count as a tap
  const swiped = useRef(false);

  const handlePointerUp = (clientY: number) => {
    const startY = swipeStartY.current;
    swipeStartY.current = null;
    if (startY !== null && startY - clientY >= SWIPE_DISMISS_PX) {
      swiped.current = true;
      banner.onClose();
    }
  };

  const handleClick = () => {
    if (swiped.current) {
      swiped.current = false;
      return;
    }
    banner.onTap();
  };

  return (
    <div
      className="
        pointer-events-auto bg-probe-bg-element border border-probe-purple/50 rounded-2xl p-4
        shadow-lg w-full animate-slide-down cursor-pointer touch-none select-none
        hover:bg-probe-bg-hover transition-colors
      "
      role="status"
      aria-live="polite"
      data-testid="notification-banner"
      onPointerDown={(e) => {
        swipeStartY.current = e.clientY;
        swiped.current = false;
      }}
      onPointerUp={(e) => handlePointerUp(e.clientY)}
      onPointerCancel={() => {
        swipeStartY.current = null;
      }}
      onClick={handleClick}
    >
      <div className="flex items-start">
        {/* Image or icon */}
        {banner.imageUrl ? (
          // eslint-disable-next-line @next/next/no-img-element
          <img
            src={banner.imageUrl}
            alt=""
            className="w-12 h-12 rounded-lg object-cover flex-shrink-0"
          />
        ) : (
          <div className="w-10 h-10 rounded-full bg-probe-purple flex items-center justify-center flex-shrink-0">
            <Bell className="w-5 h-5 text-probe-bg-dark" aria-hidden="true" />
          </div>
        )}

        {/* Content */}
        <div className="ml-3 flex-1 min-w-0">
          <p className="text-probe-text-primary font-semibold text-sm truncate">
            {banner.title}
          </p>
          {banner.body && (
            <p className="text-probe-text-accent text-sm mt-1 line-clamp-2">
              {banner.body}
            </p>
          )}
        </div>

        {/* Close button */}
        <button
          onClick={(e) => {
            e.stopPropagation();
            banner.onClose();
          }}
          className="ml-2 p-1 text-probe-text-accent hover:text-probe-text-primary rounded-full hover:bg-probe-bg-dark transition-colors"
          aria-label="Dismiss notification"
        >
          <X className="w-4 h-4" />
        </button>
      </div>
    </div>
  );
}
