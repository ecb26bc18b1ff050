"use client";

import { useEffect } from "react";
import { Bell, X } from "lucide-react";
import type { BannerEntry } from "@/lib/push/presentationDispatcher";
import { useBannerStore } from "@/stores";

interface NotificationDialogProps {
  dialog: BannerEntry;
  /** Only the topmost dialog answers Escape */
  isTop?: boolean;
}

/**
 * NotificationDialog - modal fallback for a foreground push
 *
 * Used when the banner overlay is not mounted yet. Anchored to the top of
 * the screen; the backdrop, the X and Escape close it, tapping the card
 * runs the tap action.
 */
export function NotificationDialog({ dialog, isTop = true }: NotificationDialogProps) {
  const { onClose } = dialog;

  useEffect(() => {
    if (!isTop) return;

    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.key === "Escape") {
        e.preventDefault();
        onClose();
      }
    };
    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [onClose, isTop]);

  const titleId = `${dialog.id}-title`;

  return (
    <div
      className="fixed inset-0 z-50 flex items-start justify-center"
      style={{ paddingTop: "calc(env(safe-area-inset-top, 0px) + 16px)" }}
      role="dialog"
      aria-modal="true"
      aria-labelledby={titleId}
    >
      {/* Backdrop */}
      <div
        className="absolute inset-0 bg-black/25"
        onClick={onClose}
        aria-hidden="true"
        data-testid="notification-dialog-backdrop"
      />

      {/* Dialog */}
      <div
        className="relative bg-probe-bg-dark border border-probe-bg-element rounded-2xl p-4 w-full max-w-md mx-4 shadow-2xl cursor-pointer"
        onClick={dialog.onTap}
      >
        <button
          onClick={(e) => {
            e.stopPropagation();
            onClose();
          }}
          className="absolute top-3 right-3 text-probe-text-accent hover:text-probe-text-primary transition-colors"
          aria-label="Close notification"
        >
          <X className="w-5 h-5" />
        </button>

        <div className="flex items-start pr-6">
          <div className="w-10 h-10 rounded-full bg-probe-purple/20 flex items-center justify-center flex-shrink-0">
            <Bell className="w-5 h-5 text-probe-purple" aria-hidden="true" />
          </div>
          <div className="ml-3 min-w-0">
            <h2 id={titleId} className="text-base font-bold text-probe-purple">
              {dialog.title}
            </h2>
            {dialog.body && (
              <p className="text-sm text-probe-text-accent mt-1">{dialog.body}</p>
            )}
          </div>
        </div>

        {dialog.imageUrl && (
          // eslint-disable-next-line @next/next/no-img-element
          <img
            src={dialog.imageUrl}
            alt=""
            className="mt-3 w-full max-h-48 rounded-lg object-cover"
          />
        )}
      </div>
    </div>
  );
}

/**
 * NotificationDialogHost - renders the open fallback dialogs, latest on top
 */
export function NotificationDialogHost() {
  const dialogs = useBannerStore((state) => state.dialogs);

  if (dialogs.length === 0) return null;

  return (
    <>
      {dialogs.map((dialog, index) => (
        <NotificationDialog
          key={dialog.id}
          dialog={dialog}
          isTop={index === dialogs.length - 1}
        />
      ))}
    </>
  );
}
