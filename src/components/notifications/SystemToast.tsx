'use client';

import { useEffect } from 'react';
import { CheckCircle2, X } from 'lucide-react';
import { useBannerStore } from '@/stores';

interface SystemToastProps {
  id: string;
  message: string;
  /** Keep this stable: a new function restarts the dismiss timer */
  onDismiss: (id: string) => void;
  autoDismissMs?: number;
}

/**
 * SystemToast - short confirmation ("Token copied to clipboard")
 *
 * Features:
 * - Auto-dismisses after specified duration (default 2s)
 * - Manual dismiss via X button
 */
export function SystemToast({
  id,
  message,
  onDismiss,
  autoDismissMs = 2000,
}: SystemToastProps) {
  useEffect(() => {
    const timer = setTimeout(() => {
      onDismiss(id);
    }, autoDismissMs);

    return () => clearTimeout(timer);
  }, [id, onDismiss, autoDismissMs]);

  return (
    <div
      className="
        pointer-events-auto bg-probe-bg-element border border-green-500/50 rounded-lg px-4 py-3
        shadow-lg w-80 animate-slide-in
      "
      role="alert"
      aria-live="polite"
    >
      <div className="flex items-center">
        <CheckCircle2 className="w-5 h-5 text-green-500 flex-shrink-0" aria-hidden="true" />

        <p className="ml-3 flex-1 min-w-0 text-probe-text-primary text-sm">{message}</p>

        <button
          onClick={() => onDismiss(id)}
          className="ml-2 p-1 text-probe-text-accent hover:text-probe-text-primary rounded-full hover:bg-probe-bg-dark transition-colors"
          aria-label="Dismiss message"
        >
          <X className="w-4 h-4" />
        </button>
      </div>
    </div>
  );
}

/**
 * SystemToastContainer - renders confirmation toasts at the bottom of the screen
 */
interface SystemToastContainerProps {
  toasts: Array<{ id: string; message: string; durationMs?: number }>;
  onDismiss: (id: string) => void;
}

export function SystemToastContainer({
  toasts,
  onDismiss,
}: SystemToastContainerProps) {
  if (toasts.length === 0) return null;

  return (
    <div
      className="fixed left-0 right-0 z-40 flex flex-col items-center space-y-2 pointer-events-none"
      style={{ bottom: 'calc(env(safe-area-inset-bottom, 0px) + 16px)' }}
    >
      {toasts.map((toast) => (
        <SystemToast
          key={toast.id}
          id={toast.id}
          message={toast.message}
          autoDismissMs={toast.durationMs}
          onDismiss={onDismiss}
        />
      ))}
    </div>
  );
}

/**
 * Toast container wired to the banner store.
 */
export function SystemToastHost() {
  const toasts = useBannerStore((state) => state.toasts);
  const dismissToast = useBannerStore((state) => state.dismissToast);

  return <SystemToastContainer toasts={toasts} onDismiss={dismissToast} />;
}
