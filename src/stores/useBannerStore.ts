/**
 * Banner Store
 *
 * UI state behind the presentation root: foreground banners, the dialog
 * fallback and confirmation toasts. The PresentationDispatcher writes here
 * through the root built in providers/presentationRoot.ts; the components
 * in components/notifications read from it.
 */

import { create } from 'zustand';
import type { BannerEntry } from '@/lib/push/presentationDispatcher';

export interface ToastItem {
  id: string;
  message: string;
  durationMs: number;
}

export const DEFAULT_TOAST_DURATION_MS = 2000;

interface BannerStore {
  // State
  /** Oldest first */
  banners: BannerEntry[];
  dialogs: BannerEntry[];
  toasts: ToastItem[];
  /** Whether the overlay layer is mounted and can take banners */
  overlayMounted: boolean;

  // Actions
  insertBanner: (entry: BannerEntry) => void;
  removeBanner: (id: string) => void;
  openDialog: (entry: BannerEntry) => void;
  closeDialog: (id: string) => void;
  pushToast: (message: string, durationMs?: number) => string;
  dismissToast: (id: string) => void;
  setOverlayMounted: (mounted: boolean) => void;
  reset: () => void;
}

let toastSequence = 0;

export const useBannerStore = create<BannerStore>((set) => ({
  // Initial state
  banners: [],
  dialogs: [],
  toasts: [],
  overlayMounted: false,

  // Actions
  insertBanner: (entry) =>
    set((state) => ({ banners: [...state.banners.filter((b) => b.id !== entry.id), entry] })),
  removeBanner: (id) =>
    set((state) => ({ banners: state.banners.filter((b) => b.id !== id) })),
  openDialog: (entry) =>
    set((state) => ({ dialogs: [...state.dialogs.filter((d) => d.id !== entry.id), entry] })),
  closeDialog: (id) =>
    set((state) => ({ dialogs: state.dialogs.filter((d) => d.id !== id) })),
  pushToast: (message, durationMs = DEFAULT_TOAST_DURATION_MS) => {
    toastSequence += 1;
    const id = `toast-${toastSequence}`;
    set((state) => ({ toasts: [...state.toasts, { id, message, durationMs }] }));
    return id;
  },
  dismissToast: (id) =>
    set((state) => ({ toasts: state.toasts.filter((t) => t.id !== id) })),
  setOverlayMounted: (overlayMounted) => set({ overlayMounted }),
  reset: () =>
    set({
      banners: [],
      dialogs: [],
      toasts: [],
      overlayMounted: false,
    }),
}));
