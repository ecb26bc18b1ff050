/**
 * Presentation root backed by the banner store.
 *
 * The overlay only counts as available while NotificationBannerLayer is
 * mounted; before that the dispatcher falls back to the dialog host.
 */

import type { OverlayLayer, PresentationRoot } from '@/lib/push/presentationDispatcher';
import { useBannerStore } from '@/stores';

export function createBannerStoreRoot(store: typeof useBannerStore = useBannerStore): PresentationRoot {
  const overlay: OverlayLayer = {
    insert: (entry) => store.getState().insertBanner(entry),
    remove: (id) => store.getState().removeBanner(id),
  };

  return {
    getOverlay: () => (store.getState().overlayMounted ? overlay : null),
    showDialog: (entry) => store.getState().openDialog(entry),
    closeDialog: (id) => store.getState().closeDialog(id),
    showToast: (text) => {
      store.getState().pushToast(text);
    },
  };
}
