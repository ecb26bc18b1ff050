export { useBannerStore, DEFAULT_TOAST_DURATION_MS, type ToastItem } from './useBannerStore';
