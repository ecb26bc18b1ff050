export { NotificationBanner } from './NotificationBanner';
export { NotificationBannerLayer } from './NotificationBannerLayer';
export { NotificationDialog, NotificationDialogHost } from './NotificationDialog';
export { SystemToast, SystemToastContainer, SystemToastHost } from './SystemToast';
