// Main providers wrapper
export { Providers } from './Providers';

export { PushProvider, usePushServices } from './PushProvider';
export { createPushServices, type PushServices } from './createPushServices';
export { createBannerStoreRoot } from './presentationRoot';
