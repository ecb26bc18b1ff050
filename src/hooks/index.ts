export * from './usePushInitializer';
export * from './useRegistrationToken';
export * from './useTokenClipboard';
