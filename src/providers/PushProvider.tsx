'use client';

import { createContext, useContext, useEffect, useState, type ReactNode } from 'react';
import { NotificationBannerLayer, NotificationDialogHost, SystemToastHost } from '@/components/notifications';
import { createPushServices, type PushServices } from './createPushServices';
import { createBannerStoreRoot } from './presentationRoot';

const PushContext = createContext<PushServices | null>(null);

interface PushProviderProps {
  children: ReactNode;
  /** Pre-built services (tests, storybook); built from env otherwise */
  services?: PushServices;
}

/**
 * Owns the one messaging client and dispatcher of the app and mounts the
 * layers they render into.
 */
export function PushProvider({ children, services }: PushProviderProps) {
  const [value] = useState<PushServices>(() => services ?? createPushServices());

  useEffect(() => {
    const root = createBannerStoreRoot();
    return value.dispatcher.setRootProvider(() => root);
  }, [value]);

  useEffect(() => {
    return () => value.client.dispose();
  }, [value]);

  return (
    <PushContext.Provider value={value}>
      {children}
      <NotificationBannerLayer />
      <NotificationDialogHost />
      <SystemToastHost />
    </PushContext.Provider>
  );
}

export function usePushServices(): PushServices {
  const context = useContext(PushContext);
  if (!context) {
    throw new Error('usePushServices must be used within PushProvider');
  }
  return context;
}
