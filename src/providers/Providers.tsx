'use client';

import { type ReactNode } from 'react';
import { PushProvider } from './PushProvider';

interface ProvidersProps {
  children: ReactNode;
}

export function Providers({ children }: ProvidersProps) {
  return <PushProvider>{children}</PushProvider>;
}
