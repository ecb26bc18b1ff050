/**
 * Push Initializer Hook
 *
 * Starts push messaging once the app has mounted: requests permission,
 * fetches the token and installs the delivery handlers. Failures are
 * logged and reported through the returned state, never thrown.
 */

import { useEffect, useState } from 'react';
import type { AuthorizationStatus, PushError } from '@/lib/push';
import { usePushServices } from '@/providers';
import { debugLog, debugError } from '@/lib/debug-logger';

export type PushInitStatus = 'initializing' | 'ready' | 'failed';

export interface PushInitState {
  status: PushInitStatus;
  permission: AuthorizationStatus | null;
  error: PushError | null;
}

export function usePushInitializer(): PushInitState {
  const { client } = usePushServices();
  const [state, setState] = useState<PushInitState>({
    status: 'initializing',
    permission: null,
    error: null,
  });

  useEffect(() => {
    let cancelled = false;

    const initPush = async () => {
      debugLog('[PushInitializer] Initializing push notifications');
      const result = await client.initialize();
      if (cancelled) {
        return;
      }

      if (result.success) {
        debugLog('[PushInitializer] Push notifications initialized, permission:', result.value);
        setState({ status: 'ready', permission: result.value, error: null });
      } else {
        debugError(`[PushInitializer] Push initialization failed (${result.error.kind}):`, result.error.message);
        setState({
          status: 'failed',
          permission: client.getPermissionStatus(),
          error: result.error,
        });
      }
    };

    initPush().catch((error: unknown) => {
      debugError('[PushInitializer] Unexpected error during push initialization:', error);
    });

    return () => {
      cancelled = true;
    };
  }, [client]);

  return state;
}
