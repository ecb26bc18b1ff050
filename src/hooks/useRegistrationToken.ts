/**
 * useRegistrationToken Hook
 *
 * Reads the registration token held by the messaging client. The client
 * does not push token changes, so the value is re-read after
 * initialization and whenever the user refreshes.
 */

'use client';

import { useCallback, useEffect, useState } from 'react';
import { usePushServices } from '@/providers';
import { debugLog } from '@/lib/debug-logger';

interface UseRegistrationTokenResult {
  token: string | null;
  isRefreshing: boolean;
  /** Fetch the token again and re-read it; resolves to the new value */
  refresh: () => Promise<string | null>;
}

export function useRegistrationToken(ready: boolean): UseRegistrationTokenResult {
  const { client } = usePushServices();
  const [token, setToken] = useState<string | null>(() => client.getToken());
  const [isRefreshing, setIsRefreshing] = useState(false);

  useEffect(() => {
    if (ready) {
      setToken(client.getToken());
    }
  }, [ready, client]);

  const refresh = useCallback(async (): Promise<string | null> => {
    setIsRefreshing(true);
    try {
      const result = await client.refreshToken();
      if (!result.success) {
        debugLog(`[useRegistrationToken] Refresh failed (${result.error.kind}):`, result.error.message);
      }
      const current = client.getToken();
      setToken(current);
      return current;
    } finally {
      setIsRefreshing(false);
    }
  }, [client]);

  return { token, isRefreshing, refresh };
}
