/**
 * useTokenClipboard Hook
 *
 * Copies the registration token for pasting into a test send. `isCopied`
 * drives the button's "Copied" state for two seconds; `onCopied` runs only
 * once the token is actually on the clipboard.
 */

'use client';

import { useState, useCallback, useEffect, useRef } from 'react';

interface UseTokenClipboardResult {
  /** Copy the current token; false when there is none or the copy failed */
  copyToken: () => Promise<boolean>;
  isCopied: boolean;
  error: string | null;
}

export const COPIED_FEEDBACK_MS = 2000;

export function useTokenClipboard(
  token: string | null,
  onCopied?: () => void
): UseTokenClipboardResult {
  const [isCopied, setIsCopied] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const timeoutRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  useEffect(() => {
    return () => {
      if (timeoutRef.current) {
        clearTimeout(timeoutRef.current);
      }
    };
  }, []);

  const copyToken = useCallback(async (): Promise<boolean> => {
    if (!token) return false;

    if (timeoutRef.current) {
      clearTimeout(timeoutRef.current);
      timeoutRef.current = null;
    }
    setError(null);

    if (typeof navigator === 'undefined' || !navigator.clipboard?.writeText) {
      setError('Clipboard API not available');
      setIsCopied(false);
      return false;
    }

    try {
      await navigator.clipboard.writeText(token);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to copy token');
      setIsCopied(false);
      return false;
    }

    setIsCopied(true);
    timeoutRef.current = setTimeout(() => {
      setIsCopied(false);
      timeoutRef.current = null;
    }, COPIED_FEEDBACK_MS);
    onCopied?.();
    return true;
  }, [token, onCopied]);

  return { copyToken, isCopied, error };
}
