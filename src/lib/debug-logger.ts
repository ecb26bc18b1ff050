/**
 * Debug Logger Utility
 *
 * Provides conditional logging based on environment variables.
 * In development (npm run dev), all debug logs are shown.
 * In production, debug logs are hidden unless NEXT_PUBLIC_DEBUG_LOGGING is set to 'true'.
 *
 * Usage:
 *   import { createLogger } from '@/lib/debug-logger';
 *   const log = createLogger('[MessagingClient]');
 *   log.debug('Token fetched', { length: token.length });
 *
 * The service worker bundles this module too, so nothing here may assume
 * a window is present.
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const isDebugEnabled = process.env.NEXT_PUBLIC_DEBUG_LOGGING === 'true';

export const DEBUG_STORAGE_KEY = 'PUSH_PROBE_DEBUG';

/**
 * Check if debug logging is enabled at runtime.
 * Can be enabled via:
 * - NODE_ENV=development
 * - NEXT_PUBLIC_DEBUG_LOGGING=true (build-time)
 * - localStorage.setItem('PUSH_PROBE_DEBUG', 'true') (runtime override)
 */
function checkDebugEnabled(): boolean {
  if (isDevelopment || isDebugEnabled) return true;

  // Runtime override via localStorage (useful for debugging production)
  if (typeof window !== 'undefined') {
    try {
      return window.localStorage.getItem(DEBUG_STORAGE_KEY) === 'true';
    } catch {
      return false;
    }
  }
  return false;
}

/**
 * Log a debug message to the console.
 * Only outputs when debug logging is enabled.
 */
export function debugLog(...args: unknown[]): void {
  if (checkDebugEnabled()) {
    console.log(...args);
  }
}

/**
 * Log a debug warning to the console.
 * Only outputs when debug logging is enabled.
 */
export function debugWarn(...args: unknown[]): void {
  if (checkDebugEnabled()) {
    console.warn(...args);
  }
}

/**
 * Log an error to the console.
 * Always outputs.
 */
export function debugError(...args: unknown[]): void {
  console.error(...args);
}

/**
 * Log an info message to the console.
 * Always outputs.
 */
export function infoLog(...args: unknown[]): void {
  console.log(...args);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a namespaced logger for a specific module.
 *
 * Usage:
 *   const log = createLogger('[PresentationDispatcher]');
 *   log.debug('Banner inserted');
 *   log.info('Permission granted');
 */
export function createLogger(namespace: string): Logger {
  return {
    debug: (...args: unknown[]) => debugLog(namespace, ...args),
    info: (...args: unknown[]) => infoLog(namespace, ...args),
    warn: (...args: unknown[]) => debugWarn(namespace, ...args),
    error: (...args: unknown[]) => debugError(namespace, ...args),
  };
}
