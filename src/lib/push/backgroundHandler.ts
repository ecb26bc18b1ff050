/**
 * Background delivery handler.
 *
 * Runs inside the messaging service worker when a message arrives while no
 * page is in the foreground. There is no UI here: it only logs. Firebase
 * displays the system notification itself when the payload carries one.
 */

import type { MessagePayload } from 'firebase/messaging/sw';
import { createLogger } from '@/lib/debug-logger';
import { describeMessage, fromMessagePayload } from './message';

const log = createLogger('[BackgroundMessage]');

export function handleBackgroundMessage(payload: MessagePayload): void {
  const message = fromMessagePayload(payload);
  log.info('Background message received', describeMessage(message));
}
