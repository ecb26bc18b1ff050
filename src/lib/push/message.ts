/**
 * Inbound message normalization.
 *
 * Messages reach the page from three places: the Firebase foreground
 * stream, a tap relayed by the service worker, and the launch URL the
 * service worker opens on a cold start. All of them end up as a frozen
 * InboundMessage.
 */

import type { MessagePayload } from 'firebase/messaging';
import type { InboundMessage, NotificationContent } from './types';

export const LAUNCH_PARAM = 'push_launch';

let generatedIds = 0;

function generateMessageId(): string {
  generatedIds += 1;
  return `local-${Date.now()}-${generatedIds}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toStringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
}

function toNotification(value: unknown): NotificationContent | null {
  if (!isRecord(value)) {
    return null;
  }
  const content: NotificationContent = {};
  const title = optionalString(value.title);
  const body = optionalString(value.body);
  // Firebase names the field `image`; serialized messages use `imageUrl`
  const imageUrl = optionalString(value.imageUrl) ?? optionalString(value.image);
  if (title !== undefined) content.title = title;
  if (body !== undefined) content.body = body;
  if (imageUrl !== undefined) content.imageUrl = imageUrl;
  return content;
}

interface MessageFields {
  messageId?: string;
  sentTime?: number | null;
  from?: string | null;
  notification?: NotificationContent | null;
  data?: Record<string, string>;
}

/**
 * Build a frozen InboundMessage.
 */
export function createInboundMessage(fields: MessageFields): InboundMessage {
  const notification = fields.notification ? Object.freeze({ ...fields.notification }) : null;
  return Object.freeze({
    messageId: fields.messageId && fields.messageId.length > 0 ? fields.messageId : generateMessageId(),
    sentTime: fields.sentTime ?? null,
    from: fields.from ?? null,
    notification,
    data: Object.freeze({ ...(fields.data ?? {}) }),
  });
}

/**
 * Convert a Firebase foreground payload.
 */
export function fromMessagePayload(payload: MessagePayload): InboundMessage {
  return createInboundMessage({
    messageId: payload.messageId,
    from: payload.from,
    notification: toNotification(payload.notification),
    data: toStringMap(payload.data),
  });
}

/**
 * Parse a message that crossed a serialization boundary (postMessage,
 * launch URL, Firebase's stored notification data). Returns null for
 * anything that does not look like a message.
 */
export function parseInboundMessage(value: unknown): InboundMessage | null {
  if (!isRecord(value)) {
    return null;
  }

  const messageId = optionalString(value.messageId) ?? optionalString(value.fcmMessageId);
  const sentTime = typeof value.sentTime === 'number' && Number.isFinite(value.sentTime)
    ? value.sentTime
    : null;
  const notification = toNotification(value.notification);
  const data = toStringMap(value.data);

  if (!messageId && !notification && Object.keys(data).length === 0) {
    return null;
  }

  return createInboundMessage({
    messageId,
    sentTime,
    from: optionalString(value.from) ?? null,
    notification,
    data,
  });
}

/**
 * Whether a message carries something a banner can show.
 */
export function hasDisplayContent(message: InboundMessage): boolean {
  const notification = message.notification;
  if (!notification) {
    return false;
  }
  return Boolean(notification.title) || Boolean(notification.body);
}

/**
 * URL the service worker opens when a tap cold-starts the app.
 */
export function buildLaunchUrl(message: InboundMessage, basePath = '/'): string {
  const params = new URLSearchParams({ [LAUNCH_PARAM]: JSON.stringify(message) });
  return `${basePath}?${params.toString()}`;
}

/**
 * Decode the launch parameter from a query string.
 */
export function readLaunchMessage(search: string): InboundMessage | null {
  const raw = new URLSearchParams(search).get(LAUNCH_PARAM);
  if (!raw) {
    return null;
  }
  try {
    return parseInboundMessage(JSON.parse(raw));
  } catch {
    return null;
  }
}

/**
 * Short description used in log lines.
 */
export function describeMessage(message: InboundMessage): Record<string, unknown> {
  return {
    messageId: message.messageId,
    sentTime: message.sentTime,
    title: message.notification?.title ?? null,
    body: message.notification?.body ?? null,
    imageUrl: message.notification?.imageUrl ?? null,
    data: message.data,
  };
}
