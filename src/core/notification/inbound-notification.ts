import {
  InboundNotification,
  NotificationValue,
} from '../interfaces/common.types';
import { isRecord } from '../utils/guards';

const TAG_PATTERN = /<[^>]*>/g;
const WHITESPACE_RUN = /[\r\n\t ]+/g;
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;
const ORDER_ID_PATTERN = /^\d+$/;

/**
 * Strip markup tags and control characters, collapse whitespace runs, trim
 */
export function sanitizeText(value: string): string {
  return value
    .replace(TAG_PATTERN, '')
    .replace(CONTROL_CHARS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Normalize a field name: lowercase, keep only [a-z0-9_-]
 */
export function sanitizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9_-]/g, '');
}

function sanitizeValue(value: unknown): NotificationValue | undefined {
  if (typeof value === 'string') {
    return sanitizeText(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return sanitizeText(String(value));
  }
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string')
      .map(sanitizeText);
  }
  return undefined;
}

/**
 * Build a sanitized notification from an untrusted request body.
 * Nested objects and other non-scalar values are dropped.
 */
export function extractNotification(payload: unknown): InboundNotification {
  const notification: Record<string, NotificationValue> = {};

  if (!isRecord(payload)) {
    return notification;
  }

  for (const [rawKey, rawValue] of Object.entries(payload)) {
    const key = sanitizeKey(rawKey);
    if (!key) continue;

    const value = sanitizeValue(rawValue);
    if (value !== undefined) {
      notification[key] = value;
    }
  }

  return notification;
}

/**
 * Read a field as a string; arrays and absent fields read as ''
 */
export function readField(
  notification: InboundNotification,
  name: string,
): string {
  const value = notification[name];
  return typeof value === 'string' ? value : '';
}

export function hasField(
  notification: InboundNotification,
  name: string,
): boolean {
  return Object.prototype.hasOwnProperty.call(notification, name);
}

/**
 * Parse an order correlation id: digits only, positive, safe integer
 */
export function parseOrderId(raw: string): number | null {
  if (!ORDER_ID_PATTERN.test(raw)) {
    return null;
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    return null;
  }
  return id;
}
