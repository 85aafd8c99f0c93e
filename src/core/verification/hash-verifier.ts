import * as crypto from 'crypto';
import { InboundNotification } from '../interfaces/common.types';
import {
  hasField,
  readField,
  sanitizeKey,
} from '../notification/inbound-notification';

export const VERIFY_KEY_FIELD = 'verify_key';
export const VERIFY_SIGN_FIELD = 'verify_sign';
const PASSWORD_FIELD = 'store_passwd';

export function md5(value: string): string {
  return crypto.createHash('md5').update(value, 'utf8').digest('hex');
}

/**
 * Build the canonical string the processor signs:
 * named fields plus store_passwd = md5(secret), sorted by key, joined as k=v&k=v
 */
export function buildHashString(
  fields: Record<string, string>,
  storePassword: string,
): string {
  const entries: Record<string, string> = {
    ...fields,
    [PASSWORD_FIELD]: md5(storePassword),
  };

  return Object.keys(entries)
    .sort()
    .map((key) => `${key}=${entries[key]}`)
    .join('&');
}

/**
 * Verify the keyed MD5 checksum on a processor notification.
 *
 * A notification carrying neither verify_sign nor verify_key is accepted
 * unverified; the validation API round-trip is then the only check.
 * A notification carrying only one of them is rejected.
 */
export function verifyNotificationHash(
  notification: InboundNotification,
  storePassword: string,
): boolean {
  const hasSign = hasField(notification, VERIFY_SIGN_FIELD);
  const hasKey = hasField(notification, VERIFY_KEY_FIELD);

  if (!hasSign && !hasKey) {
    return true;
  }
  if (!hasSign || !hasKey) {
    return false;
  }

  const signature = readField(notification, VERIFY_SIGN_FIELD);
  const keyList = readField(notification, VERIFY_KEY_FIELD);
  if (!signature || !keyList) {
    return false;
  }

  const signed: Record<string, string> = {};
  for (const rawName of keyList.split(',')) {
    const name = sanitizeKey(rawName);
    if (name && hasField(notification, name)) {
      signed[name] = readField(notification, name);
    }
  }

  const expected = md5(buildHashString(signed, storePassword));
  return timingSafeEqual(expected, signature);
}

/**
 * Sign a set of fields the way the processor does
 */
export function signNotification(
  fields: Record<string, string>,
  storePassword: string,
): { verify_key: string; verify_sign: string } {
  return {
    verify_key: Object.keys(fields).join(','),
    verify_sign: md5(buildHashString(fields, storePassword)),
  };
}

function timingSafeEqual(a: string, b: string): boolean {
  const bufferA = Buffer.from(a, 'utf8');
  const bufferB = Buffer.from(b, 'utf8');
  // Byte lengths, not string lengths: non-ASCII input differs
  if (bufferA.length !== bufferB.length) {
    return false;
  }
  return crypto.timingSafeEqual(bufferA, bufferB);
}
