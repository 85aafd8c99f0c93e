import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  ClientCredentials,
  CredentialsError,
} from '../domain/value-objects/client-credentials.vo';
import { isRecord } from '../utils/guards';
import { GatewaySettingsSchema } from './gateway-settings.schema';

export const DEFAULT_GATEWAY_NAME = 'sslcommerz';

export type CredentialsResolution =
  | { kind: 'resolved'; credentials: ClientCredentials }
  | { kind: 'missing' }
  | { kind: 'invalid'; errors: string[] };

/**
 * Parse persisted payment settings into ClientCredentials.
 *
 * Accepts the host's `{ payment_methods: [{ name, fields: [{ name, value }] }] }`
 * blob (optionally wrapped in `payment_settings`, object or JSON string) or a
 * flat `{ environment, store_id, store_password }` record.
 */
export function resolveCredentials(
  raw: unknown,
  gatewayName: string = DEFAULT_GATEWAY_NAME,
): CredentialsResolution {
  const settings = locateGatewaySettings(raw, gatewayName);
  if (!settings) {
    return { kind: 'missing' };
  }

  const schema = plainToInstance(GatewaySettingsSchema, settings);
  const errors = validateSync(schema);
  if (errors.length > 0) {
    return { kind: 'invalid', errors: errors.map((e) => e.property) };
  }

  try {
    const credentials = ClientCredentials.builder()
      .storeId(schema.store_id)
      .storePassword(schema.store_password)
      .environment(schema.environment)
      .build();
    return { kind: 'resolved', credentials };
  } catch (error) {
    if (error instanceof CredentialsError) {
      return { kind: 'invalid', errors: error.invalidFields };
    }
    throw error;
  }
}

/**
 * Find this gateway's settings and flatten them into a plain record
 */
export function locateGatewaySettings(
  raw: unknown,
  gatewayName: string,
): Record<string, unknown> | null {
  if (typeof raw === 'string') {
    return locateGatewaySettings(parseJson(raw), gatewayName);
  }
  if (!isRecord(raw)) {
    return null;
  }

  if ('payment_settings' in raw) {
    return locateGatewaySettings(raw.payment_settings, gatewayName);
  }

  if ('payment_methods' in raw) {
    const methods = raw.payment_methods;
    if (!Array.isArray(methods)) {
      return null;
    }
    const method = methods.find(
      (m: unknown) => isRecord(m) && m.name === gatewayName,
    );
    return isRecord(method) ? flattenFields(method.fields) : null;
  }

  if ('store_id' in raw || 'store_password' in raw || 'environment' in raw) {
    return raw;
  }

  return null;
}

function flattenFields(fields: unknown): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  if (!Array.isArray(fields)) {
    return flat;
  }
  for (const field of fields) {
    if (isRecord(field) && typeof field.name === 'string' && 'value' in field) {
      flat[field.name] = field.value;
    }
  }
  return flat;
}

function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}
