import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { ClientCredentials } from '../domain/value-objects/client-credentials.vo';
import { isConfirmedProcessorStatus } from '../domain/enums';
import { InboundNotification, ValidationResult } from '../interfaces/common.types';
import { readField } from '../notification/inbound-notification';
import { verifyNotificationHash } from '../verification/hash-verifier';
import { httpsAgentFor } from '../http/tls-policy';
import { isRecord } from '../utils/guards';

export const VALIDATION_ENDPOINT = '/validator/api/validationserverAPI.php';
export const BASE_SETTLEMENT_CURRENCY = 'BDT';
export const AMOUNT_TOLERANCE = 1;
export const DEFAULT_VALIDATION_TIMEOUT_MS = 30000;

/**
 * Synthetic statuses for results the processor never reported
 */
export const UNAVAILABLE_STATUS = 'UNAVAILABLE';
export const UNPARSEABLE_STATUS = 'UNPARSEABLE';

export const ValidationFailureReason = {
  MISSING_FIELDS: 'missing_fields',
  HASH_MISMATCH: 'hash_mismatch',
  TRANSPORT: 'transport_error',
  HTTP_STATUS: 'http_status',
  EMPTY_BODY: 'empty_body',
  UNPARSEABLE: 'unparseable',
  STATUS_NOT_CONFIRMED: 'status_not_confirmed',
  TRAN_ID_MISMATCH: 'tran_id_mismatch',
  AMOUNT_INVALID: 'amount_invalid',
  AMOUNT_MISMATCH: 'amount_mismatch',
} as const;

export type ValidationFailureReason =
  (typeof ValidationFailureReason)[keyof typeof ValidationFailureReason];

/**
 * Network-level failure talking to the processor (timeout, DNS, TLS, reset)
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export interface ValidationClientOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
}

export interface ValidateOptions {
  /** Result of a hash check already run by the caller */
  hashVerified?: boolean;
}

export interface RawValidationResponse {
  httpStatus: number;
  body: string;
}

/**
 * Client for the processor's transaction validation API
 *
 * validate() never throws for processor or network trouble; every such
 * failure comes back as a negative ValidationResult with a reason.
 */
export class SslcommerzValidationClient {
  private readonly logger = new Logger(SslcommerzValidationClient.name);
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: ValidationClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS;
  }

  async validate(
    notification: InboundNotification,
    credentials: ClientCredentials,
    options: ValidateOptions = {},
  ): Promise<ValidationResult> {
    const tranId = readField(notification, 'tran_id');
    const valId = readField(notification, 'val_id');

    if (!tranId || !valId) {
      return negative('', ValidationFailureReason.MISSING_FIELDS);
    }

    const hashValid =
      options.hashVerified ??
      verifyNotificationHash(notification, credentials.storePassword);
    if (!hashValid) {
      this.logger.warn(`Hash mismatch for transaction ${tranId}`);
      return negative('', ValidationFailureReason.HASH_MISMATCH);
    }

    let response: RawValidationResponse;
    try {
      response = await this.fetchValidation(valId, credentials);
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger.warn(
          `Validation API unreachable for transaction ${tranId}: ${error.code ?? error.message}`,
        );
        return negative(UNAVAILABLE_STATUS, ValidationFailureReason.TRANSPORT);
      }
      throw error;
    }

    return this.evaluate(response, notification);
  }

  /**
   * Perform the validation GET. Throws TransportError on network failure;
   * any HTTP status is returned as-is.
   */
  async fetchValidation(
    valId: string,
    credentials: ClientCredentials,
  ): Promise<RawValidationResponse> {
    const url = buildValidationUrl(valId, credentials);

    try {
      const response = await this.http.get<unknown>(url, {
        timeout: this.timeoutMs,
        httpsAgent: httpsAgentFor(credentials.environment),
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });

      return {
        httpStatus: response.status,
        body: bodyAsText(response.data),
      };
    } catch (error) {
      // The URL carries the store secret; only the error code is kept.
      if (axios.isAxiosError(error)) {
        throw new TransportError(
          'Validation request failed',
          error.code,
          error,
        );
      }
      throw new TransportError(
        'Validation request failed',
        undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Decide whether a validation API response confirms the claimed notification
   */
  evaluate(
    response: RawValidationResponse,
    notification: InboundNotification,
  ): ValidationResult {
    if (response.httpStatus !== 200) {
      return negative(UNAVAILABLE_STATUS, ValidationFailureReason.HTTP_STATUS);
    }
    if (response.body.trim() === '') {
      return negative(UNPARSEABLE_STATUS, ValidationFailureReason.EMPTY_BODY);
    }

    const parsed = parseJsonObject(response.body);
    if (!parsed) {
      return negative(UNPARSEABLE_STATUS, ValidationFailureReason.UNPARSEABLE);
    }

    const status = stringOf(parsed.status);
    const confirmedTranId = stringOf(parsed.tran_id).trim();
    const confirmedCurrency = stringOf(parsed.currency) || undefined;
    const confirmedAmount = numberOf(parsed.amount);
    const confirmedCurrencyAmount = numberOf(parsed.currency_amount);

    const details: ValidationResult = {
      confirmed: false,
      status,
      tranId: confirmedTranId || undefined,
      amount: confirmedAmount,
      currency: confirmedCurrency,
      currencyAmount: confirmedCurrencyAmount,
    };

    if (!isConfirmedProcessorStatus(status)) {
      return { ...details, reason: ValidationFailureReason.STATUS_NOT_CONFIRMED };
    }

    if (confirmedTranId !== readField(notification, 'tran_id')) {
      return { ...details, reason: ValidationFailureReason.TRAN_ID_MISMATCH };
    }

    const claimedCurrency =
      readField(notification, 'currency') || BASE_SETTLEMENT_CURRENCY;
    const claimedAmount = numberOf(readField(notification, 'amount'));
    const comparedAmount =
      claimedCurrency === BASE_SETTLEMENT_CURRENCY
        ? confirmedAmount
        : confirmedCurrencyAmount;

    if (claimedAmount === undefined || comparedAmount === undefined) {
      return { ...details, reason: ValidationFailureReason.AMOUNT_INVALID };
    }
    if (Math.abs(claimedAmount - comparedAmount) >= AMOUNT_TOLERANCE) {
      return { ...details, reason: ValidationFailureReason.AMOUNT_MISMATCH };
    }

    return { ...details, confirmed: true };
  }
}

export function buildValidationUrl(
  valId: string,
  credentials: ClientCredentials,
): string {
  const query = [
    `val_id=${encodeURIComponent(valId)}`,
    `store_id=${encodeURIComponent(credentials.storeId)}`,
    `store_passwd=${encodeURIComponent(credentials.storePassword)}`,
    'v=1',
    'format=json',
  ].join('&');

  return `${credentials.apiDomain}${VALIDATION_ENDPOINT}?${query}`;
}

function negative(status: string, reason: ValidationFailureReason): ValidationResult {
  return { confirmed: false, status, reason };
}

function bodyAsText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

function parseJsonObject(body: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function stringOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}
