import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { ClientCredentials } from '../domain/value-objects/client-credentials.vo';
import { httpsAgentFor } from '../http/tls-policy';
import { isRecord } from '../utils/guards';
import { BASE_SETTLEMENT_CURRENCY } from '../validation/validation-client';

export const SESSION_ENDPOINT = '/gwprocess/v4/api.php';
export const DEFAULT_SESSION_TIMEOUT_MS = 60000;
export const DEFAULT_TRANSACTION_PREFIX = 'ORDER-';

const PRODUCT_CATEGORY = 'education';
const PRODUCT_PROFILE = 'non-physical-goods';
const SHIPPING_METHOD = 'NO';
const DEFAULT_COUNTRY = 'Bangladesh';
const DEFAULT_PHONE = '01700000000';
const DEFAULT_POSTCODE = '0000';
const DEFAULT_PRODUCT_NAME = 'Course Purchase';
const DEFAULT_CUSTOMER_NAME = 'Customer';
const DEFAULT_STORE_NAME = 'Online Store';
const NOT_AVAILABLE = 'N/A';

export interface CheckoutCustomer {
  name?: string;
  email: string;
  phone?: string;
}

export interface BillingAddress {
  address1?: string;
  address2?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface CheckoutRequest {
  orderId: number;
  amount: number;
  currency: string;
  customer: CheckoutCustomer;
  billingAddress?: BillingAddress;
  description?: string;
  storeName?: string;
}

export interface CheckoutUrls {
  successUrl: string;
  cancelUrl: string;
  ipnUrl: string;
}

export interface SessionResult {
  redirectUrl: string;
  tranId: string;
}

/**
 * Payment session could not be created
 */
export class InitiationError extends Error {
  constructor(
    message: string,
    public readonly reason?: string,
  ) {
    super(message);
    this.name = 'InitiationError';
  }
}

export interface SessionClientOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
  transactionPrefix?: string;
  clock?: () => Date;
}

/**
 * Creates hosted checkout sessions and returns the gateway redirect URL
 */
export class SslcommerzSessionClient {
  private readonly logger = new Logger(SslcommerzSessionClient.name);
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly transactionPrefix: string;
  private readonly clock: () => Date;

  constructor(options: SessionClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.transactionPrefix =
      options.transactionPrefix ?? DEFAULT_TRANSACTION_PREFIX;
    this.clock = options.clock ?? (() => new Date());
  }

  async createSession(
    request: CheckoutRequest,
    credentials: ClientCredentials,
    urls: CheckoutUrls,
  ): Promise<SessionResult> {
    const form = this.buildSessionForm(request, credentials, urls);
    const tranId = form.tran_id;

    const body = await this.post(form, credentials);
    if (body.status === 'SUCCESS') {
      const redirectUrl =
        typeof body.GatewayPageURL === 'string' ? body.GatewayPageURL : '';
      if (!redirectUrl) {
        throw new InitiationError('Gateway URL not found in response');
      }
      this.logger.log(
        `Session created for order ${request.orderId} (${tranId})`,
      );
      return { redirectUrl, tranId };
    }

    const reason =
      typeof body.failedreason === 'string' && body.failedreason
        ? body.failedreason
        : 'Unknown error occurred';
    this.logger.warn(
      `Session rejected for order ${request.orderId}: ${reason}`,
    );
    throw new InitiationError(`Payment session failed: ${reason}`, reason);
  }

  /**
   * Build the form fields for a session request
   */
  buildSessionForm(
    request: CheckoutRequest,
    credentials: ClientCredentials,
    urls: CheckoutUrls,
  ): Record<string, string> {
    assertCheckoutRequest(request);

    const unixSeconds = Math.floor(this.clock().getTime() / 1000);
    const tranId = `${this.transactionPrefix}${request.orderId}-${unixSeconds}`;
    const amount = request.amount.toFixed(2);
    const address = request.billingAddress ?? {};
    const customerName = request.customer.name || DEFAULT_CUSTOMER_NAME;
    const country =
      address.country ||
      (request.currency === BASE_SETTLEMENT_CURRENCY
        ? DEFAULT_COUNTRY
        : NOT_AVAILABLE);

    return {
      store_id: credentials.storeId,
      store_passwd: credentials.storePassword,
      total_amount: amount,
      product_amount: amount,
      currency: request.currency,
      tran_id: tranId,
      product_category: PRODUCT_CATEGORY,
      product_name: request.description || DEFAULT_PRODUCT_NAME,
      product_profile: PRODUCT_PROFILE,

      success_url: urls.successUrl,
      fail_url: urls.cancelUrl,
      cancel_url: urls.cancelUrl,
      ipn_url: urls.ipnUrl,

      cus_name: customerName,
      cus_email: request.customer.email,
      cus_add1: address.address1 || NOT_AVAILABLE,
      cus_add2: address.address2 ?? '',
      cus_city: address.city || NOT_AVAILABLE,
      cus_state: address.state ?? '',
      cus_postcode: address.postalCode || DEFAULT_POSTCODE,
      cus_country: country,
      cus_phone: request.customer.phone || DEFAULT_PHONE,

      shipping_method: SHIPPING_METHOD,
      num_of_item: '1',
      ship_name: customerName,
      ship_add1: address.address1 || NOT_AVAILABLE,
      ship_add2: address.address2 ?? '',
      ship_city: address.city || NOT_AVAILABLE,
      ship_state: address.state ?? '',
      ship_postcode: address.postalCode || DEFAULT_POSTCODE,
      ship_country: country,

      value_a: String(request.orderId),
      value_b: request.customer.email,
      value_c: request.storeName || DEFAULT_STORE_NAME,
    };
  }

  private async post(
    form: Record<string, string>,
    credentials: ClientCredentials,
  ): Promise<Record<string, unknown>> {
    let status: number;
    let data: unknown;

    try {
      const response = await this.http.post<unknown>(
        `${credentials.apiDomain}${SESSION_ENDPOINT}`,
        new URLSearchParams(form).toString(),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: this.timeoutMs,
          httpsAgent: httpsAgentFor(credentials.environment),
          responseType: 'text',
          transformResponse: [(raw: unknown) => raw],
          validateStatus: () => true,
        },
      );
      status = response.status;
      data = response.data;
    } catch (error) {
      const detail = axios.isAxiosError(error)
        ? (error.code ?? error.message)
        : String(error);
      throw new InitiationError(
        `Failed to connect with payment gateway: ${detail}`,
        detail,
      );
    }

    const text = typeof data === 'string' ? data : '';
    if (status !== 200 || text.trim() === '') {
      throw new InitiationError(
        `Failed to connect with payment gateway (HTTP ${status})`,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new InitiationError('Invalid JSON response from payment gateway');
    }
    if (!isRecord(parsed)) {
      throw new InitiationError('Invalid JSON response from payment gateway');
    }
    return parsed;
  }
}

function assertCheckoutRequest(request: CheckoutRequest): void {
  if (!Number.isSafeInteger(request.orderId) || request.orderId <= 0) {
    throw new InitiationError('Order ID is required for payment processing');
  }
  if (!Number.isFinite(request.amount) || request.amount <= 0) {
    throw new InitiationError('Payment amount must be greater than zero');
  }
  if (!request.currency) {
    throw new InitiationError('Currency is required for payment processing');
  }
  if (!request.customer?.email) {
    throw new InitiationError('Customer email is required for payment processing');
  }
}
