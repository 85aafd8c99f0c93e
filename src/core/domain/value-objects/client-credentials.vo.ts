import {
  GatewayEnvironment,
  GATEWAY_API_DOMAINS,
  isGatewayEnvironment,
} from '../enums';

/**
 * Raised when credentials cannot be built from the supplied fields
 */
export class CredentialsError extends Error {
  constructor(
    message: string,
    public readonly invalidFields: string[],
  ) {
    super(message);
    this.name = 'CredentialsError';
  }
}

/**
 * ClientCredentials value object - immutable per-merchant configuration
 *
 * Built once through {@link ClientCredentialsBuilder}; construction fails fast
 * when a field is missing. The store secret is redacted from every
 * serialized form.
 */
export class ClientCredentials {
  private constructor(
    public readonly storeId: string,
    private readonly secret: string,
    public readonly environment: GatewayEnvironment,
  ) {
    Object.freeze(this);
  }

  static builder(): ClientCredentialsBuilder {
    return new ClientCredentialsBuilder();
  }

  /** @internal used by the builder only */
  static create(
    storeId: string,
    storePassword: string,
    environment: GatewayEnvironment,
  ): ClientCredentials {
    return new ClientCredentials(storeId, storePassword, environment);
  }

  get storePassword(): string {
    return this.secret;
  }

  get apiDomain(): string {
    return GATEWAY_API_DOMAINS[this.environment];
  }

  get isSandbox(): boolean {
    return this.environment === GatewayEnvironment.SANDBOX;
  }

  toJSON(): Record<string, string> {
    return {
      storeId: this.storeId,
      storePassword: '[REDACTED]',
      environment: this.environment,
    };
  }

  toString(): string {
    return `ClientCredentials(${this.storeId}, ${this.environment})`;
  }
}

/**
 * Collects credential fields and validates them together on build()
 */
export class ClientCredentialsBuilder {
  private storeIdValue?: string;
  private storePasswordValue?: string;
  private environmentValue?: string;

  storeId(value: string | undefined): this {
    this.storeIdValue = value?.trim();
    return this;
  }

  storePassword(value: string | undefined): this {
    this.storePasswordValue = value;
    return this;
  }

  environment(value: string | undefined): this {
    this.environmentValue = value?.trim().toLowerCase();
    return this;
  }

  build(): ClientCredentials {
    const invalid: string[] = [];

    if (!this.storeIdValue) {
      invalid.push('store_id');
    }
    if (!this.storePasswordValue) {
      invalid.push('store_password');
    }
    if (!isGatewayEnvironment(this.environmentValue)) {
      invalid.push('environment');
    }

    if (
      invalid.length > 0 ||
      !this.storeIdValue ||
      !this.storePasswordValue ||
      !isGatewayEnvironment(this.environmentValue)
    ) {
      throw new CredentialsError(
        `Invalid SSLCommerz credentials: ${invalid.join(', ')}`,
        invalid,
      );
    }

    return ClientCredentials.create(
      this.storeIdValue,
      this.storePasswordValue,
      this.environmentValue,
    );
  }
}
