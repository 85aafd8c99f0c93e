import {
  ClientCredentials,
  CredentialsError,
  GatewayEnvironment,
} from '../../src';

describe('ClientCredentials', () => {
  const build = () =>
    ClientCredentials.builder()
      .storeId('teststore01')
      .storePassword('test-secret')
      .environment('sandbox')
      .build();

  it('should build sandbox credentials', () => {
    const credentials = build();

    expect(credentials.storeId).toBe('teststore01');
    expect(credentials.storePassword).toBe('test-secret');
    expect(credentials.environment).toBe(GatewayEnvironment.SANDBOX);
    expect(credentials.isSandbox).toBe(true);
    expect(credentials.apiDomain).toBe('https://sandbox.sslcommerz.com');
  });

  it('should derive the live API domain', () => {
    const credentials = ClientCredentials.builder()
      .storeId('teststore01')
      .storePassword('test-secret')
      .environment('live')
      .build();

    expect(credentials.isSandbox).toBe(false);
    expect(credentials.apiDomain).toBe('https://securepay.sslcommerz.com');
  });

  it('should normalize the environment and store id', () => {
    const credentials = ClientCredentials.builder()
      .storeId('  teststore01 ')
      .storePassword('test-secret')
      .environment(' Sandbox ')
      .build();

    expect(credentials.storeId).toBe('teststore01');
    expect(credentials.environment).toBe(GatewayEnvironment.SANDBOX);
  });

  it('should name every invalid field', () => {
    let caught: unknown;
    try {
      ClientCredentials.builder().environment('staging').build();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CredentialsError);
    expect(caught).toMatchObject({
      name: 'CredentialsError',
      invalidFields: ['store_id', 'store_password', 'environment'],
    });
  });

  it('should reject a whitespace-only store id', () => {
    expect(() =>
      ClientCredentials.builder()
        .storeId('   ')
        .storePassword('test-secret')
        .environment('live')
        .build(),
    ).toThrow('Invalid SSLCommerz credentials: store_id');
  });

  it('should redact the store password when serialized', () => {
    const credentials = build();

    expect(credentials.toJSON()).toEqual({
      storeId: 'teststore01',
      storePassword: '[REDACTED]',
      environment: 'sandbox',
    });
    expect(JSON.stringify(credentials)).not.toContain('test-secret');
    expect(String(credentials)).toBe('ClientCredentials(teststore01, sandbox)');
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(build())).toBe(true);
  });
});
