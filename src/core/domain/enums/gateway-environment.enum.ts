/**
 * Merchant environment; selects API domain and TLS policy
 */
export enum GatewayEnvironment {
  SANDBOX = 'sandbox',
  LIVE = 'live',
}

export const GATEWAY_API_DOMAINS: Readonly<Record<GatewayEnvironment, string>> =
  {
    [GatewayEnvironment.SANDBOX]: 'https://sandbox.sslcommerz.com',
    [GatewayEnvironment.LIVE]: 'https://securepay.sslcommerz.com',
  };

export function isGatewayEnvironment(
  value: unknown,
): value is GatewayEnvironment {
  return (
    value === GatewayEnvironment.SANDBOX || value === GatewayEnvironment.LIVE
  );
}
