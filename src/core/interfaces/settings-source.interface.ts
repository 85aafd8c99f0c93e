/**
 * Source of the persisted payment-method settings blob
 *
 * The value is returned raw (object or JSON string); parsing and validation
 * belong to the credentials resolver.
 */
export interface SettingsSource {
  loadPaymentSettings(): Promise<unknown>;
}
