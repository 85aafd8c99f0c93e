/**
 * Callback processing pipeline
 *
 * 1. Landing filter - Only the success landing (or IPN) proceeds
 * 2. Extraction - Sanitize body, require tran_id and order id
 * 3. Credentials - Load gateway settings
 * 4. Verification - Check the notification hash
 * 5. Validation - Confirm with the processor's validation API
 * 6. Reconciliation - Apply the result to the order
 */

// Main processor
export { CallbackProcessor } from './callback-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { LandingFilterStage } from './stages/landing-filter.stage';
export { ExtractionStage } from './stages/extraction.stage';
export { CredentialsStage } from './stages/credentials.stage';
export { VerificationStage } from './stages/verification.stage';
export { ValidationStage } from './stages/validation.stage';
export { ReconciliationStage } from './stages/reconciliation.stage';
