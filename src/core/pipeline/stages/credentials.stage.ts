import { CallbackOutcome } from '../../domain/enums';
import { SettingsSource } from '../../interfaces/settings-source.interface';
import { resolveCredentials } from '../../settings/credentials-resolver';
import { CallbackContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 3: Credentials
 * Loads persisted gateway settings; absent or incomplete settings end the run
 */
export class CredentialsStage implements PipelineStage {
  name = 'credentials';

  constructor(
    private readonly settingsSource: SettingsSource,
    private readonly gatewayName?: string,
  ) {}

  async execute(context: CallbackContext): Promise<StageResult> {
    const raw = await this.settingsSource.loadPaymentSettings();
    const resolution = resolveCredentials(raw, this.gatewayName);

    switch (resolution.kind) {
      case 'resolved':
        context.credentials = resolution.credentials;
        return { kind: 'continue', context };
      case 'missing':
        return {
          kind: 'skip',
          outcome: CallbackOutcome.UNCONFIGURED,
          reason: 'Gateway settings not found',
          context,
        };
      case 'invalid':
        return {
          kind: 'skip',
          outcome: CallbackOutcome.UNCONFIGURED,
          reason: `Gateway settings invalid: ${resolution.errors.join(', ')}`,
          context,
        };
    }
  }
}
