import * as https from 'https';
import { GatewayEnvironment } from '../domain/enums';

// Sandbox certificates are not verified; live always is.
const sandboxAgent = new https.Agent({ rejectUnauthorized: false });
const liveAgent = new https.Agent({ rejectUnauthorized: true });

export function httpsAgentFor(environment: GatewayEnvironment): https.Agent {
  return environment === GatewayEnvironment.SANDBOX ? sandboxAgent : liveAgent;
}
