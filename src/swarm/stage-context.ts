import type { Augmenter } from '../augment/augmenter.js';
import type { ToolGatewayClient } from '../gateway/client.js';
import type { SwarmLogger } from '../runner/logger.js';

/**
 * Collaborators shared by every pipeline stage within one run.
 */
export interface StageContext {
  augmenter: Augmenter;
  logger: SwarmLogger;
  /** Absent or disabled means no remote tools are consulted. */
  gateway?: ToolGatewayClient;
}

export function gatewayEnabled(context: StageContext): context is StageContext & { gateway: ToolGatewayClient } {
  return context.gateway !== undefined && context.gateway.enabled;
}
