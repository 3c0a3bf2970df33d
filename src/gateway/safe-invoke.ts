import type { ToolDocument } from '../contracts/tool.js';
import { ConfigurationError, GatewayError, describeError } from '../runner/errors.js';
import type { SwarmLogger } from '../runner/logger.js';
import type { ToolGatewayClient } from './client.js';

/**
 * Describe, then invoke a tool. Gateway and configuration failures are logged
 * and resolve `null`; anything else is a defect and propagates.
 */
export async function safeInvokeTool(
  client: ToolGatewayClient,
  name: string,
  args: ToolDocument,
  logger: SwarmLogger,
): Promise<ToolDocument | null> {
  try {
    await client.describeTool(name);
    return await client.invokeTool(name, args);
  } catch (error) {
    if (error instanceof GatewayError || error instanceof ConfigurationError) {
      logger.warn('gateway.invoke_failed', `Tool '${name}' failed: ${describeError(error)}`, {
        tool: name,
        code: error.code,
      });
      return null;
    }
    throw error;
  }
}
