import {
  GatewayRequestSchema,
  type GatewayResponse,
} from '../contracts/tool.js';
import type { ToolGatewayClient } from './client.js';

/**
 * Validate an operator request and run it against the gateway.
 * Errors from validation or the gateway are not caught here.
 */
export async function executeGatewayRequest(
  client: ToolGatewayClient,
  input: unknown,
): Promise<GatewayResponse> {
  const request = GatewayRequestSchema.parse(input);

  switch (request.operation) {
    case 'list_tools': {
      const tools = await client.listTools();
      return { operation: request.operation, data: { tools } };
    }
    case 'describe_tool':
      return { operation: request.operation, data: await client.describeTool(requireName(request.name)) };
    case 'invoke_tool':
      return {
        operation: request.operation,
        data: await client.invokeTool(requireName(request.name), request.arguments),
      };
  }
}

// The schema refinement guarantees a name for these operations.
function requireName(name: string | undefined): string {
  if (name === undefined) {
    throw new Error('Tool name is required');
  }
  return name;
}
