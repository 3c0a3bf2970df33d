import type { ToolDescriptor } from '../contracts/tool.js';
import { SwarmException, describeError } from '../runner/errors.js';
import { SwarmLogger } from '../runner/logger.js';
import type { ToolGatewayClient } from './client.js';

export const RESEARCH_TOOL_KEYWORDS = ['web', 'search', 'knowledge'] as const;
export const TICKET_UPDATE_TOOL_KEYWORDS = ['ticket', 'database', 'crm', 'update'] as const;
export const NOTIFY_TOOL_KEYWORDS = ['email', 'notify', 'slack', 'teams'] as const;

/**
 * First tool whose name or description mentions any keyword, case-insensitively.
 */
export function resolveToolByKeywords(
  tools: readonly ToolDescriptor[],
  keywords: readonly string[],
): ToolDescriptor | null {
  const needles = keywords.map(k => k.toLowerCase());
  for (const tool of tools) {
    const haystack = `${tool.name} ${tool.description}`.toLowerCase();
    if (needles.some(needle => haystack.includes(needle))) {
      return tool;
    }
  }
  return null;
}

/**
 * List the server's tools and pick one by keyword. Any gateway or
 * configuration failure resolves `null`.
 */
export async function findToolByKeywords(
  client: ToolGatewayClient,
  keywords: readonly string[],
  logger: SwarmLogger = SwarmLogger.silent(),
): Promise<ToolDescriptor | null> {
  let tools: ToolDescriptor[];
  try {
    tools = await client.listTools();
  } catch (error) {
    if (!(error instanceof SwarmException)) {
      throw error;
    }
    logger.warn('gateway.list_failed', `Tool listing failed: ${describeError(error)}`, { code: error.code });
    return null;
  }

  const tool = resolveToolByKeywords(tools, keywords);
  if (tool === null) {
    logger.debug('gateway.no_matching_tool', 'No tool matched keywords', { keywords, available: tools.length });
  }
  return tool;
}
