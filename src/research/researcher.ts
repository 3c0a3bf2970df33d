import type { TicketRequest } from '../contracts/ticket.js';
import type { ResearchResult } from '../contracts/research-result.js';
import type { KnowledgeHit } from '../contracts/kb-source.js';
import type { KnowledgeStore } from '../kb/store.js';
import { tryAugment } from '../augment/augmenter.js';
import { RESEARCH_TOOL_KEYWORDS, findToolByKeywords } from '../gateway/resolver.js';
import { safeInvokeTool } from '../gateway/safe-invoke.js';
import { describeError } from '../runner/errors.js';
import { gatewayEnabled, type StageContext } from '../swarm/stage-context.js';

export const RESEARCH_ROLE = 'Research Agent';
const RESEARCH_INSTRUCTIONS =
  'You research support issues using internal KB first, and flag when external web validation is needed.';

export const KNOWLEDGE_LIMIT = 3;
export const DEFAULT_SYNTHESIS = 'Use internal runbooks and policies to resolve the issue.';
const TOOL_NOTE_LENGTH = 240;
const SYNTHESIS_LENGTH = 500;

export function formatNote(hit: KnowledgeHit): string {
  return `[${hit.source}] ${hit.content}`;
}

// Text after the "] " of a formatted note.
function noteBody(note: string): string {
  const marker = note.indexOf('] ');
  return marker === -1 ? note : note.slice(marker + 2);
}

export interface ResearchOptions {
  /** Maximum knowledge hits requested from the store. */
  limit?: number;
}

async function searchKnowledge(
  knowledge: KnowledgeStore,
  query: string,
  limit: number,
  context: StageContext,
): Promise<KnowledgeHit[]> {
  try {
    return await knowledge.search(query, limit);
  } catch (error) {
    context.logger.warn('research.kb_failed', `Knowledge search failed: ${describeError(error)}`);
    return [];
  }
}

/**
 * Retrieve internal knowledge; when fewer than two notes come back, try a
 * research tool on the tool server.
 */
export async function researchTicket(
  ticket: TicketRequest,
  knowledge: KnowledgeStore,
  context: StageContext,
  options: ResearchOptions = {},
): Promise<ResearchResult> {
  const hits = await searchKnowledge(knowledge, ticket.message, options.limit ?? KNOWLEDGE_LIMIT, context);
  const notes = hits.map(formatNote);
  const webLookupNeeded = notes.length < 2;
  const toolActions: string[] = [];

  if (webLookupNeeded && gatewayEnabled(context)) {
    const tool = await findToolByKeywords(context.gateway, RESEARCH_TOOL_KEYWORDS, context.logger);
    if (tool !== null) {
      const result = await safeInvokeTool(
        context.gateway,
        tool.name,
        { query: ticket.message, ticket_id: ticket.ticket_id },
        context.logger,
      );
      if (result !== null) {
        toolActions.push(`Invoked tool: ${tool.name}`);
        notes.push(`[tool:${tool.name}] ${JSON.stringify(result).slice(0, TOOL_NOTE_LENGTH)}`);
      }
    }
  }

  const augmented = await tryAugment(
    context.augmenter,
    {
      role: RESEARCH_ROLE,
      instructions: RESEARCH_INSTRUCTIONS,
      prompt: `Summarize the top support guidance in 2 sentences. Ticket: ${ticket.message}\nKnowledge: ${notes.join(' | ')}`,
      maxLength: SYNTHESIS_LENGTH,
    },
    context.logger,
  );

  let synthesis = DEFAULT_SYNTHESIS;
  if (augmented !== null) {
    synthesis = augmented;
  } else if (notes.length > 0) {
    synthesis = notes.slice(0, 2).map(noteBody).join(' ');
  }

  context.logger.debug('research.done', `Retrieved ${notes.length} notes`, {
    notes: notes.length,
    webLookupNeeded,
    toolActions: toolActions.length,
  });

  return {
    retrieved_notes: notes,
    web_lookup_needed: webLookupNeeded,
    synthesis,
    tool_actions: toolActions,
  };
}
