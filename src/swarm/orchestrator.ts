import { z } from 'zod';
import { randomUUID } from 'crypto';
import { validateTicketRequest, type TicketRequest, type TicketRequestInput } from '../contracts/ticket.js';
import { ORCHESTRATION_MODE, SwarmRunResultSchema, type SwarmRunResult } from '../contracts/swarm-run.js';
import { noAugmentation, tryAugment, type Augmenter } from '../augment/augmenter.js';
import type { ToolGatewayClient } from '../gateway/client.js';
import type { KnowledgeStore } from '../kb/store.js';
import { SwarmLogger } from '../runner/logger.js';
import { triageTicket } from '../triage/classifier.js';
import { researchTicket } from '../research/researcher.js';
import { draftResponse } from '../draft/generator.js';
import { decideEscalation } from '../escalation/router.js';
import type { StageContext } from './stage-context.js';

export interface SwarmDependencies {
  knowledge: KnowledgeStore;
  gateway?: ToolGatewayClient;
  augmenter?: Augmenter;
  logger?: SwarmLogger;
  /** Source of `generated_at`. */
  clock?: () => Date;
  /** Source of the per-run trace id; must produce a UUID. */
  traceId?: () => string;
  notifyTo?: string;
  /** Knowledge hits requested by the research stage (default 3). */
  knowledgeLimit?: number;
}

const TraceIdSchema = z.string().uuid('trace id must be a UUID');

export const ORCHESTRATOR_ROLE = 'Support Orchestrator';
const HANDOFF_LENGTH = 280;

export type FrozenSwarmRunResult = Readonly<SwarmRunResult>;

function freezeTree(value: unknown): void {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      freezeTree(child);
    }
    Object.freeze(value);
  }
}

function handoffPrompt(ticket: TicketRequest): string {
  return [
    'Run end-to-end support orchestration over this ticket.',
    `Ticket ID: ${ticket.ticket_id}`,
    `Customer: ${ticket.customer_name} (${ticket.company})`,
    `Message: ${ticket.message}`,
    'Return concise operational guidance.',
  ].join('\n');
}

/**
 * Run triage, research, response and escalation in order for one ticket.
 * Runs share nothing but the injected collaborators.
 */
export async function runSupportSwarm(
  input: TicketRequestInput,
  deps: SwarmDependencies,
): Promise<FrozenSwarmRunResult> {
  const ticket = validateTicketRequest(input);
  const traceId = TraceIdSchema.parse((deps.traceId ?? randomUUID)());
  const clock = deps.clock ?? (() => new Date());
  const logger = (deps.logger ?? SwarmLogger.silent()).child({ traceId, ticketId: ticket.ticket_id });
  const context: StageContext = {
    augmenter: deps.augmenter ?? noAugmentation,
    logger,
    gateway: deps.gateway,
  };

  logger.info('swarm.start', `Starting swarm run for ticket ${ticket.ticket_id}`, {
    toolsEnabled: deps.gateway?.enabled ?? false,
  });

  const handoff = await tryAugment(
    context.augmenter,
    {
      role: ORCHESTRATOR_ROLE,
      instructions: 'Coordinate triage, research, response and escalation for support tickets.',
      prompt: handoffPrompt(ticket),
      maxLength: HANDOFF_LENGTH,
    },
    logger,
  );

  const triage = await triageTicket(ticket, context);
  const research = await researchTicket(ticket, deps.knowledge, context, { limit: deps.knowledgeLimit });
  if (handoff !== null) {
    research.synthesis = `${research.synthesis}\n\nHandoff summary: ${handoff}`;
  }
  const response = await draftResponse(ticket, triage, research, context);
  const escalation = await decideEscalation(ticket, triage, context, { notifyTo: deps.notifyTo });

  const result = SwarmRunResultSchema.parse({
    ticket_id: ticket.ticket_id,
    triage,
    research,
    response,
    escalation,
    generated_at: clock().toISOString(),
    trace_id: traceId,
    orchestration: ORCHESTRATION_MODE,
  });

  logger.info('swarm.finish', `Finished swarm run for ticket ${ticket.ticket_id}`, {
    urgency: triage.urgency,
    escalate: escalation.escalate,
    routeTo: escalation.route_to,
  });

  for (const part of Object.values(result)) {
    freezeTree(part);
  }
  return Object.freeze(result);
}
