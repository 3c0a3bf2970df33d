import type { Augmenter } from '../augment/augmenter.js';
import type { TicketRequest } from '../contracts/ticket.js';
import type { TriageResult, Urgency } from '../contracts/triage-result.js';
import { SLA_TARGET_MINUTES } from '../contracts/triage-result.js';
import { validateTicketRequest } from '../contracts/ticket.js';
import { SwarmLogger } from '../runner/logger.js';
import type { StageContext } from '../swarm/stage-context.js';

export function makeTicket(overrides: Partial<TicketRequest> = {}): TicketRequest {
  return validateTicketRequest({
    ticket_id: 'T-100',
    customer_name: 'Dana',
    company: 'Acme Corp',
    message: 'How do I change my avatar?',
    ...overrides,
  });
}

export function makeTriage(urgency: Urgency): TriageResult {
  return { urgency, reason: 'test reason', confidence: 0.8, sla_target_minutes: SLA_TARGET_MINUTES[urgency] };
}

export interface AugmentCall {
  role: string;
  instructions: string;
  prompt: string;
}

/** Answers only for the listed roles and records every request. */
export function scriptedAugmenter(answers: Record<string, string>, calls: AugmentCall[] = []): Augmenter {
  return {
    augment: async (role, instructions, prompt) => {
      calls.push({ role, instructions, prompt });
      return answers[role] ?? null;
    },
  };
}

export function quietContext(overrides: Partial<StageContext> = {}): StageContext {
  return {
    augmenter: { augment: async () => null },
    logger: SwarmLogger.silent(),
    ...overrides,
  };
}
