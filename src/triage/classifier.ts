import type { TicketRequest } from '../contracts/ticket.js';
import { SLA_TARGET_MINUTES, type TriageResult, type Urgency } from '../contracts/triage-result.js';
import { tryAugment } from '../augment/augmenter.js';
import type { StageContext } from '../swarm/stage-context.js';

export interface UrgencyTier {
  urgency: Urgency;
  keywords: readonly string[];
  confidence: number;
  reason: string;
}

/** Checked in order; the first tier with a matching keyword wins. */
export const URGENCY_TIERS: readonly UrgencyTier[] = [
  {
    urgency: 'critical',
    keywords: ['breach', 'outage', 'down', 'incident', 'security'],
    confidence: 0.9,
    reason: 'Possible service or security incident detected.',
  },
  {
    urgency: 'high',
    keywords: ['urgent', "can't login", 'cannot login', 'blocked'],
    confidence: 0.82,
    reason: 'Customer blocked from key workflow.',
  },
  {
    urgency: 'medium',
    keywords: ['billing', 'invoice', 'refund'],
    confidence: 0.78,
    reason: 'Billing-related request with potential business impact.',
  },
];

const DEFAULT_TIER: UrgencyTier = {
  urgency: 'low',
  keywords: [],
  confidence: 0.7,
  reason: 'General support request with no outage indicators.',
};

export const TRIAGE_ROLE = 'Triage Agent';
const TRIAGE_INSTRUCTIONS = 'You triage incoming enterprise support tickets by urgency.';
const AUGMENTATION_NOTE_LENGTH = 160;

export function classifyUrgency(ticket: TicketRequest): UrgencyTier {
  const text = `${ticket.message} ${ticket.urgency_hint ?? ''}`.toLowerCase();
  return URGENCY_TIERS.find(tier => tier.keywords.some(kw => text.includes(kw))) ?? DEFAULT_TIER;
}

/**
 * Deterministic urgency classification. Augmentation can only add a note to
 * the reason; urgency, confidence and SLA always come from the tier table.
 */
export async function triageTicket(ticket: TicketRequest, context: StageContext): Promise<TriageResult> {
  const tier = classifyUrgency(ticket);

  const note = await tryAugment(
    context.augmenter,
    {
      role: TRIAGE_ROLE,
      instructions: TRIAGE_INSTRUCTIONS,
      prompt: `Classify urgency as low/medium/high/critical and return one-sentence reason. Ticket: ${ticket.message}`,
      maxLength: AUGMENTATION_NOTE_LENGTH,
    },
    context.logger,
  );

  context.logger.debug('triage.classified', `Classified ticket as ${tier.urgency}`, {
    urgency: tier.urgency,
    augmented: note !== null,
  });

  return {
    urgency: tier.urgency,
    reason: note !== null ? `${tier.reason} Augmentation note: ${note}` : tier.reason,
    confidence: tier.confidence,
    sla_target_minutes: SLA_TARGET_MINUTES[tier.urgency],
  };
}
