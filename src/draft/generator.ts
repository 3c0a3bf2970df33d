import type { TicketRequest, TonePreference } from '../contracts/ticket.js';
import type { TriageResult } from '../contracts/triage-result.js';
import type { ResearchResult } from '../contracts/research-result.js';
import type { ResponseDraft } from '../contracts/draft-response.js';
import { tryAugment } from '../augment/augmenter.js';
import type { StageContext } from '../swarm/stage-context.js';

export const TONE_HINTS: Readonly<Record<TonePreference, string>> = {
  friendly: 'warm, empathetic, and human',
  formal: 'professional and concise',
  direct: 'clear and action-oriented',
};

export const SUGGESTED_ACTIONS: readonly string[] = [
  'Acknowledge the issue and provide immediate next step.',
  'Share ETA based on the assigned SLA.',
  'Offer a fallback workaround if available.',
  'Record internal runbook update notes for the knowledge base.',
];

export const RESPONSE_ROLE = 'Response Agent';
const RESPONSE_INSTRUCTIONS =
  'You craft personalized customer support messages with recommended actions and clear ownership.';
const MESSAGE_LENGTH = 1000;
const SIGNATURE = 'Support Swarm';

export function buildSubject(ticket: TicketRequest, triage: TriageResult): string {
  return `[${triage.urgency.toUpperCase()}] Update on ticket ${ticket.ticket_id}`;
}

export function renderTemplate(ticket: TicketRequest, triage: TriageResult, research: ResearchResult): string {
  return [
    `Hi ${ticket.customer_name},`,
    'Thanks for raising this with us. We have triaged your request and started investigation using our internal runbooks. ' +
      `Current priority is **${triage.urgency}** with a target response window of ${triage.sla_target_minutes} minutes.`,
    `What we know so far: ${research.synthesis}`,
    "We'll share another update shortly with resolution steps.",
    `Best,\n${SIGNATURE}`,
  ].join('\n\n');
}

/**
 * Customer-facing reply. The tone preference only shapes the augmentation
 * prompt; the fallback template is the same for every tone.
 */
export async function draftResponse(
  ticket: TicketRequest,
  triage: TriageResult,
  research: ResearchResult,
  context: StageContext,
): Promise<ResponseDraft> {
  const drafted = await tryAugment(
    context.augmenter,
    {
      role: RESPONSE_ROLE,
      instructions: RESPONSE_INSTRUCTIONS,
      prompt:
        `Draft a short support reply for ${ticket.customer_name} at ${ticket.company}. ` +
        `Urgency=${triage.urgency}. Tone=${TONE_HINTS[ticket.preferred_tone]}. Research=${research.synthesis}`,
      maxLength: MESSAGE_LENGTH,
    },
    context.logger,
  );

  return {
    subject: buildSubject(ticket, triage),
    message: drafted ?? renderTemplate(ticket, triage, research),
    suggested_actions: [...SUGGESTED_ACTIONS],
  };
}
