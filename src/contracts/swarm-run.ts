import { z } from 'zod';
import { TriageResultSchema } from './triage-result.js';
import { ResearchResultSchema } from './research-result.js';
import { ResponseDraftSchema } from './draft-response.js';
import { EscalationDecisionSchema } from './escalation.js';

export const ORCHESTRATION_MODE = 'Deterministic four-stage pipeline with optional augmentation';

export const SwarmRunResultSchema = z.object({
  ticket_id: z.string().min(1),
  triage: TriageResultSchema,
  research: ResearchResultSchema,
  response: ResponseDraftSchema,
  escalation: EscalationDecisionSchema,
  generated_at: z.string().datetime(),
  trace_id: z.string().uuid(),
  orchestration: z.string().default(ORCHESTRATION_MODE),
});

export type SwarmRunResult = z.infer<typeof SwarmRunResultSchema>;

export function validateSwarmRunResult(data: unknown): SwarmRunResult {
  return SwarmRunResultSchema.parse(data);
}
