import { z } from 'zod';

export const UrgencySchema = z.enum([
  'low',
  'medium',
  'high',
  'critical',
]);

export type Urgency = z.infer<typeof UrgencySchema>;

/** Fixed SLA targets; an urgency never appears with any other value. */
export const SLA_TARGET_MINUTES: Readonly<Record<Urgency, number>> = {
  critical: 15,
  high: 60,
  medium: 240,
  low: 1440,
};

export const TriageResultSchema = z
  .object({
    urgency: UrgencySchema,
    reason: z.string().min(1),
    confidence: z.number().min(0).max(1),
    sla_target_minutes: z.number().int().positive(),
  })
  .refine(result => SLA_TARGET_MINUTES[result.urgency] === result.sla_target_minutes, {
    message: 'sla_target_minutes does not match urgency',
    path: ['sla_target_minutes'],
  });

export type TriageResult = z.infer<typeof TriageResultSchema>;

export function validateTriageResult(data: unknown): TriageResult {
  return TriageResultSchema.parse(data);
}
