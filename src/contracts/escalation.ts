import { z } from 'zod';

export const RouteTargetSchema = z.enum([
  'none',
  'human_support_lead',
  'security_specialist',
  'billing_specialist',
]);

export type RouteTarget = z.infer<typeof RouteTargetSchema>;

export const EscalationDecisionSchema = z
  .object({
    escalate: z.boolean(),
    route_to: RouteTargetSchema,
    reason: z.string().min(1),
    tool_actions: z.array(z.string()).default([]),
  })
  .refine(decision => (decision.route_to === 'none') === !decision.escalate, {
    message: "route_to must be 'none' exactly when escalate is false",
    path: ['route_to'],
  });

export type EscalationDecision = z.infer<typeof EscalationDecisionSchema>;

export function validateEscalationDecision(data: unknown): EscalationDecision {
  return EscalationDecisionSchema.parse(data);
}
