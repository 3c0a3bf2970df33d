import { z } from 'zod';

export const TonePreferenceSchema = z.enum([
  'friendly',
  'formal',
  'direct',
]);

export const TicketRequestSchema = z.object({
  ticket_id: z.string().min(1),
  customer_name: z.string().min(1),
  company: z.string().min(1),
  message: z.string().min(8, 'message must be at least 8 characters'),
  preferred_tone: TonePreferenceSchema.default('friendly'),
  urgency_hint: z.string().optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type TicketRequest = z.infer<typeof TicketRequestSchema>;
export type TicketRequestInput = z.input<typeof TicketRequestSchema>;
export type TonePreference = z.infer<typeof TonePreferenceSchema>;

export function validateTicketRequest(data: unknown): TicketRequest {
  return TicketRequestSchema.parse(data);
}
