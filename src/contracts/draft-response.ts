import { z } from 'zod';

export const ResponseDraftSchema = z.object({
  subject: z.string().min(1),
  message: z.string().min(1),
  suggested_actions: z.array(z.string()),
});

export type ResponseDraft = z.infer<typeof ResponseDraftSchema>;

export function validateResponseDraft(data: unknown): ResponseDraft {
  return ResponseDraftSchema.parse(data);
}
