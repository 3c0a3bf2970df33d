import { z } from 'zod';

export const ResearchResultSchema = z.object({
  retrieved_notes: z.array(z.string()),
  web_lookup_needed: z.boolean(),
  synthesis: z.string(),
  tool_actions: z.array(z.string()).default([]),
});

export type ResearchResult = z.infer<typeof ResearchResultSchema>;
