import { z } from 'zod';

export const KnowledgeChunkSchema = z.object({
  id: z.string(),
  content: z.string(),
  doc_id: z.string(),
  source: z.string(),
  start_line: z.number().int().nonnegative(),
  end_line: z.number().int().nonnegative(),
  heading_path: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type KnowledgeChunk = z.infer<typeof KnowledgeChunkSchema>;

export const KnowledgeDocumentSchema = z.object({
  doc_id: z.string().min(1),
  content: z.string().min(20, 'content must be at least 20 characters'),
  source: z.string().min(1).default('internal'),
});

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

export interface KnowledgeHit {
  source: string;
  content: string;
}

export function validateKnowledgeDocument(data: unknown): KnowledgeDocument {
  return KnowledgeDocumentSchema.parse(data);
}
