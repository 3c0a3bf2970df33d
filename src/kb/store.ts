import type { KnowledgeDocument, KnowledgeHit } from '../contracts/kb-source.js';
import { chunkMarkdown, chunkText, type ChunkingOptions, DEFAULT_CHUNKING_OPTIONS } from './chunking.js';
import { TermIndex } from './retrieval.js';

/**
 * Read side used by the pipeline, write side used by ingestion.
 * Implementations must be safe to share between concurrent runs.
 */
export interface KnowledgeStore {
  search(query: string, limit: number): Promise<KnowledgeHit[]>;
  add(id: string, content: string, source: string): Promise<void>;
}

export const DEFAULT_KNOWLEDGE: readonly KnowledgeDocument[] = [
  {
    doc_id: 'kb-1',
    content: 'Password reset issues are usually solved by clearing SSO cache and retrying after 5 minutes.',
    source: 'playbook',
  },
  {
    doc_id: 'kb-2',
    content: 'Billing disputes above 5000 USD must be routed to billing_specialist with invoice references.',
    source: 'billing-policy',
  },
  {
    doc_id: 'kb-3',
    content: 'If a customer reports suspected account breach, escalate to security_specialist immediately.',
    source: 'security-runbook',
  },
  {
    doc_id: 'kb-4',
    content: 'Enterprise support SLA: critical tickets target 15 minutes, high 60 minutes, medium 240, low 1440.',
    source: 'sla-policy',
  },
];

export interface InMemoryKnowledgeStoreOptions {
  chunking?: ChunkingOptions;
  minScore?: number;
}

/**
 * Process-local knowledge store backed by a term index.
 */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly index = new TermIndex();
  private readonly chunking: ChunkingOptions;
  private readonly minScore: number;

  constructor(options: InMemoryKnowledgeStoreOptions = {}) {
    this.chunking = options.chunking ?? DEFAULT_CHUNKING_OPTIONS;
    this.minScore = options.minScore ?? 0.1;
  }

  count(): number {
    return this.index.documentCount;
  }

  async add(id: string, content: string, source: string): Promise<void> {
    const origin = { docId: id, source };
    const chunks = /^#{1,6}\s/m.test(content)
      ? chunkMarkdown(content, origin, this.chunking)
      : chunkText(content, origin, this.chunking);
    this.index.upsert(id, chunks);
  }

  async addDocuments(documents: readonly KnowledgeDocument[]): Promise<void> {
    for (const doc of documents) {
      await this.add(doc.doc_id, doc.content, doc.source);
    }
  }

  async search(query: string, limit: number): Promise<KnowledgeHit[]> {
    return this.index
      .search(query, { topK: limit, minScore: this.minScore })
      .map(result => ({ source: result.chunk.source, content: result.chunk.content }));
  }

  /** Adds the starter documents when the store is empty. */
  async seedDefaults(): Promise<void> {
    if (this.count() > 0) {
      return;
    }
    await this.addDocuments(DEFAULT_KNOWLEDGE);
  }
}
