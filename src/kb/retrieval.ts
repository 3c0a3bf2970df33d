import type { KnowledgeChunk } from '../contracts/kb-source.js';

export interface RetrievalResult {
  chunk: KnowledgeChunk;
  score: number;
}

export interface SearchOptions {
  topK?: number;
  minScore?: number;
}

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'is', 'are', 'was', 'were', 'be', 'been',
  'being', 'have', 'has', 'had', 'do', 'does', 'did', 'will',
  'would', 'could', 'should', 'may', 'might', 'must', 'shall',
  'can', 'need', 'to', 'of', 'in', 'for', 'on', 'with', 'at',
  'by', 'from', 'as', 'into', 'and', 'but', 'or', 'so', 'if',
  'because', 'while', 'where', 'when', 'that', 'which', 'who',
  'what', 'this', 'these', 'those', 'i', 'you', 'he', 'she', 'it',
  'we', 'they', 'me', 'him', 'her', 'us', 'them', 'our', 'your',
]);

export function extractTerms(text: string): string[] {
  const words = text.toLowerCase().match(/\b[a-z]+\b/g) ?? [];
  return [...new Set(words.filter(w => w.length > 2 && !STOP_WORDS.has(w)))];
}

/**
 * Inverted term index over knowledge chunks.
 * Documents can be replaced; their previous chunks leave the index.
 */
export class TermIndex {
  private readonly chunks = new Map<string, KnowledgeChunk>();
  private readonly chunksByDoc = new Map<string, string[]>();
  private readonly terms = new Map<string, Set<string>>();

  get documentCount(): number {
    return this.chunksByDoc.size;
  }

  get chunkCount(): number {
    return this.chunks.size;
  }

  hasTerm(term: string): boolean {
    return this.terms.has(term);
  }

  upsert(docId: string, chunks: KnowledgeChunk[]): void {
    this.remove(docId);

    const ids: string[] = [];
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
      ids.push(chunk.id);
      for (const term of extractTerms(chunk.content)) {
        let posting = this.terms.get(term);
        if (posting === undefined) {
          posting = new Set();
          this.terms.set(term, posting);
        }
        posting.add(chunk.id);
      }
    }
    this.chunksByDoc.set(docId, ids);
  }

  remove(docId: string): void {
    const ids = this.chunksByDoc.get(docId);
    if (ids === undefined) {
      return;
    }

    for (const id of ids) {
      const chunk = this.chunks.get(id);
      if (chunk !== undefined) {
        for (const term of extractTerms(chunk.content)) {
          const posting = this.terms.get(term);
          posting?.delete(id);
          if (posting?.size === 0) {
            this.terms.delete(term);
          }
        }
      }
      this.chunks.delete(id);
    }
    this.chunksByDoc.delete(docId);
  }

  /**
   * Rank chunks by the share of query terms they contain.
   * Ties keep insertion order.
   */
  search(query: string, options: SearchOptions = {}): RetrievalResult[] {
    const { topK = 5, minScore = 0.1 } = options;

    const queryTerms = extractTerms(query);
    if (queryTerms.length === 0 || topK <= 0) {
      return [];
    }

    const hits = new Map<string, number>();
    for (const term of queryTerms) {
      for (const id of this.terms.get(term) ?? []) {
        hits.set(id, (hits.get(id) ?? 0) + 1);
      }
    }

    const order = [...this.chunks.keys()];
    const results: RetrievalResult[] = [];
    for (const [id, count] of hits) {
      const chunk = this.chunks.get(id);
      const score = count / queryTerms.length;
      if (chunk !== undefined && score >= minScore) {
        results.push({ chunk, score });
      }
    }

    results.sort((a, b) => b.score - a.score || order.indexOf(a.chunk.id) - order.indexOf(b.chunk.id));

    return results.slice(0, topK);
  }
}
