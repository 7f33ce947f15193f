/**
 * In-memory dense and lexical indices over corpus chunks.
 *
 * Used for development and tests in place of a vector store and a full-text
 * engine. Both honour `filters.documentIds`; the lexical index reports `null`
 * when none of the requested documents has been indexed.
 */

import { cosineSimilarity } from "./vectorMath";
import type {
  ChunkMetadata,
  DenseIndex,
  IndexFilters,
  IndexHit,
  LexicalIndex,
} from "../routing/types";

export interface IndexedChunk {
  sourceId: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk extends IndexedChunk {
  vector: readonly number[];
}

function inScope(chunk: IndexedChunk, filters: IndexFilters): boolean {
  return filters.documentIds.includes(chunk.metadata.documentId);
}

function byScoreThenId(a: IndexHit, b: IndexHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

export class InMemoryDenseIndex implements DenseIndex {
  private readonly chunks: EmbeddedChunk[] = [];

  add(chunk: EmbeddedChunk): void {
    this.chunks.push(chunk);
  }

  get size(): number {
    return this.chunks.length;
  }

  async search(vector: readonly number[], limit: number, filters: IndexFilters): Promise<IndexHit[]> {
    return this.chunks
      .filter((chunk) => inScope(chunk, filters))
      .map((chunk) => ({
        sourceId: chunk.sourceId,
        text: chunk.text,
        metadata: chunk.metadata,
        score: cosineSimilarity(vector, chunk.vector),
      }))
      .sort(byScoreThenId)
      .slice(0, limit);
  }
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter((token) => token.length > 1);
}

interface LexicalEntry {
  chunk: IndexedChunk;
  termFrequencies: Map<string, number>;
  length: number;
}

export interface Bm25Options {
  k1?: number;
  b?: number;
}

/**
 * BM25 over chunks. Statistics (document frequency, average length) are
 * computed over the chunks in scope for each query.
 */
export class InMemoryLexicalIndex implements LexicalIndex {
  private readonly entries: LexicalEntry[] = [];
  private readonly indexedDocuments = new Set<string>();
  private readonly k1: number;
  private readonly b: number;

  constructor(options: Bm25Options = {}) {
    this.k1 = options.k1 ?? 1.2;
    this.b = options.b ?? 0.75;
  }

  add(chunk: IndexedChunk): void {
    const tokens = tokenize(chunk.text);
    const termFrequencies = new Map<string, number>();
    for (const token of tokens) {
      termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
    }
    this.entries.push({ chunk, termFrequencies, length: tokens.length });
    this.indexedDocuments.add(chunk.metadata.documentId);
  }

  hasDocument(documentId: string): boolean {
    return this.indexedDocuments.has(documentId);
  }

  async search(text: string, limit: number, filters: IndexFilters): Promise<IndexHit[] | null> {
    if (!filters.documentIds.some((id) => this.indexedDocuments.has(id))) {
      return null;
    }

    const scoped = this.entries.filter((entry) => inScope(entry.chunk, filters));
    const queryTerms = Array.from(new Set(tokenize(text)));
    if (queryTerms.length === 0 || scoped.length === 0) return [];

    const avgLength = scoped.reduce((sum, entry) => sum + entry.length, 0) / scoped.length || 1;
    const documentFrequency = new Map<string, number>();
    for (const term of queryTerms) {
      documentFrequency.set(term, scoped.filter((entry) => entry.termFrequencies.has(term)).length);
    }

    const hits: IndexHit[] = [];
    for (const entry of scoped) {
      let score = 0;
      for (const term of queryTerms) {
        const tf = entry.termFrequencies.get(term) ?? 0;
        if (tf === 0) continue;
        const df = documentFrequency.get(term) ?? 0;
        const idf = Math.log(1 + (scoped.length - df + 0.5) / (df + 0.5));
        const norm = tf + this.k1 * (1 - this.b + (this.b * entry.length) / avgLength);
        score += idf * ((tf * (this.k1 + 1)) / norm);
      }
      if (score > 0) {
        hits.push({
          sourceId: entry.chunk.sourceId,
          text: entry.chunk.text,
          metadata: entry.chunk.metadata,
          score,
        });
      }
    }

    return hits.sort(byScoreThenId).slice(0, limit);
  }
}
