import { cosineSimilarity } from "./vectorMath";
import type { EmbeddingService, Reranker } from "../routing/types";

/**
 * Scores a passage by cosine similarity between its embedding and the
 * query's. Query embeddings are memoized for the lifetime of the instance,
 * so create one per request.
 */
export class EmbeddingReranker implements Reranker {
  private readonly queryVectors = new Map<string, Promise<number[]>>();

  constructor(private readonly embeddings: EmbeddingService) {}

  async score(query: string, passage: string, signal?: AbortSignal): Promise<number> {
    let queryVector = this.queryVectors.get(query);
    if (!queryVector) {
      queryVector = this.embeddings.encode(query, signal);
      this.queryVectors.set(query, queryVector);
    }

    const [q, p] = await Promise.all([queryVector, this.embeddings.encode(passage, signal)]);
    return cosineSimilarity(q, p);
  }
}
