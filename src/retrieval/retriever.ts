import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import { InvalidInputError, UnavailableDependencyError } from "../errors.js";
import { topKSimilarChunks } from "./search.js";
import type { PassageRetriever, RetrievalResult, StoredIndex } from "./types.js";

export function assertQuery(query: string): void {
  if (query.trim().length === 0) {
    throw new InvalidInputError("Query must not be empty");
  }
}

export class Retriever implements PassageRetriever {
  private readonly embeddings: EmbeddingsInterface;
  private readonly index: StoredIndex;

  constructor(params: { embeddings: EmbeddingsInterface; index: StoredIndex }) {
    this.embeddings = params.embeddings;
    this.index = params.index;
  }

  async retrieve(query: string, k: number): Promise<RetrievalResult> {
    assertQuery(query);
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidInputError(`Retrieval width must be a positive integer (got ${k})`);
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embedQuery(query);
    } catch (err: unknown) {
      throw new UnavailableDependencyError("Embedder", err);
    }

    if (queryEmbedding.length !== this.index.embeddingDimension) {
      throw new UnavailableDependencyError(
        "Similarity index",
        new Error(
          `Embedding dimension mismatch. Index: ${this.index.embeddingDimension} Query: ${queryEmbedding.length}`
        )
      );
    }

    try {
      return topKSimilarChunks({ queryEmbedding, chunks: this.index.chunks, k });
    } catch (err: unknown) {
      throw new UnavailableDependencyError("Similarity index", err);
    }
  }
}
