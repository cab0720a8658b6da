import type { ScoredPassage, StoredChunk } from "./types.js";
import { cosineSimilarity } from "./similarity.js";

export function topKSimilarChunks(params: {
  queryEmbedding: number[];
  chunks: StoredChunk[];
  k: number;
}): ScoredPassage[] {
  const expectedDim = params.queryEmbedding.length;
  const valid = params.chunks.filter((c) => c.embedding.length === expectedDim);

  if (expectedDim === 0 || valid.length === 0) {
    throw new Error(
      "No valid embeddings found in index. Re-run: storyteller ingest"
    );
  }

  return valid
    .map((chunk) => ({ chunk, score: cosineSimilarity(params.queryEmbedding, chunk.embedding) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, params.k)
    .map(({ chunk, score }) => ({
      passage: { id: chunk.id, source: chunk.source, text: chunk.text },
      score
    }));
}
