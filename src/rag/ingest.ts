import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../config/settings.js";
import { UnavailableDependencyError } from "../errors.js";
import { createEmbeddings } from "../integrations/gemini/embeddings.js";
import { loadKnowledge, type KnowledgeStore } from "../knowledge/store.js";
import { saveIndex } from "../retrieval/indexStore.js";
import type { StoredChunk, StoredIndex } from "../retrieval/types.js";

export async function buildIndex(params: {
  knowledge: KnowledgeStore;
  embeddings: EmbeddingsInterface;
  embeddingModel: string;
}): Promise<StoredIndex> {
  const { passages } = params.knowledge;
  if (passages.length === 0) {
    throw new Error("Cannot build an index from an empty knowledge store");
  }

  let vectors: number[][];
  try {
    vectors = await params.embeddings.embedDocuments(passages.map((p) => p.text));
  } catch (err: unknown) {
    throw new UnavailableDependencyError("Embedder", err);
  }

  if (vectors.length !== passages.length) {
    throw new Error(
      `Embedding count mismatch: passages=${passages.length} embeddings=${vectors.length}`
    );
  }

  const embeddingDimension = vectors[0]?.length ?? 0;
  if (embeddingDimension <= 0) {
    throw new Error(
      `Embedding dimension invalid (${embeddingDimension}). Check embedding model: ${params.embeddingModel}`
    );
  }

  const chunks: StoredChunk[] = passages.map((passage, i) => {
    const embedding = vectors[i] ?? [];
    if (embedding.length !== embeddingDimension) {
      throw new Error(
        `Embedding dimension mismatch at passage ${i}: expected=${embeddingDimension} actual=${embedding.length}`
      );
    }
    return { ...passage, embedding };
  });

  return {
    version: 1,
    embeddingModel: params.embeddingModel,
    knowledgeSource: params.knowledge.source,
    embeddingDimension,
    chunks
  };
}

export async function ingestKnowledge(params: {
  settings: Settings;
  sourceDir?: string;
  embeddings?: EmbeddingsInterface;
}): Promise<number> {
  const knowledge = await loadKnowledge({ settings: params.settings, sourceDir: params.sourceDir });
  const index = await buildIndex({
    knowledge,
    embeddings: params.embeddings ?? createEmbeddings(params.settings),
    embeddingModel: params.settings.embeddingModel
  });

  await saveIndex(params.settings.indexPath, index);
  return index.chunks.length;
}
