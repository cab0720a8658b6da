import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { KnowledgeStore } from "../../knowledge/store.js";
import type { Passage, StoredIndex } from "../../retrieval/types.js";

export const VOCABULARY = ["fox", "gold", "city", "spirit", "tree"];

/** Bag-of-words embedder over a fixed vocabulary. */
export class KeywordEmbeddings implements EmbeddingsInterface {
  embedQueryCalls = 0;

  constructor(private readonly vocabulary: string[] = VOCABULARY) {}

  vectorize(text: string): number[] {
    const words = text.toLowerCase().split(/[^a-z]+/);
    return this.vocabulary.map((v) => words.filter((w) => w === v).length);
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    return documents.map((d) => this.vectorize(d));
  }

  async embedQuery(document: string): Promise<number[]> {
    this.embedQueryCalls += 1;
    return this.vectorize(document);
  }
}

export class FailingEmbeddings implements EmbeddingsInterface {
  async embedDocuments(): Promise<number[][]> {
    throw new Error("embedding service offline");
  }

  async embedQuery(): Promise<number[]> {
    throw new Error("embedding service offline");
  }
}

export const KITSUNE = "The kitsune is a fox spirit of Japanese folklore known for shapeshifting.";
export const EL_DORADO = "El Dorado is a legendary city of gold sought by explorers.";

export function passagesOf(texts: string[]): Passage[] {
  return texts.map((text, i) => ({ id: `p-${i}`, source: "test", text }));
}

export function indexOf(texts: string[], embeddings = new KeywordEmbeddings()): StoredIndex {
  const chunks = passagesOf(texts).map((p) => ({ ...p, embedding: embeddings.vectorize(p.text) }));
  return {
    version: 1,
    embeddingModel: "keyword-test",
    knowledgeSource: "test",
    embeddingDimension: chunks[0]?.embedding.length ?? 0,
    chunks
  };
}

export function knowledgeOf(texts: string[]): KnowledgeStore {
  return { source: "test", passages: passagesOf(texts) };
}
