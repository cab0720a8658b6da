import type { EmbeddingsInterface } from "@langchain/core/embeddings";

import type { Settings } from "../config/settings.js";
import { createChatModel } from "../integrations/gemini/chat.js";
import { createEmbeddings } from "../integrations/gemini/embeddings.js";
import { describeKnowledgeSource, loadKnowledge } from "../knowledge/store.js";
import { loadIndexIfPresent } from "../retrieval/indexStore.js";
import { Retriever } from "../retrieval/retriever.js";
import type { StoredIndex } from "../retrieval/types.js";
import { createCannedStoryGenerator } from "./cannedGenerator.js";
import { createChatStoryGenerator, type StoryGenerator } from "./generator.js";
import { buildIndex } from "./ingest.js";
import { StoryPipeline } from "./pipeline.js";

export type Log = (line: string) => void;

async function resolveIndex(params: {
  settings: Settings;
  embeddings: EmbeddingsInterface;
  log: Log;
}): Promise<StoredIndex> {
  const { settings, log } = params;
  const saved = await loadIndexIfPresent(settings.indexPath);
  if (saved) {
    if (saved.embeddingModel !== settings.embeddingModel) {
      throw new Error(
        `Embedding model mismatch.\nIndex: ${saved.embeddingModel}\nCurrent: ${settings.embeddingModel}\nRe-run: storyteller ingest`
      );
    }
    if (settings.knowledgeDir) {
      const wanted = describeKnowledgeSource(settings.knowledgeDir);
      if (saved.knowledgeSource !== wanted) {
        throw new Error(
          `Knowledge source mismatch.\nIndex: ${saved.knowledgeSource}\nCurrent: ${wanted}\nRe-run: storyteller ingest`
        );
      }
    }
    log(
      `Loaded index from ${settings.indexPath} (${saved.chunks.length} passages, knowledge: ${saved.knowledgeSource}).`
    );
    return saved;
  }

  const knowledge = await loadKnowledge({ settings });
  log(`Embedding ${knowledge.passages.length} passages...`);
  return buildIndex({ knowledge, embeddings: params.embeddings, embeddingModel: settings.embeddingModel });
}

export function createGenerator(settings: Settings): StoryGenerator {
  return settings.generator === "canned"
    ? createCannedStoryGenerator()
    : createChatStoryGenerator(createChatModel(settings));
}

export async function createStoryPipeline(params: {
  settings: Settings;
  embeddings?: EmbeddingsInterface;
  generator?: StoryGenerator;
  log?: Log;
}): Promise<StoryPipeline> {
  const { settings } = params;
  const log = params.log ?? (() => undefined);

  log("Building story pipeline...");
  const embeddings = params.embeddings ?? createEmbeddings(settings);
  const index = await resolveIndex({ settings, embeddings, log });
  const pipeline = new StoryPipeline({
    retriever: new Retriever({ embeddings, index }),
    generator: params.generator ?? createGenerator(settings),
    k: settings.retrievalK
  });
  log("Story pipeline ready.");
  return pipeline;
}
