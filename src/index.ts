export { loadSettings, type GeneratorKind, type Settings } from "./config/settings.js";
export {
  DependencyError,
  InvalidInputError,
  StorytellerError,
  UnavailableDependencyError
} from "./errors.js";
export { loadKnowledge, type KnowledgeStore } from "./knowledge/store.js";
export { createStoryPipeline, createGenerator } from "./rag/bootstrap.js";
export { createCannedStoryGenerator } from "./rag/cannedGenerator.js";
export { createChatStoryGenerator, type StoryGenerator } from "./rag/generator.js";
export { buildIndex, ingestKnowledge } from "./rag/ingest.js";
export { StoryPipeline, type StoryTelling } from "./rag/pipeline.js";
export { createPipelineHandle, type PipelineHandle } from "./rag/pipelineHandle.js";
export { composePrompt, STORY_PROMPT_TEMPLATE } from "./rag/prompt.js";
export { Retriever } from "./retrieval/retriever.js";
export type {
  Passage,
  PassageRetriever,
  RetrievalResult,
  ScoredPassage,
  StoredIndex
} from "./retrieval/types.js";
