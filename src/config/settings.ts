export type GeneratorKind = "gemini" | "canned";

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  retrievalK: number;
  indexPath: string;
  knowledgeDir?: string;
  generator: GeneratorKind;
};

function parseRetrievalK(raw: string | undefined): number {
  if (raw == null || raw.trim() === "") return 2;
  const k = Number(raw);
  if (!Number.isInteger(k) || k < 1) {
    throw new Error(`STORYTELLER_RETRIEVAL_K must be a positive integer (got "${raw}")`);
  }
  return k;
}

function parseTemperature(raw: string | undefined): number {
  if (raw == null || raw.trim() === "") return 0.9;
  const t = Number(raw);
  if (!Number.isFinite(t) || t < 0) {
    throw new Error(`STORYTELLER_TEMPERATURE must be a non-negative number (got "${raw}")`);
  }
  return t;
}

function parseGenerator(raw: string | undefined): GeneratorKind {
  const value = (raw ?? "gemini").trim().toLowerCase();
  if (value === "gemini" || value === "canned") return value;
  throw new Error(`STORYTELLER_GENERATOR must be "gemini" or "canned" (got "${raw}")`);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new Error("GOOGLE_API_KEY is required");
  }

  const knowledgeDir = env.STORYTELLER_KNOWLEDGE_DIR?.trim();

  return {
    googleApiKey,
    chatModel: env.STORYTELLER_GEMINI_MODEL ?? "gemini-2.5-flash",
    embeddingModel: env.STORYTELLER_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    temperature: parseTemperature(env.STORYTELLER_TEMPERATURE),
    retrievalK: parseRetrievalK(env.STORYTELLER_RETRIEVAL_K),
    indexPath: env.STORYTELLER_INDEX_PATH ?? ".storyteller/index.json",
    knowledgeDir: knowledgeDir ? knowledgeDir : undefined,
    generator: parseGenerator(env.STORYTELLER_GENERATOR)
  };
}
