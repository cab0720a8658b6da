import { promises as fs } from "node:fs";
import path from "node:path";

import type { StoredChunk, StoredIndex } from "./types.js";

const REINGEST_HINT = "Re-run: storyteller ingest";

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function isStoredChunk(value: unknown): value is StoredChunk {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "source" in value &&
    typeof value.source === "string" &&
    "text" in value &&
    typeof value.text === "string" &&
    "embedding" in value &&
    Array.isArray(value.embedding) &&
    value.embedding.every((n: unknown) => typeof n === "number")
  );
}

/** Every chunk must carry a vector of the index's declared dimension. */
export function parseStoredIndex(raw: string, filePath: string): StoredIndex {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("version" in parsed) || parsed.version !== 1) {
    throw new Error("Unsupported index version");
  }

  const invalid = (detail: string): Error =>
    new Error(`Index is invalid: ${filePath} (${detail})\n${REINGEST_HINT}`);

  if (!("embeddingModel" in parsed) || typeof parsed.embeddingModel !== "string") {
    throw invalid("missing embeddingModel");
  }
  if (!("knowledgeSource" in parsed) || typeof parsed.knowledgeSource !== "string") {
    throw invalid("missing knowledgeSource");
  }
  if (
    !("embeddingDimension" in parsed) ||
    typeof parsed.embeddingDimension !== "number" ||
    !Number.isInteger(parsed.embeddingDimension) ||
    parsed.embeddingDimension <= 0
  ) {
    throw invalid("missing embeddingDimension");
  }
  if (!("chunks" in parsed) || !Array.isArray(parsed.chunks) || parsed.chunks.length === 0) {
    throw invalid("no chunks");
  }

  const embeddingDimension = parsed.embeddingDimension;
  const chunks: StoredChunk[] = [];
  parsed.chunks.forEach((chunk: unknown, i: number) => {
    if (!isStoredChunk(chunk)) {
      throw invalid(`chunk ${i} is malformed`);
    }
    if (chunk.embedding.length !== embeddingDimension) {
      throw invalid(
        `chunk ${i} has dimension ${chunk.embedding.length}, expected ${embeddingDimension}`
      );
    }
    chunks.push(chunk);
  });

  return {
    version: 1,
    embeddingModel: parsed.embeddingModel,
    knowledgeSource: parsed.knowledgeSource,
    embeddingDimension,
    chunks
  };
}

export async function saveIndex(filePath: string, index: StoredIndex): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(index), "utf-8");
}

export async function loadIndexIfPresent(filePath: string): Promise<StoredIndex | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
  return parseStoredIndex(raw, filePath);
}
