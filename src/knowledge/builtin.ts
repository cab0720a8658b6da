import { promises as fs } from "node:fs";
import path from "node:path";

import type { Passage } from "../retrieval/types.js";

export const BUILTIN_KNOWLEDGE_PATH = path.resolve(__dirname, "../../data/knowledge.json");

type KnowledgeFile = {
  passages: string[];
};

function isKnowledgeFile(value: unknown): value is KnowledgeFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "passages" in value &&
    Array.isArray(value.passages) &&
    value.passages.every((p: unknown) => typeof p === "string")
  );
}

export function toBuiltinPassages(texts: string[]): Passage[] {
  return texts
    .map((text) => text.trim())
    .filter((text) => text.length > 0)
    .map((text, i) => ({ id: `builtin-${i}`, source: "builtin", text }));
}

export async function loadBuiltinKnowledge(
  filePath: string = BUILTIN_KNOWLEDGE_PATH
): Promise<Passage[]> {
  const raw = await fs.readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isKnowledgeFile(parsed)) {
    throw new Error(`Knowledge file is malformed: ${filePath}`);
  }
  return toBuiltinPassages(parsed.passages);
}
