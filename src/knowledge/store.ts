import path from "node:path";

import type { Settings } from "../config/settings.js";
import { loadDirectoryKnowledge } from "../loaders/sourceDirectory.js";
import type { Passage } from "../retrieval/types.js";
import { loadBuiltinKnowledge } from "./builtin.js";

export const BUILTIN_SOURCE = "builtin";

export type KnowledgeStore = {
  source: string;
  passages: Passage[];
};

export function describeKnowledgeSource(dir: string | undefined): string {
  return dir ? path.resolve(dir) : BUILTIN_SOURCE;
}

export async function loadKnowledge(params: {
  settings: Settings;
  sourceDir?: string;
}): Promise<KnowledgeStore> {
  const dir = params.sourceDir ?? params.settings.knowledgeDir;
  const passages = dir ? await loadDirectoryKnowledge(dir) : await loadBuiltinKnowledge();
  if (passages.length === 0) {
    throw new Error(`Knowledge store is empty${dir ? `: no .md or .txt text in ${dir}` : ""}`);
  }
  return { source: describeKnowledgeSource(dir), passages };
}
