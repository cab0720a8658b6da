import type { RetrievalResult } from "../retrieval/types.js";

export const EMPTY_CONTEXT = "(no related lore was found; draw on the request alone)";

export function buildContext(result: RetrievalResult): string {
  if (result.length === 0) return EMPTY_CONTEXT;
  return result.map((r, i) => `[#${i + 1}] ${r.passage.text}`).join("\n\n");
}
