import type { RetrievalResult } from "../retrieval/types.js";
import { buildContext } from "./context.js";

export const STORY_PROMPT_TEMPLATE = `You are a storyteller who retells the world's folklore and myths.
Draw on the lore below to write a short, original story for the reader's request.
Stay true to the culture the lore comes from, keep the telling vivid, and give the story a clear beginning, middle and end.

LORE:
{context}

REQUEST:
{question}

STORY:
`;

/**
 * Fills the story template with the retrieved passages and the request.
 * Both placeholders are replaced in one pass, so braces inside the request or
 * the lore are left as written.
 */
export function composePrompt(query: string, result: RetrievalResult): string {
  const values: Record<string, string> = {
    context: buildContext(result),
    question: query.trim()
  };
  return STORY_PROMPT_TEMPLATE.replace(/\{(context|question)\}/g, (match, key: string) => values[key] ?? match);
}
