import type { PipelineHandle } from "../../rag/pipelineHandle.js";
import { parseTellArgs } from "../parse.js";

export async function runTellCommand(args: string[], handle: PipelineHandle): Promise<void> {
  const { idea, showPrompt } = parseTellArgs(args);
  if (!idea) {
    throw new Error("Usage: storyteller tell [--show-prompt] <idea>");
  }

  const pipeline = await handle.get();
  const { story, prompt } = await pipeline.tell(idea);
  if (showPrompt) {
    process.stdout.write(`--- PROMPT ---\n${prompt}\n--------------\n\n`);
  }
  process.stdout.write(`${story}\n`);
}
