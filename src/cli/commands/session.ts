import { createInterface } from "node:readline/promises";

import type { PipelineHandle } from "../../rag/pipelineHandle.js";
import { formatExamples, pickExample } from "../examples.js";

export type SessionIO = {
  ask(question: string): Promise<string>;
  write(text: string): void;
};

export const IDEA_QUESTION = "\nYour story idea (number for an example, blank to quit): ";
export const FEEDBACK_QUESTION = "Was this story helpful and relevant? [y/n] ";

/** Interactive loop; returns how many stories were told. */
export async function runSession(handle: PipelineHandle, io: SessionIO): Promise<number> {
  io.write("Warming up the storyteller...\n");
  const pipeline = await handle.get();
  io.write(`Example ideas:\n${formatExamples()}\n`);

  let told = 0;
  for (;;) {
    const answer = (await io.ask(IDEA_QUESTION)).trim();
    if (!answer) break;
    const idea = pickExample(answer) ?? answer;

    io.write(`The storyteller is writing: "${idea}"\n`);
    let story: string;
    try {
      story = await pipeline.run(idea);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      io.write(`Error: ${message}\n`);
      continue;
    }
    told += 1;
    io.write(`\n${story}\n\n`);

    const feedback = (await io.ask(FEEDBACK_QUESTION)).trim();
    if (feedback) {
      io.write("Thank you for your feedback!\n");
    }
  }

  io.write("Goodbye.\n");
  return told;
}

export async function runSessionCommand(handle: PipelineHandle): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await runSession(handle, {
      ask: (question) => rl.question(question),
      write: (text) => {
        process.stdout.write(text);
      }
    });
  } finally {
    rl.close();
  }
}
