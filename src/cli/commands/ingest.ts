import type { Settings } from "../../config/settings.js";
import { ingestKnowledge } from "../../rag/ingest.js";

export async function runIngestCommand(args: string[], settings: Settings): Promise<void> {
  const sourceDir = args[0];
  const count = await ingestKnowledge({ sourceDir, settings });
  process.stdout.write(`${count}\n`);
}
