#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

function loadEnv(): void {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const cwd = process.cwd();
  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }

  dotenv.config();
}

loadEnv();

import { loadSettings } from "../config/settings.js";
import { createStoryPipeline } from "../rag/bootstrap.js";
import { createPipelineHandle } from "../rag/pipelineHandle.js";
import { runIngestCommand } from "./commands/ingest.js";
import { runSessionCommand } from "./commands/session.js";
import { runTellCommand } from "./commands/tell.js";
import { formatExamples } from "./examples.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);

  if (parsed.command === "examples") {
    process.stdout.write(`${formatExamples()}\n`);
    return;
  }

  const settings = loadSettings();

  if (parsed.command === "ingest") {
    await runIngestCommand(parsed.args, settings);
    return;
  }

  const handle = createPipelineHandle(() =>
    createStoryPipeline({
      settings,
      log: (line) => {
        process.stderr.write(`${line}\n`);
      }
    })
  );

  if (parsed.command === "tell") {
    await runTellCommand(parsed.args, handle);
    return;
  }

  await runSessionCommand(handle);
}

main(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
