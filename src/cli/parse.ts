export type Command = "ingest" | "tell" | "session" | "examples";

const COMMANDS: readonly Command[] = ["ingest", "tell", "session", "examples"];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error("Usage: storyteller <ingest|tell|session|examples> [...]");
  }
  return { command, args: rest };
}

export function parseTellArgs(args: string[]): { idea: string; showPrompt: boolean } {
  const showPrompt = args.includes("--show-prompt");
  const idea = args
    .filter((a) => a !== "--show-prompt")
    .join(" ")
    .trim();
  return { idea, showPrompt };
}
