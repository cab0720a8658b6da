export const EXAMPLE_PROMPTS: readonly string[] = [
  "A story about a trickster spider from Africa",
  "A tale of a hidden city of gold",
  "A myth about the Norse world tree"
];

export function formatExamples(): string {
  return EXAMPLE_PROMPTS.map((p, i) => `  ${i + 1}. ${p}`).join("\n");
}

/** Resolves "2" to the second example; anything else is not a pick. */
export function pickExample(input: string): string | undefined {
  if (!/^\d+$/.test(input)) return undefined;
  return EXAMPLE_PROMPTS[Number(input) - 1];
}
