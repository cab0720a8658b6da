import { InvalidInputError } from "../errors.js";
import { assertQuery } from "../retrieval/retriever.js";
import type { Passage, PassageRetriever } from "../retrieval/types.js";
import type { StoryGenerator } from "./generator.js";
import { composePrompt } from "./prompt.js";

export type StoryTelling = {
  story: string;
  prompt: string;
  passages: Passage[];
};

export class StoryPipeline {
  private readonly retriever: PassageRetriever;
  private readonly generator: StoryGenerator;
  readonly k: number;

  constructor(params: { retriever: PassageRetriever; generator: StoryGenerator; k: number }) {
    if (!Number.isInteger(params.k) || params.k < 1) {
      throw new InvalidInputError(`Retrieval width must be a positive integer (got ${params.k})`);
    }
    this.retriever = params.retriever;
    this.generator = params.generator;
    this.k = params.k;
  }

  /** Retrieve, compose, generate. Errors from any stage reach the caller as thrown. */
  async tell(query: string): Promise<StoryTelling> {
    assertQuery(query);
    const result = await this.retriever.retrieve(query, this.k);
    const prompt = composePrompt(query, result);
    const story = await this.generator.generate(prompt);
    return { story, prompt, passages: result.map((r) => r.passage) };
  }

  async run(query: string): Promise<string> {
    const { story } = await this.tell(query);
    return story;
  }
}
