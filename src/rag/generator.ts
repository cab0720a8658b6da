import { HumanMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { StringOutputParser } from "@langchain/core/output_parsers";

import { DependencyError } from "../errors.js";

export interface StoryGenerator {
  generate(prompt: string): Promise<string>;
}

export function requireStory(raw: string): string {
  const story = raw.trim();
  if (!story) {
    throw new DependencyError("Language model returned an empty story");
  }
  return story;
}

export function createChatStoryGenerator(llm: BaseChatModel): StoryGenerator {
  const chain = llm.pipe(new StringOutputParser());

  return {
    async generate(prompt: string): Promise<string> {
      let raw: string;
      try {
        raw = await chain.invoke([new HumanMessage(prompt)]);
      } catch (err: unknown) {
        throw new DependencyError("Story generation failed", err);
      }
      return requireStory(raw);
    }
  };
}
