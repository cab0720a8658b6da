import { ChatGoogleGenerativeAI } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";

export function createChatModel(
  settings: Pick<Settings, "googleApiKey" | "chatModel" | "temperature">
): ChatGoogleGenerativeAI {
  return new ChatGoogleGenerativeAI({
    apiKey: settings.googleApiKey,
    model: settings.chatModel,
    temperature: settings.temperature,
    maxRetries: 0
  });
}
