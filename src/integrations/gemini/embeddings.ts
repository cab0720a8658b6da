import { GoogleGenerativeAIEmbeddings } from "@langchain/google-genai";

import type { Settings } from "../../config/settings.js";

export function createEmbeddings(
  settings: Pick<Settings, "googleApiKey" | "embeddingModel">
): GoogleGenerativeAIEmbeddings {
  return new GoogleGenerativeAIEmbeddings({
    apiKey: settings.googleApiKey,
    model: settings.embeddingModel,
    // failures go straight to the caller
    maxRetries: 0
  });
}
