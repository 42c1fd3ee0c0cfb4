import type { GoogleGenAI } from "@google/genai";
import type { CompleteFn, ModelOptions } from "./base.js";

export function createGeminiCompletion(getClient: () => GoogleGenAI, options: ModelOptions): CompleteFn {
  return async (prompt) => {
    const ai = getClient();

    const response = await ai.models.generateContent({
      model: options.model,
      contents: prompt,
      config: {
        maxOutputTokens: options.maxTokens,
        temperature: options.temperature,
      },
    });

    return response.text || "";
  };
}
