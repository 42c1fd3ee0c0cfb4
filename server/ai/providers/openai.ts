import type OpenAI from "openai";
import type { CompleteFn, ModelOptions } from "./base.js";

/** Chat completions over any OpenAI-compatible endpoint (OpenAI, Ollama, Hugging Face router) */
export function createOpenAICompatibleCompletion(getClient: () => OpenAI, options: ModelOptions): CompleteFn {
  return async (prompt) => {
    const client = getClient();

    const response = await client.chat.completions.create({
      model: options.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    });

    return response.choices[0]?.message?.content || "";
  };
}
