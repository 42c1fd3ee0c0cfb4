import type Anthropic from "@anthropic-ai/sdk";
import { BackendFailureError } from "../types.js";
import type { CompleteFn, ModelOptions } from "./base.js";

export function createAnthropicCompletion(getClient: () => Anthropic, options: ModelOptions): CompleteFn {
  return async (prompt) => {
    const anthropic = getClient();

    const response = await anthropic.messages.create({
      model: options.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages: [{ role: "user", content: prompt }],
    });

    const block = response.content[0];
    if (block?.type !== "text") {
      throw new BackendFailureError("anthropic", "Anthropic response contained no text block");
    }
    return block.text;
  };
}
