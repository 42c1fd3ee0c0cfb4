import type { Env, TextGeneratorBackend } from "../../config.js";
import { getAnthropic, getGemini, getHuggingFace, getOllama, getOpenAI } from "../clients.js";
import type { TextGenerator } from "../types.js";
import { createAnthropicCompletion } from "./anthropic.js";
import { CompletionTextGenerator, type ModelOptions } from "./base.js";
import { createGeminiCompletion } from "./gemini.js";
import { createOpenAICompatibleCompletion } from "./openai.js";

/**
 * Build the text generator for a backend, or null when generation should
 * rely on the built-in generators alone.
 */
export function createTextGenerator(
  env: Env,
  backend: TextGeneratorBackend = env.TEXT_GENERATOR
): TextGenerator | null {
  const options = (model: string): ModelOptions => ({
    model,
    maxTokens: env.MAX_OUTPUT_TOKENS,
    temperature: env.TEMPERATURE,
  });

  switch (backend) {
    case "ollama":
      return new CompletionTextGenerator(
        "ollama",
        createOpenAICompatibleCompletion(() => getOllama(env), options(env.OLLAMA_MODEL))
      );
    case "huggingface":
      return new CompletionTextGenerator(
        "huggingface",
        createOpenAICompatibleCompletion(() => getHuggingFace(env), options(env.HF_MODEL))
      );
    case "openai":
      return new CompletionTextGenerator(
        "openai",
        createOpenAICompatibleCompletion(() => getOpenAI(env), options(env.OPENAI_MODEL))
      );
    case "anthropic":
      return new CompletionTextGenerator(
        "anthropic",
        createAnthropicCompletion(() => getAnthropic(env), options(env.ANTHROPIC_MODEL))
      );
    case "gemini":
      return new CompletionTextGenerator(
        "gemini",
        createGeminiCompletion(() => getGemini(env), options(env.GEMINI_MODEL))
      );
    case "none":
      return null;
  }
}

export { CompletionTextGenerator } from "./base.js";
export type { CompleteFn, ModelOptions } from "./base.js";
