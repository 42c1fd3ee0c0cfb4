import logger from "../../logger.js";
import { parseGenerationOutput } from "../parsers.js";
import type { GenerationOutcome, TextGenerator } from "../types.js";
import { BackendUnavailableError } from "../types.js";

/** Sends one prompt to a model and resolves with its raw text reply */
export type CompleteFn = (prompt: string) => Promise<string>;

export interface ModelOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Adapts a raw completion function to the TextGenerator contract. Nothing
 * thrown by the backend escapes: every failure becomes a failed outcome so
 * the caller can fall back straight away.
 */
export class CompletionTextGenerator implements TextGenerator {
  constructor(
    readonly name: string,
    private readonly complete: CompleteFn
  ) {}

  async generate(prompt: string): Promise<GenerationOutcome> {
    let text: string;
    try {
      text = await this.complete(prompt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof BackendUnavailableError) {
        logger.warn(`Text generator ${this.name} unavailable`, { error: message });
        return { ok: false, reason: "backend_unavailable", error: message };
      }
      logger.error(`Text generator ${this.name} failed`, { error: message });
      return { ok: false, reason: "backend_failure", error: message };
    }

    const outcome = parseGenerationOutput(text);
    if (!outcome.ok) {
      logger.warn(`Text generator ${this.name} returned unusable output`, {
        error: outcome.error,
        textPreview: text.substring(0, 200),
      });
    }
    return outcome;
  }
}
