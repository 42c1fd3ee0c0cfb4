import logger from "../logger.js";
import { OPTION_COUNT, type AssessmentItem } from "../../shared/schema.js";
import { mapCurriculum } from "./curriculum.js";
import { generateFallbackItem } from "./generators/index.js";
import { ensureFive } from "./options.js";
import type { RandomSource } from "./random.js";
import type { GenerationOutcome } from "./types.js";
import { cleanText, coerceIndex } from "./utils.js";

function coerceOptions(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((option) => cleanText(option));
}

/**
 * Turn a generator outcome into a valid item. Structural problems (option
 * count, index range) are repaired; a missing question or explanation is
 * never invented, the built-in generator for the topic is used instead.
 */
export function validateAndRepair(
  outcome: GenerationOutcome,
  topic: string,
  difficulty: string,
  random: RandomSource
): AssessmentItem {
  if (!outcome.ok) {
    logger.warn("Text generator gave no usable output, using built-in generator", {
      topic,
      reason: outcome.reason,
      error: outcome.error,
    });
    return generateFallbackItem(topic, difficulty, random);
  }

  const { data } = outcome;
  const question = cleanText(data.question).trim();
  const explanation = cleanText(data.explanation).trim();

  const rawOptions = coerceOptions(data.options);
  const options = ensureFive(rawOptions, random);
  if (rawOptions.length !== OPTION_COUNT || options.some((option, i) => option !== rawOptions[i])) {
    logger.debug("Repaired generated options", { topic, received: rawOptions.length });
  }

  // The index refers to the options as sent, so follow its text through the repair
  const rawIndex = coerceIndex(data.correct_index);
  const rawCorrect = rawIndex >= 0 && rawIndex < rawOptions.length ? rawOptions[rawIndex].trim() : "";
  let correctIndex = rawCorrect ? options.indexOf(rawCorrect) : -1;
  if (correctIndex === -1) {
    logger.debug("Generated correct_index does not match a kept option, defaulting to 0", {
      topic,
      correctIndex: data.correct_index,
    });
    correctIndex = 0;
  }

  if (!question || !explanation) {
    logger.warn("Generated item is missing question or explanation, using built-in generator", {
      topic,
      hasQuestion: Boolean(question),
      hasExplanation: Boolean(explanation),
    });
    return generateFallbackItem(topic, difficulty, random);
  }

  const placement = mapCurriculum(topic);
  return {
    question,
    options,
    correctIndex,
    explanation,
    ...placement,
    difficulty,
    hasImage: placement.topic.toLowerCase().includes("coordinate"),
  };
}
