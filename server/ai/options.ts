import { OPTION_COUNT } from "../../shared/schema.js";
import type { RandomSource } from "./random.js";
import { FILLER_RANGE } from "./constants.js";

/**
 * Normalize candidate options into exactly five unique, non-empty strings.
 * First occurrences keep their order; short lists are padded with small
 * integers that do not collide with what was kept.
 */
export function ensureFive(candidates: readonly string[], random: RandomSource): string[] {
  const kept: string[] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    const value = candidate.trim();
    if (value && !seen.has(value)) {
      kept.push(value);
      seen.add(value);
    }
    if (kept.length === OPTION_COUNT) break;
  }

  while (kept.length < OPTION_COUNT) {
    const filler = String(random.int(FILLER_RANGE.min, FILLER_RANGE.max));
    if (!seen.has(filler)) {
      kept.push(filler);
      seen.add(filler);
    }
  }

  return kept;
}

/**
 * Run options through ensureFive, shuffle them, and find where the correct
 * answer ended up. The correct value must be the first candidate so it can
 * never be dropped by dedup or truncation.
 */
export function placeOptions(
  correct: string,
  distractors: readonly string[],
  random: RandomSource
): { options: string[]; correctIndex: number } {
  const options = random.shuffle(ensureFive([correct, ...distractors], random));
  const correctIndex = options.indexOf(correct.trim());
  return { options, correctIndex: correctIndex === -1 ? 0 : correctIndex };
}
