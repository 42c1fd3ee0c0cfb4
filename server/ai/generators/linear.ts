import type { AssessmentItem } from "../../../shared/schema.js";
import { placementFor } from "../curriculum.js";
import { placeOptions } from "../options.js";
import type { RandomSource } from "../random.js";
import { signed } from "../utils.js";

const parenthesize = (n: number) => (n < 0 ? `(${n})` : String(n));
const xTerm = (coefficient: number) => (coefficient === 1 ? "x" : `${coefficient}x`);

/**
 * ax + b = cx + d with b solved backwards from the target root, so
 * (a - c)x = d - b has x0 as its exact solution.
 */
export function generateLinearItem(difficulty: string, random: RandomSource): AssessmentItem {
  const a = random.int(2, 10);
  const c = random.int(1, a - 1);
  const d = random.int(5, 20);
  const x0 = random.int(2, 5);
  const b = d - x0 * (a - c);

  const { options, correctIndex } = placeOptions(
    String(x0),
    [x0 + 1, Math.max(1, x0 - 1), x0 + 2, x0 * 2].map(String),
    random
  );

  return {
    question: `If $${a}x ${signed(b)} = ${xTerm(c)} + ${d}$, what is the value of $x$?`,
    options,
    correctIndex,
    explanation: `$${a}x-${xTerm(c)}=${d}-${parenthesize(b)}$ so $${xTerm(a - c)}=${d - b}$, hence $x=${x0}$.`,
    ...placementFor("linear"),
    difficulty,
    hasImage: false,
  };
}
