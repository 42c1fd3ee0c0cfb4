import type { AssessmentItem } from "../../../shared/schema.js";
import { placementFor } from "../curriculum.js";
import { placeOptions } from "../options.js";
import type { RandomSource } from "../random.js";
import { signed } from "../utils.js";

const ROOT_RANGE = Array.from({ length: 13 }, (_, i) => i - 6);

function formatLinearTerm(b: number): string {
  if (b === 0) return "";
  const magnitude = Math.abs(b) === 1 ? "" : String(Math.abs(b));
  return ` ${b < 0 ? "-" : "+"} ${magnitude}x`;
}

/** x^2 + bx + c = 0 with zero terms left out */
export function formatMonicQuadratic(b: number, c: number): string {
  const constant = c === 0 ? "" : ` ${signed(c)}`;
  return `x^2${formatLinearTerm(b)}${constant} = 0`;
}

function formatFactor(root: number): string {
  if (root === 0) return "x";
  return `(x ${signed(-root)})`;
}

const rootPair = (a: number, b: number) => `$x=${a}$ and $x=${b}$`;

export function generateQuadraticItem(difficulty: string, random: RandomSource): AssessmentItem {
  const [a, b] = random.sample(ROOT_RANGE, 2);
  const linear = -(a + b);
  const constant = a * b;

  // Opposite roots make the sign flip another correct answer
  const flipped = a === -b ? rootPair(a, b - 2) : rootPair(-a, -b);

  const { options, correctIndex } = placeOptions(
    rootPair(a, b),
    [rootPair(a + 1, b + 1), flipped, rootPair(a, b + 2), rootPair(a - 1, b)],
    random
  );

  return {
    question: `If $${formatMonicQuadratic(linear, constant)}$, what are all possible values of $x$?`,
    options,
    correctIndex,
    explanation: `Factor: $${formatFactor(a)}${formatFactor(b)}=0$ so $x=${a}$ or $x=${b}$.`,
    ...placementFor("quadratic"),
    difficulty,
    hasImage: false,
  };
}
