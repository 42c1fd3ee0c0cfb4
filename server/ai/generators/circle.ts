import type { AssessmentItem } from "../../../shared/schema.js";
import { placementFor } from "../curriculum.js";
import { placeOptions } from "../options.js";
import type { RandomSource } from "../random.js";

const piMultiple = (n: number) => `$${n}\\pi$`;

export function generateCircleItem(difficulty: string, random: RandomSource): AssessmentItem {
  const r = random.int(3, 12);
  const area = r * r;

  const { options, correctIndex } = placeOptions(
    piMultiple(area),
    [piMultiple(2 * r), piMultiple(r), piMultiple(2 * area), piMultiple(Math.max(1, Math.floor(area / 2)))],
    random
  );

  return {
    question: `A circle has a radius of ${r} units. What is the area of the circle?`,
    options,
    correctIndex,
    explanation: `Area formula: $A=\\pi r^2$. With $r=${r}$, $A=\\pi\\cdot ${r}^2=${area}\\pi$ square units.`,
    ...placementFor("circle"),
    difficulty,
    hasImage: false,
  };
}
