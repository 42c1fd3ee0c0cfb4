import type { AssessmentItem } from "../../../shared/schema.js";
import { findCurriculumRule } from "../curriculum.js";
import type { RandomSource } from "../random.js";
import type { GeneratorKind } from "../types.js";
import { generateCircleItem } from "./circle.js";
import { generateCoordinateItem } from "./coordinate.js";
import { generateLinearItem } from "./linear.js";
import { generatePercentItem } from "./percent.js";
import { generateQuadraticItem } from "./quadratic.js";

export type ItemGenerator = (difficulty: string, random: RandomSource) => AssessmentItem;

export const GENERATORS: Record<GeneratorKind, ItemGenerator> = {
  circle: generateCircleItem,
  quadratic: generateQuadraticItem,
  coordinate: generateCoordinateItem,
  percent: generatePercentItem,
  linear: generateLinearItem,
};

/** Built-in item for a free-text topic; unknown topics get a linear equation */
export function generateFallbackItem(topic: string, difficulty: string, random: RandomSource): AssessmentItem {
  const { generator } = findCurriculumRule(topic);
  return GENERATORS[generator](difficulty, random);
}

export { generateCircleItem, generateCoordinateItem, generateLinearItem, generatePercentItem, generateQuadraticItem };
export { formatMonicQuadratic } from "./quadratic.js";
