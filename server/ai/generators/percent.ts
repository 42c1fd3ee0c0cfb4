import type { AssessmentItem } from "../../../shared/schema.js";
import { placementFor } from "../curriculum.js";
import { placeOptions } from "../options.js";
import type { RandomSource } from "../random.js";

const PERCENTAGES = [25, 30, 40, 50, 60, 75, 80] as const;
const CATEGORIES = ["wearing glasses", "playing sports", "taking music lessons"] as const;
const OFFSETS = [-10, -5, 5, 10] as const;

export function generatePercentItem(difficulty: string, random: RandomSource): AssessmentItem {
  const total = random.int(40, 120);
  const percentage = random.pick(PERCENTAGES);
  const category = random.pick(CATEGORIES);
  const correct = Math.floor((total * percentage) / 100);

  const wrongs = [...new Set(OFFSETS.map((d) => correct + d).filter((w) => w > 0))];
  const { options, correctIndex } = placeOptions(String(correct), wrongs.map(String), random);

  return {
    question: `In a group of ${total} students, ${percentage}% are ${category}. How many students are ${category}?`,
    options,
    correctIndex,
    explanation: `Compute ${percentage}% of ${total}: $\\frac{${percentage}}{100}\\times ${total}=${correct}$.`,
    ...placementFor("percent"),
    difficulty,
    hasImage: false,
  };
}
