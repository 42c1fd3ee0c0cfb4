import type { TopicRequest } from "./types.js";

export const TOPIC_POOL: readonly TopicRequest[] = [
  { topic: "Circles (Area, circumference)", difficulty: "moderate" },
  { topic: "Quadratic Equations & Functions (Finding roots/solutions, graphing)", difficulty: "moderate" },
  { topic: "Coordinate Geometry", difficulty: "easy" },
  { topic: "Fractions, Decimals, & Percents", difficulty: "moderate" },
  { topic: "Interpreting Variables", difficulty: "easy" },
];

export const FILLER_RANGE = { min: 1, max: 99 } as const;

export const POINT_LABELS = ["A", "B", "C", "D", "E"] as const;

export const COORDINATE_BOUND = 5;

export const DEFAULT_TITLE = "AI-Generated Quantitative Math Assessment";
