import type { CurriculumPlacement } from "../../shared/schema.js";
import type { CurriculumRule, GeneratorKind } from "./types.js";

const SUBJECT = "Quantitative Math";

/**
 * Evaluated top to bottom; the first rule with a keyword contained in the
 * topic wins. The last rule has no keywords and catches everything else.
 */
export const CURRICULUM_RULES: readonly CurriculumRule[] = [
  {
    keywords: ["circle"],
    subject: SUBJECT,
    unit: "Geometry and Measurement",
    topic: "Circles (Area, circumference)",
    generator: "circle",
  },
  {
    keywords: ["quadratic"],
    subject: SUBJECT,
    unit: "Algebra",
    topic: "Quadratic Equations & Functions (Finding roots/solutions, graphing)",
    generator: "quadratic",
  },
  {
    keywords: ["coordinate"],
    subject: SUBJECT,
    unit: "Geometry and Measurement",
    topic: "Coordinate Geometry",
    generator: "coordinate",
  },
  {
    keywords: ["fraction", "percent"],
    subject: SUBJECT,
    unit: "Numbers and Operations",
    topic: "Fractions, Decimals, & Percents",
    generator: "percent",
  },
  {
    keywords: ["interpreting variables", "linear"],
    subject: SUBJECT,
    unit: "Algebra",
    topic: "Interpreting Variables",
    generator: "linear",
  },
  {
    keywords: [],
    subject: SUBJECT,
    unit: "Problem Solving",
    topic: "Algebra",
    generator: "linear",
  },
];

export function findCurriculumRule(topic: string): CurriculumRule {
  const t = topic.toLowerCase();
  const rule = CURRICULUM_RULES.find(
    (r) => r.keywords.length === 0 || r.keywords.some((keyword) => t.includes(keyword))
  );
  // The catch-all rule always matches
  return rule ?? CURRICULUM_RULES[CURRICULUM_RULES.length - 1];
}

export function mapCurriculum(topic: string): CurriculumPlacement {
  const { subject, unit, topic: canonical } = findCurriculumRule(topic);
  return { subject, unit, topic: canonical };
}

export function placementFor(kind: GeneratorKind): CurriculumPlacement {
  const rule = CURRICULUM_RULES.find((r) => r.generator === kind) ?? findCurriculumRule("");
  return { subject: rule.subject, unit: rule.unit, topic: rule.topic };
}
