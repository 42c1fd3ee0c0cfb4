import type { AssessmentItem } from "../../shared/schema.js";
import { cleanText } from "../ai/utils.js";
import { DEFAULT_TITLE } from "../ai/constants.js";

const DESCRIPTION = "Comprehensive math assessment covering various curriculum topics";

function formatItem(item: AssessmentItem, order: number, title: string): string {
  const lines: string[] = [];

  if (order === 1) {
    lines.push(`@title ${title}`, `@description ${DESCRIPTION}`, "");
  }

  lines.push(
    `@question ${cleanText(item.question)}`,
    "@instruction Choose the correct option",
    `@difficulty ${cleanText(item.difficulty)}`,
    `@Order ${order}`
  );
  item.options.forEach((option, i) => {
    const tag = i === item.correctIndex ? "@@option" : "@option";
    lines.push(`${tag} ${cleanText(option)}`);
  });
  lines.push(
    `@explanation ${cleanText(item.explanation)}`,
    `@subject ${cleanText(item.subject)}`,
    `@unit ${cleanText(item.unit)}`,
    `@topic ${cleanText(item.topic)}`,
    "@plusmarks 1",
    ""
  );

  return lines.join("\n");
}

/** Tagged plain-text format; the correct option is marked with `@@option` */
export function formatAssessmentText(items: readonly AssessmentItem[], title: string = DEFAULT_TITLE): string {
  return items.map((item, i) => formatItem(item, i + 1, title)).join("\n");
}
