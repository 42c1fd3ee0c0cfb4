#!/usr/bin/env node
import * as fs from "fs";
import { parseArgs } from "util";
import { loadConfig, TEXT_GENERATOR_BACKENDS, type TextGeneratorBackend } from "../server/config.js";
import logger, { logError } from "../server/logger.js";
import {
  AssessmentGenerator,
  buildImageRequest,
  createRandomSource,
  createTextGenerator,
  DEFAULT_TITLE,
} from "../server/ai/index.js";
import { formatAssessmentText } from "../server/export/tagged-text.js";

const USAGE = `Usage: generate-assessment [options]

  --num <n>       Number of questions (default 2)
  --llm <name>    Text generator: ${TEXT_GENERATOR_BACKENDS.join(" | ")} (default: $TEXT_GENERATOR)
  --title <text>  Assessment title
  --out <file>    Tagged text output (default assessment_questions.txt)
  --json <file>   Also write the items as JSON
  --seed <n>      Seed for repeatable output
  --help          Show this message`;

function isBackend(value: string): value is TextGeneratorBackend {
  return TEXT_GENERATOR_BACKENDS.some((backend) => backend === value);
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`--${name} must be an integer, got "${value}"`);
  }
  return n;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      num: { type: "string", default: "2" },
      llm: { type: "string" },
      title: { type: "string", default: DEFAULT_TITLE },
      out: { type: "string", default: "assessment_questions.txt" },
      json: { type: "string" },
      seed: { type: "string" },
      help: { type: "boolean", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const { env, warnings } = loadConfig();
  warnings.forEach((w) => logger.warn(w));

  const backend = values.llm ?? env.TEXT_GENERATOR;
  if (!isBackend(backend)) {
    throw new Error(`Unknown text generator "${backend}". Expected one of: ${TEXT_GENERATOR_BACKENDS.join(", ")}`);
  }

  const count = parseInteger("num", values.num) ?? 2;
  const seed = parseInteger("seed", values.seed) ?? env.RANDOM_SEED;

  const generator = new AssessmentGenerator({
    textGenerator: createTextGenerator(env, backend),
    random: createRandomSource(seed),
  });

  logger.info("Generating math assessment questions", { count, backend, seed });
  const items = await generator.generateAssessment(count);

  const outPath = values.out ?? "assessment_questions.txt";
  await fs.promises.writeFile(outPath, formatAssessmentText(items, values.title), "utf-8");
  logger.info(`Formatted questions written to ${outPath}`);

  if (values.json) {
    await fs.promises.writeFile(values.json, JSON.stringify(items, null, 2), "utf-8");
    logger.info(`Items written to ${values.json}`);
  }

  items.forEach((item, i) => {
    const request = buildImageRequest(item);
    if (request) {
      logger.info(`Question ${i + 1} needs a coordinate-plane image`, { points: request.points });
    }
  });
}

main().catch((error: unknown) => {
  logError(error instanceof Error ? error : new Error(String(error)));
  process.exitCode = 1;
});
