import logger, { logGeneration } from "../logger.js";
import { assessmentItemSchema, OPTION_COUNT, type AssessmentItem } from "../../shared/schema.js";
import { fromZodError } from "zod-validation-error";
import { TOPIC_POOL } from "./constants.js";
import { generateFallbackItem } from "./generators/index.js";
import { ensureFive } from "./options.js";
import { buildQuestionPrompt } from "./prompts.js";
import { createRandomSource, type RandomSource } from "./random.js";
import type { GenerationOutcome, TextGenerator, TopicRequest } from "./types.js";
import { validateAndRepair } from "./validators.js";

export interface AssessmentGeneratorOptions {
  textGenerator?: TextGenerator | null;
  random?: RandomSource;
  topicPool?: readonly TopicRequest[];
}

/**
 * Produces assessments one item at a time. With a text generator each item
 * is requested from the model and repaired; without one, or whenever the
 * model's output is unusable, the built-in generator for the topic is used.
 */
export class AssessmentGenerator {
  private readonly textGenerator: TextGenerator | null;
  private readonly random: RandomSource;
  private readonly topicPool: readonly TopicRequest[];

  constructor(options: AssessmentGeneratorOptions = {}) {
    this.textGenerator = options.textGenerator ?? null;
    this.random = options.random ?? createRandomSource();
    this.topicPool = options.topicPool ?? TOPIC_POOL;
  }

  async generateAssessment(n: number = 2): Promise<AssessmentItem[]> {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Question count must be a non-negative integer, got ${n}`);
    }

    const startTime = Date.now();
    const picks = this.pickTopics(n);

    const items: AssessmentItem[] = [];
    for (const { topic, difficulty } of picks) {
      const item = await this.generateQuestion(topic, difficulty);
      items.push(this.enforceInvariants(item));
    }

    logGeneration("assessment", {
      count: items.length,
      topics: picks.map((p) => p.topic),
      backend: this.textGenerator?.name ?? "none",
      duration: Date.now() - startTime,
    });

    return items;
  }

  async generateQuestion(topic: string, difficulty: string = "moderate"): Promise<AssessmentItem> {
    if (!this.textGenerator) {
      return generateFallbackItem(topic, difficulty, this.random);
    }

    const prompt = buildQuestionPrompt(topic, difficulty);
    let outcome: GenerationOutcome;
    try {
      outcome = await this.textGenerator.generate(prompt);
    } catch (error) {
      outcome = {
        ok: false,
        reason: "backend_failure",
        error: error instanceof Error ? error.message : String(error),
      };
    }

    return validateAndRepair(outcome, topic, difficulty, this.random);
  }

  /** Distinct topics first; only when n exceeds the pool are repeats drawn */
  private pickTopics(n: number): TopicRequest[] {
    const picks = this.random.sample(this.topicPool, Math.min(n, this.topicPool.length));
    while (picks.length < n) {
      picks.push(this.random.pick(this.topicPool));
    }
    return picks;
  }

  private enforceInvariants(item: AssessmentItem): AssessmentItem {
    let repaired = item;

    if (item.options.length !== OPTION_COUNT) {
      logger.warn("Item reached final check with wrong option count", { count: item.options.length });
      repaired = { ...repaired, options: ensureFive(item.options, this.random) };
    }
    if (!(repaired.correctIndex >= 0 && repaired.correctIndex < OPTION_COUNT)) {
      logger.warn("Item reached final check with out-of-range correctIndex", { correctIndex: repaired.correctIndex });
      repaired = { ...repaired, correctIndex: 0 };
    }

    const check = assessmentItemSchema.safeParse(repaired);
    if (!check.success) {
      logger.warn("Item failed schema check", { topic: repaired.topic, error: fromZodError(check.error).message });
    }

    return repaired;
  }
}
