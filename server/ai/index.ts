export { AssessmentGenerator } from "./generator.js";
export type { AssessmentGeneratorOptions } from "./generator.js";

export { BackendUnavailableError, BackendFailureError } from "./types.js";
export type {
  GenerationOutcome,
  FailureReason,
  TextGenerator,
  TopicRequest,
  GeneratorKind,
  CurriculumRule,
} from "./types.js";

export { createRandomSource } from "./random.js";
export type { RandomSource } from "./random.js";

export { ensureFive, placeOptions } from "./options.js";
export { CURRICULUM_RULES, mapCurriculum, findCurriculumRule } from "./curriculum.js";
export { GENERATORS, generateFallbackItem } from "./generators/index.js";
export { buildQuestionPrompt, QUESTION_SCHEMA } from "./prompts.js";
export { parseGenerationOutput } from "./parsers.js";
export { validateAndRepair } from "./validators.js";
export { buildImageRequest } from "./image.js";
export type { CoordinatePlaneRequest, LabelledPoint } from "./image.js";

export { createTextGenerator, CompletionTextGenerator } from "./providers/index.js";
export type { CompleteFn, ModelOptions } from "./providers/index.js";

export { TOPIC_POOL, DEFAULT_TITLE } from "./constants.js";
