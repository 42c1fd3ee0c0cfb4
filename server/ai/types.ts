export type FailureReason = "backend_unavailable" | "backend_failure" | "malformed_response";

/**
 * Result of one call to a text generator. `data` is whatever JSON object the
 * model produced; nothing about its fields is trusted.
 */
export type GenerationOutcome =
  | { ok: true; data: Record<string, unknown> }
  | { ok: false; error: string; reason: FailureReason };

export interface TextGenerator {
  readonly name: string;
  generate(prompt: string): Promise<GenerationOutcome>;
}

export interface TopicRequest {
  topic: string;
  difficulty: string;
}

export type GeneratorKind = "circle" | "quadratic" | "coordinate" | "percent" | "linear";

export interface CurriculumRule {
  keywords: readonly string[];
  subject: string;
  unit: string;
  topic: string;
  generator: GeneratorKind;
}

export class BackendUnavailableError extends Error {
  code = "BACKEND_UNAVAILABLE";
  constructor(public readonly backend: string, message: string = `Text generator ${backend} is not available`) {
    super(message);
    this.name = "BackendUnavailableError";
  }
}

export class BackendFailureError extends Error {
  code = "BACKEND_FAILURE";
  constructor(public readonly backend: string, message: string) {
    super(message);
    this.name = "BackendFailureError";
  }
}
