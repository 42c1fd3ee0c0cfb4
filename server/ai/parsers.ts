import type { GenerationOutcome } from "./types.js";
import { isRecord } from "./utils.js";

/**
 * Pull the JSON object out of free-form model output. Everything from the
 * first `{` to the last `}` is parsed, which also covers code fences and
 * chatter before or after the object.
 */
export function parseGenerationOutput(text: string): GenerationOutcome {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");

  if (start === -1 || end === -1 || end <= start) {
    return { ok: false, reason: "malformed_response", error: "No JSON object found in model output" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (e) {
    return { ok: false, reason: "malformed_response", error: `JSON parse failed: ${e instanceof Error ? e.message : String(e)}` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, reason: "malformed_response", error: "Model output is not a JSON object" };
  }

  return { ok: true, data: parsed };
}
