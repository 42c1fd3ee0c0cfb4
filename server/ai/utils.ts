// Control characters that break XML-based document formats (tab, LF and CR are kept)
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F]/g;

export function cleanText(text: unknown): string {
  if (text === undefined || text === null) return "";
  return String(text).replace(CONTROL_CHARS, "");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Integer coercion for model-supplied indices: numbers are truncated, integer
 * strings and booleans are converted, anything else becomes -1.
 */
export function coerceIndex(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : -1;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return -1;
}

export function signed(n: number): string {
  return n < 0 ? `- ${Math.abs(n)}` : `+ ${n}`;
}
