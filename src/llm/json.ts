/**
 * Lenient JSON extraction from model output
 *
 * Models wrap JSON in markdown fences, prepend "Sure, here it is:" or
 * trail off into an explanation. Two strategies, in order:
 *
 * 1. Strip code fences and parse the whole response
 * 2. Parse the first brace-balanced {...} span
 *
 * Only a JSON object counts as success. Never throws.
 */

export const PARSE_FAILURE_MESSAGE = 'Failed to parse response';

/** How much of an unparseable response is kept for diagnostics */
export const RAW_EXCERPT_CHARS = 500;

export type JsonObject = { [key: string]: unknown };

export type ParsedJson =
  | { ok: true; value: JsonObject }
  | { ok: false; error: string; raw: string };

const OPENING_FENCE = /```(?:json)?\s*/gi;

function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

export function stripCodeFences(text: string): string {
  return text.trim().replace(OPENING_FENCE, '').replace(/`+$/, '').trim();
}

/**
 * Find the first `{` and its matching `}`, skipping braces inside string
 * literals. Returns undefined when the braces never balance.
 */
export function findBalancedObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

/**
 * Parse a model response into a JSON object.
 *
 * @example
 * parseModelJson('```json\n{"a": 1}\n```')         // { ok: true, value: { a: 1 } }
 * parseModelJson('Result: {"a": 1} hope it helps') // { ok: true, value: { a: 1 } }
 * parseModelJson('no json here')                  // { ok: false, error: 'Failed to parse response', raw: 'no json here' }
 */
export function parseModelJson(text: string): ParsedJson {
  const direct = tryParseObject(stripCodeFences(text));
  if (direct) {
    return { ok: true, value: direct };
  }

  const candidate = findBalancedObject(text);
  if (candidate !== undefined) {
    const embedded = tryParseObject(candidate);
    if (embedded) {
      return { ok: true, value: embedded };
    }
  }

  return { ok: false, error: PARSE_FAILURE_MESSAGE, raw: text.slice(0, RAW_EXCERPT_CHARS) };
}
