/**
 * Report field schemas for model output.
 *
 * Small models send `null` for fields they have nothing to say about and
 * drift slightly outside numeric ranges. These helpers treat `null` like a
 * missing key (so the default applies) and clamp scores into [0, 1].
 */

import { z } from 'zod';

function absentToUndefined(value: unknown): unknown {
  return value ?? undefined;
}

export function text(fallback: string) {
  return z.preprocess(absentToUndefined, z.string().default(fallback));
}

export function optionalText() {
  return z.string().nullish();
}

export function flag(fallback: boolean) {
  return z.preprocess(absentToUndefined, z.boolean().default(fallback));
}

/** A 0..1 score; numbers outside the range are clamped, not rejected */
export function score(fallback: number) {
  return z.preprocess(
    (value) => (typeof value === 'number' ? Math.min(1, Math.max(0, value)) : absentToUndefined(value)),
    z.number().default(fallback)
  );
}

export function list<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(absentToUndefined, z.array(item).default([]));
}

/** A list of plain strings; non-string entries are dropped */
export function stringList() {
  return z.preprocess(
    (value) => (Array.isArray(value) ? value.filter((entry) => typeof entry === 'string') : absentToUndefined(value)),
    z.array(z.string()).default([])
  );
}

/** A number, also read from numeric strings such as "12.5%" */
export function numeric(fallback: number) {
  return z.preprocess((value) => {
    if (typeof value === 'string') {
      const parsed = Number.parseFloat(value);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    return absentToUndefined(value);
  }, z.number().default(fallback));
}
