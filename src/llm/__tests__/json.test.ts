/**
 * Model JSON Parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { parseModelJson, findBalancedObject, stripCodeFences } from '../json.js';

describe('parseModelJson', () => {
  it('parses a bare JSON object', () => {
    expect(parseModelJson('{"score": 0.8}')).toEqual({ ok: true, value: { score: 0.8 } });
  });

  it('strips a json code fence', () => {
    const text = '```json\n{"violations": [], "summary": "fine"}\n```';
    expect(parseModelJson(text)).toEqual({
      ok: true,
      value: { violations: [], summary: 'fine' },
    });
  });

  it('strips a plain code fence', () => {
    expect(parseModelJson('```\n{"a": 1}\n```')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('extracts an object surrounded by prose', () => {
    const text = 'Here is the analysis: {"a": {"b": 2}} Let me know if you need more.';
    expect(parseModelJson(text)).toEqual({ ok: true, value: { a: { b: 2 } } });
  });

  it('ignores braces inside string literals', () => {
    const text = 'Result: {"note": "use } carefully", "n": 1} done';
    expect(parseModelJson(text)).toEqual({ ok: true, value: { note: 'use } carefully', n: 1 } });
  });

  it('rejects a top-level array', () => {
    const result = parseModelJson('[1, 2, 3]');
    expect(result.ok).toBe(false);
  });

  it('returns a tagged failure for garbage', () => {
    expect(parseModelJson('I cannot help with that.')).toEqual({
      ok: false,
      error: 'Failed to parse response',
      raw: 'I cannot help with that.',
    });
  });

  it('truncates the raw excerpt to 500 characters', () => {
    const result = parseModelJson('x'.repeat(900));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.raw).toHaveLength(500);
    }
  });

  it('fails on unbalanced braces', () => {
    expect(parseModelJson('{"a": {"b": 1}').ok).toBe(false);
  });
});

describe('findBalancedObject', () => {
  it('returns the first balanced span', () => {
    expect(findBalancedObject('a {"x": {}} b {"y": 1}')).toBe('{"x": {}}');
  });

  it('handles escaped quotes in strings', () => {
    expect(findBalancedObject('{"q": "say \\"}\\" now"}')).toBe('{"q": "say \\"}\\" now"}');
  });

  it('returns undefined without an opening brace', () => {
    expect(findBalancedObject('plain text')).toBeUndefined();
  });
});

describe('stripCodeFences', () => {
  it('removes opening and trailing fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});
