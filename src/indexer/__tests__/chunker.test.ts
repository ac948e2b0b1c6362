/**
 * Chunker Module Tests
 *
 * Profile-driven settings, the recursive splitter, and chunk drafts.
 */

import { describe, it, expect } from 'vitest';
import { BUILTIN_PROFILES, DEFAULT_PROFILE } from '../../config/profiles.js';
import {
  RecursiveTextSplitter,
  chunkDocument,
  chunkSettingsForProfile,
} from '../chunker/index.js';

describe('chunkSettingsForProfile', () => {
  it('sizes small-model chunks from the profile', () => {
    const qwen = BUILTIN_PROFILES['qwen-7b'];
    expect(qwen && chunkSettingsForProfile(qwen)).toEqual({ size: 1024, overlap: 128 });
  });

  it('sizes default chunks from the profile', () => {
    expect(chunkSettingsForProfile(DEFAULT_PROFILE)).toEqual({ size: 2048, overlap: 256 });
  });

  it('never drops overlap below 16 characters', () => {
    expect(chunkSettingsForProfile({ chunkTokenLimit: 10 })).toEqual({ size: 40, overlap: 16 });
  });
});

describe('RecursiveTextSplitter', () => {
  it('returns text that fits as a single chunk', () => {
    const text = 'A short note.\n\nWith two paragraphs.';
    expect(new RecursiveTextSplitter({ size: 100, overlap: 10 }).splitText(text)).toEqual([text]);
  });

  it('returns nothing for blank text', () => {
    expect(new RecursiveTextSplitter({ size: 100, overlap: 10 }).splitText('  \n\n ')).toEqual([]);
  });

  it('prefers paragraph boundaries', () => {
    const text = 'First para here.\n\nSecond para is here.\n\nThird.';
    expect(new RecursiveTextSplitter({ size: 24, overlap: 4 }).splitText(text)).toEqual([
      'First para here.',
      'Second para is here.',
      'Third.',
    ]);
  });

  it('carries trailing words into the next chunk as overlap', () => {
    const text = 'one two three four five six seven eight nine ten';
    expect(new RecursiveTextSplitter({ size: 20, overlap: 8 }).splitText(text)).toEqual([
      'one two three four',
      'four five six seven',
      'seven eight nine ten',
    ]);
  });

  it('falls back to characters when there is no separator', () => {
    const chunks = new RecursiveTextSplitter({ size: 10, overlap: 3 }).splitText(
      'abcdefghijklmnopqrstuvwxyz'
    );
    expect(chunks).toEqual(['abcdefghij', 'hijklmnopq', 'opqrstuvwx', 'vwxyz']);
  });

  it('keeps every chunk within the size limit and inside the input', () => {
    const text = 'Lorem ipsum dolor sit amet. '.repeat(40) + '\n\n' + 'consectetur adipiscing '.repeat(30);
    for (const chunk of new RecursiveTextSplitter({ size: 120, overlap: 15 }).splitText(text)) {
      expect(chunk.length).toBeLessThanOrEqual(120);
      expect(text.includes(chunk)).toBe(true);
    }
  });

  it('rejects overlap at least as large as the size', () => {
    expect(() => new RecursiveTextSplitter({ size: 10, overlap: 10 })).toThrow(RangeError);
  });
});

describe('chunkDocument', () => {
  it('numbers chunks and merges metadata', () => {
    const chunks = chunkDocument(
      'prd-7',
      'alpha beta gamma delta epsilon',
      { size: 12, overlap: 4 },
      { project_id: 'checkout', doc_type: 'prd' }
    );

    expect(chunks.map((c) => c.id)).toEqual(['prd-7_0', 'prd-7_1', 'prd-7_2']);
    expect(chunks.map((c) => c.text)).toEqual(['alpha beta', 'gamma delta', 'epsilon']);
    expect(chunks[1]).toEqual({
      id: 'prd-7_1',
      sourceDocId: 'prd-7',
      index: 1,
      text: 'gamma delta',
      metadata: { project_id: 'checkout', doc_type: 'prd', doc_id: 'prd-7', chunk_index: 1 },
    });
  });
});
