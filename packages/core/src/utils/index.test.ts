import { describe, it, expect } from 'vitest';
import { generateId, truncate, formatBytes } from './index.js';

// ─── generateId ──────────────────────────────────────────────────────────────

describe('generateId', () => {
  it('returns a string of default length 21', () => {
    const id = generateId();
    expect(id).toHaveLength(21);
  });

  it('returns a string of custom length', () => {
    expect(generateId(8)).toHaveLength(8);
    expect(generateId(64)).toHaveLength(64);
    expect(generateId(1)).toHaveLength(1);
  });

  it('only contains URL-safe characters (A-Z, a-z, 0-9, _, -)', () => {
    const validChars = /^[A-Za-z0-9_-]+$/;
    for (let i = 0; i < 100; i++) {
      expect(generateId()).toMatch(validChars);
    }
  });

  it('generates unique IDs', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(generateId());
    }
    // With 64-char alphabet and 21 length, collisions should be near-zero
    expect(ids.size).toBe(1000);
  });

  it('handles length 0 by returning empty string', () => {
    const id = generateId(0);
    expect(id).toBe('');
  });

  it('generates different IDs on successive calls', () => {
    const a = generateId();
    const b = generateId();
    expect(a).not.toBe(b);
  });
});

// ─── truncate ────────────────────────────────────────────────────────────────

describe('truncate', () => {
  it('returns the original string if shorter than maxLength', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('returns the original string if exactly maxLength', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });

  it('truncates and adds ellipsis when string exceeds maxLength', () => {
    expect(truncate('hello world', 8)).toBe('hello...');
  });

  it('handles maxLength of 3 (minimum for ellipsis)', () => {
    expect(truncate('hello', 3)).toBe('...');
  });

  it('handles empty string', () => {
    expect(truncate('', 5)).toBe('');
  });

  it('handles empty string with 0 maxLength', () => {
    expect(truncate('', 0)).toBe('');
  });

  it('preserves the string when maxLength equals string length', () => {
    const str = 'exact length';
    expect(truncate(str, str.length)).toBe(str);
  });

  it('truncates to maxLength - 3 chars plus ellipsis', () => {
    const result = truncate('abcdefghij', 7);
    expect(result).toBe('abcd...');
    expect(result).toHaveLength(7);
  });

  it('handles single-character string within limit', () => {
    expect(truncate('a', 5)).toBe('a');
  });

  it('handles unicode characters', () => {
    const emoji = 'Hello World';
    expect(truncate(emoji, 20)).toBe(emoji);
  });
});

// ─── formatBytes ─────────────────────────────────────────────────────────────

describe('formatBytes', () => {
  it('prints small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('switches to KB at 1024 bytes', () => {
    expect(formatBytes(1024)).toBe('1.0 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
  });

  it('scales through MB and GB', () => {
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
    expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('3.0 GB');
  });

  it('stops at TB', () => {
    expect(formatBytes(2048 * 1024 ** 4)).toBe('2048.0 TB');
  });
});
