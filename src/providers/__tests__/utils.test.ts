import { describe, it, expect } from 'vitest';
import { parseDurationToMs, parseIntHeader, parseRetryAfter } from '../utils.js';

describe('parseDurationToMs', () => {
  it.each([
    ['6m23.456s', 383456],
    ['500ms', 500],
    ['2h30m0s', 9_000_000],
    ['1s', 1000],
  ])('parses %s', (input, expected) => {
    expect(parseDurationToMs(input)).toBe(expected);
  });

  it('returns undefined for unparseable input', () => {
    expect(parseDurationToMs('soon')).toBeUndefined();
    expect(parseDurationToMs('')).toBeUndefined();
  });
});

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('30')).toBe(30_000);
    expect(parseRetryAfter('1.5')).toBe(1500);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:10 GMT', now)).toBe(10_000);
  });

  it('clamps past dates and negative values to 0', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
    expect(parseRetryAfter('-5')).toBe(0);
  });

  it('returns undefined for absent or junk values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('  ')).toBeUndefined();
    expect(parseRetryAfter('later')).toBeUndefined();
  });
});

describe('parseIntHeader', () => {
  it('parses integers and ignores junk', () => {
    expect(parseIntHeader('42')).toBe(42);
    expect(parseIntHeader(null)).toBeUndefined();
    expect(parseIntHeader('n/a')).toBeUndefined();
  });
});
