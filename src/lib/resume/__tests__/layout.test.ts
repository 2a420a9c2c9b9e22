import { describe, it, expect } from 'vitest';
import { buildLines, buildPageLines, computeGapThreshold, medianOf } from '../layout';
import { DEFAULT_PARSER_OPTIONS } from '../options';
import type { PageTokens, WordToken } from '../../../types/resume';

function word(text: string, left: number, top: number, page = 0): WordToken {
  return { text, left, right: left + text.length * 6, top, bottom: top + 10, page };
}

function page(tokens: WordToken[], width = 600, pageIndex = 0): PageTokens {
  return { pageIndex, width, tokens };
}

describe('medianOf', () => {
  it('handles odd, even and empty inputs', () => {
    expect(medianOf([3, 1, 2])).toBe(2);
    expect(medianOf([4, 1, 3, 2])).toBe(2.5);
    expect(medianOf([])).toBe(0);
  });
});

describe('computeGapThreshold', () => {
  it('scales with page width above the floor', () => {
    expect(computeGapThreshold(600, DEFAULT_PARSER_OPTIONS)).toBe(48);
    expect(computeGapThreshold(200, DEFAULT_PARSER_OPTIONS)).toBe(30);
    expect(computeGapThreshold(Number.NaN, DEFAULT_PARSER_OPTIONS)).toBe(30);
  });
});

describe('buildPageLines', () => {
  it('joins words within the vertical tolerance', () => {
    const lines = buildPageLines(page([word('Doe', 80, 101), word('Jane', 50, 100)]), DEFAULT_PARSER_OPTIONS);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toEqual({ text: 'Jane Doe', top: 100, bottom: 111, left: 50, right: 98, page: 0 });
  });

  it('keeps separate bands apart in reading order', () => {
    const lines = buildPageLines(
      page([word('Engineer', 50, 120), word('Jane', 50, 100)]),
      DEFAULT_PARSER_OPTIONS
    );
    expect(lines.map((l) => l.text)).toEqual(['Jane', 'Engineer']);
  });

  it('splits a band at a wide horizontal gap', () => {
    const lines = buildPageLines(
      page([word('Skills', 20, 100), word('Experience', 300, 100)]),
      DEFAULT_PARSER_OPTIONS
    );
    expect(lines.map((l) => [l.text, l.left])).toEqual([
      ['Skills', 20],
      ['Experience', 300],
    ]);
  });

  it('measures the gap against the page width', () => {
    const tokens = [word('Senior', 50, 100), word('Engineer', 120, 100)];
    expect(buildPageLines(page(tokens, 600), DEFAULT_PARSER_OPTIONS).map((l) => l.text)).toEqual([
      'Senior Engineer',
    ]);
    expect(buildPageLines(page(tokens, 0), DEFAULT_PARSER_OPTIONS).map((l) => l.text)).toEqual([
      'Senior',
      'Engineer',
    ]);
  });

  it('ignores blank tokens', () => {
    expect(buildPageLines(page([word('  ', 10, 10)]), DEFAULT_PARSER_OPTIONS)).toEqual([]);
  });
});

describe('buildLines', () => {
  it('orders pages by index', () => {
    const lines = buildLines(
      [page([word('Second', 50, 10, 1)], 600, 1), page([word('First', 50, 10, 0)], 600, 0)],
      DEFAULT_PARSER_OPTIONS
    );
    expect(lines.map((l) => [l.text, l.page])).toEqual([
      ['First', 0],
      ['Second', 1],
    ]);
  });

  it('returns no lines for empty input', () => {
    expect(buildLines([], DEFAULT_PARSER_OPTIONS)).toEqual([]);
  });
});
