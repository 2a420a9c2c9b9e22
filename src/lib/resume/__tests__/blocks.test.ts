import { describe, it, expect } from 'vitest';
import { isEntryStart, splitBlocks, splitEducationBlocks, splitExperienceBlocks } from '../blocks';
import { DEFAULT_PARSER_OPTIONS } from '../options';
import type { ResumeLine } from '../../../types/resume';

function line(text: string, top: number): ResumeLine {
  return { text, left: 40, right: 40 + text.length * 6, top, bottom: top + 10, page: 0 };
}

// Lines 12pt apart, so every gap is 2.
function stacked(texts: string[], start = 0): ResumeLine[] {
  return texts.map((t, i) => line(t, start + i * 12));
}

function texts(blocks: ResumeLine[][]): string[][] {
  return blocks.map((b) => b.map((l) => l.text));
}

describe('splitBlocks', () => {
  it('starts a block after a large vertical gap', () => {
    const lines = [...stacked(['Resume Parser', 'Extracts data']), ...stacked(['Trip Planner'], 60)];
    expect(texts(splitBlocks(lines, DEFAULT_PARSER_OPTIONS))).toEqual([
      ['Resume Parser', 'Extracts data'],
      ['Trip Planner'],
    ]);
  });

  it('folds bullet and duration-only blocks into the previous block', () => {
    const lines = [
      ...stacked(['Acme', 'Engineer']),
      ...stacked(['• Shipped v2'], 60),
      ...stacked(['2 years 3 months'], 120),
    ];
    expect(texts(splitBlocks(lines, DEFAULT_PARSER_OPTIONS))).toEqual([
      ['Acme', 'Engineer', '• Shipped v2', '2 years 3 months'],
    ]);
  });

  it('keeps a dated block separate even when it has a duration', () => {
    const lines = [...stacked(['Acme', 'Engineer']), ...stacked(['2019 - 2021', '2 years'], 60)];
    expect(splitBlocks(lines, DEFAULT_PARSER_OPTIONS)).toHaveLength(2);
  });

  it('uses blockGapFactor', () => {
    const lines = [...stacked(['Resume Parser', 'Extracts data']), ...stacked(['Trip Planner'], 60)];
    expect(splitBlocks(lines, { ...DEFAULT_PARSER_OPTIONS, blockGapFactor: 4 })).toHaveLength(1);
  });

  it('returns nothing for no lines', () => {
    expect(splitBlocks([], DEFAULT_PARSER_OPTIONS)).toEqual([]);
  });
});

describe('splitExperienceBlocks', () => {
  it('groups roles under a repeated company line', () => {
    const lines = stacked([
      'Acme Corp',
      '3 years 2 months',
      'Senior Engineer',
      'Jan 2021 - Present',
      'Engineer',
      'Jan 2019 - Dec 2020',
      'Globex',
      'Developer',
      'Mar 2017 - Dec 2018',
    ]);
    expect(texts(splitExperienceBlocks(lines))).toEqual([
      ['Acme Corp', '3 years 2 months', 'Senior Engineer', 'Jan 2021 - Present'],
      ['Acme Corp', 'Engineer', 'Jan 2019 - Dec 2020'],
      ['Globex', 'Developer', 'Mar 2017 - Dec 2018'],
    ]);
  });

  it('never starts an entry at a duration or bullet line', () => {
    const lines = stacked(['3 years', 'Engineer', 'Jan 2019 - Dec 2020', '• Did work', 'Jan 2021 - Present']);
    expect(isEntryStart(lines, 0)).toBe(false);
    expect(isEntryStart(lines, 3)).toBe(false);
  });
});

describe('splitEducationBlocks', () => {
  it('pairs institutions with degree lines and joins a wrapped year', () => {
    const lines = stacked([
      'Stanford University',
      'Master of Science, Computer Science (2014 -',
      '2016)',
      'MIT',
      'Bachelor of Science in Physics · (2010 - 2014)',
    ]);
    expect(texts(splitEducationBlocks(lines))).toEqual([
      ['Stanford University', 'Master of Science, Computer Science (2014 - 2016)'],
      ['MIT', 'Bachelor of Science in Physics · (2010 - 2014)'],
    ]);
  });

  it('keeps an institution without a degree on its own', () => {
    const lines = stacked(['Online Academy', 'Night School']);
    expect(texts(splitEducationBlocks(lines))).toEqual([['Online Academy'], ['Night School']]);
  });
});
