import { describe, it, expect } from 'vitest';
import {
  findDateLine,
  hasDateRange,
  isDateOnly,
  lookupMonth,
  normalizeDate,
  parseDateRange,
} from '../dates';
import { buildVocabulary } from '../vocabulary';

describe('normalizeDate', () => {
  it('maps month names to YYYY-MM', () => {
    expect(normalizeDate('Mar 2020')).toBe('2020-03');
    expect(normalizeDate('Sept. 2018')).toBe('2018-09');
    expect(normalizeDate('juin 2019')).toBe('2019-06');
    expect(normalizeDate('января 2020')).toBe('2020-01');
  });

  it('keeps a bare year and falls back to it for unknown words', () => {
    expect(normalizeDate('2017')).toBe('2017');
    expect(normalizeDate('Foo 2020')).toBe('2020');
  });

  it('converts numeric dates', () => {
    expect(normalizeDate('06/2020')).toBe('2020-06');
    expect(normalizeDate('3.2021')).toBe('2021-03');
  });

  it('is idempotent', () => {
    const once = normalizeDate('Mar 2020');
    expect(normalizeDate(once)).toBe(once);
  });

  it('returns empty for open-ended and unrecognized values', () => {
    expect(normalizeDate('Present')).toBe('');
    expect(normalizeDate('настоящее время')).toBe('');
    expect(normalizeDate('gibberish')).toBe('');
    expect(normalizeDate('')).toBe('');
  });
});

describe('lookupMonth', () => {
  it('matches exact words and unambiguous prefixes', () => {
    expect(lookupMonth('Juillet')).toBe(7);
    expect(lookupMonth('Septiembre')).toBe(9);
    expect(lookupMonth('Decem')).toBe(12);
  });

  it('drops prefixes shared by different months', () => {
    expect(lookupMonth('juix')).toBe(0);
  });

  it('needs the whole word to be a month or the start of one', () => {
    expect(lookupMonth('Juill')).toBe(7);
    expect(lookupMonth('Outreach')).toBe(0);
    expect(lookupMonth('General')).toBe(0);
    expect(lookupMonth('Marketing')).toBe(0);
    expect(normalizeDate('Outreach 2020')).toBe('2020');
    expect(normalizeDate('General 2019')).toBe('2019');
  });
});

describe('parseDateRange', () => {
  it('parses a month range with an open end', () => {
    expect(parseDateRange('Jan 2020 - Present')).toEqual({ start: '2020-01', end: '' });
  });

  it('parses year ranges and en dashes', () => {
    expect(parseDateRange('2019 - 2021')).toEqual({ start: '2019', end: '2021' });
    expect(parseDateRange('Sept. 2018 – Oct 2019')).toEqual({ start: '2018-09', end: '2019-10' });
  });

  it('parses Russian ranges', () => {
    expect(parseDateRange('января 2020 — настоящее время')).toEqual({ start: '2020-01', end: '' });
  });

  it('accepts "to" as a separator', () => {
    expect(parseDateRange('06/2020 to 2022')).toEqual({ start: '2020-06', end: '2022' });
  });

  it('falls back to a single date', () => {
    expect(parseDateRange('Since 2019')).toEqual({ start: '2019', end: '' });
  });

  it('returns empty bounds without a date', () => {
    expect(parseDateRange('Summer internship')).toEqual({ start: '', end: '' });
    expect(parseDateRange('')).toEqual({ start: '', end: '' });
  });
});

describe('vocabulary overrides', () => {
  it('adds open-ended markers', () => {
    const vocab = buildVocabulary({ openEnded: ['ongoing'] });
    expect(hasDateRange('2020 - ongoing')).toBe(false);
    expect(hasDateRange('2020 - ongoing', vocab)).toBe(true);
    expect(parseDateRange('2020 - ongoing', vocab)).toEqual({ start: '2020', end: '' });
  });
});

describe('isDateOnly', () => {
  it('accepts whole-line dates with an optional "Issued" prefix', () => {
    expect(isDateOnly('Issued Mar 2021')).toBe(true);
    expect(isDateOnly('2019 - 2020')).toBe(true);
    expect(isDateOnly('Certified in 2019')).toBe(false);
  });
});

describe('findDateLine', () => {
  it('returns the first line carrying a date', () => {
    expect(findDateLine(['Acme', 'Mar 2020 - Present', 'Berlin 2021'])).toBe('Mar 2020 - Present');
    expect(findDateLine(['Acme', 'Engineer'])).toBe('');
  });
});
