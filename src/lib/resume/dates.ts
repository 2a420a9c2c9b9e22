import type { DateRange, Vocabulary } from '../../types/resume';
import { DEFAULT_VOCABULARY, normalizeMonthWord } from './vocabulary';

const NUMERIC_DATE = String.raw`\d{4}-(?:0[1-9]|1[0-2])(?!\d)|(?:0?[1-9]|1[0-2])[./]\d{4}(?!\d)`;
const WORD_DATE = String.raw`(?:\p{L}[\p{L}.]{2,11}\s+)?\d{4}(?!\d)`;
const DATE_TOKEN = String.raw`(?<![\p{L}\p{N}])(?:${NUMERIC_DATE}|${WORD_DATE})`;
const SEPARATOR = String.raw`\s*(?:-|–|—|(?<!\p{L})to(?!\p{L}))\s*`;

interface DatePatterns {
  range: RegExp;
  single: RegExp;
  dateOnly: RegExp;
}

const patternCache = new WeakMap<Vocabulary, DatePatterns>();

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function patternsFor(vocab: Vocabulary): DatePatterns {
  const cached = patternCache.get(vocab);
  if (cached) return cached;

  const openEnded = [...vocab.openEnded]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  const end = openEnded ? `${DATE_TOKEN}|(?:${openEnded})(?!\\p{L})` : DATE_TOKEN;
  const range = `(?<start>${DATE_TOKEN})${SEPARATOR}(?<end>${end})`;

  const patterns: DatePatterns = {
    range: new RegExp(range, 'iu'),
    single: new RegExp(DATE_TOKEN, 'iu'),
    dateOnly: new RegExp(`^(?:issued\\s+)?(?:${range}|${DATE_TOKEN})$`, 'iu'),
  };
  patternCache.set(vocab, patterns);
  return patterns;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function lookupMonth(word: string, vocab: Vocabulary = DEFAULT_VOCABULARY): number {
  const key = normalizeMonthWord(word);
  return vocab.months.get(key) ?? vocab.monthPrefixes.get(key) ?? 0;
}

/**
 * Canonicalizes one side of a date expression to `YYYY`, `YYYY-MM` or `''`.
 * Open-ended markers ("Present", "настоящее время") and anything unrecognized
 * become `''`.
 */
export function normalizeDate(value: string, vocab: Vocabulary = DEFAULT_VOCABULARY): string {
  const v = value.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!v) return '';
  if (vocab.openEnded.includes(v)) return '';

  const iso = /^(\d{4})-(0[1-9]|1[0-2])$/.exec(v);
  if (iso) return `${iso[1]}-${iso[2]}`;

  const numeric = /^(0?[1-9]|1[0-2])[./](\d{4})$/.exec(v);
  if (numeric) return `${numeric[2]}-${pad2(Number(numeric[1]))}`;

  if (/^\d{4}$/.test(v)) return v;

  const parts = v.split(' ');
  if (parts.length === 2 && /^\d{4}$/.test(parts[1])) {
    const month = lookupMonth(parts[0], vocab);
    return month ? `${parts[1]}-${pad2(month)}` : parts[1];
  }
  return '';
}

export function hasDateRange(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  return patternsFor(vocab).range.test(text);
}

export function hasSingleDate(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  return patternsFor(vocab).single.test(text);
}

// True when the whole line is a date expression, e.g. "Issued Mar 2021" or "2019 - 2020".
export function isDateOnly(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  return patternsFor(vocab).dateOnly.test(text.trim());
}

export function parseDateRange(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): DateRange {
  if (!text) return { start: '', end: '' };
  const { range, single } = patternsFor(vocab);

  const r = range.exec(text);
  if (r?.groups) {
    return {
      start: normalizeDate(r.groups.start ?? '', vocab),
      end: normalizeDate(r.groups.end ?? '', vocab),
    };
  }

  const s = single.exec(text);
  if (s) return { start: normalizeDate(s[0], vocab), end: '' };

  return { start: '', end: '' };
}

export function findDateLine(texts: string[], vocab: Vocabulary = DEFAULT_VOCABULARY): string {
  return texts.find((t) => hasDateRange(t, vocab) || hasSingleDate(t, vocab)) ?? '';
}
