import type { SectionKey, Vocabulary, VocabularyOverrides } from '../../types/resume';
import { SECTION_KEYS } from '../../types/resume';
import headingsData from './data/headings.json';
import monthsData from './data/months.json';
import lexicon from './data/lexicon.json';

export const DEGREE_KEYWORDS: readonly string[] = lexicon.degreeKeywords;
export const ROLE_KEYWORDS: readonly string[] = lexicon.roleKeywords;
export const EMPLOYMENT_TYPES: readonly string[] = lexicon.employmentTypes;

const BUILTIN_HEADINGS: Record<SectionKey, string[]> = headingsData;
const BUILTIN_MONTHS: Record<string, number> = monthsData;

// Case- and accent-insensitive key used for heading lookup.
export function normalizeHeading(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s&]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalizeMonthWord(word: string): string {
  return word.normalize('NFC').toLowerCase().replace(/\.+$/, '');
}

function buildHeadingLookup(extra: Partial<Record<SectionKey, string[]>> = {}): Map<string, SectionKey> {
  const lookup = new Map<string, SectionKey>();
  for (const key of SECTION_KEYS) {
    const aliases = [...BUILTIN_HEADINGS[key], ...(extra[key] ?? [])];
    for (const alias of aliases) {
      const normalized = normalizeHeading(alias);
      if (normalized && !lookup.has(normalized)) lookup.set(normalized, key);
    }
  }
  return lookup;
}

// Every prefix of three letters or more maps to its month, unless month
// words of different months share it ("jui" is both juin and juillet).
// A whole word must be such a prefix, so "Outreach" is not October.
function buildMonthPrefixes(months: Map<string, number>): Map<string, number> {
  const seen = new Map<string, number | null>();
  for (const [word, month] of months) {
    for (let len = 3; len <= word.length; len++) {
      const prefix = word.slice(0, len);
      const prev = seen.get(prefix);
      if (prev === undefined) seen.set(prefix, month);
      else if (prev !== month) seen.set(prefix, null);
    }
  }
  const prefixes = new Map<string, number>();
  for (const [prefix, month] of seen) {
    if (month !== null) prefixes.set(prefix, month);
  }
  return prefixes;
}

function mergeWords(base: readonly string[], extra: string[] = []): string[] {
  const out: string[] = [];
  for (const word of [...base, ...extra]) {
    const clean = word.trim().toLowerCase();
    if (clean && !out.includes(clean)) out.push(clean);
  }
  return out;
}

export function buildVocabulary(overrides: VocabularyOverrides = {}): Vocabulary {
  const months = new Map<string, number>();
  for (const [word, month] of Object.entries({ ...BUILTIN_MONTHS, ...(overrides.months ?? {}) })) {
    if (Number.isInteger(month) && month >= 1 && month <= 12) {
      months.set(normalizeMonthWord(word), month);
    }
  }

  return {
    headings: buildHeadingLookup(overrides.headings),
    months,
    monthPrefixes: buildMonthPrefixes(months),
    openEnded: mergeWords(lexicon.openEnded, overrides.openEnded),
    locationKeywords: mergeWords(lexicon.locationKeywords, overrides.locationKeywords),
    durationUnits: mergeWords(lexicon.durationUnits, overrides.durationUnits),
  };
}

export const DEFAULT_VOCABULARY: Vocabulary = buildVocabulary();
