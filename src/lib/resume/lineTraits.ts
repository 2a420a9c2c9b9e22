import type { LineKind, LineTraits, Vocabulary } from '../../types/resume';
import { hasDateRange } from './dates';
import { DEFAULT_VOCABULARY, EMPLOYMENT_TYPES } from './vocabulary';

const PAGE_FOOTER_RE = /^page\s+\d+\s+(?:of|\/)\s*\d+$/i;
const BULLET_PREFIXES = ['-', '•', '–'];
const LABELS = new Set(['achievements', 'achievements:', 'main responsibilities:']);
const CONTACT_HEADINGS = new Set(['способы связаться', 'контакты', 'контактная информация']);

const durationCache = new WeakMap<Vocabulary, RegExp>();

function durationPattern(vocab: Vocabulary): RegExp {
  const cached = durationCache.get(vocab);
  if (cached) return cached;
  const units = [...vocab.durationUnits]
    .sort((a, b) => b.length - a.length)
    .map((u) => u.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('|');
  const re = new RegExp(String.raw`(?<![\p{L}\p{N}])\d+\s+(?:${units})(?!\p{L})`, 'iu');
  durationCache.set(vocab, re);
  return re;
}

export function isPageFooter(text: string): boolean {
  return PAGE_FOOTER_RE.test(text.trim());
}

export function isNoiseLine(text: string): boolean {
  const lowered = text.trim().toLowerCase();
  if (lowered.startsWith('page ') || PAGE_FOOTER_RE.test(lowered)) return true;
  if (lowered === 'contact' || lowered.startsWith('contact ')) return true;
  return CONTACT_HEADINGS.has(lowered);
}

export function isLabelLine(text: string): boolean {
  return LABELS.has(text.trim().toLowerCase());
}

export function isBulletLine(text: string): boolean {
  const trimmed = text.trim();
  return BULLET_PREFIXES.some((p) => trimmed.startsWith(p));
}

export function stripBullet(text: string): string {
  return text.trim().replace(/^[•\-–\s]+/, '').trim();
}

export function isDurationLine(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  if (/(?<!\d)\d{4}(?!\d)/.test(text)) return false;
  return durationPattern(vocab).test(text);
}

export function isEmploymentTypeLine(text: string): boolean {
  const lowered = text.toLowerCase();
  return EMPLOYMENT_TYPES.some((term) => lowered.includes(term));
}

export function tagLine(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): LineTraits {
  const trimmed = text.trim();
  const bullet = isBulletLine(trimmed);
  const dateRange = hasDateRange(trimmed, vocab);
  const duration = isDurationLine(trimmed, vocab);

  let kind: LineKind = 'plain';
  if (isPageFooter(trimmed)) kind = 'footer';
  else if (isNoiseLine(trimmed)) kind = 'noise';
  else if (isLabelLine(trimmed)) kind = 'label';
  else if (dateRange) kind = 'dateRange';
  else if (bullet) kind = 'bullet';
  else if (duration) kind = 'duration';

  return {
    text: trimmed,
    kind,
    bullet,
    dateRange,
    duration,
    employment: isEmploymentTypeLine(trimmed),
  };
}

export function tagLines(texts: string[], vocab: Vocabulary = DEFAULT_VOCABULARY): LineTraits[] {
  return texts.filter((t) => t.trim()).map((t) => tagLine(t, vocab));
}

export interface CleanOptions {
  dropDuration?: boolean;
  dropEmployment?: boolean;
}

// Drops footers, contact noise and achievement labels, optionally durations
// and employment-type lines.
export function cleanBlockTexts(
  texts: string[],
  opts: CleanOptions = {},
  vocab: Vocabulary = DEFAULT_VOCABULARY
): string[] {
  return tagLines(texts, vocab)
    .filter((t) => {
      if (t.kind === 'footer' || t.kind === 'noise') return false;
      if (t.text.toLowerCase() === 'achievements' || t.text.toLowerCase() === 'achievements:') return false;
      if (opts.dropDuration && t.duration) return false;
      if (opts.dropEmployment && t.employment) return false;
      return true;
    })
    .map((t) => t.text);
}
