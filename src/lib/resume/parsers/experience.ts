import type { LineTraits, ResumeLine, Vocabulary, WorkEntry } from '../../../types/resume';
import { findDateLine, hasDateRange, parseDateRange } from '../dates';
import { cleanBlockTexts, isBulletLine, isDurationLine, stripBullet, tagLines } from '../lineTraits';
import { DEFAULT_VOCABULARY, ROLE_KEYWORDS } from '../vocabulary';

const HIGHLIGHT_LABELS = new Set(['achievements:', 'achievements', 'main responsibilities:']);
const COMPANY_SUFFIXES = [' Oy', ' Inc', ' LLC', ' Ltd', ' GmbH', ' S.A.'];

export function containsRoleKeyword(text: string): boolean {
  const lowered = text.toLowerCase();
  return ROLE_KEYWORDS.some((k) => lowered.includes(k));
}

function isHeaderCandidate(text: string): boolean {
  if (text.endsWith('.') || text.endsWith(':')) return false;
  if (containsRoleKeyword(text)) return true;
  if (COMPANY_SUFFIXES.some((s) => text.includes(s))) return true;
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length < 2) return false;
  const caps = words.filter((w) => /^\p{Lu}/u.test(w)).length;
  return caps >= Math.max(1, Math.floor(words.length / 2));
}

function isCompanyNameWord(text: string): boolean {
  const stripped = text.trim();
  if (stripped.endsWith('.') || stripped.endsWith(':')) return false;
  const parts = stripped.split(/\s+/);
  return parts.length === 1 && /^\p{Lu}/u.test(parts[0]);
}

// A line opens the next entry's header when a date range follows closely.
function looksLikeHeaderStart(lines: LineTraits[], idx: number): boolean {
  const line = lines[idx];
  if (line.kind === 'label' || line.bullet) return false;

  const next = lines[idx + 1];
  if (next?.duration) return true;
  if (next && containsRoleKeyword(next.text) && lines[idx + 2]?.dateRange) {
    return isCompanyNameWord(line.text) || isHeaderCandidate(line.text);
  }
  if (line.text.length > 50 || !isHeaderCandidate(line.text)) return false;
  for (let offset = 1; offset <= 3; offset++) {
    if (lines[idx + offset]?.dateRange) return true;
  }
  return false;
}

// `consumed` is the number of leading lines used: 1 for "Position at Company".
export function splitTitleCompany(texts: string[]): { position: string; company: string; consumed: number } {
  if (texts.length === 0) return { position: '', company: '', consumed: 0 };
  const first = texts[0];
  const parts = first.split(/\s+at\s+/i);
  if (parts.length >= 2 && parts[0].trim() && parts[1].trim()) {
    return { position: parts[0].trim(), company: parts[1].trim(), consumed: 1 };
  }
  if (texts.length === 1) return { position: first, company: '', consumed: 1 };
  return { position: first, company: texts[1].split('·')[0].trim(), consumed: 2 };
}

export function parseCompanyPosition(header: string[], lastCompany: string): { company: string; position: string } {
  if (header.length === 0) return { company: lastCompany, position: '' };
  if (header.length === 1) {
    const { company, position } = splitTitleCompany(header);
    return company ? { company, position } : { company: lastCompany, position: header[0] };
  }
  if (/\sat\s/i.test(header[0])) {
    const { company, position } = splitTitleCompany([header[0], header[1]]);
    return { company, position };
  }
  return { company: header[0], position: header[1] };
}

function cleanHeaderLines(header: LineTraits[]): string[] {
  return header
    .filter((h) => h.text && h.kind !== 'label' && !h.duration && !h.employment)
    .map((h) => h.text);
}

/**
 * Picks the location line of a work entry's body: the first unbulleted line
 * with a comma, or a lone capitalized word without a role keyword. The
 * single-word rule is a heuristic and takes a one-word title such as "Intern"
 * for a place.
 */
export function findLocationFromBlock(texts: string[], vocab: Vocabulary = DEFAULT_VOCABULARY): string {
  for (const text of texts) {
    if (isBulletLine(text)) continue;
    if (text.includes(',') && text.length <= 60 && !hasDateRange(text, vocab)) return text;
    if (text.length <= 20 && /^\p{Lu}\p{L}*$/u.test(text) && !containsRoleKeyword(text)) return text;
  }
  return '';
}

export function splitHighlights(texts: string[]): { highlights: string[]; summary: string } {
  const highlights: string[] = [];
  const summaryParts: string[] = [];
  let lastWasHighlight = false;

  for (const text of texts) {
    const stripped = text.trim();
    if (HIGHLIGHT_LABELS.has(stripped.toLowerCase())) continue;
    if (isBulletLine(stripped)) {
      highlights.push(stripBullet(stripped));
      lastWasHighlight = true;
    } else if (highlights.length > 0 && lastWasHighlight) {
      highlights[highlights.length - 1] = `${highlights[highlights.length - 1]} ${stripped}`.trim();
    } else {
      summaryParts.push(stripped);
      lastWasHighlight = false;
    }
  }

  return { highlights, summary: summaryParts.join(' ').trim() };
}

function finalizeWorkEntry(entry: WorkEntry, body: string[], vocab: Vocabulary): WorkEntry {
  const location = findLocationFromBlock(body, vocab);
  const content = location ? body.filter((t) => t !== location) : body;
  const { highlights, summary } = splitHighlights(content);
  return { ...entry, location, summary, highlights };
}

/**
 * Pivot scan over an experience section: every date-range line opens an
 * entry whose header is whatever was buffered since the previous entry, and
 * the lines up to the next header form its body.
 */
export function parseExperience(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): WorkEntry[] {
  const tagged = tagLines(lines.map((l) => l.text), vocab).filter((t) => t.kind !== 'footer');
  const entries: WorkEntry[] = [];
  let header: LineTraits[] = [];
  let body: string[] = [];
  let current: WorkEntry | null = null;
  let lastCompany = '';

  for (let i = 0; i < tagged.length; i++) {
    const line = tagged[i];

    if (line.dateRange) {
      if (current) entries.push(finalizeWorkEntry(current, body, vocab));
      const { company, position } = parseCompanyPosition(cleanHeaderLines(header), lastCompany);
      const { start, end } = parseDateRange(line.text, vocab);
      current = {
        name: company,
        position,
        location: '',
        startDate: start,
        endDate: end,
        summary: '',
        highlights: [],
      };
      if (company) lastCompany = company;
      header = [];
      body = [];
      continue;
    }

    if ((line.duration && header.length > 0) || looksLikeHeaderStart(tagged, i)) {
      header.push(line);
    } else if (current) {
      body.push(line.text);
    } else {
      header.push(line);
    }
  }
  if (current) entries.push(finalizeWorkEntry(current, body, vocab));

  return entries.filter((e) => e.name || e.position);
}

export function parseWorkBlock(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): WorkEntry | null {
  const texts = cleanBlockTexts(lines.map((l) => l.text), { dropDuration: true, dropEmployment: true }, vocab);
  if (texts.length === 0) return null;

  const dateLine = findDateLine(texts, vocab);
  const { start, end } = parseDateRange(dateLine, vocab);
  const dateIndex = dateLine ? texts.indexOf(dateLine) : -1;
  const before = (dateIndex >= 0 ? texts.slice(0, dateIndex) : texts).filter((t) => !isDurationLine(t, vocab));
  const after = dateIndex >= 0 ? texts.slice(dateIndex + 1) : [];

  let company = '';
  let position = '';
  if (before.length >= 2) {
    company = before[0];
    position = before[1];
  } else if (before.length === 1) {
    position = before[0];
  }
  if (!company && !position) return null;

  const content = dateIndex >= 0 ? after : texts.slice(2);
  return finalizeWorkEntry(
    { name: company, position, location: '', startDate: start, endDate: end, summary: '', highlights: [] },
    content,
    vocab
  );
}
