import type { EducationEntry, ResumeLine, Vocabulary } from '../../../types/resume';
import { looksLikeDegreeLine, splitEducationBlocks } from '../blocks';
import { findDateLine, isDateOnly, parseDateRange } from '../dates';
import { cleanBlockTexts } from '../lineTraits';
import { DEFAULT_VOCABULARY, DEGREE_KEYWORDS } from '../vocabulary';

function hasDegreeKeyword(text: string): boolean {
  const lowered = text.toLowerCase();
  return DEGREE_KEYWORDS.some((k) => lowered.includes(k));
}

/**
 * Splits a degree line into study type and area: "Bachelor of Science,
 * Computer Science" or "MSc in Data Science". A parenthesized year is removed
 * first.
 */
export function parseDegree(raw: string): { studyType: string; area: string } {
  if (!raw) return { studyType: '', area: '' };
  const line = raw
    .replace(/\s*\([^)]*?\d{4}[^)]*?\)/g, '')
    .replace(/·/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  const comma = line.indexOf(',');
  if (comma >= 0) {
    const left = line.slice(0, comma).trim();
    const right = line.slice(comma + 1).trim();
    if (hasDegreeKeyword(left)) return { studyType: left || line, area: right };
  }

  const parts = line.split(/\s+in\s+/i);
  if (parts.length >= 2) {
    return { studyType: parts[0].trim() || line, area: parts.slice(1).join(' in ').trim() };
  }
  return { studyType: line, area: '' };
}

export function parseEducationBlock(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): EducationEntry | null {
  const texts = cleanBlockTexts(lines.map((l) => l.text), {}, vocab);
  if (texts.length === 0) return null;

  const dateLine = findDateLine(texts, vocab);
  const { start, end } = parseDateRange(dateLine, vocab);
  // A lone dated line ("Certificate in Marketing 2019") stays as the institution.
  const dropDateLine =
    dateLine !== '' && !looksLikeDegreeLine(dateLine, vocab) && (texts.length > 1 || isDateOnly(dateLine, vocab));
  const cleaned = dropDateLine ? texts.filter((t) => t !== dateLine) : texts;

  const institution = cleaned[0] ?? '';
  const degreeLine = cleaned[1] ?? '';
  const { studyType, area } = parseDegree(isDateOnly(degreeLine, vocab) ? '' : degreeLine);
  if (!institution && !studyType) return null;

  return { institution, studyType, area, startDate: start, endDate: end };
}

export function parseEducation(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): EducationEntry[] {
  const entries: EducationEntry[] = [];
  for (const block of splitEducationBlocks(lines, vocab)) {
    const entry = parseEducationBlock(block, vocab);
    if (entry) {
      entries.push(entry);
      continue;
    }
    // A date-only block dates the undated entry above it.
    const prev = entries[entries.length - 1];
    if (prev && !prev.startDate && !prev.endDate) {
      const { start, end } = parseDateRange(block.map((l) => l.text).join(' '), vocab);
      prev.startDate = start;
      prev.endDate = end;
    }
  }
  return entries;
}
