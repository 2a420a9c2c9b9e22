import type { ProjectEntry, ResolvedParserOptions, ResumeLine, VolunteerEntry } from '../../../types/resume';
import { splitBlocks } from '../blocks';
import { findDateLine, isDateOnly, parseDateRange } from '../dates';
import { cleanBlockTexts } from '../lineTraits';
import { splitTitleCompany } from './experience';

type BlockParserOptions = Pick<ResolvedParserOptions, 'blockGapFactor' | 'vocabulary'>;

export function parseProjectBlock(lines: ResumeLine[], opts: BlockParserOptions): ProjectEntry | null {
  const texts = cleanBlockTexts(lines.map((l) => l.text), {}, opts.vocabulary);
  if (texts.length === 0) return null;
  const description = texts
    .slice(1)
    .filter((t) => !isDateOnly(t, opts.vocabulary))
    .join(' ')
    .trim();
  return { name: texts[0], description };
}

export function parseVolunteerBlock(lines: ResumeLine[], opts: BlockParserOptions): VolunteerEntry | null {
  const texts = cleanBlockTexts(lines.map((l) => l.text), { dropDuration: true, dropEmployment: true }, opts.vocabulary);
  if (texts.length === 0) return null;

  const dateLine = findDateLine(texts, opts.vocabulary);
  const { start, end } = parseDateRange(dateLine, opts.vocabulary);
  const cleaned = dateLine ? texts.filter((t) => t !== dateLine) : texts;
  if (cleaned.length === 0 && !start) return null;

  const { position, company, consumed } = splitTitleCompany(cleaned);
  return {
    organization: company,
    position,
    startDate: start,
    endDate: end,
    summary: cleaned.slice(consumed).join(' ').trim(),
  };
}

export function parseProjects(lines: ResumeLine[], opts: BlockParserOptions): ProjectEntry[] {
  return splitBlocks(lines, opts)
    .map((block) => parseProjectBlock(block, opts))
    .filter((e): e is ProjectEntry => e !== null);
}

export function parseVolunteer(lines: ResumeLine[], opts: BlockParserOptions): VolunteerEntry[] {
  return splitBlocks(lines, opts)
    .map((block) => parseVolunteerBlock(block, opts))
    .filter((e): e is VolunteerEntry => e !== null);
}
