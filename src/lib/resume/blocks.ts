import type { ResolvedParserOptions, ResumeLine, Vocabulary } from '../../types/resume';
import { hasDateRange } from './dates';
import { isBulletLine, isDurationLine, isLabelLine, isPageFooter } from './lineTraits';
import { medianOf } from './layout';
import { DEFAULT_VOCABULARY } from './vocabulary';

type BlockOptions = Pick<ResolvedParserOptions, 'blockGapFactor' | 'vocabulary'>;

const FALLBACK_LINE_HEIGHT = 10;

export function isContinuationBlock(block: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  const texts = block.map((l) => l.text.trim()).filter(Boolean);
  if (texts.length === 0) return false;

  const first = texts[0];
  if (first.toLowerCase().startsWith('achievements')) return true;
  if (isBulletLine(first)) return true;
  if (isPageFooter(first)) return true;

  const dated = texts.some((t) => hasDateRange(t, vocab));
  return !dated && texts.some((t) => isDurationLine(t, vocab));
}

/**
 * Gap-based segmentation: a new block starts when the vertical gap to the
 * previous line exceeds `blockGapFactor` median line heights. Blocks that read
 * as a continuation are folded back into their predecessor.
 */
export function splitBlocks(lines: ResumeLine[], opts: BlockOptions): ResumeLine[][] {
  if (lines.length === 0) return [];

  const heights = lines.filter((l) => l.bottom > l.top).map((l) => l.bottom - l.top);
  const threshold = (heights.length ? medianOf(heights) : FALLBACK_LINE_HEIGHT) * opts.blockGapFactor;

  const blocks: ResumeLine[][] = [];
  let current: ResumeLine[] = [lines[0]];
  let lastBottom = lines[0].bottom;

  for (const line of lines.slice(1)) {
    if (line.top - lastBottom > threshold) {
      blocks.push(current);
      current = [line];
    } else {
      current.push(line);
    }
    lastBottom = line.bottom;
  }
  blocks.push(current);

  const merged: ResumeLine[][] = [];
  for (const block of blocks) {
    if (merged.length > 0 && isContinuationBlock(block, opts.vocabulary)) {
      merged[merged.length - 1].push(...block);
    } else {
      merged.push([...block]);
    }
  }
  return merged;
}

function textAt(lines: ResumeLine[], idx: number): string {
  return idx >= 0 && idx < lines.length ? lines[idx].text.trim() : '';
}

export function isEntryStart(lines: ResumeLine[], idx: number, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  const text = textAt(lines, idx);
  if (!text || isLabelLine(text)) return false;
  if (isBulletLine(text) || isDurationLine(text, vocab)) return false;
  if (hasDateRange(text, vocab)) return false;
  if (text.length > 60) return false;

  const next = textAt(lines, idx + 1);
  if (isDurationLine(next, vocab)) return true;
  if (hasDateRange(next, vocab) && !isDurationLine(textAt(lines, idx - 1), vocab)) return true;

  if (idx + 2 < lines.length && hasDateRange(lines[idx + 2].text, vocab)) {
    return !isDurationLine(next, vocab) && !hasDateRange(next, vocab);
  }
  return false;
}

function isPositionOnlyStart(lines: ResumeLine[], idx: number, vocab: Vocabulary): boolean {
  if (hasDateRange(textAt(lines, idx), vocab)) return false;
  return hasDateRange(textAt(lines, idx + 1), vocab) && !isDurationLine(textAt(lines, idx - 1), vocab);
}

function isCompanyLine(lines: ResumeLine[], idx: number, vocab: Vocabulary): boolean {
  return isDurationLine(textAt(lines, idx + 1), vocab);
}

/**
 * Experience variant: entries open at an explicit entry start (a short,
 * undated, unbulleted line followed within two lines by a date range or a
 * duration). Two starts in a row ("Company / Role / dates") belong to one
 * entry. A role listed under an earlier company line ("Company / 5 yrs /
 * Role A / dates / Role B / dates") gets that company line copied in.
 */
export function splitExperienceBlocks(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): ResumeLine[][] {
  const cleaned = lines.filter((l) => !isPageFooter(l.text));
  const blocks: ResumeLine[][] = [];
  let current: ResumeLine[] = [];
  let lastCompany: ResumeLine | null = null;
  let prevWasStart = false;

  for (let idx = 0; idx < cleaned.length; idx++) {
    const line = cleaned[idx];
    const start = isEntryStart(cleaned, idx, vocab);
    if (start && !prevWasStart) {
      if (current.length) blocks.push(current);
      current = [];
      if (lastCompany && isPositionOnlyStart(cleaned, idx, vocab)) current.push(lastCompany);
    }
    prevWasStart = start;
    current.push(line);
    if (isCompanyLine(cleaned, idx, vocab)) lastCompany = line;
  }
  if (current.length) blocks.push(current);

  return blocks;
}

export function looksLikeDegreeLine(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  if (hasDateRange(text, vocab)) return true;
  if (/\(\d{4}/.test(text)) return true;
  const lowered = text.toLowerCase();
  return ['degree', 'bachelor', 'master', 'phd'].some((k) => lowered.includes(k));
}

export function isTrailingYearLine(text: string): boolean {
  return /^\d{4}\)?$/.test(text.trim());
}

/**
 * Education variant: an institution line plus an optional degree line. A
 * year that wrapped onto its own line ("2016)") is folded into the degree
 * line's text.
 */
export function splitEducationBlocks(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): ResumeLine[][] {
  const cleaned = lines.filter((l) => !isPageFooter(l.text));
  const blocks: ResumeLine[][] = [];

  let i = 0;
  while (i < cleaned.length) {
    if (!cleaned[i].text.trim()) {
      i++;
      continue;
    }
    const block = [cleaned[i]];
    const next = cleaned[i + 1];
    if (next && looksLikeDegreeLine(next.text.trim(), vocab)) {
      const trailing = cleaned[i + 2];
      if (trailing && isTrailingYearLine(trailing.text)) {
        block.push({ ...next, text: `${next.text} ${trailing.text}`.trim() });
        i += 2;
      } else {
        block.push(next);
        i += 1;
      }
    }
    blocks.push(block);
    i++;
  }

  return blocks;
}
