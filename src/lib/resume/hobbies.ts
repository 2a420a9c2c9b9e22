import type { Basics, InterestEntry, ResolvedParserOptions, ResumeLine } from '../../types/resume';
import { columnOf, detectColumnSplit } from './columns';

type MarkerOptions = Pick<ResolvedParserOptions, 'minColumnLines' | 'minColumnSplitGap'>;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * In two-column layouts a "Hobbies:" label can sit in one column while the
 * list it introduces is printed in the other. Returns the text of the closest
 * line at or below the label in the opposite column, or ''.
 */
export function findHobbiesMarker(lines: ResumeLine[], opts: MarkerOptions): string {
  const split = detectColumnSplit(lines, opts);
  if (split === null) return '';

  let bestText = '';
  let bestGap = Number.POSITIVE_INFINITY;
  for (const label of lines.filter((l) => l.text.toLowerCase().includes('hobbies:'))) {
    const side = columnOf(label, split);
    for (const line of lines) {
      if (line.page !== label.page || columnOf(line, split) === side || line.top < label.top) continue;
      const text = line.text.trim();
      if (!text || text.toLowerCase().includes('hobbies')) continue;
      const gap = line.top - label.top;
      if (gap < bestGap) {
        bestGap = gap;
        bestText = text;
      }
    }
  }
  return bestText;
}

function insertBefore(summary: string, needle: string, insert: string): string | null {
  const match = new RegExp(escapeRegExp(needle), 'i').exec(summary);
  if (!match) return null;
  return summary.slice(0, match.index) + insert + summary.slice(match.index);
}

export function addHobbiesToSummary(basics: Basics, interests: InterestEntry[], marker = ''): Basics {
  const summary = basics.summary.trim();
  if (!summary || /\bhobbies\b/i.test(summary)) return basics;
  if (interests.length === 0 && !marker) return basics;

  const names = interests.map((i) => i.name.trim()).filter(Boolean);
  if (names.length > 0) {
    const list = names.join(', ');
    const updated = insertBefore(summary, list, 'Hobbies: ') ?? `${summary} Hobbies: ${list}`;
    return { ...basics, summary: updated.trim() };
  }

  const updated = insertBefore(summary, marker, 'Hobbies: ') ?? summary;
  return { ...basics, summary: updated.trim() };
}
