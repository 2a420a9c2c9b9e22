import type { ColumnSide, ResolvedParserOptions, ResumeLine } from '../../types/resume';

type ColumnOptions = Pick<ResolvedParserOptions, 'minColumnLines' | 'minColumnSplitGap'>;

/**
 * Returns the x coordinate separating a two-column layout, or null.
 *
 * Short documents are always treated as single-column. Otherwise the largest
 * gap between sorted left edges is accepted when it exceeds
 * `minColumnSplitGap`, and the boundary is the midpoint of that gap.
 */
export function detectColumnSplit(lines: ResumeLine[], opts: ColumnOptions): number | null {
  if (lines.length < opts.minColumnLines || lines.length < 2) return null;

  const xs = lines.map((l) => l.left).sort((a, b) => a - b);
  let bestGap = 0;
  let bestIdx = 0;
  for (let i = 0; i < xs.length - 1; i++) {
    const gap = xs[i + 1] - xs[i];
    if (gap > bestGap) {
      bestGap = gap;
      bestIdx = i;
    }
  }

  if (bestGap <= opts.minColumnSplitGap) return null;
  return (xs[bestIdx] + xs[bestIdx + 1]) / 2;
}

export function columnOf(line: ResumeLine, split: number | null): ColumnSide {
  return split !== null && line.left > split ? 'right' : 'left';
}
