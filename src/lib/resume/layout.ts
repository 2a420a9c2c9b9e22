import type { PageTokens, ResumeLine, ResolvedParserOptions, WordToken } from '../../types/resume';

type LayoutOptions = Pick<ResolvedParserOptions, 'lineTolerance' | 'minColumnGap' | 'columnGapRatio'>;

export function medianOf(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

function centerY(token: WordToken): number {
  return (token.top + token.bottom) / 2;
}

export function computeGapThreshold(pageWidth: number, opts: LayoutOptions): number {
  const width = Number.isFinite(pageWidth) && pageWidth > 0 ? pageWidth : 0;
  return Math.max(opts.minColumnGap, width * opts.columnGapRatio);
}

export function clusterBands(tokens: WordToken[], tolerance: number): WordToken[][] {
  const usable = tokens.filter((t) => t.text.trim().length > 0);
  if (usable.length === 0) return [];

  const sorted = [...usable].sort((a, b) => centerY(a) - centerY(b) || a.left - b.left);

  const bands: WordToken[][] = [];
  let current: WordToken[] = [sorted[0]];
  let anchor = centerY(sorted[0]);

  for (let i = 1; i < sorted.length; i++) {
    const token = sorted[i];
    if (Math.abs(centerY(token) - anchor) <= tolerance) {
      current.push(token);
    } else {
      bands.push(current);
      current = [token];
      anchor = centerY(token);
    }
  }
  bands.push(current);

  return bands.map((band) => [...band].sort((a, b) => a.left - b.left));
}

function buildLine(tokens: WordToken[], page: number): ResumeLine {
  return {
    text: tokens.map((t) => t.text.trim()).join(' ').replace(/\s+/g, ' ').trim(),
    top: Math.min(...tokens.map((t) => t.top)),
    bottom: Math.max(...tokens.map((t) => t.bottom)),
    left: Math.min(...tokens.map((t) => t.left)),
    right: Math.max(...tokens.map((t) => t.right)),
    page,
  };
}

/**
 * Splits one left-to-right band wherever the horizontal gap between
 * neighbouring tokens exceeds `gapThreshold`, so a sidebar item sharing a
 * baseline with body text becomes its own line.
 */
export function splitBandByGap(band: WordToken[], gapThreshold: number, page: number): ResumeLine[] {
  if (band.length === 0) return [];

  const lines: ResumeLine[] = [];
  let current: WordToken[] = [band[0]];
  let lastRight = band[0].right;

  for (let i = 1; i < band.length; i++) {
    const token = band[i];
    if (token.left - lastRight > gapThreshold) {
      lines.push(buildLine(current, page));
      current = [token];
    } else {
      current.push(token);
    }
    lastRight = token.right;
  }
  lines.push(buildLine(current, page));

  return lines;
}

export function buildPageLines(page: PageTokens, opts: LayoutOptions): ResumeLine[] {
  const gap = computeGapThreshold(page.width, opts);
  return clusterBands(page.tokens, opts.lineTolerance).flatMap((band) =>
    splitBandByGap(band, gap, page.pageIndex)
  );
}

export function buildLines(pages: PageTokens[], opts: LayoutOptions): ResumeLine[] {
  return [...pages]
    .sort((a, b) => a.pageIndex - b.pageIndex)
    .flatMap((page) => buildPageLines(page, opts));
}
