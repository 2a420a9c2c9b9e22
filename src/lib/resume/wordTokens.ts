import type { WordToken } from '../../types/resume';

export interface PdfTextRun {
  str: string;
  transform: number[];
  width: number;
  height: number;
}

/**
 * Converts text runs (origin bottom-left, one run per styled span) into word
 * tokens with a top-left origin. A run's width is spread evenly over its
 * characters to place each word.
 */
export function textItemsToWordTokens(items: PdfTextRun[], pageIndex: number, pageHeight: number): WordToken[] {
  const tokens: WordToken[] = [];
  for (const item of items) {
    if (!item.str || !item.str.trim()) continue;

    const x = item.transform[4] ?? 0;
    const y = item.transform[5] ?? 0;
    const height = item.height > 0 ? item.height : Math.abs(item.transform[3] ?? 0);
    const charWidth = item.str.length > 0 ? item.width / item.str.length : 0;
    const top = pageHeight - (y + height);
    const bottom = pageHeight - y;

    for (const match of item.str.matchAll(/\S+/g)) {
      const offset = match.index ?? 0;
      const left = x + offset * charWidth;
      tokens.push({
        text: match[0],
        top,
        bottom,
        left,
        right: left + match[0].length * charWidth,
        page: pageIndex,
      });
    }
  }
  return tokens;
}
