import type { ParserOptions, ResolvedParserOptions } from '../../types/resume';
import { DEFAULT_VOCABULARY, buildVocabulary } from './vocabulary';

export const DEFAULT_PARSER_OPTIONS: ResolvedParserOptions = {
  lineTolerance: 2.5,
  minColumnGap: 30,
  columnGapRatio: 0.08,
  minColumnLines: 40,
  minColumnSplitGap: 80,
  blockGapFactor: 1.8,
  headerScanLines: 12,
  experienceStrategy: 'pivot',
  vocabulary: DEFAULT_VOCABULARY,
};

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function resolveParserOptions(options: ParserOptions = {}): ResolvedParserOptions {
  const d = DEFAULT_PARSER_OPTIONS;
  return {
    lineTolerance: positive(options.lineTolerance, d.lineTolerance),
    minColumnGap: positive(options.minColumnGap, d.minColumnGap),
    columnGapRatio: positive(options.columnGapRatio, d.columnGapRatio),
    minColumnLines: positive(options.minColumnLines, d.minColumnLines),
    minColumnSplitGap: positive(options.minColumnSplitGap, d.minColumnSplitGap),
    blockGapFactor: positive(options.blockGapFactor, d.blockGapFactor),
    headerScanLines: Math.floor(positive(options.headerScanLines, d.headerScanLines)),
    experienceStrategy: options.experienceStrategy === 'blocks' ? 'blocks' : 'pivot',
    vocabulary: options.vocabulary ? buildVocabulary(options.vocabulary) : DEFAULT_VOCABULARY,
    onProgress: options.onProgress,
  };
}
