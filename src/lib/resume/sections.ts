import type {
  ColumnSide,
  ColumnState,
  ResolvedParserOptions,
  ResumeLine,
  SectionKey,
  SectionMap,
  Vocabulary,
} from '../../types/resume';
import { columnOf, detectColumnSplit } from './columns';
import { isPageFooter } from './lineTraits';
import { DEFAULT_VOCABULARY, normalizeHeading } from './vocabulary';

type SectionOptions = Pick<ResolvedParserOptions, 'minColumnLines' | 'minColumnSplitGap' | 'vocabulary'>;

export function looksLikeHeading(text: string): boolean {
  if (text.length > 60) return false;
  if (/\d/.test(text)) return false;
  const words = text.trim().split(/\s+/).filter(Boolean);
  return words.length >= 1 && words.length <= 5;
}

export function classifyHeading(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): SectionKey | null {
  const section = vocab.headings.get(normalizeHeading(text));
  if (!section || !looksLikeHeading(text)) return null;
  return section;
}

export function emptySectionMap(): SectionMap {
  return {
    about: [],
    experience: [],
    education: [],
    skills: [],
    certifications: [],
    projects: [],
    volunteer: [],
    languages: [],
    interests: [],
  };
}

function transition(state: ColumnState, line: ResumeLine, vocab: Vocabulary): ColumnState {
  const section = classifyHeading(line.text, vocab);
  return section ? { status: 'active', section } : state;
}

/**
 * Assigns every line to a section. Each column keeps its own active section,
 * so a sidebar can hold "Skills" while the main column is in "Experience".
 * Lines seen before a column's first heading are dropped.
 */
export function splitSections(lines: ResumeLine[], opts: SectionOptions): SectionMap {
  const sections = emptySectionMap();
  const split = detectColumnSplit(lines, opts);
  const columns: Record<ColumnSide, ColumnState> = {
    left: { status: 'idle' },
    right: { status: 'idle' },
  };

  for (const line of lines) {
    if (isPageFooter(line.text)) continue;
    const side = columnOf(line, split);
    const before = columns[side];
    const after = transition(before, line, opts.vocabulary);
    if (after !== before) {
      columns[side] = after;
      continue;
    }
    if (before.status === 'active') sections[before.section].push(line);
  }

  return sections;
}
