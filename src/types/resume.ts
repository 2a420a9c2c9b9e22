export interface WordToken {
  text: string;
  top: number;
  bottom: number;
  left: number;
  right: number;
  page: number;
}

export interface PageTokens {
  pageIndex: number;
  width: number;
  tokens: WordToken[];
}

export interface ResumeLine {
  text: string;
  top: number;
  bottom: number;
  left: number;
  right: number;
  page: number;
}

export type SectionKey =
  | 'about'
  | 'experience'
  | 'education'
  | 'skills'
  | 'certifications'
  | 'projects'
  | 'volunteer'
  | 'languages'
  | 'interests';

export const SECTION_KEYS: readonly SectionKey[] = [
  'about',
  'experience',
  'education',
  'skills',
  'certifications',
  'projects',
  'volunteer',
  'languages',
  'interests',
];

export type SectionMap = Record<SectionKey, ResumeLine[]>;

export type ColumnSide = 'left' | 'right';

export type ColumnState = { status: 'idle' } | { status: 'active'; section: SectionKey };

export type LineKind =
  | 'footer'
  | 'noise'
  | 'label'
  | 'dateRange'
  | 'bullet'
  | 'duration'
  | 'plain';

export interface LineTraits {
  text: string;
  kind: LineKind;
  bullet: boolean;
  dateRange: boolean;
  duration: boolean;
  employment: boolean;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface ProfileLink {
  network: string;
  url: string;
}

export interface Basics {
  name: string;
  label: string;
  email: string;
  phone: string;
  location: string;
  profiles: ProfileLink[];
  summary: string;
}

export interface WorkEntry {
  name: string;
  position: string;
  location: string;
  startDate: string;
  endDate: string;
  summary: string;
  highlights: string[];
}

export interface EducationEntry {
  institution: string;
  studyType: string;
  area: string;
  startDate: string;
  endDate: string;
}

export interface CertificateEntry {
  name: string;
  issuer: string;
  date: string;
}

export interface ProjectEntry {
  name: string;
  description: string;
}

export interface VolunteerEntry {
  organization: string;
  position: string;
  startDate: string;
  endDate: string;
  summary: string;
}

export interface SkillEntry {
  name: string;
}

export interface LanguageEntry {
  language: string;
  fluency: string;
}

export interface InterestEntry {
  name: string;
}

export interface Resume {
  basics: Basics;
  work: WorkEntry[];
  education: EducationEntry[];
  skills: SkillEntry[];
  certificates: CertificateEntry[];
  projects: ProjectEntry[];
  volunteer: VolunteerEntry[];
  languages: LanguageEntry[];
  interests: InterestEntry[];
}

export interface Vocabulary {
  headings: Map<string, SectionKey>;
  months: Map<string, number>;
  monthPrefixes: Map<string, number>;
  openEnded: string[];
  locationKeywords: string[];
  durationUnits: string[];
}

export interface VocabularyOverrides {
  headings?: Partial<Record<SectionKey, string[]>>;
  months?: Record<string, number>;
  openEnded?: string[];
  locationKeywords?: string[];
  durationUnits?: string[];
}

export type ParseStage = 'LINES' | 'SECTIONS' | 'ENTRIES' | 'ASSEMBLE';

export interface ParseProgress {
  stage: ParseStage;
  message: string;
  pct: number;
}

export type ExperienceStrategy = 'pivot' | 'blocks';

export interface ParserOptions {
  lineTolerance?: number;
  minColumnGap?: number;
  columnGapRatio?: number;
  minColumnLines?: number;
  minColumnSplitGap?: number;
  blockGapFactor?: number;
  headerScanLines?: number;
  experienceStrategy?: ExperienceStrategy;
  vocabulary?: VocabularyOverrides;
  onProgress?: (progress: ParseProgress) => void;
}

export interface ResolvedParserOptions {
  lineTolerance: number;
  minColumnGap: number;
  columnGapRatio: number;
  minColumnLines: number;
  minColumnSplitGap: number;
  blockGapFactor: number;
  headerScanLines: number;
  experienceStrategy: ExperienceStrategy;
  vocabulary: Vocabulary;
  onProgress?: (progress: ParseProgress) => void;
}

export interface ResumePdfResult {
  resume: Resume;
  pageCount: number;
  warnings: string[];
}

export interface WordTokenExtraction {
  pages: PageTokens[];
  pageCount: number;
  warnings: string[];
}
