export type {
  Basics,
  CertificateEntry,
  EducationEntry,
  InterestEntry,
  LanguageEntry,
  PageTokens,
  ParseProgress,
  ParserOptions,
  ProfileLink,
  ProjectEntry,
  Resume,
  ResumeLine,
  ResumePdfResult,
  SectionKey,
  SectionMap,
  SkillEntry,
  VocabularyOverrides,
  VolunteerEntry,
  WordToken,
  WordTokenExtraction,
  WorkEntry,
} from '../../types/resume';

export { parseResume, emptyResume } from './pipeline';
export { extractWordTokens, parseResumePdf } from './extractWordTokens';
export { textItemsToWordTokens } from './wordTokens';
export type { PdfTextRun } from './wordTokens';
export { buildLines, buildPageLines, splitBandByGap } from './layout';
export { detectColumnSplit } from './columns';
export { splitSections, classifyHeading, looksLikeHeading } from './sections';
export { splitBlocks, splitExperienceBlocks, splitEducationBlocks } from './blocks';
export { normalizeDate, parseDateRange } from './dates';
export { tagLine, tagLines } from './lineTraits';
export { buildVocabulary, normalizeHeading } from './vocabulary';
export { DEFAULT_PARSER_OPTIONS, resolveParserOptions } from './options';
export { parseBasics } from './parsers/basics';
export { parseExperience, parseWorkBlock } from './parsers/experience';
export { parseEducation } from './parsers/education';
export { parseCertifications } from './parsers/certifications';
export { parseProjects, parseVolunteer } from './parsers/projects';
export { parseSkills, parseLanguages, parseInterests } from './parsers/lists';
export { findHobbiesMarker, addHobbiesToSummary } from './hobbies';
