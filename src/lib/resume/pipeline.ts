import type {
  Basics,
  ParseProgress,
  ParserOptions,
  PageTokens,
  ResolvedParserOptions,
  Resume,
  ResumeLine,
  WorkEntry,
} from '../../types/resume';
import { splitExperienceBlocks } from './blocks';
import { addHobbiesToSummary, findHobbiesMarker } from './hobbies';
import { buildLines } from './layout';
import { resolveParserOptions } from './options';
import { parseBasics } from './parsers/basics';
import { parseCertifications } from './parsers/certifications';
import { parseEducation } from './parsers/education';
import { parseExperience, parseWorkBlock } from './parsers/experience';
import { parseInterests, parseLanguages, parseSkills } from './parsers/lists';
import { parseProjects, parseVolunteer } from './parsers/projects';
import { splitSections } from './sections';

function emit(options: ResolvedParserOptions, progress: ParseProgress) {
  options.onProgress?.(progress);
}

export function emptyBasics(): Basics {
  return { name: '', label: '', email: '', phone: '', location: '', profiles: [], summary: '' };
}

export function emptyResume(): Resume {
  return {
    basics: emptyBasics(),
    work: [],
    education: [],
    skills: [],
    certificates: [],
    projects: [],
    volunteer: [],
    languages: [],
    interests: [],
  };
}

function parseWork(lines: ResumeLine[], options: ResolvedParserOptions): WorkEntry[] {
  if (options.experienceStrategy === 'pivot') return parseExperience(lines, options.vocabulary);
  return splitExperienceBlocks(lines, options.vocabulary)
    .map((block) => parseWorkBlock(block, options.vocabulary))
    .filter((e): e is WorkEntry => e !== null);
}

/**
 * Runs the whole extraction over decoded pages. Never throws on a token
 * stream; a document with no text yields `emptyResume()`.
 */
export function parseResume(pages: PageTokens[], parserOptions: ParserOptions = {}): Resume {
  const options = resolveParserOptions(parserOptions);

  emit(options, { stage: 'LINES', message: 'Reconstructing lines', pct: 0 });
  const lines = buildLines(pages, options);
  if (lines.length === 0) {
    console.warn('[ResumeParser] No text lines reconstructed; returning an empty record');
    emit(options, { stage: 'ASSEMBLE', message: 'Done', pct: 100 });
    return emptyResume();
  }

  emit(options, { stage: 'SECTIONS', message: 'Classifying sections', pct: 25 });
  const sections = splitSections(lines, options);

  emit(options, { stage: 'ENTRIES', message: 'Parsing entries', pct: 50 });
  const vocab = options.vocabulary;
  const basics = parseBasics(lines, sections.about, options.headerScanLines, vocab);
  const work = parseWork(sections.experience, options);
  const education = parseEducation(sections.education, vocab);
  const skills = parseSkills(sections.skills);
  const certificates = parseCertifications(sections.certifications, vocab);
  const projects = parseProjects(sections.projects, options);
  const volunteer = parseVolunteer(sections.volunteer, options);
  const languages = parseLanguages(sections.languages);
  const interests = parseInterests(sections.interests);

  emit(options, { stage: 'ASSEMBLE', message: 'Assembling record', pct: 90 });
  const marker = findHobbiesMarker(lines, options);

  const resume: Resume = {
    basics: addHobbiesToSummary(basics, interests, marker),
    work,
    education,
    skills,
    certificates,
    projects,
    volunteer,
    languages,
    interests,
  };
  emit(options, { stage: 'ASSEMBLE', message: 'Done', pct: 100 });
  return resume;
}
