import type { Basics, ProfileLink, ResumeLine, Vocabulary } from '../../../types/resume';
import { hasDateRange } from '../dates';
import { isNoiseLine } from '../lineTraits';
import { DEFAULT_VOCABULARY } from '../vocabulary';

export const EMAIL_RE = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;
const URL_RE = /https?:\/\/\S+|www\.\S+|linkedin\.com\/\S+|github\.com\/\S+|gitlab\.com\/\S+/gi;
const PHONE_RE = /(?:\+?\d{1,3}[\s.-]?)?(?:\(?\d{2,3}\)?[\s.-]?)?\d{3}[\s.-]?\d{4}/;
const LINKEDIN_HANDLE_RE = /(\S+)\s*\(LinkedIn\)/i;
const LINK_LABEL_RE = /\((?:LinkedIn|Personal|Company|Portfolio|Blog|Other)\)/i;

function hasUrl(text: string): boolean {
  return new RegExp(URL_RE.source, 'i').test(text);
}

function isContactLike(text: string): boolean {
  return EMAIL_RE.test(text) || hasUrl(text) || PHONE_RE.test(text) || LINK_LABEL_RE.test(text);
}

export function stripContactPrefix(text: string): string {
  return /^contact\s+/i.test(text) ? text.replace(/^contact\s+/i, '').trim() : text;
}

export function isLocationText(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  if (text.length > 60) return false;
  if (text.includes(',')) return true;
  const lowered = text.toLowerCase();
  return vocab.locationKeywords.some((k) => lowered.includes(k));
}

export function pickNameLabel(
  lines: ResumeLine[],
  scanLines: number,
  vocab: Vocabulary = DEFAULT_VOCABULARY
): { name: string; label: string } {
  let name = '';
  let label = '';
  for (const line of lines.slice(0, scanLines)) {
    const text = stripContactPrefix(line.text.trim());
    if (!text || isNoiseLine(text) || isContactLike(text)) continue;
    if (!name) {
      name = text;
      continue;
    }
    if (!isLocationText(text, vocab)) {
      label = text;
      break;
    }
  }
  return { name, label };
}

export function findLocation(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): string {
  for (const line of lines) {
    const text = line.text.trim();
    if (isLocationText(text, vocab) && !EMAIL_RE.test(text)) return text;
    if (text.toLowerCase().includes(' area')) return text;
  }
  return '';
}

// Date ranges written without spaces ("2019-2021") also fit the phone shape.
export function findPhone(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): string {
  for (const line of lines) {
    const text = line.text.trim();
    const lowered = text.toLowerCase();
    if (lowered.includes('linkedin') || lowered.includes('github') || hasUrl(text)) continue;
    if (hasDateRange(text, vocab)) continue;
    const match = PHONE_RE.exec(text);
    if (!match) continue;
    if (match[0].replace(/\D/g, '').length < 7) continue;
    return match[0].trim();
  }
  return '';
}

/**
 * Recovers a LinkedIn handle printed as "handle (LinkedIn)". When the line
 * above ends with a URL cut at a hyphen, the handle completes that URL.
 */
export function extractLinkedinFromLines(lines: ResumeLine[]): string {
  for (let i = 0; i < lines.length; i++) {
    const match = LINKEDIN_HANDLE_RE.exec(lines[i].text);
    if (!match) continue;
    const handle = match[1].trim();
    if (!handle || handle.toLowerCase().includes('linkedin.com')) continue;

    const prev = i > 0 ? lines[i - 1].text.trim() : '';
    const wrapped = /(?:https?:\/\/)?(?:www\.)?linkedin\.com\/in\/\S*-$/i.exec(prev);
    if (wrapped) {
      const head = wrapped[0].replace(/^(?:https?:\/\/)?(?:www\.)?/i, '');
      return `https://www.${head}${handle}`;
    }
    return `https://www.linkedin.com/in/${handle}`;
  }
  return '';
}

export function networkOf(url: string): string {
  const lower = url.toLowerCase();
  if (lower.includes('linkedin.com')) return 'LinkedIn';
  if (lower.includes('github.com')) return 'GitHub';
  if (lower.includes('twitter.com') || /(?:^|[/.])x\.com/.test(lower)) return 'Twitter';
  return 'Website';
}

function isTruncated(url: string): boolean {
  return url.replace(/\/+$/, '').endsWith('-');
}

// "https://www.linkedin.com/in/jd/" and "linkedin.com/in/jd" are one profile.
function profileKey(url: string): string {
  return url
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/^www\./, '')
    .replace(/\/+$/, '');
}

export function buildProfiles(urls: string[], lines: ResumeLine[]): ProfileLink[] {
  const collected = urls.map((u) => u.replace(/[).,]+$/, '')).filter(Boolean);
  const extra = extractLinkedinFromLines(lines);
  if (extra) collected.push(extra);

  const hasFullLinkedin = collected.some(
    (u) => u.toLowerCase().includes('linkedin.com/in/') && !isTruncated(u)
  );

  const seen = new Set<string>();
  const profiles: ProfileLink[] = [];
  for (const url of collected) {
    const lower = url.toLowerCase();
    if (hasFullLinkedin && lower.includes('linkedin.com/in')) {
      if (isTruncated(url)) continue;
      if (lower.endsWith('/in') || lower.endsWith('/in/')) continue;
    }
    const network = networkOf(url);
    const key = `${network.toLowerCase()}::${profileKey(url)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    profiles.push({ network, url });
  }
  return profiles;
}

export function parseBasics(
  lines: ResumeLine[],
  aboutLines: ResumeLine[],
  scanLines: number,
  vocab: Vocabulary = DEFAULT_VOCABULARY
): Basics {
  const allText = lines.map((l) => l.text).join('\n');
  const { name, label } = pickNameLabel(lines, scanLines, vocab);
  const email = EMAIL_RE.exec(allText);

  return {
    name,
    label,
    email: email ? email[0] : '',
    phone: findPhone(lines, vocab),
    location: findLocation(lines.slice(0, scanLines), vocab),
    profiles: buildProfiles(allText.match(URL_RE) ?? [], lines),
    summary: aboutLines
      .map((l) => l.text.trim())
      .filter((t) => t && !isNoiseLine(t))
      .join(' ')
      .trim(),
  };
}
