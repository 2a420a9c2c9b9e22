import type { InterestEntry, LanguageEntry, ResumeLine, SkillEntry } from '../../../types/resume';
import { isNoiseLine } from '../lineTraits';

const LIST_DELIMITERS = /[•·,;|]/;

export function isTitleToken(token: string): boolean {
  if (token.startsWith('.') && token.length > 1) return true;
  if (token === token.toUpperCase() && token !== token.toLowerCase()) return true;
  return /^\p{Lu}/u.test(token);
}

export function dedupeNames(parts: string[]): SkillEntry[] {
  const seen = new Set<string>();
  const out: SkillEntry[] = [];
  for (const part of parts) {
    const name = part.trim();
    if (!name) continue;
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ name });
  }
  return out;
}

/**
 * Skills are either delimited ("Python, SQL | Go") or printed one per line.
 * A line of three or more capitalized tokens with no delimiter is a wrapped
 * list ("Kubernetes Terraform AWS") and is split into words.
 */
export function parseSkills(lines: ResumeLine[]): SkillEntry[] {
  const text = lines.map((l) => l.text).join(' ').trim();
  if (!text) return [];
  if (LIST_DELIMITERS.test(text)) return dedupeNames(text.split(LIST_DELIMITERS));

  const parts: string[] = [];
  for (const line of lines) {
    const lineText = line.text.trim();
    if (!lineText) continue;
    const tokens = lineText.split(/\s+/);
    if (tokens.length >= 3 && tokens.every(isTitleToken)) parts.push(...tokens);
    else parts.push(lineText);
  }
  return dedupeNames(parts);
}

export function parseLanguages(lines: ResumeLine[]): LanguageEntry[] {
  const items: LanguageEntry[] = [];
  for (const line of lines) {
    const text = line.text.trim();
    if (!text || isNoiseLine(text)) continue;
    const match = /^(.+?)\s*\(([^)]+)\)$/.exec(text);
    if (match) items.push({ language: match[1].trim(), fluency: match[2].trim() });
    else items.push({ language: text, fluency: '' });
  }
  return items;
}

export function parseInterests(lines: ResumeLine[]): InterestEntry[] {
  const text = lines
    .map((l) => l.text)
    .filter((t) => !isNoiseLine(t))
    .join(' ');
  return text
    .split(/[•·,;|]/)
    .map((part) => part.trim())
    .filter(Boolean)
    .map((name) => ({ name }));
}
