import type { CertificateEntry, ResumeLine, Vocabulary } from '../../../types/resume';
import { hasDateRange, isDateOnly, lookupMonth, parseDateRange } from '../dates';
import { cleanBlockTexts } from '../lineTraits';
import { DEFAULT_VOCABULARY } from '../vocabulary';

// A "Hobbies:" aside from the other column sometimes lands on a certificate line.
export function cleanupCertText(text: string): string {
  const cleaned = text.trim();
  const idx = cleaned.indexOf('Hobbies:');
  return idx >= 0 ? cleaned.slice(0, idx).trim() : cleaned;
}

export function isCertContinuationLine(text: string, currentName: string): boolean {
  const lowered = text.toLowerCase();
  if (lowered.startsWith('(') || lowered.startsWith('-')) return true;
  return currentName !== '' && lowered.includes('specialization');
}

// "Issued Mar 2021", "Mar 2021", "2019 - 2020" and "06/2020" date a
// certificate; "ITIL 2011" names the next one.
export function isIssueDateLine(text: string, vocab: Vocabulary = DEFAULT_VOCABULARY): boolean {
  if (!isDateOnly(text, vocab)) return false;
  if (/^issued\s/i.test(text) || hasDateRange(text, vocab)) return true;
  const words = text.trim().split(/\s+/);
  return words.length === 1 || lookupMonth(words[0], vocab) > 0;
}

export function parseCertifications(lines: ResumeLine[], vocab: Vocabulary = DEFAULT_VOCABULARY): CertificateEntry[] {
  const texts = cleanBlockTexts(lines.map((l) => l.text), {}, vocab);
  const entries: CertificateEntry[] = [];
  let current: CertificateEntry | null = null;

  for (const text of texts) {
    const cleaned = cleanupCertText(text);
    if (!cleaned) continue;

    if (current && isIssueDateLine(cleaned, vocab)) {
      const { start, end } = parseDateRange(cleaned, vocab);
      if (!current.date) current.date = start || end;
      continue;
    }
    if (current && isCertContinuationLine(cleaned, current.name)) {
      current.name = `${current.name} ${cleaned}`.trim();
      continue;
    }
    if (current) entries.push(current);
    current = { name: cleaned, issuer: '', date: '' };
  }
  if (current) entries.push(current);

  return entries;
}
