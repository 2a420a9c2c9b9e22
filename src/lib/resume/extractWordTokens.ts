import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem } from 'pdfjs-dist/types/src/display/api';
import type { PageTokens, ParserOptions, ResumePdfResult, WordTokenExtraction } from '../../types/resume';
import { parseResume } from './pipeline';
import { textItemsToWordTokens } from './wordTokens';

function isTextRun(item: unknown): item is TextItem {
  return typeof item === 'object' && item !== null && 'str' in item && 'transform' in item;
}

export async function extractWordTokens(data: Uint8Array): Promise<WordTokenExtraction> {
  const warnings: string[] = [];

  let pdf;
  try {
    pdf = await getDocument({ data, isEvalSupported: false }).promise;
  } catch (err) {
    const msg = String(err);
    if (msg.includes('password') || msg.includes('encrypted')) {
      throw new Error('This PDF appears to be password-protected. Remove the password and try again.', {
        cause: err,
      });
    }
    throw new Error(`PDF processing failed: ${msg}`, { cause: err });
  }

  const pages: PageTokens[] = [];
  for (let i = 1; i <= pdf.numPages; i++) {
    try {
      const page = await pdf.getPage(i);
      const viewport = page.getViewport({ scale: 1 });
      const content = await page.getTextContent();
      const runs = content.items.filter(isTextRun);
      pages.push({
        pageIndex: i - 1,
        width: viewport.width,
        tokens: textItemsToWordTokens(runs, i - 1, viewport.height),
      });
    } catch (pageErr) {
      console.warn(`[ResumePdf] Could not extract text from page ${i}:`, pageErr);
      warnings.push(`Could not extract text from page ${i}: ${String(pageErr)}`);
      pages.push({ pageIndex: i - 1, width: 0, tokens: [] });
    }
  }

  const pageCount = pdf.numPages;
  await pdf.destroy();

  if (pages.every((p) => p.tokens.length === 0)) {
    warnings.push('No text could be extracted. The PDF may be image-based (scanned).');
  }

  return { pages, pageCount, warnings };
}

export async function parseResumePdf(data: Uint8Array, options: ParserOptions = {}): Promise<ResumePdfResult> {
  const { pages, pageCount, warnings } = await extractWordTokens(data);
  return { resume: parseResume(pages, options), pageCount, warnings };
}
