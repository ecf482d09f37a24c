import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import pdf from 'pdf-parse';
import { ALLOWED_DOCUMENT_EXTS, PDF_EXT } from '../config/constants';
import { ProcessingError, ValidationError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';
import { PDF_INFO_SCHEMA } from '../schemas/pdf-info';

export interface LoadedDocument {
  path: string;
  name: string;
  /** Page texts. PDF pages keep their numbering, blank ones included. */
  pages: string[];
  companyName: string;
}

export const UNKNOWN_COMPANY = 'Unknown Company';

const NON_NAME_MARKERS = ['confidential', 'pitch deck', 'presentation'];
const MAX_NAME_LENGTH = 50;

function readFrontMatterTitle(text: string): string | undefined {
  const fm = text.match(/^---\r?\n([\s\S]*?)\r?\n---/);
  if (!fm || fm[1] === undefined) return undefined;
  const title = fm[1].match(/^title:\s*(.+)$/m);
  const value = title?.[1]?.trim().replace(/^["']|["']$/g, '');
  return value || undefined;
}

function stripFrontMatter(text: string): string {
  return text.replace(/^---\r?\n[\s\S]*?\r?\n---\r?\n?/, '');
}

/**
 * Best guess at the company a deck describes: a front-matter title, else
 * the first short line that is not boilerplate like "Confidential".
 */
export function guessCompanyName(text: string): string {
  const title = readFrontMatterTitle(text);
  if (title) return title;

  for (const rawLine of stripFrontMatter(text).split(/\r?\n|\f/)) {
    const line = rawLine.replace(/^#+\s*/, '').trim();
    if (!line || line.length >= MAX_NAME_LENGTH) continue;
    const lower = line.toLowerCase();
    if (NON_NAME_MARKERS.some((marker) => lower.includes(marker))) continue;
    return line;
  }
  return UNKNOWN_COMPANY;
}

export function splitPages(text: string): string[] {
  return stripFrontMatter(text)
    .split('\f')
    .map((page) => page.trim())
    .filter((page) => page.length > 0);
}

/**
 * Page-tagged text handed to the claim extractor.
 */
export function formatPagesForExtraction(pages: readonly string[]): string {
  return pages.map((page, i) => `=== PAGE ${i + 1} ===\n${page}`).join('\n\n');
}

// pdf-parse prefixes every rendered page with a blank line
const PDF_PAGE_SEPARATOR = '\n\n';

interface PdfPages {
  pages: string[];
  title?: string;
}

/**
 * Extracts per-page text from a PDF.
 *
 * A single pass is split on the separator pdf-parse puts before each page.
 * When that does not yield one chunk per rendered page (a page holding a
 * blank line of its own), pages are rendered one at a time instead.
 */
export async function readPdfPages(buffer: Buffer): Promise<PdfPages> {
  const parsed = await pdf(buffer);
  debug(`PDF parsed: ${parsed.numpages} page(s), ${parsed.text.length} chars`);

  let pages = parsed.text.split(PDF_PAGE_SEPARATOR).slice(1);
  if (pages.length !== parsed.numrender) {
    pages = [];
    let previous = '';
    for (let max = 1; max <= parsed.numrender; max++) {
      const { text } = await pdf(buffer, { max });
      pages.push(text.slice(previous.length + PDF_PAGE_SEPARATOR.length));
      previous = text;
    }
  }

  const info = PDF_INFO_SCHEMA.safeParse(parsed.info);
  const title = info.success ? info.data.Title?.trim() : undefined;
  return {
    pages: pages.map((page) => page.trim()),
    ...(title ? { title } : {}),
  };
}

async function loadPdf(fullPath: string): Promise<LoadedDocument> {
  let result: PdfPages;
  try {
    result = await readPdfPages(readFileSync(fullPath));
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing PDF');
    throw new ProcessingError(`Failed to parse PDF: ${err.message}`);
  }

  return {
    path: fullPath,
    name: path.basename(fullPath),
    pages: result.pages,
    companyName: result.title ?? guessCompanyName(result.pages[0] ?? ''),
  };
}

/**
 * Loads a deck from a PDF, or from a text/markdown export whose pages are
 * separated by form feeds.
 */
export async function loadDocument(filePath: string, cwd: string = process.cwd()): Promise<LoadedDocument> {
  const fullPath = path.resolve(cwd, filePath);
  const ext = path.extname(fullPath).toLowerCase();
  if (!ALLOWED_DOCUMENT_EXTS.has(ext)) {
    throw new ValidationError(
      `Unsupported document type "${ext || 'none'}" (supported: ${[...ALLOWED_DOCUMENT_EXTS].join(', ')}).`
    );
  }
  if (!existsSync(fullPath)) {
    throw new ProcessingError(`Document not found: ${fullPath}`);
  }

  if (ext === PDF_EXT) {
    return loadPdf(fullPath);
  }

  let text: string;
  try {
    text = readFileSync(fullPath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading document');
    throw new ProcessingError(`Failed to read document: ${err.message}`);
  }

  return {
    path: fullPath,
    name: path.basename(fullPath),
    pages: splitPages(text),
    companyName: guessCompanyName(text),
  };
}
