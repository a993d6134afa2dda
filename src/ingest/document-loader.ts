/**
 * Reads text, markdown, PDF and Word (.docx) files into documents.
 *
 * PDF text comes from pdfjs-dist, page by page; DOCX text from mammoth's raw
 * text extraction.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import mammoth from 'mammoth';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { Document } from './types.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('document-loader');

/** Extension (lowercase, with dot) to document type. */
const SUPPORTED_TYPES: Record<string, string> = {
  '.txt': 'txt',
  '.md': 'md',
  '.markdown': 'md',
  '.pdf': 'pdf',
  '.docx': 'docx',
};

interface ExtractedText {
  text: string;
  title?: string;
  author?: string;
}

export function isSupportedFile(path: string): boolean {
  return extname(path).toLowerCase() in SUPPORTED_TYPES;
}

/**
 * Stable document id for a file path.
 */
export function documentIdForPath(path: string): string {
  return createHash('sha256').update(resolve(path)).digest('hex').slice(0, 16);
}

/**
 * First markdown heading in the text.
 */
export function extractTitle(text: string): string | undefined {
  const match = /^#{1,6}\s+(.+?)\s*#*\s*$/m.exec(text);
  return match?.[1];
}

function stringField(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Text of every page, pages separated by a blank line, plus the title and
 * author from the document information dictionary.
 */
export async function extractPdfText(data: Uint8Array): Promise<ExtractedText> {
  const pdf = await getDocument({ data, verbosity: 0 }).promise;
  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      pages.push(
        content.items
          .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
          .join('')
          .trim(),
      );
    }

    const { info } = await pdf.getMetadata();
    return {
      text: pages.filter(Boolean).join('\n\n'),
      title: stringField(info, 'Title'),
      author: stringField(info, 'Author'),
    };
  } finally {
    await pdf.destroy();
  }
}

export async function extractDocxText(path: string): Promise<ExtractedText> {
  const result = await mammoth.extractRawText({ path });
  return { text: result.value.trim() };
}

async function extractText(path: string, type: string): Promise<ExtractedText> {
  switch (type) {
    case 'pdf':
      return extractPdfText(new Uint8Array(await readFile(path)));
    case 'docx':
      return extractDocxText(path);
    case 'md': {
      const text = await readFile(path, 'utf-8');
      return { text, title: extractTitle(text) };
    }
    default:
      return { text: await readFile(path, 'utf-8') };
  }
}

/**
 * Load a single file.
 *
 * @throws ValidationError for unsupported extensions
 */
export async function loadDocument(path: string): Promise<Document> {
  const extension = extname(path).toLowerCase();
  const type = SUPPORTED_TYPES[extension];
  if (type === undefined) {
    throw new ValidationError(
      `Unsupported file type "${extension || '(none)'}" for ${path}. Supported: ${Object.keys(SUPPORTED_TYPES).join(', ')}`,
      'UNSUPPORTED_FILE_TYPE',
    );
  }

  const [extracted, stats] = await Promise.all([extractText(path, type), stat(path)]);
  const filename = basename(path);

  log.debug(`Loaded ${filename}`, { type, bytes: stats.size, chars: extracted.text.length });

  return {
    id: documentIdForPath(path),
    text: extracted.text,
    type,
    title: extracted.title,
    author: extracted.author,
    filename,
    metadata: {
      fileSize: stats.size,
      filePath: resolve(path),
      fileModified: stats.mtime.toISOString(),
    },
  };
}
