import type { Stats } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { IngestionError } from '@doc-quiz/core';

export const SUPPORTED_EXTENSIONS = ['.md', '.markdown', '.txt', '.pdf'];

export interface SourceDocument {
  source: string;
  content: string;
}

/**
 * Reads every supported file named in `paths`, descending into directories.
 * Hidden entries and node_modules are skipped. A PDF yields one document per
 * page, sourced as `file.pdf#page=N`.
 */
export async function loadDocuments(paths: string[]): Promise<SourceDocument[]> {
  const documents: SourceDocument[] = [];

  for (const path of paths) {
    let info: Stats;
    try {
      info = await stat(path);
    } catch (error) {
      throw new IngestionError(`Cannot read ${path}: ${errorMessage(error)}`, path);
    }

    if (info.isDirectory()) {
      documents.push(...(await loadDocuments(await listDirectory(path))));
    } else if (info.isFile() && extname(path).toLowerCase() === '.pdf') {
      documents.push(...(await readPdfPages(path)));
    } else if (info.isFile() && isSupported(path)) {
      const content = await readFile(path, 'utf8');
      if (content.trim()) {
        documents.push({ source: path, content });
      }
    }
  }

  return documents;
}

async function readPdfPages(path: string): Promise<SourceDocument[]> {
  const data = new Uint8Array(await readFile(path));

  const pdf = await getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise.catch(
    (error: unknown) => {
      throw new IngestionError(`Cannot parse PDF ${path}: ${errorMessage(error)}`, path);
    }
  );

  try {
    const pages: SourceDocument[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const text = await page.getTextContent();
      const content = text.items
        .map(item => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
        .join('')
        .trim();
      if (content) {
        pages.push({ source: `${path}#page=${pageNumber}`, content });
      }
    }
    return pages;
  } finally {
    await pdf.destroy();
  }
}

async function listDirectory(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });

  return entries
    .filter(entry => !entry.name.startsWith('.') && entry.name !== 'node_modules')
    .map(entry => join(dir, entry.name))
    .sort();
}

function isSupported(path: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(extname(path).toLowerCase());
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
