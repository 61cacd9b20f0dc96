/**
 * Corpus Loader
 * =============
 *
 * Finds reference documents on disk and extracts their text.
 *
 * Supported formats:
 * - Plain text (.txt, .md), read as UTF-8
 * - PDF, via the pdfjs-dist legacy build
 */

import type { Stats } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { dirname, extname, relative, resolve, sep } from 'node:path';
import type { MetricsCollector } from '../infra/metrics.js';
import { ConfigError, CorpusReadError, errnoCode } from './errors.js';
import type { CorpusDocument, DocumentType } from './types.js';

// =============================================================================
// Extractors
// =============================================================================

/**
 * Turns one file into plain text.
 */
export interface TextExtractor {
  supports(path: string): boolean;
  extract(path: string): Promise<string>;
}

/**
 * UTF-8 text and Markdown files.
 */
export class PlainTextExtractor implements TextExtractor {
  private readonly extensions: ReadonlySet<string>;

  constructor(extensions: readonly string[] = ['.txt', '.md']) {
    this.extensions = new Set(extensions.map((e) => e.toLowerCase()));
  }

  supports(path: string): boolean {
    return this.extensions.has(extname(path).toLowerCase());
  }

  async extract(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }
}

/**
 * PDF text layer, one line per page.
 */
export class PdfTextExtractor implements TextExtractor {
  supports(path: string): boolean {
    return extname(path).toLowerCase() === '.pdf';
  }

  async extract(path: string): Promise<string> {
    const data = new Uint8Array(await readFile(path));

    // Loaded lazily: most corpora are plain text
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const doc = await pdfjs.getDocument({ data, isEvalSupported: false }).promise;

    try {
      const pages: string[] = [];
      for (let pageNum = 1; pageNum <= doc.numPages; pageNum++) {
        const page = await doc.getPage(pageNum);
        const content = await page.getTextContent();
        pages.push(
          content.items
            .map((item) => ('str' in item ? item.str : ''))
            .join(' ')
        );
      }
      return pages.join('\n');
    } finally {
      await doc.destroy();
    }
  }
}

export const DEFAULT_EXTRACTORS: readonly TextExtractor[] = [
  new PlainTextExtractor(),
  new PdfTextExtractor(),
];

// =============================================================================
// Discovery
// =============================================================================

/**
 * A corpus file and the directory its document id is relative to.
 */
export interface CorpusFile {
  path: string;
  base: string;
}

/**
 * Expand corpus paths into a sorted list of files.
 * Files are taken as given; directories are walked for supported extensions.
 */
export async function discoverCorpusFiles(
  paths: readonly string[],
  extractors: readonly TextExtractor[] = DEFAULT_EXTRACTORS
): Promise<CorpusFile[]> {
  const found = new Map<string, CorpusFile>();
  const supported = (path: string): boolean => extractors.some((e) => e.supports(path));

  async function walkDir(dir: string, base: string): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      throw new CorpusReadError(dir, `Cannot list directory: ${dir}`, { cause: error });
    }

    for (const entry of entries) {
      const full = resolve(dir, entry);
      let info: Stats;
      try {
        info = await stat(full);
      } catch (error) {
        // Includes symlinks whose target is gone
        throw new CorpusReadError(full, `Cannot read corpus entry: ${full}`, { cause: error });
      }
      if (info.isDirectory()) {
        await walkDir(full, base);
      } else if (info.isFile() && supported(full) && !found.has(full)) {
        found.set(full, { path: full, base });
      }
    }
  }

  for (const input of paths) {
    const abs = resolve(input);
    let info: Stats;
    try {
      info = await stat(abs);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new ConfigError('corpus', `Corpus path not found: ${input}`);
      }
      throw new CorpusReadError(abs, `Cannot stat corpus path: ${input}`, { cause: error });
    }

    if (info.isDirectory()) {
      await walkDir(abs, abs);
    } else if (!found.has(abs)) {
      found.set(abs, { path: abs, base: dirname(abs) });
    }
  }

  return [...found.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Infer the document type from a file name or relative path.
 * Matches the whole tokens "opord" and "mfr", case-insensitive.
 */
export function inferDocumentType(name: string): DocumentType {
  const tokens = name.toLowerCase().split(/[^a-z]+/);
  if (tokens.includes('opord')) return 'OPORD';
  if (tokens.includes('mfr')) return 'MFR';
  return 'UNSPECIFIED';
}

/**
 * Document id: path relative to its base, without extension, '/'-separated.
 */
export function documentIdFor(file: CorpusFile): string {
  const rel = relative(file.base, file.path);
  const withoutExt = rel.slice(0, rel.length - extname(rel).length);
  return withoutExt.split(sep).join('/');
}

// =============================================================================
// Loading
// =============================================================================

export interface LoadCorpusOptions {
  /**
   * Tag every document with this type instead of inferring from the file name.
   */
  document_type?: DocumentType;

  extractors?: readonly TextExtractor[];

  logger?: MetricsCollector;
}

/**
 * Discover and extract every document under the given paths.
 * Blank documents are skipped with a warning.
 */
export async function loadCorpus(
  paths: readonly string[],
  options: LoadCorpusOptions = {}
): Promise<CorpusDocument[]> {
  const extractors = options.extractors ?? DEFAULT_EXTRACTORS;
  const files = await discoverCorpusFiles(paths, extractors);
  const documents: CorpusDocument[] = [];

  for (const file of files) {
    const extractor = extractors.find((e) => e.supports(file.path));
    if (!extractor) {
      throw new CorpusReadError(file.path, `No text extractor for ${file.path}`);
    }

    let text: string;
    try {
      text = await extractor.extract(file.path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CorpusReadError(file.path, `Failed to extract ${file.path}: ${message}`, { cause: error });
    }

    const document_id = documentIdFor(file);
    if (text.trim().length === 0) {
      options.logger?.warn('Skipping blank document', { document_id, path: file.path });
      continue;
    }

    documents.push({
      document_id,
      text,
      document_type: options.document_type ?? inferDocumentType(document_id),
      source_path: file.path,
    });
  }

  options.logger?.info('Corpus loaded', { files: files.length, documents: documents.length });
  return documents;
}
