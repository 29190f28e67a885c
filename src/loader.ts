import * as fs from 'node:fs';
import * as path from 'node:path';
import { PartialIndexConfig } from './config.js';
import { IndexError } from './errors.js';
import { createIndex, IndexResult } from './indexer.js';

/**
 * Options for loading content files
 */
export interface LoadOptions {
  /** Directory to scan for .md files */
  contentDir: string;
  /** Whether to include _*.md files (default: false) */
  includeMetadata?: boolean;
  /** Settings applied to every document */
  config?: PartialIndexConfig;
}

/**
 * One loaded document and the outcome of indexing it
 */
export interface LoadedDocument {
  documentId: string;
  /** Raw annotated source */
  source: string;
  /** Present when indexing succeeded */
  result?: IndexResult;
  /** Present when the document has a fatal error */
  error?: IndexError;
}

/**
 * Result of loading all content files
 */
export interface LoadResult {
  documents: Map<string, LoadedDocument>;
  /** Fatal errors and unreadable files, prefixed with the document ID */
  errors: string[];
  /** Non-fatal warnings, prefixed with the document ID */
  warnings: string[];
}

/**
 * Check if a filename is a metadata file (starts with _)
 */
function isMetadataFile(filename: string): boolean {
  return path.basename(filename).startsWith('_');
}

/**
 * Find all markdown files in a directory (non-recursive), sorted by name
 */
function findMarkdownFiles(dir: string, includeMetadata: boolean): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.endsWith('.md'))
    .filter(entry => includeMetadata || !isMetadataFile(entry.name))
    .map(entry => path.join(dir, entry.name))
    .sort();
}

/**
 * Load and index every markdown file in a directory. A document with a
 * fatal error is kept (with its error) so it can still be listed.
 */
export function loadContent(options: LoadOptions): LoadResult {
  const { contentDir, includeMetadata = false, config } = options;

  const documents = new Map<string, LoadedDocument>();
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const filePath of findMarkdownFiles(contentDir, includeMetadata)) {
    const documentId = path.basename(filePath);

    let source: string;
    try {
      source = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      errors.push(`Failed to read ${documentId}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    try {
      const result = createIndex(source, { config });
      documents.set(documentId, { documentId, source, result });
      for (const warning of result.warnings) {
        warnings.push(`${documentId}: ${warning.message}`);
      }
    } catch (err) {
      if (!(err instanceof IndexError)) {
        throw err;
      }
      documents.set(documentId, { documentId, source, error: err });
      errors.push(`${documentId}: ${err.message}`);
    }
  }

  return { documents, errors, warnings };
}
