import * as path from 'node:path';
import { ConcordanceRule, applyConcordance } from './concordance.js';
import { createIndex, IndexOptions, IndexResult } from './indexer.js';
import { convertLatexIndexCommands } from './latex.js';

export interface ConvertOptions extends IndexOptions {
  /** Convert `\index{…}` commands first */
  latex?: boolean;
  /** Mark concordance terms before indexing */
  concordance?: readonly ConcordanceRule[];
  log?: (message: string) => void;
}

export interface ConvertResult extends IndexResult {
  latexConverted: number;
  concordanceMarked: number;
  /** Concordance matches that could not be marked in place */
  concordanceSkipped: number;
}

/**
 * Run the preprocessors, then index the document.
 */
export function convertDocument(source: string, options: ConvertOptions = {}): ConvertResult {
  let text = source;
  let latexConverted = 0;
  let concordanceMarked = 0;
  let concordanceSkipped = 0;

  if (options.latex) {
    const latex = convertLatexIndexCommands(text, options.log);
    text = latex.text;
    latexConverted = latex.converted;
  }
  if (options.concordance) {
    const concordance = applyConcordance(text, options.concordance);
    text = concordance.text;
    concordanceMarked = concordance.marked;
    concordanceSkipped = concordance.skipped;
  }

  const result = createIndex(text, options);
  return { ...result, latexConverted, concordanceMarked, concordanceSkipped };
}

/**
 * `notes/book.md` -> `notes/book-converted.md`
 */
export function convertedPath(file: string): string {
  const { dir, name, ext } = path.parse(file);
  return path.join(dir, `${name}-converted${ext}`);
}
