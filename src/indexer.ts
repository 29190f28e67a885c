import { applyOptionString, IndexConfig, PartialIndexConfig, resolveConfig } from './config.js';
import { IndexWarning } from './errors.js';
import { buildRenderedIndex } from './index-renderer.js';
import { assignLocators, compressAll, createContiguity, LocatorOptions, PageContiguity, PageSource } from './locators.js';
import { serializeIndexHtml } from './renderer.js';
import { DocumentResolver } from './resolver.js';
import { findPlaceholder, rewriteDocument } from './rewriter.js';
import { scanDocument } from './scanner.js';
import { RenderedIndex } from './types.js';

export * from './types.js';
export * from './errors.js';
export { scanDocument, parseTokenBody } from './scanner.js';
export { EntryRegistry } from './registry.js';
export { AnchorResolver } from './anchors.js';
export { DocumentResolver } from './resolver.js';
export { assignLocators, compressRanges, compressAll, createContiguity, elideEnd } from './locators.js';
export type { LocatorMode, LocatorOptions, PageContiguity, PageSource } from './locators.js';
export { buildRenderedIndex, compareEntries } from './index-renderer.js';
export { serializeRenderedIndex, parseRenderedIndex } from './index-schema.js';
export { serializeIndexHtml, renderMarkdown } from './renderer.js';
export { rewriteDocument } from './rewriter.js';
export { DEFAULT_CONFIG, resolveConfig, applyOptionString, loadConfig } from './config.js';
export type { IndexConfig, PartialIndexConfig } from './config.js';
export { convertLatexIndexCommands } from './latex.js';
export { parseConcordance, applyConcordance } from './concordance.js';

export interface IndexOptions {
  config?: PartialIndexConfig;
  /** Page numbers, required in paginated mode */
  pages?: PageSource;
  isContiguous?: PageContiguity;
}

export interface IndexStats {
  tokens: number;
  entries: number;
  occurrences: number;
  anchors: number;
}

export interface IndexResult {
  /** The document with tokens replaced and the index inserted */
  document: string;
  index: RenderedIndex;
  indexHtml: string;
  warnings: IndexWarning[];
  stats: IndexStats;
  /** The settings in effect, after the placeholder's options */
  config: IndexConfig;
}

/**
 * Resolve every annotation token of a document and build its index.
 *
 * Throws an IndexError on the first fatal problem; nothing is produced for
 * a document with fatal errors.
 */
export function createIndex(source: string, options: IndexOptions = {}): IndexResult {
  const text = source.replace(/\r\n?/g, '\n');
  const warnings: IndexWarning[] = [];

  const scan = scanDocument(text);
  const placeholder = findPlaceholder(scan);

  let config = resolveConfig(options.config);
  if (placeholder && placeholder.options) {
    const applied = applyOptionString(config, placeholder.options, placeholder.location);
    config = applied.config;
    warnings.push(...applied.warnings);
  }

  const log = config.verbose ? (message: string) => console.log(`[indexmark] ${message}`) : undefined;
  const { snapshot, anchors } = new DocumentResolver(log).resolve(scan.tokens);

  const locatorOptions: LocatorOptions = {
    mode: config.mode,
    pages: options.pages,
    isContiguous: options.isContiguous
  };
  const locators = assignLocators(snapshot, locatorOptions);
  const ranges = compressAll(snapshot, locators, createContiguity(locatorOptions));

  const rendered = buildRenderedIndex(snapshot, ranges, { sortEmphasisFirst: config.sortEmphasisFirst });
  warnings.push(...rendered.warnings);
  const indexHtml = rendered.index.items.length > 0 ? serializeIndexHtml(rendered.index, config) : '';

  const rewritten = rewriteDocument(text, scan, locators, indexHtml, config);
  warnings.push(...rewritten.warnings);

  return {
    document: rewritten.document,
    index: rendered.index,
    indexHtml,
    warnings,
    stats: {
      tokens: scan.tokens.length,
      entries: snapshot.entries.length,
      occurrences: locators.size,
      anchors
    },
    config
  };
}
