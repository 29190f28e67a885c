import { IndexConfig } from './config.js';
import { IndexWarning, MultiplePlaceholdersError } from './errors.js';
import { Locator, Placeholder, ScanResult } from './types.js';

export interface RewriteResult {
  document: string;
  warnings: IndexWarning[];
}

interface Edit {
  start: number;
  end: number;
  text: string;
}

/**
 * The document's single `{index}` placeholder, if it has one.
 */
export function findPlaceholder(scan: ScanResult): Placeholder | undefined {
  if (scan.placeholders.length > 1) {
    throw new MultiplePlaceholdersError(scan.placeholders[1].location);
  }
  return scan.placeholders[0];
}

/**
 * Replace every resolved token with its visible text, and the placeholder
 * with the index HTML. In reference mode, tokens that produced an
 * occurrence become `<span id="idxN" class="indexmark">` so locators can
 * link to them.
 *
 * @param locators - locator of each occurrence, by token source index
 */
export function rewriteDocument(
  text: string,
  scan: ScanResult,
  locators: ReadonlyMap<number, Locator>,
  indexHtml: string,
  config: Pick<IndexConfig, 'idPrefix'>
): RewriteResult {
  const warnings: IndexWarning[] = [];
  const edits: Edit[] = scan.removals.map(removal => ({ ...removal, text: '' }));

  for (const token of scan.tokens) {
    const locator = locators.get(token.index);
    const replacement =
      locator?.mode === 'reference'
        ? `<span id="${config.idPrefix}${locator.id}" class="indexmark">${token.visible}</span>`
        : token.visible;
    edits.push({ start: token.start, end: token.end, text: replacement });
  }

  const placeholder = findPlaceholder(scan);
  if (placeholder) {
    edits.push({ start: placeholder.start, end: placeholder.end, text: indexHtml });
  } else {
    warnings.push({
      code: 'MissingPlaceholder',
      message: 'Document has no {index} placeholder; the index is not included in the output'
    });
  }

  edits.sort((a, b) => a.start - b.start);
  let document = '';
  let cursor = 0;
  for (const edit of edits) {
    document += text.slice(cursor, edit.start) + edit.text;
    cursor = edit.end;
  }
  document += text.slice(cursor);

  return { document, warnings };
}
