import { EntryPath } from './types.js';

const PATH_KEY_SEPARATOR = '\u001f';
const LEADING_ARTICLE = /^(?:the|a|an)\s+(?=\S)/;

/**
 * Remove Markdown emphasis and code markers: `_x_`, `*x*`, `` `x` ``.
 */
export function stripMarkup(text: string): string {
  return text
    .replace(/_([^_]+?)_/g, '$1')
    .replace(/\*([^*]+?)\*/g, '$1')
    .replace(/`([^`]+)`/g, '$1');
}

function foldText(text: string): string {
  return stripMarkup(text)
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase();
}

function squash(text: string): string {
  return text
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Case- and punctuation-insensitive form of one heading segment.
 */
export function normalizeSegment(text: string): string {
  const folded = foldText(text);
  const squashed = squash(folded);
  return squashed || folded.trim();
}

/**
 * Key under which an entry path is stored; equal keys denote the same entry.
 */
export function pathKey(path: EntryPath): string {
  return path.map(normalizeSegment).join(PATH_KEY_SEPARATOR);
}

/**
 * Ordering form of a heading or sort key: also ignores a leading article.
 */
export function sortText(text: string): string {
  const folded = foldText(text).trim().replace(LEADING_ARTICLE, '');
  const squashed = squash(folded);
  return squashed || folded;
}

/**
 * The group an already-normalized sort text belongs to.
 */
export function groupInitial(sorted: string): string {
  return ([...sorted][0] ?? '').toUpperCase();
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Collapse runs of whitespace in a heading as written.
 */
export function cleanHeading(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Whether `key` is `ancestorKey` itself or a path nested below it.
 */
export function keyWithin(key: string, ancestorKey: string): boolean {
  return key === ancestorKey || key.startsWith(ancestorKey + PATH_KEY_SEPARATOR);
}
