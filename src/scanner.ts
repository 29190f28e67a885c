import { MalformedTokenError } from './errors.js';
import { cleanHeading, stripMarkup } from './normalize.js';
import {
  CrossReferenceKind,
  Directive,
  PathSegment,
  PathSpec,
  Placeholder,
  Removal,
  ScanResult,
  SourceLocation,
  Token
} from './types.js';

/**
 * Regex patterns for locating annotation tokens
 */

// An annotation token with its optional attached text:
// Group 1: bracketed visible text ("[visible]{^…}"), backslash escapes allowed
// Group 2: preceding code span, emphasis run, or run of non-space characters
// Group 3: the token body
const TOKEN_PATTERN =
  /(?:(?<!\\)\[((?:\\.|[^\]\n<>\\])+)\]|(`[^`\n]+`|_[^_\n]+_|[^\s[\]{}<>]+))?\{\^([^}\n<]*)\}/g;

// Any token opener, to catch ones that never close
const TOKEN_OPENER_PATTERN = /\{\^/g;

// "{index}" or "{index key=value …}" alone on a line
const PLACEHOLDER_PATTERN = /^\{index(?:[ \t]+([^}\n]*))?\}[ \t]*$/gm;

const ANCHOR_NAME_PATTERN = /^[A-Za-z0-9_-]+/;
const BARE_SORT_KEY_PATTERN = /^[^\s|[\]@~;>]+/;

const ENABLE_TOGGLE = '+';
const DISABLE_TOGGLE = '-';
const REPEAT_PREVIOUS = '=';

/**
 * Maps character offsets to line/column positions.
 */
export function createLocator(text: string): (offset: number) => SourceLocation {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  return (offset: number) => {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { offset, line: low + 1, column: offset - lineStarts[low] + 1 };
  };
}

/**
 * Unescape `\[` and `\]` inside bracketed visible text
 */
function unescapeBrackets(text: string): string {
  return text.replace(/\\([[\]])/g, '$1');
}

interface PathDraft {
  anchor?: string;
  segments: PathSegment[];
  buffer: string;
  prefix?: { labelOnly: boolean };
}

function emptyDraft(): PathDraft {
  return { segments: [], buffer: '' };
}

function draftIsEmpty(draft: PathDraft): boolean {
  return !draft.anchor && draft.segments.length === 0 && !draft.prefix && draft.buffer.trim() === '';
}

/**
 * Parse the body of a token (the text between `{^` and `}`) into directives.
 *
 * @param plainText - attached text without markup, used for wildcards
 */
export function parseTokenBody(body: string, plainText: string, location?: SourceLocation): Directive[] {
  const directives: Directive[] = [];
  const fail = (message: string): never => {
    throw new MalformedTokenError(`${message} in {^${body}}`, location);
  };

  // Trailing flags: "!" marks a definition, "/" opens or closes a span
  let rest = body.trimEnd();
  let definition = false;
  let span = false;
  while (rest.endsWith('!') || rest.endsWith('/')) {
    if (rest.endsWith('!')) {
      definition = true;
    } else {
      span = true;
    }
    rest = rest.slice(0, -1).trimEnd();
  }

  type Section = 'main' | 'alias' | 'xref';
  let section: Section = 'main';
  let draft = emptyDraft();
  let xrefKind: CrossReferenceKind = 'see';
  let xrefCount = 0;

  function finishSegment(): void {
    const text = cleanHeading(draft.buffer);
    if (draft.prefix) {
      if (text) {
        fail('Prefix wildcard must stand alone in a path segment');
      }
      draft.segments.push({ kind: 'prefix', text: plainText, labelOnly: draft.prefix.labelOnly });
    } else if (text) {
      draft.segments.push({ kind: 'text', text });
    } else {
      fail('Empty path segment');
    }
    draft.buffer = '';
    draft.prefix = undefined;
  }

  function finishPath(): PathSpec | null {
    if (draftIsEmpty(draft)) {
      return null;
    }
    if (draft.prefix || draft.buffer.trim() !== '') {
      finishSegment();
    } else if (draft.segments.length > 0) {
      fail('Path ends with ">"');
    }
    const path: PathSpec = { segments: draft.segments };
    if (draft.anchor) {
      path.anchor = draft.anchor;
    }
    draft = emptyDraft();
    return path;
  }

  function commit(): void {
    const path = finishPath();
    if (section === 'main') {
      if (!path) return;
      const last = path.segments[path.segments.length - 1];
      if (!path.anchor && path.segments.length === 1 && last.kind === 'text' && last.text === REPEAT_PREVIOUS) {
        directives.push({ kind: 'repeat-previous' });
        return;
      }
      if (path.anchor && path.segments.length === 0) {
        directives.push({ kind: 'ref-anchor', name: path.anchor });
        return;
      }
      if (path.segments.length > 1 || path.anchor) {
        const parent: PathSpec = { segments: path.segments.slice(0, -1) };
        if (path.anchor) {
          parent.anchor = path.anchor;
        }
        directives.push({ kind: 'subentry-of', parent });
      }
      directives.push({ kind: 'heading', segment: last });
    } else if (section === 'alias') {
      if (!path) {
        fail('"@" without a heading');
      } else {
        directives.push({ kind: 'alias-heading', path });
      }
    } else if (path) {
      directives.push({ kind: 'cross-ref', type: xrefKind, target: path });
      xrefCount++;
    }
    xrefKind = 'see';
  }

  function readAnchorName(from: number, marker: string): string {
    const match = rest.slice(from).match(ANCHOR_NAME_PATTERN);
    if (!match) {
      fail(`"${marker}" without an anchor name`);
    }
    return match ? match[0] : '';
  }

  function closingQuote(open: string): string {
    return open === '“' ? '”' : '"';
  }

  let i = 0;
  while (i < rest.length) {
    const ch = rest[i];

    if (ch === '"' || ch === '“') {
      const close = rest.indexOf(closingQuote(ch), i + 1);
      if (close === -1) {
        fail('Unbalanced quote');
      }
      if (draft.prefix) {
        fail('Prefix wildcard must stand alone in a path segment');
      }
      draft.buffer += rest.slice(i + 1, close);
      i = close + 1;
      continue;
    }

    if (ch === '>') {
      if (draft.anchor && draft.segments.length === 0 && !draft.prefix && draft.buffer.trim() === '') {
        // "#name>sub": the anchor stands for the parent path
        i++;
        continue;
      }
      finishSegment();
      i++;
      continue;
    }

    if (ch === '#') {
      if (rest[i + 1] === '#') {
        if (section !== 'main') {
          fail('Anchor definitions belong before "|" and "@"');
        }
        const name = readAnchorName(i + 2, '##');
        directives.push({ kind: 'define-anchor', name });
        i += 2 + name.length;
        continue;
      }
      const name = readAnchorName(i + 1, '#');
      if (!draftIsEmpty(draft)) {
        fail(`#${name} must start a path`);
      }
      draft.anchor = name;
      i += 1 + name.length;
      continue;
    }

    if (ch === '~') {
      let j = i + 1;
      while (j < rest.length && /\s/.test(rest[j])) j++;
      let key = '';
      if (rest[j] === '"' || rest[j] === '“') {
        const close = rest.indexOf(closingQuote(rest[j]), j + 1);
        if (close === -1) {
          fail('Unbalanced quote');
        }
        key = rest.slice(j + 1, close);
        j = close + 1;
      } else {
        const match = rest.slice(j).match(BARE_SORT_KEY_PATTERN);
        key = match ? match[0] : '';
        j += key.length;
      }
      if (!key.trim()) {
        fail('"~" without a sort key');
      }
      directives.push({ kind: 'sort-key', text: key.trim() });
      i = j;
      continue;
    }

    if (ch === '[') {
      const close = rest.indexOf(']', i + 1);
      if (close === -1) {
        fail('Unbalanced bracket');
      }
      const text = rest.slice(i + 1, close).trim();
      if (!text) {
        fail('Empty suffix');
      }
      if (text.toLowerCase() === 'passim') {
        directives.push({ kind: 'range-mode', mode: 'passim' });
      } else {
        directives.push({ kind: 'suffix', text });
      }
      i = close + 1;
      continue;
    }

    if (ch === ']') {
      fail('Unbalanced bracket');
    }

    if (ch === '{') {
      fail('Unexpected "{"');
    }

    if (ch === '@') {
      commit();
      section = 'alias';
      i++;
      continue;
    }

    if (ch === '|') {
      commit();
      section = 'xref';
      i++;
      continue;
    }

    if (ch === ';' && section !== 'main') {
      commit();
      i++;
      continue;
    }

    if (ch === '+' && section === 'xref' && draftIsEmpty(draft)) {
      xrefKind = 'see-also';
      i++;
      continue;
    }

    if (ch === '*') {
      if (!plainText) {
        fail('Wildcard without attached text');
      }
      if (rest[i + 1] === '^') {
        if (draft.buffer.trim() !== '' || draft.prefix) {
          fail('Prefix wildcard must stand alone in a path segment');
        }
        const labelOnly = rest[i + 2] === '-';
        draft.prefix = { labelOnly };
        i += labelOnly ? 3 : 2;
        continue;
      }
      if (draft.prefix) {
        fail('Prefix wildcard must stand alone in a path segment');
      }
      if (rest[i + 1] === '*') {
        draft.buffer += plainText.toLowerCase();
        i += 2;
      } else {
        draft.buffer += plainText;
        i++;
      }
      continue;
    }

    if (draft.prefix && !/\s/.test(ch)) {
      fail('Prefix wildcard must stand alone in a path segment');
    }
    draft.buffer += ch;
    i++;
  }
  commit();

  if (section === 'xref' && xrefCount === 0) {
    fail('"|" without a target');
  }
  if (definition) {
    directives.push({ kind: 'definition' });
  }
  if (span) {
    directives.push({ kind: 'range-mode', mode: 'span' });
  }
  return directives;
}

function hasHeading(directives: Directive[]): boolean {
  return directives.some(d => d.kind === 'heading' || d.kind === 'ref-anchor' || d.kind === 'repeat-previous');
}

/**
 * Scan a document for annotation tokens, processing toggles and index
 * placeholders. Non-token text is left untouched.
 */
export function scanDocument(text: string): ScanResult {
  const locate = createLocator(text);
  const tokens: Token[] = [];
  const removals: Removal[] = [];
  const placeholders: Placeholder[] = [];
  const covered: Removal[] = [];
  let enabled = true;

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    const raw = match[0];
    const end = start + raw.length;
    const body = match[3];
    covered.push({ start, end });

    const trimmed = body.trim();
    if (trimmed === ENABLE_TOGGLE || trimmed === DISABLE_TOGGLE) {
      enabled = trimmed === ENABLE_TOGGLE;
      // Keep any attached text; drop only the toggle itself
      const opener = raw.lastIndexOf('{^');
      removals.push({ start: start + opener, end });
      continue;
    }
    if (!enabled) {
      continue;
    }

    const visible = match[1] !== undefined ? unescapeBrackets(match[1]) : (match[2] ?? '');
    const plainText = cleanHeading(stripMarkup(visible));
    const location = locate(start);
    const directives = parseTokenBody(body, plainText, location);
    if (!hasHeading(directives) && !plainText) {
      throw new MalformedTokenError(`Token has no heading and no attached text: ${raw}`, location);
    }

    tokens.push({
      index: tokens.length,
      start,
      end,
      location,
      raw,
      visible,
      plainText,
      directives
    });
  }

  for (const match of text.matchAll(TOKEN_OPENER_PATTERN)) {
    const offset = match.index ?? 0;
    if (!covered.some(span => offset >= span.start && offset < span.end)) {
      throw new MalformedTokenError('Unclosed annotation token', locate(offset));
    }
  }

  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const start = match.index ?? 0;
    placeholders.push({
      start,
      end: start + match[0].length,
      location: locate(start),
      options: (match[1] ?? '').trim()
    });
  }

  return { tokens, placeholders, removals };
}
