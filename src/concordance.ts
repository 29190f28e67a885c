/**
 * Concordance files: automatic marking of terms from a rule list.
 *
 * Each non-blank line that does not start with `#` holds a regular
 * expression, a tab, and the token body to attach to every match:
 *
 *   apple	fruit>apple
 *   =NASA	"space agencies">NASA
 *
 * A pattern written entirely in lower case matches case-insensitively.
 * Mixed case, or a leading `=`, makes it case-sensitive; `\=` stands for a
 * literal leading `=`.
 */

import { InvalidConfigurationError } from './errors.js';

export interface ConcordanceRule {
  pattern: RegExp;
  /** Token body; empty means "index the matched text as is" */
  body: string;
}

interface Span {
  start: number;
  end: number;
}

interface Mark extends Span {
  text: string;
  body: string;
}

// Existing tokens, the index placeholder, and HTML tags
const EXCLUDED_PATTERN = /(?:\[(?:\\.|[^\]\n\\])+\]|[^\s[\]{}<>]+)?\{\^[^}\n]*\}|^\{index[^}\n]*\}[ \t]*$|<[^>\n]*>/gm;

function compilePattern(pattern: string, flags: string, line: number): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`Concordance line ${line}: ${reason}`);
  }
}

/**
 * Parse the text of a concordance file.
 */
export function parseConcordance(source: string): ConcordanceRule[] {
  const rules: ConcordanceRule[] = [];
  for (const [index, rawLine] of source.replace(/\r\n?/g, '\n').split('\n').entries()) {
    if (rawLine.startsWith('#') || rawLine.trim() === '') {
      continue;
    }
    const [first, second = ''] = rawLine.replace(/\t+/g, '\t').split('\t');
    let pattern = first;
    let caseSensitive: boolean;
    if (pattern.startsWith('\\=')) {
      pattern = pattern.slice(1);
      caseSensitive = pattern !== pattern.toLowerCase();
    } else if (pattern.startsWith('=')) {
      pattern = pattern.slice(1);
      caseSensitive = true;
    } else {
      caseSensitive = pattern !== pattern.toLowerCase();
    }
    rules.push({
      pattern: compilePattern(pattern, caseSensitive ? 'g' : 'gi', index + 1),
      body: second.trim()
    });
  }
  return rules;
}

function overlaps(span: Span, spans: readonly Span[]): boolean {
  return spans.some(other => span.start < other.end && other.start < span.end);
}

export interface ConcordanceResult {
  text: string;
  marked: number;
  /** Matches left unmarked because bracketed text cannot hold them */
  skipped: number;
}

// Characters the bracketed visible-text form of a token excludes
const UNMARKABLE = /[\n<>]/;

/**
 * Wrap every match of every rule as `[match]{^body}`. Rules are applied in
 * order; text already matched, already annotated, or inside an HTML tag or
 * the placeholder is skipped, as are matches spanning a line break or
 * containing `<` or `>`.
 */
export function applyConcordance(text: string, rules: readonly ConcordanceRule[]): ConcordanceResult {
  const excluded: Span[] = [];
  for (const match of text.matchAll(EXCLUDED_PATTERN)) {
    const start = match.index ?? 0;
    excluded.push({ start, end: start + match[0].length });
  }

  const marks: Mark[] = [];
  let skipped = 0;
  for (const rule of rules) {
    const found: Span[] = [];
    for (const match of text.matchAll(rule.pattern)) {
      if (match[0] === '') continue;
      const start = match.index ?? 0;
      const span = { start, end: start + match[0].length };
      if (overlaps(span, excluded)) continue;
      if (UNMARKABLE.test(match[0])) {
        skipped++;
        continue;
      }
      marks.push({ ...span, text: match[0], body: rule.body });
      found.push(span);
    }
    excluded.push(...found);
  }

  marks.sort((a, b) => a.start - b.start);
  let output = '';
  let cursor = 0;
  for (const mark of marks) {
    const visible = mark.text.replace(/[[\]]/g, '\\$&');
    output += `${text.slice(cursor, mark.start)}[${visible}]{^${mark.body}}`;
    cursor = mark.end;
  }
  output += text.slice(cursor);

  return { text: output, marked: marks.length, skipped };
}
