/**
 * Conversion of LaTeX `\index{…}` commands into annotation tokens, so that
 * documents indexed for LaTeX can be indexed here unchanged.
 *
 *   \index{fruit!apple}           ->  {^"fruit">"apple"}
 *   \index{Neumann@von Neumann}   ->  {^"von Neumann" ~"Neumann"}
 *   \index{kiwi|see{fruit, green}} -> {^"kiwi" |"fruit">"green"}
 *   \index{lime|textbf}           ->  {^"lime" !}
 *   \index{war|(} … \index{war|)}  ->  {^"war" /} … {^"war" /}
 */

const COMMAND_START = /\\index\{/g;
const MAX_COMMAND_LENGTH = 150;

const RANGE_MARKER = /\|([()])$/;
const EMPHASIS_COMMAND = /\\(?:textbf|textit|textsl|emph)\{([^}]+)\}/gi;
const SORT_KEY = /^([^@]+)@/;
const LOCATOR_EMPHASIS = /\|(?:textbf|textit|textsl|emph)$/;
const CROSS_REFERENCE = /\|(see(?:also)?)\s*\{([^}]+)\}$/;

export interface LatexConversion {
  text: string;
  converted: number;
}

function quotedPath(parts: string[]): string {
  return parts.map(part => `"${part.trim()}"`).join('>');
}

/**
 * Build the annotation token for the body of one `\index{…}` command.
 */
export function latexCommandToToken(command: string): string {
  let content = command;
  let span = false;

  const range = content.match(RANGE_MARKER);
  if (range) {
    span = true;
    content = content.slice(0, -range[0].length);
  }

  content = content.replace(EMPHASIS_COMMAND, '_$1_');

  let sortKey: string | undefined;
  const sort = content.match(SORT_KEY);
  if (sort) {
    sortKey = sort[1];
    content = content.slice(sort[0].length);
  }

  let emphasis = false;
  const locatorEmphasis = content.match(LOCATOR_EMPHASIS);
  if (locatorEmphasis && locatorEmphasis.index !== undefined) {
    emphasis = true;
    content = content.slice(0, locatorEmphasis.index);
  }

  let crossReference: string | undefined;
  const xref = content.match(CROSS_REFERENCE);
  if (xref && xref.index !== undefined) {
    const target = quotedPath(xref[2].split(/,\s*/));
    crossReference = `|${xref[1].toLowerCase() === 'seealso' ? '+' : ''}${target}`;
    content = content.slice(0, xref.index);
  }

  const parts = [quotedPath(content.split('!'))];
  if (crossReference) parts.push(crossReference);
  if (sortKey) parts.push(`~"${sortKey}"`);
  if (span) {
    parts.push('/');
  } else if (emphasis) {
    parts.push('!');
  }
  return `{^${parts.join(' ')}}`;
}

/**
 * Replace every `\index{…}` command in `text`. A command whose braces do
 * not balance within a short distance is left as it is.
 */
export function convertLatexIndexCommands(text: string, log?: (message: string) => void): LatexConversion {
  let output = '';
  let cursor = 0;
  let converted = 0;

  for (const match of text.matchAll(COMMAND_START)) {
    const start = match.index ?? 0;
    if (start < cursor) continue;
    const bodyStart = start + match[0].length;

    let depth = 1;
    let at = bodyStart;
    while (depth > 0 && at < text.length && at - bodyStart < MAX_COMMAND_LENGTH) {
      if (text[at] === '}') depth--;
      else if (text[at] === '{') depth++;
      at++;
    }
    if (depth !== 0) continue;

    const command = text.slice(start, at);
    const token = latexCommandToToken(text.slice(bodyStart, at - 1));
    log?.(`Converted ${command} to ${token}`);
    output += text.slice(cursor, start) + token;
    cursor = at;
    converted++;
  }

  return { text: output + text.slice(cursor), converted };
}
