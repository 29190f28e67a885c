import { marked } from 'marked';
import { IndexConfig } from './config.js';
import { locatorValue } from './locators.js';
import { Locator, Range, Redirect, RenderedEntry, RenderedIndex } from './types.js';

/**
 * Result of rendering markdown
 */
export interface RenderResult {
  /** The rendered HTML */
  html: string;
  /** Table of contents extracted from headings */
  toc: TocEntry[];
}

/**
 * A table of contents entry
 */
export interface TocEntry {
  /** Heading level (1-6) */
  level: number;
  /** Heading text */
  text: string;
  /** Slug for anchor linking */
  slug: string;
}

/**
 * Generate a URL-safe slug from text
 */
function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\w\s-]/g, '') // Remove non-word chars except spaces and hyphens
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .trim();
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Create a configured marked instance
 */
function createMarkedInstance(): typeof marked {
  marked.setOptions({
    gfm: true,
    breaks: true
  });
  return marked;
}

/**
 * Render a fragment of inline Markdown (a heading or visible text)
 */
export function renderInline(markdown: string): string {
  const html = createMarkedInstance().parseInline(markdown);
  if (typeof html !== 'string') {
    throw new Error('Asynchronous Markdown extensions are not supported');
  }
  return html;
}

/**
 * Extract table of contents from markdown content
 */
export function extractToc(markdown: string): TocEntry[] {
  const toc: TocEntry[] = [];
  const headingRegex = /^(#{1,6})\s+(.+)$/gm;

  let match;
  while ((match = headingRegex.exec(markdown)) !== null) {
    const text = match[2].trim();
    toc.push({ level: match[1].length, text, slug: slugify(text) });
  }

  return toc;
}

/**
 * Render a (rewritten) markdown document to HTML for preview. The index
 * and the occurrence spans are HTML already and pass through unchanged.
 */
export function renderMarkdown(markdown: string): RenderResult {
  const toc = extractToc(markdown);
  const html = createMarkedInstance().parse(markdown);
  if (typeof html !== 'string') {
    throw new Error('Asynchronous Markdown extensions are not supported');
  }
  return { html, toc };
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Serializes a rendered index as nested definition lists.
 */
class IndexHtmlWriter {
  private readonly lines: string[] = [];

  constructor(private readonly config: IndexConfig) {}

  write(index: RenderedIndex): string {
    const { config } = this;
    if (config.includeHeader) {
      this.lines.push(`<h2 class="indexmark-header">${escapeHtml(config.headerText)}</h2>`);
    }
    this.lines.push('<dl class="indexmark index">');
    if (config.groupHeadings && index.firstInitial !== undefined) {
      this.lines.push(this.groupRow(index.firstInitial));
    }
    for (const item of index.items) {
      if (item.kind === 'group') {
        this.lines.push(this.groupRow(item.initial));
      } else {
        this.writeEntry(item.entry, 1);
      }
    }
    this.lines.push('</dl>');
    if (config.includeFooter) {
      this.lines.push(`<p class="indexmark-footer">${escapeHtml(config.footerText)}</p>`);
    }
    return this.lines.join('\n');
  }

  private groupRow(initial: string): string {
    const label = this.config.groupHeadings ? escapeHtml(initial) : '';
    return `<dt class="group-separator">${label}</dt>`;
  }

  private writeEntry(entry: RenderedEntry, depth: number): void {
    const indent = '  '.repeat(depth);
    let line = `${indent}<dt id="${this.config.entryIdPrefix}${entry.id}">${renderInline(entry.heading)}`;
    if (entry.ranges.length > 0) {
      line += this.config.fieldSeparator + entry.ranges.map(range => this.range(range)).join(this.config.fieldSeparator);
    }
    line += this.redirects(this.config.seeLabel, entry.see);
    line += this.redirects(this.config.seeAlsoLabel, entry.seeAlso);
    this.lines.push(`${line}</dt>`);

    if (entry.subentries.length > 0) {
      this.lines.push(`${indent}<dd><dl>`);
      for (const child of entry.subentries) {
        this.writeEntry(child, depth + 1);
      }
      this.lines.push(`${indent}</dl></dd>`);
    }
  }

  private locator(locator: Locator, label: string, emphasized: boolean): string {
    const html =
      locator.mode === 'reference'
        ? `<a class="locator" href="#${this.config.idPrefix}${locator.id}">${escapeHtml(label)}</a>`
        : `<span class="locator">${escapeHtml(label)}</span>`;
    return emphasized ? `<em>${html}</em>` : html;
  }

  private range(range: Range): string {
    const isDefinition = (locator: Locator) => range.definitions.some(d => locatorValue(d) === locatorValue(locator));
    const [first, last] = range.rendered;
    let html = this.locator(first, String(locatorValue(first)), isDefinition(first));
    if (last) {
      html += this.config.rangeSeparator + this.locator(last, range.endLabel, isDefinition(last));
    }
    if (range.suffix) {
      html += escapeHtml(range.suffix);
    }
    if (range.passim) {
      html += `${this.config.fieldSeparator}passim`;
    }
    const interior = range.definitions.filter(
      (d, index) =>
        !range.rendered.some(r => locatorValue(r) === locatorValue(d)) &&
        range.definitions.findIndex(other => locatorValue(other) === locatorValue(d)) === index
    );
    if (interior.length > 0) {
      // Definitions hidden inside the range are listed after it
      const listed = interior.map(d => this.locator(d, String(locatorValue(d)), true));
      html += ` (${listed.join(this.config.fieldSeparator)})`;
      const ids = interior.map(d => (d.mode === 'reference' ? `${this.config.idPrefix}${d.id}` : String(d.page)));
      html = `<span class="range" data-definitions="${escapeHtml(ids.join(' '))}">${html}</span>`;
    }
    return html;
  }

  private redirects(label: string, redirects: Redirect[]): string {
    if (redirects.length === 0) {
      return '';
    }
    const targets = redirects.map(redirect => {
      const text = renderInline(redirect.path.join(this.config.pathSeparator));
      return redirect.targetId === undefined
        ? `<span class="unresolved">${text}</span>`
        : `<a href="#${this.config.entryIdPrefix}${redirect.targetId}">${text}</a>`;
    });
    return `${this.config.categorySeparator}<em>${escapeHtml(capitalize(label))}</em> ${targets.join(this.config.listSeparator)}`;
  }
}

/**
 * Serialize a rendered index to HTML.
 */
export function serializeIndexHtml(index: RenderedIndex, config: IndexConfig): string {
  return new IndexHtmlWriter(config).write(index);
}
