import { InvalidConfigurationError } from './errors.js';
import {
  Locator,
  Occurrence,
  OccurrenceSite,
  Range,
  ReadonlyIndexEntry,
  RegistrySnapshot
} from './types.js';

export type LocatorMode = 'reference' | 'paginated';

/**
 * Page numbers for paginated mode: one per occurrence (by ordinal), or a
 * callback that computes the page of each occurrence site.
 */
export type PageSource = readonly number[] | ((site: OccurrenceSite) => number);

export type PageContiguity = (previous: number, next: number) => boolean;

export interface LocatorOptions {
  mode: LocatorMode;
  pages?: PageSource;
  /** Paginated mode only: whether two pages belong to one run */
  isContiguous?: PageContiguity;
}

export type Contiguity = (previous: Locator, next: Locator) => boolean;

/**
 * An occurrence together with its assigned locator.
 */
export interface LocatedOccurrence {
  occurrence: Occurrence;
  locator: Locator;
}

export function locatorValue(locator: Locator): number {
  return locator.mode === 'reference' ? locator.id : locator.page;
}

function sameLocator(a: Locator, b: Locator): boolean {
  return locatorValue(a) === locatorValue(b);
}

/**
 * All occurrences of the snapshot in source order.
 */
function occurrencesInSourceOrder(snapshot: RegistrySnapshot): Occurrence[] {
  const all: Occurrence[] = [];
  for (const entry of snapshot.entries) {
    all.push(...entry.occurrences);
  }
  return all.sort((a, b) => a.sourceIndex - b.sourceIndex);
}

function pageFor(source: PageSource | undefined, site: OccurrenceSite): number {
  if (!source) {
    throw new InvalidConfigurationError('Paginated mode requires page numbers for every occurrence');
  }
  const page = typeof source === 'function' ? source(site) : source[site.ordinal];
  if (page === undefined || !Number.isInteger(page) || page < 1) {
    throw new InvalidConfigurationError(
      `Occurrence ${site.ordinal + 1} (line ${site.line}) has no valid page number`
    );
  }
  return page;
}

/**
 * Give every occurrence its locator, keyed by the source index of the
 * token it came from. Reference ids run 1..n in source order.
 */
export function assignLocators(snapshot: RegistrySnapshot, options: LocatorOptions): Map<number, Locator> {
  const locators = new Map<number, Locator>();
  const occurrences = occurrencesInSourceOrder(snapshot);
  occurrences.forEach((occurrence, ordinal) => {
    if (options.mode === 'reference') {
      locators.set(occurrence.sourceIndex, { mode: 'reference', id: ordinal + 1 });
      return;
    }
    const site: OccurrenceSite = {
      ordinal,
      sourceIndex: occurrence.sourceIndex,
      offset: occurrence.offset,
      line: occurrence.line
    };
    locators.set(occurrence.sourceIndex, { mode: 'page', page: pageFor(options.pages, site) });
  });
  return locators;
}

/**
 * Adjacency test for the given mode. Reference ids must be successive;
 * pages default to "same or next page".
 */
export function createContiguity(options: LocatorOptions): Contiguity {
  if (options.mode === 'reference') {
    return (previous, next) => locatorValue(next) === locatorValue(previous) + 1;
  }
  const pages: PageContiguity = options.isContiguous ?? ((previous, next) => next >= previous && next - previous <= 1);
  return (previous, next) => pages(locatorValue(previous), locatorValue(next));
}

/**
 * Shorten the end of a numeric range the way printed indexes do:
 * 123–25, 101–8, 1496–500. Numbers under 100, and starts that are
 * multiples of 100, keep every digit; teens keep their tens digit (112–13).
 */
export function elideEnd(start: number, end: number): string {
  const full = String(end);
  if (start < 100 || end <= start || start % 100 === 0) {
    return full;
  }
  const first = String(start);
  if (first.length !== full.length) {
    return full;
  }
  let differs = 0;
  while (first[differs] === full[differs]) {
    differs++;
  }
  const minimum = start % 100 < 10 ? 1 : 2;
  const keep = Math.max(full.length - differs, minimum);
  return full.slice(full.length - keep);
}

interface RangeDraft {
  items: LocatedOccurrence[];
  passim: boolean;
  span: boolean;
  suffix?: string;
}

function finishRange(draft: RangeDraft): Range {
  const { items } = draft;
  const start = items[0].locator;
  const end = items[items.length - 1].locator;
  const rendered = [start];
  const elided: Locator[] = [];
  const lastRendered = items.length > 1 && !sameLocator(start, end);
  items.forEach((item, index) => {
    if (index === 0) return;
    if (lastRendered && index === items.length - 1) {
      rendered.push(item.locator);
    } else {
      elided.push(item.locator);
    }
  });
  const single = items.length === 1;
  const range: Range = {
    start,
    end,
    passim: draft.passim && !single,
    span: draft.span && !single,
    rendered,
    elided,
    definitions: items.filter(item => item.occurrence.definition).map(item => item.locator),
    endLabel: elideEnd(locatorValue(start), locatorValue(end))
  };
  if (draft.suffix) {
    range.suffix = draft.suffix;
  }
  return range;
}

/**
 * Position of a span marker that opens a span nothing closes, or -1.
 */
function unclosedSpanOpener(items: readonly LocatedOccurrence[]): number {
  const markers: number[] = [];
  items.forEach((item, index) => {
    if (item.occurrence.rangeMode === 'span') markers.push(index);
  });
  return markers.length % 2 === 1 ? markers[markers.length - 1] : -1;
}

/**
 * Merge one entry's located occurrences (already in source order) into
 * display ranges.
 *
 * An occurrence joins the current range when it is adjacent to the
 * previous one, when it or the previous occurrence is marked passim, or
 * while an explicit span is open. A span-marked occurrence opens a span;
 * the next one closes it. An opener with no closing marker after it is
 * treated as an ordinary occurrence.
 */
export function compressRanges(items: readonly LocatedOccurrence[], adjacent: Contiguity): Range[] {
  const ranges: Range[] = [];
  let current: RangeDraft | undefined;
  let previous: LocatedOccurrence | undefined;
  let spanOpen = false;
  const unclosed = unclosedSpanOpener(items);

  for (const [index, item] of items.entries()) {
    const mode = index === unclosed ? undefined : item.occurrence.rangeMode;
    const passim = mode === 'passim';
    const suffix = item.occurrence.suffix;

    const joins =
      current !== undefined &&
      previous !== undefined &&
      (spanOpen ||
        (current.suffix === suffix &&
          (passim || previous.occurrence.rangeMode === 'passim' || adjacent(previous.locator, item.locator))));

    if (!joins || !current) {
      if (current) {
        ranges.push(finishRange(current));
      }
      current = { items: [item], passim: false, span: false, suffix };
    } else {
      current.items.push(item);
    }

    if (passim) {
      current.passim = true;
    }
    if (mode === 'span') {
      current.span = true;
      spanOpen = !spanOpen;
    }
    previous = item;
  }

  if (current) {
    ranges.push(finishRange(current));
  }
  return ranges;
}

/**
 * Compressed ranges for every entry of the snapshot, keyed by entry id.
 */
export function compressAll(
  snapshot: RegistrySnapshot,
  locators: ReadonlyMap<number, Locator>,
  adjacent: Contiguity
): Map<number, Range[]> {
  const ranges = new Map<number, Range[]>();
  for (const entry of snapshot.entries) {
    ranges.set(entry.id, compressRanges(locate(entry, locators), adjacent));
  }
  return ranges;
}

function locate(entry: ReadonlyIndexEntry, locators: ReadonlyMap<number, Locator>): LocatedOccurrence[] {
  return entry.occurrences.map(occurrence => {
    const locator = locators.get(occurrence.sourceIndex);
    if (!locator) {
      throw new Error(`Occurrence from token ${occurrence.sourceIndex} has no locator`);
    }
    return { occurrence, locator };
  });
}
