import { IndexWarning } from './errors.js';
import { compareText, groupInitial, sortText } from './normalize.js';
import {
  EntryPath,
  Range,
  ReadonlyIndexEntry,
  Redirect,
  RegistrySnapshot,
  RenderedEntry,
  RenderedIndex,
  RenderedItem
} from './types.js';

export interface IndexRenderOptions {
  /** Put ranges containing a defining occurrence first */
  sortEmphasisFirst?: boolean;
}

export interface IndexRenderResult {
  index: RenderedIndex;
  warnings: IndexWarning[];
}

function entrySortText(entry: ReadonlyIndexEntry): string {
  return sortText(entry.sortKey ?? entry.heading);
}

/**
 * Total order on siblings: normalized sort text, then first appearance in
 * the document, then creation order.
 */
export function compareEntries(a: ReadonlyIndexEntry, b: ReadonlyIndexEntry): number {
  return compareText(entrySortText(a), entrySortText(b)) || a.firstSeen - b.firstSeen || a.id - b.id;
}

function pathSortText(path: EntryPath): string {
  return path.map(sortText).join(' ');
}

function orderRanges(ranges: readonly Range[], emphasisFirst: boolean): Range[] {
  if (!emphasisFirst) {
    return [...ranges];
  }
  const defining = ranges.filter(range => range.definitions.length > 0);
  const plain = ranges.filter(range => range.definitions.length === 0);
  return [...defining, ...plain];
}

/**
 * Builds the nested, sorted index from a frozen registry and its
 * compressed ranges.
 */
class IndexBuilder {
  readonly warnings: IndexWarning[] = [];

  constructor(
    private readonly snapshot: RegistrySnapshot,
    private readonly ranges: ReadonlyMap<number, readonly Range[]>,
    private readonly options: IndexRenderOptions
  ) {}

  build(): RenderedIndex {
    const items: RenderedItem[] = [];
    let firstInitial: string | undefined;
    let previousInitial: string | undefined;
    for (const entry of [...this.snapshot.roots].sort(compareEntries)) {
      const initial = groupInitial(entrySortText(entry));
      if (previousInitial === undefined) {
        firstInitial = initial;
      } else if (initial !== previousInitial) {
        items.push({ kind: 'group', initial });
      }
      previousInitial = initial;
      items.push({ kind: 'entry', entry: this.renderEntry(entry) });
    }
    return firstInitial === undefined ? { items } : { firstInitial, items };
  }

  private renderEntry(entry: ReadonlyIndexEntry): RenderedEntry {
    return {
      id: entry.id,
      heading: entry.heading,
      path: [...entry.path],
      ranges: orderRanges(this.ranges.get(entry.id) ?? [], this.options.sortEmphasisFirst ?? false),
      see: this.redirects(entry, 'see'),
      seeAlso: this.redirects(entry, 'see-also'),
      subentries: [...entry.children].sort(compareEntries).map(child => this.renderEntry(child))
    };
  }

  private redirects(entry: ReadonlyIndexEntry, kind: 'see' | 'see-also'): Redirect[] {
    const redirects: Redirect[] = [];
    const seen = new Set<string>();
    for (const reference of entry.crossReferences) {
      if (reference.kind !== kind) continue;
      const target = this.snapshot.lookup(reference.target);
      const redirect: Redirect = target ? { path: [...target.path], targetId: target.id } : { path: [...reference.target] };
      if (!target) {
        this.warnings.push({
          code: 'UnresolvedCrossReference',
          message: `"${entry.path.join(' > ')}" refers to "${reference.target.join(' > ')}", which is not in the index`
        });
      }
      const key = pathSortText(redirect.path);
      if (seen.has(key)) continue;
      seen.add(key);
      redirects.push(redirect);
    }
    return redirects.sort((a, b) => compareText(pathSortText(a.path), pathSortText(b.path)));
  }
}

/**
 * Produce the rendered index structure. An empty registry yields an empty
 * index and an EmptyIndex warning.
 */
export function buildRenderedIndex(
  snapshot: RegistrySnapshot,
  ranges: ReadonlyMap<number, readonly Range[]>,
  options: IndexRenderOptions = {}
): IndexRenderResult {
  if (snapshot.entries.length === 0) {
    return {
      index: { items: [] },
      warnings: [{ code: 'EmptyIndex', message: 'No index entries were registered' }]
    };
  }
  const builder = new IndexBuilder(snapshot, ranges, options);
  const index = builder.build();
  return { index, warnings: builder.warnings };
}

/**
 * Every entry of a rendered index, depth first.
 */
export function* walkRenderedEntries(index: RenderedIndex): Generator<RenderedEntry> {
  function* visit(entry: RenderedEntry): Generator<RenderedEntry> {
    yield entry;
    for (const child of entry.subentries) {
      yield* visit(child);
    }
  }
  for (const item of index.items) {
    if (item.kind === 'entry') {
      yield* visit(item.entry);
    }
  }
}
