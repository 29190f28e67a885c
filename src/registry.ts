import { AmbiguousEntryError, ConflictingAliasError } from './errors.js';
import { keyWithin, pathKey } from './normalize.js';
import {
  CrossReference,
  CrossReferenceKind,
  EntryPath,
  Occurrence,
  ReadonlyIndexEntry,
  RegistrySnapshot,
  SourceLocation
} from './types.js';

/**
 * Mutable form of an index entry, owned by the registry until it is frozen.
 */
interface IndexEntry {
  id: number;
  heading: string;
  /** Source index of the token whose spelling is used for the heading */
  headingSource: number;
  path: string[];
  key: string;
  sortKey?: string;
  firstSeen: number;
  parent?: IndexEntry;
  children: IndexEntry[];
  occurrences: Occurrence[];
  crossReferences: CrossReference[];
}

/**
 * Per-call context: which token touched the registry, and where.
 */
export interface EntryDirectives {
  sourceIndex: number;
  sortKey?: string;
  location?: SourceLocation;
}

function pathOf(entry: IndexEntry): string[] {
  const parts = [entry.heading];
  let parent = entry.parent;
  while (parent) {
    parts.unshift(parent.heading);
    parent = parent.parent;
  }
  return parts;
}

function describe(path: EntryPath): string {
  return path.map(part => `"${part}"`).join(' > ');
}

function hasSee(entry: IndexEntry): boolean {
  return entry.crossReferences.some(ref => ref.kind === 'see');
}

/**
 * The symbol table of index entries for one document: hierarchy, aliases,
 * cross-references and occurrences.
 */
export class EntryRegistry {
  private readonly roots: IndexEntry[] = [];
  private readonly ordered: IndexEntry[] = [];
  private readonly byKey = new Map<string, IndexEntry>();
  /** alias key -> path it stands for (compressed as chains are followed) */
  private readonly aliasTargets = new Map<string, EntryPath>();
  private frozen = false;

  get size(): number {
    return this.ordered.length;
  }

  /**
   * Return the canonical entry for `path`, creating it (and any missing
   * ancestors) on first reference, and record `occurrence` against it.
   */
  register(path: EntryPath, occurrence: Occurrence | undefined, directives: EntryDirectives): ReadonlyIndexEntry {
    this.assertMutable();
    const entry = this.ensure(this.canonicalPath(path), directives.sourceIndex);
    if (directives.sortKey) {
      entry.sortKey = directives.sortKey;
    }
    if (occurrence) {
      if (hasSee(entry)) {
        throw new AmbiguousEntryError(
          `Entry ${describe(pathOf(entry))} is a "see" redirect and cannot also have locators`,
          directives.location
        );
      }
      this.insertOccurrence(entry, occurrence);
    }
    return entry;
  }

  /**
   * Make `aliasPath` resolve to the entry at `canonicalPath`. The alias
   * heading itself becomes a pure "see" entry pointing at the canonical one.
   */
  addAlias(aliasPath: EntryPath, canonicalPath: EntryPath, directives: EntryDirectives): void {
    this.assertMutable();
    const target = this.canonicalPath(canonicalPath);
    const alias = [...this.canonicalPath(aliasPath.slice(0, -1)), aliasPath[aliasPath.length - 1]];
    const aliasKey = pathKey(alias);
    const targetKey = pathKey(target);

    if (aliasKey === targetKey) {
      return;
    }
    if (keyWithin(targetKey, aliasKey)) {
      throw new ConflictingAliasError(
        `Alias ${describe(alias)} -> ${describe(target)} would make the entry refer to itself`,
        directives.location
      );
    }

    const previous = this.aliasTargets.get(aliasKey);
    if (previous) {
      if (pathKey(this.followAliases(previous)) !== targetKey) {
        throw new ConflictingAliasError(
          `${describe(alias)} is already an alias of ${describe(previous)}`,
          directives.location
        );
      }
      return;
    }

    const existing = this.byKey.get(aliasKey);
    if (existing && existing.occurrences.length > 0) {
      throw new ConflictingAliasError(
        `${describe(alias)} already has its own locators and cannot become an alias of ${describe(target)}`,
        directives.location
      );
    }

    const redirect = this.ensure(alias, directives.sourceIndex);
    this.pushCrossReference(redirect, 'see', target, directives);
    this.aliasTargets.set(aliasKey, target);
  }

  /**
   * Append a "see" or "see also" redirect to the entry at `path`.
   */
  addCrossReference(
    path: EntryPath,
    kind: CrossReferenceKind,
    target: EntryPath,
    directives: EntryDirectives
  ): ReadonlyIndexEntry {
    this.assertMutable();
    const entry = this.ensure(this.canonicalPath(path), directives.sourceIndex);
    this.pushCrossReference(entry, kind, target, directives);
    return entry;
  }

  /**
   * Find an existing entry, following aliases.
   */
  lookup(path: EntryPath): ReadonlyIndexEntry | undefined {
    if (path.length === 0) {
      return undefined;
    }
    return this.byKey.get(pathKey(this.canonicalPath(path)));
  }

  /**
   * Depth-first search (creation order) for the first entry whose heading
   * starts with `text`.
   */
  prefixSearch(text: string): ReadonlyIndexEntry | undefined {
    const visit = (entries: IndexEntry[]): IndexEntry | undefined => {
      for (const entry of entries) {
        if (entry.heading.startsWith(text)) {
          return entry;
        }
        const found = visit(entry.children);
        if (found) {
          return found;
        }
      }
      return undefined;
    };
    return visit(this.roots);
  }

  /**
   * The path an entry is currently displayed under.
   */
  pathOf(entry: ReadonlyIndexEntry): EntryPath {
    const own = this.byKey.get(entry.key);
    return own ? pathOf(own) : entry.path;
  }

  /**
   * Stop accepting changes and hand out a read-only view.
   */
  freeze(): RegistrySnapshot {
    if (!this.frozen) {
      for (const entry of this.ordered) {
        entry.path = pathOf(entry);
      }
      this.frozen = true;
    }
    return {
      roots: this.roots,
      entries: this.ordered,
      lookup: (path: EntryPath) => this.lookup(path)
    };
  }

  /**
   * Rewrite a path through the alias table, one level at a time, so that
   * aliased ancestors are replaced as well.
   */
  canonicalPath(path: EntryPath): EntryPath {
    let result: EntryPath = [];
    for (const segment of path) {
      result = this.followAliases([...result, segment]);
    }
    return result;
  }

  private followAliases(path: EntryPath): EntryPath {
    let current = path;
    let key = pathKey(current);
    const visited: string[] = [];
    let next = this.aliasTargets.get(key);
    while (next) {
      if (visited.includes(key)) {
        throw new ConflictingAliasError(`Alias cycle through ${describe(current)}`);
      }
      visited.push(key);
      current = next;
      key = pathKey(current);
      next = this.aliasTargets.get(key);
    }
    // Path compression: point every alias on the chain at the final entry
    for (const aliasKey of visited) {
      this.aliasTargets.set(aliasKey, current);
    }
    return current;
  }

  private ensure(path: EntryPath, sourceIndex: number): IndexEntry {
    let parent: IndexEntry | undefined;
    let entry: IndexEntry | undefined;
    for (let depth = 0; depth < path.length; depth++) {
      const prefix = path.slice(0, depth + 1);
      const key = pathKey(prefix);
      entry = this.byKey.get(key);
      if (!entry) {
        entry = {
          id: this.ordered.length,
          heading: path[depth],
          headingSource: sourceIndex,
          path: [...prefix],
          key,
          firstSeen: sourceIndex,
          parent,
          children: [],
          occurrences: [],
          crossReferences: []
        };
        this.byKey.set(key, entry);
        this.ordered.push(entry);
        (parent ? parent.children : this.roots).push(entry);
      } else if (sourceIndex < entry.headingSource) {
        // The earliest spelling in the document wins
        entry.heading = path[depth];
        entry.headingSource = sourceIndex;
      }
      entry.firstSeen = Math.min(entry.firstSeen, sourceIndex);
      parent = entry;
    }
    if (!entry) {
      throw new Error('Cannot register an entry with an empty path');
    }
    return entry;
  }

  private pushCrossReference(
    entry: IndexEntry,
    kind: CrossReferenceKind,
    target: EntryPath,
    directives: EntryDirectives
  ): void {
    if (kind === 'see' && entry.occurrences.length > 0) {
      throw new AmbiguousEntryError(
        `Entry ${describe(pathOf(entry))} has locators, so it cannot be a pure "see" redirect (use "see also")`,
        directives.location
      );
    }
    const targetKey = pathKey(target);
    if (entry.crossReferences.some(ref => ref.kind === kind && pathKey(ref.target) === targetKey)) {
      return;
    }
    entry.crossReferences.push({ kind, target: [...target] });
  }

  private insertOccurrence(entry: IndexEntry, occurrence: Occurrence): void {
    const list = entry.occurrences;
    let at = list.length;
    while (at > 0 && list[at - 1].sourceIndex > occurrence.sourceIndex) {
      at--;
    }
    list.splice(at, 0, occurrence);
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new Error('Entry registry is frozen');
    }
  }
}
