/**
 * An entry's position in the index: top-level heading first, then each
 * nested subentry heading.
 */
export type EntryPath = readonly string[];

/**
 * Source location of a token or placeholder.
 */
export interface SourceLocation {
  /** Character offset into the (line-ending normalized) document */
  offset: number;

  /** Line number (1-based) */
  line: number;

  /** Column number (1-based) */
  column: number;
}

export type CrossReferenceKind = 'see' | 'see-also';

export type RangeMode = 'passim' | 'span';

/**
 * One heading segment as written in a token. Prefix segments come from the
 * `*^` wildcard and are expanded against the registry when the token's
 * path is resolved.
 */
export type PathSegment =
  | { kind: 'text'; text: string }
  | { kind: 'prefix'; text: string; labelOnly: boolean };

/**
 * A path as written in a token, optionally rooted at a named anchor.
 */
export interface PathSpec {
  anchor?: string;
  segments: PathSegment[];
}

/**
 * Parsed directive primitives, in the order they appeared in the body.
 */
export type Directive =
  | { kind: 'heading'; segment: PathSegment }
  | { kind: 'subentry-of'; parent: PathSpec }
  | { kind: 'define-anchor'; name: string }
  | { kind: 'ref-anchor'; name: string }
  | { kind: 'repeat-previous' }
  | { kind: 'definition' }
  | { kind: 'alias-heading'; path: PathSpec }
  | { kind: 'cross-ref'; type: CrossReferenceKind; target: PathSpec }
  | { kind: 'sort-key'; text: string }
  | { kind: 'range-mode'; mode: RangeMode }
  | { kind: 'suffix'; text: string };

/**
 * An annotation token found by the scanner.
 */
export interface Token {
  /** Source order among tokens (0-based) */
  index: number;

  /** Offset where the token (including its attached text) starts */
  start: number;

  /** Offset just past the closing brace */
  end: number;

  location: SourceLocation;

  /** The full matched text */
  raw: string;

  /** Attached visible text as written (Markdown), empty for standalone tokens */
  visible: string;

  /** Attached text with emphasis/code markers removed */
  plainText: string;

  directives: Directive[];
}

/**
 * The `{index …}` placeholder line.
 */
export interface Placeholder {
  start: number;
  end: number;
  location: SourceLocation;
  /** Raw option string (may be empty) */
  options: string;
}

/**
 * A stretch of source text removed from the output (processing toggles).
 */
export interface Removal {
  start: number;
  end: number;
}

export interface ScanResult {
  tokens: Token[];
  placeholders: Placeholder[];
  removals: Removal[];
}

/**
 * One annotated reference to an entry.
 */
export interface Occurrence {
  /** Source index of the token that produced it */
  sourceIndex: number;
  offset: number;
  line: number;
  definition: boolean;
  rangeMode?: RangeMode;
  suffix?: string;
}

export interface CrossReference {
  kind: CrossReferenceKind;
  target: EntryPath;
}

/**
 * A node of the index tree as seen by downstream stages.
 */
export interface ReadonlyIndexEntry {
  readonly id: number;
  readonly heading: string;
  readonly path: EntryPath;
  readonly key: string;
  readonly sortKey?: string;
  readonly firstSeen: number;
  readonly parent?: ReadonlyIndexEntry;
  readonly children: readonly ReadonlyIndexEntry[];
  readonly occurrences: readonly Occurrence[];
  readonly crossReferences: readonly CrossReference[];
}

/**
 * Frozen view of the registry handed to the locator and rendering stages.
 */
export interface RegistrySnapshot {
  /** Top-level entries in creation order */
  readonly roots: readonly ReadonlyIndexEntry[];
  /** Every entry in creation order */
  readonly entries: readonly ReadonlyIndexEntry[];
  /** Look up an entry, following aliases */
  lookup(path: EntryPath): ReadonlyIndexEntry | undefined;
}

export type Locator =
  | { mode: 'reference'; id: number }
  | { mode: 'page'; page: number };

/**
 * Where an occurrence sits in the source, for externally supplied pages.
 */
export interface OccurrenceSite {
  /** Position among all occurrences in source order (0-based) */
  ordinal: number;
  sourceIndex: number;
  offset: number;
  line: number;
}

/**
 * A compressed run of one entry's locators.
 */
export interface Range {
  start: Locator;
  end: Locator;
  passim: boolean;
  span: boolean;
  /** Locators rendered individually: the start, then the end if it differs */
  rendered: Locator[];
  /** Interior locators kept for addressability but not rendered */
  elided: Locator[];
  /** Defining locators inside the range */
  definitions: Locator[];
  /** Display form of the end value, Chicago-style (123–25) */
  endLabel: string;
  suffix?: string;
}

export interface Redirect {
  path: EntryPath;
  /** Entry id of the target, when it exists */
  targetId?: number;
}

export interface RenderedEntry {
  id: number;
  heading: string;
  path: EntryPath;
  ranges: Range[];
  see: Redirect[];
  seeAlso: Redirect[];
  subentries: RenderedEntry[];
}

export type RenderedItem =
  | { kind: 'group'; initial: string }
  | { kind: 'entry'; entry: RenderedEntry };

export interface RenderedIndex {
  /** Initial of the first group, when the index is not empty */
  firstInitial?: string;
  items: RenderedItem[];
}
