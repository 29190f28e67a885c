import { CyclicReferenceError, DuplicateAnchorError, UnknownAnchorError } from './errors.js';
import { EntryPath, SourceLocation } from './types.js';

/**
 * A named definition site: `##name` on some token.
 */
export interface AnchorBinding {
  name: string;
  /** Token that defined the anchor */
  tokenIndex: number;
  location: SourceLocation;
  /** Filled in once the defining token's entry is known */
  path?: EntryPath;
}

interface AnchorReference {
  name: string;
  tokenIndex: number;
  location: SourceLocation;
}

/**
 * Binds anchor names to entries. Definitions and references are collected
 * while scanning (pass 1); references are only resolved after every
 * definition in the document has been seen (pass 2), because a reference
 * may come before its definition.
 */
export class AnchorResolver {
  private readonly bindings = new Map<string, AnchorBinding>();
  private readonly references: AnchorReference[] = [];
  private readonly resolving = new Set<string>();
  private collecting = true;

  define(name: string, tokenIndex: number, location: SourceLocation): AnchorBinding {
    if (!this.collecting) {
      throw new Error('Anchors can only be defined while scanning');
    }
    if (this.bindings.has(name)) {
      throw new DuplicateAnchorError(name, location);
    }
    const binding: AnchorBinding = { name, tokenIndex, location };
    this.bindings.set(name, binding);
    return binding;
  }

  refer(name: string, tokenIndex: number, location: SourceLocation): void {
    this.references.push({ name, tokenIndex, location });
  }

  /**
   * Record the entry an anchor's defining token resolved to.
   */
  bind(name: string, path: EntryPath): void {
    const binding = this.bindings.get(name);
    if (binding) {
      binding.path = path;
    }
  }

  /**
   * End of pass 1. Every reference must now name a known anchor.
   */
  finishCollection(): void {
    this.collecting = false;
    for (const reference of this.references) {
      if (!this.bindings.has(reference.name)) {
        throw new UnknownAnchorError(reference.name, reference.location);
      }
    }
  }

  /**
   * Resolve an anchor name to its entry path (pass 2). When the defining
   * token's own path depends on other anchors, `resolveDefinition` is asked
   * to work it out; loops are reported rather than followed.
   */
  resolve(
    name: string,
    location: SourceLocation,
    resolveDefinition: (binding: AnchorBinding) => EntryPath
  ): EntryPath {
    if (this.collecting) {
      throw new Error('Anchor references are resolved after scanning completes');
    }
    const binding = this.bindings.get(name);
    if (!binding) {
      throw new UnknownAnchorError(name, location);
    }
    if (binding.path) {
      return binding.path;
    }
    if (this.resolving.has(name)) {
      throw new CyclicReferenceError(`Anchor #${name} is defined in terms of itself`, location);
    }
    this.resolving.add(name);
    try {
      const path = resolveDefinition(binding);
      binding.path = path;
      return path;
    } finally {
      this.resolving.delete(name);
    }
  }

  get size(): number {
    return this.bindings.size;
  }
}
