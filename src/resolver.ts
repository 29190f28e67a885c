import { AnchorResolver } from './anchors.js';
import { MalformedTokenError } from './errors.js';
import { EntryDirectives, EntryRegistry } from './registry.js';
import {
  CrossReferenceKind,
  EntryPath,
  Occurrence,
  PathSegment,
  PathSpec,
  RangeMode,
  RegistrySnapshot,
  SourceLocation,
  Token
} from './types.js';

/**
 * A token's directives, grouped by the stage that applies them.
 */
interface TokenPlan {
  token: Token;
  defines: string[];
  refAnchor?: string;
  parent?: PathSpec;
  heading?: PathSegment;
  /** Index of the token whose entry `=` repeats */
  repeatOf?: number;
  aliases: PathSpec[];
  crossReferences: Array<{ kind: CrossReferenceKind; target: PathSpec }>;
  sortKey?: string;
  definition: boolean;
  rangeMode?: RangeMode;
  suffix?: string;
  /** Resolved entry path, once known */
  path?: EntryPath;
}

export interface ResolutionResult {
  snapshot: RegistrySnapshot;
  anchors: number;
}

export type ProgressLogger = (message: string) => void;

function planToken(token: Token, previous: TokenPlan | undefined): TokenPlan {
  const plan: TokenPlan = { token, defines: [], aliases: [], crossReferences: [], definition: false };
  for (const directive of token.directives) {
    switch (directive.kind) {
      case 'heading':
        plan.heading = directive.segment;
        break;
      case 'subentry-of':
        plan.parent = directive.parent;
        break;
      case 'define-anchor':
        plan.defines.push(directive.name);
        break;
      case 'ref-anchor':
        plan.refAnchor = directive.name;
        break;
      case 'repeat-previous':
        if (!previous) {
          throw new MalformedTokenError('"=" has no earlier entry to repeat', token.location);
        }
        plan.repeatOf = previous.token.index;
        break;
      case 'definition':
        plan.definition = true;
        break;
      case 'alias-heading':
        plan.aliases.push(directive.path);
        break;
      case 'cross-ref':
        plan.crossReferences.push({ kind: directive.type, target: directive.target });
        break;
      case 'sort-key':
        plan.sortKey = directive.text;
        break;
      case 'range-mode':
        plan.rangeMode = directive.mode;
        break;
      case 'suffix':
        plan.suffix = directive.text;
        break;
    }
  }
  if (plan.repeatOf !== undefined && (plan.heading || plan.refAnchor)) {
    throw new MalformedTokenError('"=" cannot be combined with a heading', token.location);
  }
  return plan;
}

/**
 * Whether the token marks a place in the text. Tokens that only define a
 * redirect, and standalone tokens that only define an anchor, do not.
 */
function createsOccurrence(plan: TokenPlan): boolean {
  if (plan.crossReferences.some(ref => ref.kind === 'see')) {
    return false;
  }
  return !(plan.token.visible === '' && plan.defines.length > 0);
}

/**
 * Resolves a scanned token stream into an entry registry.
 *
 * Pass 1 walks the tokens in source order, binding anchor definitions and
 * registering every token whose path is known without anchors. Pass 2
 * runs once all anchors are defined and resolves the remaining tokens and
 * cross-references.
 */
export class DocumentResolver {
  private readonly registry = new EntryRegistry();
  private readonly anchors = new AnchorResolver();
  private readonly plans: TokenPlan[] = [];
  private readonly deferredPlans: TokenPlan[] = [];
  private readonly deferredReferences: Array<{ plan: TokenPlan; kind: CrossReferenceKind; target: PathSpec }> = [];
  private readonly deferredAliases: Array<{ plan: TokenPlan; alias: PathSpec }> = [];
  private secondPass = false;

  constructor(private readonly log: ProgressLogger = () => undefined) {}

  resolve(tokens: readonly Token[]): ResolutionResult {
    // Pass 1
    for (const token of tokens) {
      const plan = planToken(token, this.plans[this.plans.length - 1]);
      this.plans.push(plan);
      for (const name of plan.defines) {
        this.anchors.define(name, token.index, token.location);
      }
      for (const name of this.anchorsReferenced(plan)) {
        this.anchors.refer(name, token.index, token.location);
      }
      const path = this.tryPath(plan);
      if (path) {
        this.apply(plan, path);
      } else {
        this.deferredPlans.push(plan);
      }
    }

    // Pass 2
    this.anchors.finishCollection();
    this.secondPass = true;
    for (const plan of this.deferredPlans) {
      this.apply(plan, this.pathOf(plan));
    }
    for (const { plan, alias } of this.deferredAliases) {
      this.addAlias(plan, alias);
    }
    for (const { plan, kind, target } of this.deferredReferences) {
      this.addCrossReference(plan, kind, target);
    }

    return { snapshot: this.registry.freeze(), anchors: this.anchors.size };
  }

  private anchorsReferenced(plan: TokenPlan): string[] {
    const names: string[] = [];
    if (plan.refAnchor) names.push(plan.refAnchor);
    if (plan.parent?.anchor) names.push(plan.parent.anchor);
    for (const alias of plan.aliases) {
      if (alias.anchor) names.push(alias.anchor);
    }
    for (const reference of plan.crossReferences) {
      if (reference.target.anchor) names.push(reference.target.anchor);
    }
    return names;
  }

  /**
   * The token's path if it can be worked out now; undefined while it
   * depends on an anchor that pass 2 has yet to resolve.
   */
  private tryPath(plan: TokenPlan): EntryPath | undefined {
    if (plan.path) {
      return plan.path;
    }
    if (plan.repeatOf !== undefined) {
      return this.tryPath(this.plans[plan.repeatOf]);
    }
    if (plan.refAnchor || plan.parent?.anchor) {
      return undefined;
    }
    return this.pathOf(plan);
  }

  private pathOf(plan: TokenPlan): EntryPath {
    if (plan.path) {
      return plan.path;
    }
    const { token } = plan;
    let path: EntryPath;
    if (plan.repeatOf !== undefined) {
      path = this.pathOf(this.plans[plan.repeatOf]);
    } else if (plan.refAnchor && !plan.heading) {
      path = this.anchorPath(plan.refAnchor, token.location);
    } else {
      const parent = plan.parent ? this.specPath(plan.parent, token.location) : [];
      const heading: PathSegment = plan.heading ?? { kind: 'text', text: token.plainText };
      path = [...parent, ...this.expandSegment(heading)];
    }
    plan.path = path;
    return path;
  }

  private anchorPath(name: string, location: SourceLocation): EntryPath {
    return this.anchors.resolve(name, location, binding => this.pathOf(this.plans[binding.tokenIndex]));
  }

  private specPath(spec: PathSpec, location: SourceLocation): EntryPath {
    const base = spec.anchor ? this.anchorPath(spec.anchor, location) : [];
    return [...base, ...spec.segments.flatMap(segment => this.expandSegment(segment))];
  }

  /**
   * `*^` expands to the full path of the first entry whose heading starts
   * with the attached text, `*^-` to that entry's heading alone.
   */
  private expandSegment(segment: PathSegment): EntryPath {
    if (segment.kind === 'text') {
      return [segment.text];
    }
    const found = this.registry.prefixSearch(segment.text);
    if (!found) {
      return [segment.text];
    }
    return segment.labelOnly ? [found.heading] : this.registry.pathOf(found);
  }

  private directives(plan: TokenPlan): EntryDirectives {
    return { sourceIndex: plan.token.index, sortKey: plan.sortKey, location: plan.token.location };
  }

  private apply(plan: TokenPlan, path: EntryPath): void {
    plan.path = path;
    const { token } = plan;

    for (const name of plan.defines) {
      this.anchors.bind(name, path);
    }

    this.registry.register(path, undefined, this.directives(plan));

    for (const alias of plan.aliases) {
      if (alias.anchor && !this.secondPass) {
        this.deferredAliases.push({ plan, alias });
      } else {
        this.addAlias(plan, alias);
      }
    }
    for (const { kind, target } of plan.crossReferences) {
      if (target.anchor && !this.secondPass) {
        this.deferredReferences.push({ plan, kind, target });
      } else {
        this.addCrossReference(plan, kind, target);
      }
    }

    if (createsOccurrence(plan)) {
      const occurrence: Occurrence = {
        sourceIndex: token.index,
        offset: token.start,
        line: token.location.line,
        definition: plan.definition
      };
      if (plan.rangeMode) occurrence.rangeMode = plan.rangeMode;
      if (plan.suffix) occurrence.suffix = plan.suffix;
      this.registry.register(path, occurrence, this.directives(plan));
      this.log(`line ${token.location.line}: ${path.join(' > ')}${plan.definition ? ' (definition)' : ''}`);
    } else {
      this.log(`line ${token.location.line}: ${path.join(' > ')} (no locator)`);
    }
  }

  private addAlias(plan: TokenPlan, alias: PathSpec): void {
    const path = this.pathOf(plan);
    this.registry.addAlias(this.specPath(alias, plan.token.location), path, this.directives(plan));
  }

  private addCrossReference(plan: TokenPlan, kind: CrossReferenceKind, target: PathSpec): void {
    const path = this.pathOf(plan);
    this.registry.addCrossReference(path, kind, this.specPath(target, plan.token.location), this.directives(plan));
  }
}
