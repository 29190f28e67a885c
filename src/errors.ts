import { SourceLocation } from './types.js';

export type IndexErrorCode =
  | 'MalformedToken'
  | 'UnknownAnchor'
  | 'DuplicateAnchor'
  | 'ConflictingAlias'
  | 'AmbiguousEntry'
  | 'MultiplePlaceholders'
  | 'CyclicReference'
  | 'InvalidConfiguration';

/**
 * A fatal problem with the document. Resolution stops and no index is produced.
 */
export class IndexError extends Error {
  constructor(
    public readonly code: IndexErrorCode,
    message: string,
    public readonly location?: SourceLocation,
    public readonly statusCode: number = 422
  ) {
    super(location ? `${message} (line ${location.line}, column ${location.column})` : message);
    this.name = 'IndexError';
  }
}

export class MalformedTokenError extends IndexError {
  constructor(message: string, location?: SourceLocation) {
    super('MalformedToken', message, location);
    this.name = 'MalformedTokenError';
  }
}

export class UnknownAnchorError extends IndexError {
  constructor(public readonly anchor: string, location?: SourceLocation) {
    super('UnknownAnchor', `Anchor #${anchor} is never defined`, location);
    this.name = 'UnknownAnchorError';
  }
}

export class DuplicateAnchorError extends IndexError {
  constructor(public readonly anchor: string, location?: SourceLocation) {
    super('DuplicateAnchor', `Anchor ##${anchor} is defined more than once`, location);
    this.name = 'DuplicateAnchorError';
  }
}

export class ConflictingAliasError extends IndexError {
  constructor(message: string, location?: SourceLocation) {
    super('ConflictingAlias', message, location);
    this.name = 'ConflictingAliasError';
  }
}

export class AmbiguousEntryError extends IndexError {
  constructor(message: string, location?: SourceLocation) {
    super('AmbiguousEntry', message, location);
    this.name = 'AmbiguousEntryError';
  }
}

export class MultiplePlaceholdersError extends IndexError {
  constructor(location?: SourceLocation) {
    super('MultiplePlaceholders', 'Document contains more than one {index} placeholder', location);
    this.name = 'MultiplePlaceholdersError';
  }
}

export class CyclicReferenceError extends IndexError {
  constructor(message: string, location?: SourceLocation) {
    super('CyclicReference', message, location);
    this.name = 'CyclicReferenceError';
  }
}

export class InvalidConfigurationError extends IndexError {
  constructor(message: string) {
    super('InvalidConfiguration', message);
    this.name = 'InvalidConfigurationError';
  }
}

export type IndexWarningCode =
  | 'EmptyIndex'
  | 'MissingPlaceholder'
  | 'UnresolvedCrossReference'
  | 'UnknownOption';

/**
 * A non-fatal problem. Resolution completes and the warning is returned
 * alongside the output.
 */
export interface IndexWarning {
  code: IndexWarningCode;
  message: string;
  location?: SourceLocation;
}
