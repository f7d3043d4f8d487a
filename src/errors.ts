// Error types for the document engine
// Every loud failure is raised before the tree or the indices are touched.

export type QuireErrorCode =
  | 'malformed-shorthand'
  | 'unknown-option'
  | 'invalid-value'
  | 'attribute-not-set'
  | 'structure'
  | 'not-a-child'
  | 'target-not-found'
  | 'config';

export class QuireError extends Error {
  readonly code: QuireErrorCode;

  constructor(code: QuireErrorCode, message: string) {
    super(message);
    this.name = 'QuireError';
    this.code = code;
  }
}

/**
 * A quad-coordinate string ("top,left,height,width") did not match.
 */
export class MalformedShorthandError extends QuireError {
  constructor(public readonly input: string) {
    super('malformed-shorthand', `Could not parse attribute string option: ${input}`);
    this.name = 'MalformedShorthandError';
  }
}

/**
 * A keyword was not found in an enumerated option list (display, position, ...).
 */
export class UnknownOptionError extends QuireError {
  constructor(public readonly listName: string, public readonly option: string) {
    super('unknown-option', `${listName} attribute string option not found: ${option}`);
    this.name = 'UnknownOptionError';
  }
}

/**
 * A number-valued attribute (opacity, focusIndex, zIndex) got something that is not a number.
 */
export class InvalidValueError extends QuireError {
  constructor(public readonly attribute: string, public readonly input: string) {
    super('invalid-value', `Invalid ${attribute} value: ${input}`);
    this.name = 'InvalidValueError';
  }
}

export class AttributeNotSetError extends QuireError {
  constructor(public readonly kind: string, elementLabel: string) {
    super('attribute-not-set', `Attribute "${kind}" is not set on ${elementLabel}`);
    this.name = 'AttributeNotSetError';
  }
}

export class StructureError extends QuireError {
  constructor(message: string) {
    super('structure', message);
    this.name = 'StructureError';
  }
}

export class NotAChildError extends QuireError {
  constructor(childLabel: string, parentLabel: string) {
    super('not-a-child', `Referenced element ${childLabel} is not a child of ${parentLabel}`);
    this.name = 'NotAChildError';
  }
}

export class TargetNotFoundError extends QuireError {
  constructor(public readonly target: string) {
    super('target-not-found', `Target element not found: ${target}`);
    this.name = 'TargetNotFoundError';
  }
}

/**
 * Bad command line flag or configuration value.
 */
export class ConfigError extends QuireError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
