/**
 * Raised when a directive value is not valid delta-seconds.
 */
export class DeltaSecondsError extends Error {
  /** The value text that failed conversion. */
  readonly value: string;

  constructor(message: string, value: string) {
    super(message);
    this.name = 'DeltaSecondsError';
    this.value = value;
  }
}

/**
 * Base class for grammar errors raised by strict parsing.
 */
export class CacheControlParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CacheControlParseError';
  }
}

export class UnknownDirectiveError extends CacheControlParseError {
  /** Offending directive name, lowercased. Empty for an empty list member. */
  readonly directive: string;

  constructor(directive: string) {
    super(`unknown directive: ${directive}`);
    this.name = 'UnknownDirectiveError';
    this.directive = directive;
  }
}

export class InvalidDirectiveValueError extends CacheControlParseError {
  readonly directive: string;
  /** Value text as it appeared after normalization. */
  readonly value: string;
  declare readonly cause: DeltaSecondsError;

  constructor(directive: string, value: string, cause: DeltaSecondsError) {
    super(
      `failed to parse the value of directive(${directive}=${value}): ${cause.message}`,
      { cause },
    );
    this.name = 'InvalidDirectiveValueError';
    this.directive = directive;
    this.value = value;
  }
}

/**
 * Raised when a header source stream fails while being drained. This is an
 * I/O failure, not a grammar error, so it does not extend
 * {@link CacheControlParseError}.
 */
export class CacheControlSourceReadError extends Error {
  constructor(cause: unknown) {
    super(
      `failed to read Cache-Control header source: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = 'CacheControlSourceReadError';
  }
}
