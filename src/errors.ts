/**
 * Thrown when a cache is built with a configuration it cannot honour:
 * a maximum size that is not a positive integer, an unknown removal policy
 * or an unknown option.
 */
export class InvalidConfigurationError extends Error {
  /** Name of the offending option */
  readonly field: string;
  /** The value that was rejected */
  readonly invalidValue: unknown;

  constructor(message: string, field: string, invalidValue: unknown) {
    super(message);
    this.name = 'InvalidConfigurationError';
    this.field = field;
    this.invalidValue = invalidValue;
  }
}

/**
 * Thrown by a live cache traversal whose cache was structurally modified
 * after the traversal started.
 */
export class ConcurrentModificationError extends Error {
  constructor(message = 'Cache was structurally modified during iteration') {
    super(message);
    this.name = 'ConcurrentModificationError';
  }
}
