/**
 * typed-writable — error classes
 *
 * Every failure here is permanent for its input: the library does no I/O,
 * so there is nothing to retry.
 */

/**
 * Thrown when a value outside the seven representable variants is offered
 * at a construction boundary: validate(), the smart constructors, and the
 * mutating methods of VariableSequence and Mapping.
 *
 * offendingType names the runtime type of the innermost rejected value,
 * e.g. 'boolean', 'symbol', 'Date'.
 */
export class ValidationError extends Error {
  readonly offendingType: string;

  constructor(message: string, offendingType: string) {
    super(message);
    this.name          = 'ValidationError';
    this.offendingType = offendingType;
  }
}

/**
 * Thrown when an encoded buffer is malformed. offset is the byte position at
 * which the problem was detected.
 */
export class DecodeError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number, options?: { cause?: unknown }) {
    super(`${message} (byte offset ${offset})`, options);
    this.name   = 'DecodeError';
    this.offset = offset;
  }
}

/** Thrown when a value cannot be written within the configured limits. */
export class EncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodeError';
  }
}

/**
 * Thrown by a ByteComparator configured with strictMappings when it reaches
 * two mappings at the same position. Mappings have no byte-level order; the
 * non-strict comparator reports them equal.
 */
export class ComparisonIncompletenessError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name   = 'ComparisonIncompletenessError';
    this.offset = offset;
  }
}
