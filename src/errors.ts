// Error Codes
// ==============================

/**
 * Every failure the engine reports.
 */
export type TermStatsErrorCode =
  | 'invalid_merge_input'
  | 'invalid_policy_id'
  | 'malformed_wire_data'
  | 'invalid_entry';

// Error Classes
// ==============================

/**
 * Base class for engine errors. Errors are local to the request that raised
 * them and are never retried by the engine.
 */
export class TermStatsError extends Error {
  readonly code: TermStatsErrorCode;

  constructor(code: TermStatsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TermStatsError';
    this.code = code;
  }
}

/**
 * `reduce` was called with an empty partial list or with partials that
 * disagree on name, ordering policy or required size.
 */
export class InvalidMergeInput extends TermStatsError {
  constructor(message: string) {
    super('invalid_merge_input', message);
    this.name = 'InvalidMergeInput';
  }
}

/**
 * An ordering-policy id or name that maps to no known policy.
 */
export class InvalidPolicyId extends TermStatsError {
  readonly policyId: number | string;

  constructor(policyId: number | string) {
    super('invalid_policy_id', `Unknown ordering policy: ${JSON.stringify(policyId)}`);
    this.name = 'InvalidPolicyId';
    this.policyId = policyId;
  }
}

/**
 * Bytes that do not form a valid facet, or a facet that cannot be written.
 */
export class MalformedWireData extends TermStatsError {
  /** Byte offset at which decoding failed, when known. */
  readonly offset: number | undefined;

  constructor(message: string, offset?: number, options?: { cause?: unknown }) {
    super(
      'malformed_wire_data',
      offset === undefined ? message : `${message} (at byte ${offset})`,
      options,
    );
    this.name = 'MalformedWireData';
    this.offset = offset;
  }
}

/**
 * An entry with a count that is not an integer >= 1.
 */
export class InvalidEntry extends TermStatsError {
  constructor(message: string) {
    super('invalid_entry', message);
    this.name = 'InvalidEntry';
  }
}

// Utilities
// ==============================

/**
 * Narrow an unknown value to a `TermStatsError`, optionally of a given code.
 */
export function isTermStatsError(
  value: unknown,
  code?: TermStatsErrorCode,
): value is TermStatsError {
  return value instanceof TermStatsError && (code === undefined || value.code === code);
}
