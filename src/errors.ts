/**
 * Fatal error reporting.
 *
 * Data that does not fit a schema is reported as a returned `RangeViolation`.
 * Everything in this module is for the other tier: misuse of the API by the
 * program itself (unknown keys while merging, missing profiles, bad access
 * paths, schemas declaring a key twice) and rejected configurations surfacing
 * out of `makeConfiguration`. These are thrown and never recovered internally.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling of fatal reports.
 */
export type ConfigurationErrorCode =
  | 'UNKNOWN_SCHEMA_KEY'
  | 'MISSING_PROFILE'
  | 'NOT_A_MAP'
  | 'UNKNOWN_ACCESS_PATH'
  | 'RANGE_VIOLATION'
  | 'DUPLICATE_SCHEMA_KEY'
  | 'FOLD_PRECONDITION';

/**
 * Error thrown for every fatal report.
 */
export class ConfigurationError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ConfigurationErrorCode;
  /** Name of the operation that reported the error. */
  public readonly who: string;
  /** Free-form context: paths, keys, offending values. */
  public readonly details: Readonly<Record<string, unknown>>;

  /**
   * Creates a new ConfigurationError.
   *
   * @param who - The reporting operation.
   * @param code - The error code.
   * @param message - Human-readable error message.
   * @param details - Additional context.
   */
  constructor(
    who: string,
    code: ConfigurationErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {}
  ) {
    super(`${who}: ${message}`);
    this.name = 'ConfigurationError';
    this.code = code;
    this.who = who;
    this.details = details;
  }
}

/**
 * Reports a fatal condition. Never returns.
 *
 * @param who - The reporting operation, e.g. `'applyProfiles'`.
 * @param code - The error code.
 * @param message - Human-readable error message.
 * @param details - Additional context.
 * @throws ConfigurationError always.
 */
export function reportFatal(
  who: string,
  code: ConfigurationErrorCode,
  message: string,
  details: Readonly<Record<string, unknown>> = {}
): never {
  throw new ConfigurationError(who, code, message, details);
}
