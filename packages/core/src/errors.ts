/**
 * Error definitions for family classification, queries and configuration.
 */

/**
 * Error codes raised by the core package.
 */
export type OsFamilyErrorCode =
  // Classification
  | "UNKNOWN_FAMILY"
  // Arguments
  | "INVALID_ARGUMENT"
  // Configuration
  | "INVALID_CONFIG";

/**
 * Base class for every error the core package throws.
 *
 * @example
 * ```typescript
 * throw new ClassificationError("beos");
 * ```
 */
export class OsFamilyError extends Error {
  override readonly name: string = "OsFamilyError";

  constructor(
    /** Error code identifying the type of error */
    readonly code: OsFamilyErrorCode,
    message: string,
    readonly context?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a family token is not one of the registered families.
 * Always a caller or configuration defect.
 */
export class ClassificationError extends OsFamilyError {
  override readonly name = "ClassificationError";

  constructor(readonly family: string) {
    super("UNKNOWN_FAMILY", `Don't know how to detect os family "${family}"`, { family });
  }
}

/**
 * Thrown when a required string argument is missing or not a string.
 */
export class InvalidArgumentError extends OsFamilyError {
  override readonly name = "InvalidArgumentError";

  constructor(readonly argument: string, received: unknown) {
    super("INVALID_ARGUMENT", `Expected a string for "${argument}", received ${describeValue(received)}`, {
      argument,
    });
  }
}

/**
 * Thrown when a configuration file cannot be parsed or has the wrong shape.
 */
export class ConfigurationError extends OsFamilyError {
  override readonly name = "ConfigurationError";

  constructor(message: string, context?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, context);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  return typeof value;
}

/**
 * Type guard to check if an error is an OsFamilyError.
 */
export function isOsFamilyError(error: unknown): error is OsFamilyError {
  return error instanceof OsFamilyError;
}

/**
 * Type guard to check if an error is an OsFamilyError with a specific code.
 */
export function isOsFamilyErrorWithCode(error: unknown, code: OsFamilyErrorCode): error is OsFamilyError {
  return isOsFamilyError(error) && error.code === code;
}

/**
 * Narrow an untyped argument to a string, or throw InvalidArgumentError.
 */
export function requireString(value: unknown, argument: string): string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(argument, value);
  }
  return value;
}
