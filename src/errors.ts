/**
 * Error hierarchy for spendguard.
 *
 * All errors extend {@link SpendGuardError} so callers can match on `code`:
 *
 * ```ts
 * try {
 *   await store.initialize();
 * } catch (e) {
 *   if (e instanceof PersistenceError) { ... }
 * }
 * ```
 *
 * @module errors
 */

/** Base error. Includes an error code for programmatic matching. */
export class SpendGuardError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "SpendGuardError";
    this.code = code;
  }
}

/** Thrown when a settings value fails validation. */
export class ConfigValidationError extends SpendGuardError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIG_VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigValidationError";
    this.field = field;
  }
}

/** Thrown when the remote price catalog cannot be read. */
export class PricingLookupError extends SpendGuardError {
  readonly model: string;
  constructor(model: string, message: string) {
    super("PRICING_LOOKUP_ERROR", `Pricing lookup for "${model}" failed: ${message}`);
    this.name = "PricingLookupError";
    this.model = model;
  }
}

/** Thrown by store adapters when a read or write cannot complete. */
export class PersistenceError extends SpendGuardError {
  readonly operation: string;
  readonly cause?: Error;
  constructor(operation: string, message: string, cause?: Error) {
    super("PERSISTENCE_ERROR", `${operation} failed: ${message}`);
    this.name = "PersistenceError";
    this.operation = operation;
    this.cause = cause;
  }
}

/** Flattens an unknown thrown value into log-friendly fields. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof SpendGuardError) {
    return { name: error.name, code: error.code, message: error.message, stack: error.stack };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
