export type CoreErrorCode = "INVALID_KEY" | "INVALID_VALUE" | "INVALID_POPULATION" | "INVALID_RECORD";

/**
 * Base class for programmer and data errors raised by the core.
 * None of them is transient; callers validate up front or translate them.
 */
export class CoreError extends Error {
  public readonly code: CoreErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: CoreErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidKeyError extends CoreError {
  constructor(key: string, detail: string) {
    super(`invalid key "${key}": ${detail}`, "INVALID_KEY", { key });
  }
}

export class InvalidValueError extends CoreError {
  constructor(key: string) {
    super(`value for key "${key}" must not be null or undefined`, "INVALID_VALUE", { key });
  }
}

export class InvalidPopulationError extends CoreError {
  constructor(name: string, population: number) {
    super(`population of "${name}" must be a positive number, got ${population}`, "INVALID_POPULATION", {
      name,
      population,
    });
  }
}

export class InvalidRecordError extends CoreError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_RECORD", context);
  }
}

export function isCoreError(e: unknown): e is CoreError {
  return e instanceof CoreError;
}
