/**
 * Base class for every error raised by anvil.
 *
 * `code` is stable and machine readable; `recoverable` tells the error handler
 * whether the operator can fix the problem and re-run the command.
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details?: string | undefined;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Serializable view used by `--verbose` output
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
    };
  }
}

/**
 * Normalize anything thrown into a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `code` of a Node system error (ENOENT, EACCES, ...), if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
