/**
 * packages/core/src/errors.ts — Error type for deterministic runtime violations.
 *
 * Why: Every failure the engine raises on purpose carries a stable `code` so
 * hosts and tests can branch on it without parsing messages. Layout never
 * throws for under-constrained input; only contract violations, invalid
 * configuration and host failures do.
 */

export type CellframeErrorCode =
  | "CF_INVALID_PROPS"
  | "CF_CONTRACT_VIOLATION"
  | "CF_REENTRANT_RENDER"
  | "CF_HOST_ERROR"
  | "CF_INVALID_KEY";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class CellframeError extends Error {
  override readonly name = "CellframeError";
  readonly code: CellframeErrorCode;

  constructor(code: CellframeErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CellframeError);
    }
  }
}

export function invalidProps(detail: string): never {
  throw new CellframeError("CF_INVALID_PROPS", detail);
}

export function contractViolation(detail: string): never {
  throw new CellframeError("CF_CONTRACT_VIOLATION", detail);
}

export function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

export function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

/** Render an unknown thrown value for inclusion in an error message. */
export function describeThrown(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return String(e);
}
