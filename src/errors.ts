export type PersistenceErrorKind = "not_found" | "malformed" | "invalid" | "io";

export class PersistenceError extends Error {
  readonly kind: PersistenceErrorKind;

  constructor(kind: PersistenceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
    this.kind = kind;
  }
}

export type Result<T, E = PersistenceError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
