/**
 * Error types
 *
 * Programming errors (phases called out of order, a scene without bounds,
 * a primitive id that does not match the insertion index) throw. Failures the
 * caller is expected to handle, such as running out of buffer space, are
 * returned as results.
 */

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** Structured failure with a machine-readable code */
export type ErrorDetail<C extends string> = Readonly<{ code: C; detail: string }>;

/** Discriminated union result of an operation that can fail */
export type Result<T, E> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: E }>;

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<C extends string>(code: C, detail: string): Result<never, ErrorDetail<C>> {
  return { ok: false, error: { code, detail } };
}
