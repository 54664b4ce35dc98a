export type SchedulingErrorKind =
  | 'INVALID_ROUTE'
  | 'INVALID_TRUCK'
  | 'INVALID_DRIVER'
  | 'NO_ROUTES'
  | 'NO_AVAILABLE_TRUCK'
  | 'NO_AVAILABLE_DRIVER'
  | 'NO_FACILITY'
  | 'NO_ALTERNATE_FACILITY'
  | 'NO_TRIPS'
  | 'DUPLICATE_ROUTE_SAME_DAY'
  | 'WORKING_HOURS_VIOLATION'
  | 'NO_QUALIFIED_TECHNICIAN'
  | 'STORAGE_FAILURE';

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SchedulingErrorKind; readonly detail?: string };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: SchedulingErrorKind, detail?: string): Outcome<T> {
  return detail === undefined ? { ok: false, error } : { ok: false, error, detail };
}

/**
 * Thrown inside a transaction to abort it; services catch it at their
 * boundary and turn it back into a failed outcome.
 */
export class SchedulingError extends Error {
  constructor(
    readonly kind: SchedulingErrorKind,
    detail?: string,
  ) {
    super(detail ? `${kind}: ${detail}` : kind);
    this.name = 'SchedulingError';
  }
}

/** Map anything a service caught to an outcome kind. */
export function toFailure<T = never>(err: unknown): Outcome<T> {
  if (err instanceof SchedulingError) return fail(err.kind);
  return fail('STORAGE_FAILURE', err instanceof Error ? err.message : String(err));
}
