/**
 * Explicit outcome of a non-throwing mapping attempt.
 *
 * Used by `Mapper.tryConvertFrom` and `TaxonomyTypeMapper.tryMap` in place of
 * out-parameters or swallowed exceptions.
 *
 * @example
 * ```typescript
 * const result = typeMapper.tryMap(entity, Campaign);
 * if (isMapSuccess(result)) {
 *   use(result.value);
 * } else {
 *   log.debug('not mappable', { error_message: result.error.message });
 * }
 * ```
 */

export interface MapSuccess<T> {
  readonly success: true;
  readonly value: T;
}

export interface MapFailure {
  readonly success: false;
  readonly value: null;
  readonly error: Error;
}

export type MapResult<T> = MapSuccess<T> | MapFailure;

export function mapSuccess<T>(value: T): MapSuccess<T> {
  return { success: true, value };
}

/**
 * Build a failure result. Non-`Error` throwables are wrapped.
 */
export function mapFailure(error: unknown): MapFailure {
  return { success: false, value: null, error: toError(error) };
}

export function isMapSuccess<T>(result: MapResult<T>): result is MapSuccess<T> {
  return result.success;
}

/**
 * Normalize anything thrown into an `Error`.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
