/**
 * Result type for failures that are values rather than exceptions.
 *
 * Parsing a similarity method and running an optional validation step both
 * return a Result so callers choose whether to throw.
 *
 * @example
 * ```typescript
 * const parsed = parseSimilarityMethod(env.VALIDATION_SIMILARITY_METHOD)
 *
 * if (!parsed.ok) {
 *   return { status: 500, body: parsed.error.toJSON() }
 * }
 *
 * calculateSimilarity(a, b, parsed.value)
 * ```
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Unwrap the value or throw the error.
 * Use at boundaries where throwing is appropriate.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}

/**
 * Run an async operation, mapping a rejection through `mapError`.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}
