/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err).
 * Lets a batch keep going when one item fails, without try/catch pyramids.
 *
 * @example
 * ```typescript
 * const result = await tryCatch(() => downloadOne(resource))
 *
 * if (!result.ok) {
 *   failed.push({ url: resource.url, error: result.error.message })
 *   continue
 * }
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Wrap an async operation that might throw.
 */
export async function tryCatch<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)))
  }
}
