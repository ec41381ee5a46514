/**
 * Branded types for nominal typing of identifiers and dates.
 *
 * Prevents accidentally passing a free-form string where a portal dataset id
 * or a normalized calendar date is expected.
 * Zero runtime cost - brands are erased during compilation.
 *
 * @example
 * ```typescript
 * const datasetId = asDatasetId("consommation-electrique")
 * const day = toIsoDate(2025, 1, 5) // "2025-01-05"
 * ```
 */

declare const __brand: unique symbol

/**
 * Brand a base type with a unique tag for nominal typing.
 */
type Brand<T, B> = T & { readonly [__brand]: B }

/**
 * Dataset identifier or slug on the open-data portal.
 */
export type DatasetId = Brand<string, "DatasetId">

/**
 * Calendar day formatted as YYYY-MM-DD.
 */
export type IsoDate = Brand<string, "IsoDate">

/**
 * Create a DatasetId from a string.
 */
export function asDatasetId(id: string): DatasetId {
  return id as DatasetId
}

/**
 * Build an IsoDate from its parts, or null when the parts do not name a real
 * day (month 13, 31 February, ...).
 */
export function toIsoDate(year: number, month: number, day: number): IsoDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null
  }
  const date = new Date(Date.UTC(year, month - 1, day))
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null
  }
  const pad = (n: number, width: number) => String(n).padStart(width, "0")
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` as IsoDate
}
