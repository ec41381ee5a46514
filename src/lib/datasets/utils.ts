/**
 * @fileoverview Dataset Utilities
 *
 * Small string helpers shared by the downloader and the block parser.
 *
 * @module lib/datasets/utils
 */

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Parse a plain decimal number ("1000.5", "-3", "1e3", " 42 ").
 * Returns null for anything else, including empty strings, "NaN",
 * comma decimals and thousands separators.
 */
export function parseDecimal(field: string): number | null {
  const trimmed = field.trim()
  if (!DECIMAL_PATTERN.test(trimmed)) return null
  return Number(trimmed)
}

function pathnameOf(url: string): string {
  try {
    return new URL(url).pathname
  } catch {
    return url.split(/[?#]/)[0]
  }
}

/**
 * Last segment of a URL path, used as the local filename of a resource.
 * Query string and fragment are ignored. Returns null when the path ends
 * with a slash or the segment is a dot entry.
 */
export function filenameFromUrl(url: string): string | null {
  const segment = pathnameOf(url).split("/").pop() ?? ""
  if (segment === "" || segment === "." || segment === "..") return null
  return segment
}

/**
 * Split text into trimmed, non-empty lines. Handles LF, CRLF and lone CR.
 */
export function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}
