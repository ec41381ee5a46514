/**
 * Commander argument parsers for numeric and pattern flags.
 */

import { InvalidArgumentError } from "commander"
import type { ParseFileOptions } from "@/lib/datasets"

type Encoding = NonNullable<ParseFileOptions["encoding"]>

const ENCODINGS: readonly Encoding[] = ["utf8", "latin1"]

function parseNumber(value: string): number {
  const parsed = Number(value)
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.")
  }
  return parsed
}

export function parsePositiveNumber(value: string): number {
  const parsed = parseNumber(value)
  if (parsed <= 0) throw new InvalidArgumentError("Must be greater than 0.")
  return parsed
}

export function parseNonNegativeNumber(value: string): number {
  const parsed = parseNumber(value)
  if (parsed < 0) throw new InvalidArgumentError("Must be 0 or more.")
  return parsed
}

export function parseRetryCount(value: string): number {
  const parsed = parseNumber(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be an integer of at least 1.")
  }
  return parsed
}

export function parseUrlPattern(value: string): RegExp {
  try {
    return new RegExp(value)
  } catch (error) {
    throw new InvalidArgumentError(
      `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
    )
  }
}

export function parseEncoding(value: string): Encoding {
  const encoding = ENCODINGS.find((candidate) => candidate === value)
  if (!encoding) {
    throw new InvalidArgumentError(`Expected one of: ${ENCODINGS.join(", ")}.`)
  }
  return encoding
}
