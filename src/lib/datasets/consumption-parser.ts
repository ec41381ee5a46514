/**
 * @fileoverview Daily Consumption Block Parser
 *
 * Parses the grid operator's consumption export: a tab-separated text file
 * (shipped with an .xls extension) made of repeated daily blocks:
 *
 * ```
 * Journée du 05/01/2025
 * Heures	PrévisionJ-1	PrévisionJ	Consommation
 * 00:00	1000.5	1020.0	990.2
 * 00:15	...
 * ```
 *
 * Every block becomes a run of rows tagged with its date; blocks are
 * concatenated in file order. The parser is permissive: lines it cannot read
 * are dropped, and a file without any recognizable block yields an empty table.
 *
 * @module lib/datasets/consumption-parser
 */

import { readFile } from "fs/promises"
import { IoError } from "@/lib/errors"
import { toIsoDate, type IsoDate } from "@/lib/types/branded"
import {
  CONSUMPTION_COLUMNS,
  type ConsumptionRow,
  type ConsumptionTable,
} from "./types"
import { nonEmptyLines, parseDecimal } from "./utils"

/** Present in every date header; the accented letter is often mis-encoded */
const DATE_HEADER_MARKER = "Journ"
const DATE_PATTERN = /(\d{2})\/(\d{2})\/(\d{4})/
const COLUMN_HEADER_TOKENS = ["Heures", "Hours"] as const
const MIN_FIELDS = 4

/**
 * What a single trimmed line means to the parser.
 * `date` is null when the header names a day that does not exist.
 */
export type LineEvent =
  | { kind: "date-header"; date: IsoDate | null }
  | { kind: "column-header" }
  | { kind: "ignored" }
  | { kind: "content"; line: string }

/**
 * - seeking: between a date header and its column header, or before any
 *   usable date. Content lines are ignored.
 * - in-block: after the column header; content lines are collected.
 */
type ParserState =
  | { phase: "seeking"; date: IsoDate | null }
  | { phase: "in-block"; date: IsoDate; lines: string[] }

export interface ParseFileOptions {
  /** Exports saved by older tools are Windows-1252; read those as latin1 */
  encoding?: "utf8" | "latin1"
}

/**
 * Classify a trimmed, non-empty line. A marker line that looks like a date
 * header ("/" present) but carries no DD/MM/YYYY date is ignored.
 */
export function classifyLine(line: string): LineEvent {
  if (line.includes(DATE_HEADER_MARKER)) {
    const match = line.match(DATE_PATTERN)
    if (match) {
      const [, day, month, year] = match
      return {
        kind: "date-header",
        date: toIsoDate(Number(year), Number(month), Number(day)),
      }
    }
    if (line.includes("/")) {
      return { kind: "ignored" }
    }
  }

  if (COLUMN_HEADER_TOKENS.some((token) => line.startsWith(token))) {
    return { kind: "column-header" }
  }

  return { kind: "content", line }
}

/**
 * Turn the collected lines of one block into rows.
 * A line needs at least four tab-separated fields, the last three of which
 * must be decimal numbers; anything else is dropped.
 */
export function parseBlockRows(
  date: IsoDate,
  lines: readonly string[]
): ConsumptionRow[] {
  const rows: ConsumptionRow[] = []

  for (const line of lines) {
    const fields = line.split("\t")
    if (fields.length < MIN_FIELDS) continue

    const forecastDayBefore = parseDecimal(fields[1])
    const forecastSameDay = parseDecimal(fields[2])
    const consumption = parseDecimal(fields[3])
    if (forecastDayBefore === null || forecastSameDay === null || consumption === null) {
      continue
    }

    rows.push({
      date,
      hour: fields[0].trim(),
      forecastDayBefore,
      forecastSameDay,
      consumption,
    })
  }

  return rows
}

/**
 * Parse the text content of a consumption export.
 */
export function parseConsumptionText(text: string): ConsumptionTable {
  const rows: ConsumptionRow[] = []
  let state: ParserState = { phase: "seeking", date: null }

  const flush = (current: ParserState) => {
    if (current.phase === "in-block") {
      rows.push(...parseBlockRows(current.date, current.lines))
    }
  }

  for (const line of nonEmptyLines(text)) {
    const event = classifyLine(line)

    switch (event.kind) {
      case "date-header":
        // A new date always resets, even when the previous block never got a column header
        flush(state)
        state = { phase: "seeking", date: event.date }
        break

      case "column-header":
        if (state.date !== null) {
          state = { phase: "in-block", date: state.date, lines: [] }
        }
        break

      case "ignored":
        break

      case "content":
        if (state.phase === "in-block") {
          state.lines.push(event.line)
        }
        break
    }
  }

  flush(state)

  return { columns: CONSUMPTION_COLUMNS, rows }
}

/**
 * Read and parse a consumption export from disk.
 *
 * @throws IoError when the file is missing or unreadable
 */
export async function parseConsumptionFile(
  path: string,
  options: ParseFileOptions = {}
): Promise<ConsumptionTable> {
  let text: string
  try {
    text = await readFile(path, { encoding: options.encoding ?? "utf8" })
  } catch (error) {
    throw new IoError(`Cannot read consumption file ${path}`, path, { cause: error })
  }

  return parseConsumptionText(text)
}
