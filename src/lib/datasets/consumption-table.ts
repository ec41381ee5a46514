/**
 * @fileoverview Consumption Table Output
 *
 * CSV serialization and a short summary of a consolidated consumption table.
 *
 * @module lib/datasets/consumption-table
 */

import { mkdir, writeFile } from "fs/promises"
import { dirname } from "path"
import Papa from "papaparse"
import { IoError } from "@/lib/errors"
import {
  CONSUMPTION_COLUMNS,
  type ConsumptionSummary,
  type ConsumptionTable,
} from "./types"

/**
 * Serialize a table as CSV: header row, then one line per row, "\n" endings,
 * no trailing newline.
 */
export function formatConsumptionCsv(table: ConsumptionTable): string {
  return Papa.unparse(
    {
      fields: [...CONSUMPTION_COLUMNS],
      data: table.rows.map((row) => [
        row.date,
        row.hour,
        row.forecastDayBefore,
        row.forecastSameDay,
        row.consumption,
      ]),
    },
    { newline: "\n" }
  )
}

/**
 * Write a table to `path` as UTF-8 CSV, creating parent directories.
 *
 * @throws IoError when the file cannot be written
 */
export async function writeConsumptionCsv(
  table: ConsumptionTable,
  path: string
): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, `${formatConsumptionCsv(table)}\n`, "utf8")
  } catch (error) {
    throw new IoError(`Cannot write CSV to ${path}`, path, { cause: error })
  }
}

/**
 * Row count, columns and date range of a table.
 */
export function summarizeConsumptionTable(table: ConsumptionTable): ConsumptionSummary {
  let firstDate: ConsumptionSummary["firstDate"] = null
  let lastDate: ConsumptionSummary["lastDate"] = null

  // ISO dates order lexicographically
  for (const { date } of table.rows) {
    if (firstDate === null || date < firstDate) firstDate = date
    if (lastDate === null || date > lastDate) lastDate = date
  }

  return {
    rowCount: table.rows.length,
    columns: table.columns,
    firstDate,
    lastDate,
  }
}
