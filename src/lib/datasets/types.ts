/**
 * @fileoverview Dataset Types
 *
 * Portal payload schemas and the consolidated consumption table.
 *
 * @module lib/datasets/types
 */

import { z } from "zod"
import type { IsoDate } from "@/lib/types/branded"

/**
 * One downloadable file attached to a dataset.
 * Only `url` is required; the portal sends many more fields.
 */
export const resourceDescriptorSchema = z.looseObject({
  id: z.string().optional(),
  title: z.string().nullish(),
  format: z.string().nullish(),
  filesize: z.number().nullish(),
  url: z.string().min(1),
})

/**
 * Payload of `GET /api/1/datasets/{id}/`.
 */
export const datasetDescriptorSchema = z.looseObject({
  id: z.string().optional(),
  title: z.string().optional(),
  slug: z.string().optional(),
  resources: z.array(resourceDescriptorSchema).default([]),
})

export type ResourceDescriptor = Readonly<z.infer<typeof resourceDescriptorSchema>>
export type DatasetDescriptor = Readonly<z.infer<typeof datasetDescriptorSchema>>

/**
 * Why a resource was not downloaded
 */
export type SkipReason = "filtered" | "exists"

/**
 * Outcome of a `downloadResources` call. Per-resource failures land in
 * `failed` instead of aborting the batch.
 */
export interface DownloadReport {
  /** Paths of newly written files, under the destination directory */
  downloaded: string[]
  skipped: Array<{ url: string; reason: SkipReason }>
  failed: Array<{ url: string; error: string }>
}

/**
 * Output columns, in order. Names follow the source file headers.
 */
export const CONSUMPTION_COLUMNS = [
  "date",
  "Heures",
  "PrévisionJ-1",
  "PrévisionJ",
  "Consommation",
] as const

export type ConsumptionColumn = (typeof CONSUMPTION_COLUMNS)[number]

/**
 * One time slot of a daily block.
 */
export interface ConsumptionRow {
  /** Day of the block the row came from */
  date: IsoDate
  /** Time label as written in the file, e.g. "00:00" */
  hour: string
  /** "PrévisionJ-1": forecast issued the day before */
  forecastDayBefore: number
  /** "PrévisionJ": same-day forecast */
  forecastSameDay: number
  /** "Consommation": measured consumption */
  consumption: number
}

/**
 * All blocks of one file, in file order.
 */
export interface ConsumptionTable {
  columns: typeof CONSUMPTION_COLUMNS
  rows: ConsumptionRow[]
}

export interface ConsumptionSummary {
  rowCount: number
  columns: readonly ConsumptionColumn[]
  firstDate: IsoDate | null
  lastDate: IsoDate | null
}
