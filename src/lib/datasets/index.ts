/**
 * @fileoverview Datasets Barrel Export
 *
 * Portal downloader and consumption-file parser.
 *
 * @module lib/datasets
 */

// Types
export type {
  ConsumptionColumn,
  ConsumptionRow,
  ConsumptionSummary,
  ConsumptionTable,
  DatasetDescriptor,
  DownloadReport,
  ResourceDescriptor,
  SkipReason,
} from "./types"

export { CONSUMPTION_COLUMNS, datasetDescriptorSchema, resourceDescriptorSchema } from "./types"

// Utilities
export { filenameFromUrl, nonEmptyLines, parseDecimal } from "./utils"

// Downloader
export {
  DatasetPortalClient,
  type DatasetPortalClientOptions,
  type DownloadResourcesOptions,
} from "./portal-client"

// Parser
export {
  classifyLine,
  parseBlockRows,
  parseConsumptionFile,
  parseConsumptionText,
  type LineEvent,
  type ParseFileOptions,
} from "./consumption-parser"

// Output
export {
  formatConsumptionCsv,
  summarizeConsumptionTable,
  writeConsumptionCsv,
} from "./consumption-table"
