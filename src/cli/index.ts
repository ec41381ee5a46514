#!/usr/bin/env -S npx tsx
/**
 * data-portal CLI
 *
 * Usage:
 *   data-portal download <datasetId> [--dest ./data] [--match "\.xls$"]
 *   data-portal consolidate <input> [output.csv] [--encoding latin1]
 */

import "dotenv/config"
import * as Sentry from "@sentry/node"
import { loadConfig } from "@/lib/config"
import { initSentry } from "../instrument"
import { handleError } from "./handle-error"
import { createProgram } from "./program"

async function main(): Promise<void> {
  const config = loadConfig()
  initSentry(config)
  await createProgram(config).parseAsync(process.argv)
}

void main()
  .catch(handleError)
  .finally(() => Sentry.flush(2000))
