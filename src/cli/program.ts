import { Command } from "commander"
import type { AppConfig } from "@/lib/config"
import { consolidateCommand, type ConsolidateCommandOptions } from "./commands/consolidate"
import { downloadCommand, type DownloadCommandOptions } from "./commands/download"
import { handleError } from "./handle-error"
import {
  parseEncoding,
  parseNonNegativeNumber,
  parsePositiveNumber,
  parseRetryCount,
  parseUrlPattern,
} from "./options"

/**
 * Build the command tree. Command failures go through `handleError`
 * instead of rejecting `parseAsync`.
 */
export function createProgram(config: AppConfig): Command {
  const program = new Command()

  program
    .name("data-portal")
    .description("Download open-data portal resources and consolidate consumption exports")
    .version("0.1.0")

  program
    .command("download <datasetId>")
    .description("Download every resource of a dataset, skipping files already present")
    .option("-d, --dest <dir>", "Destination directory", config.downloadDir)
    .option("--match <regex>", "Only download resources whose URL matches", parseUrlPattern)
    .option("--timeout <seconds>", "Per-request timeout", parsePositiveNumber)
    .option("--max-retries <n>", "Attempts per request", parseRetryCount)
    .option("--retry-delay <seconds>", "Pause between attempts", parseNonNegativeNumber)
    .action(async (datasetId: string, options: DownloadCommandOptions) => {
      try {
        await downloadCommand(datasetId, options, config)
      } catch (error) {
        handleError(error)
      }
    })

  program
    .command("consolidate <input> [output]")
    .description("Merge the daily blocks of a consumption export into one table")
    .option("--encoding <encoding>", "Source file encoding (utf8|latin1)", parseEncoding, "utf8")
    .action(
      async (input: string, output: string | undefined, options: ConsolidateCommandOptions) => {
        try {
          await consolidateCommand(input, output, options)
        } catch (error) {
          handleError(error)
        }
      }
    )

  return program
}
