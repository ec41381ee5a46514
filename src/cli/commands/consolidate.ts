import chalk from "chalk"
import {
  parseConsumptionFile,
  summarizeConsumptionTable,
  writeConsumptionCsv,
  type ConsumptionSummary,
  type ParseFileOptions,
} from "@/lib/datasets"
import { formatSummary } from "../formatters"

export type ConsolidateCommandOptions = ParseFileOptions

/**
 * Parse a consumption export, print its summary, and write the CSV when an
 * output path is given.
 */
export async function consolidateCommand(
  input: string,
  output: string | undefined,
  options: ConsolidateCommandOptions
): Promise<ConsumptionSummary> {
  console.log(chalk.bold(`Reading consumption data from ${input}...`))

  const table = await parseConsumptionFile(input, { encoding: options.encoding })
  const summary = summarizeConsumptionTable(table)

  for (const line of formatSummary(summary)) {
    console.log(line)
  }

  if (output) {
    await writeConsumptionCsv(table, output)
    console.log(chalk.green(`Data saved to ${output}`))
  }

  return summary
}
