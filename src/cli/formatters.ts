import chalk from "chalk"
import type { ConsumptionSummary, DownloadReport } from "@/lib/datasets"

/**
 * One line per resource, then a totals line.
 */
export function formatDownloadReport(report: DownloadReport): string[] {
  const lines: string[] = []

  for (const path of report.downloaded) {
    lines.push(`  ${chalk.green("✓")} ${path}`)
  }
  for (const { url, reason } of report.skipped) {
    const why = reason === "exists" ? "already downloaded" : "filtered out"
    lines.push(`  ${chalk.gray("○")} ${url} ${chalk.gray(`(${why})`)}`)
  }
  for (const { url, error } of report.failed) {
    lines.push(`  ${chalk.red("✗")} ${url}`)
    lines.push(`    ${chalk.red(error)}`)
  }

  const totals = [
    chalk.green(`${report.downloaded.length} downloaded`),
    chalk.gray(`${report.skipped.length} skipped`),
    report.failed.length > 0
      ? chalk.red(`${report.failed.length} failed`)
      : `${report.failed.length} failed`,
  ]
  lines.push(chalk.bold(`Done: ${totals.join(", ")}`))
  return lines
}

/**
 * Shape and date range of a parsed table.
 */
export function formatSummary(summary: ConsumptionSummary): string[] {
  const range =
    summary.firstDate && summary.lastDate
      ? `${summary.firstDate} to ${summary.lastDate}`
      : chalk.gray("(no data)")

  return [
    `Rows:       ${summary.rowCount}`,
    `Columns:    ${summary.columns.join(", ")}`,
    `Date range: ${range}`,
  ]
}
