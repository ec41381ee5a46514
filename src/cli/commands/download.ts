import chalk from "chalk"
import type { AppConfig } from "@/lib/config"
import { DatasetPortalClient, type DownloadReport } from "@/lib/datasets"
import { formatDownloadReport } from "../formatters"

export interface DownloadCommandOptions {
  dest?: string
  match?: RegExp
  timeout?: number
  maxRetries?: number
  retryDelay?: number
}

/**
 * Download the resources of a dataset. Flags override configuration.
 * Per-resource failures are printed and set a non-zero exit code.
 */
export async function downloadCommand(
  datasetId: string,
  options: DownloadCommandOptions,
  config: AppConfig
): Promise<DownloadReport> {
  const client = new DatasetPortalClient({
    datasetId,
    baseUrl: config.portalBaseUrl,
    timeoutSeconds: options.timeout ?? config.timeoutSeconds,
    maxRetries: options.maxRetries ?? config.maxRetries,
    retryDelaySeconds: options.retryDelay ?? config.retryDelaySeconds,
  })
  const destination = options.dest ?? config.downloadDir
  const pattern = options.match

  console.log(chalk.bold(`Fetching resources of ${datasetId} into ${destination}...`))

  const report = await client.downloadResources(destination, {
    urlFilter: pattern ? (url) => pattern.test(url) : undefined,
  })

  for (const line of formatDownloadReport(report)) {
    console.log(line)
  }

  if (report.failed.length > 0) {
    process.exitCode = 1
  }
  return report
}
