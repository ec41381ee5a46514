/**
 * @fileoverview Open-Data Portal Client
 *
 * Fetches dataset metadata from the portal API (`/api/1/datasets/{id}/`)
 * and downloads the resource files it lists. Every HTTP call gets a
 * per-attempt timeout and a fixed-delay retry.
 *
 * One client is one session for one dataset: metadata and the resource list
 * are cached on the instance and refreshed with `force`.
 *
 * @module lib/datasets/portal-client
 */

import { access, mkdir, rename, rm, writeFile } from "fs/promises"
import { join } from "path"
import { z } from "zod"
import { DEFAULT_PORTAL_BASE_URL } from "@/lib/config"
import {
  IoError,
  NetworkError,
  ValidationError,
  errorMessage,
} from "@/lib/errors"
import { fmt, logger } from "@/lib/logger"
import { tryCatch } from "@/lib/result"
import { withRetry } from "@/lib/retry"
import { asDatasetId, type DatasetId } from "@/lib/types/branded"
import {
  datasetDescriptorSchema,
  type DatasetDescriptor,
  type DownloadReport,
  type ResourceDescriptor,
} from "./types"
import { filenameFromUrl } from "./utils"

const PARTIAL_SUFFIX = ".part"

const clientOptionsSchema = z.object({
  datasetId: z.string().trim().min(1),
  baseUrl: z.url().default(DEFAULT_PORTAL_BASE_URL),
  timeoutSeconds: z.number().positive().default(30),
  maxRetries: z.number().int().min(1).default(3),
  retryDelaySeconds: z.number().min(0).default(2),
})

export type DatasetPortalClientOptions = z.input<typeof clientOptionsSchema>

export interface DownloadResourcesOptions {
  /** Re-fetch dataset metadata before downloading. Existing files are still kept. */
  force?: boolean
  /** Resources whose URL this rejects are skipped */
  urlFilter?: (url: string) => boolean
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Client for one dataset of the portal.
 */
export class DatasetPortalClient {
  readonly datasetId: DatasetId
  readonly maxRetries: number
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly retryDelayMs: number

  private infos: DatasetDescriptor | null = null
  private resources: readonly ResourceDescriptor[] | null = null

  constructor(options: DatasetPortalClientOptions) {
    const parsed = clientOptionsSchema.safeParse(options)
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error, "Invalid portal client options")
    }

    this.datasetId = asDatasetId(parsed.data.datasetId)
    this.baseUrl = parsed.data.baseUrl.replace(/\/+$/, "")
    this.timeoutMs = parsed.data.timeoutSeconds * 1000
    this.maxRetries = parsed.data.maxRetries
    this.retryDelayMs = parsed.data.retryDelaySeconds * 1000
  }

  /**
   * Dataset metadata endpoint.
   */
  getApiUrl(): string {
    return `${this.baseUrl}/api/1/datasets/${encodeURIComponent(this.datasetId)}/`
  }

  /**
   * Fetch dataset metadata, from cache unless `force` is set.
   *
   * @throws RetriesExhaustedError when every attempt failed
   * @throws ValidationError when the payload is not a dataset descriptor
   */
  async fetchDatasetInfo(force = false): Promise<DatasetDescriptor> {
    if (!force && this.infos !== null) {
      return this.infos
    }

    const url = this.getApiUrl()
    logger.info("Fetching dataset infos", { datasetId: this.datasetId, url })

    const body = await this.request(url, `Fetching dataset ${this.datasetId}`, (response) =>
      response.text()
    )

    let json: unknown
    try {
      json = JSON.parse(body)
    } catch {
      throw new ValidationError(`Dataset ${this.datasetId} response is not valid JSON`)
    }

    const parsed = datasetDescriptorSchema.safeParse(json)
    if (!parsed.success) {
      throw ValidationError.fromZodError(
        parsed.error,
        `Dataset ${this.datasetId} response does not match the expected schema`
      )
    }

    this.infos = parsed.data
    return this.infos
  }

  /**
   * Resources listed by the dataset, from cache unless `force` is set.
   */
  async listResources(force = false): Promise<readonly ResourceDescriptor[]> {
    if (!force && this.resources !== null) {
      return this.resources
    }

    const infos = await this.fetchDatasetInfo(force)
    this.resources = infos.resources
    return this.resources
  }

  /**
   * Download every resource into `destinationDir`, one at a time.
   *
   * Files already present under the derived name are not requested again.
   * A resource that keeps failing is logged and reported; the others still
   * download.
   */
  async downloadResources(
    destinationDir: string,
    options: DownloadResourcesOptions = {}
  ): Promise<DownloadReport> {
    try {
      await mkdir(destinationDir, { recursive: true })
    } catch (error) {
      throw new IoError(`Cannot create ${destinationDir}`, destinationDir, { cause: error })
    }

    const resources = await this.listResources(options.force)
    const report: DownloadReport = { downloaded: [], skipped: [], failed: [] }

    for (const { url } of resources) {
      if (options.urlFilter && !options.urlFilter(url)) {
        logger.info("Resource filtered out, skipping download", { url })
        report.skipped.push({ url, reason: "filtered" })
        continue
      }

      const filename = filenameFromUrl(url)
      if (filename === null) {
        logger.error("Cannot derive a filename from resource URL", { url })
        report.failed.push({ url, error: "Cannot derive a filename from URL" })
        continue
      }

      const target = join(destinationDir, filename)
      if (await pathExists(target)) {
        logger.info("File already exists, skipping download", { url, path: target })
        report.skipped.push({ url, reason: "exists" })
        continue
      }

      logger.info(fmt`Fetching resource ${url}`)
      const result = await tryCatch(() => this.download(url, target))
      if (result.ok) {
        report.downloaded.push(target)
      } else {
        logger.error("Failed to download resource", {
          url,
          maxRetries: this.maxRetries,
          error: result.error.message,
        })
        report.failed.push({ url, error: result.error.message })
      }
    }

    return report
  }

  /**
   * Fetch `url` and write its body to `target` through a temporary sibling
   * file, so `target` only ever holds a complete body.
   */
  private async download(url: string, target: string): Promise<void> {
    const body = await this.request(url, `Downloading ${url}`, (response) =>
      response.arrayBuffer()
    )

    const partial = `${target}${PARTIAL_SUFFIX}`
    try {
      await writeFile(partial, Buffer.from(body))
      await rename(partial, target)
    } catch (error) {
      await rm(partial, { recursive: true, force: true })
      throw new IoError(`Cannot write ${target}`, target, { cause: error })
    }
  }

  /**
   * GET `url` and read its body with `read`, retrying connection errors,
   * timeouts, non-2xx statuses and interrupted bodies.
   */
  private request<T>(
    url: string,
    label: string,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    return withRetry(
      async () => {
        let response: Response
        try {
          response = await fetch(url, {
            headers: { Accept: "*/*" },
            redirect: "follow",
            signal: AbortSignal.timeout(this.timeoutMs),
          })
        } catch (error) {
          throw new NetworkError(`Request to ${url} failed: ${errorMessage(error)}`, {
            url,
            cause: error,
          })
        }

        if (!response.ok) {
          throw new NetworkError(`HTTP ${response.status} for ${url}`, {
            url,
            status: response.status,
          })
        }

        try {
          return await read(response)
        } catch (error) {
          throw new NetworkError(`Reading response from ${url} failed: ${errorMessage(error)}`, {
            url,
            cause: error,
          })
        }
      },
      {
        maxAttempts: this.maxRetries,
        delayMs: this.retryDelayMs,
        label,
        shouldRetry: (error) => error instanceof NetworkError,
        onAttemptFailed: (error, attempt) => {
          logger.error(`Attempt ${attempt} failed`, {
            url,
            attempt,
            maxAttempts: this.maxRetries,
            error: errorMessage(error),
          })
        },
      }
    )
  }
}
