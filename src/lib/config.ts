/**
 * @fileoverview Runtime Configuration
 *
 * Reads portal and download settings from environment variables.
 * CLI flags override these values per invocation.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ValidationError } from "./errors"

export const DEFAULT_PORTAL_BASE_URL = "https://www.data.gouv.fr"

const envSchema = z.object({
  PORTAL_BASE_URL: z.url().default(DEFAULT_PORTAL_BASE_URL),
  PORTAL_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  PORTAL_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  PORTAL_RETRY_DELAY_SECONDS: z.coerce.number().min(0).default(2),
  DOWNLOAD_DIR: z.string().min(1).default("./data"),
  SENTRY_DSN: z.string().min(1).optional(),
})

export interface AppConfig {
  portalBaseUrl: string
  timeoutSeconds: number
  maxRetries: number
  retryDelaySeconds: number
  downloadDir: string
  sentryDsn?: string
}

/**
 * Validate the environment and map it to an AppConfig.
 * Empty variables count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  )
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, "Invalid environment configuration")
  }

  const vars = parsed.data
  return {
    portalBaseUrl: vars.PORTAL_BASE_URL,
    timeoutSeconds: vars.PORTAL_TIMEOUT_SECONDS,
    maxRetries: vars.PORTAL_MAX_RETRIES,
    retryDelaySeconds: vars.PORTAL_RETRY_DELAY_SECONDS,
    downloadDir: vars.DOWNLOAD_DIR,
    sentryDsn: vars.SENTRY_DSN,
  }
}
