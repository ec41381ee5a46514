import * as Sentry from "@sentry/node"
import chalk from "chalk"
import { toAppError } from "@/lib/errors"

/**
 * Report a failed command: Sentry, then message and stack on stderr.
 * Sets a non-zero exit code but lets the process end on its own.
 */
export function handleError(error: unknown): void {
  Sentry.captureException(error)

  const appError = toAppError(error)
  console.error(chalk.red(`Error: ${appError.message}`))
  for (const detail of appError.details ?? []) {
    console.error(chalk.red(`  ${detail.field ? `${detail.field}: ` : ""}${detail.message}`))
  }
  if (error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack))
  }

  process.exitCode = 1
}
