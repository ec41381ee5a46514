import * as Sentry from "@sentry/node";

type LogLevel = "info" | "warn" | "error";
type LogMessage = Parameters<typeof Sentry.logger.info>[0];
type LogAttributes = Parameters<typeof Sentry.logger.info>[1];

export interface LoggerOptions {
  /** Whether a Sentry client is active; defaults to `Sentry.isEnabled` */
  sentryEnabled?: () => boolean;
  /** Console sink used while Sentry is off; defaults to stderr */
  write?: (line: string) => void;
}

export type Logger = Record<LogLevel, (message: LogMessage, attributes?: LogAttributes) => void>;

/**
 * Format a log line for the console sink.
 */
export function formatLogLine(
  level: LogLevel,
  message: LogMessage,
  attributes?: LogAttributes
): string {
  const line = `[${level}] ${String(message)}`;
  return attributes && Object.keys(attributes).length > 0
    ? `${line} ${JSON.stringify(attributes)}`
    : line;
}

/**
 * Structured logger. Sends to Sentry.logger when Sentry is enabled,
 * otherwise writes one line per call to the console sink.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sentryEnabled = options.sentryEnabled ?? (() => Sentry.isEnabled());
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  const log =
    (level: LogLevel) =>
    (message: LogMessage, attributes?: LogAttributes): void => {
      if (sentryEnabled()) {
        Sentry.logger[level](message, attributes);
        return;
      }
      write(formatLogLine(level, message, attributes));
    };

  return { info: log("info"), warn: log("warn"), error: log("error") };
}

/**
 * @example
 * ```ts
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Fetching dataset infos", { datasetId, url });
 * logger.error("Download failed", { url, attempt, error: err.message });
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Downloaded ${filename} into ${destinationDir}`);
 * ```
 */
export const logger = createLogger();

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt;
