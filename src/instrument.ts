import * as Sentry from "@sentry/node";
import type { AppConfig } from "@/lib/config";

/**
 * Initialize Sentry for the CLI process. Without a DSN the SDK stays
 * disabled and `logger` writes to stderr instead.
 */
export function initSentry(config: AppConfig): void {
  Sentry.init({
    dsn: config.sentryDsn,
    enabled: Boolean(config.sentryDsn),

    // Enable structured logging
    enableLogs: true,

    // Short-lived batch process: errors and logs only
    tracesSampleRate: 0,

    debug: false,
  });
}
