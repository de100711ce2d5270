import * as Sentry from "@sentry/node"
import type { AppConfig } from "./config"

/**
 * Initialise Sentry logging and tracing for the process.
 *
 * Call once at startup, before the validation context is created.
 * Without a DSN the SDK stays disabled and `logger` calls are dropped.
 */
export function initSentry(config: AppConfig): void {
  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.environment,

    // Enable structured logging
    enableLogs: true,

    integrations: [
      Sentry.consoleLoggingIntegration({
        levels: ["log", "warn", "error"],
      }),
    ],

    // Production: 10%, everything else: 100%
    tracesSampleRate: config.environment === "production" ? 0.1 : 1.0,

    debug: false,
  })
}
