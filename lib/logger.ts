import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Attributes become searchable fields once `initSentry` has run with a DSN;
 * before that every call is a no-op.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Validation passed", { similarity: 0.97, method: "cosine" })
 * logger.warn("Quality problems detected", { pageCount: 3 })
 * logger.error("Secondary extraction failed", { documentId, error: err.message })
 * ```
 */
export const logger = Sentry.logger
