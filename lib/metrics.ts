import * as Sentry from "@sentry/node"

type SpanAttributes = Record<string, string | number | boolean | undefined>

/**
 * Create a traced span for an async operation
 *
 * @example
 * ```ts
 * import { startSpan, SpanOp } from "@/lib/metrics"
 *
 * const sections = await startSpan("secondary-extraction", SpanOp.EXTRACTION, () =>
 *   extractor.processDocument(documentId, query)
 * )
 * ```
 */
export async function startSpan<T>(
  name: string,
  op: string,
  fn: () => Promise<T>,
  attributes?: SpanAttributes
): Promise<T> {
  return Sentry.startSpan({ name, op, attributes }, fn)
}

/**
 * Create a traced span for a sync operation
 */
export function startSpanSync<T>(
  name: string,
  op: string,
  fn: () => T,
  attributes?: SpanAttributes
): T {
  return Sentry.startSpan({ name, op, attributes }, fn)
}

/**
 * Operation types for consistent span naming
 */
export const SpanOp = {
  VALIDATION: "validation",
  PROBLEM_DETECTION: "validation.problems",
  SIMILARITY: "validation.similarity",
  EXTRACTION: "extraction",
} as const
