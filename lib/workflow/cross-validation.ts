/**
 * @fileoverview Optional cross-validation step at the end of a workflow
 *
 * Wraps a finished workflow result: validates it against a secondary
 * extraction when enabled, and applies the failure policy when the
 * validation itself cannot complete.
 *
 * @module lib/workflow/cross-validation
 */

import type { ValidationFailurePolicy } from "@/lib/config"
import { toAppError, type SerializedError } from "@/lib/errors"
import type { ExtractedSection } from "@/lib/extraction/types"
import { logger } from "@/lib/logger"
import { tryCatchWith, unwrap } from "@/lib/result"
import type { ValidationReport, ValidationResult } from "@/lib/validation/types"
import type { ValidationService } from "@/lib/validation/validation-service"

// ============================================================================
// Types
// ============================================================================

export type WorkflowValidationReport =
  | (ValidationReport & { status: "completed"; usedSecondary: boolean })
  | { status: "failed"; error: SerializedError }

export interface WorkflowResult {
  /** Full extracted content */
  content: string
  /** Workflow execution details (workflow name, pages, timings) */
  metadata: Record<string, unknown>
  /** Per-page sections when the workflow produced them */
  sections?: ExtractedSection[]
  /** Present once the cross-validation step ran */
  validationReport?: WorkflowValidationReport
  createdAt: Date
}

export interface CrossValidationOptions {
  service: ValidationService
  documentId: string
  query?: string
  /** Skip the step entirely when false */
  enabled: boolean
  /** `fail` rethrows; `serve_primary` returns the unvalidated result */
  onFailure?: ValidationFailurePolicy
  /** Attach the four-method similarity report when the secondary wins */
  detailed?: boolean
}

// ============================================================================
// Step
// ============================================================================

function completedReport(result: ValidationResult): WorkflowValidationReport {
  return { ...result.report, status: "completed", usedSecondary: result.usedSecondary }
}

/**
 * Cross-validate a workflow result.
 *
 * @throws SecondaryExtractionError - validation failed under the `fail` policy
 */
export async function applyCrossValidation(
  result: WorkflowResult,
  options: CrossValidationOptions
): Promise<WorkflowResult> {
  const { service, documentId, query = "", enabled, onFailure = "fail", detailed = false } = options

  if (!enabled) return result

  const run = () =>
    detailed
      ? service.validateWithDetailedReport(result.content, documentId, query, result.sections)
      : service.validate(result.content, documentId, query, result.sections)

  const outcome = await tryCatchWith(run, toAppError)

  if (!outcome.ok && onFailure === "serve_primary") {
    logger.warn("Cross-validation failed, serving unvalidated content", {
      documentId,
      code: outcome.error.code,
      error: outcome.error.message,
    })
    return {
      ...result,
      metadata: { ...result.metadata, validated: false },
      validationReport: { status: "failed", error: outcome.error.toJSON() },
    }
  }

  const validation = unwrap(outcome)
  return {
    ...result,
    content: validation.content,
    metadata: {
      ...result.metadata,
      validated: true,
      usedSecondary: validation.usedSecondary,
    },
    validationReport: completedReport(validation),
  }
}
