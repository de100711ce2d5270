/**
 * @fileoverview Explicitly constructed validation context
 *
 * Built once per process (or per test) and passed to whoever needs it.
 *
 * @example
 * ```ts
 * const config = loadConfig()
 * initSentry(config)
 * const ctx = createValidationContext(config, new PdfTextClient())
 *
 * const validated = await applyCrossValidation(workflowResult, {
 *   service: ctx.validationService,
 *   documentId: pdfPath,
 *   enabled: ctx.config.validation.enabled,
 *   onFailure: ctx.config.validation.failurePolicy,
 * })
 * ```
 *
 * @module lib/context
 */

import type { AppConfig } from "./config"
import type { SecondaryExtractor } from "./extraction/types"
import { ValidationService } from "./validation/validation-service"

export interface ValidationContext {
  readonly config: AppConfig
  readonly validationService: ValidationService
}

export function createValidationContext(
  config: AppConfig,
  secondaryExtractor: SecondaryExtractor
): ValidationContext {
  return {
    config,
    validationService: new ValidationService(secondaryExtractor, {
      similarityMethod: config.validation.similarityMethod,
      similarityThreshold: config.validation.similarityThreshold,
    }),
  }
}
