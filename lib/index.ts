/**
 * @fileoverview Public entry point
 * @module extraction-validation
 */

export * from "./validation"

export {
  CONTENT_SEPARATOR,
  joinSections,
  type ExtractedSection,
  type ExtractionClient,
  type PageInput,
  type SecondaryExtractor,
} from "./extraction/types"
export { PdfTextClient, type PdfTextClientOptions } from "./extraction/pdf-text-client"

export {
  applyCrossValidation,
  type CrossValidationOptions,
  type WorkflowResult,
  type WorkflowValidationReport,
} from "./workflow/cross-validation"

export {
  loadConfig,
  VALIDATION_FAILURE_POLICIES,
  type AppConfig,
  type ValidationFailurePolicy,
} from "./config"
export { createValidationContext, type ValidationContext } from "./context"
export { initSentry } from "./sentry"

export {
  AppError,
  ConfigurationError,
  SecondaryExtractionError,
  EncryptedDocumentError,
  CorruptDocumentError,
  InternalError,
  isAppError,
  toAppError,
  type ErrorCode,
  type ErrorDetail,
  type SerializedError,
} from "./errors"
export { Ok, Err, unwrap, tryCatchWith, type Result } from "./result"
