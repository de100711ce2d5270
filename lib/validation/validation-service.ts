/**
 * @fileoverview Cross-validation of a primary extraction
 *
 * Decision flow for one call:
 * 1. Problem check over the primary's pages (when pages are supplied)
 * 2. Problems found → trust the secondary extraction ("quality_issues")
 * 3. Otherwise fetch the secondary anyway and score similarity
 * 4. Below threshold → trust the secondary ("low_similarity")
 * 5. Else keep the primary ("validated")
 *
 * A failing secondary extractor fails the whole call. There is no silent
 * fallback to the primary here; that policy belongs to the caller.
 *
 * @module lib/validation/validation-service
 */

import { ConfigurationError, SecondaryExtractionError } from "@/lib/errors"
import { joinSections, type ExtractedSection, type SecondaryExtractor } from "@/lib/extraction/types"
import { logger } from "@/lib/logger"
import { SpanOp, startSpan, startSpanSync } from "@/lib/metrics"
import { unwrap } from "@/lib/result"
import {
  DETECTION_THRESHOLDS,
  detectProblemsBatch,
  findInvalidThresholds,
} from "./problem-detector"
import {
  calculateSimilarity,
  calculateSimilarityReport,
  parseSimilarityMethod,
} from "./similarity-calculator"
import {
  DEFAULT_SIMILARITY_METHOD,
  type DetectionThresholds,
  type ProblemKind,
  type SimilarityMethod,
  type ValidationResult,
} from "./types"

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85

export interface ValidationServiceOptions {
  /** Method name, matched case-insensitively (default: number_frequency) */
  similarityMethod?: string
  /** Minimum score in [0, 1] to keep the primary (default: 0.85) */
  similarityThreshold?: number
  /** Overrides for the page problem heuristics */
  detectionThresholds?: Partial<DetectionThresholds>
}

function elapsedSeconds(start: number): number {
  return (performance.now() - start) / 1000
}

function distinctProblemTypes(problemsByPage: Readonly<Record<number, readonly ProblemKind[]>>): ProblemKind[] {
  return [...new Set(Object.values(problemsByPage).flat())]
}

export class ValidationService {
  readonly similarityMethod: SimilarityMethod
  readonly similarityThreshold: number
  private readonly detectionThresholds: DetectionThresholds

  /**
   * @throws ConfigurationError - unknown method, similarity threshold outside
   *   [0, 1], or unusable detection thresholds
   */
  constructor(
    private readonly secondaryExtractor: SecondaryExtractor,
    options: ValidationServiceOptions = {}
  ) {
    const {
      similarityMethod = DEFAULT_SIMILARITY_METHOD,
      similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
      detectionThresholds = {},
    } = options

    if (!Number.isFinite(similarityThreshold) || similarityThreshold < 0 || similarityThreshold > 1) {
      throw new ConfigurationError(
        `Similarity threshold must be between 0 and 1, got ${similarityThreshold}`,
        [{ field: "similarityThreshold", message: "Expected a number in [0, 1]" }]
      )
    }

    const thresholds = { ...DETECTION_THRESHOLDS, ...detectionThresholds }
    const invalid = findInvalidThresholds(thresholds)
    if (invalid.length > 0) {
      throw new ConfigurationError(
        `Invalid detection thresholds: ${invalid.map((detail) => detail.field).join(", ")}`,
        invalid.map((detail) => ({ ...detail, field: `detectionThresholds.${detail.field}` }))
      )
    }

    this.similarityMethod = unwrap(parseSimilarityMethod(similarityMethod))
    this.similarityThreshold = similarityThreshold
    this.detectionThresholds = thresholds

    logger.info("Initialized ValidationService", {
      similarityMethod: this.similarityMethod,
      similarityThreshold: this.similarityThreshold,
    })
  }

  /**
   * Decide whether the primary extraction can be trusted.
   *
   * @param primaryContent - Combined text of the primary extraction
   * @param documentId - Handed to the secondary extractor as-is
   * @param query - Extraction query, forwarded to the secondary extractor
   * @param sections - Primary extraction per page; enables the problem check
   * @throws SecondaryExtractionError - the secondary extractor rejected
   */
  async validate(
    primaryContent: string,
    documentId: string,
    query = "",
    sections?: readonly ExtractedSection[]
  ): Promise<ValidationResult> {
    return startSpan(
      "validation.validate",
      SpanOp.VALIDATION,
      () => this.runValidation(primaryContent, documentId, query, sections),
      { method: this.similarityMethod, pageCount: sections?.length ?? 0 }
    )
  }

  /**
   * Same as `validate`, plus a four-method similarity comparison of primary
   * and secondary content whenever the secondary was chosen.
   */
  async validateWithDetailedReport(
    primaryContent: string,
    documentId: string,
    query = "",
    sections?: readonly ExtractedSection[]
  ): Promise<ValidationResult> {
    const result = await this.validate(primaryContent, documentId, query, sections)
    if (!result.usedSecondary) return result

    logger.info("Generating detailed similarity report", { documentId })
    const detailedSimilarity = calculateSimilarityReport(primaryContent, result.content)

    return { ...result, report: { ...result.report, detailedSimilarity } }
  }

  private async runValidation(
    primaryContent: string,
    documentId: string,
    query: string,
    sections: readonly ExtractedSection[] | undefined
  ): Promise<ValidationResult> {
    const start = performance.now()
    logger.info("Starting validation", { documentId })

    if (sections && sections.length > 0) {
      const problemsByPage = await startSpan(
        "validation.detect-problems",
        SpanOp.PROBLEM_DETECTION,
        () => detectProblemsBatch(sections, this.detectionThresholds),
        { pageCount: sections.length }
      )
      const problemCount = Object.keys(problemsByPage).length

      if (problemCount > 0) {
        const problemTypes = distinctProblemTypes(problemsByPage)
        logger.warn("Quality problems detected, using secondary extraction", {
          documentId,
          problemCount,
          problemTypes: problemTypes.join(","),
        })

        const secondaryContent = await this.extractWithSecondary(documentId, query)
        return {
          content: secondaryContent,
          usedSecondary: true,
          report: {
            reason: "quality_issues",
            problemsByPage,
            problemCount,
            problemTypes,
            validationTimeSeconds: elapsedSeconds(start),
          },
        }
      }
    }

    const secondaryContent = await this.extractWithSecondary(documentId, query)
    const similarity = startSpanSync(
      "validation.similarity",
      SpanOp.SIMILARITY,
      () => calculateSimilarity(primaryContent, secondaryContent, this.similarityMethod),
      { method: this.similarityMethod }
    )

    logger.info("Similarity computed", {
      documentId,
      similarity,
      threshold: this.similarityThreshold,
      method: this.similarityMethod,
    })

    if (similarity < this.similarityThreshold) {
      logger.warn("Similarity below threshold, using secondary extraction", {
        documentId,
        similarity,
        threshold: this.similarityThreshold,
      })

      return {
        content: secondaryContent,
        usedSecondary: true,
        report: {
          reason: "low_similarity",
          similarity,
          threshold: this.similarityThreshold,
          method: this.similarityMethod,
          validationTimeSeconds: elapsedSeconds(start),
        },
      }
    }

    logger.info("Validation passed, using primary extraction", { documentId, similarity })

    return {
      content: primaryContent,
      usedSecondary: false,
      report: {
        reason: "validated",
        similarity,
        threshold: this.similarityThreshold,
        method: this.similarityMethod,
        validationTimeSeconds: elapsedSeconds(start),
      },
    }
  }

  private async extractWithSecondary(documentId: string, query: string): Promise<string> {
    let sections: ExtractedSection[]
    try {
      sections = await startSpan("validation.secondary-extraction", SpanOp.EXTRACTION, () =>
        this.secondaryExtractor.processDocument(documentId, query)
      )
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.error("Secondary extraction failed", { documentId, error: message })
      throw new SecondaryExtractionError(`Secondary extraction failed: ${message}`, {
        cause: error,
      })
    }

    const content = joinSections(sections)
    logger.info("Secondary extraction complete", {
      documentId,
      charCount: content.length,
      pageCount: sections.length,
    })
    return content
  }
}
