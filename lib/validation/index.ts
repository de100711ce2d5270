/**
 * @fileoverview Extraction validation module
 *
 * Everything here is synchronous and side-effect-free except
 * `ValidationService`, which calls the injected secondary extractor.
 *
 * @module lib/validation
 */

export * from "./types"

export {
  normalizeText,
  extractNumbers,
  extractKeyTerms,
  calculateWordFrequency,
  removePageBreaks,
  normalizeForComparison,
} from "./content-normalizer"

export {
  DETECTION_THRESHOLDS,
  detectProblemsForSection,
  detectProblemsBatch,
  findInvalidThresholds,
} from "./problem-detector"

export {
  LEVENSHTEIN_MAX_LENGTH,
  REPORT_LEVENSHTEIN_LIMIT,
  parseSimilarityMethod,
  cosineSimilarity,
  levenshteinDistance,
  calculateSimilarity,
  calculateSimilarityReport,
} from "./similarity-calculator"

export {
  DEFAULT_SIMILARITY_THRESHOLD,
  ValidationService,
  type ValidationServiceOptions,
} from "./validation-service"
