/**
 * @fileoverview Validation type definitions
 * @module lib/validation/types
 */

// ============================================================================
// Problem Detection
// ============================================================================

/** Heuristic defect categories, in the order they are checked */
export const PROBLEM_KINDS = [
  "low_content_density",
  "missing_numbers",
  "repeated_characters",
  "low_word_count",
  "high_gibberish",
  "suspicious_characters",
  "incomplete_tables",
  "excessive_whitespace",
  "encoding_issues",
  "missing_punctuation",
] as const

export type ProblemKind = (typeof PROBLEM_KINDS)[number]

/** Page number → problems found on that page. Clean pages are absent. */
export type ProblemReport = Readonly<Record<number, readonly ProblemKind[]>>

export interface DetectionThresholds {
  /** Minimum trimmed characters per page */
  minContentLength: number
  /** A character followed by this many copies of itself is a glitch */
  maxRepeatedCharLength: number
  /** Minimum word tokens per page */
  minWordCount: number
  /** Words (length >= 4) needed before gibberish is judged */
  minGibberishSample: number
  /** Fraction of suspicious words above which the page is gibberish */
  maxGibberishRatio: number
  /** Distinct pipe counts tolerated across table lines */
  maxTableColumnVariants: number
  /** Consecutive spaces that count as excessive */
  maxSpaceRun: number
  /** Triple-newline occurrences tolerated */
  maxBlankLineRuns: number
  /** Word tokens needed before punctuation density is judged */
  minPunctuationSample: number
  /** Expect at least one punctuation mark per this many words */
  wordsPerPunctuation: number
}

// ============================================================================
// Similarity
// ============================================================================

export const SIMILARITY_METHODS = [
  "number_frequency",
  "word_overlap",
  "cosine",
  "levenshtein",
] as const

export type SimilarityMethod = (typeof SIMILARITY_METHODS)[number]

export const DEFAULT_SIMILARITY_METHOD: SimilarityMethod = "number_frequency"

/** Score per method; levenshtein is null when skipped for long inputs */
export type SimilarityReport = Record<Exclude<SimilarityMethod, "levenshtein">, number> & {
  levenshtein: number | null
}

// ============================================================================
// Validation Result
// ============================================================================

interface TimedReport {
  validationTimeSeconds: number
  /** Four-method comparison, only from `validateWithDetailedReport` */
  detailedSimilarity?: SimilarityReport
}

export interface QualityIssuesReport extends TimedReport {
  reason: "quality_issues"
  problemsByPage: ProblemReport
  problemCount: number
  /** Distinct problem kinds, first-seen order */
  problemTypes: ProblemKind[]
}

export interface SimilarityCheckReport extends TimedReport {
  reason: "low_similarity" | "validated"
  similarity: number
  threshold: number
  method: SimilarityMethod
}

export type ValidationReport = QualityIssuesReport | SimilarityCheckReport

export type ValidationReason = ValidationReport["reason"]

/**
 * Outcome of one validation call. The secondary extraction is used exactly
 * when the reason is `quality_issues` or `low_similarity`.
 */
export type ValidationResult =
  | {
      readonly content: string
      readonly usedSecondary: true
      readonly report: Readonly<
        QualityIssuesReport | (SimilarityCheckReport & { reason: "low_similarity" })
      >
    }
  | {
      readonly content: string
      readonly usedSecondary: false
      readonly report: Readonly<SimilarityCheckReport & { reason: "validated" }>
    }
