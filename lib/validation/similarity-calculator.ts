/**
 * @fileoverview Similarity scoring between two extractions of one document
 *
 * Methods:
 * - number_frequency: cosine over number multisets (tables, financial data)
 * - word_overlap: Jaccard index over key terms
 * - cosine: cosine over word-frequency vectors
 * - levenshtein: normalized character edit distance (expensive)
 *
 * Every score lies in [0, 1] and is symmetric in its two arguments.
 *
 * @module lib/validation/similarity-calculator
 */

import { ConfigurationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { Err, Ok, unwrap, type Result } from "@/lib/result"
import {
  calculateWordFrequency,
  extractKeyTerms,
  extractNumbers,
  normalizeForComparison,
} from "./content-normalizer"
import {
  DEFAULT_SIMILARITY_METHOD,
  SIMILARITY_METHODS,
  type SimilarityMethod,
  type SimilarityReport,
} from "./types"

/** Normalized inputs are cut to this many characters before edit distance */
export const LEVENSHTEIN_MAX_LENGTH = 10_000

/** The report only runs levenshtein when both raw inputs are shorter than this */
export const REPORT_LEVENSHTEIN_LIMIT = 5_000

// ============================================================================
// Method Parsing
// ============================================================================

function isSimilarityMethod(value: string): value is SimilarityMethod {
  return SIMILARITY_METHODS.some((method) => method === value)
}

/**
 * Resolve a method name case-insensitively.
 */
export function parseSimilarityMethod(
  name: string
): Result<SimilarityMethod, ConfigurationError> {
  const method = name.trim().toLowerCase()
  if (isSimilarityMethod(method)) return Ok(method)

  return Err(
    new ConfigurationError(
      `Unknown similarity method: ${name}. Valid options: ${SIMILARITY_METHODS.join(", ")}`,
      [{ field: "similarityMethod", message: `Expected one of ${SIMILARITY_METHODS.join(", ")}` }]
    )
  )
}

// ============================================================================
// Vector Math
// ============================================================================

function squaredNorm<K>(vector: ReadonlyMap<K, number>): number {
  let sum = 0
  for (const value of vector.values()) sum += value * value
  return sum
}

/**
 * Cosine similarity of two sparse frequency vectors.
 *
 * The dot product runs over the key union in sorted order so swapping the
 * arguments yields the identical float. Zero-magnitude vectors score 0.
 */
export function cosineSimilarity<K extends string | number>(
  a: ReadonlyMap<K, number>,
  b: ReadonlyMap<K, number>
): number {
  const keys = [...new Set([...a.keys(), ...b.keys()])].sort()
  if (keys.length === 0) return 0

  let dot = 0
  for (const key of keys) {
    dot += (a.get(key) ?? 0) * (b.get(key) ?? 0)
  }

  const magnitude = Math.sqrt(squaredNorm(a) * squaredNorm(b))
  if (magnitude === 0) return 0

  return Math.min(1, Math.max(0, dot / magnitude))
}

function countValues<T>(values: readonly T[]): Map<T, number> {
  const counts = new Map<T, number>()
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1)
  return counts
}

// ============================================================================
// Edit Distance
// ============================================================================

/**
 * Levenshtein distance with two rolling rows, O(n·m) time, O(min(n, m)) space.
 *
 * @example
 * levenshteinDistance("hello", "hallo") // 1
 */
export function levenshteinDistance(s1: string, s2: string): number {
  if (s1.length < s2.length) return levenshteinDistance(s2, s1)
  if (s2.length === 0) return s1.length

  let previous = Array.from({ length: s2.length + 1 }, (_, j) => j)
  let current = new Array<number>(s2.length + 1).fill(0)

  for (let i = 0; i < s1.length; i++) {
    current[0] = i + 1
    const c1 = s1.charCodeAt(i)
    for (let j = 0; j < s2.length; j++) {
      const substitution = previous[j] + (c1 === s2.charCodeAt(j) ? 0 : 1)
      const insertion = previous[j + 1] + 1
      const deletion = current[j] + 1
      current[j + 1] = Math.min(insertion, deletion, substitution)
    }
    const done = previous
    previous = current
    current = done
  }

  return previous[s2.length]
}

// ============================================================================
// Methods
// ============================================================================

function numberFrequencySimilarity(text1: string, text2: string): number {
  const numbers1 = extractNumbers(text1)
  const numbers2 = extractNumbers(text2)

  if (numbers1.length === 0 && numbers2.length === 0) return 1
  if (numbers1.length === 0 || numbers2.length === 0) return 0

  const similarity = cosineSimilarity(countValues(numbers1), countValues(numbers2))
  logger.debug("Number frequency similarity", {
    similarity,
    numbers1: numbers1.length,
    numbers2: numbers2.length,
  })
  return similarity
}

function wordOverlapSimilarity(text1: string, text2: string): number {
  const terms1 = extractKeyTerms(text1)
  const terms2 = extractKeyTerms(text2)

  if (terms1.size === 0 && terms2.size === 0) return 1
  if (terms1.size === 0 || terms2.size === 0) return 0

  let intersection = 0
  for (const term of terms1) {
    if (terms2.has(term)) intersection++
  }
  const union = terms1.size + terms2.size - intersection

  const similarity = intersection / union
  logger.debug("Word overlap similarity", {
    similarity,
    terms1: terms1.size,
    terms2: terms2.size,
  })
  return similarity
}

function wordCosineSimilarity(text1: string, text2: string): number {
  const freq1 = calculateWordFrequency(text1)
  const freq2 = calculateWordFrequency(text2)

  if (freq1.size === 0 && freq2.size === 0) return 1
  if (freq1.size === 0 || freq2.size === 0) return 0

  const similarity = cosineSimilarity(freq1, freq2)
  logger.debug("Cosine similarity", {
    similarity,
    words1: freq1.size,
    words2: freq2.size,
  })
  return similarity
}

function truncateForEditDistance(text: string, label: string): string {
  if (text.length <= LEVENSHTEIN_MAX_LENGTH) return text
  logger.warn("Text truncated for edit distance", {
    text: label,
    originalLength: text.length,
    maxLength: LEVENSHTEIN_MAX_LENGTH,
  })
  return text.slice(0, LEVENSHTEIN_MAX_LENGTH)
}

function levenshteinSimilarity(text1: string, text2: string): number {
  const a = truncateForEditDistance(normalizeForComparison(text1), "text1")
  const b = truncateForEditDistance(normalizeForComparison(text2), "text2")

  if (a === b) return 1
  if (a.length === 0 || b.length === 0) return 0

  const distance = levenshteinDistance(a, b)
  const maxLength = Math.max(a.length, b.length)
  const similarity = 1 - distance / maxLength

  logger.debug("Levenshtein similarity", { similarity, distance, maxLength })
  return similarity
}

const METHODS: Record<SimilarityMethod, (text1: string, text2: string) => number> = {
  number_frequency: numberFrequencySimilarity,
  word_overlap: wordOverlapSimilarity,
  cosine: wordCosineSimilarity,
  levenshtein: levenshteinSimilarity,
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Similarity between two texts, from 0 (unrelated) to 1 (identical under the
 * chosen method).
 *
 * @throws ConfigurationError - unknown method name
 */
export function calculateSimilarity(
  text1: string,
  text2: string,
  method: string = DEFAULT_SIMILARITY_METHOD
): number {
  const resolved = unwrap(parseSimilarityMethod(method))
  return METHODS[resolved](text1, text2)
}

/**
 * Score the texts with every method. Levenshtein is reported as `null` when
 * either input has 5,000 characters or more.
 */
export function calculateSimilarityReport(text1: string, text2: string): SimilarityReport {
  const report: SimilarityReport = {
    number_frequency: numberFrequencySimilarity(text1, text2),
    word_overlap: wordOverlapSimilarity(text1, text2),
    cosine: wordCosineSimilarity(text1, text2),
    levenshtein:
      text1.length < REPORT_LEVENSHTEIN_LIMIT && text2.length < REPORT_LEVENSHTEIN_LIMIT
        ? levenshteinSimilarity(text1, text2)
        : null,
  }

  logger.info("Similarity report", {
    numberFrequency: report.number_frequency,
    wordOverlap: report.word_overlap,
    cosine: report.cosine,
    levenshtein: report.levenshtein ?? "skipped",
  })
  return report
}
