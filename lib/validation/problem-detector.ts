/**
 * @fileoverview Quality problem detection for extracted pages
 *
 * Ten independent heuristics flag pages whose text looks like a failed or
 * degraded extraction: too little content, glitches, mojibake, ragged tables,
 * OCR output without punctuation.
 *
 * Known false positives: `high_gibberish` flags acronym-heavy and
 * non-English pages, and `suspicious_characters` flags any run of five
 * non-ASCII characters. Both are kept as-is pending tuning against real
 * documents.
 *
 * @module lib/validation/problem-detector
 */

import type { ErrorDetail } from "@/lib/errors"
import type { ExtractedSection } from "@/lib/extraction/types"
import { logger } from "@/lib/logger"
import type { DetectionThresholds, ProblemKind, ProblemReport } from "./types"

export const DETECTION_THRESHOLDS: DetectionThresholds = {
  minContentLength: 100,
  maxRepeatedCharLength: 10,
  minWordCount: 20,
  minGibberishSample: 10,
  maxGibberishRatio: 0.3,
  maxTableColumnVariants: 2,
  maxSpaceRun: 20,
  maxBlankLineRuns: 5,
  minPunctuationSample: 50,
  wordsPerPunctuation: 30,
}

/** Thresholds that count characters, words, lines or runs */
const COUNT_THRESHOLDS = [
  "minContentLength",
  "maxRepeatedCharLength",
  "minWordCount",
  "minGibberishSample",
  "maxTableColumnVariants",
  "maxSpaceRun",
  "maxBlankLineRuns",
  "minPunctuationSample",
  "wordsPerPunctuation",
] as const satisfies ReadonlyArray<keyof DetectionThresholds>

/**
 * Check a threshold set before any page is analyzed.
 *
 * @returns One detail per invalid field; empty when every value is usable
 */
export function findInvalidThresholds(thresholds: DetectionThresholds): ErrorDetail[] {
  const details: ErrorDetail[] = []

  for (const field of COUNT_THRESHOLDS) {
    const value = thresholds[field]
    if (!Number.isInteger(value) || value < 1) {
      details.push({ field, message: `Expected an integer >= 1, got ${value}` })
    }
  }

  const ratio = thresholds.maxGibberishRatio
  if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
    details.push({ field: "maxGibberishRatio", message: `Expected a number in [0, 1], got ${ratio}` })
  }

  return details
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu
const LATIN_WORD_PATTERN = /(?<![\p{L}\p{N}_])[a-zA-Z]{4,}(?![\p{L}\p{N}_])/gu
const VOWEL_PATTERN = /[aeiou]/
const CONSONANT_RUN_PATTERN = /[bcdfghjklmnpqrstvwxyz]{5,}/
const PUNCTUATION_PATTERN = /[.,!?;:]/g

const SUSPICIOUS_PATTERNS = [
  /[^\x00-\x7F]{5,}/u,
  /\uFFFD{2,}/,
  /[\x00-\x08\x0B\x0C\x0E-\x1F]/,
]

/** Mis-decoded UTF-8 sequences (smart quotes, accented vowels) */
const MOJIBAKE_MARKERS = ["â€™", "â€œ", "â€", "Ã©", "Ã¨"]

type ProblemCheck = (content: string, thresholds: DetectionThresholds) => boolean

function countWords(content: string): number {
  return content.match(WORD_PATTERN)?.length ?? 0
}

function hasTableMarkers(content: string): boolean {
  return content.includes("|") || content.toUpperCase().includes("TABLE")
}

function countOccurrences(content: string, needle: string): number {
  return content.split(needle).length - 1
}

const isLowContentDensity: ProblemCheck = (content, t) =>
  content.trim().length < t.minContentLength

const hasMissingNumbers: ProblemCheck = (content) =>
  hasTableMarkers(content) && !/\d/.test(content)

const hasRepeatedCharacters: ProblemCheck = (content, t) =>
  new RegExp(`([^\\n])\\1{${t.maxRepeatedCharLength},}`, "u").test(content)

const isLowWordCount: ProblemCheck = (content, t) => countWords(content) < t.minWordCount

const hasHighGibberish: ProblemCheck = (content, t) => {
  const words = content.match(LATIN_WORD_PATTERN) ?? []
  if (words.length < t.minGibberishSample) return false

  const gibberish = words.filter((word) => {
    const lower = word.toLowerCase()
    return !VOWEL_PATTERN.test(lower) || CONSONANT_RUN_PATTERN.test(lower)
  })
  return gibberish.length / words.length > t.maxGibberishRatio
}

const hasSuspiciousCharacters: ProblemCheck = (content) =>
  SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(content))

const hasIncompleteTables: ProblemCheck = (content, t) => {
  if (!hasTableMarkers(content)) return false

  const tableLines = content.split("\n").filter((line) => line.includes("|"))
  if (tableLines.length < 2) return false

  const pipeCounts = new Set(tableLines.map((line) => countOccurrences(line, "|")))
  return pipeCounts.size > t.maxTableColumnVariants
}

const hasExcessiveWhitespace: ProblemCheck = (content, t) =>
  content.includes(" ".repeat(t.maxSpaceRun)) ||
  countOccurrences(content, "\n\n\n") > t.maxBlankLineRuns

const hasEncodingIssues: ProblemCheck = (content) =>
  MOJIBAKE_MARKERS.some((marker) => content.includes(marker))

const hasMissingPunctuation: ProblemCheck = (content, t) => {
  const wordCount = countWords(content)
  if (wordCount < t.minPunctuationSample) return false

  const punctuationCount = content.match(PUNCTUATION_PATTERN)?.length ?? 0
  return punctuationCount < wordCount / t.wordsPerPunctuation
}

const CHECKS: ReadonlyArray<readonly [ProblemKind, ProblemCheck]> = [
  ["low_content_density", isLowContentDensity],
  ["missing_numbers", hasMissingNumbers],
  ["repeated_characters", hasRepeatedCharacters],
  ["low_word_count", isLowWordCount],
  ["high_gibberish", hasHighGibberish],
  ["suspicious_characters", hasSuspiciousCharacters],
  ["incomplete_tables", hasIncompleteTables],
  ["excessive_whitespace", hasExcessiveWhitespace],
  ["encoding_issues", hasEncodingIssues],
  ["missing_punctuation", hasMissingPunctuation],
]

/**
 * Run every check against one page.
 *
 * @returns Problem kinds in check order; empty when the page looks clean
 */
export function detectProblemsForSection(
  section: ExtractedSection,
  thresholds: DetectionThresholds = DETECTION_THRESHOLDS
): ProblemKind[] {
  const { content } = section
  const problems = CHECKS.filter(([, check]) => check(content, thresholds)).map(
    ([kind]) => kind
  )

  if (problems.length > 0) {
    logger.debug("Detected page problems", {
      pageNumber: section.pageNumber,
      problems: problems.join(","),
    })
  }

  return problems
}

/**
 * Analyze all pages concurrently and keep only pages with problems.
 *
 * @example
 * await detectProblemsBatch(sections)
 * // { 1: ["low_content_density", "missing_numbers"], 5: ["repeated_characters"] }
 */
export async function detectProblemsBatch(
  sections: readonly ExtractedSection[],
  thresholds: DetectionThresholds = DETECTION_THRESHOLDS
): Promise<ProblemReport> {
  if (sections.length === 0) return {}

  logger.info("Analyzing sections for quality problems", {
    sectionCount: sections.length,
  })

  const results = await Promise.all(
    sections.map(async (section) => detectProblemsForSection(section, thresholds))
  )

  const problemsByPage: Record<number, ProblemKind[]> = {}
  sections.forEach((section, index) => {
    const problems = results[index]
    if (problems && problems.length > 0) {
      problemsByPage[section.pageNumber] = problems
    }
  })

  logger.info("Problem detection complete", {
    pagesWithProblems: Object.keys(problemsByPage).length,
  })

  return problemsByPage
}
