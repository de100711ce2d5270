/**
 * @fileoverview Text normalization for comparison and validation
 *
 * Pure functions; every one accepts empty or missing input and returns the
 * empty result for it.
 *
 * @module lib/validation/content-normalizer
 */

import { logger } from "@/lib/logger"

type TextInput = string | null | undefined

const NUMBER_PATTERN = /-?\d+(?:,\d{3})*(?:\.\d+)?%?/g
const KEY_TERM_PATTERN = /\b[a-z0-9]+\b/g
const PAGE_BREAK_MARKERS = ["---PAGE-BREAK---", "---PAGE BREAK---", "[PAGE BREAK]"]

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

/**
 * Lowercase (unless `preserveCase`), collapse whitespace runs including line
 * breaks to single spaces, and trim.
 *
 * @example
 * normalizeText("  Hello   World  ") // "hello world"
 * normalizeText("Line1\n\n\nLine2") // "line1 line2"
 */
export function normalizeText(text: TextInput, preserveCase = false): string {
  if (!text) return ""
  return collapseWhitespace(preserveCase ? text : text.toLowerCase())
}

/**
 * Extract every number in encounter order, duplicates included.
 *
 * Handles negatives, thousands separators, decimals and percentages
 * ("25%" yields 25).
 *
 * @example
 * extractNumbers("Price: $1,234.56") // [1234.56]
 * extractNumbers("Scores: 85, 90, 95") // [85, 90, 95]
 */
export function extractNumbers(text: TextInput): number[] {
  if (!text) return []

  const numbers: number[] = []
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const value = Number.parseFloat(match[0].replaceAll(",", "").replace(/%$/, ""))
    if (Number.isNaN(value)) {
      logger.debug("Could not parse number", { match: match[0] })
      continue
    }
    numbers.push(value)
  }
  return numbers
}

function termTokens(normalized: string, minLength: number): string[] {
  return (normalized.match(KEY_TERM_PATTERN) ?? []).filter(
    (term) => term.length >= minLength
  )
}

/**
 * Unique lowercase alphanumeric terms of at least `minLength` characters.
 *
 * @example
 * extractKeyTerms("The quick brown fox") // Set { "the", "quick", "brown", "fox" }
 */
export function extractKeyTerms(text: TextInput, minLength = 3): Set<string> {
  if (!text) return new Set()
  return new Set(termTokens(normalizeText(text), minLength))
}

/**
 * Whole-word occurrence count of every key term.
 *
 * @example
 * calculateWordFrequency("foo bar foo baz foo") // Map { "foo" => 3, "bar" => 1, "baz" => 1 }
 */
export function calculateWordFrequency(text: TextInput): Map<string, number> {
  const frequency = new Map<string, number>()
  if (!text) return frequency

  for (const term of termTokens(normalizeText(text), 3)) {
    frequency.set(term, (frequency.get(term) ?? 0) + 1)
  }
  return frequency
}

/**
 * Strip page-break markers and collapse the whitespace around them.
 */
export function removePageBreaks(text: TextInput): string {
  if (!text) return ""

  let stripped = text
  for (const marker of PAGE_BREAK_MARKERS) {
    stripped = stripped.replaceAll(marker, " ")
  }
  return collapseWhitespace(stripped)
}

/**
 * Canonical form for character-level comparison: no page breaks, lowercase,
 * only `[a-z0-9]` and single spaces.
 */
export function normalizeForComparison(text: TextInput): string {
  if (!text) return ""

  const normalized = normalizeText(removePageBreaks(text))
  return collapseWhitespace(normalized.replace(/[^a-z0-9\s]/g, " "))
}
