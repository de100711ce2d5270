import { describe, it, expect, vi } from "vitest"
import { ConfigurationError } from "@/lib/errors"
import { SIMILARITY_METHODS } from "./types"
import {
  calculateSimilarity,
  calculateSimilarityReport,
  cosineSimilarity,
  levenshteinDistance,
  parseSimilarityMethod,
} from "./similarity-calculator"

const mockLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}))

vi.mock("@/lib/logger", () => ({ logger: mockLogger }))

describe("parseSimilarityMethod", () => {
  it("accepts known methods case-insensitively", () => {
    expect(parseSimilarityMethod("Cosine")).toEqual({ ok: true, value: "cosine" })
    expect(parseSimilarityMethod(" WORD_OVERLAP ")).toEqual({ ok: true, value: "word_overlap" })
  })

  it("returns a ConfigurationError listing the valid methods", () => {
    const result = parseSimilarityMethod("fuzzy")

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigurationError)
      expect(result.error.message).toBe(
        "Unknown similarity method: fuzzy. Valid options: number_frequency, word_overlap, cosine, levenshtein"
      )
    }
  })
})

describe("cosineSimilarity", () => {
  it("returns 0 for empty vectors", () => {
    expect(cosineSimilarity(new Map<string, number>(), new Map<string, number>())).toBe(0)
  })

  it("returns 0 when one vector has no magnitude", () => {
    expect(cosineSimilarity(new Map([["a", 0]]), new Map([["a", 1]]))).toBe(0)
  })

  it("returns 1 for parallel vectors", () => {
    expect(cosineSimilarity(new Map([[1, 2]]), new Map([[1, 5]]))).toBe(1)
  })
})

describe("levenshteinDistance", () => {
  it.each([
    ["hello", "hallo", 1],
    ["kitten", "sitting", 3],
    ["flaw", "lawn", 2],
    ["hello", "", 5],
    ["", "abc", 3],
    ["abc", "", 3],
    ["same", "same", 0],
  ])("distance(%s, %s) = %i", (a, b, expected) => {
    expect(levenshteinDistance(a, b)).toBe(expected)
  })
})

describe("calculateSimilarity", () => {
  describe("number_frequency", () => {
    it("compares number multisets", () => {
      expect(calculateSimilarity("1 2 3", "1 2 4", "number_frequency")).toBeCloseTo(2 / 3, 10)
    })

    it("is the default method", () => {
      expect(calculateSimilarity("1 2 3", "1 2 4")).toBeCloseTo(2 / 3, 10)
    })

    it("ignores surrounding words", () => {
      expect(
        calculateSimilarity("Revenue: 1,500 and 2,000", "revenue was 1,500 then 2,000")
      ).toBe(1)
    })

    it("scores two empty texts as 1", () => {
      expect(calculateSimilarity("", "", "number_frequency")).toBe(1)
      expect(calculateSimilarity("", "", "word_overlap")).toBe(1)
    })

    it("scores 1 when neither text has numbers", () => {
      expect(calculateSimilarity("no numbers", "none here", "number_frequency")).toBe(1)
    })

    it("scores 0 when only one text has numbers", () => {
      expect(calculateSimilarity("Total 42", "Total", "number_frequency")).toBe(0)
    })

    it("scores disjoint numbers as 0", () => {
      expect(calculateSimilarity("10 20 30", "40 50 60", "number_frequency")).toBe(0)
    })
  })

  describe("word_overlap", () => {
    it("computes the Jaccard index of key terms", () => {
      expect(
        calculateSimilarity("apple banana cherry", "apple banana grape", "word_overlap")
      ).toBe(0.5)
    })

    it("scores 1 for two texts without key terms", () => {
      expect(calculateSimilarity("a b", "! ?", "word_overlap")).toBe(1)
    })

    it("scores 0 when only one text has key terms", () => {
      expect(calculateSimilarity("apple", "", "word_overlap")).toBe(0)
    })
  })

  describe("cosine", () => {
    it("compares word-frequency vectors", () => {
      expect(
        calculateSimilarity("apple apple banana", "apple banana banana", "cosine")
      ).toBeCloseTo(0.8, 10)
    })

    it("scores identical texts as 1", () => {
      expect(calculateSimilarity("the cat sat on the mat", "the cat sat on the mat", "cosine")).toBe(1)
    })

    it("scores 1 for two empty texts", () => {
      expect(calculateSimilarity("", "", "cosine")).toBe(1)
    })
  })

  describe("levenshtein", () => {
    it("normalizes by the longer string", () => {
      expect(calculateSimilarity("kitten", "sitting", "levenshtein")).toBeCloseTo(1 - 3 / 7, 10)
    })

    it("ignores case and punctuation", () => {
      expect(calculateSimilarity("Hello, World!", "hello world", "levenshtein")).toBe(1)
    })

    it("scores 0 when one side normalizes to nothing", () => {
      expect(calculateSimilarity("abc", "!!!", "levenshtein")).toBe(0)
    })

    it("truncates long inputs before comparing", () => {
      const long = "a".repeat(12_000)
      const divergentTail = "a".repeat(10_000) + "b".repeat(2_000)

      expect(calculateSimilarity(long, divergentTail, "levenshtein")).toBe(1)
      expect(mockLogger.warn).toHaveBeenCalledWith(
        "Text truncated for edit distance",
        expect.objectContaining({ text: "text1", originalLength: 12_000 })
      )
    })
  })

  it("accepts method names in any case", () => {
    expect(calculateSimilarity("apple", "apple", "COSINE")).toBe(1)
  })

  it("throws ConfigurationError for an unknown method", () => {
    expect(() => calculateSimilarity("a", "b", "fuzzy")).toThrow(ConfigurationError)
  })

  it.each(SIMILARITY_METHODS)("%s is symmetric and within [0, 1]", (method) => {
    const a = "Revenue 1,200 up 5% from 1,100 in the north region"
    const b = "Revenue 1,200 rose 4% from 1,000 in the south region"

    const forward = calculateSimilarity(a, b, method)
    const backward = calculateSimilarity(b, a, method)

    expect(forward).toBe(backward)
    expect(forward).toBeGreaterThanOrEqual(0)
    expect(forward).toBeLessThanOrEqual(1)
  })

  it.each(SIMILARITY_METHODS)("%s scores identical text as 1", (method) => {
    const text = "Invoice 2024: 3 items totalling 1,250.50 dollars"
    expect(calculateSimilarity(text, text, method)).toBe(1)
  })
})

describe("calculateSimilarityReport", () => {
  it("scores every method", () => {
    expect(calculateSimilarityReport("Revenue 100 and 200", "Revenue 100 and 200")).toEqual({
      number_frequency: 1,
      word_overlap: 1,
      cosine: 1,
      levenshtein: 1,
    })
  })

  it("skips levenshtein for long inputs", () => {
    const long = "word 1 ".repeat(1_000)
    const report = calculateSimilarityReport(long, long)

    expect(report.levenshtein).toBeNull()
    expect(report.cosine).toBe(1)
  })

  it("reports methods independently", () => {
    const report = calculateSimilarityReport("Total 10 20 30", "Total 40 50 60")

    expect(report.number_frequency).toBe(0)
    expect(report.word_overlap).toBe(1)
    expect(report.cosine).toBe(1)
    expect(report.levenshtein).toBeCloseTo(1 - 3 / 14, 10)
  })
})
