// test/factories.ts
import { vi } from "vitest"
import type { ExtractedSection, SecondaryExtractor } from "@/lib/extraction/types"

/**
 * A page that passes every problem check: long enough, punctuated,
 * plain ASCII, with digits and no table markers.
 */
export const CLEAN_PAGE_TEXT =
  "Quarterly revenue increased to 1,250,000 dollars in the third quarter, " +
  "compared with 980,000 dollars a year earlier. Operating costs were flat at " +
  "410,000 dollars, and the board approved a dividend of 2.5% for shareholders. " +
  "Management expects similar growth next year."

export function createSection(
  pageNumber: number,
  content: string,
  metadata: Record<string, unknown> = {}
): ExtractedSection {
  return { pageNumber, content, metadata }
}

/** Secondary extractor that resolves with one section per given page text */
export function createFakeExtractor(...pages: string[]) {
  const processDocument = vi.fn(async (_documentId: string, _query: string) =>
    pages.map((content, index) => createSection(index + 1, content, { provider: "fake" }))
  )
  const extractor: SecondaryExtractor = { processDocument }
  return { extractor, processDocument }
}

/** Secondary extractor that always rejects with `error` */
export function createFailingExtractor(error: Error) {
  const processDocument = vi.fn(async (_documentId: string, _query: string): Promise<ExtractedSection[]> => {
    throw error
  })
  const extractor: SecondaryExtractor = { processDocument }
  return { extractor, processDocument }
}
