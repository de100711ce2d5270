/**
 * @fileoverview Extraction contract shared by every provider client
 * @module lib/extraction/types
 */

/** Separator placed between page contents when sections are joined */
export const CONTENT_SEPARATOR = "\n---PAGE-BREAK---\n"

/** Content extracted from a single PDF page */
export interface ExtractedSection {
  /** 1-indexed page number */
  readonly pageNumber: number
  /** Extracted text, may be empty */
  readonly content: string
  /** Provider-specific details (model, confidence, word count, ...) */
  readonly metadata: Readonly<Record<string, unknown>>
}

/** Raw page handed to `extractPageContent` */
export interface PageInput {
  /** Text layer of the page, when the PDF has one */
  text?: string
}

/**
 * The single capability the validation core needs from a provider.
 */
export interface SecondaryExtractor {
  processDocument(documentId: string, query: string): Promise<ExtractedSection[]>
}

/**
 * Full provider contract. Any AI backend or local strategy implements this;
 * validation only ever sees it as a `SecondaryExtractor`.
 */
export interface ExtractionClient extends SecondaryExtractor {
  readonly providerName: string
  extractPageContent(
    page: PageInput,
    query: string,
    pageNumber: number
  ): Promise<ExtractedSection>
  healthCheck(): Promise<boolean>
}

/**
 * Join page contents in the order given, using `CONTENT_SEPARATOR`.
 */
export function joinSections(sections: readonly ExtractedSection[]): string {
  return sections.map((section) => section.content).join(CONTENT_SEPARATOR)
}
