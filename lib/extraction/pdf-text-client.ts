/**
 * @fileoverview Local PDF text-layer extraction
 *
 * Reads the embedded text layer page by page with unpdf; no AI provider
 * involved. Serves as the "text extraction" workflow and as a cheap
 * secondary extractor for cross-validation. Scanned PDFs yield empty pages.
 *
 * @module lib/extraction/pdf-text-client
 */

import { readFile } from "fs/promises"
import { CorruptDocumentError, EncryptedDocumentError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { ExtractedSection, ExtractionClient, PageInput } from "./types"

export interface PdfTextClientOptions {
  /** Load the document bytes for an identifier (default: read from disk) */
  readDocument?: (documentId: string) => Promise<Uint8Array>
}

function pageSection(pageNumber: number, rawText: string): ExtractedSection {
  const content = rawText.normalize("NFC").trim()
  return {
    pageNumber,
    content,
    metadata: {
      extractor: "pdf_text",
      charCount: content.length,
      wordCount: content.split(/\s+/).filter(Boolean).length,
    },
  }
}

export class PdfTextClient implements ExtractionClient {
  readonly providerName = "pdf_text"
  private readonly readDocument: (documentId: string) => Promise<Uint8Array>

  constructor(options: PdfTextClientOptions = {}) {
    this.readDocument = options.readDocument ?? ((path) => readFile(path))
  }

  /**
   * Extract every page's text layer. The query is ignored: there is no model
   * to steer.
   *
   * @throws EncryptedDocumentError - Password-protected PDF
   * @throws CorruptDocumentError - Invalid or corrupt PDF
   */
  async processDocument(documentId: string, query: string): Promise<ExtractedSection[]> {
    const { extractText, getDocumentProxy } = await import("unpdf")
    const bytes = await this.readDocument(documentId)

    try {
      const pdf = await getDocumentProxy(new Uint8Array(bytes))
      try {
        const { totalPages, text } = await extractText(pdf, { mergePages: false })
        const pages = Array.isArray(text) ? text : [text]
        const sections = pages.map((pageText, index) => pageSection(index + 1, pageText))

        logger.info("PDF text extraction complete", {
          documentId,
          totalPages,
          queryLength: query.length,
          emptyPages: sections.filter((section) => section.content.length === 0).length,
        })
        return sections
      } finally {
        await pdf.destroy()
      }
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : String(error)

      if (errorMessage.includes("password") || errorMessage.includes("encrypted")) {
        throw new EncryptedDocumentError()
      }
      if (errorMessage.includes("Invalid PDF") || errorMessage.includes("not a PDF")) {
        throw new CorruptDocumentError()
      }
      throw error
    }
  }

  async extractPageContent(
    page: PageInput,
    _query: string,
    pageNumber: number
  ): Promise<ExtractedSection> {
    return pageSection(pageNumber, page.text ?? "")
  }

  async healthCheck(): Promise<boolean> {
    return true
  }
}
