import { describe, it, expect } from "vitest"
import { SecondaryExtractionError } from "@/lib/errors"
import { ValidationService } from "@/lib/validation/validation-service"
import {
  createFailingExtractor,
  createFakeExtractor,
  createSection,
} from "@/test/factories"
import { applyCrossValidation, type WorkflowResult } from "./cross-validation"

function workflowResult(overrides: Partial<WorkflowResult> = {}): WorkflowResult {
  return {
    content: "Totals: 10, 20, 30",
    metadata: { workflow: "text_extraction", pages: 1 },
    createdAt: new Date("2025-01-15T10:00:00Z"),
    ...overrides,
  }
}

describe("applyCrossValidation", () => {
  it("returns the result untouched when disabled", async () => {
    const { extractor, processDocument } = createFakeExtractor("anything")
    const input = workflowResult()

    const output = await applyCrossValidation(input, {
      service: new ValidationService(extractor),
      documentId: "doc.pdf",
      enabled: false,
    })

    expect(output).toBe(input)
    expect(processDocument).not.toHaveBeenCalled()
  })

  it("keeps primary content and records the report when validated", async () => {
    const { extractor } = createFakeExtractor("Totals: 10, 20, 30")

    const output = await applyCrossValidation(workflowResult(), {
      service: new ValidationService(extractor),
      documentId: "doc.pdf",
      enabled: true,
    })

    expect(output.content).toBe("Totals: 10, 20, 30")
    expect(output.metadata).toEqual({
      workflow: "text_extraction",
      pages: 1,
      validated: true,
      usedSecondary: false,
    })
    expect(output.validationReport).toMatchObject({
      status: "completed",
      usedSecondary: false,
      reason: "validated",
      similarity: 1,
    })
    expect(output.createdAt).toEqual(new Date("2025-01-15T10:00:00Z"))
  })

  it("replaces the content when the secondary wins", async () => {
    const { extractor } = createFakeExtractor("Totals: 40, 50, 60")

    const output = await applyCrossValidation(workflowResult(), {
      service: new ValidationService(extractor),
      documentId: "doc.pdf",
      enabled: true,
    })

    expect(output.content).toBe("Totals: 40, 50, 60")
    expect(output.metadata).toMatchObject({ validated: true, usedSecondary: true })
    expect(output.validationReport).toMatchObject({
      status: "completed",
      reason: "low_similarity",
    })
  })

  it("runs problem detection over the workflow's sections", async () => {
    const { extractor, processDocument } = createFakeExtractor("Recovered text 10")

    const output = await applyCrossValidation(
      workflowResult({ content: "Hi.", sections: [createSection(1, "Hi.")] }),
      {
        service: new ValidationService(extractor),
        documentId: "doc.pdf",
        query: "extract everything",
        enabled: true,
      }
    )

    expect(output.content).toBe("Recovered text 10")
    expect(output.validationReport).toMatchObject({ reason: "quality_issues", problemCount: 1 })
    expect(processDocument).toHaveBeenCalledWith("doc.pdf", "extract everything")
  })

  it("attaches the detailed similarity report when asked", async () => {
    const { extractor } = createFakeExtractor("Totals: 40, 50, 60")

    const output = await applyCrossValidation(workflowResult(), {
      service: new ValidationService(extractor),
      documentId: "doc.pdf",
      enabled: true,
      detailed: true,
    })

    expect(output.validationReport).toMatchObject({
      status: "completed",
      detailedSimilarity: { number_frequency: 0, word_overlap: 1, cosine: 1 },
    })
  })

  it("rethrows validation failures under the fail policy", async () => {
    const { extractor } = createFailingExtractor(new Error("provider down"))

    await expect(
      applyCrossValidation(workflowResult(), {
        service: new ValidationService(extractor),
        documentId: "doc.pdf",
        enabled: true,
      })
    ).rejects.toBeInstanceOf(SecondaryExtractionError)
  })

  it("serves the primary content under the serve_primary policy", async () => {
    const { extractor } = createFailingExtractor(new Error("provider down"))
    const input = workflowResult()

    const output = await applyCrossValidation(input, {
      service: new ValidationService(extractor),
      documentId: "doc.pdf",
      enabled: true,
      onFailure: "serve_primary",
    })

    expect(output.content).toBe(input.content)
    expect(output.metadata).toEqual({
      workflow: "text_extraction",
      pages: 1,
      validated: false,
    })
    expect(output.validationReport).toEqual({
      status: "failed",
      error: {
        code: "SECONDARY_EXTRACTION_FAILED",
        message: "Secondary extraction failed: provider down",
      },
    })
  })
})
