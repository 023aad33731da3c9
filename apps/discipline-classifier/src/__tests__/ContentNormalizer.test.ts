/**
 * @fileoverview Unit tests for ContentNormalizer
 *
 * Tests cover:
 * - Identifier exclusivity (checked before any retrieval)
 * - Missing files and records
 * - PDF signature and payload shape checks
 * - Request body mapping
 *
 * @module __tests__/ContentNormalizer
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InvalidInputError, NotFoundError, UnsupportedFormatError } from "@papertriage/engine";
import { ContentNormalizer, hasPdfSignature } from "../domain/stages/ContentNormalizer.js";
import { requestFromJson } from "../domain/entities/ClassificationRequest.js";
import type { FileRetrieval, StructuredContentRetrieval } from "../domain/ports/index.js";
import { createTestContext } from "./fixtures.js";

const PDF_BYTES = new TextEncoder().encode("%PDF-1.7\n%test\n");

function createMockStores() {
    const files = { getFileBytes: vi.fn<FileRetrieval["getFileBytes"]>() };
    const contents = { getStructuredContent: vi.fn<StructuredContentRetrieval["getStructuredContent"]>() };
    return { files, contents };
}

describe("ContentNormalizer", () => {
    let stores: ReturnType<typeof createMockStores>;
    let normalizer: ContentNormalizer;

    beforeEach(() => {
        stores = createMockStores();
        normalizer = new ContentNormalizer(stores.files, stores.contents);
    });

    // Scenario: both ids is an input error and nothing is fetched
    it("should reject requests with both ids", async () => {
        await expect(normalizer.run(
            { fileId: "f-1", structuredContentOverviewId: "c-1" },
            createTestContext()
        )).rejects.toThrow(InvalidInputError);

        expect(stores.files.getFileBytes).not.toHaveBeenCalled();
        expect(stores.contents.getStructuredContent).not.toHaveBeenCalled();
    });

    // Scenario: neither id (blank strings count as absent)
    it("should reject requests without an id", async () => {
        await expect(normalizer.run({ fileId: "   " }, createTestContext())).rejects.toThrow(
            "One of file_id or structured_content_overview_id is required"
        );
    });

    // Scenario: a PDF file becomes a raw source
    it("should resolve a file id to PDF bytes", async () => {
        stores.files.getFileBytes.mockResolvedValue(PDF_BYTES);

        const { value, diagnostics } = await normalizer.run({ fileId: " f-1 " }, createTestContext());

        expect(stores.files.getFileBytes).toHaveBeenCalledWith("f-1");
        expect(value).toEqual({ kind: "raw", fileId: "f-1", bytes: PDF_BYTES });
        expect(diagnostics).toEqual([]);
    });

    // Scenario: absent file
    it("should raise NotFoundError for a missing file", async () => {
        stores.files.getFileBytes.mockResolvedValue(null);

        await expect(normalizer.run({ fileId: "missing" }, createTestContext())).rejects.toThrow(
            new NotFoundError("File not found: missing")
        );
    });

    // Scenario: bytes without the PDF signature
    it("should reject files that are not PDFs", async () => {
        stores.files.getFileBytes.mockResolvedValue(new TextEncoder().encode("PK\u0003\u0004zip"));

        await expect(normalizer.run({ fileId: "f-2" }, createTestContext())).rejects.toThrow(UnsupportedFormatError);
    });

    // Scenario: a structured payload becomes a structured source
    it("should resolve a content id to its payload", async () => {
        const payload = { title: "A Paper", sections: [{ name: "Intro", content: "Text" }] };
        stores.contents.getStructuredContent.mockResolvedValue(payload);

        const { value } = await normalizer.run({ structuredContentOverviewId: "c-1" }, createTestContext());

        expect(value).toEqual({ kind: "structured", contentId: "c-1", payload });
    });

    // Scenario: absent record and payload without sections
    it("should reject missing or malformed structured content", async () => {
        stores.contents.getStructuredContent.mockResolvedValueOnce(null);
        await expect(normalizer.run({ structuredContentOverviewId: "c-9" }, createTestContext())).rejects.toThrow(
            "Structured content not found: c-9"
        );

        stores.contents.getStructuredContent.mockResolvedValueOnce({ sections: "none" });
        await expect(normalizer.run({ structuredContentOverviewId: "c-9" }, createTestContext())).rejects.toThrow(
            "Structured content c-9 has no sections array"
        );
    });
});

describe("hasPdfSignature", () => {
    // Scenario: BOM and leading whitespace are skipped
    it("should accept a signature after a BOM and whitespace", () => {
        const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x0a, 0x20, ...PDF_BYTES]);

        expect(hasPdfSignature(bytes)).toBe(true);
        expect(hasPdfSignature(new Uint8Array([0x25, 0x50, 0x44]))).toBe(false);
        expect(hasPdfSignature(new Uint8Array())).toBe(false);
    });
});

describe("requestFromJson", () => {
    // Scenario: snake_case body fields map to the request
    it("should map body fields", () => {
        expect(requestFromJson({ file_id: "f-1" })).toEqual({ fileId: "f-1", structuredContentOverviewId: undefined });
        expect(requestFromJson({ structured_content_overview_id: "c-1", file_id: null })).toEqual({
            fileId                     : undefined,
            structuredContentOverviewId: "c-1",
        });
    });

    // Scenario: wrong types are input errors
    it("should reject non-object bodies and non-string ids", () => {
        expect(() => requestFromJson([])).toThrow("Request body must be a JSON object");
        expect(() => requestFromJson({ file_id: 42 })).toThrow("file_id must be a string");
    });
});
