/**
 * @fileoverview Unit tests for PaperParser
 *
 * Tests cover:
 * - PDF text: title, heading segmentation, page-number lines
 * - Unreadable pages, unopenable files and empty documents
 * - Text truncation
 * - Structured payloads: ordering, skipped sections, keywords
 * - Term analysis and hints (reference sections excluded)
 * - Identical output for identical input
 *
 * @module __tests__/PaperParser
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ParseError } from "@papertriage/engine";
import {
    PaperParser,
    findTitleLine,
    segmentLines,
    structuredContentText,
} from "../domain/stages/PaperParser.js";
import type { ContentSource } from "../domain/entities/ClassificationRequest.js";
import type { PageText, PdfTextExtractor } from "../domain/ports/index.js";
import { createTestContext, createTestLexicon } from "./fixtures.js";

const RAW_SOURCE: ContentSource = { kind: "raw", fileId: "f-1", bytes: new Uint8Array([0x25]) };

const PAGE_ONE = [
    "Graph Learning for Code Search",
    "Abstract",
    "We propose a neural network approach to code search.",
    "1 Introduction",
    "Machine learning improves every algorithm we tested.",
    "2",
].join("\n");

const PAGE_THREE = [
    "2 Methods",
    "The algorithm uses a neural network trained on clinical notes.",
    "References",
    "Smith. A clinical patient study. 2020.",
].join("\n");

function createMockExtractor(pages: PageText[]) {
    return { extractPages: vi.fn<PdfTextExtractor["extractPages"]>().mockResolvedValue(pages) };
}

describe("PaperParser", () => {
    const lexicon = createTestLexicon();

    describe("raw PDF text", () => {
        let extractor: ReturnType<typeof createMockExtractor>;

        beforeEach(() => {
            extractor = createMockExtractor([
                { pageNumber: 1, ok: true, text: PAGE_ONE },
                { pageNumber: 2, ok: false, error: "bad xref" },
                { pageNumber: 3, ok: true, text: PAGE_THREE },
            ]);
        });

        // Scenario: title and sections come from the page text
        it("should segment the text at headings", async () => {
            const parser = new PaperParser(extractor, lexicon);

            const { value } = await parser.run(RAW_SOURCE, createTestContext());
            const { document } = value;

            expect(document.title).toBe("Graph Learning for Code Search");
            expect(document.sectionCount).toBe(4);
            expect(document.sections.map((section) => [section.heading, section.sectionType])).toEqual([
                ["Abstract", "abstract"],
                ["Introduction", "introduction"],
                ["Methods", "methods"],
                ["References", "references"],
            ]);
            expect(document.sections[1].text).toBe("Machine learning improves every algorithm we tested.");
            expect(document.provenance).toEqual({ kind: "raw", fileId: "f-1", pageCount: 3, pagesSkipped: 1 });
        });

        // Scenario: an unreadable page is a diagnostic, not a failure
        it("should report skipped pages", async () => {
            const parser = new PaperParser(extractor, lexicon);
            const context = createTestContext();

            const { diagnostics } = await parser.run(RAW_SOURCE, context);

            expect(diagnostics).toEqual([{
                stage  : "parser",
                code   : "page-skipped",
                message: "Page 2 could not be read",
                data   : { page: 2, error: "bad xref" },
            }]);
            expect(context.logger.warn).toHaveBeenCalledWith("Skipping unreadable page", { page: 2, error: "bad xref" });
        });

        // Scenario: terms, word counts and hints leave out the references
        it("should compute terms and hints without the references", async () => {
            const parser = new PaperParser(extractor, lexicon);

            const { value } = await parser.run(RAW_SOURCE, createTestContext());
            const { document, hints } = value;

            expect(document.wordCount).toBe(31);
            expect(document.sections.map((section) => section.termWeight)).toEqual([1.5, 2.5, 3.5, 2]);
            expect(document.sections[3].terms).toEqual(["clinical", "patient"]);
            expect([...document.rawTerms]).toEqual([
                "algorithm",
                "clinical",
                "machine learning",
                "neural network",
                "Code Search",
                "Graph Learning",
            ]);
            expect(hints.map((hint) => [hint.disciplineId, hint.strength])).toEqual([[1, 0.8025], [2, 0.3846]]);
            expect([...hints[1].matchedTerms]).toEqual(["clinical"]);
        });

        // Scenario: parsing the same PDF twice gives the same document and hints
        it("should parse identical PDF text identically", async () => {
            const parser = new PaperParser(extractor, lexicon);

            const first = await parser.run(RAW_SOURCE, createTestContext());
            const second = await parser.run(RAW_SOURCE, createTestContext());

            expect(second.value.document).toEqual(first.value.document);
            expect([...second.value.document.rawTerms]).toEqual([...first.value.document.rawTerms]);
            expect(second.value.hints).toEqual(first.value.hints);
            expect(second.value.hints.map((hint) => [...hint.matchedTerms])).toEqual(
                first.value.hints.map((hint) => [...hint.matchedTerms])
            );
            expect(second.diagnostics).toEqual(first.diagnostics);
        });

        // Scenario: the extractor cannot open the file
        it("should raise ParseError when the PDF cannot be opened", async () => {
            extractor.extractPages.mockRejectedValue(new Error("Invalid PDF structure"));
            const parser = new PaperParser(extractor, lexicon);

            await expect(parser.run(RAW_SOURCE, createTestContext())).rejects.toThrow(
                new ParseError("Could not open PDF f-1: Invalid PDF structure")
            );
        });

        // Scenario: pages without text
        it("should raise ParseError when no page has text", async () => {
            extractor.extractPages.mockResolvedValue([
                { pageNumber: 1, ok: true, text: "  " },
                { pageNumber: 2, ok: false, error: "bad xref" },
            ]);
            const parser = new PaperParser(extractor, lexicon);

            await expect(parser.run(RAW_SOURCE, createTestContext())).rejects.toThrow("No extractable text in file f-1");
        });

        // Scenario: overlong text is cut and reported
        it("should truncate text beyond the configured limit", async () => {
            extractor.extractPages.mockResolvedValue([{
                pageNumber: 1,
                ok        : true,
                text      : "Short Title Here\nAbstract\nSome words about polymer synthesis that go on and on.",
            }]);
            const parser = new PaperParser(extractor, lexicon, { maxTextChars: 60 });

            const { value, diagnostics } = await parser.run(RAW_SOURCE, createTestContext());

            expect(diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.data])).toEqual([
                ["text-truncated", { originalLength: 79 }],
            ]);
            expect(value.document.sections[0].text).toBe("Some words about polymer synthesis");
        });
    });

    describe("structured content", () => {
        const extractor = createMockExtractor([]);
        const parser = new PaperParser(extractor, lexicon);

        const source: ContentSource = {
            kind     : "structured",
            contentId: "c-1",
            payload  : {
                paper_title: "Polymer Synthesis Routes",
                keywords   : ["gene", 7, ""],
                sections   : [
                    { name: "Results", order: 2, content: { markdown: "The polymer yield rose." } },
                    { section_name: "Introduction", order: 1, content: "Protein synthesis matters." },
                    42,
                    { heading: "Empty", content: "   " },
                    "Loose paragraph about cell growth.",
                ],
            },
        };

        // Scenario: sections are ordered and unusable ones skipped
        it("should order sections and skip unusable ones", async () => {
            const { value, diagnostics } = await parser.run(source, createTestContext());
            const { document } = value;

            expect(document.title).toBe("Polymer Synthesis Routes");
            expect(document.sections.map((section) => [section.heading, section.sectionType, section.order])).toEqual([
                ["Introduction", "introduction", 0],
                ["Results", "results", 1],
                [null, "content", 2],
            ]);
            expect(document.provenance).toEqual({ kind: "structured", contentId: "c-1" });
            expect(diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
                "Section 2 is neither text nor an object",
                "Section 3 has no text",
            ]);
            expect(extractor.extractPages).not.toHaveBeenCalled();
        });

        // Scenario: payload keywords feed the hints and raw terms
        it("should use payload keywords in the analysis", async () => {
            const { value } = await parser.run(source, createTestContext());

            expect(value.document.wordCount).toBe(15);
            expect(value.hints.map((hint) => [hint.disciplineId, hint.strength])).toEqual([[3, 0.7576], [4, 0.6522]]);
            expect([...value.hints[1].matchedTerms]).toEqual(["cell", "gene", "protein"]);
            expect([...value.document.rawTerms]).toEqual([
                "cell",
                "gene",
                "polymer",
                "protein",
                "synthesis",
                "Polymer Synthesis Routes",
            ]);
        });

        // Scenario: parsing the same payload twice gives the same document and hints
        it("should parse identical payloads identically", async () => {
            const first = await parser.run(source, createTestContext());
            const second = await parser.run(source, createTestContext());

            expect(second.value.document).toEqual(first.value.document);
            expect([...second.value.document.rawTerms]).toEqual([...first.value.document.rawTerms]);
            expect(second.value.hints).toEqual(first.value.hints);
            expect(second.value.hints.map((hint) => [...hint.matchedTerms])).toEqual(
                first.value.hints.map((hint) => [...hint.matchedTerms])
            );
        });

        // Scenario: a declared section type wins over the heading
        it("should honour declared section types", async () => {
            const { value } = await parser.run({
                kind     : "structured",
                contentId: "c-3",
                payload  : { sections: [{ name: "Overview", type: "abstract", text: "# Cell Atlas\nWe map every cell." }] },
            }, createTestContext());

            expect(value.document.sections[0].sectionType).toBe("abstract");
            expect(value.document.title).toBe("Cell Atlas");
        });

        // Scenario: nothing usable at all
        it("should raise ParseError when no section has text", async () => {
            await expect(parser.run({
                kind     : "structured",
                contentId: "c-2",
                payload  : { sections: [null, { name: "Blank" }] },
            }, createTestContext())).rejects.toThrow("Structured content c-2 has no section text");
        });
    });
});

describe("parser helpers", () => {
    // Scenario: content objects without a text key fall back to key/value lines
    it("should flatten structured content", () => {
        expect(structuredContentText("plain")).toBe("plain");
        expect(structuredContentText({ text: "  body  ", value: "other" })).toBe("body");
        expect(structuredContentText({ dataset: "Synthetic", size: 3, _internal: "x", name: "n" })).toBe(
            "dataset: Synthetic\nsize: 3"
        );
        expect(structuredContentText([1, 2])).toBe("");
    });

    // Scenario: markdown titles win; identifiers and headings are skipped
    it("should find the title line", () => {
        expect(findTitleLine(["Preprint", "# My Title"])).toBe(1);
        expect(findTitleLine(["arXiv:2401.00001", "A Real Title Line"])).toBe(1);
        expect(findTitleLine(["Abstract", "x"])).toBe(-1);
    });

    // Scenario: headings with nothing under them are dropped
    it("should drop empty sections", () => {
        expect(segmentLines(["Abstract", "1 Introduction", "Text here"], -1)).toEqual([
            { heading: "Introduction", text: "Text here", sectionType: "introduction" },
        ]);
    });
});
