/**
 * @fileoverview PaperDocument entity
 *
 * The normalized representation of a paper produced by the parser. Every
 * downstream stage depends on this shape only, never on where the paper
 * came from.
 *
 * @module domain/entities/PaperDocument
 */

import { UnsupportedFormatError } from "@papertriage/engine";
import { isRecord } from "./ClassificationRequest.js";
import type { DisciplineHint } from "./Discipline.js";

/**
 * Coarse role of a section, inferred from its heading.
 */
export type SectionType =
    | "abstract"
    | "introduction"
    | "methods"
    | "results"
    | "discussion"
    | "conclusion"
    | "references"
    | "appendix"
    | "content";

export const kSECTION_TYPES: readonly SectionType[] = [
    "abstract",
    "introduction",
    "methods",
    "results",
    "discussion",
    "conclusion",
    "references",
    "appendix",
    "content",
];

export function isSectionType(value: unknown): value is SectionType {
    return typeof value === "string" && kSECTION_TYPES.some((type) => type === value);
}

export interface DocumentSection {
    readonly heading: string | null;
    readonly text: string;
    readonly sectionType: SectionType;

    /** Position in the document, 0-based after sorting */
    readonly order: number;

    /** Words in `text` */
    readonly wordCount: number;

    /** Canonical lexicon terms found in this section, sorted */
    readonly terms: readonly string[];

    /** Weighted lexicon hits in this section */
    readonly termWeight: number;
}

/**
 * Where the document came from. Used for diagnostics only.
 */
export type DocumentProvenance =
    | { readonly kind: "raw"; readonly fileId: string; readonly pageCount: number; readonly pagesSkipped: number }
    | { readonly kind: "structured"; readonly contentId: string };

export interface PaperDocument {
    readonly title: string | null;
    readonly sections: readonly DocumentSection[];
    readonly sectionCount: number;

    /** Lexicon terms and named-entity terms found anywhere in the paper */
    readonly rawTerms: ReadonlySet<string>;

    /** Words counted towards hint density (title + non-reference sections) */
    readonly wordCount: number;

    readonly provenance: DocumentProvenance;
}

/**
 * Phase 1 output: the document plus the discipline hints derived from it.
 */
export interface ParsedPaper {
    readonly document: PaperDocument;
    readonly hints: readonly DisciplineHint[];
}

/**
 * Build a frozen PaperDocument. `sectionCount` always equals the number
 * of sections.
 */
export function createPaperDocument(input: Omit<PaperDocument, "sectionCount">): PaperDocument {
    return Object.freeze({
        title       : input.title,
        sections    : Object.freeze(input.sections.map((section) => Object.freeze({
            ...section,
            terms: Object.freeze([...section.terms]),
        }))),
        sectionCount: input.sections.length,
        rawTerms    : new Set(input.rawTerms),
        wordCount   : input.wordCount,
        provenance  : Object.freeze({ ...input.provenance }),
    });
}

/**
 * Full searchable text of the document: title followed by every section's
 * heading and text.
 */
export function documentText(document: PaperDocument): string {
    const parts: string[] = [];
    if (document.title) {
        parts.push(document.title);
    }
    for (const section of document.sections) {
        if (section.heading) {
            parts.push(section.heading);
        }
        parts.push(section.text);
    }
    return parts.join("\n");
}

/**
 * JSON form of a parsed paper, as saved in the run workspace. Sets become
 * arrays in insertion order so `parsedPaperFromJson` restores them exactly.
 */
export function serializeParsedPaper(parsed: ParsedPaper): Record<string, unknown> {
    const { document } = parsed;
    const { provenance } = document;
    return {
        title     : document.title,
        provenance: provenance.kind === "raw"
            ? {
                kind         : "raw",
                file_id      : provenance.fileId,
                page_count   : provenance.pageCount,
                pages_skipped: provenance.pagesSkipped,
            }
            : { kind: "structured", content_id: provenance.contentId },
        word_count: document.wordCount,
        raw_terms : [...document.rawTerms],
        sections  : document.sections.map((section) => ({
            order       : section.order,
            heading     : section.heading,
            section_type: section.sectionType,
            word_count  : section.wordCount,
            terms       : section.terms,
            term_weight : section.termWeight,
            text        : section.text,
        })),
        hints: parsed.hints.map((hint) => ({
            discipline_id: hint.disciplineId,
            strength     : hint.strength,
            matched_terms: [...hint.matchedTerms],
        })),
    };
}

function malformed(reason: string): UnsupportedFormatError {
    return new UnsupportedFormatError(`Saved paper content is malformed: ${reason}`);
}

function readStrings(value: unknown, field: string): string[] {
    if (!Array.isArray(value)) {
        throw malformed(`${field} must be a list`);
    }
    const items: unknown[] = value;
    return items.map((item) => {
        if (typeof item !== "string") {
            throw malformed(`${field} must hold strings only`);
        }
        return item;
    });
}

function readProvenance(raw: unknown): DocumentProvenance {
    if (isRecord(raw) && raw.kind === "structured" && typeof raw.content_id === "string") {
        return { kind: "structured", contentId: raw.content_id };
    }
    if (
        isRecord(raw)
        && raw.kind === "raw"
        && typeof raw.file_id === "string"
        && typeof raw.page_count === "number"
        && typeof raw.pages_skipped === "number"
    ) {
        return { kind: "raw", fileId: raw.file_id, pageCount: raw.page_count, pagesSkipped: raw.pages_skipped };
    }
    throw malformed("provenance is neither raw nor structured");
}

function readSection(raw: unknown, index: number): DocumentSection {
    if (!isRecord(raw)) {
        throw malformed(`section ${index} is not an object`);
    }

    const { heading, text, section_type: sectionType, order, word_count: wordCount, term_weight: termWeight } = raw;
    if (heading !== null && typeof heading !== "string") {
        throw malformed(`section ${index} has an invalid heading`);
    }
    if (typeof text !== "string" || !isSectionType(sectionType)) {
        throw malformed(`section ${index} has no text or an unknown type`);
    }
    if (typeof order !== "number" || typeof wordCount !== "number" || typeof termWeight !== "number") {
        throw malformed(`section ${index} has non-numeric counts`);
    }

    return {
        heading,
        text,
        sectionType,
        order,
        wordCount,
        terms: readStrings(raw.terms, `sections[${index}].terms`),
        termWeight,
    };
}

function readHint(raw: unknown, index: number): DisciplineHint {
    if (!isRecord(raw) || typeof raw.discipline_id !== "number" || typeof raw.strength !== "number") {
        throw malformed(`hint ${index} needs a numeric discipline_id and strength`);
    }
    return {
        disciplineId: raw.discipline_id,
        strength    : raw.strength,
        matchedTerms: new Set(readStrings(raw.matched_terms, `hints[${index}].matched_terms`)),
    };
}

/**
 * Restore a parsed paper written by `serializeParsedPaper`.
 *
 * @throws UnsupportedFormatError when the data does not have that shape
 */
export function parsedPaperFromJson(data: unknown): ParsedPaper {
    if (!isRecord(data)) {
        throw malformed("expected a JSON object");
    }

    const { title, word_count: wordCount, sections, hints } = data;
    if (title !== null && typeof title !== "string") {
        throw malformed("title must be a string or null");
    }
    if (typeof wordCount !== "number") {
        throw malformed("word_count must be a number");
    }
    if (!Array.isArray(sections) || !Array.isArray(hints)) {
        throw malformed("sections and hints must be lists");
    }
    const sectionList: unknown[] = sections;
    const hintList: unknown[] = hints;

    return {
        document: createPaperDocument({
            title,
            sections  : sectionList.map(readSection),
            rawTerms  : new Set(readStrings(data.raw_terms, "raw_terms")),
            wordCount,
            provenance: readProvenance(data.provenance),
        }),
        hints: hintList.map(readHint),
    };
}
