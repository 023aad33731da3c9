/**
 * @fileoverview Paper Parser stage (Phase 1)
 *
 * Turns a content source into a PaperDocument plus discipline hints.
 *
 * Raw PDFs are read page by page, a title is inferred and the text is
 * segmented at detected headings. Structured payloads keep their own
 * section boundaries. Both then go through the same term extraction and
 * hint scoring, which is deterministic: the same input and lexicon always
 * give the same document and hints.
 *
 * @module domain/stages/PaperParser
 */

import {
    DiagnosticCollector,
    ParseError,
    errorMessage,
    stageResult,
    type PipelineStage,
    type StageContext,
    type StageResult,
} from "@papertriage/engine";
import type { ContentSource, RawSource, StructuredSource } from "../entities/ClassificationRequest.js";
import { isRecord } from "../entities/ClassificationRequest.js";
import type {
    DocumentProvenance,
    DocumentSection,
    ParsedPaper,
    SectionType,
} from "../entities/PaperDocument.js";
import { createPaperDocument, isSectionType } from "../entities/PaperDocument.js";
import type { PageText, PdfTextExtractor } from "../ports/index.js";
import type { KeywordLexicon } from "../taxonomy/KeywordLexicon.js";
import { detectHeading, inferSectionType } from "../text/headings.js";
import {
    addCounts,
    extractNamedEntities,
    matchTerms,
    scoreHints,
    termNames,
    weightedHits,
    type TermCounts,
} from "../text/terms.js";
import { countWords, tokenize } from "../text/tokens.js";

export interface PaperParserConfig {
    /** Extracted PDF text beyond this many characters is ignored (default: 200000) */
    readonly maxTextChars?: number;
}

/**
 * Section before term analysis.
 */
interface DraftSection {
    readonly heading: string | null;
    readonly text: string;
    readonly sectionType: SectionType;
}

interface DraftDocument {
    readonly title: string | null;
    readonly sections: readonly DraftSection[];
    readonly keywords: readonly string[];
    readonly provenance: DocumentProvenance;
}

const kPAGE_NUMBER = /^(?:page\s+)?\d{1,4}(?:\s*(?:of|\/)\s*\d{1,4})?$/i;
const kTITLE_SEARCH_LINES = 15;
const kTITLE_MIN_CHARS = 8;
const kTITLE_MAX_CHARS = 250;

/**
 * Keys holding a structured section's text, in priority order.
 */
const kTEXT_KEYS = ["markdown", "text", "value", "raw_content", "paragraph"] as const;

/**
 * Keys that describe a structured section rather than hold its text.
 */
const kSECTION_META_KEYS = new Set([
    "id", "section_id", "name", "section_name", "heading", "title",
    "type", "section_type", "order", "section_order", "content",
]);

function firstString(record: Record<string, unknown>, keys: readonly string[]): string | null {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === "string" && value.trim().length > 0) {
            return value.trim();
        }
    }
    return null;
}

function firstNumber(record: Record<string, unknown>, keys: readonly string[]): number | null {
    for (const key of keys) {
        const value = record[key];
        if (typeof value === "number" && Number.isFinite(value)) {
            return value;
        }
    }
    return null;
}

/**
 * Text of a structured section's content: a plain string, the first
 * non-empty text key, or else `key: value` lines of its scalar fields.
 */
export function structuredContentText(content: unknown): string {
    if (typeof content === "string") {
        return content;
    }
    if (!isRecord(content)) {
        return "";
    }

    const direct = firstString(content, kTEXT_KEYS);
    if (direct !== null) {
        return direct;
    }

    return Object.entries(content)
        .filter(([key, value]) =>
            !key.startsWith("_")
            && !kSECTION_META_KEYS.has(key)
            && (typeof value === "string" || typeof value === "number"))
        .map(([key, value]) => `${key}: ${String(value)}`)
        .join("\n");
}

/**
 * Pick the title line among the first lines of a PDF's text.
 *
 * @returns Index into `lines`, or -1 when nothing looks like a title
 */
export function findTitleLine(lines: readonly string[]): number {
    const window = lines.slice(0, kTITLE_SEARCH_LINES);

    const markdownTitle = window.findIndex((line) => /^#\s+\S/.test(line));
    if (markdownTitle >= 0) {
        return markdownTitle;
    }

    return window.findIndex((line) =>
        line.length >= kTITLE_MIN_CHARS
        && line.length <= kTITLE_MAX_CHARS
        && /\p{L}{2}/u.test(line)
        && detectHeading(line) === null
        && !line.includes("@")
        && !/https?:\/\/|www\./i.test(line)
        && !/^arxiv:/i.test(line));
}

/**
 * PaperParser
 *
 * @example
 * ```typescript
 * const parser = new PaperParser(new PdfJsTextExtractor(), lexicon);
 * const { value, diagnostics } = await parser.run(source, context);
 * value.document.sectionCount; // 5
 * value.hints[0];              // { disciplineId: 1, strength: 0.81, ... }
 * ```
 */
export class PaperParser implements PipelineStage<ContentSource, ParsedPaper> {
    readonly id = "parser";

    private readonly maxTextChars: number;

    constructor(
        private readonly extractor: PdfTextExtractor,
        private readonly lexicon: KeywordLexicon,
        config: PaperParserConfig = {}
    ) {
        this.maxTextChars = config.maxTextChars ?? 200_000;
    }

    /**
     * @throws ParseError when the source yields no usable text
     */
    async run(source: ContentSource, context: StageContext): Promise<StageResult<ParsedPaper>> {
        const issues = new DiagnosticCollector(this.id);

        const draft = source.kind === "raw"
            ? await this.parseRaw(source, issues, context)
            : this.parseStructured(source, issues, context);

        const parsed = this.analyze(draft);

        context.logger.info("Paper parsed", {
            source  : source.kind,
            title   : parsed.document.title,
            sections: parsed.document.sectionCount,
            words   : parsed.document.wordCount,
            hints   : parsed.hints.length,
            topHint : parsed.hints[0]?.disciplineId ?? null,
        });

        return stageResult(parsed, issues.list());
    }

    private async parseRaw(
        source: RawSource,
        issues: DiagnosticCollector,
        context: StageContext
    ): Promise<DraftDocument> {
        let pages: readonly PageText[];
        try {
            pages = await this.extractor.extractPages(source.bytes);
        }
        catch (error) {
            throw new ParseError(`Could not open PDF ${source.fileId}: ${errorMessage(error)}`, {
                cause  : error,
                details: { fileId: source.fileId },
            });
        }

        const texts: string[] = [];
        let pagesSkipped = 0;

        for (const page of pages) {
            if (!page.ok) {
                pagesSkipped++;
                issues.add("page-skipped", `Page ${page.pageNumber} could not be read`, {
                    page : page.pageNumber,
                    error: page.error,
                });
                context.logger.warn("Skipping unreadable page", { page: page.pageNumber, error: page.error });
                continue;
            }
            if (page.text.trim().length > 0) {
                texts.push(page.text);
            }
        }

        const provenance: DocumentProvenance = {
            kind     : "raw",
            fileId   : source.fileId,
            pageCount: pages.length,
            pagesSkipped,
        };

        if (texts.length === 0) {
            throw new ParseError(`No extractable text in file ${source.fileId}`, {
                details: { fileId: source.fileId, pageCount: pages.length, pagesSkipped },
            });
        }

        let fullText = texts.join("\n");
        if (fullText.length > this.maxTextChars) {
            issues.add("text-truncated", `Text truncated to ${this.maxTextChars} characters`, {
                originalLength: fullText.length,
            });
            fullText = fullText.slice(0, this.maxTextChars);
        }

        const lines = fullText
            .split(/\r?\n/)
            .map((line) => line.replace(/\s+/g, " ").trim())
            .filter((line) => line.length > 0 && !kPAGE_NUMBER.test(line));

        const titleIndex = findTitleLine(lines);
        const title = titleIndex >= 0 ? lines[titleIndex].replace(/^#\s+/, "").trim() : null;
        const sections = segmentLines(lines, titleIndex);

        if (sections.length === 0) {
            throw new ParseError(`No extractable text in file ${source.fileId}`, {
                details: { fileId: source.fileId, pageCount: pages.length, pagesSkipped },
            });
        }

        return { title, sections, keywords: [], provenance };
    }

    private parseStructured(
        source: StructuredSource,
        issues: DiagnosticCollector,
        context: StageContext
    ): DraftDocument {
        const { payload } = source;
        const ordered: Array<DraftSection & { order: number; position: number }> = [];

        payload.sections.forEach((raw, position) => {
            const record = isRecord(raw) ? raw : null;
            if (record === null && typeof raw !== "string") {
                issues.add("section-skipped", `Section ${position} is neither text nor an object`, { position });
                return;
            }

            const heading = record ? firstString(record, ["name", "section_name", "heading", "title"]) : null;
            const text = (record ? structuredContentText("content" in record ? record.content : record) : String(raw)).trim();

            if (text.length === 0) {
                issues.add("section-skipped", `Section ${position} has no text`, { position, heading });
                return;
            }

            const declaredType = record ? record.type ?? record.section_type : undefined;
            ordered.push({
                heading,
                text,
                sectionType: isSectionType(declaredType) ? declaredType : inferSectionType(heading),
                order      : (record ? firstNumber(record, ["order", "section_order"]) : null) ?? position,
                position,
            });
        });

        if (ordered.length === 0) {
            throw new ParseError(`Structured content ${source.contentId} has no section text`, {
                details: { contentId: source.contentId, sections: payload.sections.length },
            });
        }

        ordered.sort((a, b) => a.order - b.order || a.position - b.position);
        context.logger.debug("Structured sections accepted", {
            accepted: ordered.length,
            skipped : payload.sections.length - ordered.length,
        });

        const title = firstString(payload, ["title", "paper_title"])
            ?? markdownTitle(ordered[0].text);

        const keywordsField = payload.keywords ?? payload.key_terms;
        const keywords = Array.isArray(keywordsField)
            ? keywordsField.filter((keyword): keyword is string => typeof keyword === "string" && keyword.trim().length > 0)
            : [];

        return {
            title,
            sections  : ordered.map(({ heading, text, sectionType }) => ({ heading, text, sectionType })),
            keywords,
            provenance: { kind: "structured", contentId: source.contentId },
        };
    }

    /**
     * Term extraction and hint scoring, shared by both input variants.
     * Reference sections are kept in the document but do not count
     * towards terms, words or hints.
     */
    private analyze(draft: DraftDocument): ParsedPaper {
        const documentCounts: TermCounts = new Map();
        const namedEntities = new Set<string>();
        let wordCount = 0;

        if (draft.title) {
            addCounts(documentCounts, matchTerms(tokenize(draft.title), this.lexicon));
            wordCount += countWords(draft.title);
            extractNamedEntities(draft.title).forEach((entity) => namedEntities.add(entity));
        }

        const sections: DocumentSection[] = draft.sections.map((section, order) => {
            const counts = matchTerms(tokenize(section.text), this.lexicon);
            if (section.heading) {
                addCounts(counts, matchTerms(tokenize(section.heading), this.lexicon));
            }
            const sectionWords = countWords(section.text);

            if (section.sectionType !== "references") {
                addCounts(documentCounts, counts);
                wordCount += sectionWords;
                extractNamedEntities(section.text).forEach((entity) => namedEntities.add(entity));
            }

            return {
                heading    : section.heading,
                text       : section.text,
                sectionType: section.sectionType,
                order,
                wordCount  : sectionWords,
                terms      : termNames(counts),
                termWeight : weightedHits(counts),
            };
        });

        for (const keyword of draft.keywords) {
            addCounts(documentCounts, matchTerms(tokenize(keyword), this.lexicon));
        }

        const rawTerms = new Set<string>([
            ...termNames(documentCounts),
            ...[...namedEntities].sort(),
            ...draft.keywords.map((keyword) => keyword.trim()),
        ]);

        const document = createPaperDocument({
            title     : draft.title,
            sections,
            rawTerms,
            wordCount,
            provenance: draft.provenance,
        });

        return Object.freeze({
            document,
            hints: Object.freeze(scoreHints(documentCounts, wordCount)),
        });
    }
}

/**
 * First `# ` heading of a markdown text, if any.
 */
function markdownTitle(text: string): string | null {
    const match = /^#\s+(.+)$/m.exec(text);
    return match ? match[1].trim() : null;
}

/**
 * Split lines into sections at detected headings. The title line is left
 * out; text before the first heading becomes an untitled section.
 * Headings without any text under them are dropped.
 */
export function segmentLines(lines: readonly string[], titleIndex: number): DraftSection[] {
    const sections: DraftSection[] = [];
    let heading: string | null = null;
    let body: string[] = [];

    const flush = (): void => {
        const text = body.join("\n").trim();
        if (text.length > 0) {
            sections.push({ heading, text, sectionType: inferSectionType(heading) });
        }
    };

    lines.forEach((line, index) => {
        if (index === titleIndex) {
            return;
        }

        const detected = detectHeading(line);
        if (detected) {
            flush();
            heading = detected.heading;
            body = detected.remainder ? [detected.remainder] : [];
            return;
        }

        body.push(line);
    });
    flush();

    return sections;
}
