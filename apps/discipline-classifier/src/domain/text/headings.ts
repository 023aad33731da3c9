/**
 * @fileoverview Section heading detection and section type inference
 *
 * @module domain/text/headings
 */

import type { SectionType } from "../entities/PaperDocument.js";

/**
 * Section names recognised as headings even without numbering.
 */
const kKNOWN_HEADINGS = new Set([
    "abstract",
    "introduction",
    "background",
    "related work",
    "literature review",
    "preliminaries",
    "method",
    "methods",
    "methodology",
    "materials and methods",
    "approach",
    "experiments",
    "experimental setup",
    "results",
    "findings",
    "evaluation",
    "discussion",
    "analysis",
    "conclusion",
    "conclusions",
    "summary",
    "concluding remarks",
    "future work",
    "limitations",
    "acknowledgments",
    "acknowledgements",
    "references",
    "bibliography",
    "appendix",
    "supplementary material",
]);

/**
 * Ordered keyword rules; the first rule with a keyword contained in the
 * lower-cased heading wins.
 */
const kSECTION_TYPE_RULES: ReadonlyArray<readonly [SectionType, readonly string[]]> = [
    ["introduction", ["introduction", "intro", "background"]],
    ["methods", ["method", "methodology", "approach", "materials and methods"]],
    ["results", ["result", "finding", "experiment"]],
    ["discussion", ["discussion", "analysis"]],
    ["conclusion", ["conclusion", "summary", "concluding"]],
    ["abstract", ["abstract"]],
    ["references", ["reference", "bibliography", "citation"]],
    ["appendix", ["appendix", "supplementary"]],
];

const kMARKDOWN_HEADING = /^(#{1,6})\s+(.+?)\s*#*$/;
const kNUMBERED_HEADING = /^(?:\d{1,2}(?:\.\d{1,2}){0,3}\.?|[IVX]{1,5}\.)\s+(\p{Lu}[^.!?]*?)\s*$/u;
const kINLINE_ABSTRACT = /^(abstract)\s*[.:—–-]\s*(\S.*)$/i;

/**
 * A heading found on a line, plus any body text that followed it on the
 * same line ("Abstract. We study...").
 */
export interface DetectedHeading {
    readonly heading: string;
    readonly remainder: string;
    readonly level: number;
}

export function isKnownHeading(text: string): boolean {
    return kKNOWN_HEADINGS.has(text.toLowerCase().replace(/[:.]+$/, "").trim());
}

/**
 * Decide whether a line of extracted text is a section heading.
 *
 * Recognised forms:
 * - markdown headings (`## Results`)
 * - numbered headings (`1 Introduction`, `2.1 Data`, `IV. RESULTS`), at most 10 words
 * - a bare known section name (`Abstract`, `CONCLUSIONS:`)
 * - an inline abstract (`Abstract - We study ...`)
 *
 * @example
 * ```typescript
 * detectHeading("3.2 Training Setup"); // { heading: "Training Setup", remainder: "", level: 2 }
 * detectHeading("We trained for 3 epochs."); // null
 * ```
 */
export function detectHeading(line: string): DetectedHeading | null {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.length > 120) {
        return null;
    }

    const markdown = kMARKDOWN_HEADING.exec(trimmed);
    if (markdown) {
        return { heading: markdown[2], remainder: "", level: markdown[1].length };
    }

    const numbered = kNUMBERED_HEADING.exec(trimmed);
    if (numbered && numbered[1].split(/\s+/).length <= 10) {
        const numbering = trimmed.slice(0, trimmed.length - numbered[1].length).trim();
        const level = /^\d/.test(numbering) ? numbering.replace(/\.$/, "").split(".").length : 1;
        return { heading: numbered[1], remainder: "", level };
    }

    if (isKnownHeading(trimmed)) {
        return { heading: trimmed.replace(/[:.]+$/, ""), remainder: "", level: 1 };
    }

    const inline = kINLINE_ABSTRACT.exec(trimmed);
    if (inline) {
        return { heading: inline[1], remainder: inline[2], level: 1 };
    }

    return null;
}

/**
 * Infer a section's role from its heading.
 *
 * @example
 * ```typescript
 * inferSectionType("2. Materials and Methods"); // "methods"
 * inferSectionType("Related Work");             // "content"
 * inferSectionType(null);                       // "content"
 * ```
 */
export function inferSectionType(heading: string | null): SectionType {
    if (!heading) {
        return "content";
    }

    const lower = heading.toLowerCase();
    for (const [type, keywords] of kSECTION_TYPE_RULES) {
        if (keywords.some((keyword) => lower.includes(keyword))) {
            return type;
        }
    }
    return "content";
}
