/**
 * @fileoverview Term extraction and hint scoring
 *
 * @module domain/text/terms
 */

import type { DisciplineHint } from "../entities/Discipline.js";
import { compareHints } from "../entities/Discipline.js";
import type { KeywordLexicon, LexiconTerm } from "../taxonomy/KeywordLexicon.js";
import type { Token } from "./tokens.js";
import { tokenize } from "./tokens.js";

/**
 * Occurrences of each lexicon term in a text.
 */
export type TermCounts = Map<LexiconTerm, number>;

/**
 * Find lexicon terms in a token stream.
 *
 * Longest match first: at each position the longest phrase (up to the
 * lexicon's longest term) whose key is in the lexicon is taken, and its
 * tokens are not matched again, so "machine learning" does not also count
 * as "learning". A phrase can hit several disciplines at once.
 */
export function matchTerms(tokens: readonly Token[], lexicon: KeywordLexicon): TermCounts {
    const counts: TermCounts = new Map();
    let i = 0;

    while (i < tokens.length) {
        let consumed = 0;

        for (let n = Math.min(lexicon.maxTokens, tokens.length - i); n >= 1 && consumed === 0; n--) {
            const window = tokens.slice(i, i + n);
            const key = window.map((token) => token.norm).join(" ");
            const raw = window.map((token) => token.raw).join(" ");

            for (const term of lexicon.lookup(key)) {
                if (term.caseSensitive && raw !== term.term) {
                    continue;
                }
                counts.set(term, (counts.get(term) ?? 0) + 1);
                consumed = n;
            }
        }

        i += consumed > 0 ? consumed : 1;
    }

    return counts;
}

/**
 * Merge `source` into `target`.
 */
export function addCounts(target: TermCounts, source: TermCounts): void {
    for (const [term, count] of source) {
        target.set(term, (target.get(term) ?? 0) + count);
    }
}

/**
 * Sum of `count × weight` over every term.
 */
export function weightedHits(counts: TermCounts): number {
    let total = 0;
    for (const [term, count] of counts) {
        total += count * term.weight;
    }
    return total;
}

/**
 * Canonical spellings of the matched terms, sorted and de-duplicated.
 */
export function termNames(counts: TermCounts): string[] {
    return [...new Set([...counts.keys()].map((term) => term.term))].sort();
}

const kNAMED_ENTITY_STOPWORDS = new Set([
    "a", "an", "and", "as", "at", "by", "for", "from", "in", "into", "it", "its",
    "of", "on", "or", "our", "the", "their", "these", "this", "those", "to", "we", "with",
]);

const kROMAN_NUMERAL = /^[IVXLC]+$/;
const kACRONYM = /^[A-Z][A-Z0-9]{1,7}$/;
const kCAPITALIZED = /^\p{Lu}\p{Ll}+$/u;

/**
 * Extract named-entity-like terms: runs of two or more capitalized words
 * ("Monte Carlo", "Transformer Networks") and standalone acronyms ("BERT").
 * Runs never cross punctuation or line breaks.
 */
export function extractNamedEntities(text: string): Set<string> {
    const entities = new Set<string>();

    for (const fragment of text.split(/[^\p{L}\p{N}\s-]+|\n/u)) {
        const tokens = tokenize(fragment).map((token) => token.raw);
        let run: string[] = [];

        const flush = (): void => {
            // Drop leading function words such as "The" or "In"
            while (run.length > 0 && kNAMED_ENTITY_STOPWORDS.has(run[0].toLowerCase())) {
                run.shift();
            }
            if (run.length >= 2) {
                entities.add(run.join(" "));
            }
            run = [];
        };

        for (const token of tokens) {
            if (kACRONYM.test(token) && !kROMAN_NUMERAL.test(token)) {
                flush();
                entities.add(token);
            }
            else if (kCAPITALIZED.test(token)) {
                run.push(token);
            }
            else {
                flush();
            }
        }
        flush();
    }

    return entities;
}

/**
 * Density constant: a density of `kHINT_HALF_DENSITY` weighted hits per
 * thousand words maps to strength 0.5.
 */
export const kHINT_HALF_DENSITY = 8;

/**
 * Documents shorter than this are scored as if they had this many words.
 */
export const kMIN_HINT_WORDS = 200;

/**
 * Turn term counts into per-discipline hints.
 *
 * density  = weightedHits × 1000 / max(wordCount, 200)
 * strength = density / (density + 8), rounded to 4 decimals
 *
 * @returns Hints for every discipline with at least one hit, strongest first
 */
export function scoreHints(counts: TermCounts, wordCount: number): DisciplineHint[] {
    const perDiscipline = new Map<number, { weight: number; terms: Set<string> }>();

    for (const [term, count] of counts) {
        const entry = perDiscipline.get(term.disciplineId) ?? { weight: 0, terms: new Set<string>() };
        entry.weight += count * term.weight;
        entry.terms.add(term.term);
        perDiscipline.set(term.disciplineId, entry);
    }

    const words = Math.max(wordCount, kMIN_HINT_WORDS);
    const hints: DisciplineHint[] = [];

    for (const [disciplineId, entry] of perDiscipline) {
        const density = (entry.weight * 1000) / words;
        const strength = Math.round((density / (density + kHINT_HALF_DENSITY)) * 10_000) / 10_000;
        hints.push({
            disciplineId,
            matchedTerms: new Set([...entry.terms].sort()),
            strength,
        });
    }

    return hints.sort(compareHints);
}
