/**
 * @fileoverview Keyword Lexicon
 *
 * Per-discipline keyword sets used to derive hints. Terms are indexed by
 * their normalized phrase key so that a single lookup finds every
 * discipline a phrase belongs to ("polymer" counts for Chemistry and
 * Materials Science alike).
 *
 * @module domain/taxonomy/KeywordLexicon
 */

import { InvariantViolation } from "@papertriage/engine";
import type { DisciplineDefinition } from "../entities/Discipline.js";
import { phraseKey } from "../text/tokens.js";
import type { TaxonomyRegistry } from "./TaxonomyRegistry.js";

/**
 * Lexicon row as configured.
 */
export interface LexiconEntryInput {
    readonly disciplineId: number;
    readonly term: string;
    readonly weight?: number;
}

/**
 * Indexed lexicon term.
 */
export interface LexiconTerm {
    readonly disciplineId: number;

    /** Canonical spelling as configured */
    readonly term: string;

    readonly weight: number;

    /** Acronyms (all capitals) only match the same capitals */
    readonly caseSensitive: boolean;

    /** Normalized phrase key */
    readonly key: string;

    readonly tokenCount: number;
}

const kSINGLE_WORD_WEIGHT = 1;
const kMULTI_WORD_WEIGHT = 1.5;

function isAcronym(term: string): boolean {
    return /^[A-Z][A-Z0-9]+$/.test(term);
}

export class KeywordLexicon {
    private readonly index: ReadonlyMap<string, readonly LexiconTerm[]>;
    private readonly byDiscipline: ReadonlyMap<number, readonly string[]>;

    /** Longest phrase, in tokens */
    readonly maxTokens: number;

    /**
     * @throws InvariantViolation for unknown discipline ids, empty terms or non-positive weights
     */
    constructor(entries: readonly LexiconEntryInput[], private readonly registry: TaxonomyRegistry) {
        const index = new Map<string, LexiconTerm[]>();
        const byDiscipline = new Map<number, string[]>();
        let maxTokens = 0;

        for (const entry of entries) {
            if (!registry.has(entry.disciplineId)) {
                throw new InvariantViolation(`Lexicon term "${entry.term}" references unknown discipline ${entry.disciplineId}`);
            }

            const term = entry.term.trim();
            const key = phraseKey(term);
            if (key.length === 0) {
                throw new InvariantViolation(`Empty lexicon term for discipline ${entry.disciplineId}`);
            }

            const tokenCount = key.split(" ").length;
            const weight = entry.weight ?? (tokenCount > 1 ? kMULTI_WORD_WEIGHT : kSINGLE_WORD_WEIGHT);
            if (!Number.isFinite(weight) || weight <= 0) {
                throw new InvariantViolation(`Lexicon term "${term}" has invalid weight ${weight}`);
            }

            const bucket = index.get(key) ?? [];
            // Same term listed twice for one discipline: keep the first
            if (bucket.some((existing) => existing.disciplineId === entry.disciplineId)) {
                continue;
            }
            bucket.push(Object.freeze({
                disciplineId : entry.disciplineId,
                term,
                weight,
                caseSensitive: isAcronym(term),
                key,
                tokenCount,
            }));
            index.set(key, bucket);

            const keywords = byDiscipline.get(entry.disciplineId) ?? [];
            keywords.push(term);
            byDiscipline.set(entry.disciplineId, keywords);

            maxTokens = Math.max(maxTokens, tokenCount);
        }

        this.index = index;
        this.byDiscipline = byDiscipline;
        this.maxTokens = maxTokens;
    }

    /**
     * Terms whose normalized key equals `key`, one per discipline.
     */
    lookup(key: string): readonly LexiconTerm[] {
        return this.index.get(key) ?? [];
    }

    /**
     * Configured keywords of a discipline, in configuration order.
     */
    keywordsFor(disciplineId: number): readonly string[] {
        return this.byDiscipline.get(disciplineId) ?? [];
    }

    /**
     * Discipline plus keywords, as handed to the semantic scorer.
     */
    definitionFor(disciplineId: number): DisciplineDefinition {
        return {
            ...this.registry.resolve(disciplineId),
            keywords: this.keywordsFor(disciplineId),
        };
    }

    /** Number of distinct (term, discipline) pairs */
    get size(): number {
        let size = 0;
        for (const bucket of this.index.values()) {
            size += bucket.length;
        }
        return size;
    }
}
