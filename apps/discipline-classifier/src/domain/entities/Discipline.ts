/**
 * @fileoverview Discipline entities
 *
 * @module domain/entities/Discipline
 */

/**
 * One of the fixed academic disciplines. Owned by the TaxonomyRegistry.
 */
export interface Discipline {
    /** Stable identifier, 1-based and contiguous */
    readonly id: number;

    /** Canonical name, e.g. "Computer Science" */
    readonly name: string;

    /** One-line definition used in prompts */
    readonly description: string;
}

/**
 * A discipline together with its indicative keywords. This is what the
 * semantic scorer receives for each candidate.
 */
export interface DisciplineDefinition extends Discipline {
    readonly keywords: readonly string[];
}

/**
 * Cheap, term-matching prior produced by the parser for one discipline.
 */
export interface DisciplineHint {
    readonly disciplineId: number;

    /** Canonical lexicon terms found in the paper */
    readonly matchedTerms: ReadonlySet<string>;

    /** Normalized signal in [0, 1] */
    readonly strength: number;
}

/**
 * Sort hints by strength descending, then discipline id ascending.
 */
export function compareHints(a: DisciplineHint, b: DisciplineHint): number {
    return b.strength - a.strength || a.disciplineId - b.disciplineId;
}
