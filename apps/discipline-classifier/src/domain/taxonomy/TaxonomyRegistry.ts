/**
 * @fileoverview Taxonomy Registry
 *
 * Immutable table of the academic disciplines. Built once at start-up and
 * shared read-only by every request; the single source of truth for valid
 * discipline ids.
 *
 * @module domain/taxonomy/TaxonomyRegistry
 */

import { InvariantViolation } from "@papertriage/engine";
import type { Discipline } from "../entities/Discipline.js";
import { UnknownDisciplineError } from "./UnknownDisciplineError.js";

/**
 * Number of disciplines in the taxonomy.
 */
export const kDISCIPLINE_COUNT = 23;

/**
 * TaxonomyRegistry
 *
 * @example
 * ```typescript
 * const registry = new TaxonomyRegistry(loadDisciplines("./config/disciplines.yml"));
 * registry.resolve(1).name;        // "Computer Science"
 * registry.findByName("physics");  // { id: 6, name: "Physics", ... }
 * registry.resolve(99);            // throws UnknownDisciplineError
 * ```
 */
export class TaxonomyRegistry {
    private readonly ordered: readonly Discipline[];
    private readonly byId: ReadonlyMap<number, Discipline>;

    /**
     * @param disciplines - Rows of the table, any order
     * @param expectedCount - Size the table must have
     * @throws InvariantViolation if ids are not unique and contiguous from 1
     */
    constructor(disciplines: readonly Discipline[], expectedCount: number = kDISCIPLINE_COUNT) {
        const sorted = [...disciplines].sort((a, b) => a.id - b.id);

        if (sorted.length !== expectedCount) {
            throw new InvariantViolation(
                `Taxonomy must contain ${expectedCount} disciplines, found ${sorted.length}`
            );
        }

        const names = new Set<string>();
        sorted.forEach((discipline, index) => {
            if (discipline.id !== index + 1) {
                throw new InvariantViolation(
                    `Taxonomy ids must be unique and contiguous from 1; expected ${index + 1}, found ${discipline.id}`
                );
            }
            const name = discipline.name.trim();
            if (name.length === 0) {
                throw new InvariantViolation(`Discipline ${discipline.id} has an empty name`);
            }
            if (names.has(name.toLowerCase())) {
                throw new InvariantViolation(`Duplicate discipline name: ${name}`);
            }
            names.add(name.toLowerCase());
        });

        this.ordered = Object.freeze(sorted.map((discipline) => Object.freeze({
            id         : discipline.id,
            name       : discipline.name.trim(),
            description: discipline.description.trim(),
        })));
        this.byId = new Map(this.ordered.map((discipline) => [discipline.id, discipline]));
        Object.freeze(this);
    }

    /**
     * Look up a discipline by id.
     *
     * @throws UnknownDisciplineError for ids outside the table
     */
    resolve(id: number): Discipline {
        const discipline = this.byId.get(id);
        if (!discipline) {
            throw new UnknownDisciplineError(id);
        }
        return discipline;
    }

    has(id: number): boolean {
        return this.byId.has(id);
    }

    /**
     * Every discipline, ordered by id.
     */
    all(): readonly Discipline[] {
        return this.ordered;
    }

    get size(): number {
        return this.ordered.length;
    }

    /**
     * Case-insensitive lookup by canonical name.
     */
    findByName(name: string): Discipline | undefined {
        const wanted = name.trim().toLowerCase();
        return this.ordered.find((discipline) => discipline.name.toLowerCase() === wanted);
    }

    /**
     * Markdown table of the taxonomy for prompts and reports.
     */
    describeForPrompt(): string {
        const rows = this.ordered.map((d) => `| ${d.id} | ${d.name} | ${d.description} |`);
        return ["| ID | Discipline | Description |", "|----|------------|-------------|", ...rows].join("\n");
    }
}
