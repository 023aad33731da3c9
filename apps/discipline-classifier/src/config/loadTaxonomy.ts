/**
 * @fileoverview Taxonomy and keyword lexicon loaders
 *
 * Loads the discipline table and the keyword lexicon from YAML files.
 *
 * @module config/loadTaxonomy
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { InvariantViolation } from "@papertriage/engine";
import type { Discipline } from "../domain/entities/Discipline.js";
import { isRecord } from "../domain/entities/ClassificationRequest.js";
import { KeywordLexicon, type LexiconEntryInput } from "../domain/taxonomy/KeywordLexicon.js";
import { TaxonomyRegistry } from "../domain/taxonomy/TaxonomyRegistry.js";

/**
 * Read a YAML file and return the array stored under `key`.
 */
function readYamlList(filePath: string, key: string): unknown[] {
    if (!existsSync(filePath)) {
        throw new InvariantViolation(`Configuration file not found: ${filePath}`);
    }

    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));
    if (!isRecord(parsed) || !Array.isArray(parsed[key])) {
        throw new InvariantViolation(`Invalid file format in ${filePath}: expected { ${key}: [...] }`);
    }
    return parsed[key];
}

/**
 * Load discipline definitions from a YAML file.
 *
 * @param filePath - Path to disciplines.yml
 * @throws InvariantViolation if the file doesn't exist or an entry is invalid
 *
 * @example
 * ```typescript
 * const disciplines = loadDisciplines("./config/disciplines.yml");
 * // [{ id: 1, name: "Computer Science", description: "..." }, ...]
 * ```
 */
export function loadDisciplines(filePath: string): Discipline[] {
    return readYamlList(filePath, "disciplines").map((raw, index) => {
        if (!isRecord(raw)) {
            throw new InvariantViolation(`Invalid discipline at index ${index}: expected a mapping`);
        }
        if (typeof raw.id !== "number" || !Number.isInteger(raw.id)) {
            throw new InvariantViolation(`Invalid discipline at index ${index}: missing or invalid 'id'`);
        }
        if (typeof raw.name !== "string" || raw.name.trim().length === 0) {
            throw new InvariantViolation(`Invalid discipline at index ${index}: missing or invalid 'name'`);
        }
        if (typeof raw.description !== "string" || raw.description.trim().length === 0) {
            throw new InvariantViolation(
                `Invalid discipline ${raw.id} (${raw.name}): missing or invalid 'description'`,
                { details: { index, id: raw.id, name: raw.name } }
            );
        }

        return {
            id         : raw.id,
            name       : raw.name,
            description: raw.description,
        };
    });
}

/**
 * Load keyword lexicon entries. Each term is either a string or a
 * `{ term, weight }` mapping.
 *
 * @throws InvariantViolation if the file doesn't exist or an entry is invalid
 */
export function loadLexiconEntries(filePath: string): LexiconEntryInput[] {
    const entries: LexiconEntryInput[] = [];

    readYamlList(filePath, "lexicon").forEach((raw, index) => {
        if (!isRecord(raw) || typeof raw.discipline_id !== "number" || !Array.isArray(raw.terms)) {
            throw new InvariantViolation(
                `Invalid lexicon entry at index ${index}: expected { discipline_id, terms: [...] }`
            );
        }
        const disciplineId = raw.discipline_id;

        for (const term of raw.terms) {
            if (typeof term === "string") {
                entries.push({ disciplineId, term });
            }
            else if (isRecord(term) && typeof term.term === "string") {
                entries.push({
                    disciplineId,
                    term  : term.term,
                    weight: typeof term.weight === "number" ? term.weight : undefined,
                });
            }
            else {
                throw new InvariantViolation(
                    `Invalid term for discipline ${disciplineId}: ${JSON.stringify(term)}`
                );
            }
        }
    });

    return entries;
}

export interface Taxonomy {
    readonly registry: TaxonomyRegistry;
    readonly lexicon: KeywordLexicon;
}

/**
 * Load and validate the registry and lexicon together.
 */
export function loadTaxonomy(disciplinesPath: string, keywordsPath: string): Taxonomy {
    const registry = new TaxonomyRegistry(loadDisciplines(disciplinesPath));
    const lexicon = new KeywordLexicon(loadLexiconEntries(keywordsPath), registry);
    return { registry, lexicon };
}
