/**
 * @fileoverview Shared test fixtures
 *
 * A four-discipline taxonomy with a small lexicon, a mock logger and a
 * stage context whose signal the test controls.
 */

import { vi } from "vitest";
import type { PipelineLogger, StageContext } from "@papertriage/engine";
import type { Discipline } from "../domain/entities/Discipline.js";
import { KeywordLexicon, type LexiconEntryInput } from "../domain/taxonomy/KeywordLexicon.js";
import { TaxonomyRegistry } from "../domain/taxonomy/TaxonomyRegistry.js";

export const TEST_DISCIPLINES: Discipline[] = [
    { id: 1, name: "Computer Science", description: "Algorithms, machine learning, software" },
    { id: 2, name: "Medicine", description: "Clinical research and patient care" },
    { id: 3, name: "Chemistry", description: "Compounds, reactions and synthesis" },
    { id: 4, name: "Biology", description: "Genes, cells and organisms" },
];

export const TEST_LEXICON: LexiconEntryInput[] = [
    { disciplineId: 1, term: "machine learning" },
    { disciplineId: 1, term: "neural network" },
    { disciplineId: 1, term: "algorithm" },
    { disciplineId: 1, term: "AI" },
    { disciplineId: 2, term: "clinical" },
    { disciplineId: 2, term: "patient" },
    { disciplineId: 2, term: "treatment", weight: 0.5 },
    { disciplineId: 3, term: "polymer" },
    { disciplineId: 3, term: "synthesis" },
    { disciplineId: 3, term: "protein" },
    { disciplineId: 4, term: "gene" },
    { disciplineId: 4, term: "protein" },
    { disciplineId: 4, term: "cell" },
];

export function createTestRegistry(): TaxonomyRegistry {
    return new TaxonomyRegistry(TEST_DISCIPLINES, TEST_DISCIPLINES.length);
}

export function createTestLexicon(registry: TaxonomyRegistry = createTestRegistry()): KeywordLexicon {
    return new KeywordLexicon(TEST_LEXICON, registry);
}

/**
 * Create a mock logger for testing.
 */
export function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    } satisfies PipelineLogger;
}

/**
 * Create a stage context for testing. Abort `controller` to simulate an
 * expired deadline.
 */
export function createTestContext(controller: AbortController = new AbortController()) {
    return {
        traceId: "test-trace-001",
        signal : controller.signal,
        logger : createMockLogger(),
        emit   : vi.fn(),
    } satisfies StageContext;
}
