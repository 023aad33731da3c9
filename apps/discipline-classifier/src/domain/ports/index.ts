/**
 * @fileoverview Collaborator ports
 *
 * Interfaces for everything the pipeline reaches outside itself: file and
 * content retrieval, PDF text extraction, semantic scoring and the
 * per-run artifact workspace. Adapters in
 * `src/adapters` and `src/scorers` implement them; tests use fakes.
 *
 * @module domain/ports
 */

import type { DisciplineDefinition } from "../entities/Discipline.js";

/**
 * Read-only access to uploaded files.
 */
export interface FileRetrieval {
    /**
     * @returns The file's bytes, or null when no file has that id
     */
    getFileBytes(fileId: string): Promise<Uint8Array | null>;
}

/**
 * Read-only access to structured-content records.
 */
export interface StructuredContentRetrieval {
    /**
     * @returns The decoded record, or null when no record has that id
     */
    getStructuredContent(contentId: string): Promise<Record<string, unknown> | null>;
}

/**
 * Text of a single PDF page, or the reason it could not be read.
 */
export type PageText =
    | { readonly pageNumber: number; readonly ok: true; readonly text: string }
    | { readonly pageNumber: number; readonly ok: false; readonly error: string };

/**
 * Extracts per-page text from PDF bytes. Throws only when the document as
 * a whole cannot be opened; a bad page is reported in its PageText.
 */
export interface PdfTextExtractor {
    extractPages(bytes: Uint8Array): Promise<readonly PageText[]>;
}

export interface DisciplineScore {
    /** Relevance in [0, 1] */
    readonly score: number;

    /** Excerpt copied from the paper that supports the score */
    readonly evidence: string;
}

export interface ScoreOptions {
    /** Aborted when the request deadline passes */
    readonly signal?: AbortSignal;
}

/**
 * Semantic-inference capability: how relevant is this excerpt to one
 * discipline? Throws on any failure; the classifier retries.
 */
export interface DisciplineScorer {
    readonly id: string;

    scoreDiscipline(
        excerpt: string,
        discipline: DisciplineDefinition,
        options?: ScoreOptions
    ): Promise<DisciplineScore>;
}

/**
 * Per-run JSON artifacts, keyed by trace id and file name. Written after a
 * successful run; read back when a phase is replayed.
 */
export interface ArtifactStore {
    write(traceId: string, name: string, data: unknown): Promise<void>;

    /**
     * @returns The decoded artifact, or null when the run never wrote it
     */
    read(traceId: string, name: string): Promise<unknown>;
}
