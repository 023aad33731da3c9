/**
 * @fileoverview Classification result entities and response rendering
 *
 * @module domain/entities/ClassificationResult
 */

import { UnsupportedFormatError } from "@papertriage/engine";
import { isRecord } from "./ClassificationRequest.js";
import type { Discipline } from "./Discipline.js";

/**
 * Evidence marker used when no discipline reached the relevance threshold.
 */
export const kUNCLASSIFIED_EVIDENCE = "unclassified";

export interface DisciplineAssignment {
    readonly disciplineId: number;
    readonly relevanceScore: number;
    readonly evidence: string;
}

/**
 * Phase 2 output, before assembly.
 */
export interface ClassifierOutcome {
    /** Ordered by score descending, then id ascending */
    readonly assignments: readonly DisciplineAssignment[];
    readonly confidenceScore: number;
    readonly reasoning: string;
    readonly unclassified: boolean;
}

export interface ClassificationResult {
    readonly classificationId: string;
    readonly disciplines: readonly DisciplineAssignment[];
    readonly confidenceScore: number;
    readonly classificationReasoning: string;
    readonly paperTitle: string | null;
    readonly paperSections: number;
}

/**
 * Wire format returned to callers.
 */
export interface ClassificationResponse {
    readonly discipline_classification_id: string;
    readonly disciplines: ReadonlyArray<{
        readonly discipline_id: number;
        readonly name: string;
        readonly relevance_score: number;
        readonly evidence: string;
    }>;
    readonly confidence_score: number;
    readonly classification_reasoning: string;
    readonly paper_title: string | null;
    readonly paper_sections: number;
}

/**
 * Render a result in the wire format.
 *
 * @param result - Assembled result
 * @param resolve - Discipline lookup, usually `registry.resolve`
 */
export function toResponse(
    result: ClassificationResult,
    resolve: (id: number) => Discipline
): ClassificationResponse {
    return {
        discipline_classification_id: result.classificationId,
        disciplines                 : result.disciplines.map((assignment) => ({
            discipline_id  : assignment.disciplineId,
            name           : resolve(assignment.disciplineId).name,
            relevance_score: assignment.relevanceScore,
            evidence       : assignment.evidence,
        })),
        confidence_score            : result.confidenceScore,
        classification_reasoning    : result.classificationReasoning,
        paper_title                 : result.paperTitle,
        paper_sections              : result.paperSections,
    };
}

/**
 * Rebuild the classifier outcome behind a saved response. Ids are checked
 * against the taxonomy later, by the assembler.
 *
 * @throws UnsupportedFormatError when the data is not a response
 */
export function outcomeFromResponse(data: unknown): ClassifierOutcome {
    if (
        !isRecord(data)
        || !Array.isArray(data.disciplines)
        || typeof data.confidence_score !== "number"
        || typeof data.classification_reasoning !== "string"
    ) {
        throw new UnsupportedFormatError("Saved classification is malformed: expected a classification response");
    }

    const rows: unknown[] = data.disciplines;
    const assignments = rows.map((row, index): DisciplineAssignment => {
        if (
            !isRecord(row)
            || typeof row.discipline_id !== "number"
            || typeof row.relevance_score !== "number"
            || typeof row.evidence !== "string"
        ) {
            throw new UnsupportedFormatError(`Saved classification is malformed: discipline ${index} is incomplete`);
        }
        return { disciplineId: row.discipline_id, relevanceScore: row.relevance_score, evidence: row.evidence };
    });

    return {
        assignments,
        confidenceScore: data.confidence_score,
        reasoning      : data.classification_reasoning,
        unclassified   : assignments.length === 1 && assignments[0].evidence === kUNCLASSIFIED_EVIDENCE,
    };
}

/**
 * Order assignments by relevance descending, ties by ascending id.
 */
export function compareAssignments(a: DisciplineAssignment, b: DisciplineAssignment): number {
    return b.relevanceScore - a.relevanceScore || a.disciplineId - b.disciplineId;
}
