/**
 * @fileoverview Classification Assembler stage (Phase 3)
 *
 * Validates the classifier's outcome against the taxonomy and packages it
 * as an immutable ClassificationResult with a fresh id.
 *
 * @module domain/stages/ClassificationAssembler
 */

import { v4 as uuidv4 } from "uuid";
import {
    DiagnosticCollector,
    InvariantViolation,
    stageResult,
    type PipelineStage,
    type StageContext,
    type StageResult,
} from "@papertriage/engine";
import type {
    ClassificationResult,
    ClassifierOutcome,
    DisciplineAssignment,
} from "../entities/ClassificationResult.js";
import { compareAssignments } from "../entities/ClassificationResult.js";
import type { PaperDocument } from "../entities/PaperDocument.js";
import type { TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";
import { clamp01 } from "./confidence.js";

export interface AssemblyInput {
    readonly document: PaperDocument;
    readonly outcome: ClassifierOutcome;
}

export interface ClassificationAssemblerConfig {
    /** Scores and confidences this far outside [0, 1] are clamped instead of rejected (default: 0.05) */
    readonly scoreTolerance?: number;

    /** Result id source (default: uuid v4) */
    readonly idFactory?: () => string;
}

export class ClassificationAssembler implements PipelineStage<AssemblyInput, ClassificationResult> {
    readonly id = "assembler";

    private readonly scoreTolerance: number;
    private readonly idFactory: () => string;

    constructor(
        private readonly registry: TaxonomyRegistry,
        config: ClassificationAssemblerConfig = {}
    ) {
        this.scoreTolerance = config.scoreTolerance ?? 0.05;
        this.idFactory = config.idFactory ?? (() => uuidv4());
    }

    /**
     * @throws InvariantViolation on an unknown discipline id, an empty
     *   outcome, or a score or confidence that cannot be brought into [0, 1]
     */
    async run(input: AssemblyInput, context: StageContext): Promise<StageResult<ClassificationResult>> {
        const { document, outcome } = input;
        const issues = new DiagnosticCollector(this.id);

        if (outcome.assignments.length === 0) {
            throw this.violation(context, "Classifier produced no assignments");
        }

        const byId = new Map<number, DisciplineAssignment>();
        for (const assignment of outcome.assignments) {
            if (!this.registry.has(assignment.disciplineId)) {
                throw this.violation(context, `Assignment references unknown discipline ${assignment.disciplineId}`, {
                    disciplineId: assignment.disciplineId,
                });
            }

            const relevanceScore = this.checkScore(assignment, issues, context);
            const normalized = { ...assignment, relevanceScore };
            const existing = byId.get(assignment.disciplineId);

            if (existing) {
                const message = `Discipline ${assignment.disciplineId} was assigned twice`;
                issues.add("duplicate-assignment", message, { disciplineId: assignment.disciplineId });
                context.logger.warn(message, { disciplineId: assignment.disciplineId });
                if (normalized.relevanceScore <= existing.relevanceScore) {
                    continue;
                }
            }
            byId.set(assignment.disciplineId, normalized);
        }

        const confidenceScore = this.checkConfidence(outcome.confidenceScore, issues, context);

        const disciplines = [...byId.values()]
            .sort(compareAssignments)
            .map((assignment) => Object.freeze(assignment));

        const result: ClassificationResult = Object.freeze({
            classificationId       : this.idFactory(),
            disciplines            : Object.freeze(disciplines),
            confidenceScore,
            classificationReasoning: outcome.reasoning,
            paperTitle             : document.title,
            paperSections          : document.sectionCount,
        });

        context.logger.debug("Result assembled", {
            classificationId: result.classificationId,
            disciplines     : disciplines.length,
        });

        return stageResult(result, issues.list());
    }

    private checkScore(
        assignment: DisciplineAssignment,
        issues: DiagnosticCollector,
        context: StageContext
    ): number {
        const score = assignment.relevanceScore;
        if (!this.withinTolerance(score)) {
            throw this.violation(context, `Relevance score out of range for discipline ${assignment.disciplineId}: ${score}`, {
                disciplineId: assignment.disciplineId,
                score,
            });
        }

        const clamped = clamp01(score);
        if (clamped !== score) {
            const message = `Relevance score ${score} clamped to ${clamped}`;
            issues.add("score-clamped", message, { disciplineId: assignment.disciplineId, score });
            context.logger.warn(message, { disciplineId: assignment.disciplineId, score });
        }
        return clamped;
    }

    private checkConfidence(confidence: number, issues: DiagnosticCollector, context: StageContext): number {
        if (!this.withinTolerance(confidence)) {
            throw this.violation(context, `Confidence out of range: ${confidence}`, { confidence });
        }

        const clamped = clamp01(confidence);
        if (clamped !== confidence) {
            const message = `Confidence ${confidence} clamped to ${clamped}`;
            issues.add("confidence-clamped", message, { confidence });
            context.logger.warn(message, { confidence });
        }
        return clamped;
    }

    private withinTolerance(value: number): boolean {
        return Number.isFinite(value) && value >= -this.scoreTolerance && value <= 1 + this.scoreTolerance;
    }

    private violation(context: StageContext, message: string, details?: Record<string, unknown>): InvariantViolation {
        context.logger.error(message, details);
        return new InvariantViolation(message, { details });
    }
}
