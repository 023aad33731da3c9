/**
 * @fileoverview Discipline Classifier stage (Phase 2)
 *
 * Maps a parsed paper to a scored, evidenced list of disciplines.
 *
 * Pipeline:
 * 1. Seed candidates from the parser's hints
 * 2. Score every candidate with the semantic scorer (bounded fan-out,
 *    one retry per candidate, failures dropped)
 * 3. Check each evidence excerpt against the paper text
 * 4. Filter, sort and cap the assignments
 * 5. Aggregate a confidence and write the reasoning
 *
 * @module domain/stages/DisciplineClassifier
 */

import {
    ClassificationError,
    DiagnosticCollector,
    errorMessage,
    runBounded,
    stageResult,
    withRetry,
    type PipelineStage,
    type StageContext,
    type StageResult,
} from "@papertriage/engine";
import type { DisciplineHint } from "../entities/Discipline.js";
import { compareHints } from "../entities/Discipline.js";
import type { ClassifierOutcome, DisciplineAssignment } from "../entities/ClassificationResult.js";
import { compareAssignments, kUNCLASSIFIED_EVIDENCE } from "../entities/ClassificationResult.js";
import type { PaperDocument, ParsedPaper } from "../entities/PaperDocument.js";
import { documentText } from "../entities/PaperDocument.js";
import type { DisciplineScore, DisciplineScorer } from "../ports/index.js";
import type { KeywordLexicon } from "../taxonomy/KeywordLexicon.js";
import type { TaxonomyRegistry } from "../taxonomy/TaxonomyRegistry.js";
import { isGrounded, normalizeForGrounding } from "../text/grounding.js";
import { aggregateConfidence, round4 } from "./confidence.js";

export interface DisciplineClassifierConfig {
    /** Hints at or below this strength are not candidates by default (default: 0.05) */
    readonly hintFloor?: number;

    /** Best hints below the floor still scored (default: 2) */
    readonly belowFloorCandidates?: number;

    /** Below-floor hints are added only while fewer candidates than this are selected (default: 8) */
    readonly maxCandidates?: number;

    /** Sections included in the excerpt besides the title (default: 3) */
    readonly salientSections?: number;

    /** Excerpt length limit in characters (default: 12000) */
    readonly maxExcerptChars?: number;

    /** Scoring calls in flight at once (default: 5) */
    readonly maxConcurrency?: number;

    /** Retries per candidate after a failed call (default: 1) */
    readonly retries?: number;

    /** Delay before a retry (default: 250) */
    readonly retryBackoffMs?: number;

    /** Assignments below this score are dropped (default: 0.1) */
    readonly minRelevance?: number;

    /** Maximum number of assignments (default: 5) */
    readonly maxDisciplines?: number;

    /** Confidence ceiling of an unclassified result (default: 0.3) */
    readonly unclassifiedConfidenceCap?: number;

    /** Scores this far outside [0, 1] are still accepted from the scorer (default: 0.05) */
    readonly scoreTolerance?: number;
}

/**
 * Discipline reported when nothing at all points elsewhere.
 */
export const kFALLBACK_DISCIPLINE_ID = 1;

interface ScoredCandidate {
    readonly disciplineId: number;
    readonly score: number;
    readonly evidence: string;
    readonly grounded: boolean;
}

/**
 * Candidates in scoring order: every hint above the floor, then the best
 * few positive hints at or below it. `max` limits only those extras; hints
 * above the floor are never dropped.
 */
export function selectCandidates(
    hints: readonly DisciplineHint[],
    floor: number,
    belowFloor: number,
    max: number
): DisciplineHint[] {
    const ranked = [...hints].sort(compareHints);
    const above = ranked.filter((hint) => hint.strength > floor);
    const room = Math.max(0, Math.min(belowFloor, max - above.length));
    const below = ranked
        .filter((hint) => hint.strength > 0 && hint.strength <= floor)
        .slice(0, room);
    return [...above, ...below];
}

/**
 * Salient excerpt: the title plus the sections with the highest term
 * density, rendered in document order. Reference sections are skipped
 * unless nothing else exists.
 */
export function buildExcerpt(document: PaperDocument, sectionCount: number, maxChars: number): string {
    const eligible = document.sections.filter((section) => section.sectionType !== "references");
    const pool = eligible.length > 0 ? eligible : document.sections;
    const density = (section: PaperDocument["sections"][number]): number =>
        section.termWeight / Math.max(section.wordCount, 1);

    const chosen = [...pool]
        .sort((a, b) => density(b) - density(a) || a.order - b.order)
        .slice(0, sectionCount)
        .sort((a, b) => a.order - b.order);

    const parts: string[] = [];
    if (document.title) {
        parts.push(`Title: ${document.title}`);
    }
    for (const section of chosen) {
        parts.push(section.heading ? `## ${section.heading}\n${section.text}` : section.text);
    }

    const excerpt = parts.join("\n\n");
    return excerpt.length > maxChars ? excerpt.slice(0, maxChars) : excerpt;
}

/**
 * DisciplineClassifier
 *
 * @example
 * ```typescript
 * const classifier = new DisciplineClassifier(scorer, registry, lexicon, { maxDisciplines: 3 });
 * const { value } = await classifier.run(parsed, context);
 * value.assignments[0]; // { disciplineId: 1, relevanceScore: 0.92, evidence: "..." }
 * ```
 */
export class DisciplineClassifier implements PipelineStage<ParsedPaper, ClassifierOutcome> {
    readonly id = "classifier";

    private readonly config: Required<DisciplineClassifierConfig>;

    constructor(
        private readonly scorer: DisciplineScorer,
        private readonly registry: TaxonomyRegistry,
        private readonly lexicon: KeywordLexicon,
        config: DisciplineClassifierConfig = {}
    ) {
        this.config = {
            hintFloor                : config.hintFloor ?? 0.05,
            belowFloorCandidates     : config.belowFloorCandidates ?? 2,
            maxCandidates            : config.maxCandidates ?? 8,
            salientSections          : config.salientSections ?? 3,
            maxExcerptChars          : config.maxExcerptChars ?? 12_000,
            maxConcurrency           : config.maxConcurrency ?? 5,
            retries                  : config.retries ?? 1,
            retryBackoffMs           : config.retryBackoffMs ?? 250,
            minRelevance             : config.minRelevance ?? 0.1,
            maxDisciplines           : config.maxDisciplines ?? 5,
            unclassifiedConfidenceCap: config.unclassifiedConfidenceCap ?? 0.3,
            scoreTolerance           : config.scoreTolerance ?? 0.05,
        };
    }

    /**
     * @throws ClassificationError when every candidate's scoring failed
     */
    async run(parsed: ParsedPaper, context: StageContext): Promise<StageResult<ClassifierOutcome>> {
        const issues = new DiagnosticCollector(this.id);
        const candidates = selectCandidates(
            parsed.hints,
            this.config.hintFloor,
            this.config.belowFloorCandidates,
            this.config.maxCandidates
        );

        if (candidates.length === 0) {
            issues.add("no-candidates", "No discipline keyword matched the paper");
            context.logger.info("No candidate disciplines; result is unclassified");
            return stageResult(this.unclassified(parsed, [], candidates.length), issues.list());
        }

        const excerpt = buildExcerpt(parsed.document, this.config.salientSections, this.config.maxExcerptChars);
        const corpus = normalizeForGrounding(documentText(parsed.document));

        context.logger.debug("Scoring candidates", {
            candidates   : candidates.map((hint) => hint.disciplineId),
            excerptLength: excerpt.length,
        });

        const settled = await runBounded(candidates, this.config.maxConcurrency, (hint) =>
            this.scoreCandidate(hint.disciplineId, excerpt, context));

        const scored: ScoredCandidate[] = [];
        let lastError: unknown = null;

        settled.forEach((outcome, index) => {
            const disciplineId = candidates[index].disciplineId;
            const name = this.registry.resolve(disciplineId).name;

            if (outcome.status === "rejected") {
                lastError = outcome.reason;
                issues.add("candidate-dropped", `Scoring ${name} failed after retries`, {
                    disciplineId,
                    error: errorMessage(outcome.reason),
                });
                context.logger.warn("Candidate dropped", { disciplineId, error: errorMessage(outcome.reason) });
                context.emit("candidate:dropped", { disciplineId, error: errorMessage(outcome.reason) });
                return;
            }

            const evidence = outcome.value.evidence.trim();
            const grounded = isGrounded(evidence, corpus);
            if (!grounded) {
                issues.add("evidence-ungrounded", `Evidence for ${name} was not found in the paper text`, {
                    disciplineId,
                    evidence: evidence.slice(0, 200),
                });
                context.logger.warn("Ungrounded evidence", { disciplineId, evidence: evidence.slice(0, 200) });
            }

            scored.push({ disciplineId, score: outcome.value.score, evidence, grounded });
            context.emit("candidate:scored", { disciplineId, score: outcome.value.score, grounded });
        });

        if (scored.length === 0) {
            // A deadline abort surfaces as the timeout, not as a scoring failure
            context.signal.throwIfAborted();
            throw new ClassificationError(`All ${candidates.length} candidate scoring calls failed`, {
                cause  : lastError,
                details: {
                    candidates: candidates.map((hint) => hint.disciplineId),
                    lastError : errorMessage(lastError),
                },
            });
        }

        const surviving = scored
            .filter((candidate) => candidate.score >= this.config.minRelevance)
            .map((candidate): DisciplineAssignment => ({
                disciplineId  : candidate.disciplineId,
                relevanceScore: candidate.score,
                evidence      : candidate.evidence,
            }))
            .sort(compareAssignments)
            .slice(0, this.config.maxDisciplines);

        if (surviving.length === 0) {
            issues.add("below-threshold", `No discipline reached relevance ${this.config.minRelevance}`, {
                best: Math.max(...scored.map((candidate) => candidate.score)),
            });
            return stageResult(this.unclassified(parsed, scored, candidates.length), issues.list());
        }

        const confidenceScore = aggregateConfidence(scored.map((candidate) => candidate.score));
        const reasoning = this.describe(parsed, surviving, scored, candidates.length, confidenceScore);

        context.logger.info("Disciplines classified", {
            primary    : surviving[0].disciplineId,
            assignments: surviving.length,
            scored     : scored.length,
            dropped    : candidates.length - scored.length,
            confidenceScore,
        });

        return stageResult(Object.freeze({
            assignments : Object.freeze(surviving),
            confidenceScore,
            reasoning,
            unclassified: false,
        }), issues.list());
    }

    /**
     * One candidate, with retry. A non-finite score or one outside the
     * tolerated range counts as a failed call.
     */
    private scoreCandidate(disciplineId: number, excerpt: string, context: StageContext): Promise<DisciplineScore> {
        const definition = this.lexicon.definitionFor(disciplineId);
        const { scoreTolerance } = this.config;

        return withRetry(async () => {
            const result = await this.scorer.scoreDiscipline(excerpt, definition, { signal: context.signal });

            if (!Number.isFinite(result.score) || result.score < -scoreTolerance || result.score > 1 + scoreTolerance) {
                throw new ClassificationError(`Scorer returned an invalid score for ${definition.name}: ${result.score}`, {
                    details: { disciplineId, score: result.score },
                });
            }
            return result;
        }, {
            retries  : this.config.retries,
            backoffMs: this.config.retryBackoffMs,
            signal   : context.signal,
            onRetry  : (attempt, error) => {
                context.logger.warn("Retrying discipline scoring", {
                    disciplineId,
                    attempt,
                    error: errorMessage(error),
                });
            },
        });
    }

    /**
     * Single "unclassified" assignment for the best scored candidate, else
     * the strongest hint, else the fallback discipline.
     */
    private unclassified(
        parsed: ParsedPaper,
        scored: readonly ScoredCandidate[],
        candidateCount: number
    ): ClassifierOutcome {
        const best = [...scored].sort((a, b) => b.score - a.score || a.disciplineId - b.disciplineId)[0];
        const disciplineId = best?.disciplineId ?? parsed.hints[0]?.disciplineId ?? kFALLBACK_DISCIPLINE_ID;
        const confidenceScore = Math.min(
            this.config.unclassifiedConfidenceCap,
            aggregateConfidence(scored.map((candidate) => candidate.score))
        );

        const assignment: DisciplineAssignment = {
            disciplineId,
            relevanceScore: best?.score ?? 0,
            evidence      : kUNCLASSIFIED_EVIDENCE,
        };

        const parts: string[] = [];
        if (best) {
            parts.push(
                `No discipline reached the relevance threshold of ${this.config.minRelevance};`
                + ` the closest was ${this.registry.resolve(best.disciplineId).name} (${best.score.toFixed(2)}).`
            );
        }
        else {
            parts.push("No discipline keywords were found in the paper, so no candidate was scored.");
        }
        parts.push(...this.tallies(scored.length, candidateCount, scored.length));
        parts.push(`Confidence ${confidenceScore.toFixed(2)}.`);

        return Object.freeze({
            assignments : Object.freeze([assignment]),
            confidenceScore,
            reasoning   : parts.join(" "),
            unclassified: true,
        });
    }

    /**
     * Deterministic human-readable account of the decision.
     */
    private describe(
        parsed: ParsedPaper,
        surviving: readonly DisciplineAssignment[],
        scored: readonly ScoredCandidate[],
        candidateCount: number,
        confidenceScore: number
    ): string {
        const label = (assignment: DisciplineAssignment): string =>
            `${this.registry.resolve(assignment.disciplineId).name} (${round4(assignment.relevanceScore).toFixed(2)})`;

        const [primary, ...others] = surviving;
        const parts = [`Primary discipline: ${label(primary)}.`];
        if (others.length > 0) {
            parts.push(`Also relevant: ${others.map(label).join(", ")}.`);
        }

        const belowThreshold = scored.filter((candidate) => candidate.score < this.config.minRelevance).length;
        parts.push(...this.tallies(scored.length, candidateCount, belowThreshold));

        const signals = parsed.hints.slice(0, 3).map((hint) =>
            `${this.registry.resolve(hint.disciplineId).name} [${[...hint.matchedTerms].slice(0, 5).join(", ")}]`);
        if (signals.length > 0) {
            parts.push(`Keyword signals: ${signals.join("; ")}.`);
        }

        const ungrounded = scored.filter((candidate) => !candidate.grounded).length;
        if (ungrounded > 0) {
            parts.push(`${ungrounded} evidence excerpt(s) could not be matched to the paper text.`);
        }

        parts.push(`Confidence ${confidenceScore.toFixed(2)}.`);
        return parts.join(" ");
    }

    private tallies(scoredCount: number, candidateCount: number, belowThreshold: number): string[] {
        if (candidateCount === 0) {
            return [];
        }

        let sentence = `Scored ${scoredCount} of ${candidateCount} candidate disciplines`;
        const dropped = candidateCount - scoredCount;
        if (dropped > 0) {
            sentence += `, ${dropped} dropped after retries`;
        }
        if (belowThreshold > 0) {
            sentence += `, ${belowThreshold} below the relevance threshold`;
        }
        return [`${sentence}.`];
    }
}
