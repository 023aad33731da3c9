/**
 * @fileoverview Unit tests for DisciplinePipeline
 *
 * Tests cover:
 * - End-to-end classification of structured content and PDF files
 * - Stage order and lifecycle events
 * - Missing content and deadline expiry
 * - Artifact writing and artifact failures
 * - Replaying saved parser or classifier output
 *
 * @module __tests__/DisciplinePipeline
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
    InMemoryEventBus,
    InvalidInputError,
    NotFoundError,
    TimeoutError,
    UnsupportedFormatError,
    type EventPayload,
} from "@papertriage/engine";
import {
    DisciplinePipeline,
    kCLASSIFICATION_ARTIFACT,
    kPAPER_CONTENT_ARTIFACT,
    type DebugPhase,
} from "../domain/DisciplinePipeline.js";
import { requestFromJson } from "../domain/entities/ClassificationRequest.js";
import type {
    ArtifactStore,
    DisciplineScore,
    DisciplineScorer,
    FileRetrieval,
    PdfTextExtractor,
    StructuredContentRetrieval,
} from "../domain/ports/index.js";
import { createMockLogger, createTestLexicon, createTestRegistry } from "./fixtures.js";

const PAYLOAD = {
    paper_title: "Neural Networks for Emergency Triage",
    sections   : [
        { name: "Abstract", content: "We train a neural network with a new algorithm." },
        { name: "Methods", content: "Clinical notes from each patient were labelled by nurses." },
    ],
};

const SCORES: Record<number, DisciplineScore> = {
    1: { score: 0.9, evidence: "We train a neural network" },
    2: { score: 0.4, evidence: "Clinical notes from each patient" },
};

const PDF_TEXT = [
    "Neural Ranking for Code Search",
    "Abstract",
    "We train a neural network to rank code snippets.",
    "1 Introduction",
    "Machine learning helps developers find code.",
    "2 Methods",
    "Our algorithm indexes every repository.",
].join("\n");

/**
 * Artifact store kept in memory; values go through JSON like on disk.
 */
function createMemoryArtifacts() {
    const saved = new Map<string, unknown>();
    return {
        saved,
        write: vi.fn<ArtifactStore["write"]>(async (traceId, name, data) => {
            saved.set(`${traceId}/${name}`, JSON.parse(JSON.stringify(data)));
        }),
        read: vi.fn<ArtifactStore["read"]>(async (traceId, name) => saved.get(`${traceId}/${name}`) ?? null),
    };
}

function createDeps() {
    const registry = createTestRegistry();
    const files = { getFileBytes: vi.fn<FileRetrieval["getFileBytes"]>().mockResolvedValue(null) };
    const contents = {
        getStructuredContent: vi.fn<StructuredContentRetrieval["getStructuredContent"]>().mockResolvedValue(PAYLOAD),
    };
    const extractor = { extractPages: vi.fn<PdfTextExtractor["extractPages"]>() };
    const scorer = {
        id             : "fake",
        scoreDiscipline: vi.fn<DisciplineScorer["scoreDiscipline"]>(async (_excerpt, discipline) => {
            return SCORES[discipline.id] ?? { score: 0, evidence: "" };
        }),
    };
    const artifacts = createMemoryArtifacts();
    const logger = createMockLogger();

    return {
        registry,
        lexicon : createTestLexicon(registry),
        files,
        contents,
        extractor,
        scorer,
        artifacts,
        logger,
        eventBus: new InMemoryEventBus(logger),
    };
}

describe("DisciplinePipeline", () => {
    let deps: ReturnType<typeof createDeps>;
    let pipeline: DisciplinePipeline;

    beforeEach(() => {
        deps = createDeps();
        pipeline = new DisciplinePipeline(deps, { assembler: { idFactory: () => "cls-0042" } });
    });

    // Scenario: a structured paper is classified end to end
    it("should classify structured content", async () => {
        const run = await pipeline.classify({ structuredContentOverviewId: "c-1" }, { traceId: "trace-42" });

        expect(deps.contents.getStructuredContent).toHaveBeenCalledWith("c-1");
        expect(deps.extractor.extractPages).not.toHaveBeenCalled();
        expect(run.traceId).toBe("trace-42");
        expect(run.response).toEqual({
            discipline_classification_id: "cls-0042",
            disciplines                 : [
                {
                    discipline_id  : 1,
                    name           : "Computer Science",
                    relevance_score: 0.9,
                    evidence       : "We train a neural network",
                },
                {
                    discipline_id  : 2,
                    name           : "Medicine",
                    relevance_score: 0.4,
                    evidence       : "Clinical notes from each patient",
                },
            ],
            confidence_score            : 0.78,
            classification_reasoning    : run.result.classificationReasoning,
            paper_title                 : "Neural Networks for Emergency Triage",
            paper_sections              : 2,
        });
        expect(run.result.classificationReasoning).toMatch(
            /^Primary discipline: Computer Science \(0\.90\)\. Also relevant: Medicine \(0\.40\)\. /
        );
        expect(run.diagnostics).toEqual([]);
        expect(deps.scorer.scoreDiscipline).toHaveBeenCalledTimes(2);
    });

    // Scenario: a three-section PDF is classified end to end
    it("should classify a PDF file", async () => {
        deps.files.getFileBytes.mockResolvedValue(new TextEncoder().encode("%PDF-1.7\n%fake body"));
        deps.extractor.extractPages.mockResolvedValue([{ pageNumber: 1, ok: true, text: PDF_TEXT }]);

        const run = await pipeline.classify(requestFromJson({ file_id: "f1" }), { traceId: "trace-pdf" });

        expect(deps.files.getFileBytes).toHaveBeenCalledWith("f1");
        expect(deps.contents.getStructuredContent).not.toHaveBeenCalled();
        expect(deps.scorer.scoreDiscipline).toHaveBeenCalledTimes(1);
        expect(run.response).toEqual({
            discipline_classification_id: "cls-0042",
            disciplines                 : [{
                discipline_id  : 1,
                name           : "Computer Science",
                relevance_score: 0.9,
                evidence       : "We train a neural network",
            }],
            confidence_score            : 0.9,
            classification_reasoning    : run.result.classificationReasoning,
            paper_title                 : "Neural Ranking for Code Search",
            paper_sections              : 3,
        });
    });

    // Scenario: the engine runs the four stages in order and brackets them with run events
    it("should emit lifecycle events in stage order", async () => {
        const events: EventPayload[] = [];
        deps.eventBus.subscribe("*", (event) => events.push(event));

        await pipeline.classify({ structuredContentOverviewId: "c-1" });

        expect(events[0].type).toBe("pipeline:started");
        expect(events[0].data).toMatchObject({ pipeline: "classify", fileId: null, contentId: "c-1" });
        expect(events[events.length - 1].type).toBe("pipeline:completed");
        expect(events.filter((event) => event.type === "stage:completed").map((event) => event.data?.stage)).toEqual([
            "normalizer",
            "parser",
            "classifier",
            "assembler",
        ]);
        expect(events.filter((event) => event.type === "candidate:scored")).toHaveLength(2);
    });

    // Scenario: unknown content id
    it("should raise NotFoundError for missing content", async () => {
        deps.contents.getStructuredContent.mockResolvedValue(null);

        await expect(pipeline.classify({ structuredContentOverviewId: "c-404" })).rejects.toThrow(
            new NotFoundError("Structured content not found: c-404")
        );
        expect(deps.scorer.scoreDiscipline).not.toHaveBeenCalled();
        expect(deps.artifacts.write).not.toHaveBeenCalled();
    });

    // Scenario: a scorer that never answers hits the request deadline
    it("should fail with TimeoutError when the deadline passes", async () => {
        deps.scorer.scoreDiscipline.mockImplementation((_excerpt, _discipline, options) => {
            return new Promise<DisciplineScore>((_resolve, reject) => {
                const signal = options?.signal;
                if (signal) {
                    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
                }
            });
        });

        await expect(pipeline.classify({ structuredContentOverviewId: "c-1" }, { timeoutMs: 20 })).rejects.toThrow(
            TimeoutError
        );
    });

    describe("artifacts", () => {
        // Scenario: both artifacts are written under the run's trace id
        it("should write the parsed paper and the response", async () => {
            const run = await pipeline.classify({ structuredContentOverviewId: "c-1" }, { traceId: "trace-42" });

            expect(deps.artifacts.write).toHaveBeenCalledTimes(2);
            expect(deps.artifacts.write).toHaveBeenNthCalledWith(
                1,
                "trace-42",
                kPAPER_CONTENT_ARTIFACT,
                expect.objectContaining({ title: "Neural Networks for Emergency Triage" })
            );
            expect(deps.artifacts.write).toHaveBeenNthCalledWith(2, "trace-42", kCLASSIFICATION_ARTIFACT, run.response);
        });

        // Scenario: the saved paper keeps the section text needed for a replay
        it("should save the full parsed paper", async () => {
            await pipeline.classify({ structuredContentOverviewId: "c-1" }, { traceId: "trace-42" });

            expect(deps.artifacts.saved.get(`trace-42/${kPAPER_CONTENT_ARTIFACT}`)).toMatchObject({
                title     : "Neural Networks for Emergency Triage",
                provenance: { kind: "structured", content_id: "c-1" },
                sections  : [
                    { heading: "Abstract", text: "We train a neural network with a new algorithm." },
                    { heading: "Methods", text: "Clinical notes from each patient were labelled by nurses." },
                ],
            });
        });

        // Scenario: a failed write is logged and the run still succeeds
        it("should not fail the run when an artifact write fails", async () => {
            deps.artifacts.write.mockRejectedValue(new Error("disk full"));

            const run = await pipeline.classify({ structuredContentOverviewId: "c-1" }, { traceId: "trace-42" });

            expect(run.response.discipline_classification_id).toBe("cls-0042");
            expect(deps.logger.warn).toHaveBeenCalledWith("Artifact write failed", {
                traceId: "trace-42",
                name   : kCLASSIFICATION_ARTIFACT,
                error  : "disk full",
            });
        });
    });

    describe("debug phases", () => {
        function createReplayingPipeline(phases: DebugPhase[]): DisciplinePipeline {
            return new DisciplinePipeline(deps, {
                debugPhases: new Set(phases),
                assembler  : { idFactory: () => "cls-0043" },
            });
        }

        // Scenario: only the classifier runs, on the parser output of an earlier run
        it("should replay the saved parser output", async () => {
            const first = await pipeline.classify({ structuredContentOverviewId: "c-1" }, { traceId: "trace-42" });
            vi.clearAllMocks();

            const run = await createReplayingPipeline(["classifier"]).classify(
                { structuredContentOverviewId: "c-1" },
                { traceId: "trace-42" }
            );

            expect(deps.contents.getStructuredContent).not.toHaveBeenCalled();
            expect(deps.scorer.scoreDiscipline).toHaveBeenCalledTimes(2);
            expect(deps.artifacts.read).toHaveBeenCalledWith("trace-42", kPAPER_CONTENT_ARTIFACT);
            expect(run.response).toEqual({ ...first.response, discipline_classification_id: "cls-0043" });
            expect(run.diagnostics).toEqual([{
                stage  : "parser",
                code   : "phase-replayed",
                message: "Loaded paper_content.json instead of running parser",
                data   : { traceId: "trace-42", artifact: kPAPER_CONTENT_ARTIFACT },
            }]);
            expect(deps.artifacts.write).toHaveBeenCalledTimes(1);
            expect(deps.artifacts.write).toHaveBeenCalledWith("trace-42", kCLASSIFICATION_ARTIFACT, run.response);
        });

        // Scenario: the parser runs and the scores come from the saved classification
        it("should replay the saved classification", async () => {
            const first = await pipeline.classify({ structuredContentOverviewId: "c-1" }, { traceId: "trace-42" });
            vi.clearAllMocks();

            const run = await createReplayingPipeline(["parser"]).classify(
                { structuredContentOverviewId: "c-1" },
                { traceId: "trace-42" }
            );

            expect(deps.contents.getStructuredContent).toHaveBeenCalledWith("c-1");
            expect(deps.scorer.scoreDiscipline).not.toHaveBeenCalled();
            expect(run.response).toEqual({ ...first.response, discipline_classification_id: "cls-0043" });
            expect(run.diagnostics.map((diagnostic) => [diagnostic.stage, diagnostic.code])).toEqual([
                ["classifier", "phase-replayed"],
            ]);
        });

        // Scenario: nothing was saved under the trace id
        it("should raise NotFoundError when the artifact is missing", async () => {
            await expect(createReplayingPipeline(["classifier"]).classify(
                { structuredContentOverviewId: "c-1" },
                { traceId: "trace-missing" }
            )).rejects.toThrow(new NotFoundError("Saved paper_content.json not found for run trace-missing"));
            expect(deps.scorer.scoreDiscipline).not.toHaveBeenCalled();
        });

        // Scenario: a saved file that is not a parsed paper
        it("should reject a malformed saved artifact", async () => {
            deps.artifacts.saved.set(`trace-9/${kPAPER_CONTENT_ARTIFACT}`, { title: 5 });

            await expect(createReplayingPipeline(["classifier"]).classify(
                { structuredContentOverviewId: "c-1" },
                { traceId: "trace-9" }
            )).rejects.toThrow(new UnsupportedFormatError("Saved paper content is malformed: title must be a string or null"));
        });

        // Scenario: replay needs a workspace and the trace id of the saved run
        it("should require a workspace and a trace id", async () => {
            expect(() => new DisciplinePipeline({ ...deps, artifacts: undefined }, {
                debugPhases: new Set<DebugPhase>(["parser"]),
            })).toThrow(new InvalidInputError("Debug phases need an artifact workspace to replay from"));

            await expect(createReplayingPipeline(["parser"]).classify({ structuredContentOverviewId: "c-1" })).rejects.toThrow(
                new InvalidInputError("Replaying a phase needs the trace id of the run that saved it")
            );
        });

        // Scenario: listing every phase runs the whole pipeline
        it("should run everything when every phase is listed", async () => {
            const run = await createReplayingPipeline(["parser", "classifier"]).classify(
                { structuredContentOverviewId: "c-1" }
            );

            expect(deps.artifacts.read).not.toHaveBeenCalled();
            expect(run.response.discipline_classification_id).toBe("cls-0043");
        });
    });
});
