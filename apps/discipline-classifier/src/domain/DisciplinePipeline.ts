/**
 * @fileoverview Discipline classification pipeline
 *
 * Wires the four stages onto a PipelineEngine:
 *
 *     request -> ContentNormalizer -> PaperParser -> DisciplineClassifier
 *             -> ClassificationAssembler -> response
 *
 * One `classify()` call is one request: its own trace id, deadline and
 * abort signal. The registry and lexicon are shared read-only.
 *
 * With debug phases configured, only the listed phases run; the parser or
 * classifier output of the others is loaded from the artifacts an earlier
 * run with the same trace id wrote.
 *
 * @module domain/DisciplinePipeline
 */

import {
    InvalidInputError,
    PipelineEngine,
    createConsoleLogger,
    errorMessage,
    type Diagnostic,
    type EventBus,
    type PipelineLogger,
} from "@papertriage/engine";
import type { ClassificationRequest } from "./entities/ClassificationRequest.js";
import type { ClassificationResponse, ClassificationResult } from "./entities/ClassificationResult.js";
import { outcomeFromResponse, toResponse } from "./entities/ClassificationResult.js";
import type { ClassifierOutcome } from "./entities/ClassificationResult.js";
import type { ParsedPaper } from "./entities/PaperDocument.js";
import { parsedPaperFromJson, serializeParsedPaper } from "./entities/PaperDocument.js";
import type {
    ArtifactStore,
    DisciplineScorer,
    FileRetrieval,
    PdfTextExtractor,
    StructuredContentRetrieval,
} from "./ports/index.js";
import { ArtifactReplay } from "./stages/ArtifactReplay.js";
import { ClassificationAssembler, type ClassificationAssemblerConfig } from "./stages/ClassificationAssembler.js";
import { ContentNormalizer } from "./stages/ContentNormalizer.js";
import { DisciplineClassifier, type DisciplineClassifierConfig } from "./stages/DisciplineClassifier.js";
import { PaperParser, type PaperParserConfig } from "./stages/PaperParser.js";
import type { KeywordLexicon } from "./taxonomy/KeywordLexicon.js";
import type { TaxonomyRegistry } from "./taxonomy/TaxonomyRegistry.js";

export interface DisciplinePipelineDeps {
    readonly registry: TaxonomyRegistry;
    readonly lexicon: KeywordLexicon;
    readonly files: FileRetrieval;
    readonly contents: StructuredContentRetrieval;
    readonly extractor: PdfTextExtractor;
    readonly scorer: DisciplineScorer;

    /** Receives paper_content.json and classification.json after success; read back to replay a phase */
    readonly artifacts?: ArtifactStore;
    readonly logger?: PipelineLogger;
    readonly eventBus?: EventBus;
}

/**
 * Phases that can be replayed from saved artifacts.
 */
export type DebugPhase = "parser" | "classifier";

export const kDEBUG_PHASES: readonly DebugPhase[] = ["parser", "classifier"];

export function isDebugPhase(value: string): value is DebugPhase {
    return kDEBUG_PHASES.some((phase) => phase === value);
}

export interface DisciplinePipelineConfig {
    /** Per-request deadline (default: 600000) */
    readonly timeoutMs?: number;

    /** Phases to run; the rest are replayed. Empty or unset runs everything. */
    readonly debugPhases?: ReadonlySet<DebugPhase>;
    readonly parser?: PaperParserConfig;
    readonly classifier?: DisciplineClassifierConfig;
    readonly assembler?: ClassificationAssemblerConfig;
}

export interface ClassifyOptions {
    readonly traceId?: string;
    readonly timeoutMs?: number;
}

export interface ClassificationRun {
    readonly traceId: string;
    readonly result: ClassificationResult;
    readonly response: ClassificationResponse;
    readonly diagnostics: readonly Diagnostic[];
    readonly durationMs: number;
}

export const kPAPER_CONTENT_ARTIFACT = "paper_content.json";
export const kCLASSIFICATION_ARTIFACT = "classification.json";

/**
 * DisciplinePipeline
 *
 * @example
 * ```typescript
 * const pipeline = new DisciplinePipeline({ registry, lexicon, files, contents, extractor, scorer });
 * const run = await pipeline.classify({ fileId: "paper-42" });
 * run.response.disciplines[0]; // { discipline_id: 1, name: "Computer Science", ... }
 * ```
 */
export class DisciplinePipeline {
    readonly engine: PipelineEngine;

    private readonly normalizer: ContentNormalizer;
    private readonly parser: PaperParser;
    private readonly classifier: DisciplineClassifier;
    private readonly assembler: ClassificationAssembler;
    private readonly parserReplay: ArtifactReplay<ParsedPaper> | null = null;
    private readonly classifierReplay: ArtifactReplay<ClassifierOutcome> | null = null;
    private readonly logger: PipelineLogger;

    constructor(
        private readonly deps: DisciplinePipelineDeps,
        config: DisciplinePipelineConfig = {}
    ) {
        this.logger = deps.logger ?? createConsoleLogger();
        this.engine = new PipelineEngine({
            name     : "classify",
            timeoutMs: config.timeoutMs,
            eventBus : deps.eventBus,
            logger   : this.logger,
        });

        this.normalizer = new ContentNormalizer(deps.files, deps.contents);
        this.parser = new PaperParser(deps.extractor, deps.lexicon, config.parser);
        this.classifier = new DisciplineClassifier(deps.scorer, deps.registry, deps.lexicon, config.classifier);
        this.assembler = new ClassificationAssembler(deps.registry, config.assembler);

        const debugPhases = config.debugPhases ?? new Set<DebugPhase>();
        if (debugPhases.size > 0) {
            if (!deps.artifacts) {
                throw new InvalidInputError("Debug phases need an artifact workspace to replay from");
            }
            if (!debugPhases.has("parser")) {
                this.parserReplay = new ArtifactReplay(
                    "parser",
                    deps.artifacts,
                    kPAPER_CONTENT_ARTIFACT,
                    parsedPaperFromJson
                );
            }
            if (!debugPhases.has("classifier")) {
                this.classifierReplay = new ArtifactReplay(
                    "classifier",
                    deps.artifacts,
                    kCLASSIFICATION_ARTIFACT,
                    outcomeFromResponse
                );
            }
        }
    }

    /**
     * Classify one paper.
     *
     * @throws PipelineError subclasses; TimeoutError when the deadline passes
     * @throws InvalidInputError when a phase is replayed and no trace id was given
     */
    async classify(request: ClassificationRequest, options: ClassifyOptions = {}): Promise<ClassificationRun> {
        const { parserReplay, classifierReplay } = this;
        if ((parserReplay || classifierReplay) && options.traceId === undefined) {
            throw new InvalidInputError("Replaying a phase needs the trace id of the run that saved it");
        }

        const outcome = await this.engine.execute(async (run) => {
            const parsed = parserReplay
                ? await run.stage(parserReplay, run.traceId)
                : await run.stage(this.parser, await run.stage(this.normalizer, request));
            const classified = classifierReplay
                ? await run.stage(classifierReplay, run.traceId)
                : await run.stage(this.classifier, parsed);
            const result = await run.stage(this.assembler, { document: parsed.document, outcome: classified });
            return { parsed, result };
        }, {
            traceId  : options.traceId,
            timeoutMs: options.timeoutMs,
            meta     : {
                fileId   : request.fileId ?? null,
                contentId: request.structuredContentOverviewId ?? null,
            },
        });

        const { parsed, result } = outcome.value;
        const response = toResponse(result, (id) => this.deps.registry.resolve(id));

        if (this.deps.artifacts) {
            const artifacts: Array<readonly [string, unknown]> = [];
            if (!parserReplay) {
                artifacts.push([kPAPER_CONTENT_ARTIFACT, serializeParsedPaper(parsed)]);
            }
            artifacts.push([kCLASSIFICATION_ARTIFACT, response]);
            await this.writeArtifacts(this.deps.artifacts, outcome.traceId, artifacts);
        }

        return {
            traceId    : outcome.traceId,
            result,
            response,
            diagnostics: outcome.diagnostics,
            durationMs : outcome.durationMs,
        };
    }

    /**
     * Artifacts are for debugging only; a failed write is logged and the
     * classification still returned.
     */
    private async writeArtifacts(
        store: ArtifactStore,
        traceId: string,
        artifacts: ReadonlyArray<readonly [string, unknown]>
    ): Promise<void> {
        for (const [name, data] of artifacts) {
            try {
                await store.write(traceId, name, data);
            }
            catch (error) {
                this.logger.warn("Artifact write failed", { traceId, name, error: errorMessage(error) });
            }
        }
    }
}
