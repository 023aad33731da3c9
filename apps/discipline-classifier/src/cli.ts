/**
 * @fileoverview Command-line front end
 *
 * Argument parsing, pipeline wiring and the JSON envelopes printed on
 * stdout. Logs go to stderr.
 *
 * @module cli
 */

import { join } from "path";
import {
    createConsoleLogger,
    toErrorPayload,
    type PipelineLogger,
} from "@papertriage/engine";
import { PdfJsTextExtractor } from "./adapters/pdfjs/PdfJsTextExtractor.js";
import { LocalContentStore } from "./adapters/storage/LocalContentStore.js";
import { LocalFileStore } from "./adapters/storage/LocalFileStore.js";
import { WorkspaceArtifacts } from "./adapters/workspace/WorkspaceArtifacts.js";
import { kCONFIG_DIR, loadAppConfig, loadTaxonomy, PromptManager, type AppConfig } from "./config/index.js";
import type { ClassificationRequest } from "./domain/entities/ClassificationRequest.js";
import type { ClassificationResponse } from "./domain/entities/ClassificationResult.js";
import { DisciplinePipeline } from "./domain/DisciplinePipeline.js";
import { OpenAIDisciplineScorer } from "./scorers/openai-scorer.js";

export const kPIPELINE_VERSION = "0.1.0";

export const kUSAGE = "Usage: discipline-classifier --file-id <id> | --content-id <id> [--trace-id <id>]";

export const kEXIT_OK = 0;
export const kEXIT_FAILED = 1;
export const kEXIT_USAGE = 2;

export type CliEnvelope =
    | { readonly status: "success"; readonly pipeline_version: string; readonly result: ClassificationResponse }
    | {
        readonly status: "error";
        readonly pipeline_version: string;
        readonly error: { readonly kind: string; readonly message: string; readonly retryable: boolean };
    };

/**
 * Thrown for malformed command lines.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

/**
 * The request plus an optional trace id for the run.
 */
export interface CliArgs extends ClassificationRequest {
    readonly traceId?: string;
}

const kFLAGS: Record<string, keyof CliArgs> = {
    "--file-id"   : "fileId",
    "--content-id": "structuredContentOverviewId",
    "--trace-id"  : "traceId",
};

/**
 * Parse `--file-id <id>` / `--content-id <id>` / `--trace-id <id>` (or
 * `--flag=value`). Whether exactly one paper id was given is left to the
 * pipeline.
 *
 * @throws UsageError on unknown flags, missing values or no paper id at all
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    const request: { fileId?: string; structuredContentOverviewId?: string; traceId?: string } = {};

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.indexOf("=");
        const flag = eq >= 0 ? arg.slice(0, eq) : arg;
        const field = kFLAGS[flag];

        if (field === undefined) {
            throw new UsageError(`Unknown argument: ${arg}`);
        }

        let value: string | undefined;
        if (eq >= 0) {
            value = arg.slice(eq + 1);
        }
        else {
            value = argv[i + 1];
            i++;
        }
        if (value === undefined || value.length === 0 || value.startsWith("--")) {
            throw new UsageError(`Missing value for ${flag}`);
        }
        request[field] = value;
    }

    if (request.fileId === undefined && request.structuredContentOverviewId === undefined) {
        throw new UsageError("One of --file-id or --content-id is required");
    }
    return request;
}

export function successEnvelope(result: ClassificationResponse): CliEnvelope {
    return { status: "success", pipeline_version: kPIPELINE_VERSION, result };
}

export function errorEnvelope(error: unknown): CliEnvelope {
    const { kind, message, retryable } = toErrorPayload(error);
    return { status: "error", pipeline_version: kPIPELINE_VERSION, error: { kind, message, retryable } };
}

/**
 * Build the production pipeline: YAML taxonomy, local stores, pdf.js and
 * the OpenAI scorer.
 */
export function createPipeline(config: AppConfig, logger: PipelineLogger): DisciplinePipeline {
    const { registry, lexicon } = loadTaxonomy(
        join(kCONFIG_DIR, "disciplines.yml"),
        join(kCONFIG_DIR, "keywords.yml")
    );
    const prompts = PromptManager.fromFile(join(kCONFIG_DIR, "prompts.yml"), config.openai.model);

    logger.debug(`Loaded ${registry.size} disciplines and ${lexicon.size} keyword terms`);

    const pipeline = new DisciplinePipeline({
        registry,
        lexicon,
        files    : new LocalFileStore(config.fileStoreDir),
        contents : new LocalContentStore(config.contentStoreDir),
        extractor: new PdfJsTextExtractor(),
        scorer   : new OpenAIDisciplineScorer(prompts, {
            apiKey     : config.openai.apiKey,
            temperature: config.openai.temperature,
        }),
        artifacts: config.workspaceDir === null ? undefined : new WorkspaceArtifacts(config.workspaceDir),
        logger,
    }, {
        timeoutMs  : config.timeoutMs,
        debugPhases: config.debugPhases,
        classifier : {
            maxDisciplines: config.maxDisciplines,
            minRelevance  : config.minRelevance,
            hintFloor     : config.hintFloor,
            maxConcurrency: config.maxConcurrency,
        },
    });

    pipeline.engine.eventBus.subscribe("candidate:dropped", (event) => {
        logger.debug("Candidate dropped", { traceId: event.traceId, ...event.data });
    });

    return pipeline;
}

export interface CliDeps {
    readonly env: Readonly<Record<string, string | undefined>>;

    /** Writes one line to stdout */
    readonly print: (line: string) => void;

    readonly createPipeline?: (config: AppConfig, logger: PipelineLogger) => DisciplinePipeline;
}

/**
 * Run one classification from the command line.
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
    const emit = (envelope: CliEnvelope): void => deps.print(JSON.stringify(envelope, null, 2));

    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    }
    catch (error) {
        if (error instanceof UsageError) {
            emit({
                status          : "error",
                pipeline_version: kPIPELINE_VERSION,
                error           : { kind: "invalid_input", message: `${error.message}\n${kUSAGE}`, retryable: false },
            });
            return kEXIT_USAGE;
        }
        throw error;
    }

    try {
        const config = loadAppConfig(deps.env);
        const logger = createConsoleLogger(config.logLevel, true);
        const pipeline = (deps.createPipeline ?? createPipeline)(config, logger);

        const { traceId, ...request } = args;
        const run = await pipeline.classify(request, { traceId });
        emit(successEnvelope(run.response));
        return kEXIT_OK;
    }
    catch (error) {
        emit(errorEnvelope(error));
        return kEXIT_FAILED;
    }
}
