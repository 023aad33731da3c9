/**
 * @fileoverview Application configuration from the environment
 *
 * `.env` is loaded by the entry point (`import "dotenv/config"`); this
 * module only reads and validates `process.env`-shaped input.
 *
 * @module config/loadAppConfig
 */

import { InvalidInputError, isLogLevel, type LogLevel } from "@papertriage/engine";
import { isDebugPhase, kDEBUG_PHASES, type DebugPhase } from "../domain/DisciplinePipeline.js";

export interface AppConfig {
    readonly openai: {
        readonly apiKey: string | undefined;
        readonly model: string;
        readonly temperature: number;
    };
    readonly timeoutMs: number;
    readonly maxDisciplines: number;
    readonly minRelevance: number;
    readonly hintFloor: number;
    readonly maxConcurrency: number;
    readonly fileStoreDir: string;
    readonly contentStoreDir: string;

    /** Artifacts are written only when set */
    readonly workspaceDir: string | null;

    /** Phases to run; the others are replayed from the workspace. Empty runs all. */
    readonly debugPhases: ReadonlySet<DebugPhase>;
    readonly logLevel: LogLevel;
}

type Env = Readonly<Record<string, string | undefined>>;

function readString(env: Env, name: string): string | null {
    const value = env[name]?.trim();
    return value ? value : null;
}

function readNumber(
    env: Env,
    name: string,
    fallback: number,
    check: { min: number; max?: number; integer?: boolean }
): number {
    const raw = readString(env, name);
    if (raw === null) {
        return fallback;
    }

    const value = Number(raw);
    const valid = Number.isFinite(value)
        && value >= check.min
        && (check.max === undefined || value <= check.max)
        && (!check.integer || Number.isInteger(value));

    if (!valid) {
        const range = check.max === undefined ? `>= ${check.min}` : `between ${check.min} and ${check.max}`;
        throw new InvalidInputError(
            `${name} must be ${check.integer ? "an integer" : "a number"} ${range}, got "${raw}"`,
            { details: { name, value: raw } }
        );
    }
    return value;
}

/**
 * Comma-separated phase names, e.g. `CLASSIFIER_DEBUG_PHASES=classifier`.
 */
function readDebugPhases(env: Env): ReadonlySet<DebugPhase> {
    const phases = new Set<DebugPhase>();
    for (const name of (readString(env, "CLASSIFIER_DEBUG_PHASES") ?? "").split(",")) {
        const phase = name.trim().toLowerCase();
        if (phase.length === 0) {
            continue;
        }
        if (!isDebugPhase(phase)) {
            throw new InvalidInputError(
                `CLASSIFIER_DEBUG_PHASES may only name ${kDEBUG_PHASES.join(", ")}, got "${phase}"`,
                { details: { name: "CLASSIFIER_DEBUG_PHASES", value: phase } }
            );
        }
        phases.add(phase);
    }
    return phases;
}

/**
 * Build the application config from environment variables.
 *
 * @param env - Usually `process.env`
 * @throws InvalidInputError on a malformed value
 *
 * @example
 * ```typescript
 * const config = loadAppConfig({ CLASSIFIER_MAX_DISCIPLINES: "3" });
 * config.maxDisciplines; // 3
 * config.openai.model;   // "gpt-4o-mini"
 * ```
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
    const logLevel = readString(env, "LOG_LEVEL")?.toLowerCase() ?? "info";
    if (!isLogLevel(logLevel)) {
        throw new InvalidInputError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
    }

    return Object.freeze({
        openai         : Object.freeze({
            apiKey     : readString(env, "OPENAI_API_KEY") ?? undefined,
            model      : readString(env, "OPENAI_MODEL") ?? "gpt-4o-mini",
            temperature: readNumber(env, "OPENAI_TEMPERATURE", 0.1, { min: 0, max: 2 }),
        }),
        timeoutMs      : readNumber(env, "CLASSIFIER_TIMEOUT_MS", 600_000, { min: 1, integer: true }),
        maxDisciplines : readNumber(env, "CLASSIFIER_MAX_DISCIPLINES", 5, { min: 1, max: 23, integer: true }),
        minRelevance   : readNumber(env, "CLASSIFIER_MIN_RELEVANCE", 0.1, { min: 0, max: 1 }),
        hintFloor      : readNumber(env, "CLASSIFIER_HINT_FLOOR", 0.05, { min: 0, max: 1 }),
        maxConcurrency : readNumber(env, "CLASSIFIER_MAX_CONCURRENCY", 5, { min: 1, integer: true }),
        fileStoreDir   : readString(env, "FILE_STORE_DIR") ?? "./data/files",
        contentStoreDir: readString(env, "CONTENT_STORE_DIR") ?? "./data/content",
        workspaceDir   : readString(env, "CLASSIFIER_WORKSPACE_DIR"),
        debugPhases    : readDebugPhases(env),
        logLevel,
    });
}
