/**
 * @fileoverview Pipeline error taxonomy
 *
 * Every failure that leaves the pipeline is a PipelineError with a stable
 * `kind`. `category` says whose fault it is (client input vs. the service)
 * and `retryable` says whether the caller may simply try again.
 *
 * @module @papertriage/engine/errors/PipelineError
 */

/**
 * Stable error kinds surfaced to callers.
 */
export type PipelineErrorKind =
    | "invalid_input"
    | "not_found"
    | "unsupported_format"
    | "parse_error"
    | "classification_failed"
    | "timeout"
    | "invariant_violation"
    | "unknown_discipline";

/**
 * `client` maps to a 4xx response, `server` to a 5xx response.
 */
export type ErrorCategory = "client" | "server";

export interface PipelineErrorOptions {
    readonly details?: Record<string, unknown>;
    readonly cause?: unknown;
}

/**
 * Base class for all pipeline errors.
 */
export abstract class PipelineError extends Error {
    abstract readonly kind: PipelineErrorKind;
    abstract readonly category: ErrorCategory;
    abstract readonly retryable: boolean;

    readonly details?: Record<string, unknown>;

    constructor(message: string, options: PipelineErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.details = options.details;
    }
}

/** Malformed, missing or conflicting request identifiers. */
export class InvalidInputError extends PipelineError {
    readonly kind = "invalid_input";
    readonly category = "client";
    readonly retryable = false;
}

/** The referenced file or content record does not exist. */
export class NotFoundError extends PipelineError {
    readonly kind = "not_found";
    readonly category = "client";
    readonly retryable = false;
}

/** The retrieved bytes or payload are not a format the parser accepts. */
export class UnsupportedFormatError extends PipelineError {
    readonly kind = "unsupported_format";
    readonly category = "client";
    readonly retryable = false;
}

/** The document was accepted but yielded no usable text. */
export class ParseError extends PipelineError {
    readonly kind = "parse_error";
    readonly category = "client";
    readonly retryable = false;
}

/** Every semantic scoring attempt failed. */
export class ClassificationError extends PipelineError {
    readonly kind = "classification_failed";
    readonly category = "server";
    readonly retryable = true;
}

/** The pipeline exceeded its deadline. */
export class TimeoutError extends PipelineError {
    readonly kind = "timeout";
    readonly category = "server";
    readonly retryable = true;
}

/** Internal consistency failure. Always logged, never swallowed. */
export class InvariantViolation extends PipelineError {
    readonly kind = "invariant_violation";
    readonly category = "server";
    readonly retryable = false;
}

/**
 * Type guard for PipelineError instances.
 */
export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}

/**
 * Caller-facing error payload.
 */
export interface ErrorPayload {
    readonly kind: PipelineErrorKind | "internal";
    readonly message: string;
    readonly retryable: boolean;
    readonly details?: Record<string, unknown>;
}

/**
 * Render any thrown value as an ErrorPayload. Unknown errors become `internal`.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
    if (isPipelineError(error)) {
        return {
            kind     : error.kind,
            message  : error.message,
            retryable: error.retryable,
            details  : error.details,
        };
    }

    return {
        kind     : "internal",
        message  : error instanceof Error ? error.message : String(error),
        retryable: false,
    };
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
