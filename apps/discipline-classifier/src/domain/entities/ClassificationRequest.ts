/**
 * @fileoverview Classification request and normalized content source
 *
 * @module domain/entities/ClassificationRequest
 */

import { InvalidInputError } from "@papertriage/engine";

/**
 * Exactly one of the two identifiers must be set.
 */
export interface ClassificationRequest {
    readonly fileId?: string;
    readonly structuredContentOverviewId?: string;
}

/**
 * Structured content as returned by the content-retrieval collaborator.
 * Only `sections` is required; see the parser for the accepted keys.
 */
export type StructuredContentPayload = Readonly<Record<string, unknown>> & {
    readonly sections: readonly unknown[];
};

/**
 * A PDF byte stream resolved from a file id.
 */
export interface RawSource {
    readonly kind: "raw";
    readonly fileId: string;
    readonly bytes: Uint8Array;
}

/**
 * A pre-structured payload resolved from a content id.
 */
export interface StructuredSource {
    readonly kind: "structured";
    readonly contentId: string;
    readonly payload: StructuredContentPayload;
}

/**
 * Output of the content normalizer.
 */
export type ContentSource = RawSource | StructuredSource;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map the JSON request body (`{"file_id": ...}` or
 * `{"structured_content_overview_id": ...}`) onto a ClassificationRequest.
 * Identifier exclusivity is checked later, by the normalizer.
 *
 * @throws InvalidInputError when the body is not an object or an id is not a string
 */
export function requestFromJson(body: unknown): ClassificationRequest {
    if (!isRecord(body)) {
        throw new InvalidInputError("Request body must be a JSON object");
    }

    const fileId = body.file_id;
    const contentId = body.structured_content_overview_id;

    for (const [key, value] of [["file_id", fileId], ["structured_content_overview_id", contentId]] as const) {
        if (value !== undefined && value !== null && typeof value !== "string") {
            throw new InvalidInputError(`${key} must be a string`, { details: { field: key } });
        }
    }

    return {
        fileId                     : typeof fileId === "string" ? fileId : undefined,
        structuredContentOverviewId: typeof contentId === "string" ? contentId : undefined,
    };
}
