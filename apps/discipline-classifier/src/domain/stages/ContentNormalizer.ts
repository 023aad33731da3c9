/**
 * @fileoverview Content Normalizer stage
 *
 * Resolves a classification request to exactly one content source:
 * PDF bytes for a file id, or a structured payload for a content id.
 * Nothing downstream ever sees the request itself.
 *
 * @module domain/stages/ContentNormalizer
 */

import {
    InvalidInputError,
    NotFoundError,
    UnsupportedFormatError,
    stageResult,
    type PipelineStage,
    type StageContext,
    type StageResult,
} from "@papertriage/engine";
import type {
    ClassificationRequest,
    ContentSource,
    StructuredContentPayload,
} from "../entities/ClassificationRequest.js";
import type { FileRetrieval, StructuredContentRetrieval } from "../ports/index.js";

const kPDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46, 0x2d]; // "%PDF-"
const kUTF8_BOM = [0xef, 0xbb, 0xbf];
const kLEADING_WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);

/**
 * Whether `bytes` start with the PDF signature, ignoring a UTF-8 BOM and
 * leading whitespace.
 */
export function hasPdfSignature(bytes: Uint8Array): boolean {
    let offset = 0;
    if (kUTF8_BOM.every((byte, i) => bytes[i] === byte)) {
        offset = kUTF8_BOM.length;
    }
    while (offset < bytes.length && kLEADING_WHITESPACE.has(bytes[offset])) {
        offset++;
    }
    return kPDF_SIGNATURE.every((byte, i) => bytes[offset + i] === byte);
}

function presentId(value: string | undefined): string | null {
    if (value === undefined) {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function isStructuredPayload(value: Record<string, unknown>): value is StructuredContentPayload {
    return Array.isArray(value.sections);
}

export class ContentNormalizer implements PipelineStage<ClassificationRequest, ContentSource> {
    readonly id = "normalizer";

    constructor(
        private readonly files: FileRetrieval,
        private readonly contents: StructuredContentRetrieval
    ) {}

    /**
     * @throws InvalidInputError when both ids or neither are given (before any retrieval)
     * @throws NotFoundError when the referenced file or record is absent
     * @throws UnsupportedFormatError when the bytes are not a PDF or the payload has no sections
     */
    async run(request: ClassificationRequest, context: StageContext): Promise<StageResult<ContentSource>> {
        const fileId = presentId(request.fileId);
        const contentId = presentId(request.structuredContentOverviewId);

        if (fileId !== null && contentId !== null) {
            throw new InvalidInputError(
                "Provide either file_id or structured_content_overview_id, not both"
            );
        }

        if (fileId !== null) {
            return stageResult(await this.resolveFile(fileId, context));
        }

        if (contentId !== null) {
            return stageResult(await this.resolveContent(contentId, context));
        }

        throw new InvalidInputError("One of file_id or structured_content_overview_id is required");
    }

    private async resolveFile(fileId: string, context: StageContext): Promise<ContentSource> {
        const bytes = await this.files.getFileBytes(fileId);
        if (bytes === null) {
            throw new NotFoundError(`File not found: ${fileId}`, { details: { fileId } });
        }

        if (!hasPdfSignature(bytes)) {
            throw new UnsupportedFormatError(`File ${fileId} is not a PDF document`, {
                details: { fileId, size: bytes.length },
            });
        }

        context.logger.debug("Resolved PDF file", { fileId, size: bytes.length });
        return { kind: "raw", fileId, bytes };
    }

    private async resolveContent(contentId: string, context: StageContext): Promise<ContentSource> {
        const payload = await this.contents.getStructuredContent(contentId);
        if (payload === null) {
            throw new NotFoundError(`Structured content not found: ${contentId}`, { details: { contentId } });
        }

        if (!isStructuredPayload(payload)) {
            throw new UnsupportedFormatError(
                `Structured content ${contentId} has no sections array`,
                { details: { contentId } }
            );
        }

        context.logger.debug("Resolved structured content", {
            contentId,
            sections: payload.sections.length,
        });
        return { kind: "structured", contentId, payload };
    }
}
