/**
 * @fileoverview Local structured-content store
 *
 * Serves structured-content records from `<dir>/<contentId>.json`.
 *
 * @module adapters/storage/LocalContentStore
 */

import { existsSync, readFileSync } from "fs";
import { UnsupportedFormatError, errorMessage } from "@papertriage/engine";
import { isRecord } from "../../domain/entities/ClassificationRequest.js";
import type { StructuredContentRetrieval } from "../../domain/ports/index.js";
import { storePath } from "./storeKeys.js";

export class LocalContentStore implements StructuredContentRetrieval {
    constructor(private readonly dir: string) {}

    /**
     * @returns The decoded record, or null when `<contentId>.json` doesn't exist
     * @throws InvalidInputError for ids containing path separators or `..`
     * @throws UnsupportedFormatError when the file is not a JSON object
     */
    async getStructuredContent(contentId: string): Promise<Record<string, unknown> | null> {
        const filePath = storePath(this.dir, contentId, ".json");
        if (!existsSync(filePath)) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(readFileSync(filePath, "utf-8"));
        }
        catch (error) {
            throw new UnsupportedFormatError(
                `Structured content ${contentId} is not valid JSON: ${errorMessage(error)}`,
                { cause: error }
            );
        }

        if (!isRecord(parsed)) {
            throw new UnsupportedFormatError(`Structured content ${contentId} is not a JSON object`);
        }
        return parsed;
    }
}
