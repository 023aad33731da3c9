/**
 * @fileoverview Local file store
 *
 * Serves uploaded PDFs from `<dir>/<fileId>.pdf`.
 *
 * @module adapters/storage/LocalFileStore
 */

import { existsSync, readFileSync } from "fs";
import type { FileRetrieval } from "../../domain/ports/index.js";
import { storePath } from "./storeKeys.js";

export class LocalFileStore implements FileRetrieval {
    constructor(private readonly dir: string) {}

    /**
     * @returns The file's bytes, or null when `<fileId>.pdf` doesn't exist
     * @throws InvalidInputError for ids containing path separators or `..`
     */
    async getFileBytes(fileId: string): Promise<Uint8Array | null> {
        const filePath = storePath(this.dir, fileId, ".pdf");
        if (!existsSync(filePath)) {
            return null;
        }
        return new Uint8Array(readFileSync(filePath));
    }
}
