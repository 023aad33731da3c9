/**
 * @fileoverview Per-run debugging artifacts
 *
 * JSON artifacts live at `<root>/<traceId>/<name>`.
 *
 * @module adapters/workspace/WorkspaceArtifacts
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { UnsupportedFormatError, errorMessage } from "@papertriage/engine";
import type { ArtifactStore } from "../../domain/ports/index.js";
import { storePath } from "../storage/storeKeys.js";

export class WorkspaceArtifacts implements ArtifactStore {
    constructor(private readonly root: string) {}

    async write(traceId: string, name: string, data: unknown): Promise<void> {
        const runDir = storePath(this.root, traceId, "");
        mkdirSync(runDir, { recursive: true });
        writeFileSync(join(runDir, name), `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    }

    /**
     * @throws InvalidInputError for unsafe trace ids
     * @throws UnsupportedFormatError when the file is not valid JSON
     */
    async read(traceId: string, name: string): Promise<unknown> {
        const filePath = join(storePath(this.root, traceId, ""), name);
        if (!existsSync(filePath)) {
            return null;
        }

        try {
            const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
            return parsed;
        }
        catch (error) {
            throw new UnsupportedFormatError(
                `Artifact ${name} of run ${traceId} is not valid JSON: ${errorMessage(error)}`,
                { cause: error }
            );
        }
    }
}
