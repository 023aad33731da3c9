/**
 * @fileoverview Replay of a saved phase output
 *
 * Stands in for a stage by loading what an earlier run with the same trace
 * id wrote to the artifact workspace.
 *
 * @module domain/stages/ArtifactReplay
 */

import {
    DiagnosticCollector,
    NotFoundError,
    stageResult,
    type PipelineStage,
    type StageContext,
    type StageResult,
} from "@papertriage/engine";
import type { ArtifactStore } from "../ports/index.js";

export class ArtifactReplay<T> implements PipelineStage<string, T> {
    /**
     * @param id - Stage id reported in events and diagnostics
     * @param artifact - File name inside the run's workspace directory
     * @param decode - Validates the stored JSON; throws when it is malformed
     */
    constructor(
        readonly id: string,
        private readonly store: ArtifactStore,
        private readonly artifact: string,
        private readonly decode: (data: unknown) => T
    ) {}

    /**
     * @param sourceTraceId - Run whose artifact is loaded
     * @throws NotFoundError when that run never wrote the artifact
     */
    async run(sourceTraceId: string, context: StageContext): Promise<StageResult<T>> {
        const data = await this.store.read(sourceTraceId, this.artifact);
        if (data === null) {
            throw new NotFoundError(`Saved ${this.artifact} not found for run ${sourceTraceId}`, {
                details: { traceId: sourceTraceId, artifact: this.artifact },
            });
        }

        const value = this.decode(data);
        context.logger.info(`Skipping ${this.id}, loaded ${this.artifact} from the workspace`, {
            traceId: sourceTraceId,
        });

        const issues = new DiagnosticCollector(this.id);
        issues.add("phase-replayed", `Loaded ${this.artifact} instead of running ${this.id}`, {
            traceId : sourceTraceId,
            artifact: this.artifact,
        });
        return stageResult(value, issues.list());
    }
}
