import { PipelineError } from "@papertriage/engine";

/**
 * A discipline id that is not in the taxonomy.
 */
export class UnknownDisciplineError extends PipelineError {
    readonly kind = "unknown_discipline";
    readonly category = "server";
    readonly retryable = false;

    constructor(readonly disciplineId: number) {
        super(`Unknown discipline id: ${disciplineId}`, { details: { disciplineId } });
    }
}
