export type {
    PipelineEngineConfig,
    ExecuteOptions,
    PipelineRun,
    PipelineOutcome,
} from "./PipelineEngine.js";
export { PipelineEngine, generateTraceId, kDEFAULT_TIMEOUT_MS } from "./PipelineEngine.js";
