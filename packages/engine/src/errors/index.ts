export type {
    PipelineErrorKind,
    ErrorCategory,
    PipelineErrorOptions,
    ErrorPayload,
} from "./PipelineError.js";
export {
    PipelineError,
    InvalidInputError,
    NotFoundError,
    UnsupportedFormatError,
    ParseError,
    ClassificationError,
    TimeoutError,
    InvariantViolation,
    isPipelineError,
    toErrorPayload,
    errorMessage,
} from "./PipelineError.js";
