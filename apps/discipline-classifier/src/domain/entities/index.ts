export type { Discipline, DisciplineDefinition, DisciplineHint } from "./Discipline.js";
export { compareHints } from "./Discipline.js";

export type {
    SectionType,
    DocumentSection,
    DocumentProvenance,
    PaperDocument,
    ParsedPaper,
} from "./PaperDocument.js";
export {
    kSECTION_TYPES,
    isSectionType,
    createPaperDocument,
    documentText,
    serializeParsedPaper,
    parsedPaperFromJson,
} from "./PaperDocument.js";

export type {
    ClassificationRequest,
    StructuredContentPayload,
    RawSource,
    StructuredSource,
    ContentSource,
} from "./ClassificationRequest.js";
export { isRecord, requestFromJson } from "./ClassificationRequest.js";

export type {
    DisciplineAssignment,
    ClassifierOutcome,
    ClassificationResult,
    ClassificationResponse,
} from "./ClassificationResult.js";
export {
    kUNCLASSIFIED_EVIDENCE,
    toResponse,
    outcomeFromResponse,
    compareAssignments,
} from "./ClassificationResult.js";
