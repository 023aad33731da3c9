export { ContentNormalizer, hasPdfSignature } from "./ContentNormalizer.js";
export { PaperParser, findTitleLine, segmentLines, structuredContentText } from "./PaperParser.js";
export type { PaperParserConfig } from "./PaperParser.js";
export {
    DisciplineClassifier,
    buildExcerpt,
    selectCandidates,
    kFALLBACK_DISCIPLINE_ID,
} from "./DisciplineClassifier.js";
export type { DisciplineClassifierConfig } from "./DisciplineClassifier.js";
export { ClassificationAssembler } from "./ClassificationAssembler.js";
export type { AssemblyInput, ClassificationAssemblerConfig } from "./ClassificationAssembler.js";
export { aggregateConfidence, clamp01, round4, kAMBIGUITY_PENALTY } from "./confidence.js";
export { ArtifactReplay } from "./ArtifactReplay.js";
