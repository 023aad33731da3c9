export type { Token } from "./tokens.js";
export { tokenize, normalizeWord, countWords, phraseKey } from "./tokens.js";
export type { DetectedHeading } from "./headings.js";
export { detectHeading, inferSectionType, isKnownHeading } from "./headings.js";
export type { TermCounts } from "./terms.js";
export {
    matchTerms,
    addCounts,
    weightedHits,
    termNames,
    extractNamedEntities,
    scoreHints,
    kHINT_HALF_DENSITY,
    kMIN_HINT_WORDS,
} from "./terms.js";
export { isGrounded, normalizeForGrounding } from "./grounding.js";
