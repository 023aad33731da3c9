export { TaxonomyRegistry, kDISCIPLINE_COUNT } from "./TaxonomyRegistry.js";
export { KeywordLexicon } from "./KeywordLexicon.js";
export type { LexiconEntryInput, LexiconTerm } from "./KeywordLexicon.js";
export { UnknownDisciplineError } from "./UnknownDisciplineError.js";
