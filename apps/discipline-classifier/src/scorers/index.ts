/**
 * Discipline scorer exports
 */

export {
    OpenAIDisciplineScorer,
    parseScoreResponse,
    kSYSTEM_PROMPT_KEY,
    kUSER_PROMPT_KEY,
    type OpenAIScorerConfig,
} from "./openai-scorer.js";
