/**
 * OpenAI-based discipline scorer
 *
 * Asks a GPT model how relevant a paper excerpt is to one discipline and
 * for a verbatim supporting excerpt. Uses JSON mode for the response.
 */

import OpenAI from "openai";
import { ClassificationError, errorMessage } from "@papertriage/engine";
import type { PromptManager } from "../config/PromptManager.js";
import { isRecord } from "../domain/entities/ClassificationRequest.js";
import type { DisciplineDefinition } from "../domain/entities/Discipline.js";
import type { DisciplineScore, DisciplineScorer, ScoreOptions } from "../domain/ports/index.js";

export const kSYSTEM_PROMPT_KEY = "discipline_relevance_system";
export const kUSER_PROMPT_KEY = "discipline_relevance_user";

/**
 * Configuration options for the OpenAI scorer
 */
export interface OpenAIScorerConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Overrides the prompt file's temperature */
    temperature?: number;

    /** Maximum tokens for the response (default: 400) */
    maxTokens?: number;
}

/**
 * Validate the model's JSON answer.
 *
 * @throws ClassificationError when the content is not `{ score: number, evidence: string }`
 */
export function parseScoreResponse(content: string): DisciplineScore {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    }
    catch (error) {
        throw new ClassificationError(`Scorer returned invalid JSON: ${errorMessage(error)}`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new ClassificationError("Scorer response is not a JSON object");
    }

    const score = typeof parsed.score === "string" ? Number(parsed.score) : parsed.score;
    if (typeof score !== "number" || !Number.isFinite(score)) {
        throw new ClassificationError(`Scorer response has no numeric score: ${JSON.stringify(parsed.score)}`);
    }
    if (typeof parsed.evidence !== "string") {
        throw new ClassificationError("Scorer response has no evidence string");
    }

    return { score, evidence: parsed.evidence.trim() };
}

/**
 * OpenAI-based DisciplineScorer implementation
 */
export class OpenAIDisciplineScorer implements DisciplineScorer {
    readonly id: string;

    private client: OpenAI;
    private config: {
        temperature?: number;
        maxTokens: number;
    };

    constructor(
        private readonly prompts: PromptManager,
        config: OpenAIScorerConfig = {},
        id: string = "openai"
    ) {
        this.id = id;

        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });

        this.config = {
            temperature: config.temperature,
            maxTokens  : config.maxTokens ?? 400,
        };
    }

    /**
     * Score one discipline. Throws on any failure; the caller retries.
     */
    async scoreDiscipline(
        excerpt: string,
        discipline: DisciplineDefinition,
        options: ScoreOptions = {}
    ): Promise<DisciplineScore> {
        const userPrompt = this.prompts.getPrompt(kUSER_PROMPT_KEY, {
            discipline_id         : discipline.id,
            discipline_name       : discipline.name,
            discipline_description: discipline.description,
            discipline_keywords   : discipline.keywords.join(", "),
            excerpt,
        });

        const response = await this.client.chat.completions.create({
            model          : this.prompts.getModel(kUSER_PROMPT_KEY),
            temperature    : this.config.temperature ?? this.prompts.getTemperature(kSYSTEM_PROMPT_KEY),
            max_tokens     : this.config.maxTokens,
            response_format: { type: "json_object" },
            messages       : [
                { role: "system", content: this.prompts.getPrompt(kSYSTEM_PROMPT_KEY) },
                { role: "user", content: userPrompt },
            ],
        }, { signal: options.signal });

        const content = response.choices[0]?.message?.content;
        if (!content) {
            throw new ClassificationError(`No response from OpenAI for discipline ${discipline.id}`);
        }

        return parseScoreResponse(content);
    }
}
