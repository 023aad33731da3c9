/**
 * @fileoverview Prompt templates
 *
 * Prompts live in YAML as `{ template, description?, temperature?, model? }`
 * entries keyed by name. Templates use `{name}` placeholders.
 *
 * @module config/PromptManager
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { InvariantViolation } from "@papertriage/engine";
import { isRecord } from "../domain/entities/ClassificationRequest.js";

export interface PromptDefinition {
    readonly template: string;
    readonly description: string;
    readonly temperature?: number;
    readonly model?: string;
}

export const kDEFAULT_PROMPT_TEMPERATURE = 0.3;

const kPLACEHOLDER = /\{([a-z_][a-z0-9_]*)\}/gi;

export class PromptManager {
    private readonly prompts: ReadonlyMap<string, PromptDefinition>;

    /**
     * @param definitions - Parsed prompt file contents
     * @param defaultModel - Model used when a prompt names none
     * @throws InvariantViolation when an entry has no template
     */
    constructor(definitions: Record<string, unknown>, private readonly defaultModel: string) {
        const prompts = new Map<string, PromptDefinition>();

        for (const [key, raw] of Object.entries(definitions)) {
            if (!isRecord(raw) || typeof raw.template !== "string" || raw.template.trim().length === 0) {
                throw new InvariantViolation(`No template found for prompt '${key}'`);
            }
            prompts.set(key, Object.freeze({
                template   : raw.template,
                description: typeof raw.description === "string" ? raw.description : "",
                temperature: typeof raw.temperature === "number" ? raw.temperature : undefined,
                model      : typeof raw.model === "string" ? raw.model : undefined,
            }));
        }

        this.prompts = prompts;
    }

    /**
     * Load prompts from a YAML file.
     *
     * @throws InvariantViolation if the file doesn't exist or is not a mapping
     */
    static fromFile(filePath: string, defaultModel: string): PromptManager {
        if (!existsSync(filePath)) {
            throw new InvariantViolation(`Prompts file not found: ${filePath}`);
        }

        const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));
        if (!isRecord(parsed)) {
            throw new InvariantViolation(`Invalid prompts file format in ${filePath}: expected a mapping`);
        }
        return new PromptManager(parsed, defaultModel);
    }

    /**
     * Render a prompt, substituting every `{name}` placeholder.
     *
     * @throws InvariantViolation on an unknown key or a placeholder with no value
     *
     * @example
     * ```typescript
     * prompts.getPrompt("discipline_relevance_user", { discipline_name: "Physics", ... });
     * ```
     */
    getPrompt(key: string, variables: Record<string, string | number> = {}): string {
        const { template } = this.definition(key);

        return template.replace(kPLACEHOLDER, (_match, name: string) => {
            const value = variables[name];
            if (value === undefined) {
                throw new InvariantViolation(`Prompt '${key}' needs a value for {${name}}`);
            }
            return String(value);
        });
    }

    getTemperature(key: string): number {
        return this.definition(key).temperature ?? kDEFAULT_PROMPT_TEMPERATURE;
    }

    getModel(key: string): string {
        return this.definition(key).model ?? this.defaultModel;
    }

    getDescription(key: string): string {
        return this.definition(key).description;
    }

    has(key: string): boolean {
        return this.prompts.has(key);
    }

    private definition(key: string): PromptDefinition {
        const definition = this.prompts.get(key);
        if (!definition) {
            throw new InvariantViolation(`Prompt '${key}' not found in configuration`);
        }
        return definition;
    }
}
