/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

import { dirname, join } from "path";
import { fileURLToPath } from "url";

export { loadDisciplines, loadLexiconEntries, loadTaxonomy } from "./loadTaxonomy.js";
export type { Taxonomy } from "./loadTaxonomy.js";
export { loadAppConfig } from "./loadAppConfig.js";
export type { AppConfig } from "./loadAppConfig.js";
export { PromptManager, kDEFAULT_PROMPT_TEMPERATURE } from "./PromptManager.js";
export type { PromptDefinition } from "./PromptManager.js";

/**
 * The app's `config/` directory holding the YAML assets.
 */
export const kCONFIG_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "config");
