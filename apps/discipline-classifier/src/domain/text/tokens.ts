/**
 * @fileoverview Tokenization and light term normalization
 *
 * Deterministic, dictionary-free. Words are runs of letters and digits;
 * everything else separates them.
 *
 * @module domain/text/tokens
 */

export interface Token {
    /** Text as written */
    readonly raw: string;

    /** Lower-cased and suffix-normalized form used for matching */
    readonly norm: string;
}

const kWORD = /[\p{L}\p{N}]+/gu;

/**
 * Reduce a word to a matching key: lower-case, then strip one common
 * inflectional suffix. "networks" and "network" share a key, as do
 * "statistical" and "statistics".
 *
 * @example
 * ```typescript
 * normalizeWord("Studies");     // "study"
 * normalizeWord("processes");   // "process"
 * normalizeWord("programming"); // "programm"
 * normalizeWord("clinical");    // "clinic"
 * ```
 */
export function normalizeWord(word: string): string {
    const w = word.toLowerCase();

    if (w.length <= 3) {
        return w;
    }
    if (w.endsWith("ies") && w.length > 4) {
        return `${w.slice(0, -3)}y`;
    }
    if (w.endsWith("sses") || /(?:ch|sh|x|z)es$/.test(w)) {
        return w.slice(0, -2);
    }
    if (w.endsWith("ical") && w.length > 6) {
        return w.slice(0, -2);
    }
    if (w.endsWith("ing") && w.length > 5) {
        return w.slice(0, -3);
    }
    if (w.endsWith("ed") && w.length > 4) {
        return w.slice(0, -2);
    }
    if (w.endsWith("s") && !/(?:ss|us|is)$/.test(w)) {
        return w.slice(0, -1);
    }
    return w;
}

/**
 * Split text into tokens.
 */
export function tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    for (const match of text.matchAll(kWORD)) {
        tokens.push({ raw: match[0], norm: normalizeWord(match[0]) });
    }
    return tokens;
}

/**
 * Number of words in a text.
 */
export function countWords(text: string): number {
    let count = 0;
    for (const _match of text.matchAll(kWORD)) {
        count++;
    }
    return count;
}

/**
 * Matching key of a multi-word phrase: its normalized words joined by a
 * single space.
 */
export function phraseKey(phrase: string): string {
    return tokenize(phrase).map((token) => token.norm).join(" ");
}
