/**
 * @fileoverview Evidence grounding check
 *
 * @module domain/text/grounding
 */

/**
 * Canonical form for substring comparison: lower case, straight quotes,
 * plain hyphens, single spaces.
 */
export function normalizeForGrounding(text: string): string {
    return text
        .toLowerCase()
        .replace(/[‘’‚‛]/g, "'")
        .replace(/[“”„‟]/g, "\"")
        .replace(/[‐-―−]/g, "-")
        .replace(/-\s*\n\s*/g, "")
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Whether every fragment of `evidence` occurs in `corpus`. Fragments are
 * separated by an ellipsis ("..." or "…"); surrounding quotes are ignored.
 *
 * @param evidence - Evidence text as returned by the scorer
 * @param normalizedCorpus - Document text already passed through normalizeForGrounding
 *
 * @example
 * ```typescript
 * const corpus = normalizeForGrounding("We train a graph neural network.\nIt beats baselines.");
 * isGrounded("graph  Neural network ... beats baselines", corpus); // true
 * isGrounded("we use reinforcement learning", corpus);             // false
 * ```
 */
export function isGrounded(evidence: string, normalizedCorpus: string): boolean {
    const fragments = evidence
        .split(/\.\.\.|…/)
        .map((fragment) => normalizeForGrounding(fragment).replace(/^["']+|["']+$/g, "").trim())
        .filter((fragment) => fragment.length > 0);

    if (fragments.length === 0) {
        return false;
    }

    return fragments.every((fragment) => normalizedCorpus.includes(fragment));
}
