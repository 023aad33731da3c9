/**
 * @fileoverview Aggregate confidence
 *
 * @module domain/stages/confidence
 */

/**
 * Share of the top score removed at full ambiguity.
 */
export const kAMBIGUITY_PENALTY = 0.6;

export function clamp01(value: number): number {
    return Math.min(1, Math.max(0, value));
}

export function round4(value: number): number {
    return Math.round(value * 10_000) / 10_000;
}

/**
 * Confidence over a whole set of candidate scores.
 *
 * With s1 >= s2 >= ... the finite scores, negatives raised to 0:
 *
 *     A = min(1, 1/2 * sum over i >= 2 of (s_i / s1) * 2^-(i-2))
 *     confidence = min(1, s1) * (1 - 0.6 * A)
 *
 * A measures how close the runners-up come to the leader, with later
 * runners-up counting half as much as the one before. Ratios are taken
 * before the top score is capped at 1, so A depends on the relative
 * scores only: multiplying every score by k > 1 leaves A unchanged and
 * never lowers min(1, s1), even when the scores go past 1. Raising the
 * runners-up alone does lower confidence, e.g. [1, 0.5] gives 0.85 and
 * [1, 0.75] gives 0.775.
 *
 * @example
 * ```typescript
 * aggregateConfidence([0.9]);           // 0.9
 * aggregateConfidence([0.8, 0.4]);      // 0.8 * (1 - 0.6 * 0.25) = 0.68
 * aggregateConfidence([0.5, 0.5, 0.5]); // 0.5 * (1 - 0.6 * 0.75) = 0.275
 * aggregateConfidence([]);              // 0
 * ```
 */
export function aggregateConfidence(scores: readonly number[]): number {
    const sorted = scores
        .filter((score) => Number.isFinite(score))
        .map((score) => Math.max(0, score))
        .sort((a, b) => b - a);

    const top = sorted[0] ?? 0;
    if (top === 0) {
        return 0;
    }

    let spread = 0;
    for (let i = 1; i < sorted.length; i++) {
        spread += (sorted[i] / top) * 0.5 ** (i - 1);
    }
    const ambiguity = Math.min(1, spread / 2);

    return round4(Math.min(1, top) * (1 - kAMBIGUITY_PENALTY * ambiguity));
}
