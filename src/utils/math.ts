export function clamp(value: number, min: number, max: number): number {
    if (value < min) return min;
    if (value > max) return max;
    return value;
}

/**
 * Rounds a similarity score to 6 decimals so that float noise from
 * dot products (0.9999999999999998) does not leak into the report.
 */
export function roundScore(value: number): number {
    return Math.round(value * 1e6) / 1e6;
}

/**
 * Median of a list of numbers; 0 for an empty list.
 * Even-length lists average the two middle values.
 */
export function median(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const middle = Math.floor(sorted.length / 2);

    if (sorted.length % 2 === 1) {
        return sorted[middle] ?? 0;
    }
    return ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
}

export function formatPercent(score: number): string {
    return `${Math.round(clamp(score, 0, 1) * 100)}%`;
}
