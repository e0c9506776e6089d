/**
 * Forecast Fusion — Math Helpers
 * Shared numeric utilities for safe fusion calculations.
 */

export function filterFiniteNumbers(values: number[]): number[] {
    return values.filter((value) => Number.isFinite(value));
}

export function clampPercent(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(100, value));
}

export function mean(values: number[]): number | null {
    const finite = filterFiniteNumbers(values);
    if (finite.length === 0) return null;
    return finite.reduce((sum, value) => sum + value, 0) / finite.length;
}

export function computeStats(values: number[]): {
    mean: number;
    min: number;
    max: number;
    count: number;
} {
    const finite = filterFiniteNumbers(values);
    const count = finite.length;

    if (count === 0) {
        return { mean: 0, min: 0, max: 0, count: 0 };
    }

    return {
        mean: finite.reduce((sum, value) => sum + value, 0) / count,
        min: Math.min(...finite),
        max: Math.max(...finite),
        count
    };
}

export function roundTo(value: number, decimals: number): number {
    if (!Number.isFinite(value)) return 0;
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}
