/**
 * Fusion configuration.
 *
 * This file centralizes the constants used to classify source disagreement and
 * to lay out the daytime window, so the methodology can be documented and kept
 * in sync with the implementation.
 *
 * Units:
 * - Temperature: °C
 * - Rain probability: % (differences in percentage points, "pp")
 *
 * Disagreement tiers (worst-case difference between the two feeds):
 * - low:    temp range ≤ low.temperatureC    and rain range ≤ low.rainPct
 * - medium: temp range ≤ medium.temperatureC and rain range ≤ medium.rainPct
 * - high:   anything above
 *
 * The same bands decide whether a reference forecast agrees (within low) or
 * disagrees (beyond medium) with the fused average.
 */

export interface ThresholdBand {
    temperatureC: number;
    rainPct: number;
}

export interface DisagreementThresholds {
    low: ThresholdBand;
    medium: ThresholdBand;
}

export interface WindowConfig {
    startHour: number;
    endHour: number;
    stepHours: number;
    /** Slots that are annotated on the chart and must not be empty */
    anchorHours: {
        midday: number;
        evening: number;
    };
}

export interface ZoneConfig {
    warm: { fromC: number; toC: number };
    hot: { fromC: number };
}

export interface FusionConfig {
    thresholds: DisagreementThresholds;
    window: WindowConfig;
    zones: ZoneConfig;
}

export const DEFAULT_THRESHOLDS: DisagreementThresholds = {
    low: { temperatureC: 1, rainPct: 10 },
    medium: { temperatureC: 3, rainPct: 25 }
};

export const DEFAULT_WINDOW: WindowConfig = {
    startHour: 9,
    endHour: 21,
    stepHours: 3,
    anchorHours: { midday: 12, evening: 21 }
};

export const DEFAULT_ZONES: ZoneConfig = {
    warm: { fromC: 24, toC: 30 },
    hot: { fromC: 30 }
};

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
    thresholds: DEFAULT_THRESHOLDS,
    window: DEFAULT_WINDOW,
    zones: DEFAULT_ZONES
};

function getNumericEnv(value: unknown, fallback: number): number {
    if (value === undefined || value === null || value === '') return fallback;
    const parsed = typeof value === 'number' ? value : Number(value);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Threshold overrides from the environment:
 * FUSION_LOW_TEMP_C, FUSION_LOW_RAIN_PCT, FUSION_MEDIUM_TEMP_C, FUSION_MEDIUM_RAIN_PCT.
 */
export function loadFusionConfig(env: NodeJS.ProcessEnv = process.env): FusionConfig {
    const low: ThresholdBand = {
        temperatureC: getNumericEnv(env.FUSION_LOW_TEMP_C, DEFAULT_THRESHOLDS.low.temperatureC),
        rainPct: getNumericEnv(env.FUSION_LOW_RAIN_PCT, DEFAULT_THRESHOLDS.low.rainPct)
    };
    const medium: ThresholdBand = {
        temperatureC: getNumericEnv(env.FUSION_MEDIUM_TEMP_C, DEFAULT_THRESHOLDS.medium.temperatureC),
        rainPct: getNumericEnv(env.FUSION_MEDIUM_RAIN_PCT, DEFAULT_THRESHOLDS.medium.rainPct)
    };

    // A medium band narrower than the low band would make "medium" unreachable.
    if (medium.temperatureC < low.temperatureC || medium.rainPct < low.rainPct) {
        throw new Error(
            `Invalid thresholds: medium (${medium.temperatureC}°C/${medium.rainPct}pp) is narrower than low (${low.temperatureC}°C/${low.rainPct}pp)`
        );
    }

    return {
        ...DEFAULT_FUSION_CONFIG,
        thresholds: { low, medium }
    };
}
