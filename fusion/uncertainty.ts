/**
 * Forecast Fusion — Uncertainty Estimator
 * Worst-case disagreement between the two feeds and its tier.
 */

import { IncompleteWindowError } from './errors';
import { DEFAULT_THRESHOLDS, type DisagreementThresholds, type ThresholdBand } from './config';
import type { AlignedSlot, Alignment, DisagreementRanges, DisagreementTier } from './types';

/**
 * Largest absolute difference between the feeds over slots where both are present.
 * A single divergent slot is not averaged away.
 *
 * @throws IncompleteWindowError when no slot carries both feeds
 */
export function measureDisagreement(slots: readonly AlignedSlot[]): DisagreementRanges {
    let tempRangeC = 0;
    let rainRangePct = 0;
    let compared = 0;

    for (const slot of slots) {
        if (!slot.primary || !slot.secondary) continue;
        compared++;
        tempRangeC = Math.max(tempRangeC, Math.abs(slot.primary.temperatureC - slot.secondary.temperatureC));
        rainRangePct = Math.max(
            rainRangePct,
            Math.abs(slot.primary.rainProbabilityPct - slot.secondary.rainProbabilityPct)
        );
    }

    if (compared === 0) {
        throw new IncompleteWindowError('The feeds share no slot to compare');
    }
    return { tempRangeC, rainRangePct };
}

export function withinBand(tempDelta: number, rainDelta: number, band: ThresholdBand): boolean {
    return tempDelta <= band.temperatureC && rainDelta <= band.rainPct;
}

export function classifyDisagreement(
    ranges: DisagreementRanges,
    thresholds: DisagreementThresholds = DEFAULT_THRESHOLDS
): DisagreementTier {
    if (withinBand(ranges.tempRangeC, ranges.rainRangePct, thresholds.low)) return 'low';
    if (withinBand(ranges.tempRangeC, ranges.rainRangePct, thresholds.medium)) return 'medium';
    return 'high';
}

const TIER_ALIGNMENT: Record<DisagreementTier, Alignment> = {
    low: 'full',
    medium: 'partial',
    high: 'divergent'
};

export function tierToAlignment(tier: DisagreementTier): Alignment {
    return TIER_ALIGNMENT[tier];
}
