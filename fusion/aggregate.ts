/**
 * Forecast Fusion — Aggregator
 *
 * Whole-window statistics from the aligned slots. Pure: the same slots always
 * produce the same summary.
 */

import { IncompleteWindowError } from './errors';
import { computeStats, mean } from './math';
import { measureDisagreement } from './uncertainty';
import type { AlignedSlot, DaySummary, SlotReading } from './types';

function presentReadings(slot: AlignedSlot): SlotReading[] {
    const readings: SlotReading[] = [];
    if (slot.primary) readings.push(slot.primary);
    if (slot.secondary) readings.push(slot.secondary);
    return readings;
}

/**
 * Per-slot average temperature (lone value when one feed is missing).
 */
export function slotAverageTemperature(slot: AlignedSlot): number | null {
    return mean(presentReadings(slot).map((reading) => reading.temperatureC));
}

export function slotAverageRain(slot: AlignedSlot): number | null {
    return mean(presentReadings(slot).map((reading) => reading.rainProbabilityPct));
}

export function aggregateDay(slots: readonly AlignedSlot[]): DaySummary {
    const covered = slots.filter((slot) => slot.primary || slot.secondary);
    if (covered.length === 0) {
        throw new IncompleteWindowError('No slot carries a reading from either feed');
    }

    const slotTemps: number[] = [];
    const slotRains: number[] = [];
    const everyTemp: number[] = [];

    for (const slot of covered) {
        const temp = slotAverageTemperature(slot);
        const rain = slotAverageRain(slot);
        if (temp !== null) slotTemps.push(temp);
        if (rain !== null) slotRains.push(rain);
        // High/low come from the individual feeds so a single-source spike survives.
        for (const reading of presentReadings(slot)) {
            everyTemp.push(reading.temperatureC);
        }
    }

    const tempStats = computeStats(everyTemp);
    const { tempRangeC, rainRangePct } = measureDisagreement(covered);

    // Floating-point summation can drift a hair outside [low, high].
    const avgTempC = Math.min(tempStats.max, Math.max(tempStats.min, computeStats(slotTemps).mean));

    return {
        avgTempC,
        tempRangeC,
        avgRainPct: Math.round(computeStats(slotRains).mean),
        rainRangePct,
        highTempC: tempStats.max,
        lowTempC: tempStats.min,
        windowStart: slots[0].time,
        windowEnd: slots[slots.length - 1].time
    };
}
