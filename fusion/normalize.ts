/**
 * Forecast Fusion — Time-Series Normalizer
 *
 * Puts the primary and secondary feeds onto the shared daytime grid.
 * Samples between grid points are discarded, never interpolated.
 */

import { DEFAULT_WINDOW, type WindowConfig } from './config';
import { IncompleteWindowError, InvalidSeriesError } from './errors';
import { clampPercent } from './math';
import { buildHourGrid, isSameDate, minutesOfDay, parseDateKey, parseDateTimeKey } from './time';
import type {
    AlignedSlot,
    MissingSlotValue,
    RawSample,
    SlotReading,
    SourceRole,
    SourceSeries
} from './types';

export interface NormalizeOptions {
    /** Target local date (YYYY-MM-DD) */
    date: string;
    window?: WindowConfig;
}

export interface NormalizedDay {
    slots: AlignedSlot[];
    issues: MissingSlotValue[];
}

type TimedSample = {
    sample: RawSample;
    minutes: number;
};

function formatHour(hour: number): string {
    return `${String(hour).padStart(2, '0')}:00`;
}

/**
 * Check the series invariants and attach minute-of-day offsets.
 * Samples without finite values count as absent.
 */
function prepareSeries(series: SourceSeries, role: SourceRole, date: string): TimedSample[] {
    const day = parseDateKey(date);
    if (!day) {
        throw new InvalidSeriesError(`Invalid target date "${date}"`, role);
    }

    const timed: TimedSample[] = [];
    let previous = -Infinity;

    for (const sample of series.samples) {
        const parts = parseDateTimeKey(sample.time);
        if (!parts) {
            throw new InvalidSeriesError(`${series.provider}: malformed sample time "${sample.time}"`, role);
        }
        if (!isSameDate(parts, day)) {
            throw new InvalidSeriesError(`${series.provider}: sample ${sample.time} is not on ${date}`, role);
        }
        const minutes = minutesOfDay(parts);
        if (minutes <= previous) {
            throw new InvalidSeriesError(
                `${series.provider}: sample times must be strictly increasing (${sample.time})`,
                role
            );
        }
        previous = minutes;

        if (Number.isFinite(sample.temperatureC) && Number.isFinite(sample.rainProbabilityPct)) {
            timed.push({ sample, minutes });
        }
    }

    return timed;
}

/**
 * Smallest gap between consecutive samples, in minutes.
 */
export function nativeIntervalMinutes(samples: readonly { minutes: number }[]): number | null {
    let smallest: number | null = null;
    for (let i = 1; i < samples.length; i++) {
        const gap = samples[i].minutes - samples[i - 1].minutes;
        if (gap > 0 && (smallest === null || gap < smallest)) {
            smallest = gap;
        }
    }
    return smallest;
}

function toReading(sample: RawSample, substituted: boolean): SlotReading {
    return {
        temperatureC: sample.temperatureC,
        rainProbabilityPct: clampPercent(sample.rainProbabilityPct),
        sampledAt: sample.time,
        substituted
    };
}

function pickReading(
    timed: TimedSample[],
    slotMinutes: number,
    stepMinutes: number,
    interval: number | null
): SlotReading | null {
    const exact = timed.find((entry) => entry.minutes === slotMinutes);
    if (exact) return toReading(exact.sample, false);

    // Only a feed denser than the grid may lend its nearest earlier sample.
    if (interval === null || interval >= stepMinutes) return null;

    let earlier: TimedSample | null = null;
    for (const entry of timed) {
        if (entry.minutes >= slotMinutes) break;
        if (slotMinutes - entry.minutes <= interval) earlier = entry;
    }
    return earlier ? toReading(earlier.sample, true) : null;
}

/**
 * Align both feeds onto the window grid.
 *
 * @throws InvalidSeriesError when a feed breaks the ordering/date invariants
 * @throws IncompleteWindowError when a feed has no sample inside the window,
 *   or is missing at an anchor slot
 */
export function normalizeSeries(
    primary: SourceSeries,
    secondary: SourceSeries,
    options: NormalizeOptions
): NormalizedDay {
    const { date, window = DEFAULT_WINDOW } = options;
    const windowStart = window.startHour * 60;
    const windowEnd = window.endHour * 60;
    const stepMinutes = window.stepHours * 60;

    const feeds = ([['primary', primary], ['secondary', secondary]] as const).map(([role, series]) => {
        const timed = prepareSeries(series, role, date);
        const inWindow = timed.filter((entry) => entry.minutes >= windowStart && entry.minutes <= windowEnd);
        if (inWindow.length === 0) {
            throw new IncompleteWindowError(
                `${series.provider} (${role}) has no samples between ${formatHour(window.startHour)} and ${formatHour(window.endHour)} on ${date}`,
                role
            );
        }
        return { role, provider: series.provider, timed, interval: nativeIntervalMinutes(timed) };
    });

    const anchors = new Map<number, string>([
        [window.anchorHours.midday, 'midday'],
        [window.anchorHours.evening, 'evening']
    ]);

    const slots: AlignedSlot[] = [];
    const issues: MissingSlotValue[] = [];

    for (const time of buildHourGrid(date, window.startHour, window.endHour, window.stepHours)) {
        const parts = parseDateTimeKey(time);
        if (!parts) continue;
        const slotMinutes = minutesOfDay(parts);

        const anchor = anchors.get(parts.hour);
        const [primaryReading, secondaryReading] = feeds.map((feed) => {
            const reading = pickReading(feed.timed, slotMinutes, stepMinutes, feed.interval);
            if (reading) return reading;
            if (anchor) {
                throw new IncompleteWindowError(
                    `${feed.provider} (${feed.role}) has no reading at the ${anchor} anchor ${time}`,
                    feed.role
                );
            }
            issues.push({ kind: 'missing_slot_value', time, source: feed.role });
            return null;
        });

        slots.push({
            time,
            hour: parts.hour,
            primary: primaryReading,
            secondary: secondaryReading
        });
    }

    return { slots, issues };
}
