import type { AlignedSlot, City, SlotReading, SourceRole, SourceSeries } from '../types';

export const DATE = '2026-10-20';

export const PARIS: City = { name: 'Paris', latitude: 48.8566, longitude: 2.3522, timezone: 'Europe/Paris' };
export const BRUSSELS: City = { name: 'Brussels', latitude: 50.8503, longitude: 4.3517, timezone: 'Europe/Brussels' };

/** [hour, temperature °C, rain %] */
export type Point = [number, number, number];

export function at(hour: number, date: string = DATE): string {
    return `${date}T${String(hour).padStart(2, '0')}:00`;
}

export function series(source: SourceRole, provider: string, points: Point[], date: string = DATE): SourceSeries {
    return {
        source,
        provider,
        samples: points.map(([hour, temperatureC, rainProbabilityPct]) => ({
            time: at(hour, date),
            temperatureC,
            rainProbabilityPct
        }))
    };
}

/** 3-hourly primary feed on the grid */
export const PRIMARY_POINTS: Point[] = [
    [9, 10, 0],
    [12, 14, 20],
    [15, 16, 40],
    [18, 13, 10],
    [21, 9, 0]
];

export const SECONDARY_POINTS: Point[] = [
    [9, 11, 10],
    [12, 15, 30],
    [15, 15, 20],
    [18, 14, 10],
    [21, 10, 0]
];

function reading(hour: number, temperatureC: number, rainProbabilityPct: number): SlotReading {
    return { temperatureC, rainProbabilityPct, sampledAt: at(hour), substituted: false };
}

/**
 * Build slots directly: [hour, primary [temp, rain] | null, secondary [temp, rain] | null].
 */
export function slots(rows: Array<[number, [number, number] | null, [number, number] | null]>): AlignedSlot[] {
    return rows.map(([hour, primary, secondary]) => ({
        time: at(hour),
        hour,
        primary: primary ? reading(hour, primary[0], primary[1]) : null,
        secondary: secondary ? reading(hour, secondary[0], secondary[1]) : null
    }));
}

/** Summary fixture: averages 12.7 °C / 14 %, high 16, low 9 */
export const SAMPLE_SLOTS: AlignedSlot[] = slots([
    [9, [10, 0], [12, 10]],
    [12, [14, 20], [15, 30]],
    [15, [16, 40], [15, 20]],
    [18, [13, 10], null],
    [21, [9, 0], [10, 0]]
]);
