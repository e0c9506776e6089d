/**
 * Chart model: everything the day chart draws, as plain data.
 * Kept separate from the React tree so it can be tested and compared directly.
 */

import { DEFAULT_WINDOW, DEFAULT_ZONES, type WindowConfig, type ZoneConfig } from '../config';
import { roundTo } from '../math';
import { slotAverageTemperature } from '../aggregate';
import type { AlignedSlot, DaySummary } from '../types';

export interface ChartRow {
    /** Hour label on the x axis, e.g. "09" */
    label: string;
    time: string;
    primaryTemp: number | null;
    secondaryTemp: number | null;
    avgTemp: number | null;
    /** [lower, upper] of the two feeds; null unless both are present */
    band: [number, number] | null;
    primaryRain: number | null;
    secondaryRain: number | null;
}

export interface ChartZone {
    id: 'warm' | 'hot';
    fromC: number;
    toC: number;
    fill: string;
}

export interface ChartAnnotation {
    label: string;
    value: number;
    text: string;
}

export interface ChartModel {
    title: string;
    city: string;
    date: string;
    rows: ChartRow[];
    tempDomain: [number, number];
    zones: ChartZone[];
    annotations: ChartAnnotation[];
    width: number;
    height: number;
}

export const CHART_COLORS = {
    primaryTemp: '#d62728',
    secondaryTemp: '#ff7f0e',
    avgTemp: '#111111',
    band: '#7f7f7f',
    primaryRain: '#17becf',
    secondaryRain: '#1f3fb4',
    warmZone: '#ffd27a',
    hotZone: '#ff8a65'
} as const;

const DOMAIN_PADDING_C = 2;

export function chartTitle(city: string): string {
    return `${city} Tomorrow – Day Forecast`;
}

export function formatAnnotation(value: number): string {
    return `${value.toFixed(1)}°C`;
}

function hourLabel(slot: AlignedSlot): string {
    return String(slot.hour).padStart(2, '0');
}

function buildRow(slot: AlignedSlot): ChartRow {
    const primaryTemp = slot.primary?.temperatureC ?? null;
    const secondaryTemp = slot.secondary?.temperatureC ?? null;
    const avgTemp = slotAverageTemperature(slot);

    return {
        label: hourLabel(slot),
        time: slot.time,
        primaryTemp,
        secondaryTemp,
        avgTemp: avgTemp === null ? null : roundTo(avgTemp, 2),
        band:
            primaryTemp !== null && secondaryTemp !== null
                ? [Math.min(primaryTemp, secondaryTemp), Math.max(primaryTemp, secondaryTemp)]
                : null,
        primaryRain: slot.primary?.rainProbabilityPct ?? null,
        secondaryRain: slot.secondary?.rainProbabilityPct ?? null
    };
}

/**
 * Temperature axis domain: the day's low/high padded by 2 °C, on whole degrees.
 */
export function temperatureDomain(summary: DaySummary): [number, number] {
    return [
        Math.floor(summary.lowTempC - DOMAIN_PADDING_C),
        Math.ceil(summary.highTempC + DOMAIN_PADDING_C)
    ];
}

/**
 * Static zones clipped to the visible domain; zones outside it are dropped.
 */
export function visibleZones(domain: [number, number], zones: ZoneConfig = DEFAULT_ZONES): ChartZone[] {
    const [lower, upper] = domain;
    const candidates: ChartZone[] = [
        { id: 'warm', fromC: zones.warm.fromC, toC: zones.warm.toC, fill: CHART_COLORS.warmZone },
        { id: 'hot', fromC: zones.hot.fromC, toC: upper, fill: CHART_COLORS.hotZone }
    ];

    return candidates
        .map((zone) => ({ ...zone, fromC: Math.max(zone.fromC, lower), toC: Math.min(zone.toC, upper) }))
        .filter((zone) => zone.toC > zone.fromC);
}

export function buildChartModel(params: {
    city: string;
    date: string;
    slots: readonly AlignedSlot[];
    summary: DaySummary;
    window?: WindowConfig;
    zones?: ZoneConfig;
}): ChartModel {
    const { city, date, slots, summary, window = DEFAULT_WINDOW, zones = DEFAULT_ZONES } = params;
    const rows = slots.map(buildRow);
    const tempDomain = temperatureDomain(summary);

    const anchorHours = [window.anchorHours.midday, window.anchorHours.evening];
    const annotations: ChartAnnotation[] = [];
    for (const hour of anchorHours) {
        const slot = slots.find((candidate) => candidate.hour === hour);
        const value = slot ? slotAverageTemperature(slot) : null;
        if (slot && value !== null) {
            annotations.push({ label: hourLabel(slot), value, text: formatAnnotation(value) });
        }
    }

    return {
        title: chartTitle(city),
        city,
        date,
        rows,
        tempDomain,
        zones: visibleZones(tempDomain, zones),
        annotations,
        width: 800,
        height: 400
    };
}
