/**
 * Forecast Fusion — Reference Forecasts
 *
 * Independent forecasts used only to corroborate the fused result. A reference
 * that cannot be fetched or parsed becomes an unavailable point; it never
 * fails the run.
 */
/* eslint-disable no-console */

import { JSDOM } from 'jsdom';
import { DEFAULT_WINDOW, type WindowConfig } from '../config';
import { isReferenceAvailable } from '../corroborate';
import { ProviderError } from '../errors';
import { clampPercent, mean } from '../math';
import { buildHourGrid } from '../time';
import type { City, ReferencePoint, ReferenceUnavailable } from '../types';
import { fetchJson, fetchText, isRecord, toFiniteNumber } from './http';

export interface ReferenceFetchOptions {
    timeoutMs?: number;
    window?: WindowConfig;
}

export interface ReferenceSource {
    name: string;
    fetchPoint(city: City, date: string, options?: ReferenceFetchOptions): Promise<ReferencePoint>;
}

export interface CollectedReferences {
    points: ReferencePoint[];
    issues: ReferenceUnavailable[];
}

export function unavailablePoint(source: string): ReferencePoint {
    return { source, temperatureC: null, rainProbabilityPct: null };
}

// =============================================================================
// yr.no daily table
// =============================================================================

const YR_BASE_URL = 'https://www.yr.no/en/forecast/daily-table';

/** Location paths on yr.no, keyed by lower-case city name. */
export const DEFAULT_YR_PATHS: Readonly<Record<string, string>> = {
    brussels: '2-2800866/Belgium/Brussels-Capital/Brussels',
    paris: '2-2988507/France/Île-de-France/Paris'
};

/** What the yr.no value measures; the fused average covers daytime only. */
export const YR_BASIS = 'midpoint of the daily high and low, night-time low included';

const NUMBER_RE = /[-\u2212\u2013]?\d+(?:[.,]\d+)?/;
const PERCENT_RE = /^(\d+(?:[.,]\d+)?)\s*%$/;

function readNumber(text: string): number | null {
    const match = NUMBER_RE.exec(text.replace(/\s+/g, ''));
    if (!match) return null;
    return toFiniteNumber(match[0].replace(/[\u2212\u2013]/, '-').replace(',', '.'));
}

function textOf(element: Element): string {
    return (element.textContent ?? '').replace(/\s+/g, ' ').trim();
}

/** Elements without element children, in document order. */
function leaves(root: Element): Element[] {
    return Array.from(root.querySelectorAll('*')).filter((element) => element.children.length === 0);
}

function findDailyRow(document: Document, date: string): Element | null {
    for (const time of Array.from(document.querySelectorAll('time[datetime]'))) {
        if (time.getAttribute('datetime')?.startsWith(date)) {
            return time.closest('tr');
        }
    }
    return null;
}

/**
 * Read the row for `date` from the daily table: the midpoint of max/min
 * temperature, plus the precipitation probability when the row shows one.
 */
export function parseYrDailyTable(html: string, date: string): ReferencePoint {
    const { document } = new JSDOM(html).window;
    const row = findDailyRow(document, date);
    if (!row) {
        throw new ProviderError('yr.no', `no daily row for ${date}`);
    }

    const marked = Array.from(row.querySelectorAll('.temperature'));
    const temperatureCells = marked.length > 0 ? marked : leaves(row).filter((cell) => textOf(cell).includes('°'));
    const temperatures = temperatureCells
        .map((cell) => readNumber(textOf(cell)))
        .filter((value): value is number => value !== null)
        .slice(0, 2);

    let rainProbabilityPct: number | null = null;
    for (const cell of leaves(row)) {
        const match = PERCENT_RE.exec(textOf(cell));
        const value = match ? toFiniteNumber(match[1].replace(',', '.')) : null;
        if (value !== null) {
            rainProbabilityPct = clampPercent(value);
            break;
        }
    }

    const temperatureC = mean(temperatures);
    if (temperatureC === null && rainProbabilityPct === null) {
        throw new ProviderError('yr.no', `daily row for ${date} has no values`);
    }

    return { source: 'yr.no', temperatureC, rainProbabilityPct, basis: YR_BASIS };
}

export function createYrReference(paths: Readonly<Record<string, string>> = DEFAULT_YR_PATHS): ReferenceSource {
    return {
        name: 'yr.no',
        async fetchPoint(city, date, options = {}) {
            const path = paths[city.name.toLowerCase()];
            if (!path) {
                throw new ProviderError('yr.no', `no location configured for ${city.name}`);
            }
            const html = await fetchText(`${YR_BASE_URL}/${encodeURI(path)}`, 'yr.no', {
                timeoutMs: options.timeoutMs
            });
            return parseYrDailyTable(html, date);
        }
    };
}

// =============================================================================
// Open-Meteo
// =============================================================================

const OPEN_METEO_ENDPOINT = 'https://api.open-meteo.com/v1/forecast';

/**
 * Average the hourly values that fall on the window grid.
 */
export function parseOpenMeteoForecast(
    body: unknown,
    date: string,
    window: WindowConfig = DEFAULT_WINDOW
): ReferencePoint {
    const hourly = isRecord(body) ? body.hourly : undefined;
    const times: unknown = isRecord(hourly) ? hourly.time : undefined;
    const temperatureValues: unknown = isRecord(hourly) ? hourly.temperature_2m : undefined;
    const rainValues: unknown = isRecord(hourly) ? hourly.precipitation_probability : undefined;
    if (!Array.isArray(times) || !Array.isArray(temperatureValues) || !Array.isArray(rainValues)) {
        throw new ProviderError('open-meteo', 'response has no hourly block');
    }

    const grid = new Set(buildHourGrid(date, window.startHour, window.endHour, window.stepHours));
    const temperatures: number[] = [];
    const rains: number[] = [];

    for (let index = 0; index < times.length; index++) {
        const time: unknown = times[index];
        if (typeof time !== 'string' || !grid.has(time)) continue;
        const temperature = toFiniteNumber(temperatureValues[index]);
        const rain = toFiniteNumber(rainValues[index]);
        if (temperature !== null) temperatures.push(temperature);
        if (rain !== null) rains.push(clampPercent(rain));
    }

    const temperatureC = mean(temperatures);
    const rainProbabilityPct = mean(rains);
    if (temperatureC === null && rainProbabilityPct === null) {
        throw new ProviderError('open-meteo', `no hourly values inside the window on ${date}`);
    }

    return { source: 'open-meteo', temperatureC, rainProbabilityPct };
}

export function createOpenMeteoReference(): ReferenceSource {
    return {
        name: 'open-meteo',
        async fetchPoint(city, date, options = {}) {
            const params = new URLSearchParams({
                latitude: city.latitude.toString(),
                longitude: city.longitude.toString(),
                hourly: 'temperature_2m,precipitation_probability',
                timezone: city.timezone,
                start_date: date,
                end_date: date
            });
            const body = await fetchJson(`${OPEN_METEO_ENDPOINT}?${params}`, 'open-meteo', {
                timeoutMs: options.timeoutMs
            });
            return parseOpenMeteoForecast(body, date, options.window);
        }
    };
}

// =============================================================================
// Collection
// =============================================================================

function describeFailure(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Query every source in turn. Each failure yields an unavailable point and a
 * `reference_unavailable` issue; this function does not throw.
 */
export async function collectReferences(
    sources: readonly ReferenceSource[],
    city: City,
    date: string,
    options: ReferenceFetchOptions = {}
): Promise<CollectedReferences> {
    const points: ReferencePoint[] = [];
    const issues: ReferenceUnavailable[] = [];

    for (const source of sources) {
        try {
            const point = await source.fetchPoint(city, date, options);
            points.push({ ...point, source: source.name });
            if (!isReferenceAvailable(point)) {
                issues.push({ kind: 'reference_unavailable', source: source.name, reason: 'no values' });
            }
        } catch (error) {
            const reason = describeFailure(error);
            console.warn(`[references] ${source.name} unavailable for ${city.name}: ${reason}`);
            points.push(unavailablePoint(source.name));
            issues.push({ kind: 'reference_unavailable', source: source.name, reason });
        }
    }

    return { points, issues };
}
