/**
 * Forecast Fusion — Daily Pipeline
 *
 * Main entry point for a forecast run.
 * Fetches both feeds, fuses them, corroborates against references, renders the
 * chart and stores the record. One city's failure never affects another's.
 */
/* eslint-disable no-console */

import { aggregateDay } from '../aggregate';
import { renderChartPng, type ChartRenderer } from '../chart/render';
import { buildChartModel } from '../chart/model';
import { DEFAULT_FUSION_CONFIG, type FusionConfig } from '../config';
import { corroborate } from '../corroborate';
import { isFusionError, type FusionErrorCode } from '../errors';
import { normalizeSeries } from '../normalize';
import {
    chartKey as buildChartKey,
    createForecastRecord,
    latestRecordKey,
    parseRecord,
    recordKey,
    serializeRecord
} from '../record';
import { tomorrowIn } from '../time';
import type { City, ForecastRecord, PipelineIssue } from '../types';
import { classifyDisagreement } from '../uncertainty';
import type { ForecastProvider } from './providers';
import { collectReferences, type ReferenceSource } from './references';
import type { StorageBackend } from './storage';

// =============================================================================
// Single city
// =============================================================================

export interface CityForecastOptions {
    /** Target local date (YYYY-MM-DD) */
    date: string;
    storage: StorageBackend;
    primary: ForecastProvider;
    secondary: ForecastProvider;
    references?: readonly ReferenceSource[];
    fusion?: FusionConfig;
    /** Chart rasterizer (default: recharts + sharp) */
    renderChart?: ChartRenderer;
    /** Override run clock (for deterministic records). */
    now?: Date;
    timeoutMs?: number;
}

export interface CityForecastResult {
    record: ForecastRecord;
    chart: Uint8Array | null;
    /** False when an existing record for the city/date was reused */
    stored: boolean;
}

function encodeRecord(record: ForecastRecord): Uint8Array {
    return new TextEncoder().encode(serializeRecord(record));
}

async function readRecord(storage: StorageBackend, key: string): Promise<ForecastRecord | null> {
    const bytes = await storage.get(key);
    return bytes ? parseRecord(new TextDecoder().decode(bytes)) : null;
}

/**
 * Point `records/latest/{city}` at this record unless a newer date is already there.
 */
async function updateLatestPointer(storage: StorageBackend, record: ForecastRecord): Promise<void> {
    const key = latestRecordKey(record.city);
    try {
        const current = await readRecord(storage, key);
        if (current && current.date > record.date) {
            return;
        }
    } catch (error) {
        console.warn(`[pipeline] Replacing unreadable latest pointer ${key}:`, error);
    }
    await storage.put(key, encodeRecord(record));
}

/**
 * Run the whole pipeline for one city:
 * 1. Fetch both feeds
 * 2. Normalize onto the window grid
 * 3. Aggregate and classify the disagreement
 * 4. Corroborate against references
 * 5. Render the chart
 * 6. Store chart, record and latest pointer
 */
export async function runCityForecast(city: City, options: CityForecastOptions): Promise<CityForecastResult> {
    const {
        date,
        storage,
        primary,
        secondary,
        references = [],
        fusion = DEFAULT_FUSION_CONFIG,
        renderChart = renderChartPng,
        now,
        timeoutMs
    } = options;

    const key = recordKey(date, city.name);
    const existing = await readRecord(storage, key);
    if (existing) {
        console.log(`[pipeline] Skipped ${city.name} ${date} (record exists)`);
        return { record: existing, chart: await storage.get(existing.chartKey), stored: false };
    }

    console.log(`[pipeline] Starting ${city.name} for ${date}...`);

    // 1. Feeds
    const [primarySeries, secondarySeries] = await Promise.all([
        primary.fetchSeries(city, date),
        secondary.fetchSeries(city, date)
    ]);

    // 2–3. Fusion
    const normalized = normalizeSeries(primarySeries, secondarySeries, { date, window: fusion.window });
    const summary = aggregateDay(normalized.slots);
    const tier = classifyDisagreement(summary, fusion.thresholds);

    // 4. References
    const collected = await collectReferences(references, city, date, { timeoutMs, window: fusion.window });
    const issues: PipelineIssue[] = [...normalized.issues, ...collected.issues];
    const verdict = corroborate({
        summary,
        prior: tier,
        references: collected.points,
        issues,
        thresholds: fusion.thresholds
    });

    for (const issue of normalized.issues) {
        console.warn(`[pipeline] ${city.name}: no ${issue.source} value at ${issue.time}`);
    }

    // 5. Chart
    const model = buildChartModel({
        city: city.name,
        date,
        slots: normalized.slots,
        summary,
        window: fusion.window,
        zones: fusion.zones
    });
    const chart = await renderChart(model);
    const chartKey = buildChartKey(date, city.name);

    // 6. Record
    const record = createForecastRecord({
        city,
        date,
        generatedAt: now ?? new Date(),
        summary,
        slots: normalized.slots,
        references: collected.points,
        verdict,
        chartKey,
        issues
    });

    await storage.put(chartKey, chart);
    await storage.put(key, encodeRecord(record));
    await updateLatestPointer(storage, record);

    console.log(
        `[pipeline] Stored ${city.name} ${date} → ${record.recordId.slice(0, 12)}... (${verdict.alignment})`
    );

    return { record, chart, stored: true };
}

// =============================================================================
// Batch
// =============================================================================

export interface ForecastBatchOptions extends Omit<CityForecastOptions, 'date'> {
    cities: readonly City[];
    /** Fixed target date; default is tomorrow in each city's zone */
    date?: string;
}

export type CityOutcome =
    | { status: 'ok'; city: string; date: string; record: ForecastRecord; chart: Uint8Array | null; stored: boolean }
    | { status: 'failed'; city: string; date: string; code: FusionErrorCode | 'UNEXPECTED'; message: string };

export async function runForecastBatch(options: ForecastBatchOptions): Promise<CityOutcome[]> {
    const { cities, date: fixedDate, ...cityOptions } = options;
    const outcomes: CityOutcome[] = [];

    for (const city of cities) {
        let date = fixedDate ?? '';
        try {
            date = fixedDate ?? tomorrowIn(city.timezone, cityOptions.now);
            const result = await runCityForecast(city, { ...cityOptions, date });
            outcomes.push({ status: 'ok', city: city.name, date, ...result });
        } catch (error) {
            const code = isFusionError(error) ? error.code : 'UNEXPECTED';
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[pipeline] ${city.name} failed (${code}): ${message}`);
            outcomes.push({ status: 'failed', city: city.name, date, code, message });
        }
    }

    const succeeded = outcomes.filter((outcome) => outcome.status === 'ok').length;
    console.log(`[pipeline] Batch complete: ${succeeded}/${cities.length} cities`);

    return outcomes;
}
