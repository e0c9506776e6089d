/**
 * Forecast Fusion — Forecast Records
 *
 * A record is created once per city per run and never mutated afterwards.
 * Its ID is the BLAKE3 hash of the canonical JSON of every other field, so
 * re-running on identical inputs (and clock) yields the same ID.
 */

import { canonicalJsonBytes, sortKeys } from './canonical';
import { hashHex, verifyHash } from './hash';
import {
    CURRENT_RECORD_SCHEMA_VERSION,
    type AlignedSlot,
    type AlignmentVerdict,
    type City,
    type DaySummary,
    type ForecastRecord,
    type PipelineIssue,
    type ReferencePoint
} from './types';

export interface ForecastRecordInput {
    city: City;
    date: string;
    generatedAt: Date;
    summary: DaySummary;
    slots: readonly AlignedSlot[];
    references: readonly ReferencePoint[];
    verdict: AlignmentVerdict;
    chartKey: string;
    issues: readonly PipelineIssue[];
}

// =============================================================================
// Storage keys
// =============================================================================

export function citySlug(name: string): string {
    return name
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export function recordKey(date: string, cityName: string): string {
    return `records/${date}/${citySlug(cityName)}.json`;
}

export function chartKey(date: string, cityName: string): string {
    return `charts/${date}/${citySlug(cityName)}.png`;
}

/** Mutable pointer to the newest record for a city. */
export function latestRecordKey(cityName: string): string {
    return `records/latest/${citySlug(cityName)}.json`;
}

// =============================================================================
// Creation
// =============================================================================

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

export function computeRecordId(content: Omit<ForecastRecord, 'recordId'>): string {
    return hashHex(canonicalJsonBytes(content));
}

export function createForecastRecord(input: ForecastRecordInput): ForecastRecord {
    // structuredClone detaches the record from caller-owned arrays before freezing.
    const content: Omit<ForecastRecord, 'recordId'> = structuredClone({
        schemaVersion: CURRENT_RECORD_SCHEMA_VERSION,
        city: input.city.name,
        date: input.date,
        timezone: input.city.timezone,
        generatedAt: input.generatedAt.toISOString(),
        summary: input.summary,
        slots: [...input.slots],
        references: [...input.references],
        verdict: input.verdict,
        chartKey: input.chartKey,
        issues: [...input.issues]
    });

    return deepFreeze({ recordId: computeRecordId(content), ...content });
}

// =============================================================================
// Serialization
// =============================================================================

export function serializeRecord(record: ForecastRecord): string {
    return JSON.stringify(sortKeys(record), null, 2);
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isForecastRecord(value: unknown): value is ForecastRecord {
    if (!isObject(value)) return false;
    return (
        typeof value.schemaVersion === 'number' &&
        typeof value.recordId === 'string' &&
        typeof value.city === 'string' &&
        typeof value.date === 'string' &&
        typeof value.timezone === 'string' &&
        typeof value.generatedAt === 'string' &&
        isObject(value.summary) &&
        Array.isArray(value.slots) &&
        Array.isArray(value.references) &&
        isObject(value.verdict) &&
        typeof value.verdict.alignment === 'string' &&
        typeof value.chartKey === 'string' &&
        Array.isArray(value.issues)
    );
}

/**
 * Parse a stored record and check its ID against its content.
 */
export function parseRecord(text: string): ForecastRecord {
    const parsed: unknown = JSON.parse(text);
    if (!isForecastRecord(parsed)) {
        throw new Error('Stored record does not match the forecast record shape');
    }
    if (parsed.schemaVersion > CURRENT_RECORD_SCHEMA_VERSION) {
        throw new Error(`Record schema version ${parsed.schemaVersion} is unsupported (max: ${CURRENT_RECORD_SCHEMA_VERSION})`);
    }

    const { recordId, ...content } = parsed;
    if (!verifyHash(canonicalJsonBytes(content), recordId)) {
        throw new Error('Integrity check failed: record ID mismatch');
    }
    return deepFreeze(parsed);
}
