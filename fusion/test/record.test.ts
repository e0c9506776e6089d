import { describe, it, expect } from 'vitest';
import { aggregateDay } from '../aggregate';
import { canonicalJson } from '../canonical';
import { corroborate } from '../corroborate';
import {
    chartKey,
    citySlug,
    createForecastRecord,
    latestRecordKey,
    parseRecord,
    recordKey,
    serializeRecord,
    type ForecastRecordInput
} from '../record';
import { classifyDisagreement } from '../uncertainty';
import { DATE, PARIS, SAMPLE_SLOTS } from './fixtures';

function sampleInput(overrides: Partial<ForecastRecordInput> = {}): ForecastRecordInput {
    const summary = aggregateDay(SAMPLE_SLOTS);
    const references = [{ source: 'yr.no', temperatureC: 13, rainProbabilityPct: 20 }];
    return {
        city: PARIS,
        date: DATE,
        generatedAt: new Date('2026-10-19T18:00:00.000Z'),
        summary,
        slots: SAMPLE_SLOTS,
        references,
        verdict: corroborate({ summary, prior: classifyDisagreement(summary), references }),
        chartKey: chartKey(DATE, PARIS.name),
        issues: [],
        ...overrides
    };
}

describe('Storage keys', () => {

    it('slugs city names', () => {
        expect(citySlug('Paris')).toBe('paris');
        expect(citySlug('Île-de-France')).toBe('ile-de-france');
        expect(citySlug('  São Paulo ')).toBe('sao-paulo');
    });

    it('builds dated and latest keys', () => {
        expect(recordKey(DATE, 'Paris')).toBe('records/2026-10-20/paris.json');
        expect(chartKey(DATE, 'Paris')).toBe('charts/2026-10-20/paris.png');
        expect(latestRecordKey('Paris')).toBe('records/latest/paris.json');
    });
});

describe('createForecastRecord', () => {

    it('derives the same ID from the same inputs', () => {
        const a = createForecastRecord(sampleInput());
        const b = createForecastRecord(sampleInput());

        expect(a.recordId).toMatch(/^[0-9a-f]{64}$/);
        expect(a.recordId).toBe(b.recordId);
        expect(canonicalJson(a)).toBe(canonicalJson(b));
    });

    it('changes the ID when any field changes', () => {
        const base = createForecastRecord(sampleInput());
        const later = createForecastRecord(sampleInput({ generatedAt: new Date('2026-10-19T18:00:01.000Z') }));
        expect(later.recordId).not.toBe(base.recordId);
    });

    it('carries the run context', () => {
        const record = createForecastRecord(sampleInput());

        expect(record.schemaVersion).toBe(1);
        expect(record.city).toBe('Paris');
        expect(record.timezone).toBe('Europe/Paris');
        expect(record.generatedAt).toBe('2026-10-19T18:00:00.000Z');
        expect(record.chartKey).toBe('charts/2026-10-20/paris.png');
        expect(record.slots).toHaveLength(5);
    });

    it('is frozen and detached from its inputs', () => {
        const input = sampleInput();
        const record = createForecastRecord(input);

        expect(Object.isFrozen(record)).toBe(true);
        expect(Object.isFrozen(record.summary)).toBe(true);
        expect(Object.isFrozen(record.slots[0])).toBe(true);
        expect(Object.isFrozen(input.summary)).toBe(false);

        input.summary.avgTempC = 99;
        expect(record.summary.avgTempC).toBeCloseTo(12.7, 10);
    });
});

describe('serializeRecord / parseRecord', () => {

    it('reads back what it wrote', () => {
        const record = createForecastRecord(sampleInput());
        const text = serializeRecord(record);

        expect(text.startsWith('{\n  "chartKey": "charts/2026-10-20/paris.png",')).toBe(true);
        expect(parseRecord(text)).toEqual(record);
    });

    it('rejects a record whose content no longer matches its ID', () => {
        const parsed: unknown = JSON.parse(serializeRecord(createForecastRecord(sampleInput())));
        const tampered = JSON.stringify(parsed).replace('"city":"Paris"', '"city":"Lyon"');

        expect(tampered).toContain('"city":"Lyon"');
        expect(() => parseRecord(tampered)).toThrow('Integrity check failed: record ID mismatch');
    });

    it('rejects newer schema versions and foreign shapes', () => {
        const record = createForecastRecord(sampleInput());
        const future = serializeRecord(record).replace('"schemaVersion": 1', '"schemaVersion": 2');

        expect(() => parseRecord(future)).toThrow('Record schema version 2 is unsupported (max: 1)');
        expect(() => parseRecord('{"city":"Paris"}')).toThrow('Stored record does not match the forecast record shape');
    });
});
