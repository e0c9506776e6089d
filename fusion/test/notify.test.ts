import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { aggregateDay } from '../aggregate';
import { corroborate } from '../corroborate';
import { ProviderError } from '../errors';
import { sendPushover } from '../notify/pushover';
import { conditionForRain, formatSummary, notificationTitle } from '../notify/summary';
import { chartKey, createForecastRecord } from '../record';
import type { Alignment, DaySummary } from '../types';
import { DATE, PARIS, SAMPLE_SLOTS } from './fixtures';

function recordWith(summary: DaySummary, alignment: Alignment) {
    const verdict = corroborate({ summary, prior: 'medium', references: [] });
    return createForecastRecord({
        city: PARIS,
        date: DATE,
        generatedAt: new Date('2026-10-19T18:00:00.000Z'),
        summary,
        slots: SAMPLE_SLOTS,
        references: [],
        verdict: { ...verdict, alignment },
        chartKey: chartKey(DATE, PARIS.name),
        issues: []
    });
}

describe('formatSummary', () => {

    it('writes one message per city', () => {
        // avg 12.7 °C, 14 % rain, ranges 2 °C / 20 pp, high 16, low 9
        const record = recordWith(aggregateDay(SAMPLE_SLOTS), 'partial');

        expect(formatSummary(record)).toBe(
            'Paris: ⛅ Avg 12.7°C (2°C range), 14% rain (20% range)\n' +
            'High 16°C / Low 9°C\n' +
            'Alignment: partial'
        );
    });

    it('flags a divergent forecast as uncertain', () => {
        const summary: DaySummary = {
            avgTempC: 21.25,
            tempRangeC: 4.2,
            avgRainPct: 45,
            rainRangePct: 35,
            highTempC: 26.4,
            lowTempC: 15.6,
            windowStart: '2026-10-20T09:00',
            windowEnd: '2026-10-20T21:00'
        };

        expect(formatSummary(recordWith(summary, 'divergent'))).toBe(
            'Paris: 🌧️ Avg 21.3°C (4°C range), 45% rain (35% range)\n' +
            'High 26°C / Low 16°C\n' +
            'Alignment: divergent\n' +
            '⚠️ Forecast uncertain'
        );
    });

    it('picks the condition from the average rain', () => {
        expect(conditionForRain(31)).toBe('rain');
        expect(conditionForRain(30)).toBe('cloud');
        expect(conditionForRain(6)).toBe('cloud');
        expect(conditionForRain(5)).toBe('clear');
    });

    it('titles the notification with the date', () => {
        expect(notificationTitle(DATE)).toBe('Daily Forecast – 2026-10-20');
    });
});

describe('sendPushover', () => {
    const fetchMock = vi.fn<typeof fetch>();
    const config = { token: 'test-token', user: 'test-user' };

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('posts the message with the chart attached', async () => {
        fetchMock.mockResolvedValue(new Response(JSON.stringify({ status: 1, request: 'req-1' }), { status: 200 }));

        await sendPushover('Paris: ☀️ Avg 20.0°C', new Uint8Array([1, 2, 3]), config, { title: 'Daily Forecast' });

        const [url, init] = fetchMock.mock.calls[0];
        expect(String(url)).toBe('https://api.pushover.net/1/messages.json');
        expect(init?.method).toBe('POST');

        const body = init?.body;
        if (!(body instanceof FormData)) throw new Error('expected a multipart body');
        expect(body.get('token')).toBe('test-token');
        expect(body.get('user')).toBe('test-user');
        expect(body.get('message')).toBe('Paris: ☀️ Avg 20.0°C');
        expect(body.get('title')).toBe('Daily Forecast');
        expect(body.get('priority')).toBe('0');

        const attachment = body.get('attachment');
        if (!(attachment instanceof Blob)) throw new Error('expected an attachment');
        expect(attachment.type).toBe('image/png');
        expect(Array.from(new Uint8Array(await attachment.arrayBuffer()))).toEqual([1, 2, 3]);
    });

    it('sends without an attachment', async () => {
        fetchMock.mockResolvedValue(new Response(JSON.stringify({ status: 1 }), { status: 200 }));

        await sendPushover('hello', null, config);

        const body = fetchMock.mock.calls[0][1]?.body;
        if (!(body instanceof FormData)) throw new Error('expected a multipart body');
        expect(body.has('attachment')).toBe(false);
        expect(body.has('title')).toBe(false);
    });

    it('raises on a rejected message', async () => {
        fetchMock.mockResolvedValueOnce(
            new Response(JSON.stringify({ status: 0, errors: ['user identifier is invalid'] }), {
                status: 400,
                statusText: 'Bad Request'
            })
        );
        await expect(sendPushover('hello', null, config)).rejects.toThrow('pushover: fetch failed: 400 Bad Request');

        fetchMock.mockResolvedValueOnce(new Response('{"status":0}', { status: 200 }));
        const pending = sendPushover('hello', null, config);
        await expect(pending).rejects.toThrow(ProviderError);
        await expect(pending).rejects.toThrow('pushover: message rejected: {"status":0}');
    });
});
