import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProviderError } from '../errors';
import {
    createOpenWeatherProvider,
    createWeatherApiProvider,
    parseOpenWeatherForecast,
    parseWeatherApiForecast
} from '../ingest/providers';
import { DATE, PARIS } from './fixtures';

/** Epoch seconds for a UTC wall-clock time on 2026-10-xx */
function utc(day: number, hour: number): number {
    return Date.UTC(2026, 9, day, hour, 0) / 1000;
}

const OPENWEATHER_BODY = {
    cod: '200',
    list: [
        // Paris is UTC+2 on these dates
        { dt: utc(20, 10), main: { temp: 15.2 }, pop: 0.35 },
        { dt: utc(20, 7), main: { temp: 11.4 }, pop: 0 },
        { dt: utc(19, 7), main: { temp: 9.9 }, pop: 0.1 },
        { dt: utc(20, 7), main: { temp: 99 }, pop: 0 },
        { dt: utc(20, 13), main: {} },
        { dt: utc(20, 16), main: { temp: '14.0' } }
    ]
};

const WEATHERAPI_BODY = {
    forecast: {
        forecastday: [
            { date: '2026-10-19', hour: [{ time: '2026-10-19 09:00', temp_c: 8, chance_of_rain: 0 }] },
            {
                date: DATE,
                hour: [
                    { time: '2026-10-20 09:00', temp_c: 11.8, chance_of_rain: 12 },
                    { time: '2026-10-20 10:00', temp_c: 12.6, chance_of_rain: 20 },
                    { time: 'not a time', temp_c: 13, chance_of_rain: 0 },
                    { time: '2026-10-20 11:00', temp_c: null, chance_of_rain: 5 }
                ]
            }
        ]
    }
};

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
    return new Response(JSON.stringify(body), { status, statusText, headers: { 'content-type': 'application/json' } });
}

describe('parseOpenWeatherForecast', () => {

    it('keeps the target date in local time, sorted and de-duplicated', () => {
        expect(parseOpenWeatherForecast(OPENWEATHER_BODY, DATE, 'Europe/Paris')).toEqual([
            { time: '2026-10-20T09:00', temperatureC: 11.4, rainProbabilityPct: 0 },
            { time: '2026-10-20T12:00', temperatureC: 15.2, rainProbabilityPct: 35 },
            { time: '2026-10-20T18:00', temperatureC: 14, rainProbabilityPct: 0 }
        ]);
    });

    it('rejects a body without a forecast list', () => {
        expect(() => parseOpenWeatherForecast({ cod: '401' }, DATE, 'Europe/Paris')).toThrow(
            'openweather: response has no forecast list'
        );
    });
});

describe('parseWeatherApiForecast', () => {

    it('reads the hourly entries of the target day', () => {
        expect(parseWeatherApiForecast(WEATHERAPI_BODY, DATE)).toEqual([
            { time: '2026-10-20T09:00', temperatureC: 11.8, rainProbabilityPct: 12 },
            { time: '2026-10-20T10:00', temperatureC: 12.6, rainProbabilityPct: 20 }
        ]);
    });

    it('rejects a body without forecast days', () => {
        expect(() => parseWeatherApiForecast({ error: { message: 'bad key' } }, DATE)).toThrow(ProviderError);
    });
});

describe('provider adapters', () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('fetches the primary series from OpenWeather', async () => {
        fetchMock.mockResolvedValue(jsonResponse(OPENWEATHER_BODY));

        const provider = createOpenWeatherProvider({ apiKey: 'test-secret' });
        const result = await provider.fetchSeries(PARIS, DATE);

        expect(provider.role).toBe('primary');
        expect(result.source).toBe('primary');
        expect(result.provider).toBe('openweather');
        expect(result.samples).toHaveLength(3);

        const url = new URL(String(fetchMock.mock.calls[0][0]));
        expect(url.origin + url.pathname).toBe('https://api.openweathermap.org/data/2.5/forecast');
        expect(url.searchParams.get('lat')).toBe('48.8566');
        expect(url.searchParams.get('lon')).toBe('2.3522');
        expect(url.searchParams.get('units')).toBe('metric');
        expect(url.searchParams.get('appid')).toBe('test-secret');
    });

    it('fetches the secondary series from WeatherAPI', async () => {
        fetchMock.mockResolvedValue(jsonResponse(WEATHERAPI_BODY));

        const result = await createWeatherApiProvider({ apiKey: 'test-secret' }).fetchSeries(PARIS, DATE);

        expect(result.source).toBe('secondary');
        expect(result.samples.map((sample) => sample.time)).toEqual(['2026-10-20T09:00', '2026-10-20T10:00']);

        const url = new URL(String(fetchMock.mock.calls[0][0]));
        expect(url.searchParams.get('key')).toBe('test-secret');
        expect(url.searchParams.get('q')).toBe('48.8566,2.3522');
        expect(url.searchParams.get('days')).toBe('2');
    });

    it('wraps HTTP failures in ProviderError', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ message: 'nope' }, 503, 'Service Unavailable'));

        const pending = createOpenWeatherProvider({ apiKey: 'test-secret' }).fetchSeries(PARIS, DATE);
        await expect(pending).rejects.toThrow(ProviderError);
        await expect(pending).rejects.toThrow('openweather: fetch failed: 503 Service Unavailable');
    });

    it('wraps network errors and bad JSON in ProviderError', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
        await expect(createWeatherApiProvider({ apiKey: 'test-secret' }).fetchSeries(PARIS, DATE)).rejects.toThrow(
            'weatherapi: request failed: TypeError: fetch failed'
        );

        fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));
        await expect(createWeatherApiProvider({ apiKey: 'test-secret' }).fetchSeries(PARIS, DATE)).rejects.toThrow(
            'weatherapi: response is not valid JSON'
        );
    });

    it('times out a hanging request', async () => {
        fetchMock.mockImplementation(
            (_input, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
                })
        );

        await expect(
            createOpenWeatherProvider({ apiKey: 'test-secret', timeoutMs: 5 }).fetchSeries(PARIS, DATE)
        ).rejects.toThrow('openweather: timed out after 5ms');
    });
});
