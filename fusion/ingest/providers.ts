/**
 * Forecast Fusion — Provider Adapters
 *
 * Fetches the two forecast feeds and turns each provider's wire format into a
 * SourceSeries for one local date. Minimal transformation: local timestamps,
 * °C and rain probability in percent.
 *
 * - primary:   OpenWeather 5 day / 3 hour forecast
 * - secondary: WeatherAPI hourly forecast
 */
/* eslint-disable no-console */

import { ProviderError } from '../errors';
import { epochToLocalKey, formatDateTimeKey, parseDateTimeKey } from '../time';
import type { City, RawSample, SourceRole, SourceSeries } from '../types';
import { fetchJson, isRecord, toFiniteNumber, type FetchOptions } from './http';

// =============================================================================
// Configuration
// =============================================================================

const OPENWEATHER_ENDPOINT = 'https://api.openweathermap.org/data/2.5/forecast';
const WEATHERAPI_ENDPOINT = 'https://api.weatherapi.com/v1/forecast.json';

export interface ForecastProvider {
    id: string;
    role: SourceRole;
    fetchSeries(city: City, date: string): Promise<SourceSeries>;
}

export interface ProviderCredentials {
    apiKey: string;
    timeoutMs?: number;
}

// =============================================================================
// Shared
// =============================================================================

/**
 * Keep samples on the date, in time order, first sample wins on duplicates.
 */
function finalizeSamples(samples: RawSample[], date: string): RawSample[] {
    const seen = new Set<string>();
    return samples
        .filter((sample) => sample.time.startsWith(`${date}T`))
        .sort((a, b) => (a.time < b.time ? -1 : a.time > b.time ? 1 : 0))
        .filter((sample) => {
            if (seen.has(sample.time)) return false;
            seen.add(sample.time);
            return true;
        });
}

// =============================================================================
// OpenWeather (primary)
// =============================================================================

/**
 * `list[].dt` is epoch seconds; `pop` is a 0–1 probability.
 */
export function parseOpenWeatherForecast(body: unknown, date: string, timeZone: string): RawSample[] {
    if (!isRecord(body) || !Array.isArray(body.list)) {
        throw new ProviderError('openweather', 'response has no forecast list');
    }

    const samples: RawSample[] = [];
    for (const item of body.list) {
        if (!isRecord(item) || !isRecord(item.main)) continue;
        const dt = toFiniteNumber(item.dt);
        const temperatureC = toFiniteNumber(item.main.temp);
        if (dt === null || temperatureC === null) continue;

        const time = epochToLocalKey(dt, timeZone);
        if (!time) continue;

        const pop = toFiniteNumber(item.pop) ?? 0;
        samples.push({ time, temperatureC, rainProbabilityPct: Math.round(pop * 100) });
    }

    return finalizeSamples(samples, date);
}

export async function fetchPrimarySeries(
    city: City,
    date: string,
    credentials: ProviderCredentials
): Promise<SourceSeries> {
    const params = new URLSearchParams({
        lat: city.latitude.toString(),
        lon: city.longitude.toString(),
        units: 'metric',
        appid: credentials.apiKey
    });
    const options: FetchOptions = { timeoutMs: credentials.timeoutMs };
    const body = await fetchJson(`${OPENWEATHER_ENDPOINT}?${params}`, 'openweather', options);
    const samples = parseOpenWeatherForecast(body, date, city.timezone);
    console.log(`[providers] openweather: ${samples.length} samples for ${city.name} on ${date}`);
    return { source: 'primary', provider: 'openweather', samples };
}

export function createOpenWeatherProvider(credentials: ProviderCredentials): ForecastProvider {
    return {
        id: 'openweather',
        role: 'primary',
        fetchSeries: (city, date) => fetchPrimarySeries(city, date, credentials)
    };
}

// =============================================================================
// WeatherAPI (secondary)
// =============================================================================

/**
 * `forecast.forecastday[].hour[].time` is already local ("YYYY-MM-DD HH:mm").
 */
export function parseWeatherApiForecast(body: unknown, date: string): RawSample[] {
    const forecast = isRecord(body) ? body.forecast : undefined;
    if (!isRecord(forecast) || !Array.isArray(forecast.forecastday)) {
        throw new ProviderError('weatherapi', 'response has no forecast days');
    }

    const samples: RawSample[] = [];
    for (const day of forecast.forecastday) {
        if (!isRecord(day) || day.date !== date || !Array.isArray(day.hour)) continue;

        for (const hour of day.hour) {
            if (!isRecord(hour) || typeof hour.time !== 'string') continue;
            const parts = parseDateTimeKey(hour.time);
            const temperatureC = toFiniteNumber(hour.temp_c);
            const rain = toFiniteNumber(hour.chance_of_rain);
            if (!parts || temperatureC === null || rain === null) continue;

            samples.push({ time: formatDateTimeKey(parts), temperatureC, rainProbabilityPct: rain });
        }
    }

    return finalizeSamples(samples, date);
}

export async function fetchSecondarySeries(
    city: City,
    date: string,
    credentials: ProviderCredentials
): Promise<SourceSeries> {
    const params = new URLSearchParams({
        key: credentials.apiKey,
        q: `${city.latitude},${city.longitude}`,
        days: '2',
        aqi: 'no',
        alerts: 'no'
    });
    const options: FetchOptions = { timeoutMs: credentials.timeoutMs };
    const body = await fetchJson(`${WEATHERAPI_ENDPOINT}?${params}`, 'weatherapi', options);
    const samples = parseWeatherApiForecast(body, date);
    console.log(`[providers] weatherapi: ${samples.length} samples for ${city.name} on ${date}`);
    return { source: 'secondary', provider: 'weatherapi', samples };
}

export function createWeatherApiProvider(credentials: ProviderCredentials): ForecastProvider {
    return {
        id: 'weatherapi',
        role: 'secondary',
        fetchSeries: (city, date) => fetchSecondarySeries(city, date, credentials)
    };
}
