/**
 * Run configuration for the daily batch: provider keys, cities, output
 * directory, fetch timeout and notification credentials.
 */

import { isValidTimeZone } from '../time';
import type { City } from '../types';
import { DEFAULT_FETCH_TIMEOUT_MS } from './http';

export interface PushoverConfig {
    token: string;
    user: string;
}

export interface RunConfig {
    openWeatherApiKey: string;
    weatherApiKey: string;
    cities: City[];
    outputDir: string;
    fetchTimeoutMs: number;
    /** Null when notifications are not configured */
    pushover: PushoverConfig | null;
}

export const DEFAULT_CITIES: readonly City[] = [
    { name: 'Brussels', latitude: 50.8503, longitude: 4.3517, timezone: 'Europe/Brussels' },
    { name: 'Paris', latitude: 48.8566, longitude: 2.3522, timezone: 'Europe/Paris' }
];

const DEFAULT_OUTPUT_DIR = './data';

function getEnvVar(env: NodeJS.ProcessEnv, name: string, fallback?: string): string | undefined {
    const value = env[name];
    if (value && value.trim().length > 0) {
        return value.trim();
    }
    return fallback;
}

function requireEnvVar(env: NodeJS.ProcessEnv, name: string): string {
    const value = getEnvVar(env, name);
    if (!value) {
        throw new Error(`${name} must be set`);
    }
    return value;
}

function getTimeoutMs(env: NodeJS.ProcessEnv): number {
    const raw = getEnvVar(env, 'FETCH_TIMEOUT_MS');
    if (!raw) {
        return DEFAULT_FETCH_TIMEOUT_MS;
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_FETCH_TIMEOUT_MS;
}

/**
 * Parse "Name:lat:lon:Zone;Name:lat:lon:Zone".
 */
export function parseCities(raw: string): City[] {
    return raw
        .split(';')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
        .map((entry) => {
            const [name, lat, lon, timezone] = entry.split(':').map((part) => part.trim());
            const latitude = Number(lat);
            const longitude = Number(lon);
            if (
                !name ||
                !Number.isFinite(latitude) ||
                !Number.isFinite(longitude) ||
                Math.abs(latitude) > 90 ||
                Math.abs(longitude) > 180
            ) {
                throw new Error(`Invalid city entry "${entry}" (expected Name:lat:lon:Zone)`);
            }
            if (!timezone || !isValidTimeZone(timezone)) {
                throw new Error(`Invalid time zone in city entry "${entry}"`);
            }
            return { name, latitude, longitude, timezone };
        });
}

export function loadRunConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
    const citiesRaw = getEnvVar(env, 'FUSION_CITIES');
    const cities = citiesRaw ? parseCities(citiesRaw) : DEFAULT_CITIES.map((city) => ({ ...city }));
    if (cities.length === 0) {
        throw new Error('FUSION_CITIES lists no cities');
    }

    const token = getEnvVar(env, 'PUSHOVER_TOKEN');
    const user = getEnvVar(env, 'PUSHOVER_USER');

    return {
        openWeatherApiKey: requireEnvVar(env, 'OPENWEATHER_API_KEY'),
        weatherApiKey: requireEnvVar(env, 'WEATHERAPI_API_KEY'),
        cities,
        outputDir: getEnvVar(env, 'OUTPUT_DIR', DEFAULT_OUTPUT_DIR) ?? DEFAULT_OUTPUT_DIR,
        fetchTimeoutMs: getTimeoutMs(env),
        pushover: token && user ? { token, user } : null
    };
}
