/**
 * Forecast Fusion — HTTP helper for provider and reference fetches.
 * Every request is bounded by a timeout; failures surface as ProviderError.
 */

import { ProviderError } from '../errors';

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

export interface FetchOptions {
    timeoutMs?: number;
    headers?: Record<string, string>;
}

async function fetchWithTimeout(
    url: string,
    label: string,
    options: FetchOptions,
    body?: FormData
): Promise<Response> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(url, {
            method: body ? 'POST' : 'GET',
            body,
            signal: controller.signal,
            headers: options.headers
        });
        if (!response.ok) {
            throw new ProviderError(label, `fetch failed: ${response.status} ${response.statusText}`);
        }
        return response;
    } catch (error) {
        if (error instanceof ProviderError) throw error;
        if (controller.signal.aborted) {
            throw new ProviderError(label, `timed out after ${timeoutMs}ms`, { cause: error });
        }
        throw new ProviderError(label, `request failed: ${String(error)}`, { cause: error });
    } finally {
        clearTimeout(timeoutId);
    }
}

export async function fetchJson(url: string, label: string, options: FetchOptions = {}): Promise<unknown> {
    const response = await fetchWithTimeout(url, label, options);
    try {
        const body: unknown = await response.json();
        return body;
    } catch (error) {
        throw new ProviderError(label, 'response is not valid JSON', { cause: error });
    }
}

export async function fetchText(url: string, label: string, options: FetchOptions = {}): Promise<string> {
    const response = await fetchWithTimeout(url, label, options);
    return response.text();
}

/**
 * Multipart POST; the reply body is returned as text.
 */
export async function postForm(
    url: string,
    label: string,
    form: FormData,
    options: FetchOptions = {}
): Promise<string> {
    const response = await fetchWithTimeout(url, label, options, form);
    return response.text();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toFiniteNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}
