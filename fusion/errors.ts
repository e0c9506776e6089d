/**
 * Forecast Fusion — Fatal errors.
 *
 * Each of these aborts the affected city's run only. Non-fatal conditions are
 * plain values (see PipelineIssue in ./types).
 */

import type { SourceRole } from './types';

export type FusionErrorCode = 'INCOMPLETE_WINDOW' | 'INVALID_SERIES' | 'PROVIDER_FAILED';

export class FusionError extends Error {
    constructor(
        readonly code: FusionErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class IncompleteWindowError extends FusionError {
    constructor(
        message: string,
        readonly source?: SourceRole
    ) {
        super('INCOMPLETE_WINDOW', message);
    }
}

export class InvalidSeriesError extends FusionError {
    constructor(
        message: string,
        readonly source: SourceRole
    ) {
        super('INVALID_SERIES', message);
    }
}

export class ProviderError extends FusionError {
    constructor(
        readonly provider: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super('PROVIDER_FAILED', `${provider}: ${message}`, options);
    }
}

export function isFusionError(error: unknown): error is FusionError {
    return error instanceof FusionError;
}
