/**
 * Forecast Fusion — Core Type Definitions
 *
 * Everything the pipeline produces or consumes for one city/day.
 * Times are local wall-clock keys ("YYYY-MM-DDTHH:mm") in the city's zone;
 * dates are "YYYY-MM-DD".
 */

// =============================================================================
// Inputs
// =============================================================================

export type SourceRole = 'primary' | 'secondary';

export interface RawSample {
    time: string;
    temperatureC: number;
    rainProbabilityPct: number;
}

/**
 * Ordered samples from one provider for one city/day.
 * Invariant: strictly increasing `time`, every sample on the target date.
 */
export interface SourceSeries {
    source: SourceRole;
    /** Provider identifier (e.g. "openweather", "weatherapi") */
    provider: string;
    samples: RawSample[];
}

/**
 * A forecast scraped from an independent site.
 * Both values null = the reference could not be obtained.
 */
export interface ReferencePoint {
    source: string;
    temperatureC: number | null;
    rainProbabilityPct: number | null;
    /** What the temperature measures, when it is not a daytime average */
    basis?: string;
}

export interface City {
    name: string;
    latitude: number;
    longitude: number;
    /** IANA zone the window is expressed in */
    timezone: string;
}

// =============================================================================
// Normalized series
// =============================================================================

export interface SlotReading {
    temperatureC: number;
    rainProbabilityPct: number;
    /** Time of the sample the reading came from */
    sampledAt: string;
    /** True when the nearest-earlier fallback supplied the reading */
    substituted: boolean;
}

export interface AlignedSlot {
    time: string;
    hour: number;
    primary: SlotReading | null;
    secondary: SlotReading | null;
}

// =============================================================================
// Non-fatal issues
// =============================================================================

export interface MissingSlotValue {
    kind: 'missing_slot_value';
    time: string;
    source: SourceRole;
}

export interface ReferenceUnavailable {
    kind: 'reference_unavailable';
    source: string;
    reason: string;
}

export type PipelineIssue = MissingSlotValue | ReferenceUnavailable;

// =============================================================================
// Outputs
// =============================================================================

export interface DaySummary {
    avgTempC: number;
    tempRangeC: number;
    /** Whole percent */
    avgRainPct: number;
    rainRangePct: number;
    highTempC: number;
    lowTempC: number;
    windowStart: string;
    windowEnd: string;
}

export interface DisagreementRanges {
    tempRangeC: number;
    rainRangePct: number;
}

export type DisagreementTier = 'low' | 'medium' | 'high';

export type Alignment = 'full' | 'partial' | 'divergent';

export interface AlignmentVerdict {
    alignment: Alignment;
    /** Alignment implied by the two feeds alone */
    prior: Alignment;
    agreeing: string[];
    disagreeing: string[];
    unavailable: string[];
    /** Presentation only; nothing branches on it */
    rationale: string;
}

export const CURRENT_RECORD_SCHEMA_VERSION = 1;

export interface ForecastRecord {
    schemaVersion: number;
    /** BLAKE3 of the canonical JSON of every other field */
    recordId: string;
    city: string;
    date: string;
    timezone: string;
    generatedAt: string;
    summary: DaySummary;
    slots: AlignedSlot[];
    references: ReferencePoint[];
    verdict: AlignmentVerdict;
    /** Storage key of the rendered chart */
    chartKey: string;
    issues: PipelineIssue[];
}
