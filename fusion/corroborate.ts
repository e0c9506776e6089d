/**
 * Forecast Fusion — Reference Corroborator
 *
 * Moves the two-feed alignment one step toward `full` or `divergent` when a
 * strict majority of available references agrees or disagrees with the fused
 * average. The rationale is derived text; nothing branches on it.
 */

import { DEFAULT_THRESHOLDS, type DisagreementThresholds } from './config';
import { tierToAlignment, withinBand } from './uncertainty';
import type {
    Alignment,
    AlignmentVerdict,
    DaySummary,
    DisagreementTier,
    MissingSlotValue,
    PipelineIssue,
    ReferencePoint,
    ReferenceUnavailable
} from './types';

export type ReferenceStanding = 'agrees' | 'disagrees' | 'neutral' | 'unavailable';

export interface ReferenceAssessment {
    source: string;
    standing: ReferenceStanding;
    tempDeltaC: number | null;
    rainDeltaPct: number | null;
}

export interface CorroborateInput {
    summary: DaySummary;
    prior: DisagreementTier;
    references: readonly ReferencePoint[];
    issues?: readonly PipelineIssue[];
    thresholds?: DisagreementThresholds;
}

const ALIGNMENT_ORDER: readonly Alignment[] = ['divergent', 'partial', 'full'];

function shiftAlignment(alignment: Alignment, steps: number): Alignment {
    const index = ALIGNMENT_ORDER.indexOf(alignment);
    const next = Math.max(0, Math.min(ALIGNMENT_ORDER.length - 1, index + steps));
    return ALIGNMENT_ORDER[next];
}

function finiteOrNull(value: number | null): number | null {
    return value !== null && Number.isFinite(value) ? value : null;
}

export function isReferenceAvailable(reference: ReferencePoint): boolean {
    return finiteOrNull(reference.temperatureC) !== null || finiteOrNull(reference.rainProbabilityPct) !== null;
}

/**
 * Compare a reference's present fields with the fused average.
 * Absent fields neither agree nor disagree.
 */
export function assessReference(
    reference: ReferencePoint,
    summary: DaySummary,
    thresholds: DisagreementThresholds = DEFAULT_THRESHOLDS
): ReferenceAssessment {
    if (!isReferenceAvailable(reference)) {
        return { source: reference.source, standing: 'unavailable', tempDeltaC: null, rainDeltaPct: null };
    }

    const temperature = finiteOrNull(reference.temperatureC);
    const rain = finiteOrNull(reference.rainProbabilityPct);

    const tempDeltaC = temperature === null ? null : Math.abs(temperature - summary.avgTempC);
    const rainDeltaPct = rain === null ? null : Math.abs(rain - summary.avgRainPct);

    const agrees = withinBand(tempDeltaC ?? 0, rainDeltaPct ?? 0, thresholds.low);
    const disagrees = !withinBand(tempDeltaC ?? 0, rainDeltaPct ?? 0, thresholds.medium);

    return {
        source: reference.source,
        standing: agrees ? 'agrees' : disagrees ? 'disagrees' : 'neutral',
        tempDeltaC,
        rainDeltaPct
    };
}

function formatList(names: readonly string[]): string {
    return names.length > 0 ? names.join(', ') : 'none';
}

function describeIssues(issues: readonly PipelineIssue[]): string[] {
    const lines: string[] = [];

    const missing = issues
        .filter((issue): issue is MissingSlotValue => issue.kind === 'missing_slot_value')
        .map((issue) => `${issue.source} at ${issue.time.slice(11, 16)}`);
    if (missing.length > 0) {
        lines.push(`Missing feed values: ${missing.join(', ')}.`);
    }

    const unavailable = issues
        .filter((issue): issue is ReferenceUnavailable => issue.kind === 'reference_unavailable')
        .map((issue) => `${issue.source} (${issue.reason})`);
    if (unavailable.length > 0) {
        lines.push(`Unavailable references: ${unavailable.join(', ')}.`);
    }

    return lines;
}

export function corroborate(input: CorroborateInput): AlignmentVerdict {
    const { summary, prior, references, issues = [], thresholds = DEFAULT_THRESHOLDS } = input;
    const priorAlignment = tierToAlignment(prior);
    const assessments = references.map((reference) => assessReference(reference, summary, thresholds));

    const available = assessments.filter((assessment) => assessment.standing !== 'unavailable');
    const agreeing = available.filter((assessment) => assessment.standing === 'agrees').map((a) => a.source);
    const disagreeing = available.filter((assessment) => assessment.standing === 'disagrees').map((a) => a.source);
    const unavailable = assessments.filter((assessment) => assessment.standing === 'unavailable').map((a) => a.source);

    const lines = [
        `Feeds differ by up to ${summary.tempRangeC.toFixed(1)}°C and ${Math.round(summary.rainRangePct)}pp rain (${priorAlignment}).`
    ];

    let alignment = priorAlignment;

    if (available.length === 0) {
        lines.push(`No reference forecasts available; ${priorAlignment} stands.`);
    } else {
        const majority = available.length / 2;
        lines.push(
            `${agreeing.length} of ${available.length} references agree (${formatList(agreeing)}); ` +
            `${disagreeing.length} disagree (${formatList(disagreeing)}).`
        );

        for (const reference of references) {
            if (reference.basis && isReferenceAvailable(reference)) {
                lines.push(`${reference.source} value is the ${reference.basis}.`);
            }
        }

        if (agreeing.length > majority) {
            alignment = shiftAlignment(priorAlignment, 1);
            lines.push(`Majority agrees: ${alignment === priorAlignment ? 'remains' : 'upgraded to'} ${alignment}.`);
        } else if (disagreeing.length > majority) {
            alignment = shiftAlignment(priorAlignment, -1);
            lines.push(`Majority disagrees: ${alignment === priorAlignment ? 'remains' : 'downgraded to'} ${alignment}.`);
        } else {
            lines.push(`No majority: ${priorAlignment} stands.`);
        }
    }

    lines.push(...describeIssues(issues));

    return {
        alignment,
        prior: priorAlignment,
        agreeing,
        disagreeing,
        unavailable,
        rationale: lines.join(' ')
    };
}
