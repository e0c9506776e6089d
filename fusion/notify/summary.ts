/**
 * One-message summary per city for push notifications.
 */

import type { ForecastRecord } from '../types';

export type Condition = 'rain' | 'cloud' | 'clear';

const CONDITION_EMOJI: Record<Condition, string> = {
    rain: '🌧️',
    cloud: '⛅',
    clear: '☀️'
};

export const UNCERTAINTY_FLAG = '⚠️ Forecast uncertain';

export function conditionForRain(avgRainPct: number): Condition {
    if (avgRainPct > 30) return 'rain';
    if (avgRainPct > 5) return 'cloud';
    return 'clear';
}

/**
 * e.g.
 * Paris: ⛅ Avg 17.3°C (1°C range), 12% rain (5% range)
 * High 20°C / Low 14°C
 * Alignment: full
 */
export function formatSummary(record: ForecastRecord): string {
    const { summary, verdict } = record;
    const emoji = CONDITION_EMOJI[conditionForRain(summary.avgRainPct)];

    const lines = [
        `${record.city}: ${emoji} Avg ${summary.avgTempC.toFixed(1)}°C (${summary.tempRangeC.toFixed(0)}°C range), ` +
            `${summary.avgRainPct}% rain (${summary.rainRangePct.toFixed(0)}% range)`,
        `High ${summary.highTempC.toFixed(0)}°C / Low ${summary.lowTempC.toFixed(0)}°C`,
        `Alignment: ${verdict.alignment}`
    ];
    if (verdict.alignment === 'divergent') {
        lines.push(UNCERTAINTY_FLAG);
    }
    return lines.join('\n');
}

export function notificationTitle(date: string): string {
    return `Daily Forecast – ${date}`;
}
