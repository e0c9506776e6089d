/**
 * Daily forecast run: fuse tomorrow's forecast for every configured city,
 * store the records and charts, and push one notification per city.
 *
 * Exits non-zero only when every city failed.
 */
/* eslint-disable no-console */
import 'dotenv/config';
import { loadFusionConfig } from '../fusion/config';
import { loadRunConfig } from '../fusion/ingest/config';
import { runForecastBatch } from '../fusion/ingest/pipeline';
import { createOpenWeatherProvider, createWeatherApiProvider } from '../fusion/ingest/providers';
import { createOpenMeteoReference, createYrReference } from '../fusion/ingest/references';
import { FileStorage } from '../fusion/ingest/storage';
import { sendPushover } from '../fusion/notify/pushover';
import { formatSummary, notificationTitle } from '../fusion/notify/summary';

async function main(): Promise<number> {
    const run = loadRunConfig();
    const fusion = loadFusionConfig();
    const timeoutMs = run.fetchTimeoutMs;

    const outcomes = await runForecastBatch({
        cities: run.cities,
        storage: new FileStorage(run.outputDir),
        primary: createOpenWeatherProvider({ apiKey: run.openWeatherApiKey, timeoutMs }),
        secondary: createWeatherApiProvider({ apiKey: run.weatherApiKey, timeoutMs }),
        references: [createYrReference(), createOpenMeteoReference()],
        fusion,
        timeoutMs
    });

    for (const outcome of outcomes) {
        if (outcome.status !== 'ok') continue;
        if (!run.pushover) {
            console.log(formatSummary(outcome.record));
            continue;
        }
        try {
            await sendPushover(formatSummary(outcome.record), outcome.chart, run.pushover, {
                title: notificationTitle(outcome.date),
                timeoutMs
            });
        } catch (error) {
            console.warn(`[notify] ${outcome.city} notification failed:`, error);
        }
    }

    return outcomes.some((outcome) => outcome.status === 'ok') ? 0 : 1;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error('[pipeline] Run aborted:', error);
        process.exitCode = 1;
    });
