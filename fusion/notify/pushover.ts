/**
 * Pushover delivery: one message per city with the chart attached.
 */
/* eslint-disable no-console */

import { ProviderError } from '../errors';
import { isRecord, postForm, type FetchOptions } from '../ingest/http';
import type { PushoverConfig } from '../ingest/config';

const PUSHOVER_ENDPOINT = 'https://api.pushover.net/1/messages.json';

export interface PushoverMessageOptions {
    title?: string;
    priority?: -2 | -1 | 0 | 1 | 2;
    attachmentName?: string;
    timeoutMs?: number;
}

/**
 * @throws ProviderError on a non-2xx reply or a reply without `status: 1`
 */
export async function sendPushover(
    message: string,
    attachment: Uint8Array | null,
    config: PushoverConfig,
    options: PushoverMessageOptions = {}
): Promise<void> {
    const form = new FormData();
    form.append('token', config.token);
    form.append('user', config.user);
    form.append('message', message);
    form.append('priority', String(options.priority ?? 0));
    if (options.title) {
        form.append('title', options.title);
    }
    if (attachment) {
        form.append('attachment', new Blob([attachment.slice()], { type: 'image/png' }), options.attachmentName ?? 'forecast.png');
    }

    const fetchOptions: FetchOptions = { timeoutMs: options.timeoutMs };
    const text = await postForm(PUSHOVER_ENDPOINT, 'pushover', form, fetchOptions);

    let reply: unknown;
    try {
        reply = JSON.parse(text);
    } catch (error) {
        throw new ProviderError('pushover', 'reply is not valid JSON', { cause: error });
    }
    if (!isRecord(reply) || reply.status !== 1) {
        throw new ProviderError('pushover', `message rejected: ${text}`);
    }

    console.log('[notify] Pushover message sent');
}
