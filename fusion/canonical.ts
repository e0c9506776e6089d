/**
 * Forecast Fusion — Canonical Serialization
 *
 * Record identity requires deterministic serialization: the same logical
 * record must always produce identical bytes.
 */

/**
 * Recursively sort object keys alphabetically.
 * Arrays are preserved in order.
 *
 * Throws if `undefined`, functions, symbols, bigints or non-finite numbers are
 * encountered; none of them has a stable JSON form.
 */
export function sortKeys(value: unknown): unknown {
    if (value === null || typeof value !== 'object') {
        if (value === undefined) throw new Error('Record contains undefined value (forbidden)');
        if (typeof value === 'function') throw new Error('Record contains function (forbidden)');
        if (typeof value === 'symbol') throw new Error('Record contains symbol (forbidden)');
        if (typeof value === 'bigint') throw new Error('Record contains bigint (forbidden - use string)');
        if (typeof value === 'number') {
            if (!Number.isFinite(value)) throw new Error(`Record contains non-finite value ${value} (forbidden)`);
            // Normalize -0 to 0
            if (Object.is(value, -0)) return 0;
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }

    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    for (const [key, val] of entries) {
        // JSON.stringify would silently drop these.
        if (val === undefined) {
            throw new Error(`Record key '${key}' is undefined (forbidden)`);
        }
        sorted[key] = sortKeys(val);
    }
    return sorted;
}

/**
 * Canonical JSON text: sorted keys, no whitespace.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

export function canonicalJsonBytes(value: unknown): Uint8Array {
    return new TextEncoder().encode(canonicalJson(value));
}
