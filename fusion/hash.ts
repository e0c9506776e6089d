/**
 * Forecast Fusion — BLAKE3 Hashing Utilities
 *
 * Every stored record carries the BLAKE3 hash of its canonical content.
 */

import { blake3 } from '@noble/hashes/blake3';

/**
 * Compute BLAKE3 hash and return as lowercase hex string.
 */
export function hashHex(data: Uint8Array): string {
    return toHex(blake3(data));
}

/**
 * Convert Uint8Array to lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map((b) => b.toString(16).padStart(2, '0'))
        .join('');
}

/**
 * Verify that data matches expected hash.
 */
export function verifyHash(data: Uint8Array, expectedHex: string): boolean {
    return hashHex(data) === expectedHex.toLowerCase();
}
