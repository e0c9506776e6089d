/**
 * Forecast Fusion — Storage
 *
 * Records and charts are addressed by key ("records/2026-10-20/paris.json").
 * Dated keys are written once; the `records/latest/*` pointers are overwritten.
 */

import type { Dirent } from 'node:fs';
import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

// =============================================================================
// Storage Interface (abstract over local disk / object stores)
// =============================================================================

export interface StorageBackend {
    /** Check if object exists */
    exists(key: string): Promise<boolean>;

    /** Write object, replacing any previous bytes */
    put(key: string, data: Uint8Array): Promise<void>;

    /** Get object */
    get(key: string): Promise<Uint8Array | null>;

    /** List objects with prefix */
    list(prefix: string): Promise<string[]>;
}

function assertValidKey(key: string): void {
    const segments = key.split('/');
    if (key === '' || key.startsWith('/') || segments.some((segment) => segment === '' || segment === '.' || segment === '..')) {
        throw new Error(`Invalid storage key: "${key}"`);
    }
}

// =============================================================================
// In-memory storage (tests)
// =============================================================================

export class MemoryStorage implements StorageBackend {
    private store = new Map<string, Uint8Array>();

    async exists(key: string): Promise<boolean> {
        return this.store.has(key);
    }

    async put(key: string, data: Uint8Array): Promise<void> {
        assertValidKey(key);
        this.store.set(key, data.slice());
    }

    async get(key: string): Promise<Uint8Array | null> {
        return this.store.get(key) ?? null;
    }

    async list(prefix: string): Promise<string[]> {
        return Array.from(this.store.keys())
            .filter((k) => k.startsWith(prefix))
            .sort();
    }

    /** Get all keys (for debugging) */
    keys(): string[] {
        return Array.from(this.store.keys());
    }
}

// =============================================================================
// Local directory storage
// =============================================================================

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStorage implements StorageBackend {
    constructor(private readonly rootDir: string) {}

    private resolve(key: string): string {
        assertValidKey(key);
        return path.join(this.rootDir, ...key.split('/'));
    }

    async exists(key: string): Promise<boolean> {
        try {
            await stat(this.resolve(key));
            return true;
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
    }

    async put(key: string, data: Uint8Array): Promise<void> {
        const filePath = this.resolve(key);
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, data);
    }

    async get(key: string): Promise<Uint8Array | null> {
        try {
            return new Uint8Array(await readFile(this.resolve(key)));
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    async list(prefix: string): Promise<string[]> {
        const keys: string[] = [];

        const walk = async (dir: string, keyPrefix: string): Promise<void> => {
            let entries: Dirent[];
            try {
                entries = await readdir(dir, { withFileTypes: true });
            } catch (error) {
                if (isNotFound(error)) return;
                throw error;
            }
            for (const entry of entries) {
                const key = keyPrefix ? `${keyPrefix}/${entry.name}` : entry.name;
                if (entry.isDirectory()) {
                    await walk(path.join(dir, entry.name), key);
                } else if (key.startsWith(prefix)) {
                    keys.push(key);
                }
            }
        };

        await walk(this.rootDir, '');
        return keys.sort();
    }
}
