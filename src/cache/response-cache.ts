import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_CACHE_DIR = '.pharma-papers-cache';

interface CacheEntry<T> {
    timestamp: number;
    url: string;
    data: T;
}

function isCacheEntry<T>(value: unknown): value is CacheEntry<T> {
    return typeof value === 'object' && value !== null
        && typeof Reflect.get(value, 'timestamp') === 'number'
        && Reflect.has(value, 'data');
}

/**
 * File-system cache for E-utilities responses.
 * One JSON file per request, keyed by SHA-256 of the request URL.
 */
export class ResponseCache {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private filePath(key: string): string {
        return join(this.cacheDir, `${createHash('sha256').update(key).digest('hex')}.json`);
    }

    /**
     * Get a cached response, or null if missing, expired, or unreadable.
     */
    get<T>(key: string): T | null {
        if (!this.enabled) return null;

        const filePath = this.filePath(key);
        if (!existsSync(filePath)) return null;

        let entry: unknown;
        try {
            entry = JSON.parse(readFileSync(filePath, 'utf-8'));
        } catch (error) {
            getLogger().warn({ error, filePath }, 'Ignoring corrupt cache entry');
            return null;
        }

        if (!isCacheEntry<T>(entry)) {
            getLogger().warn({ filePath }, 'Ignoring malformed cache entry');
            return null;
        }

        if (Date.now() - entry.timestamp > this.ttlMs) {
            getLogger().debug({ key: key.slice(0, 80) }, 'Cache expired');
            return null;
        }

        getLogger().debug({ key: key.slice(0, 80) }, 'Cache hit');
        return entry.data;
    }

    set<T>(key: string, data: T): void {
        if (!this.enabled) return;

        const entry: CacheEntry<T> = {
            timestamp: Date.now(),
            url: key.slice(0, 200),
            data,
        };

        try {
            writeFileSync(this.filePath(key), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

}

/**
 * Count entries and total size of a cache directory. Returns null if it does not exist.
 */
export function inspectCacheDir(cacheDir: string = DEFAULT_CACHE_DIR): { entries: number; bytes: number } | null {
    if (!existsSync(cacheDir)) return null;

    const files = readdirSync(cacheDir).filter((f) => f.endsWith('.json'));
    let bytes = 0;
    for (const f of files) {
        bytes += statSync(join(cacheDir, f)).size;
    }
    return { entries: files.length, bytes };
}

/**
 * Delete a cache directory. Returns false if there was nothing to delete.
 */
export function clearCacheDir(cacheDir: string = DEFAULT_CACHE_DIR): boolean {
    if (!existsSync(cacheDir)) return false;
    rmSync(cacheDir, { recursive: true, force: true });
    return true;
}
