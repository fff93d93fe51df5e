import type { Direction, PathCacheTuning, Position } from '@tilewalker/shared';
import type { Clock } from './config';
import { positionKey } from './position';

export interface PathCacheEntry {
    destination: Position;
    origin: Position;
    steps: Direction[];
    createdAt: number;
    lastAccess: number;
}

export interface PathCacheStats {
    entries: number;
    hits: number;
    misses: number;
}

// Keyed by destination; origin drift is checked on read
export class PathCache {
    private entries = new Map<number, PathCacheEntry>();
    hits = 0;
    misses = 0;

    constructor(private tuning: PathCacheTuning, private now: Clock) {}

    get(origin: Position, dest: Position): PathCacheEntry | null {
        const key = positionKey(dest);
        const entry = this.entries.get(key);
        if (!entry) {
            this.misses++;
            return null;
        }

        const time = this.now();
        const drift = Math.max(Math.abs(origin.x - entry.origin.x), Math.abs(origin.y - entry.origin.y));
        if (time - entry.createdAt > this.tuning.ttlMs || origin.z !== entry.origin.z || drift > this.tuning.driftTolerance) {
            this.entries.delete(key);
            this.misses++;
            return null;
        }

        entry.lastAccess = time;
        this.hits++;
        return entry;
    }

    put(origin: Position, dest: Position, steps: Direction[]) {
        const time = this.now();
        const key = positionKey(dest);
        if (!this.entries.has(key) && this.entries.size >= this.tuning.maxEntries) this.evictOldest();
        this.entries.set(key, {
            destination: dest,
            origin,
            steps: [...steps],
            createdAt: time,
            lastAccess: time
        });
    }

    delete(dest: Position) {
        this.entries.delete(positionKey(dest));
    }

    clear() {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }

    stats(): PathCacheStats {
        return { entries: this.entries.size, hits: this.hits, misses: this.misses };
    }

    private evictOldest() {
        let oldestKey: number | null = null;
        let oldestAccess = Infinity;
        for (const [key, entry] of this.entries) {
            if (entry.lastAccess < oldestAccess) {
                oldestAccess = entry.lastAccess;
                oldestKey = key;
            }
        }
        if (oldestKey !== null) this.entries.delete(oldestKey);
    }
}
