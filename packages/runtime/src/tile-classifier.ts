import type { ClassifierTuning, MapQuery, Position } from '@tilewalker/shared';
import type { Clock } from './config';
import { HazardCatalog } from './hazard-catalog';
import { neighborsOf, positionKey } from './position';

export interface TileClassification {
    walkable: boolean;
    hazardous: boolean;
    occupied: boolean;
    field: boolean;
    // false when the map could not resolve the cell
    known: boolean;
    classifiedAt: number;
}

export interface ClassifierStats {
    entries: number;
    hits: number;
    misses: number;
}

/**
 * Walkable / hazardous / occupied verdicts per cell. The pre-colored layer is
 * consulted first and a positive answer skips the tile query altogether; item
 * ids are only inspected on a miss. An unresolved cell is non-walkable but also
 * non-hazardous.
 */
export class TileSafetyClassifier {
    private cache = new Map<number, TileClassification>();
    private lastCleanup: number;
    hits = 0;
    misses = 0;

    constructor(
        private map: MapQuery,
        private tuning: ClassifierTuning,
        private now: Clock,
        private catalog: HazardCatalog = new HazardCatalog()
    ) {
        this.lastCleanup = now();
    }

    classify(pos: Position): TileClassification {
        const time = this.now();
        if (time - this.lastCleanup >= this.tuning.cleanupIntervalMs) this.cleanup(time);

        const key = positionKey(pos);
        const cached = this.cache.get(key);
        if (cached && time - cached.classifiedAt < this.tuning.cacheTtlMs) {
            this.hits++;
            return cached;
        }

        this.misses++;
        const result = this.inspect(pos, time);
        this.cache.set(key, result);
        return result;
    }

    isHazardous(pos: Position): boolean {
        return this.classify(pos).hazardous;
    }

    isNearHazard(pos: Position): boolean {
        if (this.classify(pos).hazardous) return true;
        return neighborsOf(pos).some((cell) => this.classify(cell).hazardous);
    }

    invalidate() {
        this.cache.clear();
    }

    stats(): ClassifierStats {
        return { entries: this.cache.size, hits: this.hits, misses: this.misses };
    }

    private inspect(pos: Position, time: number): TileClassification {
        // Transition cells stay walkable so a floor-change walk may enter them
        if (this.map.getCoarseHazardSignal(pos) === 'level-transition') {
            return { walkable: true, hazardous: true, occupied: false, field: false, known: true, classifiedAt: time };
        }

        const tile = this.map.getTile(pos);
        if (!tile) {
            return { walkable: false, hazardous: false, occupied: false, field: false, known: false, classifiedAt: time };
        }

        const ids = tile.groundId === null ? tile.occupantIds : [tile.groundId, ...tile.occupantIds];
        const hazardous = ids.some((id) => this.catalog.isTransition(id));

        return {
            walkable: tile.walkable,
            hazardous,
            occupied: tile.hasOccupant,
            field: ids.some((id) => this.catalog.isField(id)),
            known: true,
            classifiedAt: time
        };
    }

    private cleanup(time: number) {
        for (const [key, entry] of this.cache) {
            if (time - entry.classifiedAt >= this.tuning.cacheTtlMs) this.cache.delete(key);
        }
        this.lastCleanup = time;
    }
}
