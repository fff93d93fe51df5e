import type { Direction, PlannerTuning, Position } from '@tilewalker/shared';
import type { Clock } from './config';
import { ALL_DIRECTIONS, CARDINAL_DIRECTIONS, directionBetween } from './directions';
import type { DirectionSpec } from './directions';
import { chebyshev, manhattan, octile, positionKey, samePosition } from './position';
import type { TileSafetyClassifier } from './tile-classifier';

// How often the search looks at the clock
const TIME_CHECK_INTERVAL = 16;

export interface PlanOptions {
    ignoreOccupants?: boolean;
    ignoreFields?: boolean;
    allowUnseen?: boolean;
    // the one level-transition cell the path may end on
    transitionAt?: Position;
    precision?: number;
}

export interface PlannedPath {
    steps: Direction[];
    cost: number;
    expanded: number;
    shortcut: boolean;
}

export type PlanFailure = 'no-path' | 'budget-exceeded' | 'floor-mismatch' | 'out-of-range';

export type PlanOutcome =
    | { ok: true; path: PlannedPath }
    | { ok: false; reason: PlanFailure; expanded: number };

interface ParentRef {
    fromKey: number;
    direction: Direction;
}

/**
 * Single-policy bounded search over the tile grid. Callers escalate through
 * option sets themselves; the planner never relaxes constraints on its own.
 */
export class PathPlanner {
    lastExpanded = 0;

    constructor(
        private classifier: TileSafetyClassifier,
        private tuning: PlannerTuning,
        private now: Clock
    ) {}

    findPath(origin: Position, dest: Position, maxDistance: number, options: PlanOptions = {}, nodeBudget?: number): PlanOutcome {
        this.lastExpanded = 0;
        if (origin.z !== dest.z) return { ok: false, reason: 'floor-mismatch', expanded: 0 };
        if (chebyshev(origin, dest) > maxDistance) return { ok: false, reason: 'out-of-range', expanded: 0 };

        const precision = options.precision ?? 0;
        if (chebyshev(origin, dest) <= precision) {
            return { ok: true, path: { steps: [], cost: 0, expanded: 0, shortcut: true } };
        }

        if (manhattan(origin, dest) <= this.tuning.shortcutDistance) {
            const direct = this.tryStraightLine(origin, dest, precision, options);
            if (direct) return { ok: true, path: direct };
        }

        return this.search(origin, dest, maxDistance, precision, options, nodeBudget ?? this.tuning.nodeBudget);
    }

    /** Cheap check: can the agent get next to `dest` under permissive options? */
    isReachable(origin: Position, dest: Position, maxDistance: number, nodeBudget: number): boolean {
        const outcome = this.findPath(origin, dest, maxDistance, { ignoreOccupants: true, precision: 1 }, nodeBudget);
        return outcome.ok;
    }

    isPassable(cell: Position, options: PlanOptions): boolean {
        const tile = this.classifier.classify(cell);
        if (!tile.known) return options.allowUnseen === true;
        if (!tile.walkable) return false;
        if (tile.hazardous && !(options.transitionAt && samePosition(cell, options.transitionAt))) return false;
        if (tile.field && !options.ignoreFields) return false;
        if (tile.occupied && !options.ignoreOccupants) return false;
        return true;
    }

    private tryStraightLine(origin: Position, dest: Position, precision: number, options: PlanOptions): PlannedPath | null {
        const steps: Direction[] = [];
        let cost = 0;
        let cursor = origin;

        while (chebyshev(cursor, dest) > precision) {
            const sx = Math.sign(dest.x - cursor.x);
            let sy = Math.sign(dest.y - cursor.y);
            if (!this.tuning.allowDiagonal && sx !== 0) sy = 0;

            const next = { x: cursor.x + sx, y: cursor.y + sy, z: cursor.z };
            const direction = directionBetween(cursor, next);
            if (!direction || !this.isPassable(next, options)) return null;

            steps.push(direction);
            cost += sx !== 0 && sy !== 0 ? 1.41 : 1;
            cursor = next;
        }

        return { steps, cost, expanded: 0, shortcut: true };
    }

    private search(
        origin: Position,
        dest: Position,
        maxDistance: number,
        precision: number,
        options: PlanOptions,
        nodeBudget: number
    ): PlanOutcome {
        const started = this.now();
        const directions: readonly DirectionSpec[] = this.tuning.allowDiagonal ? ALL_DIRECTIONS : CARDINAL_DIRECTIONS;
        const heuristic = (pos: Position) => (this.tuning.allowDiagonal ? octile(pos, dest) : manhattan(pos, dest));

        const startKey = positionKey(origin);
        const openSet = new Set<number>([startKey]);
        const cellByKey = new Map<number, Position>([[startKey, origin]]);
        const cameFrom = new Map<number, ParentRef>();
        const gScore = new Map<number, number>([[startKey, 0]]);
        const fScore = new Map<number, number>([[startKey, heuristic(origin)]]);

        let expanded = 0;
        while (openSet.size > 0) {
            if (expanded >= nodeBudget) {
                this.lastExpanded = expanded;
                return { ok: false, reason: 'budget-exceeded', expanded };
            }
            if (expanded % TIME_CHECK_INTERVAL === 0 && this.now() - started > this.tuning.timeBudgetMs) {
                this.lastExpanded = expanded;
                return { ok: false, reason: 'budget-exceeded', expanded };
            }

            let currentKey = -1;
            let currentF = Infinity;
            for (const key of openSet) {
                const score = fScore.get(key) ?? Infinity;
                if (score < currentF) {
                    currentF = score;
                    currentKey = key;
                }
            }
            const current = cellByKey.get(currentKey);
            openSet.delete(currentKey);
            if (!current) continue;
            expanded++;

            if (chebyshev(current, dest) <= precision) {
                this.lastExpanded = expanded;
                return {
                    ok: true,
                    path: {
                        steps: this.reconstructPath(currentKey, cameFrom),
                        cost: gScore.get(currentKey) ?? Infinity,
                        expanded,
                        shortcut: false
                    }
                };
            }

            for (const spec of directions) {
                const next = { x: current.x + spec.dx, y: current.y + spec.dy, z: current.z };
                if (chebyshev(origin, next) > maxDistance) continue;
                const nextKey = positionKey(next);

                const tentativeG = (gScore.get(currentKey) ?? Infinity) + spec.cost;
                if (tentativeG >= (gScore.get(nextKey) ?? Infinity)) continue;
                if (!this.isPassable(next, options)) continue;

                cellByKey.set(nextKey, next);
                cameFrom.set(nextKey, { fromKey: currentKey, direction: spec.name });
                gScore.set(nextKey, tentativeG);
                fScore.set(nextKey, tentativeG + heuristic(next));
                openSet.add(nextKey);
            }
        }

        this.lastExpanded = expanded;
        return { ok: false, reason: 'no-path', expanded };
    }

    private reconstructPath(finalKey: number, cameFrom: Map<number, ParentRef>): Direction[] {
        const steps: Direction[] = [];
        let curr = finalKey;
        let parent = cameFrom.get(curr);
        while (parent) {
            steps.unshift(parent.direction);
            curr = parent.fromKey;
            parent = cameFrom.get(curr);
        }
        return steps;
    }
}
