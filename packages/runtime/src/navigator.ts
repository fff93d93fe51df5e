import type { Direction, MovementPrimitive, NavigationTuning, ObstacleHandler, Position } from '@tilewalker/shared';
import type { Clock } from './config';
import { countTurns, trailOf } from './directions';
import type { NavLog } from './nav-log';
import type { PathCache } from './path-cache';
import type { PathPlanner, PlanOptions } from './planner';
import { chebyshev, formatPosition, manhattan, neighborsOf, samePosition } from './position';
import type { TileSafetyClassifier } from './tile-classifier';

const SMALL_PATH_STEPS = 5;
const MEDIUM_PATH_STEPS = 15;
const MEDIUM_CHUNK_STEPS = 10;
const MIN_ZIGZAG_CHUNK = 3;
const ZIGZAG_SHRINK = 0.6;
const CURSOR_TTL_STEP_FACTOR = 0.8;

export type WalkStatus = 'arrived' | 'in-progress' | 'blocked';

export type BlockReason = 'floor-mismatch' | 'destination-hazardous' | 'no-path' | 'movement-rejected' | 'no-position';

export interface WalkParams {
    precision?: number;
    allowFloorChange?: boolean;
    ignoreOccupants?: boolean;
    ignoreFields?: boolean;
}

export interface WalkResult {
    status: WalkStatus;
    reason: BlockReason | null;
    issuedSteps: number;
    target: Position | null;
}

export interface NavigationCursor {
    steps: Direction[];
    index: number;
    origin: Position;
    destination: Position;
    // where the agent should stand once the issued steps are done
    expected: Position;
    createdAt: number;
    ttl: number;
}

interface Substitution {
    requested: Position;
    substitute: Position;
}

type CursorLookup = NavigationCursor | 'waiting' | null;

function rebaseSteps(origin: Position, steps: Direction[], current: Position): Direction[] | null {
    if (samePosition(origin, current)) return steps;
    const index = trailOf(origin, steps).findIndex((cell) => samePosition(cell, current));
    return index >= 0 ? steps.slice(index + 1) : null;
}

/**
 * One "move toward destination" per tick: reuse or rebuild the path, keep it
 * clear of level-transition cells and hand the host a bounded chunk.
 */
export class NavigationExecutor {
    cursor: NavigationCursor | null = null;
    private substitution: Substitution | null = null;

    constructor(
        private getPosition: () => Position | null,
        private classifier: TileSafetyClassifier,
        private cache: PathCache,
        private planner: PathPlanner,
        private movement: MovementPrimitive,
        private tuning: NavigationTuning,
        private now: Clock,
        private log: NavLog,
        private obstacles: ObstacleHandler | null = null
    ) {}

    walkTo(dest: Position, maxDistance: number, params: WalkParams = {}): WalkResult {
        const current = this.getPosition();
        if (!current) return this.blocked('no-position', null);

        const precision = params.precision ?? this.tuning.defaultPrecision;
        if (current.z === dest.z && chebyshev(current, dest) <= precision) {
            this.cursor = null;
            return { status: 'arrived', reason: null, issuedSteps: 0, target: dest };
        }

        if (dest.z !== current.z) {
            if (!params.allowFloorChange) return this.blocked('floor-mismatch', dest);
            return this.walkAcrossLevels(dest, maxDistance, precision);
        }

        const range = Math.min(maxDistance, this.tuning.maxPathDistance);
        let target = dest;
        let targetPrecision = precision;

        if (!params.allowFloorChange && this.classifier.isHazardous(dest)) {
            if (chebyshev(current, dest) <= 1) {
                this.cursor = null;
                return { status: 'arrived', reason: null, issuedSteps: 0, target: current };
            }
            const substitute = this.findSafeSubstitute(current, dest, range, params);
            if (!substitute) return this.blocked('destination-hazardous', dest);
            target = substitute;
            targetPrecision = 0;
        }

        const planOptions = this.basePlanOptions(target, targetPrecision, params);
        let cursor = this.lookupCursor(current, target, range, planOptions, params);
        if (cursor === 'waiting') return { status: 'in-progress', reason: null, issuedSteps: 0, target };
        if (!cursor) return this.lastResort(dest, 'no-path');

        let safeSteps = this.countSafeSteps(cursor, params);
        if (safeSteps < Math.min(this.tuning.validateSteps, cursor.steps.length - cursor.index)) {
            this.log.recordLog('PATH_CROSSES_HAZARD', current, `target=${formatPosition(target)} safe=${safeSteps}`);
            this.cache.delete(target);
            this.cursor = null;
            cursor = this.planFresh(current, target, range, planOptions, params);
            if (!cursor) {
                const alternate = params.allowFloorChange ? null : this.findSafeSubstitute(current, target, range, params);
                if (!alternate) return this.blocked('destination-hazardous', dest);
                target = alternate;
                cursor = this.planFresh(current, target, range, this.basePlanOptions(target, 0, params), params);
                if (!cursor) return this.blocked('destination-hazardous', dest);
            }
            safeSteps = this.countSafeSteps(cursor, params);
            if (safeSteps === 0) {
                this.cursor = null;
                return this.blocked('destination-hazardous', dest);
            }
        }

        return this.issueChunk(cursor, current, safeSteps, range, params);
    }

    /** Drops the cursor. Caches survive; they stay valid across resets. */
    reset() {
        this.cursor = null;
        this.substitution = null;
    }

    chunkSizeFor(steps: Direction[], index: number): number {
        const remaining = steps.length - index;
        let size: number;
        if (remaining <= SMALL_PATH_STEPS) size = remaining;
        else if (remaining <= MEDIUM_PATH_STEPS) size = Math.min(MEDIUM_CHUNK_STEPS, remaining);
        else size = Math.min(this.tuning.maxChunkSteps, remaining);

        const turns = countTurns(steps.slice(index, index + size));
        if (turns > size * 0.5) {
            size = Math.min(size, Math.max(MIN_ZIGZAG_CHUNK, Math.floor(size * ZIGZAG_SHRINK)));
        }
        return size;
    }

    /** Nearest safe neighbor of `dest` reachable within the walk's own range. */
    findSafeSubstitute(current: Position, dest: Position, range: number, params: WalkParams): Position | null {
        const previous = this.substitution;
        if (previous && samePosition(previous.requested, dest) && this.isSafeStandingCell(previous.substitute)) {
            return previous.substitute;
        }

        const candidates = neighborsOf(dest)
            .filter((cell) => !samePosition(cell, current) && this.isSafeStandingCell(cell))
            .sort((a, b) => chebyshev(current, a) - chebyshev(current, b) || manhattan(current, a) - manhattan(current, b));

        for (const cell of candidates) {
            const outcome = this.planner.findPath(current, cell, range, {
                ignoreOccupants: true,
                ignoreFields: params.ignoreFields,
                precision: 0
            });
            if (!outcome.ok) continue;
            this.cache.put(current, cell, outcome.path.steps);
            this.substitution = { requested: dest, substitute: cell };
            this.log.recordLog('SAFE_SUBSTITUTE', current, `${formatPosition(dest)} -> ${formatPosition(cell)}`);
            return cell;
        }

        this.substitution = null;
        this.log.recordLog('NO_SAFE_SUBSTITUTE', current, formatPosition(dest));
        return null;
    }

    private isSafeStandingCell(cell: Position): boolean {
        const tile = this.classifier.classify(cell);
        return tile.known && tile.walkable && !tile.hazardous;
    }

    private basePlanOptions(target: Position, precision: number, params: WalkParams): PlanOptions {
        return {
            ignoreOccupants: params.ignoreOccupants,
            ignoreFields: params.ignoreFields,
            transitionAt: params.allowFloorChange ? target : undefined,
            precision
        };
    }

    private permissivenessTiers(base: PlanOptions): PlanOptions[] {
        const tiers: PlanOptions[] = [
            base,
            { ...base, ignoreOccupants: true },
            { ...base, ignoreOccupants: true, ignoreFields: true },
            { ...base, ignoreOccupants: true, ignoreFields: true, allowUnseen: true }
        ];
        return tiers.filter((tier, i) =>
            tiers.findIndex((other) =>
                other.ignoreOccupants === tier.ignoreOccupants
                && other.ignoreFields === tier.ignoreFields
                && other.allowUnseen === tier.allowUnseen
            ) === i
        );
    }

    private lookupCursor(current: Position, target: Position, range: number, options: PlanOptions, params: WalkParams): CursorLookup {
        const cursor = this.cursor;
        if (
            cursor
            && samePosition(cursor.destination, target)
            && this.now() - cursor.createdAt < cursor.ttl
            && cursor.index < cursor.steps.length
        ) {
            if (samePosition(cursor.expected, current)) return cursor;
            if (this.movement.isCurrentlyMoving()) return 'waiting';
            const rest = rebaseSteps(cursor.origin, cursor.steps, current);
            if (rest && rest.length > 0) {
                cursor.index = cursor.steps.length - rest.length;
                cursor.expected = current;
                return cursor;
            }
        }
        this.cursor = null;

        const cached = this.cache.get(current, target);
        if (cached) {
            const rest = rebaseSteps(cached.origin, cached.steps, current);
            if (rest && rest.length > 0) return this.installCursor(current, target, rest);
        }

        return this.planFresh(current, target, range, options, params);
    }

    private planFresh(current: Position, target: Position, range: number, options: PlanOptions, params: WalkParams): NavigationCursor | null {
        for (const tier of this.permissivenessTiers(options)) {
            const outcome = this.planner.findPath(current, target, range, tier);
            if (outcome.ok) {
                if (outcome.path.steps.length === 0) return null;
                this.cache.put(current, target, outcome.path.steps);
                return this.installCursor(current, target, outcome.path.steps);
            }
            if (outcome.reason === 'floor-mismatch' || outcome.reason === 'out-of-range') break;
        }
        this.log.recordLog(
            'NO_PATH',
            current,
            `target=${formatPosition(target)} occupants=${params.ignoreOccupants === true} fields=${params.ignoreFields === true}`
        );
        return null;
    }

    private installCursor(current: Position, target: Position, steps: Direction[]): NavigationCursor {
        const cursor: NavigationCursor = {
            steps,
            index: 0,
            origin: current,
            destination: target,
            expected: current,
            createdAt: this.now(),
            ttl: this.tuning.cursorTtlMs
        };
        this.cursor = cursor;
        return cursor;
    }

    private countSafeSteps(cursor: NavigationCursor, params: WalkParams): number {
        const window = cursor.steps.slice(cursor.index, cursor.index + this.tuning.validateSteps);
        const trail = trailOf(cursor.expected, window);
        let safe = 0;
        for (const cell of trail) {
            const allowed = params.allowFloorChange === true && samePosition(cell, cursor.destination);
            if (!allowed && this.classifier.isHazardous(cell)) break;
            safe++;
        }
        return safe;
    }

    private issueChunk(cursor: NavigationCursor, current: Position, safeSteps: number, range: number, params: WalkParams): WalkResult {
        const size = Math.min(this.chunkSizeFor(cursor.steps, cursor.index), safeSteps);
        const chunk = cursor.steps.slice(cursor.index, cursor.index + size);
        const trail = trailOf(current, chunk);
        const chunkEnd = trail[trail.length - 1];
        const nearHazard = trail.some((cell) => this.classifier.isNearHazard(cell));

        let accepted: boolean;
        let issued: number;
        if (chunk.length >= 2 && !nearHazard) {
            accepted = this.movement.issueMultiStepMove(chunkEnd, range, {
                precision: 0,
                ignoreOccupants: params.ignoreOccupants
            });
            issued = chunk.length;
        } else {
            accepted = this.movement.issueSingleStep(chunk[0]);
            issued = 1;
        }

        if (!accepted) {
            this.cursor = null;
            this.log.recordLog('MOVE_REJECTED', current, `steps=${issued}`);
            return this.lastResort(cursor.destination, 'movement-rejected');
        }

        cursor.index += issued;
        cursor.expected = trail[issued - 1];
        cursor.createdAt = this.now();
        cursor.ttl = Math.max(
            this.tuning.cursorTtlMs,
            issued * this.movement.estimateStepDuration() * CURSOR_TTL_STEP_FACTOR
        );
        return { status: 'in-progress', reason: null, issuedSteps: issued, target: cursor.destination };
    }

    private walkAcrossLevels(dest: Position, maxDistance: number, precision: number): WalkResult {
        const accepted = this.movement.issueMultiStepMove(dest, maxDistance, { precision, allowFloorChange: true });
        if (accepted) return { status: 'in-progress', reason: null, issuedSteps: 0, target: dest };
        return this.lastResort(dest, 'movement-rejected');
    }

    private lastResort(dest: Position, reason: BlockReason): WalkResult {
        if (this.obstacles && this.obstacles.tryResolve(dest)) {
            this.log.recordLog('OBSTACLE_HANDLED', this.getPosition(), formatPosition(dest));
            return { status: 'in-progress', reason: null, issuedSteps: 0, target: dest };
        }
        return this.blocked(reason, dest);
    }

    private blocked(reason: BlockReason, target: Position | null): WalkResult {
        return { status: 'blocked', reason, issuedSteps: 0, target };
    }
}
