import type { FloorGuardTuning, MovementPrimitive, Position } from '@tilewalker/shared';
import type { Clock } from './config';
import type { NavLog } from './nav-log';
import type { PathPlanner } from './planner';
import { chebyshev, formatPosition, samePosition } from './position';
import type { TileSafetyClassifier } from './tile-classifier';

// Radius around the landing cell searched for a stair, ladder or hole back
const EXIT_SCAN_RADIUS = 3;

export interface FloorIntent {
    active: boolean;
    expectedFloor: number;
    sourceFloor: number;
    timestamp: number;
    timeout: number;
    waypointId: number | null;
}

export interface FloorTransitionRecord {
    fromZ: number;
    toZ: number;
    timestamp: number;
}

export type GuardMode = 'unknown' | 'tracking' | 'stepping-back';

export type AcceptReason = 'loop' | 'attempts-exhausted' | 'no-baseline' | 'cooldown' | 'no-path-back';

export type Reconciliation =
    | { kind: 'unchanged' }
    | { kind: 'same-level' }
    | { kind: 'intentional'; waypointId: number | null }
    | { kind: 'recovered' }
    | { kind: 'stepping-back'; target: Position }
    | { kind: 'accepted'; reason: AcceptReason };

/**
 * Tracks level transitions against the declared intent and walks the agent
 * back to its last safe cell after an accidental one.
 */
export class FloorGuard {
    intent: FloorIntent | null = null;
    lastSafePosition: Position | null = null;
    history: FloorTransitionRecord[] = [];
    mode: GuardMode = 'unknown';
    stepBackAttempts = 0;
    private lastStepBackAt = -Infinity;

    constructor(
        private classifier: TileSafetyClassifier,
        private planner: PathPlanner,
        private movement: MovementPrimitive,
        private tuning: FloorGuardTuning,
        private now: Clock,
        private log: NavLog
    ) {}

    markIntentionalTransition(expectedLevel: number, sourceLevel: number, waypointId: number | null = null) {
        this.intent = {
            active: true,
            expectedFloor: expectedLevel,
            sourceFloor: sourceLevel,
            timestamp: this.now(),
            timeout: this.tuning.intentTimeoutMs,
            waypointId
        };
    }

    isTransitionIntentional(observedLevel: number): boolean {
        const intent = this.activeIntent();
        if (!intent) return false;
        if (observedLevel === intent.expectedFloor) return true;
        if (!this.tuning.intentDirectionTolerance) return false;

        const intendedDirection = Math.sign(intent.expectedFloor - intent.sourceFloor);
        const observedDirection = Math.sign(observedLevel - intent.sourceFloor);
        return intendedDirection !== 0
            && observedDirection === intendedDirection
            && Math.abs(observedLevel - intent.expectedFloor) <= 1;
    }

    clearIntent() {
        this.intent = null;
    }

    activeIntent(): FloorIntent | null {
        const intent = this.intent;
        if (!intent || !intent.active) return null;
        if (this.now() - intent.timestamp > intent.timeout) {
            this.log.recordLog('INTENT_EXPIRED', null, `expected z=${intent.expectedFloor}`);
            this.intent = null;
            return null;
        }
        return intent;
    }

    observe(oldPos: Position, newPos: Position): Reconciliation {
        if (oldPos.z === newPos.z) {
            if (oldPos.x === newPos.x && oldPos.y === newPos.y) return { kind: 'unchanged' };
            if (this.mode !== 'stepping-back' && !this.classifier.isNearHazard(newPos)) {
                this.lastSafePosition = newPos;
                this.stepBackAttempts = 0;
                if (this.mode === 'unknown') this.mode = 'tracking';
            }
            return { kind: 'same-level' };
        }

        this.classifier.invalidate();
        const recent = this.recentTransition();
        this.recordTransition(oldPos.z, newPos.z);

        if (this.isTransitionIntentional(newPos.z)) {
            const waypointId = this.intent?.waypointId ?? null;
            this.intent = null;
            this.acceptBaseline(newPos);
            this.log.recordLog('FLOOR_INTENTIONAL', newPos, `z ${oldPos.z} -> ${newPos.z}`);
            return { kind: 'intentional', waypointId };
        }

        if (this.mode === 'stepping-back' && this.lastSafePosition && newPos.z === this.lastSafePosition.z) {
            this.mode = 'tracking';
            this.log.recordLog('STEP_BACK_DONE', newPos, `z ${oldPos.z} -> ${newPos.z}`);
            return { kind: 'recovered' };
        }

        if (recent && recent.fromZ === newPos.z && recent.toZ === oldPos.z) {
            return this.accept(newPos, 'loop');
        }
        if (this.stepBackAttempts >= this.tuning.maxStepBackAttempts) return this.accept(newPos, 'attempts-exhausted');

        const baseline = this.lastSafePosition;
        if (!baseline || baseline.z !== oldPos.z) return this.accept(newPos, 'no-baseline');
        if (this.now() - this.lastStepBackAt < this.tuning.stepBackCooldownMs) return this.accept(newPos, 'cooldown');

        return this.stepBack(newPos, baseline);
    }

    /**
     * True while a step-back issued earlier may still be under way. The window
     * covers the cooldown plus the walk itself; once it lapses the guard
     * returns to tracking.
     */
    isSteppingBack(): boolean {
        if (this.mode !== 'stepping-back') return false;
        const window = this.tuning.stepBackCooldownMs + this.tuning.stepBackMaxDistance * this.movement.estimateStepDuration();
        if (this.now() - this.lastStepBackAt <= window) return true;
        this.mode = 'tracking';
        this.log.recordLog('STEP_BACK_TIMEOUT', this.lastSafePosition, `after ${Math.round(window)}ms`);
        return false;
    }

    /** Full reset: clears intent, baseline and attempt counters. */
    reset() {
        this.intent = null;
        this.lastSafePosition = null;
        this.stepBackAttempts = 0;
        this.mode = 'unknown';
    }

    private stepBack(current: Position, baseline: Position): Reconciliation {
        this.stepBackAttempts++;
        this.lastStepBackAt = this.now();

        const exit = this.findWayBack(current, baseline);
        if (!exit) {
            this.log.recordLog('STEP_BACK_NO_PATH', current, formatPosition(baseline));
            this.stepBackAttempts = 0;
            return this.accept(current, 'no-path-back');
        }

        const accepted = this.movement.issueMultiStepMove(baseline, this.tuning.stepBackMaxDistance, {
            precision: 0,
            ignoreOccupants: true,
            allowFloorChange: true
        });
        if (!accepted) return this.accept(current, 'no-path-back');

        this.mode = 'stepping-back';
        this.log.recordLog(
            'STEP_BACK',
            current,
            `to ${formatPosition(baseline)} via ${formatPosition(exit)} attempt ${this.stepBackAttempts}/${this.tuning.maxStepBackAttempts}`
        );
        return { kind: 'stepping-back', target: baseline };
    }

    /**
     * The cell under the baseline comes first, then any level-transition cell
     * around the landing, nearest first. Returns the first one the planner can
     * reach on this level.
     */
    private findWayBack(current: Position, baseline: Position): Position | null {
        const exits: Position[] = [{ x: baseline.x, y: baseline.y, z: current.z }];
        const nearby: Position[] = [];
        for (let dx = -EXIT_SCAN_RADIUS; dx <= EXIT_SCAN_RADIUS; dx++) {
            for (let dy = -EXIT_SCAN_RADIUS; dy <= EXIT_SCAN_RADIUS; dy++) {
                const cell = { x: current.x + dx, y: current.y + dy, z: current.z };
                if (!samePosition(cell, exits[0]) && this.classifier.isHazardous(cell)) nearby.push(cell);
            }
        }
        nearby.sort((a, b) => chebyshev(current, a) - chebyshev(current, b));
        exits.push(...nearby);

        for (const exit of exits) {
            const outcome = this.planner.findPath(current, exit, this.tuning.stepBackMaxDistance, {
                ignoreOccupants: true,
                ignoreFields: true,
                transitionAt: exit,
                precision: 0
            });
            if (outcome.ok) return exit;
        }
        return null;
    }

    private accept(pos: Position, reason: AcceptReason): Reconciliation {
        this.acceptBaseline(pos);
        this.log.recordLog('FLOOR_ACCEPTED', pos, reason);
        return { kind: 'accepted', reason };
    }

    private acceptBaseline(pos: Position) {
        this.lastSafePosition = pos;
        this.mode = 'tracking';
        if (!this.classifier.isNearHazard(pos)) this.stepBackAttempts = 0;
    }

    private recentTransition(): FloorTransitionRecord | null {
        const last = this.history[this.history.length - 1];
        if (!last) return null;
        return this.now() - last.timestamp <= this.tuning.loopWindowMs ? last : null;
    }

    private recordTransition(fromZ: number, toZ: number) {
        this.history.push({ fromZ, toZ, timestamp: this.now() });
        if (this.history.length > this.tuning.historyCapacity) this.history.shift();
    }
}
