import type {
    ActionOutcome,
    EngineTuning,
    LifecycleSignal,
    Position,
    WaypointActionHandler,
    WaypointList,
    WaypointRecord
} from '@tilewalker/shared';
import type { Clock } from './config';
import type { FloorGuard, Reconciliation } from './floor-guard';
import type { NavLog } from './nav-log';
import type { NavigationExecutor, WalkResult } from './navigator';
import type { PathPlanner } from './planner';
import { chebyshev, formatPosition, manhattan, parseGoto } from './position';
import type { GotoTarget } from './position';
import type { ProgressTracker } from './progress-tracker';
import type { TileSafetyClassifier } from './tile-classifier';

const MAX_BACKWARD_SCAN = 100;
const MAX_SKIP_BLOCK = 5;

export type EngineState = 'normal' | 'stuck' | 'recovering' | 'stopped';

export type StopReason = 'recovery-timeout' | 'strategies-exhausted';

export type RecoveryStrategy =
    | 'forward-search'
    | 'backward-search'
    | 'nearest-on-level'
    | 'nearest-adjacent-levels'
    | 'skip-current'
    | 'skip-block';

export const RECOVERY_LADDER: readonly RecoveryStrategy[] = [
    'forward-search',
    'backward-search',
    'nearest-on-level',
    'nearest-adjacent-levels',
    'skip-current',
    'skip-block'
];

const ALLOWED_TRANSITIONS: Record<EngineState, readonly EngineState[]> = {
    normal: ['stuck'],
    stuck: ['normal', 'recovering'],
    recovering: ['normal', 'stopped'],
    stopped: []
};

interface GotoEntry {
    index: number;
    record: WaypointRecord;
    target: GotoTarget;
}

export interface EngineSnapshot {
    state: EngineState;
    failures: number;
    retries: number;
    recoveryAttempt: number;
    focus: number;
    stopReason: StopReason | null;
}

export interface WaypointEngineDeps {
    waypoints: WaypointList;
    getPosition: () => Position | null;
    classifier: TileSafetyClassifier;
    planner: PathPlanner;
    navigator: NavigationExecutor;
    floorGuard: FloorGuard;
    tracker: ProgressTracker;
    log: NavLog;
    tuning: EngineTuning;
    now: Clock;
    recoveryEnabled?: boolean;
    lifecycle?: LifecycleSignal;
    actions?: WaypointActionHandler;
}

export class WaypointEngine {
    state: EngineState = 'normal';
    failures = 0;
    retries = 0;
    recoveryAttempt = 0;
    stopReason: StopReason | null = null;
    private stuckSince = 0;
    private stuckAnchor: Position | null = null;
    private recoveryStartedAt = 0;
    // set once skip-current wins; cleared by the next real success
    private skipSpent = false;
    private lastTickAt = -Infinity;
    private deps: WaypointEngineDeps;

    constructor(deps: WaypointEngineDeps) {
        this.deps = deps;
        deps.log.setContextProvider(() => ({
            engineState: this.state,
            focus: deps.waypoints.focusedIndex(),
            failures: this.failures
        }));
    }

    /** Runs one engine step. Returns false when skipped by the re-entrancy guard. */
    tick(): boolean {
        const now = this.deps.now();
        if (now - this.lastTickAt < this.deps.tuning.minTickIntervalMs) return false;
        this.lastTickAt = now;

        if (this.state === 'stopped') return true;
        const pos = this.deps.getPosition();
        if (!pos) return true;

        this.deps.tracker.sample(now, pos, this.focusedRecord()?.id ?? null);
        if (this.updateState(now, pos)) return true;
        if (this.deps.floorGuard.isSteppingBack()) return true;

        this.runFocusedAction(pos);
        return true;
    }

    onPositionChange(oldPos: Position, newPos: Position): Reconciliation {
        const result = this.deps.floorGuard.observe(oldPos, newPos);
        if (oldPos.z === newPos.z) return result;

        this.deps.navigator.reset();
        if (result.kind === 'intentional' && result.waypointId !== null) {
            const index = this.indexOfRecord(result.waypointId);
            if (index >= 0) this.focus((index + 1) % this.deps.waypoints.count(), 'transition waypoint done');
            this.retries = 0;
            this.recordSuccess();
        } else if (result.kind === 'accepted') {
            const index = this.nearestOnLevel(newPos, false);
            if (index !== null) this.focus(index, `nearest on z=${newPos.z}`);
        }
        return result;
    }

    recordSuccess() {
        if (this.state === 'stopped') return;
        this.failures = 0;
        this.skipSpent = false;
        if (this.state === 'stuck' || this.state === 'recovering') this.transitionTo('normal', 'action succeeded');
    }

    recordFailure() {
        if (this.state === 'stopped') return;
        this.failures++;
    }

    /** External reset. Leaves Stopped; `full` also clears floor intent and baseline. */
    reset(full: boolean = false) {
        this.state = 'normal';
        this.failures = 0;
        this.retries = 0;
        this.recoveryAttempt = 0;
        this.stopReason = null;
        this.stuckAnchor = null;
        this.skipSpent = false;
        this.deps.tracker.reset();
        this.deps.navigator.reset();
        if (full) this.deps.floorGuard.reset();
        this.deps.log.recordLog('ENGINE_RESET', this.deps.getPosition(), full ? 'full' : 'routine');
    }

    snapshot(): EngineSnapshot {
        return {
            state: this.state,
            failures: this.failures,
            retries: this.retries,
            recoveryAttempt: this.recoveryAttempt,
            focus: this.deps.waypoints.focusedIndex(),
            stopReason: this.stopReason
        };
    }

    private updateState(now: number, pos: Position): boolean {
        const tuning = this.deps.tuning;
        switch (this.state) {
            case 'normal': {
                const stalled = this.failures >= tuning.noProgressFailureThreshold && !this.deps.tracker.hasRecentProgress(now);
                if (this.failures >= tuning.stuckFailureThreshold || stalled) {
                    this.transitionTo('stuck', `failures=${this.failures}`);
                }
                return false;
            }
            case 'stuck': {
                const elapsed = now - this.stuckSince;
                const anchor = this.stuckAnchor;
                const moved = anchor !== null
                    && (anchor.z !== pos.z || manhattan(anchor, pos) >= tuning.movementThreshold);
                if (elapsed >= tuning.stuckGraceMs && moved) {
                    this.transitionTo('normal', 'movement resumed');
                    return false;
                }
                if (elapsed >= tuning.stuckTimeoutMs && this.deps.recoveryEnabled !== false) {
                    this.transitionTo('recovering', `stuck for ${Math.round(elapsed)}ms`);
                    return true;
                }
                return false;
            }
            case 'recovering':
                if (now - this.recoveryStartedAt >= tuning.recoveryTimeoutMs) {
                    this.stop('recovery-timeout');
                    return true;
                }
                this.runRecoveryStep(pos);
                return true;
            case 'stopped':
                return true;
        }
    }

    private transitionTo(next: EngineState, reason: string): boolean {
        const from = this.state;
        if (!ALLOWED_TRANSITIONS[from].includes(next)) {
            this.deps.log.recordLog('ILLEGAL_TRANSITION', this.deps.getPosition(), `${from} -> ${next}`);
            return false;
        }

        const now = this.deps.now();
        this.state = next;
        switch (next) {
            case 'stuck':
                this.stuckSince = now;
                this.stuckAnchor = this.deps.getPosition();
                break;
            case 'recovering':
                this.recoveryAttempt = 0;
                this.recoveryStartedAt = now;
                break;
            case 'normal':
                this.failures = 0;
                this.retries = 0;
                this.recoveryAttempt = 0;
                this.stuckAnchor = null;
                this.deps.tracker.reset();
                break;
            case 'stopped':
                break;
        }
        this.deps.log.recordLog('STATE', this.deps.getPosition(), `${from} -> ${next}: ${reason}`);
        return true;
    }

    private stop(reason: StopReason) {
        if (!this.transitionTo('stopped', reason)) return;
        this.stopReason = reason;
        console.warn(`Tilewalker: Unable to recover (${reason}). Stopping.`);
        this.deps.lifecycle?.reportUnrecoverable(reason);
    }

    private runRecoveryStep(pos: Position) {
        const strategy = RECOVERY_LADDER[this.recoveryAttempt];
        if (strategy === undefined) {
            this.stop('strategies-exhausted');
            return;
        }
        this.recoveryAttempt++;

        const index = this.runStrategy(strategy, pos);
        if (index !== null) {
            if (strategy === 'skip-current') this.skipSpent = true;
            this.focus(index, strategy);
            this.deps.log.recordLog('RECOVERY_OK', pos, `${strategy} -> #${index}`);
            this.transitionTo('normal', `recovered by ${strategy}`);
            return;
        }

        this.deps.log.recordLog('RECOVERY_FAIL', pos, `${strategy} (${this.recoveryAttempt}/${RECOVERY_LADDER.length})`);
        if (this.recoveryAttempt >= RECOVERY_LADDER.length) this.stop('strategies-exhausted');
    }

    private runStrategy(strategy: RecoveryStrategy, pos: Position): number | null {
        const count = this.deps.waypoints.count();
        const focus = this.deps.waypoints.focusedIndex();
        switch (strategy) {
            case 'forward-search':
                return this.forwardSearch(pos);
            case 'backward-search':
                return this.backwardSearch(pos);
            case 'nearest-on-level':
                return this.nearestOnLevel(pos, true);
            case 'nearest-adjacent-levels':
                return this.nearestAcrossLevels(pos);
            case 'skip-current':
                return count > 1 && !this.skipSpent ? (focus + 1) % count : null;
            case 'skip-block': {
                const skip = Math.min(MAX_SKIP_BLOCK, Math.floor(count / 4));
                return skip >= 1 && count > skip ? (focus + skip) % count : null;
            }
        }
    }

    private forwardSearch(pos: Position): number | null {
        const focus = this.deps.waypoints.focusedIndex();
        const count = this.deps.waypoints.count();
        const entries: GotoEntry[] = [];
        for (let step = 1; step < count; step++) {
            const entry = this.gotoAt((focus + step) % count);
            if (entry && this.onLevelWithin(entry, pos, this.deps.tuning.waypointSearchDistance)) entries.push(entry);
        }
        entries.sort((a, b) => chebyshev(pos, a.target.position) - chebyshev(pos, b.target.position));
        // Only the nearest is checked; nearest-on-level checks more
        return this.firstReachable(entries.slice(0, 1), pos);
    }

    private backwardSearch(pos: Position): number | null {
        const focus = this.deps.waypoints.focusedIndex();
        const range = this.deps.tuning.waypointSearchDistance;
        const previous: GotoEntry[] = [];
        for (let index = focus - 1; index >= 0 && focus - index <= MAX_BACKWARD_SCAN; index--) {
            const entry = this.gotoAt(index);
            if (entry && entry.target.position.z === pos.z) previous.push(entry);
        }

        const close = previous.filter((entry) => chebyshev(pos, entry.target.position) <= range / 2);
        const found = this.firstReachable(close, pos);
        if (found !== null) return found;

        const extended = previous
            .filter((entry) => chebyshev(pos, entry.target.position) <= range * 2)
            .sort((a, b) => chebyshev(pos, a.target.position) - chebyshev(pos, b.target.position));
        return this.firstReachable(extended, pos, range * 2);
    }

    private nearestOnLevel(pos: Position, excludeFocus: boolean): number | null {
        const focus = this.deps.waypoints.focusedIndex();
        const entries = this.gotoEntries()
            .filter((entry) => !(excludeFocus && entry.index === focus))
            .filter((entry) => this.onLevelWithin(entry, pos, this.deps.tuning.waypointSearchDistance))
            .sort((a, b) => chebyshev(pos, a.target.position) - chebyshev(pos, b.target.position));
        return this.firstReachable(entries, pos);
    }

    private nearestAcrossLevels(pos: Position): number | null {
        const focus = this.deps.waypoints.focusedIndex();
        const range = this.deps.tuning.waypointSearchDistance;
        const entries = this.gotoEntries()
            .filter((entry) => entry.index !== focus)
            .filter((entry) => Math.abs(entry.target.position.z - pos.z) <= 1)
            .filter((entry) => chebyshev(pos, entry.target.position) <= range)
            .sort((a, b) => manhattan(pos, a.target.position) - manhattan(pos, b.target.position));

        let checked = 0;
        for (const entry of entries) {
            // Other levels cannot be planned; the nearest one is taken as is
            if (entry.target.position.z !== pos.z) return entry.index;
            if (checked >= this.deps.tuning.maxReachabilityChecks) continue;
            checked++;
            if (this.isReachable(pos, entry.target.position, range)) return entry.index;
        }
        return null;
    }

    private firstReachable(entries: GotoEntry[], pos: Position, range: number = this.deps.tuning.waypointSearchDistance): number | null {
        for (const entry of entries.slice(0, this.deps.tuning.maxReachabilityChecks)) {
            if (this.isReachable(pos, entry.target.position, range)) return entry.index;
        }
        return null;
    }

    private isReachable(pos: Position, target: Position, range: number): boolean {
        if (chebyshev(pos, target) <= 1) return true;
        return this.deps.planner.isReachable(pos, target, range, this.deps.tuning.reachabilityCheckBudget);
    }

    private onLevelWithin(entry: GotoEntry, pos: Position, range: number): boolean {
        return entry.target.position.z === pos.z && chebyshev(pos, entry.target.position) <= range;
    }

    private runFocusedAction(pos: Position) {
        const list = this.deps.waypoints;
        const count = list.count();
        if (count === 0) return;

        let index = list.focusedIndex();
        if (index < 0 || index >= count) {
            index = 0;
            list.focus(0);
        }
        const record = list.get(index);
        if (!record) return;

        const outcome = this.executeRecord(record, index, pos);
        if (outcome.kind === 'retry') {
            this.retries++;
            if (this.retries > this.deps.tuning.maxActionRetries) this.recordFailure();
            return;
        }

        this.retries = 0;
        if (outcome.success) this.recordSuccess();
        else this.recordFailure();

        if (this.state !== 'stopped' && list.focusedIndex() === index) {
            list.focus((index + 1) % count);
            this.deps.navigator.reset();
        }
    }

    private executeRecord(record: WaypointRecord, index: number, pos: Position): ActionOutcome {
        const target = parseGoto(record.text);
        if (target) return this.runGoto(target, record, index, pos);
        if (this.deps.actions) return this.deps.actions.run(record, this.retries);
        this.deps.log.recordLog('SKIP_OPAQUE', pos, `#${index} ${record.text}`);
        return { kind: 'done', success: true };
    }

    private runGoto(target: GotoTarget, record: WaypointRecord, index: number, pos: Position): ActionOutcome {
        if (this.retries >= this.deps.tuning.gotoMaxRetries) return { kind: 'done', success: false };

        const dest = target.position;
        const range = this.deps.tuning.waypointSearchDistance;
        const nextLevel = this.transitionLevelFor(dest, index);
        let result: WalkResult;
        if (nextLevel !== null) {
            if (!this.deps.floorGuard.activeIntent()) {
                this.deps.floorGuard.markIntentionalTransition(nextLevel, pos.z, record.id);
                this.deps.log.recordLog('INTENT', pos, `${formatPosition(dest)} -> z=${nextLevel}`);
            }
            result = this.deps.navigator.walkTo(dest, range, { precision: 0, allowFloorChange: true });
        } else {
            result = this.deps.navigator.walkTo(dest, range, target.precision === null ? {} : { precision: target.precision });
        }

        switch (result.status) {
            case 'arrived':
                return { kind: 'done', success: true };
            case 'in-progress':
                return { kind: 'retry' };
            case 'blocked':
                this.deps.log.recordLog('GOTO_BLOCKED', pos, `#${index} ${result.reason ?? ''}`);
                return { kind: 'done', success: false };
        }
    }

    /** Level the next goto lies on, when `dest` is a transition cell leading there. */
    private transitionLevelFor(dest: Position, index: number): number | null {
        if (!this.deps.classifier.isHazardous(dest)) return null;
        const count = this.deps.waypoints.count();
        for (let step = 1; step < count; step++) {
            const entry = this.gotoAt((index + step) % count);
            if (!entry) continue;
            return entry.target.position.z !== dest.z ? entry.target.position.z : null;
        }
        return null;
    }

    private focus(index: number, reason: string) {
        this.deps.waypoints.focus(index);
        this.deps.navigator.reset();
        this.deps.log.recordLog('FOCUS', this.deps.getPosition(), `#${index} (${reason})`);
    }

    private focusedRecord(): WaypointRecord | null {
        return this.deps.waypoints.get(this.deps.waypoints.focusedIndex());
    }

    private gotoAt(index: number): GotoEntry | null {
        const record = this.deps.waypoints.get(index);
        if (!record) return null;
        const target = parseGoto(record.text);
        return target ? { index, record, target } : null;
    }

    private gotoEntries(): GotoEntry[] {
        const entries: GotoEntry[] = [];
        for (let index = 0; index < this.deps.waypoints.count(); index++) {
            const entry = this.gotoAt(index);
            if (entry) entries.push(entry);
        }
        return entries;
    }

    private indexOfRecord(id: number): number {
        for (let index = 0; index < this.deps.waypoints.count(); index++) {
            if (this.deps.waypoints.get(index)?.id === id) return index;
        }
        return -1;
    }
}
