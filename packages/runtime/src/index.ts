import type { AgentHost, FeatureFlags, Position, TuningOverrides, Tuning } from '@tilewalker/shared';
import { mergeTuning, systemClock } from './config';
import type { Clock } from './config';
import { FloorGuard } from './floor-guard';
import { NavLog } from './nav-log';
import type { NavLogEntry } from './nav-log';
import { NavigationExecutor } from './navigator';
import { PathCache } from './path-cache';
import type { PathCacheStats } from './path-cache';
import { PathPlanner } from './planner';
import { samePosition } from './position';
import { ProgressTracker } from './progress-tracker';
import type { TelemetrySink } from './telemetry';
import { TileSafetyClassifier } from './tile-classifier';
import type { ClassifierStats } from './tile-classifier';
import { WaypointEngine } from './waypoint-engine';
import type { EngineSnapshot } from './waypoint-engine';

export * from './config';
export * from './directions';
export * from './floor-guard';
export * from './hazard-catalog';
export * from './nav-log';
export * from './navigator';
export * from './path-cache';
export * from './planner';
export * from './position';
export * from './progress-tracker';
export * from './telemetry';
export * from './tile-classifier';
export * from './waypoint-engine';

// Log events worth shipping off-process
const DIAGNOSTIC_EVENTS = new Set([
    'STATE',
    'RECOVERY_OK',
    'RECOVERY_FAIL',
    'FLOOR_INTENTIONAL',
    'FLOOR_ACCEPTED',
    'STEP_BACK',
    'STEP_BACK_DONE',
    'NO_SAFE_SUBSTITUTE',
    'ENGINE_RESET'
]);

export interface RuntimeSnapshot {
    engine: EngineSnapshot;
    classifier: ClassifierStats;
    pathCache: PathCacheStats;
    tickErrors: number;
    running: boolean;
}

export interface RuntimeOptions {
    tuning?: TuningOverrides;
    features?: FeatureFlags;
    telemetry?: TelemetrySink;
    now?: Clock;
}

/**
 * One automated agent: owns every cache, cursor and state machine for that
 * agent and drives them from a fixed-period scheduler.
 */
export class Runtime {
    tuning: Tuning;
    log: NavLog;
    classifier: TileSafetyClassifier;
    pathCache: PathCache;
    planner: PathPlanner;
    navigator: NavigationExecutor;
    floorGuard: FloorGuard;
    tracker: ProgressTracker;
    engine: WaypointEngine;
    running = false;
    tickErrors = 0;
    private lastPosition: Position | null = null;
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(private host: AgentHost, private options: RuntimeOptions = {}) {
        const now = options.now ?? systemClock;
        const getPosition = () => host.getPosition();
        this.tuning = mergeTuning(options.tuning);
        this.log = new NavLog();
        this.classifier = new TileSafetyClassifier(host.map, this.tuning.classifier, now);
        this.pathCache = new PathCache(this.tuning.pathCache, now);
        this.planner = new PathPlanner(this.classifier, this.tuning.planner, now);
        this.navigator = new NavigationExecutor(
            getPosition,
            this.classifier,
            this.pathCache,
            this.planner,
            host.movement,
            this.tuning.navigation,
            now,
            this.log,
            host.obstacles ?? null
        );
        this.floorGuard = new FloorGuard(this.classifier, this.planner, host.movement, this.tuning.floorGuard, now, this.log);
        this.tracker = new ProgressTracker({
            capacity: this.tuning.engine.progressCapacity,
            sampleIntervalMs: this.tuning.engine.sampleIntervalMs,
            windowMs: this.tuning.engine.progressWindowMs,
            movementThreshold: this.tuning.engine.movementThreshold
        });
        this.engine = new WaypointEngine({
            waypoints: host.waypoints,
            getPosition,
            classifier: this.classifier,
            planner: this.planner,
            navigator: this.navigator,
            floorGuard: this.floorGuard,
            tracker: this.tracker,
            log: this.log,
            tuning: this.tuning.engine,
            now,
            recoveryEnabled: options.features?.enableRecovery ?? true,
            lifecycle: host.lifecycle,
            actions: host.actions
        });

        this.log.subscribe((entry) => this.forwardDiagnostic(entry));
    }

    start() {
        if (this.running) return;
        this.running = true;
        this.lastPosition = this.host.getPosition();
        this.timer = setInterval(() => this.tick(), this.tuning.engine.tickIntervalMs);
        console.log('Tilewalker: Runtime started');
        if (this.options.features?.enableTelemetry) {
            this.options.telemetry?.send('boot', { waypoints: this.host.waypoints.count() });
        }
    }

    stop() {
        this.running = false;
        if (this.timer !== null) clearInterval(this.timer);
        this.timer = null;
        console.log('Tilewalker: Runtime stopped');
    }

    /** One scheduler period: reconcile the position delta, then step the engine. */
    tick(): boolean {
        try {
            const pos = this.host.getPosition();
            if (pos) {
                if (this.lastPosition && !samePosition(this.lastPosition, pos)) {
                    this.engine.onPositionChange(this.lastPosition, pos);
                }
                this.lastPosition = pos;
            }
            return this.engine.tick();
        } catch (e) {
            this.tickErrors++;
            console.error('Tilewalker: Tick Loop Error', e);
            return false;
        }
    }

    /** Routine reset keeps floor intent; a full reset clears it as well. */
    reset(full: boolean = false) {
        this.engine.reset(full);
        this.lastPosition = this.host.getPosition();
    }

    snapshot(): RuntimeSnapshot {
        return {
            engine: this.engine.snapshot(),
            classifier: this.classifier.stats(),
            pathCache: this.pathCache.stats(),
            tickErrors: this.tickErrors,
            running: this.running
        };
    }

    private forwardDiagnostic(entry: NavLogEntry) {
        const sink = this.options.telemetry;
        if (!sink || !this.options.features?.enableTelemetry || !DIAGNOSTIC_EVENTS.has(entry.event)) return;
        sink.send(`nav.${entry.event.toLowerCase()}`, {
            event: entry.event,
            x: entry.x,
            y: entry.y,
            z: entry.z,
            engineState: entry.engineState,
            focus: entry.focus,
            failures: entry.failures,
            detail: entry.detail
        });
    }
}

export function init(host: AgentHost, options: RuntimeOptions = {}): Runtime {
    const runtime = new Runtime(host, options);
    runtime.start();
    return runtime;
}
