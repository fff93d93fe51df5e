export interface Position {
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export declare type Direction =
    | 'north'
    | 'north-east'
    | 'east'
    | 'south-east'
    | 'south'
    | 'south-west'
    | 'west'
    | 'north-west';

// Pre-colored layer answer; only 'level-transition' short-circuits classification
export declare type CoarseHazardSignal = 'clear' | 'level-transition' | 'unknown';

export interface TileInfo {
    walkable: boolean;
    occupantIds: number[];
    groundId: number | null;
    hasOccupant: boolean;
}

/**
 * Read access to the host's world. Returns null for cells that are not loaded
 * or not visible. Called at high frequency; the engine caches around it.
 */
export interface MapQuery {
    getTile(pos: Position): TileInfo | null;
    getCoarseHazardSignal(pos: Position): CoarseHazardSignal;
}

export interface MoveOptions {
    precision?: number;
    ignoreOccupants?: boolean;
    allowFloorChange?: boolean;
}

/** Fire-and-forget movement requests; outcomes are observed on later ticks. */
export interface MovementPrimitive {
    issueMultiStepMove(dest: Position, maxDistance: number, options: MoveOptions): boolean;
    issueSingleStep(direction: Direction): boolean;
    isCurrentlyMoving(): boolean;
    estimateStepDuration(): number;
}

export interface WaypointRecord {
    id: number;
    text: string;
}

/** Externally owned itinerary. The engine only moves the focus pointer. */
export interface WaypointList {
    count(): number;
    get(index: number): WaypointRecord | null;
    focusedIndex(): number;
    focus(index: number): void;
}

export interface ObstacleHandler {
    tryResolve(dest: Position): boolean;
}

export interface LifecycleSignal {
    reportUnrecoverable(reason: string): void;
}

export declare type ActionOutcome =
    | { kind: 'done'; success: boolean }
    | { kind: 'retry' };

/** Runs waypoint records that are not gotos (doors, item handling, labels). */
export interface WaypointActionHandler {
    run(record: WaypointRecord, retries: number): ActionOutcome;
}

export interface AgentHost {
    map: MapQuery;
    movement: MovementPrimitive;
    waypoints: WaypointList;
    getPosition(): Position | null;
    obstacles?: ObstacleHandler;
    lifecycle?: LifecycleSignal;
    actions?: WaypointActionHandler;
}

export interface ClassifierTuning {
    cacheTtlMs: number;
    cleanupIntervalMs: number;
}

export interface PathCacheTuning {
    ttlMs: number;
    maxEntries: number;
    driftTolerance: number;
}

export interface PlannerTuning {
    nodeBudget: number;
    timeBudgetMs: number;
    allowDiagonal: boolean;
    shortcutDistance: number;
}

export interface NavigationTuning {
    maxPathDistance: number;
    maxChunkSteps: number;
    validateSteps: number;
    cursorTtlMs: number;
    defaultPrecision: number;
}

export interface FloorGuardTuning {
    intentTimeoutMs: number;
    stepBackCooldownMs: number;
    maxStepBackAttempts: number;
    stepBackMaxDistance: number;
    loopWindowMs: number;
    historyCapacity: number;
    intentDirectionTolerance: boolean;
}

export interface EngineTuning {
    tickIntervalMs: number;
    minTickIntervalMs: number;
    stuckFailureThreshold: number;
    noProgressFailureThreshold: number;
    stuckGraceMs: number;
    stuckTimeoutMs: number;
    recoveryTimeoutMs: number;
    progressCapacity: number;
    sampleIntervalMs: number;
    progressWindowMs: number;
    movementThreshold: number;
    maxActionRetries: number;
    gotoMaxRetries: number;
    waypointSearchDistance: number;
    reachabilityCheckBudget: number;
    maxReachabilityChecks: number;
}

export interface Tuning {
    classifier: ClassifierTuning;
    pathCache: PathCacheTuning;
    planner: PlannerTuning;
    navigation: NavigationTuning;
    floorGuard: FloorGuardTuning;
    engine: EngineTuning;
}

export declare type TuningOverrides = {
    [K in keyof Tuning]?: Partial<Tuning[K]>;
};

export interface Config {
    key: string;
    engine: 'on' | 'off';
    tuning?: TuningOverrides;
}

export interface FeatureFlags {
    enableTelemetry: boolean;
    enableRecovery: boolean;
}

export interface TelemetryEvent {
    type: string;
    payload: Record<string, unknown>;
    timestamp: number;
}

export interface SignedConfig {
    config: Config;
    features: FeatureFlags;
    allowed: boolean;
    killSwitch: boolean;
    notBefore: number;
    notAfter: number;
    signature: string;
    version: string;
}
