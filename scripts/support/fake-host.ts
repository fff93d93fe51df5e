import type {
    ActionOutcome,
    AgentHost,
    CoarseHazardSignal,
    Direction,
    LifecycleSignal,
    MapQuery,
    MoveOptions,
    MovementPrimitive,
    ObstacleHandler,
    Position,
    TileInfo,
    WaypointActionHandler,
    WaypointList,
    WaypointRecord
} from '@tilewalker/shared';
import { positionKey } from '@tilewalker/runtime/position';

const PLAIN_GROUND = 100;

export function check(condition: boolean, message: string) {
    if (!condition) {
        console.error(`FAILED: ${message}`);
        process.exit(1);
    }
}

export function checkEqual<T>(actual: T, expected: T, message: string) {
    const a = JSON.stringify(actual);
    const e = JSON.stringify(expected);
    if (a !== e) console.error(`  Expected: ${e}\n  Actual:   ${a}`);
    check(a === e, message);
}

export function pos(x: number, y: number, z: number): Position {
    return { x, y, z };
}

export class ManualClock {
    time: number;

    constructor(start: number = 0) {
        this.time = start;
    }

    now = () => this.time;

    advance(ms: number) {
        this.time += ms;
    }
}

/**
 * Unbounded grid where every cell is plain walkable ground until told
 * otherwise. Counts queries so cache behavior can be asserted.
 */
export class GridMap implements MapQuery {
    tileQueries = 0;
    signalQueries = 0;
    private blocked = new Set<number>();
    private hidden = new Set<number>();
    private occupied = new Set<number>();
    private items = new Map<number, number[]>();
    private grounds = new Map<number, number>();
    private signals = new Map<number, CoarseHazardSignal>();

    block(...cells: Position[]) {
        for (const cell of cells) this.blocked.add(positionKey(cell));
    }

    unblock(cell: Position) {
        this.blocked.delete(positionKey(cell));
    }

    hide(cell: Position) {
        this.hidden.add(positionKey(cell));
    }

    occupy(cell: Position) {
        this.occupied.add(positionKey(cell));
    }

    placeItem(cell: Position, id: number) {
        const key = positionKey(cell);
        this.items.set(key, [...(this.items.get(key) ?? []), id]);
    }

    setGround(cell: Position, id: number) {
        this.grounds.set(positionKey(cell), id);
    }

    markTransitionLayer(cell: Position) {
        this.signals.set(positionKey(cell), 'level-transition');
    }

    getTile(cell: Position): TileInfo | null {
        this.tileQueries++;
        const key = positionKey(cell);
        if (this.hidden.has(key)) return null;
        return {
            walkable: !this.blocked.has(key),
            occupantIds: this.items.get(key) ?? [],
            groundId: this.grounds.get(key) ?? PLAIN_GROUND,
            hasOccupant: this.occupied.has(key)
        };
    }

    getCoarseHazardSignal(cell: Position): CoarseHazardSignal {
        this.signalQueries++;
        return this.signals.get(positionKey(cell)) ?? 'clear';
    }
}

export interface MultiStepCall {
    dest: Position;
    maxDistance: number;
    options: MoveOptions;
}

export class MovementRecorder implements MovementPrimitive {
    multiMoves: MultiStepCall[] = [];
    singleSteps: Direction[] = [];
    moving = false;
    accept = true;
    stepDuration = 200;

    issueMultiStepMove(dest: Position, maxDistance: number, options: MoveOptions): boolean {
        this.multiMoves.push({ dest, maxDistance, options });
        return this.accept;
    }

    issueSingleStep(direction: Direction): boolean {
        this.singleSteps.push(direction);
        return this.accept;
    }

    isCurrentlyMoving(): boolean {
        return this.moving;
    }

    estimateStepDuration(): number {
        return this.stepDuration;
    }
}

export class ArrayWaypointList implements WaypointList {
    records: WaypointRecord[];
    focusIndex = 0;
    focusHistory: number[] = [];

    constructor(texts: string[]) {
        this.records = texts.map((text, i) => ({ id: i + 1, text }));
    }

    count(): number {
        return this.records.length;
    }

    get(index: number): WaypointRecord | null {
        return this.records[index] ?? null;
    }

    focusedIndex(): number {
        return this.focusIndex;
    }

    focus(index: number) {
        this.focusIndex = index;
        this.focusHistory.push(index);
    }
}

export class RecordingLifecycle implements LifecycleSignal {
    reasons: string[] = [];

    reportUnrecoverable(reason: string) {
        this.reasons.push(reason);
    }
}

export class StubObstacles implements ObstacleHandler {
    calls: Position[] = [];

    constructor(public resolves: boolean) {}

    tryResolve(dest: Position): boolean {
        this.calls.push(dest);
        return this.resolves;
    }
}

// Non-goto records never finish
export class PendingActions implements WaypointActionHandler {
    runs = 0;

    run(_record: WaypointRecord, _retries: number): ActionOutcome {
        this.runs++;
        return { kind: 'retry' };
    }
}

export class FakeAgent implements AgentHost {
    map = new GridMap();
    movement = new MovementRecorder();
    waypoints: ArrayWaypointList;
    lifecycle = new RecordingLifecycle();
    actions = new PendingActions();
    position: Position | null;

    constructor(start: Position, texts: string[] = []) {
        this.position = start;
        this.waypoints = new ArrayWaypointList(texts);
    }

    getPosition(): Position | null {
        return this.position;
    }
}
