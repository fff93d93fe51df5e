import type { Direction, Position } from '@tilewalker/shared';

export const CARDINAL_COST = 1;
export const DIAGONAL_COST = 1.41;

export interface DirectionSpec {
    name: Direction;
    dx: number;
    dy: number;
    cost: number;
}

// Cardinal first so ties in the search favor straight moves
export const CARDINAL_DIRECTIONS: readonly DirectionSpec[] = [
    { name: 'north', dx: 0, dy: -1, cost: CARDINAL_COST },
    { name: 'east', dx: 1, dy: 0, cost: CARDINAL_COST },
    { name: 'south', dx: 0, dy: 1, cost: CARDINAL_COST },
    { name: 'west', dx: -1, dy: 0, cost: CARDINAL_COST }
];

export const DIAGONAL_DIRECTIONS: readonly DirectionSpec[] = [
    { name: 'north-east', dx: 1, dy: -1, cost: DIAGONAL_COST },
    { name: 'south-east', dx: 1, dy: 1, cost: DIAGONAL_COST },
    { name: 'south-west', dx: -1, dy: 1, cost: DIAGONAL_COST },
    { name: 'north-west', dx: -1, dy: -1, cost: DIAGONAL_COST }
];

export const ALL_DIRECTIONS: readonly DirectionSpec[] = [...CARDINAL_DIRECTIONS, ...DIAGONAL_DIRECTIONS];

const BY_NAME = new Map<Direction, DirectionSpec>(ALL_DIRECTIONS.map((spec) => [spec.name, spec]));

export function directionSpec(direction: Direction): DirectionSpec {
    const spec = BY_NAME.get(direction);
    if (!spec) throw new Error(`Unknown direction: ${direction}`);
    return spec;
}

/** Direction of a single step between two cells, or null when they are not adjacent. */
export function directionBetween(from: Position, to: Position): Direction | null {
    if (from.z !== to.z) return null;
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    for (const spec of ALL_DIRECTIONS) {
        if (spec.dx === dx && spec.dy === dy) return spec.name;
    }
    return null;
}

export function applyStep(pos: Position, direction: Direction): Position {
    const spec = directionSpec(direction);
    return { x: pos.x + spec.dx, y: pos.y + spec.dy, z: pos.z };
}

/** Every cell visited after each step, excluding the origin. */
export function trailOf(origin: Position, steps: readonly Direction[]): Position[] {
    const trail: Position[] = [];
    let cursor = origin;
    for (const step of steps) {
        cursor = applyStep(cursor, step);
        trail.push(cursor);
    }
    return trail;
}

export function countTurns(steps: readonly Direction[]): number {
    let turns = 0;
    for (let i = 1; i < steps.length; i++) {
        if (steps[i] !== steps[i - 1]) turns++;
    }
    return turns;
}
