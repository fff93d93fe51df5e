import type { Position } from '@tilewalker/shared';

// x and y fit in 16 bits on every supported map; z is a small floor index
const AXIS_SPAN = 65536;
const GOTO_PATTERN = /^goto:\s*(-?\d+)\s*,\s*(-?\d+)\s*,\s*(-?\d+)\s*(?:,\s*(\d+)\s*)?$/;

export interface GotoTarget {
    position: Position;
    precision: number | null;
}

export function positionKey(pos: Position): number {
    return (pos.z * AXIS_SPAN + pos.y) * AXIS_SPAN + pos.x;
}

export function samePosition(a: Position, b: Position): boolean {
    return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function chebyshev(a: Position, b: Position): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function manhattan(a: Position, b: Position): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function octile(a: Position, b: Position): number {
    const dx = Math.abs(a.x - b.x);
    const dy = Math.abs(a.y - b.y);
    return Math.max(dx, dy) + 0.41 * Math.min(dx, dy);
}

export function neighborsOf(pos: Position): Position[] {
    const cells: Position[] = [];
    for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
            if (dx === 0 && dy === 0) continue;
            cells.push({ x: pos.x + dx, y: pos.y + dy, z: pos.z });
        }
    }
    return cells;
}

export function formatPosition(pos: Position): string {
    return `${pos.x},${pos.y},${pos.z}`;
}

/** Parses `goto:x,y,z` with an optional trailing precision. Anything else yields null. */
export function parseGoto(text: string): GotoTarget | null {
    const match = GOTO_PATTERN.exec(text.trim());
    if (!match) return null;
    return {
        position: { x: Number(match[1]), y: Number(match[2]), z: Number(match[3]) },
        precision: match[4] === undefined ? null : Number(match[4])
    };
}

export function formatGoto(target: GotoTarget): string {
    const base = `goto:${formatPosition(target.position)}`;
    return target.precision === null ? base : `${base},${target.precision}`;
}
