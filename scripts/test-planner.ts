import { DEFAULT_TUNING } from '@tilewalker/runtime/config';
import { trailOf } from '@tilewalker/runtime/directions';
import { PathPlanner } from '@tilewalker/runtime/planner';
import type { PlanOutcome, PlannedPath } from '@tilewalker/runtime/planner';
import { neighborsOf, samePosition } from '@tilewalker/runtime/position';
import { TileSafetyClassifier } from '@tilewalker/runtime/tile-classifier';
import { GridMap, ManualClock, check, checkEqual, pos } from './support/fake-host';

function setup(allowDiagonal: boolean = true) {
    const map = new GridMap();
    const clock = new ManualClock();
    const classifier = new TileSafetyClassifier(map, DEFAULT_TUNING.classifier, clock.now);
    const planner = new PathPlanner(classifier, { ...DEFAULT_TUNING.planner, allowDiagonal }, clock.now);
    return { map, planner };
}

function pathOf(outcome: PlanOutcome, message: string): PlannedPath {
    if (!outcome.ok) {
        console.error(`FAILED: ${message} (${outcome.reason})`);
        process.exit(1);
    }
    return outcome.path;
}

console.log('Running PathPlanner tests...');

const start = pos(100, 100, 7);
const fiveEast = pos(105, 100, 7);

// 1. Straight-line shortcut
{
    const { planner } = setup();
    const path = pathOf(planner.findPath(start, fiveEast, 50), 'open line should plan');
    checkEqual(path.steps, ['east', 'east', 'east', 'east', 'east'], 'shortcut should walk straight east');
    check(path.shortcut && path.expanded === 0, 'short open line should skip the search');
}

// 2. Detour around a wall
{
    const { map, planner } = setup();
    const wall = pos(103, 100, 7);
    map.block(wall);
    const path = pathOf(planner.findPath(start, fiveEast, 50), 'blocked line should detour');
    check(!path.shortcut, 'detour should come from the search');
    check(path.steps.length === 5, 'detour should take five steps');
    check(Math.abs(path.cost - 5.82) < 1e-9, 'detour should use two diagonals');
    const trail = trailOf(start, path.steps);
    check(!trail.some((cell) => samePosition(cell, wall)), 'detour should avoid the wall');
    check(samePosition(trail[trail.length - 1], fiveEast), 'detour should end on the destination');
}

// 3. Rejections
{
    const { map, planner } = setup();
    const floor = planner.findPath(start, pos(105, 100, 8), 50);
    check(!floor.ok && floor.reason === 'floor-mismatch', 'destination on another level should be rejected');

    const range = planner.findPath(start, fiveEast, 3);
    check(!range.ok && range.reason === 'out-of-range', 'destination beyond max distance should be rejected');

    map.block(...neighborsOf(fiveEast));
    const budget = planner.findPath(start, fiveEast, 50, {}, 40);
    check(!budget.ok && budget.reason === 'budget-exceeded' && budget.expanded === 40, 'enclosed destination should exhaust the budget');
    check(!planner.isReachable(start, fiveEast, 50, 150), 'enclosed destination should not be reachable');
    check(planner.isReachable(start, pos(100, 110, 7), 50, 150), 'open destination should be reachable');
}
{
    const { map, planner } = setup();
    for (let y = 97; y <= 103; y++) map.block(pos(102, y, 7));
    const walled = planner.findPath(start, pos(103, 100, 7), 3);
    check(!walled.ok && walled.reason === 'no-path', 'wall spanning the search box should exhaust the open set');
}

// 4. Precision
{
    const { planner } = setup();
    const path = pathOf(planner.findPath(start, pos(110, 100, 7), 50, { precision: 2 }), 'precision goal should plan');
    check(path.steps.length === 8 && path.steps.every((s) => s === 'east'), 'search should stop two cells short');

    const near = pathOf(planner.findPath(start, pos(101, 101, 7), 50, { precision: 1 }), 'adjacent goal should plan');
    check(near.steps.length === 0, 'goal within precision needs no steps');
}

// 5. Relaxed options
{
    const { map, planner } = setup();
    map.occupy(pos(102, 100, 7));
    check(!pathOf(planner.findPath(start, fiveEast, 50), 'occupant should be avoided').shortcut, 'occupant should force a detour');
    const through = pathOf(planner.findPath(start, fiveEast, 50, { ignoreOccupants: true }), 'occupant may be ignored');
    check(through.shortcut && through.steps.length === 5, 'ignoring occupants should restore the straight line');
}
{
    const { map, planner } = setup();
    map.hide(pos(102, 100, 7));
    const unseen = pathOf(planner.findPath(start, fiveEast, 50, { allowUnseen: true }), 'unseen cell may be allowed');
    check(unseen.shortcut && unseen.steps.length === 5, 'allowing unseen cells should restore the straight line');
    check(!planner.isPassable(pos(102, 100, 7), {}), 'unseen cell should be impassable by default');
}
{
    const { map, planner } = setup();
    map.placeItem(pos(102, 100, 7), 1487);
    check(!planner.isPassable(pos(102, 100, 7), {}), 'field should be impassable by default');
    check(planner.isPassable(pos(102, 100, 7), { ignoreFields: true }), 'field should be passable when ignored');
}
{
    const { map, planner } = setup();
    map.placeItem(fiveEast, 414);
    const refused = planner.findPath(start, fiveEast, 10);
    check(!refused.ok && refused.reason === 'no-path', 'stairs destination should be refused by default');
    const allowed = pathOf(planner.findPath(start, fiveEast, 10, { transitionAt: fiveEast }), 'named transition may be entered');
    check(allowed.steps.length === 5, 'named transition should be reachable in a straight line');
    check(!planner.isPassable(fiveEast, { transitionAt: pos(1, 1, 7) }), 'only the named transition cell is passable');
}

// 6. Cardinal-only grids
{
    const { planner } = setup(false);
    const path = pathOf(planner.findPath(start, pos(102, 102, 7), 50), 'cardinal path should plan');
    checkEqual(path.steps, ['east', 'east', 'south', 'south'], 'cardinal shortcut should move along x first');
}

console.log('All PathPlanner tests passed!');
