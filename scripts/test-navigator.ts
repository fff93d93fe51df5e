import type { Direction, ObstacleHandler, Position } from '@tilewalker/shared';
import { DEFAULT_TUNING } from '@tilewalker/runtime/config';
import { trailOf } from '@tilewalker/runtime/directions';
import { NavLog } from '@tilewalker/runtime/nav-log';
import { NavigationExecutor } from '@tilewalker/runtime/navigator';
import { PathCache } from '@tilewalker/runtime/path-cache';
import { PathPlanner } from '@tilewalker/runtime/planner';
import { neighborsOf, samePosition } from '@tilewalker/runtime/position';
import { TileSafetyClassifier } from '@tilewalker/runtime/tile-classifier';
import { GridMap, ManualClock, MovementRecorder, StubObstacles, check, checkEqual, pos } from './support/fake-host';

function setup(obstacles: ObstacleHandler | null = null) {
    const map = new GridMap();
    const clock = new ManualClock();
    const movement = new MovementRecorder();
    const log = new NavLog();
    let agent: Position = pos(100, 100, 7);
    const classifier = new TileSafetyClassifier(map, DEFAULT_TUNING.classifier, clock.now);
    const cache = new PathCache(DEFAULT_TUNING.pathCache, clock.now);
    const planner = new PathPlanner(classifier, DEFAULT_TUNING.planner, clock.now);
    const navigator = new NavigationExecutor(
        () => agent,
        classifier,
        cache,
        planner,
        movement,
        DEFAULT_TUNING.navigation,
        clock.now,
        log,
        obstacles
    );
    const moveTo = (next: Position) => {
        agent = next;
    };
    return { map, clock, movement, log, cache, navigator, moveTo };
}

console.log('Running NavigationExecutor tests...');

// 1. Arrival and level checks
{
    const { movement, navigator } = setup();
    const near = navigator.walkTo(pos(101, 100, 7), 50);
    check(near.status === 'arrived' && near.issuedSteps === 0, 'destination within default precision counts as arrived');
    const other = navigator.walkTo(pos(101, 100, 8), 50);
    check(other.status === 'blocked' && other.reason === 'floor-mismatch', 'other level without permission should be blocked');
    check(movement.multiMoves.length === 0 && movement.singleSteps.length === 0, 'no movement should be issued');
}

// 2. Short path in one chunk
{
    const { movement, cache, navigator, moveTo } = setup();
    const dest = pos(110, 100, 7);
    const first = navigator.walkTo(dest, 50, { precision: 0 });
    check(first.status === 'in-progress' && first.issuedSteps === 10, 'ten-step path should be issued whole');
    check(movement.multiMoves.length === 1, 'one multi-step move should be issued');
    checkEqual(movement.multiMoves[0].dest, dest, 'chunk should end on the destination');
    check(movement.multiMoves[0].maxDistance === 50, 'move should carry the search range');

    navigator.reset();
    check(navigator.cursor === null && cache.size === 1, 'reset should drop the cursor but keep cached paths');

    moveTo(dest);
    check(navigator.walkTo(dest, 50, { precision: 0 }).status === 'arrived', 'agent on the destination should arrive');
}

// 3. Waiting on a moving host, then re-anchoring mid-chunk
{
    const { movement, navigator, moveTo } = setup();
    const dest = pos(150, 100, 7);
    const first = navigator.walkTo(dest, 50, { precision: 0 });
    check(first.issuedSteps === 40, 'long path should be chunked at forty steps');
    checkEqual(movement.multiMoves[0].dest, pos(140, 100, 7), 'first chunk should stop forty cells east');

    moveTo(pos(120, 100, 7));
    movement.moving = true;
    const waiting = navigator.walkTo(dest, 50, { precision: 0 });
    check(waiting.status === 'in-progress' && waiting.issuedSteps === 0, 'moving host should not be interrupted');
    check(movement.multiMoves.length === 1, 'no new move while the host is moving');

    moveTo(pos(125, 100, 7));
    movement.moving = false;
    const resumed = navigator.walkTo(dest, 50, { precision: 0 });
    check(resumed.issuedSteps === 25, 'cursor should re-anchor on the current cell');
    checkEqual(movement.multiMoves[1].dest, dest, 'remaining chunk should end on the destination');
}

// 4. Hazardous destination with a single safe neighbor
{
    const { map, movement, log, navigator, moveTo } = setup();
    const stairs = pos(104, 100, 7);
    map.placeItem(stairs, 414);
    map.block(...neighborsOf(stairs).filter((cell) => !samePosition(cell, pos(103, 100, 7))));

    for (const x of [101, 102, 103]) {
        const step = navigator.walkTo(stairs, 50);
        check(step.status === 'in-progress' && step.issuedSteps === 1, 'cells beside stairs should be walked one at a time');
        checkEqual(step.target, pos(103, 100, 7), 'substitute should replace the stairs');
        moveTo(pos(x, 100, 7));
    }
    checkEqual(movement.singleSteps, ['east', 'east', 'east'], 'three single steps should be issued');
    check(movement.multiMoves.length === 0, 'no multi-step move next to a hazard');
    check(log.recent('SAFE_SUBSTITUTE').length === 1, 'substitute should be chosen once and reused');
    check(navigator.walkTo(stairs, 50).status === 'arrived', 'standing beside the stairs counts as arrived');
}

// 5. Hazardous destination without a safe neighbor
{
    const { map, log, navigator } = setup();
    const stairs = pos(104, 100, 7);
    map.placeItem(stairs, 414);
    map.block(...neighborsOf(stairs));
    const result = navigator.walkTo(stairs, 50);
    check(result.status === 'blocked' && result.reason === 'destination-hazardous', 'enclosed stairs should be refused');
    check(log.recent('NO_SAFE_SUBSTITUTE').length === 1, 'missing substitute should be logged');
}

// 5b. Distant hazardous destination on open ground
{
    const { map, movement, log, navigator } = setup();
    const hole = pos(120, 100, 7);
    map.placeItem(hole, 294);
    const result = navigator.walkTo(hole, 50);
    check(result.status === 'in-progress' && result.issuedSteps === 1, 'far hole should still get a substitute');
    checkEqual(result.target, pos(119, 100, 7), 'substitute should be the neighbor straight ahead');
    checkEqual(movement.singleSteps, ['east'], 'walk toward the substitute should start east');
    check(log.recent('SAFE_SUBSTITUTE')[0].detail === '120,100,7 -> 119,100,7', 'substitution should be logged');
    const cursor = navigator.cursor;
    check(cursor !== null && cursor.steps.length === 19, 'path to the substitute should be nineteen steps');
}
{
    const { map, navigator } = setup();
    map.placeItem(pos(108, 100, 7), 294);
    const substitute = navigator.findSafeSubstitute(pos(100, 100, 7), pos(108, 100, 7), 50, {});
    checkEqual(substitute, pos(107, 100, 7), 'equal Chebyshev distance should prefer the straight neighbor');
}

// 6. Cached path that now crosses a hazard
{
    const { map, movement, log, cache, navigator } = setup();
    const start = pos(100, 100, 7);
    const dest = pos(106, 100, 7);
    const stale: Direction[] = ['east', 'east', 'east', 'east', 'east', 'east'];
    cache.put(start, dest, stale);
    map.placeItem(pos(103, 100, 7), 414);

    const result = navigator.walkTo(dest, 50, { precision: 0 });
    check(result.status === 'in-progress' && result.issuedSteps === 1, 'replanned path near stairs should be walked step by step');
    check(log.recent('PATH_CROSSES_HAZARD').length === 1, 'hazard on the cached path should be logged');
    check(movement.singleSteps.length === 1 && movement.multiMoves.length === 0, 'one single step should be issued');
    const cursor = navigator.cursor;
    check(cursor !== null && cursor.steps.length === 6, 'replacement path should still take six steps');
    check(
        cursor !== null && !trailOf(start, cursor.steps).some((cell) => samePosition(cell, pos(103, 100, 7))),
        'replacement path should avoid the stairs'
    );
}

// 7. Boxed in: obstacle handler is the last resort
{
    const handler = new StubObstacles(true);
    const { map, log, navigator } = setup(handler);
    map.block(...neighborsOf(pos(100, 100, 7)));
    const handled = navigator.walkTo(pos(110, 100, 7), 50, { precision: 0 });
    check(handled.status === 'in-progress', 'resolved obstacle should keep the walk going');
    check(handler.calls.length === 1, 'obstacle handler should be consulted once');
    check(log.recent('NO_PATH').length === 1, 'exhausted tiers should be logged');

    handler.resolves = false;
    const stuck = navigator.walkTo(pos(110, 100, 7), 50, { precision: 0 });
    check(stuck.status === 'blocked' && stuck.reason === 'no-path', 'unresolved obstacle should block');
}

// 8. Host refuses the move
{
    const { movement, navigator } = setup();
    movement.accept = false;
    const result = navigator.walkTo(pos(110, 100, 7), 50, { precision: 0 });
    check(result.status === 'blocked' && result.reason === 'movement-rejected', 'rejected move should block');
    check(navigator.cursor === null, 'rejected move should drop the cursor');
}

// 9. Level change delegated to the host
{
    const { movement, navigator } = setup();
    const result = navigator.walkTo(pos(105, 100, 8), 50, { allowFloorChange: true });
    check(result.status === 'in-progress', 'cross-level walk should be handed to the host');
    checkEqual(movement.multiMoves[0].options, { precision: 1, allowFloorChange: true }, 'host move should allow the level change');
}

// 10. Chunk sizing
{
    const { navigator } = setup();
    const straight: Direction[] = new Array<Direction>(30).fill('east');
    check(navigator.chunkSizeFor(straight, 0) === 30, 'thirty straight steps should go in one chunk');
    const zigzag: Direction[] = Array.from({ length: 20 }, (_, i): Direction => (i % 2 === 0 ? 'east' : 'south'));
    check(navigator.chunkSizeFor(zigzag, 0) === 12, 'zigzag path should shrink the chunk');
    check(navigator.chunkSizeFor(straight, 26) === 4, 'short remainder should go whole');
    check(navigator.chunkSizeFor(zigzag, 16) === 3, 'short zigzag remainder should shrink to three');
}

console.log('All NavigationExecutor tests passed!');
