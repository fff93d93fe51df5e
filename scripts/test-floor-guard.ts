import type { FloorGuardTuning } from '@tilewalker/shared';
import { DEFAULT_TUNING } from '@tilewalker/runtime/config';
import { FloorGuard } from '@tilewalker/runtime/floor-guard';
import { NavLog } from '@tilewalker/runtime/nav-log';
import { PathPlanner } from '@tilewalker/runtime/planner';
import { TileSafetyClassifier } from '@tilewalker/runtime/tile-classifier';
import { GridMap, ManualClock, MovementRecorder, check, checkEqual, pos } from './support/fake-host';

function setup(overrides: Partial<FloorGuardTuning> = {}) {
    const map = new GridMap();
    const clock = new ManualClock();
    const movement = new MovementRecorder();
    const log = new NavLog();
    const classifier = new TileSafetyClassifier(map, DEFAULT_TUNING.classifier, clock.now);
    const planner = new PathPlanner(classifier, DEFAULT_TUNING.planner, clock.now);
    const guard = new FloorGuard(
        classifier,
        planner,
        movement,
        { ...DEFAULT_TUNING.floorGuard, ...overrides },
        clock.now,
        log
    );
    return { map, clock, movement, log, guard };
}

console.log('Running FloorGuard tests...');

// 1. Safe-position baseline
{
    const { map, guard } = setup();
    check(guard.observe(pos(50, 50, 7), pos(50, 50, 7)).kind === 'unchanged', 'same cell should be unchanged');
    check(guard.observe(pos(50, 50, 7), pos(51, 50, 7)).kind === 'same-level', 'walk on one level should be same-level');
    checkEqual(guard.lastSafePosition, pos(51, 50, 7), 'safe cell should become the baseline');
    check(guard.mode === 'tracking', 'first baseline should start tracking');

    map.placeItem(pos(60, 50, 7), 414);
    guard.observe(pos(51, 50, 7), pos(59, 50, 7));
    checkEqual(guard.lastSafePosition, pos(51, 50, 7), 'cell beside stairs should not become the baseline');
}

// 2. Declared intent
{
    const { guard, log } = setup();
    guard.markIntentionalTransition(8, 7, 42);
    checkEqual(guard.observe(pos(51, 50, 7), pos(51, 50, 8)), { kind: 'intentional', waypointId: 42 }, 'expected level change should be intentional');
    check(guard.intent === null, 'intent should be consumed');
    checkEqual(guard.lastSafePosition, pos(51, 50, 8), 'arrival cell should become the baseline');
    check(log.recent('FLOOR_INTENTIONAL').length === 1, 'intentional change should be logged');
}
{
    const { guard } = setup();
    guard.markIntentionalTransition(9, 7);
    check(guard.isTransitionIntentional(8), 'same direction within one level should be tolerated');
    check(!guard.isTransitionIntentional(6), 'opposite direction should not be tolerated');
    check(guard.isTransitionIntentional(9), 'exact level should match');
}
{
    const { guard } = setup({ intentDirectionTolerance: false });
    guard.markIntentionalTransition(9, 7);
    check(!guard.isTransitionIntentional(8), 'tolerance disabled should require the exact level');
}
{
    const { clock, guard } = setup();
    guard.markIntentionalTransition(8, 7);
    clock.time = 10000;
    check(guard.isTransitionIntentional(8), 'intent should hold until its timeout');
    clock.time = 10001;
    check(!guard.isTransitionIntentional(8), 'intent should expire after its timeout');
    check(guard.intent === null, 'expired intent should be cleared');
}

// 3. Accidental fall, step back, then loop detection
{
    const { clock, movement, log, guard } = setup();
    guard.observe(pos(49, 50, 7), pos(50, 50, 7));

    const fall = guard.observe(pos(50, 50, 7), pos(51, 50, 8));
    checkEqual(fall, { kind: 'stepping-back', target: pos(50, 50, 7) }, 'accidental fall should trigger a step back');
    check(movement.multiMoves.length === 1, 'step back should issue one move');
    checkEqual(movement.multiMoves[0].dest, pos(50, 50, 7), 'step back should head for the baseline');
    checkEqual(
        movement.multiMoves[0].options,
        { precision: 0, ignoreOccupants: true, allowFloorChange: true },
        'step back should permit the level change'
    );
    check(guard.stepBackAttempts === 1 && guard.isSteppingBack(), 'guard should be stepping back');

    clock.time = 100;
    guard.observe(pos(51, 50, 8), pos(50, 50, 8));
    checkEqual(guard.lastSafePosition, pos(50, 50, 7), 'walking during a step back should keep the baseline');

    clock.time = 200;
    check(guard.observe(pos(50, 50, 8), pos(50, 50, 7)).kind === 'recovered', 'returning to the baseline level should recover');
    check(log.recent('STEP_BACK_DONE').length === 1, 'recovery should be logged');

    clock.time = 300;
    checkEqual(guard.observe(pos(50, 50, 7), pos(50, 50, 8)), { kind: 'accepted', reason: 'loop' }, 'immediate repeat should be accepted as a loop');
    check(movement.multiMoves.length === 1, 'loop should not issue another step back');
    checkEqual(guard.lastSafePosition, pos(50, 50, 8), 'accepted level should become the baseline');
}

// 4. Other acceptance reasons
{
    const { guard } = setup();
    checkEqual(guard.observe(pos(50, 50, 7), pos(50, 50, 8)), { kind: 'accepted', reason: 'no-baseline' }, 'fall without baseline should be accepted');
}
{
    const { clock, guard } = setup();
    guard.observe(pos(49, 50, 7), pos(50, 50, 7));
    guard.observe(pos(50, 50, 7), pos(51, 50, 8));
    clock.time = 100;
    guard.observe(pos(51, 50, 8), pos(50, 50, 7));
    clock.time = 200;
    guard.observe(pos(50, 50, 7), pos(49, 50, 7));
    clock.time = 1000;
    checkEqual(guard.observe(pos(49, 50, 7), pos(49, 50, 6)), { kind: 'accepted', reason: 'cooldown' }, 'second fall inside the cooldown should be accepted');
}
{
    const { guard } = setup({ maxStepBackAttempts: 0 });
    guard.observe(pos(49, 50, 7), pos(50, 50, 7));
    checkEqual(guard.observe(pos(50, 50, 7), pos(51, 50, 8)), { kind: 'accepted', reason: 'attempts-exhausted' }, 'no attempts left should accept');
}
{
    const { map, movement, log, guard } = setup();
    guard.observe(pos(49, 50, 7), pos(50, 50, 7));
    map.block(pos(50, 50, 8));
    checkEqual(guard.observe(pos(50, 50, 7), pos(51, 50, 8)), { kind: 'accepted', reason: 'no-path-back' }, 'unreachable landing should accept');
    check(movement.multiMoves.length === 0, 'no move without a way back');
    check(guard.stepBackAttempts === 0, 'attempts should reset when there is no way back');
    check(log.recent('STEP_BACK_NO_PATH').length === 1, 'missing way back should be logged');
}
{
    const { map, movement, log, guard } = setup();
    guard.observe(pos(49, 50, 7), pos(50, 50, 7));
    map.block(pos(50, 50, 8));
    map.placeItem(pos(53, 50, 8), 1219);
    checkEqual(
        guard.observe(pos(50, 50, 7), pos(52, 50, 8)),
        { kind: 'stepping-back', target: pos(50, 50, 7) },
        'ladder beside the landing should offer a way back'
    );
    checkEqual(movement.multiMoves[0].dest, pos(50, 50, 7), 'step back should still head for the baseline');
    check(log.recent('STEP_BACK')[0].detail === 'to 50,50,7 via 53,50,8 attempt 1/3', 'step back should name the exit it found');
}

// 5. Step-back window and reset
{
    const { clock, log, guard } = setup();
    guard.observe(pos(49, 50, 7), pos(50, 50, 7));
    guard.observe(pos(50, 50, 7), pos(51, 50, 8));
    clock.time = 4000;
    check(guard.isSteppingBack(), 'step back should hold through cooldown plus walk time');
    clock.time = 4001;
    check(!guard.isSteppingBack(), 'step back should lapse after its window');
    check(guard.mode === 'tracking' && log.recent('STEP_BACK_TIMEOUT').length === 1, 'lapsed step back should return to tracking');

    guard.markIntentionalTransition(9, 8);
    guard.reset();
    check(guard.intent === null && guard.lastSafePosition === null, 'reset should clear intent and baseline');
    check(guard.stepBackAttempts === 0 && guard.mode === 'unknown', 'reset should clear attempts and mode');
}

console.log('All FloorGuard tests passed!');
