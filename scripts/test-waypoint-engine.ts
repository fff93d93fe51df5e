import { Runtime } from '@tilewalker/runtime';
import type { RuntimeOptions } from '@tilewalker/runtime';
import { neighborsOf } from '@tilewalker/runtime/position';
import { FakeAgent, ManualClock, check, checkEqual, pos } from './support/fake-host';

function setup(texts: string[], options: RuntimeOptions = {}) {
    const agent = new FakeAgent(pos(100, 100, 7), texts);
    const clock = new ManualClock();
    const runtime = new Runtime(agent, { ...options, now: clock.now });
    const tickAt = (time: number) => {
        clock.time = time;
        return runtime.tick();
    };
    return { agent, clock, runtime, engine: runtime.engine, tickAt };
}

// Drives a stuck engine into recovery: stuck at t=0, recovering at t=5000
function enterRecovery(env: ReturnType<typeof setup>) {
    env.engine.failures = 8;
    env.tickAt(0);
    check(env.engine.state === 'stuck', 'eight failures should mark the engine stuck');
    env.tickAt(5000);
    check(env.engine.state === 'recovering', 'five seconds stuck should start recovery');
}

console.log('Running WaypointEngine tests...');

// 1. Forward search recovers to the nearest goto ahead
{
    const env = setup(['use:door', 'goto:104,100,7', 'goto:130,100,7', 'goto:100,100,8']);
    enterRecovery(env);
    check(env.agent.actions.runs === 1, 'focused action should still run while stuck');
    env.tickAt(5150);
    checkEqual(
        env.engine.snapshot(),
        { state: 'normal', failures: 0, retries: 0, recoveryAttempt: 0, focus: 1, stopReason: null },
        'forward search should refocus the nearest goto and resume'
    );
    check(env.runtime.log.recent('RECOVERY_OK')[0].detail === 'forward-search -> #1', 'recovery should name the strategy');
    checkEqual(
        env.runtime.log.recent('STATE').map((e) => e.detail),
        ['normal -> stuck: failures=8', 'stuck -> recovering: stuck for 5000ms', 'recovering -> normal: recovered by forward-search'],
        'state changes should be logged in order'
    );
}

// 2. Nothing to recover to: the ladder runs out
{
    const env = setup(['use:lever']);
    enterRecovery(env);
    for (let i = 1; i <= 6; i++) env.tickAt(5000 + i * 150);
    check(env.engine.state === 'stopped', 'exhausted ladder should stop the engine');
    check(env.engine.stopReason === 'strategies-exhausted', 'stop reason should be recorded');
    check(env.runtime.log.recent('RECOVERY_FAIL').length === 6, 'each strategy should fail once');
    env.tickAt(6500);
    checkEqual(env.agent.lifecycle.reasons, ['strategies-exhausted'], 'unrecoverable state should be reported once');

    env.runtime.reset();
    check(env.engine.state === 'normal' && env.engine.stopReason === null, 'reset should leave the stopped state');
}

// 3. Recovery timeout
{
    const env = setup(['use:lever'], { tuning: { engine: { recoveryTimeoutMs: 100 } } });
    enterRecovery(env);
    env.tickAt(5150);
    check(env.engine.snapshot().stopReason === 'recovery-timeout', 'slow recovery should time out');
    checkEqual(env.agent.lifecycle.reasons, ['recovery-timeout'], 'timeout should be reported');
}

// 4. Skip-current when there are no gotos to search
{
    const env = setup(['use:a', 'use:b']);
    enterRecovery(env);
    for (let i = 1; i <= 5; i++) env.tickAt(5000 + i * 150);
    check(env.engine.state === 'normal', 'skipping the record should recover');
    check(env.agent.waypoints.focusedIndex() === 1, 'focus should move to the next record');
    check(env.runtime.log.recent('RECOVERY_OK')[0].detail === 'skip-current -> #1', 'skip-current should be the winning strategy');
}

// 5. Backward search reaches a previous goto beyond the forward range
{
    const env = setup(['goto:170,100,7', 'use:lever']);
    env.agent.waypoints.focusIndex = 1;
    enterRecovery(env);
    env.tickAt(5150);
    env.tickAt(5300);
    check(env.engine.state === 'normal', 'backward search should recover');
    check(env.runtime.log.recent('RECOVERY_OK')[0].detail === 'backward-search -> #0', 'backward search should find the earlier goto');
    checkEqual(
        env.runtime.log.recent('RECOVERY_FAIL').map((e) => e.detail),
        ['forward-search (1/6)'],
        'forward search should fail first'
    );
}

// 6. Nearest on level looks past an unreachable nearest goto
{
    const env = setup(['use:lever', 'goto:104,100,7', 'goto:120,100,7']);
    const walled = pos(104, 100, 7);
    env.agent.map.block(walled, ...neighborsOf(walled));
    enterRecovery(env);
    for (const t of [5150, 5300, 5450]) env.tickAt(t);
    check(env.agent.waypoints.focusedIndex() === 2, 'focus should move to the reachable goto');
    check(env.runtime.log.recent('RECOVERY_OK')[0].detail === 'nearest-on-level -> #2', 'nearest-on-level should win');
    checkEqual(
        env.runtime.log.recent('RECOVERY_FAIL').map((e) => e.detail),
        ['forward-search (1/6)', 'backward-search (2/6)'],
        'forward and backward searches should fail first'
    );
}

// 7. Adjacent levels: the other-level goto is taken without a reachability check
{
    const env = setup(['use:lever', 'goto:104,100,7', 'goto:110,100,8']);
    const walled = pos(104, 100, 7);
    env.agent.map.block(walled, ...neighborsOf(walled));
    enterRecovery(env);
    for (const t of [5150, 5300, 5450, 5600]) env.tickAt(t);
    check(env.engine.state === 'normal', 'adjacent-level search should recover');
    check(env.agent.waypoints.focusedIndex() === 2, 'focus should move to the goto one level down');
    check(env.runtime.log.recent('RECOVERY_OK')[0].detail === 'nearest-adjacent-levels -> #2', 'adjacent-level search should win');
    check(env.runtime.log.recent('RECOVERY_FAIL').length === 3, 'three strategies should fail before it');
}

// 8. A second stall right after a skip escalates to skipping a block
{
    const env = setup(['use:a', 'use:b', 'use:c', 'use:d', 'use:e', 'use:f', 'use:g', 'use:h']);
    enterRecovery(env);
    for (let i = 1; i <= 5; i++) env.tickAt(5000 + i * 150);
    check(env.agent.waypoints.focusedIndex() === 1, 'first recovery should skip one record');

    env.engine.failures = 8;
    env.tickAt(6000);
    env.tickAt(11000);
    check(env.engine.state === 'recovering', 'second stall should recover again');
    for (let i = 1; i <= 6; i++) env.tickAt(11000 + i * 150);
    check(env.engine.state === 'normal', 'skip-block should recover');
    check(env.agent.waypoints.focusedIndex() === 3, 'skip-block should jump two of eight records');
    checkEqual(
        env.runtime.log.recent('RECOVERY_OK').map((e) => e.detail),
        ['skip-current -> #1', 'skip-block -> #3'],
        'skip should escalate'
    );
}

// 9. Movement resumed while stuck
{
    const env = setup(['use:x']);
    env.engine.failures = 8;
    env.tickAt(0);
    check(env.engine.state === 'stuck', 'eight failures should mark the engine stuck');
    env.agent.position = pos(103, 100, 7);
    env.tickAt(1000);
    check(env.engine.state === 'stuck', 'movement inside the grace period should not clear stuck');
    env.tickAt(3000);
    check(env.engine.state === 'normal' && env.engine.failures === 0, 'movement after the grace period should resume');
    check(env.runtime.log.recent('STATE')[1].detail === 'stuck -> normal: movement resumed', 'resume should be logged');
}

// 10. Blocked gotos without displacement
{
    const env = setup(['goto:100,100,8', 'goto:101,101,8', 'goto:102,102,8', 'goto:103,103,8']);
    for (const t of [0, 150, 300]) env.tickAt(t);
    check(env.engine.state === 'normal' && env.engine.failures === 3, 'each blocked goto should count one failure');
    check(env.runtime.log.recent('GOTO_BLOCKED').length === 3, 'blocked gotos should be logged');
    env.tickAt(450);
    check(env.engine.state === 'stuck', 'failures without displacement should mark the engine stuck');
    check(env.runtime.log.recent('STATE')[0].detail === 'normal -> stuck: failures=3', 'stall should be logged with its failure count');
}
{
    const env = setup(['goto:100,100,8', 'goto:101,101,8', 'goto:102,102,8', 'goto:103,103,8']);
    env.tickAt(0);
    env.agent.position = pos(103, 100, 7);
    env.tickAt(1000);
    env.tickAt(2000);
    env.tickAt(3000);
    check(env.engine.failures === 4, 'blocked gotos should keep counting');
    check(env.engine.state === 'normal', 'failures with displacement should not mark the engine stuck');
}

// 11. Goto progression
{
    const env = setup(['goto:101,100,7,0', 'use:x']);
    env.tickAt(0);
    checkEqual(env.agent.movement.singleSteps, ['east'], 'one-cell goto should issue a single step');
    check(env.engine.retries === 1, 'walk in progress should count as a retry');

    env.agent.position = pos(101, 100, 7);
    env.tickAt(150);
    check(env.agent.waypoints.focusedIndex() === 1, 'arrival should advance the focus');
    check(env.engine.retries === 0 && env.engine.failures === 0, 'arrival should clear counters');
}

// 12. Long-running actions turn into failures
{
    const env = setup(['use:x']);
    for (let i = 0; i < 21; i++) env.tickAt(i * 150);
    check(env.engine.retries === 21, 'every pending tick should count as a retry');
    check(env.engine.failures === 1, 'retries past the limit should count as failures');
    check(env.agent.waypoints.focusedIndex() === 0, 'pending action should keep the focus');
}

// 13. Declared level change completes the transition waypoint
{
    const env = setup(['goto:104,100,7', 'goto:104,110,8']);
    env.agent.map.placeItem(pos(104, 100, 7), 414);
    env.agent.position = pos(103, 100, 7);
    env.tickAt(0);
    check(env.runtime.floorGuard.activeIntent()?.expectedFloor === 8, 'stairs goto should declare the next level');
    checkEqual(env.agent.movement.singleSteps, ['east'], 'agent should step onto the stairs');

    env.agent.position = pos(104, 100, 8);
    env.tickAt(150);
    check(env.runtime.log.recent('FLOOR_INTENTIONAL').length === 1, 'level change should match the intent');
    check(env.agent.waypoints.focusedIndex() === 1, 'transition waypoint should be completed');
    check(env.agent.movement.multiMoves.length === 1, 'next goto should start walking on the new level');
}

console.log('All WaypointEngine tests passed!');
