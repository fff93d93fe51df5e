import type { Position } from '@tilewalker/shared';
import { Runtime } from '@tilewalker/runtime';
import type { RuntimeOptions, TelemetrySink } from '@tilewalker/runtime';
import { FakeAgent, ManualClock, check, checkEqual, pos } from './support/fake-host';

class RecordingSink implements TelemetrySink {
    events: { type: string; payload: Record<string, unknown> }[] = [];

    send(type: string, payload: Record<string, unknown>) {
        this.events.push({ type, payload });
    }
}

class OfflineAgent extends FakeAgent {
    getPosition(): Position | null {
        throw new Error('map offline');
    }
}

function setup(options: RuntimeOptions = {}, agent: FakeAgent = new FakeAgent(pos(100, 100, 7), ['use:x'])) {
    const clock = new ManualClock();
    const runtime = new Runtime(agent, { ...options, now: clock.now });
    const tickAt = (time: number) => {
        clock.time = time;
        return runtime.tick();
    };
    return { agent, runtime, tickAt };
}

console.log('Running Runtime tests...');

// 1. Re-entrancy guard
{
    const { agent, tickAt } = setup();
    check(tickAt(0), 'first tick should run');
    check(!tickAt(50), 'tick 50ms later should be skipped');
    check(tickAt(150), 'tick after the minimum interval should run');
    check(agent.actions.runs === 2, 'skipped tick should not run the action');
}

// 2. Tick errors are contained
{
    const { runtime } = setup({}, new OfflineAgent(pos(100, 100, 7), ['use:x']));
    check(!runtime.tick(), 'failing tick should report false');
    check(runtime.snapshot().tickErrors === 1, 'failing tick should be counted');
}

// 3. Diagnostics forwarded to telemetry
{
    const sink = new RecordingSink();
    const { runtime, tickAt } = setup({ telemetry: sink, features: { enableTelemetry: true, enableRecovery: true } });
    runtime.engine.failures = 8;
    tickAt(0);
    check(sink.events.length === 1, 'state change should be the only forwarded event');
    check(sink.events[0].type === 'nav.state', 'event type should carry the log event name');
    check(sink.events[0].payload.detail === 'normal -> stuck: failures=8', 'payload should carry the transition');
    check(sink.events[0].payload.engineState === 'stuck', 'payload should carry the new state');
}
{
    const sink = new RecordingSink();
    const { runtime, tickAt } = setup({ telemetry: sink, features: { enableTelemetry: false, enableRecovery: true } });
    runtime.engine.failures = 8;
    tickAt(0);
    check(sink.events.length === 0, 'disabled telemetry should send nothing');
}

// 4. Accidental fall pauses the itinerary during the step back
{
    const { agent, runtime, tickAt } = setup();
    tickAt(0);
    agent.position = pos(101, 100, 7);
    tickAt(150);
    agent.position = pos(101, 101, 8);
    tickAt(300);
    check(runtime.floorGuard.mode === 'stepping-back', 'fall should trigger a step back');
    checkEqual(agent.movement.multiMoves[0].dest, pos(101, 100, 7), 'step back should head for the last safe cell');
    check(agent.actions.runs === 2, 'no action should run while stepping back');
}

// 5. Scheduler lifecycle
{
    const sink = new RecordingSink();
    const { runtime } = setup({ telemetry: sink, features: { enableTelemetry: true, enableRecovery: true } });
    runtime.start();
    check(runtime.running, 'start should mark the runtime running');
    runtime.stop();
    check(!runtime.running, 'stop should clear the running flag');
    checkEqual(sink.events[0], { type: 'boot', payload: { waypoints: 1 } }, 'start should announce itself');
    const snapshot = runtime.snapshot();
    check(!snapshot.running && snapshot.engine.state === 'normal', 'snapshot should report a stopped, healthy runtime');
    checkEqual(snapshot.pathCache, { entries: 0, hits: 0, misses: 0 }, 'no paths should be cached before any walk');
}

console.log('All Runtime tests passed!');
