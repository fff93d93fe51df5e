import { EventStore, parseEvent, readEngineStatus } from './store';

function check(condition: boolean, message: string) {
    if (!condition) {
        console.error(`FAILED: ${message}`);
        process.exit(1);
    }
}

console.log('Running EventStore tests...');

const store = new EventStore(3);

// 1. Ingest scrubs payloads
const first = store.ingest({ type: 'nav.state', payload: { agentKey: 'test-key', detail: 'normal -> stuck' }, timestamp: 5 }, 100);
check(first !== null, 'valid event should be stored');
check(JSON.stringify(first?.payload) === '{"agentKey":"[REDACTED]","detail":"normal -> stuck"}', 'agent key should be redacted');
check(first?.timestamp === 5 && first.receivedAt === 100, 'timestamps should be kept');

// 2. Rejected bodies
check(store.ingest({ payload: {} }, 101) === null, 'event without a type should be rejected');
check(store.ingest({ type: '' }, 102) === null, 'empty type should be rejected');
check(store.ingest('nav.state', 103) === null, 'bare string should be rejected');

const loose = parseEvent({ type: 'boot', payload: [1, 2], timestamp: 'now' });
check(JSON.stringify(loose) === '{"type":"boot","payload":{},"timestamp":null}', 'malformed payload and timestamp should be normalized');

// 3. Ring limit and listing
store.ingest({ type: 'boot', payload: { waypoints: 4 } }, 104);
store.ingest({ type: 'nav.state', payload: {} }, 105);
store.ingest({ type: 'nav.step_back', payload: {} }, 106);
store.ingest({ type: 'boot', payload: {} }, 107);
check(store.events.length === 3, 'store should keep only the newest events');
check(store.events[0].receivedAt === 105, 'oldest events should be dropped first');

check(store.recent('2').map((e) => e.type).join(',') === 'nav.step_back,boot', 'limit should come from the query string');
check(store.recent('abc').length === 3, 'bad limit should fall back to the default');
check(store.recent(10).length === 3, 'limit should be capped by the store size');

const stats = store.stats();
check(stats.retained === 3 && stats.maxEvents === 3, 'stats should report retention');
check(JSON.stringify(stats.counts) === '{"nav.state":1,"nav.step_back":1,"boot":1}', 'stats should count retained events by type');
check(stats.engine === null, 'nav events without engine context should not report a status');

// 4. Engine status from nav events
const live = new EventStore(10);
live.ingest({
    type: 'nav.state',
    payload: { event: 'STATE', x: 100, y: 101, z: 7, engineState: 'stuck', focus: 2, failures: 8, detail: 'normal -> stuck: failures=8' }
}, 200);
live.ingest({ type: 'nav.step_back', payload: { event: 'STEP_BACK', x: null, y: null, z: null, engineState: 'recovering', focus: 4, failures: 0 } }, 201);
live.ingest({ type: 'boot', payload: { waypoints: 6 } }, 202);
check(
    JSON.stringify(live.stats().engine) === '{"engineState":"recovering","focus":4,"failures":0,"position":null,"receivedAt":201}',
    'newest nav event should describe the engine'
);
const stuckEvent = live.events[0];
check(
    JSON.stringify(readEngineStatus(stuckEvent)) === '{"engineState":"stuck","focus":2,"failures":8,"position":"100,101,7","receivedAt":200}',
    'nav payload should yield state, focus and position'
);
check(readEngineStatus(live.events[2]) === null, 'non-nav event should carry no engine status');

console.log('All EventStore tests passed!');
