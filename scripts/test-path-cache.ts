import type { Direction } from '@tilewalker/shared';
import { DEFAULT_TUNING } from '@tilewalker/runtime/config';
import { PathCache } from '@tilewalker/runtime/path-cache';
import { ManualClock, check, pos } from './support/fake-host';

console.log('Running PathCache tests...');

const origin = pos(100, 100, 7);
const dest = pos(120, 100, 7);

// 1. Drift tolerance
{
    const cache = new PathCache(DEFAULT_TUNING.pathCache, new ManualClock().now);
    const steps: Direction[] = ['east', 'east', 'east'];
    cache.put(origin, dest, steps);
    steps.push('south');
    check(cache.get(pos(102, 101, 7), dest)?.steps.length === 3, 'entry should be copied and served within drift 2');
    check(cache.get(pos(103, 100, 7), dest) === null, 'drift of 3 should miss');
    check(cache.size === 0, 'stale entry should be removed on read');
    check(cache.get(origin, dest) === null, 'removed entry should stay gone');
}

// 2. Level change
{
    const cache = new PathCache(DEFAULT_TUNING.pathCache, new ManualClock().now);
    cache.put(origin, dest, ['east']);
    check(cache.get(pos(100, 100, 8), dest) === null, 'origin on another level should miss');
}

// 3. TTL
{
    const clock = new ManualClock();
    const cache = new PathCache(DEFAULT_TUNING.pathCache, clock.now);
    cache.put(origin, dest, ['east']);
    clock.time = 800;
    check(cache.get(origin, dest) !== null, 'entry should be served at exactly the TTL');
    clock.time = 801;
    check(cache.get(origin, dest) === null, 'entry should expire past the TTL');
    const stats = cache.stats();
    check(stats.hits === 1 && stats.misses === 1 && stats.entries === 0, 'stats should track hits and misses');
}

// 4. Eviction by last access
{
    const clock = new ManualClock();
    const cache = new PathCache({ ...DEFAULT_TUNING.pathCache, maxEntries: 2 }, clock.now);
    const a = pos(110, 100, 7);
    const b = pos(100, 110, 7);
    const c = pos(90, 100, 7);
    cache.put(origin, a, ['east']);
    clock.time = 10;
    cache.put(origin, b, ['south']);
    clock.time = 20;
    cache.get(origin, a);
    clock.time = 30;
    cache.put(origin, c, ['west']);
    check(cache.size === 2, 'cache should stay at capacity');
    check(cache.get(origin, b) === null, 'least recently used entry should be evicted');
    check(cache.get(origin, a) !== null && cache.get(origin, c) !== null, 'recent entries should survive');

    cache.delete(a);
    check(cache.get(origin, a) === null, 'deleted entry should miss');
    cache.clear();
    check(cache.size === 0, 'clear should empty the cache');
}

console.log('All PathCache tests passed!');
