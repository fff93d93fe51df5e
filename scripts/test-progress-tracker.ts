import { ProgressTracker } from '@tilewalker/runtime/progress-tracker';
import { check, pos } from './support/fake-host';

console.log('Running ProgressTracker tests...');

const tracker = new ProgressTracker({ capacity: 4, sampleIntervalMs: 1000, windowMs: 15000, movementThreshold: 3 });

// 1. Rate limiting
check(tracker.sample(0, pos(0, 0, 7), 1), 'first sample should be stored');
check(!tracker.sample(500, pos(0, 0, 7), 1), 'sample inside the interval should be dropped');
check(tracker.length === 1, 'dropped sample should not be counted');

// 2. Displacement against the threshold
tracker.sample(1000, pos(1, 0, 7), 1);
tracker.sample(2000, pos(2, 0, 7), 1);
check(tracker.displacement(2000) === 2, 'two cells of travel should be measured');
check(!tracker.hasRecentProgress(2000), 'two cells should be below the threshold');
tracker.sample(3000, pos(3, 0, 7), 2);
check(tracker.hasRecentProgress(3000), 'three cells should count as progress');

// 3. Ring wrap keeps the newest samples
tracker.sample(4000, pos(4, 0, 7), 2);
check(tracker.length === 4, 'ring should stay at capacity');
check(tracker.window(4000)[0].position.x === 1, 'oldest sample should be overwritten');
check(tracker.displacement(4000) === 3, 'displacement should span the surviving samples');

// 4. Trailing window
check(tracker.displacement(16000) === 3, 'samples within fifteen seconds should count');
check(tracker.window(17500).length === 2, 'older samples should fall out of the window');
check(tracker.displacement(17500) === 1, 'displacement should use only windowed samples');
check(tracker.displacement(20000) === 0, 'empty window should report no displacement');

// 5. Level change counts as progress
tracker.reset();
check(tracker.length === 0, 'reset should empty the ring');
tracker.sample(0, pos(0, 0, 7), null);
tracker.sample(1000, pos(0, 0, 8), null);
check(tracker.hasRecentProgress(1000), 'changing level should count as progress');

console.log('All ProgressTracker tests passed!');
