import { DEFAULT_TUNING } from '@tilewalker/runtime/config';
import { HazardCatalog } from '@tilewalker/runtime/hazard-catalog';
import { TileSafetyClassifier } from '@tilewalker/runtime/tile-classifier';
import { GridMap, ManualClock, check, pos } from './support/fake-host';

function setup() {
    const map = new GridMap();
    const clock = new ManualClock();
    const classifier = new TileSafetyClassifier(map, DEFAULT_TUNING.classifier, clock.now);
    return { map, clock, classifier };
}

console.log('Running TileSafetyClassifier tests...');

// 1. Catalog lookups
const catalog = new HazardCatalog();
check(catalog.transitionKind(414) === 'stairs', '414 should be a staircase');
check(catalog.transitionKind(1956) === 'ramps', '1956 should be a ramp');
check(catalog.fieldKind(1487) === 'fire', '1487 should be a fire field');
check(!catalog.isTransition(1487), 'fire field should not be a level transition');
check(!catalog.isTransition(100) && !catalog.isField(100), 'plain ground should be neither');

// 2. Cached verdicts do not touch the map
{
    const { map, classifier } = setup();
    const cell = pos(10, 10, 7);
    const first = classifier.classify(cell);
    const tileQueries = map.tileQueries;
    const signalQueries = map.signalQueries;
    const second = classifier.classify(cell);
    check(first === second, 'classification within the TTL should be reused');
    check(map.tileQueries === tileQueries && map.signalQueries === signalQueries, 'cache hit should not query the map');
    check(classifier.stats().hits === 1 && classifier.stats().misses === 1, 'stats should count one hit and one miss');
    check(first.walkable && first.known && !first.hazardous && !first.occupied && !first.field, 'plain cell should be safe');
}

// 3. Hazard sources
{
    const { map, classifier } = setup();
    const layer = pos(1, 1, 7);
    const stairs = pos(2, 1, 7);
    const ramp = pos(3, 1, 7);
    const fire = pos(4, 1, 7);
    map.markTransitionLayer(layer);
    map.placeItem(stairs, 414);
    map.setGround(ramp, 1956);
    map.placeItem(fire, 1487);
    map.occupy(fire);

    check(classifier.isHazardous(layer), 'pre-colored transition cell should be hazardous');
    check(map.tileQueries === 0 && map.signalQueries === 1, 'positive layer signal should skip the tile query');
    check(classifier.isHazardous(stairs), 'cell holding stairs should be hazardous');
    check(classifier.isHazardous(ramp), 'ramp ground should be hazardous');
    const fireCell = classifier.classify(fire);
    check(fireCell.field && !fireCell.hazardous, 'fire should be a field, not a transition');
    check(fireCell.occupied, 'occupant flag should be reported');
}

// 4. Unresolved cells
{
    const { map, classifier } = setup();
    const hidden = pos(5, 5, 7);
    map.hide(hidden);
    const verdict = classifier.classify(hidden);
    check(!verdict.known && !verdict.walkable && !verdict.hazardous, 'unresolved cell should be non-walkable and non-hazardous');

    const hiddenTransition = pos(6, 5, 7);
    map.hide(hiddenTransition);
    map.markTransitionLayer(hiddenTransition);
    check(classifier.isHazardous(hiddenTransition), 'layer signal should mark an unresolved cell hazardous');
}

// 5. TTL expiry
{
    const { map, clock, classifier } = setup();
    const cell = pos(20, 20, 7);
    check(classifier.classify(cell).walkable, 'cell should start walkable');
    map.block(cell);
    clock.time = 1999;
    check(classifier.classify(cell).walkable, 'stale verdict should be served inside the TTL');
    clock.time = 2000;
    check(!classifier.classify(cell).walkable, 'verdict should refresh once the TTL lapses');
}

// 6. Neighborhood checks
{
    const { map, classifier } = setup();
    map.placeItem(pos(10, 10, 7), 414);
    check(classifier.isNearHazard(pos(11, 11, 7)), 'diagonal neighbor of stairs should be near a hazard');
    check(classifier.isNearHazard(pos(10, 10, 7)), 'stairs cell itself should be near a hazard');
    check(!classifier.isNearHazard(pos(13, 10, 7)), 'cell three away should not be near a hazard');
}

// 7. Periodic cleanup and invalidation
{
    const { clock, classifier } = setup();
    classifier.classify(pos(1, 1, 7));
    clock.time = 4000;
    classifier.classify(pos(2, 2, 7));
    clock.time = 5000;
    classifier.classify(pos(2, 2, 7));
    check(classifier.stats().entries === 1, 'cleanup should drop only expired entries');
    classifier.invalidate();
    check(classifier.stats().entries === 0, 'invalidate should empty the cache');
}

console.log('All TileSafetyClassifier tests passed!');
