import { countTurns, directionBetween, trailOf } from '@tilewalker/runtime/directions';
import { chebyshev, formatGoto, manhattan, octile, parseGoto, positionKey } from '@tilewalker/runtime/position';
import { check, checkEqual, pos } from './support/fake-host';

console.log('Running position and direction tests...');

// 1. goto parsing
const plain = parseGoto('goto:10,20,7');
checkEqual(plain, { position: { x: 10, y: 20, z: 7 }, precision: null }, 'goto without precision should parse');
check(plain !== null && formatGoto(plain) === 'goto:10,20,7', 'goto should format back to its text');

const precise = parseGoto('goto: 1, 2, 3, 4');
check(precise?.precision === 4, 'trailing precision should parse');
check(precise !== null && formatGoto(precise) === 'goto:1,2,3,4', 'precision should be kept when formatting');
checkEqual(parseGoto('goto:-5,8,0')?.position, { x: -5, y: 8, z: 0 }, 'negative coordinates should parse');

check(parseGoto('say:hello') === null, 'non-goto text should not parse');
check(parseGoto('goto:1,2') === null, 'goto with two coordinates should not parse');
check(parseGoto('goto:a,b,c') === null, 'goto with non-numeric coordinates should not parse');

// 2. Distances
const origin = pos(0, 0, 7);
const far = pos(3, -5, 7);
check(chebyshev(origin, far) === 5, 'chebyshev distance should be the larger axis delta');
check(manhattan(origin, far) === 8, 'manhattan distance should sum axis deltas');
check(Math.abs(octile(origin, far) - 6.23) < 1e-9, 'octile distance should weight the shorter axis');

// 3. Keys
check(positionKey(pos(1, 2, 7)) !== positionKey(pos(1, 2, 8)), 'keys should differ across levels');
check(positionKey(pos(1, 2, 7)) === positionKey(pos(1, 2, 7)), 'keys should be stable');

// 4. Directions
check(directionBetween(pos(5, 5, 7), pos(6, 4, 7)) === 'north-east', 'up and right should be north-east');
check(directionBetween(pos(5, 5, 7), pos(7, 5, 7)) === null, 'non-adjacent cells have no direction');
check(directionBetween(pos(5, 5, 7), pos(6, 5, 8)) === null, 'cells on different levels have no direction');
checkEqual(trailOf(origin, ['east', 'south']), [pos(1, 0, 7), pos(1, 1, 7)], 'trail should exclude the origin');
check(countTurns(['east', 'east', 'south', 'east']) === 2, 'two direction changes should count as two turns');
check(countTurns([]) === 0, 'empty path has no turns');

console.log('All position tests passed!');
