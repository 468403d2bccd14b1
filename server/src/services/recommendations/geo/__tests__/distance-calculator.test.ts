/**
 * Distance Calculator Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DistanceCalculator,
  distanceFromUser,
  filterPlacesWithinRadius,
  isWithinRadius
} from '../distance-calculator.js';
import { makePlace, northOf } from '../../__tests__/test-helpers.js';

const origin = { lat: 40.7128, lng: -74.006 };

describe('DistanceCalculator', () => {
  const calculator = new DistanceCalculator();

  it('is zero for the same point', () => {
    assert.equal(calculator.haversine(10, 20, 10, 20), 0);
  });

  it('measures one degree of latitude as about 111.19 km', () => {
    const km = calculator.haversine(0, 0, 1, 0);
    assert.ok(Math.abs(km - 111.195) < 0.01, `got ${km}`);
  });

  it('converts to miles', () => {
    const miles = calculator.distanceInMiles(origin, northOf(origin, 1.25));
    assert.ok(Math.abs(miles - 1.25) < 1e-9, `got ${miles}`);
  });
});

describe('radius helpers', () => {
  it('returns null distance for a place without coordinates', () => {
    assert.equal(distanceFromUser(makePlace({ id: 'x' }), origin), null);
  });

  it('includes the boundary and excludes beyond it', () => {
    assert.equal(isWithinRadius(origin, northOf(origin, 1.99), 2), true);
    assert.equal(isWithinRadius(origin, northOf(origin, 2.01), 2), false);
  });

  it('drops places outside the radius and places without coordinates', () => {
    const kept = filterPlacesWithinRadius([
      makePlace({ id: 'near', coordinates: northOf(origin, 0.5) }),
      makePlace({ id: 'far', coordinates: northOf(origin, 3) }),
      makePlace({ id: 'nowhere' })
    ], origin, 2);

    assert.deepEqual(kept.map(p => p.id), ['near']);
  });
});
