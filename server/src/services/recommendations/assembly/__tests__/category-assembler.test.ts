/**
 * Category Assembler Tests
 * Non-empty output, template fallback, demo set, ordering
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CategoryAssembler, shufflePlaces, type PlaceSearcher } from '../category-assembler.js';
import { createScoringSnapshot } from '../../ranking/place-scorer.js';
import { distanceFromUser } from '../../geo/distance-calculator.js';
import type { SearchArea } from '../../places/place-search.adapter.js';
import type { Place } from '../../types.js';
import { makeDescriptor, makePlace, northOf, seededRandom } from '../../__tests__/test-helpers.js';

const origin = { lat: 40.7128, lng: -74.006 };
const area: SearchArea = { origin, radiusMiles: 2 };
const snapshot = createScoringSnapshot(null);
// Always picks the last index: Fisher-Yates leaves the order unchanged
const identityRandom = () => 0.999999;

class FakeSearcher implements PlaceSearcher {
  readonly queries: string[] = [];

  constructor(private readonly results: Record<string, Place[]>) { }

  async search(query: string): Promise<Place[]> {
    this.queries.push(query);
    return this.results[query] ?? [];
  }
}

function placesFor(prefix: string, count = 2): Place[] {
  return Array.from({ length: count }, (_, i) =>
    makePlace({ id: `${prefix}-${i}`, coordinates: northOf(origin, 0.2 * (i + 1)) })
  );
}

const TEMPLATE_RESULTS: Record<string, Place[]> = {
  restaurant: placesFor('restaurant'),
  cafe: placesFor('cafe'),
  bar: placesFor('bar'),
  entertainment: placesFor('entertainment'),
  store: placesFor('store')
};

describe('CategoryAssembler', () => {
  it('keeps personalized categories with places, ordered by confidence', async () => {
    const searcher = new FakeSearcher({
      'ramen query': placesFor('ramen'),
      'tacos query': placesFor('tacos'),
      'empty query': [],
      'jazz query': placesFor('jazz')
    });
    const assembler = new CategoryAssembler(searcher, identityRandom);

    const result = await assembler.assemble({
      descriptors: [
        makeDescriptor({ id: 'ramen', searchQuery: 'ramen query', confidence: 0.7 }),
        makeDescriptor({ id: 'tacos', searchQuery: 'tacos query', confidence: 0.95 }),
        makeDescriptor({ id: 'empty', searchQuery: 'empty query', confidence: 0.99 }),
        makeDescriptor({ id: 'jazz', searchQuery: 'jazz query', confidence: 0.8 })
      ],
      area,
      snapshot
    });

    assert.equal(result.source, 'personalized');
    assert.deepEqual(result.categories.map(c => c.id), ['tacos', 'jazz', 'ramen']);
    assert.ok(result.categories.every(c => c.places.length > 0));
    assert.equal(searcher.queries.length, 4);
  });

  it('replaces a lone survivor with the templates', async () => {
    const searcher = new FakeSearcher({ ...TEMPLATE_RESULTS, 'ramen query': placesFor('ramen') });
    const assembler = new CategoryAssembler(searcher, identityRandom);

    const result = await assembler.assemble({
      descriptors: [
        makeDescriptor({ id: 'ramen', searchQuery: 'ramen query', confidence: 0.95 }),
        makeDescriptor({ id: 'nothing', searchQuery: 'nothing query' })
      ],
      area,
      snapshot
    });

    assert.equal(result.source, 'fallback');
    assert.deepEqual(result.categories.map(c => c.id), [
      'coffee_shops',
      'top_restaurants',
      'bars_lounges',
      'entertainment',
      'shopping'
    ]);
  });

  it('never grows past the template set when two categories survive', async () => {
    const searcher = new FakeSearcher({
      ...TEMPLATE_RESULTS,
      'ramen query': placesFor('ramen'),
      'tacos query': placesFor('tacos')
    });
    const assembler = new CategoryAssembler(searcher, identityRandom);

    const result = await assembler.assemble({
      descriptors: [
        makeDescriptor({ id: 'ramen', searchQuery: 'ramen query', confidence: 0.95 }),
        makeDescriptor({ id: 'tacos', searchQuery: 'tacos query', confidence: 0.9 })
      ],
      area,
      snapshot
    });

    assert.equal(result.source, 'fallback');
    assert.equal(result.categories.length, 5);
    assert.ok(result.categories.every(c => c.id !== 'ramen' && c.id !== 'tacos'));
  });

  it('serves exactly the five templates when generation produced nothing', async () => {
    const assembler = new CategoryAssembler(new FakeSearcher(TEMPLATE_RESULTS), identityRandom);

    const result = await assembler.assemble({ descriptors: [], area, snapshot });

    assert.equal(result.source, 'fallback');
    assert.deepEqual(result.categories.map(c => c.id), [
      'coffee_shops',
      'top_restaurants',
      'bars_lounges',
      'entertainment',
      'shopping'
    ]);
    assert.deepEqual(result.categories.map(c => c.searchQuery), ['cafe', 'restaurant', 'bar', 'entertainment', 'store']);
  });

  it('skips templates whose search comes back empty', async () => {
    const assembler = new CategoryAssembler(new FakeSearcher({ cafe: placesFor('cafe') }), identityRandom);

    const result = await assembler.assemble({ descriptors: [], area, snapshot });

    assert.deepEqual(result.categories.map(c => c.id), ['coffee_shops']);
  });

  it('falls back to demo categories when no search yields anything', async () => {
    const assembler = new CategoryAssembler(new FakeSearcher({}), seededRandom(7));
    const smallArea: SearchArea = { origin, radiusMiles: 0.5 };

    const result = await assembler.assemble({ descriptors: [], area: smallArea, snapshot });

    assert.equal(result.source, 'demo');
    assert.deepEqual(result.categories.map(c => c.id), ['demo_restaurants', 'demo_cafes', 'demo_bars']);
    for (const category of result.categories) {
      assert.equal(category.places.length, 1);
      const [place] = category.places;
      assert.equal(place?.isDemo, true);
      assert.equal(place?.googlePlaceId, undefined);
      const miles = place ? distanceFromUser(place, origin) : null;
      assert.ok(miles !== null && miles <= 0.5, `demo place ${miles} mi away`);
    }
  });

  it('treats a throwing search as an empty category', async () => {
    const searcher: PlaceSearcher = {
      async search(query: string) {
        if (query === 'boom query') throw new Error('socket hang up');
        return TEMPLATE_RESULTS[query] ?? placesFor(query);
      }
    };
    const assembler = new CategoryAssembler(searcher, identityRandom);

    const result = await assembler.assemble({
      descriptors: [
        makeDescriptor({ id: 'boom', searchQuery: 'boom query' }),
        makeDescriptor({ id: 'a', searchQuery: 'a query' }),
        makeDescriptor({ id: 'b', searchQuery: 'b query' }),
        makeDescriptor({ id: 'c', searchQuery: 'c query' })
      ],
      area,
      snapshot
    });

    assert.equal(result.source, 'personalized');
    assert.deepEqual(result.categories.map(c => c.id), ['a', 'b', 'c']);
  });

  it('orders places by score before shuffling', async () => {
    const far = makePlace({ id: 'far', coordinates: northOf(origin, 1.5) });
    const near = makePlace({ id: 'near', coordinates: northOf(origin, 0.1) });
    const mid = makePlace({ id: 'mid', coordinates: northOf(origin, 0.7) });
    const searcher = new FakeSearcher({ q1: [far, near, mid], q2: placesFor('x'), q3: placesFor('y') });
    const assembler = new CategoryAssembler(searcher, identityRandom);

    const result = await assembler.assemble({
      descriptors: [
        makeDescriptor({ id: 'one', searchQuery: 'q1', confidence: 0.9 }),
        makeDescriptor({ id: 'two', searchQuery: 'q2' }),
        makeDescriptor({ id: 'three', searchQuery: 'q3' })
      ],
      area,
      snapshot
    });

    assert.deepEqual(result.categories[0]?.places.map(p => p.id), ['near', 'mid', 'far']);
  });
});

describe('shufflePlaces', () => {
  const places = ['a', 'b', 'c'].map(id => makePlace({ id }));

  it('keeps the same places', () => {
    const shuffled = shufflePlaces(places, seededRandom(3));
    assert.deepEqual(shuffled.map(p => p.id).sort(), ['a', 'b', 'c']);
  });

  it('repeats the same order for the same seed', () => {
    const first = shufflePlaces(places, seededRandom(3)).map(p => p.id);
    const second = shufflePlaces(places, seededRandom(3)).map(p => p.id);
    assert.deepEqual(second, first);
  });

  it('is driven by the injected random source', () => {
    assert.deepEqual(shufflePlaces(places, () => 0).map(p => p.id), ['b', 'c', 'a']);
  });

  it('does not modify its input', () => {
    shufflePlaces(places, () => 0);
    assert.deepEqual(places.map(p => p.id), ['a', 'b', 'c']);
  });
});
