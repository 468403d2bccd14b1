/**
 * Category Descriptor Parser Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_CONFIDENCE,
  DEFAULT_EMOJI,
  DEFAULT_VIBE,
  parseCategoryDescriptors,
  resolveCategory
} from '../category-descriptor.parser.js';

const complete = {
  id: 'late_night_ramen',
  title: 'Late Night Ramen',
  subtitle: 'Steaming bowls after dark',
  reasoning: 'You like noodles',
  searchQuery: 'ramen late night',
  category: 'restaurants',
  confidence: 0.91,
  personalizedEmoji: '🍜',
  vibeDescription: 'Warm and loud'
};

describe('parseCategoryDescriptors', () => {
  it('parses a complete item', () => {
    const [descriptor] = parseCategoryDescriptors(JSON.stringify([complete]));
    assert.deepEqual(descriptor, {
      ...complete,
      socialProofText: undefined,
      psychologyHook: undefined,
      places: []
    });
  });

  it('returns [] for text that is not JSON', () => {
    assert.deepEqual(parseCategoryDescriptors('Here are some categories you might like!'), []);
  });

  it('returns [] for a JSON object at the top level', () => {
    assert.deepEqual(parseCategoryDescriptors(JSON.stringify({ categories: [complete] })), []);
  });

  it('accepts an array wrapped in a json code fence', () => {
    const raw = '```json\n' + JSON.stringify([complete]) + '\n```';
    const result = parseCategoryDescriptors(raw);
    assert.equal(result.length, 1);
    assert.equal(result[0]?.id, 'late_night_ramen');
  });

  it('drops items missing a required field and keeps the rest', () => {
    const { searchQuery: _omitted, ...noQuery } = complete;
    const result = parseCategoryDescriptors(JSON.stringify([noQuery, { ...complete, id: 'second' }, 'junk']));
    assert.deepEqual(result.map(d => d.id), ['second']);
  });

  it('keeps only the first item for a repeated id', () => {
    const result = parseCategoryDescriptors(JSON.stringify([
      complete,
      { ...complete, title: 'Ramen Again', searchQuery: 'ramen' },
      { ...complete, id: 'other' }
    ]));

    assert.deepEqual(result.map(d => d.id), ['late_night_ramen', 'other']);
    assert.equal(result[0]?.title, 'Late Night Ramen');
  });

  it('applies defaults for absent optional fields', () => {
    const { confidence: _c, personalizedEmoji: _e, vibeDescription: _v, ...required } = complete;
    const [descriptor] = parseCategoryDescriptors(JSON.stringify([required]));
    assert.equal(descriptor?.confidence, DEFAULT_CONFIDENCE);
    assert.equal(descriptor?.personalizedEmoji, DEFAULT_EMOJI);
    assert.equal(descriptor?.vibeDescription, DEFAULT_VIBE);
  });

  it('applies defaults for mistyped optional fields', () => {
    const [descriptor] = parseCategoryDescriptors(JSON.stringify([
      { ...complete, confidence: 'high', personalizedEmoji: 7 }
    ]));
    assert.equal(descriptor?.confidence, 0.8);
    assert.equal(descriptor?.personalizedEmoji, '📍');
  });

  it('clamps confidence into [0, 1]', () => {
    const result = parseCategoryDescriptors(JSON.stringify([
      { ...complete, id: 'a', confidence: 1.7 },
      { ...complete, id: 'b', confidence: -0.2 }
    ]));
    assert.deepEqual(result.map(d => d.confidence), [1, 0]);
  });

  it('maps unknown category kinds to restaurants', () => {
    const [descriptor] = parseCategoryDescriptors(JSON.stringify([{ ...complete, category: 'museums' }]));
    assert.equal(descriptor?.category, 'restaurants');
  });

  it('keeps social proof and psychology hook when present', () => {
    const [descriptor] = parseCategoryDescriptors(JSON.stringify([
      { ...complete, socialProofText: 'Popular with locals', psychologyHook: 'Limited seats' }
    ]));
    assert.equal(descriptor?.socialProofText, 'Popular with locals');
    assert.equal(descriptor?.psychologyHook, 'Limited seats');
  });
});

describe('resolveCategory', () => {
  it('accepts singular, plural and mixed case names', () => {
    assert.equal(resolveCategory('Cafe'), 'cafes');
    assert.equal(resolveCategory('bars'), 'bars');
    assert.equal(resolveCategory(' VENUE '), 'venues');
    assert.equal(resolveCategory('shopping'), 'shopping');
  });

  it('returns null for unknown names', () => {
    assert.equal(resolveCategory('parks'), null);
  });
});
