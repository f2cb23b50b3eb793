import { describe, expect, test } from 'vitest';

import { DEFAULT_CATEGORIES } from '../src/server/memory/config';
import {
  appendAnchors,
  categoryMatchScore,
  chooseCategories,
  describeCategory,
  findCategoryByName,
  pickAnchors
} from '../src/server/operations/taxonomy';
import { ALICE, makeItem } from './fixtures';

describe('chooseCategories', () => {
  test('keeps suggestions that exist in the taxonomy', () => {
    expect(chooseCategories('anything', ['Preferences', 'unknown', 'preferences'], DEFAULT_CATEGORIES, 0.25, 'knowledge')).toEqual([
      'preferences'
    ]);
  });

  test('falls back to the best lexical match', () => {
    expect(chooseCategories('My work project meeting', [], DEFAULT_CATEGORIES, 0.25, 'knowledge')).toEqual(['work_life']);
  });

  test('uses the default category when nothing matches', () => {
    expect(chooseCategories('zzz qqq', [], DEFAULT_CATEGORIES, 0.25, 'knowledge')).toEqual(['knowledge']);
  });
});

describe('categoryMatchScore', () => {
  test('is the share of content words found in the name or description', () => {
    const activities = { name: 'activities', description: 'Activities, hobbies, and interests' };

    expect(categoryMatchScore('I love hiking and other activities', activities)).toBe(0.25);
    expect(categoryMatchScore('the and of', activities)).toBe(0);
  });
});

describe('category lookups', () => {
  test('names match without regard to case', () => {
    const categories = [{ name: 'preferences' }, { name: 'goals' }];

    expect(findCategoryByName(categories, 'GOALS')).toEqual({ name: 'goals' });
    expect(findCategoryByName(categories, 'habits')).toBeNull();
    expect(describeCategory('Goals', DEFAULT_CATEGORIES)).toBe('Goals, aspirations, and objectives');
    expect(describeCategory('custom', DEFAULT_CATEGORIES)).toBe('');
  });
});

describe('anchors', () => {
  test('pickAnchors prefers confidence, then reinforcement, then recency', () => {
    const items = [
      makeItem(ALICE, 'low', { confidence: 0.3 }),
      makeItem(ALICE, 'old', { confidence: 0.8, reinforcementCount: 2 }),
      makeItem(ALICE, 'new', { confidence: 0.8, reinforcementCount: 2, updatedAt: new Date('2026-02-01T00:00:00.000Z') }),
      makeItem(ALICE, 'top', { confidence: 0.8, reinforcementCount: 5 })
    ];

    expect(pickAnchors(items, 3)).toEqual(['top', 'new', 'old']);
  });

  test('appendAnchors moves re-added ids to the end and keeps the newest', () => {
    expect(appendAnchors(['a', 'b', 'c'], ['b', 'd'], 3)).toEqual(['c', 'b', 'd']);
    expect(appendAnchors([], ['x'], 3)).toEqual(['x']);
  });
});
