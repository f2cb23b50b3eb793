import { describe, expect, test } from 'vitest';

import { decideMerge, itemContentHash, normalizeText, resourceContentHash } from '../src/server/memory/merge';
import { ALICE, makeItem } from './fixtures';

describe('content hashes', () => {
  test('item hashes ignore case and whitespace but not memory type', () => {
    const hash = itemContentHash('profile', 'My  favorite color\nis blue');

    expect(hash).toHaveLength(16);
    expect(itemContentHash('profile', ' my favorite COLOR is blue ')).toBe(hash);
    expect(itemContentHash('behavior', 'my favorite color is blue')).not.toBe(hash);
  });

  test('resource hashes depend on the modality', () => {
    expect(resourceContentHash('conversation', 'hello')).not.toBe(resourceContentHash('document', 'hello'));
    expect(resourceContentHash('document', 'hello')).toHaveLength(64);
  });

  test('normalizeText collapses whitespace', () => {
    expect(normalizeText('  Tea\t\tAND   toast ')).toBe('tea and toast');
  });
});

describe('decideMerge', () => {
  const existing = makeItem(ALICE, 'item-1', { text: 'My favorite color is blue.', confidence: 0.6 });

  test('creates when nothing is close', () => {
    expect(decideMerge({ contentHash: 'x', confidence: 0.9, memoryType: 'profile' }, null, 0.9)).toEqual({
      action: 'create'
    });
  });

  test('reinforces an identical item whatever the similarity', () => {
    const decision = decideMerge(
      { contentHash: existing.contentHash, confidence: 0.1, memoryType: 'profile' },
      { item: existing, similarity: 0.2 },
      0.9
    );

    expect(decision).toEqual({ action: 'reinforce', target: existing, reason: 'identical' });
  });

  test('supersedes a near duplicate with equal or better confidence', () => {
    const decision = decideMerge(
      { contentHash: 'other', confidence: 0.6, memoryType: 'profile' },
      { item: existing, similarity: 0.95 },
      0.9
    );

    expect(decision).toEqual({ action: 'supersede', target: existing });
  });

  test('keeps the existing item when the near duplicate is weaker', () => {
    const decision = decideMerge(
      { contentHash: 'other', confidence: 0.4, memoryType: 'profile' },
      { item: existing, similarity: 0.95 },
      0.9
    );

    expect(decision).toEqual({ action: 'reinforce', target: existing, reason: 'weaker_evidence' });
  });

  test('creates when the match is below the threshold or of another type', () => {
    expect(
      decideMerge({ contentHash: 'other', confidence: 0.9, memoryType: 'profile' }, { item: existing, similarity: 0.5 }, 0.9)
        .action
    ).toBe('create');
    expect(
      decideMerge({ contentHash: 'other', confidence: 0.9, memoryType: 'goal' }, { item: existing, similarity: 0.99 }, 0.9)
        .action
    ).toBe('create');
  });
});
