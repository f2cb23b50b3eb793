import { describe, expect, test, vi } from 'vitest';

import { ALICE, ALICE_OTHER_AGENT, BOB, createTestService, failure, requireRunId, unwrap } from './fixtures';

const BLUE = 'user: My favorite color is blue.';

describe('retrieve', () => {
  test('stops at the category layer once its summary covers the query', async () => {
    const { service } = await createTestService();
    unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));

    const value = unwrap(await service.retrieve(ALICE, 'What is my favorite color?'));

    expect(value.needsRetrieval).toBe(true);
    expect(value.sufficientAt).toBe('category');
    expect(value.nextStepQuery).toBeNull();
    expect(value.categories.map(({ category }) => [category.name, category.summary])).toEqual([
      ['preferences', 'My favorite color is blue.']
    ]);
    expect(value.items).toEqual([]);
    expect(value.resources).toEqual([]);
    expect(value.intention).toBeNull();
    expect(value.degraded).toBe(false);
    expect(value.retriever).toBe('hybrid');
    expect(value.policy).toEqual({
      appliedPolicies: [],
      candidateLimit: 50,
      rerankLimit: 20,
      vectorEnabled: false,
      fallback: 'category_routing',
      combinations: 1
    });
  });

  test('recalls items and their resources when sufficiency checks are off', async () => {
    const { service } = await createTestService();
    const stored = unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));

    const value = unwrap(await service.retrieve(ALICE, 'favorite color', { sufficiencyCheck: false }));

    expect(value.sufficientAt).toBeNull();
    expect(value.items).toHaveLength(1);
    expect(value.items[0].item.id).toBe(stored.items[0].id);
    expect(value.items[0].item.embedding).toBeNull();
    expect(value.items[0].score).toBe(1);
    expect(value.resources.map(({ resource }) => resource.id)).toEqual([stored.resource.id]);
  });

  test('omits category summaries on request', async () => {
    const { service } = await createTestService();
    unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));

    const value = unwrap(
      await service.retrieve(ALICE, 'favorite color', { sufficiencyCheck: false, includeSummary: false })
    );

    expect(value.categories.map(({ category }) => [category.name, category.summary])).toEqual([['preferences', '']]);
  });

  test('skips retrieval for queries without content words', async () => {
    const { service } = await createTestService();
    unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));

    const value = unwrap(await service.retrieve(ALICE, 'what is it?'));

    expect(value.needsRetrieval).toBe(false);
    expect(value.categories).toEqual([]);
    expect(value.items).toEqual([]);
    expect(value.resources).toEqual([]);
  });

  test('never returns memories from another scope', async () => {
    const { service } = await createTestService();
    unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));
    unwrap(await service.memorize(BOB, { content: 'user: My favorite color is green.' }, 'conversation'));

    const alice = unwrap(await service.retrieve(ALICE, 'favorite color', { sufficiencyCheck: false }));
    const bob = unwrap(await service.retrieve(BOB, 'favorite color', { sufficiencyCheck: false }));

    expect(alice.items.map(({ item }) => item.text)).toEqual(['My favorite color is blue.']);
    expect(bob.items.map(({ item }) => item.text)).toEqual(['My favorite color is green.']);
    expect(alice.categories.every(({ category }) => category.scope.user === 'alice')).toBe(true);
    expect(bob.resources.every(({ resource }) => resource.scope.user === 'bob')).toBe(true);
  });

  test('stays isolated after concurrent writes to neighbouring scopes', async () => {
    const { service } = await createTestService();

    await Promise.all([
      service.memorize(ALICE, { content: BLUE }, 'conversation'),
      service.memorize(BOB, { content: 'user: My favorite color is green.' }, 'conversation'),
      service.memorize(ALICE_OTHER_AGENT, { content: 'user: My favorite color is red.' }, 'conversation'),
      service.memorize(ALICE, { content: BLUE }, 'conversation')
    ]).then((results) => results.map(unwrap));

    const texts = async (scope: typeof ALICE) =>
      unwrap(await service.retrieve(scope, 'favorite color', { sufficiencyCheck: false })).items.map(({ item }) => [
        item.text,
        item.scope
      ]);

    expect(await texts(ALICE)).toEqual([['My favorite color is blue.', ALICE]]);
    expect(await texts(BOB)).toEqual([['My favorite color is green.', BOB]]);
    expect(await texts(ALICE_OTHER_AGENT)).toEqual([['My favorite color is red.', ALICE_OTHER_AGENT]]);
  });

  test('answers a project scoped question and finds nothing in a sibling project', async () => {
    const { service } = await createTestService({ fields: 'project:string,agent:string' });
    const p1 = { project: 'p1', agent: 'a1' };
    unwrap(await service.memorize(p1, { content: BLUE }, 'conversation'));

    const found = unwrap(await service.retrieve(p1, 'what color do they like'));
    const empty = unwrap(await service.retrieve({ project: 'p2', agent: 'a1' }, 'what color do they like'));

    expect(found.needsRetrieval).toBe(true);
    expect(found.categories.map(({ category }) => [category.name, category.summary, category.scope])).toEqual([
      ['preferences', 'My favorite color is blue.', p1]
    ]);
    expect(found.items.every(({ item }) => item.scope.project === 'p1')).toBe(true);
    expect(empty.categories).toEqual([]);
    expect(empty.items).toEqual([]);
    expect(empty.resources).toEqual([]);
  });

  test('surfaces the scope intention', async () => {
    const { service } = await createTestService();
    unwrap(await service.memorize(ALICE, { content: 'user: Remind me to renew the passport next month.' }, 'conversation'));

    const value = unwrap(await service.retrieve(ALICE, 'passport renewal'));

    expect(value.intention?.goals).toEqual(['Remind me to renew the passport next month.']);
    expect(value.intentions).toHaveLength(1);
  });

  test('rejects an empty query before starting a run', async () => {
    const { service, store } = await createTestService();

    const result = failure(await service.retrieve(ALICE, '   '));

    expect(result.error.kind).toBe('ValidationError');
    expect(result.runId).toBeNull();
    expect(await store.listRunLogs()).toEqual([]);
  });

  describe('cross-scope selectors', () => {
    test('a selector that wildcards every field is rejected before the store is read', async () => {
      const { service, store } = await createTestService();
      const list = vi.spyOn(store, 'list');
      const get = vi.spyOn(store, 'get');
      const putRunLog = vi.spyOn(store, 'putRunLog');

      const result = failure(await service.retrieve({ user: { any: true }, agent: { any: true } }, 'favorite color'));

      expect(result.error.kind).toBe('PolicyViolation');
      expect(result.error.message).toBe('Cross-scope retrieval rejected: selector wildcards every scope field');
      expect(result.runId).toBeNull();
      expect(list).not.toHaveBeenCalled();
      expect(get).not.toHaveBeenCalled();
      expect(putRunLog).not.toHaveBeenCalled();
    });

    test('a selector expanding to too many combinations is rejected', async () => {
      const { service } = await createTestService();
      const users = Array.from({ length: 17 }, (_, index) => `user-${index}`);

      const result = failure(await service.retrieve({ user: { in: users }, agent: 'a1' }, 'favorite color'));

      expect(result.error.kind).toBe('PolicyViolation');
      expect(result.error.message).toBe(
        'Cross-scope retrieval rejected: selector expands to 17 scope combinations (limit 16)'
      );
    });

    test('a bounded wildcard reads across the matching scopes only', async () => {
      const { service } = await createTestService();
      unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));
      unwrap(await service.memorize(ALICE_OTHER_AGENT, { content: 'user: I live in Lisbon.' }, 'conversation'));
      unwrap(await service.memorize(BOB, { content: 'user: My favorite color is green.' }, 'conversation'));

      const selector = { user: 'alice', agent: { any: true as const } };
      const result = await service.retrieve(selector, 'favorite color', { sufficiencyCheck: false });
      const value = unwrap(result);

      expect(value.items.map(({ item }) => item.text)).toEqual(['My favorite color is blue.']);
      expect(value.policy).toEqual({
        appliedPolicies: ['candidate-cap', 'wide-range-fallback', 'vector-unavailable-fallback'],
        candidateLimit: 50,
        rerankLimit: 20,
        vectorEnabled: false,
        fallback: 'category_routing',
        combinations: 1
      });

      const log = unwrap(await service.getRun(requireRunId(result)));
      expect(log.scope).toBeNull();
      expect(log.selector).toEqual(selector);
      expect(log.inputSummary.crossScope).toBe(true);
    });

    test('single-valued sets collapse to an exact scope', async () => {
      const { service } = await createTestService();
      unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));

      const result = await service.retrieve({ user: { in: ['alice'] }, agent: { in: ['a1'] } }, 'favorite color');
      const value = unwrap(result);

      expect(value.policy.appliedPolicies).toEqual([]);
      const log = unwrap(await service.getRun(requireRunId(result)));
      expect(log.scope).toEqual(ALICE);
      expect(log.selector).toBeNull();
    });
  });
});
