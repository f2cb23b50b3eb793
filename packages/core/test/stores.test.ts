import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';

import { CancelledError, StoreIntegrityError } from '../src/server/memory/errors';
import { FileMetadataStore } from '../src/server/memory/fileStore';
import { InMemoryMetadataStore } from '../src/server/memory/inMemoryStore';
import type { CategoryItem, MemoryCategory, RunLog, Scope } from '../src/server/memory/models';
import { scopeToFilter } from '../src/server/memory/scope';
import type { MetadataStore } from '../src/server/memory/store';
import { ALICE, BOB, makeItem, makeResource } from './fixtures';

const EPOCH = new Date('2026-01-01T00:00:00.000Z');
const roots: string[] = [];

afterEach(async () => {
  while (roots.length > 0) {
    const root = roots.pop();
    if (root) {
      await fs.rm(root, { recursive: true, force: true });
    }
  }
});

async function tempFile(): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'stratum-store-'));
  roots.push(root);
  return path.join(root, 'memory.json');
}

function makeCategory(scope: Scope, id: string, name: string): MemoryCategory {
  return {
    id,
    scope,
    name,
    description: `${name} facts`,
    summary: '',
    anchorItemIds: [],
    taxonomyVersion: 1,
    summarizedAt: null,
    createdAt: EPOCH,
    updatedAt: EPOCH
  };
}

function makeLink(scope: Scope, id: string, categoryId: string, itemId: string): CategoryItem {
  return { id, scope, categoryId, itemId, createdAt: EPOCH, updatedAt: EPOCH };
}

function makeRunLog(runId: string, scope: Scope | null): RunLog {
  return {
    runId,
    operation: 'memorize',
    pipeline: 'memorize',
    revisionId: 'memorize@1',
    runner: 'inline',
    scope,
    selector: null,
    status: 'succeeded',
    inputSummary: { modality: 'conversation' },
    steps: [],
    error: null,
    audit: null,
    startedAt: EPOCH,
    finishedAt: EPOCH
  };
}

async function seed(store: MetadataStore, scope: Scope): Promise<void> {
  await store.transaction(scope, async (tx) => {
    await tx.put('resource', makeResource(scope, 'res-1'));
    await tx.put('item', makeItem(scope, 'item-1'));
    await tx.put('category', makeCategory(scope, 'cat-1', 'preferences'));
    await tx.put('categoryItem', makeLink(scope, 'link-1', 'cat-1', 'item-1'));
  });
}

async function rejection(work: Promise<unknown>): Promise<unknown> {
  try {
    await work;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

const STORES: Array<{ name: string; create: () => Promise<MetadataStore> }> = [
  { name: 'in-memory', create: async () => new InMemoryMetadataStore() },
  { name: 'file', create: async () => new FileMetadataStore(await tempFile()) }
];

describe.each(STORES)('$name metadata store', ({ create }) => {
  test('commits every write of a transaction', async () => {
    const store = await create();

    await seed(store, ALICE);

    const filter = scopeToFilter(ALICE);
    expect((await store.list('resource', filter)).map((row) => row.id)).toEqual(['res-1']);
    expect((await store.list('item', filter)).map((row) => row.id)).toEqual(['item-1']);
    expect((await store.list('categoryItem', filter)).map((row) => [row.categoryId, row.itemId])).toEqual([
      ['cat-1', 'item-1']
    ]);
    expect((await store.get('item', ALICE, 'item-1'))?.text).toBe('fact item-1');
  });

  test('an aborted transaction rolls back instead of committing', async () => {
    const store = await create();
    const controller = new AbortController();

    const error = await rejection(
      store.transaction(
        ALICE,
        async (tx) => {
          await tx.put('resource', makeResource(ALICE, 'res-1'));
          controller.abort();
        },
        { signal: controller.signal }
      )
    );

    expect(error).toBeInstanceOf(CancelledError);
    expect(await store.list('resource', {})).toEqual([]);
  });

  test('discards every write when the transaction fails', async () => {
    const store = await create();

    const error = await rejection(
      store.transaction(ALICE, async (tx) => {
        await tx.put('resource', makeResource(ALICE, 'res-1'));
        await tx.put('item', makeItem(ALICE, 'item-1'));
        throw new Error('boom');
      })
    );

    expect(error).toBeInstanceOf(Error);
    expect(await store.list('resource', {})).toEqual([]);
    expect(await store.list('item', {})).toEqual([]);
  });

  test('refuses rows from another scope', async () => {
    const store = await create();

    const error = await rejection(
      store.transaction(ALICE, async (tx) => {
        await tx.put('resource', makeResource(BOB, 'res-1'));
      })
    );

    expect(error).toBeInstanceOf(StoreIntegrityError);
    expect(error).toHaveProperty(
      'message',
      'resource res-1 carries scope user=bob,agent=a1 inside a transaction for user=alice,agent=a1'
    );
  });

  test('refuses items whose resource is missing', async () => {
    const store = await create();

    const error = await rejection(
      store.transaction(ALICE, async (tx) => {
        await tx.put('item', makeItem(ALICE, 'item-1'));
      })
    );

    expect(error).toHaveProperty('message', 'item item-1 references missing resource res-1');
  });

  test('refuses a category name that differs only in case', async () => {
    const store = await create();
    await seed(store, ALICE);

    const error = await rejection(
      store.transaction(ALICE, async (tx) => {
        await tx.put('category', makeCategory(ALICE, 'cat-2', 'Preferences'));
      })
    );

    expect(error).toHaveProperty('message', 'category name Preferences already exists in scope');
  });

  test('refuses a second link between the same category and item', async () => {
    const store = await create();
    await seed(store, ALICE);

    const error = await rejection(
      store.transaction(ALICE, async (tx) => {
        await tx.put('categoryItem', makeLink(ALICE, 'link-2', 'cat-1', 'item-1'));
      })
    );

    expect(error).toHaveProperty('message', 'item item-1 is already linked to category cat-1');
  });

  test('keeps a category that still has links', async () => {
    const store = await create();
    await seed(store, ALICE);

    const error = await rejection(
      store.transaction(ALICE, async (tx) => {
        await tx.delete('category', 'cat-1');
      })
    );

    expect(error).toHaveProperty('message', 'category cat-1 still has 1 linked items');
    expect(await store.get('category', ALICE, 'cat-1')).not.toBeNull();
  });

  test('stores the same id separately per scope', async () => {
    const store = await create();
    await seed(store, ALICE);
    await seed(store, BOB);

    expect(await store.list('item', {})).toHaveLength(2);
    expect(await store.list('item', { user: ['alice', 'bob'], agent: null })).toHaveLength(2);
    expect((await store.list('item', scopeToFilter(BOB))).map((row) => row.scope)).toEqual([BOB]);
  });

  test('filters, orders and limits listings', async () => {
    const store = await create();
    await store.transaction(ALICE, async (tx) => {
      await tx.put('resource', makeResource(ALICE, 'res-1'));
      await tx.put('item', makeItem(ALICE, 'item-a', { createdAt: new Date('2026-01-03T00:00:00.000Z') }));
      await tx.put('item', makeItem(ALICE, 'item-b', { createdAt: new Date('2026-01-02T00:00:00.000Z') }));
      await tx.put('item', makeItem(ALICE, 'item-c', { status: 'superseded', supersededBy: 'item-a' }));
    });
    const filter = scopeToFilter(ALICE);

    const ascending = await store.list('item', filter, { where: { status: 'active' } });
    const newest = await store.list('item', filter, { order: 'createdAt:desc', limit: 1 });
    const picked = await store.list('item', filter, { ids: ['item-c'] });

    expect(ascending.map((row) => row.id)).toEqual(['item-b', 'item-a']);
    expect(newest.map((row) => row.id)).toEqual(['item-a']);
    expect(picked.map((row) => row.status)).toEqual(['superseded']);
  });

  test('purges one scope with its run logs', async () => {
    const store = await create();
    await seed(store, ALICE);
    await seed(store, BOB);
    await store.putRunLog(makeRunLog('run-alice', ALICE));
    await store.putRunLog(makeRunLog('run-bob', BOB));
    await store.putRunLog(makeRunLog('run-cross', null));

    const summary = await store.purgeScope(ALICE);

    expect(summary).toEqual({ resource: 1, item: 1, category: 1, categoryItem: 1, intention: 0, runLogs: 1 });
    expect(await store.list('item', scopeToFilter(ALICE))).toEqual([]);
    expect(await store.list('item', scopeToFilter(BOB))).toHaveLength(1);
    expect((await store.listRunLogs()).map((log) => log.runId).sort()).toEqual(['run-bob', 'run-cross']);
  });

  test('lists run logs by scope, operation and status', async () => {
    const store = await create();
    await store.putRunLog(makeRunLog('run-1', ALICE));
    await store.putRunLog({ ...makeRunLog('run-2', ALICE), operation: 'retrieve', pipeline: 'retrieve', status: 'failed' });
    await store.putRunLog(makeRunLog('run-3', BOB));

    const alice = await store.listRunLogs({ filter: scopeToFilter(ALICE) });
    const failed = await store.listRunLogs({ status: 'failed' });
    const memorize = await store.listRunLogs({ operation: 'memorize', limit: 1 });

    expect(alice.map((log) => log.runId)).toEqual(['run-1', 'run-2']);
    expect(failed.map((log) => log.runId)).toEqual(['run-2']);
    expect(memorize.map((log) => log.runId)).toEqual(['run-1']);
  });
});

describe('FileMetadataStore', () => {
  test('reloads rows and dates from disk in a new instance', async () => {
    const file = await tempFile();
    await seed(new FileMetadataStore(file), ALICE);

    const reopened = new FileMetadataStore(file);
    const item = await reopened.get('item', ALICE, 'item-1');

    expect(item?.createdAt).toBeInstanceOf(Date);
    expect(item?.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(item?.evidence.resourceId).toBe('res-1');
    expect(reopened.location).toBe(file);
  });

  test('serializes concurrent transactions on the same file', async () => {
    const file = await tempFile();
    const store = new FileMetadataStore(file);

    await Promise.all([seed(store, ALICE), seed(store, BOB)]);

    expect(await store.list('category', {})).toHaveLength(2);
    const raw: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
    expect(raw).toMatchObject({ version: 1, revision: 2 });
  });
});
