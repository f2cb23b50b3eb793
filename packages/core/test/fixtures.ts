import type { MemoryServiceOptions, OperationResult } from '../src/server/memory';
import { MemoryService } from '../src/server/memory';
import { HeuristicReasoner } from '../src/server/memory/heuristicReasoner';
import { InMemoryMetadataStore } from '../src/server/memory/inMemoryStore';
import type { MemoryItem, Resource, Scope } from '../src/server/memory/models';
import { itemContentHash } from '../src/server/memory/merge';
import type { MetadataStore } from '../src/server/memory/store';

export const ALICE: Scope = { user: 'alice', agent: 'a1' };
export const ALICE_OTHER_AGENT: Scope = { user: 'alice', agent: 'a2' };
export const BOB: Scope = { user: 'bob', agent: 'a1' };

export type TestServiceOptions = Partial<MemoryServiceOptions> & { fields?: string };

export async function createTestService(
  options: TestServiceOptions = {}
): Promise<{ service: MemoryService; store: MetadataStore }> {
  const { fields = 'user:string,agent:string', ...overrides } = options;
  const store = overrides.store ?? new InMemoryMetadataStore();
  const service = await MemoryService.create({
    reasoner: new HeuristicReasoner(),
    config: { runner: { backoffMs: 0 } },
    ...overrides,
    store
  });
  const provisioned = await service.provisionScopeSchema(fields);
  if (!provisioned.ok) {
    throw new Error(`provisioning failed: ${provisioned.error.message}`);
  }
  return { service, store };
}

export function unwrap<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

export function failure<T>(result: OperationResult<T>) {
  if (result.ok) {
    throw new Error('expected the operation to fail');
  }
  return result;
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

const EPOCH = new Date('2026-01-01T00:00:00.000Z');

export function makeResource(scope: Scope, id: string, content = 'user: placeholder'): Resource {
  return {
    id,
    scope,
    modality: 'conversation',
    uri: null,
    content,
    sourceKey: null,
    contentHash: `hash-${id}`,
    supersedesId: null,
    preprocess: null,
    createdAt: EPOCH,
    updatedAt: EPOCH
  };
}

export function makeItem(scope: Scope, id: string, overrides: Partial<MemoryItem> = {}): MemoryItem {
  const text = overrides.text ?? `fact ${id}`;
  const memoryType = overrides.memoryType ?? 'profile';
  const resourceId = overrides.resourceId ?? 'res-1';
  return {
    id,
    scope,
    resourceId,
    lineageId: id,
    version: 1,
    status: 'active',
    supersededBy: null,
    memoryType,
    text,
    contentHash: itemContentHash(memoryType, text),
    evidence: { resourceId, start: null, end: null, page: null, timestampMs: null, excerpt: text },
    confidence: 0.5,
    stable: true,
    reinforcementCount: 0,
    lastReinforcedAt: null,
    embedding: null,
    createdAt: EPOCH,
    updatedAt: EPOCH,
    ...overrides
  };
}

export function requireRunId<T>(result: OperationResult<T>): string {
  if (!result.runId) {
    throw new Error('expected the operation to record a run');
  }
  return result.runId;
}
