import { createHash } from 'node:crypto';

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';

import {
  TransientStoreError,
  assertDimensions,
  normalizeEmbedding,
  scopeKey,
  scopeSchema,
  type Scope,
  type ScopeField,
  type ScopeFilter,
  type VectorCandidate,
  type VectorIndex,
  type VectorNamespace
} from '@stratum/core';

export type QdrantCondition =
  | { key: string; match: { value: string | number } }
  | { key: string; match: { any: string[] | number[] } }
  | { is_empty: { key: string } };

export type QdrantFilter = {
  must: QdrantCondition[];
  must_not?: QdrantCondition[];
};

export interface QdrantVectorIndexOptions {
  dimensions: number;
  collectionPrefix?: string;
}

const payloadSchema = z.object({
  entityId: z.string(),
  scopeKey: z.string(),
  scope: scopeSchema
});

/** Point ids must be UUIDs or integers; derive a stable UUID from the entity key. */
export function pointId(namespace: VectorNamespace, key: string, entityId: string): string {
  const hex = createHash('sha1').update(`${namespace}|${key}|${entityId}`).digest('hex');
  return [hex.slice(0, 8), hex.slice(8, 12), `5${hex.slice(13, 16)}`, `a${hex.slice(17, 20)}`, hex.slice(20, 32)].join('-');
}

function matchValues(key: string, values: readonly (string | number)[]): QdrantCondition {
  const strings = values.filter((value): value is string => typeof value === 'string');
  const numbers = values.filter((value): value is number => typeof value === 'number');
  if (values.length === 1) {
    return { key, match: { value: values[0] } };
  }
  return numbers.length > 0 && strings.length === 0 ? { key, match: { any: numbers } } : { key, match: { any: strings } };
}

/**
 * Translates a scope filter into a Qdrant payload filter. Wildcard fields
 * only exclude points that lack the field.
 */
export function buildQdrantFilter(filter: ScopeFilter): QdrantFilter {
  const must: QdrantCondition[] = [];
  const mustNot: QdrantCondition[] = [];
  for (const [name, allowed] of Object.entries(filter)) {
    const key = `scope.${name}`;
    if (allowed === null) {
      mustNot.push({ is_empty: { key } });
    } else if (allowed.length === 0) {
      // an empty value set matches nothing
      must.push({ key: 'scopeKey', match: { any: [] } });
    } else {
      must.push(matchValues(key, allowed));
    }
  }
  return mustNot.length > 0 ? { must, must_not: mustNot } : { must };
}

export class QdrantVectorIndex implements VectorIndex {
  readonly backend = 'qdrant';
  readonly dimensions: number;
  private readonly client: QdrantClient;
  private readonly prefix: string;
  private readonly ready = new Map<VectorNamespace, Promise<void>>();

  constructor(client: QdrantClient, options: QdrantVectorIndexOptions) {
    this.client = client;
    this.dimensions = options.dimensions;
    this.prefix = options.collectionPrefix ?? 'stratum';
  }

  collectionName(namespace: VectorNamespace): string {
    return `${this.prefix}_${namespace}`;
  }

  async provision(fields: readonly ScopeField[]): Promise<void> {
    const namespaces: VectorNamespace[] = ['item', 'category', 'resource'];
    for (const namespace of namespaces) {
      await this.ensureCollection(namespace);
      const collection = this.collectionName(namespace);
      await this.call(() =>
        this.client.createPayloadIndex(collection, { field_name: 'scopeKey', field_schema: 'keyword', wait: true })
      );
      for (const field of fields) {
        await this.call(() =>
          this.client.createPayloadIndex(collection, {
            field_name: `scope.${field.name}`,
            field_schema: field.type === 'number' ? 'integer' : 'keyword',
            wait: true
          })
        );
      }
    }
  }

  async upsert(scope: Scope, namespace: VectorNamespace, entityId: string, vector: number[]): Promise<void> {
    assertDimensions(vector, this.dimensions);
    await this.ensureCollection(namespace);
    const key = scopeKey(scope);
    await this.call(() =>
      this.client.upsert(this.collectionName(namespace), {
        wait: true,
        points: [
          {
            id: pointId(namespace, key, entityId),
            vector: normalizeEmbedding(vector),
            payload: { entityId, scopeKey: key, scope }
          }
        ]
      })
    );
  }

  async delete(scope: Scope, namespace: VectorNamespace, entityId: string): Promise<void> {
    await this.ensureCollection(namespace);
    await this.call(() =>
      this.client.delete(this.collectionName(namespace), {
        wait: true,
        points: [pointId(namespace, scopeKey(scope), entityId)]
      })
    );
  }

  async query(filter: ScopeFilter, namespace: VectorNamespace, vector: number[], k: number): Promise<VectorCandidate[]> {
    assertDimensions(vector, this.dimensions);
    await this.ensureCollection(namespace);
    const hits = await this.call(() =>
      this.client.search(this.collectionName(namespace), {
        vector: normalizeEmbedding(vector),
        limit: k,
        filter: buildQdrantFilter(filter),
        with_payload: true
      })
    );
    const candidates: VectorCandidate[] = [];
    for (const hit of hits) {
      const payload = payloadSchema.safeParse(hit.payload);
      if (!payload.success) {
        console.warn('[Stratum] Skipping Qdrant point with unexpected payload:', hit.id);
        continue;
      }
      candidates.push({ entityId: payload.data.entityId, namespace, scope: payload.data.scope, score: hit.score });
    }
    return candidates;
  }

  async purgeScope(scope: Scope): Promise<void> {
    const key = scopeKey(scope);
    const namespaces: VectorNamespace[] = ['item', 'category', 'resource'];
    for (const namespace of namespaces) {
      await this.ensureCollection(namespace);
      await this.call(() =>
        this.client.delete(this.collectionName(namespace), {
          wait: true,
          filter: { must: [{ key: 'scopeKey', match: { value: key } }] }
        })
      );
    }
  }

  private ensureCollection(namespace: VectorNamespace): Promise<void> {
    const existing = this.ready.get(namespace);
    if (existing) {
      return existing;
    }
    const pending = this.createCollection(namespace);
    this.ready.set(namespace, pending);
    void pending.catch(() => this.ready.delete(namespace));
    return pending;
  }

  private async createCollection(namespace: VectorNamespace): Promise<void> {
    const name = this.collectionName(namespace);
    const { collections } = await this.call(() => this.client.getCollections());
    if (collections.some((collection) => collection.name === name)) {
      return;
    }
    await this.call(() => this.client.createCollection(name, { vectors: { size: this.dimensions, distance: 'Cosine' } }));
  }

  private async call<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw new TransientStoreError(`Qdrant request failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }
}
