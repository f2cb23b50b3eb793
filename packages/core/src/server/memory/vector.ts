import type { Scope, ScopeField } from './models';
import { ValidationError } from './errors';
import { matchesScopeFilter, scopeKey, scopeToFilter, type ScopeFilter } from './scope';

export type VectorNamespace = 'item' | 'category' | 'resource';

export type VectorCandidate = {
  entityId: string;
  namespace: VectorNamespace;
  scope: Scope;
  score: number;
};

/** Scoped similarity search. Scores are cosine similarity, highest first. */
export interface VectorIndex {
  readonly backend: string;
  readonly dimensions: number;
  provision?(fields: readonly ScopeField[]): Promise<void>;
  upsert(scope: Scope, namespace: VectorNamespace, entityId: string, vector: number[]): Promise<void>;
  delete(scope: Scope, namespace: VectorNamespace, entityId: string): Promise<void>;
  query(filter: ScopeFilter, namespace: VectorNamespace, vector: number[], k: number): Promise<VectorCandidate[]>;
  purgeScope(scope: Scope): Promise<void>;
}

export function computeNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

export function normalizeEmbedding(vector: readonly number[]): number[] {
  const norm = computeNorm(vector);
  if (norm === 0) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
  }
  const denom = computeNorm(a) * computeNorm(b);
  return denom === 0 ? 0 : dot / denom;
}

export function assertDimensions(vector: readonly number[], dimensions: number): void {
  if (vector.length !== dimensions) {
    throw new ValidationError(`Vector has ${vector.length} dimensions; index expects ${dimensions}`);
  }
  if (vector.some((value) => !Number.isFinite(value))) {
    throw new ValidationError('Vector contains non-finite values');
  }
}

type StoredVector = {
  scope: Scope;
  namespace: VectorNamespace;
  entityId: string;
  vector: number[];
};

/** Full-scan index. Fine for small per-scope volumes and for tests. */
export class BruteForceVectorIndex implements VectorIndex {
  readonly backend = 'brute-force';
  readonly dimensions: number;
  private readonly vectors = new Map<string, StoredVector>();

  constructor(dimensions: number) {
    this.dimensions = dimensions;
  }

  private key(scope: Scope, namespace: VectorNamespace, entityId: string): string {
    return `${scopeKey(scope)}#${namespace}#${entityId}`;
  }

  async upsert(scope: Scope, namespace: VectorNamespace, entityId: string, vector: number[]): Promise<void> {
    assertDimensions(vector, this.dimensions);
    this.vectors.set(this.key(scope, namespace, entityId), {
      scope: { ...scope },
      namespace,
      entityId,
      vector: normalizeEmbedding(vector)
    });
  }

  async delete(scope: Scope, namespace: VectorNamespace, entityId: string): Promise<void> {
    this.vectors.delete(this.key(scope, namespace, entityId));
  }

  async query(filter: ScopeFilter, namespace: VectorNamespace, vector: number[], k: number): Promise<VectorCandidate[]> {
    assertDimensions(vector, this.dimensions);
    if (k <= 0) {
      return [];
    }
    const query = normalizeEmbedding(vector);
    const scored: VectorCandidate[] = [];
    for (const stored of this.vectors.values()) {
      if (stored.namespace !== namespace || !matchesScopeFilter(stored.scope, filter)) {
        continue;
      }
      scored.push({
        entityId: stored.entityId,
        namespace,
        scope: { ...stored.scope },
        score: cosineSimilarity(query, stored.vector)
      });
    }
    scored.sort((a, b) => b.score - a.score || a.entityId.localeCompare(b.entityId));
    return scored.slice(0, k);
  }

  async purgeScope(scope: Scope): Promise<void> {
    const filter = scopeToFilter(scope);
    for (const [key, stored] of this.vectors) {
      if (matchesScopeFilter(stored.scope, filter)) {
        this.vectors.delete(key);
      }
    }
  }

  get size(): number {
    return this.vectors.size;
  }
}
