import { z } from 'zod';

import {
  assertDimensions,
  scopeKey,
  scopeSchema,
  type Scope,
  type ScopeField,
  type ScopeFilter,
  type VectorCandidate,
  type VectorIndex,
  type VectorNamespace
} from '@stratum/core';

import { tableNames, vectorDdl, type PgTables } from './schema';
import { SqlParams, runQuery, scopeFilterSql, type SqlPool } from './sql';

const candidateRowSchema = z.object({
  entity_id: z.string(),
  scope: scopeSchema,
  score: z.coerce.number()
});

export type PgVectorIndexOptions = {
  dimensions: number;
  tablePrefix?: string;
};

export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(',')}]`;
}

/** Cosine similarity search over a pgvector column with an HNSW index. */
export class PgVectorIndex implements VectorIndex {
  readonly backend = 'pgvector';
  readonly dimensions: number;
  private readonly pool: SqlPool;
  private readonly tables: PgTables;

  constructor(pool: SqlPool, options: PgVectorIndexOptions) {
    this.pool = pool;
    this.dimensions = options.dimensions;
    this.tables = tableNames(options.tablePrefix);
  }

  async provision(_fields: readonly ScopeField[]): Promise<void> {
    for (const statement of vectorDdl(this.tables, this.dimensions)) {
      await runQuery(this.pool, statement);
    }
  }

  async upsert(scope: Scope, namespace: VectorNamespace, entityId: string, vector: number[]): Promise<void> {
    assertDimensions(vector, this.dimensions);
    await runQuery(
      this.pool,
      `insert into ${this.tables.vectors} (namespace, scope_key, entity_id, scope, embedding)
       values ($1, $2, $3, $4::jsonb, $5::vector)
       on conflict (namespace, scope_key, entity_id) do update set embedding = excluded.embedding`,
      [namespace, scopeKey(scope), entityId, JSON.stringify(scope), toVectorLiteral(vector)]
    );
  }

  async delete(scope: Scope, namespace: VectorNamespace, entityId: string): Promise<void> {
    await runQuery(this.pool, `delete from ${this.tables.vectors} where namespace = $1 and scope_key = $2 and entity_id = $3`, [
      namespace,
      scopeKey(scope),
      entityId
    ]);
  }

  async query(filter: ScopeFilter, namespace: VectorNamespace, vector: number[], k: number): Promise<VectorCandidate[]> {
    assertDimensions(vector, this.dimensions);
    const params = new SqlParams([toVectorLiteral(vector), namespace]);
    const text =
      `select entity_id, scope, 1 - (embedding <=> $1::vector) as score from ${this.tables.vectors}` +
      ` where namespace = $2 and ${scopeFilterSql(filter, params)}` +
      ` order by embedding <=> $1::vector limit ${params.add(k)}`;
    const rows = await runQuery(this.pool, text, params.values);
    return rows.map((row) => {
      const parsed = candidateRowSchema.parse(row);
      return { entityId: parsed.entity_id, namespace, scope: parsed.scope, score: parsed.score };
    });
  }

  async purgeScope(scope: Scope): Promise<void> {
    await runQuery(this.pool, `delete from ${this.tables.vectors} where scope_key = $1`, [scopeKey(scope)]);
  }
}
