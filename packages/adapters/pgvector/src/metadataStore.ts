import { z } from 'zod';

import {
  ScopedTransaction,
  emptyPurgeSummary,
  parseEntity,
  runLogSchema,
  scopeKey,
  scopeToFilter,
  serviceMetaSchema,
  throwIfAborted,
  type EntityKind,
  type EntityOf,
  type ListOrder,
  type ListQuery,
  type MetadataStore,
  type PurgeSummary,
  type RunLog,
  type RunLogQuery,
  type Scope,
  type ScopeField,
  type ScopeFilter,
  type ServiceMeta,
  type StoreTransaction,
  type TransactionOptions
} from '@stratum/core';

import { metadataDdl, scopeFieldDdl, tableNames, type PgTables } from './schema';
import { SqlParams, runQuery, scopeFilterSql, whereSql, type SqlClient, type SqlPool } from './sql';

const bodyRowSchema = z.object({ body: z.unknown() });
const kindRowSchema = z.object({ kind: z.enum(['resource', 'item', 'category', 'categoryItem', 'intention']) });

const ORDER_SQL: Record<ListOrder, string> = {
  'createdAt:asc': 'created_at asc, id asc',
  'createdAt:desc': 'created_at desc, id asc',
  'updatedAt:desc': 'updated_at desc, id asc'
};

export type PgMetadataStoreOptions = {
  tablePrefix?: string;
};

function isUndefinedTable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === '42P01';
}

function listSql(
  tables: PgTables,
  kind: EntityKind,
  filter: ScopeFilter,
  query: ListQuery = {}
): { text: string; values: unknown[] } {
  const params = new SqlParams([kind]);
  const clauses = ['kind = $1', scopeFilterSql(filter, params)];
  if (query.ids) {
    clauses.push(`id = any(${params.add([...query.ids])}::text[])`);
  }
  clauses.push(...whereSql(query.where, params));
  let text = `select body from ${tables.entities} where ${clauses.join(' and ')} order by ${ORDER_SQL[query.order ?? 'createdAt:asc']}`;
  if (query.limit !== undefined) {
    text += ` limit ${params.add(query.limit)}`;
  }
  return { text, values: params.values };
}

function decodeRows<K extends EntityKind>(kind: K, rows: unknown[]): EntityOf<K>[] {
  return rows.map((row) => parseEntity(kind, bodyRowSchema.parse(row).body));
}

class PgTransaction extends ScopedTransaction {
  private readonly client: SqlClient;
  private readonly tables: PgTables;
  private readonly key: string;

  constructor(client: SqlClient, tables: PgTables, scope: Scope) {
    super(scope);
    this.client = client;
    this.tables = tables;
    this.key = scopeKey(scope);
  }

  async get<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null> {
    const rows = await runQuery(
      this.client,
      `select body from ${this.tables.entities} where kind = $1 and scope_key = $2 and id = $3`,
      [kind, this.key, id]
    );
    const [row] = decodeRows(kind, rows);
    return row ?? null;
  }

  async list<K extends EntityKind>(kind: K, query?: ListQuery): Promise<EntityOf<K>[]> {
    const { text, values } = listSql(this.tables, kind, scopeToFilter(this.scope), query);
    return decodeRows(kind, await runQuery(this.client, text, values));
  }

  protected async write<K extends EntityKind>(kind: K, row: EntityOf<K>): Promise<void> {
    await runQuery(
      this.client,
      `insert into ${this.tables.entities} (kind, scope_key, id, scope, body, created_at, updated_at)
       values ($1, $2, $3, $4::jsonb, $5::jsonb, $6, $7)
       on conflict (kind, scope_key, id) do update set body = excluded.body, updated_at = excluded.updated_at`,
      [kind, this.key, row.id, JSON.stringify(row.scope), JSON.stringify(row), row.createdAt, row.updatedAt]
    );
  }

  protected async remove(kind: EntityKind, id: string): Promise<void> {
    await runQuery(this.client, `delete from ${this.tables.entities} where kind = $1 and scope_key = $2 and id = $3`, [
      kind,
      this.key,
      id
    ]);
  }
}

/**
 * PostgreSQL metadata store. Entities live as jsonb rows keyed by kind, scope
 * key and id; writers for one scope serialize on a transaction-scoped
 * advisory lock.
 */
export class PgMetadataStore implements MetadataStore {
  readonly backend = 'postgres';
  readonly tables: PgTables;
  private readonly pool: SqlPool;

  constructor(pool: SqlPool, options: PgMetadataStoreOptions = {}) {
    this.pool = pool;
    this.tables = tableNames(options.tablePrefix);
  }

  async migrate(): Promise<void> {
    for (const statement of metadataDdl(this.tables)) {
      await runQuery(this.pool, statement);
    }
  }

  async provision(fields: readonly ScopeField[]): Promise<void> {
    await this.migrate();
    for (const statement of scopeFieldDdl(this.tables, fields)) {
      await runQuery(this.pool, statement);
    }
  }

  async readServiceMeta(): Promise<ServiceMeta | null> {
    let rows: unknown[];
    try {
      rows = await runQuery(this.pool, `select body from ${this.tables.meta} where id = 1`);
    } catch (error) {
      if (isUndefinedTable(error)) {
        return null;
      }
      throw error;
    }
    const [row] = rows;
    return row ? serviceMetaSchema.parse(bodyRowSchema.parse(row).body) : null;
  }

  async writeServiceMeta(meta: ServiceMeta): Promise<void> {
    await runQuery(
      this.pool,
      `insert into ${this.tables.meta} (id, body) values (1, $1::jsonb) on conflict (id) do update set body = excluded.body`,
      [JSON.stringify(meta)]
    );
  }

  async get<K extends EntityKind>(kind: K, scope: Scope, id: string): Promise<EntityOf<K> | null> {
    const rows = await runQuery(
      this.pool,
      `select body from ${this.tables.entities} where kind = $1 and scope_key = $2 and id = $3`,
      [kind, scopeKey(scope), id]
    );
    const [row] = decodeRows(kind, rows);
    return row ?? null;
  }

  async list<K extends EntityKind>(kind: K, filter: ScopeFilter, query?: ListQuery): Promise<EntityOf<K>[]> {
    const { text, values } = listSql(this.tables, kind, filter, query);
    return decodeRows(kind, await runQuery(this.pool, text, values));
  }

  async transaction<T>(scope: Scope, work: (tx: StoreTransaction) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.withClient(scope, async (client) => {
      const result = await work(new PgTransaction(client, this.tables, scope));
      throwIfAborted(options.signal);
      return result;
    });
  }

  async putRunLog(log: RunLog): Promise<void> {
    await runQuery(
      this.pool,
      `insert into ${this.tables.runLogs} (run_id, operation, status, scope, started_at, body)
       values ($1, $2, $3, $4::jsonb, $5, $6::jsonb)
       on conflict (run_id) do update set status = excluded.status, body = excluded.body`,
      [log.runId, log.operation, log.status, log.scope ? JSON.stringify(log.scope) : null, log.startedAt, JSON.stringify(log)]
    );
  }

  async getRunLog(runId: string): Promise<RunLog | null> {
    const [row] = await runQuery(this.pool, `select body from ${this.tables.runLogs} where run_id = $1`, [runId]);
    return row ? runLogSchema.parse(bodyRowSchema.parse(row).body) : null;
  }

  async listRunLogs(query: RunLogQuery = {}): Promise<RunLog[]> {
    const params = new SqlParams();
    const clauses: string[] = [];
    if (query.filter) {
      clauses.push('scope is not null', scopeFilterSql(query.filter, params));
    }
    if (query.operation) {
      clauses.push(`operation = ${params.add(query.operation)}`);
    }
    if (query.status) {
      clauses.push(`status = ${params.add(query.status)}`);
    }
    let text = `select body from ${this.tables.runLogs}`;
    if (clauses.length > 0) {
      text += ` where ${clauses.join(' and ')}`;
    }
    text += ' order by started_at desc, run_id asc';
    if (query.limit !== undefined) {
      text += ` limit ${params.add(query.limit)}`;
    }
    const rows = await runQuery(this.pool, text, params.values);
    return rows.map((row) => runLogSchema.parse(bodyRowSchema.parse(row).body));
  }

  async purgeScope(scope: Scope): Promise<PurgeSummary> {
    return this.withClient(scope, async (client) => {
      const summary = emptyPurgeSummary();
      const deleted = await runQuery(client, `delete from ${this.tables.entities} where scope_key = $1 returning kind`, [
        scopeKey(scope)
      ]);
      for (const row of deleted) {
        summary[kindRowSchema.parse(row).kind] += 1;
      }
      const logs = await runQuery(client, `delete from ${this.tables.runLogs} where scope = $1::jsonb returning run_id`, [
        JSON.stringify(scope)
      ]);
      summary.runLogs = logs.length;
      return summary;
    });
  }

  async close(): Promise<void> {
    await this.pool.end?.();
  }

  private async withClient<T>(scope: Scope, work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await runQuery(client, 'begin');
      await runQuery(client, 'select pg_advisory_xact_lock(hashtext($1))', [scopeKey(scope)]);
      const result = await work(client);
      await runQuery(client, 'commit');
      return result;
    } catch (error) {
      try {
        await client.query('rollback');
      } catch (rollbackError) {
        console.warn('[Stratum] Rollback failed:', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
