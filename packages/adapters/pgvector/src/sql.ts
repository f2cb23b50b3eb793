import type { Pool, PoolClient } from 'pg';

import { TransientStoreError, type ScopeFilter, type WhereValue } from '@stratum/core';

export type SqlResult = { rows: unknown[] };

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
}

/** The slice of `pg.Pool` the adapters use. Tests substitute a recording pool. */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  connect(): Promise<SqlClient>;
  end?(): Promise<void>;
}

function wrapClient(client: PoolClient): SqlClient {
  return {
    query: async (text, values = []) => {
      const result = await client.query(text, values);
      return { rows: result.rows };
    },
    release: () => client.release()
  };
}

export function fromPgPool(pool: Pool): SqlPool {
  return {
    query: async (text, values = []) => {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    connect: async () => wrapClient(await pool.connect()),
    end: () => pool.end()
  };
}

// serialization_failure, deadlock_detected, and the connection exception class
const TRANSIENT_CODES = new Set(['40001', '40P01', '08000', '08003', '08006', '57P01']);

export function isTransientPgError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  const code = error.code;
  return typeof code === 'string' && (TRANSIENT_CODES.has(code) || code === 'ECONNRESET' || code === 'ECONNREFUSED');
}

export async function runQuery(target: Pick<SqlPool, 'query'>, text: string, values: unknown[] = []): Promise<unknown[]> {
  try {
    return (await target.query(text, values)).rows;
  } catch (error) {
    if (isTransientPgError(error)) {
      throw new TransientStoreError(`PostgreSQL query failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    throw error;
  }
}

/** Accumulates positional parameters while a statement is assembled. */
export class SqlParams {
  readonly values: unknown[] = [];

  constructor(initial: unknown[] = []) {
    this.values.push(...initial);
  }

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

/**
 * Renders a scope filter against a jsonb `scope` column. Wildcard fields only
 * require the key to be present.
 */
export function scopeFilterSql(filter: ScopeFilter, params: SqlParams, column = 'scope'): string {
  const clauses: string[] = [];
  for (const [name, allowed] of Object.entries(filter)) {
    if (allowed === null) {
      clauses.push(`${column} ? ${params.add(name)}`);
    } else if (allowed.length === 0) {
      clauses.push('false');
    } else {
      clauses.push(`${column} -> ${params.add(name)} = any(${params.add(allowed.map((value) => JSON.stringify(value)))}::jsonb[])`);
    }
  }
  return clauses.length > 0 ? clauses.join(' and ') : 'true';
}

export function whereSql(where: Record<string, WhereValue> | undefined, params: SqlParams, column = 'body'): string[] {
  if (!where) {
    return [];
  }
  return Object.entries(where).map(
    ([field, value]) => `coalesce(${column} -> ${params.add(field)}, 'null'::jsonb) = ${params.add(JSON.stringify(value))}::jsonb`
  );
}
