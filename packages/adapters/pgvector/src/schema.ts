import type { ScopeField } from '@stratum/core';

export type PgTables = {
  meta: string;
  entities: string;
  runLogs: string;
  vectors: string;
};

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function tableNames(prefix = 'stratum'): PgTables {
  if (!IDENTIFIER.test(prefix)) {
    throw new Error(`Invalid table prefix ${prefix}`);
  }
  return {
    meta: `${prefix}_meta`,
    entities: `${prefix}_entities`,
    runLogs: `${prefix}_run_logs`,
    vectors: `${prefix}_vectors`
  };
}

export function metadataDdl(tables: PgTables): string[] {
  return [
    `create table if not exists ${tables.meta} (id smallint primary key, body jsonb not null)`,
    `create table if not exists ${tables.entities} (
      kind text not null,
      scope_key text not null,
      id text not null,
      scope jsonb not null,
      body jsonb not null,
      created_at timestamptz not null,
      updated_at timestamptz not null,
      primary key (kind, scope_key, id)
    )`,
    `create index if not exists ${tables.entities}_scope_idx on ${tables.entities} using gin (scope)`,
    `create table if not exists ${tables.runLogs} (
      run_id text primary key,
      operation text not null,
      status text not null,
      scope jsonb,
      started_at timestamptz not null,
      body jsonb not null
    )`,
    `create index if not exists ${tables.runLogs}_started_idx on ${tables.runLogs} (started_at desc)`
  ];
}

/**
 * Composite indexes led by the provisioned scope fields, in schema order,
 * with the listing sort key last.
 */
export function scopeFieldDdl(tables: PgTables, fields: readonly ScopeField[]): string[] {
  const invalid = fields.find((field) => !IDENTIFIER.test(field.name));
  if (invalid) {
    throw new Error(`Invalid scope field ${invalid.name}`);
  }
  if (fields.length === 0) {
    return [];
  }
  const scopeColumns = fields.map((field) => `(scope -> '${field.name}')`).join(', ');
  return [
    `create index if not exists ${tables.entities}_scope_created_idx on ${tables.entities} (kind, ${scopeColumns}, created_at, id)`,
    `create index if not exists ${tables.entities}_scope_updated_idx on ${tables.entities} (kind, ${scopeColumns}, updated_at, id)`,
    `create index if not exists ${tables.runLogs}_scope_started_idx on ${tables.runLogs} (${scopeColumns}, started_at desc)`
  ];
}

export function vectorDdl(tables: PgTables, dimensions: number): string[] {
  return [
    'create extension if not exists vector',
    `create table if not exists ${tables.vectors} (
      namespace text not null,
      scope_key text not null,
      entity_id text not null,
      scope jsonb not null,
      embedding vector(${dimensions}) not null,
      primary key (namespace, scope_key, entity_id)
    )`,
    `create index if not exists ${tables.vectors}_embedding_idx on ${tables.vectors} using hnsw (embedding vector_cosine_ops)`,
    `create index if not exists ${tables.vectors}_scope_idx on ${tables.vectors} using gin (scope)`
  ];
}
