import { ENTITY_KINDS, type EntityKind, type EntityOf, type RunLog, type Scope } from './models';
import { matchesScopeFilter, scopeKey, scopeToFilter, type ScopeFilter } from './scope';
import {
  ScopedTransaction,
  emptyPurgeSummary,
  matchesWhere,
  sortRows,
  type ListQuery,
  type PurgeSummary,
  type RunLogQuery
} from './store';

export type TableSet = { [K in EntityKind]: Map<string, EntityOf<K>> };

type StagedSet = { [K in EntityKind]: Map<string, EntityOf<K> | null> };

export function createTables(): TableSet {
  return {
    resource: new Map(),
    item: new Map(),
    category: new Map(),
    categoryItem: new Map(),
    intention: new Map()
  };
}

export function tableFor<K extends EntityKind>(tables: TableSet, kind: K): Map<string, EntityOf<K>> {
  return tables[kind];
}

function stagedFor<K extends EntityKind>(staged: StagedSet, kind: K): Map<string, EntityOf<K> | null> {
  return staged[kind];
}

export function rowKey(scope: Scope, id: string): string {
  return `${scopeKey(scope)}#${id}`;
}

export function selectRows<R extends { scope: Scope; id: string; createdAt: Date; updatedAt: Date }>(
  rows: Iterable<R>,
  filter: ScopeFilter,
  query: ListQuery = {}
): R[] {
  const ids = query.ids ? new Set(query.ids) : null;
  const matched: R[] = [];
  for (const row of rows) {
    if (!matchesScopeFilter(row.scope, filter)) continue;
    if (ids && !ids.has(row.id)) continue;
    if (!matchesWhere(row, query.where)) continue;
    matched.push(row);
  }
  const sorted = sortRows(matched, query.order);
  const limited = query.limit !== undefined ? sorted.slice(0, query.limit) : sorted;
  return limited.map((row) => structuredClone(row));
}

export function selectRunLogs(logs: Iterable<RunLog>, query: RunLogQuery = {}): RunLog[] {
  const matched = [...logs].filter((log) => {
    if (query.operation && log.operation !== query.operation) return false;
    if (query.status && log.status !== query.status) return false;
    if (query.filter) {
      const filter = query.filter;
      if (log.scope) {
        return matchesScopeFilter(log.scope, filter);
      }
      return false;
    }
    return true;
  });
  matched.sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime() || a.runId.localeCompare(b.runId));
  const limited = query.limit !== undefined ? matched.slice(0, query.limit) : matched;
  return limited.map((log) => structuredClone(log));
}

export function purgeTables(tables: TableSet, scope: Scope): PurgeSummary {
  const summary = emptyPurgeSummary();
  const filter = scopeToFilter(scope);
  for (const kind of ENTITY_KINDS) {
    const table = tableFor(tables, kind);
    for (const [key, row] of table) {
      if (matchesScopeFilter(row.scope, filter)) {
        table.delete(key);
        summary[kind] += 1;
      }
    }
  }
  return summary;
}

/**
 * Transaction over in-process tables. Writes are staged and only applied to
 * the tables by `commit`, so an abandoned transaction leaves no trace.
 */
export class StagedTransaction extends ScopedTransaction {
  private readonly tables: TableSet;
  private readonly staged: StagedSet = {
    resource: new Map(),
    item: new Map(),
    category: new Map(),
    categoryItem: new Map(),
    intention: new Map()
  };

  constructor(tables: TableSet, scope: Scope) {
    super(scope);
    this.tables = tables;
  }

  async get<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null> {
    const key = rowKey(this.scope, id);
    const pending = stagedFor(this.staged, kind);
    if (pending.has(key)) {
      const row = pending.get(key) ?? null;
      return row ? structuredClone(row) : null;
    }
    const row = tableFor(this.tables, kind).get(key);
    return row ? structuredClone(row) : null;
  }

  async list<K extends EntityKind>(kind: K, query: ListQuery = {}): Promise<EntityOf<K>[]> {
    const merged = new Map(tableFor(this.tables, kind));
    for (const [key, row] of stagedFor(this.staged, kind)) {
      if (row) {
        merged.set(key, row);
      } else {
        merged.delete(key);
      }
    }
    return selectRows(merged.values(), scopeToFilter(this.scope), query);
  }

  protected async write<K extends EntityKind>(kind: K, row: EntityOf<K>): Promise<void> {
    stagedFor(this.staged, kind).set(rowKey(this.scope, row.id), row);
  }

  protected async remove(kind: EntityKind, id: string): Promise<void> {
    stagedFor(this.staged, kind).set(rowKey(this.scope, id), null);
  }

  get writeCount(): number {
    return ENTITY_KINDS.reduce((total, kind) => total + stagedFor(this.staged, kind).size, 0);
  }

  commit(): void {
    for (const kind of ENTITY_KINDS) {
      this.commitKind(kind);
    }
  }

  private commitKind<K extends EntityKind>(kind: K): void {
    const table = tableFor(this.tables, kind);
    for (const [key, row] of stagedFor(this.staged, kind)) {
      if (row) {
        table.set(key, row);
      } else {
        table.delete(key);
      }
    }
  }
}
