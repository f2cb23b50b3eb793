import type { EntityKind, EntityOf, RunLog, Scope, ScopeField, ServiceMeta } from './models';
import { KeyedMutex } from './lock';
import { scopeKey, scopeToFilter, type ScopeFilter } from './scope';
import { throwIfAborted } from './errors';
import type { ListQuery, MetadataStore, PurgeSummary, RunLogQuery, StoreTransaction, TransactionOptions } from './store';
import { StagedTransaction, createTables, purgeTables, rowKey, selectRows, selectRunLogs, tableFor } from './tables';

/** Volatile store for tests and single-process deployments. */
export class InMemoryMetadataStore implements MetadataStore {
  readonly backend = 'memory';
  private readonly tables = createTables();
  private readonly runLogs = new Map<string, RunLog>();
  private readonly locks = new KeyedMutex();
  private meta: ServiceMeta | null = null;
  private scopeFields: readonly ScopeField[] = [];

  async provision(fields: readonly ScopeField[]): Promise<void> {
    this.scopeFields = [...fields];
  }

  async readServiceMeta(): Promise<ServiceMeta | null> {
    return this.meta ? structuredClone(this.meta) : null;
  }

  async writeServiceMeta(meta: ServiceMeta): Promise<void> {
    this.meta = structuredClone(meta);
  }

  async get<K extends EntityKind>(kind: K, scope: Scope, id: string): Promise<EntityOf<K> | null> {
    const row = tableFor(this.tables, kind).get(rowKey(scope, id));
    return row ? structuredClone(row) : null;
  }

  async list<K extends EntityKind>(kind: K, filter: ScopeFilter, query?: ListQuery): Promise<EntityOf<K>[]> {
    return selectRows(tableFor(this.tables, kind).values(), filter, query);
  }

  async transaction<T>(scope: Scope, work: (tx: StoreTransaction) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.locks.runExclusive(scopeKey(scope, this.scopeFields.length ? this.scopeFields : undefined), async () => {
      const tx = new StagedTransaction(this.tables, scope);
      const result = await work(tx);
      throwIfAborted(options.signal);
      tx.commit();
      return result;
    });
  }

  async putRunLog(log: RunLog): Promise<void> {
    this.runLogs.set(log.runId, structuredClone(log));
  }

  async getRunLog(runId: string): Promise<RunLog | null> {
    const log = this.runLogs.get(runId);
    return log ? structuredClone(log) : null;
  }

  async listRunLogs(query?: RunLogQuery): Promise<RunLog[]> {
    return selectRunLogs(this.runLogs.values(), query);
  }

  async purgeScope(scope: Scope): Promise<PurgeSummary> {
    return this.locks.runExclusive(scopeKey(scope, this.scopeFields.length ? this.scopeFields : undefined), async () => {
      const summary = purgeTables(this.tables, scope);
      const filter = scopeToFilter(scope);
      for (const log of selectRunLogs(this.runLogs.values(), { filter })) {
        this.runLogs.delete(log.runId);
        summary.runLogs += 1;
      }
      return summary;
    });
  }

  async close(): Promise<void> {
    this.runLogs.clear();
  }
}
