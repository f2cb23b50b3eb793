import fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import {
  categoryItemSchema,
  intentionSchema,
  memoryCategorySchema,
  memoryItemSchema,
  resourceSchema,
  runLogSchema,
  scopeFieldSchema,
  serviceMetaSchema,
  type EntityKind,
  type EntityOf,
  type RunLog,
  type Scope,
  type ScopeField,
  type ServiceMeta
} from './models';
import { TransientStoreError, throwIfAborted } from './errors';
import { KeyedMutex } from './lock';
import { scopeToFilter, type ScopeFilter } from './scope';
import type { ListQuery, MetadataStore, PurgeSummary, RunLogQuery, StoreTransaction, TransactionOptions } from './store';
import {
  StagedTransaction,
  createTables,
  purgeTables,
  rowKey,
  selectRows,
  selectRunLogs,
  tableFor,
  type TableSet
} from './tables';

export type FileStoreOptions = {
  lockTimeoutMs?: number;
  lockRetryDelayMs?: number;
  maxLockRetryDelayMs?: number;
  lockRetryBackoff?: number;
};

const fileDocumentSchema = z.object({
  version: z.literal(1),
  revision: z.number().int().nonnegative(),
  scopeFields: z.array(scopeFieldSchema),
  meta: serviceMetaSchema.nullable(),
  resources: z.array(resourceSchema),
  items: z.array(memoryItemSchema),
  categories: z.array(memoryCategorySchema),
  categoryItems: z.array(categoryItemSchema),
  intentions: z.array(intentionSchema),
  runLogs: z.array(runLogSchema)
});

type FileDocument = {
  revision: number;
  scopeFields: ScopeField[];
  meta: ServiceMeta | null;
  tables: TableSet;
  runLogs: Map<string, RunLog>;
};

function indexRows<K extends EntityKind>(tables: TableSet, kind: K, rows: EntityOf<K>[]): void {
  const table = tableFor(tables, kind);
  for (const row of rows) {
    table.set(rowKey(row.scope, row.id), row);
  }
}

function emptyDocument(): FileDocument {
  return { revision: 0, scopeFields: [], meta: null, tables: createTables(), runLogs: new Map() };
}

/**
 * Embedded store keeping the whole deployment in one JSON file. Every write
 * takes an exclusive lock file and replaces the document atomically.
 */
export class FileMetadataStore implements MetadataStore {
  readonly backend = 'file';
  private readonly filePath: string;
  private readonly lockPath: string;
  private readonly options: Required<FileStoreOptions>;
  private readonly mutex = new KeyedMutex();

  constructor(filePath: string, options: FileStoreOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.lockPath = `${this.filePath}.lock`;
    this.options = {
      lockTimeoutMs: options.lockTimeoutMs ?? 5000,
      lockRetryDelayMs: options.lockRetryDelayMs ?? 20,
      maxLockRetryDelayMs: options.maxLockRetryDelayMs ?? 250,
      lockRetryBackoff: options.lockRetryBackoff ?? 1.6
    };
  }

  get location(): string {
    return this.filePath;
  }

  async provision(fields: readonly ScopeField[]): Promise<void> {
    await this.withDocument(async (doc) => {
      doc.scopeFields = [...fields];
    });
  }

  async readServiceMeta(): Promise<ServiceMeta | null> {
    return (await this.load()).meta;
  }

  async writeServiceMeta(meta: ServiceMeta): Promise<void> {
    await this.withDocument(async (doc) => {
      doc.meta = structuredClone(meta);
    });
  }

  async get<K extends EntityKind>(kind: K, scope: Scope, id: string): Promise<EntityOf<K> | null> {
    const doc = await this.load();
    return tableFor(doc.tables, kind).get(rowKey(scope, id)) ?? null;
  }

  async list<K extends EntityKind>(kind: K, filter: ScopeFilter, query?: ListQuery): Promise<EntityOf<K>[]> {
    const doc = await this.load();
    return selectRows(tableFor(doc.tables, kind).values(), filter, query);
  }

  async transaction<T>(scope: Scope, work: (tx: StoreTransaction) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.withDocument(async (doc) => {
      const tx = new StagedTransaction(doc.tables, scope);
      const result = await work(tx);
      throwIfAborted(options.signal);
      tx.commit();
      return result;
    });
  }

  async putRunLog(log: RunLog): Promise<void> {
    await this.withDocument(async (doc) => {
      doc.runLogs.set(log.runId, structuredClone(log));
    });
  }

  async getRunLog(runId: string): Promise<RunLog | null> {
    return (await this.load()).runLogs.get(runId) ?? null;
  }

  async listRunLogs(query?: RunLogQuery): Promise<RunLog[]> {
    return selectRunLogs((await this.load()).runLogs.values(), query);
  }

  async purgeScope(scope: Scope): Promise<PurgeSummary> {
    return this.withDocument(async (doc) => {
      const summary = purgeTables(doc.tables, scope);
      for (const log of selectRunLogs(doc.runLogs.values(), { filter: scopeToFilter(scope) })) {
        doc.runLogs.delete(log.runId);
        summary.runLogs += 1;
      }
      return summary;
    });
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(this.filePath, async () => undefined);
  }

  private async load(): Promise<FileDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyDocument();
      }
      throw new TransientStoreError(`Failed to read ${this.filePath}`, error);
    }
    const parsed = fileDocumentSchema.parse(JSON.parse(raw));
    const doc: FileDocument = {
      revision: parsed.revision,
      scopeFields: parsed.scopeFields,
      meta: parsed.meta,
      tables: createTables(),
      runLogs: new Map(parsed.runLogs.map((log) => [log.runId, log]))
    };
    indexRows(doc.tables, 'resource', parsed.resources);
    indexRows(doc.tables, 'item', parsed.items);
    indexRows(doc.tables, 'category', parsed.categories);
    indexRows(doc.tables, 'categoryItem', parsed.categoryItems);
    indexRows(doc.tables, 'intention', parsed.intentions);
    return doc;
  }

  private async withDocument<T>(mutate: (doc: FileDocument) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(this.filePath, async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await this.acquireLock();
      try {
        const doc = await this.load();
        const result = await mutate(doc);
        doc.revision += 1;
        await this.atomicWrite(doc);
        return result;
      } finally {
        await releaseLock(this.lockPath, handle);
      }
    });
  }

  private async acquireLock(): Promise<FileHandle> {
    const started = Date.now();
    let delay = this.options.lockRetryDelayMs;

    while (Date.now() - started < this.options.lockTimeoutMs) {
      const handle = await tryAcquireLock(this.lockPath);
      if (handle) return handle;

      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(this.options.maxLockRetryDelayMs, Math.floor(delay * this.options.lockRetryBackoff));
    }

    throw new TransientStoreError(`Lock timeout acquiring ${this.lockPath}`);
  }

  private async atomicWrite(doc: FileDocument): Promise<void> {
    const serialized = {
      version: 1,
      revision: doc.revision,
      scopeFields: doc.scopeFields,
      meta: doc.meta,
      resources: [...doc.tables.resource.values()],
      items: [...doc.tables.item.values()],
      categories: [...doc.tables.category.values()],
      categoryItems: [...doc.tables.categoryItem.values()],
      intentions: [...doc.tables.intention.values()],
      runLogs: [...doc.runLogs.values()]
    };
    const tmp = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tmp, JSON.stringify(serialized, null, 2), 'utf8');
    await fs.rename(tmp, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function tryAcquireLock(lockPath: string): Promise<FileHandle | null> {
  try {
    // 'wx' fails when another writer holds the lock
    const handle = await fs.open(lockPath, 'wx');
    await handle.writeFile(String(process.pid), 'utf8');
    return handle;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return null;
    }
    throw new TransientStoreError(`Failed to create lock ${lockPath}`, error);
  }
}

async function releaseLock(lockPath: string, handle: FileHandle): Promise<void> {
  try {
    await handle.close();
  } finally {
    await fs.rm(lockPath, { force: true });
  }
}
