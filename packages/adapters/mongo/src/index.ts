import { MongoClient, MongoServerError, type ClientSession, type Collection, type Db, type Document, type Sort } from 'mongodb';
import { z } from 'zod';

import {
  ENTITY_KINDS,
  ScopedTransaction,
  TransientStoreError,
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

export type MongoMetadataStoreOptions = {
  dbName?: string;
  collectionPrefix?: string;
};

export type MongoIndexSpec = {
  collection: 'entities' | 'runLogs';
  name: string;
  key: Record<string, 1 | -1>;
};

type EntityDocument = {
  _id: string;
  kind: EntityKind;
  scopeKey: string;
  scope: Scope;
  entity: unknown;
};

type RunLogDocument = {
  _id: string;
  scopeKey: string | null;
  scope: Scope | null;
  operation: string;
  status: string;
  startedAt: Date;
  log: unknown;
};

type MetaDocument = { _id: string; meta: unknown };

type LockDocument = { _id: string; version: number };

const entityDocumentSchema = z.object({ entity: z.unknown() });
const runLogDocumentSchema = z.object({ log: z.unknown() });
const metaDocumentSchema = z.object({ meta: z.unknown() });

const SORTS: Record<ListOrder, Sort> = {
  'createdAt:asc': { 'entity.createdAt': 1, 'entity.id': 1 },
  'createdAt:desc': { 'entity.createdAt': -1, 'entity.id': 1 },
  'updatedAt:desc': { 'entity.updatedAt': -1, 'entity.id': 1 }
};

// duplicate key and write conflict
const TRANSIENT_CODES = new Set([11000, 112]);

export function isTransientMongoError(error: unknown): boolean {
  return (
    error instanceof MongoServerError &&
    ((typeof error.code === 'number' && TRANSIENT_CODES.has(error.code)) || error.hasErrorLabel('TransientTransactionError'))
  );
}

export function entityDocumentId(kind: EntityKind, key: string, id: string): string {
  return `${kind}|${key}|${id}`;
}

/** Scope predicates on a nested `scope` document; wildcards require the field to exist. */
export function buildScopeQuery(filter: ScopeFilter, prefix = 'scope'): Document {
  const query: Document = {};
  for (const [name, allowed] of Object.entries(filter)) {
    const path = `${prefix}.${name}`;
    if (allowed === null) {
      query[path] = { $exists: true };
    } else if (allowed.length === 1) {
      query[path] = allowed[0];
    } else {
      query[path] = { $in: [...allowed] };
    }
  }
  return query;
}

export function buildEntityQuery(kind: EntityKind, filter: ScopeFilter, query: ListQuery = {}): Document {
  const result: Document = { kind, ...buildScopeQuery(filter) };
  if (query.ids) {
    result['entity.id'] = { $in: [...query.ids] };
  }
  for (const [field, value] of Object.entries(query.where ?? {})) {
    result[`entity.${field}`] = value;
  }
  return result;
}

export function buildRunLogQuery(query: RunLogQuery = {}): Document {
  const result: Document = {};
  if (query.filter) {
    result.scopeKey = { $ne: null };
    Object.assign(result, buildScopeQuery(query.filter));
  }
  if (query.operation) {
    result.operation = query.operation;
  }
  if (query.status) {
    result.status = query.status;
  }
  return result;
}

/** Scope fields lead every listing index, in schema order, ahead of the sort key. */
export function mongoIndexSpecs(fields: readonly ScopeField[]): MongoIndexSpec[] {
  const scopeKeys: Record<string, 1> = {};
  for (const field of fields) {
    scopeKeys[`scope.${field.name}`] = 1;
  }
  return [
    { collection: 'entities', name: 'kind_scope', key: { kind: 1, scopeKey: 1 } },
    { collection: 'entities', name: 'scope_created', key: { kind: 1, ...scopeKeys, 'entity.createdAt': 1, 'entity.id': 1 } },
    { collection: 'entities', name: 'scope_updated', key: { kind: 1, ...scopeKeys, 'entity.updatedAt': -1, 'entity.id': 1 } },
    { collection: 'runLogs', name: 'started', key: { startedAt: -1 } },
    { collection: 'runLogs', name: 'scope_started', key: { ...scopeKeys, startedAt: -1 } }
  ];
}

async function guard<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (isTransientMongoError(error)) {
      throw new TransientStoreError(`MongoDB operation failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    throw error;
  }
}

class MongoTransaction extends ScopedTransaction {
  private readonly entities: Collection<EntityDocument>;
  private readonly session: ClientSession;
  private readonly key: string;

  constructor(entities: Collection<EntityDocument>, session: ClientSession, scope: Scope) {
    super(scope);
    this.entities = entities;
    this.session = session;
    this.key = scopeKey(scope);
  }

  async get<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null> {
    const doc = await this.entities.findOne({ _id: entityDocumentId(kind, this.key, id) }, { session: this.session });
    return doc ? parseEntity(kind, entityDocumentSchema.parse(doc).entity) : null;
  }

  async list<K extends EntityKind>(kind: K, query: ListQuery = {}): Promise<EntityOf<K>[]> {
    let cursor = this.entities
      .find(buildEntityQuery(kind, scopeToFilter(this.scope), query), { session: this.session })
      .sort(SORTS[query.order ?? 'createdAt:asc']);
    if (query.limit !== undefined) {
      cursor = cursor.limit(query.limit);
    }
    const docs = await cursor.toArray();
    return docs.map((doc) => parseEntity(kind, entityDocumentSchema.parse(doc).entity));
  }

  protected async write<K extends EntityKind>(kind: K, row: EntityOf<K>): Promise<void> {
    const _id = entityDocumentId(kind, this.key, row.id);
    await this.entities.replaceOne(
      { _id },
      { kind, scopeKey: this.key, scope: row.scope, entity: row },
      { upsert: true, session: this.session }
    );
  }

  protected async remove(kind: EntityKind, id: string): Promise<void> {
    await this.entities.deleteOne({ _id: entityDocumentId(kind, this.key, id) }, { session: this.session });
  }
}

/**
 * MongoDB metadata store. Transactions bump a per-scope lock document first,
 * so concurrent writers for one scope conflict and retry instead of
 * interleaving.
 */
export class MongoMetadataStore implements MetadataStore {
  readonly backend = 'mongo';
  private readonly client: MongoClient;
  private readonly db: Db;
  private readonly entities: Collection<EntityDocument>;
  private readonly runLogs: Collection<RunLogDocument>;
  private readonly meta: Collection<MetaDocument>;
  private readonly locks: Collection<LockDocument>;

  constructor(client: MongoClient, options: MongoMetadataStoreOptions = {}) {
    const prefix = options.collectionPrefix ?? 'stratum';
    this.client = client;
    this.db = client.db(options.dbName);
    this.entities = this.db.collection<EntityDocument>(`${prefix}_entities`);
    this.runLogs = this.db.collection<RunLogDocument>(`${prefix}_run_logs`);
    this.meta = this.db.collection<MetaDocument>(`${prefix}_meta`);
    this.locks = this.db.collection<LockDocument>(`${prefix}_scope_locks`);
  }

  async provision(fields: readonly ScopeField[]): Promise<void> {
    for (const spec of mongoIndexSpecs(fields)) {
      if (spec.collection === 'entities') {
        await guard(() => this.entities.createIndex(spec.key, { name: spec.name }));
      } else {
        await guard(() => this.runLogs.createIndex(spec.key, { name: spec.name }));
      }
    }
  }

  async readServiceMeta(): Promise<ServiceMeta | null> {
    const doc = await guard(() => this.meta.findOne({ _id: 'service' }));
    return doc ? serviceMetaSchema.parse(metaDocumentSchema.parse(doc).meta) : null;
  }

  async writeServiceMeta(meta: ServiceMeta): Promise<void> {
    await guard(() => this.meta.replaceOne({ _id: 'service' }, { meta }, { upsert: true }));
  }

  async get<K extends EntityKind>(kind: K, scope: Scope, id: string): Promise<EntityOf<K> | null> {
    const doc = await guard(() => this.entities.findOne({ _id: entityDocumentId(kind, scopeKey(scope), id) }));
    return doc ? parseEntity(kind, entityDocumentSchema.parse(doc).entity) : null;
  }

  async list<K extends EntityKind>(kind: K, filter: ScopeFilter, query: ListQuery = {}): Promise<EntityOf<K>[]> {
    let cursor = this.entities.find(buildEntityQuery(kind, filter, query)).sort(SORTS[query.order ?? 'createdAt:asc']);
    if (query.limit !== undefined) {
      cursor = cursor.limit(query.limit);
    }
    const docs = await guard(() => cursor.toArray());
    return docs.map((doc) => parseEntity(kind, entityDocumentSchema.parse(doc).entity));
  }

  async transaction<T>(scope: Scope, work: (tx: StoreTransaction) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.withScopeSession(scope, async (session) => {
      const result = await work(new MongoTransaction(this.entities, session, scope));
      throwIfAborted(options.signal);
      return result;
    });
  }

  async putRunLog(log: RunLog): Promise<void> {
    await guard(() =>
      this.runLogs.replaceOne(
        { _id: log.runId },
        {
          scopeKey: log.scope ? scopeKey(log.scope) : null,
          scope: log.scope,
          operation: log.operation,
          status: log.status,
          startedAt: log.startedAt,
          log
        },
        { upsert: true }
      )
    );
  }

  async getRunLog(runId: string): Promise<RunLog | null> {
    const doc = await guard(() => this.runLogs.findOne({ _id: runId }));
    return doc ? runLogSchema.parse(runLogDocumentSchema.parse(doc).log) : null;
  }

  async listRunLogs(query: RunLogQuery = {}): Promise<RunLog[]> {
    let cursor = this.runLogs.find(buildRunLogQuery(query)).sort({ startedAt: -1, _id: 1 });
    if (query.limit !== undefined) {
      cursor = cursor.limit(query.limit);
    }
    const docs = await guard(() => cursor.toArray());
    return docs.map((doc) => runLogSchema.parse(runLogDocumentSchema.parse(doc).log));
  }

  async purgeScope(scope: Scope): Promise<PurgeSummary> {
    const key = scopeKey(scope);
    return this.withScopeSession(scope, async (session) => {
      const summary = emptyPurgeSummary();
      for (const kind of ENTITY_KINDS) {
        const result = await this.entities.deleteMany({ kind, scopeKey: key }, { session });
        summary[kind] = result.deletedCount;
      }
      const logs = await this.runLogs.deleteMany({ scopeKey: key }, { session });
      summary.runLogs = logs.deletedCount;
      return summary;
    });
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async withScopeSession<T>(scope: Scope, work: (session: ClientSession) => Promise<T>): Promise<T> {
    const session = this.client.startSession();
    const holder: { outcome: { value: T } | null } = { outcome: null };
    try {
      await guard(() =>
        session.withTransaction(async () => {
          await this.locks.updateOne({ _id: scopeKey(scope) }, { $inc: { version: 1 } }, { upsert: true, session });
          holder.outcome = { value: await work(session) };
        })
      );
    } finally {
      await session.endSession();
    }
    if (!holder.outcome) {
      throw new TransientStoreError('MongoDB transaction ended without committing');
    }
    return holder.outcome.value;
  }
}
