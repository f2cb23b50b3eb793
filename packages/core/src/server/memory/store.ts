import {
  categoryItemSchema,
  memoryCategorySchema,
  memoryItemSchema,
  parseEntity,
  type EntityKind,
  type EntityOf,
  type OperationName,
  type RunLog,
  type RunStatus,
  type Scope,
  type ScopeField,
  type ServiceMeta
} from './models';
import { StoreIntegrityError } from './errors';
import { describeScope, sameScope, type ScopeFilter } from './scope';

export type WhereValue = string | number | boolean | null;

export type ListOrder = 'createdAt:asc' | 'createdAt:desc' | 'updatedAt:desc';

export type ListQuery = {
  where?: Record<string, WhereValue>;
  ids?: readonly string[];
  limit?: number;
  order?: ListOrder;
};

export type RunLogQuery = {
  filter?: ScopeFilter;
  operation?: OperationName;
  status?: RunStatus;
  limit?: number;
};

export type TransactionOptions = {
  /** Once aborted, the transaction rolls back instead of committing. */
  signal?: AbortSignal;
};

export type PurgeSummary = Record<EntityKind, number> & { runLogs: number };

export interface StoreTransaction {
  readonly scope: Scope;
  get<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null>;
  list<K extends EntityKind>(kind: K, query?: ListQuery): Promise<EntityOf<K>[]>;
  put<K extends EntityKind>(kind: K, entity: EntityOf<K>): Promise<void>;
  delete(kind: 'category' | 'categoryItem', id: string): Promise<void>;
}

/**
 * Durable storage for the memory hierarchy. Every read is scope filtered and
 * every write goes through a transaction bound to exactly one scope.
 */
export interface MetadataStore {
  readonly backend: string;
  provision(fields: readonly ScopeField[]): Promise<void>;
  readServiceMeta(): Promise<ServiceMeta | null>;
  writeServiceMeta(meta: ServiceMeta): Promise<void>;
  get<K extends EntityKind>(kind: K, scope: Scope, id: string): Promise<EntityOf<K> | null>;
  list<K extends EntityKind>(kind: K, filter: ScopeFilter, query?: ListQuery): Promise<EntityOf<K>[]>;
  transaction<T>(scope: Scope, work: (tx: StoreTransaction) => Promise<T>, options?: TransactionOptions): Promise<T>;
  putRunLog(log: RunLog): Promise<void>;
  getRunLog(runId: string): Promise<RunLog | null>;
  listRunLogs(query?: RunLogQuery): Promise<RunLog[]>;
  purgeScope(scope: Scope): Promise<PurgeSummary>;
  close(): Promise<void>;
}

export function emptyPurgeSummary(): PurgeSummary {
  return { resource: 0, item: 0, category: 0, categoryItem: 0, intention: 0, runLogs: 0 };
}

/**
 * Base for backend transactions. Rows are validated and checked against the
 * scope invariants before the backend sees them.
 */
export abstract class ScopedTransaction implements StoreTransaction {
  readonly scope: Scope;

  protected constructor(scope: Scope) {
    this.scope = scope;
  }

  abstract get<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null>;
  abstract list<K extends EntityKind>(kind: K, query?: ListQuery): Promise<EntityOf<K>[]>;
  protected abstract write<K extends EntityKind>(kind: K, row: EntityOf<K>): Promise<void>;
  protected abstract remove(kind: EntityKind, id: string): Promise<void>;

  async put<K extends EntityKind>(kind: K, entity: EntityOf<K>): Promise<void> {
    const row = parseEntity(kind, entity);
    if (!sameScope(row.scope, this.scope)) {
      throw new StoreIntegrityError(
        `${kind} ${row.id} carries scope ${describeScope(row.scope)} inside a transaction for ${describeScope(this.scope)}`
      );
    }
    await this.checkReferences(kind, row);
    await this.write(kind, row);
  }

  async delete(kind: 'category' | 'categoryItem', id: string): Promise<void> {
    if (kind === 'category') {
      const links = await this.list('categoryItem', { where: { categoryId: id } });
      if (links.length > 0) {
        throw new StoreIntegrityError(`category ${id} still has ${links.length} linked items`);
      }
    }
    await this.remove(kind, id);
  }

  private async checkReferences(kind: EntityKind, row: unknown): Promise<void> {
    if (kind === 'item') {
      const item = memoryItemSchema.parse(row);
      if (item.evidence.resourceId !== item.resourceId) {
        throw new StoreIntegrityError(`item ${item.id} evidence points outside its resource`);
      }
      if (!(await this.get('resource', item.resourceId))) {
        throw new StoreIntegrityError(`item ${item.id} references missing resource ${item.resourceId}`);
      }
      return;
    }
    if (kind === 'categoryItem') {
      const link = categoryItemSchema.parse(row);
      const [category, item] = await Promise.all([
        this.get('category', link.categoryId),
        this.get('item', link.itemId)
      ]);
      if (!category || !item) {
        throw new StoreIntegrityError(`link ${link.id} references an entity outside scope ${describeScope(this.scope)}`);
      }
      const duplicate = (await this.list('categoryItem', { where: { categoryId: link.categoryId, itemId: link.itemId } })).find(
        (existing) => existing.id !== link.id
      );
      if (duplicate) {
        throw new StoreIntegrityError(`item ${link.itemId} is already linked to category ${link.categoryId}`);
      }
      return;
    }
    if (kind === 'category') {
      const category = memoryCategorySchema.parse(row);
      const lowered = category.name.toLowerCase();
      const clash = (await this.list('category')).find(
        (existing) => existing.id !== category.id && existing.name.toLowerCase() === lowered
      );
      if (clash) {
        throw new StoreIntegrityError(`category name ${category.name} already exists in scope`);
      }
    }
  }
}

function compareDates(a: Date, b: Date): number {
  return a.getTime() - b.getTime();
}

export function sortRows<R extends { createdAt: Date; updatedAt: Date; id: string }>(rows: R[], order: ListOrder = 'createdAt:asc'): R[] {
  const sorted = [...rows];
  switch (order) {
    case 'createdAt:asc':
      sorted.sort((a, b) => compareDates(a.createdAt, b.createdAt) || a.id.localeCompare(b.id));
      break;
    case 'createdAt:desc':
      sorted.sort((a, b) => compareDates(b.createdAt, a.createdAt) || a.id.localeCompare(b.id));
      break;
    case 'updatedAt:desc':
      sorted.sort((a, b) => compareDates(b.updatedAt, a.updatedAt) || a.id.localeCompare(b.id));
      break;
  }
  return sorted;
}

export function matchesWhere(row: object, where: Record<string, WhereValue> | undefined): boolean {
  if (!where) {
    return true;
  }
  return Object.entries(where).every(([field, expected]) => {
    const actual: unknown = Reflect.get(row, field);
    return (actual ?? null) === expected;
  });
}
