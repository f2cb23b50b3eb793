import { createHash } from 'node:crypto';

import {
  scopeFieldSchema,
  scopeSelectorSchema,
  type Scope,
  type ScopeField,
  type ScopeSelector,
  type ServiceMeta
} from './models';
import { NotProvisionedError, ScopeSchemaMismatchError, ValidationError } from './errors';
import { isValueSet, isWildcard } from './scope';
import type { MetadataStore } from './store';

export type ScopeSchema = {
  fields: readonly ScopeField[];
  fingerprint: string;
};

/** Parses `"project_id:string, agent_id:string"` into ordered fields. */
export function parseScopeDescriptor(descriptor: string): ScopeField[] {
  const parts = descriptor
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length === 0) {
    throw new ValidationError('Scope descriptor must name at least one field');
  }
  return parts.map((part) => {
    const [name, type = 'string', ...rest] = part.split(':').map((token) => token.trim());
    if (rest.length > 0) {
      throw new ValidationError(`Malformed scope field "${part}"`);
    }
    const result = scopeFieldSchema.safeParse({ name, type });
    if (!result.success) {
      throw new ValidationError(
        `Invalid scope field "${part}"`,
        result.error.issues.map((issue) => issue.message)
      );
    }
    return result.data;
  });
}

export function fingerprintFields(fields: readonly ScopeField[]): string {
  const canonical = JSON.stringify(fields.map((field) => [field.name, field.type]));
  return createHash('sha256').update(canonical).digest('hex');
}

export function buildScopeSchema(fields: readonly ScopeField[]): ScopeSchema {
  const names = new Set<string>();
  for (const field of fields) {
    if (names.has(field.name)) {
      throw new ValidationError(`Duplicate scope field ${field.name}`);
    }
    names.add(field.name);
  }
  if (fields.length === 0) {
    throw new ValidationError('Scope schema must contain at least one field');
  }
  return { fields: fields.map((field) => ({ ...field })), fingerprint: fingerprintFields(fields) };
}

function describeFields(fields: readonly ScopeField[]): string {
  return fields.map((field) => `${field.name}:${field.type}`).join(', ');
}

function checkFieldSet(schema: ScopeSchema, supplied: string[]): string[] {
  const problems: string[] = [];
  const expected = new Set(schema.fields.map((field) => field.name));
  for (const name of supplied) {
    if (!expected.has(name)) {
      problems.push(`unknown field ${name}`);
    }
  }
  for (const field of schema.fields) {
    if (!supplied.includes(field.name)) {
      problems.push(`missing field ${field.name}`);
    }
  }
  return problems;
}

function checkValue(field: ScopeField, value: unknown): string | null {
  if (field.type === 'string') {
    if (typeof value !== 'string') return `${field.name} must be a string`;
    if (value.length === 0) return `${field.name} must not be empty`;
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return `${field.name} must be a finite number`;
  }
  return null;
}

/**
 * Owns the deployment's tenant identity schema. Provisioning is a one-time
 * act; afterwards every scope and selector must match the locked field set.
 */
export class TenancyManager {
  private readonly store: MetadataStore;
  private schema: ScopeSchema | null = null;
  private meta: ServiceMeta | null = null;

  constructor(store: MetadataStore) {
    this.store = store;
  }

  async load(): Promise<ServiceMeta | null> {
    const meta = await this.store.readServiceMeta();
    this.meta = meta;
    this.schema = meta ? { fields: meta.scopeFields, fingerprint: meta.schemaFingerprint } : null;
    return meta;
  }

  async provision(input: string | readonly ScopeField[]): Promise<ServiceMeta> {
    const fields = typeof input === 'string' ? parseScopeDescriptor(input) : input.map((field) => scopeFieldSchema.parse(field));
    const schema = buildScopeSchema(fields);
    const existing = await this.load();

    if (existing) {
      if (existing.schemaFingerprint !== schema.fingerprint) {
        throw new ScopeSchemaMismatchError(
          `Deployment is provisioned with [${describeFields(existing.scopeFields)}]; refusing to re-provision as [${describeFields(schema.fields)}] without an operator migration`
        );
      }
      return existing;
    }

    await this.store.provision(schema.fields);
    const now = new Date();
    const meta: ServiceMeta = {
      scopeFields: [...schema.fields],
      schemaFingerprint: schema.fingerprint,
      schemaVersion: 1,
      taxonomyVersion: 1,
      pipelineRevision: null,
      provisionedAt: now,
      updatedAt: now
    };
    await this.store.writeServiceMeta(meta);
    this.meta = meta;
    this.schema = schema;
    return meta;
  }

  get isProvisioned(): boolean {
    return this.schema !== null;
  }

  requireSchema(): ScopeSchema {
    if (!this.schema) {
      throw new NotProvisionedError();
    }
    return this.schema;
  }

  requireMeta(): ServiceMeta {
    if (!this.meta) {
      throw new NotProvisionedError();
    }
    return this.meta;
  }

  validateScope(value: unknown): Scope {
    const schema = this.requireSchema();
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ScopeSchemaMismatchError('Scope must be an object of scope field values');
    }
    const entries = Object.entries(value);
    const problems = checkFieldSet(
      schema,
      entries.map(([name]) => name)
    );
    const scope: Scope = {};
    for (const field of schema.fields) {
      const raw: unknown = Reflect.get(value, field.name);
      if (raw === undefined) continue;
      const problem = checkValue(field, raw);
      if (problem) {
        problems.push(problem);
      } else if (typeof raw === 'string' || typeof raw === 'number') {
        scope[field.name] = raw;
      }
    }
    if (problems.length > 0) {
      throw new ScopeSchemaMismatchError(`Scope does not match [${describeFields(schema.fields)}]: ${problems.join('; ')}`);
    }
    return scope;
  }

  validateSelector(value: unknown): ScopeSelector {
    const schema = this.requireSchema();
    const parsed = scopeSelectorSchema.safeParse(value);
    if (!parsed.success) {
      throw new ScopeSchemaMismatchError(
        `Scope selector is malformed: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
      );
    }
    const selector = parsed.data;
    const problems = checkFieldSet(schema, Object.keys(selector));
    for (const field of schema.fields) {
      const entry = selector[field.name];
      if (entry === undefined || isWildcard(entry)) continue;
      const values = isValueSet(entry) ? entry.in : [entry];
      for (const candidate of values) {
        const problem = checkValue(field, candidate);
        if (problem) problems.push(problem);
      }
    }
    if (problems.length > 0) {
      throw new ScopeSchemaMismatchError(
        `Scope selector does not match [${describeFields(schema.fields)}]: ${problems.join('; ')}`
      );
    }
    return selector;
  }

  async bumpTaxonomyVersion(): Promise<ServiceMeta> {
    return this.updateMeta((meta) => ({ ...meta, taxonomyVersion: meta.taxonomyVersion + 1 }));
  }

  async recordPipelineRevision(token: string): Promise<ServiceMeta> {
    return this.updateMeta((meta) => ({ ...meta, pipelineRevision: token }));
  }

  private async updateMeta(change: (meta: ServiceMeta) => ServiceMeta): Promise<ServiceMeta> {
    const current = (await this.store.readServiceMeta()) ?? this.requireMeta();
    const next = { ...change(current), updatedAt: new Date() };
    await this.store.writeServiceMeta(next);
    this.meta = next;
    return next;
  }
}
