import { describe, expect, test } from 'vitest';

import { NotProvisionedError, ScopeSchemaMismatchError, ValidationError } from '../src/server/memory/errors';
import { InMemoryMetadataStore } from '../src/server/memory/inMemoryStore';
import { TenancyManager, buildScopeSchema, parseScopeDescriptor } from '../src/server/memory/tenancy';

async function provisioned(descriptor = 'user:string,agent:string') {
  const store = new InMemoryMetadataStore();
  const tenancy = new TenancyManager(store);
  await tenancy.provision(descriptor);
  return { store, tenancy };
}

describe('parseScopeDescriptor', () => {
  test('reads ordered fields with string as the default type', () => {
    expect(parseScopeDescriptor('user:string, org:number, agent')).toEqual([
      { name: 'user', type: 'string' },
      { name: 'org', type: 'number' },
      { name: 'agent', type: 'string' }
    ]);
  });

  test('rejects malformed descriptors', () => {
    expect(() => parseScopeDescriptor(' , ')).toThrow('Scope descriptor must name at least one field');
    expect(() => parseScopeDescriptor('a:string:x')).toThrow('Malformed scope field "a:string:x"');
    expect(() => parseScopeDescriptor('User')).toThrow(
      'Invalid scope field "User": scope field names must be lowercase identifiers'
    );
  });

  test('duplicate names are refused', () => {
    expect(() => buildScopeSchema(parseScopeDescriptor('user,user'))).toThrow(new ValidationError('Duplicate scope field user'));
  });
});

describe('TenancyManager', () => {
  test('nothing validates before provisioning', () => {
    const tenancy = new TenancyManager(new InMemoryMetadataStore());

    expect(tenancy.isProvisioned).toBe(false);
    expect(() => tenancy.validateScope({ user: 'alice' })).toThrow(NotProvisionedError);
  });

  test('provisioning writes the service meta once', async () => {
    const { store, tenancy } = await provisioned();

    const meta = await store.readServiceMeta();
    expect(meta).toMatchObject({
      scopeFields: [
        { name: 'user', type: 'string' },
        { name: 'agent', type: 'string' }
      ],
      schemaVersion: 1,
      taxonomyVersion: 1,
      pipelineRevision: null
    });
    expect(tenancy.isProvisioned).toBe(true);

    const again = await tenancy.provision('user:string, agent:string');
    expect(again.schemaFingerprint).toBe(meta?.schemaFingerprint);
  });

  test('a different schema is refused after provisioning', async () => {
    const { tenancy } = await provisioned();

    await expect(tenancy.provision('user:string')).rejects.toThrow(
      new ScopeSchemaMismatchError(
        'Deployment is provisioned with [user:string, agent:string]; refusing to re-provision as [user:string] without an operator migration'
      )
    );
  });

  test('another manager on the same store picks up the schema', async () => {
    const { store } = await provisioned();
    const other = new TenancyManager(store);

    await other.load();

    expect(other.validateScope({ user: 'alice', agent: 'a1' })).toEqual({ user: 'alice', agent: 'a1' });
  });

  test('scopes must carry exactly the provisioned fields', async () => {
    const { tenancy } = await provisioned();

    expect(() => tenancy.validateScope({ user: 'alice' })).toThrow(
      'Scope does not match [user:string, agent:string]: missing field agent'
    );
    expect(() => tenancy.validateScope({ user: 'alice', agent: 'a1', team: 'x' })).toThrow(
      'Scope does not match [user:string, agent:string]: unknown field team'
    );
    expect(() => tenancy.validateScope({ user: 'alice', agent: 7 })).toThrow(
      'Scope does not match [user:string, agent:string]: agent must be a string'
    );
    expect(() => tenancy.validateScope({ user: '', agent: 'a1' })).toThrow(
      'Scope does not match [user:string, agent:string]: user must not be empty'
    );
    expect(() => tenancy.validateScope('alice')).toThrow('Scope must be an object of scope field values');
  });

  test('validated scopes follow the schema field order', async () => {
    const { tenancy } = await provisioned();

    const scope = tenancy.validateScope({ agent: 'a1', user: 'alice' });

    expect(Object.keys(scope)).toEqual(['user', 'agent']);
  });

  test('number fields need finite numbers', async () => {
    const { tenancy } = await provisioned('org:number');

    expect(tenancy.validateScope({ org: 42 })).toEqual({ org: 42 });
    expect(() => tenancy.validateScope({ org: Number.POSITIVE_INFINITY })).toThrow(
      'Scope does not match [org:number]: org must be a finite number'
    );
    expect(() => tenancy.validateScope({ org: '42' })).toThrow(ScopeSchemaMismatchError);
  });

  test('selectors are checked field by field', async () => {
    const { tenancy } = await provisioned();

    expect(tenancy.validateSelector({ user: { in: ['alice', 'bob'] }, agent: { any: true } })).toEqual({
      user: { in: ['alice', 'bob'] },
      agent: { any: true }
    });
    expect(() => tenancy.validateSelector({ user: { in: ['alice', 3] }, agent: { any: true } })).toThrow(
      'Scope selector does not match [user:string, agent:string]: user must be a string'
    );
    expect(() => tenancy.validateSelector({ user: { in: [] }, agent: 'a1' })).toThrow(/^Scope selector is malformed/);
  });

  test('pipeline revisions are recorded in the service meta', async () => {
    const { store, tenancy } = await provisioned();

    await tenancy.recordPipelineRevision('memorize@3,retrieve@1,evolve@1');

    expect((await store.readServiceMeta())?.pipelineRevision).toBe('memorize@3,retrieve@1,evolve@1');
  });
});
