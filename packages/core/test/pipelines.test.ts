import { describe, expect, test } from 'vitest';

import type { ExtractRequest } from '../src/server/memory/capabilities';
import { CapabilityFailureError } from '../src/server/memory/errors';
import { HeuristicReasoner } from '../src/server/memory/heuristicReasoner';
import type { MemorizeState } from '../src/server/operations/memorize';
import type { Services } from '../src/server/operations/services';
import type { PipelineStep } from '../src/server/pipeline/step';
import { ALICE, BOB, createTestService, deferred, failure, requireRunId, unwrap } from './fixtures';

const BLUE = 'user: My favorite color is blue.';

class GatedReasoner extends HeuristicReasoner {
  readonly entered = deferred();
  readonly release = deferred();

  async extract(request: ExtractRequest) {
    this.entered.resolve();
    await this.release.promise;
    return super.extract(request);
  }
}

describe('pipeline revisions', () => {
  test('an in-flight run keeps the revision it started with', async () => {
    const reasoner = new GatedReasoner();
    const { service, store } = await createTestService({ reasoner });

    const pending = service.memorize(ALICE, { content: BLUE }, 'conversation');
    await reasoner.entered.promise;

    const edited = unwrap(await service.configureStep('memorize', 'extract_items', { maxFacts: 1 }));
    expect(edited.revisionId).toBe('memorize@2');
    expect(edited.steps.find((step) => step.id === 'extract_items')?.config).toEqual({ maxFacts: 1 });

    reasoner.release.resolve();
    const first = await pending;
    const firstLog = unwrap(await service.getRun(requireRunId(first)));
    expect(firstLog.revisionId).toBe('memorize@1');

    const second = await service.memorize(BOB, { content: BLUE }, 'conversation');
    const secondLog = unwrap(await service.getRun(requireRunId(second)));
    expect(secondLog.revisionId).toBe('memorize@2');

    const meta = await store.readServiceMeta();
    expect(meta?.pipelineRevision).toBe('memorize@2,retrieve@1,evolve@1');
  });

  test('an edit that breaks a state dependency is refused', async () => {
    const { service } = await createTestService();

    const result = failure(await service.removeStep('memorize', 'update_intention'));

    expect(result.error.kind).toBe('ValidationError');
    expect(result.error.message).toBe(
      'Pipeline memorize failed validation: step persist_memory requires intention, which no earlier step produces'
    );
    expect(service.describePipelines().memorize.revisionId).toBe('memorize@1');
  });

  test('rollback republishes an earlier step list as a new revision', async () => {
    const { service } = await createTestService();
    unwrap(await service.configureStep('memorize', 'extract_items', { maxFacts: 2 }));

    const rolledBack = unwrap(await service.rollbackPipeline('memorize', 1));

    expect(rolledBack.revisionId).toBe('memorize@3');
    expect(rolledBack.steps.find((step) => step.id === 'extract_items')?.config).toEqual({});
    expect(rolledBack.history.map((entry) => entry.change)).toEqual([
      { type: 'register' },
      { type: 'configure', stepId: 'extract_items', config: { maxFacts: 2 } },
      { type: 'rollback', toRevision: 1 }
    ]);
  });

  test('an inserted step runs in order and shows up in the run log', async () => {
    const { service } = await createTestService();
    const seen: string[] = [];
    const audit: PipelineStep<MemorizeState, Services> = {
      id: 'count_candidates',
      role: 'audit',
      requires: ['candidates'],
      produces: [],
      capabilities: [],
      run(state) {
        seen.push(`${state.candidates?.length ?? 0} candidates`);
        return {};
      }
    };

    const described = unwrap(await service.insertStepAfter('memorize', 'extract_items', audit));
    expect(described.steps.map((step) => step.id).slice(2, 5)).toEqual(['extract_items', 'count_candidates', 'dedupe_items']);

    const result = await service.memorize(ALICE, { content: BLUE }, 'conversation');
    const log = unwrap(await service.getRun(requireRunId(result)));
    expect(seen).toEqual(['1 candidates']);
    expect(log.steps.map((step) => step.stepId)).toContain('count_candidates');
  });
});

describe('durable runs', () => {
  test('a failed run resumes from its checkpoint', async () => {
    let open = false;
    let gateRuns = 0;
    const gate: PipelineStep<MemorizeState, Services> = {
      id: 'approval_gate',
      role: 'audit',
      requires: ['scope'],
      produces: [],
      capabilities: [],
      run() {
        gateRuns += 1;
        if (!open) {
          throw new CapabilityFailureError('approval pending');
        }
        return {};
      }
    };
    const { service, store } = await createTestService({
      config: { runner: { kind: 'durable', attempts: 1, backoffMs: 0 } }
    });
    expect(service.runnerKind).toBe('durable');
    unwrap(await service.insertStepBefore('memorize', 'persist_memory', gate));

    const failed = failure(await service.memorize(ALICE, { content: BLUE }, 'conversation'));
    expect(failed.error.kind).toBe('CapabilityFailure');
    expect(failed.error.stepId).toBe('approval_gate');
    const runId = requireRunId(failed);
    expect(unwrap(await service.getRun(runId)).status).toBe('failed');
    expect(await store.list('resource', {})).toEqual([]);

    open = true;
    const resumed = await service.resumeRun(runId);

    expect(resumed.ok).toBe(true);
    expect(resumed.runId).toBe(runId);
    expect(gateRuns).toBe(2);
    expect(await store.list('resource', {})).toHaveLength(1);
    const log = unwrap(await service.getRun(runId));
    expect(log.status).toBe('succeeded');
    expect(log.steps.filter((step) => step.stepId === 'approval_gate').map((step) => step.status)).toEqual([
      'failed',
      'succeeded'
    ]);
    expect(log.steps.filter((step) => step.stepId === 'extract_items')).toHaveLength(1);
  });

  test('resuming needs the durable runner', async () => {
    const { service } = await createTestService();

    const result = failure(await service.resumeRun('missing-run'));

    expect(result.error.kind).toBe('ValidationError');
    expect(result.error.message).toBe('Resuming a run needs the durable runner');
  });
});

describe('run logs and purging', () => {
  test('lists runs per scope and purges one scope completely', async () => {
    const { service, store } = await createTestService();
    unwrap(await service.memorize(ALICE, { content: BLUE }, 'conversation'));
    unwrap(await service.memorize(BOB, { content: BLUE }, 'conversation'));

    const aliceRuns = unwrap(await service.listRuns({ scope: ALICE }));
    expect(aliceRuns.map((log) => [log.operation, log.scope])).toEqual([['memorize', ALICE]]);

    const summary = unwrap(await service.purgeScope(ALICE));
    expect(summary).toEqual({ resource: 1, item: 1, category: 1, categoryItem: 1, intention: 0, runLogs: 1 });

    expect(await store.list('item', { user: ['alice'], agent: ['a1'] })).toEqual([]);
    expect(await store.list('item', { user: ['bob'], agent: ['a1'] })).toHaveLength(1);
  });

  test('looking up an unknown run reports NotFound', async () => {
    const { service } = await createTestService();

    const result = failure(await service.getRun('no-such-run'));

    expect(result.error.kind).toBe('NotFound');
  });
});

describe('provisioning', () => {
  test('the scope schema is locked once provisioned', async () => {
    const { service } = await createTestService();

    const same = await service.provisionScopeSchema('user:string, agent:string');
    expect(same.ok).toBe(true);

    const changed = failure(await service.provisionScopeSchema('user:string'));
    expect(changed.error.kind).toBe('ScopeSchemaMismatch');
  });
});
