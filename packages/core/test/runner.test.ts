import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';
import { z } from 'zod';

import { CapabilityFailureError, StepTimeoutError, TransientStoreError, ValidationError } from '../src/server/memory/errors';
import { FileCheckpointStore, InMemoryCheckpointStore, type Checkpoint } from '../src/server/pipeline/checkpoints';
import { DurableRunner, planStages } from '../src/server/pipeline/durableRunner';
import { PipelineRegistry } from '../src/server/pipeline/registry';
import { InlineRunner, PipelineRunError, backoffDelay, type RetryPolicy } from '../src/server/pipeline/runner';
import { requireState, type PipelineStep } from '../src/server/pipeline/step';
import { deferred } from './fixtures';

const toyStateSchema = z.object({
  input: z.number(),
  doubled: z.number().optional(),
  tripled: z.number().optional(),
  total: z.number().optional(),
  note: z.string().optional()
});

type ToyState = z.infer<typeof toyStateSchema>;
type ToyServices = { calls: string[] };
type ToyStep = PipelineStep<ToyState, ToyServices>;

const POLICY: RetryPolicy = { attempts: 3, backoffMs: 0, maxBackoffMs: 0, stepTimeoutMs: 1000 };

function doubleStep(overrides: Partial<ToyStep> = {}): ToyStep {
  return {
    id: 'double',
    role: 'assembly',
    requires: ['input'],
    produces: ['doubled'],
    run: (state, { services }) => {
      services.calls.push('double');
      return { doubled: state.input * 2 };
    },
    ...overrides
  };
}

function tripleStep(overrides: Partial<ToyStep> = {}): ToyStep {
  return {
    id: 'triple',
    role: 'assembly',
    requires: ['input'],
    produces: ['tripled'],
    run: (state, { services }) => {
      services.calls.push('triple');
      return { tripled: state.input * 3 };
    },
    ...overrides
  };
}

function sumStep(overrides: Partial<ToyStep> = {}): ToyStep {
  return {
    id: 'sum',
    role: 'assembly',
    requires: ['doubled', 'tripled'],
    produces: ['total'],
    run: (state, { services }) => {
      services.calls.push('sum');
      return { total: requireState(state, 'doubled', 'sum') + requireState(state, 'tripled', 'sum') };
    },
    ...overrides
  };
}

function noteStep(): ToyStep {
  return {
    id: 'note',
    role: 'audit',
    requires: ['input'],
    produces: ['note'],
    finalizer: true,
    run: (_state, { services }) => {
      services.calls.push('note');
      return { note: 'finished' };
    }
  };
}

function toyRevision(steps: ToyStep[]) {
  return new PipelineRegistry<ToyState, ToyServices>({
    name: 'toy',
    steps,
    initialKeys: ['input'],
    stateSchema: toyStateSchema,
    available: new Set()
  }).current();
}

function options(runId = 'run-1') {
  const services: ToyServices = { calls: [] };
  return { runId, services };
}

async function captureRunError(work: Promise<unknown>): Promise<PipelineRunError> {
  try {
    await work;
  } catch (error) {
    if (error instanceof PipelineRunError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the run to fail');
}

describe('planStages', () => {
  test('groups independent neighbours and isolates finalizers', () => {
    const stages = planStages([doubleStep(), tripleStep(), sumStep(), noteStep()]);

    expect(stages.map((stage) => stage.map((step) => step.id))).toEqual([['double', 'triple'], ['sum'], ['note']]);
  });
});

describe('backoffDelay', () => {
  test('doubles per attempt up to the cap', () => {
    const policy = { backoffMs: 100, maxBackoffMs: 250 };

    expect([1, 2, 3].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 250]);
  });
});

describe('InlineRunner', () => {
  test('runs every step in order and merges their output', async () => {
    const runner = new InlineRunner(POLICY);
    const run = options();

    const outcome = await runner.run(toyRevision([doubleStep(), tripleStep(), sumStep()]), { input: 3 }, run);

    expect(outcome.state).toEqual({ input: 3, doubled: 6, tripled: 9, total: 15 });
    expect(outcome.degraded).toBeNull();
    expect(outcome.steps.map((record) => [record.stepId, record.status, record.attempts])).toEqual([
      ['double', 'succeeded', 1],
      ['triple', 'succeeded', 1],
      ['sum', 'succeeded', 1]
    ]);
    expect(run.services.calls).toEqual(['double', 'triple', 'sum']);
  });

  test('retries a transient failure', async () => {
    let calls = 0;
    const flaky = doubleStep({
      run: (state) => {
        calls += 1;
        if (calls === 1) {
          throw new TransientStoreError('connection reset');
        }
        return { doubled: state.input * 2 };
      }
    });

    const outcome = await new InlineRunner(POLICY).run(toyRevision([flaky]), { input: 2 }, options());

    expect(outcome.state.doubled).toBe(4);
    expect(outcome.steps[0]).toMatchObject({ stepId: 'double', status: 'succeeded', attempts: 2, error: null });
  });

  test('does not retry a permanent failure', async () => {
    let calls = 0;
    const broken = sumStep({
      run: () => {
        calls += 1;
        throw new ValidationError('bad total');
      }
    });

    const error = await captureRunError(
      new InlineRunner(POLICY).run(toyRevision([doubleStep(), tripleStep(), broken]), { input: 1 }, options())
    );

    expect(calls).toBe(1);
    expect(error.stepId).toBe('sum');
    expect(error.error).toBeInstanceOf(ValidationError);
    expect(error.steps.map((record) => [record.stepId, record.status])).toEqual([
      ['double', 'succeeded'],
      ['triple', 'succeeded'],
      ['sum', 'failed']
    ]);
    expect(error.steps[2].error).toBe('bad total');
  });

  test('gives up after the configured attempts', async () => {
    let calls = 0;
    const failing = doubleStep({
      run: () => {
        calls += 1;
        throw new TransientStoreError('still down');
      }
    });

    const error = await captureRunError(new InlineRunner(POLICY).run(toyRevision([failing]), { input: 1 }, options()));

    expect(calls).toBe(3);
    expect(error.steps[0]).toMatchObject({ status: 'failed', attempts: 3, error: 'still down' });
  });

  test('times out a step that never settles', async () => {
    const stuck = doubleStep({
      timeoutMs: 20,
      retry: { attempts: 1 },
      run: () => new Promise<Partial<ToyState>>(() => undefined)
    });

    const error = await captureRunError(new InlineRunner(POLICY).run(toyRevision([stuck]), { input: 1 }, options()));

    expect(error.error).toBeInstanceOf(StepTimeoutError);
    expect(error.message).toBe('Step double timed out after 20ms');
  });

  test('rejects output keys a step did not declare', async () => {
    const sneaky = doubleStep({ run: () => ({ tripled: 1 }) });

    const error = await captureRunError(new InlineRunner(POLICY).run(toyRevision([sneaky]), { input: 1 }, options()));

    expect(error.message).toBe('Step double produced undeclared state key tripled');
  });

  test('a degradable failure skips the rest but still runs finalizers', async () => {
    const degradable = doubleStep({
      degradable: true,
      run: () => {
        throw new CapabilityFailureError('model offline');
      }
    });
    const run = options();

    const outcome = await new InlineRunner(POLICY).run(
      toyRevision([degradable, tripleStep(), sumStep(), noteStep()]),
      { input: 1 },
      run
    );

    expect(outcome.degraded?.stepId).toBe('double');
    expect(outcome.state).toEqual({ input: 1, note: 'finished' });
    expect(outcome.steps.map((record) => [record.stepId, record.status])).toEqual([
      ['double', 'failed'],
      ['triple', 'skipped'],
      ['sum', 'skipped'],
      ['note', 'succeeded']
    ]);
    expect(run.services.calls).toEqual(['note']);
  });
});

describe('DurableRunner', () => {
  test('runs independent steps of a stage side by side', async () => {
    const tripleStarted = deferred();
    const waitsForTriple = doubleStep({
      run: async (state) => {
        await tripleStarted.promise;
        return { doubled: state.input * 2 };
      }
    });
    const signalsStart = tripleStep({
      run: (state) => {
        tripleStarted.resolve();
        return { tripled: state.input * 3 };
      }
    });
    const runner = new DurableRunner(POLICY, { concurrency: 2, checkpoints: new InMemoryCheckpointStore() });

    const outcome = await runner.run(toyRevision([waitsForTriple, signalsStart, sumStep()]), { input: 2 }, options());

    expect(outcome.state.total).toBe(10);
  });

  test('resumes a failed run from the last completed stage', async () => {
    const checkpoints = new InMemoryCheckpointStore();
    const runner = new DurableRunner(POLICY, { concurrency: 2, checkpoints });
    let ready = false;
    const gated = sumStep({
      run: (state, { services }) => {
        services.calls.push('sum');
        if (!ready) {
          throw new CapabilityFailureError('not yet');
        }
        return { total: requireState(state, 'doubled', 'sum') + requireState(state, 'tripled', 'sum') };
      }
    });
    const revision = toyRevision([doubleStep(), tripleStep(), gated]);
    const first = options('run-resume');

    const error = await captureRunError(runner.run(revision, { input: 4 }, first));
    expect(error.stepId).toBe('sum');

    const checkpoint = await runner.loadCheckpoint('run-resume');
    expect(checkpoint).toMatchObject({
      runId: 'run-resume',
      pipeline: 'toy',
      revisionId: 'toy@1',
      completedSteps: ['double', 'triple'],
      degraded: null,
      state: { input: 4, doubled: 8, tripled: 12 }
    });
    if (!checkpoint) {
      throw new Error('expected a checkpoint');
    }

    ready = true;
    const second = options('run-resume');
    const outcome = await runner.resume(revision, checkpoint, (raw) => toyStateSchema.parse(raw), second);

    expect(outcome.state.total).toBe(20);
    expect(second.services.calls).toEqual(['sum']);
    expect(outcome.steps.map((record) => [record.stepId, record.status])).toEqual([
      ['double', 'succeeded'],
      ['triple', 'succeeded'],
      ['sum', 'failed'],
      ['sum', 'succeeded']
    ]);
    expect(await checkpoints.load('run-resume')).toBeNull();
  });
});

describe('FileCheckpointStore', () => {
  let root: string | null = null;

  afterEach(async () => {
    if (root) {
      await fs.rm(root, { recursive: true, force: true });
      root = null;
    }
  });

  test('saves, lists and clears checkpoints on disk', async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'stratum-checkpoints-'));
    const store = new FileCheckpointStore(root);
    const checkpoint: Checkpoint = {
      runId: 'run/7',
      pipeline: 'memorize',
      revisionId: 'memorize@1',
      completedSteps: ['ingest_resource'],
      steps: [{ stepId: 'ingest_resource', status: 'succeeded', attempts: 1, durationMs: 3, error: null }],
      degraded: null,
      state: { scope: { user: 'alice' } },
      updatedAt: '2026-01-01T00:00:00.000Z'
    };

    await store.save(checkpoint);

    expect(await fs.readdir(root)).toEqual(['run_7.json']);
    expect(await store.load('run/7')).toEqual(checkpoint);
    expect((await store.list()).map((saved) => saved.runId)).toEqual(['run/7']);

    await store.clear('run/7');
    expect(await store.load('run/7')).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  test('treats a missing directory as empty', async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'stratum-checkpoints-'));
    const store = new FileCheckpointStore(path.join(root, 'absent'));

    expect(await store.list()).toEqual([]);
    expect(await store.load('nothing')).toBeNull();
  });
});
