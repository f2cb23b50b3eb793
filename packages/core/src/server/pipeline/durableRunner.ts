import { CancelledError, MemoryEngineError } from '../memory/errors';
import type { StepRecord } from '../memory/models';
import type { Checkpoint, CheckpointStore } from './checkpoints';
import type { PipelineRevision } from './registry';
import {
  PipelineRunError,
  errorMessage,
  executeStep,
  skippedRecord,
  type PipelineRunner,
  type RetryPolicy,
  type RunOptions,
  type RunOutcome,
  type StepExecution
} from './runner';
import type { PipelineStep } from './step';

type Stage<S, C> = ReadonlyArray<Readonly<PipelineStep<S, C>>>;

/**
 * Groups consecutive steps that neither read each other's output nor write
 * the same keys. Finalizers always run alone.
 */
export function planStages<S, C>(steps: ReadonlyArray<Readonly<PipelineStep<S, C>>>): Array<Stage<S, C>> {
  const stages: Array<Array<Readonly<PipelineStep<S, C>>>> = [];
  let current: Array<Readonly<PipelineStep<S, C>>> = [];
  let produced = new Set<string>();

  for (const step of steps) {
    const dependent =
      step.requires.some((key) => produced.has(key)) || step.produces.some((key) => produced.has(key));
    if (current.length > 0 && (dependent || step.finalizer || current.some((existing) => existing.finalizer))) {
      stages.push(current);
      current = [];
      produced = new Set<string>();
    }
    current.push(step);
    for (const key of step.produces) {
      produced.add(key);
    }
  }
  if (current.length > 0) {
    stages.push(current);
  }
  return stages;
}

async function runBounded<T, R>(items: readonly T[], limit: number, work: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await work(items[index]);
    }
  });
  await Promise.all(workers);
  return results;
}

export type DurableRunnerOptions = {
  concurrency: number;
  checkpoints: CheckpointStore;
};

type Progress<S> = {
  state: S;
  records: StepRecord[];
  completed: Set<string>;
  degraded: RunOutcome<S>['degraded'];
};

/**
 * Runs a revision stage by stage with bounded parallelism, saving a
 * checkpoint after every stage. A failed or interrupted run can be resumed
 * from its last checkpoint.
 */
export class DurableRunner implements PipelineRunner {
  readonly kind = 'durable' as const;
  private readonly policy: RetryPolicy;
  private readonly concurrency: number;
  private readonly checkpoints: CheckpointStore;

  constructor(policy: RetryPolicy, options: DurableRunnerOptions) {
    this.policy = policy;
    this.concurrency = options.concurrency;
    this.checkpoints = options.checkpoints;
  }

  async run<S, C>(revision: PipelineRevision<S, C>, initial: S, options: RunOptions<C>): Promise<RunOutcome<S>> {
    return this.execute(revision, { state: initial, records: [], completed: new Set(), degraded: null }, options);
  }

  async loadCheckpoint(runId: string): Promise<Checkpoint | null> {
    return this.checkpoints.load(runId);
  }

  /** Continues a run from its checkpoint. `decode` restores the typed state. */
  async resume<S, C>(
    revision: PipelineRevision<S, C>,
    checkpoint: Checkpoint,
    decode: (raw: unknown) => S,
    options: RunOptions<C>
  ): Promise<RunOutcome<S>> {
    const degraded = checkpoint.degraded
      ? {
          stepId: checkpoint.degraded.stepId,
          error: new MemoryEngineError('CapabilityFailure', checkpoint.degraded.message, {
            context: { stepId: checkpoint.degraded.stepId }
          })
        }
      : null;
    return this.execute(
      revision,
      {
        state: decode(checkpoint.state),
        records: [...checkpoint.steps],
        completed: new Set(checkpoint.completedSteps),
        degraded
      },
      options
    );
  }

  private async execute<S, C>(
    revision: PipelineRevision<S, C>,
    progress: Progress<S>,
    options: RunOptions<C>
  ): Promise<RunOutcome<S>> {
    for (const stage of planStages(revision.steps)) {
      const pending = stage.filter((step) => !progress.completed.has(step.id));
      if (pending.length === 0) {
        continue;
      }
      if (options.signal?.aborted) {
        throw new PipelineRunError(new CancelledError(), pending[0].id, progress.records);
      }

      const runnable = progress.degraded ? pending.filter((step) => step.finalizer) : pending;
      for (const step of pending) {
        if (!runnable.includes(step)) {
          progress.records.push(skippedRecord(step.id));
          progress.completed.add(step.id);
        }
      }

      const input = progress.state;
      const executions = await runBounded<Readonly<PipelineStep<S, C>>, StepExecution<S>>(runnable, this.concurrency, (step) =>
        executeStep(revision, step, input, options, this.policy)
      );

      let fatal: { error: unknown; stepId: string } | null = null;
      for (let index = 0; index < runnable.length; index += 1) {
        const step = runnable[index];
        const execution = executions[index];
        progress.records.push(execution.record);
        if (execution.ok) {
          progress.state = { ...progress.state, ...execution.patch };
          progress.completed.add(step.id);
        } else if (step.degradable && !progress.degraded && !(execution.error instanceof CancelledError)) {
          progress.degraded = { stepId: step.id, error: execution.error };
          progress.completed.add(step.id);
        } else if (!fatal) {
          fatal = { error: execution.error, stepId: step.id };
        }
      }

      await this.save(revision, progress, options.runId);
      if (fatal) {
        throw new PipelineRunError(fatal.error, fatal.stepId, progress.records);
      }
    }

    await this.checkpoints.clear(options.runId);
    return { state: progress.state, steps: progress.records, degraded: progress.degraded };
  }

  private async save<S, C>(revision: PipelineRevision<S, C>, progress: Progress<S>, runId: string): Promise<void> {
    await this.checkpoints.save({
      runId,
      pipeline: revision.pipeline,
      revisionId: revision.id,
      completedSteps: [...progress.completed],
      steps: progress.records,
      degraded: progress.degraded
        ? { stepId: progress.degraded.stepId, message: errorMessage(progress.degraded.error) }
        : null,
      state: progress.state,
      updatedAt: new Date().toISOString()
    });
  }
}
