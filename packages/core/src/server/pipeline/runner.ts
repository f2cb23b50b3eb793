import { performance } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';

import { CancelledError, MemoryEngineError, StepTimeoutError, ValidationError, isRetryable, throwIfAborted } from '../memory/errors';
import { logStepFinished } from '../memory/logging';
import type { StepRecord } from '../memory/models';
import type { PipelineRevision } from './registry';
import type { PipelineStep, StepContext } from './step';

export type RetryPolicy = {
  attempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  stepTimeoutMs: number;
};

export type RunOptions<C> = {
  runId: string;
  services: C;
  signal?: AbortSignal;
};

export type RunOutcome<S> = {
  state: S;
  steps: StepRecord[];
  degraded: { stepId: string; error: unknown } | null;
};

/** Raised when a run ends without a usable state. Carries the step records gathered so far. */
export class PipelineRunError extends Error {
  readonly error: unknown;
  readonly stepId: string | null;
  readonly steps: StepRecord[];

  constructor(error: unknown, stepId: string | null, steps: StepRecord[]) {
    super(error instanceof Error ? error.message : String(error));
    this.name = 'PipelineRunError';
    this.error = error;
    this.stepId = stepId;
    this.steps = steps;
  }
}

export interface PipelineRunner {
  readonly kind: 'inline' | 'durable';
  run<S, C>(revision: PipelineRevision<S, C>, initial: S, options: RunOptions<C>): Promise<RunOutcome<S>>;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function backoffDelay(policy: Pick<RetryPolicy, 'backoffMs' | 'maxBackoffMs'>, attempt: number): number {
  return Math.min(policy.maxBackoffMs, policy.backoffMs * 2 ** (attempt - 1));
}

function applyPatch<S>(state: S, patch: Partial<S>, stepId: string, produces: readonly string[]): S {
  const allowed = new Set<string>(produces);
  for (const key of Object.keys(patch)) {
    if (!allowed.has(key)) {
      throw new ValidationError(`Step ${stepId} produced undeclared state key ${key}`);
    }
  }
  return { ...state, ...patch };
}

async function runWithTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  stepId: string,
  timeoutMs: number,
  parent: AbortSignal | undefined
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  parent?.addEventListener('abort', forwardAbort, { once: true });
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new StepTimeoutError(stepId, timeoutMs));
    }, timeoutMs);
  });
  const running = work(controller.signal);
  running.catch((error: unknown) => {
    if (controller.signal.aborted) {
      console.warn('[Stratum] step settled after abort:', stepId, errorMessage(error));
    }
  });
  try {
    return await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}

export type StepExecution<S> =
  | { ok: true; state: S; patch: Partial<S>; record: StepRecord }
  | { ok: false; error: unknown; record: StepRecord };

/**
 * Runs one step with the retry policy: bounded attempts, exponential backoff
 * between retryable failures and a timeout per attempt.
 */
export async function executeStep<S, C>(
  revision: PipelineRevision<S, C>,
  step: Readonly<PipelineStep<S, C>>,
  state: S,
  options: RunOptions<C>,
  policy: RetryPolicy
): Promise<StepExecution<S>> {
  const attempts = Math.max(1, step.retry?.attempts ?? policy.attempts);
  const retryPolicy = { backoffMs: step.retry?.backoffMs ?? policy.backoffMs, maxBackoffMs: policy.maxBackoffMs };
  const timeoutMs = step.timeoutMs ?? policy.stepTimeoutMs;
  const started = performance.now();
  let lastError: unknown = null;
  let attempt = 0;

  while (attempt < attempts) {
    attempt += 1;
    try {
      throwIfAborted(options.signal);
      const patch = await runWithTimeout(
        async (signal) => {
          const context: StepContext<C> = {
            runId: options.runId,
            pipeline: revision.pipeline,
            revisionId: revision.id,
            stepId: step.id,
            attempt,
            config: step.config ?? {},
            signal,
            services: options.services
          };
          return step.run(state, context);
        },
        step.id,
        timeoutMs,
        options.signal
      );
      const record: StepRecord = {
        stepId: step.id,
        status: 'succeeded',
        attempts: attempt,
        durationMs: performance.now() - started,
        error: null
      };
      logStepFinished({ runId: options.runId, pipeline: revision.pipeline, ...record });
      return { ok: true, state: applyPatch(state, patch, step.id, step.produces), patch, record };
    } catch (error) {
      lastError = error instanceof MemoryEngineError ? error.withContext({ stepId: step.id, runId: options.runId }) : error;
      if (options.signal?.aborted || !isRetryable(error) || attempt >= attempts) {
        break;
      }
      await sleep(backoffDelay(retryPolicy, attempt));
    }
  }

  const record: StepRecord = {
    stepId: step.id,
    status: 'failed',
    attempts: attempt,
    durationMs: performance.now() - started,
    error: errorMessage(lastError)
  };
  logStepFinished({ runId: options.runId, pipeline: revision.pipeline, ...record });
  return { ok: false, error: options.signal?.aborted ? new CancelledError() : lastError, record };
}

export function skippedRecord(stepId: string): StepRecord {
  return { stepId, status: 'skipped', attempts: 0, durationMs: 0, error: null };
}

/** Runs steps one after another inside the caller's request. */
export class InlineRunner implements PipelineRunner {
  readonly kind = 'inline' as const;
  private readonly policy: RetryPolicy;

  constructor(policy: RetryPolicy) {
    this.policy = policy;
  }

  async run<S, C>(revision: PipelineRevision<S, C>, initial: S, options: RunOptions<C>): Promise<RunOutcome<S>> {
    let state = initial;
    const records: StepRecord[] = [];
    let degraded: RunOutcome<S>['degraded'] = null;

    for (const step of revision.steps) {
      if (degraded && !step.finalizer) {
        records.push(skippedRecord(step.id));
        continue;
      }
      const execution = await executeStep(revision, step, state, options, this.policy);
      records.push(execution.record);
      if (execution.ok) {
        state = execution.state;
        continue;
      }
      if (step.degradable && !degraded && !(execution.error instanceof CancelledError)) {
        degraded = { stepId: step.id, error: execution.error };
        continue;
      }
      throw new PipelineRunError(execution.error, step.id, records);
    }

    return { state, steps: records, degraded };
  }
}
