import type { z } from 'zod';

import type { CapabilityName } from '../memory/capabilities';
import { MemoryEngineError } from '../memory/errors';

export type StepRole =
  | 'ingestion'
  | 'extraction'
  | 'deduplication'
  | 'clustering'
  | 'verification'
  | 'routing'
  | 'recall'
  | 'persistence'
  | 'assembly'
  | 'audit';

export const ROLE_CAPABILITIES: Record<StepRole, readonly CapabilityName[]> = {
  ingestion: [],
  extraction: ['llm'],
  deduplication: ['store'],
  clustering: ['llm'],
  verification: ['llm'],
  routing: [],
  recall: [],
  persistence: ['store'],
  assembly: [],
  audit: []
};

export type StepContext<C> = {
  runId: string;
  pipeline: string;
  revisionId: string;
  stepId: string;
  attempt: number;
  config: Readonly<Record<string, unknown>>;
  signal: AbortSignal;
  services: C;
};

export type RetryOverride = {
  attempts?: number;
  backoffMs?: number;
};

export type PipelineStep<S, C> = {
  id: string;
  role: StepRole;
  requires: ReadonlyArray<keyof S & string>;
  produces: ReadonlyArray<keyof S & string>;
  /** Defaults to the role's capabilities. */
  capabilities?: readonly CapabilityName[];
  optionalCapabilities?: readonly CapabilityName[];
  config?: Readonly<Record<string, unknown>>;
  configSchema?: z.ZodType<unknown>;
  timeoutMs?: number;
  retry?: RetryOverride;
  /** A failure ends the run as degraded instead of failed. */
  degradable?: boolean;
  /** Still runs after a degradable step failed. */
  finalizer?: boolean;
  run: (state: Readonly<S>, context: StepContext<C>) => Promise<Partial<S>> | Partial<S>;
};

export function requiredCapabilities<S, C>(step: PipelineStep<S, C>): readonly CapabilityName[] {
  return step.capabilities ?? ROLE_CAPABILITIES[step.role];
}

/** Reads a state key the step declared in `requires`. */
export function requireState<S, K extends keyof S & string>(state: Readonly<S>, key: K, stepId: string): NonNullable<S[K]> {
  const value = state[key];
  if (value === undefined || value === null) {
    throw new MemoryEngineError('InternalError', `Step ${stepId} ran without required state ${key}`, {
      context: { stepId }
    });
  }
  return value;
}
