import type { z } from 'zod';

import type { CapabilityName } from '../memory/capabilities';
import { CapabilityUnavailableError, NotFoundError, ValidationError } from '../memory/errors';
import { logPipelineRevision } from '../memory/logging';
import { requiredCapabilities, type PipelineStep } from './step';

export type RevisionChange =
  | { type: 'register' }
  | { type: 'configure'; stepId: string; config: Readonly<Record<string, unknown>> }
  | { type: 'insert_after' | 'insert_before'; anchorId: string; stepId: string }
  | { type: 'replace'; stepId: string }
  | { type: 'remove'; stepId: string }
  | { type: 'rollback'; toRevision: number };

export type PipelineRevision<S, C> = {
  readonly id: string;
  readonly pipeline: string;
  readonly number: number;
  readonly steps: ReadonlyArray<Readonly<PipelineStep<S, C>>>;
  readonly initialKeys: ReadonlyArray<keyof S & string>;
  readonly change: RevisionChange;
  readonly createdAt: Date;
};

export type StepDescription = {
  id: string;
  role: string;
  requires: string[];
  produces: string[];
  capabilities: string[];
  optionalCapabilities: string[];
  config: Record<string, unknown>;
  degradable: boolean;
  finalizer: boolean;
};

export function describeChange(change: RevisionChange): string {
  switch (change.type) {
    case 'register':
      return 'register';
    case 'configure':
      return `configure ${change.stepId}`;
    case 'insert_after':
      return `insert ${change.stepId} after ${change.anchorId}`;
    case 'insert_before':
      return `insert ${change.stepId} before ${change.anchorId}`;
    case 'replace':
      return `replace ${change.stepId}`;
    case 'remove':
      return `remove ${change.stepId}`;
    case 'rollback':
      return `rollback to ${change.toRevision}`;
  }
}

/**
 * Static checks applied before any step sequence is accepted: unique ids,
 * satisfiable state dependencies, valid step config and available capabilities.
 */
export function validateSteps<S, C>(
  pipeline: string,
  steps: ReadonlyArray<PipelineStep<S, C>>,
  initialKeys: ReadonlyArray<keyof S & string>,
  available: ReadonlySet<CapabilityName>
): void {
  const issues: string[] = [];
  const seen = new Set<string>();
  const produced = new Set<string>(initialKeys);

  if (steps.length === 0) {
    issues.push('pipeline must contain at least one step');
  }

  for (const step of steps) {
    if (!step.id.trim()) {
      issues.push('step id must not be empty');
    }
    if (seen.has(step.id)) {
      issues.push(`duplicate step id ${step.id}`);
    }
    seen.add(step.id);

    for (const key of step.requires) {
      if (!produced.has(key)) {
        issues.push(`step ${step.id} requires ${key}, which no earlier step produces`);
      }
    }
    for (const key of step.produces) {
      produced.add(key);
    }

    if (step.configSchema) {
      const parsed = step.configSchema.safeParse(step.config ?? {});
      if (!parsed.success) {
        issues.push(`step ${step.id} config is invalid: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
      }
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(`Pipeline ${pipeline} failed validation`, issues);
  }

  const missing = new Set<string>();
  for (const step of steps) {
    for (const capability of requiredCapabilities(step)) {
      if (!available.has(capability)) {
        missing.add(`${step.id} needs ${capability}`);
      }
    }
  }
  if (missing.size > 0) {
    throw new CapabilityUnavailableError(
      `Pipeline ${pipeline} needs capabilities this deployment lacks: ${[...missing].join('; ')}`,
      { pipeline }
    );
  }
}

function freezeStep<S, C>(step: PipelineStep<S, C>): Readonly<PipelineStep<S, C>> {
  return Object.freeze({
    ...step,
    requires: Object.freeze([...step.requires]),
    produces: Object.freeze([...step.produces]),
    config: Object.freeze({ ...(step.config ?? {}) })
  });
}

/**
 * Immutable revision log for one named pipeline. Every accepted edit appends a
 * new frozen revision; runs hold on to the revision they started with.
 */
export class PipelineRegistry<S, C> {
  readonly name: string;
  readonly stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>;
  private readonly available: ReadonlySet<CapabilityName>;
  private readonly revisions: PipelineRevision<S, C>[] = [];

  constructor(params: {
    name: string;
    steps: ReadonlyArray<PipelineStep<S, C>>;
    initialKeys: ReadonlyArray<keyof S & string>;
    stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>;
    available: ReadonlySet<CapabilityName>;
  }) {
    this.name = params.name;
    this.stateSchema = params.stateSchema;
    this.available = params.available;
    this.publish(params.steps, params.initialKeys, { type: 'register' });
  }

  current(): PipelineRevision<S, C> {
    const latest = this.revisions[this.revisions.length - 1];
    if (!latest) {
      throw new NotFoundError(`Pipeline ${this.name} has no revisions`);
    }
    return latest;
  }

  revision(number: number): PipelineRevision<S, C> {
    const found = this.revisions.find((revision) => revision.number === number);
    if (!found) {
      throw new NotFoundError(`Pipeline ${this.name} has no revision ${number}`);
    }
    return found;
  }

  findRevision(id: string): PipelineRevision<S, C> | null {
    return this.revisions.find((revision) => revision.id === id) ?? null;
  }

  history(): ReadonlyArray<PipelineRevision<S, C>> {
    return [...this.revisions];
  }

  describe(revision: PipelineRevision<S, C> = this.current()): StepDescription[] {
    return revision.steps.map((step) => ({
      id: step.id,
      role: step.role,
      requires: [...step.requires],
      produces: [...step.produces],
      capabilities: [...requiredCapabilities(step)],
      optionalCapabilities: [...(step.optionalCapabilities ?? [])],
      config: { ...(step.config ?? {}) },
      degradable: step.degradable ?? false,
      finalizer: step.finalizer ?? false
    }));
  }

  configureStep(stepId: string, config: Record<string, unknown>): PipelineRevision<S, C> {
    const current = this.current();
    const index = this.indexOf(current, stepId);
    const steps = [...current.steps];
    const step = steps[index];
    steps[index] = { ...step, config: { ...(step.config ?? {}), ...config } };
    return this.publish(steps, current.initialKeys, { type: 'configure', stepId, config: Object.freeze({ ...config }) });
  }

  insertAfter(anchorId: string, step: PipelineStep<S, C>): PipelineRevision<S, C> {
    const current = this.current();
    const steps = [...current.steps];
    steps.splice(this.indexOf(current, anchorId) + 1, 0, step);
    return this.publish(steps, current.initialKeys, { type: 'insert_after', anchorId, stepId: step.id });
  }

  insertBefore(anchorId: string, step: PipelineStep<S, C>): PipelineRevision<S, C> {
    const current = this.current();
    const steps = [...current.steps];
    steps.splice(this.indexOf(current, anchorId), 0, step);
    return this.publish(steps, current.initialKeys, { type: 'insert_before', anchorId, stepId: step.id });
  }

  replace(stepId: string, step: PipelineStep<S, C>): PipelineRevision<S, C> {
    const current = this.current();
    const steps = [...current.steps];
    steps[this.indexOf(current, stepId)] = step;
    return this.publish(steps, current.initialKeys, { type: 'replace', stepId });
  }

  remove(stepId: string): PipelineRevision<S, C> {
    const current = this.current();
    const steps = [...current.steps];
    steps.splice(this.indexOf(current, stepId), 1);
    return this.publish(steps, current.initialKeys, { type: 'remove', stepId });
  }

  rollback(number: number): PipelineRevision<S, C> {
    const target = this.revision(number);
    return this.publish(target.steps, target.initialKeys, { type: 'rollback', toRevision: number });
  }

  private indexOf(revision: PipelineRevision<S, C>, stepId: string): number {
    const index = revision.steps.findIndex((step) => step.id === stepId);
    if (index === -1) {
      throw new ValidationError(`Pipeline ${this.name} has no step ${stepId}`);
    }
    return index;
  }

  private publish(
    steps: ReadonlyArray<PipelineStep<S, C>>,
    initialKeys: ReadonlyArray<keyof S & string>,
    change: RevisionChange
  ): PipelineRevision<S, C> {
    validateSteps(this.name, steps, initialKeys, this.available);
    const number = this.revisions.length + 1;
    const revision: PipelineRevision<S, C> = Object.freeze({
      id: `${this.name}@${number}`,
      pipeline: this.name,
      number,
      steps: Object.freeze(steps.map((step) => freezeStep(step))),
      initialKeys: Object.freeze([...initialKeys]),
      change,
      createdAt: new Date()
    });
    this.revisions.push(revision);
    logPipelineRevision({ pipeline: this.name, revisionId: revision.id, change: describeChange(change) });
    return revision;
  }
}
