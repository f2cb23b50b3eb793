import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { z } from 'zod';

import type { BlobStore, EmbeddingCapability, ReasoningCapability } from './capabilities';
import { loadEngineConfig, parseEngineConfig, type EngineConfig, type EngineConfigInput, type RetrieverMode } from './config';
import {
  CancelledError,
  CapabilityUnavailableError,
  MemoryEngineError,
  NotFoundError,
  PolicyViolationError,
  ValidationError,
  toStructuredError,
  type StructuredError
} from './errors';
import { logPolicyDecision, logRequestRejected, logRunFinished, logRunStarted } from './logging';
import type {
  EvolveDiff,
  Intention,
  MemoryCategory,
  MemoryItem,
  Modality,
  OperationName,
  RunLog,
  RunStatus,
  Scope,
  ScopeField,
  ScopeSelector,
  ServiceMeta
} from './models';
import {
  buildDefaultRetrievalPolicies,
  buildPolicyContext,
  evaluateRetrievalPolicies,
  type RetrievalPolicy,
  type RetrievalPolicyDecision
} from './policies';
import { describeScope, exactScopeOf, scopeToFilter, selectorToFilter } from './scope';
import type { MetadataStore, PurgeSummary, RunLogQuery } from './store';
import { TenancyManager } from './tenancy';
import type { VectorIndex } from './vector';
import { FileCheckpointStore, InMemoryCheckpointStore, type Checkpoint, type CheckpointStore } from '../pipeline/checkpoints';
import { DurableRunner } from '../pipeline/durableRunner';
import { PipelineRegistry, type PipelineRevision, type RevisionChange, type StepDescription } from '../pipeline/registry';
import { InlineRunner, PipelineRunError, errorMessage, type PipelineRunner, type RetryPolicy, type RunOutcome } from '../pipeline/runner';
import type { PipelineStep } from '../pipeline/step';
import {
  EVOLVE_INITIAL_KEYS,
  defaultEvolveSteps,
  evolveOptionsSchema,
  evolveStateSchema,
  type EvolveOptions,
  type EvolveState
} from '../operations/evolve';
import {
  MEMORIZE_INITIAL_KEYS,
  defaultMemorizeSteps,
  memorizeInputSchema,
  memorizeStateSchema,
  needsBlobRead,
  type MemorizeResult,
  type MemorizeState
} from '../operations/memorize';
import {
  RETRIEVE_INITIAL_KEYS,
  defaultRetrieveSteps,
  retrieveOptionsSchema,
  retrieveStateSchema,
  type PolicySummary,
  type RetrieveOptions,
  type RetrieveState,
  type RetrievedContext
} from '../operations/retrieve';
import { effectiveRetriever } from '../operations/ranking';
import { availableCapabilities, requireBlobs, type Services } from '../operations/services';
import { findCategoryByName } from '../operations/taxonomy';

export type OperationResult<T> =
  | { ok: true; runId: string | null; value: T }
  | { ok: false; runId: string | null; error: StructuredError };

export type PipelineStates = {
  memorize: MemorizeState;
  retrieve: RetrieveState;
  evolve: EvolveState;
};

export type PipelineName = keyof PipelineStates;

type Registries = { [N in PipelineName]: PipelineRegistry<PipelineStates[N], Services> };

export const PIPELINE_NAMES: readonly PipelineName[] = ['memorize', 'retrieve', 'evolve'];

export type MemorizeInput = {
  content?: string | null;
  uri?: string | null;
  sourceKey?: string | null;
};

export type RetrieveResult = RetrievedContext & {
  intention: Intention | null;
  degraded: boolean;
  degradedReason: string | null;
  policy: PolicySummary;
  retriever: RetrieverMode;
};

export type EvolveResult = { diffSummary: EvolveDiff };

export type CategoryDetail = { category: MemoryCategory; items: MemoryItem[] };

export type PipelineDescription = {
  revisionId: string;
  steps: StepDescription[];
  history: Array<{ id: string; change: RevisionChange; createdAt: Date }>;
};

export type MemoryServiceOptions = {
  store: MetadataStore;
  reasoner: ReasoningCapability;
  embedder?: EmbeddingCapability | null;
  vector?: VectorIndex | null;
  blobs?: BlobStore | null;
  /** Replaces the file and environment configuration when given. */
  config?: EngineConfigInput;
  checkpoints?: CheckpointStore;
  retrievalPolicies?: RetrievalPolicy[];
};

type Degradation = RunOutcome<unknown>['degraded'];

type RunContext = {
  operation: OperationName;
  scope: Scope | null;
  selector: ScopeSelector | null;
  inputSummary: RunLog['inputSummary'];
};

function isPipelineName(value: string): value is PipelineName {
  return value === 'memorize' || value === 'retrieve' || value === 'evolve';
}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${label}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || label}: ${issue.message}`)
    );
  }
  return parsed.data;
}

const queryInputSchema = z.string().trim().min(1, 'query must not be empty');
const listItemsSchema = z
  .object({
    status: z.enum(['active', 'superseded']),
    categoryId: z.string(),
    limit: z.number().int().positive()
  })
  .partial();

function bypassDecision(config: EngineConfig, vectorAvailable: boolean): RetrievalPolicyDecision {
  return {
    allowed: true,
    violations: [],
    candidateLimit: config.retrieve.candidateLimit,
    rerankLimit: config.retrieve.rerankLimit,
    vectorEnabled: vectorAvailable,
    fallback: vectorAvailable ? null : 'category_routing',
    appliedPolicies: [],
    boundedCombinations: 1,
    wildcardFields: []
  };
}

function describeDegradation(degraded: Degradation): string | null {
  return degraded ? `${degraded.stepId}: ${errorMessage(degraded.error)}` : null;
}

function buildMemorizeResult(state: MemorizeState): MemorizeResult {
  if (!state.result) {
    throw new MemoryEngineError('InternalError', 'memorize finished without a result');
  }
  return state.result;
}

function buildRetrieveResult(state: RetrieveState, degraded: Degradation): RetrieveResult {
  const context: RetrievedContext = state.result ?? {
    needsRetrieval: state.needsRetrieval ?? true,
    rewrittenQuery: null,
    intentions: [],
    categories: [],
    items: [],
    resources: [],
    sufficientAt: null,
    nextStepQuery: null
  };
  return {
    ...context,
    intention: context.intentions[0] ?? null,
    degraded: degraded !== null,
    degradedReason: describeDegradation(degraded),
    policy: state.policy,
    retriever: effectiveRetriever(state.settings.retriever, state.settings.vectorEnabled)
  };
}

function buildEvolveResult(state: EvolveState): EvolveResult {
  if (!state.diff) {
    throw new MemoryEngineError('InternalError', 'evolve finished without a diff');
  }
  return { diffSummary: state.diff };
}

/**
 * Entry point for agents. Validates scope and policy up front, runs the
 * current pipeline revision and records a run log for every started run.
 */
export class MemoryService {
  readonly config: EngineConfig;
  private readonly store: MetadataStore;
  private readonly tenancy: TenancyManager;
  private readonly services: Services;
  private readonly registries: Registries;
  private readonly runner: PipelineRunner;
  private readonly durable: DurableRunner | null;
  private readonly policies: RetrievalPolicy[];

  private constructor(params: {
    config: EngineConfig;
    store: MetadataStore;
    tenancy: TenancyManager;
    services: Services;
    registries: Registries;
    runner: PipelineRunner;
    durable: DurableRunner | null;
    policies: RetrievalPolicy[];
  }) {
    this.config = params.config;
    this.store = params.store;
    this.tenancy = params.tenancy;
    this.services = params.services;
    this.registries = params.registries;
    this.runner = params.runner;
    this.durable = params.durable;
    this.policies = params.policies;
  }

  static async create(options: MemoryServiceOptions): Promise<MemoryService> {
    const config = options.config ? parseEngineConfig(options.config) : loadEngineConfig();
    const embedder = options.embedder ?? null;
    const vector = options.vector ?? null;
    if (embedder && vector && embedder.dimensions !== vector.dimensions) {
      throw new CapabilityUnavailableError(
        `Embedding model ${embedder.model} produces ${embedder.dimensions} dimensions but the ${vector.backend} index expects ${vector.dimensions}`
      );
    }

    const tenancy = new TenancyManager(options.store);
    await tenancy.load();
    const services: Services = {
      store: options.store,
      tenancy,
      reasoner: options.reasoner,
      embedder,
      vector,
      blobs: options.blobs ?? null,
      config
    };
    const available = availableCapabilities(services);
    const registries: Registries = {
      memorize: new PipelineRegistry({
        name: 'memorize',
        steps: defaultMemorizeSteps(),
        initialKeys: MEMORIZE_INITIAL_KEYS,
        stateSchema: memorizeStateSchema,
        available
      }),
      retrieve: new PipelineRegistry({
        name: 'retrieve',
        steps: defaultRetrieveSteps(),
        initialKeys: RETRIEVE_INITIAL_KEYS,
        stateSchema: retrieveStateSchema,
        available
      }),
      evolve: new PipelineRegistry({
        name: 'evolve',
        steps: defaultEvolveSteps(),
        initialKeys: EVOLVE_INITIAL_KEYS,
        stateSchema: evolveStateSchema,
        available
      })
    };

    const policy: RetryPolicy = {
      attempts: config.runner.attempts,
      backoffMs: config.runner.backoffMs,
      maxBackoffMs: config.runner.maxBackoffMs,
      stepTimeoutMs: config.runner.stepTimeoutMs
    };
    let durable: DurableRunner | null = null;
    if (config.runner.kind === 'durable') {
      const checkpoints =
        options.checkpoints ??
        (config.runner.checkpointDir ? new FileCheckpointStore(config.runner.checkpointDir) : new InMemoryCheckpointStore());
      durable = new DurableRunner(policy, { concurrency: config.runner.concurrency, checkpoints });
    }

    return new MemoryService({
      config,
      store: options.store,
      tenancy,
      services,
      registries,
      runner: durable ?? new InlineRunner(policy),
      durable,
      policies: options.retrievalPolicies ?? buildDefaultRetrievalPolicies(config.crossScope)
    });
  }

  get runnerKind(): PipelineRunner['kind'] {
    return this.runner.kind;
  }

  /** Comma-joined current revision ids, recorded in the service meta. */
  revisionToken(): string {
    return PIPELINE_NAMES.map((name) => this.registries[name].current().id).join(',');
  }

  async provisionScopeSchema(fields: string | readonly ScopeField[]): Promise<OperationResult<ServiceMeta>> {
    try {
      const meta = await this.tenancy.provision(fields);
      await this.services.vector?.provision?.(meta.scopeFields);
      return { ok: true, runId: null, value: await this.tenancy.recordPipelineRevision(this.revisionToken()) };
    } catch (error) {
      return this.fail('admin', error);
    }
  }

  async memorize(
    scope: Scope,
    input: MemorizeInput,
    modality: Modality,
    options: { signal?: AbortSignal } = {}
  ): Promise<OperationResult<MemorizeResult>> {
    let initial: MemorizeState;
    try {
      initial = {
        scope: this.tenancy.validateScope(scope),
        request: parseInput(memorizeInputSchema, { ...input, modality }, 'memorize input')
      };
      if (needsBlobRead(initial.request)) {
        requireBlobs(this.services);
      }
    } catch (error) {
      return this.reject('memorize', error);
    }

    return this.execute({
      registry: this.registries.memorize,
      initial,
      context: {
        operation: 'memorize',
        scope: initial.scope,
        selector: null,
        inputSummary: {
          modality,
          uri: initial.request.uri,
          sourceKey: initial.request.sourceKey,
          contentLength: initial.request.content ? initial.request.content.length : null
        }
      },
      signal: options.signal,
      build: buildMemorizeResult
    });
  }

  async retrieve(
    selector: ScopeSelector,
    query: string,
    options: RetrieveOptions & { signal?: AbortSignal } = {}
  ): Promise<OperationResult<RetrieveResult>> {
    let initial: RetrieveState;
    try {
      initial = this.prepareRetrieve(selector, query, options);
    } catch (error) {
      return this.reject('retrieve', error);
    }

    return this.execute({
      registry: this.registries.retrieve,
      initial,
      context: {
        operation: 'retrieve',
        scope: initial.exactScope,
        selector: initial.exactScope ? null : selector,
        inputSummary: {
          query: initial.query.slice(0, 200),
          retriever: initial.settings.retriever,
          crossScope: initial.exactScope === null
        }
      },
      signal: options.signal,
      build: buildRetrieveResult
    });
  }

  private prepareRetrieve(selector: unknown, query: unknown, options: RetrieveOptions & { signal?: AbortSignal }): RetrieveState {
    const validSelector = this.tenancy.validateSelector(selector);
    const text = parseInput(queryInputSchema, query, 'query');
    const { signal: _signal, ...overrides } = options;
    const parsed = parseInput(retrieveOptionsSchema, overrides, 'retrieve options');
    const exactScope = exactScopeOf(validSelector);
    const vectorAvailable = this.services.vector !== null && this.services.embedder !== null;
    const { retrieve } = this.config;

    let decision: RetrievalPolicyDecision;
    if (exactScope) {
      decision = bypassDecision(this.config, vectorAvailable);
    } else {
      decision = evaluateRetrievalPolicies(
        buildPolicyContext(validSelector, {
          vectorAvailable,
          requestedCandidates: retrieve.candidateLimit,
          requestedRerank: retrieve.rerankLimit
        }),
        this.policies
      );
      logPolicyDecision({ selector: validSelector, decision });
      if (!decision.allowed) {
        throw new PolicyViolationError(
          `Cross-scope retrieval rejected: ${decision.violations.join('; ')}`,
          decision.appliedPolicies
        );
      }
    }

    return {
      filter: selectorToFilter(validSelector),
      exactScope,
      query: text,
      settings: {
        retriever: parsed.retriever ?? retrieve.retriever,
        routeIntention: parsed.routeIntention ?? retrieve.routeIntention,
        sufficiencyCheck: parsed.sufficiencyCheck ?? retrieve.sufficiencyCheck,
        verify: parsed.verify ?? retrieve.verify,
        categoryTopK: parsed.categoryTopK ?? retrieve.categoryTopK,
        itemTopK: parsed.itemTopK ?? retrieve.itemTopK,
        resourceTopK: parsed.resourceTopK ?? retrieve.resourceTopK,
        candidateLimit: decision.candidateLimit,
        rerankLimit: decision.rerankLimit,
        minScore: retrieve.minScore,
        vectorEnabled: decision.vectorEnabled,
        includeSummary: parsed.includeSummary ?? true
      },
      policy: {
        appliedPolicies: decision.appliedPolicies,
        candidateLimit: decision.candidateLimit,
        rerankLimit: decision.rerankLimit,
        vectorEnabled: decision.vectorEnabled,
        fallback: decision.fallback,
        combinations: decision.boundedCombinations
      }
    };
  }

  async evolve(scope: Scope, options: EvolveOptions & { signal?: AbortSignal } = {}): Promise<OperationResult<EvolveResult>> {
    let initial: EvolveState;
    try {
      const { signal: _signal, ...overrides } = options;
      const parsed = parseInput(evolveOptionsSchema, overrides, 'evolve options');
      const { evolve } = this.config;
      initial = {
        scope: this.tenancy.validateScope(scope),
        settings: {
          staleAfterDays: parsed.staleAfterDays ?? evolve.staleAfterDays,
          minConfidence: parsed.minConfidence ?? evolve.minConfidence,
          maxTargets: parsed.maxTargets ?? evolve.maxTargets,
          anchorCount: evolve.anchorCount,
          summaryMaxLength: evolve.summaryMaxLength
        },
        startedAt: new Date()
      };
    } catch (error) {
      return this.reject('evolve', error);
    }

    return this.execute({
      registry: this.registries.evolve,
      initial,
      context: {
        operation: 'evolve',
        scope: initial.scope,
        selector: null,
        inputSummary: {
          staleAfterDays: initial.settings.staleAfterDays,
          minConfidence: initial.settings.minConfidence,
          maxTargets: initial.settings.maxTargets
        }
      },
      signal: options.signal,
      build: buildEvolveResult,
      audit: (state) => state.diff ?? null
    });
  }

  async listCategories(
    scope: Scope,
    options: { includeSummary?: boolean } = {}
  ): Promise<OperationResult<MemoryCategory[]>> {
    return this.query('admin', async () => {
      const valid = this.tenancy.validateScope(scope);
      const categories = await this.store.list('category', scopeToFilter(valid), { order: 'createdAt:asc' });
      return options.includeSummary === false ? categories.map((category) => ({ ...category, summary: '' })) : categories;
    });
  }

  async getCategory(scope: Scope, idOrName: string): Promise<OperationResult<CategoryDetail>> {
    return this.query('admin', async () => {
      const valid = this.tenancy.validateScope(scope);
      const filter = scopeToFilter(valid);
      const category =
        (await this.store.get('category', valid, idOrName)) ??
        findCategoryByName(await this.store.list('category', filter), idOrName);
      if (!category) {
        throw new NotFoundError(`No category ${idOrName} in scope ${describeScope(valid)}`);
      }
      const links = await this.store.list('categoryItem', filter, { where: { categoryId: category.id } });
      const items =
        links.length > 0
          ? await this.store.list('item', filter, {
              ids: links.map((link) => link.itemId),
              where: { status: 'active' },
              order: 'updatedAt:desc'
            })
          : [];
      return { category, items: items.map((item) => ({ ...item, embedding: null })) };
    });
  }

  async listItems(
    scope: Scope,
    options: { status?: MemoryItem['status']; categoryId?: string; limit?: number } = {}
  ): Promise<OperationResult<MemoryItem[]>> {
    return this.query('admin', async () => {
      const valid = this.tenancy.validateScope(scope);
      const parsed = parseInput(listItemsSchema, options, 'list options');
      const filter = scopeToFilter(valid);
      let ids: string[] | undefined;
      if (parsed.categoryId) {
        const links = await this.store.list('categoryItem', filter, { where: { categoryId: parsed.categoryId } });
        ids = links.map((link) => link.itemId);
      }
      const items = await this.store.list('item', filter, {
        ids,
        where: { status: parsed.status ?? 'active' },
        order: 'createdAt:desc',
        limit: parsed.limit
      });
      return items.map((item) => ({ ...item, embedding: null }));
    });
  }

  async listRuns(
    options: { scope?: Scope; operation?: OperationName; status?: RunStatus; limit?: number } = {}
  ): Promise<OperationResult<RunLog[]>> {
    return this.query('admin', async () => {
      const query: RunLogQuery = { operation: options.operation, status: options.status, limit: options.limit };
      if (options.scope) {
        query.filter = scopeToFilter(this.tenancy.validateScope(options.scope));
      }
      return this.store.listRunLogs(query);
    });
  }

  async getRun(runId: string): Promise<OperationResult<RunLog>> {
    return this.query('admin', async () => {
      const log = await this.store.getRunLog(runId);
      if (!log) {
        throw new NotFoundError(`No run ${runId}`);
      }
      return log;
    });
  }

  describePipelines(): Record<PipelineName, PipelineDescription> {
    const describe = <S>(registry: PipelineRegistry<S, Services>): PipelineDescription => ({
      revisionId: registry.current().id,
      steps: registry.describe(),
      history: registry.history().map((revision) => ({ id: revision.id, change: revision.change, createdAt: revision.createdAt }))
    });
    return {
      memorize: describe(this.registries.memorize),
      retrieve: describe(this.registries.retrieve),
      evolve: describe(this.registries.evolve)
    };
  }

  async configureStep(
    pipeline: PipelineName,
    stepId: string,
    config: Record<string, unknown>
  ): Promise<OperationResult<PipelineDescription>> {
    return this.edit(pipeline, (registry) => registry.configureStep(stepId, config));
  }

  async insertStepAfter<N extends PipelineName>(
    pipeline: N,
    anchorId: string,
    step: PipelineStep<PipelineStates[N], Services>
  ): Promise<OperationResult<PipelineDescription>> {
    return this.editTyped(pipeline, () => this.registries[pipeline].insertAfter(anchorId, step));
  }

  async insertStepBefore<N extends PipelineName>(
    pipeline: N,
    anchorId: string,
    step: PipelineStep<PipelineStates[N], Services>
  ): Promise<OperationResult<PipelineDescription>> {
    return this.editTyped(pipeline, () => this.registries[pipeline].insertBefore(anchorId, step));
  }

  async replaceStep<N extends PipelineName>(
    pipeline: N,
    stepId: string,
    step: PipelineStep<PipelineStates[N], Services>
  ): Promise<OperationResult<PipelineDescription>> {
    return this.editTyped(pipeline, () => this.registries[pipeline].replace(stepId, step));
  }

  async removeStep(pipeline: PipelineName, stepId: string): Promise<OperationResult<PipelineDescription>> {
    return this.edit(pipeline, (registry) => registry.remove(stepId));
  }

  async rollbackPipeline(pipeline: PipelineName, revision: number): Promise<OperationResult<PipelineDescription>> {
    return this.edit(pipeline, (registry) => registry.rollback(revision));
  }

  /** Continues a durable run from its last checkpoint. */
  async resumeRun(
    runId: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<OperationResult<MemorizeResult | RetrieveResult | EvolveResult>> {
    let checkpoint: Checkpoint;
    let log: RunLog;
    try {
      if (!this.durable) {
        throw new ValidationError('Resuming a run needs the durable runner');
      }
      const [found, existing] = await Promise.all([this.durable.loadCheckpoint(runId), this.store.getRunLog(runId)]);
      if (!found || !existing) {
        throw new NotFoundError(`No checkpoint for run ${runId}`);
      }
      checkpoint = found;
      log = existing;
    } catch (error) {
      return this.fail('admin', error);
    }

    const context: RunContext = {
      operation: log.operation,
      scope: log.scope,
      selector: log.selector,
      inputSummary: log.inputSummary
    };
    const pipeline = checkpoint.pipeline;
    if (!isPipelineName(pipeline)) {
      return this.fail('admin', new NotFoundError(`Unknown pipeline ${pipeline}`));
    }
    switch (pipeline) {
      case 'memorize':
        return this.resumeWith(this.registries.memorize, checkpoint, context, buildMemorizeResult, options.signal);
      case 'retrieve':
        return this.resumeWith(this.registries.retrieve, checkpoint, context, buildRetrieveResult, options.signal);
      case 'evolve':
        return this.resumeWith(this.registries.evolve, checkpoint, context, buildEvolveResult, options.signal, (state) => state.diff ?? null);
    }
  }

  async purgeScope(scope: Scope): Promise<OperationResult<PurgeSummary>> {
    return this.query('admin', async () => {
      const valid = this.tenancy.validateScope(scope);
      const summary = await this.store.purgeScope(valid);
      await this.services.vector?.purgeScope(valid);
      return summary;
    });
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private resumeWith<S, T>(
    registry: PipelineRegistry<S, Services>,
    checkpoint: Checkpoint,
    context: RunContext,
    build: (state: S, degraded: Degradation) => T,
    signal: AbortSignal | undefined,
    audit?: (state: S) => EvolveDiff | null
  ): Promise<OperationResult<T>> {
    const revision = registry.findRevision(checkpoint.revisionId);
    const durable = this.durable;
    if (!revision || !durable) {
      return Promise.resolve(this.fail('admin', new NotFoundError(`Revision ${checkpoint.revisionId} is no longer registered`)));
    }
    return this.drive({
      runId: checkpoint.runId,
      revision,
      context,
      build,
      audit,
      launch: (runId) =>
        durable.resume(revision, checkpoint, (raw) => registry.stateSchema.parse(raw), {
          runId,
          services: this.services,
          signal
        })
    });
  }

  private execute<S, T>(params: {
    registry: PipelineRegistry<S, Services>;
    initial: S;
    context: RunContext;
    signal: AbortSignal | undefined;
    build: (state: S, degraded: Degradation) => T;
    audit?: (state: S) => EvolveDiff | null;
  }): Promise<OperationResult<T>> {
    const revision = params.registry.current();
    return this.drive({
      runId: randomUUID(),
      revision,
      context: params.context,
      build: params.build,
      audit: params.audit,
      launch: (runId) => this.runner.run(revision, params.initial, { runId, services: this.services, signal: params.signal })
    });
  }

  private async drive<S, T>(params: {
    runId: string;
    revision: PipelineRevision<S, Services>;
    context: RunContext;
    launch: (runId: string) => Promise<RunOutcome<S>>;
    build: (state: S, degraded: Degradation) => T;
    audit?: (state: S) => EvolveDiff | null;
  }): Promise<OperationResult<T>> {
    const { runId, revision, context } = params;
    const started = performance.now();
    const log: RunLog = {
      runId,
      operation: context.operation,
      pipeline: revision.pipeline,
      revisionId: revision.id,
      runner: this.runner.kind,
      scope: context.scope,
      selector: context.selector,
      status: 'running',
      inputSummary: context.inputSummary,
      steps: [],
      error: null,
      audit: null,
      startedAt: new Date(),
      finishedAt: null
    };

    try {
      await this.store.putRunLog(log);
      logRunStarted({ runId, operation: context.operation, revisionId: revision.id, runner: this.runner.kind, scope: context.scope });
      const outcome = await params.launch(runId);
      const value = params.build(outcome.state, outcome.degraded);
      await this.finishRun(
        {
          ...log,
          status: outcome.degraded ? 'degraded' : 'succeeded',
          steps: outcome.steps,
          error: outcome.degraded
            ? { kind: 'Degraded', message: errorMessage(outcome.degraded.error), stepId: outcome.degraded.stepId }
            : null,
          audit: params.audit ? params.audit(outcome.state) : null
        },
        started
      );
      return { ok: true, runId, value };
    } catch (error) {
      const cause = error instanceof PipelineRunError ? error.error : error;
      const structured = toStructuredError(cause, runId);
      const stepId = structured.stepId ?? (error instanceof PipelineRunError ? error.stepId : null);
      if (!(cause instanceof MemoryEngineError)) {
        console.error('[Stratum] Unexpected failure in run', runId, cause);
      }
      await this.finishRun(
        {
          ...log,
          status: cause instanceof CancelledError ? 'cancelled' : 'failed',
          steps: error instanceof PipelineRunError ? error.steps : [],
          error: { kind: structured.kind, message: structured.message, stepId }
        },
        started
      );
      return { ok: false, runId, error: { ...structured, stepId, scope: structured.scope ?? context.scope } };
    }
  }

  private async finishRun(log: RunLog, started: number): Promise<void> {
    const finished: RunLog = { ...log, finishedAt: new Date() };
    try {
      await this.store.putRunLog(finished);
    } catch (error) {
      console.error('[Stratum] Failed to record run log', log.runId, error);
    }
    logRunFinished({
      runId: log.runId,
      operation: log.operation,
      scope: log.scope,
      status: log.status,
      durationMs: performance.now() - started,
      errorKind: log.error ? log.error.kind : null,
      failedStep: log.error ? log.error.stepId : null
    });
  }

  private async query<T>(operation: OperationName | 'admin', work: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return { ok: true, runId: null, value: await work() };
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  private edit(
    pipeline: PipelineName,
    change: (registry: Registries[PipelineName]) => unknown
  ): Promise<OperationResult<PipelineDescription>> {
    return this.editTyped(pipeline, () => change(this.registries[pipeline]));
  }

  private async editTyped(pipeline: PipelineName, change: () => unknown): Promise<OperationResult<PipelineDescription>> {
    return this.query('admin', async () => {
      change();
      if (this.tenancy.isProvisioned) {
        await this.tenancy.recordPipelineRevision(this.revisionToken());
      }
      return this.describePipelines()[pipeline];
    });
  }

  private reject<T>(operation: OperationName, error: unknown): OperationResult<T> {
    return this.fail(operation, error);
  }

  private fail<T>(operation: OperationName | 'admin', error: unknown): OperationResult<T> {
    const structured = toStructuredError(error, null);
    if (error instanceof MemoryEngineError) {
      logRequestRejected({ operation, kind: structured.kind, message: structured.message });
    } else {
      console.error('[Stratum] Unexpected failure', operation, error);
    }
    return { ok: false, runId: null, error: structured };
  }
}
