export {
  MemoryService,
  PIPELINE_NAMES,
  type CategoryDetail,
  type EvolveResult,
  type MemorizeInput,
  type MemoryServiceOptions,
  type OperationResult,
  type PipelineDescription,
  type PipelineName,
  type PipelineStates,
  type RetrieveResult
} from './server/memory';

export * from './server/memory/models';
export * from './server/memory/errors';
export * from './server/memory/capabilities';
export * from './server/memory/scope';
export * from './server/memory/store';
export * from './server/memory/vector';
export * from './server/memory/policies';
export {
  DEFAULT_CATEGORIES,
  loadEngineConfig,
  mergeEngineConfig,
  parseEngineConfig,
  resetEngineConfigCache,
  retrieverSchema,
  type CategoryDefinition,
  type EngineConfig,
  type EngineConfigInput,
  type RetrieverMode
} from './server/memory/config';
export { TenancyManager, parseScopeDescriptor, fingerprintFields } from './server/memory/tenancy';
export { InMemoryMetadataStore } from './server/memory/inMemoryStore';
export { FileMetadataStore, type FileStoreOptions } from './server/memory/fileStore';
export { KeyedMutex } from './server/memory/lock';
export { createTables, purgeTables, selectRows, selectRunLogs, StagedTransaction, type TableSet } from './server/memory/tables';
export { HeuristicReasoner } from './server/memory/heuristicReasoner';
export { HttpReasoner, type HttpReasonerOptions } from './server/memory/httpReasoner';
export {
  HashingEmbedder,
  VoyageEmbedder,
  VOYAGE_DEFAULT_DIMENSIONS,
  VOYAGE_DEFAULT_MODEL,
  createEmbedderFromEnv,
  type VoyageEmbedderOptions
} from './server/memory/voyage';
export { LocalBlobStore } from './server/memory/blobs';
export { bm25Search, keywordSearch, reciprocalRankFusion, tokenize, contentTokens } from './server/memory/lexical';
export { decideMerge, itemContentHash, resourceContentHash, type MergeDecision } from './server/memory/merge';

export { PipelineRegistry, describeChange, type PipelineRevision, type RevisionChange, type StepDescription } from './server/pipeline/registry';
export { requireState, ROLE_CAPABILITIES, type PipelineStep, type StepContext, type StepRole } from './server/pipeline/step';
export { InlineRunner, PipelineRunError, type PipelineRunner, type RetryPolicy, type RunOutcome } from './server/pipeline/runner';
export { DurableRunner, planStages, type DurableRunnerOptions } from './server/pipeline/durableRunner';
export {
  FileCheckpointStore,
  InMemoryCheckpointStore,
  checkpointSchema,
  type Checkpoint,
  type CheckpointStore
} from './server/pipeline/checkpoints';

export type { Services } from './server/operations/services';
export type { MemorizeResult, MemorizeState } from './server/operations/memorize';
export type {
  PolicySummary,
  RetrieveOptions,
  RetrieveState,
  RetrievedContext,
  ScoredCategory,
  ScoredItem,
  ScoredResource
} from './server/operations/retrieve';
export type { EvolveOptions, EvolveState } from './server/operations/evolve';
