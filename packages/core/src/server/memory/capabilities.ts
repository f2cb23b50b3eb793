import type { CategoryDefinition } from './config';
import type { Intention, MemoryType, Modality, PreprocessArtifacts, Scope } from './models';

export type CapabilityName = 'llm' | 'embedding' | 'vector' | 'store' | 'blob';

export type CapabilityResult<T> = { ok: true; value: T } | { ok: false; reason: string; retryable: boolean };

export function succeed<T>(value: T): CapabilityResult<T> {
  return { ok: true, value };
}

export function fail<T>(reason: string, retryable: boolean): CapabilityResult<T> {
  return { ok: false, reason, retryable };
}

/** Status 0 stands for a request that never got a response. */
export function isRetryableStatus(status: number): boolean {
  return status === 0 || status === 408 || status === 429 || status >= 500;
}

export type CandidateFact = {
  text: string;
  memoryType: MemoryType;
  confidence: number;
  stable: boolean;
  categories: string[];
  /** Character offsets into the extraction input. */
  start: number | null;
  end: number | null;
  timestampMs?: number | null;
  page?: number | null;
};

export type ExtractRequest = {
  scope: Scope;
  modality: Modality;
  content: string;
  categories: CategoryDefinition[];
  threshold: number;
};

export type SufficiencyVerdict = {
  sufficient: boolean;
  rewrittenQuery: string | null;
  nextStepQuery: string | null;
};

export type RankedCandidate = { id: string; text: string; score: number };

export type ItemRevision = {
  text: string;
  confidence: number;
  stable: boolean;
};

export type IntentionDraft = Pick<Intention, 'goals' | 'constraints' | 'summary'>;

/**
 * Language-model backed reasoning. Every call reports success or a failure
 * the pipeline can classify as retryable or fatal.
 */
export interface ReasoningCapability {
  readonly name: string;
  extract(request: ExtractRequest, signal?: AbortSignal): Promise<CapabilityResult<CandidateFact[]>>;
  describeMedia(
    request: { modality: Modality; uri: string | null; content: string | null },
    signal?: AbortSignal
  ): Promise<CapabilityResult<Pick<PreprocessArtifacts, 'caption' | 'transcription'>>>;
  summarize(
    request: { categoryName: string; description: string; items: string[]; previousSummary: string; maxLength: number },
    signal?: AbortSignal
  ): Promise<CapabilityResult<string>>;
  judgeSufficiency(
    request: { query: string; layer: 'intention' | 'category' | 'item'; context: string[] },
    signal?: AbortSignal
  ): Promise<CapabilityResult<SufficiencyVerdict>>;
  rerank(request: { query: string; candidates: RankedCandidate[] }, signal?: AbortSignal): Promise<CapabilityResult<RankedCandidate[]>>;
  deriveIntention(
    request: { previous: IntentionDraft | null; facts: Array<{ text: string; memoryType: MemoryType }> },
    signal?: AbortSignal
  ): Promise<CapabilityResult<IntentionDraft>>;
  reviseItem(
    request: { text: string; memoryType: MemoryType; confidence: number; excerpt: string },
    signal?: AbortSignal
  ): Promise<CapabilityResult<ItemRevision>>;
}

export type EmbeddingInputType = 'document' | 'query';

export interface EmbeddingCapability {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[], inputType: EmbeddingInputType, signal?: AbortSignal): Promise<CapabilityResult<number[][]>>;
}

export interface BlobStore {
  read(uri: string, signal?: AbortSignal): Promise<CapabilityResult<string>>;
}
