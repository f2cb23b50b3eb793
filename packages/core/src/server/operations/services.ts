import type {
  BlobStore,
  CapabilityName,
  CapabilityResult,
  EmbeddingCapability,
  EmbeddingInputType,
  ReasoningCapability
} from '../memory/capabilities';
import type { EngineConfig } from '../memory/config';
import { CapabilityFailureError, CapabilityUnavailableError, TransientCapabilityError } from '../memory/errors';
import type { MetadataStore } from '../memory/store';
import type { TenancyManager } from '../memory/tenancy';
import type { VectorIndex } from '../memory/vector';

/** Collaborators handed to every step through its context. */
export type Services = {
  store: MetadataStore;
  tenancy: TenancyManager;
  reasoner: ReasoningCapability;
  embedder: EmbeddingCapability | null;
  vector: VectorIndex | null;
  blobs: BlobStore | null;
  config: EngineConfig;
};

export function availableCapabilities(services: Pick<Services, 'embedder' | 'vector' | 'blobs'>): Set<CapabilityName> {
  const available = new Set<CapabilityName>(['store', 'llm']);
  if (services.embedder) available.add('embedding');
  if (services.vector) available.add('vector');
  if (services.blobs) available.add('blob');
  return available;
}

/** Converts a capability result into a value or a classified error. */
export function unwrapCapability<T>(result: CapabilityResult<T>, capability: string): T {
  if (result.ok) {
    return result.value;
  }
  if (result.retryable) {
    throw new TransientCapabilityError(`${capability} failed: ${result.reason}`);
  }
  throw new CapabilityFailureError(`${capability} failed: ${result.reason}`);
}

export async function embedTexts(
  services: Pick<Services, 'embedder'>,
  texts: string[],
  inputType: EmbeddingInputType,
  signal?: AbortSignal
): Promise<number[][] | null> {
  const { embedder } = services;
  if (!embedder || texts.length === 0) {
    return embedder ? [] : null;
  }
  const vectors = unwrapCapability(await embedder.embed(texts, inputType, signal), `embedding (${embedder.model})`);
  if (vectors.length !== texts.length) {
    throw new CapabilityFailureError(`embedding returned ${vectors.length} vectors for ${texts.length} texts`);
  }
  return vectors;
}

export function requireBlobs(services: Pick<Services, 'blobs'>): BlobStore {
  if (!services.blobs) {
    throw new CapabilityUnavailableError('Reading a resource by URI needs a blob store');
  }
  return services.blobs;
}
