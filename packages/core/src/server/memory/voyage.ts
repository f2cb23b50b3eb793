import { VoyageAIClient, VoyageAIError, VoyageAITimeoutError } from 'voyageai';

import {
  fail,
  isRetryableStatus,
  succeed,
  type CapabilityResult,
  type EmbeddingCapability,
  type EmbeddingInputType
} from './capabilities';
import { contentTokens, tokenize } from './lexical';
import { normalizeEmbedding } from './vector';

export const VOYAGE_DEFAULT_MODEL = 'voyage-3.5';
export const VOYAGE_DEFAULT_DIMENSIONS = 1024;

export type VoyageEmbedderOptions = {
  apiKey: string;
  model?: string;
  dimensions?: number;
};

export class VoyageEmbedder implements EmbeddingCapability {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: VoyageAIClient;

  constructor(options: VoyageEmbedderOptions) {
    this.client = new VoyageAIClient({ apiKey: options.apiKey });
    this.model = options.model ?? VOYAGE_DEFAULT_MODEL;
    this.dimensions = options.dimensions ?? VOYAGE_DEFAULT_DIMENSIONS;
  }

  async embed(texts: string[], inputType: EmbeddingInputType): Promise<CapabilityResult<number[][]>> {
    if (texts.length === 0) {
      return succeed([]);
    }
    try {
      const { data } = await this.client.embed({
        input: texts,
        model: this.model,
        inputType
      });
      const vectors: number[][] = [];
      for (const entry of data ?? []) {
        if (!entry.embedding) {
          return fail('Voyage embedding response did not include embedding data', false);
        }
        vectors.push(entry.embedding);
      }
      if (vectors.length !== texts.length) {
        return fail(`Voyage returned ${vectors.length} embeddings for ${texts.length} inputs`, false);
      }
      if (vectors.some((vector) => vector.length !== this.dimensions)) {
        return fail(`Voyage model ${this.model} did not return ${this.dimensions}-dimension vectors`, false);
      }
      return succeed(vectors);
    } catch (error) {
      if (error instanceof VoyageAITimeoutError) {
        return fail('Voyage embedding request timed out', true);
      }
      if (error instanceof VoyageAIError) {
        return fail(`Voyage embedding failed: ${error.message}`, isRetryableStatus(error.statusCode ?? 0));
      }
      return fail(`Voyage embedding failed: ${error instanceof Error ? error.message : String(error)}`, true);
    }
  }
}

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Deterministic feature-hashing embedder for development and tests. Texts
 * sharing content words land close together.
 */
export class HashingEmbedder implements EmbeddingCapability {
  readonly model: string;
  readonly dimensions: number;

  constructor(dimensions = 256) {
    this.dimensions = dimensions;
    this.model = `stratum-hashing-${dimensions}`;
  }

  embedText(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const content = contentTokens(text);
    const tokens = content.length > 0 ? content : tokenize(text);
    for (const token of tokens) {
      const hash = fnv1a(token);
      const index = hash % this.dimensions;
      vector[index] += (hash >>> 16) & 1 ? 1 : -1;
    }
    return normalizeEmbedding(vector);
  }

  async embed(texts: string[]): Promise<CapabilityResult<number[][]>> {
    return succeed(texts.map((text) => this.embedText(text)));
  }
}

export function createEmbedderFromEnv(): EmbeddingCapability {
  const apiKey = process.env.VOYAGE_API_KEY;
  if (!apiKey) {
    console.warn('[Stratum] VOYAGE_API_KEY is not set. Falling back to deterministic local embeddings.');
    return new HashingEmbedder(Number.parseInt(process.env.STRATUM_EMBEDDING_DIMENSIONS ?? '256', 10));
  }
  return new VoyageEmbedder({
    apiKey,
    model: process.env.STRATUM_EMBEDDING_MODEL ?? VOYAGE_DEFAULT_MODEL,
    dimensions: Number.parseInt(process.env.STRATUM_EMBEDDING_DIMENSIONS ?? String(VOYAGE_DEFAULT_DIMENSIONS), 10)
  });
}
