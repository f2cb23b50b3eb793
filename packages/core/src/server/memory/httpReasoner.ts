import { z } from 'zod';

import {
  fail,
  isRetryableStatus,
  succeed,
  type CandidateFact,
  type CapabilityResult,
  type ExtractRequest,
  type IntentionDraft,
  type ItemRevision,
  type RankedCandidate,
  type ReasoningCapability,
  type SufficiencyVerdict
} from './capabilities';
import { memoryTypeSchema, type MemoryType, type Modality, type PreprocessArtifacts } from './models';

export type HttpReasonerOptions = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 15_000;

type Reply = { status: number; text: string; received: boolean };

const extractResponseSchema = z.object({
  facts: z.array(
    z.object({
      text: z.string().min(1),
      memoryType: memoryTypeSchema.default('knowledge'),
      confidence: z.number().min(0).max(1),
      stable: z.boolean().default(false),
      categories: z.array(z.string()).default([]),
      start: z.number().int().nonnegative().nullable().default(null),
      end: z.number().int().nonnegative().nullable().default(null),
      timestampMs: z.number().nonnegative().nullable().optional(),
      page: z.number().int().nonnegative().nullable().optional()
    })
  )
});

const mediaResponseSchema = z.object({
  caption: z.string().nullable().default(null),
  transcription: z.string().nullable().default(null)
});

const summaryResponseSchema = z.object({ summary: z.string() });

const sufficiencyResponseSchema = z.object({
  sufficient: z.boolean(),
  rewrittenQuery: z.string().nullable().default(null),
  nextStepQuery: z.string().nullable().default(null)
});

const rerankResponseSchema = z.object({
  ranked: z.array(
    z.object({
      id: z.string(),
      score: z.number()
    })
  )
});

const intentionResponseSchema = z.object({
  goals: z.array(z.string()),
  constraints: z.array(z.string()),
  summary: z.string()
});

const revisionResponseSchema = z.object({
  text: z.string().min(1),
  confidence: z.number().min(0).max(1),
  stable: z.boolean()
});

/**
 * Reasoning over a JSON service exposing one POST route per task
 * (`/extract`, `/summarize`, `/sufficiency`, `/rerank`, `/intention`, `/revise`, `/describe`).
 */
export class HttpReasoner implements ReasoningCapability {
  readonly name = 'http';
  private readonly options: HttpReasonerOptions;

  constructor(options: HttpReasonerOptions) {
    this.options = { ...options, baseUrl: options.baseUrl.replace(/\/+$/, '') };
  }

  private async call<T>(task: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal?: AbortSignal): Promise<CapabilityResult<T>> {
    const reply = await this.post(task, body, signal);
    if (!reply.received || reply.status < 200 || reply.status >= 300) {
      return fail(`${task} failed with status ${reply.status}: ${reply.text || 'no body'}`, isRetryableStatus(reply.status));
    }
    let payload: unknown;
    try {
      payload = reply.text ? JSON.parse(reply.text) : undefined;
    } catch (error) {
      return fail(`${task} returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`, false);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      return fail(`${task} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`, false);
    }
    return succeed(parsed.data);
  }

  /** Network errors, timeouts and aborts come back as status 0 with the error message as text. */
  private async post(task: string, body: unknown, signal?: AbortSignal): Promise<Reply> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    try {
      const response = await fetch(`${this.options.baseUrl}/${task}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal
      });
      return { status: response.status, text: await response.text(), received: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn('[Stratum] reasoner request failed:', task, message);
      return { status: 0, text: message, received: false };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async extract(request: ExtractRequest, signal?: AbortSignal): Promise<CapabilityResult<CandidateFact[]>> {
    const result = await this.call(
      'extract',
      {
        modality: request.modality,
        content: request.content,
        categories: request.categories,
        threshold: request.threshold
      },
      extractResponseSchema,
      signal
    );
    if (!result.ok) return result;
    return succeed(result.value.facts.filter((fact) => fact.confidence >= request.threshold));
  }

  async describeMedia(
    request: { modality: Modality; uri: string | null; content: string | null },
    signal?: AbortSignal
  ): Promise<CapabilityResult<Pick<PreprocessArtifacts, 'caption' | 'transcription'>>> {
    return this.call('describe', request, mediaResponseSchema, signal);
  }

  async summarize(
    request: { categoryName: string; description: string; items: string[]; previousSummary: string; maxLength: number },
    signal?: AbortSignal
  ): Promise<CapabilityResult<string>> {
    const result = await this.call('summarize', request, summaryResponseSchema, signal);
    return result.ok ? succeed(result.value.summary.slice(0, request.maxLength)) : result;
  }

  async judgeSufficiency(
    request: { query: string; layer: 'intention' | 'category' | 'item'; context: string[] },
    signal?: AbortSignal
  ): Promise<CapabilityResult<SufficiencyVerdict>> {
    return this.call('sufficiency', request, sufficiencyResponseSchema, signal);
  }

  async rerank(request: { query: string; candidates: RankedCandidate[] }, signal?: AbortSignal): Promise<CapabilityResult<RankedCandidate[]>> {
    const result = await this.call('rerank', request, rerankResponseSchema, signal);
    if (!result.ok) return result;
    const scoreMap = new Map(result.value.ranked.map((entry) => [entry.id, entry.score]));
    const ranked = request.candidates
      .map((candidate) => ({ ...candidate, score: scoreMap.get(candidate.id) ?? candidate.score }))
      .sort((a, b) => b.score - a.score);
    return succeed(ranked);
  }

  async deriveIntention(
    request: { previous: IntentionDraft | null; facts: Array<{ text: string; memoryType: MemoryType }> },
    signal?: AbortSignal
  ): Promise<CapabilityResult<IntentionDraft>> {
    return this.call('intention', request, intentionResponseSchema, signal);
  }

  async reviseItem(
    request: { text: string; memoryType: MemoryType; confidence: number; excerpt: string },
    signal?: AbortSignal
  ): Promise<CapabilityResult<ItemRevision>> {
    return this.call('revise', request, revisionResponseSchema, signal);
  }
}
