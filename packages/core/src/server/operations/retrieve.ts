import { performance } from 'node:perf_hooks';
import { z } from 'zod';

import { retrieverSchema } from '../memory/config';
import { contentTokens, type LexicalDocument, type LexicalHit } from '../memory/lexical';
import { logVectorMetrics } from '../memory/logging';
import {
  intentionSchema,
  memoryCategorySchema,
  memoryItemSchema,
  resourceSchema,
  scopeSchema,
  scopeValueSchema,
  type MemoryCategory,
  type MemoryItem,
  type Resource
} from '../memory/models';
import { matchesScopeFilter, scopeToFilter, type ScopeFilter } from '../memory/scope';
import type { VectorNamespace } from '../memory/vector';
import { requireState, type PipelineStep } from '../pipeline/step';
import { rankDocuments } from './ranking';
import { embedTexts, unwrapCapability, type Services } from './services';

/** Items scanned lexically per candidate slot. */
const LEXICAL_SCAN_FACTOR = 4;
const MAX_ROUTED_INTENTIONS = 16;

export const scopeFilterSchema = z.record(z.string(), z.array(scopeValueSchema).nullable());

export const retrieveSettingsSchema = z.object({
  retriever: retrieverSchema,
  routeIntention: z.boolean(),
  sufficiencyCheck: z.boolean(),
  verify: z.boolean(),
  categoryTopK: z.number().int().positive(),
  itemTopK: z.number().int().positive(),
  resourceTopK: z.number().int().positive(),
  candidateLimit: z.number().int().positive(),
  rerankLimit: z.number().int().nonnegative(),
  minScore: z.number(),
  vectorEnabled: z.boolean(),
  includeSummary: z.boolean()
});

export type RetrieveSettings = z.infer<typeof retrieveSettingsSchema>;

/** Per-call overrides accepted by the facade. */
export const retrieveOptionsSchema = z
  .object({
    retriever: retrieverSchema,
    routeIntention: z.boolean(),
    sufficiencyCheck: z.boolean(),
    verify: z.boolean(),
    categoryTopK: z.number().int().positive(),
    itemTopK: z.number().int().positive(),
    resourceTopK: z.number().int().positive(),
    includeSummary: z.boolean()
  })
  .partial();

export type RetrieveOptions = z.infer<typeof retrieveOptionsSchema>;

const scoredCategorySchema = z.object({ category: memoryCategorySchema, score: z.number() });
const scoredItemSchema = z.object({ item: memoryItemSchema, score: z.number() });
const scoredResourceSchema = z.object({ resource: resourceSchema, score: z.number() });

export type ScoredCategory = z.infer<typeof scoredCategorySchema>;
export type ScoredItem = z.infer<typeof scoredItemSchema>;
export type ScoredResource = z.infer<typeof scoredResourceSchema>;

const sufficiencyLayerSchema = z.enum(['intention', 'category', 'item']);

export const retrievedContextSchema = z.object({
  needsRetrieval: z.boolean(),
  rewrittenQuery: z.string().nullable(),
  intentions: z.array(intentionSchema),
  categories: z.array(scoredCategorySchema),
  items: z.array(scoredItemSchema),
  resources: z.array(scoredResourceSchema),
  sufficientAt: sufficiencyLayerSchema.nullable(),
  nextStepQuery: z.string().nullable()
});

export type RetrievedContext = z.infer<typeof retrievedContextSchema>;

export const policySummarySchema = z.object({
  appliedPolicies: z.array(z.string()),
  candidateLimit: z.number().int().nonnegative(),
  rerankLimit: z.number().int().nonnegative(),
  vectorEnabled: z.boolean(),
  fallback: z.enum(['category_routing']).nullable(),
  combinations: z.number().int().nonnegative()
});

export type PolicySummary = z.infer<typeof policySummarySchema>;

export const retrieveStateSchema = z.object({
  filter: scopeFilterSchema,
  exactScope: scopeSchema.nullable(),
  query: z.string(),
  settings: retrieveSettingsSchema,
  policy: policySummarySchema,
  intentions: z.array(intentionSchema).optional(),
  needsRetrieval: z.boolean().optional(),
  activeQuery: z.string().optional(),
  rewrittenQuery: z.string().nullable().optional(),
  queryEmbedding: z.array(z.number()).nullable().optional(),
  categories: z.array(scoredCategorySchema).optional(),
  sufficientAt: sufficiencyLayerSchema.nullable().optional(),
  nextStepQuery: z.string().nullable().optional(),
  itemCandidates: z.array(scoredItemSchema).optional(),
  items: z.array(scoredItemSchema).optional(),
  resources: z.array(scoredResourceSchema).optional(),
  result: retrievedContextSchema.optional()
});

export type RetrieveState = z.infer<typeof retrieveStateSchema>;

export const RETRIEVE_INITIAL_KEYS = ['filter', 'exactScope', 'query', 'settings', 'policy'] as const;

type RetrieveStep = PipelineStep<RetrieveState, Services>;

function categoryDocument(category: MemoryCategory): LexicalDocument {
  return {
    id: category.id,
    text: `${category.name.replace(/_/g, ' ')} ${category.description} ${category.summary}`,
    fields: { name: category.name, description: category.description, summary: category.summary }
  };
}

function itemDocument(item: MemoryItem): LexicalDocument {
  return { id: item.id, text: item.text, fields: { type: item.memoryType, text: item.text } };
}

export function resourceText(resource: Resource): string {
  return resource.content ?? resource.preprocess?.transcription ?? resource.preprocess?.caption ?? resource.uri ?? '';
}

function resourceDocument(resource: Resource): LexicalDocument {
  return { id: resource.id, text: resourceText(resource), fields: { modality: resource.modality } };
}

async function vectorSearch(
  services: Services,
  filter: ScopeFilter,
  namespace: VectorNamespace,
  embedding: number[] | null | undefined,
  k: number
) {
  if (!services.vector || !embedding) {
    return [];
  }
  const started = performance.now();
  const hits = await services.vector.query(filter, namespace, embedding, k);
  logVectorMetrics({
    scope: null,
    backend: services.vector.backend,
    namespace,
    latencyMs: performance.now() - started,
    candidateCount: hits.length
  });
  return hits;
}

export const routeIntentionStep: RetrieveStep = {
  id: 'route_intention',
  role: 'routing',
  requires: ['filter', 'query', 'settings'],
  produces: ['intentions', 'needsRetrieval', 'activeQuery', 'rewrittenQuery', 'sufficientAt'],
  capabilities: ['store'],
  optionalCapabilities: ['llm'],
  async run(state, { services, signal }) {
    const { filter, query, settings } = state;
    const needsRetrieval = contentTokens(query).length > 0;
    const intentions = settings.routeIntention
      ? await services.store.list('intention', filter, { order: 'updatedAt:desc', limit: MAX_ROUTED_INTENTIONS })
      : [];

    const context = intentions.map((intention) => intention.summary).filter((summary) => summary.trim().length > 0);
    if (!needsRetrieval || context.length === 0) {
      return { intentions, needsRetrieval, activeQuery: query, rewrittenQuery: null, sufficientAt: null };
    }

    const verdict = unwrapCapability(
      await services.reasoner.judgeSufficiency({ query, layer: 'intention', context }, signal),
      'judge sufficiency'
    );
    return {
      intentions,
      needsRetrieval,
      activeQuery: verdict.rewrittenQuery ?? query,
      rewrittenQuery: verdict.rewrittenQuery,
      sufficientAt: settings.sufficiencyCheck && verdict.sufficient ? 'intention' : null
    };
  }
};

export const routeCategoriesStep: RetrieveStep = {
  id: 'route_categories',
  role: 'routing',
  requires: ['filter', 'settings', 'activeQuery', 'needsRetrieval', 'sufficientAt'],
  produces: ['categories', 'queryEmbedding'],
  capabilities: ['store'],
  optionalCapabilities: ['embedding', 'vector'],
  degradable: true,
  async run(state, { services, signal, stepId }) {
    const { filter, settings } = state;
    const query = requireState(state, 'activeQuery', stepId);
    if (!state.needsRetrieval || state.sufficientAt) {
      return { categories: [], queryEmbedding: null };
    }

    const vectors = settings.vectorEnabled ? await embedTexts(services, [query], 'query', signal) : null;
    const queryEmbedding = vectors ? vectors[0] : null;
    const categories = await services.store.list('category', filter);
    const hits = await vectorSearch(services, filter, 'category', queryEmbedding, settings.candidateLimit);
    const ranked = rankDocuments(
      settings.retriever,
      query,
      categories.map(categoryDocument),
      hits.map((hit) => ({ id: hit.entityId, score: hit.score })),
      settings.categoryTopK
    );

    const byId = new Map(categories.map((category) => [category.id, category]));
    const routed: ScoredCategory[] = [];
    for (const hit of ranked) {
      const category = byId.get(hit.id);
      if (category && matchesScopeFilter(category.scope, filter)) {
        routed.push({ category, score: hit.score });
      }
    }
    return { categories: routed, queryEmbedding };
  }
};

export const categorySufficiencyStep: RetrieveStep = {
  id: 'category_sufficiency',
  role: 'verification',
  requires: ['settings', 'activeQuery', 'categories', 'sufficientAt'],
  produces: ['sufficientAt', 'nextStepQuery'],
  capabilities: [],
  optionalCapabilities: ['llm'],
  degradable: true,
  async run(state, { services, signal, stepId }) {
    const categories = requireState(state, 'categories', stepId);
    if (state.sufficientAt) {
      return { nextStepQuery: null };
    }
    if (!state.settings.sufficiencyCheck || categories.length === 0) {
      return {};
    }
    const verdict = unwrapCapability(
      await services.reasoner.judgeSufficiency(
        {
          query: requireState(state, 'activeQuery', stepId),
          layer: 'category',
          context: categories.map(({ category }) => category.summary || category.description)
        },
        signal
      ),
      'judge sufficiency'
    );
    return verdict.sufficient
      ? { sufficientAt: 'category', nextStepQuery: null }
      : { sufficientAt: null, nextStepQuery: verdict.nextStepQuery };
  }
};

async function categoryMembers(services: Services, categories: readonly ScoredCategory[]): Promise<MemoryItem[]> {
  const members: MemoryItem[] = [];
  for (const { category } of categories) {
    const filter = scopeToFilter(category.scope);
    const links = await services.store.list('categoryItem', filter, { where: { categoryId: category.id } });
    if (links.length === 0) continue;
    const items = await services.store.list('item', filter, {
      ids: links.map((link) => link.itemId),
      where: { status: 'active' }
    });
    members.push(...items.sort((a, b) => b.confidence - a.confidence || a.id.localeCompare(b.id)));
  }
  return members;
}

export const recallItemsStep: RetrieveStep = {
  id: 'recall_items',
  role: 'recall',
  requires: ['filter', 'settings', 'activeQuery', 'needsRetrieval', 'categories', 'queryEmbedding', 'sufficientAt'],
  produces: ['itemCandidates'],
  capabilities: ['store'],
  optionalCapabilities: ['vector'],
  degradable: true,
  async run(state, { services, stepId }) {
    const { filter, settings } = state;
    if (!state.needsRetrieval || state.sufficientAt) {
      return { itemCandidates: [] };
    }
    const query = requireState(state, 'activeQuery', stepId);
    const pool = new Map<string, MemoryItem>();
    const admit = (item: MemoryItem) => {
      if (item.status === 'active' && matchesScopeFilter(item.scope, filter)) {
        pool.set(item.id, item);
      }
    };

    const members = await categoryMembers(services, state.categories ?? []);
    members.forEach(admit);

    const recent = await services.store.list('item', filter, {
      where: { status: 'active' },
      order: 'updatedAt:desc',
      limit: settings.candidateLimit * LEXICAL_SCAN_FACTOR
    });
    recent.forEach(admit);

    const vectorHits: LexicalHit[] = [];
    const embedding = settings.vectorEnabled ? state.queryEmbedding : null;
    for (const hit of await vectorSearch(services, filter, 'item', embedding, settings.candidateLimit)) {
      const item = pool.get(hit.entityId) ?? (await services.store.get('item', hit.scope, hit.entityId));
      if (!item) continue;
      admit(item);
      if (pool.has(item.id)) {
        vectorHits.push({ id: item.id, score: hit.score });
      }
    }

    const ranked = rankDocuments(
      settings.retriever,
      query,
      [...pool.values()].map(itemDocument),
      vectorHits,
      settings.candidateLimit,
      members.length > 0 ? [members.filter((item) => pool.has(item.id)).map((item) => ({ id: item.id, score: item.confidence }))] : []
    );
    const itemCandidates: ScoredItem[] = [];
    for (const hit of ranked) {
      const item = pool.get(hit.id);
      if (item) {
        itemCandidates.push({ item, score: hit.score });
      }
    }
    return { itemCandidates };
  }
};

export const verifyItemsStep: RetrieveStep = {
  id: 'verify_items',
  role: 'verification',
  requires: ['settings', 'activeQuery', 'itemCandidates'],
  produces: ['items'],
  capabilities: [],
  optionalCapabilities: ['llm'],
  degradable: true,
  async run(state, { services, signal, stepId }) {
    const { settings } = state;
    const candidates = requireState(state, 'itemCandidates', stepId);
    if (!settings.verify || candidates.length === 0 || settings.rerankLimit === 0) {
      return {
        items: candidates.filter((candidate) => candidate.score >= settings.minScore).slice(0, settings.itemTopK)
      };
    }

    const window = candidates.slice(0, settings.rerankLimit);
    const reranked = unwrapCapability(
      await services.reasoner.rerank(
        {
          query: requireState(state, 'activeQuery', stepId),
          candidates: window.map(({ item, score }) => ({ id: item.id, text: item.text, score }))
        },
        signal
      ),
      'rerank'
    );
    const byId = new Map(window.map((candidate) => [candidate.item.id, candidate.item]));
    const items: ScoredItem[] = [];
    for (const entry of reranked) {
      const item = byId.get(entry.id);
      if (item && entry.score > 0 && entry.score >= settings.minScore) {
        items.push({ item, score: entry.score });
        byId.delete(entry.id);
      }
    }
    return { items: items.slice(0, settings.itemTopK) };
  }
};

export const itemSufficiencyStep: RetrieveStep = {
  id: 'item_sufficiency',
  role: 'verification',
  requires: ['settings', 'activeQuery', 'items', 'sufficientAt'],
  produces: ['sufficientAt', 'nextStepQuery'],
  capabilities: [],
  optionalCapabilities: ['llm'],
  degradable: true,
  async run(state, { services, signal, stepId }) {
    const items = requireState(state, 'items', stepId);
    if (state.sufficientAt || !state.settings.sufficiencyCheck || items.length === 0) {
      return {};
    }
    const verdict = unwrapCapability(
      await services.reasoner.judgeSufficiency(
        {
          query: requireState(state, 'activeQuery', stepId),
          layer: 'item',
          context: items.map(({ item }) => item.text)
        },
        signal
      ),
      'judge sufficiency'
    );
    return verdict.sufficient
      ? { sufficientAt: 'item', nextStepQuery: null }
      : { nextStepQuery: verdict.nextStepQuery };
  }
};

export const recallResourcesStep: RetrieveStep = {
  id: 'recall_resources',
  role: 'recall',
  requires: ['filter', 'settings', 'activeQuery', 'needsRetrieval', 'items', 'queryEmbedding', 'sufficientAt'],
  produces: ['resources'],
  capabilities: ['store'],
  optionalCapabilities: ['vector'],
  degradable: true,
  async run(state, { services, stepId }) {
    const { filter, settings } = state;
    if (!state.needsRetrieval || state.sufficientAt) {
      return { resources: [] };
    }
    const query = requireState(state, 'activeQuery', stepId);
    const pool = new Map<string, Resource>();
    const admit = (resource: Resource | null) => {
      if (resource && matchesScopeFilter(resource.scope, filter)) {
        pool.set(resource.id, resource);
      }
    };

    const evidence: LexicalHit[] = [];
    for (const { item, score } of state.items ?? []) {
      if (!pool.has(item.resourceId)) {
        admit(await services.store.get('resource', item.scope, item.resourceId));
      }
      if (pool.has(item.resourceId) && !evidence.some((hit) => hit.id === item.resourceId)) {
        evidence.push({ id: item.resourceId, score });
      }
    }

    const recent = await services.store.list('resource', filter, { order: 'createdAt:desc', limit: settings.candidateLimit });
    recent.forEach(admit);

    const vectorHits: LexicalHit[] = [];
    const embedding = settings.vectorEnabled ? state.queryEmbedding : null;
    for (const hit of await vectorSearch(services, filter, 'resource', embedding, settings.candidateLimit)) {
      if (!pool.has(hit.entityId)) {
        admit(await services.store.get('resource', hit.scope, hit.entityId));
      }
      if (pool.has(hit.entityId)) {
        vectorHits.push({ id: hit.entityId, score: hit.score });
      }
    }

    const ranked = rankDocuments(
      settings.retriever,
      query,
      [...pool.values()].map(resourceDocument),
      vectorHits,
      settings.resourceTopK,
      evidence.length > 0 ? [evidence] : []
    );
    const resources: ScoredResource[] = [];
    for (const hit of ranked) {
      const resource = pool.get(hit.id);
      if (resource) {
        resources.push({ resource, score: hit.score });
      }
    }
    return { resources };
  }
};

function withoutEmbedding(item: MemoryItem): MemoryItem {
  return { ...item, embedding: null };
}

/** Assembles whatever layers completed, so a degraded run still answers. */
export const assembleContextStep: RetrieveStep = {
  id: 'assemble_context',
  role: 'assembly',
  requires: ['query', 'settings'],
  produces: ['result'],
  capabilities: [],
  finalizer: true,
  run(state) {
    const { settings } = state;
    const categories = (state.categories ?? []).map(({ category, score }) => ({
      category: settings.includeSummary ? category : { ...category, summary: '' },
      score
    }));
    return {
      result: {
        needsRetrieval: state.needsRetrieval ?? true,
        rewrittenQuery: state.rewrittenQuery ?? null,
        intentions: state.intentions ?? [],
        categories,
        items: (state.items ?? []).map(({ item, score }) => ({ item: withoutEmbedding(item), score })),
        resources: state.resources ?? [],
        sufficientAt: state.sufficientAt ?? null,
        nextStepQuery: state.nextStepQuery ?? null
      }
    };
  }
};

export function defaultRetrieveSteps(): RetrieveStep[] {
  return [
    routeIntentionStep,
    routeCategoriesStep,
    categorySufficiencyStep,
    recallItemsStep,
    verifyItemsStep,
    itemSufficiencyStep,
    recallResourcesStep,
    assembleContextStep
  ];
}
