import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { INTENTION_ID, memoryCategorySchema, memoryItemSchema, memoryTypeSchema, modalitySchema, resourceSchema, scopeSchema } from '../memory/models';
import type { MemoryCategory, MemoryItem, Modality, PreprocessArtifacts, Resource, Scope, Segment } from '../memory/models';
import { splitUtterances } from '../memory/capture';
import { decideMerge, itemContentHash, resourceContentHash } from '../memory/merge';
import { scopeToFilter } from '../memory/scope';
import type { StoreTransaction } from '../memory/store';
import { cosineSimilarity } from '../memory/vector';
import { requireState, type PipelineStep } from '../pipeline/step';
import { embedTexts, requireBlobs, unwrapCapability, type Services } from './services';
import { appendAnchors, chooseCategories, describeCategory, findCategoryByName } from './taxonomy';

const TEXT_MODALITIES: ReadonlySet<Modality> = new Set(['conversation', 'document']);

export const memorizeRequestSchema = z.object({
  content: z.string().min(1).nullable().default(null),
  uri: z.string().min(1).nullable().default(null),
  modality: modalitySchema,
  sourceKey: z.string().min(1).nullable().default(null)
});

export const memorizeInputSchema = memorizeRequestSchema.refine(
  (request) => request.content !== null || request.uri !== null,
  'memorize needs content or a uri'
);

export type MemorizeRequest = z.infer<typeof memorizeRequestSchema>;

/** Text modalities given only by URI are read through the blob store. */
export function needsBlobRead(request: Pick<MemorizeRequest, 'content' | 'uri' | 'modality'>): boolean {
  return request.content === null && request.uri !== null && TEXT_MODALITIES.has(request.modality);
}

const candidateFactSchema = z.object({
  text: z.string().min(1),
  memoryType: memoryTypeSchema,
  confidence: z.number().min(0).max(1),
  stable: z.boolean(),
  categories: z.array(z.string()),
  start: z.number().int().nonnegative().nullable(),
  end: z.number().int().nonnegative().nullable(),
  timestampMs: z.number().nonnegative().nullable().optional(),
  page: z.number().int().nonnegative().nullable().optional()
});

const itemPlanSchema = z.object({
  itemId: z.string(),
  candidate: candidateFactSchema,
  contentHash: z.string(),
  embedding: z.array(z.number()).nullable(),
  action: z.enum(['create', 'reinforce', 'supersede']),
  targetId: z.string().nullable()
});

export type ItemPlan = z.infer<typeof itemPlanSchema>;

const categoryPlanSchema = z.object({
  categoryId: z.string(),
  name: z.string(),
  description: z.string(),
  summary: z.string(),
  itemIds: z.array(z.string()),
  summaryEmbedding: z.array(z.number()).nullable()
});

export type CategoryPlan = z.infer<typeof categoryPlanSchema>;

const intentionPlanSchema = z.object({
  goals: z.array(z.string()),
  constraints: z.array(z.string()),
  summary: z.string(),
  sourceItemIds: z.array(z.string())
});

export const memorizeResultSchema = z.object({
  resource: resourceSchema,
  items: z.array(memoryItemSchema),
  categories: z.array(memoryCategorySchema),
  deduplicated: z.boolean(),
  supersededResourceId: z.string().nullable()
});

export type MemorizeResult = z.infer<typeof memorizeResultSchema>;

export const memorizeStateSchema = z.object({
  scope: scopeSchema,
  request: memorizeRequestSchema,
  resource: resourceSchema.optional(),
  duplicateOf: resourceSchema.nullable().optional(),
  text: z.string().optional(),
  candidates: z.array(candidateFactSchema).optional(),
  plans: z.array(itemPlanSchema).optional(),
  categoryPlans: z.array(categoryPlanSchema).optional(),
  intention: intentionPlanSchema.nullable().optional(),
  result: memorizeResultSchema.optional()
});

export type MemorizeState = z.infer<typeof memorizeStateSchema>;

export const MEMORIZE_INITIAL_KEYS = ['scope', 'request'] as const;

type MemorizeStep = PipelineStep<MemorizeState, Services>;

export const ingestResourceStep: MemorizeStep = {
  id: 'ingest_resource',
  role: 'ingestion',
  requires: ['scope', 'request'],
  produces: ['resource', 'duplicateOf'],
  capabilities: ['store'],
  optionalCapabilities: ['blob'],
  async run(state, { services, signal }) {
    const { scope, request } = state;
    let content = request.content;
    if (request.uri && needsBlobRead(request)) {
      content = unwrapCapability(await requireBlobs(services).read(request.uri, signal), 'blob read');
    }

    const contentHash = resourceContentHash(request.modality, content ?? request.uri ?? '');
    const filter = scopeToFilter(scope);
    const [duplicate] = await services.store.list('resource', filter, {
      where: { contentHash },
      order: 'createdAt:asc',
      limit: 1
    });

    const sourceKey = request.sourceKey ?? request.uri;
    let supersedesId: string | null = null;
    if (!duplicate && sourceKey) {
      const [previous] = await services.store.list('resource', filter, {
        where: { sourceKey },
        order: 'createdAt:desc',
        limit: 1
      });
      supersedesId = previous ? previous.id : null;
    }

    const now = new Date();
    const resource: Resource = {
      id: randomUUID(),
      scope,
      modality: request.modality,
      uri: request.uri,
      content,
      sourceKey,
      contentHash,
      supersedesId,
      preprocess: null,
      createdAt: now,
      updatedAt: now
    };
    return { resource, duplicateOf: duplicate ?? null };
  }
};

function segmentsFor(text: string, modality: Modality): Segment[] {
  return splitUtterances(text, modality).map((utterance, index) => ({
    index,
    start: utterance.start,
    end: utterance.end,
    speaker: modality === 'conversation' ? utterance.role : null,
    text: utterance.text
  }));
}

export const preprocessResourceStep: MemorizeStep = {
  id: 'preprocess_resource',
  role: 'ingestion',
  requires: ['resource', 'duplicateOf'],
  produces: ['resource', 'text'],
  capabilities: [],
  optionalCapabilities: ['llm'],
  async run(state, { services, signal, stepId }) {
    const resource = requireState(state, 'resource', stepId);
    if (state.duplicateOf) {
      return { text: '' };
    }

    let preprocess: PreprocessArtifacts;
    if (TEXT_MODALITIES.has(resource.modality)) {
      const content = resource.content ?? '';
      preprocess = { transcription: null, caption: null, segments: segmentsFor(content, resource.modality) };
    } else {
      const described = unwrapCapability(
        await services.reasoner.describeMedia(
          { modality: resource.modality, uri: resource.uri, content: resource.content },
          signal
        ),
        'describe media'
      );
      preprocess = {
        transcription: described.transcription,
        caption: described.caption,
        segments: described.transcription ? segmentsFor(described.transcription, 'document') : []
      };
    }

    const text = preprocess.transcription ?? resource.content ?? preprocess.caption ?? '';
    return { resource: { ...resource, preprocess }, text };
  }
};

const extractConfigSchema = z.object({
  threshold: z.number().min(0).max(1).optional(),
  maxFacts: z.number().int().positive().optional()
});

export const extractItemsStep: MemorizeStep = {
  id: 'extract_items',
  role: 'extraction',
  requires: ['scope', 'request', 'text', 'duplicateOf'],
  produces: ['candidates'],
  configSchema: extractConfigSchema,
  async run(state, { services, signal, config }) {
    const text = state.text ?? '';
    if (state.duplicateOf || !text.trim()) {
      return { candidates: [] };
    }
    const options = extractConfigSchema.parse(config);
    const facts = unwrapCapability(
      await services.reasoner.extract(
        {
          scope: state.scope,
          modality: state.request.modality,
          content: text,
          categories: services.config.memorize.categories,
          threshold: options.threshold ?? services.config.memorize.extractionThreshold
        },
        signal
      ),
      `extract (${services.reasoner.name})`
    );

    const candidates = facts
      .map((fact) => ({
        ...fact,
        text: fact.text.trim(),
        confidence: Math.min(1, Math.max(0, fact.confidence)),
        start: fact.start !== null && fact.start <= text.length ? fact.start : null,
        end: fact.end !== null && fact.end <= text.length ? fact.end : null
      }))
      .filter((fact) => fact.text.length > 0);
    return { candidates: options.maxFacts ? candidates.slice(0, options.maxFacts) : candidates };
  }
};

type ClosestItem = { item: MemoryItem; similarity: number };

async function findClosestItem(
  services: Services,
  scope: Scope,
  candidate: { contentHash: string; memoryType: MemoryItem['memoryType']; embedding: number[] | null }
): Promise<ClosestItem | null> {
  const filter = scopeToFilter(scope);
  const [identical] = await services.store.list('item', filter, {
    where: { contentHash: candidate.contentHash, status: 'active' },
    limit: 1
  });
  if (identical) {
    return { item: identical, similarity: 1 };
  }
  if (!candidate.embedding) {
    return null;
  }

  if (services.vector) {
    const hits = await services.vector.query(filter, 'item', candidate.embedding, 5);
    for (const hit of hits) {
      const item = await services.store.get('item', scope, hit.entityId);
      if (item && item.status === 'active' && item.memoryType === candidate.memoryType) {
        return { item, similarity: hit.score };
      }
    }
    return null;
  }

  let best: ClosestItem | null = null;
  const active = await services.store.list('item', filter, {
    where: { status: 'active', memoryType: candidate.memoryType }
  });
  for (const item of active) {
    if (!item.embedding) continue;
    const similarity = cosineSimilarity(candidate.embedding, item.embedding);
    if (!best || similarity > best.similarity) {
      best = { item, similarity };
    }
  }
  return best;
}

export const dedupeItemsStep: MemorizeStep = {
  id: 'dedupe_items',
  role: 'deduplication',
  requires: ['scope', 'candidates'],
  produces: ['plans'],
  optionalCapabilities: ['embedding', 'vector'],
  async run(state, { services, signal, stepId }) {
    const candidates = requireState(state, 'candidates', stepId);
    if (candidates.length === 0) {
      return { plans: [] };
    }
    const embeddings = await embedTexts(
      services,
      candidates.map((candidate) => candidate.text),
      'document',
      signal
    );

    const plans: ItemPlan[] = [];
    const seen = new Set<string>();
    for (const [index, candidate] of candidates.entries()) {
      const contentHash = itemContentHash(candidate.memoryType, candidate.text);
      if (seen.has(contentHash)) continue;
      seen.add(contentHash);

      const embedding = embeddings ? embeddings[index] : null;
      const match = await findClosestItem(services, state.scope, {
        contentHash,
        memoryType: candidate.memoryType,
        embedding
      });
      const decision = decideMerge(
        { contentHash, confidence: candidate.confidence, memoryType: candidate.memoryType },
        match,
        services.config.memorize.mergeSimilarity
      );
      plans.push({
        itemId: randomUUID(),
        candidate,
        contentHash,
        embedding,
        action: decision.action,
        targetId: decision.action === 'create' ? null : decision.target.id
      });
    }
    return { plans };
  }
};

export const assignCategoriesStep: MemorizeStep = {
  id: 'assign_categories',
  role: 'clustering',
  requires: ['scope', 'plans'],
  produces: ['categoryPlans'],
  capabilities: ['llm', 'store'],
  optionalCapabilities: ['embedding'],
  async run(state, { services, signal, stepId }) {
    const plans = requireState(state, 'plans', stepId).filter((plan) => plan.action !== 'reinforce');
    if (plans.length === 0) {
      return { categoryPlans: [] };
    }
    const { categories: taxonomy, categoryAssignThreshold, defaultCategory } = services.config.memorize;

    const groups = new Map<string, { name: string; itemIds: string[]; texts: string[] }>();
    for (const plan of plans) {
      const names = chooseCategories(
        plan.candidate.text,
        plan.candidate.categories,
        taxonomy,
        categoryAssignThreshold,
        defaultCategory
      );
      for (const name of names) {
        const key = name.toLowerCase();
        const group = groups.get(key) ?? { name, itemIds: [], texts: [] };
        group.itemIds.push(plan.itemId);
        group.texts.push(plan.candidate.text);
        groups.set(key, group);
      }
    }

    const existing = await services.store.list('category', scopeToFilter(state.scope));
    const categoryPlans: CategoryPlan[] = [];
    for (const group of groups.values()) {
      const current = findCategoryByName(existing, group.name);
      const description = current ? current.description : describeCategory(group.name, taxonomy);
      const previousSummary = current ? current.summary : '';
      const summary = unwrapCapability(
        await services.reasoner.summarize(
          {
            categoryName: group.name,
            description,
            items: previousSummary ? [previousSummary, ...group.texts] : group.texts,
            previousSummary,
            maxLength: services.config.evolve.summaryMaxLength
          },
          signal
        ),
        'summarize'
      );
      categoryPlans.push({
        categoryId: current ? current.id : randomUUID(),
        name: current ? current.name : group.name,
        description,
        summary,
        itemIds: group.itemIds,
        summaryEmbedding: null
      });
    }

    const vectors = await embedTexts(
      services,
      categoryPlans.map((plan) => `${plan.name}: ${plan.summary}`),
      'document',
      signal
    );
    return {
      categoryPlans: categoryPlans.map((plan, index) => ({
        ...plan,
        summaryEmbedding: vectors ? vectors[index] : null
      }))
    };
  }
};

export const updateIntentionStep: MemorizeStep = {
  id: 'update_intention',
  role: 'clustering',
  requires: ['scope', 'plans'],
  produces: ['intention'],
  capabilities: ['llm', 'store'],
  async run(state, { services, signal, stepId }) {
    const facts = requireState(state, 'plans', stepId).filter(
      (plan) => plan.action !== 'reinforce' && (plan.candidate.memoryType === 'goal' || plan.candidate.memoryType === 'behavior')
    );
    if (facts.length === 0) {
      return { intention: null };
    }
    const previous = await services.store.get('intention', state.scope, INTENTION_ID);
    const draft = unwrapCapability(
      await services.reasoner.deriveIntention(
        {
          previous: previous ? { goals: previous.goals, constraints: previous.constraints, summary: previous.summary } : null,
          facts: facts.map((plan) => ({ text: plan.candidate.text, memoryType: plan.candidate.memoryType }))
        },
        signal
      ),
      'derive intention'
    );
    return {
      intention: {
        ...draft,
        sourceItemIds: [...(previous ? previous.sourceItemIds : []), ...facts.map((plan) => plan.itemId)]
      }
    };
  }
};

function buildItem(
  plan: ItemPlan,
  resource: Resource,
  sourceText: string,
  now: Date,
  lineage: { lineageId: string; version: number } | null
): MemoryItem {
  const { candidate } = plan;
  const excerpt =
    candidate.start !== null && candidate.end !== null && candidate.end > candidate.start
      ? sourceText.slice(candidate.start, candidate.end)
      : candidate.text;
  return {
    id: plan.itemId,
    scope: resource.scope,
    resourceId: resource.id,
    lineageId: lineage ? lineage.lineageId : plan.itemId,
    version: lineage ? lineage.version : 1,
    status: 'active',
    supersededBy: null,
    memoryType: candidate.memoryType,
    text: candidate.text,
    contentHash: plan.contentHash,
    evidence: {
      resourceId: resource.id,
      start: candidate.start,
      end: candidate.end,
      page: candidate.page ?? null,
      timestampMs: candidate.timestampMs ?? null,
      excerpt
    },
    confidence: candidate.confidence,
    stable: candidate.stable,
    reinforcementCount: 0,
    lastReinforcedAt: null,
    embedding: plan.embedding,
    createdAt: now,
    updatedAt: now
  };
}

async function categoriesOf(tx: StoreTransaction, itemIds: readonly string[]): Promise<MemoryCategory[]> {
  const categoryIds = new Set<string>();
  for (const itemId of itemIds) {
    for (const link of await tx.list('categoryItem', { where: { itemId } })) {
      categoryIds.add(link.categoryId);
    }
  }
  return categoryIds.size > 0 ? tx.list('category', { ids: [...categoryIds] }) : [];
}

async function linkItem(tx: StoreTransaction, category: MemoryCategory, itemId: string, now: Date): Promise<boolean> {
  const existing = await tx.list('categoryItem', { where: { categoryId: category.id, itemId }, limit: 1 });
  if (existing.length > 0) {
    return false;
  }
  await tx.put('categoryItem', {
    id: randomUUID(),
    scope: category.scope,
    categoryId: category.id,
    itemId,
    createdAt: now,
    updatedAt: now
  });
  return true;
}

/**
 * Writes the whole memorize outcome in one transaction. Duplicate and merge
 * checks are repeated here because another run on the same scope may have
 * committed since the earlier steps looked.
 */
export const persistMemoryStep: MemorizeStep = {
  id: 'persist_memory',
  role: 'persistence',
  requires: ['scope', 'resource', 'duplicateOf', 'text', 'plans', 'categoryPlans', 'intention'],
  produces: ['result'],
  optionalCapabilities: ['vector'],
  async run(state, { services, signal, stepId }) {
    const { scope } = state;
    const resource = requireState(state, 'resource', stepId);
    const plans = requireState(state, 'plans', stepId);
    const categoryPlans = requireState(state, 'categoryPlans', stepId);
    const duplicateOf = state.duplicateOf ?? null;
    const sourceText = state.text ?? '';
    const { anchorCount } = services.config.evolve;
    const taxonomyVersion = services.tenancy.requireMeta().taxonomyVersion;

    if (!duplicateOf && services.vector) {
      for (const plan of plans) {
        if (plan.action !== 'reinforce' && plan.embedding) {
          await services.vector.upsert(scope, 'item', plan.itemId, plan.embedding);
        }
      }
      for (const plan of categoryPlans) {
        if (plan.summaryEmbedding) {
          await services.vector.upsert(scope, 'category', plan.categoryId, plan.summaryEmbedding);
        }
      }
    }

    const outcome = await services.store.transaction(scope, async (tx) => {
      const [raced] = duplicateOf ? [] : await tx.list('resource', { where: { contentHash: resource.contentHash }, limit: 1 });
      const duplicate = duplicateOf ?? raced ?? null;
      if (duplicate) {
        const items = await tx.list('item', { where: { resourceId: duplicate.id, status: 'active' } });
        const result: MemorizeResult = {
          resource: duplicate,
          items,
          categories: await categoriesOf(
            tx,
            items.map((item) => item.id)
          ),
          deduplicated: true,
          supersededResourceId: null
        };
        return { result, retired: [] };
      }

      const now = new Date();
      await tx.put('resource', resource);

      const touched: MemoryItem[] = [];
      const createdIds = new Set<string>();
      const retired: Array<{ from: string; to: string }> = [];
      for (const plan of plans) {
        const [sameHash] = await tx.list('item', { where: { contentHash: plan.contentHash, status: 'active' }, limit: 1 });
        const planned = plan.targetId ? await tx.get('item', plan.targetId) : null;
        const target = sameHash ?? (planned && planned.status === 'active' ? planned : null);
        const action = sameHash ? 'reinforce' : target ? plan.action : 'create';

        if (action === 'reinforce' && target) {
          const reinforced: MemoryItem = {
            ...target,
            reinforcementCount: target.reinforcementCount + 1,
            lastReinforcedAt: now,
            updatedAt: now
          };
          await tx.put('item', reinforced);
          touched.push(reinforced);
          continue;
        }

        if (action === 'supersede' && target) {
          await tx.put('item', { ...target, status: 'superseded', supersededBy: plan.itemId, updatedAt: now });
          const next = buildItem(plan, resource, sourceText, now, {
            lineageId: target.lineageId,
            version: target.version + 1
          });
          await tx.put('item', next);
          for (const category of await categoriesOf(tx, [target.id])) {
            await linkItem(tx, category, next.id, now);
          }
          retired.push({ from: target.id, to: next.id });
          createdIds.add(next.id);
          touched.push(next);
          continue;
        }

        const created = buildItem(plan, resource, sourceText, now, null);
        await tx.put('item', created);
        createdIds.add(created.id);
        touched.push(created);
      }

      const categories = new Map<string, MemoryCategory>();
      const existing = await tx.list('category');
      for (const plan of categoryPlans) {
        const linked = plan.itemIds.filter((id) => createdIds.has(id));
        if (linked.length === 0) continue;
        const current = findCategoryByName(existing, plan.name);
        const category: MemoryCategory = current
          ? {
              ...current,
              summary: plan.summary,
              anchorItemIds: appendAnchors(current.anchorItemIds, linked, anchorCount),
              summarizedAt: now,
              updatedAt: now
            }
          : {
              id: plan.categoryId,
              scope,
              name: plan.name,
              description: plan.description,
              summary: plan.summary,
              anchorItemIds: appendAnchors([], linked, anchorCount),
              taxonomyVersion,
              summarizedAt: now,
              createdAt: now,
              updatedAt: now
            };
        await tx.put('category', category);
        for (const itemId of linked) {
          await linkItem(tx, category, itemId, now);
        }
        categories.set(category.id, category);
      }

      if (retired.length > 0) {
        for (const category of await tx.list('category')) {
          const anchors = category.anchorItemIds.map((id) => retired.find((entry) => entry.from === id)?.to ?? id);
          if (anchors.some((id, index) => id !== category.anchorItemIds[index])) {
            const updated = { ...category, anchorItemIds: [...new Set(anchors)], updatedAt: now };
            await tx.put('category', updated);
            categories.set(updated.id, updated);
          }
        }
      }

      const intention = state.intention ?? null;
      if (intention) {
        const previous = await tx.get('intention', INTENTION_ID);
        await tx.put('intention', {
          id: INTENTION_ID,
          scope,
          goals: intention.goals,
          constraints: intention.constraints,
          summary: intention.summary,
          sourceItemIds: intention.sourceItemIds,
          createdAt: previous ? previous.createdAt : now,
          updatedAt: now
        });
      }

      const result: MemorizeResult = {
        resource,
        items: touched,
        categories: [...categories.values()],
        deduplicated: false,
        supersededResourceId: resource.supersedesId
      };
      return { result, retired };
    }, { signal });

    if (services.vector) {
      for (const { from } of outcome.retired) {
        try {
          await services.vector.delete(scope, 'item', from);
        } catch (error) {
          console.warn('[Stratum] Failed to drop superseded item vector:', from, error);
        }
      }
    }

    return { result: outcome.result };
  }
};

export function defaultMemorizeSteps(): MemorizeStep[] {
  return [
    ingestResourceStep,
    preprocessResourceStep,
    extractItemsStep,
    dedupeItemsStep,
    assignCategoriesStep,
    updateIntentionStep,
    persistMemoryStep
  ];
}
