import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { evolveDiffSchema, INTENTION_ID, memoryItemSchema, scopeSchema, type MemoryCategory, type MemoryItem } from '../memory/models';
import type { EvolveDiff } from '../memory/models';
import { itemContentHash } from '../memory/merge';
import { scopeToFilter } from '../memory/scope';
import type { StoreTransaction } from '../memory/store';
import { requireState, type PipelineStep } from '../pipeline/step';
import { embedTexts, unwrapCapability, type Services } from './services';
import { chooseCategories, describeCategory, findCategoryByName, pickAnchors } from './taxonomy';

const DAY_MS = 24 * 60 * 60 * 1000;
/** Confidence drift below this is not worth a new version. */
const CONFIDENCE_EPSILON = 0.05;

export const evolveOptionsSchema = z
  .object({
    staleAfterDays: z.number().nonnegative(),
    minConfidence: z.number().min(0).max(1),
    maxTargets: z.number().int().positive()
  })
  .partial();

export type EvolveOptions = z.infer<typeof evolveOptionsSchema>;

export const evolveSettingsSchema = z.object({
  staleAfterDays: z.number().nonnegative(),
  minConfidence: z.number().min(0).max(1),
  maxTargets: z.number().int().positive(),
  anchorCount: z.number().int().positive(),
  summaryMaxLength: z.number().int().positive()
});

const targetSchema = z.object({
  item: memoryItemSchema,
  reason: z.enum(['stale', 'low_confidence'])
});

const revisionPlanSchema = z.object({
  fromItemId: z.string(),
  toItemId: z.string(),
  text: z.string(),
  confidence: z.number().min(0).max(1),
  stable: z.boolean(),
  contentHash: z.string(),
  embedding: z.array(z.number()).nullable(),
  reason: z.string()
});

export type RevisionPlan = z.infer<typeof revisionPlanSchema>;

const evolveCategoryPlanSchema = z.object({
  categoryId: z.string(),
  name: z.string(),
  description: z.string(),
  created: z.boolean(),
  anchorsBefore: z.array(z.string()),
  anchorsAfter: z.array(z.string()),
  summaryBefore: z.string(),
  summary: z.string(),
  newLinks: z.array(z.string()),
  summaryEmbedding: z.array(z.number()).nullable()
});

export type EvolveCategoryPlan = z.infer<typeof evolveCategoryPlanSchema>;

const intentionPlanSchema = z.object({
  goals: z.array(z.string()),
  constraints: z.array(z.string()),
  summary: z.string(),
  sourceItemIds: z.array(z.string()),
  changed: z.boolean()
});

const appliedSchema = z.object({
  itemsRevised: evolveDiffSchema.shape.itemsRevised,
  categoriesCreated: z.array(z.string()),
  linksAdded: z.number().int().nonnegative(),
  intentionChanged: z.boolean()
});

export const evolveStateSchema = z.object({
  scope: scopeSchema,
  settings: evolveSettingsSchema,
  startedAt: z.coerce.date(),
  targets: z.array(targetSchema).optional(),
  revisions: z.array(revisionPlanSchema).optional(),
  categoryPlans: z.array(evolveCategoryPlanSchema).optional(),
  intention: intentionPlanSchema.nullable().optional(),
  applied: appliedSchema.optional(),
  diff: evolveDiffSchema.optional()
});

export type EvolveState = z.infer<typeof evolveStateSchema>;

export const EVOLVE_INITIAL_KEYS = ['scope', 'settings', 'startedAt'] as const;

type EvolveStep = PipelineStep<EvolveState, Services>;

export const selectTargetsStep: EvolveStep = {
  id: 'select_targets',
  role: 'routing',
  requires: ['scope', 'settings', 'startedAt'],
  produces: ['targets'],
  capabilities: ['store'],
  async run(state, { services }) {
    const { settings, startedAt } = state;
    const cutoff = startedAt.getTime() - settings.staleAfterDays * DAY_MS;
    const active = await services.store.list('item', scopeToFilter(state.scope), {
      where: { status: 'active' },
      order: 'createdAt:asc'
    });
    const targets: NonNullable<EvolveState['targets']> = [];
    for (const item of active) {
      if (item.confidence < settings.minConfidence) {
        targets.push({ item, reason: 'low_confidence' });
      } else if ((item.lastReinforcedAt ?? item.updatedAt).getTime() < cutoff) {
        targets.push({ item, reason: 'stale' });
      }
    }
    return { targets: targets.slice(0, settings.maxTargets) };
  }
};

export const refreshItemsStep: EvolveStep = {
  id: 'refresh_items',
  role: 'verification',
  requires: ['targets'],
  produces: ['revisions'],
  optionalCapabilities: ['embedding'],
  async run(state, { services, signal, stepId }) {
    const targets = requireState(state, 'targets', stepId);
    const revisions: RevisionPlan[] = [];
    for (const { item, reason } of targets) {
      const revised = unwrapCapability(
        await services.reasoner.reviseItem(
          { text: item.text, memoryType: item.memoryType, confidence: item.confidence, excerpt: item.evidence.excerpt },
          signal
        ),
        'revise item'
      );
      const text = revised.text.trim();
      if (!text) continue;
      const contentHash = itemContentHash(item.memoryType, text);
      const changed =
        contentHash !== item.contentHash ||
        Math.abs(revised.confidence - item.confidence) >= CONFIDENCE_EPSILON ||
        revised.stable !== item.stable;
      if (!changed) continue;
      revisions.push({
        fromItemId: item.id,
        toItemId: randomUUID(),
        text,
        confidence: Math.min(1, Math.max(0, revised.confidence)),
        stable: revised.stable,
        contentHash,
        embedding: null,
        reason
      });
    }

    const vectors = await embedTexts(
      services,
      revisions.map((revision) => revision.text),
      'document',
      signal
    );
    return {
      revisions: revisions.map((revision, index) => ({ ...revision, embedding: vectors ? vectors[index] : null }))
    };
  }
};

/** Active items as they will read once the planned revisions land. */
async function workingItems(services: Services, state: Readonly<EvolveState>, revisions: readonly RevisionPlan[]) {
  const active = await services.store.list('item', scopeToFilter(state.scope), { where: { status: 'active' } });
  const byFrom = new Map(revisions.map((revision) => [revision.fromItemId, revision]));
  return active.map((item): { item: MemoryItem; sourceId: string } => {
    const revision = byFrom.get(item.id);
    if (!revision) {
      return { item, sourceId: item.id };
    }
    return {
      item: {
        ...item,
        id: revision.toItemId,
        text: revision.text,
        confidence: revision.confidence,
        stable: revision.stable,
        contentHash: revision.contentHash,
        updatedAt: state.startedAt
      },
      sourceId: item.id
    };
  });
}

export const reclusterCategoriesStep: EvolveStep = {
  id: 'recluster_categories',
  role: 'clustering',
  requires: ['scope', 'settings', 'startedAt', 'revisions'],
  produces: ['categoryPlans'],
  capabilities: ['llm', 'store'],
  optionalCapabilities: ['embedding'],
  async run(state, { services, signal, stepId }) {
    const { settings } = state;
    const revisions = requireState(state, 'revisions', stepId);
    const filter = scopeToFilter(state.scope);
    const working = await workingItems(services, state, revisions);
    const categories = await services.store.list('category', filter);
    const links = await services.store.list('categoryItem', filter);
    const { categories: taxonomy, categoryAssignThreshold, defaultCategory } = services.config.memorize;

    const members = new Map<string, MemoryItem[]>();
    const newLinks = new Map<string, string[]>();
    const pending = new Map<string, { name: string; description: string }>();
    for (const { item, sourceId } of working) {
      const linked = links.filter((link) => link.itemId === sourceId).map((link) => link.categoryId);
      if (linked.length > 0) {
        for (const categoryId of linked) {
          members.set(categoryId, [...(members.get(categoryId) ?? []), item]);
        }
        continue;
      }
      for (const name of chooseCategories(item.text, [], taxonomy, categoryAssignThreshold, defaultCategory)) {
        const current = findCategoryByName(categories, name);
        const key = current ? current.id : `new:${name.toLowerCase()}`;
        if (!current && !pending.has(key)) {
          pending.set(key, { name, description: describeCategory(name, taxonomy) });
        }
        members.set(key, [...(members.get(key) ?? []), item]);
        newLinks.set(key, [...(newLinks.get(key) ?? []), item.id]);
      }
    }

    const targets: Array<{ key: string; category: MemoryCategory | null; name: string; description: string }> = [
      ...categories.map((category) => ({ key: category.id, category, name: category.name, description: category.description })),
      ...[...pending.entries()].map(([key, entry]) => ({ key, category: null, ...entry }))
    ];

    const plans: EvolveCategoryPlan[] = [];
    for (const target of targets) {
      const items = members.get(target.key) ?? [];
      const ranked = pickAnchors(items, items.length);
      const ordered = ranked.flatMap((id) => items.filter((item) => item.id === id));
      const summaryBefore = target.category ? target.category.summary : '';
      const summary = unwrapCapability(
        await services.reasoner.summarize(
          {
            categoryName: target.name,
            description: target.description,
            items: ordered.map((item) => item.text),
            previousSummary: summaryBefore,
            maxLength: settings.summaryMaxLength
          },
          signal
        ),
        'summarize'
      );
      plans.push({
        categoryId: target.category ? target.category.id : randomUUID(),
        name: target.name,
        description: target.description,
        created: target.category === null,
        anchorsBefore: target.category ? target.category.anchorItemIds : [],
        anchorsAfter: ranked.slice(0, settings.anchorCount),
        summaryBefore,
        summary,
        newLinks: newLinks.get(target.key) ?? [],
        summaryEmbedding: null
      });
    }

    const changed = plans.filter((plan) => plan.created || plan.summary !== plan.summaryBefore);
    const vectors = await embedTexts(
      services,
      changed.map((plan) => `${plan.name}: ${plan.summary}`),
      'document',
      signal
    );
    return {
      categoryPlans: plans.map((plan) => {
        const index = changed.indexOf(plan);
        return { ...plan, summaryEmbedding: vectors && index >= 0 ? vectors[index] : null };
      })
    };
  }
};

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

export const adjustIntentionStep: EvolveStep = {
  id: 'adjust_intention',
  role: 'clustering',
  requires: ['scope', 'startedAt', 'revisions'],
  produces: ['intention'],
  capabilities: ['llm', 'store'],
  async run(state, { services, signal, stepId }) {
    const revisions = requireState(state, 'revisions', stepId);
    const facts = (await workingItems(services, state, revisions))
      .map(({ item }) => item)
      .filter((item) => item.memoryType === 'goal' || item.memoryType === 'behavior')
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id));
    const previous = await services.store.get('intention', state.scope, INTENTION_ID);
    if (facts.length === 0 && !previous) {
      return { intention: null };
    }

    const draft = unwrapCapability(
      await services.reasoner.deriveIntention(
        { previous: null, facts: facts.map((item) => ({ text: item.text, memoryType: item.memoryType })) },
        signal
      ),
      'derive intention'
    );
    const changed =
      !previous ||
      previous.summary !== draft.summary ||
      !sameList(previous.goals, draft.goals) ||
      !sameList(previous.constraints, draft.constraints);
    return { intention: { ...draft, sourceItemIds: facts.map((item) => item.id), changed } };
  }
};

async function copyLinks(tx: StoreTransaction, fromItemId: string, toItemId: string, now: Date): Promise<void> {
  for (const link of await tx.list('categoryItem', { where: { itemId: fromItemId } })) {
    await tx.put('categoryItem', {
      id: randomUUID(),
      scope: link.scope,
      categoryId: link.categoryId,
      itemId: toItemId,
      createdAt: now,
      updatedAt: now
    });
  }
}

export const persistEvolutionStep: EvolveStep = {
  id: 'persist_evolution',
  role: 'persistence',
  requires: ['scope', 'revisions', 'categoryPlans', 'intention'],
  produces: ['applied'],
  optionalCapabilities: ['vector'],
  async run(state, { services, signal, stepId }) {
    const { scope } = state;
    const revisions = requireState(state, 'revisions', stepId);
    const categoryPlans = requireState(state, 'categoryPlans', stepId);
    const intention = state.intention ?? null;
    const meta = services.tenancy.requireMeta();
    const nextTaxonomyVersion = meta.taxonomyVersion + 1;

    if (services.vector) {
      for (const revision of revisions) {
        if (revision.embedding) {
          await services.vector.upsert(scope, 'item', revision.toItemId, revision.embedding);
        }
      }
      for (const plan of categoryPlans) {
        if (plan.summaryEmbedding) {
          await services.vector.upsert(scope, 'category', plan.categoryId, plan.summaryEmbedding);
        }
      }
    }

    const applied = await services.store.transaction(scope, async (tx) => {
      const now = new Date();
      const itemsRevised: EvolveDiff['itemsRevised'] = [];
      const skipped = new Map<string, string>();

      for (const revision of revisions) {
        const current = await tx.get('item', revision.fromItemId);
        const [clash] = await tx.list('item', { where: { contentHash: revision.contentHash, status: 'active' }, limit: 1 });
        if (!current || current.status !== 'active' || (clash && clash.id !== current.id)) {
          skipped.set(revision.toItemId, revision.fromItemId);
          continue;
        }
        await tx.put('item', { ...current, status: 'superseded', supersededBy: revision.toItemId, updatedAt: now });
        await tx.put('item', {
          ...current,
          id: revision.toItemId,
          version: current.version + 1,
          status: 'active',
          supersededBy: null,
          text: revision.text,
          contentHash: revision.contentHash,
          confidence: revision.confidence,
          stable: revision.stable,
          embedding: revision.embedding,
          createdAt: now,
          updatedAt: now
        });
        await copyLinks(tx, current.id, revision.toItemId, now);
        itemsRevised.push({
          lineageId: current.lineageId,
          fromItemId: current.id,
          toItemId: revision.toItemId,
          fromVersion: current.version,
          toVersion: current.version + 1,
          reason: revision.reason
        });
      }

      const resolve = (id: string) => skipped.get(id) ?? id;
      const categoriesCreated: string[] = [];
      let linksAdded = 0;
      const existing = await tx.list('category');
      for (const plan of categoryPlans) {
        const current = plan.created ? findCategoryByName(existing, plan.name) : await tx.get('category', plan.categoryId);
        if (!plan.created && !current) continue;
        const anchors: string[] = [];
        for (const id of plan.anchorsAfter.map(resolve)) {
          const item = await tx.get('item', id);
          if (item && item.status === 'active' && !anchors.includes(id)) anchors.push(id);
        }

        const category: MemoryCategory = current
          ? { ...current, summary: plan.summary, anchorItemIds: anchors, summarizedAt: now, updatedAt: now }
          : {
              id: plan.categoryId,
              scope,
              name: plan.name,
              description: plan.description,
              summary: plan.summary,
              anchorItemIds: anchors,
              taxonomyVersion: nextTaxonomyVersion,
              summarizedAt: now,
              createdAt: now,
              updatedAt: now
            };
        await tx.put('category', category);
        if (!current) {
          categoriesCreated.push(category.name);
        }

        for (const itemId of plan.newLinks.map(resolve)) {
          const item = await tx.get('item', itemId);
          const [linked] = await tx.list('categoryItem', { where: { categoryId: category.id, itemId }, limit: 1 });
          if (!item || item.status !== 'active' || linked) continue;
          await tx.put('categoryItem', { id: randomUUID(), scope, categoryId: category.id, itemId, createdAt: now, updatedAt: now });
          linksAdded += 1;
        }
      }

      let intentionChanged = false;
      if (intention && intention.changed) {
        const previous = await tx.get('intention', INTENTION_ID);
        await tx.put('intention', {
          id: INTENTION_ID,
          scope,
          goals: intention.goals,
          constraints: intention.constraints,
          summary: intention.summary,
          sourceItemIds: intention.sourceItemIds.map(resolve),
          createdAt: previous ? previous.createdAt : now,
          updatedAt: now
        });
        intentionChanged = true;
      }

      return { itemsRevised, categoriesCreated, linksAdded, intentionChanged };
    }, { signal });

    if (applied.categoriesCreated.length > 0) {
      await services.tenancy.bumpTaxonomyVersion();
    }
    if (services.vector) {
      for (const revised of applied.itemsRevised) {
        try {
          await services.vector.delete(scope, 'item', revised.fromItemId);
        } catch (error) {
          console.warn('[Stratum] Failed to drop superseded item vector:', revised.fromItemId, error);
        }
      }
    }
    return { applied };
  }
};

export const emitDiffStep: EvolveStep = {
  id: 'emit_diff',
  role: 'audit',
  requires: ['targets', 'categoryPlans', 'applied'],
  produces: ['diff'],
  capabilities: [],
  run(state, { stepId }) {
    const applied = requireState(state, 'applied', stepId);
    const diff: EvolveDiff = {
      itemsRevised: applied.itemsRevised,
      categoriesRefreshed: requireState(state, 'categoryPlans', stepId)
        .filter((plan) => !plan.created)
        .map((plan) => ({
          categoryId: plan.categoryId,
          name: plan.name,
          anchorsBefore: plan.anchorsBefore,
          anchorsAfter: plan.anchorsAfter,
          summaryChanged: plan.summary !== plan.summaryBefore
        })),
      categoriesCreated: applied.categoriesCreated,
      linksAdded: applied.linksAdded,
      intentionChanged: applied.intentionChanged,
      targetsConsidered: requireState(state, 'targets', stepId).length
    };
    return { diff };
  }
};

export function defaultEvolveSteps(): EvolveStep[] {
  return [
    selectTargetsStep,
    refreshItemsStep,
    reclusterCategoriesStep,
    adjustIntentionStep,
    persistEvolutionStep,
    emitDiffStep
  ];
}
