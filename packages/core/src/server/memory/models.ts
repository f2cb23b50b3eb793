import { z } from 'zod';

export const scopeValueSchema = z.union([z.string(), z.number()]);
export const scopeSchema = z.record(z.string(), scopeValueSchema);

export type ScopeValue = z.infer<typeof scopeValueSchema>;
export type Scope = z.infer<typeof scopeSchema>;

export const scopeFieldSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'scope field names must be lowercase identifiers'),
  type: z.enum(['string', 'number'])
});

export type ScopeField = z.infer<typeof scopeFieldSchema>;

export const fieldSelectorSchema = z.union([
  scopeValueSchema,
  z.object({ in: z.array(scopeValueSchema).min(1) }).strict(),
  z.object({ any: z.literal(true) }).strict()
]);

export const scopeSelectorSchema = z.record(z.string(), fieldSelectorSchema);

export type FieldSelector = z.infer<typeof fieldSelectorSchema>;
export type ScopeSelector = z.infer<typeof scopeSelectorSchema>;

export const modalitySchema = z.enum(['conversation', 'document', 'image', 'audio', 'video']);
export type Modality = z.infer<typeof modalitySchema>;

export const memoryTypeSchema = z.enum(['profile', 'event', 'knowledge', 'behavior', 'goal']);
export type MemoryType = z.infer<typeof memoryTypeSchema>;

const timestamps = {
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date()
};

export const segmentSchema = z.object({
  index: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  speaker: z.string().nullable(),
  text: z.string()
});

export type Segment = z.infer<typeof segmentSchema>;

export const preprocessSchema = z.object({
  transcription: z.string().nullable(),
  caption: z.string().nullable(),
  segments: z.array(segmentSchema)
});

export type PreprocessArtifacts = z.infer<typeof preprocessSchema>;

/** Raw ingested unit. `createdAt` is the ingestion time. */
export const resourceSchema = z.object({
  id: z.string(),
  scope: scopeSchema,
  modality: modalitySchema,
  uri: z.string().nullable(),
  content: z.string().nullable(),
  sourceKey: z.string().nullable(),
  contentHash: z.string(),
  supersedesId: z.string().nullable(),
  preprocess: preprocessSchema.nullable(),
  ...timestamps
});

export type Resource = z.infer<typeof resourceSchema>;

export const evidenceSchema = z.object({
  resourceId: z.string(),
  start: z.number().int().nonnegative().nullable(),
  end: z.number().int().nonnegative().nullable(),
  page: z.number().int().nonnegative().nullable(),
  timestampMs: z.number().nonnegative().nullable(),
  excerpt: z.string()
});

export type EvidencePointer = z.infer<typeof evidenceSchema>;

export const memoryItemSchema = z.object({
  id: z.string(),
  scope: scopeSchema,
  resourceId: z.string(),
  lineageId: z.string(),
  version: z.number().int().min(1),
  status: z.enum(['active', 'superseded']),
  supersededBy: z.string().nullable(),
  memoryType: memoryTypeSchema,
  text: z.string().min(1),
  contentHash: z.string(),
  evidence: evidenceSchema,
  confidence: z.number().min(0).max(1),
  stable: z.boolean(),
  reinforcementCount: z.number().int().nonnegative(),
  lastReinforcedAt: z.coerce.date().nullable(),
  embedding: z.array(z.number()).nullable(),
  ...timestamps
});

export type MemoryItem = z.infer<typeof memoryItemSchema>;

export const memoryCategorySchema = z.object({
  id: z.string(),
  scope: scopeSchema,
  name: z.string().min(1),
  description: z.string(),
  summary: z.string(),
  anchorItemIds: z.array(z.string()),
  taxonomyVersion: z.number().int().min(1),
  summarizedAt: z.coerce.date().nullable(),
  ...timestamps
});

export type MemoryCategory = z.infer<typeof memoryCategorySchema>;

export const categoryItemSchema = z.object({
  id: z.string(),
  scope: scopeSchema,
  categoryId: z.string(),
  itemId: z.string(),
  ...timestamps
});

export type CategoryItem = z.infer<typeof categoryItemSchema>;

export const INTENTION_ID = 'current';

export const intentionSchema = z.object({
  id: z.string(),
  scope: scopeSchema,
  goals: z.array(z.string()),
  constraints: z.array(z.string()),
  summary: z.string(),
  sourceItemIds: z.array(z.string()),
  ...timestamps
});

export type Intention = z.infer<typeof intentionSchema>;

export const entitySchemas = {
  resource: resourceSchema,
  item: memoryItemSchema,
  category: memoryCategorySchema,
  categoryItem: categoryItemSchema,
  intention: intentionSchema
};

export type EntityMap = {
  resource: Resource;
  item: MemoryItem;
  category: MemoryCategory;
  categoryItem: CategoryItem;
  intention: Intention;
};

export type EntityKind = keyof EntityMap;
export type EntityOf<K extends EntityKind> = EntityMap[K];

export const ENTITY_KINDS: readonly EntityKind[] = ['resource', 'item', 'category', 'categoryItem', 'intention'];

export function parseEntity<K extends EntityKind>(kind: K, raw: unknown): EntityOf<K> {
  const parsers: { [P in EntityKind]: (value: unknown) => EntityOf<P> } = {
    resource: (value) => resourceSchema.parse(value),
    item: (value) => memoryItemSchema.parse(value),
    category: (value) => memoryCategorySchema.parse(value),
    categoryItem: (value) => categoryItemSchema.parse(value),
    intention: (value) => intentionSchema.parse(value)
  };
  const parse: (value: unknown) => EntityOf<K> = parsers[kind];
  return parse(raw);
}

export const operationSchema = z.enum(['memorize', 'retrieve', 'evolve']);
export type OperationName = z.infer<typeof operationSchema>;

export const runStatusSchema = z.enum(['running', 'succeeded', 'failed', 'degraded', 'cancelled']);
export type RunStatus = z.infer<typeof runStatusSchema>;

export const stepRecordSchema = z.object({
  stepId: z.string(),
  status: z.enum(['succeeded', 'failed', 'skipped']),
  attempts: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  error: z.string().nullable()
});

export type StepRecord = z.infer<typeof stepRecordSchema>;

export const evolveDiffSchema = z.object({
  itemsRevised: z.array(
    z.object({
      lineageId: z.string(),
      fromItemId: z.string(),
      toItemId: z.string(),
      fromVersion: z.number().int(),
      toVersion: z.number().int(),
      reason: z.string()
    })
  ),
  categoriesRefreshed: z.array(
    z.object({
      categoryId: z.string(),
      name: z.string(),
      anchorsBefore: z.array(z.string()),
      anchorsAfter: z.array(z.string()),
      summaryChanged: z.boolean()
    })
  ),
  categoriesCreated: z.array(z.string()),
  linksAdded: z.number().int().nonnegative(),
  intentionChanged: z.boolean(),
  targetsConsidered: z.number().int().nonnegative()
});

export type EvolveDiff = z.infer<typeof evolveDiffSchema>;

export const runErrorSchema = z.object({
  kind: z.string(),
  message: z.string(),
  stepId: z.string().nullable()
});

export const runLogSchema = z.object({
  runId: z.string(),
  operation: operationSchema,
  pipeline: z.string(),
  revisionId: z.string(),
  runner: z.string(),
  scope: scopeSchema.nullable(),
  selector: scopeSelectorSchema.nullable(),
  status: runStatusSchema,
  inputSummary: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])),
  steps: z.array(stepRecordSchema),
  error: runErrorSchema.nullable(),
  audit: evolveDiffSchema.nullable(),
  startedAt: z.coerce.date(),
  finishedAt: z.coerce.date().nullable()
});

export type RunLog = z.infer<typeof runLogSchema>;

export const serviceMetaSchema = z.object({
  scopeFields: z.array(scopeFieldSchema).min(1),
  schemaFingerprint: z.string(),
  schemaVersion: z.number().int().min(1),
  taxonomyVersion: z.number().int().min(1),
  pipelineRevision: z.string().nullable(),
  provisionedAt: z.coerce.date(),
  updatedAt: z.coerce.date()
});

export type ServiceMeta = z.infer<typeof serviceMetaSchema>;
