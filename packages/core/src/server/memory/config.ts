import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const categoryDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  description: z.string()
});

export type CategoryDefinition = z.infer<typeof categoryDefinitionSchema>;

export const DEFAULT_CATEGORIES: CategoryDefinition[] = [
  { name: 'personal_info', description: 'Personal information about the user' },
  { name: 'preferences', description: 'User preferences, likes and dislikes' },
  { name: 'relationships', description: 'Information about relationships with others' },
  { name: 'activities', description: 'Activities, hobbies, and interests' },
  { name: 'goals', description: 'Goals, aspirations, and objectives' },
  { name: 'experiences', description: 'Past experiences and events' },
  { name: 'knowledge', description: 'Knowledge, facts, and learned information' },
  { name: 'opinions', description: 'Opinions, viewpoints, and perspectives' },
  { name: 'habits', description: 'Habits, routines, and patterns' },
  { name: 'work_life', description: 'Work-related information and professional life' }
];

export const retrieverSchema = z.enum(['vector', 'keyword', 'bm25', 'hybrid']);
export type RetrieverMode = z.infer<typeof retrieverSchema>;

const engineConfigSchema = z.object({
  memorize: z
    .object({
      categories: z.array(categoryDefinitionSchema).min(1).default(DEFAULT_CATEGORIES),
      defaultCategory: z.string().default('knowledge'),
      categoryAssignThreshold: z.number().min(0).max(1).default(0.25),
      mergeSimilarity: z.number().min(0).max(1).default(0.92),
      extractionThreshold: z.number().min(0).max(1).default(0.4)
    })
    .default({}),
  retrieve: z
    .object({
      retriever: retrieverSchema.default('hybrid'),
      routeIntention: z.boolean().default(true),
      sufficiencyCheck: z.boolean().default(true),
      verify: z.boolean().default(true),
      categoryTopK: z.number().int().positive().default(3),
      itemTopK: z.number().int().positive().default(5),
      resourceTopK: z.number().int().positive().default(3),
      candidateLimit: z.number().int().positive().default(50),
      rerankLimit: z.number().int().positive().default(20),
      minScore: z.number().default(0)
    })
    .default({}),
  evolve: z
    .object({
      staleAfterDays: z.number().nonnegative().default(30),
      minConfidence: z.number().min(0).max(1).default(0.5),
      maxTargets: z.number().int().positive().default(100),
      anchorCount: z.number().int().positive().default(3),
      summaryMaxLength: z.number().int().positive().default(400)
    })
    .default({}),
  crossScope: z
    .object({
      maxScopeCombinations: z.number().int().positive().default(16),
      vectorScopeCombinations: z.number().int().positive().default(8),
      allowVectorWithWildcard: z.boolean().default(false),
      maxCandidates: z.number().int().positive().default(50),
      maxRerankCandidates: z.number().int().positive().default(20)
    })
    .default({}),
  runner: z
    .object({
      kind: z.enum(['inline', 'durable']).default('inline'),
      stepTimeoutMs: z.number().int().positive().default(30_000),
      attempts: z.number().int().positive().default(3),
      backoffMs: z.number().int().nonnegative().default(100),
      maxBackoffMs: z.number().int().nonnegative().default(2_000),
      concurrency: z.number().int().positive().default(4),
      checkpointDir: z.string().nullable().default(null)
    })
    .default({})
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

let cachedConfig: EngineConfig | null = null;

function resolveConfigPath(): string {
  return process.env.STRATUM_CONFIG || path.resolve(process.cwd(), 'config/engine.json');
}

function readConfigFile(configPath: string): unknown {
  try {
    if (fs.existsSync(configPath)) {
      return JSON.parse(fs.readFileSync(configPath, 'utf8'));
    }
  } catch (error) {
    console.warn('[Stratum] Failed to load engine config:', configPath, error);
  }
  return {};
}

function applyEnvOverrides(config: EngineConfig): EngineConfig {
  const next = structuredClone(config);
  const runner = process.env.STRATUM_RUNNER;
  if (runner === 'inline' || runner === 'durable') {
    next.runner.kind = runner;
  }
  const timeout = Number.parseInt(process.env.STRATUM_STEP_TIMEOUT_MS ?? '', 10);
  if (Number.isFinite(timeout) && timeout > 0) {
    next.runner.stepTimeoutMs = timeout;
  }
  const retriever = retrieverSchema.safeParse(process.env.STRATUM_RETRIEVER);
  if (retriever.success) {
    next.retrieve.retriever = retriever.data;
  }
  const combinations = Number.parseInt(process.env.STRATUM_MAX_SCOPE_COMBINATIONS ?? '', 10);
  if (Number.isFinite(combinations) && combinations > 0) {
    next.crossScope.maxScopeCombinations = combinations;
  }
  return next;
}

export function parseEngineConfig(input: unknown): EngineConfig {
  return engineConfigSchema.parse(input ?? {});
}

/** Engine configuration from the JSON config file plus environment overrides. Cached. */
export function loadEngineConfig(): EngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  const configPath = resolveConfigPath();
  const parsed = engineConfigSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    console.warn('[Stratum] Ignoring invalid engine config:', configPath, parsed.error.message);
  }
  cachedConfig = applyEnvOverrides(parsed.success ? parsed.data : parseEngineConfig({}));
  return cachedConfig;
}

export function resetEngineConfigCache(): void {
  cachedConfig = null;
}

export function mergeEngineConfig(base: EngineConfig, overrides: EngineConfigInput | undefined): EngineConfig {
  if (!overrides) {
    return base;
  }
  return parseEngineConfig({
    memorize: { ...base.memorize, ...overrides.memorize },
    retrieve: { ...base.retrieve, ...overrides.retrieve },
    evolve: { ...base.evolve, ...overrides.evolve },
    crossScope: { ...base.crossScope, ...overrides.crossScope },
    runner: { ...base.runner, ...overrides.runner }
  });
}
