import path from 'node:path';

import { Command } from 'commander';
import { z } from 'zod';

import {
  FileMetadataStore,
  HashingEmbedder,
  HeuristicReasoner,
  LocalBlobStore,
  MemoryService,
  modalitySchema,
  operationSchema,
  retrieverSchema,
  type OperationResult
} from '@stratum/core';

import { parseScopeArg, parseSelectorArg } from './args';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const DEFAULT_DATA_PATH = '.stratum/memory.json';

const globalOptionsSchema = z.object({
  data: z.string().optional()
});

const memorizeOptionsSchema = z.object({
  scope: z.string(),
  content: z.string().optional(),
  uri: z.string().optional(),
  sourceKey: z.string().optional(),
  modality: modalitySchema.default('conversation')
});

const retrieveOptionsSchema = z.object({
  selector: z.string(),
  query: z.string(),
  retriever: retrieverSchema.optional(),
  limit: z.coerce.number().int().positive().optional()
});

const categoriesOptionsSchema = z.object({
  scope: z.string(),
  summary: z.boolean().default(true)
});

const evolveOptionsSchema = z.object({
  scope: z.string(),
  staleDays: z.coerce.number().nonnegative().optional(),
  minConfidence: z.coerce.number().min(0).max(1).optional()
});

const runsOptionsSchema = z.object({
  operation: operationSchema.optional(),
  limit: z.coerce.number().int().positive().default(20)
});

async function openService(program: Command): Promise<MemoryService> {
  const { data } = globalOptionsSchema.parse(program.opts());
  const dataPath = path.resolve(data ?? process.env.STRATUM_DATA ?? DEFAULT_DATA_PATH);
  return MemoryService.create({
    store: new FileMetadataStore(dataPath),
    reasoner: new HeuristicReasoner(),
    embedder: new HashingEmbedder(),
    blobs: new LocalBlobStore(path.dirname(dataPath))
  });
}

/**
 * Builds the CLI over a file-backed deployment. Each command opens the
 * service, prints the operation result as JSON and closes it again.
 */
export function buildProgram(io: CliIo): Command {
  const program = new Command();
  program
    .name('stratum')
    .description('Stratum Memory local CLI')
    .option('-d, --data <path>', 'path of the JSON data file');

  const run = async <T>(work: (service: MemoryService) => Promise<OperationResult<T>>): Promise<void> => {
    const service = await openService(program);
    try {
      const result = await work(service);
      if (result.ok) {
        io.out(JSON.stringify(result.value, null, 2));
      } else {
        io.err(JSON.stringify(result.error, null, 2));
        process.exitCode = 1;
      }
    } finally {
      await service.close();
    }
  };

  program
    .command('provision')
    .description('fix the tenancy schema, e.g. "user:string,agent:string"')
    .argument('<fields>', 'comma separated name:type pairs')
    .action(async (fields: string) => {
      await run((service) => service.provisionScopeSchema(fields));
    });

  program
    .command('memorize')
    .description('ingest content or a file into one scope')
    .requiredOption('-s, --scope <scope>', 'scope, e.g. user=alice,agent=planner')
    .option('-c, --content <text>', 'inline content')
    .option('-u, --uri <uri>', 'file path or file:// uri')
    .option('-k, --source-key <key>', 'stable source identity for re-ingestion')
    .option('-m, --modality <modality>', 'conversation | document | image | audio | video')
    .action(async (raw: unknown) => {
      const options = memorizeOptionsSchema.parse(raw);
      await run((service) =>
        service.memorize(
          parseScopeArg(options.scope),
          { content: options.content ?? null, uri: options.uri ?? null, sourceKey: options.sourceKey ?? null },
          options.modality
        )
      );
    });

  program
    .command('retrieve')
    .description('retrieve context for a query')
    .requiredOption('-s, --selector <selector>', 'selector, e.g. user=alice|bob,agent=*')
    .requiredOption('-q, --query <query>', 'query text')
    .option('-r, --retriever <mode>', 'vector | keyword | bm25 | hybrid')
    .option('-l, --limit <n>', 'number of items to return')
    .action(async (raw: unknown) => {
      const options = retrieveOptionsSchema.parse(raw);
      await run((service) =>
        service.retrieve(parseSelectorArg(options.selector), options.query, {
          retriever: options.retriever,
          itemTopK: options.limit
        })
      );
    });

  program
    .command('categories')
    .description('list the categories of a scope')
    .requiredOption('-s, --scope <scope>', 'scope')
    .option('--no-summary', 'omit category summaries')
    .action(async (raw: unknown) => {
      const options = categoriesOptionsSchema.parse(raw);
      await run((service) => service.listCategories(parseScopeArg(options.scope), { includeSummary: options.summary }));
    });

  program
    .command('evolve')
    .description('refresh stale or weak memory in a scope')
    .requiredOption('-s, --scope <scope>', 'scope')
    .option('--stale-days <days>', 'age after which an item counts as stale')
    .option('--min-confidence <value>', 'confidence below which an item is revisited')
    .action(async (raw: unknown) => {
      const options = evolveOptionsSchema.parse(raw);
      await run((service) =>
        service.evolve(parseScopeArg(options.scope), {
          staleAfterDays: options.staleDays,
          minConfidence: options.minConfidence
        })
      );
    });

  program
    .command('runs')
    .description('list recent runs')
    .option('-o, --operation <operation>', 'memorize | retrieve | evolve')
    .option('-l, --limit <n>', 'number of runs', '20')
    .action(async (raw: unknown) => {
      const options = runsOptionsSchema.parse(raw);
      await run((service) => service.listRuns({ operation: options.operation, limit: options.limit }));
    });

  return program;
}
