import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { stepRecordSchema } from '../memory/models';

export const checkpointSchema = z.object({
  runId: z.string(),
  pipeline: z.string(),
  revisionId: z.string(),
  completedSteps: z.array(z.string()),
  steps: z.array(stepRecordSchema),
  degraded: z.object({ stepId: z.string(), message: z.string() }).nullable(),
  state: z.unknown(),
  updatedAt: z.string()
});

export type Checkpoint = z.infer<typeof checkpointSchema>;

/** Durable progress of a run, written after every completed stage. */
export interface CheckpointStore {
  load(runId: string): Promise<Checkpoint | null>;
  save(checkpoint: Checkpoint): Promise<void>;
  clear(runId: string): Promise<void>;
  list(): Promise<Checkpoint[]>;
}

/** JSON round trip so in-memory checkpoints behave like persisted ones. */
function roundTrip(checkpoint: Checkpoint): Checkpoint {
  return checkpointSchema.parse(JSON.parse(JSON.stringify(checkpoint)));
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, string>();

  async load(runId: string): Promise<Checkpoint | null> {
    const raw = this.checkpoints.get(runId);
    return raw ? checkpointSchema.parse(JSON.parse(raw)) : null;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.checkpoints.set(checkpoint.runId, JSON.stringify(roundTrip(checkpoint)));
  }

  async clear(runId: string): Promise<void> {
    this.checkpoints.delete(runId);
  }

  async list(): Promise<Checkpoint[]> {
    return [...this.checkpoints.values()].map((raw) => checkpointSchema.parse(JSON.parse(raw)));
  }
}

/** One JSON file per run under `directory`, replaced atomically. */
export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  private fileFor(runId: string): string {
    return path.join(this.directory, `${runId.replace(/[^\w.-]/g, '_')}.json`);
  }

  async load(runId: string): Promise<Checkpoint | null> {
    try {
      const raw = await fs.readFile(this.fileFor(runId), 'utf8');
      return checkpointSchema.parse(JSON.parse(raw));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = this.fileFor(checkpoint.runId);
    const tmp = `${target}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tmp, JSON.stringify(checkpoint, null, 2), 'utf8');
    await fs.rename(tmp, target);
  }

  async clear(runId: string): Promise<void> {
    await fs.rm(this.fileFor(runId), { force: true });
  }

  async list(): Promise<Checkpoint[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    const checkpoints: Checkpoint[] = [];
    for (const entry of entries.filter((name) => name.endsWith('.json'))) {
      const raw = await fs.readFile(path.join(this.directory, entry), 'utf8');
      checkpoints.push(checkpointSchema.parse(JSON.parse(raw)));
    }
    return checkpoints;
  }
}
