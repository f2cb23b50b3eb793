import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { fail, succeed, type BlobStore, type CapabilityResult } from './capabilities';

/** Reads `file://` URIs and plain paths, relative paths resolved against `root`. */
export class LocalBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string = process.cwd()) {
    this.root = root;
  }

  resolve(uri: string): string | null {
    if (uri.startsWith('file://')) {
      return fileURLToPath(uri);
    }
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(uri)) {
      return null;
    }
    return path.resolve(this.root, uri);
  }

  async read(uri: string): Promise<CapabilityResult<string>> {
    const filePath = this.resolve(uri);
    if (!filePath) {
      return fail(`Unsupported blob URI scheme: ${uri}`, false);
    }
    try {
      return succeed(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      const retryable = code === 'EMFILE' || code === 'EAGAIN' || code === 'EBUSY';
      return fail(`Failed to read ${uri}: ${error instanceof Error ? error.message : String(error)}`, retryable);
    }
  }
}
