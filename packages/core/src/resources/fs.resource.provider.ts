import * as crypto from 'node:crypto';
import { statSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ResourceId, ResourceProvider } from '@tessera/shared';
import { resolveAndValidatePath } from './path.utils.js';

/** Resources are files under a project root; ids are root-relative paths. */
export class FsResourceProvider implements ResourceProvider {
  constructor(private readonly projectRoot: string) {}

  async read(resourceId: ResourceId): Promise<string> {
    const resolved = resolveAndValidatePath(resourceId, this.projectRoot);
    try {
      return await fs.readFile(resolved, 'utf-8');
    } catch (err) {
      // A resource that does not exist yet is created by the task
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
      throw err;
    }
  }

  /** Rough context cost of a file: a unit per four bytes, 0 when it does not exist yet. */
  estimateCost(resourceId: ResourceId): number {
    const resolved = resolveAndValidatePath(resourceId, this.projectRoot);
    try {
      return Math.ceil(statSync(resolved).size / 4);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 0;
      throw err;
    }
  }

  /** Write via a temp file and rename, so readers never see a partial file. */
  async write(resourceId: ResourceId, content: string): Promise<void> {
    const resolved = resolveAndValidatePath(resourceId, this.projectRoot);
    await fs.mkdir(path.dirname(resolved), { recursive: true });

    const tmp = `${resolved}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.writeFile(tmp, content, 'utf-8');
      await fs.rename(tmp, resolved);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}
