import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { LedgerBackend, PlanRecord } from '@tessera/shared';

const EXTENSION = '.jsonl';

function isPlanRecord(value: unknown): value is PlanRecord {
  if (value === null || typeof value !== 'object') return false;
  if (!('seq' in value && 'taskId' in value && 'timestamp' in value && 'event' in value)) return false;
  return (
    typeof value.seq === 'number' &&
    typeof value.taskId === 'string' &&
    typeof value.timestamp === 'number' &&
    typeof value.event === 'object' &&
    value.event !== null
  );
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON-lines file per task under `dir`. Each append is a single
 * `appendFile` call, so a crash can at most leave a torn final line, which
 * `readAll` drops.
 */
export class FileLedgerBackend implements LedgerBackend {
  constructor(private readonly dir: string) {}

  private fileFor(taskId: string): string {
    return path.join(this.dir, `${encodeURIComponent(taskId)}${EXTENSION}`);
  }

  async append(record: PlanRecord): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.appendFile(this.fileFor(record.taskId), `${JSON.stringify(record)}\n`, 'utf-8');
  }

  async readAll(taskId: string): Promise<PlanRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.fileFor(taskId), 'utf-8');
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const lines = content.split('\n').filter((line) => line.trim() !== '');
    const records: PlanRecord[] = [];
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err) {
        // Torn final write from a crash; everything before it is intact
        if (i === lines.length - 1) break;
        throw new Error(`Corrupt ledger entry ${i + 1} for task ${taskId}`, { cause: err });
      }
      if (!isPlanRecord(parsed)) {
        throw new Error(`Malformed ledger entry ${i + 1} for task ${taskId}`);
      }
      records.push(parsed);
    }
    return records;
  }

  async listTaskIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries
      .filter((e) => e.endsWith(EXTENSION))
      .map((e) => decodeURIComponent(e.slice(0, -EXTENSION.length)))
      .sort();
  }
}
