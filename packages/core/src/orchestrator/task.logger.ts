import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Subtask, Task, TaskOutcome } from '@tessera/shared';

const LOGS_DIR = '.tessera/logs';

/** One finished task as written to disk. */
export interface TaskLog {
  task: Task;
  subtasks: Subtask[];
  outcome: TaskOutcome;
}

function sanitizeFilename(str: string): string {
  return str
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-{2,}/g, '-')
    .slice(0, 50)
    .replace(/-$/, '');
}

function isTaskLog(value: unknown): value is TaskLog {
  if (typeof value !== 'object' || value === null) return false;
  if (!('task' in value && 'subtasks' in value && 'outcome' in value)) return false;
  const { task, outcome } = value;
  return (
    typeof task === 'object' &&
    task !== null &&
    'createdAt' in task &&
    typeof task.createdAt === 'number' &&
    Array.isArray(value.subtasks) &&
    typeof outcome === 'object' &&
    outcome !== null
  );
}

export class TaskLogger {
  constructor(private readonly projectRoot: string) {}

  private logsDir(): string {
    return path.join(this.projectRoot, LOGS_DIR);
  }

  /**
   * Persist a finished task to disk as a JSON log file.
   * Filename: <ISO timestamp>_<description-slug>_<task-id-slug>.json
   */
  async saveLog(log: TaskLog): Promise<string> {
    await fs.mkdir(this.logsDir(), { recursive: true });

    const date = new Date(log.task.createdAt);
    // e.g. "2024-01-15T14-32-00"
    const iso = date
      .toISOString()
      .replace(/:/g, '-')
      .replace(/\.\d+Z$/, '');
    const slug = sanitizeFilename(log.task.description) || 'task';
    const filename = `${iso}_${slug}_${sanitizeFilename(log.task.id)}.json`;

    const file = path.join(this.logsDir(), filename);
    await fs.writeFile(file, JSON.stringify(log, null, 2), 'utf-8');
    return file;
  }

  /**
   * Load all task logs, sorted newest first.
   */
  async listLogs(): Promise<TaskLog[]> {
    const entries = await this.readLogDir();

    const logs: TaskLog[] = [];
    for (const entry of entries) {
      try {
        const parsed: unknown = JSON.parse(await fs.readFile(path.join(this.logsDir(), entry), 'utf-8'));
        if (isTaskLog(parsed)) logs.push(parsed);
      } catch {
        // Skip malformed log files
      }
    }

    logs.sort((a, b) => b.task.createdAt - a.task.createdAt);
    return logs;
  }

  /**
   * Delete old log files, keeping only the most recent `maxCount`.
   */
  async pruneOldLogs(maxCount: number): Promise<void> {
    // Sort filenames ascending (oldest first by ISO timestamp prefix)
    const entries = (await this.readLogDir()).sort();
    const toDelete = entries.slice(0, Math.max(0, entries.length - maxCount));

    for (const entry of toDelete) {
      await fs.rm(path.join(this.logsDir(), entry), { force: true });
    }
  }

  private async readLogDir(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.logsDir());
      return entries.filter((e) => e.endsWith('.json'));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
  }
}
