import type { LedgerBackend, PlanRecord } from '@tessera/shared';

/** Process-local backend, for embedding and tests. Not durable. */
export class MemoryLedgerBackend implements LedgerBackend {
  private readonly records = new Map<string, PlanRecord[]>();

  async append(record: PlanRecord): Promise<void> {
    const list = this.records.get(record.taskId) ?? [];
    list.push(structuredClone(record));
    this.records.set(record.taskId, list);
  }

  async readAll(taskId: string): Promise<PlanRecord[]> {
    return (this.records.get(taskId) ?? []).map((r) => structuredClone(r));
  }

  async listTaskIds(): Promise<string[]> {
    return [...this.records.keys()];
  }
}
