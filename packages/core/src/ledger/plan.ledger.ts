import type { LedgerBackend, PlanRecord } from '@tessera/shared';
import { LedgerUnavailableError } from '../errors.js';

/**
 * Append-only log of task/subtask transitions in front of a durable backend.
 *
 * Appends are written strictly in call order. The first backend failure makes
 * the ledger permanently unavailable: that append and every later one reject
 * with LedgerUnavailableError.
 */
export class PlanLedger {
  private tail: Promise<void> = Promise.resolve();
  private failure: LedgerUnavailableError | null = null;

  constructor(private readonly backend: LedgerBackend) {}

  get available(): boolean {
    return this.failure === null;
  }

  /** The error that made the ledger unavailable, if any. */
  get error(): LedgerUnavailableError | null {
    return this.failure;
  }

  append(record: PlanRecord): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);

    const write = this.tail.then(async () => {
      if (this.failure) throw this.failure;
      try {
        await this.backend.append(record);
      } catch (err) {
        throw this.fail(err);
      }
    });
    // Keep the queue moving; the caller observes the failure through `write`.
    this.tail = write.catch(() => undefined);
    return write;
  }

  readAll(taskId: string): Promise<PlanRecord[]> {
    return this.backend.readAll(taskId);
  }

  listTaskIds(): Promise<string[]> {
    return this.backend.listTaskIds();
  }

  /** Resolves once every append issued so far has settled, successfully or not. */
  flush(): Promise<void> {
    return this.tail;
  }

  /** Resolves once every append issued so far is durable; rejects if any failed. */
  async barrier(): Promise<void> {
    await this.tail;
    if (this.failure) throw this.failure;
  }

  private fail(err: unknown): LedgerUnavailableError {
    if (!this.failure) {
      this.failure = err instanceof LedgerUnavailableError ? err : new LedgerUnavailableError(err);
    }
    return this.failure;
  }
}
