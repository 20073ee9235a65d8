import type { Budget } from '@tessera/shared';

export type BudgetVerdict = 'within' | 'soft' | 'hard';

/** Approximate context units for a piece of text: ~4 characters per unit. */
export function estimateUnits(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Tracks one session's context consumption against the budget thresholds.
 * The counter only grows, except when a compaction lowers it.
 */
export class BudgetMonitor {
  private consumed = 0;

  constructor(private readonly budget: Budget) {}

  get units(): number {
    return this.consumed;
  }

  /** Add the units spent on one resource and classify the new total. */
  record(units: number): BudgetVerdict {
    this.consumed += Math.max(0, units);
    return this.verdict();
  }

  /**
   * Replace the counter after a compaction. The result is never below the
   * configured baseline; anything but 'within' means the compaction failed.
   */
  afterCompaction(compactedUnits: number): BudgetVerdict {
    this.consumed = Math.max(this.budget.postCompactionBaseline, compactedUnits);
    return this.verdict();
  }

  verdict(): BudgetVerdict {
    if (this.consumed >= this.budget.hardThreshold) return 'hard';
    if (this.consumed >= this.budget.softThreshold) return 'soft';
    return 'within';
  }
}
