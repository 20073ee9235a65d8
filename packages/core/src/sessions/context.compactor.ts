import type { CompactedContext, Compactor, WorkingContext } from '@tessera/shared';
import { compareIds } from '../graph/task.graph.builder.js';
import { estimateUnits } from './budget.monitor.js';

export function emptyContext(): WorkingContext {
  return { processed: [], facts: {}, notes: [], summary: null };
}

/**
 * Default compaction: drops per-resource notes and keeps the processed list and
 * the cross-resource facts, in a canonical order so equal input always yields
 * equal output.
 */
export class DeterministicCompactor implements Compactor {
  compact(context: Readonly<WorkingContext>): CompactedContext {
    const facts: Record<string, string> = {};
    for (const key of Object.keys(context.facts).sort(compareIds)) {
      facts[key] = context.facts[key] ?? '';
    }
    const processed = [...context.processed];
    const summary =
      `Processed ${processed.length} resource(s): ${processed.join(', ')}` +
      (Object.keys(facts).length > 0 ? `; ${Object.keys(facts).length} fact(s) retained` : '');

    const compacted: WorkingContext = { processed, facts, notes: [], summary };
    return { context: compacted, units: estimateUnits(JSON.stringify(compacted)) };
  }
}
