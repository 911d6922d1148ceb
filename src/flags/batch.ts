import pLimit from 'p-limit';
import type { FlagAggregator } from './aggregate.js';
import type { EvaluationInput, EvaluationResult } from '../types.js';

export interface BatchOptions {
  concurrency: number;
  /** Called after each record, in completion order. */
  onSettled?: (done: number, total: number) => void;
}

export interface BatchSummary {
  total: number;
  badDomain: number;
  withShell: number;
  unresolvedParents: number;
}

/**
 * Evaluate records as independent tasks, at most `concurrency` at a time.
 * Results line up index-for-index with `inputs`.
 */
export async function evaluateBatch(
  aggregator: FlagAggregator,
  inputs: EvaluationInput[],
  options: BatchOptions,
): Promise<EvaluationResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency));
  let done = 0;
  return Promise.all(
    inputs.map((input) =>
      limit(async (): Promise<EvaluationResult> => {
        const flags = aggregator.evaluate(input.record, input.parent);
        done++;
        options.onSettled?.(done, inputs.length);
        return { ...input, flags };
      }),
    ),
  );
}

export function summarize(results: EvaluationResult[]): BatchSummary {
  const summary: BatchSummary = { total: results.length, badDomain: 0, withShell: 0, unresolvedParents: 0 };
  for (const r of results) {
    if (r.flags.stage === 'terminated') {
      summary.badDomain++;
      continue;
    }
    if (!r.flags.hasShell) continue;
    summary.withShell++;
    if (!r.parent || 'unresolved' in r.parent) summary.unresolvedParents++;
  }
  return summary;
}
