import { FatalConfigurationError } from '../errors';
import { InvestigateOptions, InvestigationEngine } from './engine';
import { UsageLedger } from './metrics';
import type { InvestigationResult } from './types';

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results
 * keep the input order. The first rejection rejects the whole run.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new FatalConfigurationError(`concurrency must be a finite number of at least 1, got ${concurrency}`);
  }
  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: limit }, lane));
  return results;
}

export interface BatchItem {
  /** Where the case came from, e.g. its file path. */
  source: string;
  input: unknown;
}

export interface BatchEntry {
  source: string;
  result: InvestigationResult;
}

export interface BatchOptions extends Pick<InvestigateOptions, 'signal'> {
  concurrency?: number;
  ledger?: UsageLedger;
  onResult?: (entry: BatchEntry) => void;
}

export interface BatchSummary {
  entries: BatchEntry[];
  ledger: UsageLedger;
}

/** Investigates many cases on one shared engine. */
export async function investigateBatch(
  engine: InvestigationEngine,
  items: readonly BatchItem[],
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const ledger = options.ledger ?? new UsageLedger();

  const entries = await mapWithConcurrency(items, options.concurrency ?? 2, async (item) => {
    const result = await engine.investigate(item.input, { signal: options.signal });
    ledger.record(result.usage);
    const entry = { source: item.source, result };
    options.onResult?.(entry);
    return entry;
  });

  return { entries, ledger };
}
