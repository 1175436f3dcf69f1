import {
  contentAllowance,
  type ContentFetcher,
  type ContextBudget,
  type FetchedFile,
  type FetchFailure,
  type OrderedList,
} from './types.js';

export const FETCH_BATCH_SIZE = 10;

export interface FetchReport {
  /** Successful retrievals, in selection order. */
  files: FetchedFile[];
  failures: FetchFailure[];
  batches: number;
  /** Candidates were left undispatched because the budget was already met. */
  stoppedEarly: boolean;
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** Prefix for warning lines, e.g. a request id. */
  logLabel?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function capContent(path: string, content: string, perFileCap: number): FetchedFile {
  const capped = content.length > perFileCap;
  const text = capped ? content.slice(0, perFileCap) : content;
  return { path, content: text, truncated: false, capped, bytesUsed: text.length };
}

/**
 * Fetch candidates in order, FETCH_BATCH_SIZE at a time. A batch always runs
 * to completion; the budget check happens only between batches.
 */
export async function fetchInBatches(
  ordered: OrderedList,
  budget: ContextBudget,
  fetchContent: ContentFetcher,
  options: FetchOptions = {},
): Promise<FetchReport> {
  const { signal } = options;
  const label = options.logLabel ? `[fetch ${options.logLabel}]` : '[fetch]';
  const allowance = contentAllowance(budget);
  const files: FetchedFile[] = [];
  const failures: FetchFailure[] = [];
  let running = 0;
  let batches = 0;
  let stoppedEarly = false;

  for (let start = 0; start < ordered.length; start += FETCH_BATCH_SIZE) {
    signal?.throwIfAborted();
    if (running >= allowance) {
      stoppedEarly = true;
      break;
    }

    const batch = ordered.slice(start, start + FETCH_BATCH_SIZE);
    batches++;
    const outcomes = await Promise.allSettled(batch.map((candidate) => fetchContent(candidate.path, signal)));
    signal?.throwIfAborted();

    // allSettled keeps input order, so completion order never leaks into the result.
    outcomes.forEach((outcome, index) => {
      const path = batch[index]?.path ?? '';
      if (outcome.status === 'rejected') {
        const reason = errorMessage(outcome.reason);
        failures.push({ path, reason });
        console.warn(`${label} Failed to fetch ${path}: ${reason}`);
        return;
      }
      const file = capContent(path, outcome.value, budget.perFileCap);
      files.push(file);
      running += file.bytesUsed;
    });
  }

  return { files, failures, batches, stoppedEarly };
}
