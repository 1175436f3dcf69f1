/** A blob from the repository tree listing. */
export interface FileEntry {
  path: string;
  size: number;
}

export interface Candidate extends FileEntry {
  score: number;
  depth: number;
}

/** Candidates sorted ascending by (score, depth, path). */
export type OrderedList = readonly Candidate[];

export interface FetchedFile {
  path: string;
  content: string;
  /** Set only on the file that straddles the budget boundary. */
  truncated: boolean;
  /** Content was cut to the per-file cap when it was fetched. */
  capped: boolean;
  bytesUsed: number;
}

export interface ContextBudget {
  total: number;
  promptBuffer: number;
  perFileCap: number;
  used: number;
}

export interface AssembledContext {
  blob: string;
  includedFiles: FetchedFile[];
  totalBytesUsed: number;
}

export interface RepoRef {
  owner: string;
  repo: string;
  /** Branch, tag or commit. Absent means the default branch. */
  ref?: string;
}

export interface FetchFailure {
  path: string;
  reason: string;
}

export type ContentFetcher = (path: string, signal?: AbortSignal) => Promise<string>;

/** Tree provider and content fetcher for one hosting backend. */
export interface RepoSource {
  listFiles(ref: RepoRef, signal?: AbortSignal): Promise<FileEntry[]>;
  fetchFile(ref: RepoRef, path: string, signal?: AbortSignal): Promise<string>;
}

export interface BudgetSettings {
  maxContextChars: number;
  promptBufferChars: number;
  perFileMaxChars: number;
}

export function createBudget(settings: BudgetSettings): ContextBudget {
  return {
    total: settings.maxContextChars,
    promptBuffer: settings.promptBufferChars,
    perFileCap: settings.perFileMaxChars,
    used: 0,
  };
}

/** Characters available for file content; never negative. */
export function contentAllowance(budget: ContextBudget): number {
  return Math.max(0, budget.total - budget.promptBuffer);
}

export function pathDepth(path: string): number {
  let depth = 0;
  for (const ch of path) {
    if (ch === '/') depth++;
  }
  return depth;
}
