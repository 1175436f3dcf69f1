import { assembleContext } from './assembler.js';
import { fetchInBatches } from './batchFetcher.js';
import { EmptyResultError } from './errors.js';
import { createExclusionRules, type ExclusionRules } from './exclusion.js';
import { repoCacheKey, type ResultCache } from './resultCache.js';
import { selectCandidates } from './selection.js';
import { createBudget, type AssembledContext, type BudgetSettings, type RepoRef, type RepoSource } from './types.js';

export interface PipelineSettings extends BudgetSettings {
  maxFileSizeBytes: number;
}

export interface PipelineMetrics {
  entriesListed: number;
  candidates: number;
  filesFetched: number;
  fetchFailures: number;
  batches: number;
  stoppedEarly: boolean;
  filesIncluded: number;
  charsUsed: number;
  phaseLatenciesMs: {
    listing: number;
    fetch: number;
    assemble: number;
  };
}

export interface PipelineResult {
  key: string;
  context: AssembledContext;
  cached: boolean;
  metrics: PipelineMetrics;
}

export interface BuildOptions {
  signal?: AbortSignal;
  requestId?: string;
}

function emptyMetrics(): PipelineMetrics {
  return {
    entriesListed: 0,
    candidates: 0,
    filesFetched: 0,
    fetchFailures: 0,
    batches: 0,
    stoppedEarly: false,
    filesIncluded: 0,
    charsUsed: 0,
    phaseLatenciesMs: { listing: 0, fetch: 0, assemble: 0 },
  };
}

export class ContextPipeline {
  private readonly source: RepoSource;
  private readonly cache: ResultCache<AssembledContext>;
  private readonly settings: PipelineSettings;
  private readonly rules: ExclusionRules;

  constructor(source: RepoSource, cache: ResultCache<AssembledContext>, settings: PipelineSettings) {
    this.source = source;
    this.cache = cache;
    this.settings = settings;
    this.rules = createExclusionRules(settings.maxFileSizeBytes);
  }

  async build(ref: RepoRef, options: BuildOptions = {}): Promise<PipelineResult> {
    const { signal } = options;
    const key = repoCacheKey(ref);
    const label = options.requestId ? `[pipeline ${options.requestId}]` : '[pipeline]';
    const metrics = emptyMetrics();

    const cachedContext = this.cache.get(key);
    if (cachedContext) {
      const { hits, misses, evictions } = this.cache.stats();
      console.log(`${label} Cache hit for ${key} (${hits} hits, ${misses} misses, ${evictions} evictions)`);
      metrics.filesIncluded = cachedContext.includedFiles.length;
      metrics.charsUsed = cachedContext.totalBytesUsed;
      return { key, context: cachedContext, cached: true, metrics };
    }

    const listingStart = Date.now();
    const entries = await this.source.listFiles(ref, signal);
    const ordered = selectCandidates(entries, this.rules);
    metrics.phaseLatenciesMs.listing = Date.now() - listingStart;
    metrics.entriesListed = entries.length;
    metrics.candidates = ordered.length;
    console.log(`${label} ${key}: ${ordered.length}/${entries.length} files kept (${metrics.phaseLatenciesMs.listing}ms)`);

    const budget = createBudget(this.settings);

    const fetchStart = Date.now();
    const report = await fetchInBatches(
      ordered,
      budget,
      (path, fetchSignal) => this.source.fetchFile(ref, path, fetchSignal),
      { signal, logLabel: options.requestId },
    );
    metrics.phaseLatenciesMs.fetch = Date.now() - fetchStart;
    metrics.filesFetched = report.files.length;
    metrics.fetchFailures = report.failures.length;
    metrics.batches = report.batches;
    metrics.stoppedEarly = report.stoppedEarly;
    console.log(
      `${label} ${key}: fetched ${report.files.length} files in ${report.batches} batches, ${report.failures.length} failed${report.stoppedEarly ? ', stopped early' : ''} (${metrics.phaseLatenciesMs.fetch}ms)`,
    );

    const assembleStart = Date.now();
    const context = assembleContext(report.files, budget);
    metrics.phaseLatenciesMs.assemble = Date.now() - assembleStart;
    metrics.filesIncluded = context.includedFiles.length;
    metrics.charsUsed = context.totalBytesUsed;

    if (context.includedFiles.length === 0) {
      throw new EmptyResultError(`${ref.owner}/${ref.repo}`, ordered.length, report.failures);
    }

    // A cancelled request never populates the cache.
    signal?.throwIfAborted();
    this.cache.put(key, context);
    console.log(`${label} ${key}: context built from ${context.includedFiles.length} files, ${context.totalBytesUsed} chars`);

    return { key, context, cached: false, metrics };
  }
}
