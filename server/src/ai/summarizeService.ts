import type { SummarizeResponse } from '../../../shared/types.js';
import type { ContextPipeline } from '../context/pipeline.js';
import { repoCacheKey, type ResultCache } from '../context/resultCache.js';
import type { RepoRef } from '../context/types.js';
import type { RepoSummarizer } from './summarizer.js';

export interface SummarizeOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export class SummarizeService {
  private readonly pipeline: ContextPipeline;
  private readonly summarizer: RepoSummarizer;
  private readonly responses: ResultCache<SummarizeResponse>;

  constructor(pipeline: ContextPipeline, summarizer: RepoSummarizer, responses: ResultCache<SummarizeResponse>) {
    this.pipeline = pipeline;
    this.summarizer = summarizer;
    this.responses = responses;
  }

  async summarize(ref: RepoRef, options: SummarizeOptions = {}): Promise<SummarizeResponse> {
    const { signal, requestId } = options;
    const repository = `${ref.owner}/${ref.repo}`;
    const key = repoCacheKey(ref);
    const label = requestId ? `[summarize ${requestId}]` : '[summarize]';

    const hit = this.responses.get(key);
    if (hit) {
      const { hits, misses } = this.responses.stats();
      console.log(`${label} Summary cache hit for ${key} (${hits} hits, ${misses} misses)`);
      return { ...hit, cached: true };
    }

    const { context } = await this.pipeline.build(ref, { signal, requestId });

    const started = Date.now();
    const summary = await this.summarizer.summarize({ repository, context, signal });
    console.log(`${label} ${repository}: summary generated in ${Date.now() - started}ms`);

    const response: SummarizeResponse = {
      repository,
      summary: summary.summary,
      technologies: summary.technologies,
      structure: summary.structure,
      files: context.includedFiles.map((file) => ({ path: file.path, truncated: file.truncated })),
      cached: false,
    };

    // A cancelled request never populates the cache.
    signal?.throwIfAborted();
    this.responses.put(key, response);
    return response;
  }
}
