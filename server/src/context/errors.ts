import type { FetchFailure } from './types.js';

/**
 * Nothing usable survived filtering, fetching and assembly. Kept distinct
 * from listing failures so callers can tell an empty repository from an
 * unreachable one.
 */
export class EmptyResultError extends Error {
  readonly repository: string;
  readonly candidates: number;
  readonly failures: FetchFailure[];

  constructor(repository: string, candidates: number, failures: FetchFailure[] = []) {
    super(
      candidates === 0
        ? `Repository ${repository} has no files worth summarizing.`
        : `Could not retrieve any usable file content from ${repository}.`,
    );
    this.name = 'EmptyResultError';
    this.repository = repository;
    this.candidates = candidates;
    this.failures = failures;
  }
}
