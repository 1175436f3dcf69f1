import { keepFile, type ExclusionRules } from './exclusion.js';
import { scoreFile } from './scoring.js';
import { pathDepth, type Candidate, type FileEntry, type OrderedList } from './types.js';

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) return a.score - b.score;
  if (a.depth !== b.depth) return a.depth - b.depth;
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/**
 * Filter, score and order a tree listing. The sort key is total, so the
 * same listing always yields the same order.
 */
export function selectCandidates(entries: readonly FileEntry[], rules: ExclusionRules): OrderedList {
  const candidates: Candidate[] = [];
  for (const entry of entries) {
    if (!keepFile(entry.path, entry.size, rules)) continue;
    candidates.push({
      path: entry.path,
      size: entry.size,
      score: scoreFile(entry.path),
      depth: pathDepth(entry.path),
    });
  }
  return candidates.sort(compareCandidates);
}
