import { z } from 'zod';
import blockLists from './exclusionRules.json' with { type: 'json' };

/** 500 KB; anything larger is almost always generated or binary. */
export const DEFAULT_MAX_FILE_SIZE = 512_000;

const BlockListsSchema = z.object({
  directories: z.array(z.string().min(1)),
  suffixes: z.array(z.string().min(1)),
  filenames: z.array(z.string().min(1)),
});

export type BlockLists = z.infer<typeof BlockListsSchema>;

export interface ExclusionRules {
  directories: ReadonlySet<string>;
  /** Lower-cased; matched against the lower-cased file name. */
  suffixes: readonly string[];
  filenames: ReadonlySet<string>;
  maxFileSizeBytes: number;
}

export function createExclusionRules(
  maxFileSizeBytes = DEFAULT_MAX_FILE_SIZE,
  lists: unknown = blockLists,
): ExclusionRules {
  const parsed = BlockListsSchema.parse(lists);
  return {
    directories: new Set(parsed.directories),
    suffixes: parsed.suffixes.map((suffix) => suffix.toLowerCase()),
    filenames: new Set(parsed.filenames),
    maxFileSizeBytes,
  };
}

/**
 * Whether a tree entry is worth considering at all. Every rule is an
 * independent predicate; the first failing one short-circuits.
 */
export function keepFile(path: string, size: number, rules: ExclusionRules): boolean {
  const parts = path.split('/');
  const filename = parts[parts.length - 1] ?? '';

  for (let i = 0; i < parts.length - 1; i++) {
    const segment = parts[i];
    if (segment !== undefined && rules.directories.has(segment)) return false;
  }

  if (rules.filenames.has(filename)) return false;

  const lower = filename.toLowerCase();
  if (rules.suffixes.some((suffix) => lower.endsWith(suffix))) return false;

  return size <= rules.maxFileSizeBytes;
}
