import { pathDepth } from './types.js';

/**
 * Priority scores, lower is more important. Offsets inside the
 * depth-dependent tiers are clamped so a tier never reaches the next base.
 */
export const TIER = {
  rootReadme: 0,
  rootManifest: 10,
  nestedReadme: 20,
  entryPoint: 30,
  rootFile: 40,
  source: 60,
  test: 80,
} as const;

const SHALLOW_OFFSET_MAX = 9;
const DEEP_OFFSET_MAX = 19;

const README_RE = /^readme(\.\w+)?$/i;

const MANIFEST_NAMES = new Set([
  'package.json',
  'pyproject.toml',
  'setup.py',
  'setup.cfg',
  'requirements.txt',
  'Cargo.toml',
  'go.mod',
  'Gemfile',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'composer.json',
  'Makefile',
  'CMakeLists.txt',
  'Dockerfile',
  'docker-compose.yml',
  'docker-compose.yaml',
]);

const ENTRY_POINT_RE = /^(main|app|index|server|cli|run|manage|__main__)\.(py|ts|tsx|js|jsx|mjs|cjs|go|rs|java|kt|rb|php|cs)$/i;

const TEST_NAME_MARKERS = ['test_', '_test.', '.test.', 'spec.'];
const TEST_DIRS = new Set(['test', 'tests', '__tests__', 'spec']);

export function isTestPath(path: string): boolean {
  const parts = path.toLowerCase().split('/');
  const filename = parts.pop() ?? '';
  if (parts.some((dir) => TEST_DIRS.has(dir))) return true;
  return TEST_NAME_MARKERS.some((marker) => filename.includes(marker));
}

export function scoreFile(path: string): number {
  const filename = path.split('/').pop() ?? path;
  const depth = pathDepth(path);
  const readme = README_RE.test(filename);

  if (depth === 0 && readme) return TIER.rootReadme;
  if (depth === 0 && MANIFEST_NAMES.has(filename)) return TIER.rootManifest;
  if (readme) return TIER.nestedReadme + Math.min(depth, SHALLOW_OFFSET_MAX);
  if (ENTRY_POINT_RE.test(filename)) return TIER.entryPoint + Math.min(depth, SHALLOW_OFFSET_MAX);
  if (depth === 0) return TIER.rootFile;
  if (isTestPath(path)) return TIER.test + Math.min(depth, DEEP_OFFSET_MAX);
  return TIER.source + Math.min(depth, DEEP_OFFSET_MAX);
}
