import { z } from 'zod';

function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  // Blank lines in .env arrive as empty strings; treat them as unset.
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const int = (min: number, fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  fromEnv(z.coerce.number().int().min(min).max(max).default(fallback));

export const SettingsSchema = z.object({
  PORT: int(1, 3001, 65_535),

  GITHUB_API_BASE: fromEnv(z.string().url().default('https://api.github.com')),
  GITHUB_TOKEN: fromEnv(z.string().optional()),
  GITHUB_TIMEOUT_MS: int(1, 30_000),

  LLM_PROVIDER: fromEnv(z.enum(['openai', 'anthropic']).optional()),
  LLM_TIMEOUT_MS: int(1, 60_000),
  LLM_MAX_TOKENS: int(1, 4096),

  OPENAI_API_KEY: fromEnv(z.string().optional()),
  OPENAI_BASE_URL: fromEnv(z.string().url().optional()),
  OPENAI_MODEL: fromEnv(z.string().default('gpt-4o-mini')),

  ANTHROPIC_API_KEY: fromEnv(z.string().optional()),
  ANTHROPIC_BASE_URL: fromEnv(z.string().url().optional()),
  ANTHROPIC_MODEL: fromEnv(z.string().default('claude-3-5-haiku-latest')),

  // Character budgets (not tokens; roughly 4 characters per token).
  MAX_CONTEXT_CHARS: int(0, 100_000),
  PROMPT_BUFFER_CHARS: int(0, 4_000),
  PER_FILE_MAX_CHARS: int(1, 15_000),
  CACHE_MAX_SIZE: int(0, 128),
  MAX_FILE_SIZE_BYTES: int(1, 512_000),
});

export type LlmProvider = 'openai' | 'anthropic';

export interface Settings {
  port: number;
  githubApiBase: string;
  githubToken?: string;
  githubTimeoutMs: number;
  llmProvider: LlmProvider;
  llmTimeoutMs: number;
  llmMaxTokens: number;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  anthropicApiKey?: string;
  anthropicBaseUrl?: string;
  anthropicModel: string;
  maxContextChars: number;
  promptBufferChars: number;
  perFileMaxChars: number;
  cacheMaxSize: number;
  maxFileSizeBytes: number;
}

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

/** Without LLM_PROVIDER, Anthropic is used only when it is the sole provider with a key. */
function inferProvider(openaiApiKey?: string, anthropicApiKey?: string): LlmProvider {
  return anthropicApiKey && !openaiApiKey ? 'anthropic' : 'openai';
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    githubApiBase: e.GITHUB_API_BASE.replace(/\/+$/, ''),
    githubToken: e.GITHUB_TOKEN,
    githubTimeoutMs: e.GITHUB_TIMEOUT_MS,
    llmProvider: e.LLM_PROVIDER ?? inferProvider(e.OPENAI_API_KEY, e.ANTHROPIC_API_KEY),
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    llmMaxTokens: e.LLM_MAX_TOKENS,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiBaseUrl: e.OPENAI_BASE_URL,
    openaiModel: e.OPENAI_MODEL,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    anthropicBaseUrl: e.ANTHROPIC_BASE_URL,
    anthropicModel: e.ANTHROPIC_MODEL,
    maxContextChars: e.MAX_CONTEXT_CHARS,
    promptBufferChars: e.PROMPT_BUFFER_CHARS,
    perFileMaxChars: e.PER_FILE_MAX_CHARS,
    cacheMaxSize: e.CACHE_MAX_SIZE,
    maxFileSizeBytes: e.MAX_FILE_SIZE_BYTES,
  };
}
