import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { z } from 'zod';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { AssembledContext } from '../context/types.js';

export interface RepoSummary {
  summary: string;
  technologies: string[];
  structure: string;
}

export interface SummarizeInput {
  repository: string;
  context: AssembledContext;
  signal?: AbortSignal;
}

export interface RepoSummarizer {
  summarize(input: SummarizeInput): Promise<RepoSummary>;
}

/** The slice of the OpenAI client this module calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
    };
  };
}

/** The slice of the Anthropic client this module calls. */
export interface AnthropicMessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): Promise<{ content: Array<{ type: string; text?: string }> }>;
  };
}

export interface SummarizerClients {
  openai?: ChatCompletionsClient;
  anthropic?: AnthropicMessagesClient;
}

export interface SummarizerSettings {
  llmProvider: 'openai' | 'anthropic';
  llmTimeoutMs: number;
  llmMaxTokens: number;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  anthropicApiKey?: string;
  anthropicBaseUrl?: string;
  anthropicModel: string;
}

export class SummarizerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SummarizerError';
  }
}

const RepoSummarySchema = z.object({
  summary: z.string(),
  technologies: z.array(z.string()).default([]),
  structure: z.string().default(''),
});

function buildSystemPrompt(): string {
  return [
    'You are a senior software engineer analyzing a source repository.',
    'You receive a selection of its files, most informative first; each file starts with a "=== path ===" line.',
    'Return JSON only with exactly these keys:',
    '- "summary": 3-5 sentences on what the project does, its purpose and its architecture.',
    '- "technologies": array of strings naming languages, frameworks, libraries and tools used.',
    '- "structure": a short description of the project layout and its key modules.',
    'Base every statement on the provided files. Do not wrap the JSON in markdown fences.',
  ].join('\n');
}

function buildUserPrompt(repository: string, context: AssembledContext): string {
  return [
    `Repository: ${repository}`,
    `Files included: ${context.includedFiles.length}`,
    '',
    context.blob,
  ].join('\n');
}

export function parseJsonObjectLoose(content: string): unknown {
  const trimmed = content.trim();
  if (!trimmed) return null;

  const candidates = [trimmed];

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i)?.[1];
  if (fenced) candidates.push(fenced.trim());

  const firstBrace = trimmed.indexOf('{');
  const lastBrace = trimmed.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    candidates.push(trimmed.slice(firstBrace, lastBrace + 1));
  }

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (parsed && typeof parsed === 'object') return parsed;
    } catch {
      // Try next candidate.
    }
  }

  return null;
}

export function parseRepoSummary(content: string): RepoSummary {
  const parsed = RepoSummarySchema.safeParse(parseJsonObjectLoose(content));
  if (!parsed.success) {
    throw new SummarizerError(`Model returned an invalid summary: ${content.slice(0, 200)}`);
  }
  return parsed.data;
}

function requestFailed(err: unknown, signal?: AbortSignal): unknown {
  // Caller cancellation is not a model failure.
  if (signal?.aborted) return err;
  return new SummarizerError(`Model request failed: ${err instanceof Error ? err.message : String(err)}`);
}

export class OpenAIRepoSummarizer implements RepoSummarizer {
  private readonly client: ChatCompletionsClient;
  private readonly settings: SummarizerSettings;

  constructor(client: ChatCompletionsClient, settings: SummarizerSettings) {
    this.client = client;
    this.settings = settings;
  }

  async summarize({ repository, context, signal }: SummarizeInput): Promise<RepoSummary> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: buildSystemPrompt() },
      { role: 'user', content: buildUserPrompt(repository, context) },
    ];

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.settings.openaiModel,
          temperature: 0,
          response_format: { type: 'json_object' },
          max_tokens: this.settings.llmMaxTokens,
          messages,
        },
        { signal },
      );
    } catch (err: unknown) {
      throw requestFailed(err, signal);
    }

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new SummarizerError('Model returned an empty response');
    }
    return parseRepoSummary(content);
  }
}

export class AnthropicRepoSummarizer implements RepoSummarizer {
  private readonly client: AnthropicMessagesClient;
  private readonly settings: SummarizerSettings;

  constructor(client: AnthropicMessagesClient, settings: SummarizerSettings) {
    this.client = client;
    this.settings = settings;
  }

  async summarize({ repository, context, signal }: SummarizeInput): Promise<RepoSummary> {
    let reply: Awaited<ReturnType<AnthropicMessagesClient['messages']['create']>>;
    try {
      reply = await this.client.messages.create(
        {
          model: this.settings.anthropicModel,
          max_tokens: this.settings.llmMaxTokens,
          temperature: 0,
          system: buildSystemPrompt(),
          messages: [{ role: 'user', content: buildUserPrompt(repository, context) }],
        },
        { signal },
      );
    } catch (err: unknown) {
      throw requestFailed(err, signal);
    }

    const content = reply.content
      .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
      .join('')
      .trim();
    if (!content) {
      throw new SummarizerError('Model returned an empty response');
    }
    return parseRepoSummary(content);
  }
}

function missingKey(name: string): RepoSummarizer {
  return {
    summarize: async () => {
      throw new SummarizerError(`${name} is not configured`);
    },
  };
}

/**
 * Build the summarizer for the configured provider. Without that provider's
 * API key every call fails with a SummarizerError, so the server can still
 * start and report the problem per request.
 */
export function createRepoSummarizer(settings: SummarizerSettings, clients: SummarizerClients = {}): RepoSummarizer {
  if (settings.llmProvider === 'anthropic') {
    if (clients.anthropic) return new AnthropicRepoSummarizer(clients.anthropic, settings);
    if (!settings.anthropicApiKey) return missingKey('ANTHROPIC_API_KEY');
    const anthropic = new Anthropic({
      apiKey: settings.anthropicApiKey,
      baseURL: settings.anthropicBaseUrl,
      timeout: settings.llmTimeoutMs,
    });
    return new AnthropicRepoSummarizer(anthropic, settings);
  }

  if (clients.openai) return new OpenAIRepoSummarizer(clients.openai, settings);
  if (!settings.openaiApiKey) return missingKey('OPENAI_API_KEY');
  const openai = new OpenAI({
    apiKey: settings.openaiApiKey,
    baseURL: settings.openaiBaseUrl,
    timeout: settings.llmTimeoutMs,
  });
  return new OpenAIRepoSummarizer(openai, settings);
}
