import dotenv from 'dotenv';
import http from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createRequestHandler } from './app.js';
import { GitHubSource } from './ai/github.js';
import { SummarizeService } from './ai/summarizeService.js';
import { createRepoSummarizer } from './ai/summarizer.js';
import { loadSettings } from './config.js';
import { ContextPipeline } from './context/pipeline.js';
import { ResultCache } from './context/resultCache.js';
import type { AssembledContext } from './context/types.js';
import type { SummarizeResponse } from '../../shared/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const isProductionRuntime = process.env.NODE_ENV === 'production' || Boolean(process.env.K_SERVICE);
if (!isProductionRuntime) {
  dotenv.config({ path: path.resolve(__dirname, '../../.env') });
  dotenv.config();
}

const settings = loadSettings();

const source = new GitHubSource({
  apiBase: settings.githubApiBase,
  token: settings.githubToken,
  timeoutMs: settings.githubTimeoutMs,
});
// One cache of each kind per process, shared by every request.
const contexts = new ResultCache<AssembledContext>(settings.cacheMaxSize);
const responses = new ResultCache<SummarizeResponse>(settings.cacheMaxSize);
const pipeline = new ContextPipeline(source, contexts, settings);
const service = new SummarizeService(pipeline, createRepoSummarizer(settings), responses);

const providerKey = settings.llmProvider === 'anthropic'
  ? { name: 'ANTHROPIC_API_KEY', value: settings.anthropicApiKey }
  : { name: 'OPENAI_API_KEY', value: settings.openaiApiKey };
if (!providerKey.value) {
  console.warn(`[summarize] ${providerKey.name} is not set; summarize requests will fail with 502`);
}

const handleRequest = createRequestHandler(service);

const server = http.createServer((req, res) => {
  handleRequest(req, res).catch((err: unknown) => {
    console.error('Unhandled request error:', err instanceof Error ? err.message : err);
  });
});

server.listen(settings.port, () => {
  console.log(`Server listening on http://localhost:${settings.port}`);
});

export { server };
