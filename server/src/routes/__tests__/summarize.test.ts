import { beforeEach, describe, expect, test, vi } from 'vitest';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { EventEmitter } from 'node:events';
import { createRequestHandler } from '../../app.js';
import { GitHubError } from '../../ai/github.js';
import type { SummarizeService } from '../../ai/summarizeService.js';
import { SummarizerError } from '../../ai/summarizer.js';
import { EmptyResultError } from '../../context/errors.js';
import type { SummarizeResponse } from '../../../../shared/types.js';
import { errorStatus } from '../summarize.js';

// ── Helpers ──

function createMockReq(method: string, url: string, body?: unknown): IncomingMessage {
  const emitter = new EventEmitter() as IncomingMessage;
  emitter.method = method;
  emitter.url = url;
  emitter.headers = { host: 'localhost:3001' };

  process.nextTick(() => {
    if (body !== undefined) {
      emitter.emit('data', typeof body === 'string' ? body : JSON.stringify(body));
    }
    emitter.emit('end');
  });

  return emitter;
}

function createMockRes() {
  const emitter = new EventEmitter();
  const res = Object.assign(emitter, {
    _status: 0,
    _body: null as unknown,
    _headers: {} as Record<string, string>,
    headersSent: false,
    writableEnded: false,
    statusCode: 200,
    setHeader(name: string, value: string): void {
      res._headers[name] = value;
    },
    writeHead(status: number, headers?: Record<string, string>): void {
      res._status = status;
      res.statusCode = status;
      res.headersSent = true;
      if (headers) Object.assign(res._headers, headers);
    },
    end(data?: string): void {
      res.writableEnded = true;
      if (data) {
        try {
          res._body = JSON.parse(data);
        } catch {
          res._body = data;
        }
      }
      res.emit('finish');
      res.emit('close');
    },
  });
  return res as typeof res & ServerResponse;
}

const okResponse: SummarizeResponse = {
  repository: 'acme/widgets',
  summary: 'A widget store.',
  technologies: ['TypeScript'],
  structure: 'src/ holds the server.',
  files: [{ path: 'README.md', truncated: false }],
  cached: false,
};

function mockService(impl: SummarizeService['summarize']) {
  const summarize = vi.fn(impl);
  const service: Pick<SummarizeService, 'summarize'> = { summarize };
  return { service, summarize };
}

async function call(service: Pick<SummarizeService, 'summarize'>, method: string, url: string, body?: unknown) {
  const req = createMockReq(method, url, body);
  const res = createMockRes();
  await createRequestHandler(service)(req, res);
  return res;
}

describe('summarize routes', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  test('GET /api/health', async () => {
    const { service } = mockService(async () => okResponse);
    const res = await call(service, 'GET', '/api/health');

    expect(res._status).toBe(200);
    expect(res._body).toEqual({ ok: true });
    expect(res._headers['X-Process-Time']).toMatch(/^\d+\.\d{3}$/);
  });

  test('OPTIONS answers the CORS preflight', async () => {
    const { service } = mockService(async () => okResponse);
    const res = await call(service, 'OPTIONS', '/api/summarize');

    expect(res._status).toBe(204);
    expect(res._headers['Access-Control-Allow-Origin']).toBe('*');
    expect(res._headers['Access-Control-Allow-Methods']).toBe('GET, POST, OPTIONS');
  });

  test('unknown routes are 404', async () => {
    const { service } = mockService(async () => okResponse);
    const res = await call(service, 'GET', '/api/nope');

    expect(res._status).toBe(404);
    expect(res._body).toEqual({ error: 'Not found' });
  });

  test('GET /api/summarize is not allowed', async () => {
    const { service } = mockService(async () => okResponse);
    const res = await call(service, 'GET', '/api/summarize');

    expect(res._status).toBe(405);
    expect(res._headers.Allow).toBe('POST, OPTIONS');
  });

  test('POST /api/summarize returns the summary', async () => {
    const { service, summarize } = mockService(async () => okResponse);
    const res = await call(service, 'POST', '/api/summarize', { github_url: 'https://github.com/acme/widgets' });

    expect(res._status).toBe(200);
    expect(res._body).toEqual(okResponse);
    expect(summarize).toHaveBeenCalledWith(
      { owner: 'acme', repo: 'widgets' },
      expect.objectContaining({ requestId: expect.any(String) }),
    );
  });

  test('uses the ref from the URL', async () => {
    const { service, summarize } = mockService(async () => okResponse);
    await call(service, 'POST', '/api/summarize', { github_url: 'https://github.com/acme/widgets/tree/dev' });

    expect(summarize.mock.calls[0]?.[0]).toEqual({ owner: 'acme', repo: 'widgets', ref: 'dev' });
  });

  test('accepts a branch name containing slashes', async () => {
    const { service, summarize } = mockService(async () => okResponse);
    const res = await call(service, 'POST', '/api/summarize', {
      github_url: 'https://github.com/acme/widgets/tree/feature/login',
    });

    expect(res._status).toBe(200);
    expect(summarize.mock.calls[0]?.[0]).toEqual({ owner: 'acme', repo: 'widgets', ref: 'feature/login' });
  });

  test('a ref in the body overrides the URL', async () => {
    const { service, summarize } = mockService(async () => okResponse);
    await call(service, 'POST', '/api/summarize', {
      github_url: 'https://github.com/acme/widgets/tree/dev',
      ref: 'v2.0.0',
    });

    expect(summarize.mock.calls[0]?.[0]).toEqual({ owner: 'acme', repo: 'widgets', ref: 'v2.0.0' });
  });

  test('rejects a missing github_url', async () => {
    const { service, summarize } = mockService(async () => okResponse);
    const res = await call(service, 'POST', '/api/summarize', {});

    expect(res._status).toBe(400);
    expect(summarize).not.toHaveBeenCalled();
  });

  test('rejects malformed JSON', async () => {
    const { service } = mockService(async () => okResponse);
    const res = await call(service, 'POST', '/api/summarize', '{"github_url":');

    expect(res._status).toBe(400);
  });

  test('rejects a URL that is not a GitHub repository', async () => {
    const { service } = mockService(async () => okResponse);
    const res = await call(service, 'POST', '/api/summarize', { github_url: 'https://example.com/acme/widgets' });

    expect(res._status).toBe(400);
    expect(res._body).toEqual({ error: 'github_url must look like https://github.com/owner/repo' });
  });

  test('maps service failures to status codes', async () => {
    const cases: Array<[Error, number, string]> = [
      [new GitHubError('Repository or file not found, or the repository is private.', 404), 404, 'Repository or file not found, or the repository is private.'],
      [new GitHubError('GitHub API rate limit exceeded. Try again later or set GITHUB_TOKEN.', 403), 429, 'GitHub API rate limit exceeded. Try again later or set GITHUB_TOKEN.'],
      [new GitHubError('GitHub API error 500: oops', 500), 502, 'GitHub API error 500: oops'],
      [new EmptyResultError('acme/widgets', 0), 422, 'Repository acme/widgets has no files worth summarizing.'],
      [new SummarizerError('Model returned an empty response'), 502, 'Model returned an empty response'],
      [new Error('secret internals'), 500, 'Internal server error'],
    ];

    for (const [error, status, message] of cases) {
      const { service } = mockService(async () => { throw error; });
      const res = await call(service, 'POST', '/api/summarize', { github_url: 'github.com/acme/widgets' });
      expect(res._status).toBe(status);
      expect(res._body).toEqual({ error: message });
    }
  });

  test('a client disconnect aborts the request signal', async () => {
    let seen: AbortSignal | undefined;
    const req = createMockReq('POST', '/api/summarize', { github_url: 'github.com/acme/widgets' });
    const res = createMockRes();
    const { service } = mockService(async (_ref, options) => {
      seen = options?.signal;
      res.emit('close');
      throw new Error('aborted');
    });

    await createRequestHandler(service)(req, res);

    expect(seen?.aborted).toBe(true);
    expect(res._status).toBe(0);
  });
});

describe('errorStatus', () => {
  test('passes GitHub 429 through as 429', () => {
    expect(errorStatus(new GitHubError('slow down', 429))).toBe(429);
  });

  test('timeouts are upstream failures', () => {
    expect(errorStatus(new GitHubError('timed out', 504))).toBe(502);
  });

  test('non-errors are internal', () => {
    expect(errorStatus('weird')).toBe(500);
  });
});
