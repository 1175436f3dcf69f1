import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import type { ErrorBody, SummarizeRequest } from '../../../shared/types.js';
import { GitHubError, parseGitHubUrl } from '../ai/github.js';
import type { SummarizeService } from '../ai/summarizeService.js';
import { SummarizerError } from '../ai/summarizer.js';
import { EmptyResultError } from '../context/errors.js';
import { json } from './respond.js';

const SummarizeBodySchema = z.object({
  github_url: z.string().trim().min(1, 'github_url is required'),
  ref: z.string().trim().min(1).optional(),
}) satisfies z.ZodType<SummarizeRequest>;

function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk: string) => body += chunk);
    req.on('end', () => {
      try { resolve(JSON.parse(body || '{}')); }
      catch { resolve(null); }
    });
    req.on('error', reject);
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorStatus(err: unknown): number {
  if (err instanceof GitHubError) {
    if (err.status === 404) return 404;
    if (err.status === 403 || err.status === 429) return 429;
    return 502;
  }
  if (err instanceof EmptyResultError) return 422;
  if (err instanceof SummarizerError) return 502;
  return 500;
}

export async function handleSummarizeRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  service: Pick<SummarizeService, 'summarize'>,
  requestId: string,
): Promise<void | false> {
  const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
  if (pathname !== '/api/summarize') return false;

  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST, OPTIONS');
    return json(res, 405, { error: 'Method not allowed' } satisfies ErrorBody);
  }

  const parsed = SummarizeBodySchema.safeParse(await parseBody(req));
  if (!parsed.success) {
    const detail = parsed.error.issues[0]?.message ?? 'Invalid request body';
    return json(res, 400, { error: `Invalid request body: ${detail}` } satisfies ErrorBody);
  }

  const target = parseGitHubUrl(parsed.data.github_url);
  if (!target) {
    return json(res, 400, { error: 'github_url must look like https://github.com/owner/repo' } satisfies ErrorBody);
  }
  const ref = parsed.data.ref ?? target.ref;

  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) controller.abort();
  };
  res.on('close', onClose);

  try {
    const result = await service.summarize(
      { owner: target.owner, repo: target.repo, ...(ref ? { ref } : {}) },
      { signal: controller.signal, requestId },
    );
    return json(res, 200, result);
  } catch (err: unknown) {
    if (controller.signal.aborted) {
      console.log(`[http ${requestId}] Client disconnected, request cancelled`);
      return;
    }
    const status = errorStatus(err);
    if (status === 500) {
      console.error(`[http ${requestId}] Summarize error:`, err);
      return json(res, 500, { error: 'Internal server error' } satisfies ErrorBody);
    }
    console.warn(`[http ${requestId}] ${status}: ${errorMessage(err)}`);
    return json(res, status, { error: errorMessage(err) } satisfies ErrorBody);
  } finally {
    res.off('close', onClose);
  }
}
