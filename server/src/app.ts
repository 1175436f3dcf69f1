import type { IncomingMessage, ServerResponse } from 'node:http';
import { nanoid } from 'nanoid';
import type { HealthResponse } from '../../shared/types.js';
import type { SummarizeService } from './ai/summarizeService.js';
import { empty, json, markStart, processTime } from './routes/respond.js';
import { handleSummarizeRoutes } from './routes/summarize.js';

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export function createRequestHandler(service: Pick<SummarizeService, 'summarize'>): RequestHandler {
  return async (req, res) => {
    const requestId = nanoid(10);
    markStart(res);
    res.on('finish', () => {
      const elapsedMs = Math.round(Number(processTime(res) ?? '0') * 1000);
      console.log(`[http ${requestId}] ${req.method} ${req.url} ${res.statusCode} ${elapsedMs}ms`);
    });

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      return empty(res, 204);
    }

    if (req.url === '/api/health') {
      return json(res, 200, { ok: true } satisfies HealthResponse);
    }

    try {
      const handled = await handleSummarizeRoutes(req, res, service, requestId);
      if (handled !== false) return;
    } catch (err: unknown) {
      console.error(`[http ${requestId}] Summarize route error:`, err instanceof Error ? err.message : err);
      if (!res.headersSent) json(res, 500, { error: 'Internal server error' });
      return;
    }

    json(res, 404, { error: 'Not found' });
  };
}
