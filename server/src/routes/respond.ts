import type { ServerResponse } from 'node:http';

const startTimes = new WeakMap<ServerResponse, bigint>();

export function markStart(res: ServerResponse): void {
  startTimes.set(res, process.hrtime.bigint());
}

/** Seconds since markStart, formatted for the X-Process-Time header. */
export function processTime(res: ServerResponse): string | undefined {
  const started = startTimes.get(res);
  if (started === undefined) return undefined;
  return (Number(process.hrtime.bigint() - started) / 1e9).toFixed(3);
}

function timingHeader(res: ServerResponse): Record<string, string> {
  const elapsed = processTime(res);
  return elapsed === undefined ? {} : { 'X-Process-Time': elapsed };
}

export function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...timingHeader(res) });
  res.end(JSON.stringify(data));
}

export function empty(res: ServerResponse, status: number): void {
  res.writeHead(status, timingHeader(res));
  res.end();
}
