/**
 * GitHub REST client: recursive tree listing and raw file contents.
 */

import { z } from 'zod';
import type { FileEntry, RepoRef, RepoSource } from '../context/types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const USER_AGENT = 'repo-summarizer';

export interface ParsedGitHubUrl {
  owner: string;
  repo: string;
  ref?: string;
}

export interface GitHubSourceOptions {
  apiBase: string;
  token?: string;
  timeoutMs?: number;
}

export class GitHubError extends Error {
  status: number;
  constructor(message: string, status: number) {
    super(message);
    this.name = 'GitHubError';
    this.status = status;
  }
}

const TreeResponseSchema = z.object({
  tree: z
    .array(z.object({
      path: z.string(),
      type: z.string(),
      size: z.number().optional(),
    }))
    .default([]),
  truncated: z.boolean().optional(),
});

const GITHUB_URL_RE = /^(?:https?:\/\/)?(?:www\.)?github\.com\/([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?(?:\/tree\/(\S+?))?\/?$/;

/**
 * Parse a GitHub repository URL.
 * Accepts:
 *   github.com/owner/repo
 *   https://github.com/owner/repo.git
 *   https://github.com/owner/repo/tree/branch
 *   https://github.com/owner/repo/tree/feature/nested-branch
 *
 * Everything after /tree/ is the ref; branch names may contain slashes.
 */
export function parseGitHubUrl(input: string): ParsedGitHubUrl | null {
  const match = input.trim().match(GITHUB_URL_RE);
  if (!match) return null;

  const [, owner, repo, ref] = match;
  if (!owner || !repo) return null;
  if (!ref) return { owner, repo };
  try {
    return { owner, repo, ref: decodeURIComponent(ref) };
  } catch {
    return null;
  }
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

const CONTROL_CHARS_RE = /[\x00-\x08\x0E-\x1F]/g;

export function isLikelyBinary(content: string): boolean {
  if (!content) return false;
  if (content.includes('\u0000')) return true;
  const controls = content.match(CONTROL_CHARS_RE)?.length ?? 0;
  return controls / content.length > 0.1;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class GitHubSource implements RepoSource {
  private readonly apiBase: string;
  private readonly token?: string;
  private readonly timeoutMs: number;

  constructor(options: GitHubSourceOptions) {
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async listFiles(ref: RepoRef, signal?: AbortSignal): Promise<FileEntry[]> {
    const treeRef = encodeURIComponent(ref.ref ?? 'HEAD');
    const res = await this.request(
      `/repos/${ref.owner}/${ref.repo}/git/trees/${treeRef}?recursive=1`,
      'application/vnd.github+json',
      signal,
    );

    const parsed = TreeResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new GitHubError('GitHub returned an unexpected tree listing.', 502);
    }
    if (parsed.data.truncated) {
      console.warn(`[github] Tree listing for ${ref.owner}/${ref.repo} was truncated by GitHub`);
    }

    return parsed.data.tree
      .filter((node) => node.type === 'blob')
      .map((node) => ({ path: node.path, size: node.size ?? 0 }));
  }

  async fetchFile(ref: RepoRef, path: string, signal?: AbortSignal): Promise<string> {
    const query = ref.ref ? `?ref=${encodeURIComponent(ref.ref)}` : '';
    const res = await this.request(
      `/repos/${ref.owner}/${ref.repo}/contents/${encodePath(path)}${query}`,
      'application/vnd.github.raw',
      signal,
    );

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(await res.arrayBuffer());
    } catch (err: unknown) {
      throw new Error(`Could not decode ${path} as UTF-8: ${errorMessage(err)}`);
    }
    if (isLikelyBinary(text)) {
      throw new Error(`${path} looks like binary content`);
    }
    return text;
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': accept,
      'User-Agent': USER_AGENT,
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async request(path: string, accept: string, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    let res: Response;
    try {
      res = await fetch(`${this.apiBase}${path}`, {
        headers: this.headers(accept),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err: unknown) {
      // Caller cancellation is not an upstream failure.
      if (signal?.aborted) throw err;
      if (timeout.aborted) throw new GitHubError(`GitHub request timed out after ${this.timeoutMs}ms.`, 504);
      throw new GitHubError(`GitHub request failed: ${errorMessage(err)}`, 502);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      if (res.status === 404) throw new GitHubError('Repository or file not found, or the repository is private.', 404);
      if (res.status === 403 || res.status === 429) throw new GitHubError('GitHub API rate limit exceeded. Try again later or set GITHUB_TOKEN.', res.status);
      throw new GitHubError(`GitHub API error ${res.status}: ${body.slice(0, 200)}`, res.status);
    }
    return res;
  }
}
