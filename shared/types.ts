// ── Summarize API ────────────────────────────────────────────

export interface SummarizeRequest {
  github_url: string;
  ref?: string;
}

export interface IncludedFile {
  path: string;
  truncated: boolean;
}

export interface SummarizeResponse {
  repository: string;
  summary: string;
  technologies: string[];
  structure: string;
  files: IncludedFile[];
  cached: boolean;
}

export interface ErrorBody {
  error: string;
}

export interface HealthResponse {
  ok: true;
}
