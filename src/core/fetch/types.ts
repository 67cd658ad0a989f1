// src/core/fetch/types.ts

export type QueryValue = string | number | boolean;

export interface DatasetDescriptor {
  readonly name: string;
  readonly primaryPath: string;
  readonly alternatePaths: readonly string[];
  readonly params?: Readonly<Record<string, QueryValue>>;
  readonly paginate: boolean;
  readonly rateLimit?: number; // Requests per second override
}

export type CandidateSource = 'primary' | 'alternate' | 'fallback';

export interface EndpointCandidate {
  baseUrl: string;
  path: string;
  source: CandidateSource;
  /** Position in the resolver's ordering, 0 = primary */
  index: number;
}

export interface PageEnvelope {
  records: unknown[];
  nextCursor?: string;
  totalItems?: number;
}

/**
 * Outcome of one HTTP call against a candidate
 */
export type FetchAttemptResult =
  | { kind: 'success'; envelope: PageEnvelope }
  | {
      kind: 'retryable';
      reason: string;
      status?: number;
      rateLimited: boolean;
      retryAfterMs?: number;
    }
  | { kind: 'fatal'; reason: string; status?: number; auth: boolean }
  | { kind: 'not_found'; reason: string };

export type RetrievalStatus =
  | 'completed'
  | 'truncated'
  | 'auth_failed'
  | 'not_found'
  | 'exhausted'
  | 'fatal';

export interface RetrievalResult {
  candidate: EndpointCandidate;
  status: RetrievalStatus;
  /** Empty unless status is completed or truncated */
  records: unknown[];
  pages: number;
  attempts: number;
  reason?: string;
}

export interface FetchOutcome {
  dataset: string;
  records: unknown[];
  provenance: CandidateSource | 'none';
  candidate?: EndpointCandidate;
  truncated: boolean;
  /** Retrieval result for every candidate tried, in order */
  attempts: RetrievalResult[];
  /** Set when an auth or fatal fault stopped the walk early */
  aborted?: RetrievalStatus;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}
