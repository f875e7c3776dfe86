/**
 * Core domain types shared by the safety layer, retrieval pipeline, planner,
 * synthesizer and orchestration loop.
 */

export type FetchStatus = 'OK' | 'BLOCKED_ROBOTS' | 'BLOCKED_URL' | 'FETCH_ERROR' | 'EMPTY';

export type DetailLevel = 'concise' | 'standard' | 'detailed';

export interface SubQuery {
  text: string;
  originIteration: number;
}

export interface Source {
  url: string;
  title: string;
  /** Empty unless fetchStatus is OK. */
  extractedText: string;
  fetchStatus: FetchStatus;
  retrievedAt: string;
  originSubquery: string;
  /** Why the source is not usable, for diagnostics. */
  detail?: string;
  /** Stable 1-based citation key, set when the source enters the corpus. */
  citationIndex?: number;
}

export interface CorpusEntry {
  index: number;
  url: string;
  title: string;
  text: string;
}

export interface CoverageSignal {
  usableSources: number;
  totalWords: number;
  distinctHosts: number;
}

export interface Citation {
  index: number;
  url: string;
  title: string;
}

export interface Report {
  query: string;
  summary: string;
  findings: string[];
  conclusion: string;
  /** Cleaned model output with only resolvable citations left in. */
  body: string;
  citations: Citation[];
  notice?: string;
  offline: boolean;
  iterations: number;
  generatedAt: string;
}

export type ResearchState =
  | 'PLANNING'
  | 'RETRIEVING'
  | 'AGGREGATING'
  | 'DECIDING'
  | 'SYNTHESIZING'
  | 'DONE';

export type FailurePhase = ResearchState | 'INITIALIZING';

export interface ResearchSession {
  id: string;
  userQuery: string;
  iterationCount: number;
  maxIterations: number;
  temperature: number;
  detailLevel: DetailLevel;
  offline: boolean;
  state: ResearchState;
  issuedQueries: SubQuery[];
  sources: Source[];
  report?: Report;
  startedAt: string;
}

export type StopReason =
  | 'max_iterations'
  | 'coverage_reached'
  | 'no_new_queries'
  | 'time_budget'
  | 'all_subqueries_failed'
  | 'offline'
  | 'calculation';

export type ProgressEvent =
  | { type: 'phase'; state: ResearchState; iteration: number }
  | { type: 'subqueries'; iteration: number; queries: string[] }
  | { type: 'source'; source: Source }
  | { type: 'coverage'; iteration: number; coverage: CoverageSignal }
  | { type: 'stop'; reason: StopReason; iteration: number }
  /** A piece of the report as the model writes it. */
  | { type: 'token'; text: string };

export type ProgressListener = (event: ProgressEvent) => void;

export type ResearchOutcome =
  | { status: 'completed'; report: Report; session: ResearchSession; stopReason: StopReason }
  | { status: 'failed'; phase: FailurePhase; reason: string; session: ResearchSession };

export interface ResearchRequest {
  query: string;
  maxIterations?: number;
  temperature?: number;
  offline?: boolean;
  detailLevel?: DetailLevel;
}
