/**
 * Oracle types: the narrow text-completion interface every model backend
 * implements.
 */

export type CompletionOptions = {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
  /** When set, the completion is streamed and each text delta is passed here as it arrives. */
  onToken?: (text: string) => void;
};

/** Stateless prompt-in, text-out completion. */
export interface Oracle {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/** A loaded model backend: must be initialised before use and closed on release. */
export interface OracleHandle extends Oracle {
  init(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

/** Hands out a ready oracle; the loop only depends on this. */
export interface OracleSource {
  acquire(signal?: AbortSignal): Promise<Oracle>;
}

export type ModelInfo = {
  loaded: boolean;
  model: string;
  baseURL: string;
  loadedAt?: string;
};
