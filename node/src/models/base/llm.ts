import type { CompletionOptions, OracleHandle } from '../types';

abstract class BaseLLM<CONFIG> implements OracleHandle {
  constructor(protected config: CONFIG) {}

  /**
   * Verify the backend is reachable and serves the configured model.
   * Throws OracleUnavailableError with a diagnostic otherwise.
   */
  abstract init(signal?: AbortSignal): Promise<void>;

  /**
   * Generate a completion for a single user prompt
   * @returns The raw model text, possibly empty
   */
  abstract complete(prompt: string, options: CompletionOptions): Promise<string>;

  async close(): Promise<void> {}
}

export default BaseLLM;
