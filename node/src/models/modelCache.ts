import pLimit from 'p-limit';
import type { ModelConfig } from '@/config/types';
import { componentLogger } from '@/services/logger';
import { OracleUnavailableError } from '@/utils/errors';
import { OpenAILLM } from './llms';
import type { CompletionOptions, ModelInfo, Oracle, OracleHandle, OracleSource } from './types';

const log = componentLogger('model');

interface CacheEntry {
  handle: OracleHandle;
  loadedAt: string;
}

export type OracleFactory = (config: ModelConfig) => OracleHandle;

const defaultFactory: OracleFactory = (config) => new OpenAILLM(config);

/**
 * Process-wide owner of the model handle. The handle is created lazily on the
 * first acquire() and torn down by release(). Every completion goes through a
 * single-slot queue, so the backend never runs two generations at once.
 */
export class ModelCache implements OracleSource {
  private entry: CacheEntry | null = null;
  private readonly loadLock = pLimit(1);
  private readonly generation = pLimit(1);
  private readonly gated: Oracle = {
    complete: (prompt, options) => this.generate(prompt, options),
  };

  constructor(
    private readonly config: ModelConfig,
    private readonly factory: OracleFactory = defaultFactory,
  ) {}

  async acquire(signal?: AbortSignal): Promise<Oracle> {
    if (this.entry) return this.gated;

    await this.loadLock(async () => {
      if (this.entry) return;
      const handle = this.factory(this.config);
      await handle.init(signal);
      this.entry = { handle, loadedAt: new Date().toISOString() };
      log.info('model:loaded', { model: this.config.model });
    });
    return this.gated;
  }

  async release(): Promise<void> {
    await this.loadLock(async () => {
      const entry = this.entry;
      if (!entry) return;
      this.entry = null;
      // wait for the in-flight generation, if any
      await this.generation(() => entry.handle.close());
      log.info('model:released', { model: this.config.model });
    });
  }

  info(): ModelInfo {
    return {
      loaded: this.entry !== null,
      model: this.config.model,
      baseURL: this.config.baseURL,
      loadedAt: this.entry?.loadedAt,
    };
  }

  private generate(prompt: string, options: CompletionOptions): Promise<string> {
    return this.generation(async () => {
      const entry = this.entry;
      if (!entry) throw new OracleUnavailableError('Model handle was released');
      return entry.handle.complete(prompt, options);
    });
  }
}

let shared: ModelCache | null = null;

export function getModelCache(config: ModelConfig): ModelCache {
  if (!shared) shared = new ModelCache(config);
  return shared;
}

export async function releaseModelCache(): Promise<void> {
  if (shared) await shared.release();
}
