/**
 * OpenAILLM: completion oracle for any OpenAI-compatible server
 * (llama.cpp, vLLM, Ollama's /v1 endpoint or the hosted API).
 */

import OpenAI from 'openai';
import type { ModelConfig } from '@/config/types';
import { componentLogger } from '@/services/logger';
import { CancelledError, OracleUnavailableError, errorMessage } from '@/utils/errors';
import BaseLLM from '../base/llm';
import type { CompletionOptions } from '../types';

const log = componentLogger('model');

type Completion = { content: string; finishReason?: string };

function isServed(ids: string[], model: string): boolean {
  // llama.cpp reports the GGUF path as the model id
  return ids.some((id) => id === model || id.endsWith(`/${model}`));
}

class OpenAILLM extends BaseLLM<ModelConfig> {
  private client: OpenAI;

  constructor(config: ModelConfig) {
    super(config);
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async init(signal?: AbortSignal): Promise<void> {
    let ids: string[];
    try {
      const page = await this.client.models.list({ signal });
      ids = page.data.map((m) => m.id);
    } catch (err) {
      if (signal?.aborted) throw new CancelledError();
      throw new OracleUnavailableError(
        `Model server at ${this.config.baseURL} is unreachable: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (ids.length > 0 && !isServed(ids, this.config.model)) {
      throw new OracleUnavailableError(
        `Model "${this.config.model}" is not served by ${this.config.baseURL} (available: ${ids.join(', ')})`,
      );
    }
    log.info('model:ready', { model: this.config.model, baseURL: this.config.baseURL });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const startedAt = Date.now();
    try {
      const { content, finishReason } = options.onToken
        ? await this.streamCompletion(prompt, options, options.onToken)
        : await this.singleCompletion(prompt, options);
      log.debug('model:completion', {
        ms: Date.now() - startedAt,
        chars: content.length,
        streamed: options.onToken !== undefined,
        finishReason,
      });
      return content;
    } catch (err) {
      if (options.signal?.aborted) throw new CancelledError();
      throw new OracleUnavailableError(`Completion failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async singleCompletion(prompt: string, options: CompletionOptions): Promise<Completion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      },
      { signal: options.signal },
    );
    return {
      content: response.choices[0]?.message?.content ?? '',
      finishReason: response.choices[0]?.finish_reason ?? undefined,
    };
  }

  private async streamCompletion(
    prompt: string,
    options: CompletionOptions,
    onToken: (text: string) => void,
  ): Promise<Completion> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
        stream: true,
      },
      { signal: options.signal },
    );

    let content = '';
    let finishReason: string | undefined;
    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      const delta = choice?.delta?.content;
      if (delta) {
        content += delta;
        onToken(delta);
      }
      if (choice?.finish_reason) finishReason = choice.finish_reason;
    }
    return { content, finishReason };
  }
}

export default OpenAILLM;
