/**
 * Ollama client: generation for LLM_BACKEND=ollama and query embeddings for
 * the pgvector retrieval backend.
 */

import { type OllamaConfig } from '@/types/config';

import {
  HttpStatusError,
  ModelNotFoundError,
  RequestTimeoutError,
  ServiceConnectionError,
  VectorDimensionError,
} from './errors';
import { getProperty, postJson } from './http';
import { logger } from './logger';
import { retryWithPolicy, type RetryPolicy } from './retry';

export class OllamaClient {
  constructor(
    private config: OllamaConfig,
    private retryPolicy: RetryPolicy
  ) {}

  get host(): string {
    return this.config.host;
  }

  async ping(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * @throws {ServiceConnectionError} when the host does not answer
   * @throws {ModelNotFoundError} when one of `models` has not been pulled
   */
  async healthCheck(models: string[]): Promise<void> {
    logger.debug('Performing Ollama health check', { host: this.config.host, models });

    const isRunning = await this.ping();
    if (!isRunning) {
      throw new ServiceConnectionError('Ollama', this.config.host);
    }

    logger.healthCheck('Ollama', 'OK', { host: this.config.host });

    for (const model of models) {
      await this.checkModelAvailable(model);
    }

    logger.info('All Ollama models available', { models });
  }

  async listModels(): Promise<string[]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, this.config.timeout);

    try {
      const response = await fetch(`${this.config.host}/api/tags`, {
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HttpStatusError(`${this.config.host}/api/tags`, response.status, response.statusText);
      }

      const models = getProperty((await response.json()) as unknown, 'models');
      if (!Array.isArray(models)) {
        return [];
      }
      return models
        .map((model: unknown) => getProperty(model, 'name'))
        .filter((name): name is string => typeof name === 'string');
    } catch (error) {
      if (error instanceof HttpStatusError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new RequestTimeoutError('Ollama list models', this.config.timeout);
      }
      throw new ServiceConnectionError('Ollama', this.config.host, error instanceof Error ? error : undefined);
    } finally {
      clearTimeout(timeout);
    }
  }

  /** A bare name matches any tag, so `bge-m3` accepts `bge-m3:567m`. */
  async checkModelAvailable(modelName: string): Promise<void> {
    const models = await this.listModels();
    const available = models.some((m) => m === modelName || m.startsWith(modelName + ':'));

    if (!available) {
      throw new ModelNotFoundError(modelName, this.config.host);
    }
  }

  /**
   * Embeds a search query. The vector length must equal
   * `embedding_dimensions` or the stored vectors cannot be compared.
   */
  async generateEmbedding(text: string): Promise<number[]> {
    const { embedding_model: model, embedding_dimensions: expected } = this.config;
    const url = `${this.config.host}/api/embeddings`;

    return retryWithPolicy(
      async () => {
        const response = await postJson(url, { model, prompt: text }, this.config.timeout, 'Ollama');
        if (!response.ok) {
          throw new HttpStatusError(url, response.status, response.text);
        }

        const embedding = getProperty(response.body, 'embedding');
        if (!Array.isArray(embedding) || !embedding.every((v: unknown): v is number => typeof v === 'number')) {
          throw new HttpStatusError(url, response.status, 'Response carried no embedding');
        }
        if (embedding.length !== expected) {
          throw new VectorDimensionError(expected, embedding.length, `Embedding model ${model}`);
        }
        return embedding;
      },
      this.retryPolicy,
      `Generate embedding with ${model}`
    );
  }

  /** Non-streaming generation; a body without `response` yields the raw text. */
  async generate(system: string, prompt: string, timeoutMs?: number): Promise<{ status: number; output: string }> {
    const url = `${this.config.host}/api/generate`;
    const response = await postJson(
      url,
      { model: this.config.model, system, prompt, stream: false },
      timeoutMs ?? this.config.timeout,
      'Ollama'
    );

    const output = getProperty(response.body, 'response');
    return {
      status: response.status,
      output: typeof output === 'string' ? output.trim() : response.text,
    };
  }
}

export const createOllamaClient = (config: OllamaConfig, retryPolicy: RetryPolicy): OllamaClient => {
  return new OllamaClient(config, retryPolicy);
};
