import OpenAI from 'openai';
import { logger } from '../../config/index.js';
import { withRetry } from '../../utils/retry.js';
import {
  Embedder,
  EmbeddingVector,
  OpenAIEmbedderConfig,
  EmbeddingError
} from '../types.js';

/**
 * The part of the OpenAI client the embedder calls
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string | string[]; dimensions?: number }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
      usage?: { total_tokens: number };
    }>;
  };
}

/**
 * Rate limits, server errors and dropped connections are worth retrying
 */
export function isTransientOpenAIError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  return error instanceof OpenAI.APIError
    && error.status !== undefined
    && (error.status === 429 || error.status >= 500);
}

export class OpenAIEmbedder implements Embedder {
  private client: EmbeddingsClient;
  private config: Required<Omit<OpenAIEmbedderConfig, 'baseUrl'>> & Pick<OpenAIEmbedderConfig, 'baseUrl'>;

  constructor(config: OpenAIEmbedderConfig, client?: EmbeddingsClient) {
    this.config = {
      batchSize: 100,
      maxRetries: 3,
      retryDelayMs: 1000,
      ...config
    };

    this.client = client ?? new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      maxRetries: 0,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (!texts.length) {
      return [];
    }

    const vectors: EmbeddingVector[] = [];
    for (let start = 0; start < texts.length; start += this.config.batchSize) {
      const batch = texts.slice(start, start + this.config.batchSize);
      vectors.push(...await this.embedBatch(batch));
    }
    return vectors;
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new EmbeddingError('OpenAI returned no embedding', 'openai');
    }
    return embedding;
  }

  getModel(): string {
    return this.config.model;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.request('ping');
      return true;
    } catch (error) {
      logger.warn({ error }, 'OpenAI embedder availability check failed');
      return false;
    }
  }

  private async embedBatch(batch: string[]): Promise<EmbeddingVector[]> {
    let response: Awaited<ReturnType<EmbeddingsClient['embeddings']['create']>>;
    try {
      response = await withRetry(() => this.request(batch), {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryDelayMs,
        isRetryable: isTransientOpenAIError,
        label: 'openai-embeddings'
      });
    } catch (error) {
      logger.error({ error, textsCount: batch.length }, 'OpenAI embedding failed');
      throw new EmbeddingError(
        `OpenAI embedding failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        'openai',
        error instanceof Error ? error : undefined
      );
    }

    if (response.data.length !== batch.length) {
      throw new EmbeddingError(`OpenAI returned ${response.data.length} embeddings for ${batch.length} texts`, 'openai');
    }

    if (response.usage) {
      logger.debug({
        provider: 'openai',
        model: this.config.model,
        tokens: response.usage.total_tokens,
        texts: batch.length
      }, 'Generated embeddings');
    }

    // Items carry their input position; the list itself may not be ordered
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }

  private request(input: string | string[]) {
    return this.client.embeddings.create({
      model: this.config.model,
      input,
      dimensions: this.config.dimensions,
    });
  }
}
