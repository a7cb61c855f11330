import { logger, ConfigurationError } from '../config/index.js';
import {
  Embedder,
  EmbeddingVector,
  EmbeddingServiceConfig,
  EmbedderProvider,
  EmbeddingError
} from './types.js';
import { OpenAIEmbedder } from './providers/openai.js';
import { HashingEmbedder } from './providers/hashing.js';

export interface ProviderStatus {
  provider: EmbedderProvider;
  model: string;
  available: boolean;
}

/**
 * Embedder with an optional fallback provider. Constructed once and shared
 * by every consumer of the engine.
 */
export class EmbeddingService implements Embedder {
  private primaryEmbedder: Embedder | null = null;
  private fallbackEmbedder: Embedder | null = null;
  private config: EmbeddingServiceConfig;

  constructor(config: EmbeddingServiceConfig) {
    this.config = config;
  }

  /**
   * Build the providers. A primary that cannot be built is a configuration
   * failure; a fallback that cannot be built is logged and skipped.
   */
  initialize(): void {
    logger.info({
      primary: this.config.primaryProvider,
      fallback: this.config.fallbackProvider
    }, 'Initializing embedding service');

    this.primaryEmbedder = this.createEmbedder(this.config.primaryProvider);

    if (this.config.fallbackProvider) {
      try {
        this.fallbackEmbedder = this.createEmbedder(this.config.fallbackProvider);
      } catch (error) {
        logger.warn({
          error,
          provider: this.config.fallbackProvider
        }, 'Failed to initialize fallback embedder');
      }
    }

    logger.info({ model: this.getModel() }, 'Embedding service initialized');
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (!texts.length) {
      return [];
    }

    const primary = this.requirePrimary();
    let primaryError: Error | undefined;

    try {
      return await primary.embed(texts);
    } catch (error) {
      primaryError = error instanceof Error ? error : undefined;
      logger.warn({
        error,
        provider: this.config.primaryProvider,
        textsCount: texts.length
      }, 'Primary embedder failed, trying fallback');
    }

    if (this.fallbackEmbedder && this.config.fallbackProvider) {
      try {
        logger.info({
          provider: this.config.fallbackProvider,
          textsCount: texts.length
        }, 'Using fallback embedder');

        return await this.fallbackEmbedder.embed(texts);
      } catch (error) {
        logger.error({
          error,
          provider: this.config.fallbackProvider,
          textsCount: texts.length
        }, 'Fallback embedder failed');
      }
    }

    throw new EmbeddingError(
      'All embedding providers failed',
      this.config.primaryProvider,
      primaryError
    );
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new EmbeddingError('No embedding returned', this.config.primaryProvider);
    }
    return embedding;
  }

  getModel(): string {
    return this.primaryEmbedder?.getModel() ?? 'unknown';
  }

  getDimensions(): number {
    return this.primaryEmbedder?.getDimensions() ?? 0;
  }

  async isAvailable(): Promise<boolean> {
    const status = await this.getStatus();
    return status.primary.available || status.fallback?.available === true;
  }

  async getStatus(): Promise<{ primary: ProviderStatus; fallback?: ProviderStatus }> {
    const primary: ProviderStatus = {
      provider: this.config.primaryProvider,
      model: this.primaryEmbedder?.getModel() ?? 'unknown',
      available: this.primaryEmbedder ? await this.primaryEmbedder.isAvailable() : false
    };

    if (!this.fallbackEmbedder || !this.config.fallbackProvider) {
      return { primary };
    }

    return {
      primary,
      fallback: {
        provider: this.config.fallbackProvider,
        model: this.fallbackEmbedder.getModel(),
        available: await this.fallbackEmbedder.isAvailable()
      }
    };
  }

  private requirePrimary(): Embedder {
    if (!this.primaryEmbedder) {
      this.initialize();
    }
    if (!this.primaryEmbedder) {
      throw new ConfigurationError('Embedding service has no primary provider');
    }
    return this.primaryEmbedder;
  }

  private createEmbedder(provider: EmbedderProvider): Embedder {
    switch (provider) {
      case 'openai':
        if (!this.config.openai) {
          throw new ConfigurationError('OpenAI embedder requires an API key and model identifier');
        }
        return new OpenAIEmbedder(this.config.openai);

      case 'hashing':
        return new HashingEmbedder(this.config.hashing);

      default: {
        const unknownProvider: never = provider;
        throw new ConfigurationError(`Unknown embedding provider: ${String(unknownProvider)}`);
      }
    }
  }
}
