/**
 * Core embedding system interfaces and types
 */

export type EmbeddingVector = number[];

export interface Embedder {
  /**
   * Generate embeddings for multiple texts, in input order
   */
  embed(texts: string[]): Promise<EmbeddingVector[]>;

  /**
   * Generate embedding for a single text
   */
  embedSingle(text: string): Promise<EmbeddingVector>;

  getModel(): string;

  getDimensions(): number;

  /**
   * Check if the embedder can currently serve requests
   */
  isAvailable(): Promise<boolean>;
}

export interface EmbedderConfig {
  model: string;
  dimensions: number;
  batchSize?: number;
}

export interface OpenAIEmbedderConfig extends EmbedderConfig {
  apiKey: string;
  baseUrl?: string;
  maxRetries?: number;      // Attempts per batch on rate limits and server errors
  retryDelayMs?: number;
}

export interface HashingEmbedderConfig extends EmbedderConfig {
  minTokenLength?: number;
}

export type EmbedderProvider = 'openai' | 'hashing';

export interface EmbeddingServiceConfig {
  primaryProvider: EmbedderProvider;
  fallbackProvider?: EmbedderProvider;
  openai?: OpenAIEmbedderConfig;
  hashing?: HashingEmbedderConfig;
}

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public provider: EmbedderProvider,
    public cause?: Error
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}
