/**
 * Embedding Adapters
 * ==================
 *
 * Embedding generation using various providers.
 *
 * Security:
 * - API keys from options or environment only
 * - Keys never logged or included in errors
 */

import OpenAI from 'openai';
import { randomBytes } from 'node:crypto';
import { ConfigError, OperationCancelledError, ProviderError } from './errors.js';
import type { EmbedOptions, EmbeddingAdapter, EmbeddingResult, Embedding } from './types.js';

// =============================================================================
// Shared
// =============================================================================

/**
 * Check a provider response before anything downstream trusts it.
 */
function assertWellFormed(vectors: unknown[], expected: number, provider: string): asserts vectors is number[][] {
  if (vectors.length !== expected) {
    throw new ProviderError(
      'MALFORMED_RESPONSE',
      `${provider} returned ${vectors.length} embeddings for ${expected} inputs`,
      false
    );
  }

  vectors.forEach((vector, i) => {
    if (
      !Array.isArray(vector) ||
      vector.length === 0 ||
      !vector.every((x) => typeof x === 'number' && Number.isFinite(x))
    ) {
      throw new ProviderError(
        'MALFORMED_RESPONSE',
        `${provider} returned a malformed vector at position ${i}`,
        false
      );
    }
  });
}

function toEmbeddings(vectors: number[][], model: string): Embedding[] {
  return vectors.map((vector) => ({ vector, dimensions: vector.length, model }));
}

/**
 * Estimate tokens (rough: ~4 chars per token).
 */
function estimateTokens(texts: string[]): number {
  return texts.reduce((sum, t) => sum + Math.ceil(t.length / 4), 0);
}

/**
 * Map an HTTP status to a provider error.
 */
function errorForStatus(status: number, message: string): ProviderError {
  if (status === 429) {
    return new ProviderError('RATE_LIMITED', message, true, { status });
  }
  if (status === 408) {
    return new ProviderError('TIMEOUT', message, true, { status });
  }
  if (status === 401 || status === 403) {
    return new ProviderError('AUTH_ERROR', message, false, { status });
  }
  if (status >= 500) {
    return new ProviderError('SERVER_ERROR', message, true, { status });
  }
  if (status >= 400) {
    return new ProviderError('INVALID_REQUEST', message, false, { status });
  }
  return new ProviderError('UNKNOWN', message, false, { status });
}

// =============================================================================
// OpenAI Embedding Adapter
// =============================================================================

/**
 * OpenAI embedding models with known dimensions.
 */
export type OpenAIEmbeddingModel =
  | 'text-embedding-3-small'
  | 'text-embedding-3-large'
  | 'text-embedding-ada-002';

const OPENAI_DIMENSIONS: Record<OpenAIEmbeddingModel, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

function isKnownOpenAIModel(model: string): model is OpenAIEmbeddingModel {
  return Object.prototype.hasOwnProperty.call(OPENAI_DIMENSIONS, model);
}

/**
 * The slice of the OpenAI client this adapter uses.
 */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string[]; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
      usage?: { total_tokens: number };
    }>;
  };
}

/**
 * OpenAI embedding adapter options.
 */
export interface OpenAIEmbeddingOptions {
  /**
   * Model to use.
   * @default 'text-embedding-3-small'
   */
  model?: string;

  /**
   * API key (defaults to OPENAI_API_KEY env var).
   */
  api_key?: string;

  /**
   * Base URL override (for proxies).
   */
  base_url?: string;

  /**
   * Vector size. Required for models not in the known list;
   * reduces dimensions for text-embedding-3-*.
   */
  dimensions?: number;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout_ms?: number;

  /**
   * Pre-built client (tests, custom transports).
   */
  client?: OpenAIEmbeddingsClient;
}

/**
 * OpenAI embedding adapter backed by the official SDK.
 * SDK retries are disabled; wrap in a RetryingEmbeddingAdapter instead.
 */
export class OpenAIEmbeddingAdapter implements EmbeddingAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly dimensions: number;

  private readonly client: OpenAIEmbeddingsClient;
  private readonly requestDimensions: number | undefined;

  constructor(options: OpenAIEmbeddingOptions = {}) {
    const model = options.model ?? 'text-embedding-3-small';
    this.adapter_id = `openai_embed_${randomBytes(4).toString('hex')}`;
    this.model_id = model;

    if (isKnownOpenAIModel(model)) {
      this.dimensions = options.dimensions ?? OPENAI_DIMENSIONS[model];
      // Only text-embedding-3-* accept a dimensions parameter
      this.requestDimensions =
        model.startsWith('text-embedding-3-') && this.dimensions !== OPENAI_DIMENSIONS[model]
          ? this.dimensions
          : undefined;
    } else if (options.dimensions !== undefined) {
      this.dimensions = options.dimensions;
      this.requestDimensions = undefined;
    } else {
      throw new ConfigError('embedding.dimensions', `Unknown OpenAI embedding model "${model}"; set dimensions explicitly`);
    }

    if (options.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options.api_key ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigError('OPENAI_API_KEY', 'OPENAI_API_KEY environment variable not set');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: options.base_url ?? process.env.OPENAI_BASE_URL ?? null,
      timeout: options.timeout_ms ?? 60000,
      maxRetries: 0,
    });
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingResult> {
    const startTime = performance.now();

    const body: { model: string; input: string[]; dimensions?: number } = {
      model: this.model_id,
      input: texts,
    };
    if (this.requestDimensions !== undefined) {
      body.dimensions = this.requestDimensions;
    }

    let response: Awaited<ReturnType<OpenAIEmbeddingsClient['embeddings']['create']>>;
    try {
      response = await this.client.embeddings.create(body, options.signal ? { signal: options.signal } : {});
    } catch (error) {
      throw this.mapError(error);
    }

    if (!response || !Array.isArray(response.data)) {
      throw new ProviderError('MALFORMED_RESPONSE', 'OpenAI response has no data array', false);
    }

    // Sort by index to maintain order
    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    const vectors: unknown[] = sorted.map((d) => d.embedding);
    assertWellFormed(vectors, texts.length, 'OpenAI');

    return {
      embeddings: toEmbeddings(vectors, this.model_id),
      tokens_used: response.usage?.total_tokens ?? estimateTokens(texts),
      latency_ms: Math.round(performance.now() - startTime),
    };
  }

  async isReady(): Promise<boolean> {
    try {
      await this.embed(['test']);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Map SDK errors to ProviderError.
   */
  private mapError(error: unknown): ProviderError | OperationCancelledError {
    if (error instanceof OpenAI.APIUserAbortError) {
      return new OperationCancelledError('Embedding request aborted');
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderError('TIMEOUT', error.message, true, {}, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new ProviderError('NETWORK_ERROR', error.message, true, {}, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      if (status === undefined) {
        return new ProviderError('UNKNOWN', error.message, false, {}, { cause: error });
      }
      return errorForStatus(status, error.message);
    }
    if (error instanceof ProviderError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    if (message.includes('ECONNREFUSED') || message.includes('ENOTFOUND') || message.includes('ECONNRESET')) {
      return new ProviderError('NETWORK_ERROR', message, true, {}, { cause: error });
    }
    return new ProviderError('UNKNOWN', message, false, {}, { cause: error });
  }
}

// =============================================================================
// Gemini Embedding Adapter
// =============================================================================

/**
 * Gemini embedding adapter options.
 */
export interface GeminiEmbeddingOptions {
  /**
   * Model to use.
   * @default 'text-embedding-004'
   */
  model?: string;

  /**
   * API key (defaults to GEMINI_API_KEY env var).
   */
  api_key?: string;

  /**
   * Vector size reported for the model.
   * @default 768
   */
  dimensions?: number;

  /**
   * Per-request timeout in milliseconds, response body included.
   * @default 60000
   */
  timeout_ms?: number;

  /**
   * fetch implementation (tests, proxies).
   */
  fetch_impl?: typeof fetch;
}

type GeminiTaskType = 'RETRIEVAL_QUERY' | 'RETRIEVAL_DOCUMENT';

/**
 * Gemini embedding adapter over the REST batch endpoint.
 */
export class GeminiEmbeddingAdapter implements EmbeddingAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly dimensions: number;

  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: GeminiEmbeddingOptions = {}) {
    this.model_id = options.model ?? 'text-embedding-004';
    this.adapter_id = `gemini_embed_${randomBytes(4).toString('hex')}`;
    this.dimensions = options.dimensions ?? 768;
    this.fetchImpl = options.fetch_impl ?? fetch;
    this.timeoutMs = options.timeout_ms ?? 60000;

    const apiKey = options.api_key ?? process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new ConfigError('GEMINI_API_KEY', 'GEMINI_API_KEY environment variable not set');
    }
    this.apiKey = apiKey;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingResult> {
    const startTime = performance.now();
    const taskType: GeminiTaskType = options.purpose === 'query' ? 'RETRIEVAL_QUERY' : 'RETRIEVAL_DOCUMENT';
    const embeddings: Embedding[] = [];

    // Gemini accepts at most 100 requests per batch
    const batchSize = 100;
    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      embeddings.push(...(await this.embedBatch(batch, taskType, options.signal)));
    }

    return {
      embeddings,
      tokens_used: estimateTokens(texts),
      latency_ms: Math.round(performance.now() - startTime),
    };
  }

  private async embedBatch(texts: string[], taskType: GeminiTaskType, signal?: AbortSignal): Promise<Embedding[]> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model_id}:batchEmbedContents`;

    const requests = texts.map((text) => ({
      model: `models/${this.model_id}`,
      content: { parts: [{ text }] },
      taskType,
    }));

    if (signal?.aborted) {
      throw new OperationCancelledError('Embedding request aborted');
    }

    // Aborted by the caller or by the timeout, whichever comes first
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      return await this.request(url, requests, texts.length, controller.signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Embedding request aborted');
      }
      if (timedOut) {
        throw new ProviderError(
          'TIMEOUT',
          `Gemini request timed out after ${this.timeoutMs}ms`,
          true,
          { timeout_ms: this.timeoutMs },
          { cause: error }
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async request(
    url: string,
    requests: unknown[],
    expected: number,
    signal: AbortSignal
  ): Promise<Embedding[]> {
    const init: RequestInit = {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.apiKey,
      },
      body: JSON.stringify({ requests }),
      signal,
    };

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      if (signal.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError('NETWORK_ERROR', `Gemini request failed: ${message}`, true, {}, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text();
      throw errorForStatus(response.status, `Gemini embedding API error: ${response.status} ${detail}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      if (signal.aborted) throw error;
      throw new ProviderError('MALFORMED_RESPONSE', 'Gemini response is not JSON', false, {}, { cause: error });
    }

    const entries: unknown[] | undefined =
      typeof data === 'object' && data !== null && 'embeddings' in data && Array.isArray(data.embeddings)
        ? data.embeddings
        : undefined;
    if (!entries) {
      throw new ProviderError('MALFORMED_RESPONSE', 'Gemini response has no embeddings array', false);
    }

    const vectors: unknown[] = entries.map((e) =>
      typeof e === 'object' && e !== null && 'values' in e ? e.values : undefined
    );
    assertWellFormed(vectors, expected, 'Gemini');

    return toEmbeddings(vectors, this.model_id);
  }

  async isReady(): Promise<boolean> {
    try {
      await this.embed(['test']);
      return true;
    } catch {
      return false;
    }
  }
}

// =============================================================================
// Mock Embedding Adapter
// =============================================================================

/**
 * Mock embedding adapter that generates deterministic pseudo-random unit vectors.
 * Identical text always maps to the identical vector.
 */
export class MockEmbeddingAdapter implements EmbeddingAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly dimensions: number;

  constructor(dimensions: number = 256, model: string = 'mock-embedding') {
    this.adapter_id = `mock_embed_${randomBytes(4).toString('hex')}`;
    this.model_id = model;
    this.dimensions = dimensions;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingResult> {
    if (options.signal?.aborted) {
      throw new OperationCancelledError('Embedding request aborted');
    }
    const startTime = performance.now();

    return {
      embeddings: toEmbeddings(
        texts.map((text) => this.generateDeterministicVector(text)),
        this.model_id
      ),
      tokens_used: estimateTokens(texts),
      latency_ms: Math.round(performance.now() - startTime),
    };
  }

  private generateDeterministicVector(text: string): number[] {
    const vector: number[] = [];
    let hash = 0;

    for (let i = 0; i < text.length; i++) {
      hash = ((hash << 5) - hash + text.charCodeAt(i)) | 0;
    }

    for (let i = 0; i < this.dimensions; i++) {
      // Linear congruential step seeded by the text hash
      hash = (Math.imul(hash, 1103515245) + 12345) | 0;
      vector.push((hash & 0x7fffffff) / 0x7fffffff - 0.5);
    }

    const mag = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return mag === 0 ? vector : vector.map((v) => v / mag);
  }

  async isReady(): Promise<boolean> {
    return true;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Embedding provider type.
 */
export type EmbeddingProvider = 'openai' | 'gemini' | 'mock';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProvider[] = ['openai', 'gemini', 'mock'];

/**
 * Default model per provider.
 */
export const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProvider, string> = {
  openai: 'text-embedding-3-small',
  gemini: 'text-embedding-004',
  mock: 'mock-embedding',
};

/**
 * Provider-independent embedding settings.
 */
export interface EmbeddingSettings {
  provider: EmbeddingProvider;
  model: string;
  dimensions?: number;
  timeout_ms?: number;
  api_key?: string;
  base_url?: string;
}

/**
 * Create an embedding adapter.
 */
export function createEmbeddingAdapter(settings: EmbeddingSettings): EmbeddingAdapter {
  switch (settings.provider) {
    case 'openai': {
      const options: OpenAIEmbeddingOptions = { model: settings.model };
      if (settings.dimensions !== undefined) options.dimensions = settings.dimensions;
      if (settings.timeout_ms !== undefined) options.timeout_ms = settings.timeout_ms;
      if (settings.api_key !== undefined) options.api_key = settings.api_key;
      if (settings.base_url !== undefined) options.base_url = settings.base_url;
      return new OpenAIEmbeddingAdapter(options);
    }
    case 'gemini': {
      const options: GeminiEmbeddingOptions = { model: settings.model };
      if (settings.dimensions !== undefined) options.dimensions = settings.dimensions;
      if (settings.timeout_ms !== undefined) options.timeout_ms = settings.timeout_ms;
      if (settings.api_key !== undefined) options.api_key = settings.api_key;
      return new GeminiEmbeddingAdapter(options);
    }
    case 'mock':
      return new MockEmbeddingAdapter(settings.dimensions, settings.model);
  }
}
