/**
 * RAG Retriever
 * =============
 *
 * Top-K cosine retrieval over a loaded index.
 *
 * Exact brute-force scan, O(records × dimensions) per query.
 */

import { randomBytes } from 'node:crypto';
import type { MetricsCollector } from '../infra/metrics.js';
import {
  ConfigError,
  IndexMismatchError,
  OperationCancelledError,
  ProviderError,
  toProviderError,
} from './errors.js';
import { cosineSimilarity } from './similarity.js';
import type {
  ChunkRecord,
  DocumentType,
  EmbeddingAdapter,
  EmbeddingResult,
  RagIndex,
  RetrievedChunk,
  SearchQuery,
  SearchResponse,
} from './types.js';

// =============================================================================
// Ranking
// =============================================================================

/**
 * Rank records against a query vector.
 * Descending similarity; equal scores keep index order. Records with zero
 * magnitude have no defined angle and are left out.
 */
export function rankRecords(
  records: readonly ChunkRecord[],
  queryVector: readonly number[],
  k: number,
  minSimilarity?: number
): RetrievedChunk[] {
  const scored: Array<{ record: ChunkRecord; similarity: number }> = [];

  for (const record of records) {
    const similarity = cosineSimilarity(queryVector, record.vector);
    if (similarity === null) continue;
    if (minSimilarity !== undefined && similarity < minSimilarity) continue;
    scored.push({ record, similarity });
  }

  // Array#sort is stable
  scored.sort((a, b) => b.similarity - a.similarity);

  return scored.slice(0, k).map(({ record, similarity }, i) => ({
    id: record.id,
    text: record.text,
    source_document: record.source_document,
    document_type: record.document_type,
    similarity,
    rank: i + 1,
  }));
}

// =============================================================================
// Retriever
// =============================================================================

/**
 * Retriever options.
 */
export interface RetrieverOptions {
  /**
   * Loaded index. Owned by the caller; never modified.
   */
  index: RagIndex;

  /**
   * Embedder for queries. Must match the model the index was built with.
   */
  embedder: EmbeddingAdapter;

  /**
   * Results returned when no k is given.
   * @default 4
   */
  default_k?: number;

  /**
   * Similarity floor. No floor when omitted.
   */
  min_similarity?: number;

  logger?: MetricsCollector;
}

/**
 * Retriever statistics.
 */
export interface RetrieverStats {
  records: number;
  dimensions: number;
  embedding_model: string | null;
  total_searches: number;
  total_embedding_tokens: number;
  average_search_latency_ms: number;
}

function requireK(field: string, k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigError(field, `${field} must be a positive integer, got ${k}`);
  }
}

function requireSimilarity(field: string, value: number | undefined): void {
  if (value !== undefined && !(Number.isFinite(value) && value >= -1 && value <= 1)) {
    throw new ConfigError(field, `${field} must be between -1 and 1, got ${value}`);
  }
}

/**
 * Retriever over reference-document chunks.
 */
export class Retriever {
  readonly id: string;
  readonly default_k: number;
  private readonly index: RagIndex;
  private readonly embedder: EmbeddingAdapter;
  private readonly minSimilarity: number | undefined;
  private readonly logger: MetricsCollector | undefined;

  private stats = {
    total_searches: 0,
    total_embedding_tokens: 0,
    total_search_latency_ms: 0,
  };

  constructor(options: RetrieverOptions) {
    this.id = `retriever_${randomBytes(4).toString('hex')}`;
    this.default_k = options.default_k ?? 4;
    requireK('default_k', this.default_k);
    requireSimilarity('min_similarity', options.min_similarity);

    const { index, embedder } = options;
    if (
      index.records.length > 0 &&
      index.embedding_model !== null &&
      index.embedding_model !== embedder.model_id
    ) {
      throw new IndexMismatchError(
        `Index was built with ${index.embedding_model} but the embedder uses ${embedder.model_id}`,
        { index_model: index.embedding_model, embedder_model: embedder.model_id }
      );
    }

    this.index = index;
    this.embedder = embedder;
    this.minSimilarity = options.min_similarity;
    this.logger = options.logger;
  }

  /**
   * Number of records in the index.
   */
  get size(): number {
    return this.index.records.length;
  }

  /**
   * Top-k chunks for a query, optionally restricted to one document type.
   */
  async retrieve(
    query: string,
    k: number = this.default_k,
    documentType?: DocumentType,
    signal?: AbortSignal
  ): Promise<RetrievedChunk[]> {
    const searchQuery: SearchQuery = { text: query, limit: k };
    if (documentType !== undefined) searchQuery.type_filter = documentType;
    if (signal !== undefined) searchQuery.signal = signal;

    const response = await this.search(searchQuery);
    return response.results;
  }

  /**
   * Search for relevant chunks.
   */
  async search(query: SearchQuery): Promise<SearchResponse> {
    const startTime = performance.now();
    const limit = query.limit ?? this.default_k;
    const minSimilarity = query.min_similarity ?? this.minSimilarity;

    if (query.text.trim().length === 0) {
      throw new ConfigError('query', 'query must not be empty');
    }
    requireK('k', limit);
    requireSimilarity('min_similarity', minSimilarity);

    const filter = query.type_filter;
    const candidates =
      filter === undefined ? this.index.records : this.index.records.filter((r) => r.document_type === filter);

    if (candidates.length === 0) {
      this.logger?.debug('No candidate records; skipping query embedding', {
        records: this.index.records.length,
        type_filter: filter ?? null,
      });
      return { results: [], total_searched: 0, latency_ms: Math.round(performance.now() - startTime) };
    }

    let embeddingResult: EmbeddingResult;
    try {
      embeddingResult = await this.embedder.embed(
        [query.text],
        query.signal ? { purpose: 'query', signal: query.signal } : { purpose: 'query' }
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      throw toProviderError(error);
    }

    const queryVector = embeddingResult.embeddings[0]?.vector;
    if (!queryVector) {
      throw new ProviderError('MALFORMED_RESPONSE', 'Embedder returned no vector for the query');
    }
    if (queryVector.length !== this.index.dimensions) {
      throw new IndexMismatchError(
        `Query vector has ${queryVector.length} dimensions but the index has ${this.index.dimensions}`,
        { expected: this.index.dimensions, actual: queryVector.length }
      );
    }

    const results = rankRecords(candidates, queryVector, limit, minSimilarity);
    const latencyMs = Math.round(performance.now() - startTime);

    this.stats.total_searches++;
    this.stats.total_search_latency_ms += latencyMs;
    this.stats.total_embedding_tokens += embeddingResult.tokens_used;
    this.logger?.increment('searches');
    this.logger?.recordHistogram('search_latency_ms', latencyMs);
    this.logger?.debug('Search complete', {
      candidates: candidates.length,
      results: results.length,
      latency_ms: latencyMs,
    });

    return {
      results,
      total_searched: candidates.length,
      latency_ms: latencyMs,
    };
  }

  /**
   * Get retriever statistics.
   */
  getStats(): RetrieverStats {
    return {
      records: this.index.records.length,
      dimensions: this.index.dimensions,
      embedding_model: this.index.embedding_model,
      total_searches: this.stats.total_searches,
      total_embedding_tokens: this.stats.total_embedding_tokens,
      average_search_latency_ms:
        this.stats.total_searches > 0
          ? Math.round(this.stats.total_search_latency_ms / this.stats.total_searches)
          : 0,
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a retriever.
 */
export function createRetriever(options: RetrieverOptions): Retriever {
  return new Retriever(options);
}
