/**
 * RAG Pipeline
 * ============
 *
 * Wires configuration, embedder, corpus loader, index store and retriever
 * together for the CLIs and library callers.
 */

import type { RagConfig } from '../config/index.js';
import type { MetricsCollector } from '../infra/metrics.js';
import { loadCorpus, type TextExtractor } from './corpus.js';
import { createEmbeddingAdapter } from './embeddings.js';
import { IndexStore } from './index_store.js';
import { RetryPolicy, RetryingEmbeddingAdapter, type RetryClock } from './resilience.js';
import { Retriever } from './retriever.js';
import type { DocumentType, EmbeddingAdapter, RagIndex } from './types.js';

/**
 * Provider adapter wrapped in the configured retry policy.
 */
export function createEmbedder(config: RagConfig, clock?: Partial<RetryClock>): EmbeddingAdapter {
  const policy = new RetryPolicy({ ...config.retry }, clock);
  return new RetryingEmbeddingAdapter(createEmbeddingAdapter(config.embedding), policy);
}

export interface BuildAndSaveOptions {
  /**
   * Tag every document with this type instead of inferring it.
   */
  document_type?: DocumentType;

  /**
   * Embedder to use instead of the configured one.
   */
  embedder?: EmbeddingAdapter;

  extractors?: readonly TextExtractor[];

  signal?: AbortSignal;

  logger?: MetricsCollector;
}

export interface BuildSummary {
  index_path: string;
  documents: number;
  records: number;
  dimensions: number;
  embedding_model: string | null;
  duration_ms: number;
}

/**
 * Load a corpus, build the index and save it over the configured path.
 * Nothing is written unless the whole build succeeds.
 */
export async function buildAndSaveIndex(
  config: RagConfig,
  paths: readonly string[],
  options: BuildAndSaveOptions = {}
): Promise<{ index: RagIndex; summary: BuildSummary }> {
  const startTime = performance.now();
  const { logger, signal } = options;

  // Provider settings are checked before any corpus file is read
  const embedder = options.embedder ?? createEmbedder(config);

  const corpusOptions: Parameters<typeof loadCorpus>[1] = {};
  if (options.document_type !== undefined) corpusOptions.document_type = options.document_type;
  if (options.extractors !== undefined) corpusOptions.extractors = options.extractors;
  if (logger !== undefined) corpusOptions.logger = logger;
  const corpus = await loadCorpus(paths, corpusOptions);

  const store = new IndexStore(config.index_path, logger);
  const index = await store.rebuild(corpus, {
    embedder,
    chunking: config.chunking,
    concurrency: config.build.concurrency,
    batch_size: config.build.batch_size,
    ...(signal ? { signal } : {}),
  });

  const summary: BuildSummary = {
    index_path: config.index_path,
    documents: corpus.length,
    records: index.records.length,
    dimensions: index.dimensions,
    embedding_model: index.embedding_model,
    duration_ms: Math.round(performance.now() - startTime),
  };
  logger?.info('Build complete', { ...summary });

  return { index, summary };
}

export interface OpenRetrieverOptions {
  /**
   * Embedder to use instead of the configured one.
   */
  embedder?: EmbeddingAdapter;

  /**
   * Fail on a corrupt index instead of falling back to an empty one.
   * @default false
   */
  strict?: boolean;

  logger?: MetricsCollector;
}

/**
 * Load the configured index and wrap it in a retriever.
 */
export async function openRetriever(config: RagConfig, options: OpenRetrieverOptions = {}): Promise<Retriever> {
  const store = new IndexStore(config.index_path, options.logger);
  const index = options.strict ? await store.load() : await store.loadOrEmpty();

  return new Retriever({
    index,
    embedder: options.embedder ?? createEmbedder(config),
    default_k: config.retrieval.top_k,
    ...(config.retrieval.min_similarity !== undefined ? { min_similarity: config.retrieval.min_similarity } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });
}
