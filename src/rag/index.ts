/**
 * RAG Exports
 * ===========
 *
 * Reference-document retrieval with vector embeddings.
 */

// Types
export type {
  Embedding,
  EmbeddingResult,
  EmbeddingAdapter,
  EmbeddingPurpose,
  EmbedOptions,
  CorpusDocument,
  DocumentType,
  ChunkingOptions,
  Chunk,
  ChunkRecord,
  RagIndex,
  SearchQuery,
  RetrievedChunk,
  SearchResponse,
} from './types.js';

export { DOCUMENT_TYPES, INDEX_VERSION, isDocumentType, lookupDocumentType } from './types.js';

// Errors
export type { RagErrorCode, ProviderErrorKind, BuildFailureReason } from './errors.js';

export {
  RagError,
  ConfigError,
  ProviderError,
  CorruptIndexError,
  IndexMismatchError,
  IndexIOError,
  BuildError,
  CorpusReadError,
  OperationCancelledError,
  toProviderError,
} from './errors.js';

// Chunking
export { DEFAULT_CHUNKING, chunkText, validateChunkingOptions } from './chunker.js';

// Similarity
export { cosineSimilarity, dotProduct, magnitude } from './similarity.js';

// Embeddings
export type {
  EmbeddingProvider,
  EmbeddingSettings,
  GeminiEmbeddingOptions,
  OpenAIEmbeddingModel,
  OpenAIEmbeddingOptions,
  OpenAIEmbeddingsClient,
} from './embeddings.js';

export {
  GeminiEmbeddingAdapter,
  OpenAIEmbeddingAdapter,
  MockEmbeddingAdapter,
  DEFAULT_EMBEDDING_MODELS,
  EMBEDDING_PROVIDERS,
  createEmbeddingAdapter,
} from './embeddings.js';

// Resilience
export type { RetryConfig, RetryClock, RetryStats } from './resilience.js';

export {
  RetryPolicy,
  RetryingEmbeddingAdapter,
  DEFAULT_RETRY_CONFIG,
  createRetryPolicy,
} from './resilience.js';

export { mapWithConcurrency } from './pool.js';

// Corpus
export type { TextExtractor, CorpusFile, LoadCorpusOptions } from './corpus.js';

export {
  PlainTextExtractor,
  PdfTextExtractor,
  DEFAULT_EXTRACTORS,
  discoverCorpusFiles,
  inferDocumentType,
  documentIdFor,
  loadCorpus,
} from './corpus.js';

// Index Store
export type { BuildOptions, PersistOptions } from './index_store.js';

export {
  IndexStore,
  buildIndex,
  saveIndex,
  loadIndex,
  loadIndexOrEmpty,
  parseIndex,
  serializeIndex,
  createEmptyIndex,
} from './index_store.js';

// Retriever
export type { RetrieverOptions, RetrieverStats } from './retriever.js';

export { Retriever, createRetriever, rankRecords } from './retriever.js';

// Pipeline
export type { BuildAndSaveOptions, BuildSummary, OpenRetrieverOptions } from './pipeline.js';

export { createEmbedder, buildAndSaveIndex, openRetriever } from './pipeline.js';
