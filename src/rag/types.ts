/**
 * RAG Types
 * =========
 *
 * Core types for reference-document retrieval with vector embeddings.
 */

// =============================================================================
// Document Types
// =============================================================================

/**
 * Every document type the corpus can be tagged with.
 */
export const DOCUMENT_TYPES = ['MFR', 'OPORD', 'UNSPECIFIED'] as const;

/**
 * Document type: Memorandum for Record, Operation Order, or untagged.
 */
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/**
 * Type guard for DocumentType.
 */
export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === 'string' && DOCUMENT_TYPES.some((t) => t === value);
}

/**
 * Case-insensitive lookup. Returns undefined for unknown names.
 */
export function lookupDocumentType(value: string): DocumentType | undefined {
  const upper = value.trim().toUpperCase();
  return isDocumentType(upper) ? upper : undefined;
}

// =============================================================================
// Embedding Types
// =============================================================================

/**
 * A vector embedding.
 */
export interface Embedding {
  /**
   * The embedding vector.
   */
  vector: number[];

  /**
   * Dimensionality of the vector.
   */
  dimensions: number;

  /**
   * Model used to generate embedding.
   */
  model: string;
}

/**
 * Result of embedding generation.
 */
export interface EmbeddingResult {
  /**
   * Generated embeddings (one per input, in input order).
   */
  embeddings: Embedding[];

  /**
   * Total tokens used.
   */
  tokens_used: number;

  /**
   * Latency in milliseconds.
   */
  latency_ms: number;
}

/**
 * What the text being embedded will be used for.
 * Some providers embed queries and documents differently.
 */
export type EmbeddingPurpose = 'document' | 'query';

/**
 * Per-call embedding options.
 */
export interface EmbedOptions {
  signal?: AbortSignal;
  purpose?: EmbeddingPurpose;
}

/**
 * Embedding adapter interface.
 */
export interface EmbeddingAdapter {
  /**
   * Adapter identifier.
   */
  readonly adapter_id: string;

  /**
   * Model identifier.
   */
  readonly model_id: string;

  /**
   * Embedding dimensions.
   */
  readonly dimensions: number;

  /**
   * Generate embeddings for text inputs.
   */
  embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;

  /**
   * Check if adapter is ready.
   */
  isReady(): Promise<boolean>;
}

// =============================================================================
// Corpus Types
// =============================================================================

/**
 * A reference document to be indexed.
 */
export interface CorpusDocument {
  /**
   * Unique document ID within the corpus.
   */
  document_id: string;

  /**
   * Extracted raw text.
   */
  text: string;

  /**
   * Document type tag.
   */
  document_type: DocumentType;

  /**
   * File the text was extracted from.
   */
  source_path?: string;
}

// =============================================================================
// Chunking Types
// =============================================================================

/**
 * Chunking options.
 */
export interface ChunkingOptions {
  /**
   * Maximum chunk size in characters.
   */
  chunk_size: number;

  /**
   * Characters shared between consecutive chunks.
   */
  overlap: number;

  /**
   * Prefer ending a chunk after a newline or space.
   */
  break_on_boundaries?: boolean;
}

/**
 * A chunk of a document.
 */
export interface Chunk {
  /**
   * Chunk content.
   */
  content: string;

  /**
   * Start offset in original document.
   */
  start_offset: number;

  /**
   * End offset in original document (exclusive).
   */
  end_offset: number;

  /**
   * Chunk index (0-based).
   */
  index: number;
}

// =============================================================================
// Index Types
// =============================================================================

/**
 * The unit of retrieval. Immutable once built.
 */
export interface ChunkRecord {
  readonly id: string;
  readonly source_document: string;
  readonly document_type: DocumentType;
  readonly chunk_index: number;
  readonly text: string;
  readonly vector: readonly number[];
}

/**
 * Current persisted index format version.
 */
export const INDEX_VERSION = 1;

/**
 * An immutable, fully built index.
 */
export interface RagIndex {
  readonly index_version: typeof INDEX_VERSION;

  /**
   * Model the records were embedded with (null for legacy imports).
   */
  readonly embedding_model: string | null;

  /**
   * Shared vector length (0 when the index is empty).
   */
  readonly dimensions: number;

  /**
   * ISO-8601 build time.
   */
  readonly created_at: string;

  readonly records: readonly ChunkRecord[];
}

// =============================================================================
// Search Types
// =============================================================================

/**
 * Search query.
 */
export interface SearchQuery {
  /**
   * Query text.
   */
  text: string;

  /**
   * Maximum results to return.
   */
  limit?: number;

  /**
   * Minimum similarity threshold. No floor when omitted.
   */
  min_similarity?: number;

  /**
   * Restrict to one document type.
   */
  type_filter?: DocumentType;

  signal?: AbortSignal;
}

/**
 * A retrieved chunk with its score.
 */
export interface RetrievedChunk {
  id: string;
  text: string;
  source_document: string;
  document_type: DocumentType;

  /**
   * Cosine similarity to the query (-1 to 1).
   */
  similarity: number;

  /**
   * Rank in results (1-indexed).
   */
  rank: number;
}

/**
 * Search response.
 */
export interface SearchResponse {
  /**
   * Results ordered by relevance.
   */
  results: RetrievedChunk[];

  /**
   * Records considered after filtering.
   */
  total_searched: number;

  /**
   * Search latency in milliseconds.
   */
  latency_ms: number;
}
