/**
 * Index Store
 * ===========
 *
 * Builds, persists and loads the chunk index.
 *
 * - Build embeds every chunk before assembling anything; a failed build
 *   returns nothing.
 * - Save writes a temporary sibling file and renames it over the target.
 * - Load validates every record; an absent or blank file is an empty index.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { MetricsCollector } from '../infra/metrics.js';
import { DEFAULT_CHUNKING, chunkText, validateChunkingOptions } from './chunker.js';
import {
  BuildError,
  ConfigError,
  CorruptIndexError,
  IndexIOError,
  OperationCancelledError,
  ProviderError,
  errnoCode,
  toProviderError,
} from './errors.js';
import { mapWithConcurrency } from './pool.js';
import {
  INDEX_VERSION,
  isDocumentType,
  lookupDocumentType,
  type ChunkRecord,
  type ChunkingOptions,
  type CorpusDocument,
  type DocumentType,
  type EmbeddingAdapter,
  type RagIndex,
} from './types.js';

// =============================================================================
// Construction
// =============================================================================

const LEGACY_CREATED_AT = new Date(0).toISOString();

function freezeIndex(
  records: readonly ChunkRecord[],
  embedding_model: string | null,
  dimensions: number,
  created_at: string
): RagIndex {
  const frozen = Object.freeze(
    records.map((r) => Object.freeze({ ...r, vector: Object.freeze([...r.vector]) }))
  );
  const index: RagIndex = {
    index_version: INDEX_VERSION,
    embedding_model,
    dimensions: frozen.length === 0 ? 0 : dimensions,
    created_at,
    records: frozen,
  };
  return Object.freeze(index);
}

/**
 * An index with no records.
 */
export function createEmptyIndex(embedding_model: string | null = null): RagIndex {
  return freezeIndex([], embedding_model, 0, new Date().toISOString());
}

// =============================================================================
// Build
// =============================================================================

export interface BuildOptions {
  embedder: EmbeddingAdapter;

  chunking?: Partial<ChunkingOptions>;

  /**
   * Embedding batches in flight at once.
   * @default 4
   */
  concurrency?: number;

  /**
   * Chunks per embedding call.
   * @default 16
   */
  batch_size?: number;

  signal?: AbortSignal;

  logger?: MetricsCollector;

  /**
   * Clock for created_at.
   */
  now?: () => Date;
}

interface PendingChunk {
  document: CorpusDocument;
  chunk_index: number;
  text: string;
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(field, `${field} must be a positive integer, got ${value}`);
  }
}

function isFiniteVector(vector: unknown): vector is number[] {
  return Array.isArray(vector) && vector.every((x) => typeof x === 'number' && Number.isFinite(x));
}

/**
 * Chunk, embed and assemble a corpus into an index.
 */
export async function buildIndex(
  corpus: readonly CorpusDocument[],
  options: BuildOptions
): Promise<RagIndex> {
  const chunking: ChunkingOptions = { ...DEFAULT_CHUNKING, ...options.chunking };
  const concurrency = options.concurrency ?? 4;
  const batchSize = options.batch_size ?? 16;
  const { embedder, signal, logger } = options;

  validateChunkingOptions(chunking);
  requirePositiveInteger('concurrency', concurrency);
  requirePositiveInteger('batch_size', batchSize);

  const seen = new Set<string>();
  for (const document of corpus) {
    if (seen.has(document.document_id)) {
      throw new BuildError('INVALID_CORPUS', `Duplicate document id: ${document.document_id}`, {
        document_id: document.document_id,
      });
    }
    seen.add(document.document_id);
  }

  const pending: PendingChunk[] = [];
  for (const document of corpus) {
    const chunks = chunkText(document.text, chunking);
    for (const chunk of chunks) {
      pending.push({ document, chunk_index: chunk.index, text: chunk.content });
    }
    logger?.info('Chunked document', {
      document_id: document.document_id,
      document_type: document.document_type,
      chunks: chunks.length,
    });
  }

  if (pending.length === 0) {
    throw new BuildError('EMPTY_CORPUS', 'Corpus produced no chunks to index', {
      documents: corpus.length,
    });
  }

  const batches: PendingChunk[][] = [];
  for (let i = 0; i < pending.length; i += batchSize) {
    batches.push(pending.slice(i, i + batchSize));
  }

  const endTimer = logger?.startTimer('build_duration_ms');
  let embedded: number[][][];
  try {
    embedded = await mapWithConcurrency(
      batches,
      concurrency,
      async (batch, i) => {
        const result = await embedder.embed(
          batch.map((c) => c.text),
          signal ? { signal, purpose: 'document' } : { purpose: 'document' }
        );
        if (result.embeddings.length !== batch.length) {
          throw new ProviderError(
            'MALFORMED_RESPONSE',
            `Embedder returned ${result.embeddings.length} vectors for ${batch.length} chunks`
          );
        }
        const vectors = result.embeddings.map((e) => e.vector);
        if (!vectors.every(isFiniteVector)) {
          throw new ProviderError('MALFORMED_RESPONSE', 'Embedder returned a non-numeric vector');
        }
        logger?.debug('Embedded batch', { batch: i + 1, of: batches.length, chunks: batch.length });
        logger?.increment('tokens_used', result.tokens_used);
        return vectors;
      },
      signal
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (error instanceof OperationCancelledError || signal?.aborted) {
      throw new BuildError('CANCELLED', 'Index build cancelled', {}, { cause: error });
    }
    const providerError = toProviderError(error);
    throw new BuildError(
      'PROVIDER_FAILURE',
      `Embedding failed: ${providerError.message}`,
      { kind: providerError.kind },
      { cause: providerError }
    );
  } finally {
    endTimer?.();
  }

  const vectors = embedded.flat();
  const dimensions = vectors[0]?.length ?? 0;
  if (dimensions === 0) {
    throw new BuildError('DIMENSION_MISMATCH', 'Embedder returned empty vectors');
  }

  const records: ChunkRecord[] = pending.map((chunk, i) => {
    const vector = vectors[i] ?? [];
    if (vector.length !== dimensions) {
      throw new BuildError(
        'DIMENSION_MISMATCH',
        `Chunk ${chunk.document.document_id}:${chunk.chunk_index} has ${vector.length} dimensions, expected ${dimensions}`,
        { expected: dimensions, actual: vector.length }
      );
    }
    return {
      id: `${chunk.document.document_id}:${chunk.chunk_index}`,
      source_document: chunk.document.document_id,
      document_type: chunk.document.document_type,
      chunk_index: chunk.chunk_index,
      text: chunk.text,
      vector,
    };
  });

  logger?.setGauge('records', records.length);
  logger?.info('Index built', {
    documents: corpus.length,
    records: records.length,
    dimensions,
    model: embedder.model_id,
  });

  const now = options.now ?? (() => new Date());
  return freezeIndex(records, embedder.model_id, dimensions, now().toISOString());
}

// =============================================================================
// Validation
// =============================================================================

type Fail = (message: string, details?: Record<string, unknown>) => never;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Check a record set: non-empty fields, one dimensionality, unique ids.
 * Returns the shared dimensionality (0 when empty).
 */
function checkRecords(records: readonly ChunkRecord[], fail: Fail): number {
  const ids = new Set<string>();
  let dimensions = 0;

  records.forEach((record, i) => {
    if (!isNonEmptyString(record.id)) fail(`record ${i} has an empty id`);
    if (!isNonEmptyString(record.source_document)) fail(`record ${record.id} has an empty source_document`);
    if (!isNonEmptyString(record.text)) fail(`record ${record.id} has empty text`);
    if (!Number.isInteger(record.chunk_index) || record.chunk_index < 0) {
      fail(`record ${record.id} has an invalid chunk_index`);
    }
    if (record.vector.length === 0 || !record.vector.every((x) => Number.isFinite(x))) {
      fail(`record ${record.id} has an invalid vector`);
    }
    if (i === 0) {
      dimensions = record.vector.length;
    } else if (record.vector.length !== dimensions) {
      fail(`record ${record.id} has ${record.vector.length} dimensions, expected ${dimensions}`, {
        expected: dimensions,
        actual: record.vector.length,
      });
    }
    if (ids.has(record.id)) fail(`duplicate record id ${record.id}`);
    ids.add(record.id);
  });

  return dimensions;
}

function parseRecord(value: unknown, i: number, fail: Fail): ChunkRecord {
  if (!isObject(value)) fail(`record ${i} is not an object`);

  const { id, source_document, document_type, chunk_index, text, vector } = value;
  if (!isNonEmptyString(id)) fail(`record ${i} is missing id`);
  if (!isNonEmptyString(source_document)) fail(`record ${i} is missing source_document`);
  if (!isDocumentType(document_type)) fail(`record ${i} has invalid document_type ${String(document_type)}`);
  if (typeof chunk_index !== 'number') fail(`record ${i} is missing chunk_index`);
  if (!isNonEmptyString(text)) fail(`record ${i} is missing text`);
  if (!isFiniteVector(vector)) fail(`record ${i} has a non-numeric vector`);

  return { id, source_document, document_type, chunk_index, text, vector };
}

/**
 * Records written by the first generation of the indexer:
 * `{ doc_type, source, text, embedding }` with no ids.
 */
function parseLegacyRecords(entries: readonly unknown[], fail: Fail): ChunkRecord[] {
  const counters = new Map<string, number>();

  return entries.map((value, i) => {
    if (!isObject(value)) fail(`entry ${i} is not an object`);

    const { doc_type, source, text, embedding } = value;
    if (!isNonEmptyString(source)) fail(`entry ${i} is missing source`);
    const document_type: DocumentType | undefined =
      typeof doc_type === 'string' ? lookupDocumentType(doc_type) : undefined;
    if (!document_type) fail(`entry ${i} has invalid doc_type ${String(doc_type)}`);
    if (!isNonEmptyString(text)) fail(`entry ${i} is missing text`);
    if (!isFiniteVector(embedding)) fail(`entry ${i} has a non-numeric embedding`);

    const chunk_index = counters.get(source) ?? 0;
    counters.set(source, chunk_index + 1);

    return {
      id: `${source}:${chunk_index}`,
      source_document: source,
      document_type,
      chunk_index,
      text,
      vector: embedding,
    };
  });
}

/**
 * Validate parsed JSON as an index.
 * Accepts the versioned envelope or a bare array of records
 * (current or legacy layout).
 */
export function parseIndex(data: unknown, source: string = '<memory>'): RagIndex {
  const fail: Fail = (message, details = {}) => {
    throw new CorruptIndexError(source, message, details);
  };

  if (Array.isArray(data)) {
    const legacy = data.some((entry) => isObject(entry) && ('doc_type' in entry || 'embedding' in entry));
    const records = legacy ? parseLegacyRecords(data, fail) : data.map((entry, i) => parseRecord(entry, i, fail));
    const dimensions = checkRecords(records, fail);
    return freezeIndex(records, null, dimensions, LEGACY_CREATED_AT);
  }

  if (!isObject(data)) {
    fail('top-level value must be an object or an array');
  }

  if (data.index_version !== INDEX_VERSION) {
    fail(`unsupported index_version ${String(data.index_version)}`, {
      index_version: data.index_version,
    });
  }

  const { embedding_model, dimensions, created_at, records, record_count } = data;
  if (embedding_model !== null && !isNonEmptyString(embedding_model)) {
    fail('embedding_model must be a string or null');
  }
  if (typeof dimensions !== 'number' || !Number.isInteger(dimensions) || dimensions < 0) {
    fail('dimensions must be a non-negative integer');
  }
  if (!isNonEmptyString(created_at)) {
    fail('created_at must be a string');
  }
  if (!Array.isArray(records)) {
    fail('records must be an array');
  }
  if (record_count !== undefined && record_count !== records.length) {
    fail(`record_count ${String(record_count)} does not match ${records.length} records`);
  }

  const parsed = records.map((entry, i) => parseRecord(entry, i, fail));
  const actual = checkRecords(parsed, fail);
  if (parsed.length > 0 && actual !== dimensions) {
    fail(`records have ${actual} dimensions but the index declares ${dimensions}`, {
      expected: dimensions,
      actual,
    });
  }

  return freezeIndex(parsed, embedding_model, dimensions, created_at);
}

// =============================================================================
// Persistence
// =============================================================================

export interface PersistOptions {
  logger?: MetricsCollector;
}

/**
 * Serialize an index to its on-disk JSON form.
 */
export function serializeIndex(index: RagIndex): string {
  return JSON.stringify({
    index_version: index.index_version,
    embedding_model: index.embedding_model,
    dimensions: index.dimensions,
    created_at: index.created_at,
    record_count: index.records.length,
    records: index.records,
  });
}

/**
 * Write an index atomically, replacing any existing file.
 */
export async function saveIndex(index: RagIndex, path: string, options: PersistOptions = {}): Promise<void> {
  const dimensions = checkRecords(index.records, (message) => {
    throw new IndexIOError(path, `Refusing to save invalid index: ${message}`);
  });
  if (index.records.length > 0 && dimensions !== index.dimensions) {
    throw new IndexIOError(
      path,
      `Refusing to save invalid index: records have ${dimensions} dimensions but the index declares ${index.dimensions}`
    );
  }

  const content = serializeIndex(index);
  const tmpPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
      options.logger?.warn('Could not remove temporary index file', {
        path: tmpPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    const message = error instanceof Error ? error.message : String(error);
    throw new IndexIOError(path, `Failed to save index to ${path}: ${message}`, { cause: error });
  }

  options.logger?.info('Index saved', { path, records: index.records.length, bytes: content.length });
}

/**
 * Read and validate an index. Absent or blank files load as an empty index.
 */
export async function loadIndex(path: string, options: PersistOptions = {}): Promise<RagIndex> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      options.logger?.info('No index file; starting empty', { path });
      return createEmptyIndex();
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new IndexIOError(path, `Failed to read index at ${path}: ${message}`, { cause: error });
  }

  if (content.trim().length === 0) {
    options.logger?.info('Index file is blank; starting empty', { path });
    return createEmptyIndex();
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new CorruptIndexError(path, 'invalid JSON', {}, { cause: error });
  }

  const index = parseIndex(data, path);
  options.logger?.info('Index loaded', {
    path,
    records: index.records.length,
    dimensions: index.dimensions,
    model: index.embedding_model,
  });
  return index;
}

/**
 * Load, but degrade a corrupt index to an empty one with a warning.
 */
export async function loadIndexOrEmpty(path: string, options: PersistOptions = {}): Promise<RagIndex> {
  try {
    return await loadIndex(path, options);
  } catch (error) {
    if (error instanceof CorruptIndexError) {
      options.logger?.warn('Index is corrupt; continuing without references', {
        path,
        error: error.message,
      });
      return createEmptyIndex();
    }
    throw error;
  }
}

// =============================================================================
// Index Store
// =============================================================================

/**
 * Build, save and load operations bound to one index path.
 */
export class IndexStore {
  private readonly persist: PersistOptions;

  constructor(
    readonly path: string,
    private readonly logger?: MetricsCollector
  ) {
    this.persist = logger ? { logger } : {};
  }

  build(corpus: readonly CorpusDocument[], options: BuildOptions): Promise<RagIndex> {
    const logger = options.logger ?? this.logger;
    return buildIndex(corpus, logger ? { ...options, logger } : options);
  }

  save(index: RagIndex): Promise<void> {
    return saveIndex(index, this.path, this.persist);
  }

  load(): Promise<RagIndex> {
    return loadIndex(this.path, this.persist);
  }

  loadOrEmpty(): Promise<RagIndex> {
    return loadIndexOrEmpty(this.path, this.persist);
  }

  /**
   * Build then save. A failed build leaves the existing file untouched.
   */
  async rebuild(corpus: readonly CorpusDocument[], options: BuildOptions): Promise<RagIndex> {
    const index = await this.build(corpus, options);
    await this.save(index);
    return index;
  }
}
