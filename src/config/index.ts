/**
 * Configuration
 * =============
 *
 * Settings for building and querying the reference index, read from the
 * environment. Explicit overrides (CLI flags) win over the environment,
 * which wins over defaults. Malformed values throw ConfigError naming the
 * variable, before anything touches the disk or the network.
 */

import {
  LOG_THRESHOLDS,
  createMetricsCollector,
  type LogSink,
  type LogThreshold,
  type MetricsCollector,
} from '../infra/metrics.js';
import { DEFAULT_CHUNKING } from '../rag/chunker.js';
import {
  DEFAULT_EMBEDDING_MODELS,
  EMBEDDING_PROVIDERS,
  type EmbeddingProvider,
  type EmbeddingSettings,
} from '../rag/embeddings.js';
import { ConfigError } from '../rag/errors.js';
import { DEFAULT_RETRY_CONFIG } from '../rag/resilience.js';
import type { ChunkingOptions } from '../rag/types.js';

// =============================================================================
// Types
// =============================================================================

export interface RetrySettings {
  max_attempts: number;
  initial_delay_ms: number;
  max_delay_ms: number;
  jitter: number;
}

export interface RetrievalSettings {
  top_k: number;
  min_similarity?: number;
}

export interface BuildSettings {
  concurrency: number;
  batch_size: number;
}

/**
 * Resolved configuration.
 */
export interface RagConfig {
  embedding: EmbeddingSettings;
  chunking: Required<ChunkingOptions>;
  retrieval: RetrievalSettings;
  build: BuildSettings;
  retry: RetrySettings;
  index_path: string;
  log_level: LogThreshold;
}

/**
 * Values that take precedence over the environment.
 */
export interface ConfigOverrides {
  provider?: EmbeddingProvider;
  model?: string;
  dimensions?: number;
  chunk_size?: number;
  overlap?: number;
  top_k?: number;
  min_similarity?: number;
  index_path?: string;
  concurrency?: number;
  batch_size?: number;
  log_level?: LogThreshold;
}

export type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_INDEX_PATH = 'rag_index/index.json';

// =============================================================================
// Environment Parsing
// =============================================================================

function raw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parse an integer variable. Unset returns the fallback.
 */
export function readInteger(env: Env, name: string, fallback: number, min: number = 1): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;

  const parsed = Number(value);
  if (!/^-?\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigError(name, `${name} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse a number variable within [min, max].
 */
export function readNumber(env: Env, name: string, min: number, max: number): number | undefined {
  const value = raw(env, name);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(name, `${name} must be a number between ${min} and ${max}, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse a boolean variable (true/false, 1/0, yes/no).
 */
export function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = raw(env, name)?.toLowerCase();
  if (value === undefined) return fallback;

  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  throw new ConfigError(name, `${name} must be true or false, got "${value}"`);
}

/**
 * Parse a variable restricted to a set of values.
 */
export function readChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const value = raw(env, name)?.toLowerCase();
  if (value === undefined) return fallback;

  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw new ConfigError(name, `${name} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Resolve configuration from the environment and overrides.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): RagConfig {
  const provider = overrides.provider ?? readChoice(env, 'RAG_EMBEDDING_PROVIDER', EMBEDDING_PROVIDERS, 'openai');
  const model = overrides.model ?? raw(env, 'RAG_EMBEDDING_MODEL') ?? DEFAULT_EMBEDDING_MODELS[provider];
  const dimensions = overrides.dimensions ?? readInteger(env, 'RAG_EMBEDDING_DIMENSIONS', 0);

  const embedding: EmbeddingSettings = {
    provider,
    model,
    timeout_ms: readInteger(env, 'RAG_EMBEDDING_TIMEOUT_MS', 60000),
  };
  if (dimensions > 0) embedding.dimensions = dimensions;

  // Credentials are passed through, never logged
  const apiKey =
    provider === 'openai' ? raw(env, 'OPENAI_API_KEY') : provider === 'gemini' ? raw(env, 'GEMINI_API_KEY') : undefined;
  if (apiKey !== undefined) embedding.api_key = apiKey;
  const baseUrl = provider === 'openai' ? raw(env, 'OPENAI_BASE_URL') : undefined;
  if (baseUrl !== undefined) embedding.base_url = baseUrl;

  const chunking: Required<ChunkingOptions> = {
    chunk_size: overrides.chunk_size ?? readInteger(env, 'RAG_CHUNK_SIZE', DEFAULT_CHUNKING.chunk_size),
    overlap: overrides.overlap ?? readInteger(env, 'RAG_CHUNK_OVERLAP', DEFAULT_CHUNKING.overlap, 0),
    break_on_boundaries: readBoolean(env, 'RAG_CHUNK_BREAK_ON_BOUNDARIES', DEFAULT_CHUNKING.break_on_boundaries),
  };
  if (chunking.overlap >= chunking.chunk_size) {
    throw new ConfigError(
      'RAG_CHUNK_OVERLAP',
      `RAG_CHUNK_OVERLAP (${chunking.overlap}) must be less than RAG_CHUNK_SIZE (${chunking.chunk_size})`
    );
  }

  const retrieval: RetrievalSettings = {
    top_k: overrides.top_k ?? readInteger(env, 'RAG_TOP_K', 4),
  };
  const minSimilarity = overrides.min_similarity ?? readNumber(env, 'RAG_MIN_SIMILARITY', -1, 1);
  if (minSimilarity !== undefined) retrieval.min_similarity = minSimilarity;

  const retry: RetrySettings = {
    max_attempts: readInteger(env, 'RAG_RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_CONFIG.max_attempts),
    initial_delay_ms: readInteger(env, 'RAG_RETRY_INITIAL_DELAY_MS', DEFAULT_RETRY_CONFIG.initial_delay_ms, 0),
    max_delay_ms: readInteger(env, 'RAG_RETRY_MAX_DELAY_MS', DEFAULT_RETRY_CONFIG.max_delay_ms, 0),
    jitter: readNumber(env, 'RAG_RETRY_JITTER', 0, 1) ?? DEFAULT_RETRY_CONFIG.jitter,
  };

  return {
    embedding,
    chunking,
    retrieval,
    build: {
      concurrency: overrides.concurrency ?? readInteger(env, 'RAG_BUILD_CONCURRENCY', 4),
      batch_size: overrides.batch_size ?? readInteger(env, 'RAG_EMBED_BATCH_SIZE', 16),
    },
    retry,
    index_path: overrides.index_path ?? raw(env, 'RAG_INDEX_PATH') ?? DEFAULT_INDEX_PATH,
    log_level: overrides.log_level ?? readChoice(env, 'RAG_LOG_LEVEL', LOG_THRESHOLDS, 'info'),
  };
}

/**
 * Configuration with credentials removed, for logging.
 */
export function describeConfig(config: RagConfig): Record<string, unknown> {
  const { api_key, ...embedding } = config.embedding;
  return { ...config, embedding: { ...embedding, api_key: api_key === undefined ? 'unset' : 'set' } };
}

/**
 * Logger for a component at the configured level.
 */
export function createLogger(
  component: string,
  config: Pick<RagConfig, 'log_level'>,
  sink?: LogSink
): MetricsCollector {
  return createMetricsCollector(component, sink ? { level: config.log_level, sink } : { level: config.log_level });
}
