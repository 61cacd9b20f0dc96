/**
 * Tests for configuration loading
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  createLogger,
  describeConfig,
  loadConfig,
  readBoolean,
  readChoice,
  readInteger,
  readNumber,
  DEFAULT_INDEX_PATH,
  type Env,
} from '../index.js';
import { ConfigError } from '../../rag/errors.js';

function configError(field: string, message?: string): (err: unknown) => boolean {
  return (err) => err instanceof ConfigError && err.field === field && (message === undefined || err.message === message);
}

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    assert.deepEqual(loadConfig({}), {
      embedding: { provider: 'openai', model: 'text-embedding-3-small', timeout_ms: 60000 },
      chunking: { chunk_size: 800, overlap: 100, break_on_boundaries: true },
      retrieval: { top_k: 4 },
      build: { concurrency: 4, batch_size: 16 },
      retry: { max_attempts: 3, initial_delay_ms: 1000, max_delay_ms: 30000, jitter: 0.1 },
      index_path: DEFAULT_INDEX_PATH,
      log_level: 'info',
    });
  });

  it('reads every variable', () => {
    const env: Env = {
      RAG_EMBEDDING_PROVIDER: 'openai',
      RAG_EMBEDDING_MODEL: 'text-embedding-3-large',
      RAG_EMBEDDING_DIMENSIONS: '512',
      RAG_EMBEDDING_TIMEOUT_MS: '5000',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      RAG_CHUNK_SIZE: '400',
      RAG_CHUNK_OVERLAP: '50',
      RAG_CHUNK_BREAK_ON_BOUNDARIES: 'no',
      RAG_TOP_K: '6',
      RAG_MIN_SIMILARITY: '0.3',
      RAG_BUILD_CONCURRENCY: '2',
      RAG_EMBED_BATCH_SIZE: '32',
      RAG_RETRY_MAX_ATTEMPTS: '5',
      RAG_RETRY_INITIAL_DELAY_MS: '0',
      RAG_RETRY_MAX_DELAY_MS: '2000',
      RAG_RETRY_JITTER: '0',
      RAG_INDEX_PATH: 'data/index.json',
      RAG_LOG_LEVEL: 'DEBUG',
    };

    assert.deepEqual(loadConfig(env), {
      embedding: {
        provider: 'openai',
        model: 'text-embedding-3-large',
        dimensions: 512,
        timeout_ms: 5000,
        api_key: 'test-secret',
        base_url: 'http://localhost:8080/v1',
      },
      chunking: { chunk_size: 400, overlap: 50, break_on_boundaries: false },
      retrieval: { top_k: 6, min_similarity: 0.3 },
      build: { concurrency: 2, batch_size: 32 },
      retry: { max_attempts: 5, initial_delay_ms: 0, max_delay_ms: 2000, jitter: 0 },
      index_path: 'data/index.json',
      log_level: 'debug',
    });
  });

  it('picks the key for the selected provider', () => {
    const config = loadConfig({
      RAG_EMBEDDING_PROVIDER: 'Gemini',
      GEMINI_API_KEY: 'test-secret',
      OPENAI_API_KEY: 'other-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
    });

    assert.deepEqual(config.embedding, {
      provider: 'gemini',
      model: 'text-embedding-004',
      timeout_ms: 60000,
      api_key: 'test-secret',
    });
  });

  it('passes no key to the mock provider', () => {
    const config = loadConfig({ RAG_EMBEDDING_PROVIDER: 'mock', OPENAI_API_KEY: 'test-secret' });
    assert.equal(config.embedding.api_key, undefined);
    assert.equal(config.embedding.model, 'mock-embedding');
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig(
      { RAG_TOP_K: '9', RAG_INDEX_PATH: 'env.json', RAG_EMBEDDING_PROVIDER: 'gemini' },
      { top_k: 2, index_path: 'flag.json', provider: 'mock', chunk_size: 100, overlap: 10 }
    );

    assert.equal(config.retrieval.top_k, 2);
    assert.equal(config.index_path, 'flag.json');
    assert.equal(config.embedding.provider, 'mock');
    assert.equal(config.embedding.model, 'mock-embedding');
    assert.deepEqual(config.chunking, { chunk_size: 100, overlap: 10, break_on_boundaries: true });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ RAG_TOP_K: '  ', RAG_INDEX_PATH: '', OPENAI_API_KEY: ' ' });
    assert.equal(config.retrieval.top_k, 4);
    assert.equal(config.index_path, DEFAULT_INDEX_PATH);
    assert.equal(config.embedding.api_key, undefined);
  });

  it('names the offending variable', () => {
    assert.throws(() => loadConfig({ RAG_TOP_K: 'abc' }), configError('RAG_TOP_K', 'RAG_TOP_K must be an integer >= 1, got "abc"'));
    assert.throws(() => loadConfig({ RAG_CHUNK_SIZE: '0' }), configError('RAG_CHUNK_SIZE'));
    assert.throws(() => loadConfig({ RAG_EMBEDDING_PROVIDER: 'azure' }), configError('RAG_EMBEDDING_PROVIDER'));
    assert.throws(() => loadConfig({ RAG_MIN_SIMILARITY: '2' }), configError('RAG_MIN_SIMILARITY'));
    assert.throws(() => loadConfig({ RAG_LOG_LEVEL: 'verbose' }), configError('RAG_LOG_LEVEL'));
    assert.throws(() => loadConfig({ RAG_CHUNK_BREAK_ON_BOUNDARIES: 'maybe' }), configError('RAG_CHUNK_BREAK_ON_BOUNDARIES'));
    assert.throws(() => loadConfig({ RAG_RETRY_JITTER: '1.5' }), configError('RAG_RETRY_JITTER'));
    assert.throws(() => loadConfig({ RAG_EMBEDDING_DIMENSIONS: '0' }), configError('RAG_EMBEDDING_DIMENSIONS'));
  });

  it('rejects an overlap that is not below the chunk size', () => {
    assert.throws(
      () => loadConfig({ RAG_CHUNK_OVERLAP: '800' }),
      configError('RAG_CHUNK_OVERLAP', 'RAG_CHUNK_OVERLAP (800) must be less than RAG_CHUNK_SIZE (800)')
    );
  });
});

describe('describeConfig', () => {
  it('replaces the API key with its presence', () => {
    const described = describeConfig(loadConfig({ OPENAI_API_KEY: 'test-secret' }));
    assert.deepEqual(described.embedding, {
      provider: 'openai',
      model: 'text-embedding-3-small',
      timeout_ms: 60000,
      api_key: 'set',
    });
  });

  it('reports a missing key', () => {
    const described = describeConfig(loadConfig({}));
    assert.deepEqual(described.embedding, {
      provider: 'openai',
      model: 'text-embedding-3-small',
      timeout_ms: 60000,
      api_key: 'unset',
    });
  });
});

describe('readers', () => {
  it('reads integers with a minimum', () => {
    assert.equal(readInteger({ N: '0' }, 'N', 5, 0), 0);
    assert.equal(readInteger({}, 'N', 5), 5);
    assert.throws(() => readInteger({ N: '1e3' }, 'N', 5), configError('N'));
  });

  it('reads bounded numbers', () => {
    assert.equal(readNumber({ X: '-0.25' }, 'X', -1, 1), -0.25);
    assert.equal(readNumber({}, 'X', -1, 1), undefined);
  });

  it('reads booleans', () => {
    assert.equal(readBoolean({ B: 'YES' }, 'B', false), true);
    assert.equal(readBoolean({ B: '0' }, 'B', true), false);
    assert.equal(readBoolean({}, 'B', true), true);
  });

  it('reads choices case-insensitively', () => {
    assert.equal(readChoice({ C: 'Beta' }, 'C', ['alpha', 'beta'] as const, 'alpha'), 'beta');
  });
});

describe('createLogger', () => {
  it('prints at or above the configured level to the sink', () => {
    const printed: unknown[][] = [];
    const record = (...args: unknown[]): void => {
      printed.push(args);
    };
    const logger = createLogger('build-index', { log_level: 'warn' }, {
      debug: record,
      log: record,
      warn: record,
      error: record,
    });

    logger.info('Corpus loaded', { files: 2 });
    logger.warn('Skipping blank document', { document_id: 'notes' });

    assert.deepEqual(printed, [['[build-index]', 'Skipping blank document', { document_id: 'notes' }]]);
    assert.equal(logger.getLogs().length, 2);
  });
});
