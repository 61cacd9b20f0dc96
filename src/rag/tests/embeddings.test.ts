/**
 * Tests for embedding adapters
 *
 * Provider adapters run against in-process fakes of the OpenAI client and
 * of fetch; nothing here touches the network.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import OpenAI from 'openai';

import {
  GeminiEmbeddingAdapter,
  MockEmbeddingAdapter,
  OpenAIEmbeddingAdapter,
  createEmbeddingAdapter,
  type OpenAIEmbeddingsClient,
} from '../embeddings.js';
import { ConfigError, OperationCancelledError, ProviderError } from '../errors.js';
import { magnitude } from '../similarity.js';

// =============================================================================
// Fakes
// =============================================================================

type CreateBody = Parameters<OpenAIEmbeddingsClient['embeddings']['create']>[0];
type CreateResponse = Awaited<ReturnType<OpenAIEmbeddingsClient['embeddings']['create']>>;

class FakeOpenAIClient implements OpenAIEmbeddingsClient {
  readonly bodies: CreateBody[] = [];

  constructor(private readonly respond: (body: CreateBody) => CreateResponse | Promise<CreateResponse>) {}

  embeddings = {
    create: async (body: CreateBody): Promise<CreateResponse> => {
      this.bodies.push(body);
      return this.respond(body);
    },
  };
}

function failingClient(error: unknown): FakeOpenAIClient {
  return new FakeOpenAIClient(() => {
    throw error;
  });
}

interface FetchCall {
  url: string;
  headers: Headers;
  body: unknown;
}

function fakeFetch(calls: FetchCall[], respond: (body: unknown) => Response): typeof fetch {
  return async (input, init) => {
    const body: unknown = JSON.parse(String(init?.body));
    calls.push({ url: String(input), headers: new Headers(init?.headers), body });
    return respond(body);
  };
}

/**
 * fetch that never answers until its signal aborts.
 */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });

function geminiOk(vectors: number[][]): Response {
  return new Response(JSON.stringify({ embeddings: vectors.map((values) => ({ values })) }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

async function rejectsWithKind(promise: Promise<unknown>, kind: string): Promise<void> {
  await assert.rejects(promise, (err: unknown) => err instanceof ProviderError && err.kind === kind);
}

// =============================================================================
// Mock adapter
// =============================================================================

describe('MockEmbeddingAdapter', () => {
  it('returns identical vectors for identical text', async () => {
    const adapter = new MockEmbeddingAdapter(32);
    const result = await adapter.embed(['bed rest', 'bed rest', 'convoy']);

    assert.equal(result.embeddings.length, 3);
    assert.deepEqual(result.embeddings[0]?.vector, result.embeddings[1]?.vector);
    assert.notDeepEqual(result.embeddings[0]?.vector, result.embeddings[2]?.vector);
  });

  it('returns unit vectors of the configured size', async () => {
    const adapter = new MockEmbeddingAdapter(16, 'mock-small');
    const [embedding] = (await adapter.embed(['formation'])).embeddings;

    assert.ok(embedding);
    assert.equal(embedding.dimensions, 16);
    assert.equal(embedding.model, 'mock-small');
    assert.ok(Math.abs(magnitude(embedding.vector) - 1) < 1e-9);
    assert.equal(adapter.model_id, 'mock-small');
  });

  it('is stable across instances', async () => {
    const a = await new MockEmbeddingAdapter(8).embed(['uniform']);
    const b = await new MockEmbeddingAdapter(8).embed(['uniform']);
    assert.deepEqual(a.embeddings, b.embeddings);
  });

  it('honours an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(
      new MockEmbeddingAdapter(8).embed(['x'], { signal: controller.signal }),
      OperationCancelledError
    );
  });
});

// =============================================================================
// OpenAI adapter
// =============================================================================

describe('OpenAIEmbeddingAdapter', () => {
  let savedKey: string | undefined;

  beforeEach(() => {
    savedKey = process.env.OPENAI_API_KEY;
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = savedKey;
    }
  });

  it('requires an API key when no client is given', () => {
    assert.throws(
      () => new OpenAIEmbeddingAdapter(),
      (err: unknown) => err instanceof ConfigError && err.field === 'OPENAI_API_KEY'
    );
  });

  it('accepts an API key from options', () => {
    const adapter = new OpenAIEmbeddingAdapter({ api_key: 'test-secret' });
    assert.equal(adapter.model_id, 'text-embedding-3-small');
    assert.equal(adapter.dimensions, 1536);
    assert.match(adapter.adapter_id, /^openai_embed_[0-9a-f]{8}$/);
  });

  it('knows the dimensions of published models', () => {
    const large = new OpenAIEmbeddingAdapter({ model: 'text-embedding-3-large', api_key: 'test-secret' });
    const ada = new OpenAIEmbeddingAdapter({ model: 'text-embedding-ada-002', api_key: 'test-secret' });
    assert.equal(large.dimensions, 3072);
    assert.equal(ada.dimensions, 1536);
  });

  it('rejects an unknown model without dimensions', () => {
    assert.throws(
      () => new OpenAIEmbeddingAdapter({ model: 'custom-embed', api_key: 'test-secret' }),
      (err: unknown) => err instanceof ConfigError && err.field === 'embedding.dimensions'
    );
  });

  it('accepts an unknown model with dimensions', () => {
    const adapter = new OpenAIEmbeddingAdapter({ model: 'custom-embed', dimensions: 64, api_key: 'test-secret' });
    assert.equal(adapter.dimensions, 64);
  });

  it('returns embeddings in input order', async () => {
    const client = new FakeOpenAIClient(() => ({
      data: [
        { embedding: [0, 1], index: 1 },
        { embedding: [1, 0], index: 0 },
      ],
      usage: { total_tokens: 7 },
    }));
    const adapter = new OpenAIEmbeddingAdapter({ model: 'custom-embed', dimensions: 2, client });

    const result = await adapter.embed(['first', 'second']);

    assert.deepEqual(
      result.embeddings.map((e) => e.vector),
      [
        [1, 0],
        [0, 1],
      ]
    );
    assert.equal(result.tokens_used, 7);
    assert.equal(result.embeddings[0]?.model, 'custom-embed');
    assert.deepEqual(client.bodies, [{ model: 'custom-embed', input: ['first', 'second'] }]);
  });

  it('estimates tokens when usage is missing', async () => {
    const client = new FakeOpenAIClient(() => ({ data: [{ embedding: [1], index: 0 }] }));
    const adapter = new OpenAIEmbeddingAdapter({ model: 'custom-embed', dimensions: 1, client });

    const result = await adapter.embed(['abcdefgh']);
    assert.equal(result.tokens_used, 2);
  });

  it('sends dimensions only when reducing a text-embedding-3 model', async () => {
    const respond = (body: CreateBody): CreateResponse => ({
      data: body.input.map((_, index) => ({ embedding: [1, 0], index })),
    });

    const reduced = new FakeOpenAIClient(respond);
    await new OpenAIEmbeddingAdapter({ model: 'text-embedding-3-small', dimensions: 2, client: reduced }).embed(['a']);
    assert.equal(reduced.bodies[0]?.dimensions, 2);

    const full = new FakeOpenAIClient(respond);
    await new OpenAIEmbeddingAdapter({ model: 'text-embedding-3-small', client: full }).embed(['a']);
    assert.equal(full.bodies[0]?.dimensions, undefined);

    const ada = new FakeOpenAIClient(respond);
    await new OpenAIEmbeddingAdapter({ model: 'text-embedding-ada-002', dimensions: 2, client: ada }).embed(['a']);
    assert.equal(ada.bodies[0]?.dimensions, undefined);
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const client = new FakeOpenAIClient(() => ({ data: [{ embedding: [1, 0], index: 0 }] }));
    const adapter = new OpenAIEmbeddingAdapter({ model: 'custom-embed', dimensions: 2, client });

    await assert.rejects(
      adapter.embed(['a', 'b']),
      (err: unknown) =>
        err instanceof ProviderError &&
        err.kind === 'MALFORMED_RESPONSE' &&
        err.message === 'OpenAI returned 1 embeddings for 2 inputs'
    );
  });

  it('rejects non-finite vectors', async () => {
    const client = new FakeOpenAIClient(() => ({ data: [{ embedding: [1, Number.NaN], index: 0 }] }));
    const adapter = new OpenAIEmbeddingAdapter({ model: 'custom-embed', dimensions: 2, client });

    await assert.rejects(
      adapter.embed(['a']),
      (err: unknown) =>
        err instanceof ProviderError && err.message === 'OpenAI returned a malformed vector at position 0'
    );
  });

  describe('error mapping', () => {
    const embedWith = (error: unknown): Promise<unknown> =>
      new OpenAIEmbeddingAdapter({ model: 'custom-embed', dimensions: 2, client: failingClient(error) }).embed([
        'a',
      ]);

    it('maps 429 to a retryable RATE_LIMITED', async () => {
      await assert.rejects(
        embedWith(new OpenAI.APIError(429, { message: 'Rate limit reached' }, undefined, undefined)),
        (err: unknown) =>
          err instanceof ProviderError &&
          err.kind === 'RATE_LIMITED' &&
          err.retryable &&
          err.details.status === 429 &&
          err.message === '429 Rate limit reached'
      );
    });

    it('maps 401 to a permanent AUTH_ERROR', async () => {
      await assert.rejects(
        embedWith(new OpenAI.APIError(401, { message: 'Incorrect API key' }, undefined, undefined)),
        (err: unknown) => err instanceof ProviderError && err.kind === 'AUTH_ERROR' && !err.retryable
      );
    });

    it('maps 500 to a retryable SERVER_ERROR', async () => {
      await assert.rejects(
        embedWith(new OpenAI.APIError(500, { message: 'Internal error' }, undefined, undefined)),
        (err: unknown) => err instanceof ProviderError && err.kind === 'SERVER_ERROR' && err.retryable
      );
    });

    it('maps 400 to INVALID_REQUEST', async () => {
      await rejectsWithKind(
        embedWith(new OpenAI.APIError(400, { message: 'Input too long' }, undefined, undefined)),
        'INVALID_REQUEST'
      );
    });

    it('maps connection failures to NETWORK_ERROR', async () => {
      await rejectsWithKind(embedWith(new OpenAI.APIConnectionError({ message: 'Connection error.' })), 'NETWORK_ERROR');
    });

    it('maps client timeouts to TIMEOUT', async () => {
      await rejectsWithKind(embedWith(new OpenAI.APIConnectionTimeoutError()), 'TIMEOUT');
    });

    it('maps a user abort to cancellation', async () => {
      await assert.rejects(embedWith(new OpenAI.APIUserAbortError()), OperationCancelledError);
    });

    it('maps socket errors to NETWORK_ERROR', async () => {
      await rejectsWithKind(embedWith(new Error('connect ECONNREFUSED 127.0.0.1:443')), 'NETWORK_ERROR');
    });

    it('maps anything else to a permanent UNKNOWN', async () => {
      await assert.rejects(
        embedWith(new Error('something odd')),
        (err: unknown) => err instanceof ProviderError && err.kind === 'UNKNOWN' && !err.retryable
      );
    });
  });
});

// =============================================================================
// Gemini adapter
// =============================================================================

describe('GeminiEmbeddingAdapter', () => {
  let savedKey: string | undefined;

  beforeEach(() => {
    savedKey = process.env.GEMINI_API_KEY;
    delete process.env.GEMINI_API_KEY;
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.GEMINI_API_KEY;
    } else {
      process.env.GEMINI_API_KEY = savedKey;
    }
  });

  it('requires an API key', () => {
    assert.throws(
      () => new GeminiEmbeddingAdapter(),
      (err: unknown) => err instanceof ConfigError && err.field === 'GEMINI_API_KEY'
    );
  });

  it('posts a batch request with the key in a header', async () => {
    const calls: FetchCall[] = [];
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      dimensions: 2,
      fetch_impl: fakeFetch(calls, () =>
        geminiOk([
          [1, 0],
          [0, 1],
        ])
      ),
    });

    const result = await adapter.embed(['mission', 'concept'], { purpose: 'document' });

    assert.equal(calls.length, 1);
    assert.equal(
      calls[0]?.url,
      'https://generativelanguage.googleapis.com/v1beta/models/text-embedding-004:batchEmbedContents'
    );
    assert.equal(calls[0]?.headers.get('x-goog-api-key'), 'test-secret');
    assert.deepEqual(calls[0]?.body, {
      requests: [
        { model: 'models/text-embedding-004', content: { parts: [{ text: 'mission' }] }, taskType: 'RETRIEVAL_DOCUMENT' },
        { model: 'models/text-embedding-004', content: { parts: [{ text: 'concept' }] }, taskType: 'RETRIEVAL_DOCUMENT' },
      ],
    });
    assert.deepEqual(
      result.embeddings.map((e) => e.vector),
      [
        [1, 0],
        [0, 1],
      ]
    );
    assert.equal(adapter.model_id, 'text-embedding-004');
  });

  it('uses the query task type for queries', async () => {
    const calls: FetchCall[] = [];
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: fakeFetch(calls, () => geminiOk([[0.5, 0.5]])),
    });

    await adapter.embed(['convoy'], { purpose: 'query' });

    assert.deepEqual(calls[0]?.body, {
      requests: [
        { model: 'models/text-embedding-004', content: { parts: [{ text: 'convoy' }] }, taskType: 'RETRIEVAL_QUERY' },
      ],
    });
  });

  it('splits large inputs into batches of 100', async () => {
    const calls: FetchCall[] = [];
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: fakeFetch(calls, (body) => {
        const count =
          typeof body === 'object' && body !== null && 'requests' in body && Array.isArray(body.requests)
            ? body.requests.length
            : 0;
        return geminiOk(Array.from({ length: count }, () => [1]));
      }),
    });

    const result = await adapter.embed(Array.from({ length: 250 }, (_, i) => `text ${i}`));

    assert.equal(calls.length, 3);
    assert.equal(result.embeddings.length, 250);
  });

  it('maps HTTP 429 to RATE_LIMITED', async () => {
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: fakeFetch([], () => new Response('quota exceeded', { status: 429 })),
    });

    await assert.rejects(
      adapter.embed(['a']),
      (err: unknown) =>
        err instanceof ProviderError &&
        err.kind === 'RATE_LIMITED' &&
        err.retryable &&
        err.message === 'Gemini embedding API error: 429 quota exceeded'
    );
  });

  it('maps HTTP 403 to AUTH_ERROR', async () => {
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: fakeFetch([], () => new Response('forbidden', { status: 403 })),
    });

    await rejectsWithKind(adapter.embed(['a']), 'AUTH_ERROR');
  });

  it('rejects a response without embeddings', async () => {
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: fakeFetch([], () => new Response('{"error":"none"}', { status: 200 })),
    });

    await assert.rejects(
      adapter.embed(['a']),
      (err: unknown) =>
        err instanceof ProviderError && err.message === 'Gemini response has no embeddings array'
    );
  });

  it('rejects a non-JSON response', async () => {
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: fakeFetch([], () => new Response('<html>', { status: 200 })),
    });

    await rejectsWithKind(adapter.embed(['a']), 'MALFORMED_RESPONSE');
  });

  it('maps fetch failures to a retryable NETWORK_ERROR', async () => {
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await assert.rejects(
      adapter.embed(['a']),
      (err: unknown) =>
        err instanceof ProviderError &&
        err.kind === 'NETWORK_ERROR' &&
        err.retryable &&
        err.message === 'Gemini request failed: fetch failed'
    );
  });

  it('reports cancellation when the signal aborted the request', async () => {
    const controller = new AbortController();
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      fetch_impl: async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      },
    });

    await assert.rejects(adapter.embed(['a'], { signal: controller.signal }), OperationCancelledError);
  });

  it('times out a request that never answers', async () => {
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      timeout_ms: 5,
      fetch_impl: hangingFetch,
    });

    await assert.rejects(
      adapter.embed(['a']),
      (err: unknown) =>
        err instanceof ProviderError &&
        err.kind === 'TIMEOUT' &&
        err.retryable &&
        err.message === 'Gemini request timed out after 5ms'
    );
  });

  it('treats a caller abort during a slow request as cancellation', async () => {
    const controller = new AbortController();
    const adapter = new GeminiEmbeddingAdapter({
      api_key: 'test-secret',
      timeout_ms: 60000,
      fetch_impl: hangingFetch,
    });

    const pending = adapter.embed(['a'], { signal: controller.signal });
    controller.abort();

    await assert.rejects(pending, OperationCancelledError);
  });
});

// =============================================================================
// Factory
// =============================================================================

describe('createEmbeddingAdapter', () => {
  it('creates a mock adapter', () => {
    const adapter = createEmbeddingAdapter({ provider: 'mock', model: 'mock-embedding', dimensions: 12 });
    assert.ok(adapter instanceof MockEmbeddingAdapter);
    assert.equal(adapter.dimensions, 12);
  });

  it('defaults the mock size to 256', () => {
    const adapter = createEmbeddingAdapter({ provider: 'mock', model: 'mock-embedding' });
    assert.equal(adapter.dimensions, 256);
  });

  it('creates an OpenAI adapter with the given key', () => {
    const adapter = createEmbeddingAdapter({
      provider: 'openai',
      model: 'text-embedding-3-large',
      api_key: 'test-secret',
    });
    assert.ok(adapter instanceof OpenAIEmbeddingAdapter);
    assert.equal(adapter.dimensions, 3072);
  });

  it('creates a Gemini adapter with the given key', () => {
    const adapter = createEmbeddingAdapter({ provider: 'gemini', model: 'text-embedding-004', api_key: 'test-secret' });
    assert.ok(adapter instanceof GeminiEmbeddingAdapter);
    assert.equal(adapter.dimensions, 768);
  });

  it('passes the timeout to the Gemini adapter', async () => {
    const realFetch = globalThis.fetch;
    globalThis.fetch = hangingFetch;
    try {
      const adapter = createEmbeddingAdapter({
        provider: 'gemini',
        model: 'text-embedding-004',
        api_key: 'test-secret',
        timeout_ms: 5,
      });
      await rejectsWithKind(adapter.embed(['a']), 'TIMEOUT');
    } finally {
      globalThis.fetch = realFetch;
    }
  });
});
