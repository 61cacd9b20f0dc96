/**
 * Reference Retrieval
 * ===================
 *
 * Retrieval-augmented drafting support for Memoranda for Record and
 * Operation Orders.
 *
 * Reference documents are chunked, embedded and saved as a versioned JSON
 * index. At drafting time the retriever returns the chunks most similar
 * to the request, optionally restricted to one document type.
 *
 * Key Guarantees:
 * - A failed or cancelled build never replaces an existing index
 * - Identical corpus and embedder produce identical records
 * - Equal similarities keep index order
 *
 * @packageDocumentation
 */

// Retrieval, indexing and errors
export * from './rag/index.js';

// Configuration
export type {
  RagConfig,
  ConfigOverrides,
  Env,
  RetrySettings,
  RetrievalSettings,
  BuildSettings,
} from './config/index.js';

export {
  loadConfig,
  describeConfig,
  createLogger,
  readInteger,
  readNumber,
  readBoolean,
  readChoice,
  DEFAULT_INDEX_PATH,
} from './config/index.js';

// Prompt augmentation
export type {
  AugmentedPrompt,
  AugmentOptions,
  ReferenceContextOptions,
  ReferenceSource,
} from './prompt/index.js';

export { formatReferenceContext, buildAugmentedPrompt, augmentPrompt } from './prompt/index.js';

// Observability
export * from './infra/index.js';
