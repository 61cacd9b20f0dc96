/**
 * Prompt Augmentation
 * ===================
 *
 * Utilities for enhancing drafting prompts with retrieved
 * reference excerpts.
 */

import type { MetricsCollector } from '../infra/metrics.js';
import { ProviderError } from '../rag/errors.js';
import type { Retriever } from '../rag/retriever.js';
import type { DocumentType, RetrievedChunk } from '../rag/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Augmented prompt with all components.
 */
export interface AugmentedPrompt {
  /**
   * System instruction portion.
   */
  system: string;

  /**
   * Reference excerpts section ('' without references).
   */
  references: string;

  /**
   * Main task section.
   */
  task: string;

  /**
   * Full combined prompt.
   */
  full: string;

  /**
   * Metadata about the augmentation.
   */
  metadata: {
    num_references: number;
    sources: string[];
    total_tokens_estimate: number;
  };
}

/**
 * Options for reference formatting.
 */
export interface ReferenceContextOptions {
  /**
   * Maximum tokens for reference excerpts (approximate).
   * @default 2000
   */
  max_context_tokens?: number;
}

/**
 * Options for prompt augmentation.
 */
export interface AugmentOptions extends ReferenceContextOptions {
  /**
   * Document being drafted. MFR and OPORD restrict references to that type.
   * @default 'UNSPECIFIED'
   */
  document_type?: DocumentType;

  /**
   * Number of references to retrieve.
   */
  k?: number;

  logger?: MetricsCollector;

  signal?: AbortSignal;
}

/**
 * Anything that can retrieve reference chunks.
 */
export type ReferenceSource = Pick<Retriever, 'retrieve'>;

// Rough: ~4 chars per token
const CHARS_PER_TOKEN = 4;

// =============================================================================
// Reference Formatting
// =============================================================================

function formatReferences(
  chunks: readonly RetrievedChunk[],
  options: ReferenceContextOptions
): { text: string; included: RetrievedChunk[] } {
  const budget = (options.max_context_tokens ?? 2000) * CHARS_PER_TOKEN;
  const blocks: string[] = [];
  const included: RetrievedChunk[] = [];
  let used = 0;

  for (const [i, chunk] of chunks.entries()) {
    const heading = `[${i + 1}] ${chunk.source_document} (${chunk.document_type}, similarity ${chunk.similarity.toFixed(2)})`;
    const block = `${heading}\n${chunk.text.trim()}`;
    const cost = block.length + (blocks.length > 0 ? 2 : 0);

    if (used + cost > budget) {
      // Always keep something of the best match
      if (blocks.length === 0) {
        blocks.push(block.slice(0, budget));
        included.push(chunk);
      }
      break;
    }

    blocks.push(block);
    included.push(chunk);
    used += cost;
  }

  return { text: blocks.join('\n\n'), included };
}

/**
 * Format retrieved chunks as numbered excerpts within a token budget.
 */
export function formatReferenceContext(
  chunks: readonly RetrievedChunk[],
  options: ReferenceContextOptions = {}
): string {
  return formatReferences(chunks, options).text;
}

// =============================================================================
// Prompt Building
// =============================================================================

function documentKind(documentType: DocumentType): string {
  switch (documentType) {
    case 'MFR':
      return 'a Memorandum for Record';
    case 'OPORD':
      return 'an Operation Order';
    case 'UNSPECIFIED':
      return 'an official document';
  }
}

function referenceFilter(documentType: DocumentType): DocumentType | undefined {
  switch (documentType) {
    case 'MFR':
    case 'OPORD':
      return documentType;
    case 'UNSPECIFIED':
      return undefined;
  }
}

/**
 * Build an augmented prompt from a task and retrieved reference chunks.
 */
export function buildAugmentedPrompt(
  task: string,
  documentType: DocumentType,
  chunks: readonly RetrievedChunk[],
  options: ReferenceContextOptions = {}
): AugmentedPrompt {
  const sections: string[] = [];

  // System instruction
  const systemSection = `You are drafting ${documentKind(documentType)}. Match the format and tone of the reference excerpts where they apply.`;
  sections.push(systemSection);

  const { text, included } = formatReferences(chunks, options);
  let referencesSection = '';
  if (text) {
    referencesSection = '\n## Reference Excerpts\n\n';
    referencesSection += `${text}\n`;
  }
  sections.push(referencesSection);

  // Task section
  const taskSection = `\n## Task\n\n${task}\n`;
  sections.push(taskSection);

  const full = sections.join('\n');

  return {
    system: systemSection,
    references: referencesSection,
    task: taskSection,
    full,
    metadata: {
      num_references: included.length,
      sources: [...new Set(included.map((c) => c.source_document))],
      total_tokens_estimate: Math.ceil(full.length / CHARS_PER_TOKEN),
    },
  };
}

/**
 * Retrieve references for a task and build the prompt.
 * An embedding provider failure drops the references instead of failing
 * the draft.
 */
export async function augmentPrompt(
  retriever: ReferenceSource | null,
  task: string,
  options: AugmentOptions = {}
): Promise<AugmentedPrompt> {
  const documentType = options.document_type ?? 'UNSPECIFIED';
  let chunks: RetrievedChunk[] = [];

  if (retriever) {
    try {
      chunks = await retriever.retrieve(task, options.k, referenceFilter(documentType), options.signal);
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      options.logger?.warn('Reference retrieval failed; drafting without references', {
        kind: error.kind,
        error: error.message,
      });
    }
  }

  return buildAugmentedPrompt(task, documentType, chunks, options);
}
