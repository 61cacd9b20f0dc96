/**
 * CLI Argument Parsing
 * ====================
 *
 * Flag parsing shared by build-index and query-index. Invalid arguments
 * throw ConfigError; the entrypoints turn that into exit code 2.
 */

import type { ConfigOverrides } from '../config/index.js';
import { LOG_THRESHOLDS, type LogThreshold } from '../infra/metrics.js';
import { EMBEDDING_PROVIDERS, type EmbeddingProvider } from '../rag/embeddings.js';
import { ConfigError } from '../rag/errors.js';
import { DOCUMENT_TYPES, lookupDocumentType, type DocumentType } from '../rag/types.js';

// Exit codes
export const EXIT_OK = 0;
export const EXIT_RUNTIME_ERROR = 1;
export const EXIT_VALIDATION_ERROR = 2;

/**
 * Exit code for an error that escaped a command.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError ? EXIT_VALIDATION_ERROR : EXIT_RUNTIME_ERROR;
}

export interface BuildArgs {
  help: boolean;
  corpus: string[];
  document_type?: DocumentType;
  overrides: ConfigOverrides;
}

export interface QueryArgs {
  help: boolean;
  query: string;
  type_filter?: DocumentType;
  overrides: ConfigOverrides;
}

// =============================================================================
// Value Parsing
// =============================================================================

function takeValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(flag, `${flag} requires a value`);
  }
  return value;
}

function parseInteger(flag: string, value: string, min: number): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < min) {
    throw new ConfigError(flag, `Invalid ${flag}: ${value}. Must be an integer >= ${min}.`);
  }
  return parsed;
}

function parseSimilarity(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < -1 || parsed > 1) {
    throw new ConfigError(flag, `Invalid ${flag}: ${value}. Must be between -1 and 1.`);
  }
  return parsed;
}

function parseDocumentType(flag: string, value: string): DocumentType {
  const type = lookupDocumentType(value);
  if (type === undefined) {
    throw new ConfigError(flag, `Invalid ${flag}: ${value}. Must be ${DOCUMENT_TYPES.join(', ')}.`);
  }
  return type;
}

function parseChoice<T extends string>(flag: string, value: string, choices: readonly T[]): T {
  const match = choices.find((c) => c === value.toLowerCase());
  if (match === undefined) {
    throw new ConfigError(flag, `Invalid ${flag}: ${value}. Must be ${choices.join(', ')}.`);
  }
  return match;
}

/**
 * Flags both commands accept. Returns true when the flag was consumed.
 */
function parseSharedFlag(arg: string, value: () => string, overrides: ConfigOverrides): boolean {
  switch (arg) {
    case '--provider':
      overrides.provider = parseChoice<EmbeddingProvider>(arg, value(), EMBEDDING_PROVIDERS);
      return true;
    case '--model':
      overrides.model = value();
      return true;
    case '--dimensions':
      overrides.dimensions = parseInteger(arg, value(), 1);
      return true;
    case '--log-level':
      overrides.log_level = parseChoice<LogThreshold>(arg, value(), LOG_THRESHOLDS);
      return true;
    default:
      return false;
  }
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Parse build-index arguments.
 */
export function parseBuildArgs(args: readonly string[]): BuildArgs {
  const result: BuildArgs = { help: false, corpus: [], overrides: {} };
  const { overrides } = result;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    const value = (): string => takeValue(args, i++, arg);

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--corpus') {
      result.corpus.push(value());
    } else if (arg === '--out') {
      overrides.index_path = value();
    } else if (arg === '--chunk-size') {
      overrides.chunk_size = parseInteger(arg, value(), 1);
    } else if (arg === '--overlap') {
      overrides.overlap = parseInteger(arg, value(), 0);
    } else if (arg === '--concurrency') {
      overrides.concurrency = parseInteger(arg, value(), 1);
    } else if (arg === '--batch-size') {
      overrides.batch_size = parseInteger(arg, value(), 1);
    } else if (arg === '--type') {
      result.document_type = parseDocumentType(arg, value());
    } else if (!parseSharedFlag(arg, value, overrides)) {
      throw new ConfigError('args', `Unknown option: ${arg}`);
    }
  }

  if (!result.help && result.corpus.length === 0) {
    throw new ConfigError('--corpus', '--corpus is required');
  }

  return result;
}

/**
 * Parse query-index arguments.
 */
export function parseQueryArgs(args: readonly string[]): QueryArgs {
  const result: QueryArgs = { help: false, query: '', overrides: {} };
  const { overrides } = result;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    const value = (): string => takeValue(args, i++, arg);

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--query' || arg === '-q') {
      result.query = value();
    } else if (arg === '--k') {
      overrides.top_k = parseInteger(arg, value(), 1);
    } else if (arg === '--type') {
      result.type_filter = parseDocumentType(arg, value());
    } else if (arg === '--index') {
      overrides.index_path = value();
    } else if (arg === '--min-similarity') {
      overrides.min_similarity = parseSimilarity(arg, value());
    } else if (!parseSharedFlag(arg, value, overrides)) {
      throw new ConfigError('args', `Unknown option: ${arg}`);
    }
  }

  if (!result.help && result.query.trim().length === 0) {
    throw new ConfigError('--query', '--query is required');
  }

  return result;
}
