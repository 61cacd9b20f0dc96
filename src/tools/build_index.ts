#!/usr/bin/env node
/**
 * Build Index CLI
 * ===============
 *
 * Chunks and embeds a reference corpus and saves the index.
 *
 * Usage:
 *   build-index --corpus <path> [--corpus <path> ...] [options]
 *
 * Options:
 *   --corpus <path>       File or directory to index (required, repeatable)
 *   --out <path>          Index file (default: RAG_INDEX_PATH or rag_index/index.json)
 *   --provider <name>     Embedding provider: openai|gemini|mock
 *   --model <id>          Embedding model
 *   --dimensions <n>      Vector size (required for unknown models)
 *   --chunk-size <n>      Maximum characters per chunk (default: 800)
 *   --overlap <n>         Characters shared by consecutive chunks (default: 100)
 *   --concurrency <n>     Embedding batches in flight (default: 4)
 *   --batch-size <n>      Chunks per embedding call (default: 16)
 *   --type <type>         Tag every document: MFR|OPORD|UNSPECIFIED
 *   --log-level <level>   debug|info|warn|error|silent
 *   --help, -h            Show this help message
 *
 * Exit codes:
 *   0 - Success (index written)
 *   1 - Build, provider or I/O error (existing index untouched)
 *   2 - Invalid arguments or configuration
 *
 * Output (JSON):
 *   { "index_path": "...", "documents": 2, "records": 14, "dimensions": 1536, ... }
 */

import { Console } from 'node:console';
import { createLogger, describeConfig, loadConfig } from '../config/index.js';
import { buildAndSaveIndex } from '../rag/pipeline.js';
import {
  EXIT_OK,
  EXIT_VALIDATION_ERROR,
  exitCodeFor,
  parseBuildArgs,
  type BuildArgs,
} from './cli_args.js';

/**
 * Print usage.
 */
function printUsage(): void {
  console.log(`Usage: build-index --corpus <path> [--corpus <path> ...] [options]

Chunks and embeds reference documents (.txt, .md, .pdf) and saves the index.

Required arguments:
  --corpus <path>         File or directory to index (repeatable)

Options:
  --out <path>            Index file (default: RAG_INDEX_PATH or rag_index/index.json)
  --provider <name>       Embedding provider: openai | gemini | mock
  --model <id>            Embedding model
  --dimensions <n>        Vector size (required for unknown models)
  --chunk-size <n>        Maximum characters per chunk (default: 800)
  --overlap <n>           Characters shared by consecutive chunks (default: 100)
  --concurrency <n>       Embedding batches in flight (default: 4)
  --batch-size <n>        Chunks per embedding call (default: 16)
  --type <type>           Tag every document: MFR | OPORD | UNSPECIFIED
  --log-level <level>     debug | info | warn | error | silent
  --help, -h              Show this help message

Exit codes:
  0 - Success (index written)
  1 - Build, provider or I/O error (existing index untouched)
  2 - Invalid arguments or configuration

Examples:
  build-index --corpus references/
  build-index --corpus mfr_examples.txt --corpus opord_examples.txt --out rag_index/index.json
  build-index --corpus references/ --provider mock --log-level debug`);
}

/**
 * Main entry point.
 */
async function main(): Promise<number> {
  let args: BuildArgs;
  try {
    args = parseBuildArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_VALIDATION_ERROR;
  }

  if (args.help) {
    printUsage();
    return EXIT_OK;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error('Interrupted; cancelling build (nothing will be written)');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const config = loadConfig(process.env, args.overrides);
    // Logs go to stderr; stdout carries the JSON summary
    const logger = createLogger('build-index', config, new Console(process.stderr, process.stderr));
    logger.debug('Configuration', describeConfig(config));

    const { summary } = await buildAndSaveIndex(config, args.corpus, {
      logger,
      signal: controller.signal,
      ...(args.document_type ? { document_type: args.document_type } : {}),
    });

    console.log(JSON.stringify(summary, null, 2));
    return EXIT_OK;
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return exitCodeFor(error);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = exitCodeFor(err);
  }
);
