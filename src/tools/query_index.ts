#!/usr/bin/env node
/**
 * Query Index CLI
 * ===============
 *
 * Retrieves the reference chunks most similar to a query.
 *
 * Usage:
 *   query-index --query <text> [options]
 *
 * Options:
 *   --query, -q <text>    Query text (required)
 *   --k <n>               Number of results (default: RAG_TOP_K or 4)
 *   --type <type>         Only MFR|OPORD|UNSPECIFIED chunks
 *   --index <path>        Index file (default: RAG_INDEX_PATH or rag_index/index.json)
 *   --min-similarity <x>  Drop results below this cosine similarity
 *   --provider <name>     Embedding provider: openai|gemini|mock
 *   --model <id>          Embedding model (must match the index)
 *   --dimensions <n>      Vector size
 *   --log-level <level>   debug|info|warn|error|silent
 *   --help, -h            Show this help message
 *
 * Exit codes:
 *   0 - Success (possibly zero results)
 *   1 - Provider, index or I/O error
 *   2 - Invalid arguments or configuration
 *
 * Output (JSON):
 *   { "query": "...", "total_searched": 12, "results": [{ "rank": 1, "id": "...", ... }] }
 */

import { Console } from 'node:console';
import { createLogger, loadConfig } from '../config/index.js';
import { openRetriever } from '../rag/pipeline.js';
import {
  EXIT_OK,
  EXIT_VALIDATION_ERROR,
  exitCodeFor,
  parseQueryArgs,
  type QueryArgs,
} from './cli_args.js';

/**
 * Print usage.
 */
function printUsage(): void {
  console.log(`Usage: query-index --query <text> [options]

Retrieves the reference chunks most similar to a query.

Required arguments:
  --query, -q <text>      Query text

Options:
  --k <n>                 Number of results (default: RAG_TOP_K or 4)
  --type <type>           Only MFR | OPORD | UNSPECIFIED chunks
  --index <path>          Index file (default: RAG_INDEX_PATH or rag_index/index.json)
  --min-similarity <x>    Drop results below this cosine similarity (-1 to 1)
  --provider <name>       Embedding provider: openai | gemini | mock
  --model <id>            Embedding model (must match the index)
  --dimensions <n>        Vector size
  --log-level <level>     debug | info | warn | error | silent
  --help, -h              Show this help message

Exit codes:
  0 - Success (possibly zero results)
  1 - Provider, index or I/O error
  2 - Invalid arguments or configuration

Examples:
  query-index --query "bed rest SOP" --type MFR
  query-index -q "convoy movement timeline" --k 8 --index rag_index/index.json`);
}

/**
 * Main entry point.
 */
async function main(): Promise<number> {
  let args: QueryArgs;
  try {
    args = parseQueryArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_VALIDATION_ERROR;
  }

  if (args.help) {
    printUsage();
    return EXIT_OK;
  }

  try {
    const config = loadConfig(process.env, args.overrides);
    const logger = createLogger('query-index', config, new Console(process.stderr, process.stderr));

    // A corrupt index is an error here, not an empty result
    const retriever = await openRetriever(config, { logger, strict: true });
    const response = await retriever.search({
      text: args.query,
      limit: config.retrieval.top_k,
      ...(args.type_filter ? { type_filter: args.type_filter } : {}),
    });

    console.log(
      JSON.stringify(
        {
          query: args.query,
          total_searched: response.total_searched,
          latency_ms: response.latency_ms,
          results: response.results,
        },
        null,
        2
      )
    );
    return EXIT_OK;
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    return exitCodeFor(error);
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
