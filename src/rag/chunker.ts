/**
 * Chunker
 * =======
 *
 * Splits document text into bounded, overlapping windows.
 * Consecutive chunks always share exactly `overlap` characters, so
 * dropping the first `overlap` characters of every chunk after the first
 * and concatenating reproduces the input.
 *
 * Offsets are UTF-16 code units, but no cut (chunk end or overlap start)
 * lands inside a surrogate pair. A window shrinks to avoid one and only
 * grows past `chunk_size` when it cannot shrink while still moving forward.
 */

import { ConfigError } from './errors.js';
import type { Chunk, ChunkingOptions } from './types.js';

/**
 * Default chunking options. 800 characters keeps a chunk to roughly one
 * paragraph of a memorandum.
 */
export const DEFAULT_CHUNKING: Readonly<Required<ChunkingOptions>> = {
  chunk_size: 800,
  overlap: 100,
  break_on_boundaries: true,
};

/**
 * Reject chunking parameters that cannot make progress.
 */
export function validateChunkingOptions(options: ChunkingOptions): void {
  const { chunk_size, overlap } = options;

  if (!Number.isInteger(chunk_size) || chunk_size <= 0) {
    throw new ConfigError('chunk_size', `chunk_size must be a positive integer, got ${chunk_size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError('overlap', `overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunk_size) {
    throw new ConfigError(
      'overlap',
      `overlap (${overlap}) must be smaller than chunk_size (${chunk_size})`
    );
  }
}

/**
 * Pull `end` back to just after the last newline (or space) in the window,
 * as long as the window stays long enough to move forward past the overlap.
 */
function snapToBoundary(text: string, start: number, end: number, options: ChunkingOptions): number {
  const minLength = Math.max(options.overlap + 1, Math.floor(options.chunk_size / 2));

  for (const separator of ['\n', ' ']) {
    const at = text.lastIndexOf(separator, end - 1);
    if (at >= start && at + 1 - start >= minLength) {
      return at + 1;
    }
  }

  return end;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function splitsPair(text: string, at: number): boolean {
  if (at <= 0 || at >= text.length) return false;
  return isHighSurrogate(text.charCodeAt(at - 1)) && isLowSurrogate(text.charCodeAt(at));
}

/**
 * Move `end` so that neither it nor the next chunk's start splits a pair.
 */
function avoidSplitPairs(text: string, start: number, end: number, overlap: number): number {
  const cuts = (at: number): boolean =>
    at < text.length && (splitsPair(text, at) || splitsPair(text, at - overlap));

  let candidate = end;
  while (cuts(candidate) && candidate - 1 - start > overlap) {
    candidate--;
  }
  if (!cuts(candidate)) return candidate;

  candidate = end;
  while (cuts(candidate)) {
    candidate++;
  }
  return candidate;
}

/**
 * Chunk text into overlapping windows.
 */
export function chunkText(text: string, options: ChunkingOptions = DEFAULT_CHUNKING): Chunk[] {
  validateChunkingOptions(options);

  const chunks: Chunk[] = [];
  if (text.length === 0) return chunks;

  const breakOnBoundaries = options.break_on_boundaries ?? DEFAULT_CHUNKING.break_on_boundaries;
  let start = 0;
  let index = 0;

  for (;;) {
    let end = Math.min(start + options.chunk_size, text.length);

    if (end < text.length && breakOnBoundaries) {
      end = snapToBoundary(text, start, end, options);
    }
    end = avoidSplitPairs(text, start, end, options.overlap);

    chunks.push({
      content: text.slice(start, end),
      start_offset: start,
      end_offset: end,
      index,
    });
    index++;

    if (end >= text.length) break;
    start = end - options.overlap;
  }

  return chunks;
}
