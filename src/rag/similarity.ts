/**
 * Similarity Functions
 * ====================
 *
 * Vector math for exact nearest-neighbour ranking.
 */

import { IndexMismatchError } from './errors.js';

function assertSameLength(a: readonly number[], b: readonly number[]): void {
  if (a.length !== b.length) {
    throw new IndexMismatchError(`Vector dimension mismatch: ${a.length} vs ${b.length}`, {
      expected: a.length,
      actual: b.length,
    });
  }
}

/**
 * Compute dot product between two vectors.
 */
export function dotProduct(a: readonly number[], b: readonly number[]): number {
  assertSameLength(a, b);

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }

  return sum;
}

function maxAbs(v: readonly number[]): number {
  let max = 0;
  for (const x of v) {
    max = Math.max(max, Math.abs(x));
  }
  return max;
}

// Squares of components past ~1e154 overflow and below ~1e-162 vanish
function outOfRange(sum: number): boolean {
  return !Number.isFinite(sum) || sum === 0;
}

function scaled(v: readonly number[]): number[] {
  const max = maxAbs(v);
  return max === 0 ? [...v] : v.map((x) => x / max);
}

/**
 * Euclidean norm.
 */
export function magnitude(v: readonly number[]): number {
  let sum = 0;
  for (const x of v) {
    sum += x * x;
  }
  if (outOfRange(sum)) {
    const max = maxAbs(v);
    if (max === 0 || !Number.isFinite(max)) return max;
    let scaledSum = 0;
    for (const x of v) {
      scaledSum += (x / max) * (x / max);
    }
    return max * Math.sqrt(scaledSum);
  }
  return Math.sqrt(sum);
}

function cosineOf(a: readonly number[], b: readonly number[]): { dot: number; normA: number; normB: number } {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dot += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  }

  return { dot, normA, normB };
}

/**
 * Compute cosine similarity between two vectors.
 * Returns null when either vector has zero magnitude: the angle is undefined
 * and the caller decides what to do with it.
 * Vectors whose squared norms leave the double range are rescaled by their
 * largest component first.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
  assertSameLength(a, b);

  let sums = cosineOf(a, b);
  if (outOfRange(sums.normA) || outOfRange(sums.normB) || !Number.isFinite(sums.dot)) {
    sums = cosineOf(scaled(a), scaled(b));
  }

  const denominator = Math.sqrt(sums.normA) * Math.sqrt(sums.normB);
  if (denominator === 0 || !Number.isFinite(denominator)) return null;

  return sums.dot / denominator;
}
