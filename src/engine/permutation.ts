/**
 * Bross Sequential Analysis - Permutation Driver
 * ===============================================
 * Monte Carlo re-ordering of the pair list to measure how much the
 * conclusion depends on the order pairs arrived in
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { AbortError, InvalidArgumentError } from '../core/errors';
import { filterInformative } from '../input/pairs';
import { RandomSource, createRandomSource, shuffle } from '../stats/random';
import { Decision, Pair } from '../types';
import { getLogger } from '../utils/logger';
import { TraversalEngine } from './traversal';

// ============================================================================
// OPTIONS
// ============================================================================

export interface PermutationOptions {
  /** Source of uniform draws; defaults to a freshly seeded generator */
  random?: RandomSource;
  /** Called after each completed iteration */
  onProgress?: (done: number, total: number) => void;
}

export interface AsyncPermutationOptions extends PermutationOptions {
  /** Iterations run between two yields to the event loop */
  chunkSize?: number;
  signal?: AbortSignal;
}

export const DEFAULT_CHUNK_SIZE = 250;

export function assertIterations(iterations: number): void {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new InvalidArgumentError(`iterations must be a positive integer, got ${iterations}`);
  }
}

// ============================================================================
// PERMUTATION DRIVER
// ============================================================================

export class PermutationDriver {
  private engine: TraversalEngine;

  constructor(engine: TraversalEngine = new TraversalEngine()) {
    this.engine = engine;
  }

  /**
   * One iteration: permute the whole list, then filter, then walk
   */
  private iterate(pairs: readonly Pair[], random: RandomSource): Decision {
    const order = shuffle(pairs, random);
    return this.engine.run(filterInformative(order)).decision;
  }

  /**
   * Run all iterations synchronously
   */
  evaluate(pairs: readonly Pair[], iterations: number, options: PermutationOptions = {}): Decision[] {
    assertIterations(iterations);

    const random = options.random ?? createRandomSource();
    const codes: Decision[] = new Array<Decision>(iterations);

    for (let i = 0; i < iterations; i++) {
      codes[i] = this.iterate(pairs, random);
      options.onProgress?.(i + 1, iterations);
    }

    getLogger().debug(`Permutation run finished: ${iterations} iterations over ${pairs.length} pairs`);
    return codes;
  }

  /**
   * Run all iterations in chunks, yielding between chunks.
   * An aborted signal stops new iterations and rejects with AbortError.
   */
  async evaluateAsync(
    pairs: readonly Pair[],
    iterations: number,
    options: AsyncPermutationOptions = {}
  ): Promise<Decision[]> {
    assertIterations(iterations);

    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new InvalidArgumentError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    const random = options.random ?? createRandomSource();
    const codes: Decision[] = new Array<Decision>(iterations);
    const { signal } = options;

    for (let start = 0; start < iterations; start += chunkSize) {
      if (signal?.aborted) {
        throw new AbortError(`Order check aborted after ${start} of ${iterations} iterations`);
      }

      const end = Math.min(start + chunkSize, iterations);
      for (let i = start; i < end; i++) {
        codes[i] = this.iterate(pairs, random);
        options.onProgress?.(i + 1, iterations);
      }

      if (end < iterations) {
        await yieldToEventLoop();
      }
    }

    getLogger().debug(`Async permutation run finished: ${iterations} iterations in chunks of ${chunkSize}`);
    return codes;
  }
}

export function createPermutationDriver(engine?: TraversalEngine): PermutationDriver {
  return new PermutationDriver(engine);
}
