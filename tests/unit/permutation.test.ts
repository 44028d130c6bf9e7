/**
 * Bross Sequential Analysis - Permutation Driver Tests
 * =====================================================
 */

import { PermutationDriver, createPermutationDriver } from '../../src/engine/permutation';
import { AbortError, InvalidArgumentError } from '../../src/core/errors';
import { createRandomSource } from '../../src/stats/random';
import { Pair, REGION } from '../../src/types';

const A: Pair = [1, 0];
const B: Pair = [0, 1];
const TIE_WIN: Pair = [1, 1];
const TIE_LOSS: Pair = [0, 0];

const repeat = (pair: Pair, n: number): Pair[] => Array.from({ length: n }, () => pair);

describe('PermutationDriver', () => {
  let driver: PermutationDriver;

  beforeEach(() => {
    driver = createPermutationDriver();
  });

  describe('evaluate', () => {
    it('should return one decision per iteration', () => {
      const pairs = [...repeat(A, 11), TIE_WIN, TIE_LOSS];
      const codes = driver.evaluate(pairs, 5, { random: createRandomSource(1) });

      expect(codes).toEqual([1, 1, 1, 1, 1]);
    });

    it('should give absent decisions when every pair is a tie', () => {
      const codes = driver.evaluate([TIE_WIN, TIE_LOSS, TIE_WIN], 3, { random: createRandomSource(1) });
      expect(codes).toEqual([null, null, null]);
    });

    it('should permute before walking', () => {
      const pairs = [...repeat(A, 11), B];

      // draws near 1 leave the order as entered: eleven A then B
      expect(driver.evaluate(pairs, 1, { random: () => 0.999 })).toEqual([REGION.A_BETTER]);
      // draws of 0 move B to the second-to-last place
      expect(driver.evaluate(pairs, 1, { random: () => 0 })).toEqual([REGION.TWILIGHT]);
    });

    it('should only reach A better or twilight on an A-heavy set with two B', () => {
      const pairs = [...repeat(A, 11), B, B, TIE_WIN];
      const codes = driver.evaluate(pairs, 200, { random: createRandomSource(42) });

      expect(codes).toHaveLength(200);
      codes.forEach(code => expect([REGION.A_BETTER, REGION.TWILIGHT]).toContain(code));
    });

    it('should be reproducible with a fixed seed', () => {
      const pairs = [...repeat(A, 11), B, B, TIE_LOSS];
      const first = driver.evaluate(pairs, 100, { random: createRandomSource(2024) });
      const second = driver.evaluate(pairs, 100, { random: createRandomSource(2024) });

      expect(first).toEqual(second);
    });

    it('should not mutate the caller list', () => {
      const pairs = [A, B, TIE_WIN, A];
      driver.evaluate(pairs, 10, { random: createRandomSource(3) });

      expect(pairs).toEqual([A, B, TIE_WIN, A]);
    });

    it('should report progress after every iteration', () => {
      const calls: Array<[number, number]> = [];
      driver.evaluate([A], 3, {
        random: createRandomSource(1),
        onProgress: (done, total) => calls.push([done, total]),
      });

      expect(calls).toEqual([[1, 3], [2, 3], [3, 3]]);
    });

    it('should reject a non-positive or fractional iteration count', () => {
      expect(() => driver.evaluate([A], 0)).toThrow('iterations must be a positive integer, got 0');
      expect(() => driver.evaluate([A], 2.5)).toThrow(InvalidArgumentError);
    });
  });

  describe('evaluateAsync', () => {
    const pairs = [...repeat(A, 11), B, B, TIE_WIN];

    it('should match the synchronous run for the same seed', async () => {
      const sync = driver.evaluate(pairs, 50, { random: createRandomSource(77) });
      const chunked = await driver.evaluateAsync(pairs, 50, { random: createRandomSource(77), chunkSize: 7 });

      expect(chunked).toEqual(sync);
    });

    it('should reject at once when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        driver.evaluateAsync(pairs, 10, { signal: controller.signal })
      ).rejects.toThrow('Order check aborted after 0 of 10 iterations');
    });

    it('should stop at the next chunk boundary once aborted', async () => {
      const controller = new AbortController();
      const run = driver.evaluateAsync(pairs, 10, {
        random: createRandomSource(5),
        chunkSize: 2,
        signal: controller.signal,
        onProgress: (done) => {
          if (done === 3) controller.abort();
        },
      });

      await expect(run).rejects.toBeInstanceOf(AbortError);
      await expect(run).rejects.toThrow('Order check aborted after 4 of 10 iterations');
    });

    it('should validate the chunk size', async () => {
      await expect(driver.evaluateAsync(pairs, 10, { chunkSize: 0 })).rejects.toThrow(
        'chunkSize must be a positive integer, got 0'
      );
    });

    it('should validate the iteration count', async () => {
      await expect(driver.evaluateAsync(pairs, -1)).rejects.toThrow(InvalidArgumentError);
    });
  });
});
