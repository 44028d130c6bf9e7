/**
 * Bross Sequential Analysis - Analysis Facade
 * ============================================
 * The two entry points: one sequential analysis of the pairs as given,
 * and the order-robustness check over random permutations
 */

import { OutcomeAggregator, createOutcomeAggregator, findRow } from '../engine/aggregator';
import { PermutationDriver, assertIterations, createPermutationDriver } from '../engine/permutation';
import { createTraversalEngine, describeDecision } from '../engine/traversal';
import { filterInformative, validatePairs } from '../input/pairs';
import { DecisionMap } from '../map/decision-map';
import { assertAlpha } from '../stats/binomial';
import { createRandomSource } from '../stats/random';
import {
  DEFAULT_ANALYSIS_CONFIG,
  Decision,
  FrequencyTable,
  IntervalEstimator,
  OrderCheckStats,
  SequentialAnalysisResult,
} from '../types';
import { getLogger } from '../utils/logger';
import { ProgressReporter, silentProgress } from '../utils/progress';

// ============================================================================
// SEQUENTIAL ANALYSIS
// ============================================================================

export interface SequentialAnalysisOptions {
  map?: DecisionMap;
}

/**
 * Validate, drop non-informative pairs, and walk the map in the given order
 */
export function runSequentialAnalysis(
  pairs: unknown,
  options: SequentialAnalysisOptions = {}
): SequentialAnalysisResult {
  const validated = validatePairs(pairs);
  const informative = filterInformative(validated);
  const engine = createTraversalEngine(options.map);
  const traversal = engine.run(informative);

  return {
    decision: traversal.decision,
    message: describeDecision(traversal.decision),
    informative: informative.length,
    discarded: validated.length - informative.length,
    traversal,
  };
}

// ============================================================================
// ORDER CHECK
// ============================================================================

export interface OrderCheckOptions {
  iterations?: number;
  alpha?: number;
  /** Seed for the permutation generator; omit for a fresh one */
  seed?: number | null;
  progress?: ProgressReporter;
  map?: DecisionMap;
  interval?: IntervalEstimator;
}

export interface AsyncOrderCheckOptions extends OrderCheckOptions {
  chunkSize?: number;
  signal?: AbortSignal;
}

interface PreparedOrderCheck {
  iterations: number;
  alpha: number;
  seed: number;
  progress: ProgressReporter;
  driver: PermutationDriver;
  aggregator: OutcomeAggregator;
}

function prepare(pairs: unknown, options: OrderCheckOptions) {
  const validated = validatePairs(pairs);
  const iterations = options.iterations ?? DEFAULT_ANALYSIS_CONFIG.iterations;
  const alpha = options.alpha ?? DEFAULT_ANALYSIS_CONFIG.alpha;
  assertIterations(iterations);
  assertAlpha(alpha);

  const prepared: PreparedOrderCheck = {
    iterations,
    alpha,
    seed: options.seed ?? Math.floor(Math.random() * 0x1_0000_0000),
    progress: options.progress ?? silentProgress,
    driver: createPermutationDriver(createTraversalEngine(options.map)),
    aggregator: createOutcomeAggregator(options.interval),
  };
  return { validated, prepared };
}

/**
 * Assemble the stats record from raw codes and their frequency table
 */
export function buildOrderCheckStats(
  codes: Decision[],
  freq: FrequencyTable,
  seed: number | null
): OrderCheckStats {
  const twilight = findRow(freq, 'twilight');
  const noDiff = findRow(freq, 'noDifference');
  const a = findRow(freq, 'aBetter');
  const b = findRow(freq, 'bBetter');
  const none = findRow(freq, 'none');

  return {
    codes,
    freq,
    iterations: freq.total,
    alpha: freq.alpha,
    seed,
    pTwilight: twilight.proportion,
    pNoDiff: noDiff.proportion,
    pA: a.proportion,
    pB: b.proportion,
    pNone: none.proportion,
    ciTwilight: { lower: twilight.lower, upper: twilight.upper },
    ciNoDiff: { lower: noDiff.lower, upper: noDiff.upper },
    ciA: { lower: a.lower, upper: a.upper },
    ciB: { lower: b.lower, upper: b.upper },
    ciNone: { lower: none.lower, upper: none.upper },
  };
}

/**
 * Permute the pairs `iterations` times and tabulate the decisions
 */
export function runOrderCheck(pairs: unknown, options: OrderCheckOptions = {}): OrderCheckStats {
  const { validated, prepared } = prepare(pairs, options);
  const { iterations, alpha, seed, progress, driver, aggregator } = prepared;

  getLogger().debug(`Order check: ${iterations} permutations of ${validated.length} pairs (seed ${seed})`);

  progress.start(iterations);
  let codes: Decision[];
  try {
    codes = driver.evaluate(validated, iterations, {
      random: createRandomSource(seed),
      onProgress: (done, total) => progress.update(done, total),
    });
  } finally {
    progress.finish();
  }

  return buildOrderCheckStats(codes, aggregator.summarize(codes, alpha), seed);
}

/**
 * Chunked variant of runOrderCheck that can be aborted
 */
export async function runOrderCheckAsync(
  pairs: unknown,
  options: AsyncOrderCheckOptions = {}
): Promise<OrderCheckStats> {
  const { validated, prepared } = prepare(pairs, options);
  const { iterations, alpha, seed, progress, driver, aggregator } = prepared;

  getLogger().debug(`Async order check: ${iterations} permutations of ${validated.length} pairs (seed ${seed})`);

  progress.start(iterations);
  let codes: Decision[];
  try {
    codes = await driver.evaluateAsync(validated, iterations, {
      random: createRandomSource(seed),
      onProgress: (done, total) => progress.update(done, total),
      chunkSize: options.chunkSize,
      signal: options.signal,
    });
  } finally {
    progress.finish();
  }

  return buildOrderCheckStats(codes, aggregator.summarize(codes, alpha), seed);
}
