/**
 * Bross Sequential Analysis - Type Definitions
 * =============================================
 * Core type definitions shared by the map, engine, session and interfaces
 */

// ============================================================================
// PAIR TYPES
// ============================================================================

/** Binary response: 1 = success, 0 = failure */
export type Bit = 0 | 1;

/** One patient couple: [response to A, response to B] */
export type Pair = readonly [Bit, Bit];

/** A pair whose responses differ; only these move the walker */
export type InformativePair = readonly [1, 0] | readonly [0, 1];

// ============================================================================
// MAP TYPES
// ============================================================================

/** Region codes stored in the decision grid */
export const REGION = {
  TWILIGHT: -1,
  NO_DIFFERENCE: 0,
  A_BETTER: 1,
  B_BETTER: 2,
  PATH: 3,
  BOUNDARY: 4,
} as const;

export type RegionCode = typeof REGION[keyof typeof REGION];

/** Row-major grid of region codes */
export type RegionGrid = number[][];

/** 1-indexed grid coordinate */
export interface Position {
  row: number;
  col: number;
}

// ============================================================================
// DECISION TYPES
// ============================================================================

/** Final outcome of a walk */
export type DecisionCode = -1 | 0 | 1 | 2;

/** null = no informative pairs, the procedure never started */
export type Decision = DecisionCode | null;

/** Reporting categories, in fixed order */
export type OutcomeCategory = 'twilight' | 'noDifference' | 'aBetter' | 'bBetter' | 'none';

export const OUTCOME_CATEGORIES: readonly OutcomeCategory[] = [
  'twilight',
  'noDifference',
  'aBetter',
  'bBetter',
  'none',
];

/** Outcome of a single walk over the map */
export interface TraversalResult {
  /** Final decision code, null when there were no informative pairs */
  decision: Decision;
  /** Working copy of the grid with path and boundary markers (null when untouched) */
  grid: RegionGrid | null;
  /** Every visited position, in order */
  path: Position[];
  /** Number of informative pairs consumed before the walk ended */
  steps: number;
  /** Last visited position */
  terminal: Position | null;
}

// ============================================================================
// FREQUENCY TYPES
// ============================================================================

export interface ConfidenceInterval {
  lower: number;
  upper: number;
}

/** (successes, trials, alpha) -> exact interval */
export type IntervalEstimator = (successes: number, trials: number, alpha: number) => ConfidenceInterval;

export interface FrequencyRow {
  category: OutcomeCategory;
  code: Decision;
  label: string;
  count: number;
  proportion: number;
  lower: number;
  upper: number;
}

export interface FrequencyTable {
  total: number;
  alpha: number;
  rows: readonly FrequencyRow[];
}

/** Result of the order-robustness evaluation */
export interface OrderCheckStats {
  /** Raw decision of every iteration */
  codes: Decision[];
  freq: FrequencyTable;
  iterations: number;
  alpha: number;
  /** Seed used for the permutations (null when unseeded) */
  seed: number | null;

  pTwilight: number;
  pNoDiff: number;
  pA: number;
  pB: number;
  pNone: number;

  ciTwilight: ConfidenceInterval;
  ciNoDiff: ConfidenceInterval;
  ciA: ConfidenceInterval;
  ciB: ConfidenceInterval;
  ciNone: ConfidenceInterval;
}

/** Result of one sequential analysis of the pairs in their given order */
export interface SequentialAnalysisResult {
  decision: Decision;
  message: string;
  /** Informative pairs that entered the walk */
  informative: number;
  /** Non-informative pairs dropped before the walk */
  discarded: number;
  traversal: TraversalResult;
}

// ============================================================================
// CONFIG TYPES
// ============================================================================

export interface AnalysisConfig {
  /** Significance level for binomial intervals */
  alpha: number;
  /** Default number of permutations */
  iterations: number;
  /** Fixed seed for permutations, null for a fresh one per run */
  seed: number | null;
  /** Show a progress bar during order checks */
  showProgress: boolean;
  /** Iterations per chunk in async runs */
  chunkSize: number;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  alpha: 0.05,
  iterations: 1000,
  seed: null,
  showProgress: true,
  chunkSize: 250,
};

// ============================================================================
// REPORT TYPES
// ============================================================================

/** Persisted analysis report */
export interface AnalysisReport {
  id: string;
  version: string;
  ts: string;
  pairs: Pair[];
  analysis: {
    decision: Decision;
    message: string;
    informative: number;
    discarded: number;
    steps: number;
  } | null;
  orderCheck: {
    iterations: number;
    alpha: number;
    seed: number | null;
    freq: FrequencyTable;
  } | null;
}

/** Short listing entry for saved reports */
export interface ReportListing {
  id: string;
  ts: string;
  pairCount: number;
  decision: Decision | undefined;
  path: string;
}
