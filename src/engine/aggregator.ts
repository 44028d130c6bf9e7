/**
 * Bross Sequential Analysis - Outcome Aggregator
 * ===============================================
 * Reduces raw permutation decisions into a frequency table
 */

import { assertAlpha, clopperPearson } from '../stats/binomial';
import {
  Decision,
  FrequencyRow,
  FrequencyTable,
  IntervalEstimator,
  OUTCOME_CATEGORIES,
  OutcomeCategory,
  REGION,
} from '../types';

const CATEGORY_CODES: Record<OutcomeCategory, Decision> = {
  twilight: REGION.TWILIGHT,
  noDifference: REGION.NO_DIFFERENCE,
  aBetter: REGION.A_BETTER,
  bBetter: REGION.B_BETTER,
  none: null,
};

export const CATEGORY_LABELS: Record<OutcomeCategory, string> = {
  twilight: 'Twilight(-1)',
  noDifference: 'NoDiff(0)',
  aBetter: 'A_better(1)',
  bBetter: 'B_better(2)',
  none: 'NoInfo',
};

export function categoryOf(decision: Decision): OutcomeCategory {
  switch (decision) {
    case REGION.TWILIGHT: return 'twilight';
    case REGION.NO_DIFFERENCE: return 'noDifference';
    case REGION.A_BETTER: return 'aBetter';
    case REGION.B_BETTER: return 'bBetter';
    default: return 'none';
  }
}

export class OutcomeAggregator {
  private interval: IntervalEstimator;

  constructor(interval: IntervalEstimator = clopperPearson) {
    this.interval = interval;
  }

  /**
   * Count every category and attach an exact interval to each proportion
   */
  summarize(results: readonly Decision[], alpha: number): FrequencyTable {
    assertAlpha(alpha);

    const counts: Record<OutcomeCategory, number> = {
      twilight: 0,
      noDifference: 0,
      aBetter: 0,
      bBetter: 0,
      none: 0,
    };
    for (const decision of results) {
      counts[categoryOf(decision)]++;
    }

    const total = results.length;
    const rows = OUTCOME_CATEGORIES.map((category): FrequencyRow => {
      const count = counts[category];
      const { lower, upper } = total > 0
        ? this.interval(count, total, alpha)
        : { lower: 0, upper: 1 };
      return Object.freeze({
        category,
        code: CATEGORY_CODES[category],
        label: CATEGORY_LABELS[category],
        count,
        proportion: total > 0 ? count / total : 0,
        lower,
        upper,
      });
    });

    return Object.freeze({ total, alpha, rows: Object.freeze(rows) });
  }
}

export function createOutcomeAggregator(interval?: IntervalEstimator): OutcomeAggregator {
  return new OutcomeAggregator(interval);
}

export function findRow(table: FrequencyTable, category: OutcomeCategory): FrequencyRow {
  const row = table.rows.find(r => r.category === category);
  if (!row) {
    throw new Error(`Frequency table has no ${category} row`);
  }
  return row;
}
