/**
 * Bross Sequential Analysis - Engine Module
 * ==========================================
 * Exports the walk, permutation and aggregation components
 */

export * from './traversal';
export * from './permutation';
export * from './aggregator';
