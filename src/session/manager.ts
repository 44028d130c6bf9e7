/**
 * Bross Sequential Analysis - Session Manager
 * ============================================
 * Holds the working pair set, the latest results, and saved reports
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import {
  AsyncOrderCheckOptions,
  OrderCheckOptions,
  runOrderCheck,
  runOrderCheckAsync,
  runSequentialAnalysis,
} from '../analysis/seqanalysis';
import { InvalidInputError } from '../core/errors';
import { countInformative, loadPairsFile, validatePairs } from '../input/pairs';
import { DecisionMap } from '../map/decision-map';
import { renderMap, RenderOptions } from '../render/map-renderer';
import {
  AnalysisConfig,
  AnalysisReport,
  DEFAULT_ANALYSIS_CONFIG,
  Decision,
  OrderCheckStats,
  Pair,
  ReportListing,
  SequentialAnalysisResult,
} from '../types';
import { isRecord } from '../utils/guards';
import { getLogger } from '../utils/logger';

export const REPORT_VERSION = '1.0';

const REPORT_PREFIX = 'report_';

export interface SessionSummary {
  pairCount: number;
  informative: number;
  discarded: number;
  decision: Decision | undefined;
  message: string | null;
  lastOrderCheck: {
    iterations: number;
    alpha: number;
    pA: number;
    pB: number;
    pNoDiff: number;
    pTwilight: number;
    pNone: number;
  } | null;
}

// ============================================================================
// SESSION MANAGER
// ============================================================================

export class AnalysisSession {
  private pairs: Pair[] = [];
  private defaults: AnalysisConfig;
  private resultsDir: string;
  private autoSave: boolean;
  private map: DecisionMap;
  private lastAnalysis: SequentialAnalysisResult | null = null;
  private lastOrderCheck: OrderCheckStats | null = null;
  /** Bumped whenever the pair set changes */
  private generation = 0;

  constructor(options?: {
    defaults?: Partial<AnalysisConfig>;
    resultsDir?: string;
    autoSave?: boolean;
    map?: DecisionMap;
  }) {
    this.defaults = { ...DEFAULT_ANALYSIS_CONFIG, ...options?.defaults };
    this.resultsDir = options?.resultsDir ?? './data/reports';
    this.autoSave = options?.autoSave ?? false;
    this.map = options?.map ?? DecisionMap.bross();
  }

  // ==========================================================================
  // PAIRS
  // ==========================================================================

  getPairs(): Pair[] {
    return [...this.pairs];
  }

  getMap(): DecisionMap {
    return this.map;
  }

  getDefaults(): AnalysisConfig {
    return { ...this.defaults };
  }

  /**
   * Replace the working pair set
   */
  setPairs(value: unknown): Pair[] {
    this.pairs = validatePairs(value);
    this.invalidate();
    return this.getPairs();
  }

  addPair(a: unknown, b: unknown): Pair {
    const [pair] = validatePairs([[a, b]]);
    this.pairs.push(pair);
    this.invalidate();
    return pair;
  }

  /**
   * Remove and return the most recent pair
   */
  removeLastPair(): Pair | null {
    const removed = this.pairs.pop() ?? null;
    if (removed) this.invalidate();
    return removed;
  }

  clear(): void {
    this.pairs = [];
    this.invalidate();
  }

  loadPairs(filePath: string): Pair[] {
    this.pairs = loadPairsFile(filePath);
    this.invalidate();
    getLogger().info(`Loaded ${this.pairs.length} pairs from ${filePath}`);
    return this.getPairs();
  }

  private invalidate(): void {
    this.generation++;
    this.lastAnalysis = null;
    this.lastOrderCheck = null;
  }

  private requirePairs(): Pair[] {
    if (this.pairs.length === 0) {
      throw new InvalidInputError('No pairs entered yet');
    }
    return this.pairs;
  }

  // ==========================================================================
  // ANALYSIS
  // ==========================================================================

  analyze(): SequentialAnalysisResult {
    this.lastAnalysis = runSequentialAnalysis(this.requirePairs(), { map: this.map });
    return this.lastAnalysis;
  }

  getLastAnalysis(): SequentialAnalysisResult | null {
    return this.lastAnalysis;
  }

  private withDefaults(options: OrderCheckOptions): OrderCheckOptions {
    return {
      ...options,
      iterations: options.iterations ?? this.defaults.iterations,
      alpha: options.alpha ?? this.defaults.alpha,
      seed: options.seed ?? this.defaults.seed,
      map: this.map,
    };
  }

  orderCheck(options: OrderCheckOptions = {}): OrderCheckStats {
    const stats = runOrderCheck(this.requirePairs(), this.withDefaults(options));
    this.recordOrderCheck(stats);
    return stats;
  }

  /**
   * Chunked order check. Pairs may change while it runs; the result is then
   * returned but not kept as the session's latest.
   */
  async orderCheckAsync(options: AsyncOrderCheckOptions = {}): Promise<OrderCheckStats> {
    const generation = this.generation;
    const stats = await runOrderCheckAsync(this.requirePairs(), {
      ...this.withDefaults(options),
      chunkSize: options.chunkSize ?? this.defaults.chunkSize,
      signal: options.signal,
    });

    if (generation !== this.generation) {
      getLogger().warn('Pairs changed during the order check; result not recorded');
      return stats;
    }
    this.recordOrderCheck(stats);
    return stats;
  }

  private recordOrderCheck(stats: OrderCheckStats): void {
    this.lastOrderCheck = stats;
    getLogger().info(
      `Order check done: ${stats.iterations} permutations, pA=${stats.pA.toFixed(3)} pB=${stats.pB.toFixed(3)}`
    );
    if (this.autoSave) {
      this.saveReport();
    }
  }

  getLastOrderCheck(): OrderCheckStats | null {
    return this.lastOrderCheck;
  }

  /**
   * Text map of the latest analysis (runs one if needed)
   */
  renderMap(options?: RenderOptions): string {
    const analysis = this.lastAnalysis ?? this.analyze();
    const grid = analysis.traversal.grid ?? this.map.initialGrid();
    return renderMap(grid, analysis.decision, options);
  }

  getSummary(): SessionSummary {
    const informative = countInformative(this.pairs);
    const check = this.lastOrderCheck;
    return {
      pairCount: this.pairs.length,
      informative,
      discarded: this.pairs.length - informative,
      decision: this.lastAnalysis ? this.lastAnalysis.decision : undefined,
      message: this.lastAnalysis ? this.lastAnalysis.message : null,
      lastOrderCheck: check
        ? {
          iterations: check.iterations,
          alpha: check.alpha,
          pA: check.pA,
          pB: check.pB,
          pNoDiff: check.pNoDiff,
          pTwilight: check.pTwilight,
          pNone: check.pNone,
        }
        : null,
    };
  }

  // ==========================================================================
  // REPORTS
  // ==========================================================================

  exportReport(): AnalysisReport {
    const analysis = this.lastAnalysis;
    const check = this.lastOrderCheck;
    return {
      id: uuid(),
      version: REPORT_VERSION,
      ts: new Date().toISOString(),
      pairs: this.getPairs(),
      analysis: analysis
        ? {
          decision: analysis.decision,
          message: analysis.message,
          informative: analysis.informative,
          discarded: analysis.discarded,
          steps: analysis.traversal.steps,
        }
        : null,
      orderCheck: check
        ? { iterations: check.iterations, alpha: check.alpha, seed: check.seed, freq: check.freq }
        : null,
    };
  }

  /**
   * Write the current state as a report file; returns its path
   */
  saveReport(): string {
    const report = this.exportReport();
    const dir = path.resolve(this.resultsDir);
    fs.mkdirSync(dir, { recursive: true });

    const filePath = path.join(dir, `${REPORT_PREFIX}${report.id}.json`);
    fs.writeFileSync(filePath, JSON.stringify(report, null, 2), 'utf-8');
    getLogger().info(`Report saved to ${filePath}`);
    return filePath;
  }

  loadReport(id: string): AnalysisReport {
    const filePath = path.join(path.resolve(this.resultsDir), `${REPORT_PREFIX}${id}.json`);
    return parseReport(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  }

  /**
   * Saved reports, newest first
   */
  listReports(): ReportListing[] {
    const dir = path.resolve(this.resultsDir);
    if (!fs.existsSync(dir)) return [];

    const listings: ReportListing[] = [];
    for (const file of fs.readdirSync(dir)) {
      if (!file.startsWith(REPORT_PREFIX) || !file.endsWith('.json')) continue;
      const filePath = path.join(dir, file);
      try {
        const report = parseReport(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
        listings.push({
          id: report.id,
          ts: report.ts,
          pairCount: report.pairs.length,
          decision: report.analysis ? report.analysis.decision : undefined,
          path: filePath,
        });
      } catch (error) {
        getLogger().warn(`Skipping unreadable report ${file}`, error);
      }
    }

    return listings.sort((x, y) => y.ts.localeCompare(x.ts));
  }
}

/**
 * Check the parts of a report file that listings and reloads rely on
 */
export function parseReport(raw: unknown): AnalysisReport {
  if (!isRecord(raw)) {
    throw new Error('Report must be a JSON object');
  }
  const { id, version, ts, pairs, analysis, orderCheck } = raw;
  if (typeof id !== 'string' || typeof ts !== 'string') {
    throw new Error('Report is missing id or timestamp');
  }
  return {
    id,
    version: typeof version === 'string' ? version : REPORT_VERSION,
    ts,
    pairs: Array.isArray(pairs) && pairs.length === 0 ? [] : validatePairs(pairs),
    analysis: isReportAnalysis(analysis) ? analysis : null,
    orderCheck: isReportOrderCheck(orderCheck) ? orderCheck : null,
  };
}

function isReportAnalysis(value: unknown): value is NonNullable<AnalysisReport['analysis']> {
  if (!isRecord(value)) return false;
  const decision = value.decision;
  return (decision === null || decision === -1 || decision === 0 || decision === 1 || decision === 2)
    && typeof value.message === 'string'
    && typeof value.steps === 'number';
}

function isReportOrderCheck(value: unknown): value is NonNullable<AnalysisReport['orderCheck']> {
  if (!isRecord(value)) return false;
  return typeof value.iterations === 'number'
    && typeof value.alpha === 'number'
    && isRecord(value.freq)
    && Array.isArray(value.freq.rows);
}

export function createAnalysisSession(options?: ConstructorParameters<typeof AnalysisSession>[0]): AnalysisSession {
  return new AnalysisSession(options);
}
