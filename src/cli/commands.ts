/**
 * Bross Sequential Analysis - CLI Commands
 * =========================================
 * Command handlers for the interactive shell
 */

import { SeqAnalysisError } from '../core/errors';
import { renderLegend } from '../render/map-renderer';
import { AnalysisSession } from '../session/manager';
import { Decision, FrequencyTable, Pair, REGION } from '../types';
import { getLogger, isLogLevel } from '../utils/logger';
import { createConsoleProgress, silentProgress } from '../utils/progress';

// ============================================================================
// DISPLAY HELPERS
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

function colorDecision(decision: Decision | undefined, message: string): string {
  switch (decision) {
    case REGION.A_BETTER: return `${COLORS.red}${message}${COLORS.reset}`;
    case REGION.B_BETTER: return `${COLORS.blue}${message}${COLORS.reset}`;
    case REGION.NO_DIFFERENCE: return `${COLORS.magenta}${message}${COLORS.reset}`;
    case REGION.TWILIGHT: return `${COLORS.yellow}${message}${COLORS.reset}`;
    default: return `${COLORS.dim}${message}${COLORS.reset}`;
  }
}

function formatPair(pair: Pair): string {
  const [a, b] = pair;
  if (a === b) return `${COLORS.dim}${a} ${b}  (tie)${COLORS.reset}`;
  return a === 1 ? `${a} ${b}  ${COLORS.red}→ A${COLORS.reset}` : `${a} ${b}  ${COLORS.blue}→ B${COLORS.reset}`;
}

/**
 * Plain-text frequency table: one header line and one line per category
 */
export function formatFrequencyTable(table: FrequencyTable): string {
  const pct = `${((1 - table.alpha) * 100).toFixed(0)}% CI`;
  const header = [
    'Outcome'.padEnd(14),
    'Count'.padStart(7),
    'Proportion'.padStart(11),
    `${pct} lower`.padStart(14),
    `${pct} upper`.padStart(14),
  ].join('');

  const lines = table.rows.map(row => [
    row.label.padEnd(14),
    String(row.count).padStart(7),
    row.proportion.toFixed(4).padStart(11),
    row.lower.toFixed(4).padStart(14),
    row.upper.toFixed(4).padStart(14),
  ].join(''));

  return [header, ...lines].join('\n');
}

function parseOptionalNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new SeqAnalysisError(`${name} must be a number, got "${value}"`);
  }
  return n;
}

// ============================================================================
// COMMAND HANDLERS
// ============================================================================

export class CommandHandler {
  private session: AnalysisSession;
  private showProgress: boolean;

  constructor(session: AnalysisSession, options?: { showProgress?: boolean }) {
    this.session = session;
    this.showProgress = options?.showProgress ?? true;
  }

  getSession(): AnalysisSession {
    return this.session;
  }

  /**
   * Run a handler, printing expected failures instead of throwing them
   */
  private guard(action: () => void): void {
    try {
      action();
    } catch (error) {
      if (error instanceof SeqAnalysisError) {
        console.log(`${COLORS.red}${error.message}${COLORS.reset}`);
        return;
      }
      throw error;
    }
  }

  /**
   * Add a pair: "add 1 0" or the shorthand "10"
   */
  addPair(aStr: string, bStr: string): void {
    this.guard(() => {
      const pair = this.session.addPair(Number(aStr), Number(bStr));
      const count = this.session.getPairs().length;
      console.log(`  #${count}  ${formatPair(pair)}`);
    });
  }

  undo(): void {
    const removed = this.session.removeLastPair();
    if (removed) {
      console.log(`${COLORS.yellow}Removed pair ${removed[0]} ${removed[1]}${COLORS.reset}`);
    } else {
      console.log(`${COLORS.dim}Nothing to undo${COLORS.reset}`);
    }
  }

  clear(): void {
    this.session.clear();
    console.log(`${COLORS.green}Pairs cleared${COLORS.reset}`);
  }

  load(filePath: string): void {
    try {
      const pairs = this.session.loadPairs(filePath);
      console.log(`${COLORS.green}Loaded ${pairs.length} pairs from: ${filePath}${COLORS.reset}`);
      this.displayStatus();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.log(`${COLORS.red}Failed to load pairs: ${reason}${COLORS.reset}`);
    }
  }

  displayPairs(): void {
    const pairs = this.session.getPairs();
    if (pairs.length === 0) {
      console.log(`${COLORS.dim}No pairs entered${COLORS.reset}`);
      return;
    }
    console.log(`\n${COLORS.bright}Pairs (A B):${COLORS.reset}`);
    pairs.forEach((pair, i) => {
      console.log(`  ${String(i + 1).padStart(3)}  ${formatPair(pair)}`);
    });
  }

  /**
   * Sequential analysis of the pairs in entry order
   */
  run(): void {
    this.guard(() => {
      const result = this.session.analyze();
      console.log(`\n${COLORS.bright}Sequential Analysis${COLORS.reset}`);
      console.log(`  Informative pairs: ${result.informative}`);
      console.log(`  Discarded (ties):  ${result.discarded}`);
      console.log(`  Pairs used:        ${result.traversal.steps}`);
      console.log(`  Decision:          ${colorDecision(result.decision, result.message)}`);
    });
  }

  displayMap(): void {
    this.guard(() => {
      console.log('');
      console.log(this.session.renderMap({ color: true }));
      console.log('');
      console.log(renderLegend({ color: true }));
    });
  }

  /**
   * Order-robustness check: check [iterations] [alpha] [seed]
   */
  async orderCheck(iterStr?: string, alphaStr?: string, seedStr?: string): Promise<void> {
    try {
      const stats = await this.session.orderCheckAsync({
        iterations: parseOptionalNumber(iterStr, 'iterations'),
        alpha: parseOptionalNumber(alphaStr, 'alpha'),
        seed: parseOptionalNumber(seedStr, 'seed'),
        progress: this.showProgress ? createConsoleProgress(process.stderr) : silentProgress,
      });

      console.log(`\n${COLORS.bright}Order Robustness (${stats.iterations} permutations, seed ${stats.seed})${COLORS.reset}`);
      console.log(formatFrequencyTable(stats.freq));
    } catch (error) {
      if (error instanceof SeqAnalysisError) {
        console.log(`${COLORS.red}${error.message}${COLORS.reset}`);
        return;
      }
      throw error;
    }
  }

  save(): void {
    const filePath = this.session.saveReport();
    console.log(`${COLORS.green}Report saved to: ${filePath}${COLORS.reset}`);
  }

  listReports(): void {
    const reports = this.session.listReports();

    if (reports.length === 0) {
      console.log(`${COLORS.dim}No saved reports${COLORS.reset}`);
      return;
    }

    console.log(`\n${COLORS.bright}Saved Reports:${COLORS.reset}`);
    for (const r of reports) {
      const decision = r.decision === undefined ? '-' : String(r.decision ?? 'none');
      console.log(`  ${r.ts} | ${String(r.pairCount).padStart(4)} pairs | decision ${decision} | ${r.id}`);
    }
  }

  /**
   * Print a saved report: show <id>
   */
  showReport(id: string): void {
    try {
      const report = this.session.loadReport(id);
      console.log(`\n${COLORS.bright}Report ${report.id}${COLORS.reset} (${report.ts})`);
      console.log(`  Pairs: ${report.pairs.length}`);
      if (report.analysis) {
        const a = report.analysis;
        console.log(`  Decision: ${colorDecision(a.decision, a.message)} after ${a.steps} informative pairs`);
      }
      if (report.orderCheck) {
        const { iterations, seed } = report.orderCheck;
        console.log(`  Order check: ${iterations} permutations, seed ${seed ?? 'none'}`);
        console.log(formatFrequencyTable(report.orderCheck.freq));
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.log(`${COLORS.red}Failed to read report ${id}: ${reason}${COLORS.reset}`);
    }
  }

  /**
   * Show or change the log level: log [debug|info|warn|error]
   */
  logLevel(level?: string): void {
    const logger = getLogger();
    if (level === undefined) {
      console.log(`Log level: ${logger.getLevel()}`);
      return;
    }
    if (!isLogLevel(level)) {
      console.log(`${COLORS.red}Unknown log level "${level}"; use debug, info, warn or error${COLORS.reset}`);
      return;
    }
    logger.setLevel(level);
    console.log(`${COLORS.green}Log level set to ${level}${COLORS.reset}`);
  }

  displayStatus(): void {
    const summary = this.session.getSummary();

    console.log(`\n${'─'.repeat(50)}`);
    console.log(`${COLORS.bright}Session Status${COLORS.reset}`);
    console.log(`${'─'.repeat(50)}`);
    console.log(`  Pairs: ${summary.pairCount} (${summary.informative} informative, ${summary.discarded} ties)`);
    if (summary.message !== null) {
      console.log(`  Last decision: ${colorDecision(summary.decision, summary.message)}`);
    }
    if (summary.lastOrderCheck) {
      const c = summary.lastOrderCheck;
      console.log(`  Last order check: ${c.iterations} permutations`);
      console.log(`    A better ${c.pA.toFixed(3)} | B better ${c.pB.toFixed(3)} | no diff ${c.pNoDiff.toFixed(3)} | twilight ${c.pTwilight.toFixed(3)}`);
    }
    console.log(`${'─'.repeat(50)}`);
  }

  help(): void {
    console.log(`
${COLORS.bright}Bross Sequential Analysis - Commands${COLORS.reset}
${'─'.repeat(50)}

${COLORS.cyan}Pair Entry:${COLORS.reset}
  add <a> <b>     Add a pair of 0/1 responses (A first)
  10 | 01 | 11 | 00   Shorthand for a pair

${COLORS.cyan}Analysis:${COLORS.reset}
  run             Sequential analysis in entry order
  map             Show the walk on the decision map
  check [n] [alpha] [seed]
                  Order robustness over n permutations

${COLORS.cyan}Data:${COLORS.reset}
  pairs           List entered pairs
  undo            Remove last pair
  clear           Remove all pairs
  load <path>     Load pairs from a text or JSON file
  save            Save a report
  reports         List saved reports
  show <id>       Show a saved report
  status          Show session status

${COLORS.cyan}Other:${COLORS.reset}
  log [level]     Show or set the log level
  help            Show this help
  exit/quit       Exit
`);
  }
}
