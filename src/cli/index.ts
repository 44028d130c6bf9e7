/**
 * Bross Sequential Analysis - CLI Entry Point
 * ============================================
 * Interactive command-line interface
 */

import * as readline from 'readline';
import { createAnalysisSession } from '../session/manager';
import { getLogger, initLogger } from '../utils/logger';
import { getConfig, initConfig } from '../core/config';
import { CommandHandler } from './commands';

// ============================================================================
// COLORS
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

// ============================================================================
// COMMAND DISPATCH
// ============================================================================

/**
 * Execute one input line. Returns false when the shell should exit.
 */
export async function executeCommand(handler: CommandHandler, input: string): Promise<boolean> {
  const trimmed = input.trim();
  if (!trimmed) return true;

  const parts = trimmed.split(/\s+/);
  const cmd = parts[0].toLowerCase();
  const args = parts.slice(1);

  switch (cmd) {
    case 'exit':
    case 'quit':
    case 'q':
      return false;

    case 'help':
    case 'h':
    case '?':
      handler.help();
      break;

    case 'status':
    case 's':
      handler.displayStatus();
      break;

    case 'add':
    case 'a':
      if (args.length === 2) {
        handler.addPair(args[0], args[1]);
      } else {
        console.log(`${COLORS.yellow}Usage: add <a> <b>${COLORS.reset}`);
      }
      break;

    case 'pairs':
    case 'p':
      handler.displayPairs();
      break;

    case 'undo':
    case 'u':
      handler.undo();
      break;

    case 'clear':
      handler.clear();
      break;

    case 'load':
      if (args[0]) {
        handler.load(args[0]);
      } else {
        console.log(`${COLORS.yellow}Usage: load <filepath>${COLORS.reset}`);
      }
      break;

    case 'run':
    case 'r':
      handler.run();
      break;

    case 'map':
    case 'm':
      handler.displayMap();
      break;

    case 'check':
    case 'c':
      await handler.orderCheck(args[0], args[1], args[2]);
      break;

    case 'save':
      handler.save();
      break;

    case 'reports':
      handler.listReports();
      break;

    case 'show':
      if (args[0]) {
        handler.showReport(args[0]);
      } else {
        console.log(`${COLORS.yellow}Usage: show <report id>${COLORS.reset}`);
      }
      break;

    case 'log':
      handler.logLevel(args[0]);
      break;

    default:
      // Shorthand pair entry like "10" or "1 0"
      if (/^[01][01]$/.test(cmd)) {
        handler.addPair(cmd[0], cmd[1]);
      } else if (/^[01]$/.test(cmd) && args.length === 1) {
        handler.addPair(cmd, args[0]);
      } else {
        console.log(`${COLORS.yellow}Unknown command: ${cmd}. Type 'help' for commands.${COLORS.reset}`);
      }
  }

  return true;
}

// ============================================================================
// CLI CLASS
// ============================================================================

export class SeqAnalysisCLI {
  private rl: readline.Interface;
  private handler: CommandHandler;
  private running = false;

  constructor(configPath?: string) {
    if (configPath) {
      initConfig(configPath);
    }

    const config = getConfig();
    const validation = config.validate();

    const logConfig = config.getLoggingConfig();
    initLogger({
      level: logConfig.level,
      console: false, // keep the shell output clean
      file: logConfig.file,
      filePath: logConfig.filePath,
    });

    if (!validation.valid) {
      throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
    }

    const analysisConfig = config.getAnalysisConfig();
    const sessionConfig = config.getSessionConfig();
    const session = createAnalysisSession({
      defaults: analysisConfig,
      resultsDir: sessionConfig.resultsDir,
      autoSave: sessionConfig.autoSave,
    });

    this.handler = new CommandHandler(session, { showProgress: analysisConfig.showProgress });

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
  }

  private displayBanner(): void {
    console.log(`
${COLORS.cyan}╔══════════════════════════════════════════════════════════╗
║                                                          ║
║   ${COLORS.bright}Bross Sequential Analysis${COLORS.cyan}                              ║
║   ${COLORS.dim}Paired binary outcomes · order robustness${COLORS.cyan}              ║
║                                                          ║
╚══════════════════════════════════════════════════════════╝${COLORS.reset}

${COLORS.dim}Type 'help' for commands, 'exit' to quit${COLORS.reset}
`);
  }

  private prompt(): void {
    this.rl.question(`${COLORS.green}seq>${COLORS.reset} `, (answer) => {
      executeCommand(this.handler, answer)
        .then((continueRunning) => {
          if (continueRunning && this.running) {
            this.prompt();
          } else {
            this.shutdown();
          }
        })
        .catch((error: unknown) => {
          getLogger().error('Command failed', error);
          const reason = error instanceof Error ? error.message : String(error);
          console.log(`${COLORS.yellow}Error: ${reason}${COLORS.reset}`);
          this.prompt();
        });
    });
  }

  start(): void {
    this.running = true;
    this.displayBanner();
    this.handler.displayStatus();
    this.prompt();
  }

  shutdown(): void {
    this.running = false;
    console.log(`\n${COLORS.dim}Goodbye!${COLORS.reset}\n`);
    this.rl.close();
    getLogger().close();
    process.exit(0);
  }
}

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

export function startCLI(configPath?: string): void {
  const cli = new SeqAnalysisCLI(configPath);

  process.on('SIGINT', () => {
    cli.shutdown();
  });

  cli.start();
}

if (require.main === module) {
  const configPath = process.argv[2];
  startCLI(configPath);
}
