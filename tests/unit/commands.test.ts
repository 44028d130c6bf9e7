/**
 * Bross Sequential Analysis - CLI Command Tests
 * ==============================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommandHandler, formatFrequencyTable } from '../../src/cli/commands';
import { executeCommand } from '../../src/cli';
import { OutcomeAggregator } from '../../src/engine/aggregator';
import { AnalysisSession, createAnalysisSession } from '../../src/session/manager';
import { getLogger, initLogger } from '../../src/utils/logger';

const RED = '\x1b[31m';
const RESET = '\x1b[0m';

describe('formatFrequencyTable', () => {
  it('should align a header and one row per category', () => {
    const table = new OutcomeAggregator(() => ({ lower: 0, upper: 1 })).summarize([1, 1, 1, -1], 0.05);
    const lines = formatFrequencyTable(table).split('\n');

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('Outcome         Count Proportion  95% CI lower  95% CI upper');
    expect(lines[1]).toBe('Twilight(-1)        1     0.2500        0.0000        1.0000');
    expect(lines[3]).toBe('A_better(1)         3     0.7500        0.0000        1.0000');
    expect(lines[5]).toBe('NoInfo              0     0.0000        0.0000        1.0000');
  });

  it('should name the confidence level from alpha', () => {
    const table = new OutcomeAggregator(() => ({ lower: 0, upper: 1 })).summarize([1], 0.1);
    expect(formatFrequencyTable(table).split('\n')[0]).toContain('90% CI lower');
  });
});

describe('CommandHandler', () => {
  let dir: string;
  let session: AnalysisSession;
  let handler: CommandHandler;
  let logSpy: jest.SpyInstance;

  const output = (): string[] => logSpy.mock.calls.map(call => String(call[0]));

  beforeEach(() => {
    initLogger({ console: false });
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seqanalysis-cli-'));
    session = createAnalysisSession({ resultsDir: dir });
    handler = new CommandHandler(session, { showProgress: false });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('Pair entry', () => {
    it('should add a pair and echo it', () => {
      handler.addPair('1', '0');

      expect(session.getPairs()).toEqual([[1, 0]]);
      expect(output()).toEqual([`  #1  1 0  ${RED}→ A${RESET}`]);
    });

    it('should print invalid pairs instead of throwing', () => {
      handler.addPair('2', '0');

      expect(session.getPairs()).toEqual([]);
      expect(output()).toEqual([`${RED}Pair 1: A response must be 0 or 1, got 2${RESET}`]);
    });

    it('should undo the last pair', () => {
      handler.addPair('1', '0');
      handler.addPair('0', '1');
      handler.undo();

      expect(session.getPairs()).toEqual([[1, 0]]);
    });
  });

  describe('Analysis', () => {
    it('should report missing pairs', () => {
      handler.run();
      expect(output()).toEqual([`${RED}No pairs entered yet${RESET}`]);
    });

    it('should print the decision of a run', () => {
      for (let i = 0; i < 11; i++) handler.addPair('1', '0');
      logSpy.mockClear();

      handler.run();

      expect(output()).toContain('  Informative pairs: 11');
      expect(output()).toContain(`  Decision:          ${RED}A is better${RESET}`);
    });

    it('should print a frequency table after an order check', async () => {
      for (let i = 0; i < 11; i++) handler.addPair('1', '0');
      handler.addPair('1', '1');
      logSpy.mockClear();

      await handler.orderCheck('20', '0.05', '7');

      const lines = output();
      expect(lines.some(line => line.includes('Order Robustness (20 permutations, seed 7)'))).toBe(true);
      expect(lines[lines.length - 1].split('\n')[3]).toMatch(/^A_better\(1\)\s+20\s+1\.0000/);
      expect(session.getLastOrderCheck()?.pA).toBe(1);
    });

    it('should print bad order check arguments', async () => {
      handler.addPair('1', '0');
      logSpy.mockClear();

      await handler.orderCheck('many');
      expect(output()).toEqual([`${RED}iterations must be a number, got "many"${RESET}`]);
    });
  });

  describe('Reports', () => {
    it('should save and list reports', () => {
      handler.addPair('1', '0');
      handler.save();
      logSpy.mockClear();

      handler.listReports();

      const lines = output();
      expect(lines).toHaveLength(2);
      expect(lines[1]).toContain('   1 pairs | decision - |');
    });

    it('should say when there are no reports', () => {
      handler.listReports();
      expect(output()).toEqual([`\x1b[2mNo saved reports${RESET}`]);
    });

    it('should show a saved report', async () => {
      for (let i = 0; i < 11; i++) handler.addPair('1', '0');
      handler.run();
      await handler.orderCheck('20', '0.05', '7');
      const id = path.basename(session.saveReport(), '.json').replace('report_', '');
      const ts = session.loadReport(id).ts;
      logSpy.mockClear();

      handler.showReport(id);

      const lines = output();
      expect(lines[0]).toBe(`\n\x1b[1mReport ${id}${RESET} (${ts})`);
      expect(lines[1]).toBe('  Pairs: 11');
      expect(lines[2]).toBe(`  Decision: ${RED}A is better${RESET} after 11 informative pairs`);
      expect(lines[3]).toBe('  Order check: 20 permutations, seed 7');
      expect(lines[4].split('\n')[3]).toMatch(/^A_better\(1\)\s+20\s+1\.0000/);
    });

    it('should print a report that cannot be read', () => {
      handler.showReport('missing');

      const lines = output();
      expect(lines).toHaveLength(1);
      expect(lines[0].startsWith(`${RED}Failed to read report missing: ENOENT`)).toBe(true);
    });
  });

  describe('Log level', () => {
    it('should show and change the log level', () => {
      initLogger({ console: false, level: 'warn' });

      handler.logLevel();
      handler.logLevel('debug');

      expect(output()).toEqual(['Log level: warn', `\x1b[32mLog level set to debug${RESET}`]);
      expect(getLogger().getLevel()).toBe('debug');
    });

    it('should reject unknown levels', () => {
      handler.logLevel('loud');

      expect(output()).toEqual([`${RED}Unknown log level "loud"; use debug, info, warn or error${RESET}`]);
      expect(getLogger().getLevel()).toBe('info');
    });
  });
});

describe('executeCommand', () => {
  let dir: string;
  let session: AnalysisSession;
  let handler: CommandHandler;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    initLogger({ console: false });
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seqanalysis-shell-'));
    session = createAnalysisSession({ resultsDir: dir });
    handler = new CommandHandler(session, { showProgress: false });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should stop on exit commands', async () => {
    expect(await executeCommand(handler, 'exit')).toBe(false);
    expect(await executeCommand(handler, 'q')).toBe(false);
  });

  it('should continue on blank input', async () => {
    expect(await executeCommand(handler, '   ')).toBe(true);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should accept pair shorthand', async () => {
    await executeCommand(handler, '10');
    await executeCommand(handler, '0 1');
    await executeCommand(handler, 'add 1 1');

    expect(session.getPairs()).toEqual([[1, 0], [0, 1], [1, 1]]);
  });

  it('should print usage for incomplete commands', async () => {
    await executeCommand(handler, 'add 1');
    expect(logSpy).toHaveBeenCalledWith('\x1b[33mUsage: add <a> <b>\x1b[0m');
  });

  it('should print unknown commands', async () => {
    expect(await executeCommand(handler, 'Fly')).toBe(true);
    expect(logSpy).toHaveBeenCalledWith("\x1b[33mUnknown command: fly. Type 'help' for commands.\x1b[0m");
  });

  it('should run an order check', async () => {
    await executeCommand(handler, '10');
    await executeCommand(handler, 'check 5 0.05 1');

    expect(session.getLastOrderCheck()?.iterations).toBe(5);
  });

  it('should show reports and set the log level', async () => {
    await executeCommand(handler, 'show');
    await executeCommand(handler, 'log error');

    expect(logSpy).toHaveBeenCalledWith('\x1b[33mUsage: show <report id>\x1b[0m');
    expect(getLogger().getLevel()).toBe('error');
  });

  it('should load pairs from a file', async () => {
    const file = path.join(dir, 'pairs.txt');
    fs.writeFileSync(file, '1 0\n0 0\n');

    await executeCommand(handler, `load ${file}`);
    expect(session.getPairs()).toEqual([[1, 0], [0, 0]]);
  });
});
