/**
 * Bross Sequential Analysis - Configuration Manager
 * ==================================================
 * Loads a JSON configuration file over the built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import { AnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from '../types';
import { isRecord } from '../utils/guards';
import { LogLevel, isLogLevel } from '../utils/logger';

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

export interface LoggingConfig {
  level: LogLevel;
  console: boolean;
  file: boolean;
  filePath: string;
}

export interface SessionConfig {
  /** Directory for saved analysis reports */
  resultsDir: string;
  /** Save a report after every order check */
  autoSave: boolean;
}

export interface ServerConfig {
  port: number;
}

export interface FullConfig {
  version: string;
  description: string;
  analysis: AnalysisConfig;
  logging: LoggingConfig;
  session: SessionConfig;
  server: ServerConfig;
}

/** Shape accepted from a config file: every section optional and partial */
export interface ConfigOverrides {
  version?: string;
  description?: string;
  analysis?: Partial<AnalysisConfig>;
  logging?: Partial<LoggingConfig>;
  session?: Partial<SessionConfig>;
  server?: Partial<ServerConfig>;
}

// ============================================================================
// DEFAULT FULL CONFIG
// ============================================================================

export const DEFAULT_FULL_CONFIG: FullConfig = {
  version: '1.0',
  description: 'Bross sequential analysis - default configuration',
  analysis: DEFAULT_ANALYSIS_CONFIG,
  logging: {
    level: 'info',
    console: true,
    file: false,
    filePath: './data/logs/seqanalysis.log',
  },
  session: {
    resultsDir: './data/reports',
    autoSave: false,
  },
  server: {
    port: 3000,
  },
};

function section(value: unknown, name: string): Record<string, unknown> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new Error(`Config section "${name}" must be an object`);
  }
  return value;
}

/**
 * Narrow parsed JSON to ConfigOverrides, keeping only keys of the expected type
 */
export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new Error('Config file must contain a JSON object');
  }

  const out: ConfigOverrides = {};
  if (typeof raw.version === 'string') out.version = raw.version;
  if (typeof raw.description === 'string') out.description = raw.description;

  const analysis = section(raw.analysis, 'analysis');
  if (analysis) {
    const a: Partial<AnalysisConfig> = {};
    if (typeof analysis.alpha === 'number') a.alpha = analysis.alpha;
    if (typeof analysis.iterations === 'number') a.iterations = analysis.iterations;
    if (typeof analysis.seed === 'number' || analysis.seed === null) a.seed = analysis.seed;
    if (typeof analysis.showProgress === 'boolean') a.showProgress = analysis.showProgress;
    if (typeof analysis.chunkSize === 'number') a.chunkSize = analysis.chunkSize;
    out.analysis = a;
  }

  const logging = section(raw.logging, 'logging');
  if (logging) {
    const l: Partial<LoggingConfig> = {};
    if (isLogLevel(logging.level)) l.level = logging.level;
    if (typeof logging.console === 'boolean') l.console = logging.console;
    if (typeof logging.file === 'boolean') l.file = logging.file;
    if (typeof logging.filePath === 'string') l.filePath = logging.filePath;
    out.logging = l;
  }

  const session = section(raw.session, 'session');
  if (session) {
    const s: Partial<SessionConfig> = {};
    if (typeof session.resultsDir === 'string') s.resultsDir = session.resultsDir;
    if (typeof session.autoSave === 'boolean') s.autoSave = session.autoSave;
    out.session = s;
  }

  const server = section(raw.server, 'server');
  if (server) {
    const p: Partial<ServerConfig> = {};
    if (typeof server.port === 'number') p.port = server.port;
    out.server = p;
  }

  return out;
}

// ============================================================================
// CONFIG MANAGER CLASS
// ============================================================================

export class ConfigManager {
  private config: FullConfig;
  private configPath: string | null = null;

  constructor(configPath?: string) {
    this.config = this.mergeConfig(DEFAULT_FULL_CONFIG, {});

    if (configPath) {
      this.loadFromFile(configPath);
    }
  }

  /**
   * Load configuration from a JSON file
   */
  loadFromFile(filePath: string): void {
    const absolutePath = path.resolve(filePath);
    const content = fs.readFileSync(absolutePath, 'utf-8');
    const loaded = parseConfigOverrides(JSON.parse(content));

    this.config = this.mergeConfig(DEFAULT_FULL_CONFIG, loaded);
    this.configPath = absolutePath;
  }

  /**
   * Section-wise merge of overrides onto a base config
   */
  private mergeConfig(base: FullConfig, override: ConfigOverrides): FullConfig {
    return {
      version: override.version ?? base.version,
      description: override.description ?? base.description,
      analysis: { ...base.analysis, ...override.analysis },
      logging: { ...base.logging, ...override.logging },
      session: { ...base.session, ...override.session },
      server: { ...base.server, ...override.server },
    };
  }

  getFullConfig(): FullConfig {
    return this.mergeConfig(this.config, {});
  }

  getAnalysisConfig(): AnalysisConfig {
    return { ...this.config.analysis };
  }

  getLoggingConfig(): LoggingConfig {
    return { ...this.config.logging };
  }

  getSessionConfig(): SessionConfig {
    return { ...this.config.session };
  }

  getServerConfig(): ServerConfig {
    return { ...this.config.server };
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Update configuration at runtime
   */
  updateConfig(updates: ConfigOverrides): void {
    this.config = this.mergeConfig(this.config, updates);
  }

  /**
   * Save current configuration to file
   */
  saveToFile(filePath?: string): void {
    const targetPath = filePath ?? this.configPath;
    if (!targetPath) {
      throw new Error('No config file path specified');
    }

    fs.mkdirSync(path.dirname(path.resolve(targetPath)), { recursive: true });
    fs.writeFileSync(targetPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { analysis, server } = this.config;

    if (!(analysis.alpha > 0 && analysis.alpha < 1)) {
      errors.push('analysis.alpha must be between 0 and 1 (exclusive)');
    }
    if (!Number.isInteger(analysis.iterations) || analysis.iterations < 1) {
      errors.push('analysis.iterations must be a positive integer');
    }
    if (analysis.seed !== null && !Number.isInteger(analysis.seed)) {
      errors.push('analysis.seed must be an integer or null');
    }
    if (!Number.isInteger(analysis.chunkSize) || analysis.chunkSize < 1) {
      errors.push('analysis.chunkSize must be a positive integer');
    }
    if (!Number.isInteger(server.port) || server.port < 0 || server.port > 65535) {
      errors.push('server.port must be an integer between 0 and 65535');
    }

    return { valid: errors.length === 0, errors };
  }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let globalConfig: ConfigManager | null = null;

export function initConfig(configPath?: string): ConfigManager {
  globalConfig = new ConfigManager(configPath);
  return globalConfig;
}

export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}
