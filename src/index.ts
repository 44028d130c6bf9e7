/**
 * Bross Sequential Analysis - Main Entry Point
 * =============================================
 * Exports all public API
 */

// Types
export * from './types';

// Core
export * from './core/config';
export * from './core/errors';

// Decision map and input
export * from './map/decision-map';
export * from './input/pairs';

// Engine
export * from './engine';

// Statistics
export * from './stats/binomial';
export * from './stats/random';

// Analysis
export * from './analysis/seqanalysis';
export * from './render/map-renderer';

// Session
export * from './session/manager';

// Utils
export * from './utils/logger';
export * from './utils/progress';

// CLI
export { startCLI, SeqAnalysisCLI, executeCommand } from './cli';
export { CommandHandler, formatFrequencyTable } from './cli/commands';

// Web
export { startWebServer, createApp, handleSocketMessage } from './web/server';
