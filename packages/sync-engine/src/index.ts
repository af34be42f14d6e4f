/**
 * FeedSync - Sync Engine Package
 * Reconciles the supplier catalog with marketplace listings
 *
 * @packageDocumentation
 */

// ============================================================================
// Reconciliation
// ============================================================================

export {
  computePriceUpdates,
  computeStockUpdates,
  computeUploadBatch,
  roundPrice,
  validateRecord,
} from './services/reconciliation.js';

// ============================================================================
// Runner
// ============================================================================

export { ReconciliationRunner, createReconciliationRunner, shareCatalog } from './runner.js';

export {
  runCli,
  parseCliArguments,
  EXIT_OK,
  EXIT_FATAL,
  EXIT_PARTIAL,
  USAGE,
  type CliArguments,
  type CliDependencies,
} from './run.js';

// ============================================================================
// Configuration & Logging
// ============================================================================

export { loadConfig, ozonCredentials, yandexCampaigns, envSchema, type Config } from './config.js';

export { createConsoleLogger, type ConsoleLoggerOptions } from './logger.js';

// ============================================================================
// Errors & Types
// ============================================================================

export { ValidationError, ConfigError, type ValidationErrorCode } from './errors.js';

export {
  RUN_MODES,
  type Logger,
  type LogLevel,
  type PriceUpdatePlan,
  type ReconciliationRunnerDependencies,
  type RunMode,
  type RunReport,
  type SkippedRecord,
  type StockUpdatePlan,
  type UploadBatch,
} from './types.js';
