/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  createDocumentContext,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, getLogLevel, type LogContext, type LogLevel } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export { BookInParseError, DuplicateExtractorError, ExtractorNotFoundError } from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  documentsParsedCounter,
  recordsExtractedCounter,
  parseWarningsCounter,
  progressStallsCounter,
  extractionDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateArrestRecord,
  validateArrestRecords,
  schemas,
  ARREST_RECORD_SCHEMA_FILE,
} from './schemas';

// Record extractors and the book-in report engine
export * from './extractors';
