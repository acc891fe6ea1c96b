/**
 * Taxonomy type mapper
 *
 * Type-directed mapper registry with memoized resolution, converting
 * between canonical taxon entities and application types.
 *
 * @packageDocumentation
 */

// =============================================================================
// Configuration
// =============================================================================
export {
  ConfigurationError,
  LOG_LEVELS,
  type LogLevel,
  loadConfig,
  type MapperConfig,
  OVERLAP_POLICIES,
  type OverlapPolicy,
  resolveConfig,
} from './config/index.js';

// =============================================================================
// Events
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Logging
// =============================================================================
export {
  configureLogging,
  createLogger,
  getRootLogger,
  type LogFields,
  type LoggingOptions,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  type MapperLogger,
} from './logging/index.js';

// =============================================================================
// Mappers
// =============================================================================
export { BaseMapper, type Mapper, mapperName } from './mapper/index.js';

// =============================================================================
// Registry and resolution
// =============================================================================
export * from './registry/index.js';

// =============================================================================
// Types
// =============================================================================
export * from './types/index.js';
