/**
 * Site Layout Kernel
 *
 * Main entry point for the library
 */

// Export all geometry types
export * from './types/geometry';

// Export geometry utilities
export * from './geometry';

// Export the layout pipeline and geometry operations
export * from './algorithm';

// Export logger utility
export {
  Logger,
  LogLevel,
  enableDebugLogging,
  disableLogging,
  parseLogLevel,
  LOG_LEVEL_ENV_VAR
} from './algorithm/utils/logger';

// Version info
export { ENGINE_VERSION as VERSION, ENGINE_NAME as NAME } from './algorithm/constants';
