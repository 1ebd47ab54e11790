/**
 * Utility functions for csvq
 *
 * @module utils
 */

export {
  parseTyped,
  parseNumeric,
  compareTyped,
  compareForSort,
  compareCodePoints,
} from './comparison'

export {
  type Logger,
  type LogLevel,
  LOG_LEVELS,
  createStderrLogger,
  noopLogger,
  logger,
  setLogger,
} from './logger'

export {
  formatNumber,
} from './format'
