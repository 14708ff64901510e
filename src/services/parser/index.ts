/**
 * Log text and duration parsing
 */

export {
  DURATION_MATCHERS,
  findDuration,
  parseLogText,
  parseDuration,
  formatDuration,
} from './duration.js';
export type { DurationMatcher, DurationMatch, ParsedLogText } from './duration.js';
