/**
 * Time aggregation and reporting services
 */

export { aggregatePeriod, summarizeEntries, normalizeActivity } from './aggregator.js';
export type { AggregateOptions } from './aggregator.js';
export {
  periodBounds,
  daysInPeriod,
  daysInPeriodStarting,
  parseAnchor,
  formatLocalDate,
  toLocalIsoString,
} from './periods.js';
export type { PeriodBounds } from './periods.js';
export {
  buildSuggestions,
  generateSuggestions,
  rankActivities,
  DEFAULT_THRESHOLDS,
  MAX_SUGGESTIONS,
} from './suggestions.js';
export type { ActivityStats } from './suggestions.js';
export { renderReport, renderBreakdown, renderSuggestions, formatEntryCount, sharePercent } from './report.js';
