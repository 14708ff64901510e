/**
 * Time aggregation service
 *
 * Buckets ledger entries into a calendar period and computes totals and a
 * per-activity breakdown. The anchor is always passed in by the caller.
 */

import { logger } from '../../utils/logger.js';
import { periodBounds, toLocalIsoString } from './periods.js';
import { generateSuggestions, DEFAULT_THRESHOLDS } from './suggestions.js';
import type { ActivityStats } from './suggestions.js';
import type { LedgerStore } from '../store/ledger-store.js';
import type {
  AggregationResult,
  PeriodKind,
  SuggestionThresholds,
  TimeEntry,
} from '../../types/index.js';

export interface AggregateOptions {
  thresholds?: SuggestionThresholds | undefined;
}

/**
 * Grouping key for an activity: trimmed, lower-cased, single-spaced
 */
export function normalizeActivity(description: string): string {
  return description.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Totals and per-activity minutes for a list of entries
 */
export function summarizeEntries(entries: readonly TimeEntry[]): ActivityStats {
  const byActivity = new Map<string, number>();
  let total = 0;
  let zeroDuration = 0;

  for (const entry of entries) {
    const label = normalizeActivity(entry.description);
    byActivity.set(label, (byActivity.get(label) ?? 0) + entry.duration_minutes);
    total += entry.duration_minutes;
    if (entry.duration_minutes === 0) zeroDuration++;
  }

  return {
    total_minutes: total,
    by_activity: Object.fromEntries(byActivity),
    entry_count: entries.length,
    zero_duration_count: zeroDuration,
  };
}

/**
 * Aggregate the period of the given kind that contains anchor
 */
export function aggregatePeriod(
  store: Pick<LedgerStore, 'query'>,
  kind: PeriodKind,
  anchor: Date,
  options: AggregateOptions = {}
): AggregationResult {
  const bounds = periodBounds(kind, anchor);
  const entries = store.query(bounds.start, bounds.end);

  logger.debug(`Aggregating ${entries.length} entries for ${bounds.label}`);

  const base = {
    period_kind: kind,
    period_start: toLocalIsoString(bounds.start),
    period_end: toLocalIsoString(bounds.end),
    period_label: bounds.label,
    ...summarizeEntries(entries),
  };

  return {
    ...base,
    suggestions: generateSuggestions(base, options.thresholds ?? DEFAULT_THRESHOLDS),
  };
}
