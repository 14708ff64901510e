/**
 * Heuristic suggestions for an aggregation
 *
 * Rules run in a fixed order and at most MAX_SUGGESTIONS hints are kept.
 * Output depends only on the statistics and thresholds passed in.
 */

import { formatDuration } from '../parser/duration.js';
import { daysInPeriodStarting } from './periods.js';
import type { AggregationResult, SuggestionThresholds } from '../../types/index.js';

export const MAX_SUGGESTIONS = 5;

export const DEFAULT_THRESHOLDS: SuggestionThresholds = {
  daily_min_minutes: 60,
  daily_max_minutes: 600,
  dominant_share: 0.6,
};

export interface ActivityStats {
  total_minutes: number;
  by_activity: Record<string, number>;
  entry_count: number;
  zero_duration_count: number;
}

/**
 * Activities sorted by minutes descending, ties by label ascending
 */
export function rankActivities(byActivity: Record<string, number>): Array<[string, number]> {
  return Object.entries(byActivity).sort(([labelA, minutesA], [labelB, minutesB]) => {
    if (minutesA !== minutesB) return minutesB - minutesA;
    if (labelA < labelB) return -1;
    if (labelA > labelB) return 1;
    return 0;
  });
}

function plural(count: number, singular: string, pluralForm: string): string {
  return count === 1 ? singular : pluralForm;
}

/**
 * Suggestions for statistics covering the given number of days
 */
export function buildSuggestions(
  stats: ActivityStats,
  days: number,
  thresholds: SuggestionThresholds = DEFAULT_THRESHOLDS
): string[] {
  if (stats.entry_count === 0) {
    return ['No activity recorded for this period. Log one with: timekeep log "<activity> for 30m"'];
  }

  const suggestions: string[] = [];
  const ranked = rankActivities(stats.by_activity);
  const top = ranked[0];
  const total = stats.total_minutes;

  if (top && total > 0 && top[1] / total > thresholds.dominant_share) {
    const share = Math.round((top[1] / total) * 100);
    suggestions.push(`"${top[0]}" took ${share}% of logged time; consider mixing in other work or breaks.`);
  }

  const upper = thresholds.daily_max_minutes * days;
  if (total > upper) {
    suggestions.push(
      `${formatDuration(total)} logged, above the ${formatDuration(upper)} guideline for this period; plan time to recover.`
    );
  }

  const lower = thresholds.daily_min_minutes * days;
  if (lower > 0 && total < lower) {
    suggestions.push(
      `Only ${formatDuration(total)} logged against a ${formatDuration(lower)} target; log activities as you go to keep the record complete.`
    );
  }

  if (stats.zero_duration_count > 0) {
    const count = stats.zero_duration_count;
    suggestions.push(
      `${count} ${plural(count, 'entry has', 'entries have')} no duration; add one such as "for 30m" when logging.`
    );
  }

  if (ranked.length <= 2) {
    suggestions.push(
      `Only ${ranked.length} activity ${plural(ranked.length, 'type', 'types')} logged; record more categories to judge balance.`
    );
  }

  if (suggestions.length === 0) {
    suggestions.push('Time allocation looks balanced; keep your focus on priority work.');
  }

  return suggestions.slice(0, MAX_SUGGESTIONS);
}

/**
 * Suggestions for an aggregation result, scaled to the length of its period
 */
export function generateSuggestions(
  result: Omit<AggregationResult, 'suggestions'>,
  thresholds: SuggestionThresholds = DEFAULT_THRESHOLDS
): string[] {
  const days = daysInPeriodStarting(result.period_kind, result.period_start);
  return buildSuggestions(result, days, thresholds);
}
