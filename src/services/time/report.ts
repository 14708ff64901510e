/**
 * Plain-text (Markdown) rendering of aggregation results
 */

import { formatDuration } from '../parser/duration.js';
import { rankActivities } from './suggestions.js';
import type { AggregationResult } from '../../types/index.js';

export function formatEntryCount(count: number): string {
  return `${count} ${count === 1 ? 'entry' : 'entries'}`;
}

export function sharePercent(minutes: number, total: number): number {
  return total > 0 ? Math.round((minutes / total) * 100) : 0;
}

/**
 * Bullet lines for an activity breakdown
 */
export function renderBreakdown(byActivity: Record<string, number>, total: number): string[] {
  const ranked = rankActivities(byActivity);
  if (ranked.length === 0) {
    return ['- No activity recorded.'];
  }
  return ranked.map(
    ([label, minutes]) => `- ${label}: ${formatDuration(minutes)} (${sharePercent(minutes, total)}%)`
  );
}

export function renderSuggestions(suggestions: readonly string[]): string[] {
  return suggestions.map((tip) => `- ${tip}`);
}

/**
 * Render a report for one period
 */
export function renderReport(result: AggregationResult): string {
  const lines = [
    `# ${result.period_label}`,
    '',
    `Total: ${formatDuration(result.total_minutes)} across ${formatEntryCount(result.entry_count)}`,
    '',
    '## By activity',
    '',
    ...renderBreakdown(result.by_activity, result.total_minutes),
    '',
    '## Suggestions',
    '',
    ...renderSuggestions(result.suggestions),
  ];
  return `${lines.join('\n')}\n`;
}
