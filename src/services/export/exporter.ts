/**
 * Export service: serialize the ledger or an aggregation as JSON, CSV or Markdown
 */

import { resolve } from 'path';
import { formatDuration } from '../parser/duration.js';
import { summarizeEntries } from '../time/aggregator.js';
import { buildSuggestions, rankActivities, DEFAULT_THRESHOLDS } from '../time/suggestions.js';
import { formatLocalDate } from '../time/periods.js';
import {
  renderBreakdown,
  renderReport,
  renderSuggestions,
  formatEntryCount,
  sharePercent,
} from '../time/report.js';
import { writeFileAtomic } from '../store/files.js';
import { encodeLedger } from '../store/ledger-store.js';
import { logger } from '../../utils/logger.js';
import type {
  AggregationResult,
  LedgerDocument,
  SuggestionThresholds,
  TimeEntry,
} from '../../types/index.js';

export const EXPORT_FORMATS = ['json', 'csv', 'markdown'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const ENTRY_CSV_COLUMNS = ['id', 'timestamp', 'description', 'duration_minutes', 'note'] as const;

/**
 * Quote a CSV field when it holds a separator, quote or line break
 */
export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function csvRow(values: ReadonlyArray<string | number>): string {
  return values.map(escapeCsvField).join(',');
}

function entriesToCsv(entries: readonly TimeEntry[]): string {
  const rows = [csvRow(ENTRY_CSV_COLUMNS)];
  for (const entry of entries) {
    rows.push(csvRow(ENTRY_CSV_COLUMNS.map((column) => entry[column])));
  }
  return `${rows.join('\n')}\n`;
}

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function ledgerToMarkdown(document: LedgerDocument, thresholds: SuggestionThresholds): string {
  const entries = [...document.entries].sort(
    (a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp)
  );
  const stats = summarizeEntries(entries);
  const days = new Set(entries.map((entry) => formatLocalDate(new Date(entry.timestamp)))).size;

  const lines = [
    '# All entries',
    '',
    `Total: ${formatDuration(stats.total_minutes)} across ${formatEntryCount(stats.entry_count)}`,
    '',
    '## By activity',
    '',
    ...renderBreakdown(stats.by_activity, stats.total_minutes),
    '',
    '## Suggestions',
    '',
    ...renderSuggestions(buildSuggestions(stats, Math.max(days, 1), thresholds)),
  ];

  if (entries.length > 0) {
    lines.push('', '## Entries', '', '| Timestamp | Activity | Duration | Note |', '| --- | --- | --- | --- |');
    for (const entry of entries) {
      lines.push(
        `| ${entry.timestamp} | ${escapeTableCell(entry.description)} | ` +
          `${formatDuration(entry.duration_minutes)} | ${escapeTableCell(entry.note)} |`
      );
    }
  }

  if (document.brainstorm.length > 0) {
    lines.push('', '## Brainstorm');
    for (const note of document.brainstorm) {
      lines.push('', `### ${note.topic} (${note.timestamp})`, '');
      lines.push(...note.ideas.map((idea) => `- ${idea}`));
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Serialize the full ledger. JSON output is a document the store can load.
 */
export function exportLedger(
  document: LedgerDocument,
  format: ExportFormat,
  thresholds: SuggestionThresholds = DEFAULT_THRESHOLDS
): string {
  switch (format) {
    case 'json':
      return encodeLedger(document);
    case 'csv':
      return entriesToCsv(document.entries);
    case 'markdown':
      return ledgerToMarkdown(document, thresholds);
  }
}

/**
 * Serialize one period's aggregation
 */
export function exportAggregation(result: AggregationResult, format: ExportFormat): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(result, null, 2)}\n`;
    case 'csv': {
      const rows = [csvRow(['activity', 'minutes', 'share_percent'])];
      for (const [label, minutes] of rankActivities(result.by_activity)) {
        rows.push(csvRow([label, minutes, sharePercent(minutes, result.total_minutes)]));
      }
      return `${rows.join('\n')}\n`;
    }
    case 'markdown':
      return renderReport(result);
  }
}

/**
 * Write exported content to a path, replacing it atomically
 */
export async function writeExport(outputPath: string, content: string): Promise<string> {
  const target = resolve(outputPath);
  await writeFileAtomic(target, content);
  logger.info(`Exported ${content.length} bytes to ${target}`);
  return target;
}
