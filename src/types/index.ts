/**
 * Core type definitions for timekeep
 */

// Calendar period kinds used for bucketing
export type PeriodKind = 'day' | 'week' | 'month' | 'year';

// Report names accepted on the command line, mapped to period kinds
export const REPORT_NAMES = ['daily', 'weekly', 'monthly', 'yearly'] as const;
export type ReportKind = (typeof REPORT_NAMES)[number];

export const REPORT_KINDS: Record<ReportKind, PeriodKind> = {
  daily: 'day',
  weekly: 'week',
  monthly: 'month',
  yearly: 'year',
};

// One logged activity
export interface TimeEntry {
  id: string;
  timestamp: string; // ISO 8601
  description: string;
  duration_minutes: number;
  note: string;
}

// Entry as handed to the store, before an id is assigned
export type NewTimeEntry = Omit<TimeEntry, 'id'>;

// One brainstorm capture: a topic and the ideas recorded under it
export interface BrainstormNote {
  id: string;
  timestamp: string; // ISO 8601
  topic: string;
  ideas: string[];
}

// The persisted document
export interface LedgerDocument {
  entries: TimeEntry[];
  brainstorm: BrainstormNote[];
}

// Derived per-period statistics, never persisted
export interface AggregationResult {
  period_kind: PeriodKind;
  period_start: string; // ISO 8601, inclusive
  period_end: string; // ISO 8601, inclusive
  period_label: string;
  total_minutes: number;
  by_activity: Record<string, number>;
  entry_count: number;
  zero_duration_count: number;
  suggestions: string[];
}

// Thresholds driving the suggestion heuristics
export interface SuggestionThresholds {
  daily_min_minutes: number;
  daily_max_minutes: number;
  dominant_share: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Resolved runtime configuration
export interface TimekeepConfig {
  dataPath: string;
  configPath: string;
  logLevel: LogLevel;
  voice: {
    command?: string | undefined;
    timeoutMs: number;
  };
  lock: {
    timeoutMs: number;
    staleMs: number;
  };
  suggestions: SuggestionThresholds;
}

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;

// Every command result carries the text printed by the CLI
export interface CommandOutput {
  text: string;
  warnings?: string[] | undefined;
}
