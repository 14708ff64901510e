/**
 * timekeep_report and timekeep_summary tools
 *
 * Aggregate one calendar period and render it as text. The summary is the
 * daily report for the current day.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { REPORT_KINDS, REPORT_NAMES } from '../types/index.js';
import type {
  AggregationResult,
  CommandOutput,
  PeriodKind,
  ToolResult,
} from '../types/index.js';
import { getConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { toToolError } from '../utils/errors.js';
import { withLedger } from '../services/store/index.js';
import { aggregatePeriod, parseAnchor, renderReport } from '../services/time/index.js';

export interface ReportOutput extends CommandOutput {
  result: AggregationResult;
}

const reportInputSchema = z.object({
  period: z.enum(REPORT_NAMES),
  date: z.string().optional(),
});

const summaryInputSchema = z.object({
  date: z.string().optional(),
});

/**
 * Load the ledger, aggregate the period around the anchor and render it
 */
export async function buildReport(kind: PeriodKind, date: string | undefined): Promise<ReportOutput> {
  const anchor = parseAnchor(date, new Date());
  const { suggestions } = getConfig();

  const result = await withLedger((store) => aggregatePeriod(store, kind, anchor, { thresholds: suggestions }));
  logger.info(`${result.period_label}: ${result.entry_count} entries, ${result.total_minutes} minutes`);

  return { result, text: renderReport(result) };
}

export const reportTool: Tool = {
  name: 'timekeep_report',
  description:
    'Render a daily, weekly (Monday to Sunday), monthly or yearly report: total time, time per activity and suggestions.',
  inputSchema: {
    type: 'object',
    properties: {
      period: {
        type: 'string',
        description: 'Report period',
        enum: [...REPORT_NAMES],
      },
      date: {
        type: 'string',
        description: 'Any date inside the period, YYYY-MM-DD (defaults to today)',
      },
    },
    required: ['period'],
  },
};

export const summaryTool: Tool = {
  name: 'timekeep_summary',
  description: "Render today's report: total time, time per activity and suggestions.",
  inputSchema: {
    type: 'object',
    properties: {
      date: {
        type: 'string',
        description: 'Day to summarize, YYYY-MM-DD (defaults to today)',
      },
    },
  },
};

export async function reportHandler(args: Record<string, unknown>): Promise<ToolResult<ReportOutput>> {
  const parseResult = reportInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  try {
    const input = parseResult.data;
    return { success: true, data: await buildReport(REPORT_KINDS[input.period], input.date) };
  } catch (error) {
    return toToolError(error, 'REPORT_ERROR');
  }
}

export async function summaryHandler(args: Record<string, unknown>): Promise<ToolResult<ReportOutput>> {
  const parseResult = summaryInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  try {
    return { success: true, data: await buildReport('day', parseResult.data.date) };
  } catch (error) {
    return toToolError(error, 'SUMMARY_ERROR');
  }
}
