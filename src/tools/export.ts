/**
 * timekeep_export - write the ledger or one period's aggregation to a file
 *
 * Formats: json (reloadable ledger document), csv (one row per entry),
 * markdown (summary, entry table and brainstorm notes). With `period`, the
 * aggregation for that period is exported instead of the full ledger.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { REPORT_KINDS, REPORT_NAMES } from '../types/index.js';
import type { CommandOutput, ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { toToolError } from '../utils/errors.js';
import { withLedger } from '../services/store/index.js';
import { aggregatePeriod, parseAnchor } from '../services/time/index.js';
import {
  exportAggregation,
  exportLedger,
  writeExport,
  EXPORT_FORMATS,
} from '../services/export/index.js';

export interface ExportOutput extends CommandOutput {
  format: string;
  output_path: string;
  entry_count: number;
  period?: string | undefined;
}

const exportInputSchema = z.object({
  format: z.enum(EXPORT_FORMATS),
  path: z.string().trim().min(1, 'Output path is required'),
  period: z.enum(REPORT_NAMES).optional(),
  date: z.string().optional(),
});

export const exportTool: Tool = {
  name: 'timekeep_export',
  description:
    'Export logged entries (and brainstorm notes) as JSON, CSV or Markdown. Pass a period to export that period\'s aggregation instead.',
  inputSchema: {
    type: 'object',
    properties: {
      format: {
        type: 'string',
        description: 'Output format',
        enum: [...EXPORT_FORMATS],
      },
      path: {
        type: 'string',
        description: 'File to write',
      },
      period: {
        type: 'string',
        description: 'Export one period\'s aggregation instead of the full ledger',
        enum: [...REPORT_NAMES],
      },
      date: {
        type: 'string',
        description: 'Any date inside the period, YYYY-MM-DD (defaults to today)',
      },
    },
    required: ['format', 'path'],
  },
};

export async function exportHandler(args: Record<string, unknown>): Promise<ToolResult<ExportOutput>> {
  const parseResult = exportInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const input = parseResult.data;

  try {
    const { suggestions } = getConfig();
    const period = input.period;
    const anchor = parseAnchor(input.date, new Date());

    const { content, entryCount } = await withLedger((store) => {
      if (period) {
        const result = aggregatePeriod(store, REPORT_KINDS[period], anchor, { thresholds: suggestions });
        return { content: exportAggregation(result, input.format), entryCount: result.entry_count };
      }
      const document = store.snapshot();
      return {
        content: exportLedger(document, input.format, suggestions),
        entryCount: document.entries.length,
      };
    });

    const outputPath = await writeExport(input.path, content);
    const scope = period ? `${period} aggregation` : `${entryCount} ${entryCount === 1 ? 'entry' : 'entries'}`;
    logger.info(`Export complete: ${scope} as ${input.format}`);

    return {
      success: true,
      data: {
        format: input.format,
        output_path: outputPath,
        entry_count: entryCount,
        period,
        text: `Exported ${scope} to ${outputPath}`,
      },
    };
  } catch (error) {
    return toToolError(error, 'EXPORT_ERROR');
  }
}
