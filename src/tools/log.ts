/**
 * timekeep_log tool
 *
 * Parse a free-text log line and append it to the ledger.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { CommandOutput, TimeEntry, ToolResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { toToolError } from '../utils/errors.js';
import { parseLogText, formatDuration } from '../services/parser/index.js';
import { parseAnchor } from '../services/time/periods.js';
import { withLedger } from '../services/store/index.js';

export const NO_DURATION_WARNING = 'No duration detected; the entry was logged with 0 minutes.';

const inputSchema = z.object({
  text: z.string().trim().min(1, 'Log text is required'),
  at: z.string().optional(),
});

export interface LogOutput extends CommandOutput {
  entry: TimeEntry;
  duration_formatted: string;
}

export const logTool: Tool = {
  name: 'timekeep_log',
  description:
    'Log an activity from free text such as "write report for 45m note: first draft". Durations like 45m, 2h, 1h30m, "2 hours" or a trailing "for 90" are recognized; text after "note:" is stored as a note.',
  inputSchema: {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Activity text with an optional duration and "note:" suffix',
      },
      at: {
        type: 'string',
        description: 'Timestamp for the entry (ISO 8601 or YYYY-MM-DD, defaults to now)',
      },
    },
    required: ['text'],
  },
};

export async function logHandler(args: Record<string, unknown>): Promise<ToolResult<LogOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const input = parseResult.data;

  try {
    const parsed = parseLogText(input.text);
    const timestamp = parseAnchor(input.at, new Date()).toISOString();

    const entry = await withLedger((store) =>
      store.append({
        timestamp,
        description: parsed.description,
        duration_minutes: parsed.duration_minutes,
        note: parsed.note,
      })
    );

    const durationFormatted = formatDuration(entry.duration_minutes);
    const warnings = parsed.duration_detected ? [] : [NO_DURATION_WARNING];
    if (!parsed.duration_detected) {
      logger.debug(`No duration found in "${input.text}"`);
    }
    logger.info(`Logged ${durationFormatted} for "${entry.description}"`);

    return {
      success: true,
      data: {
        entry,
        duration_formatted: durationFormatted,
        warnings,
        text: `Logged: ${entry.description} (${durationFormatted})`,
      },
    };
  } catch (error) {
    return toToolError(error, 'LOG_ERROR');
  }
}
