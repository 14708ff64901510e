/**
 * timekeep_list and timekeep_remove tools
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { REPORT_KINDS, REPORT_NAMES } from '../types/index.js';
import type { CommandOutput, TimeEntry, ToolResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { toToolError } from '../utils/errors.js';
import { withLedger, sortChronologically } from '../services/store/index.js';
import { formatDuration } from '../services/parser/index.js';
import { parseAnchor, periodBounds } from '../services/time/periods.js';

const listInputSchema = z.object({
  period: z.enum(REPORT_NAMES).optional(),
  date: z.string().optional(),
});

const removeInputSchema = z.object({
  id: z.string().trim().min(1, 'Entry id is required'),
});

export interface ListOutput extends CommandOutput {
  entries: TimeEntry[];
}

export interface RemoveOutput extends CommandOutput {
  id: string;
}

export const listTool: Tool = {
  name: 'timekeep_list',
  description: 'List logged entries with their ids, oldest first. Optionally restrict to one period.',
  inputSchema: {
    type: 'object',
    properties: {
      period: {
        type: 'string',
        description: 'Only list entries in this period',
        enum: [...REPORT_NAMES],
      },
      date: {
        type: 'string',
        description: 'Any date inside the period, YYYY-MM-DD (defaults to today)',
      },
    },
  },
};

export const removeTool: Tool = {
  name: 'timekeep_remove',
  description: 'Remove one logged entry by its id (see timekeep_list).',
  inputSchema: {
    type: 'object',
    properties: {
      id: {
        type: 'string',
        description: 'Entry id',
      },
    },
    required: ['id'],
  },
};

export function formatEntryLine(entry: TimeEntry): string {
  const note = entry.note ? ` (note: ${entry.note})` : '';
  return `${entry.id}  ${entry.timestamp}  ${formatDuration(entry.duration_minutes)}  ${entry.description}${note}`;
}

export async function listHandler(args: Record<string, unknown>): Promise<ToolResult<ListOutput>> {
  const parseResult = listInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const input = parseResult.data;

  try {
    const period = input.period;
    const anchor = parseAnchor(input.date, new Date());
    const entries = await withLedger((store) => {
      if (!period) {
        return sortChronologically(store.all());
      }
      const bounds = periodBounds(REPORT_KINDS[period], anchor);
      return store.query(bounds.start, bounds.end);
    });

    const text = entries.length === 0 ? 'No entries.' : entries.map(formatEntryLine).join('\n');
    return { success: true, data: { entries, text } };
  } catch (error) {
    return toToolError(error, 'LIST_ERROR');
  }
}

export async function removeHandler(args: Record<string, unknown>): Promise<ToolResult<RemoveOutput>> {
  const parseResult = removeInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const { id } = parseResult.data;

  try {
    const removed = await withLedger((store) => store.remove(id));
    if (!removed) {
      return { success: false, error: `No entry with id ${id}`, code: 'NOT_FOUND' };
    }
    logger.info(`Removed entry ${id}`);
    return { success: true, data: { id, text: `Removed entry ${id}` } };
  } catch (error) {
    return toToolError(error, 'REMOVE_ERROR');
  }
}
