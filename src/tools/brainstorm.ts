/**
 * timekeep_brainstorm tool
 *
 * Record ideas under a topic and answer with five follow-up prompts.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { BrainstormNote, CommandOutput, ToolResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { toToolError } from '../utils/errors.js';
import { withLedger } from '../services/store/index.js';
import { generatePrompts, normalizeCapture } from '../services/brainstorm/index.js';

const inputSchema = z.object({
  topic: z.string().min(1, 'Topic is required'),
  ideas: z.array(z.string()).min(1, 'At least one idea is required'),
});

export interface BrainstormOutput extends CommandOutput {
  note: BrainstormNote;
  prompts: string[];
}

export const brainstormTool: Tool = {
  name: 'timekeep_brainstorm',
  description:
    'Record one or more ideas under a topic and get five follow-up prompts (goal breakdown, risks, resources, next step, idea extension).',
  inputSchema: {
    type: 'object',
    properties: {
      topic: {
        type: 'string',
        description: 'Topic the ideas belong to',
      },
      ideas: {
        type: 'array',
        items: { type: 'string' },
        description: 'Ideas to record, in order',
      },
    },
    required: ['topic', 'ideas'],
  },
};

export function renderPrompts(prompts: readonly string[]): string {
  return ['Ideas recorded.', '', '## Follow-up prompts', '', ...prompts.map((p, i) => `${i + 1}. ${p}`)].join('\n');
}

export async function brainstormHandler(args: Record<string, unknown>): Promise<ToolResult<BrainstormOutput>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  try {
    const { topic, ideas } = normalizeCapture(parseResult.data.topic, parseResult.data.ideas);
    const timestamp = new Date().toISOString();

    const note = await withLedger((store) => store.appendBrainstorm(topic, ideas, timestamp));
    const prompts = generatePrompts(topic, ideas);
    logger.info(`Recorded ${ideas.length} ideas under "${topic}"`);

    return {
      success: true,
      data: { note, prompts, text: renderPrompts(prompts) },
    };
  } catch (error) {
    return toToolError(error, 'BRAINSTORM_ERROR');
  }
}
