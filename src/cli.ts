/**
 * Command-line front end
 *
 * Parses argv, resolves voice input, dispatches to the tool handlers and maps
 * results to output and an exit code. All failures end here as one message.
 */

import { parseArgs } from 'util';
import { configure, getConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { EXIT_CODES, VoiceUnavailableError, kindForCode, errorMessage, toToolError } from './utils/errors.js';
import { handleToolCall } from './tools/index.js';
import { createVoiceCapture } from './services/voice/index.js';
import type { VoiceCapture } from './services/voice/index.js';
import type { CommandOutput, ToolResult } from './types/index.js';

export const VERSION = '0.1.0';

export const USAGE = `Usage: timekeep [--data <path>] <command> [options]

Commands:
  log <text...> [--voice] [--at <time>]   Log an activity, e.g. log "write report for 45m note: draft"
  summary [--date YYYY-MM-DD]             Report for today (or the given day)
  report <daily|weekly|monthly|yearly> [--date YYYY-MM-DD]
  export <json|csv|markdown> <path> [--period <daily|weekly|monthly|yearly>] [--date YYYY-MM-DD]
  brainstorm <topic> <idea...>            Record ideas and print five follow-up prompts
  list [--period <daily|weekly|monthly|yearly>] [--date YYYY-MM-DD]
  remove <id>                             Remove an entry by id
  serve                                   Run as an MCP server over stdio

Options:
  --data <path>   Ledger file (default: $TIMEKEEP_DATA or ~/.timekeep/data.json)
  -h, --help      Show this help
  -v, --version   Show the version`;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  io?: CliIO | undefined;
  voice?: VoiceCapture | undefined;
  serve?: (() => Promise<void>) | undefined;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
  stderr: (text) => process.stderr.write(text.endsWith('\n') ? text : `${text}\n`),
};

interface ParsedArgs {
  command: string | undefined;
  rest: string[];
  data?: string | undefined;
  date?: string | undefined;
  at?: string | undefined;
  period?: string | undefined;
  voice: boolean;
  help: boolean;
  version: boolean;
}

function parseCommandLine(argv: string[]): ParsedArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      data: { type: 'string' },
      date: { type: 'string' },
      at: { type: 'string' },
      period: { type: 'string' },
      voice: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const [command, ...rest] = positionals;
  return {
    command,
    rest,
    data: values.data,
    date: values.date,
    at: values.at,
    period: values.period,
    voice: values.voice === true,
    help: values.help === true,
    version: values.version === true,
  };
}

type LogTextResult = { ok: true; text: string } | { ok: false; result: ToolResult<CommandOutput> };

/**
 * Resolve the text to log, from speech when --voice is given. Typed text is
 * the fallback whenever the recognizer yields nothing.
 */
async function resolveLogText(typed: string, args: ParsedArgs, deps: CliDeps, io: CliIO): Promise<LogTextResult> {
  if (!args.voice) {
    return { ok: true, text: typed };
  }

  const voice = deps.voice ?? createVoiceCapture(getConfig().voice);
  const outcome = await voice.listen();

  switch (outcome.status) {
    case 'recognized':
      io.stderr(`Heard: ${outcome.text}`);
      return { ok: true, text: outcome.text };
    case 'no_speech':
      if (typed) {
        io.stderr('Warning: No speech recognized; using the typed text.');
        return { ok: true, text: typed };
      }
      return {
        ok: false,
        result: toToolError(new VoiceUnavailableError('No speech recognized. Type the entry instead.'), 'VOICE_UNAVAILABLE'),
      };
    case 'unavailable':
      if (typed) {
        io.stderr(`Warning: Voice input unavailable (${outcome.reason}); using the typed text.`);
        return { ok: true, text: typed };
      }
      return {
        ok: false,
        result: toToolError(
          new VoiceUnavailableError(`Voice input unavailable: ${outcome.reason}. Type the entry instead.`),
          'VOICE_UNAVAILABLE'
        ),
      };
  }
}

function usageError(message: string): ToolResult<CommandOutput> {
  return { success: false, error: `${message}\n\n${USAGE}`, code: 'VALIDATION_ERROR' };
}

async function dispatch(args: ParsedArgs, deps: CliDeps, io: CliIO): Promise<ToolResult<CommandOutput>> {
  const { rest } = args;

  switch (args.command) {
    case 'log': {
      const typed = rest.join(' ').trim();
      const resolved = await resolveLogText(typed, args, deps, io);
      if (!resolved.ok) return resolved.result;
      if (!resolved.text) {
        return usageError('log needs activity text, e.g. timekeep log "write report for 45m"');
      }
      return handleToolCall('timekeep_log', { text: resolved.text, at: args.at });
    }
    case 'summary':
      return handleToolCall('timekeep_summary', { date: args.date });
    case 'report':
      if (rest[0] === undefined) {
        return usageError('report needs a period: daily, weekly, monthly or yearly');
      }
      return handleToolCall('timekeep_report', { period: rest[0], date: args.date });
    case 'export':
      if (rest[0] === undefined || rest[1] === undefined) {
        return usageError('export needs a format (json, csv, markdown) and an output path');
      }
      return handleToolCall('timekeep_export', {
        format: rest[0],
        path: rest[1],
        period: args.period,
        date: args.date,
      });
    case 'brainstorm': {
      const [topic, ...ideas] = rest;
      if (topic === undefined || ideas.length === 0) {
        return usageError('brainstorm needs a topic and at least one idea');
      }
      return handleToolCall('timekeep_brainstorm', { topic, ideas });
    }
    case 'list':
      return handleToolCall('timekeep_list', { period: args.period, date: args.date });
    case 'remove':
      if (rest[0] === undefined) {
        return usageError('remove needs an entry id (see timekeep list)');
      }
      return handleToolCall('timekeep_remove', { id: rest[0] });
    default:
      return usageError(`Unknown command: ${args.command ?? '(none)'}`);
  }
}

/**
 * Run one command and return the process exit code
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;

  let args: ParsedArgs;
  try {
    args = parseCommandLine(argv);
  } catch (error) {
    io.stderr(`Error: ${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_CODES.input;
  }

  if (args.help) {
    io.stdout(USAGE);
    return EXIT_CODES.ok;
  }
  if (args.version) {
    io.stdout(VERSION);
    return EXIT_CODES.ok;
  }
  if (args.command === undefined) {
    io.stderr(USAGE);
    return EXIT_CODES.input;
  }

  try {
    configure({ dataPath: args.data });
    logger.setLevel(getConfig().logLevel);
  } catch (error) {
    io.stderr(`Error: ${errorMessage(error)}`);
    return EXIT_CODES.input;
  }

  if (args.command === 'serve') {
    await (deps.serve ?? (await import('./server.js')).startServer)();
    return EXIT_CODES.ok;
  }

  let result: ToolResult<CommandOutput>;
  try {
    result = await dispatch(args, deps, io);
  } catch (error) {
    logger.debug('Unhandled command failure', error);
    io.stderr(`Error: ${errorMessage(error)}`);
    return EXIT_CODES.internal;
  }

  if (!result.success) {
    io.stderr(`Error: ${result.error}`);
    return EXIT_CODES[kindForCode(result.code)];
  }

  for (const warning of result.data.warnings ?? []) {
    io.stderr(`Warning: ${warning}`);
  }
  io.stdout(result.data.text);
  return EXIT_CODES.ok;
}
