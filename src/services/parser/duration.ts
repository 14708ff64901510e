/**
 * Duration parsing for free-text log lines
 *
 * Durations are recognized by an ordered list of matchers. The first matcher
 * that finds a token wins; new shorthand forms are added to DURATION_MATCHERS.
 */

import { InputError } from '../../utils/errors.js';

export interface DurationMatcher {
  name: string;
  pattern: RegExp;
  toMinutes(match: RegExpExecArray): number;
}

export interface ParsedLogText {
  duration_minutes: number;
  description: string;
  note: string;
  duration_detected: boolean;
}

const HOURS = String.raw`(?:hours?|hrs?|h)`;
const MINUTES = String.raw`(?:minutes?|mins?|m)`;
const NUMBER = String.raw`(\d+(?:\.\d+)?)`;
const INTEGER = String.raw`(\d+)`;

/**
 * Wrap a token body so it may be preceded by "for" and is not glued to
 * surrounding words
 */
function tokenPattern(body: string): RegExp {
  return new RegExp(String.raw`(?:\bfor\s+)?(?<![\w.])${body}(?![a-z0-9])`, 'i');
}

function group(match: RegExpExecArray, index: number): string {
  const value = match[index];
  if (value === undefined) {
    throw new Error(`Duration matcher is missing capture group ${index}`);
  }
  return value;
}

export const DURATION_MATCHERS: readonly DurationMatcher[] = [
  {
    name: 'hours-and-minutes',
    pattern: tokenPattern(String.raw`${NUMBER}\s*${HOURS}\s*(?:and\s+)?${INTEGER}\s*${MINUTES}`),
    toMinutes: (m) => parseFloat(group(m, 1)) * 60 + parseInt(group(m, 2), 10),
  },
  {
    name: 'hours',
    pattern: tokenPattern(String.raw`${NUMBER}\s*${HOURS}`),
    toMinutes: (m) => parseFloat(group(m, 1)) * 60,
  },
  {
    name: 'minutes',
    pattern: tokenPattern(String.raw`${INTEGER}\s*${MINUTES}`),
    toMinutes: (m) => parseInt(group(m, 1), 10),
  },
  {
    name: 'half-hour-phrase',
    pattern: /(?:\bfor\s+)?\bhalf\s+an\s+hour\b/i,
    toMinutes: () => 30,
  },
  {
    name: 'hour-phrase',
    pattern: /(?:\bfor\s+)?\ban\s+hour\b/i,
    toMinutes: () => 60,
  },
  {
    // "... for 90" at the end of the text counts as minutes
    name: 'trailing-minutes',
    pattern: /\bfor\s+(\d+)\s*$/i,
    toMinutes: (m) => parseInt(group(m, 1), 10),
  },
];

// Trailing "for" followed by something that starts like a number but matched nothing
const MALFORMED_DURATION = /\bfor\s+(\d\S*)\s*$/i;

const NOTE_MARKER = /\bnote:/i;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export interface DurationMatch {
  minutes: number;
  index: number;
  length: number;
  matcher: string;
}

/**
 * Find the first duration token in text using the ordered matchers
 */
export function findDuration(
  text: string,
  matchers: readonly DurationMatcher[] = DURATION_MATCHERS
): DurationMatch | null {
  for (const matcher of matchers) {
    const match = matcher.pattern.exec(text);
    if (match) {
      return {
        minutes: Math.round(matcher.toMinutes(match)),
        index: match.index,
        length: match[0].length,
        matcher: matcher.name,
      };
    }
  }
  return null;
}

/**
 * Parse a log line such as "write report for 45m note: done"
 */
export function parseLogText(
  raw: string,
  matchers: readonly DurationMatcher[] = DURATION_MATCHERS
): ParsedLogText {
  let body = raw;
  let note = '';

  const marker = NOTE_MARKER.exec(raw);
  if (marker) {
    body = raw.slice(0, marker.index);
    note = collapseWhitespace(raw.slice(marker.index + marker[0].length));
  }

  const found = findDuration(body, matchers);
  let description: string;
  if (found) {
    description = collapseWhitespace(
      `${body.slice(0, found.index)} ${body.slice(found.index + found.length)}`
    );
  } else {
    const malformed = MALFORMED_DURATION.exec(body);
    if (malformed) {
      throw new InputError(
        `Unable to parse duration "${malformed[1] ?? ''}". Use forms like 45m, 2h, 1h30m or "for 90".`
      );
    }
    description = collapseWhitespace(body);
  }

  if (!description) {
    throw new InputError('Activity description cannot be empty');
  }

  return {
    duration_minutes: found ? found.minutes : 0,
    description,
    note,
    duration_detected: found !== null,
  };
}

/**
 * Parse a standalone duration value into minutes
 *
 * Accepts minutes (90), hours (2h, 1.5h), minutes (45m) and combined forms
 * (2h30m, 2h 30m). Throws InputError on anything else.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (input < 0 || !Number.isFinite(input)) {
      throw new InputError(`Invalid duration: ${input}`);
    }
    return Math.round(input);
  }

  const trimmed = input.trim();
  if (!trimmed) {
    throw new InputError('Duration cannot be empty');
  }

  // Pure number string: treat as minutes
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed));
  }

  const found = findDuration(trimmed);
  if (!found || found.index !== 0 || found.length !== trimmed.length) {
    throw new InputError(
      `Invalid duration format: "${input}". Use minutes (90), hours (2h, 1.5h), or hours+minutes (2h 30m).`
    );
  }
  return found.minutes;
}

/**
 * Format minutes as a human-readable duration string
 */
export function formatDuration(minutes: number): string {
  if (!Number.isFinite(minutes) || minutes <= 0) return '0m';
  const rounded = Math.round(minutes);
  const hours = Math.floor(rounded / 60);
  const mins = rounded % 60;
  if (hours === 0) return `${mins}m`;
  if (mins === 0) return `${hours}h`;
  return `${hours}h ${mins}m`;
}
