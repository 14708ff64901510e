/**
 * Error taxonomy shared by services, tool handlers and the CLI
 */

import type { ToolError } from '../types/index.js';

export type ErrorKind = 'input' | 'storage' | 'voice' | 'internal';

export class TimekeepError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;

  constructor(message: string, code: string, kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TimekeepError';
    this.code = code;
    this.kind = kind;
  }
}

/**
 * Bad user input: duration syntax, empty description, unknown kinds
 */
export class InputError extends TimekeepError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message, code, 'input');
    this.name = 'InputError';
  }
}

/**
 * Unreadable or corrupt document, unwritable path, lock contention
 */
export class StorageError extends TimekeepError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown; code?: string }) {
    super(message, options?.code ?? 'STORAGE_ERROR', 'storage', { cause: options?.cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

/**
 * Speech capture requested but no recognizer could be reached
 */
export class VoiceUnavailableError extends TimekeepError {
  constructor(message: string) {
    super(message, 'VOICE_UNAVAILABLE', 'voice');
    this.name = 'VoiceUnavailableError';
  }
}

// Process exit codes per error kind
export const EXIT_CODES: Record<ErrorKind | 'ok', number> = {
  ok: 0,
  internal: 1,
  input: 2,
  storage: 3,
  voice: 4,
};

const CODE_KINDS: Record<string, ErrorKind> = {
  VALIDATION_ERROR: 'input',
  UNKNOWN_TOOL: 'input',
  NOT_FOUND: 'input',
  STORAGE_ERROR: 'storage',
  LOCK_TIMEOUT: 'storage',
  VOICE_UNAVAILABLE: 'voice',
};

/**
 * Resolve the error kind behind a tool error code
 */
export function kindForCode(code: string | undefined): ErrorKind {
  if (code === undefined) return 'internal';
  return CODE_KINDS[code] ?? 'internal';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Translate a thrown value into a ToolError at a handler boundary
 */
export function toToolError(error: unknown, fallbackCode: string): ToolError {
  if (error instanceof TimekeepError) {
    return { success: false, error: error.message, code: error.code };
  }
  return { success: false, error: errorMessage(error), code: fallbackCode };
}
