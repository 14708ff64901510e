/**
 * Voice capture capability
 *
 * The CLI only depends on VoiceCapture. Recognition itself is delegated to an
 * external command that prints the recognized text on stdout; every listen()
 * call is bounded by a timeout.
 */

import { execFile } from 'child_process';
import { logger } from '../../utils/logger.js';
import type { TimekeepConfig } from '../../types/index.js';

export type VoiceOutcome =
  | { status: 'recognized'; text: string }
  | { status: 'no_speech' }
  | { status: 'unavailable'; reason: string };

export interface VoiceCapture {
  listen(): Promise<VoiceOutcome>;
}

/**
 * Capability used when no recognizer is configured
 */
export const unavailableVoiceCapture: VoiceCapture = {
  async listen() {
    return {
      status: 'unavailable',
      reason: 'No speech recognizer configured (set TIMEKEEP_VOICE_COMMAND or voice.command)',
    };
  },
};

export class CommandVoiceCapture implements VoiceCapture {
  constructor(
    private readonly file: string,
    private readonly args: readonly string[],
    private readonly timeoutMs: number
  ) {}

  listen(): Promise<VoiceOutcome> {
    logger.debug(`Listening via ${this.file}`, { timeoutMs: this.timeoutMs });

    return new Promise((resolve) => {
      execFile(
        this.file,
        [...this.args],
        { timeout: this.timeoutMs, encoding: 'utf-8', windowsHide: true },
        (error, stdout, stderr) => {
          if (error) {
            if (error.killed || error.signal === 'SIGTERM') {
              resolve({ status: 'no_speech' });
              return;
            }
            if (error.code === 'ENOENT') {
              resolve({ status: 'unavailable', reason: `Speech recognizer not found: ${this.file}` });
              return;
            }
            const detail = stderr.trim() || error.message;
            resolve({ status: 'unavailable', reason: `Speech recognizer failed: ${detail}` });
            return;
          }

          const text = stdout.replace(/\s+/g, ' ').trim();
          resolve(text ? { status: 'recognized', text } : { status: 'no_speech' });
        }
      );
    });
  }
}

/**
 * Build the capability from config: a command line split on whitespace
 */
export function createVoiceCapture(config: TimekeepConfig['voice']): VoiceCapture {
  const parts = config.command?.trim().split(/\s+/).filter(Boolean) ?? [];
  const [file, ...args] = parts;
  if (file === undefined) {
    return unavailableVoiceCapture;
  }
  return new CommandVoiceCapture(file, args, config.timeoutMs);
}
