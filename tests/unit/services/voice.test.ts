/**
 * Tests for voice capture
 *
 * The recognizer command is played by the running Node binary.
 */

import { describe, it, expect } from 'vitest';
import { CommandVoiceCapture, createVoiceCapture } from '../../../src/services/voice/index.js';

describe('createVoiceCapture', () => {
  it('is unavailable without a configured command', async () => {
    const outcome = await createVoiceCapture({ timeoutMs: 1000 }).listen();
    expect(outcome.status).toBe('unavailable');
  });

  it('is unavailable for a blank command', async () => {
    const outcome = await createVoiceCapture({ command: '   ', timeoutMs: 1000 }).listen();
    expect(outcome.status).toBe('unavailable');
  });
});

describe('CommandVoiceCapture', () => {
  it('returns the recognized text', async () => {
    const capture = new CommandVoiceCapture(
      process.execPath,
      ['-e', "process.stdout.write('read docs   for 20m\\n')"],
      10_000
    );
    await expect(capture.listen()).resolves.toEqual({ status: 'recognized', text: 'read docs for 20m' });
  });

  it('reports no speech for empty output', async () => {
    const capture = new CommandVoiceCapture(process.execPath, ['-e', ''], 10_000);
    await expect(capture.listen()).resolves.toEqual({ status: 'no_speech' });
  });

  it('reports no speech when the recognizer times out', async () => {
    const capture = new CommandVoiceCapture(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], 200);
    await expect(capture.listen()).resolves.toEqual({ status: 'no_speech' });
  });

  it('is unavailable when the recognizer is missing', async () => {
    const capture = new CommandVoiceCapture('/nonexistent/timekeep-recognizer', [], 1000);
    await expect(capture.listen()).resolves.toEqual({
      status: 'unavailable',
      reason: 'Speech recognizer not found: /nonexistent/timekeep-recognizer',
    });
  });

  it('is unavailable when the recognizer fails', async () => {
    const capture = new CommandVoiceCapture(
      process.execPath,
      ['-e', "process.stderr.write('microphone busy'); process.exit(3)"],
      10_000
    );
    await expect(capture.listen()).resolves.toEqual({
      status: 'unavailable',
      reason: 'Speech recognizer failed: microphone busy',
    });
  });
});
