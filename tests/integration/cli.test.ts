/**
 * End-to-end tests of the command line against a ledger file on disk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, readFileSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { runCli } from '../../src/cli.js';
import { resetConfig } from '../../src/config/index.js';
import { FileLedgerStore } from '../../src/services/store/ledger-store.js';
import type { VoiceCapture, VoiceOutcome } from '../../src/services/voice/index.js';

interface RunOutput {
  code: number;
  out: string;
  err: string;
}

function fixedVoice(outcome: VoiceOutcome): VoiceCapture {
  return { listen: async () => outcome };
}

function localIso(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): string {
  return new Date(year, month - 1, day, hour, minute, second).toISOString();
}

describe('timekeep CLI', () => {
  let testDir: string;
  let dataPath: string;
  let originalEnv: NodeJS.ProcessEnv;

  async function run(argv: string[], voice?: VoiceCapture): Promise<RunOutput> {
    const out: string[] = [];
    const err: string[] = [];
    const code = await runCli(['--data', dataPath, ...argv], {
      io: { stdout: (text) => out.push(text), stderr: (text) => err.push(text) },
      voice,
    });
    return { code, out: out.join('\n'), err: err.join('\n') };
  }

  async function loadLedger(path = dataPath): Promise<FileLedgerStore> {
    const store = new FileLedgerStore(path);
    await store.load();
    return store;
  }

  beforeEach(() => {
    originalEnv = { ...process.env };
    testDir = join(tmpdir(), `timekeep-cli-${randomUUID()}`);
    mkdirSync(testDir, { recursive: true });
    dataPath = join(testDir, 'data.json');

    process.env.TIMEKEEP_CONFIG_PATH = join(testDir, 'missing.yaml');
    delete process.env.TIMEKEEP_DATA;
    delete process.env.TIMEKEEP_LOG_LEVEL;
    delete process.env.TIMEKEEP_VOICE_COMMAND;
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('log', () => {
    it('logs an entry that survives a JSON export round trip', async () => {
      const logged = await run(['log', 'write report for 45m note: done', '--at', '2024-05-15T09:00:00.000Z']);
      expect(logged).toEqual({ code: 0, out: 'Logged: write report (45m)', err: '' });

      const exportPath = join(testDir, 'export.json');
      const exported = await run(['export', 'json', exportPath]);
      expect(exported.code).toBe(0);
      expect(exported.out).toBe(`Exported 1 entry to ${exportPath}`);

      const original = await loadLedger();
      const reloaded = await loadLedger(exportPath);
      expect(reloaded.all()).toEqual(original.all());
      expect(reloaded.all()[0]).toMatchObject({
        timestamp: '2024-05-15T09:00:00.000Z',
        description: 'write report',
        duration_minutes: 45,
        note: 'done',
      });
    });

    it('joins unquoted words', async () => {
      const result = await run(['log', 'email', 'for', '10m', '--at', '2024-05-15T09:00:00.000Z']);
      expect(result.out).toBe('Logged: email (10m)');
    });

    it('warns when no duration is given', async () => {
      const result = await run(['log', 'think about roadmap']);
      expect(result.code).toBe(0);
      expect(result.err).toBe('Warning: No duration detected; the entry was logged with 0 minutes.');
      expect((await loadLedger()).all()[0]?.duration_minutes).toBe(0);
    });

    it('exits 2 without writing for a malformed duration', async () => {
      const result = await run(['log', 'write for 2x']);
      expect(result.code).toBe(2);
      expect(result.err.startsWith('Error: Unable to parse duration "2x".')).toBe(true);
      expect(existsSync(dataPath)).toBe(false);
    });

    it('exits 2 without activity text', async () => {
      const result = await run(['log']);
      expect(result.code).toBe(2);
      expect(result.err.startsWith('Error: log needs activity text')).toBe(true);
    });
  });

  describe('voice', () => {
    it('logs what the recognizer heard', async () => {
      const result = await run(
        ['log', '--voice', '--at', '2024-05-15T09:00:00.000Z'],
        fixedVoice({ status: 'recognized', text: 'stretch for 10m' })
      );
      expect(result).toEqual({ code: 0, out: 'Logged: stretch (10m)', err: 'Heard: stretch for 10m' });
    });

    it('falls back to typed text when voice is unavailable', async () => {
      const result = await run(
        ['log', 'stretch for 10m', '--voice'],
        fixedVoice({ status: 'unavailable', reason: 'no microphone' })
      );
      expect(result.code).toBe(0);
      expect(result.err).toBe('Warning: Voice input unavailable (no microphone); using the typed text.');
      expect(result.out).toBe('Logged: stretch (10m)');
    });

    it('falls back to typed text when nothing was heard', async () => {
      const result = await run(['log', 'stretch for 10m', '--voice'], fixedVoice({ status: 'no_speech' }));
      expect(result.code).toBe(0);
      expect(result.err).toBe('Warning: No speech recognized; using the typed text.');
    });

    it('exits 4 when voice is unavailable and nothing was typed', async () => {
      const result = await run(['log', '--voice'], fixedVoice({ status: 'unavailable', reason: 'no microphone' }));
      expect(result.code).toBe(4);
      expect(result.err).toBe('Error: Voice input unavailable: no microphone. Type the entry instead.');
      expect(existsSync(dataPath)).toBe(false);
    });
  });

  describe('reports', () => {
    beforeEach(async () => {
      await run(['log', 'alpha for 10m', '--at', localIso(2024, 5, 13, 0, 0, 1)]);
      await run(['log', 'beta for 20m', '--at', localIso(2024, 5, 19, 23, 59, 59)]);
      await run(['log', 'gamma for 40m', '--at', localIso(2024, 5, 12, 23, 59, 59)]);
    });

    it('keeps Monday and Sunday in the week and the Sunday before out', async () => {
      const result = await run(['report', 'weekly', '--date', '2024-05-15']);
      expect(result.code).toBe(0);

      const lines = result.out.split('\n');
      expect(lines[0]).toBe('# Weekly report: 2024-05-13 to 2024-05-19');
      expect(lines[2]).toBe('Total: 30m across 2 entries');
      expect(lines.slice(6, 8)).toEqual(['- beta: 20m (67%)', '- alpha: 10m (33%)']);
      expect(result.out).not.toContain('gamma');
    });

    it('puts the Sunday before in the previous week', async () => {
      const result = await run(['report', 'weekly', '--date', '2024-05-12']);
      const lines = result.out.split('\n');
      expect(lines[0]).toBe('# Weekly report: 2024-05-06 to 2024-05-12');
      expect(lines[2]).toBe('Total: 40m across 1 entry');
    });

    it('renders an empty day', async () => {
      const result = await run(['report', 'daily', '--date', '2030-01-01']);
      expect(result.code).toBe(0);
      expect(result.out.split('\n')).toContain('- No activity recorded.');
      expect(result.out.split('\n')[2]).toBe('Total: 0m across 0 entries');
    });

    it('prints the same summary twice without changing the ledger', async () => {
      const before = readFileSync(dataPath, 'utf-8');
      const first = await run(['summary', '--date', '2024-05-13']);
      const second = await run(['summary', '--date', '2024-05-13']);

      expect(first.code).toBe(0);
      expect(first.out).toBe(second.out);
      expect(first.out.split('\n')[0]).toBe('# Daily report: 2024-05-13');
      expect(readFileSync(dataPath, 'utf-8')).toBe(before);
    });

    it('exports a period aggregation', async () => {
      const exportPath = join(testDir, 'week.csv');
      const result = await run(['export', 'csv', exportPath, '--period', 'weekly', '--date', '2024-05-15']);
      expect(result.code).toBe(0);
      expect(readFileSync(exportPath, 'utf-8')).toBe('activity,minutes,share_percent\nbeta,20,67\nalpha,10,33\n');
    });

    it('exits 2 for an unknown report period', async () => {
      const result = await run(['report', 'hourly']);
      expect(result.code).toBe(2);
      expect(result.err.startsWith('Error: period:')).toBe(true);
    });
  });

  describe('brainstorm', () => {
    it('prints the same five prompts for the same input', async () => {
      const first = await run(['brainstorm', 'Focus', 'idea1', 'idea2']);
      const second = await run(['brainstorm', 'Focus', 'idea1', 'idea2']);

      expect(first.code).toBe(0);
      expect(first.out).toBe(second.out);
      expect(first.out.split('\n').filter((line) => /^\d\. /.test(line))).toHaveLength(5);
      expect((await loadLedger()).brainstorms()).toHaveLength(2);
    });

    it('exits 2 without ideas', async () => {
      const result = await run(['brainstorm', 'Focus']);
      expect(result.code).toBe(2);
    });
  });

  describe('list and remove', () => {
    it('removes a listed entry', async () => {
      await run(['log', 'email for 10m', '--at', '2024-05-15T09:00:00.000Z']);
      await run(['log', 'planning for 30m', '--at', '2024-05-15T08:00:00.000Z']);

      const listed = await run(['list']);
      expect(listed.out.split('\n')).toHaveLength(2);
      const [first] = (await loadLedger()).all();
      expect(listed.out.split('\n')[1]?.startsWith(first?.id ?? '?')).toBe(true);

      const id = first?.id ?? '';
      expect(await run(['remove', id])).toEqual({ code: 0, out: `Removed entry ${id}`, err: '' });

      const again = await run(['remove', id]);
      expect(again.code).toBe(2);
      expect(again.err).toBe(`Error: No entry with id ${id}`);
    });
  });

  describe('older ledgers', () => {
    it('lists stable ids for entries stored without one and removes by them', async () => {
      writeFileSync(
        dataPath,
        JSON.stringify({
          entries: [
            { timestamp: '2024-05-15T10:00:00.000Z', activity: 'weekly report', duration_minutes: 45 },
            { timestamp: '2024-05-15T11:00:00.000Z', activity: 'email', duration_minutes: '10' },
          ],
        })
      );

      const first = await run(['list']);
      const second = await run(['list']);
      expect(first.code).toBe(0);
      expect(second.out).toBe(first.out);

      const id = first.out.split('\n')[0]?.split('  ')[0] ?? '';
      expect(id).toMatch(/^entry-[0-9a-f]{16}$/);
      expect(await run(['remove', id])).toEqual({ code: 0, out: `Removed entry ${id}`, err: '' });

      const remaining = await run(['list']);
      expect(remaining.out.split('\n')).toHaveLength(1);
      expect(remaining.out).toContain('email');
      expect(remaining.out).not.toContain(id);
    });

    it('exits 3 for a ledger entry with a null duration', async () => {
      writeFileSync(
        dataPath,
        JSON.stringify({ entries: [{ timestamp: '2024-05-15T10:00:00.000Z', description: 'x', duration_minutes: null }] })
      );
      const result = await run(['list']);
      expect(result.code).toBe(3);
      expect(result.err.startsWith(`Error: Invalid ledger ${dataPath}: entries.0.duration_minutes:`)).toBe(true);
    });
  });

  describe('failures', () => {
    it('exits 3 on a corrupt ledger and leaves it untouched', async () => {
      writeFileSync(dataPath, '{oops');
      const result = await run(['summary']);
      expect(result.code).toBe(3);
      expect(result.err.startsWith(`Error: Corrupt ledger ${dataPath}`)).toBe(true);
      expect(readFileSync(dataPath, 'utf-8')).toBe('{oops');
    });

    it('exits 2 for an unknown command', async () => {
      const result = await run(['frobnicate']);
      expect(result.code).toBe(2);
      expect(result.err.startsWith('Error: Unknown command: frobnicate')).toBe(true);
    });

    it('exits 2 for an unknown option', async () => {
      const result = await run(['summary', '--bogus']);
      expect(result.code).toBe(2);
    });

    it('exits 2 for an unknown export format', async () => {
      const result = await run(['export', 'xml', join(testDir, 'out.xml')]);
      expect(result.code).toBe(2);
    });
  });

  describe('help', () => {
    it('prints usage', async () => {
      const result = await run(['--help']);
      expect(result.code).toBe(0);
      expect(result.out.startsWith('Usage: timekeep')).toBe(true);
    });

    it('prints usage and exits 2 without a command', async () => {
      const result = await run([]);
      expect(result.code).toBe(2);
      expect(result.err.startsWith('Usage: timekeep')).toBe(true);
    });
  });
});
