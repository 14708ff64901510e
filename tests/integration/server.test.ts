/**
 * MCP surface: tools listed and called through an in-memory client
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer } from '../../src/server.js';
import { resetConfig } from '../../src/config/index.js';

function firstText(content: unknown): string {
  if (!Array.isArray(content)) {
    throw new Error('Tool response has no content');
  }
  const first: unknown = content[0];
  if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
    return first.text;
  }
  throw new Error('Tool response has no text');
}

describe('MCP server', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;
  let client: Client;
  let server: ReturnType<typeof createServer>;

  beforeEach(async () => {
    originalEnv = { ...process.env };
    testDir = join(tmpdir(), `timekeep-server-${randomUUID()}`);
    mkdirSync(testDir, { recursive: true });
    process.env.TIMEKEEP_DATA = join(testDir, 'data.json');
    process.env.TIMEKEEP_CONFIG_PATH = join(testDir, 'missing.yaml');
    resetConfig();

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createServer();
    client = new Client({ name: 'timekeep-test', version: '1.0.0' });
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    process.env = originalEnv;
    resetConfig();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('lists the tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toContain('timekeep_report');
    expect(tools).toHaveLength(7);
  });

  it('logs and summarizes through tool calls', async () => {
    const at = new Date(2024, 4, 15, 9).toISOString();
    const logged = await client.callTool({ name: 'timekeep_log', arguments: { text: 'email for 10m', at } });
    expect(logged.isError).toBe(false);
    expect(JSON.parse(firstText(logged.content))).toMatchObject({
      success: true,
      data: { text: 'Logged: email (10m)' },
    });

    const summary = await client.callTool({ name: 'timekeep_summary', arguments: { date: '2024-05-15' } });
    expect(JSON.parse(firstText(summary.content))).toMatchObject({
      success: true,
      data: { result: { total_minutes: 10, by_activity: { email: 10 } } },
    });
  });

  it('flags failed calls as errors', async () => {
    const response = await client.callTool({ name: 'timekeep_report', arguments: { period: 'hourly' } });
    expect(response.isError).toBe(true);
    expect(JSON.parse(firstText(response.content))).toMatchObject({ success: false, code: 'VALIDATION_ERROR' });
  });
});
