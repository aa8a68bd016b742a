import { describe, it, expect } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { ToolRegistry, buildInstructions, createGatewayServer, toToolResult } from './server.js';
import { ToolBuilder, parseArgs } from './tools/base.js';
import { GitHubApiError, SlackApiError } from './lib/errors.js';
import { z } from 'zod';

const tools = new ToolBuilder()
  .add('echo_upper', 'Upper-case a word', { word: { type: 'string', description: 'Word', required: true } }, async (args) => {
    const { word } = parseArgs(z.object({ word: z.string().min(1) }), args);
    return { word: word.toUpperCase() };
  })
  .add('github_broken', 'Always fails with a GitHub error', {}, async () => {
    throw new GitHubApiError('GitHub GET /repos/acme/x failed (404): Not Found', 404);
  })
  .add('slack_broken', 'Always fails with a Slack error', {}, async () => {
    throw new SlackApiError('Slack chat.postMessage failed: not_in_channel', 'not_in_channel');
  })
  .add('plain_broken', 'Always fails with a plain error', {}, async () => {
    throw new Error('boom');
  })
  .build();

describe('ToolRegistry', () => {
  const registry = new ToolRegistry([tools]);

  it('should reject duplicate tool names', () => {
    expect(() => new ToolRegistry([tools, tools.slice(0, 1)])).toThrow('Duplicate tool name: echo_upper');
  });

  it('should return handler data on success', async () => {
    expect(await registry.dispatch('echo_upper', { word: 'ship' })).toEqual({ ok: true, data: { word: 'SHIP' } });
  });

  it('should report unknown tools', async () => {
    expect(await registry.dispatch('nope', {})).toEqual({ ok: false, kind: 'unknown_tool', message: 'Unknown tool: nope' });
  });

  it('should report invalid arguments', async () => {
    expect(await registry.dispatch('echo_upper', {})).toEqual({
      ok: false,
      kind: 'invalid_arguments',
      message: 'Invalid arguments: word: Required',
    });
  });

  it('should carry the kind and service of client errors', async () => {
    expect(await registry.dispatch('github_broken', {})).toEqual({
      ok: false,
      kind: 'transport',
      service: 'github',
      message: 'GitHub GET /repos/acme/x failed (404): Not Found',
    });
    expect(await registry.dispatch('slack_broken', {})).toMatchObject({ kind: 'backend', service: 'slack' });
  });

  it('should contain unexpected errors', async () => {
    expect(await registry.dispatch('plain_broken', {})).toEqual({ ok: false, kind: 'internal', message: 'boom' });
  });
});

describe('toToolResult', () => {
  it('should serialize data as pretty JSON text', () => {
    expect(toToolResult({ ok: true, data: { a: 1 } })).toEqual({
      content: [{ type: 'text', text: '{\n  "a": 1\n}' }],
    });
  });

  it('should mark failures as errors', () => {
    const result = toToolResult({ ok: false, kind: 'auth', service: 'zentao', message: 'ZenTao login failed (500)' });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0]?.text ?? '')).toEqual({
      success: false,
      error: 'ZenTao login failed (500)',
      kind: 'auth',
      service: 'zentao',
    });
  });
});

describe('buildInstructions', () => {
  it('should mention the default owner when configured', () => {
    const text = buildInstructions(new ToolRegistry([tools]), { owner: 'acme' });

    expect(text.split('\n')).toContain('Bare repository names resolve against the GitHub owner "acme".');
  });

  it('should map common requests to tool sequences', () => {
    const lines = buildInstructions(new ToolRegistry([tools])).split('\n');

    expect(lines).toContain('Shortcuts (request -> tool sequence):');
    expect(lines).toContain('- "report a bug": github_create_issue (label bug) -> slack_send_message with the description and issue link');
    expect(lines).toContain('- "notify the team": slack_send_message to the default channel');
  });

  it('should add the ZenTao step to bug reports when ZenTao tools are registered', () => {
    const zentaoTools = new ToolBuilder().add('zentao_list_bugs', 'List bugs', {}, async () => []).build();
    const lines = buildInstructions(new ToolRegistry([tools, zentaoTools])).split('\n');

    expect(lines[0]).toBe('DevOps gateway for GitHub and Slack and ZenTao.');
    expect(lines).toContain(
      '- "report a bug": github_create_issue (label bug) -> slack_send_message with the description and issue link -> zentao_create_bug'
    );
  });
});

describe('createGatewayServer', () => {
  async function connect() {
    const server = createGatewayServer(new ToolRegistry([tools]), { owner: 'acme' });
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    return client;
  }

  it('should list every registered tool with its schema', async () => {
    const client = await connect();

    const { tools: listed } = await client.listTools();

    expect(listed.map((tool) => tool.name)).toEqual(['echo_upper', 'github_broken', 'slack_broken', 'plain_broken']);
    expect(listed[0]?.inputSchema).toEqual({
      type: 'object',
      properties: { word: { type: 'string', description: 'Word' } },
      required: ['word'],
    });
    await client.close();
  });

  it('should answer tool calls and turn failures into error results', async () => {
    const client = await connect();

    const ok = CallToolResultSchema.parse(await client.callTool({ name: 'echo_upper', arguments: { word: 'go' } }));
    const failed = CallToolResultSchema.parse(await client.callTool({ name: 'github_broken', arguments: {} }));

    expect(ok.isError).toBeFalsy();
    expect(ok.content).toEqual([{ type: 'text', text: '{\n  "word": "GO"\n}' }]);
    expect(failed.isError).toBe(true);
    expect(failed.content[0]).toMatchObject({ type: 'text' });
    await client.close();
  });
});
