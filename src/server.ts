/**
 * MCP server exposing the registered GitHub, Slack and ZenTao tools.
 *
 * Every call is settled into a ToolOutcome before it reaches the wire, so a
 * failing client never takes the server down.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from './lib/logger.js';
import { IntegrationError, errorMessage, type IntegrationErrorKind, type IntegrationService } from './lib/errors.js';
import { ToolArgumentError, errorResult, successResult, type MCPToolResult, type RegisteredTool } from './tools/base.js';

const logger = createLogger('server');

export const SERVER_NAME = 'devops-gateway';
export const SERVER_VERSION = '1.0.0';

export type ToolFailureKind = IntegrationErrorKind | 'invalid_arguments' | 'unknown_tool' | 'internal';

export type ToolOutcome =
  | { ok: true; data: unknown }
  | { ok: false; kind: ToolFailureKind; message: string; service?: IntegrationService };

export interface GatewayServerOptions {
  /** GitHub owner used for bare repository names, shown to the model */
  owner?: string;
}

/**
 * name -> tool. Duplicate names are a wiring bug.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(toolSets: RegisteredTool[][]) {
    for (const tool of toolSets.flat()) {
      const name = tool.definition.name;
      if (this.tools.has(name)) {
        throw new Error(`Duplicate tool name: ${name}`);
      }
      this.tools.set(name, tool);
    }
  }

  get size(): number {
    return this.tools.size;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions() {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  async dispatch(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, kind: 'unknown_tool', message: `Unknown tool: ${name}` };
    }

    try {
      return { ok: true, data: await tool.handler(args) };
    } catch (error) {
      if (error instanceof IntegrationError) {
        return { ok: false, kind: error.kind, service: error.service, message: error.message };
      }
      if (error instanceof ToolArgumentError) {
        return { ok: false, kind: 'invalid_arguments', message: error.message };
      }
      logger.error({ tool: name, err: error }, 'Tool failed unexpectedly');
      return { ok: false, kind: 'internal', message: errorMessage(error) };
    }
  }
}

export function toToolResult(outcome: ToolOutcome): MCPToolResult {
  if (outcome.ok) {
    return successResult(outcome.data);
  }
  return errorResult(outcome.message, {
    kind: outcome.kind,
    ...(outcome.service ? { service: outcome.service } : {}),
  });
}

export function buildInstructions(registry: ToolRegistry, options: GatewayServerOptions = {}): string {
  const zentao = registry.has('zentao_list_bugs');
  const lines = [
    'DevOps gateway for GitHub and Slack' + (zentao ? ' and ZenTao.' : '.'),
    'Query commits, pull requests, issues, files and Actions runs; manage issues and project boards;',
    'post Slack messages and task cards.',
  ];
  if (zentao) {
    lines.push('Manage ZenTao bugs, tasks and stories. Tasks belong to executions (zentao_list_executions).');
  }
  if (options.owner) {
    lines.push(`Bare repository names resolve against the GitHub owner "${options.owner}".`);
  }
  lines.push('Slack task cards return channel and ts; pass both to slack_update_task.');

  lines.push(
    '',
    'Shortcuts (request -> tool sequence):',
    '- "create a requirement": github_create_issue (label enhancement, assignee) -> slack_send_message with title, owner and issue link',
    '- "report a bug": github_create_issue (label bug) -> slack_send_message with the description and issue link' +
      (zentao ? ' -> zentao_create_bug' : ''),
    '- "assign a task": slack_create_task (mention the owner, set priority) -> github_create_issue (label task)',
    '- "project status": github_get_commits + github_get_issues + github_get_pull_requests -> slack_send_message with a summary',
    '- "notify the team": slack_send_message to the default channel',
    '- "review recent changes": github_get_commits -> github_get_commit_diff'
  );
  return lines.join('\n');
}

export function createGatewayServer(registry: ToolRegistry, options: GatewayServerOptions = {}): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} }, instructions: buildInstructions(registry, options) }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: registry.definitions() }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const startTime = Date.now();
    logger.info({ tool: name }, 'Tool called');

    const outcome = await registry.dispatch(name, args ?? {});
    if (outcome.ok) {
      logger.debug({ tool: name, durationMs: Date.now() - startTime }, 'Tool succeeded');
    } else {
      logger.warn({ tool: name, kind: outcome.kind, error: outcome.message }, 'Tool failed');
    }
    return toToolResult(outcome);
  });

  return server;
}
