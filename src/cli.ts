/**
 * Command line: parse options, load configuration and serve the tools over
 * stdio or SSE.
 */

import type { Server as HttpServer } from 'http';
import { cac } from 'cac';
import express from 'express';
import { z } from 'zod';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { loadConfig } from './lib/config.js';
import { ConfigError } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { createClients, createRegistry } from './gateway.js';
import { SERVER_NAME, SERVER_VERSION, createGatewayServer, type GatewayServerOptions, type ToolRegistry } from './server.js';

const logger = createLogger('cli');

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';

const cliOptionsSchema = z.object({
  transport: z.enum(['stdio', 'sse']).default('stdio'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  config: z.string().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

type Shutdown = () => Promise<void>;

export function parseCliOptions(raw: Record<string, unknown>): CliOptions {
  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid command line: ${issues}`);
  }
  return result.data;
}

// =============================================================================
// TRANSPORTS
// =============================================================================

async function serveStdio(registry: ToolRegistry, options: GatewayServerOptions): Promise<Shutdown> {
  const server = createGatewayServer(registry, options);
  await server.connect(new StdioServerTransport());
  logger.info('Serving MCP over stdio');
  return () => server.close();
}

/**
 * One MCP server per SSE connection; POST /messages?sessionId=... feeds it.
 */
export function createSseApp(registry: ToolRegistry, options: GatewayServerOptions): express.Express {
  const app = express();
  const transports = new Map<string, SSEServerTransport>();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: transports.size, tools: registry.size });
  });

  app.get(SSE_PATH, async (_req, res) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    transports.set(transport.sessionId, transport);
    res.on('close', () => {
      transports.delete(transport.sessionId);
      logger.info({ sessionId: transport.sessionId }, 'SSE session closed');
    });

    try {
      await createGatewayServer(registry, options).connect(transport);
      logger.info({ sessionId: transport.sessionId }, 'SSE session opened');
    } catch (error) {
      transports.delete(transport.sessionId);
      logger.error({ err: error }, 'Failed to open SSE session');
    }
  });

  app.post(MESSAGES_PATH, async (req, res) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: `Unknown session: ${sessionId || '(none)'}` });
      return;
    }

    try {
      await transport.handlePostMessage(req, res);
    } catch (error) {
      logger.error({ sessionId, err: error }, 'Failed to handle message');
      if (!res.headersSent) {
        res.status(500).json({ error: 'Failed to handle message' });
      }
    }
  });

  return app;
}

async function serveSse(
  registry: ToolRegistry,
  options: GatewayServerOptions,
  host: string,
  port: number
): Promise<Shutdown> {
  const app = createSseApp(registry, options);
  const httpServer = await new Promise<HttpServer>((resolveListen, rejectListen) => {
    const listening = app.listen(port, host, () => resolveListen(listening));
    listening.once('error', rejectListen);
  });
  logger.info({ host, port, endpoint: SSE_PATH }, 'Serving MCP over SSE');

  return () =>
    new Promise<void>((resolveClose, rejectClose) => {
      httpServer.close((error) => (error ? rejectClose(error) : resolveClose()));
      httpServer.closeAllConnections();
    });
}

// =============================================================================
// ENTRY
// =============================================================================

export async function startGateway(options: CliOptions): Promise<void> {
  const config = loadConfig({ configPath: options.config });
  const registry = createRegistry(createClients(config));
  const serverOptions: GatewayServerOptions = { owner: config.github.owner };

  logger.info({ transport: options.transport, config: config.source ?? null }, 'Starting gateway');
  const close =
    options.transport === 'sse'
      ? await serveSse(registry, serverOptions, options.host, options.port)
      : await serveStdio(registry, serverOptions);

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutdown signal received');
    close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const cli = cac(SERVER_NAME);

  cli
    .help()
    .version(SERVER_VERSION)
    .option('--transport <transport>', 'stdio for a local client, sse for remote deployment', { default: 'stdio' })
    .option('--host <host>', 'SSE listen address', { default: '0.0.0.0' })
    .option('--port <port>', 'SSE listen port', { default: 8000 })
    .option('--config <file>', 'YAML config file (default: ./config.yaml)')
    .command('', 'Start the MCP gateway')
    .action(async (options: Record<string, unknown>) => {
      await startGateway(parseCliOptions(options));
    });

  cli.parse(argv, { run: false });
  await cli.runMatchedCommand();
}
