/**
 * Wires configuration into clients and clients into the tool registry.
 */

import type { AppConfig } from './lib/config.js';
import { createLogger } from './lib/logger.js';
import { GitHubClient } from './clients/github/index.js';
import { SlackClient } from './clients/slack/index.js';
import { ZentaoClient } from './clients/zentao/index.js';
import { createGitHubTools } from './tools/github-tools.js';
import { createSlackTools } from './tools/slack-tools.js';
import { createZentaoTools } from './tools/zentao-tools.js';
import { ToolRegistry } from './server.js';

const logger = createLogger('gateway');

export interface GatewayClients {
  github: GitHubClient;
  slack: SlackClient;
  /** Null unless ZenTao is configured */
  zentao: ZentaoClient | null;
}

export function createClients(config: AppConfig): GatewayClients {
  const github = new GitHubClient({ token: config.github.token, owner: config.github.owner });
  const slack = new SlackClient({ botToken: config.slack.botToken, defaultChannel: config.slack.defaultChannel });
  const zentao = config.zentao
    ? new ZentaoClient({ url: config.zentao.url, account: config.zentao.account, password: config.zentao.password })
    : null;

  logger.info(
    {
      githubOwner: config.github.owner || null,
      slackDefaultChannel: config.slack.defaultChannel,
      zentao: config.zentao ? config.zentao.url : null,
    },
    'Clients created'
  );
  return { github, slack, zentao };
}

export function createRegistry(clients: GatewayClients): ToolRegistry {
  const toolSets = [createGitHubTools(clients.github), createSlackTools(clients.slack)];
  if (clients.zentao) {
    toolSets.push(createZentaoTools(clients.zentao));
  }
  const registry = new ToolRegistry(toolSets);
  logger.info({ tools: registry.size, zentao: clients.zentao !== null }, 'Tools registered');
  return registry;
}
