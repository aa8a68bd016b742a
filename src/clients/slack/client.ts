/**
 * Slack Client
 *
 * Messaging through the Slack Web API plus name -> ID resolution for users
 * and channels. Both directories are filled by a cursor scan on first use
 * and kept for the lifetime of the client.
 */

import { ErrorCode, LogLevel, WebClient } from '@slack/web-api';
import type { KnownBlock, Logger } from '@slack/web-api';
import { createLogger, sanitizeString } from '../../lib/logger.js';
import { matchByName } from '../../lib/name-match.js';
import { SlackApiError, errorMessage } from '../../lib/errors.js';
import { Directory } from './directory.js';

const logger = createLogger('slack');

export const REQUEST_TIMEOUT_MS = 30_000;
export const DIRECTORY_PAGE_SIZE = 200;

export interface SlackClientOptions {
  botToken: string;
  /** Used when a send call names no channel */
  defaultChannel?: string;
}

export interface SlackUser {
  id: string;
  /** Handle */
  name: string;
  realName: string;
  displayName: string;
}

export interface SlackChannel {
  id: string;
  name: string;
}

export interface SlackMessageRef {
  ok: boolean;
  channel: string;
  /** Message timestamp; addresses the message in later updates */
  ts: string;
}

export type ChannelResolution =
  | { ok: true; channelId: string }
  | { ok: false; error: string };

const LOG_LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Web API log lines go through pino; the library's default logger prints to
 * stdout, which belongs to the stdio transport.
 */
export function createWebApiLogger(initialLevel: LogLevel = LogLevel.INFO): Logger {
  const log = createLogger('slack-web-api');
  let level = initialLevel;
  const enabled = (at: LogLevel) => LOG_LEVEL_ORDER.indexOf(at) >= LOG_LEVEL_ORDER.indexOf(level);
  const line = (msg: unknown[]) => sanitizeString(msg.map(String).join(' '));

  return {
    debug: (...msg: unknown[]) => {
      if (enabled(LogLevel.DEBUG)) log.debug(line(msg));
    },
    info: (...msg: unknown[]) => {
      if (enabled(LogLevel.INFO)) log.info(line(msg));
    },
    warn: (...msg: unknown[]) => {
      if (enabled(LogLevel.WARN)) log.warn(line(msg));
    },
    error: (...msg: unknown[]) => {
      if (enabled(LogLevel.ERROR)) log.error(line(msg));
    },
    setLevel: (next: LogLevel) => {
      level = next;
    },
    getLevel: () => level,
    // pino child loggers carry the component instead
    setName: () => undefined,
  };
}

export class SlackClient {
  readonly defaultChannel: string;
  private readonly web: WebClient;
  private readonly users: Directory<SlackUser>;
  private readonly channels: Directory<SlackChannel>;

  constructor(options: SlackClientOptions) {
    this.defaultChannel = options.defaultChannel || '#general';
    this.web = new WebClient(options.botToken, {
      timeout: REQUEST_TIMEOUT_MS,
      retryConfig: { retries: 0 },
      rejectRateLimitedCalls: true,
      logger: createWebApiLogger(),
    });
    this.users = new Directory((add) => this.scanUsers(add));
    this.channels = new Directory((add) => this.scanChannels(add));
  }

  private async call<T>(method: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const code = platformErrorCode(error);
      logger.error({ method, code, error: errorMessage(error) }, 'Slack API call failed');
      const message = code ? `Slack ${method} failed: ${code}` : `Slack ${method} failed: ${errorMessage(error)}`;
      throw new SlackApiError(message, code, { cause: error });
    }
  }

  // ===========================================================================
  // MESSAGES
  // ===========================================================================

  async sendMessage(text: string, channel?: string): Promise<SlackMessageRef> {
    const target = channel || this.defaultChannel;
    const response = await this.call('chat.postMessage', () =>
      this.web.chat.postMessage({ channel: target, text })
    );
    logger.info({ channel: target, ts: response.ts }, 'Message sent');
    return { ok: response.ok, channel: response.channel ?? target, ts: response.ts ?? '' };
  }

  async sendBlocks(blocks: KnownBlock[], text: string, channel?: string): Promise<SlackMessageRef> {
    const target = channel || this.defaultChannel;
    const response = await this.call('chat.postMessage', () =>
      this.web.chat.postMessage({ channel: target, blocks, text })
    );
    logger.info({ channel: target, ts: response.ts, blocks: blocks.length }, 'Block message sent');
    return { ok: response.ok, channel: response.channel ?? target, ts: response.ts ?? '' };
  }

  /**
   * Rewrite a message in place, addressed by (channel, ts). Blocks are only
   * sent when non-empty.
   */
  async updateMessage(channel: string, ts: string, text = '', blocks?: KnownBlock[]): Promise<SlackMessageRef> {
    const response = await this.call('chat.update', () =>
      this.web.chat.update({
        channel,
        ts,
        text,
        ...(blocks && blocks.length > 0 ? { blocks } : {}),
      })
    );
    logger.info({ channel, ts }, 'Message updated');
    return { ok: response.ok, channel: response.channel ?? channel, ts: response.ts ?? ts };
  }

  // ===========================================================================
  // CHANNELS
  // ===========================================================================

  /**
   * One page of public channels, straight from the API (not cached)
   */
  async listChannels(limit = 100): Promise<SlackChannel[]> {
    const response = await this.call('conversations.list', () =>
      this.web.conversations.list({ types: 'public_channel', limit })
    );
    const channels: SlackChannel[] = [];
    for (const channel of response.channels ?? []) {
      if (channel.id && channel.name) {
        channels.push({ id: channel.id, name: channel.name });
      }
    }
    logger.debug({ count: channels.length }, 'Listed channels');
    return channels;
  }

  async loadAllChannels(): Promise<void> {
    await this.channels.load();
  }

  private async scanChannels(add: (channel: SlackChannel) => void): Promise<void> {
    let cursor: string | undefined;
    do {
      const response = await this.call('conversations.list', () =>
        this.web.conversations.list({
          types: 'public_channel',
          exclude_archived: true,
          limit: DIRECTORY_PAGE_SIZE,
          cursor,
        })
      );
      for (const channel of response.channels ?? []) {
        if (channel.id && channel.name) {
          add({ id: channel.id, name: channel.name });
        }
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);
    logger.info({ count: this.channels.size }, 'Channel directory loaded');
  }

  /**
   * Channel name -> ID. A leading `#` is ignored; exact (case-insensitive)
   * beats substring. A cached channel ID is accepted as is.
   */
  async resolveChannel(name: string): Promise<string | null> {
    await this.loadAllChannels();
    const query = name.trim().replace(/^#/, '');
    if (this.channels.get(query)) return query;

    const channel = matchByName(this.channels.values(), query.toLowerCase(), (c) => [c.name]);
    if (!channel) {
      logger.warn({ channel: name }, 'Channel not found');
      return null;
    }
    return channel.id;
  }

  /**
   * Resolve a channel or explain the failure with every known channel, so
   * the caller can retry with a valid name.
   */
  async validateAndResolveChannel(name: string): Promise<ChannelResolution> {
    const channelId = await this.resolveChannel(name);
    if (channelId) {
      return { ok: true, channelId };
    }

    const known = this.channels.values().map((channel) => `#${channel.name}`);
    const available = known.length > 0 ? known.join(', ') : '(none)';
    return {
      ok: false,
      error: `Channel "#${name.trim().replace(/^#/, '')}" not found. Available channels: ${available}`,
    };
  }

  // ===========================================================================
  // USERS
  // ===========================================================================

  async loadAllUsers(): Promise<void> {
    await this.users.load();
  }

  private async scanUsers(add: (user: SlackUser) => void): Promise<void> {
    let cursor: string | undefined;
    do {
      const response = await this.call('users.list', () =>
        this.web.users.list({ limit: DIRECTORY_PAGE_SIZE, cursor })
      );
      for (const member of response.members ?? []) {
        if (!member.id || member.deleted || member.is_bot) continue;
        add({
          id: member.id,
          name: member.name ?? '',
          realName: member.real_name ?? '',
          displayName: member.profile?.display_name ?? '',
        });
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);
    logger.info({ count: this.users.size }, 'User directory loaded');
  }

  /**
   * Find a user by real name, display name or handle. Every user is checked
   * for an exact (case-insensitive) match before substring matching.
   */
  async findUserByName(name: string): Promise<SlackUser | null> {
    await this.loadAllUsers();
    const user = matchByName(this.users.values(), name, (u) => [u.realName, u.displayName, u.name]);
    if (user) {
      logger.info({ query: name, userId: user.id }, 'User matched');
    } else {
      logger.warn({ query: name }, 'User not found');
    }
    return user;
  }

  async listWorkspaceMembers(): Promise<SlackUser[]> {
    await this.loadAllUsers();
    return this.users.values();
  }
}

/**
 * Error code of an `ok: false` Web API response, '' for anything else
 */
function platformErrorCode(error: unknown): string {
  if (!(error instanceof Error) || !('code' in error) || error.code !== ErrorCode.PlatformError || !('data' in error)) {
    return '';
  }
  const data: unknown = error.data;
  if (typeof data !== 'object' || data === null || !('error' in data)) {
    return '';
  }
  return typeof data.error === 'string' ? data.error : '';
}
