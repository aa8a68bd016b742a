/**
 * Slack tools: messages, task cards and directory lookups.
 */

import { z } from 'zod';
import {
  DEFAULT_TASK_PRIORITY,
  DEFAULT_TASK_STATUS,
  buildTaskBlocks,
  type SlackClient,
} from '../clients/slack/index.js';
import { ToolBuilder, parseArgs, type RegisteredTool } from './base.js';

type ChannelTarget = { ok: true; channel: string | undefined } | { ok: false; error: string };

/**
 * An explicit channel must resolve; none means the default channel
 */
async function resolveTarget(client: SlackClient, channel: string | undefined): Promise<ChannelTarget> {
  if (!channel) {
    return { ok: true, channel: undefined };
  }
  const resolution = await client.validateAndResolveChannel(channel);
  return resolution.ok ? { ok: true, channel: resolution.channelId } : resolution;
}

/**
 * Turn an assignee name into a `<@ID>` mention when a workspace member
 * matches; mentions and unmatched names pass through.
 */
export async function mentionAssignee(client: SlackClient, assignee: string | undefined): Promise<string | undefined> {
  if (!assignee || assignee.startsWith('<@')) {
    return assignee;
  }
  const user = await client.findUserByName(assignee);
  return user ? `<@${user.id}>` : assignee;
}

export function createSlackTools(client: SlackClient): RegisteredTool[] {
  return new ToolBuilder()
    .add(
      'slack_send_message',
      'Send a message to a Slack channel (mrkdwn supported)',
      {
        text: { type: 'string', description: 'Message text', required: true },
        channel: { type: 'string', description: 'Channel name, e.g. #general; default channel when empty' },
      },
      async (args) => {
        const params = parseArgs(z.object({ text: z.string().min(1), channel: z.string().optional() }), args);
        const target = await resolveTarget(client, params.channel);
        if (!target.ok) {
          return { ok: false, error: target.error };
        }
        return client.sendMessage(params.text, target.channel);
      }
    )
    .add(
      'slack_create_task',
      'Post a task card to a channel. Keep the returned channel and ts to update it with slack_update_task.',
      {
        title: { type: 'string', description: 'Task title', required: true },
        description: { type: 'string', description: 'Task description' },
        assignee: { type: 'string', description: 'Owner name; mentioned when it matches a workspace member' },
        priority: { type: 'string', description: `Priority (default ${DEFAULT_TASK_PRIORITY})` },
        channel: { type: 'string', description: 'Channel name; default channel when empty' },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            title: z.string().min(1),
            description: z.string().optional(),
            assignee: z.string().optional(),
            priority: z.string().default(DEFAULT_TASK_PRIORITY),
            channel: z.string().optional(),
          }),
          args
        );
        const target = await resolveTarget(client, params.channel);
        if (!target.ok) {
          return { ok: false, error: target.error };
        }

        const blocks = buildTaskBlocks({
          title: params.title,
          description: params.description,
          assignee: await mentionAssignee(client, params.assignee),
          status: DEFAULT_TASK_STATUS,
          priority: params.priority,
        });
        const result = await client.sendBlocks(blocks, `📌 New task: ${params.title}`, target.channel);
        return {
          ...result,
          message: `Task '${params.title}' created. Keep channel=${result.channel} and ts=${result.ts} to update it later.`,
        };
      }
    )
    .add(
      'slack_update_task',
      'Rewrite an existing task card, e.g. to change its status',
      {
        channel: { type: 'string', description: 'Channel ID returned by slack_create_task', required: true },
        ts: { type: 'string', description: 'Message ts returned by slack_create_task', required: true },
        title: { type: 'string', description: 'Task title', required: true },
        status: { type: 'string', description: 'New status, e.g. 🔄 In progress, ✅ Done', required: true },
        description: { type: 'string', description: 'Task description' },
        assignee: { type: 'string', description: 'Owner name or <@ID> mention' },
        priority: { type: 'string', description: `Priority (default ${DEFAULT_TASK_PRIORITY})` },
      },
      async (args) => {
        const params = parseArgs(
          z.object({
            channel: z.string().min(1),
            ts: z.string().min(1),
            title: z.string().min(1),
            status: z.string().min(1),
            description: z.string().optional(),
            assignee: z.string().optional(),
            priority: z.string().default(DEFAULT_TASK_PRIORITY),
          }),
          args
        );
        const blocks = buildTaskBlocks({
          title: params.title,
          description: params.description,
          assignee: await mentionAssignee(client, params.assignee),
          status: params.status,
          priority: params.priority,
        });
        const result = await client.updateMessage(
          params.channel,
          params.ts,
          `📌 Task updated: ${params.title} - ${params.status}`,
          blocks
        );
        return { ...result, message: `Task '${params.title}' status updated to: ${params.status}` };
      }
    )
    .add(
      'slack_list_channels',
      'List public channels of the workspace',
      {
        limit: { type: 'number', description: 'Maximum number of channels (default 100)' },
      },
      async (args) => {
        const { limit } = parseArgs(z.object({ limit: z.number().int().positive().max(1000).default(100) }), args);
        return client.listChannels(limit);
      }
    )
    .add(
      'slack_find_user',
      'Find a workspace member by real name, display name or handle',
      {
        name: { type: 'string', description: 'Name to look up (exact or partial)', required: true },
      },
      async (args) => {
        const { name } = parseArgs(z.object({ name: z.string().min(1) }), args);
        const user = await client.findUserByName(name);
        if (!user) {
          return { found: false, error: `No Slack user matches "${name}"` };
        }
        return { found: true, user, mention: `<@${user.id}>` };
      }
    )
    .add(
      'slack_list_members',
      'List active human members of the workspace',
      {},
      async () => client.listWorkspaceMembers()
    )
    .build();
}
