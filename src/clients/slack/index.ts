/**
 * Slack integration
 */

export { SlackClient } from './client.js';
export type { SlackClientOptions, SlackUser, SlackChannel, SlackMessageRef, ChannelResolution } from './client.js';
export { buildTaskBlocks, DEFAULT_TASK_PRIORITY, DEFAULT_TASK_STATUS, TASK_CARD_FOOTER } from './blocks.js';
export type { TaskCard } from './blocks.js';
