import type { ContextBlock, KnownBlock, MrkdwnElement, SectionBlock } from '@slack/web-api';

export const DEFAULT_TASK_STATUS = '📋 To do';
export const DEFAULT_TASK_PRIORITY = 'Normal';
export const TASK_CARD_FOOTER = 'Created via DevOps Gateway';

export interface TaskCard {
  title: string;
  description?: string;
  /** Plain name or a `<@U123>` mention */
  assignee?: string;
  status?: string;
  priority?: string;
}

/**
 * Task card layout: header, divider, status/priority(/assignee) fields,
 * optional description, context footer.
 */
export function buildTaskBlocks(card: TaskCard): KnownBlock[] {
  const fields: MrkdwnElement[] = [
    { type: 'mrkdwn', text: `*Status:*\n${card.status ?? DEFAULT_TASK_STATUS}` },
    { type: 'mrkdwn', text: `*Priority:*\n${card.priority ?? DEFAULT_TASK_PRIORITY}` },
  ];
  if (card.assignee) {
    fields.push({ type: 'mrkdwn', text: `*Assignee:*\n${card.assignee}` });
  }

  const blocks: KnownBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: `📌 ${card.title}`, emoji: true },
    },
    { type: 'divider' },
    { type: 'section', fields },
  ];

  if (card.description) {
    const description: SectionBlock = {
      type: 'section',
      text: { type: 'mrkdwn', text: `*Description:*\n${card.description}` },
    };
    blocks.push(description);
  }

  const footer: ContextBlock = {
    type: 'context',
    elements: [{ type: 'mrkdwn', text: TASK_CARD_FOOTER }],
  };
  blocks.push(footer);

  return blocks;
}
