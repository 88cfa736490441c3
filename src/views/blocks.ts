import type { Button, ContextBlock, DividerBlock, HeaderBlock, PlainTextElement, SectionBlock } from '@slack/bolt';

export const plainText = (text: string): PlainTextElement => ({ type: 'plain_text', text, emoji: true });

export const header = (text: string): HeaderBlock => ({ type: 'header', text: plainText(text) });

export const section = (text: string): SectionBlock => ({ type: 'section', text: { type: 'mrkdwn', text } });

export const context = (text: string): ContextBlock => ({ type: 'context', elements: [{ type: 'mrkdwn', text }] });

export const divider = (): DividerBlock => ({ type: 'divider' });

export const button = (text: string, actionId: string, value?: string, style?: 'primary' | 'danger'): Button => {
  const element: Button = { type: 'button', text: plainText(text), action_id: actionId };
  if (value !== undefined) element.value = value;
  if (style) element.style = style;
  return element;
};

/**
 * Whole hours print as-is, fractions to two decimal places at most
 */
export const formatHours = (hours: number): string => String(Math.round(hours * 100) / 100);
