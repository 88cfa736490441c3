import type { KnownBlock } from '@slack/bolt';
import { z } from 'zod';
import { RewardCategory, RewardDefinition, YearMonth } from '../types';
import { monthKey, monthName, parseMonthKey } from '../utils/dates';
import { button, context, formatHours, section } from './blocks';
import { buildRewardTier } from './homeView';

export interface ClaimAction {
  memberId: string;
  slackId: string;
  category: RewardCategory;
  hours: number;
  period?: YearMonth;
}

const ClaimActionSchema = z.object({
  m: z.string().min(1),
  s: z.string().min(1),
  c: z.enum(['monthly', 'cumulative']),
  h: z.number().positive(),
  p: z.string().optional()
});

export const encodeClaimAction = (action: ClaimAction): string =>
  JSON.stringify({
    m: action.memberId,
    s: action.slackId,
    c: action.category,
    h: action.hours,
    ...(action.period ? { p: monthKey(action.period) } : {})
  });

/**
 * Decode the value of a "Mark as claimed" button. Returns null for anything malformed.
 */
export const parseClaimAction = (value: string | undefined): ClaimAction | null => {
  if (!value) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    return null;
  }

  const parsed = ClaimActionSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { m, s, c, h, p } = parsed.data;
  const action: ClaimAction = { memberId: m, slackId: s, category: c, hours: h };
  if (p !== undefined) {
    const period = parseMonthKey(p);
    if (!period) return null;
    action.period = period;
  }
  return action;
};

const unlockPhrase = (reward: RewardDefinition, period?: YearMonth): string =>
  reward.category === 'monthly' && period
    ? `for volunteering ${formatHours(reward.hours)} hours in ${monthName(period)}!`
    : `for volunteering a total of ${formatHours(reward.hours)} hours!`;

export const rewardNotificationText = (reward: RewardDefinition, period?: YearMonth): string => {
  const kind = reward.category === 'monthly' ? 'monthly' : 'lifetime';
  return `Congratulations! You've unlocked the ${kind} reward: *${reward.title}* ${unlockPhrase(reward, period)}`;
};

/**
 * DM sent to a volunteer when a submission takes them past a reward tier
 */
export const buildRewardNotification = (reward: RewardDefinition, period?: YearMonth): KnownBlock[] => {
  let text = `:tada: You've unlocked the reward: *${reward.title}* ${unlockPhrase(reward, period)}`;
  if (reward.category === 'cumulative') {
    text += '\nThank you for being a part of our community, we really appreciate your time and effort!';
  }

  return [section(text), ...buildRewardTier(reward, reward.hours, { active: true })];
};

export const adminUnlockText = (slackId: string, reward: RewardDefinition, period?: YearMonth): string => {
  const kind = reward.category === 'monthly' ? 'monthly' : 'lifetime';
  return `:tada: <@${slackId}> has unlocked the ${kind} reward: *${reward.title}* ${unlockPhrase(reward, period)}`;
};

/**
 * Admin channel post for an unlocked tier, with a button to record the hand-out
 */
export const buildAdminUnlockNotification = (action: ClaimAction, reward: RewardDefinition): KnownBlock[] => {
  return [
    section(adminUnlockText(action.slackId, reward, action.period)),
    {
      type: 'actions',
      block_id: 'claim_actions',
      elements: [button('Mark as claimed', 'claim_reward', encodeClaimAction(action), 'primary')]
    }
  ];
};

export const buildClaimedNotification = (
  action: ClaimAction,
  reward: RewardDefinition,
  claimedBy: string
): KnownBlock[] => {
  return [
    section(adminUnlockText(action.slackId, reward, action.period)),
    context(`:white_check_mark: Claimed, marked by <@${claimedBy}>`)
  ];
};

export const hoursAddedText = (adminId: string, hours: number, period: YearMonth): string =>
  `<@${adminId}> added ${formatHours(hours)}h against your profile for ${monthName(period)}. Thank you for helping out!`;

export const submissionSummaryText = (adminId: string, hours: number, volunteers: string[], period: YearMonth): string =>
  `:white_check_mark: <@${adminId}> added ${formatHours(hours)}h to ${volunteers.map(id => `<@${id}>`).join(', ')} for ${monthName(period)}.`;

export const unresolvedVolunteerText = (adminId: string, hours: number, slackId: string): string =>
  `:warning: Could not add ${formatHours(hours)}h to <@${slackId}>, they're not registered on TidyHQ or they're not linked. (Attempted by <@${adminId}>)`;
