import type { HomeView, KnownBlock, ModalView } from '@slack/bolt';
import { ClaimRecord, MemberRecord, MonthlyHours, RewardCatalog, RewardDefinition, YearMonth } from '../types';
import { monthKey, monthName, previousMonth, shortMonthName } from '../utils/dates';
import { button, context, divider, formatHours, header, plainText, section } from './blocks';
import * as strings from './strings';

export interface HoursSummary {
  thisMonth: number;
  lastMonth: number;
  total: number;
  history: MonthlyHours[];
}

export interface HomeViewInput {
  member?: MemberRecord;
  isAdmin?: boolean;
  currentMonth: YearMonth;
  hours?: HoursSummary;
  rewards: RewardCatalog;
  claims?: ClaimRecord[];
  modal?: boolean;
}

export interface RewardTierOptions {
  active?: boolean;
  claimed?: boolean;
}

/**
 * Circle emoji for progress towards a tier, rounded down to the nearest 10%
 */
export const calculateCircleEmoji = (count: number, total: number): string => {
  if (total <= 0) {
    throw new Error('Total must be greater than 0');
  }

  const percentage = Math.min(Math.floor((count / total) * 10) * 10, 100);
  return `:circle${percentage}:`;
};

/**
 * Blocks describing one reward tier against the hours that count towards it.
 * Active tiers (already reached in a closed period) render nothing when not reached.
 */
export const buildRewardTier = (
  reward: RewardDefinition,
  currentHours: number,
  options: RewardTierOptions = {}
): KnownBlock[] => {
  const { active = false, claimed = false } = options;
  const required = reward.hours;

  if (active && currentHours < required) {
    return [];
  }

  const achieved = currentHours >= required;
  const lines = [`*${reward.title}*`];

  if (active) {
    lines[0] += ` (${formatHours(required)}h)`;
  } else {
    const emoji = achieved ? ':tada:' : calculateCircleEmoji(currentHours, required);
    lines.push(`${emoji} ${formatHours(achieved ? required : currentHours)}/${formatHours(required)}h`);
  }

  if (!achieved) {
    lines[lines.length - 1] += ` - ${formatHours(required - currentHours)}h to go!`;
  }
  lines.push(reward.description);

  const tier = section(lines.join('\n'));
  if (reward.image) {
    tier.accessory = { type: 'image', image_url: reward.image, alt_text: reward.title };
  }

  const blocks: KnownBlock[] = [tier];
  if (achieved && claimed) {
    blocks.push(context(':white_check_mark: Claimed'));
  } else if (achieved && reward.claim) {
    blocks.push(context(reward.claim));
  }

  return blocks;
};

const formatHistory = (history: MonthlyHours[]): string =>
  history.map(({ month, hours }) => `${shortMonthName(month)} ${formatHours(hours)}h`).join('  ·  ');

const isClaimed = (claims: ClaimRecord[], reward: RewardDefinition, period?: YearMonth): boolean =>
  claims.some(
    claim =>
      claim.category === reward.category &&
      claim.hours === reward.hours &&
      claim.period === (reward.category === 'monthly' && period ? monthKey(period) : undefined)
  );

/**
 * Build the App Home blocks for one volunteer. The modal variant, used when an
 * admin views someone else's dashboard, leaves out the explainer and admin tools.
 */
export const buildHomeBlocks = (input: HomeViewInput): KnownBlock[] => {
  const { member, isAdmin = false, currentMonth, rewards, claims = [], modal = false } = input;
  const blocks: KnownBlock[] = [header(strings.header)];

  if (!member) {
    blocks.push(section(strings.unrecognised));
    return blocks;
  }

  const hours = input.hours ?? { thisMonth: 0, lastMonth: 0, total: 0, history: [] };
  const lastMonth = previousMonth(currentMonth);

  if (!modal) {
    blocks.push(section(strings.explainer));
  }

  blocks.push(
    section(
      `*This month:* ${formatHours(hours.thisMonth)}h\n` +
        `*Last month:* ${formatHours(hours.lastMonth)}h\n` +
        `*All time:* ${formatHours(hours.total)}h`
    )
  );
  if (hours.history.length > 0) {
    blocks.push(context(formatHistory(hours.history)));
  }

  if (isAdmin && !modal) {
    blocks.push(
      header('Admin tools'),
      section(strings.adminExplainer),
      {
        type: 'actions',
        block_id: 'admin_actions',
        elements: [
          button('Add volunteer hours', 'add_hours', member.id, 'primary'),
          button('View as user', 'view_as_user', member.id)
        ]
      }
    );
  }

  blocks.push(divider(), header(`Upcoming monthly rewards (${monthName(currentMonth)})`));
  for (const reward of rewards.monthly) {
    blocks.push(...buildRewardTier(reward, hours.thisMonth));
  }

  blocks.push(header(`Active monthly rewards (from ${monthName(lastMonth)}) - (${formatHours(hours.lastMonth)}h)`));
  const active = rewards.monthly.flatMap(reward =>
    buildRewardTier(reward, hours.lastMonth, { active: true, claimed: isClaimed(claims, reward, lastMonth) })
  );
  if (active.length > 0) {
    blocks.push(...active);
  } else {
    blocks.push(section(strings.noActiveRewards));
  }

  blocks.push(divider(), header('Lifetime rewards'));
  for (const reward of rewards.cumulative) {
    blocks.push(...buildRewardTier(reward, hours.total, { claimed: isClaimed(claims, reward) }));
  }

  return blocks;
};

export const buildHomeView = (input: HomeViewInput): HomeView => {
  return { type: 'home', blocks: buildHomeBlocks({ ...input, modal: false }) };
};

/**
 * Modal for admins to add hours to one or more volunteers
 */
export const buildAddHoursModal = (initialDate: string): ModalView => {
  return {
    type: 'modal',
    callback_id: 'submit_hours',
    title: plainText('Add Volunteer Hours'),
    submit: plainText('Add'),
    close: plainText('Cancel'),
    blocks: [
      section(strings.addHoursExplainer),
      {
        type: 'input',
        block_id: 'volunteer_select',
        label: plainText('Select volunteers'),
        hint: plainText('Only volunteers who are linked to TidyHQ will actually receive hours'),
        element: { type: 'multi_users_select', action_id: 'volunteer_select' }
      },
      {
        type: 'input',
        block_id: 'date_select',
        label: plainText('Date of volunteering'),
        hint: plainText('Only the month and year are stored, the exact day is discarded'),
        element: { type: 'datepicker', action_id: 'date_select', initial_date: initialDate }
      },
      {
        type: 'input',
        block_id: 'hours_input',
        label: plainText('Number of hours volunteered'),
        hint: plainText('These hours will be added to all selected volunteers'),
        element: {
          type: 'number_input',
          action_id: 'hours_input',
          is_decimal_allowed: true,
          min_value: '0.5',
          max_value: '100'
        }
      },
      {
        type: 'input',
        block_id: 'note_input',
        optional: true,
        label: plainText('Note'),
        element: { type: 'plain_text_input', action_id: 'note_input' }
      }
    ]
  };
};

export const buildViewAsUserModal = (): ModalView => {
  return {
    type: 'modal',
    callback_id: 'show_user_view',
    title: plainText('View as User'),
    submit: plainText('View'),
    close: plainText('Cancel'),
    blocks: [
      section(strings.viewAsUserExplainer),
      {
        type: 'input',
        block_id: 'user_select',
        label: plainText('User'),
        element: { type: 'users_select', action_id: 'user_select', placeholder: plainText('Select a user') }
      }
    ]
  };
};

const MODAL_TITLE_LIMIT = 24;

/**
 * Modal titles are capped by Slack, long names fall back to a generic title
 */
export const dashboardTitle = (name?: string): string => {
  const title = name ? `View as ${name}` : '';
  return title && title.length <= MODAL_TITLE_LIMIT ? title : 'User Dashboard';
};

export const buildUserDashboardModal = (input: HomeViewInput, name?: string): ModalView => {
  return {
    type: 'modal',
    title: plainText(dashboardTitle(name)),
    close: plainText('Close'),
    blocks: buildHomeBlocks({ ...input, modal: true })
  };
};
