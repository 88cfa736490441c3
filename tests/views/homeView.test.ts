import type { KnownBlock } from '@slack/bolt';
import { RewardDefinition } from '../../src/types';
import * as strings from '../../src/views/strings';
import {
  buildAddHoursModal,
  buildHomeBlocks,
  buildHomeView,
  buildRewardTier,
  buildUserDashboardModal,
  buildViewAsUserModal,
  calculateCircleEmoji,
  dashboardTitle,
  HomeViewInput
} from '../../src/views/homeView';
import { blockText, sampleCatalog } from '../helpers/fixtures';

const texts = (blocks: KnownBlock[]): Array<string | undefined> => blocks.map(blockText);

describe('calculateCircleEmoji', () => {
  test('should round progress down to the nearest 10%', () => {
    expect(calculateCircleEmoji(0, 10)).toBe(':circle0:');
    expect(calculateCircleEmoji(3, 10)).toBe(':circle30:');
    expect(calculateCircleEmoji(9.9, 10)).toBe(':circle90:');
    expect(calculateCircleEmoji(10, 10)).toBe(':circle100:');
  });

  test('should cap at 100%', () => {
    expect(calculateCircleEmoji(25, 10)).toBe(':circle100:');
  });

  test('should reject a zero total', () => {
    expect(() => calculateCircleEmoji(1, 0)).toThrow('Total must be greater than 0');
  });
});

describe('buildRewardTier', () => {
  const reward: RewardDefinition = {
    category: 'monthly',
    hours: 10,
    title: 'Free consumables',
    description: 'Materials for a project of your own.'
  };

  test('should show progress towards an unreached tier', () => {
    expect(texts(buildRewardTier(reward, 4))).toEqual([
      '*Free consumables*\n:circle40: 4/10h - 6h to go!\nMaterials for a project of your own.'
    ]);
  });

  test('should celebrate a reached tier without overstating the hours', () => {
    expect(texts(buildRewardTier(reward, 12))).toEqual([
      '*Free consumables*\n:tada: 10/10h\nMaterials for a project of your own.'
    ]);
  });

  test('should show claim instructions for a reached tier', () => {
    const withClaim = { ...reward, claim: 'Ask at the front desk.' };

    expect(texts(buildRewardTier(withClaim, 10))).toEqual([
      '*Free consumables*\n:tada: 10/10h\nMaterials for a project of your own.',
      'Ask at the front desk.'
    ]);
    expect(texts(buildRewardTier(withClaim, 9))).toHaveLength(1);
  });

  test('should mark claimed tiers in place of the instructions', () => {
    const withClaim = { ...reward, claim: 'Ask at the front desk.' };

    expect(texts(buildRewardTier(withClaim, 10, { claimed: true }))[1]).toBe(':white_check_mark: Claimed');
  });

  test('should render active tiers only when reached', () => {
    expect(buildRewardTier(reward, 9, { active: true })).toEqual([]);
    expect(texts(buildRewardTier(reward, 10, { active: true }))).toEqual([
      '*Free consumables* (10h)\nMaterials for a project of your own.'
    ]);
  });

  test('should show the reward image as an accessory', () => {
    const [tier] = buildRewardTier({ ...reward, image: 'https://example.test/badge.png' }, 1);

    expect(tier).toMatchObject({
      accessory: { type: 'image', image_url: 'https://example.test/badge.png', alt_text: 'Free consumables' }
    });
  });
});

describe('buildHomeBlocks', () => {
  const baseInput = (): HomeViewInput => ({
    member: { id: '1', name: 'Val Tester', groups: [], slackId: 'UVOL' },
    currentMonth: { year: 2026, month: 3 },
    hours: {
      thisMonth: 4,
      lastMonth: 6,
      total: 30,
      history: [
        { month: { year: 2026, month: 1 }, hours: 20 },
        { month: { year: 2026, month: 2 }, hours: 6 },
        { month: { year: 2026, month: 3 }, hours: 4 }
      ]
    },
    rewards: sampleCatalog()
  });

  test('should only greet users who are not linked to TidyHQ', () => {
    const blocks = buildHomeBlocks({ currentMonth: { year: 2026, month: 3 }, rewards: sampleCatalog() });

    expect(texts(blocks)).toEqual([strings.header, strings.unrecognised]);
  });

  test('should summarise hours with a history line', () => {
    const blocks = texts(buildHomeBlocks(baseInput()));

    expect(blocks.slice(0, 4)).toEqual([
      strings.header,
      strings.explainer,
      '*This month:* 4h\n*Last month:* 6h\n*All time:* 30h',
      'Jan 20h  ·  Feb 6h  ·  Mar 4h'
    ]);
  });

  test('should lay out monthly and lifetime reward sections', () => {
    const blocks = texts(buildHomeBlocks(baseInput()));

    expect(blocks).toContain('Upcoming monthly rewards (March)');
    expect(blocks).toContain('Active monthly rewards (from February) - (6h)');
    expect(blocks).toContain('*Free drink* (5h)\nA drink on us.');
    expect(blocks).toContain('Lifetime rewards');
    expect(blocks).toContain('*Volunteer t-shirt*\n:tada: 25/25h\nA shirt in your size.');
    expect(blocks).toContain('*Hall of fame*\n:circle60: 30/50h - 20h to go!\nYour name on the wall.');
    expect(blocks).not.toContain(strings.noActiveRewards);
  });

  test('should say so when nothing was reached last month', () => {
    const input = baseInput();
    input.hours = { thisMonth: 0, lastMonth: 2, total: 2, history: [] };

    expect(texts(buildHomeBlocks(input))).toContain(strings.noActiveRewards);
  });

  test('should mark last month rewards that were claimed', () => {
    const input = baseInput();
    input.claims = [
      {
        memberId: '1',
        category: 'monthly',
        hours: 5,
        period: '2026-02',
        claimedAt: '2026-03-02T10:00:00.000Z',
        claimedBy: 'UADMIN'
      }
    ];

    const blocks = texts(buildHomeBlocks(input));
    const tierIndex = blocks.indexOf('*Free drink* (5h)\nA drink on us.');

    expect(blocks[tierIndex + 1]).toBe(':white_check_mark: Claimed');
  });

  test('should add admin tools for admins only', () => {
    const adminBlocks = buildHomeBlocks({ ...baseInput(), isAdmin: true });
    const actions = adminBlocks.find(block => block.type === 'actions');

    expect(actions).toMatchObject({
      block_id: 'admin_actions',
      elements: [
        { action_id: 'add_hours', value: '1', style: 'primary' },
        { action_id: 'view_as_user', value: '1' }
      ]
    });
    expect(buildHomeBlocks(baseInput()).find(block => block.type === 'actions')).toBeUndefined();
  });

  test('should leave the explainer and admin tools out of the modal variant', () => {
    const blocks = buildHomeBlocks({ ...baseInput(), isAdmin: true, modal: true });

    expect(texts(blocks)).not.toContain(strings.explainer);
    expect(blocks.find(block => block.type === 'actions')).toBeUndefined();
  });

  test('should build a home tab view', () => {
    const view = buildHomeView({ ...baseInput(), modal: true });

    expect(view.type).toBe('home');
    expect(view.blocks.map(blockText)).toContain(strings.explainer);
  });
});

describe('modals', () => {
  test('should default the add hours date and allow decimal hours', () => {
    const modal = buildAddHoursModal('2026-03-20');

    expect(modal.callback_id).toBe('submit_hours');
    expect(modal.blocks.map(block => block.block_id)).toEqual([
      undefined,
      'volunteer_select',
      'date_select',
      'hours_input',
      'note_input'
    ]);
    expect(modal.blocks[2]).toMatchObject({ element: { type: 'datepicker', initial_date: '2026-03-20' } });
    expect(modal.blocks[3]).toMatchObject({
      element: { type: 'number_input', is_decimal_allowed: true, min_value: '0.5', max_value: '100' }
    });
  });

  test('should ask for a single user to view', () => {
    const modal = buildViewAsUserModal();

    expect(modal.callback_id).toBe('show_user_view');
    expect(modal.blocks[1]).toMatchObject({ block_id: 'user_select', element: { type: 'users_select' } });
  });

  test('should fall back to a generic title for long names', () => {
    expect(dashboardTitle('Val Tester')).toBe('View as Val Tester');
    expect(dashboardTitle('Valentina Maximiliana Tester')).toBe('User Dashboard');
    expect(dashboardTitle()).toBe('User Dashboard');
  });

  test('should build the dashboard modal from home blocks', () => {
    const modal = buildUserDashboardModal(
      { currentMonth: { year: 2026, month: 3 }, rewards: sampleCatalog() },
      'Val Tester'
    );

    expect(modal.title.text).toBe('View as Val Tester');
    expect(modal.blocks.map(blockText)).toEqual([strings.header, strings.unrecognised]);
  });
});
