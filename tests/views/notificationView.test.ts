import {
  adminUnlockText,
  buildClaimedNotification,
  buildRewardNotification,
  encodeClaimAction,
  hoursAddedText,
  parseClaimAction,
  rewardNotificationText,
  submissionSummaryText,
  unresolvedVolunteerText
} from '../../src/views/notificationView';
import { blockText, sampleCatalog } from '../helpers/fixtures';

describe('notification views', () => {
  const catalog = sampleCatalog();
  const freeDrink = catalog.monthly[0];
  const badge = catalog.cumulative[0];
  const march = { year: 2026, month: 3 };

  describe('claim actions', () => {
    test('should decode what it encodes', () => {
      const action = { memberId: '1', slackId: 'UVOL', category: 'monthly' as const, hours: 5, period: march };

      expect(parseClaimAction(encodeClaimAction(action))).toEqual(action);
    });

    test('should leave the period out for lifetime rewards', () => {
      const value = encodeClaimAction({ memberId: '1', slackId: 'UVOL', category: 'cumulative', hours: 10 });

      expect(value).toBe('{"m":"1","s":"UVOL","c":"cumulative","h":10}');
      expect(parseClaimAction(value)).toEqual({ memberId: '1', slackId: 'UVOL', category: 'cumulative', hours: 10 });
    });

    test.each([
      undefined,
      '',
      'not json',
      '{"m":"1","s":"UVOL","c":"weekly","h":5}',
      '{"m":"1","s":"UVOL","c":"monthly","h":5,"p":"2026-13"}',
      '{"m":"","s":"UVOL","c":"monthly","h":5}'
    ])('should reject %p', value => {
      expect(parseClaimAction(value)).toBeNull();
    });
  });

  test('should congratulate a volunteer on a monthly reward', () => {
    expect(rewardNotificationText(freeDrink, march)).toBe(
      "Congratulations! You've unlocked the monthly reward: *Free drink* for volunteering 5 hours in March!"
    );
  });

  test('should congratulate a volunteer on a lifetime reward', () => {
    expect(rewardNotificationText(badge)).toBe(
      "Congratulations! You've unlocked the lifetime reward: *Volunteer badge* for volunteering a total of 10 hours!"
    );
  });

  test('should include the reached tier in the reward DM', () => {
    expect(buildRewardNotification(freeDrink, march).map(blockText)).toEqual([
      ":tada: You've unlocked the reward: *Free drink* for volunteering 5 hours in March!",
      '*Free drink* (5h)\nA drink on us.',
      'Ask at the front desk.'
    ]);
  });

  test('should thank volunteers for lifetime rewards', () => {
    expect(blockText(buildRewardNotification(badge)[0])).toBe(
      ":tada: You've unlocked the reward: *Volunteer badge* for volunteering a total of 10 hours!\n" +
        'Thank you for being a part of our community, we really appreciate your time and effort!'
    );
  });

  test('should describe unlocks and claims for admins', () => {
    const action = { memberId: '1', slackId: 'UVOL', category: 'cumulative' as const, hours: 10 };

    expect(adminUnlockText('UVOL', badge)).toBe(
      ':tada: <@UVOL> has unlocked the lifetime reward: *Volunteer badge* for volunteering a total of 10 hours!'
    );
    expect(buildClaimedNotification(action, badge, 'UADMIN').map(blockText)).toEqual([
      adminUnlockText('UVOL', badge),
      ':white_check_mark: Claimed, marked by <@UADMIN>'
    ]);
  });

  test('should format submission messages', () => {
    expect(hoursAddedText('UADMIN', 2.5, march)).toBe(
      '<@UADMIN> added 2.5h against your profile for March. Thank you for helping out!'
    );
    expect(submissionSummaryText('UADMIN', 3, ['UVOL', 'UVOL2'], march)).toBe(
      ':white_check_mark: <@UADMIN> added 3h to <@UVOL>, <@UVOL2> for March.'
    );
    expect(unresolvedVolunteerText('UADMIN', 3, 'UNKNOWN')).toBe(
      ":warning: Could not add 3h to <@UNKNOWN>, they're not registered on TidyHQ or they're not linked. (Attempted by <@UADMIN>)"
    );
  });
});
