import type { ViewOutput } from '@slack/bolt';
import { ClaimService } from './claimService';
import { HoursService } from './hoursService';
import { IdentityService } from './identityService';
import { RewardService } from './rewardService';
import { CommandResult, HourSubmission, RewardDefinition, SubmissionOutcome, UnlockedReward, VolunteerResult } from '../types';
import { InvalidInputError } from '../types/errors';
import { monthKey, parseIsoDate } from '../utils/dates';
import { HOURS_PATTERN } from '../utils/hours';
import { ClaimAction } from '../views/notificationView';

export type ViewStateValues = ViewOutput['state']['values'];

export type ParsedSubmission =
  | { ok: true; submission: HourSubmission }
  | { ok: false; errors: Record<string, string> };

/**
 * Read the add-hours modal. Errors are keyed by block id so they can be shown
 * inline on the form.
 */
export const parseHourSubmission = (values: ViewStateValues): ParsedSubmission => {
  const errors: Record<string, string> = {};

  const volunteers = values.volunteer_select?.volunteer_select?.selected_users ?? [];
  if (volunteers.length === 0) {
    errors.volunteer_select = 'Select at least one volunteer';
  }

  const rawHours = (values.hours_input?.hours_input?.value ?? '').trim();
  const hours = HOURS_PATTERN.test(rawHours) ? Number(rawHours) : NaN;
  if (!(hours > 0)) {
    errors.hours_input = 'Enter a positive number of hours';
  }

  const month = parseIsoDate(values.date_select?.date_select?.selected_date ?? '');
  if (!month) {
    errors.date_select = 'Choose the date of volunteering';
  }

  if (!month || Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }

  const submission: HourSubmission = { volunteers: [...new Set(volunteers)], hours, month };
  const note = values.note_input?.note_input?.value?.trim();
  if (note) {
    submission.note = note;
  }

  return { ok: true, submission };
};

export class CommandService {
  private identityService: IdentityService;
  private hoursService: HoursService;
  private rewardService: RewardService;
  private claimService: ClaimService;
  private adminGroupIds: string[];

  constructor(
    identityService: IdentityService,
    hoursService: HoursService,
    rewardService: RewardService,
    claimService: ClaimService,
    adminGroupIds: string[] = []
  ) {
    this.identityService = identityService;
    this.hoursService = hoursService;
    this.rewardService = rewardService;
    this.claimService = claimService;
    this.adminGroupIds = adminGroupIds;
  }

  /**
   * Admins are TidyHQ contacts in one of the configured admin groups
   */
  async isAdmin(slackUserId: string): Promise<boolean> {
    const member = await this.identityService.resolve(slackUserId);
    return member ? this.identityService.isInGroups(member.id, this.adminGroupIds) : false;
  }

  /**
   * Record hours for every volunteer in the submission and work out which
   * reward tiers each one crossed. Volunteers without a TidyHQ link are
   * reported back and get no record.
   */
  async submitHours(adminSlackId: string, submission: HourSubmission): Promise<CommandResult<SubmissionOutcome>> {
    if (!(await this.isAdmin(adminSlackId))) {
      return { success: false, message: 'Only admins can add volunteer hours' };
    }

    const { hours, month, note } = submission;
    const recorded: VolunteerResult[] = [];
    const unresolved: string[] = [];

    console.log(
      `Adding ${hours} hours for ${monthKey(month)} to ${submission.volunteers.join(', ')} from ${adminSlackId}`
    );

    for (const slackId of submission.volunteers) {
      const member = await this.identityService.resolve(slackId);
      if (!member) {
        console.warn(`Could not find TidyHQ ID for Slack user ${slackId}`);
        unresolved.push(slackId);
        continue;
      }

      const monthlyBefore = this.hoursService.monthlyTotal(member.id, month.year, month.month);
      const totalBefore = this.hoursService.cumulativeTotal(member.id);

      let entryId: string;
      try {
        entryId = await this.hoursService.record(member.id, hours, { month, recordedBy: adminSlackId, note });
      } catch (error) {
        if (error instanceof InvalidInputError) {
          return { success: false, message: error.message };
        }
        throw error;
      }

      const unlocked: UnlockedReward[] = [
        ...this.rewardService.unlockedBy('monthly', monthlyBefore, hours).map(reward => ({ reward, period: month })),
        ...this.rewardService.unlockedBy('cumulative', totalBefore, hours).map(reward => ({ reward }))
      ];

      console.log(`Added ${hours} hours for ${monthKey(month)} to TidyHQ ID ${member.id} (Slack ID ${slackId})`);
      recorded.push({ slackId, memberId: member.id, entryId, unlocked });
    }

    const outcome: SubmissionOutcome = { submission, recorded, unresolved };

    if (recorded.length === 0) {
      return {
        success: false,
        message: 'None of the selected volunteers are linked to TidyHQ, no hours were added',
        data: outcome
      };
    }

    const skipped = unresolved.length > 0 ? ` (${unresolved.length} not linked to TidyHQ)` : '';
    return {
      success: true,
      message: `Added ${hours}h to ${recorded.length} volunteer${recorded.length === 1 ? '' : 's'}${skipped}`,
      data: outcome
    };
  }

  /**
   * Mark a reward tier as handed out
   */
  async claimReward(adminSlackId: string, action: ClaimAction): Promise<CommandResult<{ reward: RewardDefinition }>> {
    if (!(await this.isAdmin(adminSlackId))) {
      return { success: false, message: 'Only admins can mark rewards as claimed' };
    }

    const reward = this.rewardService.rewards(action.category).find(candidate => candidate.hours === action.hours);
    if (!reward) {
      return { success: false, message: `No ${action.category} reward at ${action.hours}h exists any more` };
    }

    const member = await this.identityService.findMember(action.memberId);
    if (!member) {
      return { success: false, message: `Contact ${action.memberId} is no longer in TidyHQ` };
    }

    const claimed = await this.claimService.markClaimed(member.id, reward, adminSlackId, action.period);
    if (!claimed) {
      return { success: false, message: `"${reward.title}" was already marked as claimed`, data: { reward } };
    }

    console.log(`${adminSlackId} marked "${reward.title}" as claimed for ${member.name} (TidyHQ ID ${member.id})`);
    return { success: true, message: `Marked "${reward.title}" as claimed`, data: { reward } };
  }
}

export const createCommandService = (
  identityService: IdentityService,
  hoursService: HoursService,
  rewardService: RewardService,
  claimService: ClaimService,
  adminGroupIds: string[] = []
): CommandService => {
  return new CommandService(identityService, hoursService, rewardService, claimService, adminGroupIds);
};
