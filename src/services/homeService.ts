import type { HomeView, ModalView } from '@slack/bolt';
import { ClaimService } from './claimService';
import { HoursService } from './hoursService';
import { IdentityService } from './identityService';
import { RewardService } from './rewardService';
import { SlackClient } from '../types/slack';
import { previousMonth } from '../utils/dates';
import { validateBlocks } from '../views/blockValidation';
import { buildHomeView, buildUserDashboardModal, HomeViewInput } from '../views/homeView';

export const HISTORY_MONTHS = 6;

export interface RefreshSummary {
  updated: number;
  failed: number;
}

/**
 * Builds volunteer dashboards from the ledger and identity cache and publishes
 * them to App Home
 */
export class HomeService {
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

  async buildHomeInput(slackUserId: string): Promise<HomeViewInput> {
    const member = await this.identityService.resolve(slackUserId);
    const currentMonth = this.hoursService.currentMonth();
    const rewards = {
      monthly: this.rewardService.rewards('monthly'),
      cumulative: this.rewardService.rewards('cumulative')
    };

    if (!member) {
      return { currentMonth, rewards };
    }

    const lastMonth = previousMonth(currentMonth);
    return {
      member,
      isAdmin: this.identityService.isInGroups(member.id, this.adminGroupIds),
      currentMonth,
      hours: {
        thisMonth: this.hoursService.monthlyTotal(member.id, currentMonth.year, currentMonth.month),
        lastMonth: this.hoursService.monthlyTotal(member.id, lastMonth.year, lastMonth.month),
        total: this.hoursService.cumulativeTotal(member.id),
        history: this.hoursService.recentMonths(member.id, HISTORY_MONTHS, currentMonth)
      },
      rewards,
      claims: this.claimService.claimsFor(member.id)
    };
  }

  async buildHome(slackUserId: string): Promise<HomeView> {
    return buildHomeView(await this.buildHomeInput(slackUserId));
  }

  /**
   * Dashboard of another user, shown to an admin as a modal
   */
  async buildDashboard(slackUserId: string): Promise<ModalView> {
    const input = await this.buildHomeInput(slackUserId);
    return buildUserDashboardModal(input, input.member?.name);
  }

  /**
   * Publish a home view. Invalid views are never sent; Slack errors are logged
   * and reported as false.
   */
  async publishHome(client: SlackClient, slackUserId: string, view?: HomeView): Promise<boolean> {
    const home = view ?? (await this.buildHome(slackUserId));
    if (!validateBlocks(home.blocks, 'home')) {
      console.error(`Not publishing invalid home view for ${slackUserId}`);
      return false;
    }

    try {
      await client.views.publish({ user_id: slackUserId, view: home });
    } catch (error) {
      console.error(`Error publishing home view for ${slackUserId}:`, error);
      return false;
    }

    console.log(`Set app home for ${slackUserId} (${home.blocks.length} blocks)`);
    return true;
  }

  /**
   * Every human, active user in the workspace
   */
  async listWorkspaceUsers(client: SlackClient): Promise<string[]> {
    const users: string[] = [];
    let cursor: string | undefined;

    do {
      const response = await client.users.list(cursor ? { cursor, limit: 200 } : { limit: 200 });
      for (const member of response.members ?? []) {
        if (member.id && !member.is_bot && !member.deleted && member.id !== 'USLACKBOT') {
          users.push(member.id);
        }
      }
      cursor = response.response_metadata?.next_cursor || undefined;
    } while (cursor);

    return users;
  }

  /**
   * Pre-render every user's home. Unlinked users all share one generic view.
   */
  async refreshAllHomes(client: SlackClient): Promise<RefreshSummary> {
    const users = await this.listWorkspaceUsers(client);
    console.log(`Found ${users.length} users`);

    let genericHome: HomeView | undefined;
    const summary: RefreshSummary = { updated: 0, failed: 0 };

    for (const [index, slackUserId] of users.entries()) {
      const progress = `${index + 1}/${users.length}`;
      try {
        const input = await this.buildHomeInput(slackUserId);
        let view: HomeView;
        if (input.member) {
          view = buildHomeView(input);
        } else {
          genericHome ??= buildHomeView(input);
          view = genericHome;
          console.log(`${progress} ${slackUserId}: not linked to TidyHQ, using generic home`);
        }

        if (await this.publishHome(client, slackUserId, view)) {
          summary.updated++;
        } else {
          summary.failed++;
        }
      } catch (error) {
        console.error(`${progress} ${slackUserId}: error updating home:`, error);
        summary.failed++;
      }
    }

    console.log(`Updated ${summary.updated} homes, ${summary.failed} failed`);
    return summary;
  }
}

export const createHomeService = (
  identityService: IdentityService,
  hoursService: HoursService,
  rewardService: RewardService,
  claimService: ClaimService,
  adminGroupIds: string[] = []
): HomeService => {
  return new HomeService(identityService, hoursService, rewardService, claimService, adminGroupIds);
};
