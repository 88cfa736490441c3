import type { KnownBlock } from '@slack/bolt';
import { SubmissionOutcome } from '../types';
import { SlackClient } from '../types/slack';
import { validateBlocks } from '../views/blockValidation';
import {
  adminUnlockText,
  buildAdminUnlockNotification,
  buildRewardNotification,
  hoursAddedText,
  rewardNotificationText,
  submissionSummaryText,
  unresolvedVolunteerText
} from '../views/notificationView';

export interface PostOptions {
  blocks?: KnownBlock[];
  pin?: boolean;
}

/**
 * Sends volunteer DMs and admin channel posts. Slack failures here are logged
 * and never undo recorded hours.
 */
export class NotificationService {
  private adminChannel?: string;

  constructor(adminChannel?: string) {
    this.adminChannel = adminChannel;
  }

  /**
   * Post to a channel or DM id. Resolves the message timestamp, or undefined on failure.
   */
  async post(client: SlackClient, channel: string, text: string, options: PostOptions = {}): Promise<string | undefined> {
    const message: { channel: string; text: string; blocks?: KnownBlock[] } = { channel, text };
    if (options.blocks) {
      if (validateBlocks(options.blocks, 'message')) {
        message.blocks = options.blocks;
      } else {
        console.warn(`Sending plain text to ${channel} in place of invalid blocks`);
      }
    }

    let ts: string | undefined;
    try {
      ts = (await client.chat.postMessage(message)).ts;
    } catch (error) {
      console.error(`Error posting message to ${channel}:`, error);
      return undefined;
    }

    if (options.pin && ts) {
      try {
        await client.pins.add({ channel, timestamp: ts });
      } catch (error) {
        console.error(`Error pinning message in ${channel}:`, error);
      }
    }

    return ts;
  }

  async sendDm(client: SlackClient, slackUserId: string, text: string, blocks?: KnownBlock[]): Promise<string | undefined> {
    let channel: string | undefined;
    try {
      channel = (await client.conversations.open({ users: slackUserId })).channel?.id;
    } catch (error) {
      console.error(`Error opening DM with ${slackUserId}:`, error);
      return undefined;
    }

    if (!channel) {
      console.error(`Slack returned no DM channel for ${slackUserId}`);
      return undefined;
    }

    return this.post(client, channel, text, { blocks });
  }

  /**
   * Post to the admin channel. Without one configured the fallback user (the
   * admin who acted) gets a DM, and pinning is skipped.
   */
  async notifyAdmins(
    client: SlackClient,
    text: string,
    fallbackUserId: string,
    options: PostOptions = {}
  ): Promise<string | undefined> {
    if (!this.adminChannel) {
      return this.sendDm(client, fallbackUserId, text, options.blocks);
    }
    return this.post(client, this.adminChannel, text, options);
  }

  /**
   * Tell volunteers and admins what a submission did
   */
  async announceSubmission(client: SlackClient, adminSlackId: string, outcome: SubmissionOutcome): Promise<void> {
    const { hours, month } = outcome.submission;

    for (const slackId of outcome.unresolved) {
      await this.notifyAdmins(client, unresolvedVolunteerText(adminSlackId, hours, slackId), adminSlackId, {
        pin: true
      });
    }

    for (const result of outcome.recorded) {
      await this.sendDm(client, result.slackId, hoursAddedText(adminSlackId, hours, month));

      for (const { reward, period } of result.unlocked) {
        console.log(`${result.slackId} unlocked ${reward.category} reward "${reward.title}"`);
        await this.sendDm(
          client,
          result.slackId,
          rewardNotificationText(reward, period),
          buildRewardNotification(reward, period)
        );

        const action = { memberId: result.memberId, slackId: result.slackId, category: reward.category, hours: reward.hours, period };
        await this.notifyAdmins(client, adminUnlockText(result.slackId, reward, period), adminSlackId, {
          blocks: buildAdminUnlockNotification(action, reward)
        });
      }
    }

    if (outcome.recorded.length > 0) {
      const volunteers = outcome.recorded.map(result => result.slackId);
      await this.notifyAdmins(client, submissionSummaryText(adminSlackId, hours, volunteers, month), adminSlackId);
    }
  }
}

export const createNotificationService = (adminChannel?: string): NotificationService => {
  return new NotificationService(adminChannel);
};
