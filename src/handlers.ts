import type { AckFn, ModalView, ViewResponseAction } from '@slack/bolt';

import { AppContext } from './context';
import { parseHourSubmission, ViewStateValues } from './services/commandService';
import { PersistenceError } from './types/errors';
import { SlackClient } from './types/slack';
import { formatIsoDate } from './utils/dates';
import { validateBlocks } from './views/blockValidation';
import { buildAddHoursModal, buildViewAsUserModal } from './views/homeView';
import { buildClaimedNotification, parseClaimAction } from './views/notificationView';

interface UserBody {
  user: { id: string };
}

export interface HomeOpenedArgs {
  event: { tab?: string; user: string };
  client: SlackClient;
}

export interface ButtonArgs {
  ack: AckFn<void>;
  body: UserBody & { trigger_id: string };
  client: SlackClient;
}

export interface ViewArgs {
  ack: AckFn<ViewResponseAction>;
  body: UserBody;
  view: { state: { values: ViewStateValues } };
  client: SlackClient;
}

export interface ClaimArgs {
  ack: AckFn<void>;
  action: { value?: string };
  body: UserBody & { channel?: { id?: string }; message?: { ts?: string } };
  client: SlackClient;
}

export interface Handlers {
  homeOpened(args: HomeOpenedArgs): Promise<void>;
  addHours(args: ButtonArgs): Promise<void>;
  viewAsUser(args: ButtonArgs): Promise<void>;
  showUserView(args: ViewArgs): Promise<void>;
  submitHours(args: ViewArgs): Promise<void>;
  claimReward(args: ClaimArgs): Promise<void>;
}

/**
 * Losing a ledger or claim write is not recoverable, everything else is logged
 * and the listener gives up.
 */
export const handleListenerError = (listener: string, error: unknown): void => {
  if (error instanceof PersistenceError) {
    console.error(`Fatal storage error in ${listener}: ${error.message} (${error.filePath})`);
    process.exit(1);
  }
  console.error(`Error in ${listener}:`, error);
};

export const createHandlers = (context: AppContext, now: () => Date = () => new Date()): Handlers => {
  const { commandService, homeService, notificationService } = context;

  return {
    async homeOpened({ event, client }) {
      if (event.tab !== 'home') return;
      try {
        await homeService.publishHome(client, event.user);
      } catch (error) {
        handleListenerError('app_home_opened', error);
      }
    },

    async addHours({ ack, body, client }) {
      await ack();
      try {
        if (!(await commandService.isAdmin(body.user.id))) {
          console.warn(`Non-admin ${body.user.id} tried to add hours`);
          return;
        }

        const view = buildAddHoursModal(formatIsoDate(now()));
        if (!validateBlocks(view.blocks, 'modal')) return;
        await client.views.open({ trigger_id: body.trigger_id, view });
      } catch (error) {
        handleListenerError('add_hours', error);
      }
    },

    async viewAsUser({ ack, body, client }) {
      await ack();
      try {
        if (!(await commandService.isAdmin(body.user.id))) {
          console.warn(`Non-admin ${body.user.id} tried to view another dashboard`);
          return;
        }

        await client.views.open({ trigger_id: body.trigger_id, view: buildViewAsUserModal() });
      } catch (error) {
        handleListenerError('view_as_user', error);
      }
    },

    async showUserView({ ack, body, view }) {
      const selected = view.state.values.user_select?.user_select?.selected_user;
      if (!selected) {
        await ack({ response_action: 'errors', errors: { user_select: 'Select a user' } });
        return;
      }

      let dashboard: ModalView;
      try {
        if (!(await commandService.isAdmin(body.user.id))) {
          await ack({ response_action: 'errors', errors: { user_select: 'Only admins can view other dashboards' } });
          return;
        }
        dashboard = await homeService.buildDashboard(selected);
      } catch (error) {
        await ack({ response_action: 'errors', errors: { user_select: 'This dashboard could not be loaded' } });
        handleListenerError('show_user_view', error);
        return;
      }

      if (!validateBlocks(dashboard.blocks, 'modal')) {
        await ack({ response_action: 'errors', errors: { user_select: 'This dashboard could not be displayed' } });
        return;
      }

      console.log(`${body.user.id} is viewing the dashboard of ${selected}`);
      await ack({ response_action: 'push', view: dashboard });
    },

    async submitHours({ ack, view, body, client }) {
      const parsed = parseHourSubmission(view.state.values);
      if (!parsed.ok) {
        await ack({ response_action: 'errors', errors: parsed.errors });
        return;
      }
      await ack();

      const adminId = body.user.id;
      try {
        const result = await commandService.submitHours(adminId, parsed.submission);
        if (!result.data) {
          await notificationService.sendDm(client, adminId, result.message);
          return;
        }

        await notificationService.announceSubmission(client, adminId, result.data);
        for (const { slackId } of result.data.recorded) {
          await homeService.publishHome(client, slackId);
        }
        if (!result.success) {
          await notificationService.sendDm(client, adminId, result.message);
        }
      } catch (error) {
        handleListenerError('submit_hours', error);
      }
    },

    async claimReward({ ack, action, body, client }) {
      await ack();
      const claim = parseClaimAction(action.value);
      if (!claim) {
        console.error(`Malformed claim button value: ${action.value}`);
        return;
      }

      try {
        const result = await commandService.claimReward(body.user.id, claim);
        console.log(`${body.user.id} claim_reward: ${result.message}`);

        const channel = body.channel?.id;
        const ts = body.message?.ts;
        if (result.success && result.data && channel && ts) {
          await client.chat.update({
            channel,
            ts,
            text: result.message,
            blocks: buildClaimedNotification(claim, result.data.reward, body.user.id)
          });
        }

        if (result.success) {
          await homeService.publishHome(client, claim.slackId);
        } else {
          await notificationService.sendDm(client, body.user.id, result.message);
        }
      } catch (error) {
        handleListenerError('claim_reward', error);
      }
    }
  };
};
