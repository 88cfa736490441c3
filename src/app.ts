import { App, BlockAction, ButtonAction, LogLevel, ViewSubmitAction } from '@slack/bolt';
import dotenv from 'dotenv';

import { AppContext, createAppContext } from './context';
import { createHandlers } from './handlers';
import { loadConfig } from './services/configService';

export const createApp = (context: AppContext): App => {
  const { slack } = context.config;
  const handlers = createHandlers(context);

  const app = new App({
    token: slack.botToken,
    logLevel: LogLevel.INFO,
    ...(slack.appToken
      ? { socketMode: true, appToken: slack.appToken }
      : { signingSecret: slack.signingSecret })
  });

  app.event('app_home_opened', args => handlers.homeOpened(args));
  app.action<BlockAction>('add_hours', args => handlers.addHours(args));
  app.action<BlockAction>('view_as_user', args => handlers.viewAsUser(args));
  app.view<ViewSubmitAction>('show_user_view', args => handlers.showUserView(args));
  app.view<ViewSubmitAction>('submit_hours', args => handlers.submitHours(args));
  app.action<BlockAction<ButtonAction>>('claim_reward', args => handlers.claimReward(args));

  return app;
};

/**
 * Start the app. With `--cron` every home is rendered once and the process
 * should exit; resolves true when the app keeps serving events.
 */
export const main = async (argv: string[] = process.argv.slice(2)): Promise<boolean> => {
  dotenv.config();

  const config = loadConfig(process.env.CONFIG_FILE_PATH || 'config.json');
  const context = createAppContext(config);

  if (context.identityService.loadSnapshot()) {
    console.log('Loaded TidyHQ cache from disk');
  }
  await context.identityService.ensureFresh();

  const app = createApp(context);

  if (argv.includes('--cron')) {
    console.log('Running in cron mode');
    await context.homeService.refreshAllHomes(app.client);
    return false;
  }

  if (config.slack.appToken) {
    await app.start();
    console.log('⚡️ Volunteer hours app is running in Socket Mode');
  } else {
    const port = parseInt(process.env.PORT || '3000', 10);
    await app.start(port);
    console.log(`⚡️ Volunteer hours app is running on port ${port}`);
  }
  return true;
};

if (require.main === module) {
  main()
    .then(keepRunning => {
      if (!keepRunning) process.exit(0);
    })
    .catch(error => {
      console.error('Failed to start:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
