import { ClaimService, createClaimService } from './services/claimService';
import { CommandService, createCommandService } from './services/commandService';
import { AppConfig } from './services/configService';
import { createHomeService, HomeService } from './services/homeService';
import { createHoursService, HoursService } from './services/hoursService';
import { createIdentityService, IdentityService } from './services/identityService';
import { createNotificationService, NotificationService } from './services/notificationService';
import { createRewardService, loadRewardCatalog, RewardService } from './services/rewardService';
import { createTidyhqClient, FetchLike } from './services/tidyhqService';

export interface AppContext {
  config: AppConfig;
  identityService: IdentityService;
  hoursService: HoursService;
  rewardService: RewardService;
  claimService: ClaimService;
  commandService: CommandService;
  homeService: HomeService;
  notificationService: NotificationService;
}

export interface AppContextOptions {
  fetchImpl?: FetchLike;
  now?: () => Date;
}

/**
 * Wire every service from a loaded config. Throws ConfigError for a bad reward
 * catalog and PersistenceError for an unreadable ledger or claims file.
 */
export const createAppContext = (config: AppConfig, options: AppContextOptions = {}): AppContext => {
  const now = options.now ?? (() => new Date());
  const { tidyhq, cache, storage, slack } = config;

  const identityService = createIdentityService({
    client: createTidyhqClient(tidyhq.token, tidyhq.apiUrl, options.fetchImpl),
    filePath: cache.file,
    expirySeconds: cache.expirySeconds,
    slackFieldId: tidyhq.slackFieldId,
    now: () => now().getTime()
  });
  const hoursService = createHoursService(storage.hoursFile, now);
  const rewardService = createRewardService(loadRewardCatalog(storage.rewardsFile), hoursService);
  const claimService = createClaimService(storage.claimsFile, now);

  return {
    config,
    identityService,
    hoursService,
    rewardService,
    claimService,
    commandService: createCommandService(identityService, hoursService, rewardService, claimService, tidyhq.adminGroupIds),
    homeService: createHomeService(identityService, hoursService, rewardService, claimService, tidyhq.adminGroupIds),
    notificationService: createNotificationService(slack.adminChannel)
  };
};
