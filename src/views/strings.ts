export const header = 'Welcome to the volunteer hours system!';

export const unrecognised =
  "Unfortunately I don't recognise you. This system is only available to members, if you think this is a mistake please contact an admin.";

export const explainer =
  "This system tracks the time you've volunteered and your progress towards specific rewards. Your contribution is greatly appreciated!";

export const noActiveRewards =
  'There are no active reward tiers recorded for you last month. Hours recorded by hand may take a few days to appear here.';

export const adminExplainer = 'As an admin you have some extra tools available to you below. Please use them responsibly.';

export const addHoursExplainer =
  'Use this form to add hours to volunteers. If they also logged the time themselves it will be counted twice!';

export const viewAsUserExplainer = 'Select a user to view their volunteer dashboard:';
