/**
 * Core types for the volunteer hours app
 */

export type RewardCategory = 'monthly' | 'cumulative';

export interface YearMonth {
  year: number;
  month: number; // 1-12
}

export interface RewardDefinition {
  category: RewardCategory;
  hours: number;
  title: string;
  description: string;
  image?: string;
  claim?: string;
}

export type RewardCatalog = Record<RewardCategory, RewardDefinition[]>;

export interface HourEntry {
  id: string;
  hours: number;
  month: string; // YYYY-MM
  recordedAt: string;
  recordedBy: string;
  note?: string;
}

export type HoursLedger = Record<string, HourEntry[]>;

export interface MonthlyHours {
  month: YearMonth;
  hours: number;
}

export interface MemberRecord {
  id: string;
  name: string;
  groups: string[];
  slackId?: string;
}

export interface GroupRecord {
  id: string;
  label: string;
}

export interface CacheSnapshot {
  refreshedAt: number;
  members: MemberRecord[];
  groups: GroupRecord[];
}

export interface ClaimRecord {
  memberId: string;
  category: RewardCategory;
  hours: number;
  period?: string;
  claimedAt: string;
  claimedBy: string;
}

export interface CommandResult<T = undefined> {
  success: boolean;
  message: string;
  data?: T;
}

export interface HourSubmission {
  volunteers: string[];
  hours: number;
  month: YearMonth;
  note?: string;
}

export interface UnlockedReward {
  reward: RewardDefinition;
  period?: YearMonth;
}

export interface VolunteerResult {
  slackId: string;
  memberId: string;
  entryId: string;
  unlocked: UnlockedReward[];
}

export interface SubmissionOutcome {
  submission: HourSubmission;
  recorded: VolunteerResult[];
  unresolved: string[];
}
