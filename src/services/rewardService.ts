import path from 'path';
import { z } from 'zod';
import { HoursService } from './hoursService';
import { RewardCatalog, RewardCategory, RewardDefinition, YearMonth } from '../types';
import { ConfigError } from '../types/errors';
import { addHours } from '../utils/hours';
import { formatZodIssues, readJsonFile } from '../utils/jsonFile';

const RewardItemSchema = z.object({
  hours: z.number().positive(),
  title: z.string().min(1),
  description: z.string().min(1),
  image: z.string().url().optional(),
  claim: z.string().min(1).optional()
});

const uniqueThresholds = (items: Array<{ hours: number }>, ctx: z.RefinementCtx) => {
  const seen = new Set<number>();
  items.forEach((item, index) => {
    if (seen.has(item.hours)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'hours'],
        message: `Duplicate threshold ${item.hours}h`
      });
    }
    seen.add(item.hours);
  });
};

export const RewardCatalogSchema = z.object({
  monthly: z.array(RewardItemSchema).superRefine(uniqueThresholds),
  cumulative: z.array(RewardItemSchema).superRefine(uniqueThresholds)
});

/**
 * Validate a raw catalog document. Each category is sorted by threshold, lowest first.
 */
export const parseRewardCatalog = (raw: unknown, source = 'rewards.json'): RewardCatalog => {
  const parsed = RewardCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid reward catalog', formatZodIssues(parsed.error.issues, source));
  }

  const toDefinitions = (category: RewardCategory): RewardDefinition[] =>
    parsed.data[category]
      .map(item => ({ category, ...item }))
      .sort((a, b) => a.hours - b.hours);

  return {
    monthly: toDefinitions('monthly'),
    cumulative: toDefinitions('cumulative')
  };
};

export const loadRewardCatalog = (filePath: string): RewardCatalog => {
  let raw: unknown;
  try {
    raw = readJsonFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${filePath}: ${reason}`);
  }

  if (raw === undefined) {
    throw new ConfigError(`${filePath} not found`);
  }

  const catalog = parseRewardCatalog(raw, path.basename(filePath));
  console.log(
    `Loaded ${catalog.monthly.length} monthly reward tiers and ${catalog.cumulative.length} all time reward tiers`
  );
  return catalog;
};

/**
 * Service for deciding which reward tiers a volunteer has reached
 */
export class RewardService {
  private catalog: RewardCatalog;
  private hoursService: HoursService;

  constructor(catalog: RewardCatalog, hoursService: HoursService) {
    this.catalog = catalog;
    this.hoursService = hoursService;
  }

  /**
   * Reward tiers for a category, lowest threshold first
   */
  rewards(category: RewardCategory): RewardDefinition[] {
    return [...this.catalog[category]];
  }

  /**
   * Hours that count towards a category. Monthly defaults to the current month.
   */
  total(memberId: string, category: RewardCategory, period?: YearMonth): number {
    if (category === 'cumulative') {
      return this.hoursService.cumulativeTotal(memberId);
    }

    const { year, month } = period ?? this.hoursService.currentMonth();
    return this.hoursService.monthlyTotal(memberId, year, month);
  }

  /**
   * Every tier at or below the given total, highest first
   */
  qualifying(total: number, category: RewardCategory): RewardDefinition[] {
    return this.catalog[category]
      .filter(reward => reward.hours <= total)
      .sort((a, b) => b.hours - a.hours);
  }

  /**
   * Tiers the member qualifies for. Claim status is not considered here.
   */
  eligible(memberId: string, category: RewardCategory, period?: YearMonth): RewardDefinition[] {
    return this.qualifying(this.total(memberId, category, period), category);
  }

  /**
   * Tiers crossed by adding `added` hours to a total of `before`, lowest first
   */
  unlockedBy(category: RewardCategory, before: number, added: number): RewardDefinition[] {
    return this.catalog[category].filter(reward => before < reward.hours && reward.hours <= addHours(before, added));
  }
}

export const createRewardService = (catalog: RewardCatalog, hoursService: HoursService): RewardService => {
  return new RewardService(catalog, hoursService);
};
