import { z } from 'zod';
import { ClaimRecord, RewardDefinition, YearMonth } from '../types';
import { PersistenceError } from '../types/errors';
import { monthKey } from '../utils/dates';
import { AtomicJsonWriter, ensureDirectory, readJsonFile } from '../utils/jsonFile';

const ClaimRecordSchema = z.object({
  memberId: z.string().min(1),
  category: z.enum(['monthly', 'cumulative']),
  hours: z.number().positive(),
  period: z.string().regex(/^\d{4}-\d{2}$/).optional(),
  claimedAt: z.string(),
  claimedBy: z.string()
});

const ClaimStoreSchema = z.array(ClaimRecordSchema);

/**
 * Tracks which reward tiers have been handed out. Monthly rewards are claimed
 * once per month, lifetime rewards once ever.
 */
export class ClaimService {
  private filePath: string;
  private claims: ClaimRecord[];
  private writer: AtomicJsonWriter;
  private now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
    this.writer = new AtomicJsonWriter(filePath);
    this.claims = this.loadInitialState();
  }

  private loadInitialState(): ClaimRecord[] {
    let raw: unknown;
    try {
      ensureDirectory(this.filePath);
      raw = readJsonFile(this.filePath);
    } catch (error) {
      console.error('Error loading claims:', error);
      throw new PersistenceError(`Could not read claims ${this.filePath}`, this.filePath);
    }

    if (raw === undefined) {
      return [];
    }

    const parsed = ClaimStoreSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Claims file ${this.filePath} is malformed`, this.filePath);
    }

    return parsed.data;
  }

  private periodKey(reward: RewardDefinition, period?: YearMonth): string | undefined {
    return reward.category === 'monthly' && period ? monthKey(period) : undefined;
  }

  private matches(claim: ClaimRecord, memberId: string, reward: RewardDefinition, period?: string): boolean {
    return (
      claim.memberId === memberId &&
      claim.category === reward.category &&
      claim.hours === reward.hours &&
      claim.period === period
    );
  }

  isClaimed(memberId: string, reward: RewardDefinition, period?: YearMonth): boolean {
    const key = this.periodKey(reward, period);
    return this.claims.some(claim => this.matches(claim, memberId, reward, key));
  }

  /**
   * Record a claim. Resolves false when it was already claimed.
   */
  async markClaimed(
    memberId: string,
    reward: RewardDefinition,
    claimedBy: string,
    period?: YearMonth
  ): Promise<boolean> {
    if (this.isClaimed(memberId, reward, period)) {
      return false;
    }

    const claim: ClaimRecord = {
      memberId,
      category: reward.category,
      hours: reward.hours,
      claimedAt: this.now().toISOString(),
      claimedBy
    };
    const key = this.periodKey(reward, period);
    if (key) {
      claim.period = key;
    }

    this.claims.push(claim);

    try {
      await this.writer.write(() => this.claims);
    } catch (error) {
      console.error('Error saving claims:', error);
      this.claims = this.claims.filter(existing => existing !== claim);
      throw new PersistenceError('Failed to save claims', this.filePath);
    }

    return true;
  }

  claimsFor(memberId: string): ClaimRecord[] {
    return this.claims.filter(claim => claim.memberId === memberId);
  }
}

export const createClaimService = (filePath: string, now?: () => Date): ClaimService => {
  return new ClaimService(filePath, now);
};
