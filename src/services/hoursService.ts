import crypto from 'crypto';
import fs from 'fs';
import { z } from 'zod';
import { HourEntry, HoursLedger, MonthlyHours, YearMonth } from '../types';
import { InvalidInputError, PersistenceError } from '../types/errors';
import { monthKey, previousMonth, toYearMonth } from '../utils/dates';
import { hasHourPrecision, sumHours } from '../utils/hours';
import { AtomicJsonWriter, ensureDirectory, readJsonFile } from '../utils/jsonFile';

const HourEntrySchema = z.object({
  id: z.string().min(1),
  hours: z.number().positive(),
  month: z.string().regex(/^\d{4}-\d{2}$/),
  recordedAt: z.string(),
  recordedBy: z.string(),
  note: z.string().optional()
});

const HoursLedgerSchema = z.record(z.array(HourEntrySchema));

export interface RecordOptions {
  month: YearMonth;
  recordedBy: string;
  note?: string;
}

const totalOf = (entries: HourEntry[]): number => sumHours(entries.map(entry => entry.hours));

/**
 * Append-only ledger of volunteer hours, keyed by TidyHQ contact id.
 * Every successful record is on disk before the call resolves.
 */
export class HoursService {
  private filePath: string;
  private ledger: HoursLedger;
  private writer: AtomicJsonWriter;
  private now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
    this.writer = new AtomicJsonWriter(filePath);
    this.ledger = this.loadInitialState();
  }

  /**
   * Load the ledger from disk, creating an empty one on first run. A ledger
   * that cannot be read is never replaced.
   */
  private loadInitialState(): HoursLedger {
    let raw: unknown;
    try {
      ensureDirectory(this.filePath);
      raw = readJsonFile(this.filePath);
    } catch (error) {
      console.error('Error loading hours ledger:', error);
      throw new PersistenceError(`Could not read hours ledger ${this.filePath}`, this.filePath);
    }

    if (raw === undefined) {
      try {
        fs.writeFileSync(this.filePath, '{}\n', 'utf8');
      } catch (error) {
        console.error('Error creating hours ledger:', error);
        throw new PersistenceError(`Could not create hours ledger ${this.filePath}`, this.filePath);
      }
      console.log(`Created empty hours ledger at ${this.filePath}`);
      return {};
    }

    const parsed = HoursLedgerSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PersistenceError(
        `Hours ledger ${this.filePath} is malformed at ${issue.path.join('.')}: ${issue.message}`,
        this.filePath
      );
    }

    return parsed.data;
  }

  private async saveState(): Promise<void> {
    try {
      await this.writer.write(() => this.ledger);
    } catch (error) {
      console.error('Error saving hours ledger:', error);
      throw new PersistenceError('Failed to save hours ledger', this.filePath);
    }
  }

  /**
   * Append an entry and persist the ledger. Returns the new entry id.
   */
  async record(memberId: string, hours: number, options: RecordOptions): Promise<string> {
    const id = memberId.trim();
    if (!id) {
      throw new InvalidInputError('A member is required', 'member');
    }

    if (!Number.isFinite(hours) || hours <= 0) {
      throw new InvalidInputError(`Hours must be a positive number, got ${hours}`, 'hours');
    }
    if (!hasHourPrecision(hours)) {
      throw new InvalidInputError(`Hours can have at most two decimal places, got ${hours}`, 'hours');
    }

    const { year, month } = options.month;
    if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidInputError(`Invalid month ${year}-${month}`, 'month');
    }

    const entry: HourEntry = {
      id: crypto.randomUUID(),
      hours: sumHours([hours]),
      month: monthKey(options.month),
      recordedAt: this.now().toISOString(),
      recordedBy: options.recordedBy
    };
    if (options.note && options.note.trim()) {
      entry.note = options.note.trim();
    }

    const previous = this.ledger[id];
    this.ledger[id] = [...(previous ?? []), entry];

    try {
      await this.saveState();
    } catch (error) {
      // keep memory in line with what is on disk
      if (previous) {
        this.ledger[id] = previous;
      } else {
        delete this.ledger[id];
      }
      throw error;
    }

    return entry.id;
  }

  entries(memberId: string): HourEntry[] {
    return [...(this.ledger[memberId.trim()] ?? [])];
  }

  monthlyTotal(memberId: string, year: number, month: number): number {
    const key = monthKey({ year, month });
    return totalOf(this.entries(memberId).filter(entry => entry.month === key));
  }

  cumulativeTotal(memberId: string): number {
    return totalOf(this.entries(memberId));
  }

  /**
   * Hours per YYYY-MM bucket
   */
  monthlyBreakdown(memberId: string): Record<string, number> {
    const byMonth: Record<string, HourEntry[]> = {};
    for (const entry of this.entries(memberId)) {
      byMonth[entry.month] = [...(byMonth[entry.month] ?? []), entry];
    }

    const breakdown: Record<string, number> = {};
    for (const [month, entries] of Object.entries(byMonth)) {
      breakdown[month] = totalOf(entries);
    }
    return breakdown;
  }

  /**
   * The last `count` months up to and including `asOf`, oldest first,
   * with zero for months without entries.
   */
  recentMonths(memberId: string, count: number, asOf: YearMonth = this.currentMonth()): MonthlyHours[] {
    const breakdown = this.monthlyBreakdown(memberId);
    const months: MonthlyHours[] = [];

    let cursor = asOf;
    for (let i = 0; i < count; i++) {
      months.unshift({ month: cursor, hours: breakdown[monthKey(cursor)] ?? 0 });
      cursor = previousMonth(cursor);
    }

    return months;
  }

  currentMonth(): YearMonth {
    return toYearMonth(this.now());
  }
}

export const createHoursService = (filePath: string, now?: () => Date): HoursService => {
  return new HoursService(filePath, now);
};
