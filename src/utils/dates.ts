import { YearMonth } from '../types';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

export const toYearMonth = (date: Date): YearMonth => ({
  year: date.getFullYear(),
  month: date.getMonth() + 1
});

/**
 * Ledger bucket key, e.g. `2026-03`
 */
export const monthKey = ({ year, month }: YearMonth): string =>
  `${year}-${String(month).padStart(2, '0')}`;

export const parseMonthKey = (key: string): YearMonth | null => {
  const match = key.match(/^(\d{4})-(\d{2})$/);
  if (!match) return null;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  if (month < 1 || month > 12) return null;

  return { year, month };
};

/**
 * Parse a Slack datepicker value (YYYY-MM-DD). Only the month is kept.
 */
export const parseIsoDate = (value: string): YearMonth | null => {
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;

  const day = parseInt(match[3], 10);
  if (day < 1 || day > 31) return null;

  return parseMonthKey(`${match[1]}-${match[2]}`);
};

export const formatIsoDate = (date: Date): string =>
  `${monthKey(toYearMonth(date))}-${String(date.getDate()).padStart(2, '0')}`;

export const previousMonth = ({ year, month }: YearMonth): YearMonth =>
  month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };

export const monthName = ({ month }: YearMonth): string => MONTH_NAMES[month - 1];

export const shortMonthName = (ym: YearMonth): string => monthName(ym).slice(0, 3);
