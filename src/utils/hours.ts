/**
 * Hours carry at most two decimal places and are added up in whole
 * hundredths, so a total does not depend on the order of its entries.
 */
const HUNDREDTHS = 100;

export const HOURS_PATTERN = /^\d+(\.\d{1,2})?$/;

export const toHundredths = (hours: number): number => Math.round(hours * HUNDREDTHS);

export const hasHourPrecision = (hours: number): boolean =>
  Math.abs(hours * HUNDREDTHS - toHundredths(hours)) < 1e-6;

export const sumHours = (values: readonly number[]): number =>
  values.reduce((total, hours) => total + toHundredths(hours), 0) / HUNDREDTHS;

export const addHours = (a: number, b: number): number => sumHours([a, b]);
