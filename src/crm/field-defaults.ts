// ============================================================================
// Field Defaults — Uniform field assignment across a batch
// ============================================================================

import type { Opportunity } from './types/index.js';

/**
 * Assigns every default onto every record. Existing values are overwritten;
 * there is no per-record condition. Returns the same array for chaining.
 */
export function applyDefaults<T extends object>(records: T[], defaults: Partial<T>): T[] {
  for (const record of records) {
    Object.assign(record, defaults);
  }
  return records;
}

export const DEFAULT_OPPORTUNITY_STAGE = 'Qualification';
export const DEFAULT_OPPORTUNITY_AMOUNT = 50000;
export const DEFAULT_CLOSE_MONTHS = 3;

/** Stage, close date (today + 3 months) and amount for new opportunities */
export function opportunityDefaults(today: Date): Required<Pick<Opportunity, 'StageName' | 'CloseDate' | 'Amount'>> {
  return {
    StageName: DEFAULT_OPPORTUNITY_STAGE,
    CloseDate: toDateOnly(addMonths(today, DEFAULT_CLOSE_MONTHS)),
    Amount: DEFAULT_OPPORTUNITY_AMOUNT,
  };
}

/**
 * Adds calendar months in UTC. When the target month is shorter, the day is
 * clamped to its last day (2026-11-30 + 3 months = 2027-02-28).
 */
export function addMonths(date: Date, months: number): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + months;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const day = Math.min(date.getUTCDate(), lastDay);
  return new Date(Date.UTC(year, month, day));
}

/** YYYY-MM-DD in UTC, the format date fields take */
export function toDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}
