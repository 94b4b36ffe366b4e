/**
 * Script Age Policy
 *
 * "Months" are 30-day blocks, not calendar months: cutoff = now - 30 * maxMonths days.
 * Comparison is strict, so a script dated exactly at the cutoff is still in window.
 */

export type ScriptAgeVerdict = 'IN_WINDOW' | 'TOO_OLD';

const DAY_MS = 24 * 60 * 60 * 1000;
const DAYS_PER_MONTH_BLOCK = 30;

export function ageCutoff(maxMonths: number, now: Date): Date {
  return new Date(now.getTime() - DAYS_PER_MONTH_BLOCK * maxMonths * DAY_MS);
}

export function evaluateScriptAge(
  scriptDate: Date,
  maxMonths: number,
  now: Date = new Date()
): ScriptAgeVerdict {
  return scriptDate.getTime() < ageCutoff(maxMonths, now).getTime() ? 'TOO_OLD' : 'IN_WINDOW';
}
