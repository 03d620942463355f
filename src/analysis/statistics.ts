/**
 * Small descriptive statistics over dated records.
 * Windows are calendar-based and anchored on the latest date in the series,
 * so gaps in the data shrink a window rather than shifting it.
 */

import { differenceInCalendarDays, format, getDay, parseISO, subDays } from 'date-fns';
import type { Confidence, TypedRecord } from '../types/models.js';

export type Accessor = (record: TypedRecord) => number | null | undefined;

export const WINDOW_DAYS = 30;

export const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Percentage change from `previous` to `current`; null when there is no positive baseline. */
export function percentChange(current: number, previous: number | null): number | null {
  if (previous === null || previous <= 0) return null;
  return ((current - previous) / previous) * 100;
}

function valuesOf(records: readonly TypedRecord[], accessor: Accessor): number[] {
  const out: number[] = [];
  for (const record of records) {
    const value = accessor(record);
    if (typeof value === 'number' && Number.isFinite(value)) out.push(value);
  }
  return out;
}

export interface WindowTrend {
  recentMean: number;
  priorMean: number | null;
  /** Null when there is no prior window to compare against. */
  changePct: number | null;
  /** Records in the recent window that carried a value. */
  recentCount: number;
  recentStart: string;
  anchor: string;
}

/**
 * Mean of `accessor` over the trailing window against the window before it.
 * Records must be sorted oldest first. Null when the recent window has no values.
 */
export function windowTrend(
  records: readonly TypedRecord[],
  accessor: Accessor,
  windowDays = WINDOW_DAYS
): WindowTrend | null {
  if (records.length === 0) return null;

  const anchor = records[records.length - 1].date;
  const anchorDate = parseISO(anchor);
  const recent: TypedRecord[] = [];
  const prior: TypedRecord[] = [];

  for (const record of records) {
    const age = differenceInCalendarDays(anchorDate, parseISO(record.date));
    if (age < 0) continue;
    if (age < windowDays) recent.push(record);
    else if (age < windowDays * 2) prior.push(record);
  }

  const recentValues = valuesOf(recent, accessor);
  const recentMean = mean(recentValues);
  if (recentMean === null) return null;
  const priorMean = mean(valuesOf(prior, accessor));

  return {
    recentMean,
    priorMean,
    changePct: percentChange(recentMean, priorMean),
    recentCount: recentValues.length,
    recentStart: format(subDays(anchorDate, windowDays - 1), 'yyyy-MM-dd'),
    anchor,
  };
}

export interface CadenceProfile {
  /** Share of calendar days in the covered span with a positive value. */
  activeShare: number;
  activeDays: number;
  spanDays: number;
  bestDay: { day: string; mean: number };
  worstDay: { day: string; mean: number };
}

/** Null when fewer than two weekdays have data. */
export function cadenceProfile(records: readonly TypedRecord[], accessor: Accessor): CadenceProfile | null {
  if (records.length === 0) return null;

  const first = parseISO(records[0].date);
  const last = parseISO(records[records.length - 1].date);
  const spanDays = differenceInCalendarDays(last, first) + 1;

  const byWeekday = new Map<number, number[]>();
  let activeDays = 0;
  for (const record of records) {
    const value = accessor(record);
    if (typeof value !== 'number' || !Number.isFinite(value)) continue;
    if (value > 0) activeDays++;
    const day = getDay(parseISO(record.date));
    const bucket = byWeekday.get(day) ?? [];
    bucket.push(value);
    byWeekday.set(day, bucket);
  }

  const means = [...byWeekday.entries()]
    .map(([day, values]) => ({ day: WEEKDAYS[day], mean: mean(values) ?? 0 }))
    .sort((a, b) => b.mean - a.mean);
  if (means.length < 2) return null;

  return {
    activeShare: activeDays / spanDays,
    activeDays,
    spanDays,
    bestDay: means[0],
    worstDay: means[means.length - 1],
  };
}

/** Confidence grows with the amount of data behind a finding. */
export function confidenceFor(recordCount: number): Confidence {
  if (recordCount >= 60) return 'High';
  if (recordCount >= 30) return 'Medium';
  return 'Low';
}

export function formatCount(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

export function formatPercent(fraction: number, digits = 1): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

export function formatChange(changePct: number): string {
  return `${changePct >= 0 ? '+' : ''}${changePct.toFixed(1)}%`;
}
