import {
  addDays,
  hourOf,
  isValidIsoDate,
  monthLabel,
  startOfMonth,
  weekdayLabel
} from './dates';
import { Expense, ExpenseStats, StatsPeriod } from './types';

interface DateWindow {
  start: string;
  end: string;
}

const PERIODS: StatsPeriod[] = ['all', 'daily', 'weekly', 'monthly'];

/** Unrecognised selectors are treated as 'all'. */
export function resolvePeriod(period: string): StatsPeriod {
  return PERIODS.find(p => p === period) ?? 'all';
}

export function periodWindow(period: StatsPeriod, today: string): DateWindow | null {
  switch (period) {
    case 'daily':
      return { start: today, end: today };
    case 'weekly':
      return { start: addDays(today, -7), end: today };
    case 'monthly':
      return { start: addDays(today, -30), end: today };
    case 'all':
      return null;
  }
}

// ISO dates compare correctly as strings; malformed dates never fall inside a window
function inWindow(expense: Expense, window: DateWindow): boolean {
  return isValidIsoDate(expense.date) && expense.date >= window.start && expense.date <= window.end;
}

function sumCents(expenses: Expense[]): number {
  return expenses.reduce((total, e) => total + e.amount, 0);
}

function toDecimal(cents: number): number {
  return cents / 100;
}

function hourlyBreakdown(expenses: Expense[]): Record<string, number> {
  const buckets: Record<string, number> = {};
  for (let hour = 0; hour < 24; hour++) {
    buckets[`${String(hour).padStart(2, '0')}:00`] = 0;
  }

  for (const expense of expenses) {
    const key = `${hourOf(expense.time) ?? '00'}:00`;
    buckets[key] += expense.amount;
  }

  return mapValues(buckets, toDecimal);
}

function weekdayBreakdown(expenses: Expense[], today: string): Record<string, number> {
  const buckets: Record<string, number> = {};
  for (let i = 0; i < 7; i++) {
    buckets[weekdayLabel(addDays(today, i - 6))] = 0;
  }

  for (const expense of expenses) {
    buckets[weekdayLabel(expense.date)] += expense.amount;
  }

  return mapValues(buckets, toDecimal);
}

/**
 * Six buckets stepping back from today in 30-day strides. Each bucket runs from
 * the first of its anchor's month to the day before the previous anchor's month
 * began, so short months can yield empty or colliding buckets. Uses the full,
 * unwindowed record set.
 */
function monthlyBreakdown(expenses: Expense[], today: string): Record<string, number> {
  const dated = expenses.filter(e => isValidIsoDate(e.date));
  const buckets: Record<string, number> = {};

  for (let i = 0; i < 6; i++) {
    const anchor = addDays(today, -30 * i);
    const start = startOfMonth(anchor);
    const end = i > 0
      ? addDays(startOfMonth(addDays(today, -30 * (i - 1))), -1)
      : today;

    const inRange = dated.filter(e => e.date >= start && e.date <= end);
    buckets[monthLabel(anchor)] = toDecimal(sumCents(inRange));
  }

  return buckets;
}

function mapValues(
  record: Record<string, number>,
  fn: (value: number) => number
): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = fn(value);
  }
  return out;
}

/**
 * Aggregate an account's expenses for the requested period.
 *
 * `today` (YYYY-MM-DD) anchors every relative window. `weekly_spent` and
 * `monthly_spent` always cover the last 7 and 30 days regardless of `period`.
 */
export function computeStats(expenses: Expense[], period: string, today: string): ExpenseStats {
  const resolved = resolvePeriod(period);
  const window = periodWindow(resolved, today);
  const windowed = window ? expenses.filter(e => inWindow(e, window)) : expenses;

  const weekly = expenses.filter(e => inWindow(e, { start: addDays(today, -7), end: today }));
  const monthly = expenses.filter(e => inWindow(e, { start: addDays(today, -30), end: today }));

  // Labels are free text, so a plain object would collide with names like "constructor"
  const categoryCents = new Map<string, number>();
  for (const expense of windowed) {
    categoryCents.set(expense.category, (categoryCents.get(expense.category) ?? 0) + expense.amount);
  }

  let breakdown: Record<string, number>;
  if (resolved === 'daily') {
    breakdown = hourlyBreakdown(windowed);
  } else if (resolved === 'weekly') {
    breakdown = weekdayBreakdown(windowed, today);
  } else {
    breakdown = monthlyBreakdown(expenses, today);
  }

  return {
    total_spent: toDecimal(sumCents(windowed)),
    weekly_spent: toDecimal(sumCents(weekly)),
    monthly_spent: toDecimal(sumCents(monthly)),
    category_stats: Object.fromEntries(
      [...categoryCents].map(([category, cents]) => [category, toDecimal(cents)])
    ),
    breakdown,
    period
  };
}
