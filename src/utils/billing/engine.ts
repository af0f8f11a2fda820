import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { warn } from '../logger';
import { isLeapYear, utcDate } from '../date/date';
import { roundCurrency } from '../money/money';
import { getIterationLimit, resolveCycle } from './limits';
import { BillingConfiguration, BillingOccurrence, IterationLimits, SubscriptionStatus } from './types';

dayjs.extend(utc);

type CycleDayFields = Pick<BillingConfiguration, 'billingCycle' | 'billingCycleDay' | 'startDate' | 'firstBillingDate'>;

function isBeforeInstant(a: Date, b: Date): boolean {
  return a.getTime() < b.getTime();
}

function isAfterInstant(a: Date, b: Date): boolean {
  return a.getTime() > b.getTime();
}

function isWithin(date: Date, start: Date, end: Date): boolean {
  return !isBeforeInstant(date, start) && !isAfterInstant(date, end);
}

export function isOneTime(config: Pick<BillingConfiguration, 'billingCycle'>): boolean {
  return config.billingCycle === 'one-time';
}

/**
 * A subscription is ended once its end date is strictly before `now`.
 */
export function isEnded(config: Pick<BillingConfiguration, 'endDate'>, now: Date): boolean {
  return config.endDate !== null && isBeforeInstant(config.endDate, now);
}

export function computedStatus(config: Pick<BillingConfiguration, 'endDate'>, now: Date): SubscriptionStatus {
  return isEnded(config, now) ? 'ended' : 'active';
}

/**
 * Adds months and pins the result to the preferred billing day, clamped to the
 * length of the target month. Jan 31 -> Feb 29 -> Mar 31 for a day-31 subscription.
 *
 * Without a billing day nothing is clamped: days past the end of the target month
 * spill into the next one, so Jan 31 + 1 month is Mar 2 in a leap year.
 */
function addMonthsOnCycleDay(date: Date, months: number, billingCycleDay: number | null): Date {
  if (months === 0) {
    return new Date(date.getTime());
  }

  if (!billingCycleDay) {
    const start = dayjs.utc(date);
    return start
      .startOf('month')
      .add(months, 'month')
      .add(start.date() - 1, 'day')
      .toDate();
  }

  const targetMonth = dayjs.utc(date).startOf('month').add(months, 'month');
  return targetMonth.date(Math.min(billingCycleDay, targetMonth.daysInMonth())).toDate();
}

/**
 * Adds years; Feb 29 lands on Feb 28 in non-leap target years.
 */
function addYearsKeepingLeapDay(date: Date, years: number): Date {
  if (years === 0) {
    return new Date(date.getTime());
  }

  const current = dayjs.utc(date);
  const year = current.year() + years;
  const month = current.month();
  let day = current.date();

  if (month === 1 && day === 29 && !isLeapYear(year)) {
    day = 28;
  }

  return utcDate(year, month, day);
}

/**
 * Date of the billing that falls `cycles` complete cycles after the first billing date.
 * Unknown cycle values, and `one-time`, are stepped as monthly.
 */
export function computeBillingDate(config: BillingConfiguration, cycles: number): Date {
  const steps = config.billingInterval * cycles;

  switch (resolveCycle(config.billingCycle)) {
    case 'daily':
      return dayjs.utc(config.firstBillingDate).add(steps, 'day').toDate();
    case 'weekly':
      return dayjs.utc(config.firstBillingDate).add(steps, 'week').toDate();
    case 'monthly':
      return addMonthsOnCycleDay(config.firstBillingDate, steps, config.billingCycleDay);
    case 'quarterly':
      return addMonthsOnCycleDay(config.firstBillingDate, steps * 3, config.billingCycleDay);
    case 'yearly':
      return addYearsKeepingLeapDay(config.firstBillingDate, steps);
  }
}

/**
 * Next due date given how many payments have been made.
 * @returns null for ended and one-time subscriptions
 */
export function nextBillingDate(config: BillingConfiguration, paidPaymentCount: number, now: Date): Date | null {
  if (isEnded(config, now)) {
    return null;
  }

  if (isOneTime(config)) {
    return null;
  }

  return computeBillingDate(config, paidPaymentCount);
}

export function isOverdue(config: BillingConfiguration, paidPaymentCount: number, now: Date): boolean {
  if (isEnded(config, now) || isOneTime(config)) {
    return false;
  }

  const next = nextBillingDate(config, paidPaymentCount, now);
  if (!next) {
    return false;
  }

  return isBeforeInstant(next, now);
}

/**
 * Whether the subscription was running at any point between the two instants.
 */
export function isActiveInMonth(
  config: Pick<BillingConfiguration, 'startDate' | 'endDate'>,
  startOfMonth: Date,
  endOfMonth: Date,
): boolean {
  if (isAfterInstant(config.startDate, endOfMonth)) {
    return false;
  }

  if (config.endDate && isBeforeInstant(config.endDate, startOfMonth)) {
    return false;
  }

  return true;
}

/**
 * Lower bound on the number of whole cycles between the first billing date and
 * `target`, kept one cycle short so the cycle it returns is always before `target`.
 * Walks can start here instead of at cycle 0.
 */
function estimateCyclesBefore(config: BillingConfiguration, target: Date): number {
  const interval = config.billingInterval;
  if (!(interval > 0)) {
    return 0;
  }

  const first = dayjs.utc(config.firstBillingDate);
  const to = dayjs.utc(target);
  let span: number;
  let unitsPerCycle: number;

  switch (resolveCycle(config.billingCycle)) {
    case 'daily':
      span = to.diff(first, 'day');
      unitsPerCycle = interval;
      break;
    case 'weekly':
      span = to.diff(first, 'day');
      unitsPerCycle = interval * 7;
      break;
    case 'monthly':
      span = to.diff(first, 'month');
      unitsPerCycle = interval;
      break;
    case 'quarterly':
      span = to.diff(first, 'month');
      unitsPerCycle = interval * 3;
      break;
    case 'yearly':
      span = to.diff(first, 'year');
      unitsPerCycle = interval;
      break;
  }

  return Math.max(0, Math.floor(span / unitsPerCycle) - 1);
}

/**
 * Finds the earliest billing date within `[startOfMonth, endOfMonth]`.
 */
export function findFirstBillingInMonth(
  config: BillingConfiguration,
  startOfMonth: Date,
  endOfMonth: Date,
  limits: Partial<IterationLimits> = {},
): BillingOccurrence {
  const first = config.firstBillingDate;

  if (isWithin(first, startOfMonth, endOfMonth)) {
    return { status: 'found', date: first, cycle: 0 };
  }

  if (isAfterInstant(first, endOfMonth)) {
    return { status: 'none' };
  }

  const maxIterations = getIterationLimit(config.billingCycle, limits);
  let cycle = estimateCyclesBefore(config, startOfMonth);
  let current = computeBillingDate(config, cycle);
  let iterations = 0;

  while (isBeforeInstant(current, startOfMonth)) {
    if (iterations >= maxIterations) {
      warn('findFirstBillingInMonth hit iteration limit', {
        subscriptionId: config.id,
        billingCycle: config.billingCycle,
        maxIterations,
      });
      return { status: 'undetermined' };
    }

    cycle++;
    iterations++;
    current = computeBillingDate(config, cycle);

    if (isAfterInstant(current, endOfMonth)) {
      return { status: 'none' };
    }
  }

  return { status: 'found', date: current, cycle };
}

/**
 * Counts billings from `fromCycle` onward that fall on or before `through`.
 * @returns null when the iteration limit is reached
 */
export function countBillingsThrough(
  config: BillingConfiguration,
  fromCycle: number,
  through: Date,
  maxIterations: number,
): number | null {
  let count = 0;
  let cycle = fromCycle;
  let current = computeBillingDate(config, cycle);

  while (!isAfterInstant(current, through)) {
    if (count >= maxIterations) {
      warn('countBillingsThrough hit iteration limit', {
        subscriptionId: config.id,
        billingCycle: config.billingCycle,
        maxIterations,
      });
      return null;
    }

    count++;
    cycle++;
    current = computeBillingDate(config, cycle);
  }

  return count;
}

/**
 * Total of every billing due within the month, paid or not. This is a
 * budgeting figure, not what remains to be paid.
 *
 * @returns the amount rounded to cents, or null when it cannot be determined
 * because a walk reached its iteration limit
 */
export function monthlyForecastAmount(
  config: BillingConfiguration,
  startOfMonth: Date,
  endOfMonth: Date,
  limits: Partial<IterationLimits> = {},
): number | null {
  if (!isActiveInMonth(config, startOfMonth, endOfMonth)) {
    return 0;
  }

  const effectiveEnd = config.endDate && isBeforeInstant(config.endDate, endOfMonth) ? config.endDate : endOfMonth;

  if (isOneTime(config)) {
    return isWithin(config.firstBillingDate, startOfMonth, effectiveEnd) ? roundCurrency(config.price) : 0;
  }

  const occurrence = findFirstBillingInMonth(config, startOfMonth, endOfMonth, limits);
  if (occurrence.status === 'none') {
    return 0;
  }
  if (occurrence.status === 'undetermined') {
    return null;
  }

  const count = countBillingsThrough(
    config,
    occurrence.cycle,
    effectiveEnd,
    getIterationLimit(config.billingCycle, limits),
  );
  if (count === null) {
    return null;
  }

  return roundCurrency(count * config.price);
}

/**
 * Preferred day of month for cycles that bill on a day of the month, else null.
 */
export function deriveBillingCycleDay(billingCycle: string, anchor: Date): number | null {
  if (billingCycle === 'monthly' || billingCycle === 'quarterly') {
    return dayjs.utc(anchor).date();
  }
  return null;
}

/**
 * Sets the billing cycle day at creation, anchored on the start date.
 */
export function setBillingCycleDay<T extends CycleDayFields>(config: T): T {
  return { ...config, billingCycleDay: deriveBillingCycleDay(config.billingCycle, config.startDate) };
}

/**
 * Re-derives the billing cycle day after the first billing date was edited.
 */
export function recalculateBillingCycleDay<T extends CycleDayFields>(config: T): T {
  return { ...config, billingCycleDay: deriveBillingCycleDay(config.billingCycle, config.firstBillingDate) };
}
