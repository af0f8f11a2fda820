import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { SubscriptionSnapshot } from '../data/subscription/types';
import { Subscription } from '../data/subscription/subscription';
import { PaymentHistory } from '../data/payment/payment';
import { IterationLimits } from '../utils/billing/types';
import { addDays, getMonthBounds, monthKey } from '../utils/date/date';
import { sumAmounts } from '../utils/money/money';
import { debug } from '../utils/logger';
import { AppConfig, loadConfig } from '../utils/config/config';
import { getSnapshots, SubscriptionStore } from '../utils/io/subscriptions';
import {
  BillItem,
  Dashboard,
  DashboardOptions,
  MonthlyForecast,
  MonthlySpending,
  SpendingTotal,
} from './types';

dayjs.extend(utc);

const DASHBOARD_LIST_SIZE = 10;
const DASHBOARD_UPCOMING_WINDOW_DAYS = 30;

/**
 * Active subscriptions that have a next billing date, paired with that date.
 * One-time and ended subscriptions drop out here.
 */
function billItems(snapshots: SubscriptionSnapshot[], now: Date): BillItem[] {
  const items: BillItem[] = [];
  for (const { subscription, paidPaymentCount } of snapshots) {
    if (subscription.isEnded(now)) {
      continue;
    }
    const nextBillingDate = subscription.nextBillingDate(paidPaymentCount, now);
    if (nextBillingDate) {
      items.push({ subscription, nextBillingDate });
    }
  }
  return items;
}

function byDueDate(a: BillItem, b: BillItem): number {
  return a.nextBillingDate.getTime() - b.nextBillingDate.getTime();
}

export function getActiveSubscriptions(snapshots: SubscriptionSnapshot[], now: Date): SubscriptionSnapshot[] {
  return snapshots.filter(({ subscription }) => !subscription.isEnded(now));
}

/**
 * Bills due on or before `now + days`, overdue ones included.
 */
export function getDueSoon(snapshots: SubscriptionSnapshot[], days: number, now: Date): BillItem[] {
  const cutoff = addDays(now, days).getTime();
  return billItems(snapshots, now).filter((item) => item.nextBillingDate.getTime() <= cutoff);
}

/**
 * Overdue bills: the next billing date has already passed.
 */
export function getExpiredBills(snapshots: SubscriptionSnapshot[], now: Date): BillItem[] {
  return billItems(snapshots, now).filter((item) => item.nextBillingDate.getTime() < now.getTime());
}

/**
 * Future bills within the window, overdue ones excluded.
 */
export function getUpcomingBills(snapshots: SubscriptionSnapshot[], days: number, now: Date): BillItem[] {
  const cutoff = addDays(now, days).getTime();
  return billItems(snapshots, now).filter((item) => {
    const due = item.nextBillingDate.getTime();
    return due > now.getTime() && due <= cutoff;
  });
}

export function getCurrentMonthBills(snapshots: SubscriptionSnapshot[], now: Date): BillItem[] {
  const { startOfMonth, endOfMonth } = getMonthBounds(now);
  return billItems(snapshots, now).filter((item) => {
    const due = item.nextBillingDate.getTime();
    return due >= startOfMonth.getTime() && due <= endOfMonth.getTime();
  });
}

/**
 * Every billing of the current month grouped by currency, paid or not.
 * Subscriptions whose amount cannot be determined are left out of the totals.
 */
export function getMonthlyForecast(
  snapshots: SubscriptionSnapshot[],
  now: Date,
  limits: Partial<IterationLimits> = {},
): MonthlyForecast {
  const { startOfMonth, endOfMonth } = getMonthBounds(now);
  const forecast: MonthlyForecast = {};

  for (const { subscription } of getActiveSubscriptions(snapshots, now)) {
    const forecastAmount = subscription.monthlyForecastAmount(startOfMonth, endOfMonth, limits);
    if (forecastAmount === null) {
      debug('Skipping subscription with undetermined forecast', { subscriptionId: subscription.id });
      continue;
    }
    if (forecastAmount <= 0) {
      continue;
    }

    if (!(subscription.currency in forecast)) {
      forecast[subscription.currency] = { currency: subscription.currency, total: 0, count: 0, subscriptions: [] };
    }
    const entry = forecast[subscription.currency];
    entry.subscriptions.push({ subscription, forecastAmount });
    entry.total = sumAmounts(entry.subscriptions.map((item) => item.forecastAmount));
    entry.count = entry.subscriptions.length;
  }

  return forecast;
}

function paidSince(payments: PaymentHistory[], since: Date): PaymentHistory[] {
  return payments.filter((payment) => payment.isPaid() && payment.paymentDate.getTime() >= since.getTime());
}

/**
 * Groups payment amounts under every key `keysOf` returns for the payment.
 */
function totalsByKey(payments: PaymentHistory[], keysOf: (payment: PaymentHistory) => string[]): Record<string, SpendingTotal> {
  const amounts: Record<string, number[]> = {};
  for (const payment of payments) {
    for (const key of keysOf(payment)) {
      if (!(key in amounts)) {
        amounts[key] = [];
      }
      amounts[key].push(payment.amount);
    }
  }

  const totals: Record<string, SpendingTotal> = {};
  for (const [key, values] of Object.entries(amounts)) {
    totals[key] = { total: sumAmounts(values), count: values.length };
  }
  return totals;
}

/**
 * Paid amounts since `since`, keyed by currency code.
 */
export function getSpendingByCurrency(payments: PaymentHistory[], since: Date): Record<string, SpendingTotal> {
  return totalsByKey(paidSince(payments, since), (payment) => [payment.currency]);
}

/**
 * Paid amounts of the last `months` months grouped by `YYYY-MM`, oldest month first.
 * Currencies are not separated.
 */
export function getMonthlySpending(payments: PaymentHistory[], months: number, now: Date): MonthlySpending[] {
  const since = dayjs.utc(now).subtract(months, 'month').toDate();
  const totals = totalsByKey(paidSince(payments, since), (payment) => [monthKey(payment.paymentDate)]);
  return Object.keys(totals)
    .sort()
    .map((month) => ({ month, ...totals[month] }));
}

/**
 * Paid amounts since `since` keyed by category name. A payment counts once for
 * every category of its subscription; uncategorised subscriptions are not listed.
 */
export function getSpendingByCategory(
  payments: PaymentHistory[],
  subscriptions: Subscription[],
  since: Date,
): Record<string, SpendingTotal> {
  const categoriesById = new Map(subscriptions.map((subscription) => [subscription.id, subscription.categories]));
  return totalsByKey(paidSince(payments, since), (payment) => categoriesById.get(payment.subscriptionId) ?? []);
}

/**
 * Everything the dashboard shows for one user, computed against a single `now`.
 */
export function getDashboard(
  snapshots: SubscriptionSnapshot[],
  payments: PaymentHistory[],
  now: Date,
  options: DashboardOptions = {},
): Dashboard {
  const { startOfMonth } = getMonthBounds(now);
  const subscriptions = snapshots.map(({ subscription }) => subscription);
  const expiredBills = getExpiredBills(snapshots, now).sort(byDueDate);

  return {
    stats: {
      totalSubscriptions: snapshots.length,
      activeSubscriptions: getActiveSubscriptions(snapshots, now).length,
      upcomingBills: getUpcomingBills(snapshots, options.upcomingBillsDays ?? 7, now).length,
      expiredBills: expiredBills.length,
    },
    spendingByCurrency: getSpendingByCurrency(payments, startOfMonth),
    spendingByCategory: getSpendingByCategory(payments, subscriptions, startOfMonth),
    monthlySpending: getMonthlySpending(payments, options.spendingMonths ?? 6, now),
    upcomingBills: getUpcomingBills(snapshots, DASHBOARD_UPCOMING_WINDOW_DAYS, now)
      .sort(byDueDate)
      .slice(0, DASHBOARD_LIST_SIZE),
    expiredBills: expiredBills.slice(0, DASHBOARD_LIST_SIZE),
    currentMonthForecast: getMonthlyForecast(snapshots, now, options.limits),
  };
}

/**
 * Reads one user's subscriptions and payments from the store and builds their
 * dashboard with the configured upcoming window and iteration limits.
 */
export function loadDashboard(
  store: SubscriptionStore,
  userId: string,
  now: Date = new Date(),
  config: AppConfig = loadConfig(),
): Dashboard {
  const snapshots = getSnapshots(store, userId);
  const ids = new Set(snapshots.map(({ subscription }) => subscription.id));
  const payments = store.getPayments().filter((payment) => ids.has(payment.subscriptionId));

  return getDashboard(snapshots, payments, now, {
    upcomingBillsDays: config.upcomingBillsDays,
    limits: config.iterationLimits,
  });
}
