import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { v4 as uuidv4 } from 'uuid';
import { NotificationDefaults, SubscriptionSnapshot } from '../data/subscription/types';
import { getSnapshots } from '../utils/io/subscriptions';
import { daysBetween, startOfDay } from '../utils/date/date';
import { err, log, warn } from '../utils/logger';
import { loadConfig } from '../utils/config/config';
import {
  DailyStatusOptions,
  Reminder,
  SendRemindersOptions,
  SendRemindersResult,
  UpcomingReminder,
} from './types';

dayjs.extend(utc);

const DIGEST_WINDOW_DAYS = 7;
const DIGEST_DATE_FORMAT = 'MMM DD, YYYY';

/**
 * Whole days from `today` until `dueDate`; negative once the bill is overdue.
 */
export function daysUntilDue(today: Date, dueDate: Date): number {
  return daysBetween(today, dueDate);
}

/**
 * Reminder due today for a subscription, if any. With `specificDays` only that
 * offset is checked; otherwise the first interval matching the days left wins,
 * so a subscription gets at most one reminder per run.
 */
export function getRemindersForSubscription(
  snapshot: SubscriptionSnapshot,
  intervals: number[],
  today: Date,
  specificDays?: number,
): Reminder[] {
  const { subscription, paidPaymentCount } = snapshot;
  const dueDate = subscription.nextBillingDate(paidPaymentCount, today);
  if (!dueDate) {
    return [];
  }

  const daysLeft = daysUntilDue(today, dueDate);
  const matched = specificDays !== undefined ? [specificDays] : intervals;

  if (!matched.includes(daysLeft)) {
    return [];
  }

  return [{ subscription, userId: subscription.userId, daysBefore: daysLeft, dueDate }];
}

/**
 * Sends today's reminders for every active subscription with notifications on.
 * A failed send is logged and counted; it does not stop the remaining sends.
 */
export async function sendSubscriptionReminders(options: SendRemindersOptions): Promise<SendRemindersResult> {
  const { store, dispatcher, dryRun = false, userId, days } = options;
  const today = startOfDay(options.now ?? new Date());
  const { defaultReminderIntervals } = options.config ?? loadConfig();
  const defaultsFor = (owner: string): NotificationDefaults => {
    const defaults = options.defaultsFor(owner);
    return defaults.reminderIntervals.length > 0 ? defaults : { ...defaults, reminderIntervals: defaultReminderIntervals };
  };

  if (dryRun) {
    warn('Dry run, no reminders will be sent');
  }

  const reminders: Reminder[] = [];
  for (const snapshot of getSnapshots(store, userId)) {
    const { subscription } = snapshot;
    const defaults = defaultsFor(subscription.userId);
    if (subscription.isEnded(today) || !subscription.areNotificationsEnabled(defaults)) {
      continue;
    }
    const { reminderIntervals } = subscription.getEffectiveNotificationSettings(defaults);
    reminders.push(...getRemindersForSubscription(snapshot, reminderIntervals, today, days));
  }

  let successCount = 0;
  let failureCount = 0;

  for (const reminder of reminders) {
    if (dryRun) {
      log('[DRY RUN]', reminder.subscription.name, { userId: reminder.userId, daysBefore: reminder.daysBefore });
      successCount++;
      continue;
    }

    const trackingId = uuidv4();
    try {
      await dispatcher.send({
        ...reminder,
        trackingId,
        settings: reminder.subscription.getEffectiveNotificationSettings(defaultsFor(reminder.userId)),
      });
      log('Subscription reminder sent', {
        userId: reminder.userId,
        subscriptionId: reminder.subscription.id,
        daysBefore: reminder.daysBefore,
        trackingId,
      });
      successCount++;
    } catch (e) {
      err('Failed to send subscription reminder', {
        userId: reminder.userId,
        subscriptionId: reminder.subscription.id,
        daysBefore: reminder.daysBefore,
        error: e instanceof Error ? e.message : String(e),
      });
      failureCount++;
    }
  }

  log('Send subscription reminders completed', {
    dryRun,
    total: reminders.length,
    successCount,
    failureCount,
  });

  return { total: reminders.length, successCount, failureCount, reminders };
}

/**
 * Bills due within the next week for the daily status digest, soonest first.
 * Includes subscriptions that follow the user's defaults or have notifications switched on.
 */
export function getUpcomingReminders(snapshots: SubscriptionSnapshot[], now: Date): UpcomingReminder[] {
  const today = startOfDay(now);
  const reminders: UpcomingReminder[] = [];

  for (const { subscription, paidPaymentCount } of snapshots) {
    if (subscription.isEnded(today)) {
      continue;
    }
    if (!subscription.useDefaultNotifications && subscription.notificationsEnabled !== true) {
      continue;
    }

    const dueDate = subscription.nextBillingDate(paidPaymentCount, today);
    if (!dueDate) {
      continue;
    }

    const daysUntil = daysUntilDue(today, dueDate);
    if (daysUntil < 0 || daysUntil > DIGEST_WINDOW_DAYS) {
      continue;
    }

    reminders.push({
      name: subscription.name,
      amount: subscription.price,
      currency: subscription.currency,
      dueDate: dayjs.utc(dueDate).format(DIGEST_DATE_FORMAT),
      daysUntil,
    });
  }

  return reminders.sort((a, b) => a.daysUntil - b.daysUntil);
}

/**
 * Sends one user's daily status: their active subscription count and the bills
 * due within the next week.
 * @returns false when the dispatcher failed; the failure is logged, not thrown
 */
export async function sendDailyStatus(options: DailyStatusOptions): Promise<boolean> {
  const { store, dispatcher, userId } = options;
  const now = options.now ?? new Date();
  const snapshots = getSnapshots(store, userId);
  const activeSubscriptions = snapshots.filter(({ subscription }) => !subscription.isEnded(startOfDay(now))).length;
  const upcomingReminders = getUpcomingReminders(snapshots, now);
  const trackingId = uuidv4();

  try {
    await dispatcher.sendDailyStatus({ userId, activeSubscriptions, upcomingReminders, trackingId });
  } catch (e) {
    err('Failed to send daily status notification', {
      userId,
      error: e instanceof Error ? e.message : String(e),
    });
    return false;
  }

  log('Daily status notification sent', {
    userId,
    activeSubscriptions,
    upcomingReminders: upcomingReminders.length,
    trackingId,
  });
  return true;
}
