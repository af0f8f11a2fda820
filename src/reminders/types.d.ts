import { Subscription } from '../data/subscription/subscription';
import { EffectiveNotificationSettings, NotificationDefaults } from '../data/subscription/types';
import { SubscriptionStore } from '../utils/io/subscriptions';
import { AppConfig } from '../utils/config/config';

export type Reminder = {
  subscription: Subscription;
  userId: string;
  /** Days left until the bill is due when the reminder goes out */
  daysBefore: number;
  dueDate: Date;
};

export type DispatchedReminder = Reminder & {
  trackingId: string;
  settings: EffectiveNotificationSettings;
};

/**
 * Delivery boundary for reminders (email, webhook). A rejected promise counts as a failed send.
 */
export interface ReminderDispatcher {
  send(reminder: DispatchedReminder): Promise<void>;
  sendDailyStatus(status: DailyStatus): Promise<void>;
}

export type SendRemindersOptions = {
  store: SubscriptionStore;
  dispatcher: ReminderDispatcher;
  /** Notification preferences of the subscription's owner */
  defaultsFor: (userId: string) => NotificationDefaults;
  /** Collect and count reminders without dispatching them */
  dryRun?: boolean;
  userId?: string;
  /** Only remind about bills due in exactly this many days */
  days?: number;
  now?: Date;
  /** Supplies the reminder intervals for users who have none configured */
  config?: AppConfig;
};

export type SendRemindersResult = {
  total: number;
  successCount: number;
  failureCount: number;
  reminders: Reminder[];
};

/**
 * One row of the daily status digest
 */
export type UpcomingReminder = {
  name: string;
  amount: number;
  currency: string;
  /** e.g. `Apr 15, 2024` */
  dueDate: string;
  daysUntil: number;
};

/**
 * The daily status message for one user
 */
export type DailyStatus = {
  userId: string;
  activeSubscriptions: number;
  upcomingReminders: UpcomingReminder[];
  trackingId: string;
};

export type DailyStatusOptions = {
  store: SubscriptionStore;
  dispatcher: ReminderDispatcher;
  userId: string;
  now?: Date;
};
