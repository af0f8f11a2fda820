export * from './utils/billing/engine';
export { DEFAULT_ITERATION_LIMITS, getIterationLimit, isRecurringBillingCycle, resolveCycle } from './utils/billing/limits';
export type {
  BillingConfiguration,
  BillingCycle,
  BillingOccurrence,
  IterationLimits,
  RecurringBillingCycle,
  SubscriptionStatus,
} from './utils/billing/types';

export { Subscription, DEFAULT_REMINDER_INTERVALS } from './data/subscription/subscription';
export type {
  EffectiveNotificationSettings,
  NotificationDefaults,
  SubscriptionData,
  SubscriptionDateUpdates,
  SubscriptionInput,
  SubscriptionSnapshot,
} from './data/subscription/types';
export { PaymentHistory, countPaidPayments, markAsPaid } from './data/payment/payment';
export type { MarkAsPaidOptions, PaymentHistoryInput } from './data/payment/payment';
export type { PaymentHistoryData, PaymentStatus } from './data/payment/types';

export { JsonSubscriptionStore, StoreError, getSnapshots } from './utils/io/subscriptions';
export type { SubscriptionStore } from './utils/io/subscriptions';

export * from './dashboard/dashboard';
export type * from './dashboard/types';

export * from './reminders/reminders';
export type * from './reminders/types';

export { loadConfig, ConfigError } from './utils/config/config';
export type { AppConfig } from './utils/config/config';
export { debug, log, warn, err, logger, LogLevel } from './utils/logger';
export { formatDate, parseDate, getMonthBounds, formatDisplayDate } from './utils/date/date';
export type { DateString } from './utils/date/types';
