import { DateString } from '../../utils/date/types';
import type { Subscription } from './subscription';

export type SubscriptionData = {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  price: number;
  /** ISO 4217 code */
  currency: string;
  paymentMethodId: string | null;
  categories: string[];
  billingCycle: string;
  billingInterval: number;
  billingCycleDay: number | null;
  startDate: DateString;
  firstBillingDate: DateString;
  endDate: DateString | null;
  websiteUrl: string | null;
  notes: string | null;
  notificationsEnabled: boolean | null;
  emailEnabled: boolean | null;
  webhookEnabled: boolean | null;
  reminderIntervals: number[] | null;
  useDefaultNotifications: boolean;
};

/**
 * Notification preferences owned by the user; subscriptions fall back to these.
 */
export type NotificationDefaults = {
  emailEnabled: boolean;
  webhookEnabled: boolean;
  reminderIntervals: number[];
  notificationEmail: string;
  webhookUrl: string | null;
};

export type EffectiveNotificationSettings = {
  notificationsEnabled: boolean;
  emailEnabled: boolean;
  webhookEnabled: boolean;
  reminderIntervals: number[];
  emailAddress: string;
  webhookUrl: string | null;
};

export type SubscriptionDateUpdates = {
  startDate?: Date;
  firstBillingDate?: Date;
};

type DefaultedSubscriptionField =
  | 'id'
  | 'description'
  | 'paymentMethodId'
  | 'categories'
  | 'billingInterval'
  | 'billingCycleDay'
  | 'firstBillingDate'
  | 'endDate'
  | 'websiteUrl'
  | 'notes'
  | 'notificationsEnabled'
  | 'emailEnabled'
  | 'webhookEnabled'
  | 'reminderIntervals'
  | 'useDefaultNotifications';

/**
 * Subscription data as accepted from callers; omitted fields take their defaults.
 * A missing first billing date defaults to the start date.
 */
export type SubscriptionInput = Omit<SubscriptionData, DefaultedSubscriptionField> &
  Partial<Pick<SubscriptionData, DefaultedSubscriptionField>>;

/**
 * A subscription together with its paid payment count, captured at read time.
 */
export type SubscriptionSnapshot = {
  subscription: Subscription;
  paidPaymentCount: number;
};
