import { v4 as uuidv4 } from 'uuid';
import {
  EffectiveNotificationSettings,
  NotificationDefaults,
  SubscriptionData,
  SubscriptionDateUpdates,
  SubscriptionInput,
} from './types';
import { BillingConfiguration, IterationLimits, SubscriptionStatus } from '../../utils/billing/types';
import {
  computedStatus,
  deriveBillingCycleDay,
  isEnded,
  isOverdue,
  monthlyForecastAmount,
  nextBillingDate,
} from '../../utils/billing/engine';
import { formatDate, parseDate } from '../../utils/date/date';
import type { PaymentHistory } from '../payment/payment';

/**
 * Used when a user has not configured any reminder intervals of their own.
 */
export const DEFAULT_REMINDER_INTERVALS: readonly number[] = [30, 15, 7, 3, 1];

/**
 * A recurring (or one-time) charge the user tracks.
 *
 * Nothing derived from payment history is stored here: the next billing date,
 * overdue flag and status are recomputed from the paid payment count on every read.
 */
export class Subscription {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  price: number;
  currency: string;
  paymentMethodId: string | null;
  categories: string[];

  billingCycle: string;
  billingInterval: number;
  billingCycleDay: number | null;

  startDate: Date;
  firstBillingDate: Date;
  endDate: Date | null;

  websiteUrl: string | null;
  notes: string | null;

  notificationsEnabled: boolean | null;
  emailEnabled: boolean | null;
  webhookEnabled: boolean | null;
  reminderIntervals: number[] | null;
  useDefaultNotifications: boolean;

  /**
   * Restores a subscription from stored or caller data. The billing cycle day is
   * taken as given; use {@link Subscription.create} for new subscriptions.
   * @throws Error if a date string is invalid
   */
  constructor(data: SubscriptionInput) {
    this.id = data.id || uuidv4();
    this.userId = data.userId;
    this.name = data.name;
    this.description = data.description ?? null;
    this.price = data.price;
    this.currency = data.currency;
    this.paymentMethodId = data.paymentMethodId ?? null;
    this.categories = data.categories ?? [];

    this.billingCycle = data.billingCycle;
    this.billingInterval = data.billingInterval ?? 1;
    this.billingCycleDay = data.billingCycleDay ?? null;

    this.startDate = parseDate(data.startDate);
    this.firstBillingDate = data.firstBillingDate ? parseDate(data.firstBillingDate) : this.startDate;
    this.endDate = data.endDate ? parseDate(data.endDate) : null;

    this.websiteUrl = data.websiteUrl ?? null;
    this.notes = data.notes ?? null;

    this.notificationsEnabled = data.notificationsEnabled ?? null;
    this.emailEnabled = data.emailEnabled ?? null;
    this.webhookEnabled = data.webhookEnabled ?? null;
    this.reminderIntervals = data.reminderIntervals ?? null;
    this.useDefaultNotifications = data.useDefaultNotifications ?? true;
  }

  /**
   * Creates a new subscription and fixes its billing cycle day from the start date.
   */
  static create(data: SubscriptionInput): Subscription {
    const subscription = new Subscription(data);
    subscription.setBillingCycleDay();
    return subscription;
  }

  toBillingConfiguration(): BillingConfiguration {
    return {
      id: this.id,
      billingCycle: this.billingCycle,
      billingInterval: this.billingInterval,
      billingCycleDay: this.billingCycleDay,
      firstBillingDate: this.firstBillingDate,
      startDate: this.startDate,
      endDate: this.endDate,
      price: this.price,
    };
  }

  /**
   * Sets the billing cycle day from the start date (monthly and quarterly only).
   */
  setBillingCycleDay(): void {
    this.billingCycleDay = deriveBillingCycleDay(this.billingCycle, this.startDate);
  }

  /**
   * Re-derives the billing cycle day from the first billing date after an edit.
   */
  recalculateBillingCycleDay(): void {
    this.billingCycleDay = deriveBillingCycleDay(this.billingCycle, this.firstBillingDate);
  }

  /**
   * Applies new start and/or first billing dates and recalculates the billing cycle day.
   * The first billing date may precede the start date.
   * @returns false when no date was supplied
   */
  updateDatesAndRecalculate(updates: SubscriptionDateUpdates): boolean {
    if (!updates.startDate && !updates.firstBillingDate) {
      return false;
    }

    if (updates.startDate) {
      this.startDate = updates.startDate;
    }

    if (updates.firstBillingDate) {
      this.firstBillingDate = updates.firstBillingDate;
    }

    this.recalculateBillingCycleDay();
    return true;
  }

  nextBillingDate(paidPaymentCount: number, now: Date): Date | null {
    return nextBillingDate(this.toBillingConfiguration(), paidPaymentCount, now);
  }

  isOverdue(paidPaymentCount: number, now: Date): boolean {
    return isOverdue(this.toBillingConfiguration(), paidPaymentCount, now);
  }

  isEnded(now: Date): boolean {
    return isEnded(this, now);
  }

  computedStatus(now: Date): SubscriptionStatus {
    return computedStatus(this, now);
  }

  monthlyForecastAmount(startOfMonth: Date, endOfMonth: Date, limits?: Partial<IterationLimits>): number | null {
    return monthlyForecastAmount(this.toBillingConfiguration(), startOfMonth, endOfMonth, limits);
  }

  private paymentCount(payments: PaymentHistory[]): number {
    return payments.filter((payment) => payment.subscriptionId === this.id).length;
  }

  /**
   * Subscriptions with any payment history are kept for the audit trail.
   */
  canBeDeleted(payments: PaymentHistory[]): boolean {
    return this.paymentCount(payments) === 0;
  }

  getDeletionBlockReason(payments: PaymentHistory[]): string | null {
    const count = this.paymentCount(payments);
    if (count > 0) {
      return `Subscription '${this.name}' has ${count} payment history record(s) and cannot be deleted`;
    }
    return null;
  }

  /**
   * Per-subscription notification settings, falling back to the user's defaults
   * when `useDefaultNotifications` is set or a value was never chosen.
   */
  getEffectiveNotificationSettings(defaults: NotificationDefaults): EffectiveNotificationSettings {
    const useDefaults = this.useDefaultNotifications;
    const defaultIntervals =
      defaults.reminderIntervals.length > 0 ? defaults.reminderIntervals : [...DEFAULT_REMINDER_INTERVALS];

    return {
      notificationsEnabled: useDefaults || this.notificationsEnabled === null ? true : this.notificationsEnabled,
      emailEnabled: useDefaults || this.emailEnabled === null ? defaults.emailEnabled : this.emailEnabled,
      webhookEnabled: useDefaults || this.webhookEnabled === null ? defaults.webhookEnabled : this.webhookEnabled,
      reminderIntervals: useDefaults || this.reminderIntervals === null ? defaultIntervals : this.reminderIntervals,
      emailAddress: defaults.notificationEmail,
      webhookUrl: defaults.webhookUrl,
    };
  }

  areNotificationsEnabled(defaults: NotificationDefaults): boolean {
    const settings = this.getEffectiveNotificationSettings(defaults);
    return settings.notificationsEnabled && (settings.emailEnabled || settings.webhookEnabled);
  }

  serialize(): SubscriptionData {
    return {
      id: this.id,
      userId: this.userId,
      name: this.name,
      description: this.description,
      price: this.price,
      currency: this.currency,
      paymentMethodId: this.paymentMethodId,
      categories: [...this.categories],
      billingCycle: this.billingCycle,
      billingInterval: this.billingInterval,
      billingCycleDay: this.billingCycleDay,
      startDate: formatDate(this.startDate),
      firstBillingDate: formatDate(this.firstBillingDate),
      endDate: this.endDate ? formatDate(this.endDate) : null,
      websiteUrl: this.websiteUrl,
      notes: this.notes,
      notificationsEnabled: this.notificationsEnabled,
      emailEnabled: this.emailEnabled,
      webhookEnabled: this.webhookEnabled,
      reminderIntervals: this.reminderIntervals ? [...this.reminderIntervals] : null,
      useDefaultNotifications: this.useDefaultNotifications,
    };
  }
}
