import { loadOrDefault, save } from './io';
import { loadConfig } from '../config/config';
import { Subscription } from '../../data/subscription/subscription';
import { SubscriptionData, SubscriptionSnapshot } from '../../data/subscription/types';
import { countPaidPayments, PaymentHistory } from '../../data/payment/payment';
import { PaymentHistoryData } from '../../data/payment/types';
import { debug } from '../logger';

export const SUBSCRIPTIONS_FILE = 'subscriptions.json';
export const PAYMENT_HISTORIES_FILE = 'payment_histories.json';

/**
 * Thrown for unknown ids and for deletions refused by the payment history guard.
 */
export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export interface SubscriptionStore {
  getSubscriptions(userId?: string): Subscription[];
  /** @throws StoreError when no subscription has this id */
  getSubscription(id: string): Subscription;
  saveSubscription(subscription: Subscription): void;
  /** @throws StoreError when the id is unknown or the subscription has payment history */
  deleteSubscription(id: string): void;
  getPayments(subscriptionId?: string): PaymentHistory[];
  /** @throws StoreError when the payment's subscription does not exist */
  addPayment(payment: PaymentHistory): void;
  getPaidPaymentCount(subscriptionId: string): number;
}

/**
 * Subscriptions and payment histories kept as two JSON files in the data directory.
 * Files are re-read on every call, so edits made by other tools are picked up.
 */
export class JsonSubscriptionStore implements SubscriptionStore {
  private dataDir: string;

  /**
   * @param dataDir - Defaults to the configured `BILLS_DATA_DIR`, read when the store is created
   */
  constructor(dataDir: string = loadConfig().dataDir) {
    this.dataDir = dataDir;
  }

  private loadSubscriptions(): SubscriptionData[] {
    return loadOrDefault<SubscriptionData[]>(SUBSCRIPTIONS_FILE, [], this.dataDir);
  }

  private loadPayments(): PaymentHistoryData[] {
    return loadOrDefault<PaymentHistoryData[]>(PAYMENT_HISTORIES_FILE, [], this.dataDir);
  }

  getSubscriptions(userId?: string): Subscription[] {
    return this.loadSubscriptions()
      .filter((data) => userId === undefined || data.userId === userId)
      .map((data) => new Subscription(data));
  }

  getSubscription(id: string): Subscription {
    const data = this.loadSubscriptions().find((s) => s.id === id);
    if (!data) {
      throw new StoreError(`Subscription ${id} not found`);
    }
    return new Subscription(data);
  }

  saveSubscription(subscription: Subscription): void {
    const subscriptions = this.loadSubscriptions();
    const index = subscriptions.findIndex((s) => s.id === subscription.id);
    if (index === -1) {
      subscriptions.push(subscription.serialize());
    } else {
      subscriptions[index] = subscription.serialize();
    }
    save(subscriptions, SUBSCRIPTIONS_FILE, this.dataDir);
    debug('Saved subscription', { subscriptionId: subscription.id, created: index === -1 });
  }

  deleteSubscription(id: string): void {
    const subscription = this.getSubscription(id);
    const reason = subscription.getDeletionBlockReason(this.getPayments(id));
    if (reason) {
      throw new StoreError(reason);
    }
    save(
      this.loadSubscriptions().filter((s) => s.id !== id),
      SUBSCRIPTIONS_FILE,
      this.dataDir,
    );
    debug('Deleted subscription', { subscriptionId: id });
  }

  getPayments(subscriptionId?: string): PaymentHistory[] {
    return this.loadPayments()
      .filter((data) => subscriptionId === undefined || data.subscriptionId === subscriptionId)
      .map((data) => new PaymentHistory(data));
  }

  addPayment(payment: PaymentHistory): void {
    if (!this.loadSubscriptions().some((s) => s.id === payment.subscriptionId)) {
      throw new StoreError(`Subscription ${payment.subscriptionId} not found`);
    }
    save([...this.loadPayments(), payment.serialize()], PAYMENT_HISTORIES_FILE, this.dataDir);
  }

  getPaidPaymentCount(subscriptionId: string): number {
    return countPaidPayments(this.getPayments(subscriptionId), subscriptionId);
  }
}

/**
 * Pairs each subscription with its paid payment count, reading payments once.
 */
export function getSnapshots(store: SubscriptionStore, userId?: string): SubscriptionSnapshot[] {
  const payments = store.getPayments();
  return store.getSubscriptions(userId).map((subscription) => ({
    subscription,
    paidPaymentCount: countPaidPayments(payments, subscription.id),
  }));
}
