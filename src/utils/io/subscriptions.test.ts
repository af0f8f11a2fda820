import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { getSnapshots, JsonSubscriptionStore, StoreError } from './subscriptions';
import { load } from './io';
import { Subscription } from '../../data/subscription/subscription';
import { PaymentHistory } from '../../data/payment/payment';
import { SubscriptionData } from '../../data/subscription/types';

function makeSubscription(id: string, userId: string = 'user-1'): Subscription {
  return Subscription.create({
    id,
    userId,
    name: `Service ${id}`,
    price: 10,
    currency: 'USD',
    billingCycle: 'monthly',
    startDate: '2024-01-15',
  });
}

describe('JsonSubscriptionStore', () => {
  let dataDir: string;
  let store: JsonSubscriptionStore;

  beforeEach(() => {
    dataDir = mkdtempSync(path.join(tmpdir(), 'bills-store-'));
    store = new JsonSubscriptionStore(dataDir);
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('should start empty when no files exist', () => {
    expect(store.getSubscriptions()).toEqual([]);
    expect(store.getPayments()).toEqual([]);
  });

  it('should persist subscriptions as serialized records', () => {
    store.saveSubscription(makeSubscription('sub-1'));

    const stored = load<SubscriptionData[]>('subscriptions.json', dataDir);
    expect(stored).toHaveLength(1);
    expect(stored[0].startDate).toBe('2024-01-15');
    expect(stored[0].billingCycleDay).toBe(15);
    expect(store.getSubscription('sub-1').name).toBe('Service sub-1');
  });

  it('should update an existing subscription in place', () => {
    const subscription = makeSubscription('sub-1');
    store.saveSubscription(subscription);
    subscription.price = 12.5;
    store.saveSubscription(subscription);

    const all = store.getSubscriptions();
    expect(all).toHaveLength(1);
    expect(all[0].price).toBe(12.5);
  });

  it('should filter subscriptions by user', () => {
    store.saveSubscription(makeSubscription('sub-1', 'user-1'));
    store.saveSubscription(makeSubscription('sub-2', 'user-2'));

    expect(store.getSubscriptions('user-2').map((s) => s.id)).toEqual(['sub-2']);
    expect(store.getSubscriptions()).toHaveLength(2);
  });

  it('should throw for an unknown subscription', () => {
    expect(() => store.getSubscription('nope')).toThrow(StoreError);
    expect(() => store.deleteSubscription('nope')).toThrow('Subscription nope not found');
  });

  it('should delete a subscription without payment history', () => {
    store.saveSubscription(makeSubscription('sub-1'));

    store.deleteSubscription('sub-1');

    expect(store.getSubscriptions()).toEqual([]);
  });

  it('should refuse to delete a subscription with payment history', () => {
    store.saveSubscription(makeSubscription('sub-1'));
    store.addPayment(
      new PaymentHistory({ subscriptionId: 'sub-1', amount: 10, currency: 'USD', paymentDate: '2024-01-15' }),
    );

    expect(() => store.deleteSubscription('sub-1')).toThrow(
      "Subscription 'Service sub-1' has 1 payment history record(s) and cannot be deleted",
    );
    expect(store.getSubscriptions()).toHaveLength(1);
  });

  it('should reject payments for unknown subscriptions', () => {
    expect(() =>
      store.addPayment(
        new PaymentHistory({ subscriptionId: 'ghost', amount: 1, currency: 'USD', paymentDate: '2024-01-01' }),
      ),
    ).toThrow(StoreError);
  });

  it('should count only paid payments', () => {
    store.saveSubscription(makeSubscription('sub-1'));
    store.addPayment(
      new PaymentHistory({ subscriptionId: 'sub-1', amount: 10, currency: 'USD', paymentDate: '2024-01-15' }),
    );
    store.addPayment(
      new PaymentHistory({
        subscriptionId: 'sub-1',
        amount: 10,
        currency: 'USD',
        paymentDate: '2024-02-15',
        status: 'failed',
      }),
    );

    expect(store.getPayments('sub-1')).toHaveLength(2);
    expect(store.getPaidPaymentCount('sub-1')).toBe(1);
  });

  it('should build snapshots with paid payment counts', () => {
    store.saveSubscription(makeSubscription('sub-1'));
    store.saveSubscription(makeSubscription('sub-2'));
    store.addPayment(
      new PaymentHistory({ subscriptionId: 'sub-2', amount: 10, currency: 'USD', paymentDate: '2024-01-15' }),
    );

    const snapshots = getSnapshots(store);

    expect(snapshots.map((s) => [s.subscription.id, s.paidPaymentCount])).toEqual([
      ['sub-1', 0],
      ['sub-2', 1],
    ]);
  });
});
