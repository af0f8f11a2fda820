import { describe, it, expect } from 'vitest';
import { PaymentHistory, countPaidPayments, markAsPaid } from './payment';
import { Subscription } from '../subscription/subscription';

describe('PaymentHistory', () => {
  it('should default to a paid payment without notes', () => {
    const payment = new PaymentHistory({
      id: 'pay-1',
      subscriptionId: 'sub-1',
      amount: 9.99,
      currency: 'EUR',
      paymentDate: '2024-03-05',
    });

    expect(payment.isPaid()).toBe(true);
    expect(payment.serialize()).toEqual({
      id: 'pay-1',
      subscriptionId: 'sub-1',
      amount: 9.99,
      currency: 'EUR',
      paymentMethodId: null,
      paymentDate: '2024-03-05',
      status: 'paid',
      notes: null,
    });
  });

  it('should only count paid payments of the given subscription', () => {
    const payments = [
      new PaymentHistory({ subscriptionId: 'sub-1', amount: 5, currency: 'USD', paymentDate: '2024-01-01' }),
      new PaymentHistory({ subscriptionId: 'sub-1', amount: 5, currency: 'USD', paymentDate: '2024-02-01' }),
      new PaymentHistory({
        subscriptionId: 'sub-1',
        amount: 5,
        currency: 'USD',
        paymentDate: '2024-03-01',
        status: 'pending',
      }),
      new PaymentHistory({
        subscriptionId: 'sub-1',
        amount: 5,
        currency: 'USD',
        paymentDate: '2024-03-02',
        status: 'refunded',
      }),
      new PaymentHistory({ subscriptionId: 'sub-2', amount: 5, currency: 'USD', paymentDate: '2024-01-01' }),
    ];

    expect(countPaidPayments(payments, 'sub-1')).toBe(2);
    expect(countPaidPayments(payments, 'sub-3')).toBe(0);
  });
});

describe('markAsPaid', () => {
  const subscription = new Subscription({
    id: 'sub-1',
    userId: 'user-1',
    name: 'Cloud storage',
    price: 2.99,
    currency: 'USD',
    paymentMethodId: 'card-1',
    billingCycle: 'monthly',
    startDate: '2024-01-10',
  });

  it('should default to the subscription price, currency, method and today', () => {
    const payment = markAsPaid(subscription, {}, new Date('2024-04-10T15:30:00Z'));

    expect(payment.subscriptionId).toBe('sub-1');
    expect(payment.serialize()).toMatchObject({
      amount: 2.99,
      currency: 'USD',
      paymentMethodId: 'card-1',
      paymentDate: '2024-04-10',
      status: 'paid',
    });
  });

  it('should take explicit values over the defaults', () => {
    const payment = markAsPaid(
      subscription,
      { amount: 3.49, currency: 'EUR', paymentMethodId: null, paymentDate: new Date('2024-04-02') },
      new Date('2024-04-10'),
    );

    expect(payment.serialize()).toMatchObject({
      amount: 3.49,
      currency: 'EUR',
      paymentMethodId: null,
      paymentDate: '2024-04-02',
    });
  });

  it('should move the next billing date forward by one cycle', () => {
    const now = new Date('2024-01-15');
    const payments = [markAsPaid(subscription, {}, now)];

    expect(subscription.nextBillingDate(countPaidPayments(payments, 'sub-1'), now)).toEqual(new Date('2024-02-10'));
  });
});
