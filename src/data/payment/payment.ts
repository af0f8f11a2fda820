import { v4 as uuidv4 } from 'uuid';
import { PaymentHistoryData, PaymentStatus } from './types';
import { formatDate, parseDate, startOfDay } from '../../utils/date/date';
import type { Subscription } from '../subscription/subscription';

type DefaultedPaymentField = 'id' | 'status' | 'notes' | 'paymentMethodId';

export type PaymentHistoryInput = Omit<PaymentHistoryData, DefaultedPaymentField> &
  Partial<Pick<PaymentHistoryData, DefaultedPaymentField>>;

export type MarkAsPaidOptions = {
  amount?: number;
  paymentDate?: Date;
  paymentMethodId?: string | null;
  currency?: string;
  notes?: string | null;
};

/**
 * A single payment recorded against a subscription
 */
export class PaymentHistory {
  id: string;
  subscriptionId: string;
  amount: number;
  currency: string;
  paymentMethodId: string | null;
  paymentDate: Date;
  status: PaymentStatus;
  notes: string | null;

  constructor(data: PaymentHistoryInput) {
    this.id = data.id || uuidv4();
    this.subscriptionId = data.subscriptionId;
    this.amount = data.amount;
    this.currency = data.currency;
    this.paymentMethodId = data.paymentMethodId ?? null;
    this.paymentDate = parseDate(data.paymentDate);
    this.status = data.status ?? 'paid';
    this.notes = data.notes ?? null;
  }

  isPaid(): boolean {
    return this.status === 'paid';
  }

  serialize(): PaymentHistoryData {
    return {
      id: this.id,
      subscriptionId: this.subscriptionId,
      amount: this.amount,
      currency: this.currency,
      paymentMethodId: this.paymentMethodId,
      paymentDate: formatDate(this.paymentDate),
      status: this.status,
      notes: this.notes,
    };
  }
}

/**
 * Number of paid payments for a subscription. This count is what decides which
 * billing cycle the subscription is on.
 */
export function countPaidPayments(payments: PaymentHistory[], subscriptionId: string): number {
  return payments.filter((payment) => payment.subscriptionId === subscriptionId && payment.isPaid()).length;
}

/**
 * Records a paid payment for the subscription. Amount, method and currency
 * default to the subscription's own; the date defaults to today.
 */
export function markAsPaid(subscription: Subscription, options: MarkAsPaidOptions = {}, now: Date = new Date()): PaymentHistory {
  return new PaymentHistory({
    subscriptionId: subscription.id,
    amount: options.amount ?? subscription.price,
    currency: options.currency ?? subscription.currency,
    paymentMethodId: options.paymentMethodId !== undefined ? options.paymentMethodId : subscription.paymentMethodId,
    paymentDate: formatDate(startOfDay(options.paymentDate ?? now)),
    status: 'paid',
    notes: options.notes ?? null,
  });
}
