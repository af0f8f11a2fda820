import { DateString } from '../../utils/date/types';

export type PaymentStatus = 'paid' | 'pending' | 'failed' | 'refunded';

export type PaymentHistoryData = {
  id: string;
  subscriptionId: string;
  amount: number;
  currency: string;
  paymentMethodId: string | null;
  paymentDate: DateString;
  status: PaymentStatus;
  notes: string | null;
};
