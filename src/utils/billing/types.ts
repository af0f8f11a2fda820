/**
 * Billing cycles the engine knows how to step. Persisted data may carry other
 * values; those are stepped like `monthly`.
 */
export type BillingCycle = 'daily' | 'weekly' | 'monthly' | 'quarterly' | 'yearly' | 'one-time';

/**
 * Cycles that repeat, i.e. every known cycle except `one-time`.
 */
export type RecurringBillingCycle = Exclude<BillingCycle, 'one-time'>;

export type SubscriptionStatus = 'active' | 'ended';

/**
 * The subset of a subscription the billing date engine reads.
 * All dates are UTC calendar dates.
 */
export type BillingConfiguration = {
  /** Only used to label log output */
  id?: string;
  billingCycle: string;
  billingInterval: number;
  /** Preferred day of month (1-31) for monthly and quarterly cycles */
  billingCycleDay: number | null;
  firstBillingDate: Date;
  startDate: Date;
  endDate: Date | null;
  price: number;
};

/**
 * Upper bound on loop steps per cycle when walking billing dates.
 */
export type IterationLimits = Record<RecurringBillingCycle, number>;

/**
 * Result of looking for the first billing date inside a window.
 * `undetermined` means the walk hit its iteration limit.
 */
export type BillingOccurrence =
  | { status: 'found'; date: Date; cycle: number }
  | { status: 'none' }
  | { status: 'undetermined' };
