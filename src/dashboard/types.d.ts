import { IterationLimits } from '../utils/billing/types';
import { Subscription } from '../data/subscription/subscription';

/**
 * A subscription with its computed next billing date
 */
export type BillItem = {
  subscription: Subscription;
  nextBillingDate: Date;
};

export type ForecastEntry = {
  subscription: Subscription;
  forecastAmount: number;
};

export type CurrencyForecast = {
  currency: string;
  total: number;
  count: number;
  subscriptions: ForecastEntry[];
};

/** Keyed by currency code */
export type MonthlyForecast = Record<string, CurrencyForecast>;

export type SpendingTotal = {
  total: number;
  count: number;
};

export type MonthlySpending = SpendingTotal & {
  /** YYYY-MM */
  month: string;
};

export type DashboardStats = {
  totalSubscriptions: number;
  activeSubscriptions: number;
  upcomingBills: number;
  expiredBills: number;
};

export type Dashboard = {
  stats: DashboardStats;
  spendingByCurrency: Record<string, SpendingTotal>;
  spendingByCategory: Record<string, SpendingTotal>;
  monthlySpending: MonthlySpending[];
  upcomingBills: BillItem[];
  expiredBills: BillItem[];
  currentMonthForecast: MonthlyForecast;
};

export type DashboardOptions = {
  /** Window for the upcoming bills count, defaults to 7 days */
  upcomingBillsDays?: number;
  /** Months of spending history, defaults to 6 */
  spendingMonths?: number;
  limits?: Partial<IterationLimits>;
};
