import { IterationLimits, RecurringBillingCycle } from './types';

/**
 * Daily cycles need many more steps than yearly ones to cross the same span,
 * so the caps shrink as the cycle unit grows.
 */
export const DEFAULT_ITERATION_LIMITS: Readonly<IterationLimits> = {
  daily: 1000,
  weekly: 100,
  monthly: 50,
  quarterly: 50,
  yearly: 50,
};

const RECURRING_CYCLES: readonly RecurringBillingCycle[] = ['daily', 'weekly', 'monthly', 'quarterly', 'yearly'];

export function isRecurringBillingCycle(cycle: string): cycle is RecurringBillingCycle {
  return RECURRING_CYCLES.some((known) => known === cycle);
}

/**
 * Maps any cycle string to the cycle whose arithmetic it uses.
 * Unknown values are treated as monthly.
 */
export function resolveCycle(cycle: string): RecurringBillingCycle {
  return isRecurringBillingCycle(cycle) ? cycle : 'monthly';
}

/**
 * Iteration cap for a cycle
 * @param limits - Overrides merged over the defaults
 */
export function getIterationLimit(cycle: string, limits: Partial<IterationLimits> = {}): number {
  const resolved = resolveCycle(cycle);
  return limits[resolved] ?? DEFAULT_ITERATION_LIMITS[resolved];
}
