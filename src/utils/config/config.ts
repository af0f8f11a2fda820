import 'dotenv/config';
import path from 'path';
import { DEFAULT_ITERATION_LIMITS } from '../billing/limits';
import { IterationLimits, RecurringBillingCycle } from '../billing/types';
import { DEFAULT_REMINDER_INTERVALS } from '../../data/subscription/subscription';

export type AppConfig = {
  /** Directory holding the JSON data files */
  dataDir: string;
  iterationLimits: IterationLimits;
  defaultReminderIntervals: number[];
  /** Window used for "upcoming bills" on the dashboard */
  upcomingBillsDays: number;
};

/**
 * Thrown when an environment variable holds a value that cannot be used.
 */
export class ConfigError extends Error {
  variable: string;
  constructor(variable: string, value: string) {
    super(`Invalid value '${value}' for ${variable}`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

function readInteger(env: NodeJS.ProcessEnv, variable: string, fallback: number, minimum: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigError(variable, raw);
  }
  return value;
}

/**
 * Iteration caps must be at least 1; a cap of 0 would leave every forecast undetermined.
 */
function readIterationLimit(env: NodeJS.ProcessEnv, cycle: RecurringBillingCycle): number {
  return readInteger(env, `BILLING_MAX_ITERATIONS_${cycle.toUpperCase()}`, DEFAULT_ITERATION_LIMITS[cycle], 1);
}

function readIntervals(env: NodeJS.ProcessEnv, variable: string): number[] {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return [...DEFAULT_REMINDER_INTERVALS];
  }
  const intervals = raw.split(',').map((part) => Number(part.trim()));
  if (intervals.some((days) => !Number.isInteger(days) || days < 0)) {
    throw new ConfigError(variable, raw);
  }
  return intervals;
}

/**
 * Builds the configuration from environment variables. `.env` is loaded by dotenv on import.
 * @throws ConfigError when a numeric variable is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    dataDir: path.resolve(env.BILLS_DATA_DIR || path.join(process.cwd(), 'data')),
    iterationLimits: {
      daily: readIterationLimit(env, 'daily'),
      weekly: readIterationLimit(env, 'weekly'),
      monthly: readIterationLimit(env, 'monthly'),
      quarterly: readIterationLimit(env, 'quarterly'),
      yearly: readIterationLimit(env, 'yearly'),
    },
    defaultReminderIntervals: readIntervals(env, 'DEFAULT_REMINDER_INTERVALS'),
    upcomingBillsDays: readInteger(env, 'UPCOMING_BILLS_DAYS', 7, 0),
  };
}
