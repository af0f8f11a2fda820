import { describe, it, expect, vi, afterEach } from 'vitest';

describe('package entry point', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('should import with malformed configuration in the environment', async () => {
    vi.stubEnv('UPCOMING_BILLS_DAYS', 'seven');
    vi.stubEnv('BILLING_MAX_ITERATIONS_MONTHLY', 'lots');
    vi.resetModules();

    const entry = await import('./index');

    expect(entry.computeBillingDate).toBeTypeOf('function');
    expect(() => entry.loadConfig()).toThrow(entry.ConfigError);
  });

  it('should only read the configuration once a store is created', async () => {
    vi.stubEnv('UPCOMING_BILLS_DAYS', 'seven');
    vi.resetModules();

    const { JsonSubscriptionStore } = await import('./index');

    expect(() => new JsonSubscriptionStore()).toThrow("Invalid value 'seven' for UPCOMING_BILLS_DAYS");
    expect(new JsonSubscriptionStore('/tmp/bills-unused').getSubscriptions).toBeTypeOf('function');
  });
});
