import { describe, expect, it } from 'vitest';
import { resolveSchedulerStartupMode } from './schedulerStartup';
import { getStockPolicy } from './stockPolicy';
import { getStorageConfig } from './storage';

describe('getStockPolicy', () => {
  it('uses the defaults for an empty environment', () => {
    expect(getStockPolicy({})).toEqual({ warningMultiplier: 1.5, defaultLookbackDays: 30, overdrawPolicy: 'clamp' });
  });

  it('reads overrides and ignores unusable values', () => {
    expect(
      getStockPolicy({
        STOCK_WARNING_MULTIPLIER: '2',
        SHORTAGE_LOOKBACK_DAYS: '-4',
        STOCK_OUT_OVERDRAW_POLICY: 'Reject'
      })
    ).toEqual({ warningMultiplier: 2, defaultLookbackDays: 30, overdrawPolicy: 'reject' });
  });
});

describe('getStorageConfig', () => {
  it('defaults to the JSON file store', () => {
    expect(getStorageConfig({})).toEqual({ kind: 'file', filePath: 'stock_monitor_db.json', databaseUrl: null });
  });

  it('selects postgres with its url', () => {
    expect(
      getStorageConfig({ STOCK_STORAGE: 'postgresql', DATABASE_URL: 'postgres://localhost/stock_test' })
    ).toMatchObject({ kind: 'postgres', databaseUrl: 'postgres://localhost/stock_test' });
  });
});

describe('resolveSchedulerStartupMode', () => {
  it('keeps the scheduler off unless in-process jobs are enabled', () => {
    expect(resolveSchedulerStartupMode({ env: {}, nodeEnv: 'production' })).toEqual({
      runInProcessJobs: false,
      schedulerEnabled: false,
      ledgerReconcileCron: '0 2 * * *'
    });
  });

  it('needs an explicit opt-in during development', () => {
    const env = { RUN_INPROCESS_JOBS: 'true' };
    expect(resolveSchedulerStartupMode({ env, nodeEnv: 'development' }).schedulerEnabled).toBe(false);
    expect(
      resolveSchedulerStartupMode({ env: { ...env, ENABLE_SCHEDULER: '1' }, nodeEnv: 'development' }).schedulerEnabled
    ).toBe(true);
  });

  it('runs the scheduler in production with a custom schedule', () => {
    expect(
      resolveSchedulerStartupMode({
        env: { RUN_INPROCESS_JOBS: 'yes', LEDGER_RECONCILE_CRON: '*/15 * * * *' },
        nodeEnv: 'production'
      })
    ).toEqual({ runInProcessJobs: true, schedulerEnabled: true, ledgerReconcileCron: '*/15 * * * *' });
  });
});
