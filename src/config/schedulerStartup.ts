import { isTruthyValue } from './parse';

type SchedulerStartupOptions = {
  env?: NodeJS.ProcessEnv;
  nodeEnv?: string;
};

type SchedulerStartupMode = {
  runInProcessJobs: boolean;
  schedulerEnabled: boolean;
  ledgerReconcileCron: string;
};

const DEFAULT_RECONCILE_CRON = '0 2 * * *';

export function resolveSchedulerStartupMode(options: SchedulerStartupOptions = {}): SchedulerStartupMode {
  const env = options.env ?? process.env;
  const nodeEnv = options.nodeEnv ?? env.NODE_ENV ?? 'development';
  const runInProcessJobs = isTruthyValue(env.RUN_INPROCESS_JOBS);
  const ledgerReconcileCron = env.LEDGER_RECONCILE_CRON?.trim() || DEFAULT_RECONCILE_CRON;

  if (!runInProcessJobs) {
    return { runInProcessJobs, schedulerEnabled: false, ledgerReconcileCron };
  }

  if (nodeEnv === 'development') {
    return {
      runInProcessJobs,
      schedulerEnabled: isTruthyValue(env.ENABLE_SCHEDULER),
      ledgerReconcileCron
    };
  }

  return { runInProcessJobs, schedulerEnabled: true, ledgerReconcileCron };
}
