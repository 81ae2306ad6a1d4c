import cron, { type ScheduledTask } from 'node-cron';
import { resolveReferenceInstant, type CycleConfig } from '../utils/config.js';
import { runCycle, type CycleDependencies, type CycleReport } from '../utils/cycle.js';
import type { CycleLog } from '../utils/cycle-log.js';
import { describeError } from '../utils/errors.js';

export interface CycleRunner {
  isRunning(): boolean;
  /** Starts a cycle and logs its report; null while another cycle is in flight. */
  trigger(reference?: Date): Promise<CycleReport> | null;
}

interface CreateCycleRunnerOptions {
  config: CycleConfig;
  /** Called once per cycle so per-cycle state such as archive listings starts fresh. */
  createDeps: () => CycleDependencies;
  log: CycleLog;
  now?: () => Date;
}

export const createCycleRunner = ({ config, createDeps, log, now = () => new Date() }: CreateCycleRunnerOptions): CycleRunner => {
  let inFlight: Promise<CycleReport> | null = null;

  return {
    isRunning: () => inFlight !== null,
    trigger(reference) {
      if (inFlight) {
        return null;
      }
      const cycleReference = reference ?? resolveReferenceInstant(config, null, now);
      const run = Promise.resolve()
        .then(() => runCycle(config, createDeps(), { reference: cycleReference, now }))
        .then((report) => {
          log.append(report);
          return report;
        })
        .finally(() => {
          inFlight = null;
        });
      inFlight = run;
      return run;
    },
  };
};

export const DEFAULT_SCHEDULE = '5 * * * *';

/** Fires a cycle on the cron expression (UTC); ticks that land on a running cycle are skipped. */
export const scheduleCycles = (runner: CycleRunner, expression: string = DEFAULT_SCHEDULE): ScheduledTask => {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression "${expression}"`);
  }
  return cron.schedule(
    expression,
    () => {
      const run = runner.trigger();
      if (!run) {
        console.warn('[cycle] Scheduled tick skipped: a cycle is still running');
        return;
      }
      run.catch((error: unknown) => {
        console.error('[cycle] Scheduled cycle crashed:', describeError(error));
      });
    },
    { timezone: 'UTC' },
  );
};
