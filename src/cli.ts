import { Command, InvalidArgumentError } from 'commander';
import { loadCycleConfig, resolveReferenceInstant, type CycleConfig } from './utils/config.js';
import { createCycleDependencies, runCycle, type CycleReport } from './utils/cycle.js';
import { createCycleLog } from './utils/cycle-log.js';
import { createRunExecutor } from './utils/run-executor.js';
import { ConfigError, describeError } from './utils/errors.js';
import { formatClock, parseReferenceTimestamp, planCycle } from './utils/time.js';
import { createCycleApp } from './server/cycle-app.js';
import { createCycleRunner, DEFAULT_SCHEDULE, scheduleCycles } from './server/cycle-runner.js';
import { startServer } from './server/start-server.js';
import { CYCLE_LOG_SECRET, PORT, REMOTE_ARCHIVE_PASSWORD, SMTP_PASSWORD } from './server/runtime.js';

export const EXIT_SUCCESS = 0;
export const EXIT_CYCLE_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

interface RunCommandOptions {
  config: string;
  at?: string;
  strictExit?: boolean;
}

interface ServeCommandOptions {
  config: string;
  port: number;
  schedule: string;
  manual?: boolean;
}

interface PlanCommandOptions {
  at?: string;
}

const secrets = { remoteArchivePassword: REMOTE_ARCHIVE_PASSWORD, smtpPassword: SMTP_PASSWORD };

/** Completed and degraded cycles exit 0 unless strict mode asks for run failures to surface. */
export const exitCodeFor = (report: Pick<CycleReport, 'status' | 'run'>, strictExit: boolean): number => {
  if (!strictExit) {
    return EXIT_SUCCESS;
  }
  return report.status === 'aborted' || Boolean(report.run?.error) ? EXIT_CYCLE_FAILED : EXIT_SUCCESS;
};

const reportConfigError = (error: ConfigError): number => {
  console.error(`[cycle] ${error.message}`);
  return EXIT_CONFIG_ERROR;
};

export const runOnce = async ({ config: configPath, at, strictExit = false }: RunCommandOptions): Promise<number> => {
  try {
    const config = await loadCycleConfig(configPath, secrets);
    const reference = resolveReferenceInstant(config, at);
    const log = createCycleLog(config.cycleLogPath);
    const report = await runCycle(config, createCycleDependencies(config), { reference });
    log.append(report);
    console.log(JSON.stringify({ id: report.id, status: report.status, issues: report.issues.length, run: report.run }));
    return exitCodeFor(report, strictExit);
  } catch (error) {
    if (error instanceof ConfigError) {
      return reportConfigError(error);
    }
    throw error;
  }
};

const serve = async ({ config: configPath, port, schedule, manual }: ServeCommandOptions): Promise<number> => {
  let config: CycleConfig;
  try {
    config = await loadCycleConfig(configPath, secrets);
  } catch (error) {
    if (error instanceof ConfigError) {
      return reportConfigError(error);
    }
    throw error;
  }
  const log = createCycleLog(config.cycleLogPath);
  const executor = createRunExecutor();
  const runner = createCycleRunner({ config, createDeps: () => createCycleDependencies(config, executor), log });
  const task = manual ? null : scheduleCycles(runner, schedule);
  if (task) {
    console.log(`[cycle] Scheduled cycles on "${schedule}" (UTC)`);
  }
  startServer({
    app: createCycleApp({ log, runner, secret: CYCLE_LOG_SECRET }),
    port,
    onShutdown: () => {
      task?.stop();
    },
  });
  return EXIT_SUCCESS;
};

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
};

const parseAt = (value: string): string => {
  if (!parseReferenceTimestamp(value)) {
    throw new InvalidArgumentError('Expected "YYYY-MM-DD HH:MM" (UTC) or an ISO-8601 timestamp.');
  }
  return value;
};

export const buildProgram = (): Command => {
  const program = new Command();

  program
    .name('hydrocycle')
    .description('Hourly precipitation upkeep and hydrologic forecast runs')
    .version('1.0.0');

  program
    .command('run')
    .description('Run one forecast cycle')
    .requiredOption('-c, --config <file>', 'cycle configuration JSON')
    .option('--at <timestamp>', 'plan the cycle for this instant instead of now', parseAt)
    .option('--strict-exit', 'exit 1 when the run fails or the cycle aborts')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await runOnce(options);
    });

  program
    .command('serve')
    .description('Serve the cycle status API and run cycles on a schedule')
    .requiredOption('-c, --config <file>', 'cycle configuration JSON')
    .option('-p, --port <n>', 'HTTP port', parsePort, PORT)
    .option('--schedule <cron>', 'cron expression for cycles, evaluated in UTC', DEFAULT_SCHEDULE)
    .option('--manual', 'only run cycles triggered through the API')
    .action(async (options: ServeCommandOptions) => {
      process.exitCode = await serve(options);
    });

  program
    .command('plan')
    .description('Print the cycle clock for an instant')
    .option('--at <timestamp>', 'reference instant, defaults to now', parseAt)
    .action((options: PlanCommandOptions) => {
      const reference = (options.at && parseReferenceTimestamp(options.at)) || new Date();
      console.log(JSON.stringify(formatClock(planCycle(reference)), null, 2));
    });

  return program;
};

export const main = async (argv: string[]): Promise<void> => {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    console.error(`[cycle] ${describeError(error)}`);
    process.exitCode = EXIT_CYCLE_FAILED;
  }
};
