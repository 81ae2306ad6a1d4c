import crypto from 'node:crypto';
import type { CycleConfig } from './config.js';
import { formatClock, planCycle, type CycleClock } from './time.js';
import { clearIngestionFolder, reconcileArchive, stageForIngestion, type ReconcileSummary, type StagingSummary } from './archive.js';
import { fillGaps, type BulkTier, type GapFillSummary } from './gap-filler.js';
import {
  createCommandNowcastPredictor,
  runNowcast,
  unavailablePredictor,
  type NowcastMode,
  type NowcastPredictor,
  type NowcastSummary,
} from './nowcast.js';
import { resolveStartState, type StartClass, type StateResolution } from './states.js';
import { buildSystemName, createSmtpTransport, dispatchStartAlert, type AlertDelivery, type MailTransport } from './alerts.js';
import { buildControlFileName, prepareRun } from './control-file.js';
import { createRunExecutor, type RunExecutor } from './run-executor.js';
import { createRemoteArchive, type RemoteArchive } from './remote-archive.js';
import { createCommandRasterProcessor, passthroughRasterProcessor } from './raster-processor.js';
import { createFetchWithTimeout } from './http-client.js';
import { describeError, err, ok, type CycleIssue, type Result, type Stage } from './errors.js';
import { REQUEST_TIMEOUT_MS } from '../server/runtime.js';

export type CycleStatus = 'completed' | 'degraded' | 'aborted';

export interface CycleDependencies {
  remote: RemoteArchive;
  predictor: NowcastPredictor;
  /** Null when alerting is switched off. */
  transport: MailTransport | null;
  executor: RunExecutor;
}

export interface RunCycleOptions {
  reference: Date;
  now?: () => Date;
}

export interface CycleReport {
  id: string;
  startedAt: string;
  finishedAt: string;
  reference: string;
  clock: Record<keyof CycleClock, string>;
  status: CycleStatus;
  reconcile: Omit<ReconcileSummary, 'issues'> | null;
  gapFill: {
    bulkRequest: { from: string; to: string; tier: BulkTier } | null;
    bulkDownloaded: number;
    filled: string[];
    fromRemote: string[];
    fromStore: string[];
    unresolved: string[];
  } | null;
  nowcast: {
    mode: NowcastMode;
    produced: string[];
    persisted: string[];
    predictorError: string | null;
  } | null;
  staging: Omit<StagingSummary, 'issues'> | null;
  states: {
    startClass: StartClass;
    resolvedStart: string;
    searchedUntil: string;
    missing: number;
  } | null;
  alerts: AlertDelivery[];
  run: {
    controlFilePath: string;
    exitCode: number | null;
    signal: string | null;
    error: string | null;
    durationMs: number;
    logPath: string;
  } | null;
  issues: CycleIssue[];
}

const isoList = (dates: Date[]): string[] => dates.map((date) => date.toISOString());

/** Runs one stage; a thrown error becomes a PrepFailure instead of ending the cycle. */
const guardStage = async <T>(stage: Stage, action: () => Promise<T>): Promise<Result<T, CycleIssue>> => {
  try {
    return ok(await action());
  } catch (error) {
    const message = describeError(error);
    console.error(`[cycle] ${stage} failed: ${message}`);
    return err({ kind: 'PrepFailure', stage, message });
  }
};

export const createCycleDependencies = (config: CycleConfig, executor: RunExecutor = createRunExecutor()): CycleDependencies => {
  const rasterProcessor = config.rasterProcessor.command
    ? createCommandRasterProcessor({ command: config.rasterProcessor.command, args: config.rasterProcessor.args })
    : passthroughRasterProcessor;
  const { smtp } = config.alerts;

  return {
    remote: createRemoteArchive({
      baseUrl: config.remoteArchive.baseUrl,
      username: config.remoteArchive.username,
      password: config.remoteArchive.password ?? config.remoteArchive.username,
      fetchWithTimeout: createFetchWithTimeout(REQUEST_TIMEOUT_MS),
      boundingBox: config.boundingBox,
      rasterProcessor,
    }),
    predictor: config.nowcast.command
      ? createCommandNowcastPredictor({ command: config.nowcast.command, args: config.nowcast.args, cwd: config.baseDir })
      : unavailablePredictor,
    transport:
      config.alerts.enabled && smtp
        ? createSmtpTransport({ ...smtp, password: smtp.password ?? '', sender: config.alerts.sender })
        : null,
    executor,
  };
};

export const buildRunLogName = (config: Pick<CycleConfig, 'domain' | 'subdomain'>): string =>
  `${config.domain}_${config.subdomain}_run.log`;

const resolveStatus = (aborted: boolean, issues: CycleIssue[], resolution: StateResolution | null): CycleStatus => {
  if (aborted) {
    return 'aborted';
  }
  const troubled = issues.some((issue) => issue.kind === 'RunFailure' || issue.kind === 'PrepFailure');
  return troubled || !resolution || resolution.startClass !== 'warm' ? 'degraded' : 'completed';
};

/**
 * One forecast cycle: reconcile the archive, fill gaps, nowcast, stage the
 * precipitation, pick the start state, alert, prepare the control file and run
 * the engine. Stage failures are collected on the report; only an aborting
 * policy or a failed run preparation stops the cycle early.
 */
export const runCycle = async (config: CycleConfig, deps: CycleDependencies, { reference, now = () => new Date() }: RunCycleOptions): Promise<CycleReport> => {
  const startedAt = now();
  const clock = planCycle(reference);
  const issues: CycleIssue[] = [];
  const report: CycleReport = {
    id: crypto.randomUUID(),
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    reference: reference.toISOString(),
    clock: formatClock(clock),
    status: 'completed',
    reconcile: null,
    gapFill: null,
    nowcast: null,
    staging: null,
    states: null,
    alerts: [],
    run: null,
    issues,
  };
  const { paths } = config;
  console.log(`[cycle] Starting cycle for ${clock.current.toISOString()} (${config.domain}/${config.subdomain})`);

  const reconciled = await guardStage('reconcile', () =>
    reconcileArchive({ clock, precipFolder: paths.precip, storeFolder: paths.store }),
  );
  if (reconciled.ok) {
    const { issues: stageIssues, ...summary } = reconciled.value;
    issues.push(...stageIssues);
    report.reconcile = summary;
  } else {
    issues.push(reconciled.error);
  }

  const filled = await guardStage('gap-fill', () =>
    fillGaps({ clock, precipFolder: paths.precip, storeFolder: paths.store, remote: deps.remote }),
  );
  let gapFill: GapFillSummary | null = null;
  if (filled.ok) {
    gapFill = filled.value;
    issues.push(...gapFill.issues);
    report.gapFill = {
      bulkRequest: gapFill.bulkRequest
        ? { from: gapFill.bulkRequest.from.toISOString(), to: gapFill.bulkRequest.to.toISOString(), tier: gapFill.bulkRequest.tier }
        : null,
      bulkDownloaded: gapFill.bulkDownloaded,
      filled: isoList(gapFill.filled),
      fromRemote: isoList(gapFill.fromRemote),
      fromStore: isoList(gapFill.fromStore),
      unresolved: isoList(gapFill.unresolved),
    };
  } else {
    issues.push(filled.error);
  }

  const nowcasted = await guardStage('nowcast', () =>
    runNowcast({
      clock,
      precipFolder: paths.precip,
      predictor: deps.predictor,
      modelName: config.nowcast.model,
      boundingBox: config.boundingBox,
      unresolvedGaps: gapFill ? gapFill.unresolved.length : 0,
      gapTolerance: config.nowcast.gapTolerance,
    }),
  );
  if (nowcasted.ok) {
    const summary: NowcastSummary = nowcasted.value;
    issues.push(...summary.issues);
    report.nowcast = {
      mode: summary.mode,
      produced: isoList(summary.produced),
      persisted: isoList(summary.persisted),
      predictorError: summary.predictorError,
    };
  } else {
    issues.push(nowcasted.error);
  }

  const finish = (aborted: boolean, resolution: StateResolution | null): CycleReport => {
    report.status = resolveStatus(aborted, issues, resolution);
    report.finishedAt = now().toISOString();
    console.log(`[cycle] Cycle for ${clock.current.toISOString()} ${report.status} with ${issues.length} issues`);
    return report;
  };

  if (config.policy.onPrepFailure === 'abort' && issues.some((issue) => issue.kind === 'PrepFailure')) {
    console.error('[cycle] Aborting before the run: a preparation stage failed');
    return finish(true, null);
  }

  issues.push(...(await clearIngestionFolder(paths.ingestion)));
  const staged = await guardStage('stage-ingestion', () =>
    stageForIngestion({ precipFolder: paths.precip, ingestionFolder: paths.ingestion }),
  );
  if (staged.ok) {
    const { issues: stageIssues, ...summary } = staged.value;
    issues.push(...stageIssues);
    report.staging = summary;
  } else {
    issues.push(staged.error);
  }

  const resolvedStates = await guardStage('states', () =>
    resolveStartState({ clock, statesFolder: paths.states, variables: config.stateVariables }),
  );
  if (!resolvedStates.ok) {
    issues.push(resolvedStates.error);
    return finish(true, null);
  }
  const resolution = resolvedStates.value;
  issues.push(...resolution.issues);
  report.states = {
    startClass: resolution.startClass,
    resolvedStart: resolution.resolvedStart.toISOString(),
    searchedUntil: resolution.searchedUntil.toISOString(),
    missing: resolution.missing.length,
  };

  if (deps.transport) {
    report.alerts = await dispatchStartAlert({
      resolution,
      clock,
      enabled: config.alerts.enabled,
      recipients: config.alerts.recipients,
      systemName: buildSystemName(config.systemModel, config.domain, config.subdomain),
      transport: deps.transport,
    });
  } else if (resolution.alert) {
    console.warn(`[alerts] ${resolution.startClass} start not mailed: alerting is disabled`);
  }

  const prepared = await guardStage('prepare', () =>
    prepareRun({
      templatePath: paths.template,
      fields: {
        outputPath: paths.output,
        statesPath: paths.states,
        resolvedStartTime: resolution.resolvedStart,
        forecastStartTime: clock.systemStartForecast,
        warmEndTime: clock.systemWarmEnd,
        stateEndTime: clock.systemStateEnd,
        endTime: clock.systemEnd,
        modelName: config.systemModel,
      },
      dataDir: paths.data,
      outputDir: paths.output,
      controlFileName: buildControlFileName(config.domain, config.subdomain, config.systemModel),
    }),
  );
  if (!prepared.ok) {
    issues.push(prepared.error);
    return finish(true, resolution);
  }

  const outcome = await deps.executor.execute({
    enginePath: config.enginePath,
    workDir: paths.output,
    controlFilePath: prepared.value.controlFilePath,
    logPath: buildRunLogName(config),
    cwd: config.baseDir,
  });
  report.run = {
    controlFilePath: prepared.value.controlFilePath,
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    error: outcome.error,
    durationMs: outcome.durationMs,
    logPath: outcome.logPath,
  };
  if (outcome.error) {
    issues.push({ kind: 'RunFailure', stage: 'run', exitCode: outcome.exitCode, message: outcome.error });
  }

  if (config.policy.clearIngestionAfterRun) {
    issues.push(...(await clearIngestionFolder(paths.ingestion)));
  }

  return finish(false, resolution);
};
