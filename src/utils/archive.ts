import fs from 'node:fs/promises';
import path from 'node:path';
import { addMinutes, type CycleClock } from './time.js';
import { createGuardedFileOps, listPrecipFiles, toObservedName, type PrecipFile } from './precip-files.js';
import { describeError, errorCode, type CycleIssue } from './errors.js';

export interface ReconcileArchiveOptions {
  clock: CycleClock;
  precipFolder: string;
  storeFolder: string;
}

export interface ReconcileSummary {
  deletedObserved: number;
  migratedForecasts: number;
  discardedForecasts: number;
  purgedDuplicates: number;
  prunedStore: number;
  issues: CycleIssue[];
}

/** Oldest observed timestamp the working folder keeps. */
export const observedRetentionStart = (clock: CycleClock): Date => addMinutes(clock.failTime, -210);

/** Observed files newer than this are leftovers of an earlier partial cycle. */
export const duplicateObservedBound = (clock: CycleClock): Date => addMinutes(clock.current, -240);

export const storeRetentionStart = (clock: CycleClock): Date => addMinutes(clock.current, -240);

const listWorkingFolder = async (precipFolder: string, issues: CycleIssue[]): Promise<PrecipFile[]> => {
  try {
    return await listPrecipFiles(precipFolder);
  } catch (error) {
    // A fresh install has no working folder yet; the store is still pruned.
    if (errorCode(error) === 'ENOENT') {
      console.log(`[archive] ${precipFolder} does not exist yet; nothing to reconcile there`);
    } else {
      const message = describeError(error);
      console.warn(`[archive] list failed for ${precipFolder}: ${message}`);
      issues.push({ kind: 'FileOpFailure', stage: 'reconcile', path: precipFolder, operation: 'list', message });
    }
    return [];
  }
};

export const reconcileArchive = async ({ clock, precipFolder, storeFolder }: ReconcileArchiveOptions): Promise<ReconcileSummary> => {
  const issues: CycleIssue[] = [];
  const ops = createGuardedFileOps({ stage: 'reconcile', tag: 'archive', issues });
  const summary: ReconcileSummary = {
    deletedObserved: 0,
    migratedForecasts: 0,
    discardedForecasts: 0,
    purgedDuplicates: 0,
    prunedStore: 0,
    issues,
  };

  const files = await listWorkingFolder(precipFolder, issues);
  const observed = files.filter((file) => file.kind === 'observed');
  const forecasts = files.filter((file) => file.kind === 'forecast');

  const retentionStart = observedRetentionStart(clock);
  console.log(`[archive] Deleting observed files older than ${retentionStart.toISOString()}`);
  const survivors: PrecipFile[] = [];
  for (const file of observed) {
    if (file.timestamp < retentionStart) {
      if (await ops.remove(file.path)) summary.deletedObserved += 1;
    } else {
      survivors.push(file);
    }
  }

  console.log(`[archive] Moving forecasts older than ${clock.current.toISOString()} into ${storeFolder}`);
  await ops.mkdir(storeFolder);
  for (const file of forecasts) {
    if (file.timestamp < clock.current) {
      const copied = await ops.copy(file.path, path.join(storeFolder, file.name));
      if (copied && (await ops.remove(file.path))) summary.migratedForecasts += 1;
    } else if (await ops.remove(file.path)) {
      summary.discardedForecasts += 1;
    }
  }

  const duplicateBound = duplicateObservedBound(clock);
  console.log(`[archive] Deleting observed files newer than ${duplicateBound.toISOString()} as probable duplicates`);
  for (const file of survivors) {
    if (file.timestamp > duplicateBound && (await ops.remove(file.path))) {
      summary.purgedDuplicates += 1;
    }
  }

  const storeStart = storeRetentionStart(clock);
  console.log(`[archive] Pruning store entries older than ${storeStart.toISOString()}`);
  const stored = await ops.list(storeFolder);
  for (const file of stored ?? []) {
    if (file.timestamp < storeStart && (await ops.remove(file.path))) {
      summary.prunedStore += 1;
    }
  }

  console.log(
    `[archive] Reconciled: ${summary.deletedObserved} expired, ${summary.migratedForecasts} migrated, ` +
      `${summary.discardedForecasts} stale forecasts, ${summary.purgedDuplicates} duplicates, ${summary.prunedStore} pruned from store`,
  );
  return summary;
};

export interface StageForIngestionOptions {
  precipFolder: string;
  ingestionFolder: string;
}

export interface StagingSummary {
  copied: number;
  renamed: number;
  issues: CycleIssue[];
}

/**
 * Copies the working folder into the engine's ingestion folder and gives every
 * forecast there the observed name; the engine reads a single precipitation series.
 */
export const stageForIngestion = async ({ precipFolder, ingestionFolder }: StageForIngestionOptions): Promise<StagingSummary> => {
  const issues: CycleIssue[] = [];
  const ops = createGuardedFileOps({ stage: 'stage-ingestion', tag: 'archive', issues });
  const summary: StagingSummary = { copied: 0, renamed: 0, issues };

  if (!(await ops.mkdir(ingestionFolder))) {
    return summary;
  }

  let names: string[];
  try {
    names = await fs.readdir(precipFolder);
  } catch (error) {
    const message = describeError(error);
    console.warn(`[archive] list failed for ${precipFolder}: ${message}`);
    issues.push({ kind: 'FileOpFailure', stage: 'stage-ingestion', path: precipFolder, operation: 'list', message });
    return summary;
  }

  for (const name of names.filter((entry) => entry.endsWith('.tif'))) {
    if (await ops.copy(path.join(precipFolder, name), path.join(ingestionFolder, name))) {
      summary.copied += 1;
    }
  }

  const staged = (await ops.list(ingestionFolder)) ?? [];
  for (const file of staged.filter((entry) => entry.kind === 'forecast')) {
    const target = path.join(ingestionFolder, toObservedName(file.name));
    if (await ops.rename(file.path, target)) {
      summary.renamed += 1;
    }
  }

  console.log(`[archive] Staged ${summary.copied} files for ingestion (${summary.renamed} forecasts renamed)`);
  return summary;
};

export const clearIngestionFolder = async (ingestionFolder: string): Promise<CycleIssue[]> => {
  const issues: CycleIssue[] = [];
  const ops = createGuardedFileOps({ stage: 'cleanup', tag: 'archive', issues });
  let names: string[] = [];
  try {
    names = await fs.readdir(ingestionFolder);
  } catch (error) {
    // Nothing staged yet.
    if (errorCode(error) !== 'ENOENT') {
      const message = describeError(error);
      console.warn(`[archive] list failed for ${ingestionFolder}: ${message}`);
      issues.push({ kind: 'FileOpFailure', stage: 'cleanup', path: ingestionFolder, operation: 'list', message });
    }
    return issues;
  }
  for (const name of names.filter((entry) => entry.endsWith('.tif'))) {
    await ops.remove(path.join(ingestionFolder, name));
  }
  return issues;
};
