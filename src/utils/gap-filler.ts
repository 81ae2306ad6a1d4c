import fs from 'node:fs/promises';
import path from 'node:path';
import { addMinutes, formatStamp, listSteps, MINUTE_MS, type CycleClock } from './time.js';
import { createGuardedFileOps, latestOf, timestampKeys } from './precip-files.js';
import type { RemoteArchive } from './remote-archive.js';
import { describeError, errorCode, type CycleIssue } from './errors.js';

export type BulkTier = 'full' | 'patch' | 'outage';

export interface BulkRequest {
  from: Date;
  to: Date;
  tier: BulkTier;
}

export interface GapFillSummary {
  horizon: Date;
  requested: Date[];
  bulkRequest: BulkRequest | null;
  bulkDownloaded: number;
  /** Every timestamp a file was added for, by the bulk request or a single lookup. */
  filled: Date[];
  fromRemote: Date[];
  fromStore: Date[];
  unresolved: Date[];
  issues: CycleIssue[];
}

export interface FillGapsOptions {
  clock: CycleClock;
  precipFolder: string;
  storeFolder: string;
  remote: RemoteArchive;
}

const PATCH_LIMIT_MINUTES = 60;

/** Newest observation the nowcast stage takes as input. */
export const observedHorizon = (clock: CycleClock): Date => addMinutes(clock.current, -210);

/** First observation a cold archive is rebuilt from. */
export const observedSpanStart = (clock: CycleClock): Date => addMinutes(clock.current, -570);

export const planBulkRequest = (clock: CycleClock, latestObserved: Date | null): BulkRequest | null => {
  const horizon = observedHorizon(clock);
  if (!latestObserved) {
    return { from: observedSpanStart(clock), to: horizon, tier: 'full' };
  }
  if (latestObserved >= horizon) {
    return null;
  }
  const gapMinutes = (horizon.getTime() - latestObserved.getTime()) / MINUTE_MS;
  return { from: latestObserved, to: horizon, tier: gapMinutes <= PATCH_LIMIT_MINUTES ? 'patch' : 'outage' };
};

const listStoreNames = async (storeFolder: string, issues: CycleIssue[]): Promise<string[]> => {
  try {
    return (await fs.readdir(storeFolder)).filter((name) => name.endsWith('.tif')).sort();
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      const message = describeError(error);
      console.warn(`[gaps] store listing failed for ${storeFolder}: ${message}`);
      issues.push({ kind: 'FileOpFailure', stage: 'gap-fill', path: storeFolder, operation: 'list', message });
    }
    return [];
  }
};

export const fillGaps = async ({ clock, precipFolder, storeFolder, remote }: FillGapsOptions): Promise<GapFillSummary> => {
  const issues: CycleIssue[] = [];
  const ops = createGuardedFileOps({ stage: 'gap-fill', tag: 'gaps', issues });
  const horizon = observedHorizon(clock);
  const summary: GapFillSummary = {
    horizon,
    requested: [],
    bulkRequest: null,
    bulkDownloaded: 0,
    filled: [],
    fromRemote: [],
    fromStore: [],
    unresolved: [],
    issues,
  };

  if (!(await ops.mkdir(precipFolder))) {
    return summary;
  }
  const initial = await ops.list(precipFolder);
  if (!initial) {
    return summary;
  }

  const latest = latestOf(initial, 'observed');
  const bulkRequest = planBulkRequest(clock, latest ? latest.timestamp : null);
  summary.bulkRequest = bulkRequest;
  const scanStart = latest ? latest.timestamp : observedSpanStart(clock);

  if (!bulkRequest) {
    console.log(`[gaps] Observed archive reaches ${horizon.toISOString()}; nothing to download`);
  } else {
    const range = `${bulkRequest.from.toISOString()} .. ${bulkRequest.to.toISOString()}`;
    if (bulkRequest.tier === 'full') {
      console.log(`[gaps] No observed files in ${precipFolder}; downloading ${range}`);
    } else if (bulkRequest.tier === 'patch') {
      console.log(`[gaps] Latest observed file is within 60 min of the horizon; downloading ${range}`);
    } else {
      console.warn(`[gaps] More than 60 min between latest observed file and the horizon; downloading ${range}`);
    }
    try {
      const result = await remote.downloadRange(bulkRequest.from, bulkRequest.to, precipFolder, timestampKeys(initial));
      summary.bulkDownloaded = result.downloaded.length;
      summary.filled.push(...result.downloaded);
      if (result.failed.length) {
        issues.push({
          kind: 'RemoteUnavailable',
          stage: 'gap-fill',
          message: `${result.failed.length} of ${result.failed.length + result.downloaded.length} bulk downloads failed`,
        });
      }
    } catch (error) {
      const message = describeError(error);
      console.warn(`[gaps] Bulk download failed: ${message}`);
      issues.push({ kind: 'RemoteUnavailable', stage: 'gap-fill', message });
    }
  }

  const refreshed = (await ops.list(precipFolder)) ?? initial;
  const present = timestampKeys(refreshed);
  summary.requested = listSteps(scanStart, horizon);
  const missing = summary.requested.filter((timestamp) => !present.has(timestamp.getTime()));
  if (!missing.length) {
    console.log(`[gaps] ${summary.requested.length} timesteps present, no gaps`);
    return summary;
  }

  console.log(`[gaps] ${missing.length} timesteps still missing after bulk download`);
  const storeNames = await listStoreNames(storeFolder, issues);

  for (const timestamp of missing) {
    const stamp = formatStamp(timestamp);
    let listed = false;
    try {
      listed = await remote.isListed(timestamp);
    } catch (error) {
      const message = describeError(error);
      console.warn(`[gaps] Listing lookup for ${stamp} failed: ${message}`);
      issues.push({ kind: 'RemoteUnavailable', stage: 'gap-fill', timestamp: timestamp.toISOString(), message });
    }

    if (listed) {
      try {
        await remote.download(timestamp, precipFolder);
        summary.fromRemote.push(timestamp);
        summary.filled.push(timestamp);
        console.log(`[gaps] Downloaded ${stamp} from the archive`);
        continue;
      } catch (error) {
        const message = describeError(error);
        console.warn(`[gaps] Download of ${stamp} failed: ${message}`);
        issues.push({ kind: 'RemoteUnavailable', stage: 'gap-fill', timestamp: timestamp.toISOString(), message });
      }
    }

    const storeName = storeNames.find((name) => name.includes(stamp));
    if (storeName && (await ops.copy(path.join(storeFolder, storeName), path.join(precipFolder, storeName)))) {
      summary.fromStore.push(timestamp);
      summary.filled.push(timestamp);
      console.log(`[gaps] Copied ${storeName} from the store`);
      continue;
    }

    console.warn(`[gaps] No source for ${stamp}; leaving the gap`);
    summary.unresolved.push(timestamp);
    issues.push({
      kind: 'TransientGap',
      stage: 'gap-fill',
      timestamp: timestamp.toISOString(),
      message: `No archive or store file for ${stamp}`,
    });
  }

  return summary;
};
