import fs from 'node:fs/promises';
import path from 'node:path';
import { formatStamp, parseStamp } from './time.js';
import { describeError, type CycleIssue, type Stage } from './errors.js';
import { debugLog } from '../server/runtime.js';

export type PrecipKind = 'observed' | 'forecast';

export interface PrecipFile {
  kind: PrecipKind;
  timestamp: Date;
  name: string;
  path: string;
}

const KIND_TOKENS: Record<PrecipKind, string> = {
  observed: 'qpe',
  forecast: 'qpf',
};

const PRECIP_NAME_PATTERN = /^([A-Za-z0-9_-]+)\.(qpe|qpf)\.(\d{12})\.(.+)\.tif$/;

export const PRECIP_PREFIX = 'imerg';
export const PRECIP_SUFFIX = '30minAccum';

export const buildPrecipName = (kind: PrecipKind, timestamp: Date): string =>
  `${PRECIP_PREFIX}.${KIND_TOKENS[kind]}.${formatStamp(timestamp)}.${PRECIP_SUFFIX}.tif`;

export const parsePrecipName = (name: string, folder: string = ''): PrecipFile | null => {
  const match = PRECIP_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const timestamp = parseStamp(match[3]);
  if (!timestamp) {
    return null;
  }
  return {
    kind: match[2] === 'qpf' ? 'forecast' : 'observed',
    timestamp,
    name,
    path: path.join(folder, name),
  };
};

/** Swaps the kind token of a forecast name for the observed one; other names come back unchanged. */
export const toObservedName = (name: string): string => {
  const parsed = parsePrecipName(name);
  if (!parsed || parsed.kind !== 'forecast') {
    return name;
  }
  return name.replace(`.${KIND_TOKENS.forecast}.`, `.${KIND_TOKENS.observed}.`);
};

export const listPrecipFiles = async (folder: string): Promise<PrecipFile[]> => {
  const names = await fs.readdir(folder);
  return names
    .map((name) => parsePrecipName(name, folder))
    .filter((file): file is PrecipFile => file !== null)
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.name.localeCompare(b.name));
};

export const latestOf = (files: PrecipFile[], kind: PrecipKind): PrecipFile | null =>
  files
    .filter((file) => file.kind === kind)
    .reduce<PrecipFile | null>((latest, file) => (!latest || file.timestamp > latest.timestamp ? file : latest), null);

export const timestampKeys = (files: PrecipFile[]): Set<number> => new Set(files.map((file) => file.timestamp.getTime()));

export const isNonEmptyFile = async (filePath: string): Promise<boolean> => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
};

export const ensureDir = async (folder: string): Promise<void> => {
  await fs.mkdir(folder, { recursive: true });
};

type FileOperation = 'list' | 'copy' | 'delete' | 'rename' | 'mkdir';

interface GuardedFileOpsOptions {
  stage: Stage;
  tag: string;
  issues: CycleIssue[];
}

/**
 * File operations that record a FileOpFailure and report `false` instead of throwing,
 * so one bad file never ends a pass over a folder.
 */
export const createGuardedFileOps = ({ stage, tag, issues }: GuardedFileOpsOptions) => {
  const guard = async (operation: FileOperation, target: string, action: () => Promise<void>): Promise<boolean> => {
    try {
      await action();
      debugLog(`[${tag}] ${operation} ${target}`);
      return true;
    } catch (error) {
      const message = describeError(error);
      console.warn(`[${tag}] ${operation} failed for ${target}: ${message}`);
      issues.push({ kind: 'FileOpFailure', stage, path: target, operation, message });
      return false;
    }
  };

  return {
    remove: (filePath: string) => guard('delete', filePath, () => fs.rm(filePath)),
    copy: (source: string, destination: string) => guard('copy', `${source} -> ${destination}`, () => fs.copyFile(source, destination)),
    rename: (source: string, destination: string) => guard('rename', `${source} -> ${destination}`, () => fs.rename(source, destination)),
    mkdir: (folder: string) => guard('mkdir', folder, () => ensureDir(folder)),
    list: async (folder: string): Promise<PrecipFile[] | null> => {
      try {
        return await listPrecipFiles(folder);
      } catch (error) {
        const message = describeError(error);
        console.warn(`[${tag}] list failed for ${folder}: ${message}`);
        issues.push({ kind: 'FileOpFailure', stage, path: folder, operation: 'list', message });
        return null;
      }
    },
  };
};
