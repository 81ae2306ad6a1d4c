import fs from 'node:fs/promises';
import path from 'node:path';
import { addMinutes, listSteps, formatStamp, parseStamp } from './time.js';
import { buildPrecipName, ensureDir } from './precip-files.js';
import { basicAuthHeader, DEFAULT_FETCH_HEADERS, type FetchWithTimeout } from './http-client.js';
import { passthroughRasterProcessor, type BoundingBox, type RasterProcessor } from './raster-processor.js';
import { describeError } from './errors.js';
import { debugLog } from '../server/runtime.js';

export interface RangeDownloadResult {
  downloaded: Date[];
  failed: { timestamp: Date; message: string }[];
}

/** Time-indexed source of observed precipitation. */
export interface RemoteArchive {
  /**
   * Downloads every 30-minute step in `[from, to]` whose time is not in `skip`;
   * failures are collected, not thrown.
   */
  downloadRange(from: Date, to: Date, destinationFolder: string, skip?: ReadonlySet<number>): Promise<RangeDownloadResult>;
  /** Whether the archive listing holds the window ending at `timestamp`. Throws when the listing cannot be read. */
  isListed(timestamp: Date): Promise<boolean>;
  /** Fetches one window into `destinationFolder` under its observed name and returns the written path. */
  download(timestamp: Date, destinationFolder: string): Promise<string>;
}

const REMOTE_PREFIX = '3B-HHR-E.MS.MRG.3IMERG.';
const REMOTE_SUFFIX = '.V07B.30min.tif';
const REMOTE_NAME_PATTERN = /3IMERG\.(\d{8})-S(\d{6})-E\d{6}\.\d{4}\.[^/]*30min\.tif$/;

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

const hhmm = (date: Date): string => `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`;

/** Remote files are keyed by accumulation start; the archive names a window by its end. */
export const remoteWindowStart = (timestamp: Date): Date => addMinutes(timestamp, -30);

export const buildRemoteFolder = (timestamp: Date): string => {
  const start = remoteWindowStart(timestamp);
  return `${start.getUTCFullYear()}/${pad(start.getUTCMonth() + 1)}/`;
};

export const buildRemoteFileName = (timestamp: Date): string => {
  const start = remoteWindowStart(timestamp);
  const end = addMinutes(start, 29);
  const day = formatStamp(start).slice(0, 8);
  const minuteOfDay = start.getUTCHours() * 60 + start.getUTCMinutes();
  return `${REMOTE_PREFIX}${day}-S${hhmm(start)}00-E${hhmm(end)}59.${pad(minuteOfDay, 4)}${REMOTE_SUFFIX}`;
};

/** Window end timestamp of a remote file name, or null for anything else. */
export const parseRemoteFileName = (name: string): Date | null => {
  const match = REMOTE_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const start = parseStamp(`${match[1]}${match[2].slice(0, 4)}`);
  return start ? addMinutes(start, 30) : null;
};

const HREF_PATTERN = /href\s*=\s*["']([^"']+)["']/gi;

export const extractListingTimestamps = (html: string): Date[] => {
  const timestamps: Date[] = [];
  for (const match of html.matchAll(HREF_PATTERN)) {
    const href = match[1];
    if (!href.endsWith('30min.tif')) {
      continue;
    }
    const parsed = parseRemoteFileName(href.split('/').pop() ?? href);
    if (parsed) {
      timestamps.push(parsed);
    }
  }
  return timestamps;
};

interface CreateRemoteArchiveOptions {
  baseUrl: string;
  username: string;
  password: string;
  fetchWithTimeout: FetchWithTimeout;
  boundingBox: BoundingBox;
  rasterProcessor?: RasterProcessor;
}

export const createRemoteArchive = ({
  baseUrl,
  username,
  password,
  fetchWithTimeout,
  boundingBox,
  rasterProcessor = passthroughRasterProcessor,
}: CreateRemoteArchiveOptions): RemoteArchive => {
  const root = baseUrl.replace(/\/+$/, '');
  const fetchOptions: RequestInit = {
    headers: { ...DEFAULT_FETCH_HEADERS, Authorization: basicAuthHeader(username, password) },
  };
  // One listing per month folder; callers build a new archive for every cycle.
  const listingCache = new Map<string, Promise<Set<number>>>();

  const fetchListing = async (folder: string): Promise<Set<number>> => {
    const response = await fetchWithTimeout(`${root}/${folder}`, fetchOptions);
    if (!response.ok) {
      throw new Error(`Archive listing ${folder} failed with status ${response.status}`);
    }
    const html = await response.text();
    return new Set(extractListingTimestamps(html).map((timestamp) => timestamp.getTime()));
  };

  const getListing = (folder: string): Promise<Set<number>> => {
    const cached = listingCache.get(folder);
    if (cached) {
      return cached;
    }
    const pending = fetchListing(folder).catch((error: unknown) => {
      listingCache.delete(folder);
      throw error;
    });
    listingCache.set(folder, pending);
    return pending;
  };

  const download = async (timestamp: Date, destinationFolder: string): Promise<string> => {
    const remoteName = buildRemoteFileName(timestamp);
    const url = `${root}/${buildRemoteFolder(timestamp)}${remoteName}`;
    debugLog(`[remote] GET ${url}`);
    const response = await fetchWithTimeout(url, fetchOptions);
    if (!response.ok) {
      throw new Error(`Download of ${remoteName} failed with status ${response.status}`);
    }
    const body = Buffer.from(await response.arrayBuffer());
    if (!body.length) {
      throw new Error(`Download of ${remoteName} returned an empty body`);
    }

    await ensureDir(destinationFolder);
    const rawPath = path.join(destinationFolder, `.download-${remoteName}`);
    const destination = path.join(destinationFolder, buildPrecipName('observed', timestamp));
    await fs.writeFile(rawPath, body);
    try {
      await rasterProcessor.process({ source: rawPath, destination, boundingBox });
    } finally {
      await fs.rm(rawPath, { force: true });
    }
    return destination;
  };

  return {
    async downloadRange(from, to, destinationFolder, skip = new Set<number>()) {
      const result: RangeDownloadResult = { downloaded: [], failed: [] };
      for (const timestamp of listSteps(from, to).filter((step) => !skip.has(step.getTime()))) {
        try {
          await download(timestamp, destinationFolder);
          result.downloaded.push(timestamp);
          console.log(`[remote] Downloaded ${timestamp.toISOString()}`);
        } catch (error) {
          const message = describeError(error);
          console.warn(`[remote] ${timestamp.toISOString()} unavailable: ${message}`);
          result.failed.push({ timestamp, message });
        }
      }
      return result;
    },
    async isListed(timestamp) {
      const listing = await getListing(buildRemoteFolder(timestamp));
      return listing.has(timestamp.getTime());
    },
    download,
  };
};
