import fs from 'node:fs';
import path from 'node:path';
import { describeError } from './errors.js';
import type { CycleReport } from './cycle.js';

const MAX_LOG_ENTRIES = 500;
const ONE_WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export interface CycleLog {
  readonly file: string;
  append(report: CycleReport): void;
  /** Newest first. */
  list(): CycleReport[];
  latest(): CycleReport | null;
  trim(): void;
}

const isCycleReport = (value: unknown): value is CycleReport =>
  typeof value === 'object' &&
  value !== null &&
  'id' in value &&
  typeof value.id === 'string' &&
  'startedAt' in value &&
  typeof value.startedAt === 'string' &&
  'status' in value &&
  typeof value.status === 'string';

export const createCycleLog = (file: string, now: () => number = Date.now): CycleLog => {
  const entries: CycleReport[] = [];

  const isWithinOneWeek = (entry: CycleReport) => now() - new Date(entry.startedAt).getTime() <= ONE_WEEK_MS;

  const rewriteFile = () => {
    try {
      const content = entries.length ? entries.map((entry) => JSON.stringify(entry)).join('\n') + '\n' : '';
      fs.writeFileSync(file, content, 'utf8');
    } catch (error) {
      console.error('[cycle-log] rewrite failed:', describeError(error));
    }
  };

  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  } catch (error) {
    console.error('[cycle-log] mkdir failed:', describeError(error));
  }

  // Keep the last week on load and rewrite the file if anything was pruned.
  try {
    if (fs.existsSync(file)) {
      const lines = fs.readFileSync(file, 'utf8').split('\n').filter(Boolean);
      const parsed = lines.flatMap((line) => {
        try {
          const value: unknown = JSON.parse(line);
          return isCycleReport(value) ? [value] : [];
        } catch {
          return [];
        }
      });
      const recent = parsed.filter(isWithinOneWeek).slice(-MAX_LOG_ENTRIES);
      entries.push(...recent);
      if (recent.length !== lines.length) rewriteFile();
    }
  } catch (error) {
    console.error('[cycle-log] load failed:', describeError(error));
  }

  return {
    file,
    append(report) {
      if (entries.length >= MAX_LOG_ENTRIES) entries.shift();
      entries.push(report);
      try {
        fs.appendFileSync(file, JSON.stringify(report) + '\n', 'utf8');
      } catch (error) {
        console.error('[cycle-log] append failed:', describeError(error));
      }
    },
    list: () => [...entries].reverse(),
    latest: () => entries[entries.length - 1] ?? null,
    trim() {
      const before = entries.length;
      const firstRecent = entries.findIndex(isWithinOneWeek);
      if (firstRecent === -1) entries.length = 0;
      else if (firstRecent > 0) entries.splice(0, firstRecent);
      if (entries.length !== before) rewriteFile();
    },
  };
};
