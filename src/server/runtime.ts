import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseNonNegativeInt = (rawValue: string | undefined, fallback: number): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed >= 0 ? Math.round(parsed) : fallback;
};

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_CYCLE = process.env.DEBUG_CYCLE === 'true';

// 0 disables the HTTP layer's timeout; raster downloads can be slow.
export const REQUEST_TIMEOUT_MS = parseNonNegativeInt(process.env.REQUEST_TIMEOUT_MS, 120_000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CYCLE_LOG_SECRET = process.env.CYCLE_LOG_SECRET || '';
export const REMOTE_ARCHIVE_PASSWORD = process.env.REMOTE_ARCHIVE_PASSWORD || '';
export const SMTP_PASSWORD = process.env.SMTP_PASSWORD || '';

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const debugLog = (...args: unknown[]): void => {
  if (DEBUG_CYCLE) {
    console.log(...args);
  }
};
