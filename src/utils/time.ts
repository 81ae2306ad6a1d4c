export const MINUTE_MS = 60 * 1000;
export const STEP_MINUTES = 30;

export interface CycleClock {
  current: Date;
  systemStart: Date;
  systemStateEnd: Date;
  systemWarmEnd: Date;
  systemStartForecast: Date;
  systemEnd: Date;
  failTime: Date;
}

export const addMinutes = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * MINUTE_MS);

export const floorToHourUtc = (date: Date): Date => {
  const floored = new Date(date.getTime());
  floored.setUTCMinutes(0, 0, 0);
  return floored;
};

export const planCycle = (reference: Date): CycleClock => {
  const current = floorToHourUtc(reference);
  return {
    current,
    systemStart: addMinutes(current, -270),
    systemStateEnd: addMinutes(current, -210),
    systemWarmEnd: addMinutes(current, -240),
    systemStartForecast: current,
    systemEnd: addMinutes(current, 360),
    failTime: addMinutes(current, -360),
  };
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

const datePart = (date: Date): string => `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}`;

const clockPart = (date: Date): string => `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}`;

/** `YYYYMMDDHHMM` in UTC, the stamp used in precipitation names and control files. */
export const formatStamp = (date: Date): string => `${datePart(date)}${clockPart(date)}`;

/** `YYYYMMDD_HHMM` in UTC, the stamp used in state snapshot names and alert text. */
export const formatStateStamp = (date: Date): string => `${datePart(date)}_${clockPart(date)}`;

export const parseStamp = (stamp: string): Date | null => {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(stamp);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute] = match.map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day, hour, minute));
  // Reject values Date.UTC silently rolls over, e.g. month 13.
  return formatStamp(parsed) === stamp ? parsed : null;
};

/**
 * Accepts `YYYY-MM-DD HH:MM` (read as UTC) or any ISO-8601 string.
 */
export const parseReferenceTimestamp = (value: string | null | undefined): Date | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const trimmed = value.trim();
  const simple = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})$/.exec(trimmed);
  if (simple) {
    return parseStamp(simple.slice(1).join(''));
  }
  const withTimezone = /([zZ]|[+-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? new Date(parsed) : null;
};

/** Every step-aligned instant from `start` through `end`, both inclusive. */
export const listSteps = (start: Date, end: Date, stepMinutes: number = STEP_MINUTES): Date[] => {
  const steps: Date[] = [];
  for (let cursor = start.getTime(); cursor <= end.getTime(); cursor += stepMinutes * MINUTE_MS) {
    steps.push(new Date(cursor));
  }
  return steps;
};

export const formatClock = (clock: CycleClock): Record<keyof CycleClock, string> => ({
  current: clock.current.toISOString(),
  systemStart: clock.systemStart.toISOString(),
  systemStateEnd: clock.systemStateEnd.toISOString(),
  systemWarmEnd: clock.systemWarmEnd.toISOString(),
  systemStartForecast: clock.systemStartForecast.toISOString(),
  systemEnd: clock.systemEnd.toISOString(),
  failTime: clock.failTime.toISOString(),
});
