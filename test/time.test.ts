import {
  formatClock,
  formatStamp,
  formatStateStamp,
  listSteps,
  parseReferenceTimestamp,
  parseStamp,
  planCycle,
} from '../src/utils/time.js';
import { utc } from './helpers.js';

describe('planCycle', () => {
  test('floors the reference to the hour and derives every offset', () => {
    const clock = planCycle(utc('2024-07-04T09:42:17.123Z'));
    expect(formatClock(clock)).toEqual({
      current: '2024-07-04T09:00:00.000Z',
      systemStart: '2024-07-04T04:30:00.000Z',
      systemStateEnd: '2024-07-04T05:30:00.000Z',
      systemWarmEnd: '2024-07-04T05:00:00.000Z',
      systemStartForecast: '2024-07-04T09:00:00.000Z',
      systemEnd: '2024-07-04T15:00:00.000Z',
      failTime: '2024-07-04T03:00:00.000Z',
    });
  });

  test('plans the same clock for any reference inside one hour', () => {
    const early = formatClock(planCycle(utc('2024-07-04T09:00:00Z')));
    const late = formatClock(planCycle(utc('2024-07-04T09:59:59.999Z')));
    expect(late).toEqual(early);
    expect(formatClock(planCycle(utc('2024-07-04T10:00:00Z'))).current).toBe('2024-07-04T10:00:00.000Z');
  });

  test('keeps the fields in chronological order', () => {
    const clock = planCycle(utc('2024-12-31T23:59:59Z'));
    const ordered = [clock.failTime, clock.systemStart, clock.systemWarmEnd, clock.systemStateEnd, clock.systemStartForecast, clock.systemEnd];
    const times = ordered.map((date) => date.getTime());
    expect([...times].sort((a, b) => a - b)).toEqual(times);
    expect(clock.current.toISOString()).toBe('2024-12-31T23:00:00.000Z');
  });
});

describe('stamps', () => {
  test('formats both stamp styles in UTC', () => {
    const date = utc('2024-07-04T09:30:00Z');
    expect(formatStamp(date)).toBe('202407040930');
    expect(formatStateStamp(date)).toBe('20240704_0930');
  });

  test('parses valid stamps and rejects rolled-over values', () => {
    expect(parseStamp('202407040930')?.toISOString()).toBe('2024-07-04T09:30:00.000Z');
    expect(parseStamp('202413010000')).toBeNull();
    expect(parseStamp('2024070409')).toBeNull();
  });
});

describe('parseReferenceTimestamp', () => {
  test('reads the short form as UTC', () => {
    expect(parseReferenceTimestamp('2024-07-04 09:20')?.toISOString()).toBe('2024-07-04T09:20:00.000Z');
  });

  test('honours an explicit offset and defaults a bare ISO time to UTC', () => {
    expect(parseReferenceTimestamp('2024-07-04T09:20:00+02:00')?.toISOString()).toBe('2024-07-04T07:20:00.000Z');
    expect(parseReferenceTimestamp('2024-07-04T09:20:00')?.toISOString()).toBe('2024-07-04T09:20:00.000Z');
  });

  test('returns null for blank or unparseable input', () => {
    expect(parseReferenceTimestamp('')).toBeNull();
    expect(parseReferenceTimestamp(undefined)).toBeNull();
    expect(parseReferenceTimestamp('yesterday')).toBeNull();
  });
});

test('listSteps includes both ends', () => {
  const steps = listSteps(utc('2024-07-04T08:00:00Z'), utc('2024-07-04T09:00:00Z'));
  expect(steps.map((step) => step.toISOString())).toEqual([
    '2024-07-04T08:00:00.000Z',
    '2024-07-04T08:30:00.000Z',
    '2024-07-04T09:00:00.000Z',
  ]);
});
