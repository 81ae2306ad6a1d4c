import fs from 'node:fs/promises';
import path from 'node:path';
import { fillGaps, planBulkRequest } from '../src/utils/gap-filler.js';
import { parsePrecipName } from '../src/utils/precip-files.js';
import { listSteps, planCycle } from '../src/utils/time.js';
import { createFakeRemote } from './fakes.js';
import { listDir, makeTempDir, qpe, qpf, removeDir, utc, writeFile } from './helpers.js';

const clock = planCycle(utc('2024-07-04T09:00:00Z'));
const iso = (dates: Date[]) => dates.map((date) => date.toISOString());

let root: string;
let precip: string;
let store: string;

beforeEach(async () => {
  root = await makeTempDir();
  precip = path.join(root, 'precip');
  store = path.join(root, 'store');
});

afterEach(async () => {
  await removeDir(root);
});

describe('planBulkRequest', () => {
  test('requests the whole span for an empty archive', () => {
    const request = planBulkRequest(clock, null);
    expect(request?.from.toISOString()).toBe('2024-07-03T23:30:00.000Z');
    expect(request?.to.toISOString()).toBe('2024-07-04T05:30:00.000Z');
    expect(request?.tier).toBe('full');
  });

  test('classifies the gap to the horizon', () => {
    expect(planBulkRequest(clock, utc('2024-07-04T05:30:00Z'))).toBeNull();
    expect(planBulkRequest(clock, utc('2024-07-04T04:30:00Z'))?.tier).toBe('patch');
    expect(planBulkRequest(clock, utc('2024-07-04T04:00:00Z'))?.tier).toBe('outage');
  });
});

describe('fillGaps', () => {
  test('rebuilds an empty archive with one bulk request', async () => {
    const span = listSteps(utc('2024-07-03T23:30:00Z'), utc('2024-07-04T05:30:00Z'));
    const remote = createFakeRemote({ bulk: span });

    const summary = await fillGaps({ clock, precipFolder: precip, storeFolder: store, remote });

    expect(remote.rangeCalls).toEqual([{ from: '2024-07-03T23:30:00.000Z', to: '2024-07-04T05:30:00.000Z' }]);
    expect(summary.bulkRequest?.tier).toBe('full');
    expect(summary.bulkDownloaded).toBe(13);
    expect(summary.unresolved).toEqual([]);
    expect(summary.issues).toEqual([]);
    expect(await listDir(precip)).toHaveLength(13);
  });

  test('patches a short gap and falls back to a single download', async () => {
    await writeFile(path.join(precip, qpe('202407040400')));
    await writeFile(path.join(precip, qpe('202407040430')));
    await writeFile(path.join(precip, qpe('202407040500')));
    const remote = createFakeRemote({ listed: [utc('2024-07-04T05:30:00Z')] });

    const summary = await fillGaps({ clock, precipFolder: precip, storeFolder: store, remote });

    expect(remote.rangeCalls).toEqual([{ from: '2024-07-04T05:00:00.000Z', to: '2024-07-04T05:30:00.000Z' }]);
    expect(summary.bulkRequest?.tier).toBe('patch');
    expect(iso(summary.requested)).toEqual(['2024-07-04T05:00:00.000Z', '2024-07-04T05:30:00.000Z']);
    expect(iso(summary.fromRemote)).toEqual(['2024-07-04T05:30:00.000Z']);
    expect(iso(summary.filled)).toEqual(['2024-07-04T05:30:00.000Z']);
    expect(summary.issues).toEqual([
      { kind: 'RemoteUnavailable', stage: 'gap-fill', message: '1 of 1 bulk downloads failed' },
    ]);
    expect(await listDir(precip)).toContain(qpe('202407040530'));
  });

  test('fills an outage from the store and reports what stays missing', async () => {
    await writeFile(path.join(precip, qpe('202407040330')));
    await writeFile(path.join(store, qpf('202407040430')), 'stored forecast');
    const remote = createFakeRemote();

    const summary = await fillGaps({ clock, precipFolder: precip, storeFolder: store, remote });

    expect(summary.bulkRequest?.tier).toBe('outage');
    expect(iso(summary.fromStore)).toEqual(['2024-07-04T04:30:00.000Z']);
    expect(iso(summary.unresolved)).toEqual(['2024-07-04T04:00:00.000Z', '2024-07-04T05:00:00.000Z', '2024-07-04T05:30:00.000Z']);
    expect(summary.issues.map((issue) => issue.kind)).toEqual(['RemoteUnavailable', 'TransientGap', 'TransientGap', 'TransientGap']);
    expect(summary.issues[0].message).toBe('4 of 4 bulk downloads failed');
    expect(await fs.readFile(path.join(precip, qpf('202407040430')), 'utf8')).toBe('stored forecast');
  });

  test('leaves timestamps already on disk out of the bulk request', async () => {
    await writeFile(path.join(precip, qpe('202407040400')));
    await writeFile(path.join(precip, qpf('202407040500')), 'backfilled forecast');
    const remote = createFakeRemote({ bulk: listSteps(utc('2024-07-04T04:00:00Z'), utc('2024-07-04T05:30:00Z')) });

    const summary = await fillGaps({ clock, precipFolder: precip, storeFolder: store, remote });

    expect(remote.rangeCalls).toEqual([{ from: '2024-07-04T04:00:00.000Z', to: '2024-07-04T05:30:00.000Z' }]);
    expect(remote.skipped).toEqual([['2024-07-04T04:00:00.000Z', '2024-07-04T05:00:00.000Z']]);
    expect(summary.bulkRequest?.tier).toBe('outage');
    expect(iso(summary.filled)).toEqual(['2024-07-04T04:30:00.000Z', '2024-07-04T05:30:00.000Z']);
    expect(summary.issues).toEqual([]);

    const names = await listDir(precip);
    expect(names).toEqual([qpe('202407040400'), qpe('202407040430'), qpe('202407040530'), qpf('202407040500')]);
    const stamps = names.map((name) => parsePrecipName(name)?.timestamp.toISOString());
    expect(new Set(stamps).size).toBe(names.length);
    expect(await fs.readFile(path.join(precip, qpf('202407040500')), 'utf8')).toBe('backfilled forecast');
  });

  test('skips the remote when the archive already reaches the horizon', async () => {
    await writeFile(path.join(precip, qpe('202407040530')));
    const remote = createFakeRemote();

    const summary = await fillGaps({ clock, precipFolder: precip, storeFolder: store, remote });

    expect(summary.bulkRequest).toBeNull();
    expect(remote.rangeCalls).toEqual([]);
    expect(iso(summary.requested)).toEqual(['2024-07-04T05:30:00.000Z']);
    expect(summary.issues).toEqual([]);
  });

  test('reports a failed listing lookup and still tries the store', async () => {
    await writeFile(path.join(precip, qpe('202407040500')));
    await writeFile(path.join(store, qpf('202407040530')));
    const remote = createFakeRemote({ listingError: new Error('listing timed out') });

    const summary = await fillGaps({ clock, precipFolder: precip, storeFolder: store, remote });

    expect(iso(summary.fromStore)).toEqual(['2024-07-04T05:30:00.000Z']);
    expect(summary.unresolved).toEqual([]);
    expect(summary.issues).toContainEqual({
      kind: 'RemoteUnavailable',
      stage: 'gap-fill',
      timestamp: '2024-07-04T05:30:00.000Z',
      message: 'listing timed out',
    });
    expect(remote.downloads).toEqual([]);
  });
});
