import fs from 'node:fs/promises';
import path from 'node:path';
import { clearIngestionFolder, reconcileArchive, stageForIngestion } from '../src/utils/archive.js';
import { planCycle } from '../src/utils/time.js';
import { listDir, makeTempDir, qpe, qpf, removeDir, utc, writeFile } from './helpers.js';

const clock = planCycle(utc('2024-07-04T09:00:00Z'));

let root: string;
let precip: string;
let store: string;
let ingestion: string;

beforeEach(async () => {
  root = await makeTempDir();
  precip = path.join(root, 'precip');
  store = path.join(root, 'store');
  ingestion = path.join(root, 'ingest');
});

afterEach(async () => {
  await removeDir(root);
});

describe('reconcileArchive', () => {
  test('expires, migrates, discards, purges and prunes in one pass', async () => {
    await writeFile(path.join(precip, qpe('202407032300')));
    await writeFile(path.join(precip, qpe('202407032330')));
    await writeFile(path.join(precip, qpe('202407040430')));
    await writeFile(path.join(precip, qpe('202407040500')));
    await writeFile(path.join(precip, qpe('202407040530')));
    await writeFile(path.join(precip, qpf('202407040830')), 'nowcast-0830');
    await writeFile(path.join(precip, qpf('202407040900')));
    await writeFile(path.join(precip, 'notes.txt'));
    await writeFile(path.join(store, qpf('202407040400')));
    await writeFile(path.join(store, qpf('202407040600')));

    const summary = await reconcileArchive({ clock, precipFolder: precip, storeFolder: store });

    expect(summary).toEqual({
      deletedObserved: 1,
      migratedForecasts: 1,
      discardedForecasts: 1,
      purgedDuplicates: 1,
      prunedStore: 1,
      issues: [],
    });
    expect(await listDir(precip)).toEqual([qpe('202407032330'), qpe('202407040430'), qpe('202407040500'), 'notes.txt']);
    expect(await listDir(store)).toEqual([qpf('202407040600'), qpf('202407040830')]);
    expect(await fs.readFile(path.join(store, qpf('202407040830')), 'utf8')).toBe('nowcast-0830');
  });

  test('treats a missing working folder as empty and still prunes the store', async () => {
    await writeFile(path.join(store, qpf('202407040400')));
    await writeFile(path.join(store, qpf('202407040600')));

    const summary = await reconcileArchive({ clock, precipFolder: precip, storeFolder: store });

    expect(summary).toEqual({
      deletedObserved: 0,
      migratedForecasts: 0,
      discardedForecasts: 0,
      purgedDuplicates: 0,
      prunedStore: 1,
      issues: [],
    });
    expect(await listDir(store)).toEqual([qpf('202407040600')]);
  });

  test('records a FileOpFailure when the working folder cannot be listed', async () => {
    await writeFile(precip, 'not a folder');
    await writeFile(path.join(store, qpf('202407040400')));

    const summary = await reconcileArchive({ clock, precipFolder: precip, storeFolder: store });

    expect(summary.deletedObserved).toBe(0);
    expect(summary.prunedStore).toBe(1);
    expect(summary.issues).toHaveLength(1);
    expect(summary.issues[0]).toMatchObject({ kind: 'FileOpFailure', stage: 'reconcile', path: precip, operation: 'list' });
  });
});

describe('stageForIngestion', () => {
  test('copies every raster and gives forecasts the observed name', async () => {
    await writeFile(path.join(precip, qpe('202407040430')));
    await writeFile(path.join(precip, qpf('202407040930')), 'forecast');
    await writeFile(path.join(precip, 'readme.txt'));

    const summary = await stageForIngestion({ precipFolder: precip, ingestionFolder: ingestion });

    expect(summary).toEqual({ copied: 2, renamed: 1, issues: [] });
    expect(await listDir(ingestion)).toEqual([qpe('202407040430'), qpe('202407040930')]);
    expect(await fs.readFile(path.join(ingestion, qpe('202407040930')), 'utf8')).toBe('forecast');
    expect(await listDir(precip)).toEqual([qpe('202407040430'), qpf('202407040930'), 'readme.txt']);
  });
});

describe('clearIngestionFolder', () => {
  test('treats a missing folder as already clear', async () => {
    expect(await clearIngestionFolder(ingestion)).toEqual([]);
  });

  test('removes rasters and leaves other files', async () => {
    await writeFile(path.join(ingestion, qpe('202407040430')));
    await writeFile(path.join(ingestion, 'keep.txt'));

    expect(await clearIngestionFolder(ingestion)).toEqual([]);
    expect(await listDir(ingestion)).toEqual(['keep.txt']);
  });
});
