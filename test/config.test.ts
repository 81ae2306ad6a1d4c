import fs from 'node:fs/promises';
import path from 'node:path';
import { loadCycleConfig, parseCycleConfig, resolveReferenceInstant } from '../src/utils/config.js';
import { ConfigError } from '../src/utils/errors.js';
import { rawConfig } from './config-fixture.js';
import { makeTempDir, removeDir, utc } from './helpers.js';

const baseDir = path.resolve('/srv/hydro/config');

const configIssues = (raw: unknown): string[] => {
  try {
    parseCycleConfig(raw, baseDir);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
};

describe('parseCycleConfig', () => {
  test('resolves relative paths against the configuration directory and fills defaults', () => {
    const config = parseCycleConfig(rawConfig({ nowcast: { model: 'convlstm', command: 'nowcast-cli', args: ['{MODEL}'] } }), baseDir);

    expect(config.paths.precip).toBe(path.resolve('/srv/hydro/precip'));
    expect(config.paths.template).toBe(path.resolve('/srv/hydro/templates/control_template.txt'));
    expect(config.enginePath).toBe(path.resolve('/srv/hydro/bin/ef5'));
    expect(config.nowcast).toEqual({ model: 'convlstm', command: 'nowcast-cli', args: ['{MODEL}'], gapTolerance: 0 });
    expect(config.policy).toEqual({ onPrepFailure: 'proceed', clearIngestionAfterRun: true });
    expect(config.alerts).toEqual({ enabled: false, recipients: [], sender: 'Real Time Model Alert', smtp: undefined });
    expect(config.hindcast).toEqual({ enabled: false });
    expect(config.cycleLogPath).toBe(path.join(baseDir, 'cycle-log.ndjson'));
    expect(config.baseDir).toBe(baseDir);
  });

  test('takes passwords from the environment when the file has none', () => {
    const config = parseCycleConfig(
      rawConfig({
        alerts: { enabled: true, recipients: ['ops@example.org'], smtp: { host: 'smtp.example.org', user: 'alerts@example.org' } },
      }),
      baseDir,
      { remoteArchivePassword: 'test-secret', smtpPassword: 'test-smtp-secret' },
    );

    expect(config.remoteArchive.password).toBe('test-secret');
    expect(config.alerts.smtp).toEqual({ host: 'smtp.example.org', port: 587, user: 'alerts@example.org', password: 'test-smtp-secret' });
  });

  test('rejects inconsistent settings with one message per problem', () => {
    const issues = configIssues(
      rawConfig({
        boundingBox: { xmin: 2, xmax: 1, ymin: 4.5, ymax: 11.5 },
        alerts: { enabled: true },
        hindcast: { enabled: true, timestamp: 'last tuesday' },
      }),
    );

    expect(issues).toEqual([
      'boundingBox: bounding box minimums must be below maximums',
      'hindcast: hindcast.timestamp must be "YYYY-MM-DD HH:MM" or ISO-8601 when hindcast is enabled',
      'alerts: alerts.smtp is required when alerts are enabled',
    ]);
  });

  test('names missing fields', () => {
    const { stateVariables: _unused, ...withoutStates } = rawConfig();
    expect(configIssues(withoutStates)).toEqual(['stateVariables: Required']);
  });
});

describe('loadCycleConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('reads the file and resolves paths beside it', async () => {
    const file = path.join(dir, 'config', 'cycle.json');
    await fs.mkdir(path.dirname(file));
    await fs.writeFile(file, JSON.stringify(rawConfig()));

    const config = await loadCycleConfig(file);

    expect(config.paths.states).toBe(path.join(dir, 'states'));
    expect(config.remoteArchive.password).toBeUndefined();
  });

  test('wraps unreadable files in a ConfigError', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ not json');

    await expect(loadCycleConfig(file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadCycleConfig(path.join(dir, 'absent.json'))).rejects.toThrow(`Cannot read configuration ${path.join(dir, 'absent.json')}`);
  });
});

describe('resolveReferenceInstant', () => {
  const now = () => utc('2024-07-04T09:42:00Z');

  test('prefers an explicit override', () => {
    const instant = resolveReferenceInstant({ hindcast: { enabled: true, timestamp: '2023-01-01 00:00' } }, '2024-07-04 06:15', now);
    expect(instant.toISOString()).toBe('2024-07-04T06:15:00.000Z');
  });

  test('uses the hindcast timestamp only when hindcast is on', () => {
    expect(resolveReferenceInstant({ hindcast: { enabled: true, timestamp: '2023-01-01 00:00' } }, null, now).toISOString()).toBe(
      '2023-01-01T00:00:00.000Z',
    );
    expect(resolveReferenceInstant({ hindcast: { enabled: false, timestamp: '2023-01-01 00:00' } }, null, now)).toEqual(now());
  });

  test('rejects an unreadable override', () => {
    expect(() => resolveReferenceInstant({ hindcast: { enabled: false } }, 'soon', now)).toThrow(ConfigError);
  });
});
