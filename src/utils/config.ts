import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import { parseReferenceTimestamp } from './time.js';

const nonEmpty = z.string().trim().min(1);

const boundingBoxSchema = z
  .object({
    xmin: z.number().finite(),
    xmax: z.number().finite(),
    ymin: z.number().finite(),
    ymax: z.number().finite(),
  })
  .refine((box) => box.xmin < box.xmax && box.ymin < box.ymax, { message: 'bounding box minimums must be below maximums' });

const commandSchema = z.object({
  command: nonEmpty.optional(),
  args: z.array(z.string()).default([]),
});

export const cycleConfigSchema = z.object({
  domain: nonEmpty,
  subdomain: nonEmpty,
  systemModel: nonEmpty,
  boundingBox: boundingBoxSchema,
  enginePath: nonEmpty,
  paths: z.object({
    precip: nonEmpty,
    ingestion: nonEmpty,
    states: nonEmpty,
    store: nonEmpty,
    template: nonEmpty,
    data: nonEmpty,
    output: nonEmpty,
  }),
  stateVariables: z.array(nonEmpty).min(1),
  nowcast: commandSchema.extend({
    model: nonEmpty,
    gapTolerance: z.number().int().min(0).default(0),
  }),
  rasterProcessor: commandSchema.default({ args: [] }),
  hindcast: z
    .object({
      enabled: z.boolean().default(false),
      timestamp: z.string().optional(),
    })
    .default({ enabled: false })
    .refine((hindcast) => !hindcast.enabled || parseReferenceTimestamp(hindcast.timestamp) !== null, {
      message: 'hindcast.timestamp must be "YYYY-MM-DD HH:MM" or ISO-8601 when hindcast is enabled',
    }),
  alerts: z
    .object({
      enabled: z.boolean().default(false),
      recipients: z.array(z.string().email()).default([]),
      sender: z.string().default('Real Time Model Alert'),
      smtp: z
        .object({
          host: nonEmpty,
          port: z.number().int().positive().default(587),
          user: nonEmpty,
          password: z.string().optional(),
        })
        .optional(),
    })
    .default({ enabled: false })
    .refine((alerts) => !alerts.enabled || alerts.smtp !== undefined, { message: 'alerts.smtp is required when alerts are enabled' }),
  remoteArchive: z.object({
    baseUrl: z.string().url(),
    username: nonEmpty,
    password: z.string().optional(),
  }),
  policy: z
    .object({
      onPrepFailure: z.enum(['proceed', 'abort']).default('proceed'),
      clearIngestionAfterRun: z.boolean().default(true),
    })
    .default({}),
  cycleLogPath: z.string().optional(),
});

export type CycleConfigInput = z.input<typeof cycleConfigSchema>;
export type ParsedCycleConfig = z.output<typeof cycleConfigSchema>;

export interface CycleConfig extends Omit<ParsedCycleConfig, 'cycleLogPath'> {
  /** Directory relative paths were resolved against. */
  baseDir: string;
  cycleLogPath: string;
}

interface SecretOverrides {
  remoteArchivePassword?: string;
  smtpPassword?: string;
}

const resolveExecutable = (baseDir: string, command: string): string =>
  command.includes('/') || command.includes(path.sep) ? path.resolve(baseDir, command) : command;

export const parseCycleConfig = (raw: unknown, baseDir: string, secrets: SecretOverrides = {}): CycleConfig => {
  const parsed = cycleConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid cycle configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  const config = parsed.data;
  const resolve = (value: string) => path.resolve(baseDir, value);
  const paths = {
    precip: resolve(config.paths.precip),
    ingestion: resolve(config.paths.ingestion),
    states: resolve(config.paths.states),
    store: resolve(config.paths.store),
    template: resolve(config.paths.template),
    data: resolve(config.paths.data),
    output: resolve(config.paths.output),
  };

  return {
    ...config,
    baseDir,
    enginePath: resolveExecutable(baseDir, config.enginePath),
    paths,
    nowcast: {
      ...config.nowcast,
      command: config.nowcast.command ? resolveExecutable(baseDir, config.nowcast.command) : undefined,
    },
    remoteArchive: {
      ...config.remoteArchive,
      password: config.remoteArchive.password || secrets.remoteArchivePassword || undefined,
    },
    alerts: {
      ...config.alerts,
      smtp: config.alerts.smtp
        ? { ...config.alerts.smtp, password: config.alerts.smtp.password || secrets.smtpPassword || undefined }
        : undefined,
    },
    cycleLogPath: config.cycleLogPath ? resolve(config.cycleLogPath) : path.join(baseDir, 'cycle-log.ndjson'),
  };
};

export const loadCycleConfig = async (configPath: string, secrets: SecretOverrides = {}): Promise<CycleConfig> => {
  const absolute = path.resolve(configPath);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(absolute, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${absolute}`, [describeError(error)]);
  }
  return parseCycleConfig(raw, path.dirname(absolute), secrets);
};

/**
 * Picks the instant a cycle is planned from: an explicit override, then the
 * hindcast timestamp when hindcast mode is on, then the wall clock.
 */
export const resolveReferenceInstant = (
  config: Pick<CycleConfig, 'hindcast'>,
  override?: string | null,
  now: () => Date = () => new Date(),
): Date => {
  if (override) {
    const parsed = parseReferenceTimestamp(override);
    if (!parsed) {
      throw new ConfigError(`Invalid reference timestamp "${override}"`, ['expected "YYYY-MM-DD HH:MM" or ISO-8601']);
    }
    return parsed;
  }
  if (config.hindcast.enabled) {
    const parsed = parseReferenceTimestamp(config.hindcast.timestamp);
    if (parsed) {
      return parsed;
    }
  }
  return now();
};
