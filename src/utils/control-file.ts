import fs from 'node:fs/promises';
import path from 'node:path';
import { formatStamp } from './time.js';

export const CONTROL_TOKENS = [
  'OUTPUTPATH',
  'STATESPATH',
  'TIMEBEGIN',
  'TIMEBEGINLR',
  'TIMEWARMEND',
  'TIMESTATE',
  'TIMEEND',
  'SYSTEMMODEL',
] as const;

export type ControlToken = (typeof CONTROL_TOKENS)[number];

export interface ControlFields {
  outputPath: string;
  statesPath: string;
  resolvedStartTime: Date;
  forecastStartTime: Date;
  warmEndTime: Date;
  stateEndTime: Date;
  endTime: Date;
  modelName: string;
}

const TOKEN_PATTERN = /\{([A-Z0-9_]+)\}/g;

/**
 * Replaces `{TOKEN}` occurrences found in `values`; any other `{TOKEN}` stays as written.
 */
export const renderTemplate = (template: string, values: Readonly<Record<string, string>>): string =>
  template.replace(TOKEN_PATTERN, (placeholder: string, token: string) =>
    Object.prototype.hasOwnProperty.call(values, token) ? values[token] : placeholder,
  );

// The engine resolves directories by plain concatenation, so they keep a trailing separator.
const asDirectory = (folder: string): string => (folder.endsWith(path.sep) ? folder : `${folder}${path.sep}`);

export const buildControlTokenTable = (fields: ControlFields): Record<ControlToken, string> => ({
  OUTPUTPATH: asDirectory(fields.outputPath),
  STATESPATH: asDirectory(fields.statesPath),
  TIMEBEGIN: formatStamp(fields.resolvedStartTime),
  TIMEBEGINLR: formatStamp(fields.forecastStartTime),
  TIMEWARMEND: formatStamp(fields.warmEndTime),
  TIMESTATE: formatStamp(fields.stateEndTime),
  TIMEEND: formatStamp(fields.endTime),
  SYSTEMMODEL: fields.modelName,
});

export const buildControlFileName = (domain: string, subdomain: string, model: string): string =>
  `${domain}_${subdomain}_${model}.txt`;

export interface PrepareRunOptions {
  templatePath: string;
  fields: ControlFields;
  dataDir: string;
  outputDir: string;
  controlFileName: string;
}

export interface PreparedRun {
  controlFilePath: string;
  tokens: Record<ControlToken, string>;
}

/**
 * Recreates the data and scratch output directories from nothing, then writes the
 * rendered control file into the output directory.
 */
export const prepareRun = async ({ templatePath, fields, dataDir, outputDir, controlFileName }: PrepareRunOptions): Promise<PreparedRun> => {
  const template = await fs.readFile(templatePath, 'utf8');

  await fs.rm(outputDir, { recursive: true, force: true });
  await fs.rm(dataDir, { recursive: true, force: true });
  await fs.mkdir(outputDir, { recursive: true });
  await fs.mkdir(dataDir, { recursive: true });

  const tokens = buildControlTokenTable(fields);
  const controlFilePath = path.join(outputDir, controlFileName);
  await fs.writeFile(controlFilePath, renderTemplate(template, tokens), 'utf8');

  console.log(`[prepare] Control file written to ${controlFilePath}`);
  return { controlFilePath, tokens };
};
