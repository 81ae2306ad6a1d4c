import path from 'node:path';
import { addMinutes, formatStamp, listSteps, type CycleClock } from './time.js';
import {
  buildPrecipName,
  createGuardedFileOps,
  isNonEmptyFile,
  listPrecipFiles,
  type PrecipFile,
} from './precip-files.js';
import { observedHorizon } from './gap-filler.js';
import { renderTemplate } from './control-file.js';
import { execFileAsync, type RunCommand } from './process.js';
import type { BoundingBox } from './raster-processor.js';
import { describeError, type CycleIssue } from './errors.js';

export interface NowcastRequest {
  inputs: PrecipFile[];
  timestamps: Date[];
  outputFolder: string;
  modelName: string;
  boundingBox: BoundingBox;
}

/** External predictor that writes forecast rasters for the requested timestamps. */
export interface NowcastPredictor {
  predict(request: NowcastRequest): Promise<PrecipFile[]>;
}

export const unavailablePredictor: NowcastPredictor = {
  predict: async () => {
    throw new Error('No nowcast predictor configured');
  },
};

interface CommandNowcastPredictorOptions {
  command: string;
  args: string[];
  cwd?: string;
  runCommand?: RunCommand;
}

export const createCommandNowcastPredictor = ({ command, args, cwd, runCommand = execFileAsync }: CommandNowcastPredictorOptions): NowcastPredictor => ({
  async predict({ inputs, timestamps, outputFolder, modelName, boundingBox }) {
    if (!timestamps.length) {
      return [];
    }
    const values = {
      INPUTDIR: outputFolder,
      OUTPUTDIR: outputFolder,
      MODEL: modelName,
      START: formatStamp(timestamps[0]),
      END: formatStamp(timestamps[timestamps.length - 1]),
      INPUTCOUNT: String(inputs.length),
      XMIN: String(boundingBox.xmin),
      XMAX: String(boundingBox.xmax),
      YMIN: String(boundingBox.ymin),
      YMAX: String(boundingBox.ymax),
    };
    const { stderr } = await runCommand(
      command,
      args.map((arg) => renderTemplate(arg, values)),
      { cwd },
    );
    if (stderr.trim()) {
      console.warn(`[nowcast] predictor stderr: ${stderr.trim()}`);
    }
    const wanted = new Set(timestamps.map((timestamp) => timestamp.getTime()));
    return (await listPrecipFiles(outputFolder)).filter((file) => file.kind === 'forecast' && wanted.has(file.timestamp.getTime()));
  },
});

/** Every step after the observed horizon through the end of the nowcast. */
export const forecastWindow = (clock: CycleClock): Date[] => listSteps(addMinutes(observedHorizon(clock), 30), addMinutes(clock.current, 150));

export type NowcastMode = 'predicted' | 'persistence' | 'mixed' | 'empty';

export interface NowcastSummary {
  mode: NowcastMode;
  window: Date[];
  produced: Date[];
  persisted: Date[];
  predictorError: string | null;
  issues: CycleIssue[];
}

export interface RunNowcastOptions {
  clock: CycleClock;
  precipFolder: string;
  predictor: NowcastPredictor;
  modelName: string;
  boundingBox: BoundingBox;
  unresolvedGaps: number;
  gapTolerance: number;
}

const findValidTimestamps = async (files: PrecipFile[], window: Date[]): Promise<Set<number>> => {
  const wanted = new Set(window.map((timestamp) => timestamp.getTime()));
  const valid = new Set<number>();
  for (const file of files) {
    const key = file.timestamp.getTime();
    if (wanted.has(key) && !valid.has(key) && (await isNonEmptyFile(file.path))) {
      valid.add(key);
    }
  }
  return valid;
};

const newestValidObserved = async (files: PrecipFile[]): Promise<PrecipFile | null> => {
  const observed = files.filter((file) => file.kind === 'observed').reverse();
  for (const file of observed) {
    if (await isNonEmptyFile(file.path)) {
      return file;
    }
  }
  return null;
};

const resolveMode = (produced: number, persisted: number): NowcastMode => {
  if (!produced) {
    return persisted ? 'persistence' : 'empty';
  }
  return persisted ? 'mixed' : 'predicted';
};

/**
 * Runs the predictor over the reconciled archive and falls back to persistence
 * (the newest observation copied forward) for every window step it did not deliver.
 */
export const runNowcast = async ({
  clock,
  precipFolder,
  predictor,
  modelName,
  boundingBox,
  unresolvedGaps,
  gapTolerance,
}: RunNowcastOptions): Promise<NowcastSummary> => {
  const issues: CycleIssue[] = [];
  const ops = createGuardedFileOps({ stage: 'nowcast', tag: 'nowcast', issues });
  const window = forecastWindow(clock);
  const summary: NowcastSummary = { mode: 'empty', window, produced: [], persisted: [], predictorError: null, issues };

  const inputs = (await listPrecipFiles(precipFolder)).filter((file) => file.kind === 'observed');

  if (unresolvedGaps > gapTolerance) {
    summary.predictorError = `${unresolvedGaps} unresolved gaps exceed the tolerance of ${gapTolerance}`;
    console.warn(`[nowcast] ${summary.predictorError}; using persistence`);
  } else {
    console.log(`[nowcast] Generating ${modelName} nowcast from ${window[0].toISOString()} to ${window[window.length - 1].toISOString()}`);
    try {
      const frames = await predictor.predict({ inputs, timestamps: window, outputFolder: precipFolder, modelName, boundingBox });
      const delivered = await findValidTimestamps(frames, window);
      summary.produced = window.filter((timestamp) => delivered.has(timestamp.getTime()));
      if (summary.produced.length < window.length) {
        summary.predictorError = `Predictor delivered ${summary.produced.length} of ${window.length} frames`;
        console.warn(`[nowcast] ${summary.predictorError}`);
      }
    } catch (error) {
      summary.predictorError = describeError(error);
      console.warn(`[nowcast] Predictor failed: ${summary.predictorError}`);
    }
  }

  const current = await listPrecipFiles(precipFolder);
  const valid = await findValidTimestamps(current, window);
  const pending = window.filter((timestamp) => !valid.has(timestamp.getTime()));
  const source = await newestValidObserved(current);

  if (pending.length && !source) {
    console.error('[nowcast] No observed file to persist; forecast window left incomplete');
    for (const timestamp of pending) {
      issues.push({
        kind: 'TransientGap',
        stage: 'nowcast',
        timestamp: timestamp.toISOString(),
        message: `No forecast or persistence source for ${formatStamp(timestamp)}`,
      });
    }
  } else if (source) {
    if (pending.length) {
      console.log(`[nowcast] Duplicating ${source.name} into ${pending.length} forecast steps`);
    }
    for (const timestamp of pending) {
      if (await ops.copy(source.path, path.join(precipFolder, buildPrecipName('forecast', timestamp)))) {
        summary.persisted.push(timestamp);
      }
    }
  }

  summary.mode = resolveMode(summary.produced.length, summary.persisted.length);
  console.log(`[nowcast] ${summary.mode}: ${summary.produced.length} predicted, ${summary.persisted.length} persisted`);
  return summary;
};
