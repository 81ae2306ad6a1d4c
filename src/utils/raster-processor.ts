import fs from 'node:fs/promises';
import { renderTemplate } from './control-file.js';
import { execFileAsync, type RunCommand } from './process.js';

export interface BoundingBox {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
}

export interface RasterJob {
  source: string;
  destination: string;
  boundingBox: BoundingBox;
}

/** Turns a downloaded global raster into the domain raster the archive keeps. */
export interface RasterProcessor {
  process(job: RasterJob): Promise<void>;
}

export const passthroughRasterProcessor: RasterProcessor = {
  process: ({ source, destination }) => fs.copyFile(source, destination),
};

interface CommandRasterProcessorOptions {
  command: string;
  args: string[];
  runCommand?: RunCommand;
}

export const createCommandRasterProcessor = ({ command, args, runCommand = execFileAsync }: CommandRasterProcessorOptions): RasterProcessor => ({
  async process({ source, destination, boundingBox }) {
    const values = {
      INPUT: source,
      OUTPUT: destination,
      XMIN: String(boundingBox.xmin),
      XMAX: String(boundingBox.xmax),
      YMIN: String(boundingBox.ymin),
      YMAX: String(boundingBox.ymax),
    };
    const { stderr } = await runCommand(
      command,
      args.map((arg) => renderTemplate(arg, values)),
    );
    if (stderr.trim()) {
      console.warn(`[raster] ${command} stderr: ${stderr.trim()}`);
    }
  },
});
