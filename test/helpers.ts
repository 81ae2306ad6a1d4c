import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const utc = (iso: string): Date => new Date(iso);

export const makeTempDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'hydrocycle-'));

export const removeDir = (dir: string): Promise<void> => fs.rm(dir, { recursive: true, force: true });

export const writeFile = async (file: string, content: string = 'raster'): Promise<void> => {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
};

export const listDir = async (dir: string): Promise<string[]> => (await fs.readdir(dir)).sort();

export const qpe = (stamp: string): string => `imerg.qpe.${stamp}.30minAccum.tif`;
export const qpf = (stamp: string): string => `imerg.qpf.${stamp}.30minAccum.tif`;
