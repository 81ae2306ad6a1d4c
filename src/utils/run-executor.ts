import fs from 'node:fs';
import path from 'node:path';
import { spawn } from 'node:child_process';
import Bottleneck from 'bottleneck';
import { describeError } from './errors.js';

export interface RunRequest {
  enginePath: string;
  /** Run folder; a relative `logPath` is placed inside it. */
  workDir: string;
  controlFilePath: string;
  logPath: string;
  /** Directory the engine resolves relative paths in the control file against. */
  cwd: string;
}

export interface LaunchResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunOutcome extends LaunchResult {
  error: string | null;
  durationMs: number;
  logPath: string;
}

export type EngineLauncher = (request: RunRequest) => Promise<LaunchResult>;

/** Runs `engine <controlFile>` with stdout and stderr appended to the run log. */
export const spawnEngine: EngineLauncher = (request) =>
  new Promise((resolve, reject) => {
    const log = fs.createWriteStream(path.resolve(request.workDir, request.logPath), { flags: 'a' });
    log.on('error', reject);
    log.on('open', () => {
      const child = spawn(request.enginePath, [request.controlFilePath], {
        cwd: request.cwd,
        stdio: ['ignore', log, log],
      });
      child.on('error', (error) => {
        log.end();
        reject(error);
      });
      child.on('close', (exitCode, signal) => {
        log.end(() => resolve({ exitCode, signal }));
      });
    });
  });

export interface RunExecutor {
  execute(request: RunRequest): Promise<RunOutcome>;
}

/**
 * One-slot queue around the engine launcher. The caller awaits `execute`, so a cycle
 * stays sequential; extra domains sharing the executor run one after another.
 */
export const createRunExecutor = (launch: EngineLauncher = spawnEngine): RunExecutor => {
  const limiter = new Bottleneck({ maxConcurrent: 1 });

  const supervise = async (pending: RunRequest): Promise<RunOutcome> => {
    const request = { ...pending, logPath: path.resolve(pending.workDir, pending.logPath) };
    const startedAt = Date.now();
    console.log(`[engine] Running ${request.enginePath} ${request.controlFilePath}`);
    try {
      const { exitCode, signal } = await launch(request);
      const durationMs = Date.now() - startedAt;
      if (exitCode === 0) {
        console.log(`[engine] Finished in ${durationMs}ms`);
        return { exitCode, signal, error: null, durationMs, logPath: request.logPath };
      }
      const reason = signal ? `terminated by ${signal}` : `exited with code ${exitCode}`;
      console.error(`[engine] Simulation ${reason}; see ${request.logPath}`);
      return { exitCode, signal, error: `Engine ${reason}`, durationMs, logPath: request.logPath };
    } catch (error) {
      const reason = describeError(error);
      console.error(`[engine] Launch failed: ${reason}`);
      return { exitCode: null, signal: null, error: reason, durationMs: Date.now() - startedAt, logPath: request.logPath };
    }
  };

  return {
    execute: (request) => limiter.schedule(() => supervise(request)),
  };
};
