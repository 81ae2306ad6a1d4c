import { execFile } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type RunCommand = (command: string, args: string[], options?: { cwd?: string }) => Promise<CommandResult>;

export const execFileAsync: RunCommand = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { cwd: options.cwd, maxBuffer: 10 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        reject(Object.assign(error, { stdout: String(stdout), stderr: String(stderr) }));
        return;
      }
      resolve({ stdout: String(stdout), stderr: String(stderr) });
    });
  });
