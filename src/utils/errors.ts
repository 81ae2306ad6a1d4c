export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export type Stage = 'reconcile' | 'gap-fill' | 'nowcast' | 'stage-ingestion' | 'states' | 'prepare' | 'run' | 'cleanup';

export type CycleIssue =
  | { kind: 'TransientGap'; stage: Stage; timestamp: string; message: string }
  | { kind: 'RemoteUnavailable'; stage: Stage; timestamp?: string; message: string }
  | { kind: 'MissingState'; stage: Stage; missing: string[]; message: string }
  | { kind: 'FileOpFailure'; stage: Stage; path: string; operation: string; message: string }
  | { kind: 'RunFailure'; stage: Stage; exitCode: number | null; message: string }
  | { kind: 'PrepFailure'; stage: Stage; message: string };

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export const errorCode = (error: unknown): string | null => {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
