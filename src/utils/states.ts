import path from 'node:path';
import { addMinutes, formatStateStamp, STEP_MINUTES, type CycleClock } from './time.js';
import { isNonEmptyFile } from './precip-files.js';
import type { CycleIssue } from './errors.js';

export type StartClass = 'cold' | 'warm' | 'degraded';

export interface StateResolution {
  resolvedStart: Date;
  startClass: StartClass;
  /** Last candidate time examined (or reached) by the backward search. */
  searchedUntil: Date;
  /** Snapshot paths missing at the candidates that were rejected. */
  missing: string[];
  alert: boolean;
  issues: CycleIssue[];
}

export interface ResolveStartStateOptions {
  clock: CycleClock;
  statesFolder: string;
  variables: string[];
}

export const buildStateFileName = (variable: string, timestamp: Date): string => `${variable}_${formatStateStamp(timestamp)}.tif`;

const findMissingStates = async (statesFolder: string, variables: string[], timestamp: Date): Promise<string[]> => {
  const missing: string[] = [];
  for (const variable of variables) {
    const statePath = path.join(statesFolder, buildStateFileName(variable, timestamp));
    if (!(await isNonEmptyFile(statePath))) {
      missing.push(statePath);
    }
  }
  return missing;
};

/**
 * Walks back from the planned start in 30-minute steps, staying after the fail time,
 * until every state variable has a non-empty snapshot.
 */
export const resolveStartState = async ({ clock, statesFolder, variables }: ResolveStartStateOptions): Promise<StateResolution> => {
  console.log('[states] Looking for states');
  const missing: string[] = [];
  let candidate = clock.systemStart;
  let complete = false;

  while (!complete && candidate > clock.failTime) {
    const missingHere = await findMissingStates(statesFolder, variables, candidate);
    if (!missingHere.length) {
      complete = true;
    } else {
      for (const statePath of missingHere) {
        console.log(`[states] Missing start state: ${statePath}`);
      }
      missing.push(...missingHere);
      candidate = addMinutes(candidate, -STEP_MINUTES);
    }
  }

  if (!complete) {
    console.warn(`[states] No complete state set after ${clock.failTime.toISOString()}; starting cold at ${clock.systemStart.toISOString()}`);
    return {
      resolvedStart: clock.systemStart,
      startClass: 'cold',
      searchedUntil: candidate,
      missing,
      alert: true,
      issues: [
        {
          kind: 'MissingState',
          stage: 'states',
          missing,
          message: `Missing states from ${formatStateStamp(candidate)} to ${formatStateStamp(clock.systemStart)}`,
        },
      ],
    };
  }

  if (candidate.getTime() === clock.systemStart.getTime()) {
    console.log(`[states] Warm start from ${clock.systemStart.toISOString()}`);
    return { resolvedStart: candidate, startClass: 'warm', searchedUntil: candidate, missing, alert: false, issues: [] };
  }

  console.warn(`[states] Had to use older states from ${candidate.toISOString()}`);
  return { resolvedStart: candidate, startClass: 'degraded', searchedUntil: candidate, missing, alert: true, issues: [] };
};
