import type { Express, Request, Response } from 'express';
import pkg from '../../package.json' with { type: 'json' };
import type { CycleLog } from '../utils/cycle-log.js';
import type { CycleRunner } from '../server/cycle-runner.js';

const { version } = pkg;

interface HealthOptions {
  runner: Pick<CycleRunner, 'isRunning'>;
  log: Pick<CycleLog, 'latest'>;
}

/** Process liveness plus the outcome of the newest logged cycle; `ok` stays true while the process answers. */
const healthPayload = ({ runner, log }: HealthOptions) => {
  const latest = log.latest();
  return {
    ok: true,
    service: 'hydrocycle-orchestrator',
    version,
    uptime: Math.floor(process.uptime()),
    cycle: {
      running: runner.isRunning(),
      last: latest
        ? {
            id: latest.id,
            current: latest.clock.current,
            status: latest.status,
            finishedAt: latest.finishedAt,
            issues: latest.issues.length,
          }
        : null,
    },
    timestamp: new Date().toISOString(),
  };
};

export const registerHealthRoutes = (app: Express, options: HealthOptions) => {
  const respond = (_req: Request, res: Response) => {
    res.json(healthPayload(options));
  };

  app.get('/healthz', respond);
  app.get('/api/health', respond);
};
