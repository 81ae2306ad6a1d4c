import type { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { CycleLog } from '../utils/cycle-log.js';
import type { CycleRunner } from '../server/cycle-runner.js';
import { parseReferenceTimestamp } from '../utils/time.js';
import { describeError } from '../utils/errors.js';

interface CycleRoutesOptions {
  app: Express;
  log: CycleLog;
  runner: CycleRunner;
  secret: string;
  /** Run ahead of the secret check on the trigger route (rate limit, body parser). */
  triggerGuards?: RequestHandler[];
}

const runBodySchema = z
  .object({
    at: z.string().trim().min(1).optional(),
  })
  .strict();

export const registerCycleRoutes = ({ app, log, runner, secret, triggerGuards = [] }: CycleRoutesOptions) => {
  const requireSecret = (req: Request, res: Response, next: NextFunction) => {
    if (secret) {
      const auth = req.headers.authorization ?? '';
      const provided = auth.startsWith('Bearer ') ? auth.slice(7) : '';
      if (provided !== secret) {
        res.status(401).json({ error: 'Unauthorized' });
        return;
      }
    }
    next();
  };

  app.get('/api/cycles', requireSecret, (_req: Request, res: Response) => {
    log.trim();
    res.json(log.list());
  });

  app.get('/api/cycles/latest', requireSecret, (_req: Request, res: Response) => {
    const latest = log.latest();
    if (!latest) {
      res.status(404).json({ error: 'No cycle has run yet' });
      return;
    }
    res.json(latest);
  });

  app.post('/api/cycles/run', ...triggerGuards, requireSecret, (req: Request, res: Response) => {
    const body = runBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid request body', details: body.error.issues.map((issue) => issue.message) });
      return;
    }
    let reference: Date | undefined;
    if (body.data.at) {
      const parsed = parseReferenceTimestamp(body.data.at);
      if (!parsed) {
        res.status(400).json({ error: 'Invalid "at" timestamp; expected "YYYY-MM-DD HH:MM" or ISO-8601' });
        return;
      }
      reference = parsed;
    }

    const run = runner.trigger(reference);
    if (!run) {
      res.status(409).json({ error: 'A cycle is already running' });
      return;
    }
    run.catch((error: unknown) => {
      console.error('[cycle] Triggered cycle crashed:', describeError(error));
    });
    res.status(202).json({ accepted: true, reference: reference ? reference.toISOString() : null });
  });
};
