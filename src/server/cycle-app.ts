import crypto from 'node:crypto';
import express, { type Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { IS_PRODUCTION, CORS_ALLOWLIST, RATE_LIMIT_WINDOW_MS, RATE_LIMIT_MAX_REQUESTS } from './runtime.js';
import { registerHealthRoutes } from '../routes/health.js';
import { registerCycleRoutes } from '../routes/cycles.js';
import type { CycleRunner } from './cycle-runner.js';
import type { CycleLog } from '../utils/cycle-log.js';

interface CreateCycleAppOptions {
  log: CycleLog;
  runner: CycleRunner;
  secret: string;
  isProduction?: boolean;
  corsAllowlist?: string[];
  /** Budget for `POST /api/cycles/run`; reads are not limited. */
  triggerLimit?: { windowMs: number; max: number };
}

export const createCycleApp = ({
  log,
  runner,
  secret,
  isProduction = IS_PRODUCTION,
  corsAllowlist = CORS_ALLOWLIST,
  triggerLimit = { windowMs: RATE_LIMIT_WINDOW_MS, max: RATE_LIMIT_MAX_REQUESTS },
}: CreateCycleAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(
    cors({
      methods: ['GET', 'POST'],
      origin(origin, callback) {
        if (!origin) {
          callback(null, true);
          return;
        }
        callback(null, corsAllowlist.length ? corsAllowlist.includes(origin) : !isProduction);
      },
    }),
  );
  app.use(compression());
  app.use(helmet());

  app.use((req, res, next) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.setHeader('X-Cycle-Running', String(runner.isRunning()));
    res.on('finish', () => {
      if (!isProduction || res.statusCode >= 500) {
        console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
      }
    });
    next();
  });

  const triggerLimiter = rateLimit({
    windowMs: triggerLimit.windowMs,
    limit: triggerLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many cycle triggers. Please retry later.' },
  });

  registerHealthRoutes(app, { runner, log });
  registerCycleRoutes({ app, log, runner, secret, triggerGuards: [triggerLimiter, express.json({ limit: '1kb' })] });
  return app;
};
