import express, {
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import { createLogger } from './logging/Logger';
import { createQualityProfilesRouter } from './modules/qualityprofiles/qualityprofiles.routes';
import { createSystemRouter } from './modules/system/system.routes';
import type { ServerContext } from './platform/ServerContext';
import { mapErrorToApiResponse } from './reliability/FailureHandling';

const log = createLogger('http');

export function createApp(context: ServerContext) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  const timeoutMs = context.config.requestTimeoutMs;
  app.use((req, res, next) => {
    const timer = setTimeout(() => {
      if (res.headersSent) return;
      log.warn('request timed out', { method: req.method, path: req.path });
      res.status(504).json({ success: false, errorMessage: 'Gateway Timeout' });
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => clearTimeout(timer));
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/api', createQualityProfilesRouter(context.qualityProfiles));
  app.use(
    '/api',
    createSystemRouter({
      ruleIndex: context.ruleIndex,
      startupTasks: context.startupTasks,
      telemetryStore: context.telemetryStore,
    }),
  );

  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, errorMessage: 'Not Found' });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const { status, body } = mapErrorToApiResponse(err, {
      operation: `${req.method} ${req.path}`,
    });
    res.status(status).json(body);
  });

  return app;
}
