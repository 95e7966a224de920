import { Router } from 'express';

import { createSystemController } from './system.controller';

export const createSystemRouter = (
  deps: Parameters<typeof createSystemController>[0],
) => {
  const router = Router();
  const controller = createSystemController(deps);

  router.get('/system/status', controller.status);
  router.get('/system/telemetry', controller.telemetry);

  return router;
};
