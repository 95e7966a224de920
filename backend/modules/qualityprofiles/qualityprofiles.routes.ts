import { Router } from 'express';

import { createQualityProfilesController } from './qualityprofiles.controller';
import type { QualityProfilesService } from './qualityprofiles.service';

export const createQualityProfilesRouter = (service: QualityProfilesService) => {
  const router = Router();
  const controller = createQualityProfilesController(service);

  router.get('/qualityprofiles/search', (req, res, next) => {
    controller.search(req, res).catch(next);
  });

  return router;
};
