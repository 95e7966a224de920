import type { Request, Response } from 'express';

import { createLogger } from '../../logging/Logger';
import { mapErrorToApiResponse } from '../../reliability/FailureHandling';
import type { QualityProfilesService } from './qualityprofiles.service';

const log = createLogger('qualityprofiles');

export function createQualityProfilesController(
  service: QualityProfilesService,
) {
  return {
    async search(req: Request, res: Response) {
      try {
        const data = await service.search(req.query);
        // The timeout middleware may already have answered with a 504.
        if (res.headersSent) {
          log.warn('search finished after the response was sent', {
            path: req.path,
          });
          return;
        }
        res.json({ success: true, data });
      } catch (err) {
        const { status, body } = mapErrorToApiResponse(err, {
          operation: 'qualityprofiles.search',
        });
        if (res.headersSent) return;
        res.status(status).json(body);
      }
    },
  };
}
