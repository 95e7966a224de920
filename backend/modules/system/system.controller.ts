import type { Request, Response } from 'express';

import type { RuleIndex } from '../../rule/RuleIndex';
import type { StartupTaskRunner } from '../../startup/StartupTaskRunner';
import type { TelemetryStore } from '../../telemetry/TelemetryStore';

export function createSystemController(deps: {
  ruleIndex: RuleIndex;
  startupTasks: StartupTaskRunner;
  telemetryStore: TelemetryStore;
}) {
  return {
    status(_req: Request, res: Response) {
      const indexedAt = deps.ruleIndex.lastIndexedAt();
      res.json({
        success: true,
        data: {
          startupTasks: deps.startupTasks.registered(),
          ruleIndex: {
            documents: deps.ruleIndex.count(),
            indexedAt:
              indexedAt === null ? null : new Date(indexedAt).toISOString(),
          },
        },
      });
    },

    telemetry(_req: Request, res: Response) {
      res.json({ success: true, data: deps.telemetryStore.snapshot() });
    },
  };
}
