import { withSession, type DbClient, type DbSession } from '../db/DbClient';
import { ONE_SHOT_TASK_TYPE, type RuleRecord } from '../db/records';
import { createLogger } from '../logging/Logger';
import type { Clock } from '../platform/Clock';
import { hasOverloadedDebt } from '../rule/RuleIndex';
import type { RuleIndexer } from '../rule/RuleIndexer';
import type { Startable } from './Startable';

export const CLEAR_RULES_OVERLOADED_DEBT_KEY = 'ClearRulesOverloadedDebt';

/** Set only while the remediation-model plugin is installed and licensed. */
export const REMEDIATION_MODEL_LICENSE_PROPERTY =
  'qualitydebt.remediationModel.licenseHash.secured';

const log = createLogger('ClearRulesOverloadedDebt');

/**
 * Removes per-rule remediation overrides left behind by older migrations when
 * the remediation-model plugin that owned them is not installed.
 *
 * Runs once per database: a loaded-template marker records the execution.
 */
export class ClearRulesOverloadedDebt implements Startable {
  readonly name = CLEAR_RULES_OVERLOADED_DEBT_KEY;

  constructor(
    private readonly deps: {
      dbClient: DbClient;
      ruleIndexer: RuleIndexer;
      clock: Clock;
    },
  ) {}

  async start(): Promise<void> {
    const executed = await withSession(this.deps.dbClient, async (session) => {
      if (await this.hasAlreadyBeenExecuted(session)) return false;

      if (!(await this.isRemediationPluginInstalled(session))) {
        await this.clearDebt(session);
      }
      await this.markAsExecuted(session);
      await session.commit();
      return true;
    });

    if (executed) await this.deps.ruleIndexer.index();
  }

  async stop(): Promise<void> {
    // Nothing to release.
  }

  private async clearDebt(session: DbSession): Promise<number> {
    let cleared = 0;
    for (const rule of await session.rules.selectAll()) {
      if (!hasOverloadedDebt(rule)) continue;

      const updated: RuleRecord = {
        ...rule,
        remediationFunction: null,
        remediationGapMultiplier: null,
        remediationBaseEffort: null,
        updatedAt: this.deps.clock.now(),
      };
      await session.rules.update(updated);
      cleared += 1;
    }

    if (cleared > 0) {
      log.warn(
        'The remediation model has been cleaned to remove any redundant data left over from previous migrations.',
        { clearedRules: cleared },
      );
      log.warn(
        '=> As a result, the technical debt of existing issues in your projects may change slightly when those projects are reanalyzed.',
      );
    }
    return cleared;
  }

  private async isRemediationPluginInstalled(session: DbSession) {
    const property = await session.properties.selectGlobalProperty(
      REMEDIATION_MODEL_LICENSE_PROPERTY,
    );
    return property !== null;
  }

  private async hasAlreadyBeenExecuted(session: DbSession) {
    const count = await session.loadedTemplates.countByTypeAndKey(
      ONE_SHOT_TASK_TYPE,
      CLEAR_RULES_OVERLOADED_DEBT_KEY,
    );
    return count > 0;
  }

  private async markAsExecuted(session: DbSession) {
    await session.loadedTemplates.insert({
      key: CLEAR_RULES_OVERLOADED_DEBT_KEY,
      type: ONE_SHOT_TASK_TYPE,
    });
  }
}
