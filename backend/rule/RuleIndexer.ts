import { withSession, type DbClient } from '../db/DbClient';
import { createLogger } from '../logging/Logger';
import type { Clock } from '../platform/Clock';
import { telemetry } from '../telemetry/Telemetry';
import { toRuleDocument, type RuleIndex } from './RuleIndex';

export class RuleIndexer {
  private readonly log = createLogger('RuleIndexer');

  constructor(
    private readonly dbClient: DbClient,
    private readonly ruleIndex: RuleIndex,
    private readonly clock: Clock,
  ) {}

  /** Rebuilds the whole index from committed rule rows. Returns the document count. */
  async index(): Promise<number> {
    return telemetry.time('rules.index', {}, async () => {
      const rules = await withSession(this.dbClient, (session) =>
        session.rules.selectAll(),
      );
      this.ruleIndex.replaceAll(rules.map(toRuleDocument), this.clock.now());
      this.log.info('rules indexed', { count: rules.length });
      return rules.length;
    });
  }
}
