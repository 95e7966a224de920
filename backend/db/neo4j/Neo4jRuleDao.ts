import neo4j from 'neo4j-driver';
import { z } from 'zod';

import type { RuleDao } from '../DbClient';
import type { RuleRecord } from '../records';
import { RuleRecordSchema } from '../schemas';
import type { CypherRunner } from './Neo4jDbClient';

const UpdatedRowSchema = z.object({ updated: z.number() });

export class Neo4jRuleDao implements RuleDao {
  constructor(private readonly cypher: CypherRunner) {}

  async selectAll(): Promise<RuleRecord[]> {
    const rows = await this.cypher.run(
      `
        MATCH (r:Rule)
        RETURN r { .* } AS rule
        ORDER BY r.key ASC
      `.trim(),
    );
    return rows.map((row) => RuleRecordSchema.parse(row.rule));
  }

  /** Writes every mutable column; a null value removes the node property. */
  async update(rule: RuleRecord): Promise<void> {
    const rows = await this.cypher.run(
      `
        MATCH (r:Rule {key: $key})
        SET r.name = $name,
            r.language = $language,
            r.remediationFunction = $remediationFunction,
            r.remediationGapMultiplier = $remediationGapMultiplier,
            r.remediationBaseEffort = $remediationBaseEffort,
            r.updatedAt = $updatedAt
        RETURN count(r) AS updated
      `.trim(),
      {
        key: rule.key,
        name: rule.name,
        language: rule.language,
        remediationFunction: rule.remediationFunction,
        remediationGapMultiplier: rule.remediationGapMultiplier,
        remediationBaseEffort: rule.remediationBaseEffort,
        updatedAt: neo4j.int(rule.updatedAt),
      },
    );
    const updated = rows[0] ? UpdatedRowSchema.parse(rows[0]).updated : 0;
    if (updated === 0) throw new Error(`Rule ${rule.key} does not exist.`);
  }
}
