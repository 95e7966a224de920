import { z } from 'zod';

import type { QualityProfileDao } from '../DbClient';
import { firstPerLanguage } from '../profileSelection';
import type { QualityProfileRecord } from '../records';
import { QualityProfileRecordSchema } from '../schemas';
import type { CypherRow, CypherRunner } from './Neo4jDbClient';

const CountByProfileRowSchema = z.object({
  profileKey: z.string(),
  total: z.number(),
});

const profileOrder = `ORDER BY p.language ASC, p.name ASC, p.key ASC`;

const toProfiles = (rows: CypherRow[]): QualityProfileRecord[] =>
  rows.map((row) => QualityProfileRecordSchema.parse(row.profile));

const toCounts = (
  rows: CypherRow[],
  profileKeys: readonly string[],
): Map<string, number> => {
  const counts = new Map<string, number>(profileKeys.map((key) => [key, 0]));
  for (const row of rows) {
    const { profileKey, total } = CountByProfileRowSchema.parse(row);
    counts.set(profileKey, total);
  }
  return counts;
};

/**
 * Profiles are `:QualityProfile` nodes. A project uses a non-default profile
 * through `(:Component)-[:USES_PROFILE]->(:QualityProfile)`; active rules hang
 * off `(:QualityProfile)-[:ACTIVATES]->(:Rule)`.
 */
export class Neo4jQualityProfileDao implements QualityProfileDao {
  constructor(private readonly cypher: CypherRunner) {}

  async selectAll(organizationUuid: string): Promise<QualityProfileRecord[]> {
    const rows = await this.cypher.run(
      `
        MATCH (p:QualityProfile {organizationUuid: $organizationUuid})
        RETURN p { .* } AS profile
        ${profileOrder}
      `.trim(),
      { organizationUuid },
    );
    return toProfiles(rows);
  }

  async selectByLanguage(
    organizationUuid: string,
    language: string,
  ): Promise<QualityProfileRecord[]> {
    const rows = await this.cypher.run(
      `
        MATCH (p:QualityProfile {organizationUuid: $organizationUuid, language: $language})
        RETURN p { .* } AS profile
        ${profileOrder}
      `.trim(),
      { organizationUuid, language },
    );
    return toProfiles(rows);
  }

  async selectByNameAndLanguages(
    organizationUuid: string,
    name: string,
    languages: readonly string[],
  ): Promise<QualityProfileRecord[]> {
    if (languages.length === 0) return [];
    const rows = await this.cypher.run(
      `
        MATCH (p:QualityProfile {organizationUuid: $organizationUuid, name: $name})
        WHERE p.language IN $languages
        RETURN p { .* } AS profile
        ${profileOrder}
      `.trim(),
      { organizationUuid, name, languages: [...languages] },
    );
    return firstPerLanguage(toProfiles(rows));
  }

  async selectByProjectAndLanguages(
    organizationUuid: string,
    projectKey: string,
    languages: readonly string[],
  ): Promise<QualityProfileRecord[]> {
    if (languages.length === 0) return [];
    const rows = await this.cypher.run(
      `
        MATCH (:Component {key: $projectKey})-[:USES_PROFILE]->(p:QualityProfile {organizationUuid: $organizationUuid})
        WHERE p.language IN $languages
        RETURN p { .* } AS profile
        ${profileOrder}
      `.trim(),
      { organizationUuid, projectKey, languages: [...languages] },
    );
    return firstPerLanguage(toProfiles(rows));
  }

  async selectDefaults(
    organizationUuid: string,
    languages: readonly string[],
  ): Promise<QualityProfileRecord[]> {
    if (languages.length === 0) return [];
    const rows = await this.cypher.run(
      `
        MATCH (p:QualityProfile {organizationUuid: $organizationUuid, isDefault: true})
        WHERE p.language IN $languages
        RETURN p { .* } AS profile
        ${profileOrder}
      `.trim(),
      { organizationUuid, languages: [...languages] },
    );
    return firstPerLanguage(toProfiles(rows));
  }

  async countActiveRulesByProfile(
    profileKeys: readonly string[],
  ): Promise<Map<string, number>> {
    if (profileKeys.length === 0) return new Map();
    const rows = await this.cypher.run(
      `
        UNWIND $profileKeys AS profileKey
        OPTIONAL MATCH (:QualityProfile {key: profileKey})-[:ACTIVATES]->(r:Rule)
        RETURN profileKey, count(r) AS total
      `.trim(),
      { profileKeys: [...profileKeys] },
    );
    return toCounts(rows, profileKeys);
  }

  async countProjectsByProfile(
    profileKeys: readonly string[],
  ): Promise<Map<string, number>> {
    if (profileKeys.length === 0) return new Map();
    const rows = await this.cypher.run(
      `
        UNWIND $profileKeys AS profileKey
        OPTIONAL MATCH (c:Component)-[:USES_PROFILE]->(:QualityProfile {key: profileKey})
        RETURN profileKey, count(c) AS total
      `.trim(),
      { profileKeys: [...profileKeys] },
    );
    return toCounts(rows, profileKeys);
  }
}
