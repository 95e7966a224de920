import type { DbSession } from '../db/DbClient';
import type { OrganizationRecord } from '../db/records';
import type { Languages } from '../languages/Languages';
import { toQualityProfile, type QualityProfile } from './QualityProfile';

/**
 * Read access to an organization's profiles. The per-language lookups return
 * at most one profile per requested language.
 */
export class QualityProfileFinder {
  constructor(private readonly languages: Languages) {}

  /** Every profile whose language is installed. */
  async allProfiles(
    session: DbSession,
    organization: OrganizationRecord,
  ): Promise<QualityProfile[]> {
    const records = await session.qualityProfiles.selectAll(organization.uuid);
    return records
      .filter((record) => this.languages.has(record.language))
      .map((record) => toQualityProfile(record, organization));
  }

  async profilesByLanguage(
    session: DbSession,
    organization: OrganizationRecord,
    language: string,
  ): Promise<QualityProfile[]> {
    const records = await session.qualityProfiles.selectByLanguage(
      organization.uuid,
      language,
    );
    return records.map((record) => toQualityProfile(record, organization));
  }

  async byNameAndLanguages(
    session: DbSession,
    organization: OrganizationRecord,
    name: string,
    languages: readonly string[],
  ): Promise<QualityProfile[]> {
    const records = await session.qualityProfiles.selectByNameAndLanguages(
      organization.uuid,
      name,
      languages,
    );
    return records.map((record) => toQualityProfile(record, organization));
  }

  async byProjectAndLanguages(
    session: DbSession,
    organization: OrganizationRecord,
    projectKey: string,
    languages: readonly string[],
  ): Promise<QualityProfile[]> {
    const records = await session.qualityProfiles.selectByProjectAndLanguages(
      organization.uuid,
      projectKey,
      languages,
    );
    return records.map((record) => toQualityProfile(record, organization));
  }

  async defaults(
    session: DbSession,
    organization: OrganizationRecord,
    languages: readonly string[],
  ): Promise<QualityProfile[]> {
    const records = await session.qualityProfiles.selectDefaults(
      organization.uuid,
      languages,
    );
    return records.map((record) => toQualityProfile(record, organization));
  }
}
