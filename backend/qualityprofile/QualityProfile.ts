import type { OrganizationRecord, QualityProfileRecord } from '../db/records';

/** A stored profile as seen by the web services, scoped to its organization. */
export type QualityProfile = {
  key: string;
  name: string;
  language: string;
  parentKey: string | null;
  isDefault: boolean;
  rulesUpdatedAt: string | null;
  organizationUuid: string;
  organizationKey: string;
};

export const toQualityProfile = (
  record: QualityProfileRecord,
  organization: OrganizationRecord,
): QualityProfile => ({
  key: record.key,
  name: record.name,
  language: record.language,
  parentKey: record.parentKey,
  isDefault: record.isDefault,
  rulesUpdatedAt: record.rulesUpdatedAt,
  organizationUuid: organization.uuid,
  organizationKey: organization.key,
});

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Language first, then name. */
export const compareQualityProfiles = (
  left: QualityProfile,
  right: QualityProfile,
): number =>
  compareStrings(left.language, right.language) ||
  compareStrings(left.name, right.name);
